import { describe, it, expect, vi, beforeEach } from 'vitest';

// vi.hoisted runs before vi.mock hoisting — safe for mock variables
const { mockCreateTransport } = vi.hoisted(() => ({
  mockCreateTransport: vi.fn(() => ({ sendMail: vi.fn(), close: vi.fn() })),
}));

vi.mock('nodemailer', () => ({
  default: { createTransport: mockCreateTransport },
}));

import { createSmtpTransport } from '../transport.js';

const smtp = {
  host: 'smtp.test.local',
  port: 587,
  senderEmail: 'sender@test.com',
  senderPassword: 'test-secret',
};

describe('createSmtpTransport', () => {
  beforeEach(() => {
    mockCreateTransport.mockClear();
  });

  it('requires STARTTLS and authenticates as the sender on the submission port', () => {
    createSmtpTransport(smtp);

    expect(mockCreateTransport).toHaveBeenCalledWith({
      host: 'smtp.test.local',
      port: 587,
      secure: false,
      requireTLS: true,
      auth: { user: 'sender@test.com', pass: 'test-secret' },
    });
  });

  it('uses implicit TLS on port 465', () => {
    createSmtpTransport({ ...smtp, port: 465 });

    expect(mockCreateTransport).toHaveBeenCalledWith(
      expect.objectContaining({ port: 465, secure: true, requireTLS: false }),
    );
  });
});
