/**
 * SMTP Transport
 *
 * Authenticated, encrypted SMTP via nodemailer. Port 465 uses implicit TLS;
 * any other port must upgrade with STARTTLS or the send fails. The transport
 * is not pooled, so each send opens its own session.
 */

import nodemailer from 'nodemailer';
import type { SmtpSettings } from '../config.js';
import type { MailTransport } from './types.js';

const IMPLICIT_TLS_PORT = 465;

export function createSmtpTransport(smtp: SmtpSettings): MailTransport {
  const implicitTls = smtp.port === IMPLICIT_TLS_PORT;

  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: {
      user: smtp.senderEmail,
      pass: smtp.senderPassword,
    },
  });
}
