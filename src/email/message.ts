/**
 * Grouped Message Builder
 *
 * One plain-text message per recipient with every staged document attached.
 * Attachments are given to nodemailer by path and read at send time; each
 * is named after the document's base filename.
 */

import path from 'node:path';
import type { SendMailOptions } from 'nodemailer';
import type { GroupedMessageInput } from './types.js';

export const PDF_CONTENT_TYPE = 'application/pdf';

export function buildGroupedMessage(input: GroupedMessageInput): SendMailOptions {
  return {
    from: input.from,
    to: input.to,
    subject: input.subject,
    text: input.body,
    attachments: input.attachments.map((filePath) => ({
      filename: path.basename(filePath),
      path: filePath,
      contentType: PDF_CONTENT_TYPE,
    })),
  };
}
