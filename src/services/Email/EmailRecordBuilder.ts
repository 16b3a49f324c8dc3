// src/services/Email/EmailRecordBuilder.ts

import { z } from 'zod';
import type { DecodedMessage, EmailRecord } from '../../Types/model';
import { StructuralValidationError } from '../../utils/errors';
import type { IEmailRecordBuilder, ITextSanitizer } from './interfaces';

export const emailRecordSchema = z.object({
  sender: z.string({ required_error: 'sender is required' }),
  subject: z.string({ required_error: 'subject is required' }),
  date: z.string({ required_error: 'date is required' }),
  body: z.string({ required_error: 'body is required' }),
});

export class EmailRecordBuilder implements IEmailRecordBuilder {
  constructor(private sanitizer: ITextSanitizer) {}

  build(decoded: DecodedMessage): EmailRecord {
    return {
      sender: decoded.sender,
      subject: decoded.subject,
      date: decoded.date,
      body: this.sanitizer.sanitize(decoded.bodyPlain, decoded.bodyHtml),
    };
  }

  /**
   * Header-prefixed text that gets embedded into the index.
   */
  toCanonicalText(record: EmailRecord): string {
    const body = this.sanitizer.clean(record.body, 'index');
    return `Sender: ${record.sender}\nSubject: ${record.subject}\nDate: ${record.date}\n\n${body}`;
  }

  /**
   * Validates a whole batch up front. One malformed record rejects the batch.
   */
  validate(records: readonly unknown[]): EmailRecord[] {
    return records.map((record, index) => {
      const result = emailRecordSchema.safeParse(record);
      if (!result.success) {
        const fields = result.error.issues.map(issue => issue.path.join('.') || '(record)');
        throw new StructuralValidationError(
          `Invalid email structure at index ${index}. Required keys: sender, subject, date, body (invalid: ${fields.join(', ')})`,
          result.error
        );
      }
      return result.data;
    });
  }
}
