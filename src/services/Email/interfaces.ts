// src/services/Email/interfaces.ts

import type { DecodedMessage, EmailRecord, RawMessage } from '../../Types/model';
import type { Result } from '../../utils/result';

export type SanitizeMode = 'display' | 'index';

export interface DecodeFailure {
  messageId: string;
  error: Error;
}

export interface DecodeBatch {
  messages: DecodedMessage[];
  failures: DecodeFailure[];
}

// Message Decoder Interface
export interface IMessageDecoder {
  decode(raw: RawMessage): Promise<DecodedMessage>;
  tryDecode(raw: RawMessage): Promise<Result<DecodedMessage, DecodeFailure>>;
  decodeAll(raws: RawMessage[]): Promise<DecodeBatch>;
}

// Text Sanitizer Interface
export interface ITextSanitizer {
  sanitize(bodyPlain: string | undefined, bodyHtml: string | undefined): string;
  clean(text: string, mode?: SanitizeMode): string;
}

// Email Record Builder Interface
export interface IEmailRecordBuilder {
  build(decoded: DecodedMessage): EmailRecord;
  toCanonicalText(record: EmailRecord): string;
  validate(records: readonly unknown[]): EmailRecord[];
}
