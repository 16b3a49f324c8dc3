// src/services/Email/MessageDecoder.ts

import { simpleParser, type ParsedMail } from 'mailparser';
import type { DecodedMessage, RawMessage } from '../../Types/model';
import DebugLogger from '../../utils/DebugLogger';
import { errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { err, ok, partitionResults, type Result } from '../../utils/result';
import type { DecodeBatch, DecodeFailure, IMessageDecoder } from './interfaces';
import { entityBody, multipartBoundary, splitMultipart } from './mimeParts';

export type MimeParser = (source: Buffer) => Promise<ParsedMail>;

// Keep text and html exactly as the parts carry them; no derived bodies
export const parseMime: MimeParser = source => simpleParser(source, {
  skipHtmlToText: true,
  skipTextToHtml: true,
  skipImageLinks: true,
  skipTextLinks: true,
});

/**
 * Turns raw RFC 822 messages into header fields plus the best available body.
 */
export class MessageDecoder implements IMessageDecoder {
  private logger = createLogger('MessageDecoder');

  constructor(private parse: MimeParser = parseMime) {}

  async decode(raw: RawMessage): Promise<DecodedMessage> {
    const parsed = await this.parse(raw.source);

    const decoded: DecodedMessage = {
      sender: parsed.from?.text ?? '',
      subject: parsed.subject ?? '',
      date: this.rawHeaderValue(parsed, 'date'),
      ...(await this.selectBody(raw.source, parsed)),
    };

    DebugLogger.log('[MessageDecoder] Decoded message', {
      id: raw.id,
      subject: decoded.subject,
      hasPlain: decoded.bodyPlain !== undefined,
      hasHtml: decoded.bodyHtml !== undefined
    });

    return decoded;
  }

  async tryDecode(raw: RawMessage): Promise<Result<DecodedMessage, DecodeFailure>> {
    try {
      return ok(await this.decode(raw));
    } catch (error) {
      return err({
        messageId: raw.id,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  /**
   * Decodes every message, skipping the ones that cannot be parsed.
   */
  async decodeAll(raws: RawMessage[]): Promise<DecodeBatch> {
    const results: Result<DecodedMessage, DecodeFailure>[] = [];
    for (const raw of raws) {
      results.push(await this.tryDecode(raw));
    }

    const { values, errors } = partitionResults(results);
    for (const failure of errors) {
      this.logger.warn(`Skipping message ${failure.messageId}: ${failure.error.message}`);
    }
    return { messages: values, failures: errors };
  }

  /**
   * Walks the leaf parts in document order. The first text/plain part wins outright;
   * otherwise the first text/html part is the fallback.
   */
  private async selectBody(source: Buffer, root: ParsedMail): Promise<Pick<DecodedMessage, 'bodyPlain' | 'bodyHtml'>> {
    let firstHtml: string | undefined;
    for await (const part of this.leafParts(source, root)) {
      if (typeof part.text === 'string') {
        return { bodyPlain: part.text };
      }
      if (firstHtml === undefined && typeof part.html === 'string' && part.html) {
        firstHtml = part.html;
      }
    }
    return firstHtml === undefined ? {} : { bodyHtml: firstHtml };
  }

  private async *leafParts(source: Buffer, parsed: ParsedMail): AsyncGenerator<ParsedMail> {
    const boundary = multipartBoundary(parsed);
    if (!boundary) {
      yield parsed;
      return;
    }

    for (const child of splitMultipart(entityBody(source), boundary)) {
      let childParsed: ParsedMail;
      try {
        childParsed = await this.parse(child);
      } catch (error) {
        this.logger.warn(`Skipping undecodable MIME part: ${errorMessage(error)}`);
        continue;
      }
      yield* this.leafParts(child, childParsed);
    }
  }

  /**
   * Header value as it appeared on the wire (unfolded), without mailparser's reinterpretation.
   */
  private rawHeaderValue(parsed: ParsedMail, key: string): string {
    const headerLine = parsed.headerLines.find(header => header.key === key);
    if (!headerLine) return '';

    const separator = headerLine.line.indexOf(':');
    return headerLine.line
      .slice(separator + 1)
      .replace(/\r?\n[ \t]+/g, ' ')
      .trim();
  }
}
