// src/services/Email/mimeParts.ts

import type { ParsedMail } from 'mailparser';

/**
 * Boundary of a multipart entity, or null for a leaf part.
 */
export function multipartBoundary(parsed: ParsedMail): string | null {
  const header = parsed.headers.get('content-type');
  if (typeof header !== 'object' || header === null || Array.isArray(header) || header instanceof Date) {
    return null;
  }
  if (!('params' in header) || !header.value.toLowerCase().startsWith('multipart/')) {
    return null;
  }
  return header.params.boundary || null;
}

/**
 * Everything after the blank line that ends the header block.
 */
export function entityBody(source: Buffer): Buffer {
  const crlf = source.indexOf('\r\n\r\n');
  const lf = source.indexOf('\n\n');
  if (crlf !== -1 && (lf === -1 || crlf < lf)) return source.subarray(crlf + 4);
  if (lf !== -1) return source.subarray(lf + 2);
  return Buffer.alloc(0);
}

/**
 * Child entities of a multipart body in document order. Preamble and epilogue are dropped;
 * an unterminated last part is kept.
 */
export function splitMultipart(body: Buffer, boundary: string): Buffer[] {
  const delimiter = `--${boundary}`;
  // latin1 keeps every byte as one char, so the round trip is lossless
  const lines = body.toString('latin1').split(/\r?\n/);

  const parts: string[][] = [];
  let current: string[] | null = null;

  for (const line of lines) {
    const marker = line.trimEnd();
    if (marker === `${delimiter}--`) {
      if (current) parts.push(current);
      current = null;
      break;
    }
    if (marker === delimiter) {
      if (current) parts.push(current);
      current = [];
      continue;
    }
    current?.push(line);
  }
  if (current) parts.push(current);

  return parts.map(part => Buffer.from(part.join('\r\n'), 'latin1'));
}
