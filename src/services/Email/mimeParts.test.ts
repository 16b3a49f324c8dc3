import { describe, expect, it } from 'vitest';
import { entityBody, multipartBoundary, splitMultipart } from './mimeParts';
import { parseMime } from './MessageDecoder';

describe('entityBody', () => {
  it('returns what follows the header block', () => {
    expect(entityBody(Buffer.from('Subject: x\r\n\r\nbody\r\n')).toString()).toBe('body\r\n');
    expect(entityBody(Buffer.from('Subject: x\n\nbody')).toString()).toBe('body');
  });

  it('is empty when there is no body', () => {
    expect(entityBody(Buffer.from('Subject: x')).length).toBe(0);
  });
});

describe('splitMultipart', () => {
  it('drops the preamble and epilogue', () => {
    const body = Buffer.from('preamble\r\n--b\r\none\r\n--b\r\ntwo\r\n--b--\r\nepilogue');

    expect(splitMultipart(body, 'b').map(part => part.toString())).toEqual(['one', 'two']);
  });

  it('keeps an unterminated last part', () => {
    const body = Buffer.from('--b\nonly\nlines');

    expect(splitMultipart(body, 'b').map(part => part.toString())).toEqual(['only\r\nlines']);
  });

  it('preserves non-ASCII bytes', () => {
    const body = Buffer.concat([Buffer.from('--b\r\n'), Buffer.from('café', 'utf8'), Buffer.from('\r\n--b--')]);

    expect(splitMultipart(body, 'b')[0].toString('utf8')).toBe('café');
  });
});

describe('multipartBoundary', () => {
  it('reads the boundary of a multipart entity', async () => {
    const parsed = await parseMime(Buffer.from('Content-Type: multipart/mixed; boundary="abc"\r\n\r\n--abc--'));

    expect(multipartBoundary(parsed)).toBe('abc');
  });

  it('is null for a leaf part', async () => {
    const parsed = await parseMime(Buffer.from('Content-Type: text/plain\r\n\r\nhello'));

    expect(multipartBoundary(parsed)).toBeNull();
  });
});
