// src/services/Email/TextSanitizer.ts

import EmailReplyParser from 'email-reply-parser';
import DebugLogger from '../../utils/DebugLogger';
import { createLogger } from '../../utils/logger';
import type { ITextSanitizer, SanitizeMode } from './interfaces';

const BASE_ENTITIES: ReadonlyArray<[string, string]> = [
  ['&nbsp;', ' '],
  ['&amp;', '&'],
  ['&lt;', '<'],
  ['&gt;', '>'],
  ['&quot;', '"'],
  ['&#39;', "'"],
  ['&apos;', "'"],
  ['&mdash;', '—'],
  ['&ndash;', '–'],
  ['&hellip;', '...'],
];

const INDEX_ENTITIES: ReadonlyArray<[string, string]> = [
  ...BASE_ENTITIES,
  ['&copy;', '(c)'],
  ['&reg;', '(R)'],
];

const STYLE_BLOCK = /<style[^>]*>[\s\S]*?<\/style>/gi;
const SCRIPT_BLOCK = /<script[^>]*>[\s\S]*?<\/script>/gi;
const HTML_TAG = /<[^>]+>/g;
const HTML_COMMENT = /<!--[\s\S]*?-->/g;
const CSS_COMMENT = /\/\*[\s\S]*?\*\//g;
const CSS_DECLARATION = /\b[a-zA-Z-]+\s*:\s*[^;{}\n]+;/g;
const CSS_AT_RULE = /@[a-zA-Z-]+\s+[^{]*\{[^}]*\}/g;
const BRACE_BLOCK = /\{[^{}]*\}/g;
const LEADING_NUMBER = /^\d+\s+/;
const STANDALONE_NUMBER = /\s+\d+\s+/g;
const WHITESPACE_RUN = /\s+/g;

/**
 * Reduces email bodies to plain, whitespace-normalized text.
 *
 * `display` mode is what records are built with. `index` mode additionally drops
 * stray numeric entity codes, CSS at-rules and the quoted reply chain, and is what
 * gets embedded into the vector store.
 */
export class TextSanitizer implements ITextSanitizer {
  private logger = createLogger('TextSanitizer');

  /**
   * Picks the record body: plain text verbatim when there is any, otherwise the cleaned HTML.
   */
  sanitize(bodyPlain: string | undefined, bodyHtml: string | undefined): string {
    if (bodyPlain) {
      return bodyPlain;
    }
    if (bodyHtml) {
      return this.clean(bodyHtml, 'display');
    }
    return '';
  }

  clean(text: string, mode: SanitizeMode = 'display'): string {
    const forIndex = mode === 'index';

    // 1. Style and script blocks, contents included
    let body = text.replace(STYLE_BLOCK, '').replace(SCRIPT_BLOCK, '');

    // 2. Remaining tags
    body = body.replace(HTML_TAG, '');

    // 3. Named entities
    for (const [entity, replacement] of forIndex ? INDEX_ENTITIES : BASE_ENTITIES) {
      body = body.split(entity).join(replacement);
    }

    // 4. HTML and CSS comments
    body = body.replace(HTML_COMMENT, '').replace(CSS_COMMENT, '');

    // 5. CSS declarations; may eat prose shaped like `word: text;`
    body = body.replace(CSS_DECLARATION, '');
    if (forIndex) {
      body = body.replace(CSS_AT_RULE, '');
    }

    // 6. Leftover rule bodies
    body = body.replace(BRACE_BLOCK, '');

    if (forIndex) {
      // 7. Numeric entity codes that survived decoding (lossy)
      body = body.replace(LEADING_NUMBER, '').replace(STANDALONE_NUMBER, ' ');

      // 8. Keep only the newest message of a reply chain
      body = this.stripReplyChain(body);
    }

    // 9. Whitespace
    return body.replace(WHITESPACE_RUN, ' ').trim();
  }

  stripReplyChain(text: string): string {
    try {
      const parsedEmail = new EmailReplyParser().read(text);
      const visible = parsedEmail.getFragments()
        .filter(fragment => !fragment.isQuoted() && !fragment.isHidden() && !fragment.isSignature())
        .map(fragment => fragment.getContent().trim())
        .filter(content => content.length > 0);

      DebugLogger.log('Reply chain parsed', {
        totalFragments: parsedEmail.getFragments().length,
        visibleFragments: visible.length
      });

      return visible.join('\n');
    } catch (error) {
      this.logger.warn('Reply parser failed, keeping full text:', error);
      return text;
    }
  }
}
