/**
 * Reduces archived HTML pages to their visible text
 */

import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';

const NON_CONTENT = 'script, style, noscript, template, svg, iframe, head';

const BLOCK_ELEMENTS = 'p, div, section, article, li, ul, ol, h1, h2, h3, h4, h5, h6, tr, br, hr, header, footer, main, aside, nav, table, blockquote, pre';

/**
 * Whether a body looks like an HTML document rather than plain text
 */
export function looksLikeHtml(content: string): boolean {
  return /<(!doctype\s+html|html|head|body)[\s>]/i.test(content.substring(0, 2048));
}

export class TextExtractor {
  /**
   * Extract visible text, one line per block element.
   * Plain-text bodies (such as robots.txt) are returned unchanged.
   */
  extract(content: string): string {
    if (!looksLikeHtml(content)) {
      return content;
    }

    const $ = cheerio.load(content);
    $(NON_CONTENT).remove();
    $(BLOCK_ELEMENTS).each((_, element) => {
      $(element).append('\n');
    });

    const root: cheerio.Cheerio<AnyNode> = $('body').length > 0 ? $('body') : $.root();
    return root
      .text()
      .split('\n')
      .map((line) => line.replace(/\s+/g, ' ').trim())
      .filter((line) => line.length > 0)
      .join('\n');
  }
}
