/**
 * HTML to Text
 *
 * SEC exhibit pages arrive as HTML. Block elements break lines so that
 * headings and paragraphs survive as separate sentences; every text node is
 * kept, in document order, including text sitting directly in <body>.
 */

import * as cheerio from 'cheerio';
import { isTag, isText, type AnyNode } from 'domhandler';

const HTML_MARKER_PATTERN = /<\s*(html|body|div|p|table|br|span|font|h[1-6])\b[^>]*>/i;

const BLOCK_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'body', 'center', 'dd', 'div', 'dl', 'dt',
  'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr', 'li', 'main',
  'nav', 'ol', 'p', 'pre', 'section', 'table', 'tbody', 'tfoot', 'thead', 'tr', 'ul',
]);

const CELL_TAGS = new Set(['td', 'th']);

const SKIPPED_TAGS = new Set(['head', 'noscript', 'script', 'style', 'template']);

interface LineBuffer {
  lines: string[];
  current: string;
}

function breakLine(buffer: LineBuffer): void {
  const line = buffer.current.replace(/\s+/g, ' ').trim();
  if (line.length > 0) {
    buffer.lines.push(line);
  }
  buffer.current = '';
}

function collectText(nodes: readonly AnyNode[], buffer: LineBuffer): void {
  for (const node of nodes) {
    if (isText(node)) {
      buffer.current += node.data;
      continue;
    }
    // comments, doctype
    if (!isTag(node)) continue;

    const name = node.name.toLowerCase();
    if (SKIPPED_TAGS.has(name)) continue;

    if (name === 'br') {
      breakLine(buffer);
      continue;
    }

    const block = BLOCK_TAGS.has(name);
    if (block) breakLine(buffer);

    collectText(node.children, buffer);

    if (block) {
      breakLine(buffer);
    } else if (CELL_TAGS.has(name)) {
      buffer.current += ' ';
    }
  }
}

/**
 * Whether a source looks like HTML markup rather than plain or markdown text
 */
export function looksLikeHtml(text: string): boolean {
  return HTML_MARKER_PATTERN.test(text.slice(0, 5000));
}

/**
 * Convert HTML to plain text. Whitespace inside a block collapses to single
 * spaces; block boundaries and <br> become newlines; table cells are
 * separated by a space.
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  const buffer: LineBuffer = { lines: [], current: '' };

  collectText($.root().contents().toArray(), buffer);
  breakLine(buffer);

  return buffer.lines.join('\n');
}
