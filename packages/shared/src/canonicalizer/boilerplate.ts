/**
 * Formatting Noise & Boilerplate Removal
 *
 * Line-level rules for exhibit headers, page furniture and markdown syntax.
 * Rules remove markup and furniture only; sentence text is never rewritten.
 */

/** Whole lines that carry no deal content */
const BOILERPLATE_LINE_PATTERNS: RegExp[] = [
  /^exhibit\s+\d+(?:\.\d+)*[a-z]?\.?$/i,
  /^execution\s+(?:version|copy)$/i,
  /^conformed\s+copy$/i,
  /^\[?\s*remainder\s+of\s+(?:this\s+)?page\s+(?:is\s+)?intentionally\s+(?:left\s+)?blank\.?\s*\]?$/i,
  /^\[?\s*signature\s+pages?\s+(?:follows?|to\s+follow)\.?\s*\]?$/i,
  /^-\s*\d{1,4}\s*-$/,
  /^page\s+\d{1,4}(?:\s+of\s+\d{1,4})?$/i,
  /^\[\d{1,4}\]$/,
];

/** Furniture that appears inside lines after HTML flattening */
const BOILERPLATE_INLINE_PATTERNS: RegExp[] = [
  /\[\s*remainder\s+of\s+(?:this\s+)?page\s+(?:is\s+)?intentionally\s+(?:left\s+)?blank\.?\s*\]/gi,
  /\[\s*signature\s+pages?\s+(?:follows?|to\s+follow)\.?\s*\]/gi,
  /\bexhibit\s+10\.\d+\s+(?=[A-Z])/g,
  /\[\d{1,4}\]/g,
];

const MARKDOWN_RULE_PATTERN = /^\s*(?:[-*_]\s*){3,}$/;
const MARKDOWN_TABLE_SEPARATOR_PATTERN = /^\|?\s*:?-{3,}:?\s*(?:\|\s*:?-{3,}:?\s*)*\|?$/;

/**
 * Remove markdown syntax, keeping the words it decorates.
 */
export function stripMarkdown(text: string): string {
  return text
    .split('\n')
    .filter((line) => !MARKDOWN_RULE_PATTERN.test(line) && !MARKDOWN_TABLE_SEPARATOR_PATTERN.test(line.trim()))
    .map((line) =>
      line
        .replace(/^\s{0,3}#{1,6}\s+/, '')
        .replace(/^\s*>\s?/, '')
        .replace(/^\s*[-*+]\s+/, '')
        .replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
        .replace(/\*\*(.+?)\*\*/g, '$1')
        .replace(/__(.+?)__/g, '$1')
        .replace(/(?<![\w*])\*(?!\s)([^*\n]+?)(?<!\s)\*(?![\w*])/g, '$1')
        .replace(/`([^`]+)`/g, '$1')
        .replace(/^\|\s*(.*?)\s*\|$/, '$1')
        .replace(/\s+\|\s+/g, ' | ')
    )
    .join('\n');
}

/**
 * Remove exhibit headers, execution-version stamps, page numbers and
 * intentionally-blank notices.
 */
export function stripBoilerplate(text: string): string {
  return text
    .split('\n')
    .map((line) => BOILERPLATE_INLINE_PATTERNS.reduce((acc, pattern) => acc.replace(pattern, ''), line))
    .filter((line) => !BOILERPLATE_LINE_PATTERNS.some((pattern) => pattern.test(line.trim())))
    .join('\n');
}

export interface RepeatedLineOptions {
  /** Occurrences at which a line counts as a repeated disclaimer */
  minOccurrences: number;
  /** Shorter lines (headings, table cells) are never treated as disclaimers */
  minLength: number;
}

export const DEFAULT_REPEATED_LINE_OPTIONS: RepeatedLineOptions = {
  minOccurrences: 3,
  minLength: 20,
};

/**
 * Keep only the first occurrence of lines repeated often enough to be
 * running headers or disclaimers.
 */
export function dropRepeatedLines(
  text: string,
  options: RepeatedLineOptions = DEFAULT_REPEATED_LINE_OPTIONS
): string {
  const lines = text.split('\n');
  const counts = new Map<string, number>();

  for (const line of lines) {
    const key = line.trim();
    if (key.length >= options.minLength) {
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }

  const seen = new Set<string>();
  return lines
    .filter((line) => {
      const key = line.trim();
      if ((counts.get(key) ?? 0) < options.minOccurrences) return true;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    })
    .join('\n');
}

/**
 * Collapse runs of spaces, trim lines and allow at most one blank line in a row.
 */
export function collapseWhitespace(text: string): string {
  return text
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
