/**
 * Value Parsing Patterns
 *
 * Regular expressions for reading money amounts, percentages and dates out of
 * credit-agreement prose. Shared by the rule-based backend (to extract) and
 * the evaluator (to check that a value is traceable to its source).
 */

export interface AmountMatch {
  amount: number;
  currency: string;
  text: string;
  index: number;
}

export interface PercentageMatch {
  percentage: number;
  text: string;
  index: number;
}

export interface DateMatch {
  /** YYYY-MM-DD */
  date: string;
  text: string;
  index: number;
}

const CURRENCY_CODES: Record<string, string> = {
  'us$': 'USD',
  $: 'USD',
  usd: 'USD',
  '€': 'EUR',
  eur: 'EUR',
  '£': 'GBP',
  gbp: 'GBP',
};

const SCALES: Record<string, number> = {
  billion: 1e9,
  bn: 1e9,
  million: 1e6,
  mm: 1e6,
  m: 1e6,
  thousand: 1e3,
  k: 1e3,
};

/**
 * Money amount - currency marker, digits with optional thousands separators,
 * optional scale word.
 * Examples: $250,000,000 / $1.5 billion / USD 75 million / €40m
 */
const AMOUNT_PATTERN =
  /(?<![A-Za-z])(US\$|\$|USD|€|EUR|£|GBP)\s?(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?(?:\s*(billion|million|thousand|bn|mm|m|k)\b)?/gi;

/**
 * Percentage - "2.75%", "2.75 percent", "2.75 per cent"
 */
const PERCENT_PATTERN = /(\d+(?:\.\d+)?)\s?(?:%|percent\b|per cent\b)/gi;

/**
 * Basis points - "275 basis points", "50 bps"
 */
const BASIS_POINTS_PATTERN = /(\d+(?:\.\d+)?)\s?(?:basis points?|bps)\b/gi;

const MONTH_NAMES =
  'Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?';

const MONTH_INDEX: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const ISO_DATE_PATTERN = /\b(\d{4})-(\d{2})-(\d{2})\b/g;
const MONTH_FIRST_PATTERN = new RegExp(
  `\\b(${MONTH_NAMES})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`,
  'gi'
);
const DAY_FIRST_PATTERN = new RegExp(
  `\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:day\\s+of\\s+)?(${MONTH_NAMES})\\.?,?\\s+(\\d{4})\\b`,
  'gi'
);
const US_NUMERIC_PATTERN = /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/g;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Find every money amount in a text, in order of appearance.
 */
export function findAmounts(text: string): AmountMatch[] {
  const matches: AmountMatch[] = [];
  for (const m of text.matchAll(AMOUNT_PATTERN)) {
    const currency = CURRENCY_CODES[m[1].toLowerCase()];
    if (!currency) continue;
    const base = Number(`${m[2].replace(/,/g, '')}.${m[3] ?? '0'}`);
    const scale = m[4] ? SCALES[m[4].toLowerCase()] ?? 1 : 1;
    matches.push({
      amount: round2(base * scale),
      currency,
      text: m[0].trim(),
      index: m.index ?? 0,
    });
  }
  return matches;
}

export function parseAmount(text: string): AmountMatch | null {
  return findAmounts(text)[0] ?? null;
}

/**
 * Find every percentage (including basis points, converted to percent) in a text.
 */
export function findPercentages(text: string): PercentageMatch[] {
  const matches: PercentageMatch[] = [];
  for (const m of text.matchAll(PERCENT_PATTERN)) {
    matches.push({ percentage: Number(m[1]), text: m[0].trim(), index: m.index ?? 0 });
  }
  for (const m of text.matchAll(BASIS_POINTS_PATTERN)) {
    matches.push({ percentage: round2(Number(m[1]) / 100), text: m[0].trim(), index: m.index ?? 0 });
  }
  return matches.sort((a, b) => a.index - b.index);
}

export function parsePercentage(text: string): PercentageMatch | null {
  return findPercentages(text)[0] ?? null;
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d.toISOString().slice(0, 10);
}

function monthFromName(name: string): number {
  return MONTH_INDEX[name.slice(0, 3).toLowerCase()] ?? 0;
}

/**
 * Find every calendar date in a text, in order of appearance.
 * Invalid calendar dates (e.g. February 30) are skipped.
 */
export function findDates(text: string): DateMatch[] {
  const matches: DateMatch[] = [];
  const push = (iso: string | null, raw: string, index: number | undefined) => {
    if (iso) matches.push({ date: iso, text: raw.trim(), index: index ?? 0 });
  };

  for (const m of text.matchAll(ISO_DATE_PATTERN)) {
    push(toIsoDate(Number(m[1]), Number(m[2]), Number(m[3])), m[0], m.index);
  }
  for (const m of text.matchAll(MONTH_FIRST_PATTERN)) {
    push(toIsoDate(Number(m[3]), monthFromName(m[1]), Number(m[2])), m[0], m.index);
  }
  for (const m of text.matchAll(DAY_FIRST_PATTERN)) {
    push(toIsoDate(Number(m[3]), monthFromName(m[2]), Number(m[1])), m[0], m.index);
  }
  for (const m of text.matchAll(US_NUMERIC_PATTERN)) {
    push(toIsoDate(Number(m[3]), Number(m[1]), Number(m[2])), m[0], m.index);
  }

  return matches.sort((a, b) => a.index - b.index);
}

export function parseDate(text: string): DateMatch | null {
  return findDates(text)[0] ?? null;
}

/**
 * Normalize free text for comparison: lowercase, punctuation to spaces
 * (decimal points kept), collapse whitespace.
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/(?<!\d)\.|\.(?!\d)/g, ' ')
    .replace(/[^\p{L}\p{N}%.]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Split prose into sentences. Newlines always end a sentence; periods end one
 * unless they sit inside a number or a common abbreviation.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/\n+/)
    .flatMap((line) => line.split(/(?<!\b(?:No|Sec|Inc|Co|Corp|Ltd|U\.S|N\.A|e\.g|i\.e)\.)(?<=[.;])\s+(?=[A-Z(])/))
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
