/**
 * Canonicalizer
 *
 * Turns one (source_uri, raw_text) pair into a CanonicalRecord. Formatting is
 * lossy (markup, page furniture, repeated disclaimers); sentence content is kept.
 * The record id is a content hash, so identical content always maps to the
 * same record.
 */

import { createHash } from 'node:crypto';
import { MalformedSourceError, toErrorInfo } from '../errors';
import { logger } from '../logger';
import type { CanonicalRecord, RawSource, RecordFailure } from '../types';
import {
  collapseWhitespace,
  dropRepeatedLines,
  stripBoilerplate,
  stripMarkdown,
  DEFAULT_REPEATED_LINE_OPTIONS,
  type RepeatedLineOptions,
} from './boilerplate';
import { htmlToText, looksLikeHtml } from './html';

export { htmlToText, looksLikeHtml } from './html';
export { stripMarkdown, stripBoilerplate, dropRepeatedLines, collapseWhitespace } from './boilerplate';

/** Share of control characters above which content is treated as binary */
const MAX_CONTROL_CHAR_RATIO = 0.05;

const CONTROL_CHAR_PATTERN = /[\u0001-\u0008\u000B\u000E-\u001F\u007F]/g;

export interface CanonicalizeOptions {
  now?: () => Date;
  repeatedLines?: RepeatedLineOptions;
}

/**
 * Decode the raw payload to a string, rejecting anything that is not text.
 */
function decodeText(source: RawSource): string {
  const raw: unknown = source.raw_text;

  if (typeof raw === 'string') {
    return raw;
  }

  if (raw instanceof Uint8Array) {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(raw);
    } catch {
      throw new MalformedSourceError('Source bytes are not valid UTF-8', source.source_uri);
    }
  }

  throw new MalformedSourceError('Source content is not text', source.source_uri);
}

function assertTextual(text: string, sourceUri: string): void {
  if (text.includes('\u0000')) {
    throw new MalformedSourceError('Source content contains NUL bytes', sourceUri);
  }
  const controlChars = text.match(CONTROL_CHAR_PATTERN)?.length ?? 0;
  if (text.length > 0 && controlChars / text.length > MAX_CONTROL_CHAR_RATIO) {
    throw new MalformedSourceError('Source content looks binary', sourceUri);
  }
}

/**
 * Canonical text for a document: markup flattened, noise removed,
 * whitespace normalized.
 */
export function canonicalText(
  text: string,
  repeatedLines: RepeatedLineOptions = DEFAULT_REPEATED_LINE_OPTIONS
): string {
  const flattened = looksLikeHtml(text) ? htmlToText(text) : text;

  const normalized = flattened
    .normalize('NFKC')
    .replace(/\u00A0/g, ' ')
    .replace(/\r\n?/g, '\n')
    .replace(/[\u200B\uFEFF]/g, '');

  // page markers such as "- 3 -" read as list items once markdown is stripped
  const cleaned = stripBoilerplate(stripMarkdown(stripBoilerplate(collapseWhitespace(normalized))));

  return collapseWhitespace(dropRepeatedLines(cleaned, repeatedLines));
}

export function computeRecordId(text: string): string {
  return `sha256:${createHash('sha256').update(text, 'utf8').digest('hex')}`;
}

/**
 * Canonicalize one source. Throws MalformedSourceError when the content is
 * not text or nothing is left after cleaning.
 */
export function canonicalize(source: RawSource, options: CanonicalizeOptions = {}): CanonicalRecord {
  const decoded = decodeText(source);
  assertTextual(decoded, source.source_uri);

  const text = canonicalText(decoded, options.repeatedLines);
  if (text.length === 0) {
    throw new MalformedSourceError('Source content is empty after cleaning', source.source_uri);
  }

  const now = options.now ?? (() => new Date());

  return Object.freeze({
    id: computeRecordId(text),
    source_uri: source.source_uri,
    raw_text: text,
    extracted_at: now().toISOString(),
  });
}

export interface CanonicalizeAllResult {
  records: CanonicalRecord[];
  failures: RecordFailure[];
  /** Sources skipped because an earlier source had identical content */
  duplicates: Array<{ source_uri: string; record_id: string }>;
}

/**
 * Canonicalize a stream of sources. Malformed sources become failures without
 * stopping the stream; identical content is kept once (first source wins).
 */
export async function canonicalizeAll(
  sources: Iterable<RawSource> | AsyncIterable<RawSource>,
  options: CanonicalizeOptions = {}
): Promise<CanonicalizeAllResult> {
  const result: CanonicalizeAllResult = { records: [], failures: [], duplicates: [] };
  const seen = new Set<string>();

  for await (const source of sources) {
    let record: CanonicalRecord;
    try {
      record = canonicalize(source, options);
    } catch (error) {
      logger.warn('Skipping malformed source', {
        sourceUri: source.source_uri,
        error: error instanceof Error ? error.message : String(error),
      });
      result.failures.push({
        stage: 'ingest',
        source_uri: source.source_uri,
        record_id: null,
        backend_id: null,
        error: toErrorInfo(error),
      });
      continue;
    }

    if (seen.has(record.id)) {
      logger.debug('Duplicate source content', { sourceUri: source.source_uri, recordId: record.id });
      result.duplicates.push({ source_uri: source.source_uri, record_id: record.id });
      continue;
    }

    seen.add(record.id);
    result.records.push(record);
  }

  return result;
}
