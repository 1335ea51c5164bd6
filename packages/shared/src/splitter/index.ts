/**
 * Splitter
 *
 * Deterministic train/eval assignment from an externally maintained
 * membership list. A record is `eval` iff its source URI or its content hash
 * is on the list; there is no randomness, so adding documents to the corpus
 * never moves an existing record between partitions.
 */

import { createHash } from 'node:crypto';
import { AmbiguousMembershipError, toErrorInfo } from '../errors';
import { logger } from '../logger';
import type {
  CanonicalRecord,
  MembershipEntry,
  MembershipSignal,
  RecordFailure,
  SplitAssignment,
} from '../types';

const CONTENT_HASH_PATTERN = /^sha256:[0-9a-f]{64}$/;

export interface IndexedEntry {
  position: number;
  sourceUri: string | null;
  contentHash: string | null;
}

/**
 * Compare URIs on what identifies the document: scheme and host are
 * case-insensitive, a trailing slash is not significant.
 */
export function normalizeSourceUri(uri: string): string {
  const trimmed = uri.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return trimmed.replace(/\/+$/, '');
  }
  const pathname = url.pathname.replace(/\/+$/, '');
  return `${url.protocol}//${url.host}${pathname}${url.search}`;
}

function toIndexedEntry(entry: MembershipEntry, position: number): IndexedEntry {
  if (typeof entry === 'string') {
    const value = entry.trim();
    return CONTENT_HASH_PATTERN.test(value)
      ? { position, sourceUri: null, contentHash: value }
      : { position, sourceUri: normalizeSourceUri(value), contentHash: null };
  }
  return {
    position,
    sourceUri: entry.source_uri ? normalizeSourceUri(entry.source_uri) : null,
    contentHash: entry.content_hash ? entry.content_hash.trim() : null,
  };
}

function pushTo(map: Map<string, IndexedEntry[]>, key: string, entry: IndexedEntry): void {
  const list = map.get(key);
  if (list) {
    list.push(entry);
  } else {
    map.set(key, [entry]);
  }
}

/**
 * Lookup tables over one membership list, built once per run.
 */
export class MembershipIndex {
  private readonly byUri = new Map<string, IndexedEntry[]>();
  private readonly byHash = new Map<string, IndexedEntry[]>();

  constructor(readonly entries: readonly MembershipEntry[]) {
    entries.forEach((entry, position) => {
      const indexed = toIndexedEntry(entry, position);
      if (indexed.sourceUri) pushTo(this.byUri, indexed.sourceUri, indexed);
      if (indexed.contentHash) pushTo(this.byHash, indexed.contentHash, indexed);
    });
  }

  get size(): number {
    return this.entries.length;
  }

  matchesByUri(sourceUri: string): IndexedEntry[] {
    return this.byUri.get(normalizeSourceUri(sourceUri)) ?? [];
  }

  matchesByHash(contentHash: string): IndexedEntry[] {
    return this.byHash.get(contentHash) ?? [];
  }
}

export function buildMembershipIndex(entries: readonly MembershipEntry[]): MembershipIndex {
  return new MembershipIndex(entries);
}

/**
 * Assign a record to a partition.
 *
 * Throws AmbiguousMembershipError when the identity signals disagree: an
 * entry naming both a URI and a hash matches only one of them, or the URI
 * and the hash match different entries.
 */
export function assign(
  record: CanonicalRecord,
  membership: MembershipIndex | readonly MembershipEntry[]
): SplitAssignment {
  const index = membership instanceof MembershipIndex ? membership : buildMembershipIndex(membership);

  const uriMatches = index.matchesByUri(record.source_uri);
  const hashMatches = index.matchesByHash(record.id);

  for (const entry of [...uriMatches, ...hashMatches]) {
    if (!entry.sourceUri || !entry.contentHash) continue;
    const uriAgrees = uriMatches.includes(entry);
    const hashAgrees = hashMatches.includes(entry);
    if (uriAgrees !== hashAgrees) {
      throw new AmbiguousMembershipError(
        `Membership entry ${entry.position} matches this record by ${uriAgrees ? 'source URI' : 'content hash'} only`,
        record.id,
        record.source_uri
      );
    }
  }

  let matchedBy: MembershipSignal | null = null;
  if (uriMatches.length > 0 && hashMatches.length > 0) {
    const shared = uriMatches.some((entry) => hashMatches.includes(entry));
    if (!shared) {
      throw new AmbiguousMembershipError(
        `Source URI matches membership entry ${uriMatches[0].position} but content hash matches entry ${hashMatches[0].position}`,
        record.id,
        record.source_uri
      );
    }
    matchedBy = 'both';
  } else if (uriMatches.length > 0) {
    matchedBy = 'source_uri';
  } else if (hashMatches.length > 0) {
    matchedBy = 'content_hash';
  }

  return {
    record_id: record.id,
    partition: matchedBy ? 'eval' : 'train',
    matched_by: matchedBy,
  };
}

export interface SplitOutcome {
  assignments: SplitAssignment[];
  failures: RecordFailure[];
}

/**
 * Assign every record, isolating ambiguous ones as failures.
 */
export function splitRecords(
  records: readonly CanonicalRecord[],
  membership: readonly MembershipEntry[]
): SplitOutcome {
  const index = buildMembershipIndex(membership);
  const outcome: SplitOutcome = { assignments: [], failures: [] };

  for (const record of records) {
    try {
      outcome.assignments.push(assign(record, index));
    } catch (error) {
      logger.warn('Split assignment is ambiguous', {
        recordId: record.id,
        sourceUri: record.source_uri,
        error: error instanceof Error ? error.message : String(error),
      });
      outcome.failures.push({
        stage: 'split',
        source_uri: record.source_uri,
        record_id: record.id,
        backend_id: null,
        error: toErrorInfo(error),
      });
    }
  }

  return outcome;
}

function md5Hex(value: string): string {
  return createHash('md5').update(value, 'utf8').digest('hex');
}

/**
 * Build a stable eval membership list of size k from a corpus of URIs.
 *
 * Locked entries still present in the corpus are kept first, in their
 * original order; the list is topped up with the remaining URIs in md5 order.
 */
export function selectEvalMembership(
  uris: readonly string[],
  k: number,
  locked: readonly string[] = []
): string[] {
  const present = new Set(uris);
  const kept = [...new Set(locked)].filter((uri) => present.has(uri)).slice(0, k);
  const keptSet = new Set(kept);

  const topUp = [...new Set(uris)]
    .filter((uri) => !keptSet.has(uri))
    .map((uri) => ({ uri, hash: md5Hex(uri) }))
    .sort((a, b) => (a.hash < b.hash ? -1 : a.hash > b.hash ? 1 : 0))
    .slice(0, Math.max(0, k - kept.length))
    .map((entry) => entry.uri);

  return [...kept, ...topUp];
}
