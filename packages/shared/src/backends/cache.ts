/**
 * Extraction Cache
 *
 * Optional collaborator of the adapter. Keys are strictly the pair
 * (record id, backend id); degraded outcomes are never stored.
 */

import type { ExtractionOutcome } from './types';

export interface ExtractionCache {
  get(recordId: string, backendId: string): Promise<ExtractionOutcome | undefined>;
  set(outcome: ExtractionOutcome): Promise<void>;
}

export function cacheKey(recordId: string, backendId: string): string {
  return JSON.stringify([recordId, backendId]);
}

export class InMemoryExtractionCache implements ExtractionCache {
  private readonly entries = new Map<string, ExtractionOutcome>();

  async get(recordId: string, backendId: string): Promise<ExtractionOutcome | undefined> {
    return this.entries.get(cacheKey(recordId, backendId));
  }

  async set(outcome: ExtractionOutcome): Promise<void> {
    this.entries.set(cacheKey(outcome.record_id, outcome.backend_id), outcome);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
