/**
 * Test Helpers
 *
 * Fixture loading and stub backends shared by the suites.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  canonicalize,
  type BackendOutput,
  type BackendCallContext,
  type CanonicalRecord,
  type CandidateFields,
  type ExtractionBackend,
  type FieldName,
  type FieldValueData,
  type Narrative,
  type RawSource,
  type ReferenceAnnotation,
} from '@memobench/shared';

const FIXTURES_DIR = path.join(__dirname, '../../fixtures');

export const ACME_URI = 'https://filings.example.com/acme/credit-agreement-2024.htm';
export const NORTHWIND_URI = 'https://filings.example.com/northwind/first-amendment.htm';
export const HARBOR_URI = 'https://filings.example.com/harbor/revolving-credit-agreement.htm';

/** Fixed clock so artifacts and records are reproducible */
export const FIXED_NOW = () => new Date('2024-06-01T00:00:00.000Z');

export function readDocument(name: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, 'documents', name), 'utf-8');
}

export function loadFixtureSources(): RawSource[] {
  const listing: Array<{ source_uri: string; document: string }> = JSON.parse(
    fs.readFileSync(path.join(FIXTURES_DIR, 'sources.json'), 'utf-8')
  );
  return listing.map((entry) => ({ source_uri: entry.source_uri, raw_text: readDocument(entry.document) }));
}

export function loadFixtureRecord(sourceUri: string): CanonicalRecord {
  const source = loadFixtureSources().find((s) => s.source_uri === sourceUri);
  if (!source) {
    throw new Error(`No fixture for ${sourceUri}`);
  }
  return canonicalize(source, { now: FIXED_NOW });
}

/**
 * Reference annotations keyed by record id. The fixture file keys them by
 * source URI since record ids are content hashes.
 */
export function loadFixtureReferences(): ReferenceAnnotation[] {
  const byUri: Record<string, { fields: Partial<Record<FieldName, FieldValueData>> }> = JSON.parse(
    fs.readFileSync(path.join(FIXTURES_DIR, 'references.json'), 'utf-8')
  );
  return Object.entries(byUri).map(([uri, reference]) => ({
    record_id: loadFixtureRecord(uri).id,
    fields: reference.fields,
  }));
}

export function missingFields(): CandidateFields {
  return {
    deal_size: { kind: 'missing' },
    deal_price: { kind: 'missing' },
    interest_rate: { kind: 'missing' },
    key_covenants: { kind: 'missing' },
    maturity_date: { kind: 'missing' },
    payment_frequency: { kind: 'missing' },
  };
}

export const STUB_NARRATIVE: Narrative = {
  executive_summary: 'Stub summary of the agreement.',
  highlights: ['Stub highlight'],
  risks: ['Stub risk'],
};

/**
 * Backend that answers from a function of the record, with call counting
 */
export class StubBackend implements ExtractionBackend {
  readonly description = 'Stub backend';
  readonly kind = 'model';
  readonly capabilities = { freeTextGeneration: true, structuredFields: true };
  calls = 0;

  constructor(
    readonly id: string,
    private readonly respond: (record: CanonicalRecord, ctx: BackendCallContext) => Promise<BackendOutput>
  ) {}

  async extract(record: CanonicalRecord, ctx: BackendCallContext): Promise<BackendOutput> {
    this.calls++;
    return this.respond(record, ctx);
  }
}

/**
 * Backend that never answers until its signal is aborted
 */
export function hangingBackend(id: string): StubBackend {
  return new StubBackend(
    id,
    (_record, ctx) =>
      new Promise<BackendOutput>((_, reject) => {
        ctx.signal.addEventListener('abort', () => reject(new Error('aborted')));
      })
  );
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
