/**
 * Memo Composer
 *
 * Merges structured fields and narrative into a MemoArtifact with a fixed
 * section order: Executive Summary; Investment Highlights & Risks; Key Deal
 * Information (exactly the six fields, in canonical order). Values are
 * copied, never adjusted.
 */

import { config } from '../config';
import { TemplateMismatchError } from '../errors';
import { renderFieldValue } from '../fields';
import type { ExtractionOutcome } from '../backends';
import {
  FIELD_LABELS,
  MEMO_FIELDS,
  type CanonicalRecord,
  type ExtractionMetadata,
  type MemoArtifact,
  type MemoSection,
  type Narrative,
  type StructuredFields,
} from '../types';

export interface ComposeOptions {
  backend_id: string;
  extraction_metadata: ExtractionMetadata;
  degraded?: boolean;
  /** Skip the narrative checks (degraded artifacts carry no narrative) */
  allowEmptyNarrative?: boolean;
  minHighlights?: number;
  minRisks?: number;
  now?: () => Date;
}

export const SECTION_ORDER = ['executive_summary', 'highlights_risks', 'key_deal_information'] as const;

function nonBlank(items: string[]): string[] {
  return items.filter((item) => item.trim().length > 0);
}

function assertNarrative(narrative: Narrative, minHighlights: number, minRisks: number): void {
  if (narrative.executive_summary.trim().length === 0) {
    throw new TemplateMismatchError('Executive summary is empty');
  }
  const highlights = nonBlank(narrative.highlights).length;
  if (highlights < minHighlights) {
    throw new TemplateMismatchError(`Expected at least ${minHighlights} highlight(s), got ${highlights}`);
  }
  const risks = nonBlank(narrative.risks).length;
  if (risks < minRisks) {
    throw new TemplateMismatchError(`Expected at least ${minRisks} risk(s), got ${risks}`);
  }
}

function assertFields(fields: StructuredFields, recordId: string, backendId: string): void {
  for (const field of MEMO_FIELDS) {
    if (!Object.prototype.hasOwnProperty.call(fields, field)) {
      throw new TemplateMismatchError(`Key deal field ${field} is absent`);
    }
    const { provenance } = fields[field];
    if (provenance.record_id !== recordId || provenance.backend_id !== backendId) {
      throw new TemplateMismatchError(
        `Field ${field} was produced for ${provenance.record_id} by ${provenance.backend_id}, not ${recordId} by ${backendId}`
      );
    }
  }
}

/**
 * Compose a memo artifact. Throws TemplateMismatchError when the narrative
 * falls short of the minimums or a field is absent or belongs elsewhere.
 */
export function compose(
  record: CanonicalRecord,
  fields: StructuredFields,
  narrative: Narrative,
  options: ComposeOptions
): MemoArtifact {
  const minHighlights = options.minHighlights ?? config.minHighlights;
  const minRisks = options.minRisks ?? config.minRisks;
  const now = options.now ?? (() => new Date());

  if (!options.allowEmptyNarrative) {
    assertNarrative(narrative, minHighlights, minRisks);
  }
  assertFields(fields, record.id, options.backend_id);

  const copied: StructuredFields = structuredClone(fields);
  const highlights = [...narrative.highlights];
  const risks = [...narrative.risks];

  const sections: MemoSection[] = [
    { id: 'executive_summary', title: 'Executive Summary', body: narrative.executive_summary },
    { id: 'highlights_risks', title: 'Investment Highlights & Risks', highlights, risks },
    {
      id: 'key_deal_information',
      title: 'Key Deal Information',
      rows: MEMO_FIELDS.map((field) => ({
        field,
        label: FIELD_LABELS[field],
        value: renderFieldValue(copied[field]),
      })),
    },
  ];

  return {
    record_id: record.id,
    backend_id: options.backend_id,
    schema: {
      ...copied,
      executive_summary: narrative.executive_summary,
      highlights,
      risks,
    },
    sections,
    degraded: options.degraded ?? false,
    generated_at: now().toISOString(),
    extraction_metadata: { ...options.extraction_metadata },
  };
}

/**
 * Compose the artifact for an adapter outcome. Degraded outcomes are
 * composed without narrative checks.
 */
export function composeOutcome(
  record: CanonicalRecord,
  outcome: ExtractionOutcome,
  options: Pick<ComposeOptions, 'minHighlights' | 'minRisks' | 'now'> = {}
): MemoArtifact {
  return compose(record, outcome.fields, outcome.narrative, {
    ...options,
    backend_id: outcome.backend_id,
    extraction_metadata: outcome.metadata,
    degraded: outcome.degraded,
    allowEmptyNarrative: outcome.degraded,
  });
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ');
}

function bulletList(items: string[]): string {
  const present = nonBlank(items);
  return present.length > 0 ? present.map((item) => `- ${item}`).join('\n') : '- N/A';
}

/**
 * Render an artifact as markdown, sections verbatim and in order.
 */
export function renderMemoMarkdown(artifact: MemoArtifact): string {
  const parts: string[] = ['# Investment Memo', `Record: \`${artifact.record_id}\`  \nBackend: \`${artifact.backend_id}\``];

  if (artifact.degraded) {
    parts.push('> Degraded: the backend did not respond; every key deal field is N/A.');
  }

  for (const section of artifact.sections) {
    switch (section.id) {
      case 'executive_summary':
        parts.push(`## ${section.title}`, section.body.trim() || 'N/A');
        break;
      case 'highlights_risks':
        parts.push(
          `## ${section.title}`,
          '### Highlights',
          bulletList(section.highlights),
          '### Risks',
          bulletList(section.risks)
        );
        break;
      case 'key_deal_information':
        parts.push(
          `## ${section.title}`,
          ['| Field | Value |', '| --- | --- |', ...section.rows.map((row) => `| ${row.label} | ${escapeCell(row.value)} |`)].join('\n')
        );
        break;
    }
  }

  return `${parts.join('\n\n')}\n`;
}
