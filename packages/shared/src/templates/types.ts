/**
 * Memo Prompt Template Types
 */

/**
 * Prompt template for model backends.
 */
export interface MemoTemplate {
  /** Stable identifier recorded with each extraction */
  id: string;

  /** Human-readable description of what this template asks for */
  description: string;

  /** System prompt with the memo structure and the extraction rules */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{record_id}}: The canonical record id
   * - {{source_uri}}: Where the document came from
   * - {{document_text}}: The canonical text (possibly truncated)
   */
  userPromptTemplate: string;
}
