/**
 * Extraction Template Types
 */

/**
 * Prompt pair sent to the model for one kind of document.
 */
export interface ExtractionTemplate {
  /** Stable template identifier, logged with every request */
  name: string;

  /** System prompt with extraction rules and the expected JSON shape */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{document_text}}: The (truncated) document text
   */
  userPromptTemplate: string;

  /** Human-readable description of what this template extracts */
  description: string;
}
