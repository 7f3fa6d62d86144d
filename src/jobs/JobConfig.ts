/**
 * Category Definition
 *
 * One allowed label plus the one-line description shown to the model.
 */
export interface CategoryDefinition {
  label: string;
  description: string;
}

/**
 * How free text is located in the input file.
 *
 * - 'column': header row present, text read from a named column
 * - 'headerless': no header row, text is the first field of each row
 */
export type InputMode = 'column' | 'headerless';

/**
 * Shape of the output document.
 *
 * - 'summary': { summary, data: [{ input, output, category }] } (.json only)
 * - 'records': original rows plus { category, reason } (.json or .csv)
 */
export type OutputMode = 'summary' | 'records';

/**
 * Job Configuration Interface
 *
 * Defines one classification job. Jobs differ only in their label set,
 * prompt wording and input/output shape; they share one pipeline.
 */
export interface JobConfig {
  /**
   * Unique identifier for the job
   * Examples: "classify-responses", "summarize-responses"
   */
  id: string;

  /**
   * Human-readable description of what this job does
   */
  description: string;

  /**
   * Allowed labels, in prompt and summary order.
   * Must contain the sentinel "Other".
   */
  categories: readonly CategoryDefinition[];

  /**
   * System instruction establishing the labeling role and JSON contract
   */
  systemPrompt: string;

  /**
   * User prompt template.
   *
   * Template variables:
   * - {{categoryList}}: "- Label: description" lines
   * - {{text}}: the response being classified
   */
  userPromptTemplate: string;

  /**
   * Where the text lives in the input file
   */
  inputMode: InputMode;

  /**
   * Column/key read in 'column' mode when the caller does not name one
   */
  defaultInputColumn: string;

  outputMode: OutputMode;

  /**
   * Append the model's full text to the diagnostic when parsing fails
   * on the last attempt
   */
  appendRawToParseDiagnostic: boolean;

  /**
   * Model used when neither --model nor ANTHROPIC_MODEL is set
   */
  model: string;

  /**
   * Maximum tokens for the completion
   */
  maxOutputTokens: number;

  /**
   * Temperature for generation. Kept at 0.0 for reproducible labels.
   */
  temperature: number;

  /**
   * Attempts per record before falling back to "Other"
   */
  maxRetries: number;

  /**
   * Fixed courtesy pause after every classification call (ms)
   */
  requestDelayMs: number;

  /**
   * Records classified in parallel. 1 keeps the run strictly sequential.
   */
  concurrencyLimit: number;
}
