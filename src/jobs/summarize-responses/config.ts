import type { JobConfig } from '../JobConfig.js';
import {
  CHEATING_CONCERNS,
  ETHICAL_PRIVACY_CONCERNS,
  NEGATIVE_EXPERIENCES,
  NO_USE,
  OTHER,
  OVERRELIANCE,
  POLICY_SCHOOL_RULES,
  POSITIVE_LEARNING_USE,
  TRUST_ISSUES,
} from '../categoryDefinitions.js';
import { SUMMARIZE_SYSTEM_PROMPT, SUMMARIZE_USER_PROMPT } from './prompt.js';

/**
 * Summarize Responses Job Configuration
 *
 * Classifies a single-column answer export and writes the category
 * distribution alongside every answer and the model's full output.
 *
 * INPUT:
 * - Headerless CSV, first field of each row is the answer
 *
 * OUTPUT (.json only):
 * - summary: total_inputs, category_counts, category_percents (all 9 labels)
 * - data: [{ input, output, category }] in input order
 */

const config: JobConfig = {
  id: 'summarize-responses',

  description:
    'Classify single-column answers into 9 categories and write the category distribution summary',

  categories: [
    CHEATING_CONCERNS,
    POSITIVE_LEARNING_USE,
    NEGATIVE_EXPERIENCES,
    OVERRELIANCE,
    TRUST_ISSUES,
    POLICY_SCHOOL_RULES,
    ETHICAL_PRIVACY_CONCERNS,
    NO_USE,
    OTHER,
  ],

  systemPrompt: SUMMARIZE_SYSTEM_PROMPT,
  userPromptTemplate: SUMMARIZE_USER_PROMPT,

  inputMode: 'headerless',
  defaultInputColumn: 'text',
  outputMode: 'summary',
  appendRawToParseDiagnostic: true,

  model: 'claude-3-5-sonnet-latest',
  maxOutputTokens: 200,
  temperature: 0.0,
  maxRetries: 5,
  requestDelayMs: 50,
  concurrencyLimit: 1,
};

export default config;
