import type { JobConfig } from '../JobConfig.js';
import {
  CHEATING_CONCERNS,
  ETHICAL_PRIVACY_CONCERNS,
  MIXED_VIEWS,
  NEGATIVE_EXPERIENCES,
  NO_USE,
  OTHER,
  OVERRELIANCE,
  POLICY_SCHOOL_RULES,
  POSITIVE_LEARNING_USE,
  TRUST_ISSUES,
} from '../categoryDefinitions.js';
import { CLASSIFY_SYSTEM_PROMPT, CLASSIFY_USER_PROMPT } from './prompt.js';

/**
 * Classify Responses Job Configuration
 *
 * Labels every row of a survey export and writes the rows back out with
 * `category` and `reason` appended.
 *
 * INPUT:
 * - CSV with a header row, or a JSON array of objects
 * - Text read from the `Response` column unless --input-column is given
 *
 * OUTPUT:
 * - .json: array of rows
 * - .csv: header taken from the first output row
 */

const config: JobConfig = {
  id: 'classify-responses',

  description:
    'Label each survey row with one of 10 categories (includes Mixed Views) and append category + reason',

  categories: [
    CHEATING_CONCERNS,
    POSITIVE_LEARNING_USE,
    NEGATIVE_EXPERIENCES,
    OVERRELIANCE,
    TRUST_ISSUES,
    POLICY_SCHOOL_RULES,
    MIXED_VIEWS,
    ETHICAL_PRIVACY_CONCERNS,
    NO_USE,
    OTHER,
  ],

  systemPrompt: CLASSIFY_SYSTEM_PROMPT,
  userPromptTemplate: CLASSIFY_USER_PROMPT,

  inputMode: 'column',
  defaultInputColumn: 'Response',
  outputMode: 'records',
  appendRawToParseDiagnostic: false,

  model: 'claude-3-5-sonnet-20240620',
  maxOutputTokens: 200,
  temperature: 0.0,
  maxRetries: 5,
  requestDelayMs: 100,
  concurrencyLimit: 1,
};

export default config;
