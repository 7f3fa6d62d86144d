/**
 * Summary Classification Prompt
 *
 * Same contract as the per-record prompt, plus a tie-break rule for
 * responses that touch several categories.
 *
 * Template variables to replace:
 * - {{categoryList}}
 * - {{text}}
 */

export const SUMMARIZE_SYSTEM_PROMPT =
  'You are a strict data labeling assistant. Your task is to classify a single free-text response ' +
  'about AI in education into exactly ONE category from a fixed label set. Return only valid JSON.';

export const SUMMARIZE_USER_PROMPT = `Classify the following free-text response into exactly ONE of the categories below.

Categories (use exact strings):
{{categoryList}}

Instructions:
- Choose exactly one category that best fits overall.
- If multiple categories seem present, pick the single category that is most apparent overall.
- If none clearly fit, use "Other".
- Output JSON only in this schema:
  {
    "category": "<one of the allowed categories>",
    "reason": "<short rationale>"
  }

Response:
"""{{text}}"""`;
