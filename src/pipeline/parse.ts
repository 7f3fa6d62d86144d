import { extractJsonFromResponse } from '../utils/validators.js';
import { CategorySet } from './categories.js';

export interface ParsedClassification {
  category: string;
  reason: string;
}

/**
 * Read `{category, reason}` out of raw model text.
 *
 * Throws ParseError when no JSON object can be recovered. A missing or
 * non-string category becomes "Other"; a missing reason becomes "".
 */
export function parseClassificationResponse(raw: string, categories: CategorySet): ParsedClassification {
  const payload = extractJsonFromResponse(raw);

  return {
    category: categories.normalize(payload.category),
    reason: typeof payload.reason === 'string' ? payload.reason.trim() : '',
  };
}
