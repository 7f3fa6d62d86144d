import Ajv, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { ParseError } from './errors.js';

/**
 * JSON Schema Validator
 *
 * Validates model payloads and summary documents against expected schemas
 */

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false, // Allow additional properties
});

/**
 * Validator class for JSON schema validation
 */
export class SchemaValidator {
  /**
   * Compile a schema into a type guard
   * @param schema JSON schema object
   */
  compile<T>(schema: SchemaObject): ValidateFunction<T> {
    return ajv.compile<T>(schema);
  }

  /**
   * Format validation errors as a readable string
   * @param errors AJV error objects
   */
  formatErrors(errors?: ErrorObject[] | null): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        return `${path}: ${message}`;
      })
      .join('; ');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();

/**
 * Payload the model is asked to return. Both fields are optional here:
 * a missing category falls back to "Other", a missing reason to "".
 */
export interface ClassificationPayload {
  category?: unknown;
  reason?: unknown;
}

const isClassificationPayload = validator.compile<ClassificationPayload>({
  type: 'object',
  properties: {
    category: {},
    reason: {},
  },
});

/**
 * Refuse to parse extremely large content (likely malformed)
 */
export const MAX_CONTENT_LENGTH = 100000;

/**
 * Cut the outermost {...} region out of a model response.
 *
 * Returns the substring from the first `{` to the last `}` when both exist in
 * that order, otherwise the trimmed text unchanged.
 */
export function extractJsonRegion(content: string): string {
  const text = content.trim();
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');

  if (start !== -1 && end !== -1 && end > start) {
    return text.slice(start, end + 1);
  }
  return text;
}

/**
 * Extract and parse the JSON object from a model response.
 * Tolerates prose before and after the payload.
 */
export function extractJsonFromResponse(content: string): ClassificationPayload {
  if (content.length > MAX_CONTENT_LENGTH) {
    throw new ParseError(
      `Response content too large (${content.length} chars, max ${MAX_CONTENT_LENGTH}). Likely truncated/malformed.`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonRegion(content));
  } catch (error) {
    throw new ParseError(
      `Could not extract valid JSON from response content: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isClassificationPayload(parsed)) {
    throw new ParseError(
      `Unexpected response shape: ${validator.formatErrors(isClassificationPayload.errors)}`
    );
  }

  return parsed;
}
