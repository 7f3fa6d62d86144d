import type { TextGenerationClient } from '../concurrent/ClaudeConcurrentClient.js';
import type { JobConfig } from '../jobs/JobConfig.js';
import { FatalError, ParseError, TransientError, errorMessage } from '../utils/errors.js';
import { JobLogger } from '../utils/logger.js';
import { CategorySet, FALLBACK_CATEGORY } from './categories.js';
import { parseClassificationResponse } from './parse.js';
import { buildPrompt } from './prompt.js';

/**
 * Outcome for one input record
 */
export interface ClassificationResult {
  readonly category: string;
  /** Model's reason, or the diagnostic when `fallback` is set */
  readonly rationale: string;
  /** Full model text ("" when no call returned text) */
  readonly rawOutput: string;
  /** True when retries were exhausted and the sentinel was substituted */
  readonly fallback: boolean;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicy {
  /** Attempts per record, including the first */
  maxRetries: number;
  /** Length of one backoff unit in ms; the first wait is one unit */
  backoffUnitMs: number;
  /** Upper bound for a single wait, in units */
  maxBackoffUnits: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 5,
  backoffUnitMs: 1000,
  maxBackoffUnits: 16,
};

export interface ResponseClassifierOptions {
  job: Pick<
    JobConfig,
    'id' | 'systemPrompt' | 'userPromptTemplate' | 'appendRawToParseDiagnostic' | 'maxOutputTokens' | 'temperature'
  >;
  categories: CategorySet;
  client: TextGenerationClient;
  model: string;
  retry?: Partial<RetryPolicy>;
  sleep?: Sleep;
}

/**
 * Response Classifier
 *
 * prompt → client → parse → normalize for one text, with bounded retries.
 *
 * - TransientError: wait, then retry. Waits start at one unit, double after
 *   each wait and are capped at maxBackoffUnits.
 * - ParseError / FatalError: retry immediately.
 * - Anything else: wait, then retry.
 *
 * Never waits after the final attempt. On exhaustion returns "Other" with a
 * diagnostic instead of throwing.
 */
export class ResponseClassifier {
  private options: ResponseClassifierOptions;
  private policy: RetryPolicy;
  private sleep: Sleep;
  private logger: JobLogger;

  constructor(options: ResponseClassifierOptions) {
    this.options = options;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = new JobLogger(`ResponseClassifier:${options.job.id}`);
  }

  async classify(text: string): Promise<ClassificationResult> {
    const { job, categories, client, model } = this.options;
    const { prompt, systemInstruction } = buildPrompt(job, categories, text);
    const maxRetries = Math.max(1, this.policy.maxRetries);

    let delayUnits = 1;
    let rawOutput = '';
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      const isLastAttempt = attempt === maxRetries;

      try {
        rawOutput = '';
        rawOutput = await client.generate({
          prompt,
          systemInstruction,
          model,
          maxOutputTokens: job.maxOutputTokens,
          temperature: job.temperature,
        });

        const parsed = parseClassificationResponse(rawOutput, categories);
        return Object.freeze({
          category: parsed.category,
          rationale: parsed.reason,
          rawOutput,
          fallback: false,
        });
      } catch (error) {
        lastError = error;

        if (isLastAttempt) {
          break;
        }

        if (error instanceof ParseError || error instanceof FatalError) {
          this.logger.debug(`Attempt ${attempt}/${maxRetries} failed, retrying`, {
            error: error.message,
          });
          continue;
        }

        const waitMs = delayUnits * this.policy.backoffUnitMs;
        this.logger.info(`Retry attempt ${attempt + 1}/${maxRetries}`, {
          waitMs,
          reason: errorMessage(error),
        });
        await this.sleep(waitMs);
        delayUnits = Math.min(delayUnits * 2, this.policy.maxBackoffUnits);
      }
    }

    const rationale = this.describeFailure(lastError, rawOutput);
    this.logger.warn('Retries exhausted, using fallback category', {
      attempts: maxRetries,
      rationale,
    });

    return Object.freeze({
      category: FALLBACK_CATEGORY,
      rationale,
      rawOutput,
      fallback: true,
    });
  }

  private describeFailure(error: unknown, rawOutput: string): string {
    if (error instanceof ParseError) {
      if (this.options.job.appendRawToParseDiagnostic) {
        return `Parse error: ${error.message} | raw=\n${rawOutput}`;
      }
      return `Parse error: ${error.message}`;
    }

    if (error instanceof TransientError || error instanceof FatalError) {
      return `API error (${error.status ?? 'unknown'}): ${error.message}`;
    }

    return `Unexpected error: ${errorMessage(error)}`;
  }
}
