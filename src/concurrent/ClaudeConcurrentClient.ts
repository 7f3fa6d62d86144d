import Anthropic from '@anthropic-ai/sdk';
import { FatalError, TransientError } from '../utils/errors.js';
import { JobLogger } from '../utils/logger.js';

/**
 * One classification request
 */
export interface GenerationRequest {
  prompt: string;
  systemInstruction: string;
  model: string;
  maxOutputTokens: number;
  temperature: number;
}

/**
 * Text generation boundary used by the pipeline.
 *
 * Implementations resolve with the model's full text and reject with
 * TransientError or FatalError.
 */
export interface TextGenerationClient {
  generate(request: GenerationRequest): Promise<string>;
}

/**
 * The part of a Messages API response the pipeline reads
 */
export interface MessageResponse {
  content: ReadonlyArray<{ type: string; text?: string }>;
  stop_reason: string | null;
  usage: {
    input_tokens: number;
    output_tokens: number;
  };
}

/**
 * The part of the Anthropic SDK the client calls. `Anthropic` satisfies it.
 */
export interface MessagesApi {
  messages: {
    create(body: Anthropic.MessageCreateParamsNonStreaming): Promise<MessageResponse>;
  };
}

/**
 * Statuses worth retrying: rate limit, server errors, Anthropic overload
 */
const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504, 529]);

const TRANSIENT_ERROR_TYPES = new Set(['rate_limit_error', 'overloaded_error', 'api_error']);

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Error type from the response body, e.g. `{ error: { type: 'rate_limit_error' } }`
 */
function readErrorType(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('error' in error)) {
    return undefined;
  }
  let body: unknown = error.error;
  // The SDK keeps the parsed body, which nests the typed error one level down
  if (typeof body === 'object' && body !== null && 'error' in body) {
    body = body.error;
  }
  if (typeof body === 'object' && body !== null && 'type' in body && typeof body.type === 'string') {
    return body.type;
  }
  return undefined;
}

/**
 * Map an SDK failure onto the pipeline's error taxonomy
 */
export function toServiceError(error: unknown): TransientError | FatalError {
  if (error instanceof TransientError || error instanceof FatalError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = readStatus(error);
  const errorType = readErrorType(error);

  if (error instanceof Anthropic.APIConnectionError) {
    return new TransientError(message, status, { kind: error.name });
  }

  if ((status !== undefined && TRANSIENT_STATUSES.has(status)) || (errorType && TRANSIENT_ERROR_TYPES.has(errorType))) {
    return new TransientError(message, status, errorType ? { errorType } : undefined);
  }

  return new FatalError(message, status, errorType ? { errorType } : undefined);
}

/**
 * Join every text block. Non-text blocks are ignored.
 */
export function combineTextBlocks(content: MessageResponse['content']): string {
  return content
    .filter((block) => block.type === 'text' && typeof block.text === 'string')
    .map((block) => block.text)
    .join('')
    .trim();
}

/**
 * Claude Concurrent Client
 *
 * Wrapper for the Anthropic Messages API. Performs a single attempt per call;
 * retries and backoff live in ResponseClassifier.
 */
export class ClaudeConcurrentClient implements TextGenerationClient {
  private client: MessagesApi;
  private logger: JobLogger;

  constructor(jobId: string, client: MessagesApi) {
    this.client = client;
    this.logger = new JobLogger(`Claude:${jobId}`);
  }

  async generate(request: GenerationRequest): Promise<string> {
    let response: MessageResponse;

    try {
      response = await this.client.messages.create({
        model: request.model,
        max_tokens: request.maxOutputTokens,
        temperature: request.temperature,
        system: request.systemInstruction,
        messages: [{ role: 'user', content: request.prompt }],
        stream: false,
      });
    } catch (error) {
      const mapped = toServiceError(error);
      if (mapped instanceof TransientError) {
        this.logger.warn('Transient API failure, will retry', {
          status: mapped.status,
          error: mapped.message,
        });
      } else {
        this.logger.error('API call failed', mapped, { status: mapped.status });
      }
      throw mapped;
    }

    if (response.stop_reason === 'max_tokens') {
      this.logger.warn('Response truncated at max_tokens', {
        maxOutputTokens: request.maxOutputTokens,
        outputTokens: response.usage.output_tokens,
      });
    }

    this.logger.debug('Completion received', {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    });

    return combineTextBlocks(response.content);
  }
}
