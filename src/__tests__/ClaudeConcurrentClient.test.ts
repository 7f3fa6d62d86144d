/**
 * Unit tests for the Anthropic client wrapper
 *
 * The SDK is replaced by a fake `messages.create`; nothing leaves the process.
 */

import { describe, it, expect, vi } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import {
  ClaudeConcurrentClient,
  combineTextBlocks,
  toServiceError,
  type MessageResponse,
} from '../concurrent/ClaudeConcurrentClient.js';
import { FatalError, TransientError } from '../utils/errors.js';

function withStatus(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe('toServiceError', () => {
  it.each([429, 500, 502, 503, 504, 529])('treats status %i as transient', (status) => {
    const mapped = toServiceError(withStatus('try later', status));

    expect(mapped).toBeInstanceOf(TransientError);
    expect(mapped.status).toBe(status);
    expect(mapped.message).toBe('try later');
  });

  it.each([400, 401, 403, 404])('treats status %i as fatal', (status) => {
    const mapped = toServiceError(withStatus('nope', status));

    expect(mapped).toBeInstanceOf(FatalError);
    expect(mapped.status).toBe(status);
  });

  it('reads the error type from the response body', () => {
    const error = Object.assign(new Error('Overloaded'), {
      error: { type: 'error', error: { type: 'overloaded_error', message: 'Overloaded' } },
    });

    const mapped = toServiceError(error);

    expect(mapped).toBeInstanceOf(TransientError);
    expect(mapped.status).toBeUndefined();
    expect(mapped.details).toEqual({ errorType: 'overloaded_error' });
  });

  it('treats connection failures as transient', () => {
    const mapped = toServiceError(new Anthropic.APIConnectionError({ message: 'Connection error.' }));

    expect(mapped).toBeInstanceOf(TransientError);
    expect(mapped.message).toBe('Connection error.');
  });

  it('passes pipeline errors through unchanged', () => {
    const original = new FatalError('bad request', 400);
    expect(toServiceError(original)).toBe(original);
  });

  it('treats anything else as fatal', () => {
    const mapped = toServiceError('boom');

    expect(mapped).toBeInstanceOf(FatalError);
    expect(mapped.message).toBe('boom');
    expect(mapped.status).toBeUndefined();
  });
});

describe('combineTextBlocks', () => {
  it('joins text blocks and ignores the rest', () => {
    const content = [
      { type: 'text', text: ' {"category": ' },
      { type: 'tool_use' },
      { type: 'text', text: '"A"} ' },
    ];

    expect(combineTextBlocks(content)).toBe('{"category": "A"}');
  });

  it('returns an empty string when there is no text', () => {
    expect(combineTextBlocks([])).toBe('');
  });
});

describe('ClaudeConcurrentClient', () => {
  const request = {
    prompt: 'hello',
    systemInstruction: 'sys',
    model: 'test-model',
    maxOutputTokens: 50,
    temperature: 0,
  };

  function createResponse(text: string, stopReason: string | null = 'end_turn'): MessageResponse {
    return {
      content: [{ type: 'text', text }],
      stop_reason: stopReason,
      usage: { input_tokens: 12, output_tokens: 8 },
    };
  }

  it('sends one non-streaming request and returns the text', async () => {
    const create = vi.fn(
      async (_body: Anthropic.MessageCreateParamsNonStreaming): Promise<MessageResponse> =>
        createResponse('{"category": "A", "reason": "r"}')
    );
    const client = new ClaudeConcurrentClient('test-job', { messages: { create } });

    await expect(client.generate(request)).resolves.toBe('{"category": "A", "reason": "r"}');
    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 50,
      temperature: 0,
      system: 'sys',
      messages: [{ role: 'user', content: 'hello' }],
      stream: false,
    });
  });

  it('still returns truncated text', async () => {
    const create = vi.fn(
      async (_body: Anthropic.MessageCreateParamsNonStreaming): Promise<MessageResponse> =>
        createResponse('{"category": "A", "rea', 'max_tokens')
    );
    const client = new ClaudeConcurrentClient('test-job', { messages: { create } });

    await expect(client.generate(request)).resolves.toBe('{"category": "A", "rea');
  });

  it('maps SDK failures onto transient and fatal errors', async () => {
    const create = vi
      .fn(async (_body: Anthropic.MessageCreateParamsNonStreaming): Promise<MessageResponse> =>
        createResponse('unused')
      )
      .mockRejectedValueOnce(withStatus('overloaded', 529))
      .mockRejectedValueOnce(withStatus('invalid x-api-key', 401));
    const client = new ClaudeConcurrentClient('test-job', { messages: { create } });

    await expect(client.generate(request)).rejects.toBeInstanceOf(TransientError);
    await expect(client.generate(request)).rejects.toBeInstanceOf(FatalError);
  });
});
