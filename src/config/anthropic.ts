import Anthropic from '@anthropic-ai/sdk';
import dotenv from 'dotenv';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

dotenv.config();

export const DEFAULT_MODEL = 'claude-3-5-sonnet-latest';

/**
 * Per-request timeout. A timed-out call counts as a transient failure.
 */
const REQUEST_TIMEOUT_MS = 60000;

export interface AnthropicOverrides {
  /** Explicit credential (e.g. --api-key); wins over ANTHROPIC_API_KEY */
  apiKey?: string;
  /** Explicit model (e.g. --model); wins over ANTHROPIC_MODEL */
  model?: string;
  /** Model used when neither the override nor the environment names one */
  fallbackModel?: string;
}

export interface ResolvedAnthropicConfig {
  apiKey: string;
  model: string;
}

/**
 * Anthropic Configuration
 *
 * Resolves the credential and model for the Messages API and caches the client.
 *
 * Models:
 * - claude-3-5-sonnet-latest (summary job default)
 * - claude-3-5-sonnet-20240620 (per-record job default)
 */
export class AnthropicConfig {
  private static client: Anthropic | null = null;
  private static clientKey: string | null = null;

  /**
   * Resolve credential and model. Throws ConfigError when no key is available.
   */
  static getConfig(overrides: AnthropicOverrides = {}): ResolvedAnthropicConfig {
    const apiKey = overrides.apiKey || process.env.ANTHROPIC_API_KEY;
    const model =
      overrides.model ||
      process.env.ANTHROPIC_MODEL ||
      overrides.fallbackModel ||
      DEFAULT_MODEL;

    if (!apiKey) {
      throw new ConfigError(
        'Missing required Anthropic configuration. ' +
          'Set ANTHROPIC_API_KEY in your environment or .env, or pass --api-key'
      );
    }

    return {
      apiKey,
      model,
    };
  }

  /**
   * Get or create the Anthropic client for the resolved credential
   */
  static getClient(overrides: AnthropicOverrides = {}): Anthropic {
    const config = this.getConfig(overrides);

    if (!this.client || this.clientKey !== config.apiKey) {
      this.client = new Anthropic({
        apiKey: config.apiKey,
        timeout: REQUEST_TIMEOUT_MS,
        maxRetries: 0, // ResponseClassifier owns the retry budget
      });
      this.clientKey = config.apiKey;

      logger.info('Anthropic client initialized', {
        defaultModel: config.model,
        timeoutMs: REQUEST_TIMEOUT_MS,
      });
    }

    return this.client;
  }

  /**
   * Get the resolved model name
   */
  static getModel(overrides: AnthropicOverrides = {}): string {
    return this.getConfig(overrides).model;
  }

  /**
   * Validate Anthropic configuration without creating client
   */
  static validate(overrides: AnthropicOverrides = {}): boolean {
    try {
      this.getConfig(overrides);
      console.log('✅ Anthropic configuration valid');
      return true;
    } catch (error) {
      console.error('❌ Anthropic configuration invalid:', error instanceof Error ? error.message : error);
      return false;
    }
  }
}
