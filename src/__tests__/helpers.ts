import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { GenerationRequest, TextGenerationClient } from '../concurrent/ClaudeConcurrentClient.js';
import type { CategoryDefinition } from '../jobs/JobConfig.js';

/**
 * Three-label set used by most unit tests
 */
export const TEST_CATEGORIES: CategoryDefinition[] = [
  { label: 'A', description: 'first' },
  { label: 'B', description: 'second' },
  { label: 'Other', description: 'rest' },
];

/**
 * Client that replays a fixed script; the last step repeats forever
 */
export class ScriptedClient implements TextGenerationClient {
  readonly requests: GenerationRequest[] = [];
  private steps: Array<string | Error>;

  constructor(steps: Array<string | Error>) {
    this.steps = steps;
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    const step = this.steps[Math.min(this.requests.length, this.steps.length) - 1];
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

/**
 * Records requested waits instead of waiting
 */
export function recordingSleep(): { sleeps: number[]; sleep: (ms: number) => Promise<void> } {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'survey-classifier-'));
}

export async function writeFixture(dir: string, name: string, content: string): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, content, 'utf-8');
  return filePath;
}
