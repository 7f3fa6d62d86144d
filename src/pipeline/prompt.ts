import type { JobConfig } from '../jobs/JobConfig.js';
import { CategorySet } from './categories.js';

/**
 * Rendered request for one response
 */
export interface RenderedPrompt {
  systemInstruction: string;
  prompt: string;
}

/**
 * Render the job's user template for one response.
 *
 * Replacers are functions so `$&`, `$1`... in survey text stay literal.
 */
export function buildPrompt(
  job: Pick<JobConfig, 'systemPrompt' | 'userPromptTemplate'>,
  categories: CategorySet,
  text: string
): RenderedPrompt {
  const categoryList = categories.renderList();

  const prompt = job.userPromptTemplate
    .replace('{{categoryList}}', () => categoryList)
    .replace('{{text}}', () => text);

  return {
    systemInstruction: job.systemPrompt,
    prompt,
  };
}
