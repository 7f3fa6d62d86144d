import type { JobConfig } from './JobConfig.js';
import classifyResponses from './classify-responses/config.js';
import summarizeResponses from './summarize-responses/config.js';

/**
 * Registered jobs, keyed by JobConfig.id
 */
export const JOBS: ReadonlyMap<string, JobConfig> = new Map(
  [classifyResponses, summarizeResponses].map((job) => [job.id, job])
);

export function listJobs(): JobConfig[] {
  return [...JOBS.values()];
}

/**
 * Look up a job configuration by id
 */
export function loadJobConfig(jobId: string): JobConfig | undefined {
  return JOBS.get(jobId);
}
