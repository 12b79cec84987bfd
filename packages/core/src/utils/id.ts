// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a job ID with "job_" prefix. */
export function generateJobId(): string {
  return `job_${nanoid(16)}`;
}

