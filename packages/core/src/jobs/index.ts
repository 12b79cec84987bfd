// packages/core/src/jobs/index.ts -- barrel re-export

export { JobRegistry } from './job-registry.js';
export type { JobContext, JobUnit, JobRegistryOptions } from './job-registry.js';
export { Reaper } from './reaper.js';
export type { ReaperOptions, SweepResult } from './reaper.js';
