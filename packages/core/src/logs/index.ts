// packages/core/src/logs/index.ts -- barrel re-export

export { RingBuffer } from './ring-buffer.js';
export { LogAggregator } from './log-aggregator.js';
export { createJobLogger } from './job-logger.js';
