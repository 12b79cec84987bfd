// packages/core/src/engine -- Cancellation and job event plumbing

export { EventBus } from './event-bus.js';
export { CancellationToken, CancellationError } from './cancellation.js';
