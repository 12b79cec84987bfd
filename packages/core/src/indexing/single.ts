// packages/core/src/indexing/single.ts — index-publication recipe

import type { JobContext } from '../jobs/job-registry.js';
import { ItemIndexError, NotFoundError, errorMessage } from '../utils/errors.js';
import { ensureReachable, type IndexingDeps } from './context.js';

const STEPS = 2;

/**
 * Index exactly one publication. A missing publication fails the job,
 * as does a failed write.
 */
export async function indexPublication(deps: IndexingDeps, ctx: JobContext, publicationId: number): Promise<void> {
  await ensureReachable(deps.index);

  ctx.reportProgress({ current: 0, total: STEPS, message: `Fetching publication ${publicationId}` });
  ctx.token.throwIfCancelled();
  const doc = await deps.denormalizer.denormalize(publicationId, ctx.logger);
  if (!doc) {
    throw new NotFoundError(`Publication ${publicationId} not found`, publicationId);
  }

  ctx.reportProgress({ current: 1, total: STEPS, message: `Indexing publication ${publicationId}` });
  ctx.token.throwIfCancelled();
  try {
    await deps.index.upsert(publicationId, doc);
  } catch (err) {
    throw new ItemIndexError(`Failed to index publication ${publicationId}: ${errorMessage(err)}`, publicationId);
  }

  ctx.logger.info(`Indexed publication ${publicationId}`);
  ctx.reportProgress({ current: STEPS, total: STEPS, indexed: 1, failed: 0, message: 'Completed' });
}
