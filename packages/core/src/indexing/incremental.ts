// packages/core/src/indexing/incremental.ts — index-scraper and sync-since recipes

import type { JobContext } from '../jobs/job-registry.js';
import { errorMessage } from '../utils/errors.js';
import { ensureReachable, readCandidates, type IndexingDeps } from './context.js';

export interface IncrementalOptions {
  since: string;
  scraperId?: number;
  limit: number;
  progressEvery: number;
}

/**
 * Re-index publications loaded or edited since a point in time, optionally
 * for one scraper. Items fail individually; a missing item is skipped.
 */
export async function indexChangedSince(deps: IndexingDeps, ctx: JobContext, options: IncrementalOptions): Promise<void> {
  const { since, scraperId, limit, progressEvery } = options;
  await ensureReachable(deps.index);

  const scope = scraperId === undefined ? '' : ` for scraper ${scraperId}`;
  const ids = await readCandidates(`publications changed since ${since}${scope}`, () =>
    deps.source.listChangedSince(since, { scraperId, limit }),
  );
  const total = ids.length;
  ctx.logger.info(`Found ${total} publication(s) changed since ${since}${scope}`);

  let indexed = 0;
  let failed = 0;
  ctx.reportProgress({ current: 0, total, indexed, failed, message: 'Starting' });

  for (const [i, id] of ids.entries()) {
    ctx.token.throwIfCancelled();
    try {
      const doc = await deps.denormalizer.denormalize(id, ctx.logger);
      if (doc) {
        await deps.index.upsert(id, doc);
        indexed++;
      } else {
        ctx.logger.warn(`Publication ${id} not found, skipped`);
      }
    } catch (err) {
      failed++;
      ctx.logger.error(`Failed to index publication ${id}: ${errorMessage(err)}`);
    }

    const current = i + 1;
    if (current % progressEvery === 0 && current < total) {
      ctx.reportProgress({ current, total, indexed, failed, message: `Processed ${current}/${total}` });
    }
  }

  ctx.logger.info(`Indexed ${indexed}/${total} publication(s), ${failed} failed`);
  ctx.reportProgress({ current: total, total, indexed, failed, message: 'Completed' });
}
