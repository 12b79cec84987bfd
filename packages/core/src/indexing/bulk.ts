// packages/core/src/indexing/bulk.ts — index-bulk recipe

import type { JobContext } from '../jobs/job-registry.js';
import type { PublicationDocument } from '../types/publication.js';
import { errorMessage } from '../utils/errors.js';
import { ensureReachable, readCandidates, type IndexingDeps } from './context.js';

/** Pass 1: page through the id space to learn its size. */
async function countPublications(deps: IndexingDeps, ctx: JobContext, pageSize: number): Promise<number> {
  let total = 0;
  let offset = 0;
  for (;;) {
    ctx.token.throwIfCancelled();
    const page = await readCandidates('publication ids', () => deps.source.listAllIds(pageSize, offset));
    total += page.length;
    if (page.length < pageSize) return total;
    offset += pageSize;
  }
}

/**
 * Full reindex. Each page is denormalized and written with one bulk call;
 * a failed bulk call counts the whole page as failed.
 */
export async function reindexAll(deps: IndexingDeps, ctx: JobContext): Promise<void> {
  const pageSize = deps.settings.bulkPageSize;
  await ensureReachable(deps.index);

  const total = await countPublications(deps, ctx, pageSize);
  ctx.logger.info(`Bulk reindex of ${total} publication(s)`);

  let offset = 0;
  let indexed = 0;
  let failed = 0;
  ctx.reportProgress({ current: 0, total, indexed, failed, message: 'Starting' });

  for (;;) {
    ctx.token.throwIfCancelled();
    const ids = await readCandidates('publication ids', () => deps.source.listAllIds(pageSize, offset));
    if (ids.length === 0) break;

    const docs: PublicationDocument[] = [];
    for (const id of ids) {
      try {
        const doc = await deps.denormalizer.denormalize(id, ctx.logger);
        if (doc) docs.push(doc);
        else ctx.logger.warn(`Publication ${id} not found, skipped`);
      } catch (err) {
        failed++;
        ctx.logger.error(`Failed to denormalize publication ${id}: ${errorMessage(err)}`);
      }
    }

    if (docs.length > 0) {
      try {
        const outcomes = await deps.index.bulkUpsert(docs);
        for (const outcome of outcomes) {
          if (outcome.ok) {
            indexed++;
          } else {
            failed++;
            ctx.logger.error(`Failed to index publication ${outcome.id}: ${outcome.error ?? 'unknown error'}`);
          }
        }
      } catch (err) {
        failed += docs.length;
        ctx.logger.error(`Bulk write at offset ${offset} failed: ${errorMessage(err)}`);
      }
    }

    offset += ids.length;
    const current = Math.min(offset, total);
    ctx.reportProgress({ current, total, indexed, failed, message: `Processed ${current}/${total}` });
    if (ids.length < pageSize) break;
  }

  ctx.logger.info(`Bulk reindex finished: ${indexed} indexed, ${failed} failed`);
  ctx.reportProgress({ current: Math.min(offset, total), total, indexed, failed, message: 'Completed' });
}
