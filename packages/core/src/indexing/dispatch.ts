// packages/core/src/indexing/dispatch.ts — Route a job to its recipe

import type { JobUnit } from '../jobs/job-registry.js';
import { reindexAll } from './bulk.js';
import type { IndexingDeps } from './context.js';
import { indexChangedSince } from './incremental.js';
import { indexPublication } from './single.js';

export function createIndexingUnit(deps: IndexingDeps): JobUnit {
  return async (ctx) => {
    const { params } = ctx;
    switch (params.type) {
      case 'index-publication':
        return indexPublication(deps, ctx, params.publicationId);
      case 'index-scraper':
        return indexChangedSince(deps, ctx, {
          since: params.since,
          scraperId: params.scraperId,
          limit: deps.settings.scraperLimit,
          progressEvery: deps.settings.scraperProgressEvery,
        });
      case 'sync-since':
        return indexChangedSince(deps, ctx, {
          since: params.since,
          limit: deps.settings.syncLimit,
          progressEvery: deps.settings.syncProgressEvery,
        });
      case 'index-bulk':
        return reindexAll(deps, ctx);
    }
  };
}
