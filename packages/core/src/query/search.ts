// packages/core/src/query/search.ts — Paged publication search over the index

import type { SearchIndex } from '../sources/search-index.js';
import {
  searchParamsSchema,
  type SearchHits,
  type SearchParams,
  type SearchRequest,
  type SearchResponse,
  type SortClause,
} from '../types/search.js';
import { DEFAULT_PAGE_SIZE } from '../utils/constants.js';
import { SourceUnavailableError, ValidationError, errorMessage } from '../utils/errors.js';
import { compileQuery } from './compiler.js';

const SORT: readonly SortClause[] = [{ editado: { order: 'desc' } }, { id: { order: 'desc' } }];

/** Validate raw search parameters. Throws ValidationError listing every issue. */
export function parseSearchParams(input: unknown): SearchParams {
  const result = searchParamsSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ValidationError(`Invalid search parameters: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function buildSearchRequest(params: SearchParams, defaultPageSize = DEFAULT_PAGE_SIZE): SearchRequest {
  const size = params.page_size ?? defaultPageSize;
  return {
    query: compileQuery(params),
    from: (params.page - 1) * size,
    size,
    sort: SORT.map((clause) => ({ ...clause })),
  };
}

/** Number of pages for `total` hits; an empty result still has one page. */
export function pageCount(total: number, pageSize: number): number {
  return total > 0 ? Math.ceil(total / pageSize) : 1;
}

export async function searchPublications(
  index: SearchIndex,
  input: unknown,
  defaultPageSize = DEFAULT_PAGE_SIZE,
): Promise<SearchResponse> {
  const params = parseSearchParams(input);
  const request = buildSearchRequest(params, defaultPageSize);

  let result: SearchHits;
  try {
    result = await index.search(request);
  } catch (err) {
    throw new SourceUnavailableError(`Search failed: ${errorMessage(err)}`, 'elasticsearch', err);
  }

  return {
    publicaciones: result.hits,
    total: result.total,
    pagina: params.page,
    paginas: pageCount(result.total, request.size),
  };
}
