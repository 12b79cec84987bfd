// packages/core/src/types/search.ts — Search parameters and the compiled boolean query

import { z } from 'zod';
import { MAX_PAGE_SIZE } from '../utils/constants.js';
import type { PublicationDocument } from './publication.js';

/** Legacy callers send most filters as strings; ids may come as numbers. */
const looseString = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .optional();

export const searchParamsSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
  search: z.string().optional(),
  objeto: z.string().optional(),
  agencia: z.string().optional(),
  pais: looseString,
  rubro: looseString,
  apertura_fr: z.string().optional(),
  apertura_to: z.string().optional(),
  incluirVencidos: looseString,
  soloVigentes: looseString,
  user_tag_ids: z.array(z.coerce.number().int()).optional(),
  filter_mode: z.enum(['all', 'user_tags']).default('all'),
});

export type SearchParamsInput = z.input<typeof searchParamsSchema>;
export type SearchParams = z.output<typeof searchParamsSchema>;

/** Filter subset of the parameters; what the compiler reads. */
export interface QueryFilters {
  search?: string;
  objeto?: string;
  agencia?: string;
  pais?: string | number;
  rubro?: string | number;
  apertura_fr?: string;
  apertura_to?: string;
  incluirVencidos?: string | number;
  soloVigentes?: string | number;
  user_tag_ids?: number[];
  filter_mode?: 'all' | 'user_tags';
}

export type TextField = 'objeto' | 'agencia' | 'oficina' | 'referencia';

export interface WildcardClause {
  wildcard: Partial<Record<TextField, string>>;
}

export type TermClause =
  | { term: { pais_id: number } }
  | { term: { pais_nombre: string } }
  | { term: { tag_ids: number } }
  | { term: { vigente: true } }
  | { term: { visible: true } };

export interface TermsClause {
  terms: { tag_ids: number[] };
}

export interface DateBounds {
  gte?: string;
  lte?: string;
}

export interface RangeClause {
  range: { apertura: DateBounds };
}

export type FilterClause = TermClause | TermsClause | RangeClause;

export interface BoolQuery {
  must?: WildcardClause[];
  filter: FilterClause[];
  should?: WildcardClause[];
  minimum_should_match?: number;
}

/** `filter` always carries the visibility clause, so the tree is never unconstrained. */
export interface CompiledQuery {
  bool: BoolQuery;
}

export type SortOrder = 'asc' | 'desc';
export type SortClause = { editado: { order: SortOrder } } | { id: { order: SortOrder } };

export interface SearchRequest {
  query: CompiledQuery;
  from: number;
  size: number;
  sort: SortClause[];
}

export interface SearchHits {
  hits: PublicationDocument[];
  total: number;
}

/** Response shape the legacy front end consumes. */
export interface SearchResponse {
  publicaciones: PublicationDocument[];
  total: number;
  pagina: number;
  paginas: number;
}
