// packages/core/src/query/compiler.ts — Filter parameters → boolean search query

import type {
  CompiledQuery,
  DateBounds,
  FilterClause,
  QueryFilters,
  TextField,
  WildcardClause,
} from '../types/search.js';

const INTEGER = /^\s*[+-]?\d+\s*$/;
const DAY_MONTH_YEAR = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const FREE_TEXT_FIELDS: readonly TextField[] = ['objeto', 'agencia', 'oficina', 'referencia'];

function text(value: string | number | undefined): string {
  return value === undefined ? '' : String(value).trim();
}

/** Blank and `all` impose no constraint. */
function categorical(value: string | number | undefined): string | null {
  const v = text(value);
  return v === '' || v === 'all' ? null : v;
}

function asInteger(value: string): number | null {
  return INTEGER.test(value) ? Number.parseInt(value, 10) : null;
}

function contains(field: TextField, term: string): WildcardClause {
  const clause: WildcardClause['wildcard'] = {};
  clause[field] = `*${term}*`;
  return { wildcard: clause };
}

/**
 * `D/M/YYYY` becomes `YYYY-MM-DD` followed by `time`. Anything else,
 * including impossible calendar dates, is returned unchanged.
 */
export function normalizeDateBound(value: string, time: '00:00:00' | '23:59:59'): string {
  const match = DAY_MONTH_YEAR.exec(value.trim());
  if (!match) return value;
  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return value;
  }
  const mm = String(month).padStart(2, '0');
  const dd = String(day).padStart(2, '0');
  return `${year}-${mm}-${dd} ${time}`;
}

/**
 * Compile filter parameters into a bool query. The visibility filter is
 * always present, so an empty parameter set still constrains results.
 */
export function compileQuery(params: QueryFilters): CompiledQuery {
  const must: WildcardClause[] = [];
  const filter: FilterClause[] = [];
  const should: WildcardClause[] = [];

  const search = text(params.search);
  if (search) {
    for (const field of FREE_TEXT_FIELDS) {
      should.push(contains(field, search));
    }
  }

  const objeto = text(params.objeto);
  if (objeto) must.push(contains('objeto', objeto));

  const agencia = text(params.agencia);
  if (agencia) must.push(contains('agencia', agencia));

  const pais = categorical(params.pais);
  if (pais !== null) {
    const paisId = asInteger(pais);
    filter.push(paisId !== null ? { term: { pais_id: paisId } } : { term: { pais_nombre: pais } });
  }

  const rubro = categorical(params.rubro);
  if (rubro !== null) {
    const tagId = asInteger(rubro);
    if (tagId !== null) filter.push({ term: { tag_ids: tagId } });
  }

  if (params.filter_mode === 'user_tags' && params.user_tag_ids && params.user_tag_ids.length > 0) {
    filter.push({ terms: { tag_ids: [...params.user_tag_ids] } });
  }

  const from = text(params.apertura_fr);
  const to = text(params.apertura_to);
  if (from || to) {
    const bounds: DateBounds = {};
    if (from) bounds.gte = normalizeDateBound(from, '00:00:00');
    if (to) bounds.lte = normalizeDateBound(to, '23:59:59');
    filter.push({ range: { apertura: bounds } });
  }

  if (text(params.soloVigentes) === '1' || text(params.incluirVencidos) === '0') {
    filter.push({ term: { vigente: true } });
  }

  filter.push({ term: { visible: true } });

  const query: CompiledQuery = { bool: { filter } };
  if (must.length > 0) query.bool.must = must;
  if (should.length > 0) {
    query.bool.should = should;
    query.bool.minimum_should_match = 1;
  }
  return query;
}
