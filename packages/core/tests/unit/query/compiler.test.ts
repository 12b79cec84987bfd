import { describe, expect, it } from 'vitest';
import { compileQuery, normalizeDateBound } from '../../../src/query/compiler.js';

const VISIBLE = { term: { visible: true } };

describe('compileQuery', () => {
  it('compiles an empty parameter set to the visibility filter alone', () => {
    expect(compileQuery({})).toEqual({ bool: { filter: [VISIBLE] } });
  });

  it('turns free text into containment should-clauses on four fields', () => {
    expect(compileQuery({ search: '  bomba  ' })).toEqual({
      bool: {
        filter: [VISIBLE],
        should: [
          { wildcard: { objeto: '*bomba*' } },
          { wildcard: { agencia: '*bomba*' } },
          { wildcard: { oficina: '*bomba*' } },
          { wildcard: { referencia: '*bomba*' } },
        ],
        minimum_should_match: 1,
      },
    });
  });

  it('adds must-clauses for objeto and agencia, ignoring blanks', () => {
    const query = compileQuery({ objeto: ' cemento ', agencia: '   ' });
    expect(query.bool.must).toEqual([{ wildcard: { objeto: '*cemento*' } }]);
  });

  it('filters pais by id when it is an integer and by name otherwise', () => {
    expect(compileQuery({ pais: '12' }).bool.filter[0]).toEqual({ term: { pais_id: 12 } });
    expect(compileQuery({ pais: 7 }).bool.filter[0]).toEqual({ term: { pais_id: 7 } });
    expect(compileQuery({ pais: 'Chile' }).bool.filter[0]).toEqual({ term: { pais_nombre: 'Chile' } });
  });

  it('ignores all and blank categorical values', () => {
    expect(compileQuery({ pais: 'all', rubro: '' })).toEqual({ bool: { filter: [VISIBLE] } });
  });

  it('maps an integer rubro to a tag filter and ignores anything else', () => {
    expect(compileQuery({ rubro: '33' }).bool.filter).toEqual([{ term: { tag_ids: 33 } }, VISIBLE]);
    expect(compileQuery({ rubro: 'Salud' }).bool.filter).toEqual([VISIBLE]);
  });

  it('applies user tags only in user_tags mode with a non-empty set', () => {
    expect(compileQuery({ user_tag_ids: [1, 2], filter_mode: 'user_tags' }).bool.filter).toEqual([
      { terms: { tag_ids: [1, 2] } },
      VISIBLE,
    ]);
    expect(compileQuery({ user_tag_ids: [1, 2], filter_mode: 'all' }).bool.filter).toEqual([VISIBLE]);
    expect(compileQuery({ user_tag_ids: [], filter_mode: 'user_tags' }).bool.filter).toEqual([VISIBLE]);
  });

  it('builds an apertura range from D/M/YYYY bounds', () => {
    expect(compileQuery({ apertura_fr: '1/2/2024', apertura_to: '15/02/2024' }).bool.filter).toEqual([
      { range: { apertura: { gte: '2024-02-01 00:00:00', lte: '2024-02-15 23:59:59' } } },
      VISIBLE,
    ]);
  });

  it('accepts a single date bound', () => {
    expect(compileQuery({ apertura_to: '31/12/2023' }).bool.filter[0]).toEqual({
      range: { apertura: { lte: '2023-12-31 23:59:59' } },
    });
  });

  it('restricts to vigente when soloVigentes=1 or incluirVencidos=0', () => {
    const vigente = { term: { vigente: true } };
    expect(compileQuery({ soloVigentes: '1' }).bool.filter).toEqual([vigente, VISIBLE]);
    expect(compileQuery({ incluirVencidos: 0 }).bool.filter).toEqual([vigente, VISIBLE]);
    expect(compileQuery({ incluirVencidos: '1' }).bool.filter).toEqual([VISIBLE]);
  });

  it('orders filter clauses pais, rubro, tags, range, vigente, visible', () => {
    const query = compileQuery({
      pais: '1',
      rubro: '2',
      user_tag_ids: [3],
      filter_mode: 'user_tags',
      apertura_fr: '2024-01-01',
      soloVigentes: '1',
    });
    expect(query.bool.filter).toEqual([
      { term: { pais_id: 1 } },
      { term: { tag_ids: 2 } },
      { terms: { tag_ids: [3] } },
      { range: { apertura: { gte: '2024-01-01' } } },
      { term: { vigente: true } },
      VISIBLE,
    ]);
  });
});

describe('normalizeDateBound', () => {
  it('passes non D/M/YYYY input through verbatim', () => {
    expect(normalizeDateBound('2024-01-01 08:00:00', '00:00:00')).toBe('2024-01-01 08:00:00');
    expect(normalizeDateBound('ayer', '23:59:59')).toBe('ayer');
  });

  it('passes impossible calendar dates through verbatim', () => {
    expect(normalizeDateBound('31/2/2024', '00:00:00')).toBe('31/2/2024');
  });

  it('pads day and month', () => {
    expect(normalizeDateBound('5/3/2024', '00:00:00')).toBe('2024-03-05 00:00:00');
  });
});
