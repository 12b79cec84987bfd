// packages/core/src/sources/mysql-source.ts — DataSource over the publications schema (mysql2)

import mysql from 'mysql2/promise';
import type { Pool, RowDataPacket } from 'mysql2/promise';
import { z } from 'zod';
import type { MysqlConfig } from '../types/config.js';
import type { PublicationRow } from '../types/publication.js';
import { DatabaseError } from '../utils/errors.js';
import type { ChangedSinceOptions, DataSource } from './data-source.js';

const PUBLICATION_WITH_JOINS = `
  SELECT
    p.*,
    GROUP_CONCAT(DISTINCT tp.tag) AS tag_ids_raw,
    GROUP_CONCAT(DISTINCT CONCAT(t.id, ':', COALESCE(t.descripcion, ''))) AS tags_raw,
    pa.nombre AS pais_nombre,
    pa.id AS pais_id,
    GROUP_CONCAT(DISTINCT sm.mercado_id) AS mercado_ids_raw,
    ptl.tipo_licit_id_esAR,
    ptl.tipo_licit_id_ptBR,
    ptl.tipo_licit_id_enUS,
    d.tasaCambioUSD,
    (CASE WHEN p.apertura >= UTC_TIMESTAMP() THEN 1 ELSE 0 END) AS vigente
  FROM publicaciones p
  LEFT JOIN tags_publicaciones tp ON p.id = tp.publicacion
  LEFT JOIN tags t ON tp.tag = t.id AND t.usuario IS NULL
  LEFT JOIN paises pa ON (
    CASE
      WHEN p.pais REGEXP '^[0-9]+$' THEN pa.id = CAST(p.pais AS UNSIGNED)
      ELSE pa.nombre = p.pais
    END
  )
  LEFT JOIN scrapers_mercados sm ON p.scraper = sm.scraper_id
  LEFT JOIN publicaciones_tipos_licit ptl ON p.tipo_id = ptl.id
  LEFT JOIN divisas d ON p.divisaSimboloISO = d.SimboloISO
  WHERE p.id = ?
  GROUP BY p.id`;

const CHANGED_SINCE = `
  SELECT id FROM publicaciones
  WHERE (cargado >= ? OR editado >= ?)
    AND visible = 1
  ORDER BY editado DESC, id DESC
  LIMIT ?`;

const CHANGED_SINCE_FOR_SCRAPER = `
  SELECT id FROM publicaciones
  WHERE scraper = ?
    AND (cargado >= ? OR editado >= ?)
    AND visible = 1
  ORDER BY editado DESC, id DESC
  LIMIT ?`;

const ALL_IDS = `
  SELECT id FROM publicaciones
  WHERE visible = 1
  ORDER BY id ASC
  LIMIT ? OFFSET ?`;

const text = z.string().nullish();
const int = z.number().int().nullish();
const numeric = z.union([z.string(), z.number()]).nullish();

const publicationRowSchema = z.object({
  id: z.number().int(),
  scraper: int,
  idexterno: text,
  referencia: text,
  objeto: text,
  agencia: text,
  oficina: text,
  link: text,
  publicado: text,
  actualizado: text,
  apertura: text,
  cierre: text,
  pais: text,
  rubro: text,
  subrubro: text,
  tipo: text,
  tipo_id: int,
  tipo_cliente_id: numeric,
  contacto: text,
  observaciones: text,
  categoria: int,
  cargado: text,
  editado: text,
  visible: z.union([z.number(), z.boolean()]).nullish(),
  attachs: text,
  monto: numeric,
  divisaSimboloISO: text,
  tag_ids_raw: text,
  tags_raw: text,
  pais_nombre: text,
  pais_id: int,
  mercado_ids_raw: text,
  tipo_licit_id_esAR: int,
  tipo_licit_id_ptBR: int,
  tipo_licit_id_enUS: int,
  tasaCambioUSD: numeric,
  vigente: z.union([z.number(), z.boolean()]).nullish(),
});

const idRowsSchema = z.array(z.object({ id: z.number().int() }));

export class MysqlDataSource implements DataSource {
  constructor(private readonly pool: Pool) {}

  /** Pool with `dateStrings` so dates reach the denormalizer exactly as stored. */
  static fromConfig(config: MysqlConfig): MysqlDataSource {
    const pool = mysql.createPool({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
      connectionLimit: config.connectionLimit,
      charset: 'utf8mb4',
      dateStrings: true,
      connectTimeout: 5000,
    });
    return new MysqlDataSource(pool);
  }

  async fetchWithJoins(id: number): Promise<PublicationRow | null> {
    const [rows] = await this.pool.query<RowDataPacket[]>(PUBLICATION_WITH_JOINS, [id]);
    const first = rows[0];
    if (!first) return null;
    const parsed = publicationRowSchema.safeParse(first);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new DatabaseError(`Unexpected row shape for publication ${id}: ${issues}`, 'fetchWithJoins');
    }
    return parsed.data;
  }

  async listChangedSince(since: string, options: ChangedSinceOptions): Promise<number[]> {
    const [rows] =
      options.scraperId === undefined
        ? await this.pool.query<RowDataPacket[]>(CHANGED_SINCE, [since, since, options.limit])
        : await this.pool.query<RowDataPacket[]>(CHANGED_SINCE_FOR_SCRAPER, [
            options.scraperId,
            since,
            since,
            options.limit,
          ]);
    return this.toIds(rows, 'listChangedSince');
  }

  async listAllIds(pageSize: number, offset: number): Promise<number[]> {
    const [rows] = await this.pool.query<RowDataPacket[]>(ALL_IDS, [pageSize, offset]);
    return this.toIds(rows, 'listAllIds');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private toIds(rows: RowDataPacket[], operation: string): number[] {
    const parsed = idRowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new DatabaseError('Candidate query returned rows without a numeric id', operation);
    }
    return parsed.data.map((r) => r.id);
  }
}
