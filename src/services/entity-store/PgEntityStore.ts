import { Pool, QueryResultRow } from 'pg';
import { StoreError } from '../../middleware/errorHandler';
import { ENTITY_TEXT_FIELDS, EntityRecord, EntityRecordInput, storedEntitySchema } from '../../types/entity';
import logger from '../../utils/logger';
import { IEntityStore } from './IEntityStore';

/**
 * Writable columns, in table order. Statements are only ever built from this list.
 */
export const ENTITY_COLUMNS: ReadonlyArray<keyof EntityRecordInput> = [
  'name',
  'entity_type',
  ...ENTITY_TEXT_FIELDS,
  'created_at',
  'updated_at',
];

export interface SqlStatement {
  text: string;
  values: string[];
}

const quote = (identifier: string) => `"${identifier}"`;

function presentColumns(record: EntityRecordInput): Array<[string, string]> {
  const columns: Array<[string, string]> = [];
  for (const column of ENTITY_COLUMNS) {
    const value = record[column];
    if (value !== undefined) {
      columns.push([column, value]);
    }
  }
  return columns;
}

export function buildInsertStatement(table: string, record: EntityRecordInput): SqlStatement {
  const columns = presentColumns(record);
  const names = columns.map(([column]) => quote(column)).join(', ');
  const placeholders = columns.map((_, index) => `$${index + 1}`).join(', ');
  return {
    text: `INSERT INTO ${quote(table)} (${names}) VALUES (${placeholders}) RETURNING *`,
    values: columns.map(([, value]) => value),
  };
}

export function buildUpdateStatement(table: string, id: string, record: EntityRecordInput): SqlStatement {
  const columns = presentColumns(record);
  const assignments = columns.map(([column], index) => `${quote(column)} = $${index + 1}`).join(', ');
  return {
    text: `UPDATE ${quote(table)} SET ${assignments} WHERE "id" = $${columns.length + 1} RETURNING *`,
    values: [...columns.map(([, value]) => value), id],
  };
}

/**
 * PostgreSQL-backed entity store
 */
export class PgEntityStore implements IEntityStore {
  constructor(private readonly pool: Pool, private readonly table = 'entities') {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(table)) {
      throw new Error(`Invalid table name: ${table}`);
    }
  }

  async findByWebsite(website: string): Promise<EntityRecord | null> {
    const rows = await this.run({
      text: `SELECT * FROM ${quote(this.table)} WHERE "website" = $1 LIMIT 1`,
      values: [website],
    });
    return rows.length > 0 ? this.toRecord(rows[0]) : null;
  }

  async insert(record: EntityRecordInput): Promise<EntityRecord | null> {
    const rows = await this.run(buildInsertStatement(this.table, record));
    return rows.length > 0 ? this.toRecord(rows[0]) : null;
  }

  async update(id: string, record: EntityRecordInput): Promise<EntityRecord | null> {
    const rows = await this.run(buildUpdateStatement(this.table, id, record));
    return rows.length > 0 ? this.toRecord(rows[0]) : null;
  }

  private async run(statement: SqlStatement): Promise<QueryResultRow[]> {
    try {
      const result = await this.pool.query(statement.text, statement.values);
      return result.rows;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Entity store query failed: ${message}`);
      throw new StoreError(`Entity store query failed: ${message}`);
    }
  }

  private toRecord(row: QueryResultRow): EntityRecord {
    const parsed = storedEntitySchema.safeParse(row);
    if (!parsed.success) {
      throw new StoreError(`Unexpected entity row shape: ${parsed.error.issues.map(issue => issue.path.join('.')).join(', ')}`);
    }
    return parsed.data;
  }
}
