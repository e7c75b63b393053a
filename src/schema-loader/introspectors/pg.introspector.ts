import { Logger } from '@nestjs/common';
import { z } from 'zod';

import { PG_QUERIES } from '../constants/query-templates';
import {
  Column,
  ForeignKey,
  SchemaIntrospector,
  Table,
} from '../types/schema-loader.types';

/** The part of a `pg` pool the introspector talks to. */
export interface PgPool {
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

export interface PgClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(): void;
}

const tableRow = z.object({
  table_schema: z.string(),
  table_name: z.string(),
  table_comment: z.string().nullable(),
});

const columnRow = z.object({
  column_name: z.string(),
  data_type: z.string(),
  udt_name: z.string(),
  is_nullable: z.string(),
  column_default: z.string().nullable(),
  is_identity: z.string().nullable(),
  character_maximum_length: z.number().nullable(),
  column_comment: z.string().nullable(),
  enum_values: z.array(z.string()).nullable(),
});

const primaryKeyRow = z.object({ column_name: z.string() });

const foreignKeyRow = z.object({
  constraint_name: z.string(),
  column_name: z.string(),
  foreign_table_schema: z.string(),
  foreign_table_name: z.string(),
  foreign_column_name: z.string(),
  update_rule: z.string(),
  delete_rule: z.string(),
});

const uniqueRow = z.object({ constraint_name: z.string(), columns: z.array(z.string()) });

const checkRow = z.object({ constraint_name: z.string(), definition: z.string() });

type ColumnRow = z.infer<typeof columnRow>;
type ForeignKeyRow = z.infer<typeof foreignKeyRow>;

export class PgIntrospector implements SchemaIntrospector {
  private readonly logger = new Logger(PgIntrospector.name);

  constructor(private readonly pool: PgPool) {}

  async ping(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(PG_QUERIES.PING);
      this.logger.debug('Database connection test successful');
    } finally {
      client.release();
    }
  }

  async getTables(schemas: string[] = ['public']): Promise<Table[]> {
    const client = await this.pool.connect();
    try {
      this.logger.debug(`Querying tables in schemas: ${schemas.join(', ')}`);
      const tables = z.array(tableRow).parse((await client.query(PG_QUERIES.GET_TABLES, [schemas])).rows);

      const result: Table[] = [];

      for (const { table_schema: schema, table_name, table_comment } of tables) {
        this.logger.debug(`Processing table: ${schema}.${table_name}`);
        const [columns, pks, fks, uniques, checks] = await Promise.all([
          client.query(PG_QUERIES.GET_COLUMNS, [schema, table_name]),
          client.query(PG_QUERIES.GET_PRIMARY_KEYS, [schema, table_name]),
          client.query(PG_QUERIES.GET_FOREIGN_KEYS, [schema, table_name]),
          client.query(PG_QUERIES.GET_UNIQUE_CONSTRAINTS, [schema, table_name]),
          client.query(PG_QUERIES.GET_CHECK_CONSTRAINTS, [schema, table_name]),
        ]);

        result.push({
          name: table_name,
          schema,
          comment: table_comment,
          columns: z.array(columnRow).parse(columns.rows).map((row) => this.mapColumn(row)),
          primary_key: z.array(primaryKeyRow).parse(pks.rows).map((pk) => pk.column_name),
          foreign_keys: this.groupForeignKeys(z.array(foreignKeyRow).parse(fks.rows)),
          unique_constraints: z
            .array(uniqueRow)
            .parse(uniques.rows)
            .map((u) => ({ name: u.constraint_name, columns: u.columns })),
          check_constraints: z
            .array(checkRow)
            .parse(checks.rows)
            .map((c) => ({ name: c.constraint_name, definition: c.definition })),
        });
      }

      this.logger.debug(`Processed ${result.length} tables`);
      return result;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private mapColumn(row: ColumnRow): Column {
    const isArrayOrEnum = row.data_type === 'ARRAY' || row.data_type === 'USER-DEFINED';
    return {
      name: row.column_name,
      data_type: (isArrayOrEnum ? row.udt_name : row.data_type).toLowerCase(),
      length: row.character_maximum_length,
      nullable: row.is_nullable === 'YES',
      default_value: row.column_default,
      is_auto_increment:
        row.is_identity === 'YES' || (row.column_default ?? '').startsWith('nextval('),
      comment: row.column_comment,
      ...(row.enum_values ? { enum_values: row.enum_values } : {}),
    };
  }

  /** One row per column comes back; composite keys are folded together. */
  private groupForeignKeys(rows: ForeignKeyRow[]): ForeignKey[] {
    const byName = new Map<string, ForeignKey>();
    for (const row of rows) {
      let fk = byName.get(row.constraint_name);
      if (!fk) {
        fk = {
          name: row.constraint_name,
          columns: [],
          referenced_schema: row.foreign_table_schema,
          referenced_table: row.foreign_table_name,
          referenced_columns: [],
          update_rule: row.update_rule,
          delete_rule: row.delete_rule,
        };
        byName.set(row.constraint_name, fk);
      }
      fk.columns.push(row.column_name);
      fk.referenced_columns.push(row.foreign_column_name);
    }
    return [...byName.values()];
  }
}
