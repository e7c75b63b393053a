import type Database from 'better-sqlite3';
import { Logger } from '@nestjs/common';
import { z } from 'zod';

import { SQLITE_QUERIES } from '../constants/query-templates';
import {
  Column,
  ForeignKey,
  SchemaIntrospector,
  Table,
  UniqueConstraint,
} from '../types/schema-loader.types';

const tableRow = z.object({ name: z.string() });

const columnRow = z.object({
  cid: z.number(),
  name: z.string(),
  type: z.string(),
  notnull: z.number(),
  dflt_value: z.string().nullable(),
  pk: z.number(),
});

const foreignKeyRow = z.object({
  id: z.number(),
  seq: z.number(),
  table: z.string(),
  from: z.string(),
  to: z.string().nullable(),
  on_update: z.string(),
  on_delete: z.string(),
});

const indexRow = z.object({
  name: z.string(),
  unique: z.number(),
  origin: z.string(),
});

const indexColumnRow = z.object({ seqno: z.number(), name: z.string().nullable() });

type ColumnRow = z.infer<typeof columnRow>;

const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

export class SqliteIntrospector implements SchemaIntrospector {
  private readonly logger = new Logger(SqliteIntrospector.name);

  constructor(private readonly db: Database.Database) {}

  // SQLite has a single schema; requested schema names do not apply
  async getTables(): Promise<Table[]> {
    const names = z
      .array(tableRow)
      .parse(this.db.prepare(SQLITE_QUERIES.GET_TABLES).all())
      .map((row) => row.name);

    const result = names.map((name) => {
      this.logger.debug(`Processing table: ${name}`);
      const columns = z.array(columnRow).parse(this.db.pragma(`table_info(${quoteIdentifier(name)})`));
      const primaryKey = columns
        .filter((column) => column.pk > 0)
        .sort((a, b) => a.pk - b.pk)
        .map((column) => column.name);

      const table: Table = {
        name,
        schema: null,
        comment: null,
        columns: columns.map((row) => this.mapColumn(row, primaryKey)),
        primary_key: primaryKey,
        foreign_keys: this.getForeignKeys(name),
        unique_constraints: this.getUniqueConstraints(name),
        check_constraints: [],
      };
      return table;
    });

    return result;
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private mapColumn(row: ColumnRow, primaryKey: string[]): Column {
    const type = /^\s*([^(]*?)\s*(?:\(\s*(\d+)\s*(?:,[^)]*)?\))?\s*$/.exec(row.type);
    const baseType = (type ? type[1] : row.type).toLowerCase();
    const isPrimary = row.pk > 0;

    return {
      name: row.name,
      data_type: baseType,
      length: type && type[2] !== undefined && !row.type.includes(',') ? Number(type[2]) : null,
      nullable: row.notnull === 0 && !isPrimary,
      default_value: row.dflt_value,
      // INTEGER PRIMARY KEY aliases the rowid
      is_auto_increment: isPrimary && primaryKey.length === 1 && baseType === 'integer',
      comment: null,
    };
  }

  private getForeignKeys(table: string): ForeignKey[] {
    const rows = z
      .array(foreignKeyRow)
      .parse(this.db.pragma(`foreign_key_list(${quoteIdentifier(table)})`));

    const byId = new Map<number, ForeignKey>();
    for (const row of rows.sort((a, b) => a.id - b.id || a.seq - b.seq)) {
      let fk = byId.get(row.id);
      if (!fk) {
        fk = {
          name: '',
          columns: [],
          referenced_schema: null,
          referenced_table: row.table,
          referenced_columns: [],
          update_rule: row.on_update,
          delete_rule: row.on_delete,
        };
        byId.set(row.id, fk);
      }
      fk.columns.push(row.from);
      if (row.to !== null) fk.referenced_columns.push(row.to);
    }

    // `REFERENCES parent` without columns points at the parent's primary key
    for (const fk of byId.values()) {
      if (fk.referenced_columns.length === 0) {
        fk.referenced_columns = z
          .array(columnRow)
          .parse(this.db.pragma(`table_info(${quoteIdentifier(fk.referenced_table)})`))
          .filter((column) => column.pk > 0)
          .sort((a, b) => a.pk - b.pk)
          .map((column) => column.name);
      }
    }

    // SQLite keeps no constraint names; use PostgreSQL's default naming
    return [...byId.values()]
      .map((fk) => ({ ...fk, name: `${table}_${fk.columns.join('_')}_fkey` }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  private getUniqueConstraints(table: string): UniqueConstraint[] {
    return z
      .array(indexRow)
      .parse(this.db.pragma(`index_list(${quoteIdentifier(table)})`))
      .filter((index) => index.unique === 1 && index.origin !== 'pk')
      .map((index) => ({
        name: index.name,
        columns: z
          .array(indexColumnRow)
          .parse(this.db.pragma(`index_info(${quoteIdentifier(index.name)})`))
          .sort((a, b) => a.seqno - b.seqno)
          .flatMap((column) => (column.name === null ? [] : [column.name])),
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }
}
