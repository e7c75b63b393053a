import { Column, ForeignKey, Table } from '../types/schema-loader.types';

export function column(name: string, data_type: string, overrides: Partial<Column> = {}): Column {
  return {
    name,
    data_type,
    length: null,
    nullable: false,
    default_value: null,
    is_auto_increment: false,
    comment: null,
    ...overrides,
  };
}

export function serialId(name = 'id'): Column {
  return column(name, 'integer', { is_auto_increment: true });
}

export function foreignKey(
  name: string,
  columns: string[],
  referenced_table: string,
  referenced_columns: string[] = ['id'],
  overrides: Partial<ForeignKey> = {},
): ForeignKey {
  return {
    name,
    columns,
    referenced_schema: null,
    referenced_table,
    referenced_columns,
    update_rule: 'NO ACTION',
    delete_rule: 'NO ACTION',
    ...overrides,
  };
}

export function table(name: string, columns: Column[], overrides: Partial<Table> = {}): Table {
  return {
    name,
    schema: null,
    comment: null,
    columns,
    primary_key: ['id'],
    foreign_keys: [],
    unique_constraints: [],
    check_constraints: [],
    ...overrides,
  };
}
