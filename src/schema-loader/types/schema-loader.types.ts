export interface Column {
  name: string;
  /** Lower-cased base type, `_`-prefixed for PostgreSQL arrays. */
  data_type: string;
  length: number | null;
  nullable: boolean;
  default_value: string | null;
  is_auto_increment: boolean;
  comment: string | null;
  /** Labels of a PostgreSQL enum type, in declaration order. */
  enum_values?: string[];
}

export interface ForeignKey {
  name: string;
  columns: string[];
  referenced_schema: string | null;
  referenced_table: string;
  referenced_columns: string[];
  update_rule: string;
  delete_rule: string;
}

export interface UniqueConstraint {
  name: string;
  columns: string[];
}

export interface CheckConstraint {
  name: string;
  definition: string;
}

export interface Table {
  name: string;
  /** `null` for databases without schemas (SQLite). */
  schema: string | null;
  comment: string | null;
  columns: Column[];
  primary_key: string[];
  foreign_keys: ForeignKey[];
  unique_constraints: UniqueConstraint[];
  check_constraints: CheckConstraint[];
}

export interface SchemaClassName {
  /** Namespace segments leading up to the class, e.g. `['My']` for `My::Schema`. */
  namespace: string[];
  className: string;
}

export interface EntityProperty {
  name: string;
  column: Column;
  tsType: string;
  primary: boolean;
  generated: boolean;
}

export interface JoinColumn {
  name: string;
  referencedColumnName: string;
}

export type EntityRelation =
  | {
      kind: 'many-to-one';
      name: string;
      target: string;
      inverseName: string;
      joinColumns: JoinColumn[];
      nullable: boolean;
      onDelete: string;
      onUpdate: string;
    }
  | {
      kind: 'one-to-many';
      name: string;
      target: string;
      inverseName: string;
    };

export interface EntityModel {
  table: Table;
  className: string;
  properties: EntityProperty[];
  relations: EntityRelation[];
}

export interface SchemaModel {
  schemaClass: SchemaClassName;
  entities: EntityModel[];
}

export interface SchemaIntrospector {
  /** Reads every base table of the given schemas (driver default when omitted). */
  getTables(schemas?: string[]): Promise<Table[]>;
  close(): Promise<void>;
}

export type GeneratedFileKind = 'schema' | 'result';

export type GeneratedCodeFilter = (
  kind: GeneratedFileKind,
  className: string,
  text: string,
) => string | Promise<string>;
