import { Injectable, Logger } from '@nestjs/common';

import { InvalidSchemaClassError, MonikerClashError } from '../../common/errors';
import { ResolvedLoaderOptions } from '../loader-options';
import {
  Column,
  EntityModel,
  EntityProperty,
  EntityRelation,
  ForeignKey,
  SchemaClassName,
  SchemaModel,
  Table,
} from '../types/schema-loader.types';
import {
  lowerFirst,
  pascalCase,
  pluralize,
  propertyName,
  singularize,
  tableMoniker,
} from '../utils/inflect';

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

const TS_TYPES: [RegExp, string][] = [
  [/^(?:bigint|int8|bigserial|serial8|numeric|decimal|money)\b/, 'string'],
  [
    /^(?:int|integer|smallint|tinyint|mediumint|int2|int4|serial|serial2|serial4|smallserial|real|float|float4|float8|double|oid)\b/,
    'number',
  ],
  [/^(?:bool|boolean)\b/, 'boolean'],
  [/^(?:date|datetime|timestamp|timestamptz)\b/, 'Date'],
  [/^jsonb?\b/, 'unknown'],
  [/^(?:bytea|blob)\b/, 'Buffer'],
];

export function parseSchemaClassName(schemaClass: string): SchemaClassName {
  const segments = schemaClass.split(/::|\./);
  if (!segments.every((segment) => IDENTIFIER.test(segment))) {
    throw new InvalidSchemaClassError(schemaClass);
  }
  return { namespace: segments.slice(0, -1), className: segments[segments.length - 1] };
}

export function tsTypeFor(column: Column): string {
  if (column.data_type === '') return 'unknown';
  if (column.data_type.startsWith('_')) {
    return `${tsTypeFor({ ...column, data_type: column.data_type.slice(1) })}[]`;
  }
  const match = TS_TYPES.find(([pattern]) => pattern.test(column.data_type));
  return match ? match[1] : 'string';
}

@Injectable()
export class ModelBuilderService {
  private readonly logger = new Logger(ModelBuilderService.name);

  /** Applies `constraint`, then `exclude`, to table names. */
  selectTables(tables: Table[], options: Pick<ResolvedLoaderOptions, 'constraint' | 'exclude'>): Table[] {
    return tables.filter(
      (table) =>
        (!options.constraint || options.constraint.test(table.name)) &&
        (!options.exclude || !options.exclude.test(table.name)),
    );
  }

  build(schemaClass: SchemaClassName, tables: Table[], options: ResolvedLoaderOptions): SchemaModel {
    const monikers = this.assignMonikers(tables, options.moniker_map, schemaClass.className);

    const entities: EntityModel[] = tables.map((table) => ({
      table,
      className: monikers.get(table) ?? tableMoniker(table.name),
      properties: table.columns.map((column) => this.buildProperty(table, column)),
      relations: [],
    }));

    if (!options.skip_relationships) {
      this.buildRelations(entities, options.rel_name_map);
    }

    for (const entity of entities) {
      this.logger.debug(`${this.qualifiedName(entity.table)} => ${entity.className}`);
    }

    return { schemaClass, entities };
  }

  /** Every table gets its own class name, distinct from the schema class. */
  private assignMonikers(
    tables: Table[],
    monikerMap: Record<string, string>,
    schemaClassName: string,
  ): Map<Table, string> {
    const monikers = new Map<Table, string>();
    const owners = new Map<string, Table>();

    for (const table of tables) {
      const mapped = monikerMap[this.qualifiedName(table)] ?? monikerMap[table.name];
      let moniker = mapped ?? tableMoniker(table.name);
      if (!mapped && owners.has(moniker) && table.schema) {
        moniker = pascalCase(table.schema) + moniker;
      }

      const owner = owners.get(moniker);
      if (owner) {
        throw new MonikerClashError(moniker, this.qualifiedName(table), `table "${this.qualifiedName(owner)}"`);
      }
      if (moniker === schemaClassName) {
        throw new MonikerClashError(moniker, this.qualifiedName(table), 'the schema class');
      }
      monikers.set(table, moniker);
      owners.set(moniker, table);
    }

    return monikers;
  }

  private buildProperty(table: Table, column: Column): EntityProperty {
    const primary = table.primary_key.includes(column.name);
    const tsType = tsTypeFor(column);
    return {
      name: propertyName(column.name),
      column,
      tsType: column.nullable ? `${tsType} | null` : tsType,
      primary,
      generated: primary && table.primary_key.length === 1 && column.is_auto_increment,
    };
  }

  private buildRelations(entities: EntityModel[], relNameMap: Record<string, string>): void {
    const byTable = new Map(entities.map((entity) => [this.tableKey(entity.table.schema, entity.table.name), entity]));
    const usedNames = new Map(
      entities.map((entity) => [entity, new Set(entity.properties.map((property) => property.name))]),
    );

    const claim = (entity: EntityModel, base: string, fallback: string): string => {
      const names = usedNames.get(entity) ?? new Set<string>();
      let name = relNameMap[base] ?? base;
      if (names.has(name)) name = fallback;
      for (let suffix = 2; names.has(name); suffix++) name = `${fallback}${suffix}`;
      names.add(name);
      return name;
    };

    for (const source of entities) {
      for (const fk of source.table.foreign_keys) {
        const target = byTable.get(this.tableKey(fk.referenced_schema ?? source.table.schema, fk.referenced_table));
        if (!target) {
          this.logger.debug(`Skipping ${fk.name}: ${fk.referenced_table} is not being dumped`);
          continue;
        }

        const belongsTo = this.belongsToName(fk, target);
        const manyToOneName = claim(source, belongsTo, `${belongsTo}_rel`);
        const hasMany = propertyName(lowerFirst(pluralize(singularize(source.table.name))));
        const oneToManyName = claim(target, hasMany, `${hasMany}_${manyToOneName}`);

        const nullable = fk.columns.some(
          (name) => source.table.columns.find((column) => column.name === name)?.nullable ?? false,
        );

        const manyToOne: EntityRelation = {
          kind: 'many-to-one',
          name: manyToOneName,
          target: target.className,
          inverseName: oneToManyName,
          joinColumns: fk.columns.map((name, index) => ({
            name,
            referencedColumnName: propertyName(fk.referenced_columns[index] ?? name),
          })),
          nullable,
          onDelete: fk.delete_rule.toUpperCase(),
          onUpdate: fk.update_rule.toUpperCase(),
        };
        source.relations.push(manyToOne);
        target.relations.push({
          kind: 'one-to-many',
          name: oneToManyName,
          target: source.className,
          inverseName: manyToOneName,
        });
      }
    }
  }

  /** `artist_id`, `artistId` and `artistid` give `artist`; anything else is named after the target. */
  private belongsToName(fk: ForeignKey, target: EntityModel): string {
    if (fk.columns.length === 1) {
      const [column] = fk.columns;
      const stripped = column.toLowerCase() === `${target.table.name.toLowerCase()}id`
        ? column.slice(0, -2)
        : column.replace(/(?:_id|_ID|Id)$/, '');
      if (stripped.length > 0) return propertyName(stripped);
    }
    return lowerFirst(target.className);
  }

  private tableKey(schema: string | null, name: string): string {
    return schema ? `${schema}.${name}` : name;
  }

  private qualifiedName(table: Table): string {
    return this.tableKey(table.schema, table.name);
  }
}
