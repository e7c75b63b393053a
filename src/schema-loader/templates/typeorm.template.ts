import { ResolvedLoaderOptions } from '../loader-options';
import { EntityModel, EntityProperty, EntityRelation, SchemaModel } from '../types/schema-loader.types';
import { lowerFirst, propertyName } from '../utils/inflect';
import {
  ModuleReference,
  importSpecifier,
  importStatement,
  parseModuleReference,
} from '../utils/module-reference';

export const GENERATED_HEADER = '// Created by schema-dump\n// DO NOT MODIFY THE FIRST PART OF THIS FILE\n';

const REFERENTIAL_ACTIONS: Record<string, string> = {
  CASCADE: 'CASCADE',
  RESTRICT: 'RESTRICT',
  'SET NULL': 'SET NULL',
  'SET DEFAULT': 'DEFAULT',
};

export interface RenderContext {
  options: ResolvedLoaderOptions;
  /** Absolute dump directory. */
  dumpDirectory: string;
  /** Absolute path of the file being rendered. */
  file: string;
}

export interface SchemaImport {
  className: string;
  specifier: string;
}

/** Names imported from typeorm; those shadowed by an entity class in the file get an `Orm` alias. */
class TypeormImports {
  private readonly used = new Set<string>();

  constructor(private readonly classNames: Set<string>) {}

  use(name: string): string {
    this.used.add(name);
    return this.classNames.has(name) ? `Orm${name}` : name;
  }

  render(): string {
    const specifiers = [...this.used]
      .sort()
      .map((name) => (this.classNames.has(name) ? `${name} as Orm${name}` : name));
    return `import { ${specifiers.join(', ')} } from 'typeorm';`;
  }
}

export function tsString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
  return `'${escaped}'`;
}

export function renderSchemaClass(model: SchemaModel, imports: SchemaImport[], options: ResolvedLoaderOptions): string {
  const sorted = [...imports].sort((a, b) => a.className.localeCompare(b.className));
  const lines = [GENERATED_HEADER];

  for (const { className, specifier } of sorted) {
    lines.push(`import { ${className} } from '${specifier}';`);
  }
  if (sorted.length > 0) lines.push('');

  if (options.generate_docs) {
    lines.push('/** Entity classes to hand to a TypeORM DataSource. */');
  }
  lines.push(`export class ${model.schemaClass.className} {`);
  lines.push(`  static readonly entities = [${sorted.map((entry) => entry.className).join(', ')}];`);
  lines.push('}');

  return `${lines.join('\n')}\n`;
}

export function renderEntity(entity: EntityModel, context: RenderContext): string {
  const { options } = context;
  const targets = new Set(entity.relations.map((relation) => relation.target));
  targets.delete(entity.className);
  const typeorm = new TypeormImports(new Set([entity.className, ...targets]));
  const members: string[] = [];

  for (const property of entity.properties) {
    members.push(renderProperty(property, typeorm, options));
  }
  const relations = [
    ...entity.relations.filter((relation) => relation.kind === 'many-to-one'),
    ...entity.relations.filter((relation) => relation.kind === 'one-to-many'),
  ];
  for (const relation of relations) {
    members.push(renderRelation(relation, typeorm));
  }

  const classDecorators = [renderEntityDecorator(entity, typeorm)];
  for (const unique of entity.table.unique_constraints) {
    classDecorators.push(`@${typeorm.use('Unique')}(${tsString(unique.name)}, [${unique.columns.map((column) => tsString(propertyName(column))).join(', ')}])`);
  }
  for (const check of entity.table.check_constraints) {
    classDecorators.push(`@${typeorm.use('Check')}(${tsString(check.name)}, ${tsString(check.definition)})`);
  }

  const base = options.result_base_class ? parseModuleReference(options.result_base_class) : undefined;
  const components = options.components.map(parseModuleReference);
  const heritage = renderHeritage(base, components);

  const lines = [GENERATED_HEADER];
  lines.push(typeorm.render());
  for (const reference of [...(base ? [base] : []), ...components]) {
    lines.push(importStatement(reference, importSpecifier(reference, context.dumpDirectory, context.file)));
  }
  for (const target of [...targets].sort()) {
    lines.push(`import { ${target} } from './${target}';`);
  }
  lines.push('');

  if (options.generate_docs) {
    lines.push(renderDoc(entity));
  }
  lines.push(...classDecorators);
  lines.push(`export class ${entity.className}${heritage} {`);
  lines.push(members.join('\n\n'));
  lines.push('}');

  return `${lines.join('\n')}\n`;
}

function renderEntityDecorator(entity: EntityModel, typeorm: TypeormImports): string {
  const parts = [`name: ${tsString(entity.table.name)}`];
  if (entity.table.schema) parts.push(`schema: ${tsString(entity.table.schema)}`);
  return `@${typeorm.use('Entity')}({ ${parts.join(', ')} })`;
}

function renderHeritage(base: ModuleReference | undefined, components: ModuleReference[]): string {
  if (!base && components.length === 0) return '';
  let expression = base ? base.localName : 'class {}';
  for (const component of components) {
    expression = `${component.localName}(${expression})`;
  }
  return ` extends ${expression}`;
}

function renderDoc(entity: EntityModel): string {
  const { table } = entity;
  const lines = [`Table: ${table.schema ? `${table.schema}.${table.name}` : table.name}`];
  if (table.comment) {
    lines.push('', ...table.comment.split('\n'));
  }
  return ['/**', ...lines.map((line) => (line ? ` * ${escapeDoc(line)}` : ' *')), ' */'].join('\n');
}

function escapeDoc(text: string): string {
  return text.replace(/\*\//g, '*\\/');
}

function renderProperty(property: EntityProperty, typeorm: TypeormImports, options: ResolvedLoaderOptions): string {
  const { column } = property;
  const parts = [`name: ${tsString(column.name)}`];

  const isArray = column.data_type.startsWith('_');
  const baseType = isArray ? column.data_type.slice(1) : column.data_type;
  if (column.enum_values) {
    parts.push("type: 'enum'", `enum: [${column.enum_values.map(tsString).join(', ')}]`, `enumName: ${tsString(baseType)}`);
  } else if (baseType) {
    parts.push(`type: ${tsString(baseType)}`);
  }
  if (isArray) parts.push('array: true');
  if (column.length !== null) parts.push(`length: ${column.length}`);

  let decorator: string;
  if (property.generated) {
    decorator = 'PrimaryGeneratedColumn';
  } else {
    decorator = property.primary ? 'PrimaryColumn' : 'Column';
    if (column.nullable) parts.push('nullable: true');
    if (column.default_value !== null) parts.push(`default: () => ${tsString(column.default_value)}`);
  }

  const lines: string[] = [];
  if (options.generate_docs && column.comment) {
    lines.push(`  /** ${escapeDoc(column.comment.replace(/\s*\n\s*/g, ' '))} */`);
  }
  lines.push(`  @${typeorm.use(decorator)}({ ${parts.join(', ')} })`);
  lines.push(`  ${property.name}!: ${property.tsType};`);
  return lines.join('\n');
}

function renderRelation(relation: EntityRelation, typeorm: TypeormImports): string {
  const relationType = typeorm.use('Relation');
  const param = lowerFirst(relation.target);
  const inverse = `(${param}) => ${param}.${relation.inverseName}`;

  if (relation.kind === 'one-to-many') {
    return [
      `  @${typeorm.use('OneToMany')}(() => ${relation.target}, ${inverse})`,
      `  ${relation.name}!: ${relationType}<${relation.target}[]>;`,
    ].join('\n');
  }

  const options: string[] = [];
  if (!relation.nullable) options.push('nullable: false');
  const onDelete = REFERENTIAL_ACTIONS[relation.onDelete];
  if (onDelete) options.push(`onDelete: ${tsString(onDelete)}`);
  const onUpdate = REFERENTIAL_ACTIONS[relation.onUpdate];
  if (onUpdate) options.push(`onUpdate: ${tsString(onUpdate)}`);

  const joinColumns = relation.joinColumns.map(
    (join) => `{ name: ${tsString(join.name)}, referencedColumnName: ${tsString(join.referencedColumnName)} }`,
  );

  return [
    `  @${typeorm.use('ManyToOne')}(() => ${relation.target}, ${inverse}${options.length > 0 ? `, { ${options.join(', ')} }` : ''})`,
    `  @${typeorm.use('JoinColumn')}(${joinColumns.length === 1 ? joinColumns[0] : `[${joinColumns.join(', ')}]`})`,
    `  ${relation.name}!: ${relationType}<${relation.target}>${relation.nullable ? ' | null' : ''};`,
  ].join('\n');
}
