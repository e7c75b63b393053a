import { InvalidSchemaClassError, MonikerClashError } from '../../common/errors';
import { parseLoaderOptions } from '../loader-options';
import { column, foreignKey, serialId, table } from '../testing/fixtures';
import { EntityModel, SchemaModel } from '../types/schema-loader.types';
import { ModelBuilderService, parseSchemaClassName, tsTypeFor } from './model-builder.service';

const schemaClass = { namespace: ['My'], className: 'Schema' };

function entity(model: SchemaModel, className: string): EntityModel {
  const found = model.entities.find((candidate) => candidate.className === className);
  if (!found) throw new Error(`no entity ${className}`);
  return found;
}

describe('parseSchemaClassName', () => {
  it.each([
    ['My::Schema', ['My'], 'Schema'],
    ['My.App.Schema', ['My', 'App'], 'Schema'],
    ['Schema', [], 'Schema'],
  ])('splits %s', (name, namespace, className) => {
    expect(parseSchemaClassName(name)).toEqual({ namespace, className });
  });

  it.each(['', 'My::', 'My::2Schema', 'My/Schema'])('rejects %p', (name) => {
    expect(() => parseSchemaClassName(name)).toThrow(InvalidSchemaClassError);
  });
});

describe('tsTypeFor', () => {
  it.each([
    ['integer', 'number'],
    ['int4', 'number'],
    ['double precision', 'number'],
    ['bigint', 'string'],
    ['numeric', 'string'],
    ['boolean', 'boolean'],
    ['timestamptz', 'Date'],
    ['jsonb', 'unknown'],
    ['bytea', 'Buffer'],
    ['varchar', 'string'],
    ['uuid', 'string'],
    ['_int4', 'number[]'],
    ['_text', 'string[]'],
    ['', 'unknown'],
  ])('maps %s to %s', (dataType, tsType) => {
    expect(tsTypeFor(column('value', dataType))).toBe(tsType);
  });
});

describe('ModelBuilderService', () => {
  const builder = new ModelBuilderService();
  const defaults = parseLoaderOptions({});

  const artist = table('artist', [serialId(), column('name', 'varchar', { length: 255 })]);
  const album = table(
    'album',
    [serialId(), column('artist_id', 'integer'), column('title', 'text', { nullable: true })],
    {
      foreign_keys: [
        foreignKey('album_artist_id_fkey', ['artist_id'], 'artist', ['id'], { delete_rule: 'cascade' }),
      ],
    },
  );

  it('selects tables by constraint, then exclude', () => {
    const tables = [artist, album, table('album_log', [serialId()])];

    expect(builder.selectTables(tables, { constraint: /^al/, exclude: /_log$/ })).toEqual([album]);
    expect(builder.selectTables(tables, {})).toEqual(tables);
  });

  it('describes columns as properties', () => {
    const model = builder.build(schemaClass, [artist, album], defaults);

    expect(model.schemaClass).toBe(schemaClass);
    expect(entity(model, 'Album').properties.map(({ name, tsType, primary, generated }) => ({
      name,
      tsType,
      primary,
      generated,
    }))).toEqual([
      { name: 'id', tsType: 'number', primary: true, generated: true },
      { name: 'artist_id', tsType: 'number', primary: false, generated: false },
      { name: 'title', tsType: 'string | null', primary: false, generated: false },
    ]);
  });

  it('does not generate composite primary keys', () => {
    const link = table('album_tag', [serialId('album_id'), column('tag_id', 'integer')], {
      primary_key: ['album_id', 'tag_id'],
    });

    const [model] = builder.build(schemaClass, [link], defaults).entities;

    expect(model.className).toBe('AlbumTag');
    expect(model.properties.map((property) => [property.primary, property.generated])).toEqual([
      [true, false],
      [true, false],
    ]);
  });

  it('turns foreign keys into a relation and its inverse', () => {
    const model = builder.build(schemaClass, [artist, album], defaults);

    expect(entity(model, 'Album').relations).toEqual([
      {
        kind: 'many-to-one',
        name: 'artist',
        target: 'Artist',
        inverseName: 'albums',
        joinColumns: [{ name: 'artist_id', referencedColumnName: 'id' }],
        nullable: false,
        onDelete: 'CASCADE',
        onUpdate: 'NO ACTION',
      },
    ]);
    expect(entity(model, 'Artist').relations).toEqual([
      { kind: 'one-to-many', name: 'albums', target: 'Album', inverseName: 'artist' },
    ]);
  });

  it('skips relationships when asked to', () => {
    const model = builder.build(schemaClass, [artist, album], parseLoaderOptions({ skip_relationships: 1 }));

    expect(model.entities.every((candidate) => candidate.relations.length === 0)).toBe(true);
  });

  it('ignores foreign keys to tables that are not dumped', () => {
    const model = builder.build(schemaClass, [album], defaults);

    expect(entity(model, 'Album').relations).toEqual([]);
  });

  it('applies moniker_map and rel_name_map', () => {
    const model = builder.build(
      schemaClass,
      [artist, album],
      parseLoaderOptions({ moniker_map: { artist: 'Performer' }, rel_name_map: { artist: 'performer' } }),
    );

    expect(model.entities.map((candidate) => candidate.className)).toEqual(['Performer', 'Album']);
    expect(entity(model, 'Album').relations[0]).toMatchObject({ name: 'performer', target: 'Performer' });
  });

  it('prefixes the schema name when two tables share a class name', () => {
    const model = builder.build(
      schemaClass,
      [table('users', [serialId()], { schema: 'public' }), table('users', [serialId()], { schema: 'audit' })],
      defaults,
    );

    expect(model.entities.map((candidate) => candidate.className)).toEqual(['User', 'AuditUser']);
  });

  it('refuses two tables that would share a class name', () => {
    expect(() =>
      builder.build(schemaClass, [table('artist', [serialId()]), table('artists', [serialId()])], defaults),
    ).toThrow(new MonikerClashError('Artist', 'artists', 'table "artist"'));
  });

  it('refuses moniker_map entries that collide', () => {
    expect(() =>
      builder.build(
        schemaClass,
        [artist, album],
        parseLoaderOptions({ moniker_map: { album: 'Artist' } }),
      ),
    ).toThrow(MonikerClashError);
  });

  it('refuses a table named like the schema class', () => {
    expect(() => builder.build(schemaClass, [table('schemas', [serialId()])], defaults)).toThrow(
      new MonikerClashError('Schema', 'schemas', 'the schema class'),
    );
  });

  it('renames relations that clash with columns or each other', () => {
    const team = table('team', [serialId()]);
    const match = table(
      'match',
      [serialId(), column('home_team_id', 'integer'), column('away_team_id', 'integer'), column('team', 'text')],
      {
        foreign_keys: [
          foreignKey('match_home_team_id_fkey', ['home_team_id'], 'team'),
          foreignKey('match_away_team_id_fkey', ['away_team_id'], 'team'),
        ],
      },
    );
    const cd = table('cd', [serialId('cdid')], { primary_key: ['cdid'] });
    const track = table('track', [serialId(), column('cd', 'integer', { nullable: true })], {
      foreign_keys: [foreignKey('track_cd_fkey', ['cd'], 'cd', ['cdid'])],
    });

    const model = builder.build(schemaClass, [team, match, cd, track], defaults);

    expect(entity(model, 'Match').relations.map((relation) => relation.name)).toEqual(['home_team', 'away_team']);
    expect(entity(model, 'Team').relations.map((relation) => relation.name)).toEqual([
      'matches',
      'matches_away_team',
    ]);
    expect(entity(model, 'Track').relations[0]).toMatchObject({
      name: 'cd_rel',
      nullable: true,
      joinColumns: [{ name: 'cd', referencedColumnName: 'cdid' }],
    });
  });

  it('names composite and self-referencing relations', () => {
    const employee = table(
      'employee',
      [serialId(), column('manager_id', 'integer', { nullable: true }), column('dept_code', 'text'), column('dept_site', 'text')],
      {
        foreign_keys: [
          foreignKey('employee_manager_id_fkey', ['manager_id'], 'employee'),
          foreignKey('employee_dept_fkey', ['dept_code', 'dept_site'], 'department', ['code', 'site']),
        ],
      },
    );
    const department = table('department', [column('code', 'text'), column('site', 'text')], {
      primary_key: ['code', 'site'],
    });

    const model = builder.build(schemaClass, [employee, department], defaults);

    expect(entity(model, 'Employee').relations.map((relation) => [relation.kind, relation.name, relation.target])).toEqual([
      ['many-to-one', 'manager', 'Employee'],
      ['one-to-many', 'employees', 'Employee'],
      ['many-to-one', 'department', 'Department'],
    ]);
  });
});
