export const PG_QUERIES = {
  PING: 'SELECT 1',
  GET_TABLES: `
    SELECT
      t.table_schema::text AS table_schema,
      t.table_name::text AS table_name,
      obj_description(format('%I.%I', t.table_schema, t.table_name)::regclass, 'pg_class') AS table_comment
    FROM information_schema.tables t
    WHERE t.table_schema = ANY($1)
    AND t.table_type = 'BASE TABLE'
    ORDER BY t.table_schema, t.table_name
  `,
  GET_COLUMNS: `
    SELECT
      c.column_name::text AS column_name,
      c.data_type::text AS data_type,
      c.udt_name::text AS udt_name,
      c.is_nullable::text AS is_nullable,
      c.column_default::text AS column_default,
      c.is_identity::text AS is_identity,
      c.character_maximum_length::int AS character_maximum_length,
      col_description(format('%I.%I', c.table_schema, c.table_name)::regclass, c.ordinal_position::int) AS column_comment,
      (
        SELECT array_agg(e.enumlabel::text ORDER BY e.enumsortorder)
        FROM pg_catalog.pg_type t
        JOIN pg_catalog.pg_namespace n ON n.oid = t.typnamespace
        JOIN pg_catalog.pg_enum e ON e.enumtypid = t.oid
        WHERE n.nspname = c.udt_schema
        AND t.typname = CASE WHEN c.data_type = 'ARRAY' THEN substr(c.udt_name, 2) ELSE c.udt_name END
      ) AS enum_values
    FROM information_schema.columns c
    WHERE c.table_schema = $1
    AND c.table_name = $2
    ORDER BY c.ordinal_position
  `,
  GET_PRIMARY_KEYS: `
    SELECT kcu.column_name::text AS column_name
    FROM information_schema.table_constraints tc
    JOIN information_schema.key_column_usage kcu
      ON kcu.constraint_name = tc.constraint_name
      AND kcu.table_schema = tc.table_schema
      AND kcu.table_name = tc.table_name
    WHERE tc.constraint_type = 'PRIMARY KEY'
    AND tc.table_schema = $1
    AND tc.table_name = $2
    ORDER BY kcu.ordinal_position
  `,
  GET_FOREIGN_KEYS: `
    SELECT
      tc.constraint_name::text AS constraint_name,
      kcu.column_name::text AS column_name,
      rkcu.table_schema::text AS foreign_table_schema,
      rkcu.table_name::text AS foreign_table_name,
      rkcu.column_name::text AS foreign_column_name,
      rc.update_rule::text AS update_rule,
      rc.delete_rule::text AS delete_rule
    FROM information_schema.table_constraints tc
    JOIN information_schema.key_column_usage kcu
      ON kcu.constraint_name = tc.constraint_name
      AND kcu.constraint_schema = tc.constraint_schema
    JOIN information_schema.referential_constraints rc
      ON rc.constraint_name = tc.constraint_name
      AND rc.constraint_schema = tc.constraint_schema
    JOIN information_schema.key_column_usage rkcu
      ON rkcu.constraint_name = rc.unique_constraint_name
      AND rkcu.constraint_schema = rc.unique_constraint_schema
      AND rkcu.ordinal_position = kcu.position_in_unique_constraint
    WHERE tc.constraint_type = 'FOREIGN KEY'
    AND tc.table_schema = $1
    AND tc.table_name = $2
    ORDER BY tc.constraint_name, kcu.ordinal_position
  `,
  GET_UNIQUE_CONSTRAINTS: `
    SELECT
      tc.constraint_name::text AS constraint_name,
      array_agg(kcu.column_name::text ORDER BY kcu.ordinal_position) AS columns
    FROM information_schema.table_constraints tc
    JOIN information_schema.key_column_usage kcu
      ON kcu.constraint_name = tc.constraint_name
      AND kcu.table_schema = tc.table_schema
      AND kcu.table_name = tc.table_name
    WHERE tc.constraint_type = 'UNIQUE'
    AND tc.table_schema = $1
    AND tc.table_name = $2
    GROUP BY tc.constraint_name
    ORDER BY tc.constraint_name
  `,
  GET_CHECK_CONSTRAINTS: `
    SELECT
      tc.constraint_name::text AS constraint_name,
      cc.check_clause::text AS definition
    FROM information_schema.table_constraints tc
    JOIN information_schema.check_constraints cc
      ON cc.constraint_name = tc.constraint_name
      AND cc.constraint_schema = tc.constraint_schema
    WHERE tc.table_schema = $1
    AND tc.table_name = $2
    AND tc.constraint_type = 'CHECK'
    AND cc.check_clause NOT LIKE '%IS NOT NULL'
    ORDER BY tc.constraint_name
  `,
};

export const SQLITE_QUERIES = {
  GET_TABLES: `
    SELECT name
    FROM sqlite_master
    WHERE type = 'table'
    AND name NOT LIKE 'sqlite_%'
    ORDER BY name
  `,
};
