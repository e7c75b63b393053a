import { UnsupportedDriverError } from '../../common/errors';

export interface PgDsn {
  driver: 'pg';
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  ssl?: boolean;
  /** DSN attributes with no meaning to the driver. */
  unknown: Record<string, string>;
}

export interface SqliteDsn {
  driver: 'sqlite';
  filename: string;
}

export type ParsedDsn = PgDsn | SqliteDsn;

const SSL_MODES: Record<string, boolean> = {
  disable: false,
  allow: false,
  prefer: false,
  require: true,
  'verify-ca': true,
  'verify-full': true,
};

/**
 * Accepts DBI-style DSNs (`dbi:Pg:dbname=app;host=db`, `dbi:SQLite:app.db`)
 * as well as `postgres://` URLs and `sqlite:` paths.
 */
export function parseDsn(dsn: string): ParsedDsn {
  if (/^postgres(?:ql)?:\/\//i.test(dsn)) {
    return { driver: 'pg', connectionString: dsn, unknown: {} };
  }

  const dbi = /^dbi:(\w+):(.*)$/is.exec(dsn);
  if (dbi) {
    const [, driver, rest] = dbi;
    if (driver.toLowerCase() === 'pg') return parsePgAttributes(rest, dsn);
    if (driver.toLowerCase() === 'sqlite') {
      const attributes = parseAttributes(rest);
      const filename = rest.includes('=')
        ? attributes.dbname ?? attributes.database ?? attributes.db
        : rest;
      return sqlite(filename, dsn);
    }
    throw new UnsupportedDriverError(dsn);
  }

  const sqliteUrl = /^sqlite:(?:\/\/)?(.*)$/is.exec(dsn);
  if (sqliteUrl) return sqlite(sqliteUrl[1], dsn);

  throw new UnsupportedDriverError(dsn);
}

function sqlite(filename: string | undefined, dsn: string): SqliteDsn {
  if (!filename) throw new UnsupportedDriverError(dsn);
  return { driver: 'sqlite', filename };
}

function parsePgAttributes(rest: string, dsn: string): PgDsn {
  const parsed: PgDsn = { driver: 'pg', unknown: {} };

  for (const [key, value] of Object.entries(parseAttributes(rest))) {
    switch (key) {
      case 'dbname':
      case 'database':
      case 'db':
        parsed.database = value;
        break;
      case 'host':
      case 'hostaddr':
        parsed.host = value;
        break;
      case 'port': {
        const port = Number(value);
        if (!Number.isInteger(port)) throw new UnsupportedDriverError(dsn);
        parsed.port = port;
        break;
      }
      case 'sslmode':
        parsed.ssl = SSL_MODES[value] ?? true;
        break;
      default:
        parsed.unknown[key] = value;
    }
  }

  return parsed;
}

function parseAttributes(text: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const part of text.split(';')) {
    const index = part.indexOf('=');
    if (index === -1) continue;
    attributes[part.slice(0, index).trim().toLowerCase()] = part.slice(index + 1).trim();
  }
  return attributes;
}
