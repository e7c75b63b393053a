import { UnsupportedDriverError } from '../../common/errors';
import { parseDsn } from './dsn';

describe('parseDsn', () => {
  it('reads DBI PostgreSQL attributes', () => {
    expect(parseDsn('dbi:Pg:dbname=app;host=db.internal;port=6543;sslmode=require;options=-c x')).toEqual({
      driver: 'pg',
      database: 'app',
      host: 'db.internal',
      port: 6543,
      ssl: true,
      unknown: { options: '-c x' },
    });
  });

  it('accepts the alternative attribute names', () => {
    expect(parseDsn('DBI:pg:database=app;hostaddr=127.0.0.1;sslmode=disable')).toEqual({
      driver: 'pg',
      database: 'app',
      host: '127.0.0.1',
      ssl: false,
      unknown: {},
    });
  });

  it('keeps PostgreSQL URLs as connection strings', () => {
    expect(parseDsn('postgresql://app@localhost/app')).toEqual({
      driver: 'pg',
      connectionString: 'postgresql://app@localhost/app',
      unknown: {},
    });
  });

  it('rejects a port that is not a number', () => {
    expect(() => parseDsn('dbi:Pg:dbname=app;port=abc')).toThrow(UnsupportedDriverError);
  });

  it.each([
    ['dbi:SQLite:dbname=./app.db', './app.db'],
    ['dbi:SQLite:./app.db', './app.db'],
    ['sqlite:./app.db', './app.db'],
    ['sqlite:///var/db/app.db', '/var/db/app.db'],
  ])('reads the SQLite file from %s', (dsn, filename) => {
    expect(parseDsn(dsn)).toEqual({ driver: 'sqlite', filename });
  });

  it.each(['dbi:mysql:database=app', 'mysql://localhost/app', 'sqlite:', 'dbi:SQLite:dbname='])(
    'rejects %s',
    (dsn) => {
      expect(() => parseDsn(dsn)).toThrow(UnsupportedDriverError);
    },
  );
});
