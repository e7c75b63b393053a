import { Injectable, Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import { Pool, PoolConfig } from 'pg';

import { SchemaDumpError } from '../../common/errors';
import { ConnectInfo, LiteralValue, isLiteralMap } from '../../common/types';
import { PgIntrospector } from '../introspectors/pg.introspector';
import { SqliteIntrospector } from '../introspectors/sqlite.introspector';
import { SchemaIntrospector } from '../types/schema-loader.types';
import { PgDsn, parseDsn } from '../utils/dsn';

@Injectable()
export class DatabaseService {
  private readonly logger = new Logger(DatabaseService.name);

  async connect(connectInfo: ConnectInfo): Promise<SchemaIntrospector> {
    const [dsn, user, password, ...extra] = connectInfo;
    const parsed = parseDsn(dsn);
    const attributes = this.mergeAttributes(extra);

    if (parsed.driver === 'sqlite') {
      this.ignoreAttributes(Object.keys(attributes));
      if (parsed.filename !== ':memory:' && !fs.existsSync(parsed.filename)) {
        throw new SchemaDumpError(`SQLite database ${parsed.filename} does not exist`);
      }
      this.logger.debug(`Opening SQLite database ${parsed.filename}`);
      return new SqliteIntrospector(
        new Database(parsed.filename, { readonly: true, fileMustExist: true }),
      );
    }

    const config = this.poolConfig(parsed, user, password, attributes);
    this.logger.debug(
      `Connecting to database with config: ${JSON.stringify({
        ...config,
        password: config.password === undefined ? undefined : '***',
        connectionString: config.connectionString === undefined ? undefined : '***',
      })}`,
    );

    const introspector = new PgIntrospector(new Pool(config));
    try {
      await introspector.ping();
    } catch (error) {
      await introspector.close();
      throw error;
    }
    return introspector;
  }

  private poolConfig(
    dsn: PgDsn,
    user: string | undefined,
    password: string | undefined,
    attributes: Record<string, LiteralValue>,
  ): PoolConfig {
    this.ignoreAttributes(Object.keys(dsn.unknown));

    const { ssl, application_name, ...rest } = attributes;
    this.ignoreAttributes(Object.keys(rest));

    return {
      connectionString: dsn.connectionString,
      host: dsn.host,
      port: dsn.port,
      database: dsn.database,
      // empty credentials fall back to PGUSER / PGPASSWORD
      user: user || undefined,
      password: password || undefined,
      ssl: typeof ssl === 'boolean' || typeof ssl === 'number' ? Boolean(ssl) : dsn.ssl,
      application_name: typeof application_name === 'string' ? application_name : 'schema-dump',
    };
  }

  /** Mapping-shaped extras are connection attributes; later ones win. */
  private mergeAttributes(extra: LiteralValue[]): Record<string, LiteralValue> {
    const attributes: Record<string, LiteralValue> = {};
    for (const value of extra) {
      if (isLiteralMap(value)) {
        Object.assign(attributes, value);
      } else {
        this.logger.warn(`Ignoring connect info value ${JSON.stringify(value)}: expected a mapping`);
      }
    }
    return attributes;
  }

  private ignoreAttributes(names: string[]): void {
    for (const name of names) {
      this.logger.debug(`Ignoring connection attribute "${name}"`);
    }
  }
}
