import { Injectable, Logger } from '@nestjs/common';

import { UnknownLoaderOptionError, UsageError } from '../../common/errors';
import { parseCliValue } from '../../common/literal-parser';
import { ConnectInfo, LiteralValue, LoaderOptions, isLiteralMap } from '../../common/types';
import { SchemaLoaderService } from '../../schema-loader/schema-loader.service';
import { SearchPathService } from '../../schema-loader/services/search-path.service';
import { ConfigFileService } from './config-file.service';

export interface SchemaDumpOptions {
  include?: string[];
  loaderOption?: string[];
}

export interface ResolvedArguments {
  schemaClass: string;
  loaderOptions: LoaderOptions;
  connectInfo: ConnectInfo;
}

const DEFAULT_DUMP_DIRECTORY = '.';

@Injectable()
export class ArgumentResolverService {
  private readonly logger = new Logger(ArgumentResolverService.name);

  constructor(
    private readonly schemaLoader: SchemaLoaderService,
    private readonly searchPath: SearchPathService,
    private readonly configFile: ConfigFileService,
  ) {}

  async resolve(params: string[], options: SchemaDumpOptions): Promise<ResolvedArguments> {
    this.searchPath.add(...(options.include ?? []));

    const loaderOptions = this.collectLoaderOptions(options.loaderOption ?? []);

    if (params.length === 1) {
      return this.fromConfigFile(params[0], loaderOptions);
    }
    return this.fromPositional(params, loaderOptions);
  }

  /** Turns repeated `key=value` flags into a mapping; the last occurrence of a key wins. */
  collectLoaderOptions(flags: string[]): LoaderOptions {
    const loaderOptions: LoaderOptions = {};

    for (const flag of flags) {
      const separator = flag.indexOf('=');
      if (separator <= 0) {
        throw new UsageError(`Loader option "${flag}" must be written as key=value`);
      }

      const key = flag.slice(0, separator).replace(/-/g, '_');
      if (!this.schemaLoader.supportsOption(key)) {
        throw new UnknownLoaderOptionError(key);
      }
      loaderOptions[key] = parseCliValue(flag.slice(separator + 1));
    }

    return loaderOptions;
  }

  private fromPositional(params: string[], loaderOptions: LoaderOptions): ResolvedArguments {
    const [schemaClass, dsn, ...rest] = params;
    if (!schemaClass || !dsn) {
      throw new UsageError('A schema class and a DSN are required');
    }

    let user: string | undefined;
    let password: string | undefined;
    if (/sqlite/i.test(dsn)) {
      user = '';
      password = '';
    } else {
      [user, password] = rest.splice(0, 2);
    }

    const extra = rest.map(parseCliValue);
    loaderOptions.dump_directory ??= DEFAULT_DUMP_DIRECTORY;

    return { schemaClass, loaderOptions, connectInfo: [dsn, user, password, ...extra] };
  }

  private async fromConfigFile(file: string, cliOptions: LoaderOptions): Promise<ResolvedArguments> {
    const config = await this.configFile.load(file);

    const schemaClass = config.schema_class;
    const connectInfo = config.connect_info;
    if (typeof schemaClass !== 'string' || schemaClass === '') {
      throw new UsageError(`${file} does not name a schema_class`);
    }
    if (!isLiteralMap(connectInfo) || Object.keys(connectInfo).length === 0) {
      throw new UsageError(`${file} has no connect_info section`);
    }

    const lib = toPathList(config.lib, file);
    if (lib.length > 0) {
      this.searchPath.add(...lib);
    }

    const { dsn, user, pass } = connectInfo;
    if (typeof dsn !== 'string' || dsn === '') {
      throw new UsageError(`connect_info in ${file} has no dsn`);
    }
    const connectOptions: LiteralValue = connectInfo.options ?? {};

    const configOptions: LiteralValue = config.loader_options ?? {};
    if (!isLiteralMap(configOptions)) {
      throw new UsageError(`loader_options in ${file} must be a mapping`);
    }

    const loaderOptions: LoaderOptions = { ...cliOptions };
    for (const [key, value] of Object.entries(configOptions)) {
      if (!this.schemaLoader.supportsOption(key)) {
        throw new UnknownLoaderOptionError(key);
      }
      loaderOptions[key] = value;
    }
    loaderOptions.dump_directory ??= DEFAULT_DUMP_DIRECTORY;

    this.logger.debug(`Read schema class ${schemaClass} and connection info from ${file}`);

    return {
      schemaClass,
      loaderOptions,
      connectInfo: [dsn, credential(user, 'user', file), credential(pass, 'pass', file), connectOptions],
    };
  }
}

function toPathList(value: LiteralValue | undefined, file: string): string[] {
  if (value === undefined || value === null) return [];
  const entries: LiteralValue[] = Array.isArray(value) ? value : [value];
  return entries.map((entry) => {
    if (typeof entry !== 'string') {
      throw new UsageError(`lib in ${file} must be a path or a list of paths`);
    }
    return entry;
  });
}

function credential(value: LiteralValue | undefined, key: string, file: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string' || typeof value === 'number') return String(value);
  throw new UsageError(`connect_info.${key} in ${file} must be a string`);
}
