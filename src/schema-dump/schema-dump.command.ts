import { Logger } from '@nestjs/common';
import { Command, CommandRunner, Option } from 'nest-commander';

import { UsageError } from '../common/errors';
import { SchemaLoaderService } from '../schema-loader/schema-loader.service';
import { ArgumentResolverService, SchemaDumpOptions } from './services/argument-resolver.service';

export const USAGE = `Usage:
  schema-dump [-I <dir>]... [-o <key>=<value>]... <schema_class> <dsn> [<user> <pass>] [<connect_option>...]
  schema-dump [-I <dir>]... [-o <key>=<value>]... <config_file>

Examples:
  schema-dump -o dump_directory=./src/entities My::Schema 'dbi:Pg:dbname=app' app_user app_password
  schema-dump -o components='["./mixins#Timestamps"]' My.Schema sqlite:./app.db
  schema-dump schema-dump.yml

The config file (.yml, .yaml or .json) holds schema_class, connect_info
(dsn, user, pass, options), and optionally loader_options and lib.
`;

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

@Command({
  name: 'schema-dump',
  arguments: '[args...]',
  description: 'Generate TypeORM entity classes from an existing database',
  options: { isDefault: true },
})
export class SchemaDumpCommand extends CommandRunner {
  private readonly logger = new Logger(SchemaDumpCommand.name);

  constructor(
    private readonly argumentResolver: ArgumentResolverService,
    private readonly schemaLoader: SchemaLoaderService,
  ) {
    super();
  }

  async run(passedParams: string[], options: SchemaDumpOptions): Promise<void> {
    try {
      const { schemaClass, loaderOptions, connectInfo } = await this.argumentResolver.resolve(
        passedParams,
        options,
      );
      await this.schemaLoader.generateSchemaAt(schemaClass, loaderOptions, connectInfo);
    } catch (error) {
      if (!(error instanceof UsageError)) throw error;

      this.logger.error(error.message);
      process.stderr.write(USAGE);
      process.exitCode = error.exitCode;
    }
  }

  @Option({
    flags: '-I, --include <dir>',
    description: 'Add a directory to the module search path (repeatable)',
  })
  parseInclude(val: string, previous?: string[]): string[] {
    return collect(val, previous);
  }

  @Option({
    flags: '-o, --loader-option <key=value>',
    description: 'Set a loader option; the value may be a literal such as [1, 2] or { a => 1 } (repeatable)',
  })
  parseLoaderOption(val: string, previous?: string[]): string[] {
    return collect(val, previous);
  }
}
