import { Injectable, Logger } from '@nestjs/common';

import { ConnectInfo, LoaderOptions } from '../common/types';
import { parseLoaderOptions, supportsOption } from './loader-options';
import { DatabaseService } from './services/database.service';
import { ModelBuilderService, parseSchemaClassName } from './services/model-builder.service';
import { OutputService } from './services/output.service';
import { Table } from './types/schema-loader.types';

@Injectable()
export class SchemaLoaderService {
  private readonly logger = new Logger(SchemaLoaderService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly modelBuilder: ModelBuilderService,
    private readonly outputService: OutputService,
  ) {}

  supportsOption(name: string): boolean {
    return supportsOption(name);
  }

  /**
   * Introspects the database behind `connectInfo` and writes `schemaClass`
   * plus one entity class per table under `dump_directory`.
   */
  async generateSchemaAt(
    schemaClass: string,
    loaderOptions: LoaderOptions,
    connectInfo: ConnectInfo,
  ): Promise<string[]> {
    const options = parseLoaderOptions(loaderOptions);
    const className = parseSchemaClassName(schemaClass);

    if (options.debug) {
      Logger.overrideLogger(['error', 'warn', 'log', 'debug', 'verbose']);
    }
    if (!options.quiet) {
      this.logger.log(`Dumping manual schema for ${schemaClass} to directory ${options.dump_directory} ...`);
    }

    const introspector = await this.databaseService.connect(connectInfo);
    let tables: Table[];
    try {
      tables = await introspector.getTables(options.db_schema);
    } finally {
      await introspector.close();
    }

    const selected = this.modelBuilder.selectTables(tables, options);
    this.logger.debug(`Found ${tables.length} tables, dumping ${selected.length}`);

    const model = this.modelBuilder.build(className, selected, options);
    const written = await this.outputService.writeSchema(model, options);

    if (!options.quiet) {
      this.logger.log('Schema dump completed.');
    }
    return written;
  }
}
