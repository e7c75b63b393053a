import { Module } from '@nestjs/common';

import { SchemaLoaderService } from './schema-loader.service';
import { DatabaseService } from './services/database.service';
import { ModelBuilderService } from './services/model-builder.service';
import { OutputService } from './services/output.service';
import { SearchPathService } from './services/search-path.service';

@Module({
  providers: [
    SchemaLoaderService,
    DatabaseService,
    ModelBuilderService,
    OutputService,
    SearchPathService,
  ],
  exports: [SchemaLoaderService, SearchPathService],
})
export class SchemaLoaderModule {}
