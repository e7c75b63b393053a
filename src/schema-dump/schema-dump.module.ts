import { Module } from '@nestjs/common';
import { SchemaLoaderModule } from '../schema-loader/schema-loader.module';
import { SchemaDumpCommand } from './schema-dump.command';
import { ArgumentResolverService } from './services/argument-resolver.service';
import { ConfigFileService } from './services/config-file.service';

@Module({
  imports: [SchemaLoaderModule],
  providers: [
    SchemaDumpCommand,
    ArgumentResolverService,
    ConfigFileService,
  ],
})
export class SchemaDumpModule {}
