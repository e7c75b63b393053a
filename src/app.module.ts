import { Module } from '@nestjs/common';
import { SchemaDumpModule } from './schema-dump/schema-dump.module';

@Module({
  imports: [SchemaDumpModule],
})
export class AppModule {}
