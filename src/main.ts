#!/usr/bin/env node
import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { CommandFactory } from 'nest-commander';
import { AppModule } from './app.module';
import { SchemaDumpError } from './common/errors';

const logger = new Logger('SchemaDump');

function handleError(error: unknown): void {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = error instanceof SchemaDumpError ? error.exitCode : 1;
}

async function bootstrap() {
  await CommandFactory.run(AppModule, {
    logger: ['error', 'warn', 'log'],
    serviceErrorHandler: handleError,
  });
}

bootstrap().catch(handleError);
