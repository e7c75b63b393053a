import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';

import {
  MissingDependencyError,
  UnsupportedConfigFormatError,
  UsageError,
  isFileNotFound,
  isModuleNotFound,
} from '../../common/errors';
import { LiteralMap, LiteralValue, isLiteralMap } from '../../common/types';

type YamlModule = typeof import('js-yaml');

/** Packages config-file mode needs; installed as optional dependencies. */
export const CONFIG_FILE_DEPENDENCIES = ['js-yaml'];

const FORMATS: Record<string, 'yaml' | 'json'> = {
  '.yml': 'yaml',
  '.yaml': 'yaml',
  '.json': 'json',
};

@Injectable()
export class ConfigFileService {
  private readonly logger = new Logger(ConfigFileService.name);

  /** Reads the first document of `file` as a mapping. */
  async load(file: string): Promise<LiteralMap> {
    const format = FORMATS[path.extname(file).toLowerCase()];
    if (!format) {
      throw new UnsupportedConfigFormatError(file);
    }

    const yaml = await this.loadParser();
    const text = await this.read(file);
    this.logger.debug(`Loading ${format} config from ${file}`);

    const [document] =
      format === 'json' ? [yaml.load(text, { schema: yaml.JSON_SCHEMA, json: true })] : yaml.loadAll(text);

    const config = toLiteral(document);
    if (!isLiteralMap(config)) {
      throw new UsageError(`${file} does not contain a configuration mapping`);
    }
    return config;
  }

  private async read(file: string): Promise<string> {
    try {
      return await fs.promises.readFile(file, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new UsageError(`Config file ${file} does not exist`);
      }
      throw error;
    }
  }

  private async loadParser(): Promise<YamlModule> {
    try {
      return await import('js-yaml');
    } catch (error) {
      if (isModuleNotFound(error)) {
        throw new MissingDependencyError('Config file mode', CONFIG_FILE_DEPENDENCIES);
      }
      throw error;
    }
  }
}

function toLiteral(value: unknown): LiteralValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return value.toISOString();
  if (value instanceof RegExp) return value;
  if (Array.isArray(value)) return value.map(toLiteral);
  if (typeof value === 'object') {
    const map: LiteralMap = {};
    for (const [key, entry] of Object.entries(value)) {
      map[key] = toLiteral(entry);
    }
    return map;
  }
  return String(value);
}
