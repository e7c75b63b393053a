import { Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

import { ModifiedFileError, SchemaDumpError, isFileNotFound } from '../../common/errors';
import { ResolvedLoaderOptions } from '../loader-options';
import { SchemaImport, renderEntity, renderSchemaClass } from '../templates/typeorm.template';
import {
  GeneratedCodeFilter,
  GeneratedFileKind,
  SchemaModel,
} from '../types/schema-loader.types';
import { SearchPathService } from './search-path.service';

const MARKER_PREFIX = '// DO NOT MODIFY THIS OR ANYTHING ABOVE! md5sum:';
const MARKER = /^\/\/ DO NOT MODIFY THIS OR ANYTHING ABOVE! md5sum:([0-9a-f]{32})$/m;

export const DEFAULT_CUSTOM_CONTENT =
  '\n// You can replace this text with custom code or comments, and it will be preserved on regeneration\n';

interface ExistingFile {
  content: string;
  custom: string;
}

export function md5(text: string): string {
  return createHash('md5').update(text).digest('hex');
}

@Injectable()
export class OutputService {
  private readonly logger = new Logger(OutputService.name);

  constructor(private readonly searchPath: SearchPathService) {}

  /** Writes the schema class and one file per entity; returns the paths written. */
  async writeSchema(model: SchemaModel, options: ResolvedLoaderOptions): Promise<string[]> {
    const dumpDirectory = path.resolve(options.dump_directory);
    const filter = options.filter_generated_code
      ? await this.loadFilter(options.filter_generated_code)
      : undefined;

    const { namespace, className } = model.schemaClass;
    const schemaFile = path.join(dumpDirectory, ...namespace, `${className}.ts`);
    const resultDirectory = options.use_namespaces
      ? path.join(dumpDirectory, ...namespace, className, options.result_namespace)
      : path.join(dumpDirectory, ...namespace, className);

    const written: string[] = [];
    const imports: SchemaImport[] = [];

    for (const entity of model.entities) {
      const file = path.join(resultDirectory, `${entity.className}.ts`);
      const text = renderEntity(entity, { options, dumpDirectory, file });
      if (await this.writeGeneratedFile(file, text, 'result', entity.className, options, filter)) {
        written.push(file);
      }
      imports.push({
        className: entity.className,
        specifier: `./${path.relative(path.dirname(schemaFile), file).split(path.sep).join('/').replace(/\.ts$/, '')}`,
      });
    }

    const schemaText = renderSchemaClass(model, imports, options);
    if (await this.writeGeneratedFile(schemaFile, schemaText, 'schema', className, options, filter)) {
      written.push(schemaFile);
    }

    if (options.really_erase_my_files) {
      await this.eraseStaleFiles(
        resultDirectory,
        new Set(model.entities.map((entity) => `${entity.className}.ts`)),
      );
    }

    return written;
  }

  /** Returns false when the file already held exactly this content. */
  async writeGeneratedFile(
    file: string,
    text: string,
    kind: GeneratedFileKind,
    className: string,
    options: Pick<ResolvedLoaderOptions, 'overwrite_modifications'>,
    filter?: GeneratedCodeFilter,
  ): Promise<boolean> {
    const generated = filter ? await filter(kind, className, text) : text;
    const existing = await this.readExisting(file, options);
    const custom = existing ? existing.custom : DEFAULT_CUSTOM_CONTENT;
    const content = `${generated}${MARKER_PREFIX}${md5(generated)}\n${custom}`;

    if (existing?.content === content) {
      this.logger.debug(`${file} is unchanged`);
      return false;
    }

    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, content);
    this.logger.debug(`Wrote ${file}`);
    return true;
  }

  private async readExisting(
    file: string,
    options: Pick<ResolvedLoaderOptions, 'overwrite_modifications'>,
  ): Promise<ExistingFile | undefined> {
    let content: string;
    try {
      content = await fs.promises.readFile(file, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) return undefined;
      throw error;
    }

    const match = MARKER.exec(content);
    if (!match) {
      throw new SchemaDumpError(`${file} exists and was not created by schema-dump; refusing to overwrite it`);
    }

    const generated = content.slice(0, match.index);
    if (md5(generated) !== match[1] && !options.overwrite_modifications) {
      throw new ModifiedFileError(file);
    }

    return { content, custom: content.slice(match.index + match[0].length + 1) };
  }

  private async eraseStaleFiles(directory: string, keep: Set<string>): Promise<void> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(directory);
    } catch (error) {
      if (isFileNotFound(error)) return;
      throw error;
    }

    for (const entry of entries) {
      if (!entry.endsWith('.ts') || keep.has(entry)) continue;
      const file = path.join(directory, entry);
      const content = await fs.promises.readFile(file, 'utf8');
      if (MARKER.test(content)) {
        await fs.promises.unlink(file);
        this.logger.log(`Deleted stale file ${file}`);
      }
    }
  }

  private async loadFilter(reference: string): Promise<GeneratedCodeFilter> {
    const loaded = await this.searchPath.loadExport(reference);
    if (typeof loaded !== 'function') {
      throw new SchemaDumpError(`filter_generated_code "${reference}" does not export a function`);
    }
    return async (kind, className, text) => {
      const filtered: unknown = await loaded(kind, className, text);
      if (typeof filtered !== 'string') {
        throw new SchemaDumpError(`filter_generated_code "${reference}" returned a ${typeof filtered}, not a string`);
      }
      return filtered.endsWith('\n') ? filtered : `${filtered}\n`;
    };
  }
}
