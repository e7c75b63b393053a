import { Injectable, Logger } from '@nestjs/common';
import * as path from 'path';

import { SchemaDumpError, isModuleNotFound } from '../../common/errors';
import { parseModuleReference } from '../utils/module-reference';

/**
 * Directories searched for modules named in loader options, in the order
 * they were added. Shared by the whole process.
 */
@Injectable()
export class SearchPathService {
  private readonly logger = new Logger(SearchPathService.name);
  private readonly directories: string[] = [];

  add(...directories: string[]): void {
    for (const directory of directories) {
      const resolved = path.resolve(directory);
      if (!this.directories.includes(resolved)) {
        this.directories.push(resolved);
        this.logger.debug(`Added ${resolved} to the module search path`);
      }
    }
  }

  entries(): string[] {
    return [...this.directories];
  }

  resolve(specifier: string): string {
    const candidates = path.isAbsolute(specifier)
      ? [specifier]
      : [...this.directories.map((directory) => path.join(directory, specifier)), specifier];

    for (const candidate of candidates) {
      try {
        return require.resolve(candidate, { paths: [process.cwd()] });
      } catch (error) {
        if (!isModuleNotFound(error)) throw error;
      }
    }

    throw new SchemaDumpError(
      `Cannot find module "${specifier}" (searched ${[...this.directories, process.cwd()].join(', ')})`,
    );
  }

  /** Loads `module#Export` (or the default export of `module`). */
  async loadExport(reference: string): Promise<unknown> {
    const { module, exportName } = parseModuleReference(reference);
    const loaded: unknown = await import(this.resolve(module));
    const key = exportName ?? 'default';

    if (typeof loaded === 'object' && loaded !== null && key in loaded) {
      return Reflect.get(loaded, key);
    }
    throw new SchemaDumpError(`Module "${module}" has no export named "${key}"`);
  }
}
