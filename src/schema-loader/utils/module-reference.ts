import * as path from 'path';

import { pascalCase } from './inflect';

export interface ModuleReference {
  module: string;
  /** Named export; the default export when absent. */
  exportName?: string;
  /** Identifier the generated code binds the export to. */
  localName: string;
}

export function parseModuleReference(reference: string): ModuleReference {
  const [module, exportName] = reference.split('#');
  if (exportName) return { module, exportName, localName: exportName };
  return { module, localName: pascalCase(path.basename(module).replace(/\.[cm]?[jt]s$/, '')) };
}

/**
 * Module specifier as seen from a generated file. Relative modules are
 * taken to be relative to the dump directory.
 */
export function importSpecifier(reference: ModuleReference, dumpDirectory: string, fromFile: string): string {
  if (!reference.module.startsWith('./') && !reference.module.startsWith('../')) {
    return reference.module;
  }
  const target = path.resolve(dumpDirectory, reference.module);
  const relative = path.relative(path.dirname(fromFile), target).split(path.sep).join('/');
  return relative.startsWith('.') ? relative : `./${relative}`;
}

export function importStatement(reference: ModuleReference, specifier: string): string {
  return reference.exportName
    ? `import { ${reference.exportName} } from '${specifier}';`
    : `import ${reference.localName} from '${specifier}';`;
}
