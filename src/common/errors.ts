export class SchemaDumpError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Insufficient or contradictory arguments; the command prints its usage. */
export class UsageError extends SchemaDumpError {}

export class UnknownLoaderOptionError extends SchemaDumpError {
  readonly exitCode = 2;

  constructor(readonly option: string) {
    super(`Unknown option: ${option}`);
  }
}

export class MissingDependencyError extends SchemaDumpError {
  readonly exitCode = 2;

  constructor(
    readonly feature: string,
    readonly packages: string[],
  ) {
    super(
      `${feature} requires the following missing packages: ${packages.join(', ')}. ` +
        `Install them with: npm install ${packages.join(' ')}`,
    );
  }
}

export class UnsupportedConfigFormatError extends UsageError {
  constructor(readonly file: string) {
    super(`Unsupported config file format: ${file} (expected .yml, .yaml or .json)`);
  }
}

export class LiteralParseError extends SchemaDumpError {
  constructor(
    reason: string,
    readonly source: string,
    readonly offset: number,
  ) {
    super(`Cannot parse literal ${JSON.stringify(source)} at offset ${offset}: ${reason}`);
  }
}

export class InvalidLoaderOptionsError extends SchemaDumpError {
  constructor(readonly issues: string[]) {
    super(`Invalid loader options:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
  }
}

export class InvalidSchemaClassError extends SchemaDumpError {
  constructor(readonly schemaClass: string) {
    super(
      `Invalid schema class name "${schemaClass}": expected identifiers separated by "::" or "."`,
    );
  }
}

export class UnsupportedDriverError extends SchemaDumpError {
  constructor(readonly dsn: string) {
    super(`Unsupported DSN "${dsn}": only PostgreSQL and SQLite databases can be introspected`);
  }
}

export class MonikerClashError extends SchemaDumpError {
  constructor(
    readonly moniker: string,
    readonly table: string,
    readonly takenBy: string,
  ) {
    super(
      `Table "${table}" would be generated as class ${moniker}, which is already taken by ${takenBy}; ` +
        'rename it with moniker_map',
    );
  }
}

export class ModifiedFileError extends SchemaDumpError {
  constructor(readonly file: string) {
    super(
      `${file} has been modified since it was generated; ` +
        'refusing to overwrite it (set overwrite_modifications to force)',
    );
  }
}

/** `code` of a Node system or module-resolution error. Errors from another realm fail `instanceof Error`. */
export function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

export function isModuleNotFound(error: unknown): boolean {
  return errorCode(error) === 'MODULE_NOT_FOUND';
}

export function isFileNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}
