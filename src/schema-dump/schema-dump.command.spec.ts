import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { UnknownLoaderOptionError } from '../common/errors';
import { supportsOption } from '../schema-loader/loader-options';
import { SchemaLoaderService } from '../schema-loader/schema-loader.service';
import { SearchPathService } from '../schema-loader/services/search-path.service';
import { SchemaDumpCommand, USAGE } from './schema-dump.command';
import { ArgumentResolverService } from './services/argument-resolver.service';
import { ConfigFileService } from './services/config-file.service';

describe('SchemaDumpCommand', () => {
  let command: SchemaDumpCommand;
  let exitCode: typeof process.exitCode;
  let stderr: jest.SpyInstance;
  let logError: jest.SpyInstance;

  const schemaLoader = {
    supportsOption: jest.fn((name: string) => supportsOption(name)),
    generateSchemaAt: jest.fn().mockResolvedValue([]),
  };

  beforeEach(async () => {
    exitCode = process.exitCode;
    stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    logError = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    const moduleRef = await Test.createTestingModule({
      providers: [
        SchemaDumpCommand,
        ArgumentResolverService,
        ConfigFileService,
        SearchPathService,
        { provide: SchemaLoaderService, useValue: schemaLoader },
      ],
    }).compile();

    command = moduleRef.get(SchemaDumpCommand);
  });

  afterEach(() => {
    process.exitCode = exitCode;
    stderr.mockRestore();
    logError.mockRestore();
    jest.clearAllMocks();
  });

  it('generates the schema once', async () => {
    await command.run(['My::Schema', 'dbi:Pg:dbname=app', 'app', 'test-secret'], {
      loaderOption: ['dump_directory=./lib', 'components=["X"]'],
    });

    expect(schemaLoader.generateSchemaAt).toHaveBeenCalledTimes(1);
    expect(schemaLoader.generateSchemaAt).toHaveBeenCalledWith(
      'My::Schema',
      { dump_directory: './lib', components: ['X'] },
      ['dbi:Pg:dbname=app', 'app', 'test-secret'],
    );
    expect(process.exitCode).toBe(exitCode);
  });

  it('prints usage and exits with 1 when arguments are missing', async () => {
    await command.run([], {});

    expect(schemaLoader.generateSchemaAt).not.toHaveBeenCalled();
    expect(logError).toHaveBeenCalledWith('A schema class and a DSN are required');
    expect(stderr).toHaveBeenCalledWith(USAGE);
    expect(process.exitCode).toBe(1);
  });

  it('prints usage when a lone argument is not a config file', async () => {
    await command.run(['My::Schema'], {});

    expect(schemaLoader.generateSchemaAt).not.toHaveBeenCalled();
    expect(logError).toHaveBeenCalledWith(
      'Unsupported config file format: My::Schema (expected .yml, .yaml or .json)',
    );
    expect(stderr).toHaveBeenCalledWith(USAGE);
    expect(process.exitCode).toBe(1);
  });

  it('prints usage when the config file does not exist', async () => {
    const file = path.join(os.tmpdir(), 'schema-dump-command-missing', 'schema-dump.yml');

    await command.run([file], {});

    expect(logError).toHaveBeenCalledWith(`Config file ${file} does not exist`);
    expect(stderr).toHaveBeenCalledWith(USAGE);
    expect(process.exitCode).toBe(1);
  });

  it('prints usage when a config file lacks schema_class', async () => {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'schema-dump-command-'));
    const file = path.join(directory, 'schema-dump.yml');
    fs.writeFileSync(file, 'connect_info:\n  dsn: sqlite:app.db\n');

    try {
      await command.run([file], {});
    } finally {
      fs.rmSync(directory, { recursive: true, force: true });
    }

    expect(schemaLoader.generateSchemaAt).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith(USAGE);
    expect(process.exitCode).toBe(1);
  });

  it('lets an unknown option escape to the error handler', async () => {
    await expect(command.run(['My::Schema', 'sqlite:app.db'], { loaderOption: ['naming=v8'] })).rejects.toThrow(
      new UnknownLoaderOptionError('naming'),
    );

    expect(schemaLoader.generateSchemaAt).not.toHaveBeenCalled();
    expect(stderr).not.toHaveBeenCalled();
  });

  it('propagates generation failures', async () => {
    schemaLoader.generateSchemaAt.mockRejectedValueOnce(new Error('connection refused'));

    await expect(command.run(['My::Schema', 'sqlite:app.db'], {})).rejects.toThrow('connection refused');
  });

  it('collects repeated options', () => {
    expect(command.parseInclude('lib')).toEqual(['lib']);
    expect(command.parseLoaderOption('quiet=1', ['debug=1'])).toEqual(['debug=1', 'quiet=1']);
  });
});
