import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { LOG_LEVEL_ENV, createGeneratorConfig, validateGeneratorConfig } from '../src/config';
import { LogLevel } from '../src/logger';

describe('Generator config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'tracegen-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const complete = () =>
    createGeneratorConfig(
      { importPath: dir, sourcePath: 'a.c', headerPath: 'a.h', perfettoHeaderPath: 'a_perfetto.h' },
      {},
    );

  test('defaults the log level to info', () => {
    expect(complete().logLevel).toBe(LogLevel.Info);
  });

  test('reads the log level from the environment', () => {
    expect(createGeneratorConfig({}, { [LOG_LEVEL_ENV]: 'debug' }).logLevel).toBe(LogLevel.Debug);
  });

  test('an explicit log level wins over the environment', () => {
    expect(createGeneratorConfig({ logLevel: LogLevel.Error }, { [LOG_LEVEL_ENV]: 'debug' }).logLevel).toBe(
      LogLevel.Error,
    );
  });

  test('ignores an unknown environment level', () => {
    expect(createGeneratorConfig({}, { [LOG_LEVEL_ENV]: 'loud' }).logLevel).toBe(LogLevel.Info);
  });

  test('accepts a complete configuration', () => {
    expect(validateGeneratorConfig(complete())).toEqual({ valid: true, errors: [] });
  });

  test('reports each missing option by its flag', () => {
    const result = validateGeneratorConfig(createGeneratorConfig({}, {}));
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.details?.option)).toEqual([
      '--import-path',
      '--utrace-src',
      '--utrace-hdr',
      '--perfetto-hdr',
    ]);
    expect(result.errors[1].message).toBe('Missing required option: --utrace-src');
  });

  test('rejects an import path that is a file', () => {
    const file = path.join(dir, 'engine.js');
    writeFileSync(file, '');
    const result = validateGeneratorConfig({ ...complete(), importPath: file });
    expect(result.errors.map((e) => e.code)).toEqual(['INVOCATION.INVALID_IMPORT_PATH']);
  });

  test('rejects outputs that share a path', () => {
    const result = validateGeneratorConfig({ ...complete(), perfettoHeaderPath: 'a.h' });
    expect(result.errors.map((e) => e.code)).toEqual(['INVOCATION.DUPLICATE_OUTPUT']);
  });
});
