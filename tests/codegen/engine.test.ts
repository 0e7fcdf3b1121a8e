import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import {
  ENGINE_MODULE,
  builtinEngine,
  loadEngine,
  runEngine,
  validateContract,
  writeArtifacts,
} from '../../src/codegen/engine';
import { GenerationEngine } from '../../src/codegen/types';
import { DeclarationError, TracegenError } from '../../src/domain/errors';
import { logger } from '../../src/logger';
import { makeFixture, targets } from './fixtures';

function captureError(fn: () => unknown): TracegenError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TracegenError) return err;
    throw err;
  }
  throw new Error('expected a TracegenError');
}

describe('Generation contract', () => {
  const { snapshot, contract } = makeFixture();

  test('accepts the fixture contract', () => {
    expect(validateContract(snapshot, contract)).toEqual([]);
  });

  test('rejects a context parameter without a name', () => {
    const errors = validateContract(snapshot, { ...contract, ctxParam: 'struct tu_device *' });
    expect(errors.map((e) => e.code)).toEqual(['CONFIG.CONTRACT']);
  });

  test('rejects a toggle symbol that is not an identifier', () => {
    const errors = validateContract(snapshot, { ...contract, toggleName: 'tu-gpu' });
    expect(errors.map((e) => e.code)).toEqual(['CONFIG.CONTRACT']);
  });

  test('rejects unknown and repeated defaults', () => {
    const errors = validateContract(snapshot, {
      ...contract,
      toggleDefaults: ['gmem_clear', 'resolve', 'gmem_clear'],
    });
    expect(errors.map((e) => e.code)).toEqual(['CONFIG.UNKNOWN_TOGGLE', 'CONFIG.CONTRACT']);
    expect(errors[0].message).toBe('Default-enabled toggle is not declared: resolve');
  });
});

describe('Built-in engine', () => {
  const { snapshot, contract } = makeFixture();

  test('produces one artifact per target', () => {
    const artifacts = builtinEngine.generate(snapshot, targets, contract);
    expect(artifacts.map((a) => [a.kind, a.path])).toEqual([
      ['source', 'out/tu_tracepoints.c'],
      ['header', 'out/tu_tracepoints.h'],
      ['perfetto-header', 'out/tu_tracepoints_perfetto.h'],
    ]);
  });

  test('output is identical across runs', () => {
    const first = builtinEngine.generate(snapshot, targets, contract);
    const second = builtinEngine.generate(makeFixture().snapshot, targets, contract);
    expect(second).toEqual(first);
  });
});

describe('runEngine', () => {
  const { snapshot, contract } = makeFixture();

  const external: GenerationEngine = {
    name: 'external',
    generate: (_snapshot, t) =>
      [t.sourcePath, t.headerPath, t.perfettoHeaderPath].map((p) => ({ kind: 'source' as const, path: p, contents: '' })),
  };

  test('checks the contract before any engine runs', () => {
    const generate = jest.fn(external.generate);
    const err = captureError(() =>
      runEngine({ name: 'external', generate }, snapshot, targets, {
        ctxParam: '*',
        toggleName: 'bad name',
        toggleDefaults: ['nope', 'nope'],
      }),
    );

    expect(err).toBeInstanceOf(DeclarationError);
    expect(err instanceof DeclarationError ? err.errors.map((e) => e.code) : []).toEqual([
      'CONFIG.CONTRACT',
      'CONFIG.CONTRACT',
      'CONFIG.UNKNOWN_TOGGLE',
      'CONFIG.UNKNOWN_TOGGLE',
    ]);
    expect(generate).not.toHaveBeenCalled();
  });

  test('rejects a tracepoint parameter named like the context parameter', () => {
    const err = captureError(() => runEngine(external, snapshot, targets, { ...contract, ctxParam: 'void *fb' }));
    expect(err.typedError.code).toBe('CONFIG.CONTRACT');
    expect(err.message).toBe('Parameter "fb" of "end_render_pass" shadows the context parameter');
  });

  test('keeps one artifact per target, in target order', () => {
    const engine: GenerationEngine = {
      name: 'extra',
      generate: (snap, t, c) => [
        { kind: 'header', path: 'out/extra.h', contents: '' },
        ...[...external.generate(snap, t, c)].reverse(),
      ],
    };
    expect(runEngine(engine, snapshot, targets, contract).map((a) => a.path)).toEqual([
      'out/tu_tracepoints.c',
      'out/tu_tracepoints.h',
      'out/tu_tracepoints_perfetto.h',
    ]);
  });

  test('wraps engine failures as generation errors', () => {
    const engine: GenerationEngine = {
      name: 'broken',
      generate: () => {
        throw new Error('template missing');
      },
    };
    const err = captureError(() => runEngine(engine, snapshot, targets, contract));
    expect(err.typedError.code).toBe('GENERATION.FAILED');
    expect(err.message).toBe('template missing');
    expect(err.typedError.details).toEqual({ engine: 'broken' });
  });

  test('fails when an output is missing', () => {
    const engine: GenerationEngine = {
      name: 'partial',
      generate: (_snapshot, t) => [{ kind: 'source', path: t.sourcePath, contents: '' }],
    };
    const err = captureError(() => runEngine(engine, snapshot, targets, contract));
    expect(err.typedError.code).toBe('GENERATION.FAILED');
    expect(err.message).toBe(
      'Engine partial produced no output for: out/tu_tracepoints.h, out/tu_tracepoints_perfetto.h',
    );
  });
});

describe('Engine loading and writing', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'tracegen-engine-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('uses the built-in engine when the import path has none', () => {
    expect(loadEngine(dir, logger)).toBe(builtinEngine);
  });

  test('loads an engine module from the import path', () => {
    writeFileSync(
      path.join(dir, ENGINE_MODULE),
      [
        'module.exports = {',
        '  generate(snapshot, targets) {',
        '    return [targets.sourcePath, targets.headerPath, targets.perfettoHeaderPath].map((p) => ({',
        "      kind: 'source',",
        '      path: p,',
        '      contents: String(snapshot.tracepoints.length),',
        '    }));',
        '  },',
        '};',
        '',
      ].join('\n'),
    );

    const engine = loadEngine(dir, logger);
    expect(engine.name).toBe(path.resolve(dir, ENGINE_MODULE));

    const { snapshot, contract } = makeFixture();
    const artifacts = runEngine(engine, snapshot, targets, contract);
    expect(artifacts.map((a) => a.contents)).toEqual(['6', '6', '6']);
  });

  test('rejects an engine module without a generate function', () => {
    writeFileSync(path.join(dir, ENGINE_MODULE), 'module.exports = { render: 1 };\n');
    const err = captureError(() => loadEngine(dir, logger));
    expect(err.typedError.code).toBe('GENERATION.FAILED');
    expect(err.message).toBe(`Engine module ${path.resolve(dir, ENGINE_MODULE)} does not export a generate function`);
  });

  const outputsIn = (root: string) => ({
    sourcePath: path.join(root, 'out', 'tu_tracepoints.c'),
    headerPath: path.join(root, 'out', 'tu_tracepoints.h'),
    perfettoHeaderPath: path.join(root, 'out', 'tu_tracepoints_perfetto.h'),
  });

  test('writes the target artifacts, creating directories', async () => {
    const t = outputsIn(dir);
    const { snapshot, contract } = makeFixture();
    const artifacts = builtinEngine.generate(snapshot, t, contract);
    await writeArtifacts([...artifacts, { kind: 'header', path: path.join(dir, 'stray.h'), contents: '' }], t, logger);

    expect(readFileSync(t.headerPath, 'utf8')).toBe(artifacts[1].contents);
    expect(readdirSync(path.join(dir, 'out')).sort()).toEqual([
      'tu_tracepoints.c',
      'tu_tracepoints.h',
      'tu_tracepoints_perfetto.h',
    ]);
    expect(existsSync(path.join(dir, 'stray.h'))).toBe(false);
  });

  test('a failed write leaves no output behind', async () => {
    const blocker = path.join(dir, 'blocker');
    writeFileSync(blocker, '');
    const t = { ...outputsIn(dir), perfettoHeaderPath: path.join(blocker, 'tu_tracepoints_perfetto.h') };
    const artifacts = [t.sourcePath, t.headerPath, t.perfettoHeaderPath].map((p) => ({
      kind: 'source' as const,
      path: p,
      contents: 'x',
    }));

    await expect(writeArtifacts(artifacts, t, logger)).rejects.toMatchObject({
      typedError: { code: 'GENERATION.WRITE_FAILED', details: { path: t.perfettoHeaderPath } },
    });
    expect(existsSync(t.sourcePath)).toBe(false);
    expect(readdirSync(path.join(dir, 'out'))).toEqual([]);
  });
});
