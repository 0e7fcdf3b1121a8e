/**
 * Generation engine.
 *
 * The built-in engine renders the three artifacts from the registry
 * snapshot. A build may supply its own engine module on the import path;
 * it is held to the same contract.
 */

import { existsSync } from 'fs';
import { mkdir, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import { v4 as uuid } from 'uuid';
import {
  DeclarationError,
  TracegenError,
  TypedError,
  configurationError,
  generationError,
  writeFailedError,
} from '../domain/errors';
import { RegistrySnapshot, callParams } from '../domain/tracepoint';
import { C_IDENTIFIER, SCHEMA_CONSTRAINTS } from '../dsl/schema';
import { Logger } from '../logger';
import { declaredName } from './naming';
import { renderPerfettoHeader } from './perfetto-header';
import { GeneratedArtifact, GenerationContract, GenerationEngine, GenerationTargets } from './types';
import { renderUtraceHeader, toggleList } from './utrace-header';
import { renderUtraceSource } from './utrace-source';

/** File an external engine is loaded from, relative to the import path. */
export const ENGINE_MODULE = 'utrace-engine.js';

/** Check the naming contract against the registered declarations. */
export function validateContract(snapshot: RegistrySnapshot, contract: GenerationContract): TypedError[] {
  const errors: TypedError[] = [];

  const ctxName = declaredName(contract.ctxParam);
  if (ctxName === undefined) {
    errors.push(
      configurationError('CONTRACT', `Context parameter must end with a parameter name: "${contract.ctxParam}"`, undefined, {
        ctxParam: contract.ctxParam,
      }),
    );
  } else {
    for (const tp of snapshot.tracepoints) {
      if (callParams(tp).some((p) => p.var === ctxName)) {
        errors.push(
          configurationError('CONTRACT', `Parameter "${ctxName}" of "${tp.name}" shadows the context parameter`, tp.name, {
            ctxParam: contract.ctxParam,
          }),
        );
      }
    }
  }
  if (!C_IDENTIFIER.test(contract.toggleName)) {
    errors.push(
      configurationError('CONTRACT', `Toggle symbol must be a C identifier: "${contract.toggleName}"`, undefined, {
        toggleName: contract.toggleName,
      }),
    );
  }

  const toggles = toggleList(snapshot);
  if (toggles.length > SCHEMA_CONSTRAINTS.maxToggles) {
    errors.push(
      configurationError('CONTRACT', `At most ${SCHEMA_CONSTRAINTS.maxToggles} toggles fit the toggle mask`, undefined, {
        count: toggles.length,
      }),
    );
  }

  const seen = new Set<string>();
  for (const toggle of contract.toggleDefaults) {
    if (!toggles.includes(toggle)) {
      errors.push(
        configurationError('UNKNOWN_TOGGLE', `Default-enabled toggle is not declared: ${toggle}`, undefined, { toggle }),
      );
    } else if (seen.has(toggle)) {
      errors.push(configurationError('CONTRACT', `Toggle listed twice in defaults: ${toggle}`, undefined, { toggle }));
    }
    seen.add(toggle);
  }

  return errors;
}

export const builtinEngine: GenerationEngine = {
  name: 'builtin',
  generate(snapshot, targets, contract) {
    const ctxName = declaredName(contract.ctxParam) ?? 'ctx';
    return [
      { kind: 'source', path: targets.sourcePath, contents: renderUtraceSource(snapshot, targets, contract) },
      {
        kind: 'header',
        path: targets.headerPath,
        contents: renderUtraceHeader(snapshot, targets, contract, ctxName),
      },
      { kind: 'perfetto-header', path: targets.perfettoHeaderPath, contents: renderPerfettoHeader(snapshot, targets) },
    ];
  },
};

function isGenerateFn(value: unknown): value is GenerationEngine['generate'] {
  return typeof value === 'function';
}

/**
 * Resolve the engine for an import path: `utrace-engine.js` there if it
 * exists, otherwise the built-in engine.
 */
export function loadEngine(importPath: string, log: Logger): GenerationEngine {
  const modulePath = path.resolve(importPath, ENGINE_MODULE);
  if (!existsSync(modulePath)) return builtinEngine;

  let loaded: unknown;
  try {
    loaded = require(modulePath);
  } catch (err) {
    throw new TracegenError(
      generationError(`Failed to load engine ${modulePath}: ${err instanceof Error ? err.message : String(err)}`, {
        modulePath,
      }),
    );
  }

  const generate = typeof loaded === 'object' && loaded !== null && 'generate' in loaded ? loaded.generate : undefined;
  if (!isGenerateFn(generate)) {
    throw new TracegenError(
      generationError(`Engine module ${modulePath} does not export a generate function`, { modulePath }),
    );
  }

  log.info('Using external generation engine', { modulePath });
  return { name: modulePath, generate };
}

/**
 * Pick the artifact for each target, in target order. Artifacts for other
 * paths are ignored.
 */
export function selectTargetArtifacts(
  artifacts: readonly GeneratedArtifact[],
  targets: GenerationTargets,
  engineName: string,
): GeneratedArtifact[] {
  const expected = [targets.sourcePath, targets.headerPath, targets.perfettoHeaderPath];
  const selected: GeneratedArtifact[] = [];
  const missing: string[] = [];
  for (const target of expected) {
    const artifact = artifacts.find((a) => a.path === target);
    if (artifact === undefined) missing.push(target);
    else selected.push(artifact);
  }
  if (missing.length > 0) {
    throw new TracegenError(
      generationError(`Engine ${engineName} produced no output for: ${missing.join(', ')}`, { missing }),
    );
  }
  return selected;
}

/**
 * Check the contract, run an engine and keep one artifact per target.
 * Engine failures are rethrown as generation errors with the engine's own
 * message.
 */
export function runEngine(
  engine: GenerationEngine,
  snapshot: RegistrySnapshot,
  targets: GenerationTargets,
  contract: GenerationContract,
): GeneratedArtifact[] {
  const errors = validateContract(snapshot, contract);
  if (errors.length > 0) throw new DeclarationError(errors);

  let artifacts: GeneratedArtifact[];
  try {
    artifacts = engine.generate(snapshot, targets, contract);
  } catch (err) {
    if (err instanceof TracegenError) throw err;
    throw new TracegenError(
      generationError(err instanceof Error ? err.message : String(err), { engine: engine.name }),
    );
  }

  return selectTargetArtifacts(Array.isArray(artifacts) ? artifacts : [], targets, engine.name);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Write the target artifacts. Each goes to a temporary sibling first; the
 * final paths are only replaced once every temporary file is written.
 */
export async function writeArtifacts(
  artifacts: readonly GeneratedArtifact[],
  targets: GenerationTargets,
  log: Logger,
): Promise<void> {
  const selected = selectTargetArtifacts(artifacts, targets, 'output');
  const staged: { artifact: GeneratedArtifact; tmpPath: string }[] = [];

  try {
    for (const artifact of selected) {
      const tmpPath = path.join(path.dirname(artifact.path), `.${path.basename(artifact.path)}.${uuid()}.tmp`);
      try {
        await mkdir(path.dirname(artifact.path), { recursive: true });
        staged.push({ artifact, tmpPath });
        await writeFile(tmpPath, artifact.contents, 'utf8');
      } catch (err) {
        throw new TracegenError(writeFailedError(artifact.path, errorMessage(err)));
      }
    }

    for (const { artifact, tmpPath } of staged) {
      try {
        await rename(tmpPath, artifact.path);
      } catch (err) {
        throw new TracegenError(writeFailedError(artifact.path, errorMessage(err)));
      }
      log.debug('Artifact written', { kind: artifact.kind, path: artifact.path, bytes: artifact.contents.length });
    }
  } catch (err) {
    await Promise.all(staged.map(({ tmpPath }) => rm(tmpPath, { force: true })));
    throw err;
  }
}
