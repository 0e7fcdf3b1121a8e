#!/usr/bin/env node
/**
 * Generator entry point.
 *
 * Exit status: 0 on success, 1 when a declaration or generation step
 * fails, 2 for invocation errors. Nothing is written unless every
 * artifact was generated.
 */

import { v4 as uuid } from 'uuid';
import { DeclarationError, TracegenError, TypedError, errorDomain } from '../domain/errors';
import { GeneratedArtifact, GenerationTargets } from '../codegen/types';
import { loadEngine, runEngine, writeArtifacts } from '../codegen/engine';
import { createGeneratorConfig, validateGeneratorConfig } from '../config';
import { declareTuTracepoints } from '../definitions/tu-tracepoints';
import { Logger, logger, setLogLevel } from '../logger';
import { CliOptions, USAGE, UsageError, parseArgs, toConfigInput } from './args';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Where usage text goes. Logs go through the logger. */
export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

const processOutput: CliOutput = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  output?: CliOutput;
}

export interface RunResult {
  exitCode: number;
  artifacts: GeneratedArtifact[];
}

function logErrors(log: Logger, message: string, errors: TypedError[]): void {
  for (const error of errors) {
    log.error(message, {
      domain: errorDomain(error),
      code: error.code,
      error: error.message,
      tracepoint: error.tracepoint,
      details: error.details,
    });
  }
}

/** Run one generation pass for the given command line. */
export async function run(argv: string[], options: RunOptions = {}): Promise<RunResult> {
  const output = options.output ?? processOutput;
  const failed = (exitCode: number): RunResult => ({ exitCode, artifacts: [] });

  let cli: CliOptions;
  try {
    cli = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    logErrors(logger, 'Invalid invocation', [err.typedError]);
    output.err(USAGE);
    return failed(EXIT_USAGE);
  }

  if (cli.help) {
    output.out(USAGE);
    return { exitCode: EXIT_OK, artifacts: [] };
  }

  const config = createGeneratorConfig(toConfigInput(cli), options.env ?? process.env);
  setLogLevel(config.logLevel);
  const validation = validateGeneratorConfig(config);
  if (!validation.valid) {
    logErrors(logger, 'Invalid invocation', validation.errors);
    output.err(USAGE);
    return failed(EXIT_USAGE);
  }

  const log = logger.child({ runId: `gen_${uuid()}` });
  const targets: GenerationTargets = {
    sourcePath: config.sourcePath,
    headerPath: config.headerPath,
    perfettoHeaderPath: config.perfettoHeaderPath,
  };

  try {
    const { registry, contract } = declareTuTracepoints(log);
    const engine = loadEngine(config.importPath, log);
    const artifacts = runEngine(engine, registry.snapshot(), targets, contract);
    await writeArtifacts(artifacts, targets, log);

    log.info('Tracepoints generated', {
      engine: engine.name,
      tracepoints: registry.tracepoints.length,
      toggles: registry.toggleNames().length,
      defaultEnabled: contract.toggleDefaults.length,
      registryHash: registry.hash().digest,
      outputs: artifacts.map((a) => a.path),
    });
    return { exitCode: EXIT_OK, artifacts };
  } catch (err) {
    if (err instanceof DeclarationError) {
      logErrors(log, 'Invalid tracepoint declaration', err.errors);
      return failed(EXIT_FAILURE);
    }
    if (err instanceof TracegenError) {
      logErrors(log, 'Generation failed', [err.typedError]);
      return failed(EXIT_FAILURE);
    }
    throw err;
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    (result) => {
      process.exitCode = result.exitCode;
    },
    (err: unknown) => {
      logger.error('Generation failed', { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = EXIT_FAILURE;
    },
  );
}
