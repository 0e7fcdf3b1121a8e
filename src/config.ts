/**
 * Generator configuration.
 *
 * Usage:
 *   const config = createGeneratorConfig({ importPath, sourcePath, headerPath, perfettoHeaderPath });
 *   const result = validateGeneratorConfig(config);
 *   if (!result.valid) reportErrors(result.errors);
 *
 * The log level comes from TRACEGEN_LOG_LEVEL unless given explicitly.
 */

import { statSync } from 'fs';
import { TypedError, invocationError, missingOptionError } from './domain/errors';
import { LogLevel, parseLogLevel } from './logger';

/** Complete configuration of one generation run. */
export interface GeneratorConfig {
  /** Search path for an external generation engine module. */
  importPath: string;
  /** Instrumentation source output. */
  sourcePath: string;
  /** Instrumentation header output. */
  headerPath: string;
  /** Trace front-end header output. */
  perfettoHeaderPath: string;
  logLevel: LogLevel;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: TypedError[];
}

/** Environment variable read for the default log level. */
export const LOG_LEVEL_ENV = 'TRACEGEN_LOG_LEVEL';

/** Command-line spelling of each path option. */
export const PATH_OPTIONS = {
  importPath: '--import-path',
  sourcePath: '--utrace-src',
  headerPath: '--utrace-hdr',
  perfettoHeaderPath: '--perfetto-hdr',
} as const;

type PathOption = keyof typeof PATH_OPTIONS;

const PATH_OPTION_KEYS = Object.keys(PATH_OPTIONS).filter((key): key is PathOption => key in PATH_OPTIONS);

/** Build a configuration, filling unset fields from the environment and defaults. */
export function createGeneratorConfig(
  partial: Partial<GeneratorConfig>,
  env: NodeJS.ProcessEnv = process.env,
): GeneratorConfig {
  return {
    importPath: partial.importPath ?? '',
    sourcePath: partial.sourcePath ?? '',
    headerPath: partial.headerPath ?? '',
    perfettoHeaderPath: partial.perfettoHeaderPath ?? '',
    logLevel: partial.logLevel ?? parseLogLevel(env[LOG_LEVEL_ENV]) ?? LogLevel.Info,
  };
}

/** Validate a configuration before any declaration is registered. */
export function validateGeneratorConfig(config: GeneratorConfig): ConfigValidationResult {
  const errors: TypedError[] = [];

  for (const key of PATH_OPTION_KEYS) {
    if (config[key].trim().length === 0) errors.push(missingOptionError(PATH_OPTIONS[key]));
  }

  if (config.importPath.trim().length > 0 && !isDirectory(config.importPath)) {
    errors.push(
      invocationError('INVALID_IMPORT_PATH', `Import path is not a directory: ${config.importPath}`, {
        importPath: config.importPath,
      }),
    );
  }

  const outputs = [config.sourcePath, config.headerPath, config.perfettoHeaderPath].filter((p) => p.length > 0);
  if (new Set(outputs).size !== outputs.length) {
    errors.push(invocationError('DUPLICATE_OUTPUT', 'Output paths must be distinct', { outputs }));
  }

  return { valid: errors.length === 0, errors };
}

function isDirectory(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}
