/**
 * Command-line parsing for the generator.
 */

import { TracegenError, TypedError, invocationError } from '../domain/errors';
import { GeneratorConfig, PATH_OPTIONS } from '../config';
import { LogLevel, parseLogLevel } from '../logger';

export interface CliOptions {
  importPath?: string;
  sourcePath?: string;
  headerPath?: string;
  perfettoHeaderPath?: string;
  logLevel?: LogLevel;
  help: boolean;
}

export const USAGE = `Usage: tracegen -p <dir> --utrace-src <file> --utrace-hdr <file> --perfetto-hdr <file>

Generate the driver's tracepoint source, header and trace front-end header.

Options:
  -p, --import-path <dir>    Search path for an external generation engine
  --utrace-src <file>        Instrumentation source to write
  --utrace-hdr <file>        Instrumentation header to write
  --perfetto-hdr <file>      Trace front-end header to write
  --log-level <level>        debug, info, warn or error
  -h, --help                 Show this message
`;

/** Error raised for malformed command lines. */
export class UsageError extends TracegenError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'UsageError';
  }
}

/** Parse arguments (without the node and script entries). Accepts `--opt value` and `--opt=value`. */
export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i];
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const arg = eq === -1 ? raw : raw.slice(0, eq);
    const inline = eq === -1 ? undefined : raw.slice(eq + 1);

    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new UsageError(invocationError('MISSING_VALUE', `Option ${arg} requires a value`, { option: arg }));
      }
      i++;
      return next;
    };

    switch (arg) {
      case '--help':
      case '-h':
        opts.help = true;
        break;
      case '-p':
      case PATH_OPTIONS.importPath:
        opts.importPath = value();
        break;
      case PATH_OPTIONS.sourcePath:
        opts.sourcePath = value();
        break;
      case PATH_OPTIONS.headerPath:
        opts.headerPath = value();
        break;
      case PATH_OPTIONS.perfettoHeaderPath:
        opts.perfettoHeaderPath = value();
        break;
      case '--log-level': {
        const level = value();
        opts.logLevel = parseLogLevel(level);
        if (opts.logLevel === undefined) {
          throw new UsageError(invocationError('INVALID_VALUE', `Unknown log level: ${level}`, { option: arg, value: level }));
        }
        break;
      }
      default:
        throw new UsageError(invocationError('UNKNOWN_OPTION', `Unknown option: ${raw}`, { option: raw }));
    }
  }

  return opts;
}

/** The configuration fields given on the command line. */
export function toConfigInput(opts: CliOptions): Partial<GeneratorConfig> {
  const input: Partial<GeneratorConfig> = {};
  if (opts.importPath !== undefined) input.importPath = opts.importPath;
  if (opts.sourcePath !== undefined) input.sourcePath = opts.sourcePath;
  if (opts.headerPath !== undefined) input.headerPath = opts.headerPath;
  if (opts.perfettoHeaderPath !== undefined) input.perfettoHeaderPath = opts.perfettoHeaderPath;
  if (opts.logLevel !== undefined) input.logLevel = opts.logLevel;
  return input;
}
