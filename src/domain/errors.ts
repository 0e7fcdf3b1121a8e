/**
 * Typed error model.
 *
 * Every failure carries a namespaced code and machine-readable details so
 * that build tooling can tell a bad declaration apart from a bad
 * invocation or a failed generation step.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain = 'CONFIG' | 'INVOCATION' | 'GENERATION';

/** Typed suggested fix. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "CONFIG.DUPLICATE_TRACEPOINT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Tracepoint the error was raised for, if any. */
  tracepoint?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  tracepoint?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    tracepoint: params.tracepoint,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Domain of a typed error code. */
export function errorDomain(error: TypedError): ErrorDomain | undefined {
  const prefix = error.code.split('.')[0];
  if (prefix === 'CONFIG' || prefix === 'INVOCATION' || prefix === 'GENERATION') return prefix;
  return undefined;
}

// --- Common error factory functions ---

export function configurationError(
  code: string,
  message: string,
  tracepoint?: string,
  details?: Record<string, unknown>,
  fixes?: SuggestedFix[],
): TypedError {
  return createTypedError({
    code: `CONFIG.${code}`,
    message,
    tracepoint,
    details,
    suggestedFixes: fixes,
  });
}

export function duplicateTracepointError(name: string): TypedError {
  return configurationError(
    'DUPLICATE_TRACEPOINT',
    `Tracepoint already registered: ${name}`,
    name,
    { name },
    [{ type: 'RENAME', params: { name }, description: `Give "${name}" a unique name` }],
  );
}

/** Two distinct declarations that would emit the same C symbol. */
export function symbolCollisionError(tracepoint: string, field: string, value: string, existing: string): TypedError {
  return configurationError(
    'DUPLICATE_TRACEPOINT',
    `${field} "${value}" of "${tracepoint}" collides with "${existing}"`,
    tracepoint,
    { field, value, existing },
    [{ type: 'RENAME', params: { name: value }, description: `Give "${value}" a name that differs in more than case` }],
  );
}

export function invocationError(code: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: `INVOCATION.${code}`,
    message,
    details,
  });
}

export function missingOptionError(option: string): TypedError {
  return createTypedError({
    code: 'INVOCATION.MISSING_OPTION',
    message: `Missing required option: ${option}`,
    details: { option },
    suggestedFixes: [{ type: 'ADD_OPTION', params: { option }, description: `Pass ${option} <path>` }],
  });
}

export function generationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'GENERATION.FAILED',
    message,
    details,
  });
}

export function writeFailedError(path: string, message: string): TypedError {
  return createTypedError({
    code: 'GENERATION.WRITE_FAILED',
    message: `Failed to write ${path}: ${message}`,
    details: { path },
  });
}

/** Error wrapper thrown at the registration, invocation and generation boundaries. */
export class TracegenError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'TracegenError';
  }
}

/** Error thrown when a set of declarations fails validation as a whole. */
export class DeclarationError extends TracegenError {
  constructor(public errors: TypedError[]) {
    super(errors[0] ?? configurationError('INVALID', 'Invalid declaration'));
    this.name = 'DeclarationError';
    if (errors.length > 1) {
      this.message = `${errors[0].message} (and ${errors.length - 1} more)`;
    }
  }
}
