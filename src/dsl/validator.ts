/**
 * Declaration validator.
 *
 * Checks the shape of tracepoint declarations before they reach the
 * registry. Expressions are validated for presence and shape only; the
 * C compiler is the authority on what they mean.
 */

import { TypedError, configurationError } from '../domain/errors';
import { HeaderScope, PrintFormat, TracepointArg, TracepointConfig, TracepointParam } from '../domain/tracepoint';
import {
  C_IDENTIFIER,
  CONVERSION_PLACEHOLDER,
  RESERVED_PARAM_NAMES,
  SCHEMA_CONSTRAINTS,
  VALID_HEADER_SCOPES,
  classifyType,
  conversionFamily,
  countConversions,
  isFormatCompatible,
} from './schema';

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
}

/** How an argument is captured: as a call parameter or as a field computed from params. */
export type CaptureMode = 'inline' | 'struct';

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim().length === 0;
}

/** Validate a tracepoint declaration. */
export function validateTracepoint(config: TracepointConfig): ValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  if (isBlank(config.name)) {
    errors.push(configurationError('MISSING_FIELD', 'Tracepoint name is required', undefined, { field: 'name' }));
    return { valid: false, errors, warnings };
  }
  const tp = config.name;

  validateIdentifier(tp, 'name', tp, errors);
  if (config.toggleName !== undefined) validateIdentifier(config.toggleName, 'toggleName', tp, errors);
  if (config.perfettoName !== undefined) validateIdentifier(config.perfettoName, 'perfettoName', tp, errors);

  const args = config.args ?? [];
  const structArgs = config.structArgs ?? [];
  const params = config.params ?? [];

  if (args.length > 0 && structArgs.length > 0) {
    errors.push(
      configurationError(
        'EXCLUSIVE_CAPTURE',
        `Tracepoint "${tp}" declares both inline and structured arguments`,
        tp,
        { args: args.length, structArgs: structArgs.length },
        [{ type: 'CHOOSE_CAPTURE', params: {}, description: 'Keep either args or structArgs, not both' }],
      ),
    );
  }

  if (params.length > 0 && structArgs.length === 0) {
    errors.push(
      configurationError(
        'PARAMS_WITHOUT_STRUCT',
        `Tracepoint "${tp}" declares call parameters without structured arguments`,
        tp,
        { params: params.length },
        [{ type: 'MOVE_TO_ARGS', params: {}, description: 'Declare the values as inline args instead' }],
      ),
    );
  }

  if (structArgs.length > 0 && params.length === 0) {
    warnings.push(`Tracepoint "${tp}" captures structured arguments without call parameters`);
  }

  validateParams(tp, params, errors);
  validateArgs(tp, args, 'inline', errors);
  validateArgs(tp, structArgs, 'struct', errors);
  if (config.print !== undefined) validatePrint(tp, config.print, errors);

  return { valid: errors.length === 0, errors, warnings };
}

/** Validate a single argument. */
export function validateArg(tp: string, arg: TracepointArg, mode: CaptureMode): TypedError[] {
  const errors: TypedError[] = [];

  for (const field of ['type', 'var', 'cFormat'] as const) {
    if (isBlank(arg[field])) {
      errors.push(
        configurationError('MISSING_FIELD', `Argument of "${tp}" is missing "${field}"`, tp, {
          field,
          argument: arg.name ?? arg.var,
        }),
      );
    }
  }
  if (errors.length > 0) return errors;

  const name = arg.name ?? arg.var;
  // Inline args become parameters of the emission call.
  if (mode === 'inline' && !C_IDENTIFIER.test(arg.var)) {
    errors.push(
      configurationError(
        'INVALID_NAME',
        `Inline argument "${arg.var}" of "${tp}" must be a C identifier`,
        tp,
        { argument: name },
        [{ type: 'USE_STRUCT_ARGS', params: {}, description: 'Capture computed values through structArgs and params' }],
      ),
    );
  } else {
    validateIdentifier(name, 'argument name', tp, errors);
  }

  const formatFamily = conversionFamily(arg.cFormat);
  if (formatFamily === undefined) {
    errors.push(
      configurationError('INVALID_FORMAT', `Argument "${name}" of "${tp}" has invalid format "${arg.cFormat}"`, tp, {
        argument: name,
        cFormat: arg.cFormat,
      }),
    );
    return errors;
  }

  if (arg.toPrimType !== undefined) {
    if (isBlank(arg.toPrimType) || !arg.toPrimType.includes(CONVERSION_PLACEHOLDER)) {
      errors.push(
        configurationError(
          'INVALID_CONVERSION',
          `Conversion of "${name}" in "${tp}" must reference the stored value as "${CONVERSION_PLACEHOLDER}"`,
          tp,
          { argument: name, toPrimType: arg.toPrimType },
        ),
      );
    }
    // The format describes the converted value, so the raw type is not checked against it.
    return errors;
  }

  const typeFamily = classifyType(arg.type);
  if (typeFamily === 'aggregate') {
    errors.push(
      configurationError(
        'CONVERSION_REQUIRED',
        `Argument "${name}" of "${tp}" has type "${arg.type}" which needs a conversion to be printed`,
        tp,
        { argument: name, type: arg.type },
        [{ type: 'ADD_CONVERSION', params: { argument: name }, description: 'Provide toPrimType' }],
      ),
    );
  } else if (!isFormatCompatible(typeFamily, formatFamily)) {
    errors.push(
      configurationError(
        'FORMAT_TYPE_MISMATCH',
        `Format "${arg.cFormat}" of "${name}" in "${tp}" does not match type "${arg.type}"`,
        tp,
        { argument: name, type: arg.type, cFormat: arg.cFormat },
      ),
    );
  }

  return errors;
}

function validateArgs(tp: string, args: TracepointArg[], mode: CaptureMode, errors: TypedError[]): void {
  if (args.length > SCHEMA_CONSTRAINTS.maxArgs) {
    errors.push(
      configurationError('TOO_MANY_ARGS', `Tracepoint "${tp}" records more than ${SCHEMA_CONSTRAINTS.maxArgs} arguments`, tp, {
        count: args.length,
      }),
    );
  }

  const seen = new Set<string>();
  const callParams = new Set<string>();
  for (const arg of args) {
    errors.push(...validateArg(tp, arg, mode));
    const name = arg.name ?? arg.var;
    if (isBlank(name)) continue;
    if (seen.has(name)) {
      errors.push(
        configurationError('DUPLICATE_ARGUMENT', `Duplicate argument "${name}" in "${tp}"`, tp, { argument: name }),
      );
      continue;
    }
    seen.add(name);

    if (mode !== 'inline' || isBlank(arg.var)) continue;
    // Inline vars are the emission call's parameters.
    checkCallParam(tp, arg.var, callParams, errors);
  }
}

function validateParams(tp: string, params: TracepointParam[], errors: TypedError[]): void {
  const seen = new Set<string>();
  for (const param of params) {
    if (isBlank(param.type) || isBlank(param.var)) {
      errors.push(configurationError('MISSING_FIELD', `Parameter of "${tp}" needs a type and a name`, tp, { param }));
      continue;
    }
    validateIdentifier(param.var, 'parameter name', tp, errors);
    checkCallParam(tp, param.var, seen, errors);
  }
}

function checkCallParam(tp: string, name: string, seen: Set<string>, errors: TypedError[]): void {
  if (RESERVED_PARAM_NAMES.includes(name)) {
    errors.push(
      configurationError('INVALID_NAME', `Parameter "${name}" of "${tp}" is reserved by the emission call`, tp, {
        argument: name,
        reserved: [...RESERVED_PARAM_NAMES],
      }),
    );
  } else if (seen.has(name)) {
    errors.push(
      configurationError('DUPLICATE_ARGUMENT', `Duplicate parameter "${name}" in "${tp}"`, tp, { argument: name }),
    );
  }
  seen.add(name);
}

function validatePrint(tp: string, print: PrintFormat, errors: TypedError[]): void {
  if (isBlank(print.format)) {
    errors.push(configurationError('MISSING_FIELD', `Print format of "${tp}" is empty`, tp, { field: 'print.format' }));
    return;
  }
  const expected = countConversions(print.format);
  if (expected !== print.args.length) {
    errors.push(
      configurationError(
        'PRINT_ARITY',
        `Print format of "${tp}" has ${expected} conversions but ${print.args.length} arguments`,
        tp,
        { format: print.format, expected, actual: print.args.length },
      ),
    );
  }
}

function validateIdentifier(value: string, field: string, tp: string, errors: TypedError[]): void {
  if (!C_IDENTIFIER.test(value)) {
    errors.push(
      configurationError('INVALID_NAME', `Invalid ${field} "${value}" in "${tp}": must be a C identifier`, tp, {
        field,
        value,
      }),
    );
  }
}

/** Validate a header reference. */
export function validateHeader(path: string, scope: HeaderScope): TypedError[] {
  const errors: TypedError[] = [];
  if (isBlank(path)) {
    errors.push(configurationError('INVALID_HEADER', 'Header path is required', undefined, { path }));
  }
  if (!VALID_HEADER_SCOPES.includes(scope)) {
    errors.push(
      configurationError('INVALID_HEADER', `Invalid header scope: ${String(scope)}`, undefined, {
        path,
        validScopes: [...VALID_HEADER_SCOPES],
      }),
    );
  }
  return errors;
}
