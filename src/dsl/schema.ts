/**
 * Declaration schema definitions.
 *
 * Patterns and type families used to validate tracepoint declarations.
 * Expressions (`var`, conversions, print args) are opaque C text and are
 * never parsed beyond the shape checks below.
 */

import { HeaderScope } from '../domain/tracepoint';

/** Header scopes recognized by the schema. */
export const VALID_HEADER_SCOPES: readonly HeaderScope[] = [HeaderScope.Header, HeaderScope.Source];

/** C identifier. Tracepoint, toggle, field and parameter names must match. */
export const C_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** A single printf conversion, e.g. `%u`, `%08x`, `%llu`, `%s`. */
export const PRINTF_CONVERSION = /^%[-+ #0]*(\d+|\*)?(\.(\d+|\*))?(hh|h|ll|l|j|z|t|L)?([diouxXfFeEgGaAcsp])$/;

/** An inttypes.h conversion such as `%" PRIu64 "`. */
export const PRINTF_INTTYPES = /^%"\s*PRI([diouxX])(8|16|32|64|PTR|MAX)\s*"$/;

/** Every conversion in a print format, `%%` included so it can be skipped. */
export const PRINTF_CONVERSIONS_GLOBAL =
  /%(%|[-+ #0]*(\d+|\*)?(\.(\d+|\*))?(hh|h|ll|l|j|z|t|L)?[diouxXfFeEgGaAcsp]|"\s*PRI[diouxX](8|16|32|64|PTR|MAX)\s*")/g;

/** Placeholder for the stored field inside a conversion template. */
export const CONVERSION_PLACEHOLDER = '{}';

/** Value families a C type or a printf conversion belongs to. */
export type ValueFamily = 'integer' | 'float' | 'string' | 'pointer';

/** Types that cannot be printed without a conversion. */
export type TypeFamily = ValueFamily | 'aggregate' | 'opaque';

const INTEGER_TYPES = new Set([
  'bool',
  '_Bool',
  'char',
  'signed char',
  'unsigned char',
  'short',
  'unsigned short',
  'int',
  'signed',
  'unsigned',
  'unsigned int',
  'long',
  'unsigned long',
  'long long',
  'unsigned long long',
  'int8_t',
  'int16_t',
  'int32_t',
  'int64_t',
  'uint8_t',
  'uint16_t',
  'uint32_t',
  'uint64_t',
  'size_t',
  'uintptr_t',
  'intptr_t',
]);

const FLOAT_TYPES = new Set(['float', 'double', 'long double']);

const CONVERSION_FAMILIES: Record<string, ValueFamily> = {
  d: 'integer',
  i: 'integer',
  o: 'integer',
  u: 'integer',
  x: 'integer',
  X: 'integer',
  c: 'integer',
  f: 'float',
  F: 'float',
  e: 'float',
  E: 'float',
  g: 'float',
  G: 'float',
  a: 'float',
  A: 'float',
  s: 'string',
  p: 'pointer',
};

/** Validation constraints. */
export const SCHEMA_CONSTRAINTS = {
  /** Maximum arguments recorded by one tracepoint. */
  maxArgs: 32,
  /** Maximum tracepoints sharing one toggle mask (one bit each in a uint64_t). */
  maxToggles: 64,
} as const;

/** Names the generated emission functions already use for their own parameters and locals. */
export const RESERVED_PARAM_NAMES: readonly string[] = ['ut', 'cs', '__entry'];

/** Classify a declared C type. Unknown typedef names are `opaque`. */
export function classifyType(type: string): TypeFamily {
  const normalized = type.trim().replace(/\s+/g, ' ').replace(/\s*\*/g, ' *');
  if (normalized.endsWith('*')) {
    const pointee = normalized.slice(0, -1).trim().replace(/^const /, '');
    return pointee === 'char' ? 'string' : 'pointer';
  }
  const bare = normalized.replace(/^const /, '');
  if (bare.startsWith('enum ')) return 'integer';
  if (bare.startsWith('struct ') || bare.startsWith('union ')) return 'aggregate';
  if (INTEGER_TYPES.has(bare)) return 'integer';
  if (FLOAT_TYPES.has(bare)) return 'float';
  return 'opaque';
}

/** Family of a single printf conversion, or undefined if the format is not one. */
export function conversionFamily(format: string): ValueFamily | undefined {
  const inttypes = PRINTF_INTTYPES.exec(format);
  if (inttypes) return 'integer';
  const match = PRINTF_CONVERSION.exec(format);
  if (!match) return undefined;
  return CONVERSION_FAMILIES[match[5]];
}

/** Number of value conversions in a print format (`%%` excluded). */
export function countConversions(format: string): number {
  let count = 0;
  for (const match of format.matchAll(PRINTF_CONVERSIONS_GLOBAL)) {
    if (match[1] !== '%') count++;
  }
  return count;
}

/** Whether a raw type can be printed with a format of the given family. */
export function isFormatCompatible(type: TypeFamily, format: ValueFamily): boolean {
  switch (type) {
    case 'opaque':
      return true;
    case 'aggregate':
      return false;
    case 'integer':
      return format === 'integer';
    default:
      return type === format;
  }
}
