/**
 * Symbol naming conventions shared by the generated artifacts.
 */

import path from 'path';
import { ResolvedArg } from '../domain/tracepoint';
import { CONVERSION_PLACEHOLDER } from '../dsl/schema';

/** Header comment of every generated artifact. */
export const GENERATED_BANNER = '/* This file is generated by tracegen. Do not edit. */';

/** Enum value of a toggle bit, e.g. `TU_GPU_TRACEPOINT_BLIT`. */
export function toggleBit(toggleSymbol: string, toggle: string): string {
  return `${toggleSymbol.toUpperCase()}_${toggle.toUpperCase()}`;
}

/** Environment variable the toggle mask is read from. */
export function toggleEnvVar(toggleSymbol: string): string {
  return toggleSymbol.toUpperCase();
}

/** Include guard for a generated header, e.g. `_TU_TRACEPOINTS_H`. */
export function includeGuard(headerPath: string): string {
  return `_${path.basename(headerPath).toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

/** How one generated file includes another generated alongside it. */
export function includeName(headerPath: string): string {
  return path.basename(headerPath);
}

/** Parameter name at the end of a C parameter declaration (`struct tu_device *dev` → `dev`). */
export function declaredName(declaration: string): string | undefined {
  const match = /([A-Za-z_][A-Za-z0-9_]*)\s*$/.exec(declaration);
  return match ? match[1] : undefined;
}

export function recordStruct(tracepoint: string): string {
  return `trace_${tracepoint}`;
}

/** Expression that prints a record field, with its conversion applied. */
export function printedValue(arg: ResolvedArg, record: string): string {
  const field = `${record}->${arg.name}`;
  if (arg.toPrimType === undefined) return field;
  return arg.toPrimType.split(CONVERSION_PLACEHOLDER).join(field);
}

/** C string literal of a plain string. */
export function cString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
