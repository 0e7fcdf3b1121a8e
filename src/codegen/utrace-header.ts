/**
 * Instrumentation header: record layouts, the toggle mask and the inline
 * emission wrappers driver code calls.
 */

import { HeaderScope, RegistrySnapshot, TracepointDecl, callParams, recordFields } from '../domain/tracepoint';
import { GENERATED_BANNER, includeGuard, recordStruct, toggleBit } from './naming';
import { GenerationContract, GenerationTargets } from './types';

/** Parameter list of an emission call, one declaration per line. */
export function emissionParams(tp: TracepointDecl, ctxParam: string): string[] {
  const params = ['struct u_trace *ut', 'void *cs', ctxParam, ...callParams(tp).map((p) => `${p.type} ${p.var}`)];
  return params.map((p, i) => (i === 0 ? `     ${p}` : `   , ${p}`));
}

/** Distinct toggles in first-use order. */
export function toggleList(snapshot: RegistrySnapshot): string[] {
  const toggles: string[] = [];
  for (const tp of snapshot.tracepoints) {
    if (tp.toggleName !== undefined && !toggles.includes(tp.toggleName)) toggles.push(tp.toggleName);
  }
  return toggles;
}

function recordDecl(tp: TracepointDecl): string[] {
  const fields = recordFields(tp);
  const lines = [`struct ${recordStruct(tp.name)} {`];
  if (fields.length === 0) {
    lines.push('   uint8_t dummy;');
  } else {
    for (const field of fields) lines.push(`   ${field.type} ${field.name};`);
  }
  lines.push('};');
  return lines;
}

function perfettoPrototype(tp: TracepointDecl, ctxParam: string): string[] {
  if (tp.perfettoName === undefined) return [];
  return [
    '#ifdef HAVE_PERFETTO',
    `void ${tp.perfettoName}(`,
    `   ${ctxParam},`,
    '   uint64_t ts_ns,',
    '   const void *flush_data,',
    `   const struct ${recordStruct(tp.name)} *payload);`,
    '#endif',
  ];
}

function emissionWrapper(tp: TracepointDecl, contract: GenerationContract, ctxName: string): string[] {
  const params = emissionParams(tp, contract.ctxParam);
  const callArgs = ['ut', 'cs', ctxName, ...callParams(tp).map((p) => p.var)].join(', ');
  const condition =
    tp.toggleName === undefined
      ? ['   if (!unlikely(u_trace_enabled(ut)))']
      : [
          '   if (!unlikely(u_trace_enabled(ut) &&',
          `                 (${contract.toggleName} & ${toggleBit(contract.toggleName, tp.toggleName)})))`,
        ];

  return [
    `void __trace_${tp.name}(`,
    ...params,
    ');',
    `static ALWAYS_INLINE void trace_${tp.name}(`,
    ...params,
    ') {',
    ...condition,
    '      return;',
    `   __trace_${tp.name}(${callArgs});`,
    '}',
  ];
}

export function renderUtraceHeader(
  snapshot: RegistrySnapshot,
  targets: GenerationTargets,
  contract: GenerationContract,
  ctxName: string,
): string {
  const guard = includeGuard(targets.headerPath);
  const toggles = toggleList(snapshot);
  const lines: string[] = [GENERATED_BANNER, '', `#ifndef ${guard}`, `#define ${guard}`, ''];

  const publicHeaders = snapshot.headers.filter((h) => h.scope === HeaderScope.Header);
  for (const header of publicHeaders) lines.push(`#include "${header.path}"`);
  if (publicHeaders.length > 0) lines.push('');
  lines.push('#include "util/u_trace.h"', '', '#ifdef __cplusplus', 'extern "C" {', '#endif', '');

  for (const decl of snapshot.forwardDecls) lines.push(`${decl.declaration};`);
  if (snapshot.forwardDecls.length > 0) lines.push('');

  lines.push(`enum ${contract.toggleName} {`);
  toggles.forEach((toggle, i) => lines.push(`   ${toggleBit(contract.toggleName, toggle)} = 1ull << ${i},`));
  lines.push(
    '};',
    '',
    `extern uint64_t ${contract.toggleName};`,
    '',
    `void ${contract.toggleName}_config_variable(void);`,
    '',
  );

  for (const tp of snapshot.tracepoints) {
    lines.push(
      '/*',
      ` * ${tp.name}`,
      ' */',
      ...recordDecl(tp),
      ...perfettoPrototype(tp, contract.ctxParam),
      ...emissionWrapper(tp, contract, ctxName),
      '',
    );
  }

  lines.push('#ifdef __cplusplus', '}', '#endif', '', `#endif /* ${guard} */`, '');
  return lines.join('\n');
}
