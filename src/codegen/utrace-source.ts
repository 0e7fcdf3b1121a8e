/**
 * Instrumentation source: toggle parsing, print callbacks, tracepoint
 * descriptors and the out-of-line emission bodies.
 *
 * Emission bodies only copy values into the record. Conversions and
 * formatting live in the print callbacks, which run when the trace is read.
 */

import { HeaderScope, RegistrySnapshot, TracepointDecl, recordFields } from '../domain/tracepoint';
import { GENERATED_BANNER, cString, includeName, printedValue, recordStruct, toggleBit, toggleEnvVar } from './naming';
import { GenerationContract, GenerationTargets } from './types';
import { emissionParams, toggleList } from './utrace-header';

function toggleConfig(toggles: string[], contract: GenerationContract): string[] {
  const symbol = contract.toggleName;
  const defaults = contract.toggleDefaults.map((toggle) => `     | ${toggleBit(symbol, toggle)}`);

  return [
    'static const struct debug_control config_control[] = {',
    ...toggles.map((toggle) => `   { ${cString(toggle)}, ${toggleBit(symbol, toggle)}, },`),
    '   { NULL, 0, },',
    '};',
    `uint64_t ${symbol} = 0;`,
    '',
    'static void',
    `${symbol}_variable_once(void)`,
    '{',
    '   uint64_t default_value = 0',
    ...defaults,
    '     ;',
    '',
    `   ${symbol} =`,
    `      parse_enable_string(getenv(${cString(toggleEnvVar(symbol))}),`,
    '                          default_value,',
    '                          config_control);',
    '}',
    '',
    'void',
    `${symbol}_config_variable(void)`,
    '{',
    `   static once_flag process_${symbol}_variable_flag = ONCE_FLAG_INIT;`,
    '',
    `   call_once(&process_${symbol}_variable_flag,`,
    `             ${symbol}_variable_once);`,
    '}',
  ];
}

function printCallback(tp: TracepointDecl): string[] {
  const struct = recordStruct(tp.name);
  const fields = recordFields(tp);
  const head = `static void __print_${tp.name}(FILE *out, const void *arg) {`;

  if (tp.print !== undefined) {
    return [
      head,
      `   const struct ${struct} *__entry =`,
      `      (const struct ${struct} *)arg;`,
      '   (void)__entry;',
      `   fprintf(out, "${tp.print.format}\\n"`,
      ...tp.print.args.map((expr) => `           , ${expr}`),
      '   );',
      '}',
    ];
  }

  if (fields.length === 0) {
    return [head, '   (void)arg;', '   fprintf(out, "\\n");', '}'];
  }

  const format = fields.map((field) => `${field.name}=${field.cFormat}`).join(', ');
  return [
    head,
    `   const struct ${struct} *__entry =`,
    `      (const struct ${struct} *)arg;`,
    `   fprintf(out, "${format}\\n"`,
    ...fields.map((field) => `           , ${printedValue(field, '__entry')}`),
    '   );',
    '}',
  ];
}

function descriptor(tp: TracepointDecl): string[] {
  const struct = recordStruct(tp.name);
  const perfetto =
    tp.perfettoName === undefined
      ? []
      : [
          '#ifdef HAVE_PERFETTO',
          `   (void (*)(void *pctx, uint64_t, const void *, const void *))${tp.perfettoName},`,
          '#endif',
        ];
  return [
    `static const struct u_tracepoint __tp_${tp.name} = {`,
    `   ALIGN_POT(sizeof(struct ${struct}), 8),   /* keep size 64b aligned */`,
    `   ${cString(tp.name)},`,
    `   __print_${tp.name},`,
    ...perfetto,
    '};',
  ];
}

function emissionBody(tp: TracepointDecl, ctxParam: string): string[] {
  const struct = recordStruct(tp.name);
  return [
    `void __trace_${tp.name}(`,
    ...emissionParams(tp, ctxParam),
    ') {',
    `   struct ${struct} *__entry =`,
    `      (struct ${struct} *)u_trace_append(ut, cs, &__tp_${tp.name});`,
    '   (void)__entry;',
    ...recordFields(tp).map((field) => `   __entry->${field.name} = ${field.var};`),
    '}',
  ];
}

export function renderUtraceSource(
  snapshot: RegistrySnapshot,
  targets: GenerationTargets,
  contract: GenerationContract,
): string {
  const lines: string[] = [
    GENERATED_BANNER,
    '',
    `#include "${includeName(targets.headerPath)}"`,
    '',
    '#define __NEEDS_TRACE_PRIV',
    '#include "util/u_debug.h"',
    '#include "util/perf/u_trace_priv.h"',
    '',
  ];

  const sourceHeaders = snapshot.headers.filter((h) => h.scope === HeaderScope.Source);
  for (const header of sourceHeaders) lines.push(`#include "${header.path}"`);
  if (sourceHeaders.length > 0) lines.push('');

  lines.push(...toggleConfig(toggleList(snapshot), contract), '');

  for (const tp of snapshot.tracepoints) {
    lines.push(
      '/*',
      ` * ${tp.name}`,
      ' */',
      '',
      ...printCallback(tp),
      '',
      ...descriptor(tp),
      '',
      ...emissionBody(tp, contract.ctxParam),
      '',
    );
  }

  return lines.join('\n');
}
