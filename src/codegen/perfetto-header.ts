/**
 * Trace front-end header: converts each tracepoint record into the
 * name/value extra data of a perfetto GPU render-stage event.
 */

import { RegistrySnapshot, TracepointDecl, recordFields } from '../domain/tracepoint';
import { GENERATED_BANNER, cString, includeGuard, includeName, printedValue, recordStruct } from './naming';
import { GenerationTargets } from './types';

function payloadAsExtra(tp: TracepointDecl): string[] {
  const fn = `trace_payload_as_extra_${tp.name}`;
  const fields = recordFields(tp);
  const lines = [
    'static void UNUSED',
    `${fn}(perfetto::protos::pbzero::GpuRenderStageEvent *event,`,
    `${' '.repeat(fn.length + 1)}const struct ${recordStruct(tp.name)} *payload)`,
    '{',
  ];

  if (fields.length > 0) {
    lines.push('   char buf[128];');
    for (const field of fields) {
      lines.push(
        '',
        '   {',
        '      auto data = event->add_extra_data();',
        `      data->set_name(${cString(field.name)});`,
        `      snprintf(buf, sizeof(buf), "${field.cFormat}", ${printedValue(field, 'payload')});`,
        '      data->set_value(buf);',
        '   }',
      );
    }
  }

  lines.push('}');
  return lines;
}

export function renderPerfettoHeader(snapshot: RegistrySnapshot, targets: GenerationTargets): string {
  const guard = includeGuard(targets.perfettoHeaderPath);
  const lines: string[] = [
    GENERATED_BANNER,
    '',
    `#ifndef ${guard}`,
    `#define ${guard}`,
    '',
    '#ifdef HAVE_PERFETTO',
    '',
    '/*',
    ' * Note that this file should be included in a single C++ file.',
    ' */',
    '',
    '#include <perfetto.h>',
    '',
    `#include "${includeName(targets.headerPath)}"`,
    '',
  ];

  for (const tp of snapshot.tracepoints) {
    lines.push(...payloadAsExtra(tp), '');
  }

  lines.push('#endif /* HAVE_PERFETTO */', '', `#endif /* ${guard} */`, '');
  return lines.join('\n');
}
