import { GenerationContract, GenerationTargets } from '../../src/codegen/types';
import { DeclarationRegistry } from '../../src/dsl/registry';
import { ScopedEventSynthesizer } from '../../src/dsl/scoped-events';
import { HeaderScope, RegistrySnapshot } from '../../src/domain/tracepoint';

export const targets: GenerationTargets = {
  sourcePath: 'out/tu_tracepoints.c',
  headerPath: 'out/tu_tracepoints.h',
  perfettoHeaderPath: 'out/tu_tracepoints_perfetto.h',
};

/** Join lines the way the renderers do, for exact block assertions. */
export function block(...lines: string[]): string {
  return lines.join('\n');
}

/**
 * A small declaration set: one inline-argument event, one structured
 * event with a custom print, and a disabled argument-free event.
 */
export function makeFixture(): { snapshot: RegistrySnapshot; contract: GenerationContract } {
  const registry = new DeclarationRegistry();
  const synthesizer = new ScopedEventSynthesizer(registry, 'tu');

  registry.registerHeader('vk_format.h');
  registry.registerHeader('freedreno/vulkan/tu_private.h', HeaderScope.Source);
  registry.registerForwardDecl('struct tu_device');

  synthesizer.declareScopedEvent('gmem_clear', {
    args: [
      { type: 'enum VkFormat', var: 'format', cFormat: '%s', toPrimType: 'vk_format_description({})->short_name' },
      { type: 'uint8_t', var: 'samples', cFormat: '%u' },
    ],
  });
  synthesizer.declareScopedEvent('render_pass', {
    params: [{ type: 'const struct tu_framebuffer *', var: 'fb' }],
    structArgs: [
      { type: 'uint16_t', name: 'width', var: 'fb->width', cFormat: '%u' },
      { type: 'uint16_t', name: 'height', var: 'fb->height', cFormat: '%u' },
    ],
    print: { format: 'size=%ux%u', args: ['__entry->width', '__entry->height'] },
  });
  synthesizer.declareScopedEvent('binning_ib', { defaultEnabled: false });

  return {
    snapshot: registry.snapshot(),
    contract: {
      ctxParam: 'struct tu_device *dev',
      toggleName: 'tu_gpu_tracepoint',
      toggleDefaults: [...synthesizer.defaultEnabled],
    },
  };
}
