/**
 * Tracepoints of the Vulkan driver.
 *
 * Every event is a scoped (start/end) pair and is enabled by default unless
 * declared with `defaultEnabled: false`.
 */

import { HeaderScope, TracepointArg } from '../domain/tracepoint';
import { DeclarationRegistry } from '../dsl/registry';
import { ScopedEventSynthesizer } from '../dsl/scoped-events';
import { GenerationContract } from '../codegen/types';
import { Logger, logger as rootLogger } from '../logger';

/** Prefix of the front-end callbacks the driver implements. */
export const TU_PREFIX = 'tu';

/** Naming contract of the driver's generated code. */
export const TU_CTX_PARAM = 'struct tu_device *dev';
export const TU_TOGGLE_NAME = 'tu_gpu_tracepoint';

/** A format argument printed by its short name. */
function formatArg(name: string): TracepointArg {
  return { type: 'enum VkFormat', var: name, cFormat: '%s', toPrimType: 'vk_format_description({})->short_name' };
}

function u8(name: string): TracepointArg {
  return { type: 'uint8_t', var: name, cFormat: '%u' };
}

function u16(name: string): TracepointArg {
  return { type: 'uint16_t', var: name, cFormat: '%u' };
}

/** Result of declaring the driver's tracepoints. */
export interface TuTracepoints {
  registry: DeclarationRegistry;
  synthesizer: ScopedEventSynthesizer;
  contract: GenerationContract;
}

export function declareTuTracepoints(log: Logger = rootLogger): TuTracepoints {
  const registry = new DeclarationRegistry(log);
  const synthesizer = new ScopedEventSynthesizer(registry, TU_PREFIX);

  registry.registerHeader('util/u_dump.h');
  registry.registerHeader('vk_format.h');
  registry.registerHeader('freedreno/vulkan/tu_private.h', HeaderScope.Source);

  registry.registerForwardDecl('struct tu_device');

  synthesizer.declareScopedEvent('render_pass', {
    params: [{ type: 'const struct tu_framebuffer *', var: 'fb' }],
    structArgs: [
      { type: 'uint16_t', name: 'width', var: 'fb->width', cFormat: '%u' },
      { type: 'uint16_t', name: 'height', var: 'fb->height', cFormat: '%u' },
      { type: 'uint8_t', name: 'MRTs', var: 'fb->attachment_count', cFormat: '%u' },
      { type: 'uint16_t', name: 'numberOfBins', var: 'fb->tile_count.width * fb->tile_count.height', cFormat: '%u' },
      { type: 'uint16_t', name: 'binWidth', var: 'fb->tile0.width', cFormat: '%u' },
      { type: 'uint16_t', name: 'binHeight', var: 'fb->tile0.height', cFormat: '%u' },
    ],
  });

  synthesizer.declareScopedEvent('binning_ib');
  synthesizer.declareScopedEvent('draw_ib_sysmem');
  synthesizer.declareScopedEvent('draw_ib_gmem');

  synthesizer.declareScopedEvent('gmem_clear', {
    args: [formatArg('format'), u8('samples')],
  });

  synthesizer.declareScopedEvent('sysmem_clear', {
    args: [formatArg('format'), u8('uses_3d_ops'), u8('samples')],
  });

  synthesizer.declareScopedEvent('sysmem_clear_all', {
    args: [u8('mrt_count'), u8('rect_count')],
  });

  synthesizer.declareScopedEvent('gmem_load', {
    args: [formatArg('format'), u8('force_load')],
  });

  synthesizer.declareScopedEvent('gmem_store', {
    args: [formatArg('format'), u8('fast_path'), u8('unaligned')],
  });

  synthesizer.declareScopedEvent('sysmem_resolve', {
    args: [formatArg('format')],
  });

  // TODO: add source and target megapixel counts once the blit path tracks them.
  synthesizer.declareScopedEvent('blit', {
    args: [u8('uses_3d_blit'), formatArg('src_format'), formatArg('dst_format'), u8('layers')],
  });

  synthesizer.declareScopedEvent('compute', {
    args: [
      u8('indirect'),
      u16('local_size_x'),
      u16('local_size_y'),
      u16('local_size_z'),
      u16('num_groups_x'),
      u16('num_groups_y'),
      u16('num_groups_z'),
    ],
  });

  return {
    registry,
    synthesizer,
    contract: {
      ctxParam: TU_CTX_PARAM,
      toggleName: TU_TOGGLE_NAME,
      toggleDefaults: [...synthesizer.defaultEnabled],
    },
  };
}
