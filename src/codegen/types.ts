/**
 * Generation engine contract.
 *
 * An engine receives a frozen registry snapshot, the three output targets
 * and the naming contract, and returns the artifact contents. Writing them
 * to disk is the caller's job, so a failing engine leaves no partial
 * output behind.
 */

import { RegistrySnapshot } from '../domain/tracepoint';

/** Output files of one generation run. */
export interface GenerationTargets {
  /** Instrumentation source, e.g. `tu_tracepoints.c`. */
  sourcePath: string;
  /** Instrumentation header, e.g. `tu_tracepoints.h`. */
  headerPath: string;
  /** Trace front-end header, e.g. `tu_tracepoints_perfetto.h`. */
  perfettoHeaderPath: string;
}

/** Naming contract passed once, after every declaration is registered. */
export interface GenerationContract {
  /** Context parameter declaration of every emission call, e.g. `struct tu_device *dev`. */
  ctxParam: string;
  /** Symbol of the runtime toggle mask, e.g. `tu_gpu_tracepoint`. */
  toggleName: string;
  /** Toggles enabled when no configuration is given, in declaration order. */
  toggleDefaults: readonly string[];
}

export type ArtifactKind = 'source' | 'header' | 'perfetto-header';

export interface GeneratedArtifact {
  kind: ArtifactKind;
  path: string;
  contents: string;
}

export interface GenerationEngine {
  /** Engine identifier, logged with each run. */
  readonly name: string;
  generate(
    snapshot: RegistrySnapshot,
    targets: GenerationTargets,
    contract: GenerationContract,
  ): GeneratedArtifact[];
}
