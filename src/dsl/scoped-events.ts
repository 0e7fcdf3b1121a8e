/**
 * Scoped events.
 *
 * A scoped event brackets one driver operation with two tracepoints,
 * `start_<name>` and `end_<name>`, that share a single toggle. The start
 * marker carries no payload; the end marker carries all of it, so the
 * record copied on the start path stays empty.
 */

import { ScopedEventOptions, TracepointConfig, TracepointDecl } from '../domain/tracepoint';
import { DeclarationRegistry } from './registry';

/** The pair of tracepoints synthesized for one scoped event. */
export interface ScopedEventPair {
  start: TracepointDecl;
  end: TracepointDecl;
}

export class ScopedEventSynthesizer {
  private readonly defaults: string[] = [];
  private readonly declared: string[] = [];

  /**
   * @param registry - Registry the synthesized tracepoints are appended to.
   * @param prefix - Driver prefix of the exported front-end callbacks, e.g. `tu`.
   */
  constructor(
    readonly registry: DeclarationRegistry,
    readonly prefix: string,
  ) {}

  /** Names of default-enabled scoped events, in declaration order. */
  get defaultEnabled(): readonly string[] {
    return this.defaults;
  }

  /** Names of all scoped events, in declaration order. */
  get scopedEvents(): readonly string[] {
    return this.declared;
  }

  /**
   * Declare a scoped event. Both tracepoints are validated before either is
   * registered, so a rejected declaration leaves the registry and the
   * default list untouched.
   */
  declareScopedEvent(name: string, options: ScopedEventOptions = {}): ScopedEventPair {
    const start: TracepointConfig = {
      name: `start_${name}`,
      toggleName: name,
      perfettoName: `${this.prefix}_start_${name}`,
    };
    const end: TracepointConfig = {
      name: `end_${name}`,
      toggleName: name,
      args: options.args,
      structArgs: options.structArgs,
      params: options.params,
      print: options.print,
      perfettoName: `${this.prefix}_end_${name}`,
    };

    const [startDecl, endDecl] = this.registry.registerTracepoints([start, end], [name]);

    this.declared.push(name);
    if (options.defaultEnabled ?? true) this.defaults.push(name);

    return { start: startDecl, end: endDecl };
  }
}
