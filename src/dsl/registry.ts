/**
 * Declaration registry.
 *
 * Ordered collection of headers, forward declarations and tracepoints that
 * make up one generation input. Entries are validated and frozen on the
 * way in and never change afterwards.
 */

import {
  DeclarationError,
  TypedError,
  configurationError,
  duplicateTracepointError,
  symbolCollisionError,
} from '../domain/errors';
import { HashRecord, computeHash } from '../domain/provenance';
import {
  ForwardDecl,
  HeaderRef,
  HeaderScope,
  RegistrySnapshot,
  TracepointConfig,
  TracepointDecl,
  resolveArg,
} from '../domain/tracepoint';
import { Logger, logger as rootLogger } from '../logger';
import { validateHeader, validateTracepoint } from './validator';

export class DeclarationRegistry {
  private readonly headerList: HeaderRef[] = [];
  private readonly forwardDeclList: ForwardDecl[] = [];
  private readonly tracepointList: TracepointDecl[] = [];
  private readonly byName = new Map<string, TracepointDecl>();
  /** Tracepoint names plus names reserved by scoped events. */
  private readonly claimed = new Set<string>();
  /** Toggle names by their upper-cased enum spelling. */
  private readonly toggleKeys = new Map<string, string>();
  private readonly perfettoNames = new Set<string>();
  private readonly log: Logger;

  constructor(log: Logger = rootLogger) {
    this.log = log.child({ module: 'registry' });
  }

  get headers(): readonly HeaderRef[] {
    return this.headerList;
  }

  get forwardDecls(): readonly ForwardDecl[] {
    return this.forwardDeclList;
  }

  get tracepoints(): readonly TracepointDecl[] {
    return this.tracepointList;
  }

  /** Append a header include. Duplicates are kept; the generated code tolerates them. */
  registerHeader(path: string, scope: HeaderScope = HeaderScope.Header): HeaderRef {
    const errors = validateHeader(path, scope);
    if (errors.length > 0) throw new DeclarationError(errors);

    const header: HeaderRef = Object.freeze({ path, scope });
    this.headerList.push(header);
    this.log.debug('Header registered', { path, scope });
    return header;
  }

  registerForwardDecl(declaration: string): ForwardDecl {
    if (declaration.trim().length === 0) {
      throw new DeclarationError([
        configurationError('MISSING_FIELD', 'Forward declaration text is required', undefined, {
          field: 'declaration',
        }),
      ]);
    }
    const decl: ForwardDecl = Object.freeze({ declaration: declaration.trim() });
    this.forwardDeclList.push(decl);
    this.log.debug('Forward declaration registered', { declaration: decl.declaration });
    return decl;
  }

  /**
   * Append one tracepoint. Throws a DeclarationError, leaving the registry
   * unchanged, if the declaration is invalid or its name is taken.
   */
  registerTracepoint(config: TracepointConfig): TracepointDecl {
    const [decl] = this.registerTracepoints([config]);
    return decl;
  }

  /**
   * Append several tracepoints atomically: either all are registered, in
   * order, or none is. `reserve` claims extra names, such as the name of the
   * scoped event the tracepoints belong to, under the same uniqueness rule.
   */
  registerTracepoints(configs: TracepointConfig[], reserve: string[] = []): TracepointDecl[] {
    const errors = this.check(configs, reserve);
    if (errors.length > 0) {
      this.log.error('Tracepoint declaration rejected', {
        names: configs.map((c) => c.name),
        codes: errors.map((e) => e.code),
      });
      throw new DeclarationError(errors);
    }

    const decls = configs.map(freezeDecl);
    for (const name of reserve) this.claimed.add(name);
    for (const decl of decls) {
      this.tracepointList.push(decl);
      this.byName.set(decl.name, decl);
      this.claimed.add(decl.name);
      if (decl.toggleName !== undefined) this.toggleKeys.set(decl.toggleName.toUpperCase(), decl.toggleName);
      if (decl.perfettoName !== undefined) this.perfettoNames.add(decl.perfettoName);
      this.log.debug('Tracepoint registered', {
        name: decl.name,
        toggle: decl.toggleName,
        fields: decl.args.length + decl.structArgs.length,
      });
    }
    return decls;
  }

  /** Validation errors registering the given declarations would raise. */
  check(configs: TracepointConfig[], reserve: string[] = []): TypedError[] {
    const errors: TypedError[] = [];
    const pending = new Set<string>();
    const pendingToggles = new Map<string, string>();
    const pendingPerfetto = new Set<string>();
    const claim = (name: string): void => {
      if (this.claimed.has(name) || pending.has(name)) errors.push(duplicateTracepointError(name));
      pending.add(name);
    };

    for (const name of reserve) claim(name);
    for (const config of configs) {
      const result = validateTracepoint(config);
      errors.push(...result.errors);
      for (const warning of result.warnings) this.log.warn(warning, { name: config.name });
      claim(config.name);

      // Toggles become upper-cased enum constants, so names differing only in case collide.
      const toggle = config.toggleName;
      if (toggle !== undefined) {
        const key = toggle.toUpperCase();
        const existing = this.toggleKeys.get(key) ?? pendingToggles.get(key);
        if (existing !== undefined && existing !== toggle) {
          errors.push(symbolCollisionError(config.name, 'Toggle', toggle, existing));
        } else {
          pendingToggles.set(key, toggle);
        }
      }

      const perfetto = config.perfettoName;
      if (perfetto !== undefined) {
        if (this.perfettoNames.has(perfetto) || pendingPerfetto.has(perfetto)) {
          errors.push(symbolCollisionError(config.name, 'Perfetto callback', perfetto, perfetto));
        }
        pendingPerfetto.add(perfetto);
      }
    }
    return errors;
  }

  /** Whether a tracepoint or scoped event already uses the name. */
  has(name: string): boolean {
    return this.claimed.has(name);
  }

  get(name: string): TracepointDecl | undefined {
    return this.byName.get(name);
  }

  /** Distinct toggle names in order of first appearance. */
  toggleNames(): string[] {
    const names: string[] = [];
    for (const tp of this.tracepointList) {
      if (tp.toggleName !== undefined && !names.includes(tp.toggleName)) names.push(tp.toggleName);
    }
    return names;
  }

  /** Frozen view of the complete generation input. */
  snapshot(): RegistrySnapshot {
    return Object.freeze({
      headers: Object.freeze([...this.headerList]),
      forwardDecls: Object.freeze([...this.forwardDeclList]),
      tracepoints: Object.freeze([...this.tracepointList]),
    });
  }

  /** Content hash of the registered declarations. */
  hash(): HashRecord {
    return computeHash(JSON.stringify(this.snapshot()));
  }
}

function freezeDecl(config: TracepointConfig): TracepointDecl {
  const decl: TracepointDecl = {
    name: config.name,
    args: Object.freeze((config.args ?? []).map(resolveArg)),
    structArgs: Object.freeze((config.structArgs ?? []).map(resolveArg)),
    params: Object.freeze((config.params ?? []).map((p) => Object.freeze({ type: p.type, var: p.var }))),
    ...(config.toggleName !== undefined ? { toggleName: config.toggleName } : {}),
    ...(config.print !== undefined
      ? { print: Object.freeze({ format: config.print.format, args: [...config.print.args] }) }
      : {}),
    ...(config.perfettoName !== undefined ? { perfettoName: config.perfettoName } : {}),
  };
  return Object.freeze(decl);
}
