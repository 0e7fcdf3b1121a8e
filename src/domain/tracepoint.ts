/**
 * Tracepoint domain model.
 *
 * A tracepoint is one named emission point in generated driver code. Each
 * emission copies a fixed-layout record into the trace buffer; formatting
 * of that record happens later, when the trace is consumed.
 */

/** Where a header is included: the generated header or only the generated source. */
export enum HeaderScope {
  Header = 'header',
  Source = 'source',
}

/** A header file the generated code must include. */
export interface HeaderRef {
  path: string;
  scope: HeaderScope;
}

/** A type declared without its definition, e.g. `struct tu_device`. */
export interface ForwardDecl {
  declaration: string;
}

/**
 * A single value captured at trace time.
 *
 * `var` is copied into the record as-is. `toPrimType` is a conversion
 * template where `{}` stands for the stored field; it is applied only when
 * the record is formatted, and `cFormat` then describes the converted value.
 */
export interface TracepointArg {
  /** Record field name. Defaults to `var` when omitted. */
  name?: string;
  /** C type of the stored field. */
  type: string;
  /** Expression that reads the live value at the call site. */
  var: string;
  /** printf conversion used when the field is printed. */
  cFormat: string;
  /** Conversion template to a printable primitive, e.g. `vk_format_description({})->short_name`. */
  toPrimType?: string;
}

/** A call-site parameter that structured args read from but that is not itself recorded. */
export interface TracepointParam {
  type: string;
  var: string;
}

/** Custom print override: a printf format and one expression per conversion. */
export interface PrintFormat {
  format: string;
  args: string[];
}

/**
 * Declaration input for a single tracepoint. Every field but `name` is
 * independently defaulted.
 *
 * `args` and `structArgs` are alternative capture strategies and never both
 * populated: inline args become call parameters and record fields at once,
 * while structured args are record fields computed from `params`.
 */
export interface TracepointConfig {
  name: string;
  toggleName?: string;
  args?: TracepointArg[];
  structArgs?: TracepointArg[];
  params?: TracepointParam[];
  print?: PrintFormat;
  /** Name of the trace front-end callback the event is exported through. */
  perfettoName?: string;
}

/** An argument after defaults are applied. */
export interface ResolvedArg {
  readonly name: string;
  readonly type: string;
  readonly var: string;
  readonly cFormat: string;
  readonly toPrimType?: string;
}

/** A registered tracepoint. Immutable once registered. */
export interface TracepointDecl {
  readonly name: string;
  readonly toggleName?: string;
  readonly args: readonly ResolvedArg[];
  readonly structArgs: readonly ResolvedArg[];
  readonly params: readonly TracepointParam[];
  readonly print?: PrintFormat;
  readonly perfettoName?: string;
}

/** Options accepted when declaring a scoped (begin/end) event. */
export interface ScopedEventOptions {
  args?: TracepointArg[];
  structArgs?: TracepointArg[];
  params?: TracepointParam[];
  print?: PrintFormat;
  /** Whether the event is emitted when no toggle configuration is given. Defaults to true. */
  defaultEnabled?: boolean;
}

/** Complete, frozen generation input. */
export interface RegistrySnapshot {
  readonly headers: readonly HeaderRef[];
  readonly forwardDecls: readonly ForwardDecl[];
  readonly tracepoints: readonly TracepointDecl[];
}

/** Resolve an argument's defaulted fields. */
export function resolveArg(arg: TracepointArg): ResolvedArg {
  const resolved: ResolvedArg = {
    name: arg.name ?? arg.var,
    type: arg.type,
    var: arg.var,
    cFormat: arg.cFormat,
    ...(arg.toPrimType !== undefined ? { toPrimType: arg.toPrimType } : {}),
  };
  return Object.freeze(resolved);
}

/**
 * Fields stored in the tracepoint's record. Inline args are recorded
 * directly; otherwise the structured args are.
 */
export function recordFields(tp: TracepointDecl): readonly ResolvedArg[] {
  return tp.structArgs.length > 0 ? tp.structArgs : tp.args;
}

/** Parameters of the generated emission call after the context parameter. */
export function callParams(tp: TracepointDecl): readonly TracepointParam[] {
  if (tp.structArgs.length > 0) return tp.params;
  return tp.args.map((arg) => ({ type: arg.type, var: arg.var }));
}
