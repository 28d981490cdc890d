import type * as ESTree from 'estree';
import { Assert } from './assert';
import { Abrupt, CR, CastNotAbrupt, CompletionType, ThrowCompletion } from './completion_record';
import { EMPTY } from './enums';
import type { NativeErrorName } from './error_object';
import { ExecutionContext } from './execution_context';
import type { Func } from './func';
import { Obj, OrdinaryObjectCreate } from './obj';
import { HasValueField, PropertyRecord, propWC } from './property_descriptor';
import { InitializeHostDefinedRealm, RealmBuilder, RealmRecord, getIntrinsicName } from './realm_record';
import { isProgram } from './static/function_code';
import { Val } from './val';

/**
 * Evaluation generator.  Nothing in the core suspends, so the yield
 * type is only a placeholder; the point of the generator protocol is
 * that operations which may run user code compose with `yield*`.
 */
export type EvalGen<T> = Generator<undefined, T, undefined>;
export type ECR<T> = EvalGen<CR<T>>;

/**
 * A unit of realm contents.  `deps` are installed first; `intrinsics`
 * runs once per realm, in installation order.
 */
export interface Plugin {
  id?: string|symbol;
  deps?: () => Plugin[];
  intrinsics?(builder: RealmBuilder): void;
}

/** The subset of a parser (e.g. esprima-next) that the VM depends on. */
export interface Parser {
  parseScript(source: string): unknown;
}

export interface VMOptions {
  /** Parser used by `parseScript` and the function-code compiler. */
  parser?: Parser;
  /** Logs every call and its completion when true. */
  trace?: boolean;
  /** Sink for log lines.  Defaults to console.log. */
  log?: (line: string) => void;
}

/** Drives an evaluation generator to completion. */
export function run<T>(gen: EvalGen<T>): T {
  let result;
  do {
    result = gen.next();
  } while (!result.done);
  return result.value;
}

/** Similar to run(), but fails if there are any yields. */
export function runImmediate<T>(gen: EvalGen<T>): T {
  const result = gen.next();
  Assert(result.done, 'Unexpected yield');
  return result.value;
}

export class VM {
  private executionStack: ExecutionContext[] = [];
  private _indent = '';

  readonly plugins = new Map<string|symbol|Plugin, Plugin>();

  constructor(readonly options: VMOptions = {}) {}

  install(plugin: Plugin): void {
    for (const dep of plugin.deps?.() ?? []) {
      const id = dep.id ?? dep;
      if (!this.plugins.has(id)) this.install(dep);
    }
    this.plugins.set(plugin.id ?? plugin, plugin);
  }

  createRealm(): RealmRecord {
    const realm = new RealmRecord();
    CastNotAbrupt(InitializeHostDefinedRealm(this, realm));
    return realm;
  }

  /**
   * Runs `fn` with the realm's root context as the running execution
   * context, so that host code can call into the object model.
   */
  evaluate<T>(realm: RealmRecord, fn: () => EvalGen<T>): T {
    return run(this.inContext(realm.RootContext, fn));
  }

  isRunning(): boolean {
    return this.executionStack.length > 0;
  }

  get stackDepth(): number {
    return this.executionStack.length;
  }

  enterContext(context: ExecutionContext): void {
    this.executionStack.at(-1)?.suspend();
    this.executionStack.push(context);
    context.resume();
  }

  popContext(context?: ExecutionContext): void {
    const top = this.executionStack.at(-1);
    Assert(top, 'Execution context stack is empty');
    if (context) Assert(top === context, 'Wrong context to pop');
    this.executionStack.pop();
    top.suspend();
    this.executionStack.at(-1)?.resume();
  }

  /**
   * Scoped form of enterContext/popContext.  The context is popped on
   * every exit path: normal return, an abrupt completion, a host
   * exception, or the generator being closed early.
   */
  * inContext<T>(context: ExecutionContext, fn: () => EvalGen<T>): EvalGen<T> {
    this.enterContext(context);
    try {
      return yield* fn();
    } finally {
      this.popContext(context);
    }
  }

  getRunningContext(): ExecutionContext {
    const context = this.executionStack.at(-1);
    Assert(context, 'Not running');
    return context;
  }

  getActiveFunctionObject(): Func|undefined {
    return this.getRunningContext().Function ?? undefined;
  }

  getRealm(): RealmRecord {
    return this.getRunningContext().Realm;
  }

  getIntrinsic(name: string): Obj {
    const intrinsic = this.getRealm().Intrinsics.get(name);
    Assert(intrinsic, `No intrinsic: ${name}`);
    return intrinsic;
  }

  makeError(name: string, message?: string): Obj {
    const props: PropertyRecord = {};
    if (message != null) props['message'] = propWC(message);
    const error = OrdinaryObjectCreate({
      Prototype: this.getIntrinsic(`%${name}.prototype%`),
      ErrorData: '',
    }, props);
    this.captureStackTrace(error);
    return error;
  }

  throw(name: NativeErrorName, message?: string): CR<never> {
    const error = this.makeError(name, message);
    if (this.options.trace) this.log(`throw ${error.ErrorData}`);
    return ThrowCompletion(error);
  }

  /** Records "Name: message" plus the active function names in [[ErrorData]]. */
  captureStackTrace(O: Obj): void {
    const frames: string[] = [];
    for (let i = this.executionStack.length - 1; i >= 0; i--) {
      const fn = this.executionStack[i].Function;
      if (fn) frames.push(`\n    at ${functionName(fn)}`);
    }
    const name = findValueProp(O, 'name');
    const msg = findValueProp(O, 'message');
    const header = msg ? `${String(name)}: ${String(msg)}` : String(name);
    O.ErrorData = header + frames.join('');
  }

  parseScript(source: string): CR<ESTree.Program> {
    const parser = this.options.parser;
    if (!parser) return this.throw('SyntaxError', 'No parser');
    let tree: unknown;
    try {
      tree = parser.parseScript(source);
    } catch (err) {
      return this.throw('SyntaxError', err instanceof Error ? err.message : String(err));
    }
    if (!isProgram(tree)) return this.throw('SyntaxError', 'Parser did not return a Program');
    return tree;
  }

  log(msg: string): void {
    const sink = this.options.log ?? console.log;
    sink(`${this._indent}${msg.replace(/\n/g, `\n${this._indent}  `)}`);
  }
  indent(): void { this._indent += '  '; }
  dedent(): void { this._indent = this._indent.substring(2); }
}

/** A language value thrown out to the host. */
export class ThrownValue extends Error {
  constructor(readonly value: Val) {
    super(`Uncaught ${DebugString(value)}`);
    this.name = 'ThrownValue';
  }
}

/**
 * Unwraps a completion for host code: throw completions become a
 * ThrownValue exception.  Other abrupt completions cannot reach the
 * host and fail an assertion.
 */
export function unwrap<T>(result: CR<T>): T {
  if (!(result instanceof Abrupt)) return result;
  if (result.Type === CompletionType.Throw) {
    throw new ThrownValue(EMPTY.is(result.Value) ? undefined : result.Value);
  }
  throw new Error(`Assertion failed: unexpected ${result.Type} completion`);
}

export function* just<T>(value: T): EvalGen<T> {
  return value;
}

export function functionName(F: Obj): string {
  const name = F.OwnProps.get('name');
  return name && HasValueField(name) && name.Value ? String(name.Value) : '<anonymous>';
}

export function DebugString(v: Val|ExecutionContext, depth = 1): string {
  if (v instanceof ExecutionContext) {
    return `${v.constructor.name} ${v.Function ? functionName(v.Function) : ''}`.trimEnd();
  }
  if (typeof v === 'string') return JSON.stringify(v);
  if (typeof v === 'symbol') return v.toString();
  if (v instanceof Obj) {
    const intrinsicName = getIntrinsicName(v);
    if (intrinsicName != null) return intrinsicName;
    if (v.StringData != null) return `String(${JSON.stringify(v.StringData)})`;
    if (v.NumberData != null) return `Number(${v.NumberData})`;
    if (v.BooleanData != null) return `Boolean(${v.BooleanData})`;
    if (v.SymbolData != null) return `Symbol(${v.SymbolData.description ?? ''})`;
    if (v.ErrorData != null) return v.ErrorData.split('\n')[0] || 'Error';
    if (typeof v.Call === 'function') return `[Function: ${functionName(v)}]`;
    if (depth <= 0) return '{...}';
    const elems: string[] = [];
    for (const [k, d] of v.OwnProps) {
      if (!d.Enumerable) continue;
      const key = typeof k === 'symbol' ? `[${k.toString()}]` :
        /^[_$a-z][_$a-z0-9]*$/i.test(k) ? k : JSON.stringify(k);
      const val = HasValueField(d) ? DebugString(d.Value, depth - 1) : '[Getter/Setter]';
      elems.push(`${key}: ${val}`);
    }
    return `{${elems.join(', ')}}`;
  }
  if (Object.is(v, -0)) return '-0';
  return String(v);
}

function findValueProp(o: Obj|null, p: string): Val {
  for (; o; o = o.Prototype) {
    const desc = o.OwnProps.get(p);
    if (desc) return HasValueField(desc) ? desc.Value : undefined;
  }
  return undefined;
}
