import * as esprima from 'esprima-next';
import { Abrupt, CR, CompletionType } from '../src/internal/completion_record';
import { EMPTY, UNUSED } from '../src/internal/enums';
import { ResolveBinding } from '../src/internal/execution_context';
import { GlobalEnvironmentRecord } from '../src/internal/environment_record';
import { FunctionCreateOptions, InstantiateFunctionObject, OrdinaryFunction } from '../src/internal/func';
import { Obj, OrdinaryObject, OrdinaryObjectCreate } from '../src/internal/obj';
import { PropertyRecord } from '../src/internal/property_descriptor';
import { RealmRecord } from '../src/internal/realm_record';
import { GetValue, PutValue } from '../src/internal/reference_record';
import { FunctionCode, functionCode } from '../src/internal/static/function_code';
import { Val } from '../src/internal/val';
import { DebugString, ECR, EvalGen, VM, VMOptions, just } from '../src/internal/vm';
import { core } from '../src/plugins';

export interface Engine {
  vm: VM;
  realm: RealmRecord;
}

/** A VM with the core plugins, an esprima-next parser, and one realm. */
export function engine(options: VMOptions = {}): Engine {
  const vm = new VM({
    parser: {parseScript: (source) => esprima.parseScript(source)},
    ...options,
  });
  vm.install(core);
  const realm = vm.createRealm();
  return {vm, realm};
}

/** Runs `fn` on the realm's root context. */
export function evaluate<T>(e: Engine, fn: ($: VM) => EvalGen<T>): T {
  return e.vm.evaluate(e.realm, () => fn(e.vm));
}

export function intrinsic(e: Engine, name: string): Obj {
  const value = e.realm.Intrinsics.get(name);
  if (!value) throw new Error(`missing intrinsic ${name}`);
  return value;
}

export function globalEnv(e: Engine): GlobalEnvironmentRecord {
  const env = e.realm.GlobalEnv;
  if (!env) throw new Error('realm has no global environment');
  return env;
}

export function globalObject(e: Engine): Obj {
  const obj = e.realm.GlobalObject;
  if (!obj) throw new Error('realm has no global object');
  return obj;
}

/** Instantiates a function declared at the top level of the realm. */
export function makeFunction(
  e: Engine,
  init: Partial<FunctionCode>,
  options?: FunctionCreateOptions,
): OrdinaryFunction {
  return evaluate(e, ($) =>
    just(InstantiateFunctionObject($, functionCode(init), globalEnv(e), options)));
}

/** An ordinary object inheriting from %Object.prototype%. */
export function plainObject(e: Engine, props: PropertyRecord = {}): OrdinaryObject {
  return OrdinaryObjectCreate({Prototype: intrinsic(e, '%Object.prototype%')}, props);
}

/** Describes a throw completion's value, e.g. "TypeError: message". */
export function thrown(result: CR<unknown>): string {
  if (!(result instanceof Abrupt) || result.Type !== CompletionType.Throw) {
    throw new Error(`expected a throw completion, got ${String(result)}`);
  }
  return EMPTY.is(result.Value) ? 'empty' : DebugString(result.Value);
}

/** Narrows a completion that should not be abrupt. */
export function ok<T>(result: CR<T>): T {
  if (result instanceof Abrupt) {
    const value = EMPTY.is(result.Value) ? 'empty' : DebugString(result.Value);
    throw new Error(`unexpected ${result.Type} completion: ${value}`);
  }
  return result;
}

export function asObj(value: Val): Obj {
  if (!(value instanceof Obj)) throw new Error(`not an object: ${DebugString(value)}`);
  return value;
}

/** Reads an identifier from the running context's lexical environment. */
export function* readBinding($: VM, name: string): ECR<Val> {
  const ref = yield* ResolveBinding($, name);
  if (ref instanceof Abrupt) return ref;
  return yield* GetValue($, ref);
}

export function* writeBinding($: VM, name: string, value: Val): ECR<UNUSED> {
  const ref = yield* ResolveBinding($, name);
  if (ref instanceof Abrupt) return ref;
  return yield* PutValue($, ref, value);
}
