/**
 * @fileoverview
 * 7.1 Type Conversion
 *
 * Conversions that can reach user code (`valueOf`, `toString`,
 * `@@toPrimitive`) are generators; the rest are plain functions.
 */

import { IsCallable } from './abstract_compare';
import { Call, Get, GetMethod } from './abstract_object';
import { CR, IsAbrupt } from './completion_record';
import { Obj, ObjectSlots, OrdinaryObjectCreate } from './obj';
import { PropertyRecord, prop0, propE } from './property_descriptor';
import { PropertyKey, Prim, Val } from './val';
import { ECR, VM } from './vm';

export type PrimitiveHint = 'string'|'number';

/**
 * 7.1.1 ToPrimitive ( input [ , preferredType ] )
 *
 * An @@toPrimitive method wins and is passed "default" when no hint
 * was given; otherwise the `valueOf`/`toString` pair is tried.
 */
export function* ToPrimitive($: VM, input: Val, preferredType?: PrimitiveHint): ECR<Prim> {
  if (!(input instanceof Obj)) return input;
  const exotic = yield* GetMethod($, input, Symbol.toPrimitive);
  if (IsAbrupt(exotic)) return exotic;
  if (exotic === undefined) return yield* OrdinaryToPrimitive($, input, preferredType ?? 'number');
  const result = yield* Call($, exotic, input, [preferredType ?? 'default']);
  if (IsAbrupt(result)) return result;
  return result instanceof Obj ?
    $.throw('TypeError', 'Cannot convert object to primitive value') : result;
}

/** 7.1.1.1 OrdinaryToPrimitive ( O, hint ) */
export function* OrdinaryToPrimitive($: VM, O: Obj, hint: PrimitiveHint): ECR<Prim> {
  const order = hint === 'string' ? ['toString', 'valueOf'] : ['valueOf', 'toString'];
  for (const name of order) {
    const candidate = yield* Get($, O, name);
    if (IsAbrupt(candidate)) return candidate;
    if (!IsCallable(candidate)) continue;
    const result = yield* Call($, candidate, O);
    if (IsAbrupt(result)) return result;
    if (!(result instanceof Obj)) return result;
  }
  return $.throw('TypeError', 'Cannot convert object to primitive value');
}

/** 7.1.2 ToBoolean ( argument ): every object is truthy. */
export function ToBoolean(argument: Val): boolean {
  return Boolean(argument);
}

/** 7.1.4 ToNumber ( argument ) */
export function* ToNumber($: VM, argument: Val): ECR<number> {
  const prim = yield* ToPrimitive($, argument, 'number');
  if (IsAbrupt(prim)) return prim;
  if (typeof prim === 'symbol') {
    return $.throw('TypeError', 'Cannot convert a Symbol value to a number');
  }
  return Number(prim);
}

/** 7.1.5 ToIntegerOrInfinity ( argument ): NaN and both zeros give 0. */
export function* ToIntegerOrInfinity($: VM, argument: Val): ECR<number> {
  const number = yield* ToNumber($, argument);
  if (IsAbrupt(number)) return number;
  return Math.trunc(number) || 0;
}

/** 7.1.7 ToUint32 ( argument ) */
export function* ToUint32($: VM, argument: Val): ECR<number> {
  const number = yield* ToNumber($, argument);
  return IsAbrupt(number) ? number : number >>> 0;
}

/** 7.1.17 ToString ( argument ) */
export function* ToString($: VM, argument: Val): ECR<string> {
  const prim = yield* ToPrimitive($, argument, 'string');
  if (IsAbrupt(prim)) return prim;
  if (typeof prim === 'symbol') {
    return $.throw('TypeError', 'Cannot convert a Symbol value to a string');
  }
  return String(prim);
}

/**
 * 7.1.18 ToObject ( argument )
 *
 * Primitives get a fresh wrapper whose prototype comes from the
 * running realm.  String wrappers also carry read-only index
 * properties and `length` (10.4.3).
 */
export function ToObject($: VM, argument: Val): CR<Obj> {
  if (argument instanceof Obj) return argument;
  if (argument == null) {
    return $.throw('TypeError', `Cannot convert ${String(argument)} to object`);
  }
  const wrap = (intrinsic: string, slots: ObjectSlots, props?: PropertyRecord) =>
    OrdinaryObjectCreate({...slots, Prototype: $.getIntrinsic(intrinsic)}, props);
  switch (typeof argument) {
    case 'boolean': return wrap('%Boolean.prototype%', {BooleanData: argument});
    case 'number': return wrap('%Number.prototype%', {NumberData: argument});
    case 'symbol': return wrap('%Symbol.prototype%', {SymbolData: argument});
    case 'string': {
      const props: PropertyRecord = Object.fromEntries(
        Array.from(argument, (_, i) => [String(i), propE(argument[i])]));
      props['length'] = prop0(argument.length);
      return wrap('%String.prototype%', {StringData: argument}, props);
    }
  }
}

/**
 * 7.1.19 ToPropertyKey ( argument )
 *
 * Numbers reach their canonical string form here: 0.000001 becomes
 * "0.000001" and 1e21 becomes "1e+21".
 */
export function* ToPropertyKey($: VM, argument: Val): ECR<PropertyKey> {
  const key = yield* ToPrimitive($, argument, 'string');
  if (IsAbrupt(key)) return key;
  return typeof key === 'symbol' ? key : String(key);
}

/** 7.1.20 ToLength ( argument ): clamps to [0, 2**53 - 1]. */
export function* ToLength($: VM, argument: Val): ECR<number> {
  const len = yield* ToIntegerOrInfinity($, argument);
  if (IsAbrupt(len)) return len;
  return Math.min(Math.max(len, 0), Number.MAX_SAFE_INTEGER);
}
