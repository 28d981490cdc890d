import { CR } from './completion_record';
import type { Func } from './func';
import { Obj, isArrayIndexKey } from './obj';
import { Val } from './val';
import { VM } from './vm';

/**
 * 7.2 Testing and Comparison Operations
 *
 * Callability and constructability are read off the object itself: a
 * builtin or script function carries `Call` (and `Construct`) methods,
 * ordinary objects do not.
 */

export function IsCallable(argument: unknown): argument is Func {
  return argument instanceof Obj && typeof argument.Call === 'function';
}

export function IsConstructor(argument: unknown): argument is Func&Required<Pick<Func, 'Construct'>> {
  return argument instanceof Obj && typeof argument.Construct === 'function';
}

export function IsExtensible($: VM, O: Obj): CR<boolean> {
  return O.IsExtensible($);
}

export function IsPropertyKey(argument: unknown): argument is string|symbol {
  return typeof argument === 'string' || typeof argument === 'symbol';
}

/** Canonical decimal strings below 2**32 - 1. */
export function IsArrayIndex(argument: unknown): argument is string {
  return typeof argument === 'string' && isArrayIndexKey(argument);
}

/** -0 and +0 differ; NaN equals itself. */
export function SameValue(x: Val, y: Val): boolean {
  return Object.is(x, y);
}

/** SameValue with -0 and +0 equal. */
export function SameValueZero(x: Val, y: Val): boolean {
  return x === y || (Number.isNaN(x) && Number.isNaN(y));
}
