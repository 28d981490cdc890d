import { IsCallable, IsConstructor } from './abstract_compare';
import { ToLength, ToObject } from './abstract_conversion';
import { CR, CastNotAbrupt, IsAbrupt } from './completion_record';
import { UNUSED } from './enums';
import { ArrayCreate } from './exotic_array';
import type { Func } from './func';
import { Obj } from './obj';
import { IsAccessorDescriptor, IsDataDescriptor, PropertyDescriptor, propW, propWC, propWEC } from './property_descriptor';
import { PropertyKey, Val } from './val';
import { DebugString, ECR, VM, just } from './vm';

/**
 * @fileoverview
 * 7.3 Operations on Objects
 *
 * The `...OrThrow` operations share the validation path of the
 * internal method they wrap; only a `false` result is turned into a
 * TypeError by `OrThrow`.
 */

function OrThrow($: VM, success: CR<boolean>, message: () => string): CR<UNUSED> {
  if (IsAbrupt(success)) return success;
  return success ? UNUSED : $.throw('TypeError', message());
}

/** 7.3.2 Get ( O, P ) */
export function Get($: VM, O: Obj, P: PropertyKey): ECR<Val> {
  return O.Get($, P, O);
}

/** 7.3.3 GetV ( V, P ): primitives are looked up on a wrapper but stay the receiver. */
export function* GetV($: VM, V: Val, P: PropertyKey): ECR<Val> {
  const wrapper = ToObject($, V);
  if (IsAbrupt(wrapper)) return wrapper;
  return yield* wrapper.Get($, P, V);
}

/** 7.3.4 Set ( O, P, V, Throw ) */
export function* Set(
  $: VM,
  O: Obj,
  P: PropertyKey,
  V: Val,
  ShouldThrow: boolean,
): ECR<UNUSED> {
  const success = yield* O.Set($, P, V, O);
  if (!ShouldThrow) return IsAbrupt(success) ? success : UNUSED;
  return OrThrow($, success,
                 () => `Cannot assign to read only property '${String(P)}' of ${DebugString(O)}`);
}

/** 7.3.5 CreateDataProperty ( O, P, V ): the attributes plain assignment would give. */
export function CreateDataProperty($: VM, O: Obj, P: PropertyKey, V: Val): CR<boolean> {
  return O.DefineOwnProperty($, P, propWEC(V));
}

/** 7.3.6 CreateMethodProperty ( O, P, V ) */
export function CreateMethodProperty($: VM, O: Obj, P: PropertyKey, V: Val): UNUSED {
  return CastNotAbrupt(DefinePropertyOrThrow($, O, P, propWC(V)));
}

/** 7.3.7 CreateDataPropertyOrThrow ( O, P, V ) */
export function CreateDataPropertyOrThrow($: VM, O: Obj, P: PropertyKey, V: Val): CR<UNUSED> {
  return OrThrow($, CreateDataProperty($, O, P, V), () => `Cannot define property ${String(P)}`);
}

/** 7.3.8 DefinePropertyOrThrow ( O, P, desc ) */
export function DefinePropertyOrThrow(
  $: VM,
  O: Obj,
  P: PropertyKey,
  desc: PropertyDescriptor,
): CR<UNUSED> {
  return OrThrow($, O.DefineOwnProperty($, P, desc), () => `Cannot redefine property: ${String(P)}`);
}

/** 7.3.9 DeletePropertyOrThrow ( O, P ) */
export function DeletePropertyOrThrow($: VM, O: Obj, P: PropertyKey): CR<UNUSED> {
  return OrThrow($, O.Delete($, P),
                 () => `Cannot delete property '${String(P)}' of ${DebugString(O)}`);
}

/**
 * 7.3.10 GetMethod ( V, P )
 *
 * undefined and null both mean "no method"; anything else must be
 * callable.
 */
export function* GetMethod($: VM, V: Val, P: PropertyKey): ECR<Func|undefined> {
  const candidate = yield* GetV($, V, P);
  if (IsAbrupt(candidate)) return candidate;
  if (candidate == null) return undefined;
  return IsCallable(candidate) ? candidate :
    $.throw('TypeError', `${DebugString(candidate)} is not a function`);
}

/** 7.3.11 HasProperty ( O, P ) */
export function HasProperty($: VM, O: Obj, P: PropertyKey): CR<boolean> {
  return O.HasProperty($, P);
}

/** 7.3.12 HasOwnProperty ( O, P ) */
export function HasOwnProperty($: VM, O: Obj, P: PropertyKey): CR<boolean> {
  const own = O.GetOwnProperty($, P);
  return IsAbrupt(own) ? own : own !== undefined;
}

/** 7.3.13 Call ( F, V [ , argumentsList ] ) */
export function Call($: VM, F: Val, V: Val, argumentsList: Val[] = []): ECR<Val> {
  return IsCallable(F) ? F.Call($, V, argumentsList) :
    just($.throw('TypeError', `${DebugString(F)} is not a function`));
}

/** 7.3.14 Construct ( F [ , argumentsList [ , newTarget ] ] ): newTarget defaults to F. */
export function Construct(
  $: VM,
  F: Val,
  argumentsList: Val[] = [],
  newTarget?: Obj,
): ECR<Obj> {
  return IsConstructor(F) ? F.Construct($, argumentsList, newTarget ?? F) :
    just($.throw('TypeError', `${DebugString(F)} is not a constructor`));
}

/**
 * 7.3.15 SetIntegrityLevel ( O, frozen ), the frozen level only.
 *
 * Stops extension, then pins every own property: accessors become
 * non-configurable and data properties also read-only.  Returns false
 * when O refuses [[PreventExtensions]].
 */
export function FreezeObject($: VM, O: Obj): CR<boolean> {
  const stopped = O.PreventExtensions($);
  if (IsAbrupt(stopped) || !stopped) return stopped;
  const keys = O.OwnPropertyKeys($);
  if (IsAbrupt(keys)) return keys;
  for (const key of keys) {
    const current = O.GetOwnProperty($, key);
    if (IsAbrupt(current)) return current;
    if (current === undefined) continue;
    const pinned: PropertyDescriptor = IsAccessorDescriptor(current) ?
      {Configurable: false} : {Configurable: false, Writable: false};
    const defined = DefinePropertyOrThrow($, O, key, pinned);
    if (IsAbrupt(defined)) return defined;
  }
  return true;
}

/** 7.3.16 TestIntegrityLevel ( O, frozen ): not extensible and every property pinned. */
export function TestFrozen($: VM, O: Obj): CR<boolean> {
  const extensible = O.IsExtensible($);
  if (IsAbrupt(extensible)) return extensible;
  if (extensible) return false;
  const keys = O.OwnPropertyKeys($);
  if (IsAbrupt(keys)) return keys;
  for (const key of keys) {
    const current = O.GetOwnProperty($, key);
    if (IsAbrupt(current)) return current;
    if (current === undefined) continue;
    if (current.Configurable || (IsDataDescriptor(current) && current.Writable)) return false;
  }
  return true;
}

/**
 * 7.3.17 CreateArrayFromList ( elements )
 *
 * The array is fresh, so its elements and length are stored directly.
 */
export function CreateArrayFromList($: VM, elements: readonly Val[]): Obj {
  const array = CastNotAbrupt(ArrayCreate($, 0));
  elements.forEach((element, index) => array.OwnProps.set(String(index), propWEC(element)));
  array.OwnProps.set('length', propW(elements.length));
  return array;
}

/** 7.3.18 LengthOfArrayLike ( obj ) */
export function* LengthOfArrayLike($: VM, obj: Obj): ECR<number> {
  const length = yield* Get($, obj, 'length');
  return IsAbrupt(length) ? length : yield* ToLength($, length);
}

/** 7.3.19 CreateListFromArrayLike ( obj ): reads 0 through length - 1 in order. */
export function* CreateListFromArrayLike($: VM, obj: Val): ECR<Val[]> {
  if (!(obj instanceof Obj)) return $.throw('TypeError', 'CreateListFromArrayLike called on non-object');
  const length = yield* LengthOfArrayLike($, obj);
  if (IsAbrupt(length)) return length;
  const elements: Val[] = [];
  while (elements.length < length) {
    const element = yield* Get($, obj, String(elements.length));
    if (IsAbrupt(element)) return element;
    elements.push(element);
  }
  return elements;
}

/** 7.3.23 EnumerableOwnProperties ( O, key ) */
export function EnumerableOwnKeys($: VM, O: Obj): CR<string[]> {
  const ownKeys = O.OwnPropertyKeys($);
  if (IsAbrupt(ownKeys)) return ownKeys;
  const visible: string[] = [];
  for (const key of ownKeys) {
    if (typeof key !== 'string') continue;
    const own = O.GetOwnProperty($, key);
    if (IsAbrupt(own)) return own;
    if (own?.Enumerable) visible.push(key);
  }
  return visible;
}
