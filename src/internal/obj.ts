import { IsPropertyKey, SameValue } from './abstract_compare';
import { Call, CreateDataProperty, Get } from './abstract_object';
import { Assert } from './assert';
import { CR, IsAbrupt } from './completion_record';
import { HasValueField, IsAccessorDescriptor, IsDataDescriptor, IsGenericDescriptor, PropertyDescriptor, PropertyRecord } from './property_descriptor';
import { PropertyMap, newPropertyMap } from './property_map';
import { memoize } from './util';
import { PropertyKey, Val } from './val';
import type { ECR, VM } from './vm';

/** Internal slots that may be supplied when an object is allocated. */
export interface ObjectSlots {
  Prototype?: Obj|null;
  Extensible?: boolean;
  OwnProps?: PropertyMap;
  ErrorData?: string;
  BooleanData?: boolean;
  NumberData?: number;
  StringData?: string;
  SymbolData?: symbol;
}

/**
 * 6.1.7 The Object Type
 *
 * The essential internal methods every object answers.  Function
 * objects add `Call`, constructors `Construct`; exotic kinds override
 * single methods and keep the ordinary algorithms below for the rest.
 */
export abstract class Obj {
  /** Own properties in creation order. */
  abstract OwnProps: PropertyMap;

  abstract Prototype: Obj|null;
  abstract Extensible: boolean;

  // Error and wrapper slots
  ErrorData?: string;
  BooleanData?: boolean;
  NumberData?: number;
  StringData?: string;
  SymbolData?: symbol;

  abstract GetPrototypeOf($: VM): CR<Obj|null>;
  abstract SetPrototypeOf($: VM, V: Obj|null): CR<boolean>;
  abstract IsExtensible($: VM): CR<boolean>;
  abstract PreventExtensions($: VM): CR<boolean>;
  abstract GetOwnProperty($: VM, P: PropertyKey): CR<PropertyDescriptor|undefined>;
  abstract DefineOwnProperty($: VM, P: PropertyKey, Desc: PropertyDescriptor): CR<boolean>;
  abstract HasProperty($: VM, P: PropertyKey): CR<boolean>;
  abstract Get($: VM, P: PropertyKey, Receiver: Val): ECR<Val>;
  abstract Set($: VM, P: PropertyKey, V: Val, Receiver: Val): ECR<boolean>;
  abstract Delete($: VM, P: PropertyKey): CR<boolean>;
  abstract OwnPropertyKeys($: VM): CR<PropertyKey[]>;

  // Only on functions
  Call?($: VM, thisArgument: Val, argumentsList: Val[]): ECR<Val>;
  Construct?($: VM, argumentsList: Val[], newTarget: Obj): ECR<Obj>;
}

/**
 * 10.1 Ordinary Objects
 *
 * Every internal method delegates to the `Ordinary...` function of the
 * same name, so subclasses can override one method and still reach
 * the ordinary behaviour for the others.
 */
export type OrdinaryObject = InstanceType<ReturnType<typeof OrdinaryObject>>;
export const OrdinaryObject = memoize(() => class OrdinaryObject extends Obj {
  OwnProps: PropertyMap;
  Prototype: Obj|null;
  Extensible: boolean;

  constructor(slots: ObjectSlots = {}, props: PropertyRecord = {}) {
    super();
    this.OwnProps = slots.OwnProps ?? newPropertyMap();
    this.Prototype = slots.Prototype ?? null;
    this.Extensible = slots.Extensible ?? true;
    if (slots.ErrorData != null) this.ErrorData = slots.ErrorData;
    if (slots.BooleanData != null) this.BooleanData = slots.BooleanData;
    if (slots.NumberData != null) this.NumberData = slots.NumberData;
    if (slots.StringData != null) this.StringData = slots.StringData;
    if (slots.SymbolData != null) this.SymbolData = slots.SymbolData;
    for (const key of Reflect.ownKeys(props)) {
      this.OwnProps.set(key, props[key]);
    }
  }

  GetPrototypeOf(_$: VM): CR<Obj|null> {
    return this.Prototype;
  }

  SetPrototypeOf(_$: VM, V: Obj|null): CR<boolean> {
    return OrdinarySetPrototypeOf(this, V);
  }

  IsExtensible(_$: VM): CR<boolean> {
    return this.Extensible;
  }

  PreventExtensions(_$: VM): CR<boolean> {
    this.Extensible = false;
    return true;
  }

  GetOwnProperty(_$: VM, P: PropertyKey): CR<PropertyDescriptor|undefined> {
    return OrdinaryGetOwnProperty(this, P);
  }

  DefineOwnProperty($: VM, P: PropertyKey, Desc: PropertyDescriptor): CR<boolean> {
    return OrdinaryDefineOwnProperty($, this, P, Desc);
  }

  HasProperty($: VM, P: PropertyKey): CR<boolean> {
    return OrdinaryHasProperty($, this, P);
  }

  Get($: VM, P: PropertyKey, Receiver: Val): ECR<Val> {
    return OrdinaryGet($, this, P, Receiver);
  }

  Set($: VM, P: PropertyKey, V: Val, Receiver: Val): ECR<boolean> {
    return OrdinarySet($, this, P, V, Receiver);
  }

  Delete($: VM, P: PropertyKey): CR<boolean> {
    return OrdinaryDelete($, this, P);
  }

  OwnPropertyKeys(_$: VM): CR<PropertyKey[]> {
    return OrdinaryOwnPropertyKeys(this);
  }
});

/**
 * 10.1.2.1 OrdinarySetPrototypeOf ( O, V )
 *
 * Refuses a change that would close a cycle.  The walk stops at the
 * first object with a non-ordinary [[GetPrototypeOf]].
 */
export function OrdinarySetPrototypeOf(O: Obj, V: Obj|null): boolean {
  if (SameValue(V, O.Prototype)) return true;
  if (!O.Extensible) return false;
  const ordinaryGetPrototypeOf = OrdinaryObject().prototype.GetPrototypeOf;
  for (let p = V; p != null; p = p.Prototype) {
    if (p === O) return false;
    if (p.GetPrototypeOf !== ordinaryGetPrototypeOf) break;
  }
  O.Prototype = V;
  return true;
}

/** 10.1.5.1 OrdinaryGetOwnProperty: a copy, so callers may not mutate the stored property. */
export function OrdinaryGetOwnProperty(O: Obj, P: PropertyKey): PropertyDescriptor|undefined {
  const X = O.OwnProps.get(P);
  if (X == null) return undefined;
  const {Enumerable, Configurable} = X;
  if (IsDataDescriptor(X)) return {Value: X.Value, Writable: X.Writable, Enumerable, Configurable};
  Assert(IsAccessorDescriptor(X));
  return {Get: X.Get, Set: X.Set, Enumerable, Configurable};
}

export function OrdinaryDefineOwnProperty($: VM, O: Obj, P: PropertyKey,
                                          Desc: PropertyDescriptor): CR<boolean> {
  const current = O.GetOwnProperty($, P);
  if (IsAbrupt(current)) return current;
  const extensible = O.IsExtensible($);
  if (IsAbrupt(extensible)) return extensible;
  return ValidateAndApplyPropertyDescriptor(O, P, extensible, Desc, current);
}

/**
 * Whether `Desc` may change a non-configurable property `current`: it
 * may not make it configurable, flip enumerability or kind, swap
 * accessors, or alter a read-only value (an identical value is
 * allowed).
 */
function mayRedefinePinned(current: PropertyDescriptor, Desc: PropertyDescriptor): boolean {
  if (Desc.Configurable) return false;
  if (Desc.Enumerable != null && Desc.Enumerable !== current.Enumerable) return false;
  if (IsGenericDescriptor(Desc)) return true;
  if (IsAccessorDescriptor(Desc) !== IsAccessorDescriptor(current)) return false;
  if (IsAccessorDescriptor(current)) {
    return !('Get' in Desc && !SameValue(Desc.Get, current.Get)) &&
      !('Set' in Desc && !SameValue(Desc.Set, current.Set));
  }
  if (current.Writable) return true;
  return !Desc.Writable && !(HasValueField(Desc) && !SameValue(Desc.Value, current.Value));
}

/**
 * 10.1.6.3 ValidateAndApplyPropertyDescriptor ( O, P, extensible, Desc, current )
 *
 * The one validation path behind both lenient definitions (which see
 * `false`) and throwing ones such as DefinePropertyOrThrow.  With `O`
 * undefined nothing is written.  Fields missing from `Desc` default to
 * false/undefined on a new property and keep their value on an
 * existing one; a kind change takes only the shared attributes from
 * `current`.
 */
export function ValidateAndApplyPropertyDescriptor(
  O: Obj|undefined,
  P: PropertyKey,
  extensible: boolean,
  Desc: PropertyDescriptor,
  current: PropertyDescriptor|undefined,
): boolean {
  Assert(IsPropertyKey(P));
  if (current == undefined) {
    if (!extensible) return false;
    O?.OwnProps.set(P, withKindOf(Desc, {Enumerable: false, Configurable: false}));
    return true;
  }
  Assert(IsDataDescriptor(current) || IsAccessorDescriptor(current));
  if (Object.keys(Desc).length === 0) return true;
  if (!current.Configurable && !mayRedefinePinned(current, Desc)) return false;
  if (O == undefined) return true;

  const kindChanges = IsAccessorDescriptor(Desc) ? IsDataDescriptor(current) :
    IsDataDescriptor(Desc) && IsAccessorDescriptor(current);
  if (kindChanges) {
    O.OwnProps.set(P, withKindOf(Desc, current));
  } else {
    const merged: PropertyDescriptor = {...current};
    for (const field of FIELDS) copyField(merged, Desc, field);
    O.OwnProps.set(P, merged);
  }
  return true;
}

/** A complete descriptor of `Desc`'s kind, with enumerable and configurable falling back to `shared`. */
function withKindOf(Desc: PropertyDescriptor, shared: PropertyDescriptor): PropertyDescriptor {
  const Enumerable = Desc.Enumerable ?? shared.Enumerable;
  const Configurable = Desc.Configurable ?? shared.Configurable;
  return IsAccessorDescriptor(Desc) ?
    {Get: Desc.Get, Set: Desc.Set, Enumerable, Configurable} :
    {Value: Desc.Value, Writable: Desc.Writable ?? false, Enumerable, Configurable};
}

const FIELDS = ['Value', 'Writable', 'Get', 'Set', 'Enumerable', 'Configurable'] as const;

function copyField<K extends typeof FIELDS[number]>(
  target: PropertyDescriptor,
  source: PropertyDescriptor,
  field: K,
): void {
  const present = field === 'Value' || field === 'Get' || field === 'Set' ?
    field in source : source[field] != null;
  if (present) target[field] = source[field];
}

export function OrdinaryHasProperty($: VM, O: Obj, P: PropertyKey): CR<boolean> {
  const hasOwn = O.GetOwnProperty($, P);
  if (IsAbrupt(hasOwn)) return hasOwn;
  if (hasOwn != undefined) return true;
  const parent = O.GetPrototypeOf($);
  if (IsAbrupt(parent)) return parent;
  return parent != null && parent.HasProperty($, P);
}

/** 10.1.8.1 OrdinaryGet: getters run with Receiver as `this`. */
export function* OrdinaryGet($: VM, O: Obj, P: PropertyKey, Receiver: Val): ECR<Val> {
  const desc = O.GetOwnProperty($, P);
  if (IsAbrupt(desc)) return desc;
  if (desc == undefined) {
    const parent = O.GetPrototypeOf($);
    if (IsAbrupt(parent)) return parent;
    return parent == null ? undefined : yield* parent.Get($, P, Receiver);
  }
  if (IsDataDescriptor(desc)) return desc.Value;
  return desc.Get == undefined ? undefined : yield* Call($, desc.Get, Receiver);
}

export function* OrdinarySet($: VM, O: Obj, P: PropertyKey, V: Val, Receiver: Val): ECR<boolean> {
  const ownDesc = O.GetOwnProperty($, P);
  if (IsAbrupt(ownDesc)) return ownDesc;
  return yield* OrdinarySetWithOwnDescriptor($, O, P, V, Receiver, ownDesc);
}

/**
 * 10.1.9.2 OrdinarySetWithOwnDescriptor ( O, P, V, Receiver, ownDesc )
 *
 * Accessors found anywhere on the chain run with Receiver as `this`;
 * data properties are always written onto Receiver, never onto the
 * prototype where they were found.  A read-only inherited property
 * blocks the write.
 */
export function* OrdinarySetWithOwnDescriptor(
  $: VM,
  O: Obj,
  P: PropertyKey,
  V: Val,
  Receiver: Val,
  ownDesc: PropertyDescriptor|undefined,
): ECR<boolean> {
  if (ownDesc == undefined) {
    const parent = O.GetPrototypeOf($);
    if (IsAbrupt(parent)) return parent;
    if (parent != null) return yield* parent.Set($, P, V, Receiver);
    ownDesc = {Value: undefined, Writable: true, Enumerable: true, Configurable: true};
  }
  if (IsAccessorDescriptor(ownDesc)) {
    if (ownDesc.Set == undefined) return false;
    const result = yield* Call($, ownDesc.Set, Receiver, [V]);
    return IsAbrupt(result) ? result : true;
  }
  if (!ownDesc.Writable || !(Receiver instanceof Obj)) return false;
  const existing = Receiver.GetOwnProperty($, P);
  if (IsAbrupt(existing)) return existing;
  if (existing == undefined) return CreateDataProperty($, Receiver, P, V);
  if (IsAccessorDescriptor(existing) || !existing.Writable) return false;
  return Receiver.DefineOwnProperty($, P, {Value: V});
}

/** 10.1.10.1 OrdinaryDelete: a missing property counts as deleted. */
export function OrdinaryDelete($: VM, O: Obj, P: PropertyKey): CR<boolean> {
  const desc = O.GetOwnProperty($, P);
  if (IsAbrupt(desc)) return desc;
  if (desc == undefined) return true;
  return desc.Configurable === true && O.OwnProps.delete(P);
}

/**
 * 10.1.11.1 OrdinaryOwnPropertyKeys ( O )
 *
 * Array indices in numeric order, then other strings, then symbols,
 * each group in creation order.
 */
export function OrdinaryOwnPropertyKeys(O: Obj): PropertyKey[] {
  const names: string[] = [];
  const indices: number[] = [];
  const symbols: symbol[] = [];
  for (const key of O.OwnProps.keys()) {
    if (typeof key === 'symbol') {
      symbols.push(key);
    } else if (isArrayIndexKey(key)) {
      indices.push(Number(key));
    } else {
      names.push(key);
    }
  }
  return [...indices.sort((a, b) => a - b).map(String), ...names, ...symbols];
}

/** Canonical array index: "0" or a decimal without leading zeros below 2^32 - 1. */
export function isArrayIndexKey(key: string): boolean {
  return (key === '0' || /^[1-9][0-9]*$/.test(key)) && Number(key) < 2 ** 32 - 1;
}

/**
 * 10.1.12 OrdinaryObjectCreate ( proto [ , additionalInternalSlotsList ] )
 *
 * The prototype and any extra slots are passed together as `slots`;
 * `props` seeds own properties without going through validation.
 */
export function OrdinaryObjectCreate(
  slots: ObjectSlots = {},
  props: PropertyRecord = {},
): OrdinaryObject {
  return new (OrdinaryObject())(slots, props);
}

export function* OrdinaryCreateFromConstructor(
  $: VM,
  constructor: Obj,
  intrinsicDefaultProto: string,
  slots: ObjectSlots = {},
): ECR<OrdinaryObject> {
  const proto = yield* GetPrototypeFromConstructor($, constructor, intrinsicDefaultProto);
  if (IsAbrupt(proto)) return proto;
  return OrdinaryObjectCreate({...slots, Prototype: proto});
}

/**
 * 10.1.14 GetPrototypeFromConstructor ( constructor, intrinsicDefaultProto )
 *
 * `constructor.prototype` when it is an object, otherwise the named
 * intrinsic of the running realm.
 */
export function* GetPrototypeFromConstructor(
  $: VM,
  constructor: Obj,
  intrinsicDefaultProto: string,
): ECR<Obj> {
  const proto = yield* Get($, constructor, 'prototype');
  if (IsAbrupt(proto)) return proto;
  return proto instanceof Obj ? proto : $.getIntrinsic(intrinsicDefaultProto);
}
