import { IsCallable } from './abstract_compare';
import { ToBoolean } from './abstract_conversion';
import { Get, HasProperty } from './abstract_object';
import { IsAbrupt } from './completion_record';
import { UNUSED } from './enums';
import { Obj, OrdinaryObjectCreate } from './obj';
import { PropertyKey, Val } from './val';
import { ECR, VM } from './vm';

export type PropertyRecord = Record<PropertyKey, PropertyDescriptor>;

/**
 * 6.2.6 Property Descriptors
 *
 * Which fields are present decides the kind: [[Value]] or [[Writable]]
 * makes a data descriptor, [[Get]] or [[Set]] an accessor, and neither
 * a generic one.  `{Get: undefined}` is still an accessor, so the
 * value-carrying fields are tested with `in`; the boolean attributes
 * count as present when they are not undefined.
 */
export interface PropertyDescriptor {
  Enumerable?: boolean;
  Configurable?: boolean;
  Writable?: boolean;
  Value?: Val;
  Get?: Obj|undefined;
  Set?: Obj|undefined;
}

export interface DataDescriptor extends PropertyDescriptor {
  Get?: undefined;
  Set?: undefined;
}
export interface AccessorDescriptor extends PropertyDescriptor {
  Writable?: undefined;
  Value?: undefined;
}

type DescriptorField = keyof PropertyDescriptor;

/** Script-side attribute names, in the order ToPropertyDescriptor reads them. */
const ATTRIBUTES = [
  ['enumerable', 'Enumerable'],
  ['configurable', 'Configurable'],
  ['value', 'Value'],
  ['writable', 'Writable'],
  ['get', 'Get'],
  ['set', 'Set'],
] as const;

function hasField(Desc: PropertyDescriptor, field: DescriptorField): boolean {
  switch (field) {
    case 'Value': case 'Get': case 'Set': return field in Desc;
    default: return Desc[field] != null;
  }
}

export function HasValueField(Desc: PropertyDescriptor): boolean {
  return hasField(Desc, 'Value');
}

export function IsAccessorDescriptor(
  Desc: PropertyDescriptor|undefined,
): Desc is AccessorDescriptor {
  return Desc != null && (hasField(Desc, 'Get') || hasField(Desc, 'Set'));
}

export function IsDataDescriptor(Desc: PropertyDescriptor|undefined): Desc is DataDescriptor {
  return Desc != null && (hasField(Desc, 'Value') || hasField(Desc, 'Writable'));
}

export function IsGenericDescriptor(Desc: PropertyDescriptor|undefined): boolean {
  return Desc != null && !IsAccessorDescriptor(Desc) && !IsDataDescriptor(Desc);
}

/**
 * 6.2.6.4 FromPropertyDescriptor ( Desc )
 *
 * Present fields become plain data properties, in the order value,
 * writable, get, set, enumerable, configurable.
 */
export function FromPropertyDescriptor(
  $: VM,
  Desc: PropertyDescriptor|undefined,
): Obj|undefined {
  if (Desc == null) return undefined;
  const props: PropertyRecord = {};
  for (const [name, field] of [...ATTRIBUTES.slice(2), ...ATTRIBUTES.slice(0, 2)]) {
    if (hasField(Desc, field)) props[name] = propWEC(Desc[field]);
  }
  return OrdinaryObjectCreate({Prototype: $.getIntrinsic('%Object.prototype%')}, props);
}

/**
 * 6.2.6.5 ToPropertyDescriptor ( Obj )
 *
 * Every attribute is looked up with HasProperty and then Get, so
 * inherited attributes and getters on the descriptor object count.
 */
export function* ToPropertyDescriptor($: VM, obj: Val): ECR<PropertyDescriptor> {
  if (!(obj instanceof Obj)) {
    return $.throw('TypeError', 'Property description must be an object');
  }
  const desc: PropertyDescriptor = {};
  for (const [name, field] of ATTRIBUTES) {
    const present = HasProperty($, obj, name);
    if (IsAbrupt(present)) return present;
    if (!present) continue;
    const value = yield* Get($, obj, name);
    if (IsAbrupt(value)) return value;
    switch (field) {
      case 'Value':
        desc.Value = value;
        break;
      case 'Get':
      case 'Set':
        if (value !== undefined && !IsCallable(value)) {
          return $.throw('TypeError', `${field === 'Get' ? 'Getter' : 'Setter'} must be a function`);
        }
        desc[field] = value;
        break;
      default:
        desc[field] = ToBoolean(value);
    }
  }
  if (IsAccessorDescriptor(desc) && IsDataDescriptor(desc)) {
    return $.throw('TypeError',
                   'Invalid property descriptor. Cannot both specify accessors and a value or writable attribute');
  }
  return desc;
}

/**
 * 6.2.6.6 CompletePropertyDescriptor ( Desc )
 *
 * Missing fields default to undefined or false; a generic descriptor
 * is completed as a data descriptor.
 */
export function CompletePropertyDescriptor(Desc: PropertyDescriptor): UNUSED {
  if (IsAccessorDescriptor(Desc)) {
    if (!hasField(Desc, 'Get')) Desc.Get = undefined;
    if (!hasField(Desc, 'Set')) Desc.Set = undefined;
  } else {
    if (!hasField(Desc, 'Value')) Desc.Value = undefined;
    Desc.Writable ??= false;
  }
  Desc.Enumerable ??= false;
  Desc.Configurable ??= false;
  return UNUSED;
}

/*
 * Data descriptor shorthands.  The suffix lists the attributes that
 * are true: W(ritable), E(numerable), C(onfigurable); prop0 has none.
 */
function data(Value: Val, Writable: boolean, Enumerable: boolean, Configurable: boolean): PropertyDescriptor {
  return {Value, Writable, Enumerable, Configurable};
}
export function propWEC(v: Val): PropertyDescriptor { return data(v, true, true, true); }
export function propWC(v: Val): PropertyDescriptor { return data(v, true, false, true); }
export function propC(v: Val): PropertyDescriptor { return data(v, false, false, true); }
export function propE(v: Val): PropertyDescriptor { return data(v, false, true, false); }
export function propW(v: Val): PropertyDescriptor { return data(v, true, false, false); }
export function prop0(v: Val): PropertyDescriptor { return data(v, false, false, false); }

/** Accessor property; non-enumerable and configurable unless overridden. */
export function accessor(
  Get: Obj|undefined,
  Set: Obj|undefined,
  Enumerable = false,
  Configurable = true,
): PropertyDescriptor {
  return {Get, Set, Enumerable, Configurable};
}

export function methodName(k: PropertyKey): string {
  return typeof k === 'symbol' ? `[${k.description ?? ''}]` : k;
}
