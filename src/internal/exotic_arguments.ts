import { SameValue } from './abstract_compare';
import { CreateDataPropertyOrThrow } from './abstract_object';
import { CR, CastNotAbrupt, IsAbrupt } from './completion_record';
import { DeclarativeEnvironmentRecord } from './environment_record';
import type { Func } from './func';
import { ObjectSlots, OrdinaryDefineOwnProperty, OrdinaryDelete, OrdinaryGet, OrdinaryGetOwnProperty, OrdinaryObject, OrdinarySet } from './obj';
import { HasValueField, IsAccessorDescriptor, IsDataDescriptor, PropertyDescriptor, accessor, propWC } from './property_descriptor';
import { memoize } from './util';
import { PropertyKey, Val } from './val';
import { ECR, VM, runImmediate } from './vm';

/**
 * 10.4.4 Arguments Exotic Objects
 *
 * In a mapped arguments object, each index below both the argument
 * count and the parameter count aliases a parameter binding: reads
 * and writes go through to the function environment until the index
 * is deleted, made an accessor, or made read-only.  Unmapped objects
 * (strict code, or non-simple parameter lists) have no ParameterMap
 * and behave as ordinary objects.
 */
export type ArgumentsObject = InstanceType<ReturnType<typeof ArgumentsObject>>;
export const ArgumentsObject = memoize(() => class ArgumentsObject extends OrdinaryObject() {
  /**
   * Index to parameter name.  An entry is removed once the index is
   * deleted or redefined as an accessor or as non-writable.
   */
  readonly ParameterMap: Map<string, string>|undefined;
  /** The function environment holding the mapped parameters. */
  readonly Environment: DeclarativeEnvironmentRecord|undefined;

  constructor(
    slots: ObjectSlots,
    ParameterMap?: Map<string, string>,
    Environment?: DeclarativeEnvironmentRecord,
  ) {
    super(slots);
    this.ParameterMap = ParameterMap;
    this.Environment = Environment;
  }

  isMapped(P: PropertyKey): boolean {
    return typeof P === 'string' && this.ParameterMap?.has(P) === true;
  }

  unmap(P: PropertyKey): void {
    if (typeof P === 'string') this.ParameterMap?.delete(P);
  }

  mappedValue($: VM, P: PropertyKey): Val {
    const name = typeof P === 'string' ? this.ParameterMap?.get(P) : undefined;
    if (name == null || !this.Environment) return undefined;
    return CastNotAbrupt(runImmediate(this.Environment.GetBindingValue($, name, false)));
  }

  setMapped($: VM, P: PropertyKey, V: Val): void {
    const name = typeof P === 'string' ? this.ParameterMap?.get(P) : undefined;
    if (name == null || !this.Environment) return;
    CastNotAbrupt(runImmediate(this.Environment.SetMutableBinding($, name, V, false)));
  }

  /** Mapped indices report the live parameter value. */
  override GetOwnProperty($: VM, P: PropertyKey): CR<PropertyDescriptor|undefined> {
    const desc = OrdinaryGetOwnProperty(this, P);
    if (desc == undefined) return undefined;
    if (this.isMapped(P)) desc.Value = this.mappedValue($, P);
    return desc;
  }

  /**
 * 10.4.4.2 [[DefineOwnProperty]] ( P, Desc )
 *
 * Making a mapped index read-only without a value freezes the current
 * parameter value into the property before the link is dropped.
 */
  override DefineOwnProperty($: VM, P: PropertyKey, Desc: PropertyDescriptor): CR<boolean> {
    const isMapped = this.isMapped(P);
    let newArgDesc = Desc;
    if (isMapped && IsDataDescriptor(Desc)) {
      if (!HasValueField(Desc) && Desc.Writable === false) {
        newArgDesc = {...Desc, Value: this.mappedValue($, P)};
      }
    }
    const allowed = OrdinaryDefineOwnProperty($, this, P, newArgDesc);
    if (IsAbrupt(allowed) || !allowed) return allowed;
    if (isMapped) {
      if (IsAccessorDescriptor(Desc)) {
        this.unmap(P);
      } else {
        if (HasValueField(Desc)) this.setMapped($, P, Desc.Value);
        if (Desc.Writable === false) this.unmap(P);
      }
    }
    return true;
  }

  override * Get($: VM, P: PropertyKey, Receiver: Val): ECR<Val> {
    if (!this.isMapped(P)) return yield* OrdinaryGet($, this, P, Receiver);
    return this.mappedValue($, P);
  }

  /** The parameter is written only when the arguments object is the receiver. */
  override * Set($: VM, P: PropertyKey, V: Val, Receiver: Val): ECR<boolean> {
    if (SameValue(this, Receiver) && this.isMapped(P)) this.setMapped($, P, V);
    return yield* OrdinarySet($, this, P, V, Receiver);
  }

  override Delete($: VM, P: PropertyKey): CR<boolean> {
    const isMapped = this.isMapped(P);
    const result = OrdinaryDelete($, this, P);
    if (IsAbrupt(result)) return result;
    if (result && isMapped) this.unmap(P);
    return result;
  }
});

/**
 * 10.4.4.6 CreateUnmappedArgumentsObject ( argumentsList )
 *
 * `callee` is the poisoned %ThrowTypeError% accessor.
 */
export function CreateUnmappedArgumentsObject($: VM, argumentsList: Val[]): ArgumentsObject {
  const obj = new (ArgumentsObject())({Prototype: $.getIntrinsic('%Object.prototype%')});
  obj.OwnProps.set('length', propWC(argumentsList.length));
  for (let index = 0; index < argumentsList.length; index++) {
    CastNotAbrupt(CreateDataPropertyOrThrow($, obj, String(index), argumentsList[index]));
  }
  obj.OwnProps.set(Symbol.iterator, propWC($.getIntrinsic('%Array.prototype.values%')));
  const thrower = $.getIntrinsic('%ThrowTypeError%');
  obj.OwnProps.set('callee', accessor(thrower, thrower, false, false));
  return obj;
}

/**
 * 10.4.4.7 CreateMappedArgumentsObject ( func, formals, argumentsList, env )
 *
 * `formals` may repeat a name; only its last occurrence is mapped.
 * Indices past the argument count are never mapped.
 */
export function CreateMappedArgumentsObject(
  $: VM,
  func: Func,
  formals: readonly string[],
  argumentsList: Val[],
  env: DeclarativeEnvironmentRecord,
): ArgumentsObject {
  const len = argumentsList.length;
  const map = new Map<string, string>();
  const obj = new (ArgumentsObject())({Prototype: $.getIntrinsic('%Object.prototype%')}, map, env);
  for (let index = 0; index < len; index++) {
    CastNotAbrupt(CreateDataPropertyOrThrow($, obj, String(index), argumentsList[index]));
  }
  obj.OwnProps.set('length', propWC(len));
  const mappedNames = new Set<string>();
  for (let index = formals.length - 1; index >= 0; index--) {
    const name = formals[index];
    if (mappedNames.has(name)) continue;
    mappedNames.add(name);
    if (index < len) map.set(String(index), name);
  }
  obj.OwnProps.set(Symbol.iterator, propWC($.getIntrinsic('%Array.prototype.values%')));
  obj.OwnProps.set('callee', propWC(func));
  return obj;
}
