import { IsCallable, SameValue } from './abstract_compare';
import { ToObject, ToPropertyKey } from './abstract_conversion';
import { Call, CreateArrayFromList, CreateListFromArrayLike, DefinePropertyOrThrow, EnumerableOwnKeys, FreezeObject, Get, HasOwnProperty, TestFrozen } from './abstract_object';
import { CR, CastNotAbrupt, IsAbrupt } from './completion_record';
import { ArgumentsObject } from './exotic_arguments';
import { IsArray } from './exotic_array';
import { CreateBuiltinFunction, Func, MakeThrowTypeError, callOrConstruct, method, methodS } from './func';
import { Obj, OrdinaryCreateFromConstructor, OrdinaryObjectCreate } from './obj';
import { FromPropertyDescriptor, PropertyDescriptor, ToPropertyDescriptor, propWC } from './property_descriptor';
import { RealmBuilder } from './realm_record';
import { PropertyKey, Val } from './val';
import { DebugString, ECR, Plugin, VM, functionName } from './vm';

export const objectAndFunctionPrototype: Plugin = {
  id: 'objectAndFunctionPrototype',
  intrinsics: CreatePrototypeIntrinsics,
};

export const objectConstructor: Plugin = {
  id: 'objectConstructor',
  deps: () => [objectAndFunctionPrototype],
  intrinsics: CreateObjectIntrinsics,
};

export const prelude: Plugin = {
  id: 'prelude',
  deps: () => [objectAndFunctionPrototype, objectConstructor],
};

/**
 * %Object.prototype% and %Function.prototype% are the roots every
 * other intrinsic hangs off, so they are registered before any of
 * their methods exist.
 */
export function CreatePrototypeIntrinsics(b: RealmBuilder): void {
  const objectPrototype = b.register('%Object.prototype%', OrdinaryObjectCreate());
  const functionPrototype = b.register('%Function.prototype%', CreateBuiltinFunction(
    {* Call() { return undefined; }}, 0, '', b.realm, objectPrototype));

  // Shared getter/setter of every poisoned caller, arguments and
  // callee property.
  b.register('%ThrowTypeError%', MakeThrowTypeError(b.realm, functionPrototype));

  const objectToString = b.register('%Object.prototype.toString%', CreateBuiltinFunction(
    {Call: ObjectPrototypeToString}, 0, 'toString', b.realm));

  b.members(objectPrototype, {
    /** 20.1.3.2 Object.prototype.hasOwnProperty ( V ) */
    'hasOwnProperty': method(function*($, thisValue, V) {
      const key = yield* ToPropertyKey($, V);
      if (IsAbrupt(key)) return key;
      const O = ToObject($, thisValue);
      return IsAbrupt(O) ? O : HasOwnProperty($, O, key);
    }),
    'toString': propWC(objectToString),
    /** 20.1.3.7 Object.prototype.valueOf ( ) */
    'valueOf': method(function*($, thisValue) {
      return ToObject($, thisValue);
    }),
  });

  b.members(functionPrototype, {
    'apply': method(FunctionPrototypeApply),
    'call': method(FunctionPrototypeCall, 1),
    'toString': method(FunctionPrototypeToString),
  });
}

/** 20.1.1 The Object Constructor */
export function CreateObjectIntrinsics(b: RealmBuilder): void {
  const objectPrototype = b.intrinsic('%Object.prototype%');
  const objectCtor = CreateBuiltinFunction(
    callOrConstruct(function*($, NewTarget, value) {
      // Subclass construction goes through NewTarget's prototype.
      if (NewTarget !== undefined && NewTarget !== $.getActiveFunctionObject()) {
        return yield* OrdinaryCreateFromConstructor($, NewTarget, '%Object.prototype%');
      }
      return value == null ? OrdinaryObjectCreate({Prototype: objectPrototype}) : ToObject($, value);
    }),
    1, 'Object', b.realm);
  b.constructorPair('Object', objectCtor, objectPrototype);

  b.members(objectCtor, {
    'create': methodS(ObjectCtorCreate),
    'defineProperties': methodS(function*($, O, Properties) {
      const target = DefinitionTarget($, O, 'defineProperties');
      if (IsAbrupt(target)) return target;
      return yield* ObjectDefineProperties($, target, Properties);
    }),
    'defineProperty': methodS(ObjectCtorDefineProperty),
    'freeze': methodS(function*($, O) {
      if (!(O instanceof Obj)) return O;
      const frozen = FreezeObject($, O);
      if (IsAbrupt(frozen)) return frozen;
      return frozen ? O : $.throw('TypeError', `Cannot freeze ${DebugString(O)}`);
    }),
    'getOwnPropertyDescriptor': methodS(ObjectCtorGetOwnPropertyDescriptor),
    'getOwnPropertyNames': methodS(function*($, O) {
      const obj = ToObject($, O);
      if (IsAbrupt(obj)) return obj;
      const keys = obj.OwnPropertyKeys($);
      if (IsAbrupt(keys)) return keys;
      return CreateArrayFromList($, keys.filter((k) => typeof k === 'string'));
    }),
    'getPrototypeOf': methodS(function*($, O) {
      const obj = ToObject($, O);
      return IsAbrupt(obj) ? obj : obj.GetPrototypeOf($);
    }),
    'is': methodS(function*(_$, value1, value2) {
      return SameValue(value1, value2);
    }),
    'isExtensible': methodS(function*($, O) {
      return O instanceof Obj ? O.IsExtensible($) : false;
    }),
    'isFrozen': methodS(function*($, O) {
      return O instanceof Obj ? TestFrozen($, O) : true;
    }),
    'keys': methodS(function*($, O) {
      const obj = ToObject($, O);
      if (IsAbrupt(obj)) return obj;
      const keys = EnumerableOwnKeys($, obj);
      return IsAbrupt(keys) ? keys : CreateArrayFromList($, keys);
    }),
    'setPrototypeOf': methodS(ObjectCtorSetPrototypeOf),
  });
}

function ValidPrototype($: VM, proto: Val): CR<Obj|null> {
  if (proto === null || proto instanceof Obj) return proto;
  return $.throw('TypeError', `Object prototype may only be an object or null: ${DebugString(proto)}`);
}

function DefinitionTarget($: VM, O: Val, api: string): CR<Obj> {
  return O instanceof Obj ? O : $.throw('TypeError', `Object.${api} called on non-object`);
}

/** 20.1.2.2 Object.create ( O, Properties ) */
export function* ObjectCtorCreate($: VM, O: Val, Properties: Val): ECR<Val> {
  const proto = ValidPrototype($, O);
  if (IsAbrupt(proto)) return proto;
  const obj = OrdinaryObjectCreate({Prototype: proto});
  return Properties === undefined ? obj : yield* ObjectDefineProperties($, obj, Properties);
}

/**
 * 20.1.2.3.1 ObjectDefineProperties ( O, Properties )
 *
 * Every enumerable own entry of Properties is converted before the
 * first definition, so a malformed entry leaves O untouched.
 */
export function* ObjectDefineProperties($: VM, O: Obj, Properties: Val): ECR<Obj> {
  const pending = yield* ReadDescriptorTable($, Properties);
  if (IsAbrupt(pending)) return pending;
  for (const [key, desc] of pending) {
    const status = DefinePropertyOrThrow($, O, key, desc);
    if (IsAbrupt(status)) return status;
  }
  return O;
}

function* ReadDescriptorTable($: VM, Properties: Val): ECR<Map<PropertyKey, PropertyDescriptor>> {
  const source = ToObject($, Properties);
  if (IsAbrupt(source)) return source;
  const keys = source.OwnPropertyKeys($);
  if (IsAbrupt(keys)) return keys;
  const table = new Map<PropertyKey, PropertyDescriptor>();
  for (const key of keys) {
    const own = source.GetOwnProperty($, key);
    if (IsAbrupt(own)) return own;
    if (!own?.Enumerable) continue;
    const attributes = yield* Get($, source, key);
    if (IsAbrupt(attributes)) return attributes;
    const desc = yield* ToPropertyDescriptor($, attributes);
    if (IsAbrupt(desc)) return desc;
    table.set(key, desc);
  }
  return table;
}

/** 20.1.2.4 Object.defineProperty ( O, P, Attributes ) */
export function* ObjectCtorDefineProperty($: VM, O: Val, P: Val, Attributes: Val): ECR<Val> {
  const target = DefinitionTarget($, O, 'defineProperty');
  if (IsAbrupt(target)) return target;
  const key = yield* ToPropertyKey($, P);
  if (IsAbrupt(key)) return key;
  const desc = yield* ToPropertyDescriptor($, Attributes);
  if (IsAbrupt(desc)) return desc;
  const status = DefinePropertyOrThrow($, target, key, desc);
  return IsAbrupt(status) ? status : target;
}

/**
 * 20.1.2.8 Object.getOwnPropertyDescriptor ( O, P )
 *
 * P goes through ToPropertyKey, so `0.000001` finds "0.000001".
 */
export function* ObjectCtorGetOwnPropertyDescriptor($: VM, O: Val, P: Val): ECR<Val> {
  const obj = ToObject($, O);
  if (IsAbrupt(obj)) return obj;
  const key = yield* ToPropertyKey($, P);
  if (IsAbrupt(key)) return key;
  const desc = obj.GetOwnProperty($, key);
  return IsAbrupt(desc) ? desc : FromPropertyDescriptor($, desc);
}

/** 20.1.2.22 Object.setPrototypeOf ( O, proto ) */
export function* ObjectCtorSetPrototypeOf($: VM, O: Val, proto: Val): ECR<Val> {
  if (O == null) {
    return $.throw('TypeError', 'Object.setPrototypeOf called on null or undefined');
  }
  const parent = ValidPrototype($, proto);
  if (IsAbrupt(parent)) return parent;
  if (!(O instanceof Obj)) return O;
  const status = O.SetPrototypeOf($, parent);
  if (IsAbrupt(status)) return status;
  return status ? O : $.throw('TypeError', `Cannot set prototype of ${DebugString(O)}`);
}

/**
 * 20.1.3.6 Object.prototype.toString ( )
 *
 * The builtin tag is decided by internal slots; a string
 * @@toStringTag found through Get overrides it.
 */
export function* ObjectPrototypeToString($: VM, thisValue: Val): ECR<Val> {
  if (thisValue === undefined) return '[object Undefined]';
  if (thisValue === null) return '[object Null]';
  const O = CastNotAbrupt(ToObject($, thisValue));
  const tag = yield* Get($, O, Symbol.toStringTag);
  if (IsAbrupt(tag)) return tag;
  return `[object ${typeof tag === 'string' ? tag : builtinTag(O)}]`;
}

function builtinTag(O: Obj): string {
  if (IsArray(O)) return 'Array';
  if (O instanceof ArgumentsObject()) return 'Arguments';
  if (IsCallable(O)) return 'Function';
  if (O.ErrorData != null) return 'Error';
  if (O.BooleanData != null) return 'Boolean';
  if (O.NumberData != null) return 'Number';
  if (O.StringData != null) return 'String';
  return 'Object';
}

function CallableReceiver($: VM, func: Val, api: string): CR<Func> {
  if (IsCallable(func)) return func;
  return $.throw('TypeError', `Function.prototype.${api} was called on ${DebugString(func)}, which is not a function`);
}

/** 20.2.3.1 Function.prototype.apply ( thisArg, argArray ) */
export function* FunctionPrototypeApply($: VM, thisValue: Val, thisArg: Val, argArray: Val): ECR<Val> {
  const func = CallableReceiver($, thisValue, 'apply');
  if (IsAbrupt(func)) return func;
  if (argArray == null) return yield* Call($, func, thisArg);
  const args = yield* CreateListFromArrayLike($, argArray);
  return IsAbrupt(args) ? args : yield* Call($, func, thisArg, args);
}

/** 20.2.3.3 Function.prototype.call ( thisArg, ...args ) */
export function* FunctionPrototypeCall($: VM, thisValue: Val, thisArg: Val, ...args: Val[]): ECR<Val> {
  const func = CallableReceiver($, thisValue, 'call');
  if (IsAbrupt(func)) return func;
  return yield* Call($, func, thisArg, args);
}

/**
 * 20.2.3.5 Function.prototype.toString ( )
 *
 * Bodies are host closures, so everything renders as native code.
 */
export function* FunctionPrototypeToString($: VM, thisValue: Val): ECR<Val> {
  if (!IsCallable(thisValue)) {
    return $.throw('TypeError', 'Function.prototype.toString requires that \'this\' be a Function');
  }
  return `function ${functionName(thisValue)}() { [native code] }`;
}
