import { IsArrayIndex, SameValueZero } from './abstract_compare';
import { ToObject, ToNumber, ToUint32 } from './abstract_conversion';
import { CreateArrayFromList, Get, LengthOfArrayLike, Set } from './abstract_object';
import { Assert } from './assert';
import { CR, CastNotAbrupt, IsAbrupt } from './completion_record';
import { KEY, KEY_VALUE, VALUE } from './enums';
import { CreateBuiltinFunction, callOrConstruct, method, methodO } from './func';
import { objectAndFunctionPrototype } from './prelude';
import { IteratorProducer, CreateIteratorFromClosure, createBrandedIteratorPrototype, iterators } from './iterators';
import { GetPrototypeFromConstructor, Obj, OrdinaryDefineOwnProperty, OrdinaryGetOwnProperty, OrdinaryObject, isArrayIndexKey } from './obj';
import { HasValueField, IsDataDescriptor, PropertyDescriptor, prop0, propW, propWC, propWEC } from './property_descriptor';
import type { PropertyFactory } from './realm_record';
import { memoize } from './util';
import { PropertyKey, Val } from './val';
import { Plugin, VM, run } from './vm';

/**
 * 10.4.2 Array Exotic Objects
 *
 * Arrays keep a non-configurable `length` that always exceeds every
 * own index.  Writing an index at or past it grows `length`; shrinking
 * `length` deletes the indices it no longer covers.  Only
 * [[DefineOwnProperty]] differs from an ordinary object.
 */
export type ArrayExoticObject = InstanceType<ReturnType<typeof ArrayExoticObject>>;
export const ArrayExoticObject = memoize(() => class ArrayExoticObject extends OrdinaryObject() {

  /**
   * 10.4.2.1 [[DefineOwnProperty]] ( P, Desc )
   *
   * Defining an index past a read-only `length` is refused before the
   * element is touched.
   */
  override DefineOwnProperty($: VM, P: PropertyKey, Desc: PropertyDescriptor): CR<boolean> {
    if (P === 'length') return ArraySetLength($, this, Desc);
    if (IsArrayIndex(P)) {
      const lengthDesc = OrdinaryGetOwnProperty(this, 'length');
      Assert(IsDataDescriptor(lengthDesc));
      Assert(!lengthDesc.Configurable);
      const length = lengthDesc.Value;
      Assert(typeof length === 'number' && length >= 0);
      const index = Number(P);
      if (index >= length && !lengthDesc.Writable) return false;
      const succeeded = CastNotAbrupt(OrdinaryDefineOwnProperty($, this, P, Desc));
      if (!succeeded) return false;
      if (index >= length) {
        const grown = CastNotAbrupt(
          OrdinaryDefineOwnProperty($, this, 'length', {...lengthDesc, Value: index + 1}));
        Assert(grown);
      }
      return true;
    }
    return OrdinaryDefineOwnProperty($, this, P, Desc);
  }
});

/** 7.2.2 IsArray ( argument ) */
export function IsArray(argument: Val): boolean {
  return argument instanceof ArrayExoticObject();
}

/** 10.4.2.2 ArrayCreate ( length [ , proto ] ): proto defaults to %Array.prototype%. */
export function ArrayCreate($: VM, length: number, proto?: Obj): CR<ArrayExoticObject> {
  if (length > 2 ** 32 - 1) return $.throw('RangeError', 'Invalid array length');
  return new (ArrayExoticObject())({
    Prototype: proto ?? $.getIntrinsic('%Array.prototype%'),
  }, {
    'length': propW(length),
  });
}

/**
 * 10.4.2.4 ArraySetLength ( A, Desc )
 *
 * The new length must be a uint32 equal to its Number form.  When
 * shrinking, indices are deleted from the top down; a read-only
 * `length` is applied only after they are all gone.  On a blocked
 * delete, every index above the blocking one is already gone and
 * "length" ends up one past the blocking index.
 */
export function ArraySetLength($: VM, A: ArrayExoticObject, Desc: PropertyDescriptor): CR<boolean> {
  if (!HasValueField(Desc)) return CastNotAbrupt(OrdinaryDefineOwnProperty($, A, 'length', Desc));
  const newLen = run(ToUint32($, Desc.Value));
  if (IsAbrupt(newLen)) return newLen;
  const numberLen = run(ToNumber($, Desc.Value));
  if (IsAbrupt(numberLen)) return numberLen;
  if (!SameValueZero(newLen, numberLen)) return $.throw('RangeError', 'Invalid array length');
  const newLenDesc: PropertyDescriptor = {...Desc, Value: newLen};
  const oldLenDesc = OrdinaryGetOwnProperty(A, 'length');
  Assert(IsDataDescriptor(oldLenDesc));
  Assert(!oldLenDesc.Configurable);
  const oldLen = oldLenDesc.Value;
  Assert(typeof oldLen === 'number');
  if (newLen >= oldLen) return CastNotAbrupt(OrdinaryDefineOwnProperty($, A, 'length', newLenDesc));
  if (!oldLenDesc.Writable) return false;
  const newWritable = newLenDesc.Writable !== false;
  if (!newWritable) newLenDesc.Writable = true;
  const succeeded = CastNotAbrupt(OrdinaryDefineOwnProperty($, A, 'length', newLenDesc));
  if (!succeeded) return false;
  for (const index of indicesAtOrAbove(A, newLen)) {
    const deleteSucceeded = CastNotAbrupt(A.Delete($, String(index)));
    if (!deleteSucceeded) {
      newLenDesc.Value = index + 1;
      if (!newWritable) newLenDesc.Writable = false;
      CastNotAbrupt(OrdinaryDefineOwnProperty($, A, 'length', newLenDesc));
      return false;
    }
  }
  if (!newWritable) {
    const frozen = CastNotAbrupt(OrdinaryDefineOwnProperty($, A, 'length', {Writable: false}));
    Assert(frozen);
  }
  return true;
}

/** Own element indices ≥ min, highest first. */
function indicesAtOrAbove(A: Obj, min: number): number[] {
  const indices: number[] = [];
  for (const key of A.OwnProps.keys()) {
    if (typeof key === 'string' && isArrayIndexKey(key) && Number(key) >= min) {
      indices.push(Number(key));
    }
  }
  return indices.sort((a, b) => b - a);
}

/**
 * 23.1.5.1 CreateArrayIterator ( array, kind )
 *
 * The length is re-read on every step, so elements appended during
 * iteration are visited.  Once the index passes the length the
 * iterator is exhausted for good.
 */
export function CreateArrayIterator($: VM, array: Obj, kind: KEY|VALUE|KEY_VALUE): Obj {
  let index = 0;
  const producer: IteratorProducer = function*($) {
    const len = yield* LengthOfArrayLike($, array);
    if (IsAbrupt(len)) return len;
    if (index >= len) return {Done: true};
    const current = index++;
    if (KEY.is(kind)) return {Done: false, Value: current};
    const elementValue = yield* Get($, array, String(current));
    if (IsAbrupt(elementValue)) return elementValue;
    if (VALUE.is(kind)) return {Done: false, Value: elementValue};
    return {Done: false, Value: CreateArrayFromList($, [current, elementValue])};
  };
  return CreateIteratorFromClosure(
    producer, '%ArrayIteratorPrototype%', $.getIntrinsic('%ArrayIteratorPrototype%'));
}

/**
 * 23.1 Array Objects
 *
 * The constructor plus the iteration surface and `push` of the
 * prototype: what arguments objects and list results need to behave
 * like ordinary arrays.
 */
export const arrayObject: Plugin = {
  id: 'arrayObject',
  deps: () => [objectAndFunctionPrototype, iterators],
  intrinsics(b) {
    // Array.prototype is itself an array, with a non-configurable length.
    const arrayPrototype = new (ArrayExoticObject())({
      Prototype: b.intrinsic('%Object.prototype%'),
    }, {
      'length': propW(0),
    });

    // A single numeric argument is a length; anything else lists the elements.
    const arrayCtor = CreateBuiltinFunction(
      callOrConstruct(function*($, NewTarget, ...values) {
        const newTarget = NewTarget ?? $.getActiveFunctionObject();
        Assert(newTarget);
        const proto = yield* GetPrototypeFromConstructor($, newTarget, '%Array.prototype%');
        if (IsAbrupt(proto)) return proto;
        const [len] = values;
        if (values.length !== 1 || typeof len !== 'number') {
          const array = CastNotAbrupt(ArrayCreate($, 0, proto));
          values.forEach((value, k) => array.OwnProps.set(String(k), propWEC(value)));
          array.OwnProps.set('length', propW(values.length));
          return array;
        }
        if (!SameValueZero(len >>> 0, len)) return $.throw('RangeError', 'Invalid array length');
        return ArrayCreate($, len, proto);
      }), 1, 'Array', b.realm);
    b.constructorPair('Array', arrayCtor, arrayPrototype);

    b.members(arrayCtor, {
      'isArray': method(function*(_$, _, arg) {
        return IsArray(arg);
      }),
      // Always a plain Array, whatever the receiver.
      'of': method(function*($, _, ...items) {
        const A = CastNotAbrupt(ArrayCreate($, 0));
        items.forEach((item, k) => A.OwnProps.set(String(k), propWEC(item)));
        const status = yield* Set($, A, 'length', items.length, true);
        return IsAbrupt(status) ? status : A;
      }, 0),
    });

    // Shared by Array.prototype[@@iterator] and arguments[@@iterator].
    const arrayPrototypeValues = b.register('%Array.prototype.values%', CreateBuiltinFunction({
      *Call($, thisValue) {
        const O = ToObject($, thisValue);
        return IsAbrupt(O) ? O : CreateArrayIterator($, O, VALUE);
      },
    }, 0, 'values', b.realm));

    b.members(arrayPrototype, {
      'values': propWC(arrayPrototypeValues),
      [Symbol.iterator]: propWC(arrayPrototypeValues),
      'entries': arrayIterationMethod(KEY_VALUE),
      'keys': arrayIterationMethod(KEY),
      'push': methodO(function*($, O, ...items) {
        let len = yield* LengthOfArrayLike($, O);
        if (IsAbrupt(len)) return len;
        if (len + items.length > Number.MAX_SAFE_INTEGER) {
          return $.throw('TypeError', 'Pushing too many items');
        }
        for (const E of items) {
          const status = yield* Set($, O, String(len++), E, true);
          if (IsAbrupt(status)) return status;
        }
        const status = yield* Set($, O, 'length', len, true);
        return IsAbrupt(status) ? status : len;
      }, 1),
    });

    createBrandedIteratorPrototype(b, '%ArrayIteratorPrototype%', 'Array Iterator');
  },
};

function arrayIterationMethod(kind: KEY|KEY_VALUE): PropertyFactory {
  return method(function*($, thisValue) {
    const O = ToObject($, thisValue);
    return IsAbrupt(O) ? O : CreateArrayIterator($, O, kind);
  });
}
