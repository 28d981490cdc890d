/**
 * @fileoverview
 * Boolean, Symbol, Number and String: the wrapper constructors whose
 * prototypes ToObject hands out for primitive receivers.
 */

import { ToBoolean, ToNumber, ToObject, ToString } from './abstract_conversion';
import { CR, CastNotAbrupt, IsAbrupt } from './completion_record';
import { BuiltinFunction, BuiltinFunctionBehavior, CreateBuiltinFunction, callOrConstruct, getter, method } from './func';
import { GetPrototypeFromConstructor, Obj, ObjectSlots, OrdinaryCreateFromConstructor, OrdinaryObject, OrdinaryObjectCreate } from './obj';
import { prelude } from './prelude';
import { prop0, propC } from './property_descriptor';
import { RealmBuilder } from './realm_record';
import { Val } from './val';
import { DebugString, Plugin, VM } from './vm';

/** Builds a wrapper constructor of length 1 and its prototype, and registers both. */
function wrapperPair(
  b: RealmBuilder,
  name: string,
  prototypeSlots: ObjectSlots,
  behavior: BuiltinFunctionBehavior,
): [BuiltinFunction, OrdinaryObject] {
  const ctor = CreateBuiltinFunction(behavior, 1, name, b.realm);
  const prototype = OrdinaryObjectCreate({
    ...prototypeSlots,
    Prototype: b.intrinsic('%Object.prototype%'),
  });
  b.constructorPair(name, ctor, prototype);
  return [ctor, prototype];
}

/**
 * Returns the `thisXValue` check for one primitive type: the primitive
 * itself, or the slot of a wrapper holding one.
 */
function unwrapper<T extends Val>(
  typeName: string,
  isPrimitive: (value: Val) => value is T,
  slot: (wrapper: Obj) => T|undefined,
): ($: VM, value: Val) => CR<T> {
  return ($, value) => {
    if (isPrimitive(value)) return value;
    const data = value instanceof Obj ? slot(value) : undefined;
    return data !== undefined ? data :
      $.throw('TypeError', `${DebugString(value)} is not a ${typeName}`);
  };
}

const thisBooleanValue = unwrapper(
  'Boolean', (v): v is boolean => typeof v === 'boolean', (o) => o.BooleanData);
const thisSymbolValue = unwrapper(
  'Symbol', (v): v is symbol => typeof v === 'symbol', (o) => o.SymbolData);
const thisNumberValue = unwrapper(
  'Number', (v): v is number => typeof v === 'number', (o) => o.NumberData);
const thisStringValue = unwrapper(
  'String', (v): v is string => typeof v === 'string', (o) => o.StringData);

/** `Boolean(v)` converts; `new Boolean(v)` wraps. */
export const booleanObject: Plugin = {
  id: 'booleanObject',
  deps: () => [prelude],
  intrinsics(b) {
    const [, booleanPrototype] = wrapperPair(
      b, 'Boolean', {BooleanData: false},
      callOrConstruct(function*($, NewTarget, value) {
        const bool = ToBoolean(value);
        if (NewTarget == null) return bool;
        return yield* OrdinaryCreateFromConstructor(
          $, NewTarget, '%Boolean.prototype%', {BooleanData: bool});
      }));

    b.members(booleanPrototype, {
      'toString': method(function*($, thisValue) {
        const bool = thisBooleanValue($, thisValue);
        return IsAbrupt(bool) ? bool : String(bool);
      }),
      'valueOf': method(function*($, thisValue) {
        return thisBooleanValue($, thisValue);
      }),
    });
  },
};

/**
 * Script symbols are host symbols, so @@iterator and @@toStringTag are
 * shared with the host.  `new Symbol()` throws.
 */
export const symbolObject: Plugin = {
  id: 'symbolObject',
  deps: () => [prelude],
  intrinsics(b) {
    const [symbolCtor, symbolPrototype] = wrapperPair(
      b, 'Symbol', {},
      callOrConstruct(function*($, NewTarget, description) {
        if (NewTarget != null) {
          return $.throw('TypeError', 'Symbol is not a constructor');
        }
        if (description === undefined) return Symbol();
        const descString = yield* ToString($, description);
        if (IsAbrupt(descString)) return descString;
        return Symbol(descString);
      }));

    b.members(symbolCtor, {
      'iterator': prop0(Symbol.iterator),
      'toStringTag': prop0(Symbol.toStringTag),
    });
    b.members(symbolPrototype, {
      'description': getter(function*($, thisValue) {
        const sym = thisSymbolValue($, thisValue);
        return IsAbrupt(sym) ? sym : sym.description;
      }),
      'toString': method(function*($, thisValue) {
        const sym = thisSymbolValue($, thisValue);
        return IsAbrupt(sym) ? sym : SymbolDescriptiveString(sym);
      }),
      'valueOf': method(function*($, thisValue) {
        return thisSymbolValue($, thisValue);
      }),
      [Symbol.toStringTag]: propC('Symbol'),
    });
  },
};

/** `Symbol(desc)` for any symbol, with an empty description when it has none. */
export function SymbolDescriptiveString(sym: symbol): string {
  return `Symbol(${sym.description ?? ''})`;
}

/** `Number()` is +0; toString only knows radix 10. */
export const numberObject: Plugin = {
  id: 'numberObject',
  deps: () => [prelude],
  intrinsics(b) {
    const [numberCtor, numberPrototype] = wrapperPair(
      b, 'Number', {NumberData: 0},
      callOrConstruct(function*($, NewTarget, ...args) {
        let n = 0;
        if (args.length) {
          const prim = yield* ToNumber($, args[0]);
          if (IsAbrupt(prim)) return prim;
          n = prim;
        }
        if (NewTarget == null) return n;
        return yield* OrdinaryCreateFromConstructor(
          $, NewTarget, '%Number.prototype%', {NumberData: n});
      }));

    b.members(numberCtor, {
      'MAX_SAFE_INTEGER': prop0(Number.MAX_SAFE_INTEGER),
      'NaN': prop0(NaN),
    });
    b.members(numberPrototype, {
      'toString': method(function*($, thisValue) {
        const x = thisNumberValue($, thisValue);
        return IsAbrupt(x) ? x : String(x);
      }, 1),
      'valueOf': method(function*($, thisValue) {
        return thisNumberValue($, thisValue);
      }),
    });
  },
};

/**
 * `String(sym)` describes the symbol instead of throwing.  Constructed
 * strings come from ToObject, so they carry the same read-only index
 * and `length` properties as any other wrapper.
 */
export const stringObject: Plugin = {
  id: 'stringObject',
  deps: () => [prelude],
  intrinsics(b) {
    const [, stringPrototype] = wrapperPair(
      b, 'String', {StringData: ''},
      callOrConstruct(function*($, NewTarget, ...args) {
        let s = '';
        if (args.length) {
          const value = args[0];
          if (NewTarget == null && typeof value === 'symbol') {
            return SymbolDescriptiveString(value);
          }
          const str = yield* ToString($, value);
          if (IsAbrupt(str)) return str;
          s = str;
        }
        if (NewTarget == null) return s;
        const proto = yield* GetPrototypeFromConstructor($, NewTarget, '%String.prototype%');
        if (IsAbrupt(proto)) return proto;
        const O = CastNotAbrupt(ToObject($, s));
        O.Prototype = proto;
        return O;
      }));

    b.members(stringPrototype, {
      'length': prop0(0),
      'toString': method(function*($, thisValue) {
        return thisStringValue($, thisValue);
      }),
      'valueOf': method(function*($, thisValue) {
        return thisStringValue($, thisValue);
      }),
    });
  },
};

export const fundamental: Plugin = {
  id: 'fundamental',
  deps: () => [
    prelude,
    booleanObject,
    symbolObject,
    numberObject,
    stringObject,
  ],
};
