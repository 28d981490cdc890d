/**
 * Tests for property descriptors and the ordinary object methods.
 */

import { beforeEach, describe, it } from 'mocha';
import { expect } from 'chai';
import {
  Call, CreateDataProperty, DefinePropertyOrThrow, DeletePropertyOrThrow,
  Get, HasOwnProperty, HasProperty, Set,
} from '../src/internal/abstract_object';
import { ToPropertyKey } from '../src/internal/abstract_conversion';
import { CreateBuiltinFunction } from '../src/internal/func';
import { OrdinaryObjectCreate, ValidateAndApplyPropertyDescriptor } from '../src/internal/obj';
import { ObjectCtorGetOwnPropertyDescriptor } from '../src/internal/prelude';
import {
  FromPropertyDescriptor, PropertyDescriptor, ToPropertyDescriptor,
  accessor, prop0, propC, propWC, propWEC,
} from '../src/internal/property_descriptor';
import { Val } from '../src/internal/val';
import { just } from '../src/internal/vm';
import { Engine, asObj, engine, evaluate, intrinsic, ok, plainObject, thrown } from './helpers';

describe('validating a descriptor without an object', () => {
  function check(extensible: boolean, desc: PropertyDescriptor, current?: PropertyDescriptor) {
    return ValidateAndApplyPropertyDescriptor(undefined, '', extensible, desc, current);
  }

  let e: Engine;
  let getterA: PropertyDescriptor['Get'];
  let getterB: PropertyDescriptor['Get'];
  beforeEach(() => {
    e = engine();
    getterA = plainObject(e);
    getterB = plainObject(e);
  });

  it('should accept any new property on an extensible object', () => {
    expect(check(true, {Value: 1})).to.equal(true);
  });

  it('should reject a new property on a non-extensible object', () => {
    expect(check(false, {Value: 1})).to.equal(false);
  });

  it('should accept an empty descriptor against anything', () => {
    expect(check(true, {}, prop0(1))).to.equal(true);
  });

  it('should allow value changes on a non-configurable writable property', () => {
    const current = {Value: 1, Writable: true, Enumerable: false, Configurable: false};
    expect(check(true, {Value: 2}, current)).to.equal(true);
    expect(check(true, {Writable: false}, current)).to.equal(true);
  });

  it('should compare values with SameValue on a frozen property', () => {
    expect(check(true, {Value: 2}, prop0(1))).to.equal(false);
    expect(check(true, {Value: 1}, prop0(1))).to.equal(true);
    expect(check(true, {Value: NaN}, prop0(NaN))).to.equal(true);
    expect(check(true, {Value: -0}, prop0(0))).to.equal(false);
    expect(check(true, {Writable: true}, prop0(1))).to.equal(false);
  });

  it('should reject attribute changes on a non-configurable property', () => {
    expect(check(true, {Configurable: true}, prop0(1))).to.equal(false);
    expect(check(true, {Enumerable: true}, prop0(1))).to.equal(false);
    expect(check(true, {Enumerable: false}, prop0(1))).to.equal(true);
  });

  it('should reject switching kind on a non-configurable property', () => {
    expect(check(true, {Get: getterA}, prop0(1))).to.equal(false);
    const current = accessor(getterA, undefined, false, false);
    expect(check(true, {Value: 1}, current)).to.equal(false);
  });

  it('should compare accessors on a non-configurable accessor property', () => {
    const current = accessor(getterA, undefined, false, false);
    expect(check(true, {Get: getterA}, current)).to.equal(true);
    expect(check(true, {Get: getterB}, current)).to.equal(false);
    expect(check(true, {Set: undefined}, current)).to.equal(true);
  });

  it('should allow anything on a configurable property', () => {
    const current = propC(1);
    expect(check(true, {Get: getterA}, current)).to.equal(true);
    expect(check(true, {Value: 2, Enumerable: true}, current)).to.equal(true);
  });
});

describe('ValidateAndApplyPropertyDescriptor', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  it('should fill absent attributes with defaults on a new property', () => {
    const obj = plainObject(e);
    expect(ValidateAndApplyPropertyDescriptor(obj, 'x', true, {Value: 1}, undefined)).to.equal(true);
    expect(obj.OwnProps.get('x')).to.deep.equal(
      {Value: 1, Writable: false, Enumerable: false, Configurable: false});
  });

  it('should create an accessor property with undefined halves', () => {
    const obj = plainObject(e);
    const getter = plainObject(e);
    ValidateAndApplyPropertyDescriptor(obj, 'x', true, {Get: getter}, undefined);
    expect(obj.OwnProps.get('x')).to.deep.equal(
      {Get: getter, Set: undefined, Enumerable: false, Configurable: false});
  });

  it('should keep enumerable and configurable when switching to an accessor', () => {
    const getter = plainObject(e);
    const obj = plainObject(e, {x: propWEC(1)});
    expect(ValidateAndApplyPropertyDescriptor(obj, 'x', true, {Get: getter}, obj.OwnProps.get('x')))
      .to.equal(true);
    expect(obj.OwnProps.get('x')).to.deep.equal(
      {Get: getter, Set: undefined, Enumerable: true, Configurable: true});
  });

  it('should default writable to false when switching to data', () => {
    const getter = plainObject(e);
    const obj = plainObject(e, {x: accessor(getter, undefined)});
    ValidateAndApplyPropertyDescriptor(obj, 'x', true, {Value: 5}, obj.OwnProps.get('x'));
    expect(obj.OwnProps.get('x')).to.deep.equal(
      {Value: 5, Writable: false, Enumerable: false, Configurable: true});
  });

  it('should merge only the fields that are present', () => {
    const obj = plainObject(e, {x: propWEC(1)});
    ValidateAndApplyPropertyDescriptor(obj, 'x', true, {Enumerable: false}, obj.OwnProps.get('x'));
    expect(obj.OwnProps.get('x')).to.deep.equal(
      {Value: 1, Writable: true, Enumerable: false, Configurable: true});
  });

  it('should leave the object untouched when validation fails', () => {
    const obj = plainObject(e, {x: prop0(1)});
    expect(ValidateAndApplyPropertyDescriptor(obj, 'x', true, {Value: 2}, obj.OwnProps.get('x')))
      .to.equal(false);
    expect(obj.OwnProps.get('x')).to.deep.equal(prop0(1));
  });
});

describe('DefineOwnProperty', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  it('should redefine a property created by assignment', () => {
    const obj = plainObject(e);
    const desc = evaluate(e, function*($) {
      ok(yield* Set($, obj, 'foo', 100, true));
      ok(DefinePropertyOrThrow($, obj, 'foo', {Value: 200}));
      return obj.GetOwnProperty($, 'foo');
    });
    expect(desc).to.deep.equal({Value: 200, Writable: true, Enumerable: true, Configurable: true});
  });

  it('should return false in lenient mode and throw in throwing mode', () => {
    const obj = plainObject(e, {x: prop0(1)});
    const lenient = evaluate(e, ($) => just(obj.DefineOwnProperty($, 'x', {Value: 2})));
    expect(lenient).to.equal(false);
    const strict = evaluate(e, ($) => just(DefinePropertyOrThrow($, obj, 'x', {Value: 2})));
    expect(thrown(strict)).to.equal('TypeError: Cannot redefine property: x');
    expect(obj.OwnProps.get('x')).to.deep.equal(prop0(1));
  });

  it('should refuse new properties on a non-extensible object', () => {
    const obj = plainObject(e);
    obj.Extensible = false;
    const result = evaluate(e, ($) => just(CreateDataProperty($, obj, 'y', 1)));
    expect(result).to.equal(false);
    expect(obj.OwnProps.has('y')).to.equal(false);
  });
});

describe('Get and Set', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  it('should read through the prototype chain', () => {
    const proto = plainObject(e, {inherited: propWEC('from proto')});
    const obj = OrdinaryObjectCreate({Prototype: proto});
    expect(evaluate(e, ($) => Get($, obj, 'inherited'))).to.equal('from proto');
    expect(evaluate(e, ($) => Get($, obj, 'missing'))).to.equal(undefined);
  });

  it('should call getters with the original receiver', () => {
    const seen: Val[] = [];
    const getterFn = CreateBuiltinFunction({
      * Call(_$, thisArgument) {
        seen.push(thisArgument);
        return 'got';
      },
    }, 0, 'getX', e.realm);
    const proto = plainObject(e, {x: accessor(getterFn, undefined)});
    const obj = OrdinaryObjectCreate({Prototype: proto});
    expect(evaluate(e, ($) => Get($, obj, 'x'))).to.equal('got');
    expect(seen).to.have.lengthOf(1);
    expect(seen[0]).to.equal(obj);
  });

  it('should create an own property instead of writing to the prototype', () => {
    const proto = plainObject(e, {x: propWEC(1)});
    const obj = OrdinaryObjectCreate({Prototype: proto, Extensible: true});
    evaluate(e, ($) => Set($, obj, 'x', 2, true));
    expect(obj.OwnProps.get('x')).to.deep.equal(propWEC(2));
    expect(proto.OwnProps.get('x')).to.deep.equal(propWEC(1));
  });

  it('should call inherited setters with the receiver', () => {
    const calls: Val[][] = [];
    const setterFn = CreateBuiltinFunction({
      * Call(_$, thisArgument, args) {
        calls.push([thisArgument, ...args]);
        return undefined;
      },
    }, 1, 'setX', e.realm);
    const proto = plainObject(e, {x: accessor(undefined, setterFn)});
    const obj = OrdinaryObjectCreate({Prototype: proto});
    evaluate(e, ($) => Set($, obj, 'x', 7, true));
    expect(calls).to.have.lengthOf(1);
    expect(calls[0][0]).to.equal(obj);
    expect(calls[0][1]).to.equal(7);
    expect(obj.OwnProps.has('x')).to.equal(false);
  });

  it('should fail on an inherited read-only property', () => {
    const proto = plainObject(e, {ro: prop0(1)});
    const obj = OrdinaryObjectCreate({Prototype: proto});
    const lenient = evaluate(e, ($) => obj.Set($, 'ro', 2, obj));
    expect(lenient).to.equal(false);
    const strict = evaluate(e, ($) => Set($, obj, 'ro', 2, true));
    expect(thrown(strict)).to.equal("TypeError: Cannot assign to read only property 'ro' of {}");
    expect(obj.OwnProps.has('ro')).to.equal(false);
  });

  it('should fail on an accessor without a setter', () => {
    const getterFn = plainObject(e);
    const obj = plainObject(e, {x: accessor(getterFn, undefined)});
    expect(evaluate(e, ($) => obj.Set($, 'x', 1, obj))).to.equal(false);
  });
});

describe('HasProperty and Delete', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  it('should distinguish own and inherited properties', () => {
    const proto = plainObject(e, {a: propWEC(1)});
    const obj = OrdinaryObjectCreate({Prototype: proto}, {b: propWEC(2)});
    evaluate(e, ($) => {
      expect(HasProperty($, obj, 'a')).to.equal(true);
      expect(HasOwnProperty($, obj, 'a')).to.equal(false);
      expect(HasOwnProperty($, obj, 'b')).to.equal(true);
      expect(HasProperty($, obj, 'c')).to.equal(false);
      return just(undefined);
    });
  });

  it('should refuse to delete a non-configurable property', () => {
    const obj = plainObject(e, {x: prop0(1), y: propWEC(2)});
    evaluate(e, ($) => {
      expect(obj.Delete($, 'x')).to.equal(false);
      expect(thrown(DeletePropertyOrThrow($, obj, 'x')))
        .to.equal("TypeError: Cannot delete property 'x' of {y: 2}");
      expect(obj.Delete($, 'y')).to.equal(true);
      expect(obj.Delete($, 'never')).to.equal(true);
      return just(undefined);
    });
    expect([...obj.OwnProps.keys()]).to.deep.equal(['x']);
  });
});

describe('property keys', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  it('should canonicalize numeric keys', () => {
    const obj = plainObject(e);
    const value = evaluate(e, function*($) {
      ok(CreateDataProperty($, obj, '0.000001', 1));
      const desc = asObj(ok(yield* ObjectCtorGetOwnPropertyDescriptor($, obj, 0.000001)));
      return yield* Get($, desc, 'value');
    });
    expect(value).to.equal(1);
    expect(evaluate(e, ($) => ToPropertyKey($, 1e21))).to.equal('1e+21');
    expect(evaluate(e, ($) => ToPropertyKey($, -0))).to.equal('0');
  });

  it('should order indices, then strings, then symbols', () => {
    const sym = Symbol('s');
    const obj = plainObject(e);
    obj.OwnProps.set('b', propWEC(1));
    obj.OwnProps.set(sym, propWEC(2));
    obj.OwnProps.set('10', propWEC(3));
    obj.OwnProps.set('a', propWEC(4));
    obj.OwnProps.set('2', propWEC(5));
    obj.OwnProps.set('0', propWEC(6));
    const keys = evaluate(e, ($) => just(obj.OwnPropertyKeys($)));
    expect(keys).to.deep.equal(['0', '2', '10', 'b', 'a', sym]);
  });

  it('should treat non-canonical numerals as strings', () => {
    const obj = plainObject(e);
    obj.OwnProps.set('01', propWEC(1));
    obj.OwnProps.set('1', propWEC(2));
    obj.OwnProps.set('4294967295', propWEC(3));
    const keys = evaluate(e, ($) => just(obj.OwnPropertyKeys($)));
    expect(keys).to.deep.equal(['1', '01', '4294967295']);
  });
});

describe('prototype links', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  it('should reject cycles and non-extensible targets', () => {
    const a = plainObject(e);
    const b = OrdinaryObjectCreate({Prototype: a});
    evaluate(e, ($) => {
      expect(a.SetPrototypeOf($, b)).to.equal(false);
      expect(b.SetPrototypeOf($, a)).to.equal(true);
      b.Extensible = false;
      expect(b.SetPrototypeOf($, null)).to.equal(false);
      expect(b.SetPrototypeOf($, a)).to.equal(true);
      return just(undefined);
    });
    expect(a.Prototype).to.equal(intrinsic(e, '%Object.prototype%'));
  });
});

describe('ToPropertyDescriptor', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  it('should read only the fields that are present', () => {
    const attrs = plainObject(e, {value: propWEC(3), enumerable: propWEC(1)});
    const desc = evaluate(e, ($) => ToPropertyDescriptor($, attrs));
    expect(desc).to.deep.equal({Enumerable: true, Value: 3});
  });

  it('should reject mixed descriptors', () => {
    const getterFn = CreateBuiltinFunction({* Call() { return 1; }}, 0, 'g', e.realm);
    const attrs = plainObject(e, {get: propWEC(getterFn), value: propWEC(1)});
    const result = evaluate(e, ($) => ToPropertyDescriptor($, attrs));
    expect(thrown(result)).to.equal(
      'TypeError: Invalid property descriptor. Cannot both specify accessors and a value or writable attribute');
  });

  it('should reject a non-callable getter', () => {
    const attrs = plainObject(e, {get: propWEC(5)});
    expect(thrown(evaluate(e, ($) => ToPropertyDescriptor($, attrs))))
      .to.equal('TypeError: Getter must be a function');
  });

  it('should reject a primitive', () => {
    expect(thrown(evaluate(e, ($) => ToPropertyDescriptor($, 'x'))))
      .to.equal('TypeError: Property description must be an object');
  });

  it('should convert back to an attributes object', () => {
    const obj = evaluate(e, ($) => just(FromPropertyDescriptor($, propWC(9))));
    const desc = asObj(obj);
    expect([...desc.OwnProps.keys()]).to.deep.equal(['value', 'writable', 'enumerable', 'configurable']);
    expect(desc.OwnProps.get('value')).to.deep.equal(propWEC(9));
    expect(desc.OwnProps.get('enumerable')).to.deep.equal(propWEC(false));
  });

  it('should call through an accessor defined from an attributes object', () => {
    const target = plainObject(e);
    const getterFn = CreateBuiltinFunction({
      * Call(_$, thisArgument) { return thisArgument === target ? 'self' : 'other'; },
    }, 0, 'g', e.realm);
    const value = evaluate(e, function*($) {
      const attrs = plainObject(e, {get: propWEC(getterFn)});
      const desc = ok(yield* ToPropertyDescriptor($, attrs));
      ok(DefinePropertyOrThrow($, target, 'p', desc));
      return yield* Call($, getterFn, target);
    });
    expect(value).to.equal('self');
    expect(target.OwnProps.get('p')).to.deep.equal(
      {Get: getterFn, Set: undefined, Enumerable: false, Configurable: false});
  });
});
