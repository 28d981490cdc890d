/**
 * Tests for ordinary function objects: [[Call]], [[Construct]],
 * FunctionDeclarationInstantiation, and the properties that
 * function creation installs.
 */

import { beforeEach, describe, it } from 'mocha';
import { expect } from 'chai';
import {
  Call, Construct, CreateDataProperty, DefinePropertyOrThrow, DeletePropertyOrThrow,
  EnumerableOwnKeys, FreezeObject, Get, HasOwnProperty, Set, TestFrozen,
} from '../src/internal/abstract_object';
import { Abrupt, IsAbrupt, ReturnCompletion, ThrowCompletion } from '../src/internal/completion_record';
import { EMPTY, STRICT } from '../src/internal/enums';
import { GetNewTarget, ResolveThisBinding } from '../src/internal/execution_context';
import { IsFunc, OrdinaryFunction } from '../src/internal/func';
import { Obj } from '../src/internal/obj';
import { accessor } from '../src/internal/property_descriptor';
import { ConstructorSlotMap } from '../src/internal/property_map';
import { FunctionBody, functionCode } from '../src/internal/static/function_code';
import { Val } from '../src/internal/val';
import { DebugString, VM, just } from '../src/internal/vm';
import {
  Engine, asObj, engine, evaluate, globalObject, intrinsic, makeFunction, ok,
  plainObject, readBinding, thrown, writeBinding,
} from './helpers';

const POISONED =
  "TypeError: 'caller', 'callee', and 'arguments' properties may not be accessed " +
  'on strict mode functions or the arguments objects for calls to them';

const returnThis: FunctionBody = function*($) {
  const thisValue = ResolveThisBinding($);
  if (IsAbrupt(thisValue)) return thisValue;
  return ReturnCompletion(thisValue);
};

/** Records each named binding, or the error reading it raised. */
function recordBindings(names: string[], out: Record<string, Val>): FunctionBody {
  return function*($) {
    for (const name of names) {
      const value = yield* readBinding($, name);
      out[name] = value instanceof Abrupt ? `threw ${thrown(value)}` : value;
    }
    return EMPTY;
  };
}

function call(e: Engine, F: Val, thisArg: Val, args: Val[] = []) {
  return evaluate(e, ($) => Call($, F, thisArg, args));
}

describe('OrdinaryCallBindThis', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  it('should substitute the global object for a nullish this in sloppy code', () => {
    const F = makeFunction(e, {Name: 'sloppy', Body: returnThis});
    expect(call(e, F, undefined)).to.equal(globalObject(e));
    expect(call(e, F, null)).to.equal(globalObject(e));
  });

  it('should box primitives in sloppy code', () => {
    const F = makeFunction(e, {Name: 'sloppy', Body: returnThis});
    const boxed = asObj(ok(call(e, F, 5)));
    expect(boxed.NumberData).to.equal(5);
    expect(boxed.Prototype).to.equal(intrinsic(e, '%Number.prototype%'));
    const obj = plainObject(e);
    expect(call(e, F, obj)).to.equal(obj);
  });

  it('should pass this through unchanged in strict code', () => {
    const F = makeFunction(e, {Name: 'strict', Strict: true, Body: returnThis});
    expect(call(e, F, undefined)).to.equal(undefined);
    expect(call(e, F, null)).to.equal(null);
    expect(call(e, F, 5)).to.equal(5);
  });

  it('should use the callee strictness, not the caller', () => {
    const inner = makeFunction(e, {Name: 'inner', Body: returnThis});
    const outer = makeFunction(e, {
      Name: 'outer',
      Strict: true,
      * Body($) {
        const result = yield* Call($, inner, undefined);
        if (IsAbrupt(result)) return result;
        return ReturnCompletion(result);
      },
    });
    expect(call(e, outer, undefined)).to.equal(globalObject(e));
  });
});

describe('FunctionDeclarationInstantiation', () => {
  let e: Engine;
  let out: Record<string, Val>;
  beforeEach(() => {
    e = engine();
    out = {};
  });

  it('should bind parameters from the arguments, padding with undefined', () => {
    const F = makeFunction(e, {FormalParameters: ['a', 'b'], Body: recordBindings(['a', 'b'], out)});
    call(e, F, undefined, [1]);
    expect(out).to.deep.equal({a: 1, b: undefined});
  });

  it('should let the last duplicate parameter win', () => {
    const F = makeFunction(e, {FormalParameters: ['a', 'a'], Body: recordBindings(['a'], out)});
    call(e, F, undefined, [1, 2]);
    expect(out['a']).to.equal(2);
    call(e, F, undefined, [1]);
    expect(out['a']).to.equal(undefined);
  });

  it('should initialize vars to undefined without clobbering parameters', () => {
    const F = makeFunction(e, {
      FormalParameters: ['a'],
      VarNames: ['v', 'a'],
      Body: recordBindings(['v', 'a'], out),
    });
    call(e, F, undefined, [9]);
    expect(out).to.deep.equal({v: undefined, a: 9});
  });

  it('should leave lexical declarations uninitialized', () => {
    const F = makeFunction(e, {
      LexicalDeclarations: [{Name: 'l', Constant: false}, {Name: 'k', Constant: true}],
      Body: recordBindings(['l', 'k'], out),
    });
    call(e, F, undefined);
    expect(out).to.deep.equal({
      l: "threw ReferenceError: Cannot access 'l' before initialization",
      k: "threw ReferenceError: Cannot access 'k' before initialization",
    });
  });

  it('should bind the last function declaration over a parameter', () => {
    const F = makeFunction(e, {
      FormalParameters: ['g'],
      FunctionDeclarations: [
        functionCode({Name: 'g', * Body() { return ReturnCompletion('first'); }}),
        functionCode({Name: 'g', * Body() { return ReturnCompletion('second'); }}),
      ],
      * Body($) {
        const g = yield* readBinding($, 'g');
        if (IsAbrupt(g)) return g;
        const result = yield* Call($, g, undefined);
        if (IsAbrupt(result)) return result;
        return ReturnCompletion(result);
      },
    });
    expect(call(e, F, undefined, [5])).to.equal('second');
  });

  it('should close inner functions over the activation', () => {
    const F = makeFunction(e, {
      FormalParameters: ['secret'],
      FunctionDeclarations: [functionCode({
        Name: 'peek',
        * Body($) {
          const value = yield* readBinding($, 'secret');
          if (IsAbrupt(value)) return value;
          return ReturnCompletion(value);
        },
      })],
      * Body($) {
        const peek = yield* readBinding($, 'peek');
        if (IsAbrupt(peek)) return peek;
        const result = yield* Call($, peek, undefined);
        if (IsAbrupt(result)) return result;
        return ReturnCompletion(result);
      },
    });
    expect(call(e, F, undefined, ['hidden-value'])).to.equal('hidden-value');
  });

  it('should link a mapped arguments object to sloppy parameters', () => {
    let self: Obj|undefined;
    const F = makeFunction(e, {
      FormalParameters: ['a'],
      * Body($, callee) {
        self = callee;
        const ao = asObj(ok(yield* readBinding($, 'arguments')));
        ok(yield* writeBinding($, 'a', 10));
        out['afterWrite'] = ok(yield* Get($, ao, '0'));
        ok(yield* Set($, ao, '0', 20, true));
        out['afterSet'] = ok(yield* readBinding($, 'a'));
        out['length'] = ok(yield* Get($, ao, 'length'));
        out['extra'] = ok(yield* Get($, ao, '1'));
        out['callee'] = ok(yield* Get($, ao, 'callee'));
        return EMPTY;
      },
    });
    call(e, F, undefined, [1, 2]);
    expect(out).to.deep.equal({afterWrite: 10, afterSet: 20, length: 2, extra: 2, callee: self});
  });

  it('should freeze the current value when a mapped index is made read-only', () => {
    const F = makeFunction(e, {
      FormalParameters: ['a'],
      * Body($) {
        const ao = asObj(ok(yield* readBinding($, 'arguments')));
        ok(DefinePropertyOrThrow($, ao, '0', {Writable: false}));
        ok(yield* writeBinding($, 'a', 5));
        out['index'] = ok(yield* Get($, ao, '0'));
        out['a'] = ok(yield* readBinding($, 'a'));
        out['writable'] = ao.OwnProps.get('0')?.Writable;
        return EMPTY;
      },
    });
    call(e, F, undefined, [1]);
    expect(out).to.deep.equal({index: 1, a: 5, writable: false});
  });

  it('should not relink an index that is deleted and defined again', () => {
    const F = makeFunction(e, {
      FormalParameters: ['a', 'b'],
      * Body($) {
        const ao = asObj(ok(yield* readBinding($, 'arguments')));
        ok(DeletePropertyOrThrow($, ao, '1'));
        ok(CreateDataProperty($, ao, '1', 9));
        out['afterRecreate'] = ok(yield* readBinding($, 'b'));
        ok(yield* writeBinding($, 'b', 3));
        out['index'] = ok(yield* Get($, ao, '1'));
        out['a'] = ok(yield* Get($, ao, '0'));
        return EMPTY;
      },
    });
    call(e, F, undefined, [1, 2]);
    expect(out).to.deep.equal({afterRecreate: 2, index: 9, a: 1});
  });

  it('should unlink a mapped index redefined as an accessor', () => {
    const F = makeFunction(e, {
      FormalParameters: ['a'],
      * Body($) {
        const ao = asObj(ok(yield* readBinding($, 'arguments')));
        ok(DefinePropertyOrThrow($, ao, '0', accessor(undefined, undefined, true, true)));
        out['afterDefine'] = ok(yield* readBinding($, 'a'));
        ok(yield* Set($, ao, '0', 8, false));
        ok(yield* writeBinding($, 'a', 5));
        out['index'] = ok(yield* Get($, ao, '0'));
        out['a'] = ok(yield* readBinding($, 'a'));
        return EMPTY;
      },
    });
    call(e, F, undefined, [1]);
    expect(out).to.deep.equal({afterDefine: 1, index: undefined, a: 5});
  });

  it('should give strict functions an unmapped, immutable arguments object', () => {
    const F = makeFunction(e, {
      FormalParameters: ['a'],
      Strict: true,
      * Body($) {
        const ao = asObj(ok(yield* readBinding($, 'arguments')));
        ok(yield* writeBinding($, 'a', 10));
        out['afterWrite'] = ok(yield* Get($, ao, '0'));
        out['callee'] = thrown(yield* Get($, ao, 'callee'));
        out['assign'] = thrown(yield* writeBinding($, 'arguments', 1));
        return EMPTY;
      },
    });
    call(e, F, undefined, [1]);
    expect(out).to.deep.equal({
      afterWrite: 1,
      callee: POISONED,
      assign: 'TypeError: Assignment to constant variable.',
    });
  });

  it('should not map arguments when parameters are duplicated', () => {
    const F = makeFunction(e, {
      FormalParameters: ['a', 'a'],
      * Body($) {
        const ao = asObj(ok(yield* readBinding($, 'arguments')));
        ok(yield* writeBinding($, 'a', 5));
        out['first'] = ok(yield* Get($, ao, '0'));
        out['second'] = ok(yield* Get($, ao, '1'));
        return EMPTY;
      },
    });
    call(e, F, undefined, [1, 2]);
    expect(out).to.deep.equal({first: 1, second: 2});
  });

  it('should skip the arguments object when the name is already taken', () => {
    const byParam = makeFunction(e, {
      FormalParameters: ['arguments'],
      Body: recordBindings(['arguments'], out),
    });
    call(e, byParam, undefined, [7]);
    expect(out['arguments']).to.equal(7);

    const byLexical = makeFunction(e, {
      LexicalDeclarations: [{Name: 'arguments', Constant: false}],
      Body: recordBindings(['arguments'], out),
    });
    call(e, byLexical, undefined, [7]);
    expect(out['arguments']).to.equal(
      "threw ReferenceError: Cannot access 'arguments' before initialization");

    const byFunction = makeFunction(e, {
      FunctionDeclarations: [functionCode({Name: 'arguments'})],
      Body: recordBindings(['arguments'], out),
    });
    call(e, byFunction, undefined, [7]);
    expect(DebugString(out['arguments'])).to.equal('[Function: arguments]');
  });
});

describe('OrdinaryConstruct', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  function point(): OrdinaryFunction {
    return makeFunction(e, {
      Name: 'Point',
      FormalParameters: ['x'],
      * Body($) {
        const thisValue = asObj(ok(ResolveThisBinding($)));
        const x = yield* readBinding($, 'x');
        if (IsAbrupt(x)) return x;
        const status = yield* Set($, thisValue, 'x', x, true);
        if (IsAbrupt(status)) return status;
        return EMPTY;
      },
    });
  }

  it('should allocate this from the prototype property', () => {
    const F = point();
    const obj = ok(evaluate(e, ($) => Construct($, F, [3])));
    expect(obj.Prototype).to.equal(F.OwnProps.get('prototype')?.Value);
    expect(obj.OwnProps.get('x')).to.deep.equal(
      {Value: 3, Writable: true, Enumerable: true, Configurable: true});
  });

  it('should prefer a returned object over this', () => {
    const replacement = plainObject(e);
    const F = makeFunction(e, {Name: 'Factory', * Body() { return ReturnCompletion(replacement); }});
    expect(ok(evaluate(e, ($) => Construct($, F)))).to.equal(replacement);
  });

  it('should ignore a returned primitive', () => {
    const F = makeFunction(e, {Name: 'Prim', * Body() { return ReturnCompletion(42); }});
    const obj = ok(evaluate(e, ($) => Construct($, F)));
    expect(obj.Prototype).to.equal(F.OwnProps.get('prototype')?.Value);
    expect(call(e, F, undefined)).to.equal(42);
  });

  it('should propagate a throw', () => {
    const F = makeFunction(e, {Name: 'Bad', * Body() { return ThrowCompletion('ctor-failed'); }});
    expect(thrown(evaluate(e, ($) => Construct($, F)))).to.equal('"ctor-failed"');
  });

  it('should fall back to %Object.prototype% for a non-object prototype', () => {
    const F = point();
    evaluate(e, ($) => just(ok(DefinePropertyOrThrow($, F, 'prototype', {Value: 1}))));
    const obj = ok(evaluate(e, ($) => Construct($, F, [0])));
    expect(obj.Prototype).to.equal(intrinsic(e, '%Object.prototype%'));
  });

  it('should allocate from newTarget and expose it', () => {
    const F = makeFunction(e, {
      Name: 'Target',
      * Body($) {
        const newTarget = GetNewTarget($);
        return newTarget ? EMPTY : ReturnCompletion('no new target');
      },
    });
    const G = point();
    const obj = ok(evaluate(e, ($) => Construct($, F, [], G)));
    expect(obj.Prototype).to.equal(G.OwnProps.get('prototype')?.Value);
    expect(call(e, F, undefined)).to.equal('no new target');
  });

  it('should reject values that cannot be called or constructed', () => {
    expect(thrown(evaluate(e, ($) => Construct($, 5)))).to.equal('TypeError: 5 is not a constructor');
    expect(thrown(evaluate(e, ($) => Construct($, plainObject(e)))))
      .to.equal('TypeError: {} is not a constructor');
    expect(thrown(call(e, 'f', undefined))).to.equal('TypeError: "f" is not a function');
  });
});

describe('function object properties', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  it('should install length, name, and prototype in order', () => {
    const sloppy = makeFunction(e, {Name: 'sloppy', FormalParameters: ['a', 'b']});
    const strict = makeFunction(e, {Name: 'strict', Strict: true});
    expect([...sloppy.OwnProps.keys()]).to.deep.equal(['length', 'name', 'prototype']);
    expect([...strict.OwnProps.keys()])
      .to.deep.equal(['length', 'caller', 'arguments', 'name', 'prototype']);
    expect(sloppy.OwnProps.get('length')).to.deep.equal(
      {Value: 2, Writable: false, Enumerable: false, Configurable: true});
    expect(sloppy.OwnProps.get('name')).to.deep.equal(
      {Value: 'sloppy', Writable: false, Enumerable: false, Configurable: true});
    const proto = sloppy.OwnProps.get('prototype');
    expect(proto?.Writable).to.equal(true);
    expect(proto?.Enumerable).to.equal(false);
    expect(proto?.Configurable).to.equal(false);
  });

  it('should fix strictness at creation', () => {
    const F = makeFunction(e, {Name: 'f', Strict: true});
    expect(F.Strict).to.equal(true);
    expect(STRICT.is(F.ThisMode)).to.equal(true);
    expect(IsFunc(F)).to.equal(true);
  });
});

describe('the default prototype constructor slot', () => {
  let e: Engine;
  let F: OrdinaryFunction;
  let proto: Obj;
  beforeEach(() => {
    e = engine();
    F = makeFunction(e, {Name: 'Ctor'});
    proto = asObj(F.OwnProps.get('prototype')?.Value);
  });

  it('should hold constructor as a non-enumerable data property', () => {
    expect(proto.OwnProps).to.be.instanceOf(ConstructorSlotMap);
    evaluate(e, ($) => {
      expect(proto.GetOwnProperty($, 'constructor')).to.deep.equal(
        {Value: F, Writable: true, Enumerable: false, Configurable: true});
      expect(proto.OwnPropertyKeys($)).to.deep.equal(['constructor']);
      expect(HasOwnProperty($, proto, 'constructor')).to.equal(true);
      expect(EnumerableOwnKeys($, proto)).to.deep.equal([]);
      return just(undefined);
    });
  });

  it('should keep redefinitions in the slot', () => {
    evaluate(e, ($) => {
      ok(DefinePropertyOrThrow($, proto, 'constructor', {Value: 1}));
      ok(CreateDataProperty($, proto, 'z', 2));
      return just(undefined);
    });
    expect([...proto.OwnProps.keys()]).to.deep.equal(['constructor', 'z']);
    expect(proto.OwnProps.get('constructor')).to.deep.equal(
      {Value: 1, Writable: true, Enumerable: false, Configurable: true});
  });

  it('should move a re-added constructor behind other properties', () => {
    evaluate(e, ($) => {
      expect(proto.Delete($, 'constructor')).to.equal(true);
      ok(CreateDataProperty($, proto, 'a', 1));
      ok(CreateDataProperty($, proto, 'constructor', 2));
      return just(undefined);
    });
    expect([...proto.OwnProps.keys()]).to.deep.equal(['a', 'constructor']);
    expect(proto.OwnProps.get('constructor')).to.deep.equal(
      {Value: 2, Writable: true, Enumerable: true, Configurable: true});
  });

  it('should freeze like any other property', () => {
    const frozen = evaluate(e, ($) => {
      ok(FreezeObject($, proto));
      return just(TestFrozen($, proto));
    });
    expect(frozen).to.equal(true);
    expect(proto.OwnProps.get('constructor')).to.deep.equal(
      {Value: F, Writable: false, Enumerable: false, Configurable: false});
  });
});

describe('poisoned caller and arguments', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  it('should install throwing accessors on strict functions', () => {
    const F = makeFunction(e, {Name: 'strict', Strict: true});
    const thrower = intrinsic(e, '%ThrowTypeError%');
    expect(F.OwnProps.get('caller')).to.deep.equal(
      {Get: thrower, Set: thrower, Enumerable: false, Configurable: true});
    expect(thrown(evaluate(e, ($) => Get($, F, 'caller')))).to.equal(POISONED);
    expect(thrown(evaluate(e, ($) => Set($, F, 'arguments', 1, true)))).to.equal(POISONED);
  });

  it('should leave sloppy functions to inherit from %Function.prototype%', () => {
    const F = makeFunction(e, {Name: 'sloppy'});
    expect(F.OwnProps.has('caller')).to.equal(false);
    expect(intrinsic(e, '%Function.prototype%').OwnProps.has('caller')).to.equal(true);
    expect(thrown(evaluate(e, ($) => Get($, F, 'caller')))).to.equal(POISONED);
  });

  it('should let the creation options override the default', () => {
    const unrestricted = makeFunction(e, {Name: 'u', Strict: true}, {restricted: false});
    const restricted = makeFunction(e, {Name: 'r'}, {restricted: true});
    expect(unrestricted.OwnProps.has('caller')).to.equal(false);
    expect(restricted.OwnProps.has('arguments')).to.equal(true);
  });

  it('should never poison built-in functions', () => {
    expect(intrinsic(e, '%Object%').OwnProps.has('caller')).to.equal(false);
    expect(intrinsic(e, '%Array%').OwnProps.has('arguments')).to.equal(false);
  });

  it('should share one frozen, anonymous %ThrowTypeError%', () => {
    const thrower = intrinsic(e, '%ThrowTypeError%');
    expect(thrower.Extensible).to.equal(false);
    expect(thrower.OwnProps.get('length')).to.deep.equal(
      {Value: 0, Writable: false, Enumerable: false, Configurable: false});
    expect(thrower.OwnProps.get('name')).to.deep.equal(
      {Value: '', Writable: false, Enumerable: false, Configurable: false});
    const a = makeFunction(e, {Name: 'a', Strict: true});
    const b = makeFunction(e, {Name: 'b', Strict: true});
    expect(a.OwnProps.get('caller')?.Get).to.equal(b.OwnProps.get('arguments')?.Set);
  });
});

describe('abrupt completions across calls', () => {
  let e: Engine;
  beforeEach(() => { e = engine(); });

  it('should return a thrown value unchanged and restore the stack', () => {
    let depthInBody = 0;
    const inner = makeFunction(e, {
      Name: 'inner',
      * Body($) {
        depthInBody = $.stackDepth;
        return ThrowCompletion(42);
      },
    });
    const outer = makeFunction(e, {
      Name: 'outer',
      * Body($) {
        const result = yield* Call($, inner, undefined);
        if (IsAbrupt(result)) return result;
        return ReturnCompletion('unreachable');
      },
    });
    const seen = evaluate(e, function*($: VM) {
      const before = $.stackDepth;
      const result = yield* Call($, outer, undefined);
      return {before, after: $.stackDepth, result};
    });
    expect(thrown(seen.result)).to.equal('42');
    expect(seen.result instanceof Abrupt && seen.result.Value).to.equal(42);
    expect(seen.before).to.equal(1);
    expect(seen.after).to.equal(1);
    expect(depthInBody).to.equal(3);
    expect(e.vm.stackDepth).to.equal(0);
  });

  it('should record the active functions on a thrown error', () => {
    const inner = makeFunction(e, {
      Name: 'thrower',
      * Body($) { return $.throw('TypeError', 'nope'); },
    });
    const outer = makeFunction(e, {
      Name: 'outerFn',
      * Body($) {
        const result = yield* Call($, inner, undefined);
        if (IsAbrupt(result)) return result;
        return EMPTY;
      },
    });
    const result = call(e, outer, undefined);
    expect(result).to.be.instanceOf(Abrupt);
    if (!(result instanceof Abrupt)) return;
    expect(asObj(EMPTY.is(result.Value) ? undefined : result.Value).ErrorData)
      .to.equal('TypeError: nope\n    at thrower\n    at outerFn');
  });
});

describe('call tracing', () => {
  it('should log calls and their completions with indentation', () => {
    const lines: string[] = [];
    const e = engine({trace: true, log: (line) => lines.push(line)});
    lines.length = 0;
    const inner = makeFunction(e, {Name: 'inner', FormalParameters: ['x'], * Body() {
      return ThrowCompletion(42);
    }});
    const outer = makeFunction(e, {
      Name: 'outer',
      * Body($) {
        const result = yield* Call($, inner, undefined, ['arg']);
        if (IsAbrupt(result)) return result;
        return EMPTY;
      },
    });
    call(e, outer, undefined);
    expect(lines).to.deep.equal([
      'call outer with 0 arguments',
      '  call inner with 1 argument',
      '  throw 42',
      'throw 42',
    ]);
  });

  it('should log constructions with the resulting object', () => {
    const lines: string[] = [];
    const e = engine({trace: true, log: (line) => lines.push(line)});
    const F = makeFunction(e, {Name: 'Pair', FormalParameters: ['x', 'y'], * Body($) {
      const thisValue = asObj(ok(ResolveThisBinding($)));
      const status = yield* Set($, thisValue, 'x', 3, true);
      if (IsAbrupt(status)) return status;
      return EMPTY;
    }});
    lines.length = 0;
    evaluate(e, ($) => Construct($, F, [1, 2]));
    expect(lines).to.deep.equal(['construct Pair with 2 arguments', 'return {x: 3}']);
  });
});
