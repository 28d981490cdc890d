import { Get } from './abstract_object';
import { ToString } from './abstract_conversion';
import { Assert } from './assert';
import { IsAbrupt } from './completion_record';
import { CreateBuiltinFunction, callOrConstruct, method } from './func';
import { Obj, OrdinaryCreateFromConstructor, OrdinaryObjectCreate } from './obj';
import { prelude } from './prelude';
import { propWC } from './property_descriptor';
import { RealmBuilder } from './realm_record';
import { Val } from './val';
import { DebugString, ECR, Plugin, VM } from './vm';

/**
 * @fileoverview
 * Error and the native errors the engine itself throws.  Each native
 * constructor inherits from %Error% and its prototype from
 * %Error.prototype%, carrying its own `name` and an empty `message`.
 */

/** Error types the engine raises through `$.throw`. */
export const NATIVE_ERRORS = [
  'RangeError',
  'ReferenceError',
  'SyntaxError',
  'TypeError',
] as const;

export type NativeErrorName = typeof NATIVE_ERRORS[number];

export const errorObject: Plugin = {
  id: 'errorObject',
  deps: () => [prelude],
  intrinsics(b) {
    const errorCtor = CreateBuiltinFunction(
      callOrConstruct(constructError('%Error.prototype%')), 1, 'Error', b.realm);
    const errorPrototype = errorPrototypeFor(b, 'Error', errorCtor, b.intrinsic('%Object.prototype%'));
    b.members(errorPrototype, {
      'toString': method(ErrorPrototypeToString),
    });

    for (const name of NATIVE_ERRORS) {
      const ctor = CreateBuiltinFunction(
        callOrConstruct(constructError(`%${name}.prototype%`)), 1, name, b.realm, errorCtor);
      errorPrototypeFor(b, name, ctor, errorPrototype);
    }
  },
};

/** Creates, registers and exposes the prototype of one error constructor. */
function errorPrototypeFor(b: RealmBuilder, name: string, ctor: Obj, parent: Obj): Obj {
  const prototype = OrdinaryObjectCreate({Prototype: parent});
  b.constructorPair(name, ctor, prototype);
  b.members(prototype, {
    'message': propWC(''),
    'name': propWC(name),
  });
  return prototype;
}

/**
 * Shared body of Error and every native error.  Calling without `new`
 * constructs as well.  A message is stringified and stored as an own
 * non-enumerable property; the rendered trace goes to [[ErrorData]].
 */
function constructError(defaultProto: string) {
  return function*($: VM, NewTarget: Obj|undefined, message: Val): ECR<Obj> {
    const newTarget = NewTarget ?? $.getActiveFunctionObject();
    Assert(newTarget, 'Error constructor called outside a function context');
    const O = yield* OrdinaryCreateFromConstructor($, newTarget, defaultProto, {ErrorData: ''});
    if (IsAbrupt(O)) return O;
    if (message !== undefined) {
      const msg = yield* ToString($, message);
      if (IsAbrupt(msg)) return msg;
      O.OwnProps.set('message', propWC(msg));
    }
    $.captureStackTrace(O);
    return O;
  };
}

/** "name: message", dropping whichever side is empty. */
function* ErrorPrototypeToString($: VM, O: Val): ECR<string> {
  if (!(O instanceof Obj)) {
    return $.throw(
      'TypeError',
      `Method Error.prototype.toString called on incompatible receiver ${DebugString(O)}`);
  }
  const name = yield* readPart($, O, 'name', 'Error');
  if (IsAbrupt(name)) return name;
  const msg = yield* readPart($, O, 'message', '');
  if (IsAbrupt(msg)) return msg;
  if (!name) return msg;
  if (!msg) return name;
  return `${name}: ${msg}`;
}

function* readPart($: VM, O: Obj, key: string, fallback: string): ECR<string> {
  const value = yield* Get($, O, key);
  if (IsAbrupt(value)) return value;
  return value == null ? fallback : yield* ToString($, value);
}
