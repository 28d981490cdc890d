import { ToBoolean } from './abstract_conversion';
import { Call, Get, GetMethod, GetV } from './abstract_object';
import { Assert } from './assert';
import { IsAbrupt } from './completion_record';
import { Func, IsFunc } from './func';
import { CreateIteratorFromClosure, listProducer } from './iterators';
import { Obj, OrdinaryObjectCreate } from './obj';
import { propWEC } from './property_descriptor';
import { Val } from './val';
import { ECR, VM } from './vm';

/**
 * @fileoverview
 * 7.4 Operations on Iterator Objects
 *
 * Host code drives script-visible iterators through an IteratorRecord,
 * which caches `next` once so later changes to the iterator's `next`
 * property are not observed.
 */

export class IteratorRecord {
  constructor(
    readonly Iterator: Obj,
    readonly NextMethod: Func,
    /** Set once a step reports `done`. */
    public Done: boolean,
  ) {}
}

/** 7.4.3 GetIterator ( obj, sync ): calls obj[@@iterator]() and caches `next`. */
export function* GetIterator($: VM, obj: Val): ECR<IteratorRecord> {
  const method = yield* GetMethod($, obj, Symbol.iterator);
  if (IsAbrupt(method)) return method;
  if (method === undefined) return $.throw('TypeError', 'object is not iterable');
  const iterator = yield* Call($, method, obj);
  if (IsAbrupt(iterator)) return iterator;
  if (!(iterator instanceof Obj)) {
    return $.throw('TypeError', 'Result of the Symbol.iterator method is not an object');
  }
  const nextMethod = yield* GetV($, iterator, 'next');
  if (IsAbrupt(nextMethod)) return nextMethod;
  if (!IsFunc(nextMethod)) return $.throw('TypeError', 'Iterator next method is not callable');
  return new IteratorRecord(iterator, nextMethod, false);
}

/** 7.4.4 IteratorNext: an optional value is passed on to `next`. */
export function* IteratorNext($: VM, record: IteratorRecord, value?: Val): ECR<Obj> {
  const args = value === undefined ? [] : [value];
  const result = yield* Call($, record.NextMethod, record.Iterator, args);
  if (IsAbrupt(result)) return result;
  return result instanceof Obj ? result :
    $.throw('TypeError', 'Iterator result is not an object');
}

export function* IteratorComplete($: VM, iterResult: Obj): ECR<boolean> {
  const done = yield* Get($, iterResult, 'done');
  return IsAbrupt(done) ? done : ToBoolean(done);
}

export function IteratorValue($: VM, iterResult: Obj): ECR<Val> {
  return Get($, iterResult, 'value');
}

/** 7.4.7 IteratorStep: the result object, or false once done. */
export function* IteratorStep($: VM, record: IteratorRecord): ECR<Obj|false> {
  const result = yield* IteratorNext($, record);
  if (IsAbrupt(result)) return result;
  const done = yield* IteratorComplete($, result);
  if (IsAbrupt(done)) return done;
  if (!done) return result;
  record.Done = true;
  return false;
}

/** 7.4.11 CreateIterResultObject ( value, done ) */
export function CreateIterResultObject($: VM, value: Val, done: boolean): Obj {
  return OrdinaryObjectCreate({Prototype: $.getIntrinsic('%Object.prototype%')},
                              {value: propWEC(value), done: propWEC(done)});
}

/**
 * 7.4.12 CreateListIteratorRecord ( list )
 *
 * The iterator is branded for %ListIteratorPrototype%, so only that
 * prototype's `next` advances it.  Script code never sees it.
 */
export function CreateListIteratorRecord($: VM, list: readonly Val[]): IteratorRecord {
  const proto = $.getIntrinsic('%ListIteratorPrototype%');
  const iterator = CreateIteratorFromClosure(listProducer(list), '%ListIteratorPrototype%', proto);
  const next = proto.OwnProps.get('next');
  const nextMethod = next && 'Value' in next ? next.Value : undefined;
  Assert(IsFunc(nextMethod), 'List iterator prototype is missing next');
  return new IteratorRecord(iterator, nextMethod, false);
}

/** 7.4.13 IteratorToList: drains the iterator in order. */
export function* IteratorToList($: VM, record: IteratorRecord): ECR<Val[]> {
  const values: Val[] = [];
  for (;;) {
    const next = yield* IteratorStep($, record);
    if (IsAbrupt(next)) return next;
    if (next === false) return values;
    const value = yield* IteratorValue($, next);
    if (IsAbrupt(value)) return value;
    values.push(value);
  }
}
