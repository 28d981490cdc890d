import { IsAbrupt } from './completion_record';
import { CreateIterResultObject } from './abstract_iterator';
import { method } from './func';
import { objectAndFunctionPrototype } from './prelude';
import { Obj, ObjectSlots, OrdinaryObject, OrdinaryObjectCreate } from './obj';
import { PropertyRecord, propC } from './property_descriptor';
import { RealmBuilder } from './realm_record';
import { memoize } from './util';
import { Val } from './val';
import { DebugString, ECR, Plugin, VM } from './vm';

/**
 * One step of a host-side producer: either the next value, or the end
 * of the sequence.
 */
export type ProducerStep = {Done: false, Value: Val}|{Done: true};

/**
 * Supplies successive values to a built-in iterator.  The producer is
 * called once per `next()` and is dropped as soon as it reports the
 * end or throws, so an exhausted iterator never calls it again.
 */
export type IteratorProducer = ($: VM) => ECR<ProducerStep>;

export interface BuiltinIteratorSlots extends ObjectSlots {
  IteratorBrand: string;
  Producer: IteratorProducer;
}

/**
 * An iterator whose `next()` advances a host producer.  This stands in
 * for the generator objects that CreateIteratorFromClosure would build:
 * there is no suspended body, only a cursor captured by the producer.
 */
export type BuiltinIterator = InstanceType<ReturnType<typeof BuiltinIterator>>;
export const BuiltinIterator = memoize(() => class BuiltinIterator extends OrdinaryObject() {
  readonly IteratorBrand: string;
  Producer: IteratorProducer|undefined;

  constructor(slots: BuiltinIteratorSlots, props: PropertyRecord = {}) {
    super(slots, props);
    this.IteratorBrand = slots.IteratorBrand;
    this.Producer = slots.Producer;
  }
});

/**
 * 27.5.3.1 CreateIteratorFromClosure ( closure, generatorBrand,
 *          generatorPrototype )
 *
 * The brand is checked by `next()`; an iterator from one family is
 * never accepted by another family's `next`.
 */
export function CreateIteratorFromClosure(
  producer: IteratorProducer,
  brand: string,
  prototype: Obj,
): BuiltinIterator {
  return new (BuiltinIterator())({
    Prototype: prototype,
    IteratorBrand: brand,
    Producer: producer,
  });
}

/**
 * 27.5.3.3 GeneratorResume ( generator, value, generatorBrand )
 *
 * The receiver's brand is checked before any producer runs, so a
 * mismatched call advances nothing.
 */
export function* GeneratorResume($: VM, generator: Val, brand: string): ECR<Obj> {
  if (!(generator instanceof BuiltinIterator()) || generator.IteratorBrand !== brand) {
    return $.throw('TypeError', `next method called on incompatible receiver ${DebugString(generator)}`);
  }
  const producer = generator.Producer;
  if (producer == undefined) return CreateIterResultObject($, undefined, true);
  const step = yield* producer($);
  if (IsAbrupt(step) || step.Done) {
    generator.Producer = undefined;
    if (IsAbrupt(step)) return step;
    return CreateIterResultObject($, undefined, true);
  }
  return CreateIterResultObject($, step.Value, false);
}

/** Producer over a fixed list of values. */
export function listProducer(list: readonly Val[]): IteratorProducer {
  let index = 0;
  return function*(): ECR<ProducerStep> {
    if (index >= list.length) return {Done: true};
    return {Done: false, Value: list[index++]};
  };
}

export const iterators: Plugin = {
  id: 'iterators',
  deps: () => [objectAndFunctionPrototype],
  intrinsics(b) {
    const iteratorPrototype = b.register('%IteratorPrototype%', OrdinaryObjectCreate({
      Prototype: b.intrinsic('%Object.prototype%'),
    }));
    b.members(iteratorPrototype, {
      [Symbol.iterator]: method(function*(_$, thisValue) { return thisValue; }),
    });
    // Not exposed as a global.
    createBrandedIteratorPrototype(b, '%ListIteratorPrototype%', 'List Iterator');
  },
};

/**
 * Registers an iterator prototype under `brand` whose `next` accepts
 * only iterators created with that same brand.
 */
export function createBrandedIteratorPrototype(
  b: RealmBuilder,
  brand: string,
  toStringTag: string,
): Obj {
  const proto = b.register(brand, OrdinaryObjectCreate({
    Prototype: b.intrinsic('%IteratorPrototype%'),
  }));
  b.members(proto, {
    'next': method(function*($, thisValue) {
      return yield* GeneratorResume($, thisValue, brand);
    }),
    [Symbol.toStringTag]: propC(toStringTag),
  });
  return proto;
}
