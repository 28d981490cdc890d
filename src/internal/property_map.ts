import type { Obj } from './obj';
import { PropertyDescriptor, propWC } from './property_descriptor';
import { PropertyKey } from './val';

/**
 * Storage for an object's own properties.  Iteration is in insertion
 * order; OrdinaryOwnPropertyKeys imposes the index-first ordering on
 * top of it.  A plain `Map` is the default implementation.
 */
export interface PropertyMap extends Iterable<[PropertyKey, PropertyDescriptor]> {
  readonly size: number;
  get(key: PropertyKey): PropertyDescriptor|undefined;
  set(key: PropertyKey, desc: PropertyDescriptor): unknown;
  has(key: PropertyKey): boolean;
  delete(key: PropertyKey): boolean;
  keys(): Iterable<PropertyKey>;
  entries(): Iterable<[PropertyKey, PropertyDescriptor]>;
}

export function newPropertyMap(): PropertyMap {
  return new Map<PropertyKey, PropertyDescriptor>();
}

/**
 * Property storage for a function's default prototype object.  The
 * `constructor` property lives in a dedicated slot in front of the
 * backing map and starts out as {[[Value]]: F, [[Writable]]: true,
 * [[Enumerable]]: false, [[Configurable]]: true}.
 *
 * The slot behaves exactly like a stored property: it is reported by
 * `get`/`has`/`keys` in the position it was created in (first), it
 * can be redefined in place, and `delete` removes it.  Once deleted,
 * a later `constructor` is an ordinary entry of the backing map, so
 * it enumerates after everything that was already there.
 */
export class ConstructorSlotMap implements PropertyMap {
  private slot: PropertyDescriptor|undefined;

  constructor(
    F: Obj,
    private readonly backing: PropertyMap = newPropertyMap(),
  ) {
    this.slot = propWC(F);
  }

  get size(): number {
    return this.backing.size + (this.slot ? 1 : 0);
  }

  get(key: PropertyKey): PropertyDescriptor|undefined {
    if (key === 'constructor' && this.slot) return this.slot;
    return this.backing.get(key);
  }

  set(key: PropertyKey, desc: PropertyDescriptor): this {
    if (key === 'constructor' && this.slot) {
      this.slot = desc;
    } else {
      this.backing.set(key, desc);
    }
    return this;
  }

  has(key: PropertyKey): boolean {
    return (key === 'constructor' && this.slot != null) || this.backing.has(key);
  }

  delete(key: PropertyKey): boolean {
    if (key === 'constructor' && this.slot) {
      this.slot = undefined;
      return true;
    }
    return this.backing.delete(key);
  }

  * keys(): IterableIterator<PropertyKey> {
    if (this.slot) yield 'constructor';
    yield* this.backing.keys();
  }

  * entries(): IterableIterator<[PropertyKey, PropertyDescriptor]> {
    if (this.slot) yield ['constructor', this.slot];
    yield* this.backing.entries();
  }

  [Symbol.iterator](): IterableIterator<[PropertyKey, PropertyDescriptor]> {
    return this.entries();
  }
}
