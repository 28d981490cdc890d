import type { Obj } from './obj';

/**
 * 6.1 ECMAScript Language Types
 *
 * An ECMAScript language value is one of undefined, null, a Boolean,
 * a String, a Symbol, a Number, or an Object reference.  Objects are
 * shared by reference; everything else is immutable and compared by
 * value.
 */
export type Prim = undefined|null|boolean|string|symbol|number;
export type Val = Prim|Obj;

/** Property keys are Strings or Symbols; numbers are canonicalized first. */
export type PropertyKey = string|symbol;
