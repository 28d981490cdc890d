/**
 * @fileoverview
 * Sentinel values used by the engine's internal records.  None of
 * them can reach script code; each prints as `~name~` in debug output.
 */

class EnumSym<const S extends string> {
  constructor(readonly Symbol: S) {}
  is<T>(this: T, arg: unknown): arg is T {
    return arg === this;
  }
  toString(): string {
    return `~${this.Symbol}~`;
  }
}

// Completion and reference markers
export const UNUSED: UNUSED = new EnumSym('unused');
export interface UNUSED extends EnumSym<'unused'> {}
export const EMPTY: EMPTY = new EnumSym('empty');
export interface EMPTY extends EnumSym<'empty'> {}
export const UNRESOLVABLE: UNRESOLVABLE = new EnumSym('unresolvable');
export interface UNRESOLVABLE extends EnumSym<'unresolvable'> {}

// How a function call binds `this`
export const STRICT: STRICT = new EnumSym('strict');
export interface STRICT extends EnumSym<'strict'> {}
export const GLOBAL: GLOBAL = new EnumSym('global');
export interface GLOBAL extends EnumSym<'global'> {}

// Whether a function environment has bound `this` yet
export const INITIALIZED: INITIALIZED = new EnumSym('initialized');
export interface INITIALIZED extends EnumSym<'initialized'> {}
export const UNINITIALIZED: UNINITIALIZED = new EnumSym('uninitialized');
export interface UNINITIALIZED extends EnumSym<'uninitialized'> {}

// What an array iterator yields
export const KEY: KEY = new EnumSym('key');
export interface KEY extends EnumSym<'key'> {}
export const VALUE: VALUE = new EnumSym('value');
export interface VALUE extends EnumSym<'value'> {}
export const KEY_VALUE: KEY_VALUE = new EnumSym('key+value');
export interface KEY_VALUE extends EnumSym<'key+value'> {}
