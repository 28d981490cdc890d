import { EMPTY } from './enums';
import { Assert } from './assert';
import { Val } from './val';

/**
 * @fileoverview
 * 6.2.4 Completion Records
 *
 * A normal completion is just its value, so `CR<T>` is `T|Abrupt` and
 * callers check with `IsAbrupt` before using a result.  Throw, return,
 * break and continue are `Abrupt` instances; only throw and return
 * carry a value, only break and continue a label.
 */
export type CR<T> = T|Abrupt;

export enum CompletionType {
  Normal = 'normal',
  Return = 'return',
  Throw = 'throw',
  Continue = 'continue',
  Break = 'break',
}
export type AbruptType = Exclude<CompletionType, CompletionType.Normal>;

export class Abrupt {
  constructor(
    readonly Type: AbruptType,
    readonly Value: Val|EMPTY,
    /** Label of a labelled break or continue. */
    readonly Target: string|EMPTY,
  ) {}
}

/**
 * Makes handing an unstarted generator (an `ECR` that was never
 * `yield*`ed) to the helpers below a compile error.
 */
export type NotGen<T> = T extends Generator ? [never] : [];

function looksLikeGenerator(x: unknown): boolean {
  return typeof x === 'object' && x != null && 'next' in x &&
    typeof x.next === 'function' && Symbol.iterator in x;
}

export function IsAbrupt<T>(x: CR<T>, ..._: NotGen<T>): x is Abrupt {
  if (looksLikeGenerator(x)) {
    throw new Error('IsAbrupt on generator: forgot to yield?');
  }
  return x instanceof Abrupt;
}

/** For results that cannot be abrupt; a host error if one is. */
export function CastNotAbrupt<T>(x: CR<T>, ..._: NotGen<T>): T {
  if (x instanceof Abrupt) {
    throw new Error(`Unexpected ${x.Type} completion`);
  }
  return x;
}

export function NormalCompletion<T>(value: T): CR<T> {
  return value;
}

type ValueCompletion<K extends AbruptType> = Abrupt & {Type: K, Value: Val};

/** Any language value may be thrown, not only errors. */
export function ThrowCompletion(value: Val): CR<never> {
  return new Abrupt(CompletionType.Throw, value, EMPTY);
}

export function ReturnCompletion(value: Val): CR<never> {
  return new Abrupt(CompletionType.Return, value, EMPTY);
}

export function BreakCompletion(target: string|EMPTY = EMPTY): CR<never> {
  return new Abrupt(CompletionType.Break, EMPTY, target);
}

export function ContinueCompletion(target: string|EMPTY = EMPTY): CR<never> {
  return new Abrupt(CompletionType.Continue, EMPTY, target);
}

export function IsThrowCompletion<T>(
  completion: CR<T>,
  ...rest: NotGen<T>
): completion is ValueCompletion<CompletionType.Throw> {
  return CompletionTypeOf(completion, ...rest) === CompletionType.Throw;
}

export function IsReturnCompletion<T>(
  completion: CR<T>,
  ...rest: NotGen<T>
): completion is ValueCompletion<CompletionType.Return> {
  return CompletionTypeOf(completion, ...rest) === CompletionType.Return;
}

export function CompletionTypeOf<T>(completion: CR<T>, ...rest: NotGen<T>): CompletionType {
  return IsAbrupt(completion, ...rest) ? completion.Type : CompletionType.Normal;
}

export function CompletionValue<T>(completion: CR<T>, ...rest: NotGen<T>): T|Val|EMPTY {
  return IsAbrupt(completion, ...rest) ? completion.Value : completion;
}

/**
 * 6.2.4.3 UpdateEmpty ( completionRecord, value )
 *
 * Fills in `value` where the completion carries none.  Throw and
 * return completions always carry one already.
 */
export function UpdateEmpty<T, U extends Val>(
  completionRecord: CR<T|EMPTY>,
  value: U,
): CR<T|U> {
  if (!(completionRecord instanceof Abrupt)) {
    return EMPTY.is(completionRecord) ? value : completionRecord;
  }
  if (completionRecord.Value !== EMPTY) return completionRecord;
  Assert(completionRecord.Type === CompletionType.Break ||
    completionRecord.Type === CompletionType.Continue);
  return new Abrupt(completionRecord.Type, value, completionRecord.Target);
}
