import { Set } from './abstract_object';
import { UNRESOLVABLE, UNUSED } from './enums';
import { EnvironmentRecord } from './environment_record';
import { GetGlobalObject } from './execution_context';
import { Val } from './val';
import { ECR, VM } from './vm';

/**
 * 6.2.5 Reference Records
 *
 * A resolved identifier: the environment record holding the binding,
 * or UNRESOLVABLE when no environment on the chain has it.  Host
 * bodies read and write names through these; property references are
 * never created here.
 */
export class ReferenceRecord {
  constructor(
    readonly Base: EnvironmentRecord|UNRESOLVABLE,
    readonly ReferencedName: string,
    /** Whether the lookup came from strict code. */
    readonly Strict: boolean,
  ) {}

  resolvedTo(): EnvironmentRecord|undefined {
    return UNRESOLVABLE.is(this.Base) ? undefined : this.Base;
  }
}

/** 6.2.5.5 GetValue ( V ): a missing name is a ReferenceError. */
export function* GetValue($: VM, V: ReferenceRecord|Val): ECR<Val> {
  if (!(V instanceof ReferenceRecord)) return V;
  const env = V.resolvedTo();
  if (env) return yield* env.GetBindingValue($, V.ReferencedName, V.Strict);
  return $.throw('ReferenceError', `${V.ReferencedName} is not defined`);
}

/**
 * 6.2.5.6 PutValue ( V, W )
 *
 * Sloppy code assigning a missing name creates a global object
 * property; strict code throws.
 */
export function* PutValue($: VM, V: ReferenceRecord|Val, W: Val): ECR<UNUSED> {
  if (!(V instanceof ReferenceRecord)) {
    return $.throw('ReferenceError', 'Invalid assignment target');
  }
  const env = V.resolvedTo();
  if (env) return yield* env.SetMutableBinding($, V.ReferencedName, W, V.Strict);
  if (V.Strict) return $.throw('ReferenceError', `${V.ReferencedName} is not defined`);
  return yield* Set($, GetGlobalObject($), V.ReferencedName, W, false);
}
