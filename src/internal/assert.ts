/**
 * Checks an internal invariant.  Failures are host exceptions, not
 * throw completions.
 */
export function Assert(arg: unknown, msg?: string): asserts arg {
  if (!arg) throw new Error(`Assertion failed${msg ? `: ${msg}` : ''}`);
}
