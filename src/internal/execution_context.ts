import { Assert } from './assert';
import { CR } from './completion_record';
import { EnvironmentRecord, FunctionEnvironmentRecord, GetIdentifierReference } from './environment_record';
import type { Func } from './func';
import type { Obj } from './obj';
import type { RealmRecord } from './realm_record';
import type { ReferenceRecord } from './reference_record';
import type { ScriptRecord } from './script_record';
import { Val } from './val';
import { ECR, VM } from './vm';

/**
 * 9.4 Execution Contexts
 *
 * One entry of the VM's context stack.  The top entry is the running
 * context; its Realm is the current realm and its Function the active
 * function object.  Script code has a null Function, host-driven code
 * a null ScriptOrModule.
 */
export abstract class ExecutionContext {
  /** Set while this is the top of the stack. */
  running = false;

  constructor(
    readonly Realm: RealmRecord,
    readonly Function: Func|null,
    readonly ScriptOrModule: ScriptRecord|null,
  ) {}

  suspend(): void {
    this.running = false;
  }

  resume(): void {
    this.running = true;
  }
}

/** Pushed when a realm is set up; names resolve against its global environment. */
export class RootExecutionContext extends ExecutionContext {
  constructor(realm: RealmRecord) {
    super(realm, null, null);
  }
}

/** Built-in calls run here, with no environments of their own. */
export class BuiltinExecutionContext extends ExecutionContext {
  constructor(F: Func, realm: RealmRecord) {
    super(realm, F, null);
  }
}

/**
 * Context for script and function code.  Names resolve through
 * LexicalEnvironment; `var` bindings live in VariableEnvironment.
 * Strictness travels with the context.
 */
export class CodeExecutionContext extends ExecutionContext {
  constructor(
    Realm: RealmRecord,
    Function: Func|null,
    ScriptOrModule: ScriptRecord|null,
    public LexicalEnvironment: EnvironmentRecord,
    public VariableEnvironment: EnvironmentRecord,
    readonly Strict: boolean,
  ) {
    super(Realm, Function, ScriptOrModule);
  }
}

export function GetLexicalEnvironment($: VM): EnvironmentRecord|undefined {
  const ctx = $.getRunningContext();
  if (ctx instanceof CodeExecutionContext) return ctx.LexicalEnvironment;
  if (ctx instanceof RootExecutionContext) return ctx.Realm.GlobalEnv;
  return undefined;
}

function IsStrictContext($: VM): boolean {
  const ctx = $.getRunningContext();
  return ctx instanceof CodeExecutionContext && ctx.Strict;
}

/**
 * 9.4.1 GetActiveScriptOrModule: the running context's script, or
 * null on an empty stack.  Function contexts carry the script their
 * code came from, so nothing below the top is searched.
 */
export function GetActiveScriptOrModule($: VM): ScriptRecord|null {
  if (!$.isRunning()) return null;
  return $.getRunningContext().ScriptOrModule;
}

/**
 * 9.4.2 ResolveBinding ( name [ , env ] )
 *
 * Looks `name` up from `env`, or from the running context's lexical
 * environment, with that context's strictness.
 */
export function* ResolveBinding($: VM, name: string,
                                env?: EnvironmentRecord): ECR<ReferenceRecord> {
  env ??= GetLexicalEnvironment($);
  Assert(env instanceof EnvironmentRecord, 'No lexical environment');
  return yield* GetIdentifierReference($, env, name, IsStrictContext($));
}

/** 9.4.3 The nearest environment with a `this` binding; the global one always has one. */
export function GetThisEnvironment($: VM): EnvironmentRecord {
  let env = GetLexicalEnvironment($);
  Assert(env instanceof EnvironmentRecord, 'No lexical environment');
  while (!env.HasThisBinding()) {
    Assert(env.OuterEnv != null);
    env = env.OuterEnv;
  }
  return env;
}

export function ResolveThisBinding($: VM): CR<Val> {
  return GetThisEnvironment($).GetThisBinding($);
}

/** 9.4.5 Only meaningful inside function code. */
export function GetNewTarget($: VM): Obj|undefined {
  const envRec = GetThisEnvironment($);
  Assert(envRec instanceof FunctionEnvironmentRecord);
  return envRec.NewTarget;
}

export function GetGlobalObject($: VM): Obj {
  const global = $.getRealm().GlobalObject;
  Assert(global, 'Realm has no global object');
  return global;
}
