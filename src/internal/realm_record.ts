import { DefinePropertyOrThrow } from './abstract_object';
import { Assert } from './assert';
import { CR, IsAbrupt } from './completion_record';
import { UNUSED } from './enums';
import { GlobalEnvironmentRecord } from './environment_record';
import { RootExecutionContext } from './execution_context';
import { AddRestrictedFunctionProperties } from './func';
import { Obj, OrdinaryObjectCreate } from './obj';
import { PropertyDescriptor, methodName, prop0, propWC } from './property_descriptor';
import { VM } from './vm';

/**
 * 9.3 Realms
 *
 * A realm owns its intrinsics, its global object and global
 * environment, and the root execution context that host code runs
 * under between script evaluations.
 */
export class RealmRecord {
  /** Intrinsics keyed by their %-delimited names. */
  Intrinsics = new Map<string, Obj>();

  GlobalObject: Obj|undefined = undefined;
  GlobalEnv: GlobalEnvironmentRecord|undefined = undefined;

  /** Free for the embedding host. */
  HostDefined: unknown = undefined;

  readonly RootContext: RootExecutionContext;

  constructor() {
    this.RootContext = new RootExecutionContext(this);
  }
}

/** Builds a member's descriptor once the realm and key are known. */
export type PropertyFactory = (realm: RealmRecord, name: string) => PropertyDescriptor;

export type MemberTable = Record<string|symbol, PropertyDescriptor|PropertyFactory>;

/**
 * Handed to each plugin's `intrinsics` hook while a realm is set up.
 * Intrinsics registered here are visible to later plugins, and every
 * `expose`d name becomes a writable, configurable global property once
 * the global object exists.
 */
export class RealmBuilder {
  readonly globals = new Map<string, Obj>();

  constructor(readonly realm: RealmRecord) {}

  intrinsic(name: string): Obj {
    const found = this.realm.Intrinsics.get(name);
    Assert(found, `No intrinsic: ${name}`);
    return found;
  }

  register<T extends Obj>(name: string, value: T): T {
    this.realm.Intrinsics.set(name, value);
    if (!intrinsicNames.has(value)) intrinsicNames.set(value, name);
    return value;
  }

  expose(name: string, value: Obj): void {
    this.globals.set(name, value);
  }

  /** Installs builtin members; factories receive the realm and the key's function name. */
  members(target: Obj, table: MemberTable): void {
    for (const key of Reflect.ownKeys(table)) {
      const entry = table[key];
      target.OwnProps.set(key, typeof entry === 'function' ? entry(this.realm, methodName(key)) : entry);
    }
  }

  /**
   * Wires `ctor.prototype` (frozen slot) and `proto.constructor`,
   * registers %Name% and %Name.prototype%, and exposes the global.
   */
  constructorPair(name: string, ctor: Obj, proto: Obj): void {
    ctor.OwnProps.set('prototype', prop0(proto));
    proto.OwnProps.set('constructor', propWC(ctor));
    this.register(`%${name}%`, ctor);
    this.register(`%${name}.prototype%`, proto);
    this.expose(name, ctor);
  }
}

const intrinsicNames = new WeakMap<Obj, string>();

export function getIntrinsicName(o: Obj): string|undefined {
  return intrinsicNames.get(o);
}

/**
 * 9.3.2 CreateIntrinsics ( realmRec )
 *
 * Plugins run in installation order, so each may look up what its
 * deps registered.  %Function.prototype% is poisoned last.
 */
export function CreateIntrinsics($: VM, realmRec: RealmRecord): RealmBuilder {
  realmRec.Intrinsics = new Map<string, Obj>();
  const builder = new RealmBuilder(realmRec);
  for (const plugin of $.plugins.values()) plugin.intrinsics?.(builder);
  const functionPrototype = realmRec.Intrinsics.get('%Function.prototype%');
  if (functionPrototype && realmRec.Intrinsics.has('%ThrowTypeError%')) {
    AddRestrictedFunctionProperties(functionPrototype, realmRec);
  }
  return builder;
}

/** 9.3.3 SetRealmGlobalObject ( realmRec, globalObj, thisValue ) */
export function SetRealmGlobalObject(
  realmRec: RealmRecord,
  globalObj: Obj = OrdinaryObjectCreate({
    Prototype: realmRec.Intrinsics.get('%Object.prototype%') ?? null,
  }),
  thisValue: Obj = globalObj,
): UNUSED {
  realmRec.GlobalObject = globalObj;
  realmRec.GlobalEnv = new GlobalEnvironmentRecord(globalObj, thisValue);
  return UNUSED;
}

/** 9.3.4 SetDefaultGlobalBindings ( realmRec ) */
export function SetDefaultGlobalBindings(
  $: VM,
  realmRec: RealmRecord,
  globals: ReadonlyMap<string, Obj>,
): CR<Obj> {
  const target = realmRec.GlobalObject;
  Assert(target, 'Global object is not set');
  for (const [name, value] of globals) {
    const defined = DefinePropertyOrThrow($, target, name, propWC(value));
    if (IsAbrupt(defined)) return defined;
  }
  return target;
}

/**
 * 9.6 InitializeHostDefinedRealm ( )
 *
 * Setup runs on the realm's root context, which is popped again on
 * every exit path.
 */
export function InitializeHostDefinedRealm($: VM, realm: RealmRecord): CR<UNUSED> {
  $.enterContext(realm.RootContext);
  try {
    const builder = CreateIntrinsics($, realm);
    SetRealmGlobalObject(realm);
    const bound = SetDefaultGlobalBindings($, realm, builder.globals);
    return IsAbrupt(bound) ? bound : UNUSED;
  } finally {
    $.popContext(realm.RootContext);
  }
}
