import { IsExtensible } from './abstract_compare';
import { DefinePropertyOrThrow, Get, HasOwnProperty, HasProperty, Set as Set$ } from './abstract_object';
import { Assert } from './assert';
import { CR, IsAbrupt } from './completion_record';
import { INITIALIZED, UNINITIALIZED, UNRESOLVABLE, UNUSED } from './enums';
import type { Func } from './func';
import { Obj } from './obj';
import { IsDataDescriptor, PropertyDescriptor } from './property_descriptor';
import { ReferenceRecord } from './reference_record';
import { Val } from './val';
import { ECR, VM, runImmediate } from './vm';

/**
 * 9.1 Environment Records
 *
 * Scopes chained through `OuterEnv`.  Methods that can reach a binding
 * object (and so run accessors) are generators; the declarative
 * implementations never yield.
 */
export abstract class EnvironmentRecord {
  abstract readonly OuterEnv: EnvironmentRecord|null;

  abstract HasBinding($: VM, N: string): ECR<boolean>;

  /** Creates an uninitialized binding; `D` allows DeleteBinding to remove it. */
  abstract CreateMutableBinding($: VM, N: string, D: boolean): CR<UNUSED>;

  /** `S` makes every later assignment throw, even from sloppy code. */
  abstract CreateImmutableBinding($: VM, N: string, S: boolean): CR<UNUSED>;

  abstract InitializeBinding($: VM, N: string, V: Val): ECR<UNUSED>;

  /** With `S`, a missing or immutable binding throws instead of being ignored. */
  abstract SetMutableBinding($: VM, N: string, V: Val, S: boolean): ECR<UNUSED>;

  /** An uninitialized binding throws ReferenceError whatever `S` is. */
  abstract GetBindingValue($: VM, N: string, S: boolean): ECR<Val>;

  /** False only when the binding exists and cannot be removed. */
  abstract DeleteBinding($: VM, N: string): CR<boolean>;

  abstract HasThisBinding(): boolean;

  /** Overridden by the records whose HasThisBinding() is true. */
  GetThisBinding(_$: VM): CR<Val> {
    throw new Error(`${this.constructor.name} has no this binding`);
  }
}

interface Binding {
  Value: Val;
  Initialized: boolean;
  readonly Mutable: boolean;
  readonly Deletable: boolean;
  readonly Strict: boolean;
}

function uninitializedError($: VM, N: string): CR<never> {
  return $.throw('ReferenceError', `Cannot access '${N}' before initialization`);
}

/**
 * 9.1.1.1 Declarative Environment Records
 *
 * Bindings live in a map on the record itself, each tracking whether
 * it has been initialized (the temporal dead zone).
 */
export class DeclarativeEnvironmentRecord extends EnvironmentRecord {
  protected readonly bindings = new Map<string, Binding>();

  constructor(readonly OuterEnv: EnvironmentRecord|null) {
    super();
  }

  override * HasBinding(_$: VM, N: string): ECR<boolean> {
    return this.bindings.has(N);
  }

  private create(N: string, binding: Omit<Binding, 'Value'|'Initialized'>): UNUSED {
    Assert(!this.bindings.has(N), `Binding already exists: ${N}`);
    this.bindings.set(N, {Value: undefined, Initialized: false, ...binding});
    return UNUSED;
  }

  override CreateMutableBinding(_$: VM, N: string, D: boolean): CR<UNUSED> {
    return this.create(N, {Mutable: true, Deletable: D, Strict: false});
  }

  override CreateImmutableBinding(_$: VM, N: string, S: boolean): CR<UNUSED> {
    return this.create(N, {Mutable: false, Deletable: false, Strict: S});
  }

  override * InitializeBinding(_$: VM, N: string, V: Val): ECR<UNUSED> {
    const binding = this.bindings.get(N);
    Assert(binding && !binding.Initialized, `Expected uninitialized binding: ${N}`);
    binding.Value = V;
    binding.Initialized = true;
    return UNUSED;
  }

  /**
   * 9.1.1.1.5 SetMutableBinding ( N, V, S )
   *
   * A missing binding is created (deletable) in sloppy code.  A
   * constant set from sloppy code is silently ignored unless it was
   * created strict.
   */
  override * SetMutableBinding($: VM, N: string, V: Val, S: boolean): ECR<UNUSED> {
    const binding = this.bindings.get(N);
    if (!binding) {
      if (S) return $.throw('ReferenceError', `${N} is not defined`);
      this.CreateMutableBinding($, N, true);
      return yield* this.InitializeBinding($, N, V);
    }
    if (!binding.Initialized) return uninitializedError($, N);
    if (binding.Mutable) {
      binding.Value = V;
    } else if (S || binding.Strict) {
      return $.throw('TypeError', 'Assignment to constant variable.');
    }
    return UNUSED;
  }

  override * GetBindingValue($: VM, N: string, _S: boolean): ECR<Val> {
    const binding = this.bindings.get(N);
    Assert(binding, `No binding: ${N}`);
    return binding.Initialized ? binding.Value : uninitializedError($, N);
  }

  override DeleteBinding(_$: VM, N: string): CR<boolean> {
    const binding = this.bindings.get(N);
    Assert(binding, `No binding: ${N}`);
    return binding.Deletable && this.bindings.delete(N);
  }

  override HasThisBinding(): boolean {
    return false;
  }

  /** Names bound in this record, in creation order. */
  bindingNames(): IterableIterator<string> {
    return this.bindings.keys();
  }
}

/**
 * 9.1.1.2 Object Environment Records
 *
 * Bindings are the properties of `BindingObject`, own or inherited,
 * enumerable or not.  They are always mutable and never track
 * initialization.
 */
export class ObjectEnvironmentRecord extends EnvironmentRecord {
  constructor(
    readonly BindingObject: Obj,
    readonly OuterEnv: EnvironmentRecord|null,
  ) {
    super();
  }

  override * HasBinding($: VM, N: string): ECR<boolean> {
    return HasProperty($, this.BindingObject, N);
  }

  override CreateMutableBinding($: VM, N: string, D: boolean): CR<UNUSED> {
    return DefinePropertyOrThrow($, this.BindingObject, N, {
      Value: undefined,
      Writable: true,
      Enumerable: true,
      Configurable: D,
    });
  }

  override CreateImmutableBinding(_$: VM, N: string, _S: boolean): CR<UNUSED> {
    throw new Error(`Cannot create immutable binding ${N} on an object environment`);
  }

  override * InitializeBinding($: VM, N: string, V: Val): ECR<UNUSED> {
    return yield* this.SetMutableBinding($, N, V, false);
  }

  /** The property may have been deleted since the lookup; strict code then throws. */
  override * SetMutableBinding($: VM, N: string, V: Val, S: boolean): ECR<UNUSED> {
    const stillExists = HasProperty($, this.BindingObject, N);
    if (IsAbrupt(stillExists)) return stillExists;
    if (!stillExists && S) return $.throw('ReferenceError', `${N} is not defined`);
    return yield* Set$($, this.BindingObject, N, V, S);
  }

  override * GetBindingValue($: VM, N: string, S: boolean): ECR<Val> {
    const exists = HasProperty($, this.BindingObject, N);
    if (IsAbrupt(exists)) return exists;
    if (exists) return yield* Get($, this.BindingObject, N);
    return S ? $.throw('ReferenceError', `${N} is not defined`) : undefined;
  }

  override DeleteBinding($: VM, N: string): CR<boolean> {
    return this.BindingObject.Delete($, N);
  }

  override HasThisBinding(): false {
    return false;
  }
}

/**
 * 9.1.1.3 Function Environment Records
 *
 * The top scope of one function invocation.  `this` starts
 * uninitialized and is bound exactly once.
 */
export class FunctionEnvironmentRecord extends DeclarativeEnvironmentRecord {
  ThisBindingStatus: INITIALIZED|UNINITIALIZED = UNINITIALIZED;
  ThisValue: Val = undefined;

  constructor(
    readonly FunctionObject: Func,
    /** undefined for [[Call]]. */
    readonly NewTarget: Obj|undefined,
    OuterEnv: EnvironmentRecord|null,
  ) {
    super(OuterEnv);
  }

  BindThisValue($: VM, V: Val): CR<Val> {
    if (INITIALIZED.is(this.ThisBindingStatus)) {
      return $.throw('ReferenceError', 'this is already initialized');
    }
    this.ThisValue = V;
    this.ThisBindingStatus = INITIALIZED;
    return V;
  }

  override HasThisBinding(): true {
    return true;
  }

  override GetThisBinding($: VM): CR<Val> {
    if (UNINITIALIZED.is(this.ThisBindingStatus)) {
      return $.throw('ReferenceError',
                     "Must call super constructor before accessing 'this'");
    }
    return this.ThisValue;
  }
}

/**
 * 9.1.1.4 Global Environment Records
 *
 * Lexical declarations live in `DeclarativeRecord`; var and function
 * declarations are properties of the global object, reached through
 * `ObjectRecord`.  A name in both resolves to the lexical one.
 * `VarNames` remembers which global properties came from declarations.
 */
export class GlobalEnvironmentRecord extends EnvironmentRecord {
  readonly ObjectRecord: ObjectEnvironmentRecord;
  readonly DeclarativeRecord: DeclarativeEnvironmentRecord;
  readonly VarNames = new Set<string>();
  readonly OuterEnv = null;

  constructor(G: Obj, readonly GlobalThisValue: Obj) {
    super();
    this.ObjectRecord = new ObjectEnvironmentRecord(G, null);
    this.DeclarativeRecord = new DeclarativeEnvironmentRecord(null);
  }

  /** The half of the record that owns (or would own) N. */
  private recordFor($: VM, N: string): EnvironmentRecord {
    return this.HasLexicalDeclaration($, N) ? this.DeclarativeRecord : this.ObjectRecord;
  }

  override * HasBinding($: VM, N: string): ECR<boolean> {
    return yield* this.recordFor($, N).HasBinding($, N);
  }

  override CreateMutableBinding($: VM, N: string, D: boolean): CR<UNUSED> {
    if (this.HasLexicalDeclaration($, N)) return redeclarationError($, N);
    return this.DeclarativeRecord.CreateMutableBinding($, N, D);
  }

  override CreateImmutableBinding($: VM, N: string, S: boolean): CR<UNUSED> {
    if (this.HasLexicalDeclaration($, N)) return redeclarationError($, N);
    return this.DeclarativeRecord.CreateImmutableBinding($, N, S);
  }

  override * InitializeBinding($: VM, N: string, V: Val): ECR<UNUSED> {
    return yield* this.recordFor($, N).InitializeBinding($, N, V);
  }

  override * SetMutableBinding($: VM, N: string, V: Val, S: boolean): ECR<UNUSED> {
    return yield* this.recordFor($, N).SetMutableBinding($, N, V, S);
  }

  override * GetBindingValue($: VM, N: string, S: boolean): ECR<Val> {
    return yield* this.recordFor($, N).GetBindingValue($, N, S);
  }

  /** Only own properties of the global object are deleted; others report true. */
  override DeleteBinding($: VM, N: string): CR<boolean> {
    if (this.HasLexicalDeclaration($, N)) {
      return this.DeclarativeRecord.DeleteBinding($, N);
    }
    const own = HasOwnProperty($, this.ObjectRecord.BindingObject, N);
    if (IsAbrupt(own)) return own;
    if (!own) return true;
    const status = this.ObjectRecord.DeleteBinding($, N);
    if (status === true) this.VarNames.delete(N);
    return status;
  }

  override HasThisBinding(): true {
    return true;
  }

  override GetThisBinding(_$: VM): CR<Val> {
    return this.GlobalThisValue;
  }

  HasVarDeclaration(N: string): boolean {
    return this.VarNames.has(N);
  }

  HasLexicalDeclaration($: VM, N: string): boolean {
    return runImmediate(this.DeclarativeRecord.HasBinding($, N)) === true;
  }

  /** A non-configurable global property blocks a lexical declaration of the same name. */
  HasRestrictedGlobalProperty($: VM, N: string): CR<boolean> {
    const existingProp = this.ObjectRecord.BindingObject.GetOwnProperty($, N);
    if (IsAbrupt(existingProp)) return existingProp;
    return existingProp !== undefined && !existingProp.Configurable;
  }

  /** An existing own property, or room to add one. */
  CanDeclareGlobalVar($: VM, N: string): CR<boolean> {
    const globalObject = this.ObjectRecord.BindingObject;
    const hasProperty = HasOwnProperty($, globalObject, N);
    if (IsAbrupt(hasProperty) || hasProperty) return hasProperty;
    return IsExtensible($, globalObject);
  }

  /**
   * A function may replace a configurable property, or a
   * non-configurable one that is already a writable enumerable data
   * property.
   */
  CanDeclareGlobalFunction($: VM, N: string): CR<boolean> {
    const globalObject = this.ObjectRecord.BindingObject;
    const existingProp = globalObject.GetOwnProperty($, N);
    if (IsAbrupt(existingProp)) return existingProp;
    if (existingProp === undefined) return IsExtensible($, globalObject);
    if (existingProp.Configurable) return true;
    return IsDataDescriptor(existingProp) && existingProp.Writable === true &&
      existingProp.Enumerable === true;
  }

  /** Reuses an existing own property, keeping its current value. */
  * CreateGlobalVarBinding($: VM, N: string, D: boolean): ECR<UNUSED> {
    const ObjRec = this.ObjectRecord;
    const hasProperty = HasOwnProperty($, ObjRec.BindingObject, N);
    if (IsAbrupt(hasProperty)) return hasProperty;
    const extensible = IsExtensible($, ObjRec.BindingObject);
    if (IsAbrupt(extensible)) return extensible;
    if (!hasProperty && extensible) {
      const created = ObjRec.CreateMutableBinding($, N, D);
      if (IsAbrupt(created)) return created;
      const initialized = yield* ObjRec.InitializeBinding($, N, undefined);
      if (IsAbrupt(initialized)) return initialized;
    }
    this.VarNames.add(N);
    return UNUSED;
  }

  /**
   * 9.1.1.4.18 CreateGlobalFunctionBinding ( N, V, D )
   *
   * A configurable (or missing) property is redefined outright; a
   * non-configurable one only has its value replaced.  The value is
   * then also assigned through [[Set]].
   */
  * CreateGlobalFunctionBinding($: VM, N: string, V: Val, D: boolean): ECR<UNUSED> {
    const globalObject = this.ObjectRecord.BindingObject;
    const existingProp = globalObject.GetOwnProperty($, N);
    if (IsAbrupt(existingProp)) return existingProp;
    const desc: PropertyDescriptor = (existingProp === undefined || existingProp.Configurable) ?
      {Value: V, Writable: true, Enumerable: true, Configurable: D} :
      {Value: V};
    const defined = DefinePropertyOrThrow($, globalObject, N, desc);
    if (IsAbrupt(defined)) return defined;
    const set = yield* Set$($, globalObject, N, V, false);
    if (IsAbrupt(set)) return set;
    this.VarNames.add(N);
    return UNUSED;
  }
}

function redeclarationError($: VM, N: string): CR<never> {
  return $.throw('TypeError', `Identifier '${N}' has already been declared`);
}

/** 9.1.2.1 GetIdentifierReference: the innermost record on the chain that has `name`. */
export function* GetIdentifierReference(
  $: VM,
  env: EnvironmentRecord|null,
  name: string,
  strict: boolean,
): ECR<ReferenceRecord> {
  for (; env != null; env = env.OuterEnv) {
    const exists = yield* env.HasBinding($, name);
    if (IsAbrupt(exists)) return exists;
    if (exists) return new ReferenceRecord(env, name, strict);
  }
  return new ReferenceRecord(UNRESOLVABLE, name, strict);
}
