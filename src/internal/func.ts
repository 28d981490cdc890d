import { ToObject } from './abstract_conversion';
import { DefinePropertyOrThrow } from './abstract_object';
import { Assert } from './assert';
import { CR, CastNotAbrupt, CompletionType, IsAbrupt, IsReturnCompletion, IsThrowCompletion } from './completion_record';
import { EMPTY, GLOBAL, STRICT, UNUSED } from './enums';
import { DeclarativeEnvironmentRecord, EnvironmentRecord, FunctionEnvironmentRecord } from './environment_record';
import { CreateMappedArgumentsObject, CreateUnmappedArgumentsObject } from './exotic_arguments';
import { BuiltinExecutionContext, CodeExecutionContext, GetActiveScriptOrModule } from './execution_context';
import { Obj, ObjectSlots, OrdinaryCreateFromConstructor, OrdinaryObject, OrdinaryObjectCreate } from './obj';
import { PropertyDescriptor, PropertyRecord, accessor, prop0, propC, propWC } from './property_descriptor';
import { ConstructorSlotMap } from './property_map';
import type { PropertyFactory, RealmRecord } from './realm_record';
import type { ScriptRecord } from './script_record';
import { FunctionCode } from './static/function_code';
import { memoize, plural } from './util';
import { PropertyKey, Val } from './val';
import { DebugString, ECR, VM, functionName, just } from './vm';

/**
 * A function object is an object that supports the [[Call]] internal
 * method.  A constructor is an object that supports the [[Construct]]
 * internal method.
 */
export interface Func extends Obj {
  Realm: RealmRecord;

  Call($: VM, thisArgument: Val, argumentsList: Val[]): ECR<Val>;
  Construct?($: VM, argumentsList: Val[], newTarget: Obj): ECR<Obj>;
}

export function IsFunc(arg: unknown): arg is Func {
  return arg instanceof Obj && typeof arg.Call === 'function';
}

/** Options for OrdinaryFunctionCreate. */
export interface FunctionCreateOptions {
  /**
   * Whether to install the poisoned `caller` and `arguments`
   * accessors as own properties.  Defaults to the code's strictness.
   */
  restricted?: boolean;
}

/**
 * 10.2.3 OrdinaryFunctionCreate ( functionPrototype, sourceText,
 *        ParameterList, Body, thisMode, env, privateEnv )
 *
 * Strictness is fixed here from the code handle and never consulted
 * from the caller afterwards.
 */
export function OrdinaryFunctionCreate(
  $: VM,
  code: FunctionCode,
  env: EnvironmentRecord,
  functionPrototype: Obj = $.getIntrinsic('%Function.prototype%'),
  options: FunctionCreateOptions = {},
): OrdinaryFunction {
  const realm = $.getRealm();
  const F = new (OrdinaryFunction())({
    Prototype: functionPrototype,
    ECMAScriptCode: code,
    Strict: code.Strict,
    ThisMode: code.Strict ? STRICT : GLOBAL,
    Environment: env,
    ScriptOrModule: GetActiveScriptOrModule($),
    Realm: realm,
  });
  SetFunctionLength($, F, code.FormalParameters.length);
  if (options.restricted ?? code.Strict) {
    AddRestrictedFunctionProperties(F, realm);
  }
  return F;
}

export interface OrdinaryFunctionSlots extends ObjectSlots {
  Prototype: Obj;
  Realm: RealmRecord;
  Environment: EnvironmentRecord;
  ECMAScriptCode: FunctionCode;
  ScriptOrModule: ScriptRecord|null;
  ThisMode: STRICT|GLOBAL;
  Strict: boolean;
}

/**
 * 10.2 ECMAScript Function Objects
 *
 * A code handle closed over the environment it was created in.
 * [[Construct]] is attached afterwards by MakeConstructor.
 */
export type OrdinaryFunction = InstanceType<ReturnType<typeof OrdinaryFunction>>;
export const OrdinaryFunction = memoize(() => class OrdinaryFunction extends OrdinaryObject() implements Func {
  Realm: RealmRecord;
  Environment: EnvironmentRecord;
  ECMAScriptCode: FunctionCode;
  ScriptOrModule: ScriptRecord|null;
  ThisMode: STRICT|GLOBAL;
  Strict: boolean;

  constructor(slots: OrdinaryFunctionSlots, props: PropertyRecord = {}) {
    super(slots, props);
    this.Realm = slots.Realm;
    this.Environment = slots.Environment;
    this.ECMAScriptCode = slots.ECMAScriptCode;
    this.ScriptOrModule = slots.ScriptOrModule;
    this.ThisMode = slots.ThisMode;
    this.Strict = slots.Strict;
  }

  /** 10.2.1 [[Call]] ( thisArgument, argumentsList ) */
  * Call($: VM, thisArgument: Val, argumentsList: Val[]): ECR<Val> {
    const F = this;
    return yield* traceCall($, F, 'call', argumentsList, function*() {
      const calleeContext = PrepareForOrdinaryCall($, F, undefined);
      const result = yield* $.inContext(calleeContext, function*() {
        CastNotAbrupt(OrdinaryCallBindThis($, F, calleeContext, thisArgument));
        return yield* OrdinaryCallEvaluateBody($, F, argumentsList);
      });
      return CallResult(result);
    });
  }
});

/**
 * Maps a body completion onto the value seen by the caller.  A throw
 * propagates with its value unchanged, a return yields its value, and
 * a normal completion (with or without a value) yields undefined.
 */
function CallResult(result: CR<Val|EMPTY>): CR<Val> {
  if (IsReturnCompletion(result)) return result.Value;
  if (IsAbrupt(result)) {
    Assert(result.Type === CompletionType.Throw, `${result.Type} completion escaped a function body`);
    return result;
  }
  return undefined;
}

/**
 * 10.2.1.1 PrepareForOrdinaryCall ( F, newTarget )
 *
 * Only builds the callee context; callers push it with `$.inContext`.
 */
export function PrepareForOrdinaryCall(
  _$: VM,
  F: OrdinaryFunction,
  newTarget: Obj|undefined,
): CodeExecutionContext {
  const localEnv = new FunctionEnvironmentRecord(F, newTarget, F.Environment);
  return new CodeExecutionContext(
    F.Realm, F, F.ScriptOrModule, localEnv, localEnv, F.Strict);
}

/** 10.2.1.2 OrdinaryCallBindThis ( F, calleeContext, thisArgument ) */
export function OrdinaryCallBindThis(
  $: VM,
  F: OrdinaryFunction,
  calleeContext: CodeExecutionContext,
  thisArgument: Val,
): CR<UNUSED> {
  const localEnv = calleeContext.LexicalEnvironment;
  let thisValue: Val;
  if (STRICT.is(F.ThisMode)) {
    thisValue = thisArgument;
  } else if (thisArgument == null) {
    const globalEnv = F.Realm.GlobalEnv;
    Assert(globalEnv, 'Realm has no global environment');
    thisValue = globalEnv.GlobalThisValue;
  } else {
    const obj = ToObject($, thisArgument);
    if (IsAbrupt(obj)) return obj;
    thisValue = obj;
  }
  Assert(localEnv instanceof FunctionEnvironmentRecord);
  const bound = localEnv.BindThisValue($, thisValue);
  if (IsAbrupt(bound)) return bound;
  return UNUSED;
}

/**
 * 10.2.1.3 Runtime Semantics: EvaluateBody
 * 10.2.1.4 OrdinaryCallEvaluateBody ( F, argumentsList )
 *
 * The raw completion is returned so that a normal finish and an
 * explicit `return undefined` remain distinguishable; [[Call]] maps
 * both onto undefined.
 */
export function* OrdinaryCallEvaluateBody(
  $: VM,
  F: OrdinaryFunction,
  argumentsList: Val[],
): ECR<Val|EMPTY> {
  const status = yield* FunctionDeclarationInstantiation($, F, argumentsList);
  if (IsAbrupt(status)) return status;
  return yield* F.ECMAScriptCode.Body($, F);
}

/**
 * 10.2.2 [[Construct]] ( argumentsList, newTarget )
 *
 * Only base constructors exist here, so a derived-class `this` never
 * needs to be read back from the environment.
 */
export function* OrdinaryConstruct(
  $: VM,
  F: OrdinaryFunction,
  argumentsList: Val[],
  newTarget: Obj,
): ECR<Obj> {
  return yield* traceCall($, F, 'construct', argumentsList, function*() {
    const thisArgument = yield* OrdinaryCreateFromConstructor($, newTarget, '%Object.prototype%');
    if (IsAbrupt(thisArgument)) return thisArgument;
    const calleeContext = PrepareForOrdinaryCall($, F, newTarget);
    const result = yield* $.inContext(calleeContext, function*() {
      CastNotAbrupt(OrdinaryCallBindThis($, F, calleeContext, thisArgument));
      return yield* OrdinaryCallEvaluateBody($, F, argumentsList);
    });
    if (IsReturnCompletion(result)) {
      return result.Value instanceof Obj ? result.Value : thisArgument;
    }
    const value = CallResult(result);
    if (IsAbrupt(value)) return value;
    return thisArgument;
  });
}

/**
 * 10.2.5 MakeConstructor ( F [ , writablePrototype [ , prototype ] ] )
 *
 * The default prototype keeps `constructor` in a ConstructorSlotMap
 * slot, which starts out writable.
 */
export function MakeConstructor(
  $: VM,
  F: OrdinaryFunction,
  writablePrototype = true,
  prototype?: Obj,
): UNUSED {
  Assert(F.Construct == null, 'Already a constructor');
  F.Construct = ($, argumentsList, newTarget) =>
    OrdinaryConstruct($, F, argumentsList, newTarget);
  if (!prototype) {
    prototype = OrdinaryObjectCreate({
      Prototype: $.getIntrinsic('%Object.prototype%'),
      OwnProps: new ConstructorSlotMap(F),
    });
  }
  CastNotAbrupt(DefinePropertyOrThrow($, F, 'prototype', {
    Value: prototype,
    Writable: writablePrototype,
    Enumerable: false,
    Configurable: false,
  }));
  return UNUSED;
}

/** 10.2.9 SetFunctionName ( F, name [ , prefix ] ) */
export function SetFunctionName(
  $: VM,
  F: Obj,
  name: PropertyKey,
  prefix?: string,
): UNUSED {
  Assert(!F.OwnProps.has('name'), 'Function already has a name');
  if (typeof name === 'symbol') {
    name = name.description == null ? '' : `[${name.description}]`;
  }
  if (prefix) name = `${prefix} ${name}`;
  CastNotAbrupt(DefinePropertyOrThrow($, F, 'name', propC(name)));
  return UNUSED;
}

/** 10.2.10 SetFunctionLength ( F, length ) */
export function SetFunctionLength($: VM, F: Obj, length: number): UNUSED {
  Assert(!F.OwnProps.has('length'), 'Function already has a length');
  CastNotAbrupt(DefinePropertyOrThrow($, F, 'length', propC(length)));
  return UNUSED;
}

/** 10.2.4 AddRestrictedFunctionProperties ( F, realm ) */
export function AddRestrictedFunctionProperties(F: Obj, realm: RealmRecord): UNUSED {
  const thrower = realm.Intrinsics.get('%ThrowTypeError%');
  Assert(thrower, 'No %ThrowTypeError% intrinsic');
  F.OwnProps.set('caller', accessor(thrower, thrower));
  F.OwnProps.set('arguments', accessor(thrower, thrower));
  return UNUSED;
}

/**
 * 10.2.11 FunctionDeclarationInstantiation ( func, argumentsList )
 *
 * Bindings are made in this order: parameters (a later duplicate
 * overwrites an earlier one), `arguments`, var names, lexical names,
 * and finally the top-level function declarations (a later
 * declaration of the same name wins).
 */
export function* FunctionDeclarationInstantiation(
  $: VM,
  func: OrdinaryFunction,
  argumentsList: Val[],
): ECR<UNUSED> {
  const calleeContext = $.getRunningContext();
  Assert(calleeContext instanceof CodeExecutionContext);
  const code = func.ECMAScriptCode;
  const strict = func.Strict;
  const parameterNames = code.FormalParameters;
  const hasDuplicates = new Set(parameterNames).size !== parameterNames.length;
  const lexicalNames = code.LexicalDeclarations.map((d) => d.Name);
  const functionNames: string[] = [];
  const functionsToInitialize: FunctionCode[] = [];
  for (const d of [...code.FunctionDeclarations].reverse()) {
    if (!functionNames.includes(d.Name)) {
      functionNames.unshift(d.Name);
      functionsToInitialize.unshift(d);
    }
  }
  const argumentsObjectNeeded =
    !parameterNames.includes('arguments') &&
    !functionNames.includes('arguments') &&
    !lexicalNames.includes('arguments');
  const env = calleeContext.LexicalEnvironment;
  Assert(env instanceof DeclarativeEnvironmentRecord);
  for (const paramName of parameterNames) {
    const alreadyDeclared = CastNotAbrupt(yield* env.HasBinding($, paramName));
    if (!alreadyDeclared) {
      CastNotAbrupt(env.CreateMutableBinding($, paramName, false));
      if (hasDuplicates) {
        CastNotAbrupt(yield* env.InitializeBinding($, paramName, undefined));
      }
    }
  }
  // Duplicate parameter names also select the unmapped form, since
  // only one of the duplicates could be linked.
  const parameterBindings = [...parameterNames];
  if (argumentsObjectNeeded) {
    const ao = strict || hasDuplicates ?
      CreateUnmappedArgumentsObject($, argumentsList) :
      CreateMappedArgumentsObject($, func, parameterNames, argumentsList, env);
    if (strict) {
      CastNotAbrupt(env.CreateImmutableBinding($, 'arguments', false));
    } else {
      CastNotAbrupt(env.CreateMutableBinding($, 'arguments', false));
    }
    CastNotAbrupt(yield* env.InitializeBinding($, 'arguments', ao));
    parameterBindings.push('arguments');
  }
  // With duplicates every binding is already initialized and is
  // assigned in order, so the last occurrence wins.
  for (let i = 0; i < parameterNames.length; i++) {
    const name = parameterNames[i];
    const value = argumentsList[i];
    const status = hasDuplicates ?
      yield* env.SetMutableBinding($, name, value, false) :
      yield* env.InitializeBinding($, name, value);
    if (IsAbrupt(status)) return status;
  }
  const instantiatedVarNames = new Set(parameterBindings);
  for (const n of [...code.VarNames, ...functionNames]) {
    if (instantiatedVarNames.has(n)) continue;
    instantiatedVarNames.add(n);
    CastNotAbrupt(env.CreateMutableBinding($, n, false));
    CastNotAbrupt(yield* env.InitializeBinding($, n, undefined));
  }
  // Lexical names share the function's environment.
  for (const d of code.LexicalDeclarations) {
    if (d.Constant) {
      CastNotAbrupt(env.CreateImmutableBinding($, d.Name, true));
    } else {
      CastNotAbrupt(env.CreateMutableBinding($, d.Name, false));
    }
  }
  for (const f of functionsToInitialize) {
    const fo = InstantiateFunctionObject($, f, env);
    CastNotAbrupt(yield* env.SetMutableBinding($, f.Name, fo, false));
  }
  return UNUSED;
}

/** 10.2.1.5 InstantiateOrdinaryFunctionObject */
export function InstantiateFunctionObject(
  $: VM,
  code: FunctionCode,
  env: EnvironmentRecord,
  options?: FunctionCreateOptions,
): OrdinaryFunction {
  const F = OrdinaryFunctionCreate($, code, env, undefined, options);
  SetFunctionName($, F, code.Name);
  MakeConstructor($, F);
  return F;
}

/**
 * Logs the entry and completion of a call when tracing is enabled.
 * Lines are nested by call depth.
 */
function* traceCall<T extends Val>(
  $: VM,
  F: Func,
  kind: 'call'|'construct',
  argumentsList: Val[],
  body: () => ECR<T>,
): ECR<T> {
  if (!$.options.trace) return yield* body();
  $.log(`${kind} ${functionName(F)} with ${plural(argumentsList.length, 'argument')}`);
  $.indent();
  let result: CR<T>;
  try {
    result = yield* body();
  } finally {
    $.dedent();
  }
  if (IsThrowCompletion<Val>(result)) {
    $.log(`throw ${DebugString(result.Value)}`);
  } else if (!IsAbrupt<Val>(result)) {
    $.log(`return ${DebugString(result)}`);
  }
  return result;
}

/**
 * 10.3 Built-in Function Objects
 *
 * The behaviour of a built-in function is a host closure.  Each
 * invocation runs under its own BuiltinExecutionContext, which is
 * popped on every exit path.
 */
export type BuiltinFunction = InstanceType<ReturnType<typeof BuiltinFunction>>;
export const BuiltinFunction = memoize(() => class BuiltinFunction extends OrdinaryObject() implements Func {
  Realm: RealmRecord;
  InitialName: string;
  readonly CallBehavior: CallBehavior;

  constructor(slots: BuiltinFunctionSlots, props: PropertyRecord) {
    super(slots, props);
    this.Realm = slots.Realm;
    this.InitialName = slots.InitialName;
    this.CallBehavior = slots.CallBehavior;
    const construct = slots.ConstructBehavior;
    if (construct) {
      this.Construct = ($, argumentsList, newTarget) =>
        traceCall($, this, 'construct', argumentsList, () => $.inContext(
          new BuiltinExecutionContext(this, this.Realm),
          () => construct.call(this, $, argumentsList, newTarget)));
    }
  }

  /** 10.3.1 [[Call]] ( thisArgument, argumentsList ) */
  Call($: VM, thisArgument: Val, argumentsList: Val[]): ECR<Val> {
    return traceCall($, this, 'call', argumentsList, () => $.inContext(
      new BuiltinExecutionContext(this, this.Realm),
      () => this.CallBehavior.call(this, $, thisArgument, argumentsList)));
  }
});

export interface CallBehavior {
  (this: Func, $: VM, thisArgument: Val, argumentsList: Val[]): ECR<Val>;
}
export interface ConstructBehavior {
  (this: Func, $: VM, argumentsList: Val[], newTarget: Obj): ECR<Obj>;
}
export interface BuiltinFunctionBehavior {
  Call: CallBehavior;
  Construct?: ConstructBehavior;
}

export interface BuiltinFunctionSlots extends ObjectSlots {
  CallBehavior: CallBehavior;
  ConstructBehavior?: ConstructBehavior;
  Prototype: Obj|null;
  Realm: RealmRecord;
  InitialName: string;
}

/**
 * 10.3.3 CreateBuiltinFunction ( behaviour, length, name,
 *        additionalInternalSlotsList [ , realm [ , prototype [ , prefix ] ] ] )
 *
 * Built-in functions never receive the poisoned `caller` and
 * `arguments` accessors.
 */
export function CreateBuiltinFunction(
  behaviour: BuiltinFunctionBehavior,
  length: number,
  name: PropertyKey,
  realm: RealmRecord,
  functionPrototype: Obj|null = realm.Intrinsics.get('%Function.prototype%') ?? null,
  prefix?: string,
): BuiltinFunction {
  let fnName = typeof name === 'symbol' ?
    (name.description == null ? '' : `[${name.description}]`) : name;
  if (prefix) fnName = `${prefix} ${fnName}`;
  return new (BuiltinFunction())({
    Prototype: functionPrototype,
    Extensible: true,
    Realm: realm,
    InitialName: fnName,
    CallBehavior: behaviour.Call,
    ConstructBehavior: behaviour.Construct,
  }, {
    length: propC(length),
    name: propC(fnName),
  });
}

/**
 * A builtin method entry for `RealmBuilder.members`; the function is
 * created once the realm and member name are known.
 */
export function method(
  fn: ($: VM, thisValue: Val, ...params: Val[]) => ECR<Val>,
  length = fn.length - 2,
  specifiedName?: string,
): PropertyFactory {
  return (realm, name) => propWC(CreateBuiltinFunction({
    Call($, thisObj, argumentsList) { return fn($, thisObj, ...argumentsList); },
  }, Math.max(length, 0), specifiedName ?? name, realm));
}

/** Same as `method` but guards that `thisValue` is an Object. */
export function methodO(
  fn: ($: VM, thisValue: Obj, ...params: Val[]) => ECR<Val>,
  length = fn.length - 2,
  specifiedName?: string,
): PropertyFactory {
  return method(
    ($, thisObj, ...argumentsList) =>
      thisObj instanceof Obj ?
        fn($, thisObj, ...argumentsList) :
        just($.throw('TypeError', `Receiver ${DebugString(thisObj)} is not an object`)),
    Math.max(length, 0), specifiedName);
}

/** Same as `method` but for static functions, which ignore `this`. */
export function methodS(
  fn: ($: VM, ...params: Val[]) => ECR<Val>,
  length = fn.length - 1,
  specifiedName?: string,
): PropertyFactory {
  return method(($, _, ...argumentsList) => fn($, ...argumentsList),
                Math.max(length, 0), specifiedName);
}

/** Defines an accessor property whose getter is a builtin. */
export function getter(
  fn: ($: VM, thisValue: Val) => ECR<Val>,
  attrs: PropertyDescriptor = {},
): PropertyFactory {
  return (realm, name) => ({
    Enumerable: false,
    Configurable: true,
    Get: CreateBuiltinFunction({
      Call($, thisObj) { return fn($, thisObj); },
    }, 0, name, realm, undefined, 'get'),
    Set: undefined,
    ...attrs,
  });
}

/**
 * Returns a behaviour for both calling and constructing.  The `this`
 * value is not exposed for calls, and `NewTarget` is undefined.
 */
export function callOrConstruct(
  fn: ($: VM, NewTarget: Obj|undefined, ...argumentList: Val[]) => ECR<Val>,
): BuiltinFunctionBehavior {
  return {
    Call($, _, argumentList) {
      return fn($, undefined, ...argumentList);
    },
    * Construct($, argumentList, NewTarget) {
      const result = yield* fn($, NewTarget, ...argumentList);
      if (IsAbrupt(result)) return result;
      Assert(result instanceof Obj, 'Constructor behaviour must produce an object');
      return result;
    },
  };
}

/**
 * Builds the intrinsic %ThrowTypeError%: an anonymous, frozen
 * function that throws a TypeError on every call.
 */
export function MakeThrowTypeError(realm: RealmRecord, functionPrototype: Obj): BuiltinFunction {
  const thrower = CreateBuiltinFunction({
    Call($) {
      return just($.throw(
        'TypeError',
        "'caller', 'callee', and 'arguments' properties may not be accessed " +
          'on strict mode functions or the arguments objects for calls to them'));
    },
  }, 0, '', realm, functionPrototype);
  thrower.OwnProps.set('length', prop0(0));
  thrower.OwnProps.set('name', prop0(''));
  thrower.Extensible = false;
  return thrower;
}

