export { VM, run, runImmediate, just, unwrap, ThrownValue, DebugString } from './internal/vm';
export type { ECR, EvalGen, Parser, Plugin, VMOptions } from './internal/vm';
export * from './plugins';

export { Abrupt, CompletionType, NormalCompletion, ThrowCompletion, ReturnCompletion, IsAbrupt, IsThrowCompletion, IsReturnCompletion, CastNotAbrupt } from './internal/completion_record';
export type { CR } from './internal/completion_record';
export { EMPTY } from './internal/enums';
export type { Val, PropertyKey } from './internal/val';

export { Obj, OrdinaryObjectCreate, ValidateAndApplyPropertyDescriptor } from './internal/obj';
export { propWEC, propWC, propC, propE, propW, prop0, accessor } from './internal/property_descriptor';
export type { PropertyDescriptor } from './internal/property_descriptor';
export { Get, Set, HasProperty, DefinePropertyOrThrow, DeletePropertyOrThrow, Call, Construct, CreateArrayFromList } from './internal/abstract_object';
export { ArrayCreate, IsArray } from './internal/exotic_array';

export { DeclarativeEnvironmentRecord, ObjectEnvironmentRecord, FunctionEnvironmentRecord, GlobalEnvironmentRecord } from './internal/environment_record';
export { OrdinaryFunctionCreate, InstantiateFunctionObject, CreateBuiltinFunction, MakeConstructor } from './internal/func';
export type { FunctionCreateOptions } from './internal/func';
export { functionCode, CompileFunction, CompileScript } from './internal/static/function_code';
export type { FunctionBody, FunctionCode, ScriptBody, ScriptCode, BodyTable } from './internal/static/function_code';
export { ScriptRecord, ParseScript, ScriptEvaluation } from './internal/script_record';
