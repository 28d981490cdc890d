import { CR, IsAbrupt } from './completion_record';
import { EMPTY, UNUSED } from './enums';
import { GlobalEnvironmentRecord } from './environment_record';
import { CodeExecutionContext } from './execution_context';
import { InstantiateFunctionObject } from './func';
import { RealmRecord } from './realm_record';
import { BodyTable, CompileScript, FunctionCode, ScriptBody, ScriptCode } from './static/function_code';
import { Val } from './val';
import { ECR, VM } from './vm';

/** 16.1.4 Script Records: a compiled script bound to the realm it runs in. */
export class ScriptRecord {
  constructor(
    readonly Realm: RealmRecord,
    readonly ECMAScriptCode: ScriptCode,
    /** Opaque to the engine. */
    readonly HostDefined?: unknown,
  ) {}
}

/**
 * 16.1.5 ParseScript ( sourceText, realm, hostDefined )
 *
 * Parses with the VM's configured parser and compiles the result.
 * Function bodies come from `bodies`, keyed by declaration path (see
 * CompileFunction); `main` is the script's own body.  Parse failures
 * come back as a thrown SyntaxError.
 */
export function ParseScript(
  $: VM,
  sourceText: string,
  realm: RealmRecord,
  bodies: BodyTable = {},
  main?: ScriptBody,
  hostDefined?: unknown,
): CR<ScriptRecord> {
  const program = $.parseScript(sourceText);
  if (IsAbrupt(program)) return program;
  const code = CompileScript($, program, bodies, main);
  if (IsAbrupt(code)) return code;
  return new ScriptRecord(realm, code, hostDefined);
}

/**
 * 16.1.6 ScriptEvaluation ( scriptRecord )
 *
 * Runs declaration instantiation and then the body in a fresh script
 * context over the realm's global environment.  The context is popped
 * however the script ends; an empty result reads as undefined.
 */
export function* ScriptEvaluation($: VM, scriptRecord: ScriptRecord): ECR<Val> {
  const realm = scriptRecord.Realm;
  const globalEnv = realm.GlobalEnv;
  if (!globalEnv) return $.throw('TypeError', 'Realm has no global environment');
  const script = scriptRecord.ECMAScriptCode;
  const scriptContext = new CodeExecutionContext(
    realm, null, scriptRecord, globalEnv, globalEnv, script.Strict);
  return yield* $.inContext(scriptContext, function*(): ECR<Val> {
    const status = yield* GlobalDeclarationInstantiation($, script, globalEnv);
    if (IsAbrupt(status)) return status;
    const result = yield* script.Body($);
    if (IsAbrupt(result)) return result;
    return EMPTY.is(result) ? undefined : result;
  });
}

/**
 * 16.1.7 GlobalDeclarationInstantiation ( script, env )
 *
 * Conflicting declarations that span more than one script are
 * detected here.  If any is found, no bindings are instantiated.
 */
export function* GlobalDeclarationInstantiation(
  $: VM,
  script: ScriptCode,
  env: GlobalEnvironmentRecord,
): ECR<UNUSED> {
  for (const {Name: name} of script.LexicalDeclarations) {
    if (env.HasVarDeclaration(name) || env.HasLexicalDeclaration($, name)) {
      return $.throw('SyntaxError', `Identifier '${name}' has already been declared`);
    }
    const hasRestrictedGlobal = env.HasRestrictedGlobalProperty($, name);
    if (IsAbrupt(hasRestrictedGlobal)) return hasRestrictedGlobal;
    if (hasRestrictedGlobal) {
      return $.throw('SyntaxError', `Cannot redeclare restricted global '${name}'`);
    }
  }
  const functionNames = script.FunctionDeclarations.map((f) => f.Name);
  for (const name of [...script.VarNames, ...functionNames]) {
    if (env.HasLexicalDeclaration($, name)) {
      return $.throw('SyntaxError', `Identifier '${name}' has already been declared`);
    }
  }
  // Last declaration of a name wins.
  const functionsToInitialize: FunctionCode[] = [];
  const declaredFunctionNames = new Set<string>();
  for (const d of [...script.FunctionDeclarations].reverse()) {
    if (declaredFunctionNames.has(d.Name)) continue;
    const fnDefinable = env.CanDeclareGlobalFunction($, d.Name);
    if (IsAbrupt(fnDefinable)) return fnDefinable;
    if (!fnDefinable) {
      return $.throw('TypeError', `Cannot declare global function '${d.Name}'`);
    }
    declaredFunctionNames.add(d.Name);
    functionsToInitialize.unshift(d);
  }
  const declaredVarNames = new Set<string>();
  for (const vn of script.VarNames) {
    if (declaredFunctionNames.has(vn)) continue;
    const vnDefinable = env.CanDeclareGlobalVar($, vn);
    if (IsAbrupt(vnDefinable)) return vnDefinable;
    if (!vnDefinable) return $.throw('TypeError', `Cannot declare global variable '${vn}'`);
    declaredVarNames.add(vn);
  }
  // Nothing is created until every check above has passed.
  for (const d of script.LexicalDeclarations) {
    const result = d.Constant ?
      env.CreateImmutableBinding($, d.Name, true) :
      env.CreateMutableBinding($, d.Name, false);
    if (IsAbrupt(result)) return result;
  }
  for (const f of functionsToInitialize) {
    const fo = InstantiateFunctionObject($, f, env);
    const result = yield* env.CreateGlobalFunctionBinding($, f.Name, fo, false);
    if (IsAbrupt(result)) return result;
  }
  for (const vn of declaredVarNames) {
    const result = yield* env.CreateGlobalVarBinding($, vn, false);
    if (IsAbrupt(result)) return result;
  }
  return UNUSED;
}
