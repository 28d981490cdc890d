/**
 * @fileoverview
 * Function and script code handles.  The core never walks statements:
 * a handle carries the names that declaration instantiation needs and
 * an opaque body supplied by the host.  Handles are either built
 * directly with `functionCode` or compiled from an ESTree parse.
 *
 * Compiled functions look their bodies up by declaration path: the
 * function's name, prefixed with `outer/` for each enclosing function
 * and suffixed with `#2`, `#3`... when the same name is declared again
 * in one scope.  `function f() { function g() {} } function f() {}`
 * reads `f`, `f/g` and `f#2`.
 */

import type * as ESTree from 'estree';
import { CR, IsAbrupt } from '../completion_record';
import { EMPTY } from '../enums';
import type { Func } from '../func';
import type { Val } from '../val';
import type { ECR, VM } from '../vm';
import { BoundNames, HasUseStrictDirective, IsConstantDeclaration, LexicallyScopedDeclarations, VarDeclaredNames } from './scope';

/**
 * A runnable body.  It runs with the function's execution context on
 * top of the stack, so it reaches parameters and locals through
 * ResolveBinding.  A normal result is a statement completion value and
 * is discarded at the call boundary; only return and throw
 * completions are observable.
 */
export type FunctionBody = ($: VM, F: Func) => ECR<Val|EMPTY>;
export type ScriptBody = ($: VM) => ECR<Val|EMPTY>;

/** Bodies keyed by declaration path. */
export type BodyTable = Readonly<Record<string, FunctionBody>>;

export interface LexicalDeclaration {
  readonly Name: string;
  readonly Constant: boolean;
}

export interface FunctionCode {
  readonly Name: string;
  /** Parameter names in order, duplicates included. */
  readonly FormalParameters: readonly string[];
  readonly Strict: boolean;
  readonly VarNames: readonly string[];
  readonly LexicalDeclarations: readonly LexicalDeclaration[];
  /** Top-level function declarations, in source order. */
  readonly FunctionDeclarations: readonly FunctionCode[];
  readonly Body: FunctionBody;
}

export interface ScriptCode {
  readonly Strict: boolean;
  readonly VarNames: readonly string[];
  readonly LexicalDeclarations: readonly LexicalDeclaration[];
  readonly FunctionDeclarations: readonly FunctionCode[];
  readonly Body: ScriptBody;
}

function* emptyBody(): ECR<EMPTY> {
  return EMPTY;
}

/** Builds a function handle, filling in empty declaration lists. */
export function functionCode(init: Partial<FunctionCode>): FunctionCode {
  return {
    Name: init.Name ?? '',
    FormalParameters: init.FormalParameters ?? [],
    Strict: init.Strict ?? false,
    VarNames: init.VarNames ?? [],
    LexicalDeclarations: init.LexicalDeclarations ?? [],
    FunctionDeclarations: init.FunctionDeclarations ?? [],
    Body: init.Body ?? emptyBody,
  };
}

export function isProgram(tree: unknown): tree is ESTree.Program {
  return typeof tree === 'object' && tree != null &&
    'type' in tree && tree.type === 'Program' &&
    'body' in tree && Array.isArray(tree.body);
}

function lexicalDeclarations(body: readonly ESTree.Node[]): LexicalDeclaration[] {
  const decls: LexicalDeclaration[] = [];
  for (const d of LexicallyScopedDeclarations(body)) {
    const Constant = IsConstantDeclaration(d);
    for (const Name of BoundNames(d)) decls.push({Name, Constant});
  }
  return decls;
}

function* functionDeclarations(body: readonly ESTree.Node[]): Generator<ESTree.FunctionDeclaration> {
  for (const stmt of body) {
    let s: ESTree.Node = stmt;
    while (s.type === 'LabeledStatement') s = s.body;
    if (s.type === 'FunctionDeclaration') yield s;
  }
}

/** Compiles the top-level function declarations of one scope. */
function compileDeclarations(
  $: VM,
  body: readonly ESTree.Node[],
  strict: boolean,
  bodies: BodyTable,
  prefix: string,
): CR<FunctionCode[]> {
  const seen = new Map<string, number>();
  const compiled: FunctionCode[] = [];
  for (const decl of functionDeclarations(body)) {
    const name = declarationName(decl);
    const count = (seen.get(name) ?? 0) + 1;
    seen.set(name, count);
    const path = prefix + (count > 1 ? `${name}#${count}` : name);
    const code = CompileFunction($, decl, strict, bodies, path);
    if (IsAbrupt(code)) return code;
    compiled.push(code);
  }
  return compiled;
}

function declarationName(node: ESTree.FunctionDeclaration): string {
  return node.id?.name ?? 'default';
}

/**
 * Compiles a function declaration into a handle.  Strictness comes
 * from the enclosing code or the function's own directive prologue.
 * Only plain identifier parameters are accepted, and generator or
 * async bodies are rejected.  `path` is the key its body is read
 * from, the bare name by default.
 */
export function CompileFunction(
  $: VM,
  node: ESTree.FunctionDeclaration,
  outerStrict: boolean,
  bodies: BodyTable,
  path: string = declarationName(node),
): CR<FunctionCode> {
  const name = declarationName(node);
  if (node.generator || node.async) {
    return $.throw('SyntaxError', `Unsupported function kind: ${name}`);
  }
  const FormalParameters: string[] = [];
  for (const param of node.params) {
    if (param.type !== 'Identifier') {
      return $.throw('SyntaxError', `Unsupported parameter in ${name}`);
    }
    FormalParameters.push(param.name);
  }
  const body = node.body.body;
  const Strict = outerStrict || HasUseStrictDirective(body);
  const FunctionDeclarations = compileDeclarations($, body, Strict, bodies, `${path}/`);
  if (IsAbrupt(FunctionDeclarations)) return FunctionDeclarations;
  return {
    Name: name,
    FormalParameters,
    Strict,
    VarNames: VarDeclaredNames(body),
    LexicalDeclarations: lexicalDeclarations(body),
    FunctionDeclarations,
    Body: bodies[path] ?? emptyBody,
  };
}

/** Compiles a parsed script into a handle. */
export function CompileScript(
  $: VM,
  program: ESTree.Program,
  bodies: BodyTable = {},
  main?: ScriptBody,
): CR<ScriptCode> {
  const body = program.body;
  const Strict = HasUseStrictDirective(body);
  const FunctionDeclarations = compileDeclarations($, body, Strict, bodies, '');
  if (IsAbrupt(FunctionDeclarations)) return FunctionDeclarations;
  return {
    Strict,
    VarNames: VarDeclaredNames(body),
    LexicalDeclarations: lexicalDeclarations(body),
    FunctionDeclarations,
    Body: main ?? emptyBody,
  };
}
