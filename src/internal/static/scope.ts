/**
 * @fileoverview
 * Declaration scanning over ESTree nodes: which names a statement
 * list binds, and in which scope they land.
 */

import type * as ESTree from 'estree';

type Node = ESTree.Node;

/** 8.2.1 BoundNames, appended to `names` in source order. */
export function BoundNames(node: Node|null|undefined, names: string[] = []): string[] {
  switch (node?.type) {
    case 'Identifier':
      names.push(node.name);
      break;
    case 'ArrayPattern':
      for (const element of node.elements) BoundNames(element, names);
      break;
    case 'ObjectPattern':
      for (const property of node.properties) {
        BoundNames(property.type === 'Property' ? property.value : property, names);
      }
      break;
    case 'RestElement':
      BoundNames(node.argument, names);
      break;
    case 'AssignmentPattern':
      BoundNames(node.left, names);
      break;
    case 'VariableDeclaration':
      for (const declarator of node.declarations) BoundNames(declarator.id, names);
      break;
    case 'FunctionDeclaration':
    case 'ClassDeclaration':
      BoundNames(node.id, names);
      break;
  }
  return names;
}

export function IsConstantDeclaration(node: Node): boolean {
  return node.type === 'VariableDeclaration' && node.kind === 'const';
}

function unlabel(node: Node): Node {
  while (node.type === 'LabeledStatement') node = node.body;
  return node;
}

/**
 * `let`, `const` and class declarations at the top of a body.  Nested
 * blocks are their own scopes and are not scanned.
 */
export function LexicallyScopedDeclarations(body: readonly Node[]): Node[] {
  return body.map(unlabel).filter((node) =>
    node.type === 'ClassDeclaration' ||
    (node.type === 'VariableDeclaration' && node.kind !== 'var'));
}

/** Statements nested directly inside a compound statement. */
function childStatements(node: Node): Array<Node|null|undefined> {
  switch (node.type) {
    case 'BlockStatement': return node.body;
    case 'SwitchStatement': return node.cases.flatMap((c) => c.consequent);
    case 'IfStatement': return [node.consequent, node.alternate];
    case 'ForStatement': return [node.init, node.body];
    case 'ForInStatement':
    case 'ForOfStatement': return [node.left, node.body];
    case 'DoWhileStatement':
    case 'WhileStatement':
    case 'WithStatement':
    case 'LabeledStatement': return [node.body];
    case 'TryStatement': return [node.block, node.handler?.body, node.finalizer];
    default: return [];
  }
}

/**
 * Declarations that bind in the function or script scope: `var` from
 * any depth outside nested functions, and function declarations only
 * at the top (labels aside).
 */
export function VarScopedDeclarations(body: readonly Node[]): Node[] {
  const found: Node[] = [];
  function scan(node: Node|null|undefined, top: boolean): void {
    if (node == null) return;
    if (node.type === 'VariableDeclaration') {
      if (node.kind === 'var') found.push(node);
    } else if (node.type === 'FunctionDeclaration') {
      if (top) found.push(node);
    } else {
      const stillTop = top && node.type === 'LabeledStatement';
      for (const child of childStatements(node)) scan(child, stillTop);
    }
  }
  for (const node of body) scan(node, true);
  return found;
}

export function VarDeclaredNames(body: readonly Node[]): string[] {
  const names: string[] = [];
  for (const decl of VarScopedDeclarations(body)) BoundNames(decl, names);
  return names;
}

/** 11.2.2: a "use strict" directive in the leading string-literal prologue. */
export function HasUseStrictDirective(body: readonly Node[]): boolean {
  for (const stmt of body) {
    if (!('directive' in stmt) || typeof stmt.directive !== 'string') return false;
    if (stmt.directive === 'use strict') return true;
  }
  return false;
}
