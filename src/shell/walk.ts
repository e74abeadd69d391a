/**
 * Tree traversal
 *
 * `childrenOf` lists a node's direct children in source order; the
 * exhaustive switch makes the compiler flag any node type added to the AST
 * but not handled here.
 */

import type * as AST from "./ast.ts";

export function childrenOf(node: AST.Node): AST.Node[] {
  switch (node.type) {
    case "Program":
      return node.body;
    case "Command":
      return [
        ...node.assignments,
        ...(node.name ? [node.name] : []),
        ...node.args,
        ...node.redirects,
      ];
    case "Pipeline":
      return node.commands;
    case "AndOrList":
      return [node.left, node.right];
    case "Background":
    case "NegatedCommand":
      return [node.command];
    case "Coproc":
      return [node.body];
    case "IfStatement":
      return [
        ...node.test,
        ...node.consequent,
        ...(node.alternate === null ? [] : Array.isArray(node.alternate) ? node.alternate : [node.alternate]),
        ...node.redirects,
      ];
    case "WhileStatement":
    case "UntilStatement":
      return [...node.test, ...node.body, ...node.redirects];
    case "ForStatement":
    case "SelectStatement":
      return [...(node.items ?? []), ...node.body, ...node.redirects];
    case "CStyleForStatement":
      return [...node.body, ...node.redirects];
    case "CaseStatement":
      return [node.word, ...node.clauses, ...node.redirects];
    case "CaseClause":
      return [...node.patterns, ...node.body];
    case "FunctionDeclaration":
      return [node.body];
    case "Group":
      return [...node.body, ...node.redirects];
    case "VariableAssignment":
      return [node.value];
    case "ArrayLiteral":
      return node.elements;
    case "ReturnStatement":
      return node.code ? [node.code] : [];
    case "TestCommand":
      return [node.expression, ...node.redirects];
    case "ArithmeticCommand":
      return [...(node.expression ? [node.expression] : []), ...node.redirects];
    case "Comment":
      return [];
    case "Redirection":
      return [node.target, ...(node.heredoc?.body ? [node.heredoc.body] : [])];
    case "Word":
      return node.parts;
    case "Literal":
    case "SingleQuoted":
    case "AnsiCQuoted":
      return [];
    case "DoubleQuoted":
      return node.parts;
    case "ParameterExpansion":
      return node.argument ? [node.argument] : [];
    case "CommandSubstitution":
    case "ProcessSubstitution":
      return node.body;
    case "ArithmeticExpansion":
      return node.expression ? [node.expression] : [];
    case "UnaryTest":
      return [node.operand];
    case "BinaryTest":
      return [node.left, node.right];
    case "LogicalTest":
      return [node.left, node.right];
    case "NotTest":
    case "GroupedTest":
      return [node.expression];
    case "WordTest":
      return [node.word];
    case "NumberLiteral":
    case "VariableReference":
      return [];
    case "BinaryArithmeticExpression":
      return [node.left, node.right];
    case "UnaryArithmeticExpression":
      return [node.argument];
    case "ConditionalArithmeticExpression":
      return [node.test, node.consequent, node.alternate];
    case "AssignmentExpression":
      return [node.left, node.right];
    case "GroupedArithmeticExpression":
      return [node.expression];
  }
}

/**
 * Depth-first pre-order walk. Returning false from `visit` skips the
 * node's children.
 */
export function walk(
  node: AST.Node,
  visit: (node: AST.Node, parent: AST.Node | null) => boolean | void,
  parent: AST.Node | null = null,
): void {
  if (visit(node, parent) === false) return;
  for (const child of childrenOf(node)) {
    walk(child, visit, node);
  }
}

/** All nodes of one type under `root`, in source order. */
export function collect<T extends AST.Node["type"]>(
  root: AST.Node,
  type: T,
): Extract<AST.Node, { type: T }>[] {
  const found: Extract<AST.Node, { type: T }>[] = [];
  walk(root, (node) => {
    if (isNodeOfType(node, type)) found.push(node);
  });
  return found;
}

export function isNodeOfType<T extends AST.Node["type"]>(
  node: AST.Node,
  type: T,
): node is Extract<AST.Node, { type: T }> {
  return node.type === type;
}

export function isStatement(node: AST.Node): node is AST.Statement {
  switch (node.type) {
    case "Command":
    case "Pipeline":
    case "AndOrList":
    case "Background":
    case "IfStatement":
    case "WhileStatement":
    case "UntilStatement":
    case "ForStatement":
    case "CStyleForStatement":
    case "CaseStatement":
    case "SelectStatement":
    case "FunctionDeclaration":
    case "Group":
    case "NegatedCommand":
    case "Coproc":
    case "VariableAssignment":
    case "ReturnStatement":
    case "TestCommand":
    case "ArithmeticCommand":
    case "Comment":
      return true;
    default:
      return false;
  }
}

/**
 * Every statement list in the tree (bodies, tests, branches, substitution
 * bodies), outermost first.
 */
export function statementLists(root: AST.Node): AST.Statement[][] {
  const lists: AST.Statement[][] = [];
  walk(root, (node) => {
    switch (node.type) {
      case "Program":
      case "Group":
      case "CaseClause":
      case "ForStatement":
      case "CStyleForStatement":
      case "SelectStatement":
      case "CommandSubstitution":
      case "ProcessSubstitution":
        lists.push(node.body);
        break;
      case "WhileStatement":
      case "UntilStatement":
        lists.push(node.test, node.body);
        break;
      case "IfStatement":
        lists.push(node.test, node.consequent);
        if (Array.isArray(node.alternate)) lists.push(node.alternate);
        break;
    }
  });
  return lists;
}
