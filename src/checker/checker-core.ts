/**
 * Checker Extension: Core
 * Node dispatch, literals, variables, and let bindings
 */

import { TypeChecker } from './checker.js';
import type {
  ExpressionNode,
  LetNode,
  LiteralNode,
  TypeName,
  VariableNode,
} from '../types.js';
import {
  InternalError,
  SABLE_ERROR_CODES,
  TypeCheckError,
} from '../types.js';

// Declaration merging to add methods to TypeChecker interface
declare module './checker.js' {
  interface TypeChecker {
    checkExpression(node: ExpressionNode): TypeName;
    checkLiteral(node: LiteralNode): TypeName;
    checkVariable(node: VariableNode): TypeName;
    checkLet(node: LetNode): TypeName;
  }
}

// ============================================================
// DISPATCH
// ============================================================

TypeChecker.prototype.checkExpression = function (
  this: TypeChecker,
  node: ExpressionNode
): TypeName {
  switch (node.type) {
    case 'BinaryExpr':
      return this.checkBinary(node);
    case 'UnaryExpr':
      return this.checkUnary(node);
    case 'Literal':
      return this.checkLiteral(node);
    case 'Variable':
      return this.checkVariable(node);
    case 'Let':
      return this.checkLet(node);
    case 'Conditional':
      return this.checkConditional(node);
    case 'WhileLoop':
      return this.checkWhile(node);
    case 'ForLoop':
      return this.checkFor(node);
    case 'Block':
      return this.checkBlock(node);
    case 'FunctionCall':
      return this.checkCall(node);
    case 'FunctionDecl':
      return this.checkFunctionDecl(node);
  }
};

// ============================================================
// LEAVES
// ============================================================

TypeChecker.prototype.checkLiteral = function (
  this: TypeChecker,
  node: LiteralNode
): TypeName {
  const { literal } = node;
  if (literal.kind === 'unit') {
    throw new InternalError(
      'Unit literal outside of an elided branch',
      node.location
    );
  }
  return literal.kind;
};

TypeChecker.prototype.checkVariable = function (
  this: TypeChecker,
  node: VariableNode
): TypeName {
  const type = this.envir.lookupVar(node.name);
  if (type === undefined) {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_UNDEFINED_VARIABLE,
      `Variable '${node.name}' does not exist here`,
      node,
      { name: node.name }
    );
  }
  return type;
};

/** Binds in the current frame; shadowing an outer frame is fine */
TypeChecker.prototype.checkLet = function (
  this: TypeChecker,
  node: LetNode
): TypeName {
  if (this.envir.varExistsInScope(node.name)) {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_REDECLARATION,
      `Variable '${node.name}' already exists in this scope`,
      node,
      { name: node.name }
    );
  }

  const value = this.checkExpression(node.value);
  this.envir.pushVariable(node.name, value);
  return 'unit';
};
