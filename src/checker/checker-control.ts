/**
 * Checker Extension: Control Flow
 * Conditionals, loops, and blocks
 */

import { TypeChecker } from './checker.js';
import type {
  BlockNode,
  ConditionalNode,
  ForLoopNode,
  SourceLocation,
  TypeName,
  WhileLoopNode,
} from '../types.js';
import { SABLE_ERROR_CODES, TypeCheckError } from '../types.js';

// Declaration merging to add methods to TypeChecker interface
declare module './checker.js' {
  interface TypeChecker {
    checkConditional(node: ConditionalNode): TypeName;
    checkWhile(node: WhileLoopNode): TypeName;
    checkFor(node: ForLoopNode): TypeName;
    checkBlock(node: BlockNode): TypeName;
  }
}

function conditionError(
  construct: 'if' | 'while' | 'loop',
  actual: TypeName,
  node: { location: SourceLocation }
): TypeCheckError {
  return TypeCheckError.fromNode(
    SABLE_ERROR_CODES.TYPE_MISMATCH,
    `Condition for ${construct} must be boolean, got ${actual}`,
    node,
    { expected: 'bool', actual }
  );
}

// ============================================================
// CONDITIONALS
// ============================================================

/** Without an else branch the result is unit whatever the then branch is */
TypeChecker.prototype.checkConditional = function (
  this: TypeChecker,
  node: ConditionalNode
): TypeName {
  const condition = this.checkExpression(node.condition);
  if (condition !== 'bool') {
    throw conditionError('if', condition, node);
  }

  const thenType = this.checkExpression(node.thenBranch);
  if (node.elseBranch === null) {
    return 'unit';
  }

  const elseType = this.checkExpression(node.elseBranch);
  if (thenType !== elseType) {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_MISMATCH,
      `If and else branch must have same type, got ${thenType} and ${elseType}`,
      node,
      { thenType, elseType }
    );
  }
  return thenType;
};

// ============================================================
// LOOPS
// ============================================================

TypeChecker.prototype.checkWhile = function (
  this: TypeChecker,
  node: WhileLoopNode
): TypeName {
  const condition = this.checkExpression(node.condition);
  if (condition !== 'bool') {
    throw conditionError('while', condition, node);
  }
  this.checkExpression(node.body);
  return 'unit';
};

/** The loop variable lives in a scope of its own around the body */
TypeChecker.prototype.checkFor = function (
  this: TypeChecker,
  node: ForLoopNode
): TypeName {
  this.enterScope();
  this.checkExpression(node.init);

  const condition = this.checkExpression(node.condition);
  if (condition !== 'bool') {
    throw conditionError('loop', condition, node);
  }

  this.checkExpression(node.body);
  this.checkExpression(node.increment);
  this.leaveScope();
  return 'unit';
};

// ============================================================
// BLOCKS
// ============================================================

/**
 * All functions of the block are registered and linked before the first
 * statement, so calls may precede declarations.
 */
TypeChecker.prototype.checkBlock = function (
  this: TypeChecker,
  node: BlockNode
): TypeName {
  this.enterScope();

  for (const { name, definition } of node.functions) {
    if (this.envir.funExistsInScope(name)) {
      throw new TypeCheckError(
        SABLE_ERROR_CODES.TYPE_REDECLARATION,
        `Function '${name}' already exists in this scope`,
        definition.location,
        { name }
      );
    }
    this.envir.pushFunction(name, definition);
  }
  this.envir.updateFunEnvirs();

  let result: TypeName = 'unit';
  for (const statement of node.statements) {
    result = this.checkExpression(statement);
  }

  this.leaveScope();
  return result;
};
