/**
 * Checker Extension: Operators
 * Arithmetic, comparison, equality, logical, and assignment operators
 */

import { TypeChecker } from './checker.js';
import type {
  BinaryExprNode,
  TypeName,
  UnaryExprNode,
} from '../types.js';
import { SABLE_ERROR_CODES, TypeCheckError } from '../types.js';

// Declaration merging to add methods to TypeChecker interface
declare module './checker.js' {
  interface TypeChecker {
    checkBinary(node: BinaryExprNode): TypeName;
    checkAssignment(node: BinaryExprNode): TypeName;
    checkCompoundAssignment(node: BinaryExprNode): TypeName;
    checkUnary(node: UnaryExprNode): TypeName;
  }
}

function isNumeric(type: TypeName): boolean {
  return type === 'int' || type === 'float';
}

function invalidOperands(
  node: BinaryExprNode,
  left: TypeName,
  right: TypeName
): TypeCheckError {
  return TypeCheckError.fromNode(
    SABLE_ERROR_CODES.TYPE_INVALID_OPERAND,
    `Invalid operation ${node.op} for ${left} and ${right}`,
    node,
    { op: node.op, left, right }
  );
}

// ============================================================
// BINARY OPERATORS
// ============================================================

TypeChecker.prototype.checkBinary = function (
  this: TypeChecker,
  node: BinaryExprNode
): TypeName {
  switch (node.op) {
    case '=':
      return this.checkAssignment(node);
    case '+=':
    case '-=':
      return this.checkCompoundAssignment(node);
  }

  const left = this.checkExpression(node.left);
  const right = this.checkExpression(node.right);

  switch (node.op) {
    case '+':
    case '-':
    case '*':
    case '/':
    case '%':
      // Any float operand promotes the result
      if (!isNumeric(left) || !isNumeric(right)) {
        throw invalidOperands(node, left, right);
      }
      return left === 'int' && right === 'int' ? 'int' : 'float';

    case '<':
    case '>':
    case '<=':
    case '>=':
      if (!isNumeric(left) || !isNumeric(right)) {
        throw invalidOperands(node, left, right);
      }
      return 'bool';

    case '==':
    case '!=':
      // Same primitive only; char and string are not comparable
      if (
        left !== right ||
        (left !== 'int' && left !== 'float' && left !== 'bool')
      ) {
        throw invalidOperands(node, left, right);
      }
      return 'bool';

    case '&&':
    case '||':
      if (left !== 'bool' || right !== 'bool') {
        throw invalidOperands(node, left, right);
      }
      return 'bool';
  }
};

TypeChecker.prototype.checkAssignment = function (
  this: TypeChecker,
  node: BinaryExprNode
): TypeName {
  const value = this.checkExpression(node.right);
  const target = node.left;
  if (target.type !== 'Variable') {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_INVALID_ASSIGNMENT,
      `Left side of '${node.op}' must be a variable`,
      node
    );
  }

  const type = this.envir.lookupVar(target.name);
  if (type === undefined) {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_UNDEFINED_VARIABLE,
      `Variable '${target.name}' does not exist here`,
      target,
      { name: target.name }
    );
  }
  if (type !== value) {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_MISMATCH,
      `Cannot assign ${value} to ${target.name} which is ${type}`,
      node,
      { name: target.name, expected: type, actual: value }
    );
  }

  return 'unit';
};

/** += and -= need int with int or float with float */
TypeChecker.prototype.checkCompoundAssignment = function (
  this: TypeChecker,
  node: BinaryExprNode
): TypeName {
  const value = this.checkExpression(node.right);
  const target = node.left;
  if (target.type !== 'Variable') {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_INVALID_ASSIGNMENT,
      `Left side of '${node.op}' must be a variable`,
      node
    );
  }

  const type = this.envir.lookupVar(target.name);
  if (type === undefined) {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_UNDEFINED_VARIABLE,
      `Variable '${target.name}' does not exist here`,
      target,
      { name: target.name }
    );
  }
  if (!isNumeric(type) || type !== value) {
    const message =
      node.op === '+='
        ? `Cannot add ${value} to ${target.name} because it is ${type}`
        : `Cannot subtract ${value} from ${target.name} because it is ${type}`;
    throw TypeCheckError.fromNode(SABLE_ERROR_CODES.TYPE_MISMATCH, message, node, {
      name: target.name,
      expected: type,
      actual: value,
    });
  }

  return 'unit';
};

// ============================================================
// UNARY OPERATORS
// ============================================================

TypeChecker.prototype.checkUnary = function (
  this: TypeChecker,
  node: UnaryExprNode
): TypeName {
  const operand = this.checkExpression(node.operand);
  const valid = node.op === '-' ? isNumeric(operand) : operand === 'bool';
  if (!valid) {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_INVALID_OPERAND,
      `Unary operator ${node.op} is not valid for ${operand}`,
      node,
      { op: node.op, operand }
    );
  }
  return operand;
};
