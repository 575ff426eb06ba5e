/**
 * Checker Extension: Functions
 * Calls, declaration placeholders, and body checking
 */

import { TypeChecker } from './checker.js';
import type {
  FunctionCallNode,
  FunctionDeclNode,
  FunctionDefinition,
  TypeName,
} from '../types.js';
import {
  InternalError,
  SABLE_ERROR_CODES,
  TypeCheckError,
} from '../types.js';
import type { Closure, Environment } from './environment.js';
import type { FunctionCheckEvent } from './types.js';

// Declaration merging to add methods to TypeChecker interface
declare module './checker.js' {
  interface TypeChecker {
    checkCall(node: FunctionCallNode): TypeName;
    checkFunctionDecl(node: FunctionDeclNode): TypeName;
    checkFunction(
      closure: Closure,
      envir: Environment,
      trigger: FunctionCheckEvent['trigger']
    ): TypeName;
  }
}

// ============================================================
// CALLS
// ============================================================

/**
 * An unchecked callee is checked on the spot, in the environment of its
 * declaring frame rather than the caller's.
 */
TypeChecker.prototype.checkCall = function (
  this: TypeChecker,
  node: FunctionCallNode
): TypeName {
  const closure = this.envir.lookupFun(node.name);
  if (!closure) {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_UNDEFINED_FUNCTION,
      `Function '${node.name}' does not exist here`,
      node,
      { name: node.name }
    );
  }

  const { definition } = closure;
  if (definition.returnType === 'any') {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_ANNOTATION_REQUIRED,
      `Recursive function '${node.name}' needs type annotations`,
      node,
      { name: node.name }
    );
  }

  if (node.args.length !== definition.paramTypes.length) {
    throw TypeCheckError.fromNode(
      SABLE_ERROR_CODES.TYPE_ARITY_MISMATCH,
      `Function '${node.name}' expects ${definition.paramTypes.length} argument(s), got ${node.args.length}`,
      node,
      {
        name: node.name,
        expected: definition.paramTypes.length,
        actual: node.args.length,
      }
    );
  }

  node.args.forEach((arg, i) => {
    const actual = this.checkExpression(arg);
    const expected = definition.paramTypes[i];
    if (actual !== expected) {
      throw TypeCheckError.fromNode(
        SABLE_ERROR_CODES.TYPE_ARGUMENT_MISMATCH,
        `Argument ${i + 1} of '${node.name}' must be ${expected}, got ${actual}`,
        arg,
        { name: node.name, index: i, expected, actual }
      );
    }
  });

  if (closure.state === 'unchecked') {
    this.checkFunction(closure, this.envir.getScope(closure.declScope), 'call');
  }

  return definition.returnType;
};

// ============================================================
// DECLARATIONS
// ============================================================

/** Checks the body at its textual position even if a call already did */
TypeChecker.prototype.checkFunctionDecl = function (
  this: TypeChecker,
  node: FunctionDeclNode
): TypeName {
  const closure = this.envir.declareFun(node.name);
  if (!closure) {
    throw new InternalError(
      `No closure registered for function '${node.name}'`,
      node.location
    );
  }

  this.checkFunction(closure, closure.envir, 'declaration');
  return 'unit';
};

/** Pairs each parameter with its annotation; a parsed definition always has both */
function parameterBindings(
  definition: FunctionDefinition
): [string, TypeName][] {
  const { params, paramTypes } = definition;
  const bindings: [string, TypeName][] = [];
  params.forEach((param, i) => {
    const paramType = paramTypes[i];
    if (paramType !== undefined) bindings.push([param, paramType]);
  });

  if (bindings.length !== params.length || params.length !== paramTypes.length) {
    throw new InternalError(
      `Function has ${params.length} parameter(s) but ${paramTypes.length} parameter type(s)`,
      definition.location
    );
  }
  return bindings;
}

TypeChecker.prototype.checkFunction = function (
  this: TypeChecker,
  closure: Closure,
  envir: Environment,
  trigger: FunctionCheckEvent['trigger']
): TypeName {
  const { definition } = closure;
  const params = parameterBindings(definition);
  closure.state = 'checking';

  const bodyType = this.withEnvironment(envir, () => {
    this.enterScope();
    params.forEach(([param, paramType]) => {
      if (this.envir.varExistsInScope(param)) {
        throw new TypeCheckError(
          SABLE_ERROR_CODES.TYPE_REDECLARATION,
          `Variable '${param}' already exists in this scope`,
          definition.location,
          { name: param }
        );
      }
      this.envir.pushVariable(param, paramType);
    });
    const type = this.checkExpression(definition.body);
    this.leaveScope();
    return type;
  });

  const inferred = definition.returnType === 'any';
  if (inferred) {
    definition.returnType = bodyType;
  } else if (definition.returnType !== bodyType) {
    throw new TypeCheckError(
      SABLE_ERROR_CODES.TYPE_RETURN_MISMATCH,
      `Return type does not match annotation, got ${bodyType} and ${definition.returnType} was annotated`,
      definition.location,
      { expected: definition.returnType, actual: bodyType }
    );
  }

  closure.state = 'checked';
  this.observability.onFunctionCheck?.({
    name: closure.name,
    trigger,
    returnType: bodyType,
    inferred,
  });
  return bodyType;
};
