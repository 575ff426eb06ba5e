/**
 * Sable Type Checker
 * Main entry point and re-exports
 */

import type { ExpressionNode, TypeName } from '../types.js';
import { TypeChecker } from './checker.js';
import { Environment } from './environment.js';
import type { CheckOptions } from './types.js';

// Import extension modules to register prototype methods on TypeChecker.
// These must be imported AFTER checker.js to ensure the class is defined.
import './checker-core.js';
import './checker-expr.js';
import './checker-control.js';
import './checker-functions.js';

/**
 * Type-check a tree and return its type.
 *
 * Throws TypeCheckError on the first type error.
 *
 * @example
 * ```typescript
 * const type = typeCheck(parse('let x = 1; x + 2')); // 'int'
 * ```
 */
export function typeCheck(
  root: ExpressionNode,
  envir: Environment = new Environment(),
  options?: CheckOptions
): TypeName {
  return new TypeChecker(envir, options).check(root);
}

export { TypeChecker } from './checker.js';
export {
  Environment,
  type Closure,
  type ClosureState,
  type IdSource,
  type ScopeFrame,
} from './environment.js';
export type {
  CheckErrorEvent,
  CheckObservability,
  CheckOptions,
  FunctionCheckEvent,
  ScopeEvent,
} from './types.js';
