/**
 * TypeChecker Class - Core
 *
 * Walks the AST with a scope environment and returns a type per node.
 * Methods are added via prototype extension from separate modules,
 * like the parser:
 * - checker-core.ts: Dispatch, literals, variables, let
 * - checker-expr.ts: Binary and unary operators, assignment
 * - checker-control.ts: Conditionals, loops, blocks
 * - checker-functions.ts: Declarations, calls, function bodies
 */

import type { ExpressionNode, TypeName } from '../types.js';
import { Environment } from './environment.js';
import type { CheckObservability, CheckOptions } from './types.js';

export class TypeChecker {
  /** Environment the walk currently resolves names in */
  envir: Environment;
  readonly observability: CheckObservability;

  constructor(envir: Environment = new Environment(), options?: CheckOptions) {
    this.envir = envir;
    this.observability = options?.observability ?? {};
  }

  /**
   * Check a whole tree. The first error aborts the check and is
   * reported to onError before it propagates.
   */
  check(root: ExpressionNode): TypeName {
    try {
      return this.checkExpression(root);
    } catch (error) {
      if (error instanceof Error) {
        this.observability.onError?.({ error });
      }
      throw error;
    }
  }

  /** @internal */
  enterScope(): void {
    const scopeId = this.envir.enterScope();
    this.observability.onScopeEnter?.({ scopeId, depth: this.envir.depth });
  }

  /** @internal */
  leaveScope(): void {
    this.observability.onScopeLeave?.({
      scopeId: this.envir.currentScopeId,
      depth: this.envir.depth,
    });
    this.envir.leaveScope();
  }

  /** Run `fn` with another environment in place, restoring afterwards */
  withEnvironment<T>(envir: Environment, fn: () => T): T {
    const saved = this.envir;
    this.envir = envir;
    try {
      return fn();
    } finally {
      this.envir = saved;
    }
  }
}
