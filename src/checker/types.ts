/**
 * Checker Types
 *
 * Public types for checker configuration.
 * These types are the primary interface for host applications.
 */

import type { TypeName } from '../types.js';

/** Observability callbacks for monitoring a check */
export interface CheckObservability {
  /** Called after a scope frame is pushed */
  onScopeEnter?: (event: ScopeEvent) => void;
  /** Called before a scope frame is popped */
  onScopeLeave?: (event: ScopeEvent) => void;
  /** Called after a function body has been checked */
  onFunctionCheck?: (event: FunctionCheckEvent) => void;
  /** Called once when the check fails */
  onError?: (event: CheckErrorEvent) => void;
}

/** Event emitted on scope entry and exit */
export interface ScopeEvent {
  /** Frame id */
  scopeId: number;
  /** Live frames, root included */
  depth: number;
}

/** Event emitted after a function body is checked */
export interface FunctionCheckEvent {
  /** Function name */
  name: string;
  /** Whether the check came from the declaration or a forward call */
  trigger: 'declaration' | 'call';
  /** Return type after the check */
  returnType: TypeName;
  /** True when the return type was adopted from the body */
  inferred: boolean;
}

/** Event emitted on error */
export interface CheckErrorEvent {
  /** The error that ended the check */
  error: Error;
}

/** Options for a type check */
export interface CheckOptions {
  /** Observability callbacks for monitoring the check */
  observability?: CheckObservability | undefined;
}
