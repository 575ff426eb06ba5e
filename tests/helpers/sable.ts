/**
 * Test utilities for Sable parser and checker tests
 */

import {
  parse,
  typeCheck,
  type CheckObservability,
  type CheckErrorEvent,
  type ExpressionNode,
  type FunctionCheckEvent,
  type ParseOptions,
  type ScopeEvent,
  type TypeName,
} from '../../src/index.js';

/** Parse a program and return its first statement */
export function parseFirst(
  source: string,
  options?: ParseOptions
): ExpressionNode {
  const [first] = parse(source, options).statements;
  if (!first) {
    throw new Error(`No statements in: ${source}`);
  }
  return first;
}

/**
 * Render an expression fully bracketed, e.g. `(1 + (2 * 3))`.
 * Only covers the node kinds expression tests produce.
 */
export function show(node: ExpressionNode): string {
  switch (node.type) {
    case 'BinaryExpr':
      return `(${show(node.left)} ${node.op} ${show(node.right)})`;
    case 'UnaryExpr':
      return `(${node.op}${show(node.operand)})`;
    case 'Literal':
      return 'value' in node.literal ? String(node.literal.value) : '()';
    case 'Variable':
      return node.name;
    case 'FunctionCall':
      return `${node.name}(${node.args.map(show).join(', ')})`;
    default:
      return `<${node.type}>`;
  }
}

/** Parse a single expression statement and render it bracketed */
export function bracket(source: string, options?: ParseOptions): string {
  return show(parseFirst(source, options));
}

/** Parse and type-check a whole program */
export function check(
  source: string,
  options?: { observability?: CheckObservability }
): TypeName {
  return typeCheck(parse(source), undefined, options);
}

export interface CollectedEvents {
  readonly scopeEnter: ScopeEvent[];
  readonly scopeLeave: ScopeEvent[];
  readonly functionCheck: FunctionCheckEvent[];
  readonly error: CheckErrorEvent[];
}

/** Collect observability events for assertions */
export function createEventCollector(): {
  events: CollectedEvents;
  callbacks: CheckObservability;
} {
  const events: CollectedEvents = {
    scopeEnter: [],
    scopeLeave: [],
    functionCheck: [],
    error: [],
  };

  return {
    events,
    callbacks: {
      onScopeEnter: (e) => events.scopeEnter.push(e),
      onScopeLeave: (e) => events.scopeLeave.push(e),
      onFunctionCheck: (e) => events.functionCheck.push(e),
      onError: (e) => events.error.push(e),
    },
  };
}
