/**
 * Parser Extension: Expression Parsing
 * Term collection and precedence resolution
 *
 * Expressions are parsed in two phases. First a flat list of terms is
 * collected: operands (fully parsed) and raw operators. Then the list is
 * split recursively at the loosest operator tier present, which imposes
 * precedence without a dedicated function per level.
 */

import { Parser } from './parser.js';
import type {
  Associativity,
  BinaryOp,
  ExpressionNode,
  Operator,
  SourceLocation,
} from '../types.js';
import {
  InternalError,
  ParseError,
  SABLE_ERROR_CODES,
  TOKEN_TYPES,
} from '../types.js';
import { advance, check, checkValue, expect, failAt } from './state.js';
import {
  BINARY_OP_PRECEDENCE,
  isBinaryOp,
  isLiteralStart,
  isTerminator,
  isUnaryOp,
  toOperator,
} from './helpers.js';

/** One operand or one operator of a flattened expression */
export type Term =
  | { readonly kind: 'operand'; readonly node: ExpressionNode }
  | {
      readonly kind: 'operator';
      readonly op: Operator;
      readonly location: SourceLocation;
    };

interface Split {
  readonly index: number;
  readonly op: BinaryOp;
  readonly location: SourceLocation;
}

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    collectTerms(): Term[];
    resolvePrecedence(terms: readonly Term[]): ExpressionNode;
    parseTerm(): ExpressionNode;
    parseGrouped(): ExpressionNode;
  }
}

// ============================================================
// TERM COLLECTION
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  const terms = this.collectTerms();
  if (terms.length === 0) {
    throw failAt(this.state, 'Expected an expression');
  }
  return this.resolvePrecedence(terms);
};

Parser.prototype.collectTerms = function (this: Parser): Term[] {
  const terms: Term[] = [];

  while (!isTerminator(this.state)) {
    if (check(this.state, TOKEN_TYPES.OPERATOR)) {
      const token = advance(this.state);
      const op = toOperator(token.value);
      if (!op) {
        throw new ParseError(
          SABLE_ERROR_CODES.PARSE_INVALID_OPERATOR,
          `Unknown operator: '${token.value}'`,
          token.span.start
        );
      }
      terms.push({ kind: 'operator', op, location: token.span.start });
      continue;
    }

    if (terms[terms.length - 1]?.kind === 'operand') {
      throw failAt(this.state, 'Expected operator or terminator');
    }
    terms.push({ kind: 'operand', node: this.parseTerm() });
  }

  return terms;
};

// ============================================================
// PRECEDENCE RESOLUTION
// ============================================================

/**
 * Find the operator of `tier` to split at. Only operators that follow an
 * operand are binary; one that follows another operator is a prefix.
 */
function findSplit(
  terms: readonly Term[],
  tier: readonly BinaryOp[],
  associativity: Associativity
): Split | undefined {
  let found: Split | undefined;

  for (let i = 1; i < terms.length; i++) {
    const term = terms[i];
    if (term?.kind !== 'operator' || terms[i - 1]?.kind !== 'operand') {
      continue;
    }
    const { op } = term;
    if (!isBinaryOp(op) || !tier.includes(op)) {
      continue;
    }

    found = { index: i, op, location: term.location };
    if (associativity === 'right') {
      return found;
    }
  }

  return found;
}

Parser.prototype.resolvePrecedence = function (
  this: Parser,
  terms: readonly Term[]
): ExpressionNode {
  const last = terms[terms.length - 1];
  if (!last) {
    throw new InternalError('Cannot resolve an empty term list');
  }
  if (last.kind === 'operator') {
    throw new ParseError(
      SABLE_ERROR_CODES.PARSE_INVALID_SYNTAX,
      `Unexpected operator '${last.op}'`,
      last.location
    );
  }
  if (terms.length === 1) {
    return last.node;
  }

  // Loosest tier first: the loosest operator becomes the root
  for (let t = BINARY_OP_PRECEDENCE.length - 1; t >= 0; t--) {
    const tier = BINARY_OP_PRECEDENCE[t] ?? [];
    const split = findSplit(terms, tier, this.state.associativity);
    if (split) {
      return {
        type: 'BinaryExpr',
        left: this.resolvePrecedence(terms.slice(0, split.index)),
        op: split.op,
        right: this.resolvePrecedence(terms.slice(split.index + 1)),
        location: split.location,
      };
    }
  }

  const first = terms[0];
  if (first?.kind === 'operator') {
    if (!isUnaryOp(first.op)) {
      throw new ParseError(
        SABLE_ERROR_CODES.PARSE_INVALID_OPERATOR,
        `Not a unary operator '${first.op}'`,
        first.location
      );
    }
    return {
      type: 'UnaryExpr',
      op: first.op,
      operand: this.resolvePrecedence(terms.slice(1)),
      location: first.location,
    };
  }

  const second = terms[1];
  if (second?.kind === 'operator') {
    throw new ParseError(
      SABLE_ERROR_CODES.PARSE_INVALID_OPERATOR,
      `Not a binary operator '${second.op}'`,
      second.location
    );
  }

  throw new InternalError('Adjacent operands in term list');
};

// ============================================================
// TERMS
// ============================================================

Parser.prototype.parseTerm = function (this: Parser): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    return this.parseBlock();
  }
  if (checkValue(this.state, TOKEN_TYPES.KEYWORD, 'if')) {
    return this.parseIf();
  }
  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    return this.parseGrouped();
  }
  if (isLiteralStart(this.state)) {
    return this.parseLiteral();
  }
  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    return this.parseVariableOrCall();
  }

  throw failAt(this.state, 'Expected a term');
};

Parser.prototype.parseGrouped = function (this: Parser): ExpressionNode {
  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '('");
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')'");
  return expression;
};
