/**
 * Parser Extension: Control Flow Parsing
 * Blocks, let bindings, conditionals, and loops
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  ConditionalNode,
  ExpressionNode,
  ForLoopNode,
  LetNode,
  LiteralNode,
  SourceLocation,
  WhileLoopNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  checkValue,
  currentLocation,
  expect,
  expectValue,
  match,
  peek,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(): BlockNode;
    parseLet(): LetNode;
    parseIf(): ConditionalNode;
    parseWhile(): WhileLoopNode;
    parseFor(): ForLoopNode;
    parseIndexedFor(location: SourceLocation): ForLoopNode;
    parseCountingFor(location: SourceLocation): ForLoopNode;
  }
}

function intLiteral(value: number, location: SourceLocation): LiteralNode {
  return { type: 'Literal', literal: { kind: 'int', value }, location };
}

// ============================================================
// BLOCKS AND BINDINGS
// ============================================================

Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{'");
  const block = this.parseStatements();
  expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}'");
  return block;
};

Parser.prototype.parseLet = function (this: Parser): LetNode {
  const location = currentLocation(this.state);
  expectValue(this.state, TOKEN_TYPES.KEYWORD, 'let', 'Expected let');
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected an identifier'
  ).value;
  expectValue(this.state, TOKEN_TYPES.OPERATOR, '=', "Expected '='");
  const value = this.parseExpression();

  return { type: 'Let', name, value, location };
};

// ============================================================
// CONDITIONALS
// ============================================================

Parser.prototype.parseIf = function (this: Parser): ConditionalNode {
  const location = currentLocation(this.state);
  expectValue(this.state, TOKEN_TYPES.KEYWORD, 'if', 'Expected if');
  const condition = this.parseGrouped();
  const thenBranch = this.parseStatement();

  let elseBranch: ExpressionNode | null = null;
  if (checkValue(this.state, TOKEN_TYPES.KEYWORD, 'else')) {
    advance(this.state);
    elseBranch = this.parseStatement();
  }

  return { type: 'Conditional', condition, thenBranch, elseBranch, location };
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhile = function (this: Parser): WhileLoopNode {
  const location = currentLocation(this.state);
  expectValue(this.state, TOKEN_TYPES.KEYWORD, 'while', 'Expected while');
  const condition = this.parseGrouped();
  const body = this.parseStatement();

  return { type: 'WhileLoop', condition, body, location };
};

/**
 * for (id, from, to[, step]) body  -> indexed loop
 * for (count) body                 -> counting loop with a hidden variable
 */
Parser.prototype.parseFor = function (this: Parser): ForLoopNode {
  const location = currentLocation(this.state);
  expectValue(this.state, TOKEN_TYPES.KEYWORD, 'for', 'Expected for');
  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '('");

  if (
    check(this.state, TOKEN_TYPES.IDENTIFIER) &&
    peek(this.state, 1).type === TOKEN_TYPES.COMMA
  ) {
    return this.parseIndexedFor(location);
  }
  return this.parseCountingFor(location);
};

Parser.prototype.parseIndexedFor = function (
  this: Parser,
  location: SourceLocation
): ForLoopNode {
  const name = advance(this.state).value;
  expect(this.state, TOKEN_TYPES.COMMA, "Expected ','");

  const from = this.parseNumericBound('From');
  const init: LetNode = {
    type: 'Let',
    name,
    value: from.node,
    location: from.node.location,
  };

  expect(this.state, TOKEN_TYPES.COMMA, "Expected ','");
  const to = this.parseNumericBound('To');
  const toLocation = to.node.location;

  const ascending = to.value > from.value;
  const condition: ExpressionNode = {
    type: 'BinaryExpr',
    left: { type: 'Variable', name, location: from.node.location },
    op: ascending ? '<' : '>',
    right: to.node,
    location: toLocation,
  };

  let step: ExpressionNode;
  if (match(this.state, TOKEN_TYPES.COMMA)) {
    const amount = this.parseExpression();
    step = ascending
      ? amount
      : { type: 'UnaryExpr', op: '-', operand: amount, location };
  } else {
    // Float loops step by a float so `+=` stays well typed
    const unit = ascending ? 1 : -1;
    step = {
      type: 'Literal',
      literal: from.isFloat
        ? { kind: 'float', value: unit }
        : { kind: 'int', value: unit },
      location: toLocation,
    };
  }

  const increment: ExpressionNode = {
    type: 'BinaryExpr',
    left: { type: 'Variable', name, location: toLocation },
    op: '+=',
    right: step,
    location: toLocation,
  };

  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')'");
  const body = this.parseStatement();

  return { type: 'ForLoop', init, condition, increment, body, location };
};

Parser.prototype.parseCountingFor = function (
  this: Parser,
  location: SourceLocation
): ForLoopNode {
  // The leading dot keeps the name out of the identifier space
  const name = `.for${this.state.forCounter++}`;
  const bound = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')'");
  const body = this.parseStatement();

  return {
    type: 'ForLoop',
    init: { type: 'Let', name, value: intLiteral(0, location), location },
    condition: {
      type: 'BinaryExpr',
      left: { type: 'Variable', name, location },
      op: '<',
      right: bound,
      location,
    },
    increment: {
      type: 'BinaryExpr',
      left: { type: 'Variable', name, location },
      op: '+=',
      right: intLiteral(1, location),
      location,
    },
    body,
    location,
  };
};
