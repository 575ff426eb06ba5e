/**
 * Parser Extension: Function Parsing
 * Function declarations, variable references, and calls
 */

import { Parser } from './parser.js';
import type {
  BlockFunction,
  ExpressionNode,
  FunctionCallNode,
  FunctionDeclNode,
  TypeName,
  VariableNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  check,
  currentLocation,
  expect,
  expectValue,
  match,
} from './state.js';
import { isTerminator } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunctionDecl(): { placeholder: FunctionDeclNode; fn: BlockFunction };
    parseVariableOrCall(): VariableNode | FunctionCallNode;
    parseArguments(): ExpressionNode[];
  }
}

// ============================================================
// DECLARATIONS
// ============================================================

/**
 * fun name(p: type, ...)[: type] = body
 *
 * Returns the placeholder left in the statement list and the function
 * itself, which travels in the block's function table.
 */
Parser.prototype.parseFunctionDecl = function (this: Parser): {
  placeholder: FunctionDeclNode;
  fn: BlockFunction;
} {
  const location = currentLocation(this.state);
  expectValue(this.state, TOKEN_TYPES.KEYWORD, 'fun', 'Expected fun');
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected an identifier'
  ).value;

  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '('");
  const params: string[] = [];
  const paramTypes: TypeName[] = [];
  while (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    const param = expect(
      this.state,
      TOKEN_TYPES.IDENTIFIER,
      'Expected an identifier'
    );
    params.push(param.value);
    expect(this.state, TOKEN_TYPES.COLON, "Expected ':'");
    paramTypes.push(this.parseTypeAnnotation());

    if (!match(this.state, TOKEN_TYPES.COMMA)) break;
  }
  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')'");

  const returnType: TypeName = match(this.state, TOKEN_TYPES.COLON)
    ? this.parseTypeAnnotation()
    : 'any';

  expectValue(this.state, TOKEN_TYPES.OPERATOR, '=', "Expected '='");
  const body = this.parseStatement();

  return {
    placeholder: { type: 'FunctionDecl', name, location },
    fn: {
      name,
      definition: { params, paramTypes, returnType, body, location },
    },
  };
};

// ============================================================
// REFERENCES AND CALLS
// ============================================================

Parser.prototype.parseVariableOrCall = function (
  this: Parser
): VariableNode | FunctionCallNode {
  const location = currentLocation(this.state);
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected an identifier'
  ).value;

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    const args = this.parseArguments();
    return { type: 'FunctionCall', name, args, location };
  }

  return { type: 'Variable', name, location };
};

/** ( expr, expr, ... ) with an optional trailing comma */
Parser.prototype.parseArguments = function (this: Parser): ExpressionNode[] {
  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '('");

  const args: ExpressionNode[] = [];
  while (!isTerminator(this.state)) {
    args.push(this.parseExpression());
    match(this.state, TOKEN_TYPES.COMMA);
  }

  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')'");
  return args;
};
