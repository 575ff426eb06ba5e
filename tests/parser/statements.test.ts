/**
 * Sable Parser Tests: Statements
 * Blocks, bindings, conditionals, loops, and function declarations
 */

import { describe, expect, it } from 'vitest';
import { parse, parseTokens, tokenize } from '../../src/index.js';
import { parseFirst, show } from '../helpers/sable.js';

describe('Sable Parser: Statements', () => {
  describe('statement lists', () => {
    it('parses let bindings and expression statements', () => {
      const block = parse('let x = 1; x');
      expect(block.type).toBe('Block');
      expect(block.statements.map((s) => s.type)).toEqual(['Let', 'Variable']);

      const [binding] = block.statements;
      if (binding?.type === 'Let') {
        expect(binding.name).toBe('x');
        expect(binding.value).toMatchObject({
          type: 'Literal',
          literal: { kind: 'int', value: 1 },
        });
        expect(binding.location).toEqual({ line: 1, column: 1, offset: 0 });
      }
    });

    it('parses an empty program as an empty block', () => {
      const block = parse('');
      expect(block.statements).toEqual([]);
      expect(block.functions).toEqual([]);
    });

    it('allows blocks without separating semicolons', () => {
      expect(parse('{ 1 } { 2 }').statements).toHaveLength(2);
    });

    it('tolerates a trailing semicolon', () => {
      expect(parse('1;').statements).toHaveLength(1);
    });

    it('requires a separator after an expression', () => {
      expect(() => parse('let a = 1 let b = 2')).toThrow(
        'Expected operator or terminator'
      );
    });

    it('parses a token stream directly', () => {
      const block = parseTokens(tokenize('true'));
      expect(block.statements[0]).toMatchObject({
        type: 'Literal',
        literal: { kind: 'bool', value: true },
      });
    });
  });

  describe('literals', () => {
    it('parses every literal kind', () => {
      const block = parse(`1; 2.5; false; 'c'; "text"`);
      expect(
        block.statements.map((s) => (s.type === 'Literal' ? s.literal : null))
      ).toEqual([
        { kind: 'int', value: 1 },
        { kind: 'float', value: 2.5 },
        { kind: 'bool', value: false },
        { kind: 'char', value: 'c' },
        { kind: 'string', value: 'text' },
      ]);
    });
  });

  describe('conditionals', () => {
    it('parses if with else', () => {
      const node = parseFirst('if (a) 1 else 2');
      expect(node.type).toBe('Conditional');
      if (node.type === 'Conditional') {
        expect(show(node.condition)).toBe('a');
        expect(show(node.thenBranch)).toBe('1');
        expect(node.elseBranch && show(node.elseBranch)).toBe('2');
      }
    });

    it('parses if without else', () => {
      const node = parseFirst('if (a) { 1 }');
      expect(node).toMatchObject({ type: 'Conditional', elseBranch: null });
    });

    it('parses if as an operand', () => {
      const node = parseFirst('let v = if (c) 1 else 2');
      expect(node.type).toBe('Let');
      if (node.type === 'Let') {
        expect(node.value.type).toBe('Conditional');
      }
    });
  });

  describe('while', () => {
    it('parses condition and body', () => {
      const node = parseFirst('while (x < 3) x += 1');
      expect(node.type).toBe('WhileLoop');
      if (node.type === 'WhileLoop') {
        expect(show(node.condition)).toBe('(x < 3)');
        expect(show(node.body)).toBe('(x += 1)');
      }
    });
  });

  describe('functions', () => {
    it('records the declaration in place and in the function table', () => {
      const block = parse('fun add(a: int, b: int): int = a + b; add(1, 2)');

      expect(block.statements.map((s) => s.type)).toEqual([
        'FunctionDecl',
        'FunctionCall',
      ]);
      expect(block.statements[0]).toMatchObject({
        type: 'FunctionDecl',
        name: 'add',
      });

      const [fn] = block.functions;
      expect(fn?.name).toBe('add');
      expect(fn?.definition.params).toEqual(['a', 'b']);
      expect(fn?.definition.paramTypes).toEqual(['int', 'int']);
      expect(fn?.definition.returnType).toBe('int');
      expect(fn && show(fn.definition.body)).toBe('(a + b)');
      expect(fn?.definition.location).toEqual({
        line: 1,
        column: 1,
        offset: 0,
      });
    });

    it('leaves an unannotated return type as any', () => {
      const [fn] = parse('fun one() = 1').functions;
      expect(fn?.definition.params).toEqual([]);
      expect(fn?.definition.returnType).toBe('any');
    });

    it('keeps nested functions in their own block', () => {
      const block = parse('{ fun g() = 1; g() }');
      expect(block.functions).toEqual([]);

      const [inner] = block.statements;
      expect(inner?.type).toBe('Block');
      if (inner?.type === 'Block') {
        expect(inner.functions.map((f) => f.name)).toEqual(['g']);
        expect(inner.statements.map((s) => s.type)).toEqual([
          'FunctionDecl',
          'FunctionCall',
        ]);
      }
    });

    it('accepts a trailing comma in call arguments', () => {
      const node = parseFirst('f(1,)');
      expect(node).toMatchObject({ type: 'FunctionCall', name: 'f' });
      if (node.type === 'FunctionCall') {
        expect(node.args).toHaveLength(1);
      }
    });

    it('parses a call without arguments', () => {
      expect(parseFirst('now()')).toMatchObject({
        type: 'FunctionCall',
        name: 'now',
        args: [],
      });
    });
  });
});
