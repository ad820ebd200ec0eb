/**
 * @fileoverview Unit tests for the expression evaluator
 */

import { describe, it, expect } from 'vitest';
import { ExpressionError, evaluateExpression, tokenize } from './expression.js';

describe('evaluateExpression', () => {
  it('should respect operator precedence and parentheses', () => {
    expect(evaluateExpression('2+2')).toBe(4);
    expect(evaluateExpression('2 + 3 * 4')).toBe(14);
    expect(evaluateExpression('(2 + 3) * 4')).toBe(20);
    expect(evaluateExpression('7 / 2')).toBe(3.5);
    expect(evaluateExpression('10 % 3')).toBe(1);
    expect(evaluateExpression('8 - 3 - 2')).toBe(3);
  });

  it('should treat ** as right-associative and tighter than unary minus', () => {
    expect(evaluateExpression('2 ** 3 ** 2')).toBe(512);
    expect(evaluateExpression('-2 ** 2')).toBe(-4);
    expect(evaluateExpression('2 ** -1')).toBe(0.5);
    expect(evaluateExpression('--3')).toBe(3);
  });

  it('should read decimal and exponent literals', () => {
    expect(evaluateExpression('1e3')).toBe(1000);
    expect(evaluateExpression('.5 * 4')).toBe(2);
    expect(evaluateExpression('2.5e-1')).toBe(0.25);
  });

  it('should provide functions and constants', () => {
    expect(evaluateExpression('sqrt(16) + 1')).toBe(5);
    expect(evaluateExpression('pow(2, 10)')).toBe(1024);
    expect(evaluateExpression('abs(-3)')).toBe(3);
    expect(evaluateExpression('floor(2.7) + ceil(2.1)')).toBe(5);
    expect(evaluateExpression('sin(0)')).toBe(0);
    expect(evaluateExpression('exp(0)')).toBe(1);
    expect(evaluateExpression('log(e)')).toBe(1);
    expect(evaluateExpression('pi')).toBe(Math.PI);
    expect(evaluateExpression('2 * pi')).toBe(2 * Math.PI);
  });

  it('should reject division by zero', () => {
    expect(() => evaluateExpression('1 / 0')).toThrow('Division by zero');
    expect(() => evaluateExpression('1 % 0')).toThrow('Division by zero');
  });

  it('should reject unknown names and wrong arity', () => {
    expect(() => evaluateExpression('foo')).toThrow("Unknown name 'foo'");
    expect(() => evaluateExpression('foo(1)')).toThrow("Unknown function 'foo'");
    expect(() => evaluateExpression('pow(2)')).toThrow('pow() takes 2 argument(s), got 1');
  });

  it('should reject malformed expressions', () => {
    expect(() => evaluateExpression('2 +')).toThrow('Unexpected end of expression');
    expect(() => evaluateExpression('(1')).toThrow('Expected RPAREN at position 2');
    expect(() => evaluateExpression('1 2')).toThrow("Unexpected '2' at position 2");
    expect(() => evaluateExpression('2 $ 3')).toThrow("Unexpected character '$' at position 2");
    expect(() => evaluateExpression('')).toThrow(ExpressionError);
  });
});

describe('tokenize', () => {
  it('should emit typed tokens ending in EOF', () => {
    expect(tokenize('2 ** x(1)').map(t => `${t.type}:${t.value}`)).toEqual([
      'NUMBER:2',
      'OP:**',
      'IDENT:x',
      'LPAREN:(',
      'NUMBER:1',
      'RPAREN:)',
      'EOF:',
    ]);
  });
});
