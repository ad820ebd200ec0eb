/**
 * @fileoverview Calculator module, usable directly or as a ReAct tool.
 *
 * @module stepgraph/modules/calculator
 */

import { z } from 'zod';
import type { Module } from '../../types/module.types.js';
import { defineModule, defineStep, respond } from '../../registry/define.js';
import { evaluateExpression } from './expression.js';

export const CALCULATOR_MODULE_NAME = 'stepgraph/calculator';
export const CALCULATOR_MODULE_VERSION = '0.1.0';

// Accepts the bare expression or `{ input: expression }`
const CalculatorInputSchema = z.union([
  z.string(),
  z.object({ input: z.string() }).transform(value => value.input),
]);

export function createCalculatorModule(): Module {
  return defineModule({
    name: CALCULATOR_MODULE_NAME,
    version: CALCULATOR_MODULE_VERSION,
    description: 'A simple calculator module that evaluates mathematical expressions.',
    longDescription:
      'Evaluates a mathematical expression. Operators: + - * / % and ** for powers. ' +
      'Available functions: sin, cos, tan, exp, log, sqrt, pow, abs, floor, ceil; constants: pi, e. ' +
      'Input the expression directly without quotes, e.g. sqrt(2 * pi) or sin(3.14159).',
    steps: [
      defineStep({
        name: 'calculate',
        description: 'Evaluates the expression',
        input: CalculatorInputSchema,
        output: z.number(),
        run: (expression) => {
          if (expression.includes('import')) {
            throw new Error('Import statements are not allowed');
          }
          try {
            return respond(evaluateExpression(expression));
          } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new Error(`Invalid calculation: ${expression} (${reason})`, { cause: error });
          }
        },
      }),
    ],
    startStep: 'calculate',
  });
}
