/**
 * @fileoverview Arithmetic expression evaluator.
 *
 * Grammar (lowest to highest precedence):
 * ```
 * expr    := term (('+' | '-') term)*
 * term    := unary (('*' | '/' | '%') unary)*
 * unary   := ('+' | '-') unary | power
 * power   := primary ('**' unary)?
 * primary := NUMBER | IDENT | IDENT '(' args ')' | '(' expr ')'
 * ```
 * `**` is right-associative and binds tighter than unary minus on its left,
 * so `-2 ** 2` is `-4`.
 *
 * @module stepgraph/modules/calculator/expression
 */

export class ExpressionError extends Error {
  constructor(message: string, readonly position: number) {
    super(message);
    this.name = 'ExpressionError';
  }
}

type TokenType = 'NUMBER' | 'IDENT' | 'OP' | 'LPAREN' | 'RPAREN' | 'COMMA' | 'EOF';

interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly position: number;
}

const CONSTANTS: Readonly<Record<string, number>> = {
  pi: Math.PI,
  e: Math.E,
};

const FUNCTIONS: Readonly<Record<string, { arity: number; fn: (...args: number[]) => number }>> = {
  sin: { arity: 1, fn: Math.sin },
  cos: { arity: 1, fn: Math.cos },
  tan: { arity: 1, fn: Math.tan },
  exp: { arity: 1, fn: Math.exp },
  log: { arity: 1, fn: Math.log },
  sqrt: { arity: 1, fn: Math.sqrt },
  abs: { arity: 1, fn: Math.abs },
  floor: { arity: 1, fn: Math.floor },
  ceil: { arity: 1, fn: Math.ceil },
  pow: { arity: 2, fn: Math.pow },
};

export const SUPPORTED_NAMES: ReadonlyArray<string> = [...Object.keys(FUNCTIONS), ...Object.keys(CONSTANTS)];

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < input.length) {
    const char = input.charAt(pos);

    if (/\s/.test(char)) {
      pos++;
      continue;
    }

    if (/[0-9.]/.test(char)) {
      const match = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(input.slice(pos));
      if (!match) {
        throw new ExpressionError(`Malformed number at position ${pos}`, pos);
      }
      tokens.push({ type: 'NUMBER', value: match[0], position: pos });
      pos += match[0].length;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const start = pos;
      while (pos < input.length && /[A-Za-z0-9_]/.test(input.charAt(pos))) {
        pos++;
      }
      tokens.push({ type: 'IDENT', value: input.slice(start, pos), position: start });
      continue;
    }

    if (input.startsWith('**', pos)) {
      tokens.push({ type: 'OP', value: '**', position: pos });
      pos += 2;
      continue;
    }

    switch (char) {
      case '+':
      case '-':
      case '*':
      case '/':
      case '%':
        tokens.push({ type: 'OP', value: char, position: pos });
        pos++;
        continue;
      case '(':
        tokens.push({ type: 'LPAREN', value: char, position: pos });
        pos++;
        continue;
      case ')':
        tokens.push({ type: 'RPAREN', value: char, position: pos });
        pos++;
        continue;
      case ',':
        tokens.push({ type: 'COMMA', value: char, position: pos });
        pos++;
        continue;
    }

    throw new ExpressionError(`Unexpected character '${char}' at position ${pos}`, pos);
  }

  tokens.push({ type: 'EOF', value: '', position: pos });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: ReadonlyArray<Token>) {}

  parse(): number {
    const value = this.expr();
    const rest = this.peek();
    if (rest.type !== 'EOF') {
      throw new ExpressionError(`Unexpected '${rest.value}' at position ${rest.position}`, rest.position);
    }
    return value;
  }

  private expr(): number {
    let value = this.term();
    while (this.isOp('+') || this.isOp('-')) {
      const op = this.next().value;
      const right = this.term();
      value = op === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    while (this.isOp('*') || this.isOp('/') || this.isOp('%')) {
      const op = this.next();
      const right = this.unary();
      if ((op.value === '/' || op.value === '%') && right === 0) {
        throw new ExpressionError('Division by zero', op.position);
      }
      value = op.value === '*' ? value * right : op.value === '/' ? value / right : value % right;
    }
    return value;
  }

  private unary(): number {
    if (this.isOp('-')) {
      this.next();
      return -this.unary();
    }
    if (this.isOp('+')) {
      this.next();
      return this.unary();
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.isOp('**')) {
      this.next();
      return base ** this.unary();
    }
    return base;
  }

  private primary(): number {
    const token = this.next();

    switch (token.type) {
      case 'NUMBER':
        return Number(token.value);

      case 'LPAREN': {
        const value = this.expr();
        this.expect('RPAREN');
        return value;
      }

      case 'IDENT': {
        if (this.peek().type === 'LPAREN') {
          return this.call(token);
        }
        const constant = CONSTANTS[token.value];
        if (constant === undefined) {
          throw new ExpressionError(`Unknown name '${token.value}'`, token.position);
        }
        return constant;
      }

      default:
        throw new ExpressionError(
          token.type === 'EOF' ? 'Unexpected end of expression' : `Unexpected '${token.value}' at position ${token.position}`,
          token.position,
        );
    }
  }

  private call(name: Token): number {
    const fn = FUNCTIONS[name.value];
    if (fn === undefined) {
      throw new ExpressionError(`Unknown function '${name.value}'`, name.position);
    }
    this.expect('LPAREN');

    const args: number[] = [];
    if (this.peek().type !== 'RPAREN') {
      args.push(this.expr());
      while (this.peek().type === 'COMMA') {
        this.next();
        args.push(this.expr());
      }
    }
    this.expect('RPAREN');

    if (args.length !== fn.arity) {
      throw new ExpressionError(`${name.value}() takes ${fn.arity} argument(s), got ${args.length}`, name.position);
    }
    return fn.fn(...args);
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { type: 'EOF', value: '', position: -1 };
  }

  private next(): Token {
    const token = this.peek();
    if (this.index < this.tokens.length) this.index++;
    return token;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token.type === 'OP' && token.value === value;
  }

  private expect(type: TokenType): Token {
    const token = this.next();
    if (token.type !== type) {
      throw new ExpressionError(`Expected ${type} at position ${token.position}`, token.position);
    }
    return token;
  }
}

/**
 * @throws ExpressionError for malformed input, unknown names or division by zero
 */
export function evaluateExpression(input: string): number {
  return new Parser(tokenize(input)).parse();
}
