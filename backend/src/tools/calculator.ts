/**
 * Arithmetic Calculator
 *
 * A small recursive-descent parser. The expression becomes a syntax tree that is
 * evaluated directly; there are no names, functions or code evaluation.
 *
 *   expression := term (('+' | '-') term)*
 *   term       := unary (('*' | '/' | '//') unary)*
 *   unary      := ('+' | '-') unary | power
 *   power      := primary ('**' unary)?
 *   primary    := NUMBER | '(' expression ')'
 */

import { ValidationError } from '../errors.js';

export type BinaryOperator = '+' | '-' | '*' | '/' | '//' | '**';

export type ExpressionNode =
  | { type: 'number'; value: number }
  | { type: 'unary'; operator: '+' | '-'; operand: ExpressionNode }
  | { type: 'binary'; operator: BinaryOperator; left: ExpressionNode; right: ExpressionNode };

type Token =
  | { kind: 'number'; value: number; position: number }
  | { kind: 'operator'; value: BinaryOperator; position: number }
  | { kind: 'paren'; value: '(' | ')'; position: number };

const ALLOWED_CHARACTERS = /^[0-9+\-*/().= ]*$/;

function invalid(message: string): ValidationError {
  return new ValidationError(message);
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const char = source[i];

    if (char === ' ') {
      i++;
      continue;
    }

    if (/[0-9.]/.test(char)) {
      const start = i;
      while (i < source.length && /[0-9.]/.test(source[i])) i++;
      const literal = source.slice(start, i);
      if (!/^(\d+\.?\d*|\.\d+)$/.test(literal)) {
        throw invalid(`Malformed number "${literal}" at ${start}`);
      }
      tokens.push({ kind: 'number', value: Number(literal), position: start });
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ kind: 'paren', value: char, position: i });
      i++;
      continue;
    }

    if (char === '*' || char === '/') {
      if (source[i + 1] === char) {
        tokens.push({ kind: 'operator', value: char === '*' ? '**' : '//', position: i });
        i += 2;
      } else {
        tokens.push({ kind: 'operator', value: char, position: i });
        i++;
      }
      continue;
    }

    if (char === '+' || char === '-') {
      tokens.push({ kind: 'operator', value: char, position: i });
      i++;
      continue;
    }

    throw invalid(`Unexpected character "${char}" at ${i}`);
  }

  return tokens;
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ExpressionNode {
    if (this.tokens.length === 0) {
      throw invalid('Empty expression');
    }
    const node = this.expression();
    const extra = this.peek();
    if (extra) {
      throw invalid(`Unexpected token at ${extra.position}`);
    }
    return node;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private matchOperator(...operators: BinaryOperator[]): BinaryOperator | null {
    const token = this.peek();
    if (token?.kind === 'operator' && operators.includes(token.value)) {
      this.index++;
      return token.value;
    }
    return null;
  }

  private expression(): ExpressionNode {
    let left = this.term();
    let operator = this.matchOperator('+', '-');
    while (operator) {
      left = { type: 'binary', operator, left, right: this.term() };
      operator = this.matchOperator('+', '-');
    }
    return left;
  }

  private term(): ExpressionNode {
    let left = this.unary();
    let operator = this.matchOperator('*', '/', '//');
    while (operator) {
      left = { type: 'binary', operator, left, right: this.unary() };
      operator = this.matchOperator('*', '/', '//');
    }
    return left;
  }

  private unary(): ExpressionNode {
    const sign = this.matchOperator('+', '-');
    if (sign === '+' || sign === '-') {
      return { type: 'unary', operator: sign, operand: this.unary() };
    }
    return this.power();
  }

  // 거듭제곱은 오른쪽 결합: 2 ** 3 ** 2 = 2 ** 9
  private power(): ExpressionNode {
    const base = this.primary();
    if (this.matchOperator('**')) {
      return { type: 'binary', operator: '**', left: base, right: this.unary() };
    }
    return base;
  }

  private primary(): ExpressionNode {
    const token = this.peek();
    if (!token) {
      throw invalid('Expression ended unexpectedly');
    }

    if (token.kind === 'number') {
      this.index++;
      return { type: 'number', value: token.value };
    }

    if (token.kind === 'paren' && token.value === '(') {
      this.index++;
      const inner = this.expression();
      const closing = this.peek();
      if (closing?.kind !== 'paren' || closing.value !== ')') {
        throw invalid(`Missing closing parenthesis for ${token.position}`);
      }
      this.index++;
      return inner;
    }

    throw invalid(`Unexpected token at ${token.position}`);
  }
}

export function parseExpression(source: string): ExpressionNode {
  return new Parser(tokenize(source)).parse();
}

export function evaluate(node: ExpressionNode): number {
  switch (node.type) {
    case 'number':
      return node.value;
    case 'unary':
      return node.operator === '-' ? -evaluate(node.operand) : evaluate(node.operand);
    case 'binary': {
      const left = evaluate(node.left);
      const right = evaluate(node.right);
      switch (node.operator) {
        case '+':
          return left + right;
        case '-':
          return left - right;
        case '*':
          return left * right;
        case '**':
          return left ** right;
        case '/':
        case '//':
          if (right === 0) {
            throw invalid('Division by zero');
          }
          return node.operator === '/' ? left / right : Math.floor(left / right);
      }
    }
  }
}

export interface Calculation {
  expression: string;
  result: number;
}

/**
 * Validates the character allowlist, drops `=` and evaluates.
 */
export function calculate(input: string): Calculation {
  if (!ALLOWED_CHARACTERS.test(input)) {
    throw invalid(`Invalid characters in expression: ${input}`);
  }

  const expression = input.replace(/=/g, '').trim();
  const result = evaluate(parseExpression(expression));

  if (!Number.isFinite(result)) {
    throw invalid(`Result is not a finite number: ${expression}`);
  }

  return { expression, result };
}

/** 12 significant digits, so 0.1 + 0.2 reads as 0.3 */
export function formatNumber(value: number): string {
  return String(Number(value.toPrecision(12)));
}
