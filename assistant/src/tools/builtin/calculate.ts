import { z } from 'zod';
import { defineTool } from '../definition.js';

type Token =
  | { type: 'number'; value: number }
  | { type: 'operator'; value: '+' | '-' | '*' | '/' | '//' | '**' }
  | { type: 'paren'; value: '(' | ')' };

const ALLOWED_CHARACTERS = /^[0-9+\-*/.() ]*$/;

class ExpressionError extends Error {}

const tokenize = (expression: string): Token[] => {
  const tokens: Token[] = [];
  let index = 0;

  while (index < expression.length) {
    const char = expression[index];
    if (char === undefined) {
      break;
    }

    if (char === ' ') {
      index += 1;
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ type: 'paren', value: char });
      index += 1;
      continue;
    }

    if (char === '*' || char === '/') {
      const doubled = expression[index + 1] === char;
      if (char === '*') {
        tokens.push({ type: 'operator', value: doubled ? '**' : '*' });
      } else {
        tokens.push({ type: 'operator', value: doubled ? '//' : '/' });
      }
      index += doubled ? 2 : 1;
      continue;
    }

    if (char === '+' || char === '-') {
      tokens.push({ type: 'operator', value: char });
      index += 1;
      continue;
    }

    const match = /^(\d+\.?\d*|\.\d+)/.exec(expression.slice(index));
    if (!match?.[0]) {
      throw new ExpressionError('invalid syntax');
    }
    tokens.push({ type: 'number', value: Number(match[0]) });
    index += match[0].length;
  }

  return tokens;
};

/**
 * Recursive-descent evaluator with the usual precedence:
 * `+ -` < `* / //` < unary sign < `**` (right associative).
 */
class ExpressionParser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  public parse(): number {
    if (this.tokens.length === 0) {
      throw new ExpressionError('empty expression');
    }
    const value = this.parseSum();
    if (this.position < this.tokens.length) {
      throw new ExpressionError('invalid syntax');
    }
    return value;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private isOperator(token: Token | undefined, ...operators: string[]): boolean {
    return token?.type === 'operator' && operators.includes(token.value);
  }

  private parseSum(): number {
    let value = this.parseProduct();
    let token = this.peek();
    while (token?.type === 'operator' && (token.value === '+' || token.value === '-')) {
      this.position += 1;
      const right = this.parseProduct();
      value = token.value === '+' ? value + right : value - right;
      token = this.peek();
    }
    return value;
  }

  private parseProduct(): number {
    let value = this.parseUnary();
    let token = this.peek();
    while (token?.type === 'operator' && (token.value === '*' || token.value === '/' || token.value === '//')) {
      this.position += 1;
      const right = this.parseUnary();
      if (token.value === '*') {
        value *= right;
      } else {
        if (right === 0) {
          throw new ExpressionError('division by zero');
        }
        value = token.value === '/' ? value / right : Math.floor(value / right);
      }
      token = this.peek();
    }
    return value;
  }

  private parseUnary(): number {
    const token = this.peek();
    if (this.isOperator(token, '+', '-')) {
      this.position += 1;
      const operand = this.parseUnary();
      return token?.value === '-' ? -operand : operand;
    }
    return this.parsePower();
  }

  private parsePower(): number {
    const base = this.parsePrimary();
    if (this.isOperator(this.peek(), '**')) {
      this.position += 1;
      return base ** this.parseUnary();
    }
    return base;
  }

  private parsePrimary(): number {
    const token = this.peek();
    if (token?.type === 'number') {
      this.position += 1;
      return token.value;
    }
    if (token?.type === 'paren' && token.value === '(') {
      this.position += 1;
      const value = this.parseSum();
      const closing = this.peek();
      if (closing?.type !== 'paren' || closing.value !== ')') {
        throw new ExpressionError('unbalanced parentheses');
      }
      this.position += 1;
      return value;
    }
    throw new ExpressionError('invalid syntax');
  }
}

/**
 * Evaluates a basic arithmetic expression.
 * Failures come back as `Error: ...` text rather than exceptions.
 */
export const calculate = (expression: string): string => {
  if (!ALLOWED_CHARACTERS.test(expression)) {
    return 'Error: Invalid characters in expression';
  }

  try {
    const value = new ExpressionParser(tokenize(expression)).parse();
    if (!Number.isFinite(value)) {
      return 'Error: result is not a finite number';
    }
    return String(value);
  } catch (error) {
    if (error instanceof ExpressionError) {
      return `Error: ${error.message}`;
    }
    throw error;
  }
};

const calculateArgsSchema = z.object({
  expression: z.string(),
});

export const CALCULATE_TOOL = defineTool({
  name: 'calculate',
  description: 'Perform mathematical calculations. Input should be a valid mathematical expression.',
  parameterSchema: {
    type: 'object',
    properties: {
      expression: {
        type: 'string',
        description: "Mathematical expression to evaluate (e.g., '2 + 2', '10 * 5')",
      },
    },
    required: ['expression'],
  },
  argsSchema: calculateArgsSchema,
  execute: ({ expression }) => calculate(expression),
});
