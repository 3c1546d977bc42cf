import { z } from 'zod';

import type { ToolDefinition, ToolResult } from './toolRegistry';

/**
 * Restricted arithmetic evaluator. The grammar only knows numbers, parentheses, unary
 * sign and the four basic operators:
 *
 *   expression := term (('+' | '-') term)*
 *   term       := factor (('*' | '/') factor)*
 *   factor     := ('+' | '-') factor | number | '(' expression ')'
 *
 * Every failure is reported as an `Error: ...` string so the agent can correct itself.
 */

type Token =
  | { kind: 'number'; value: number; position: number }
  | { kind: 'operator'; value: '+' | '-' | '*' | '/'; position: number }
  | { kind: 'paren'; value: '(' | ')'; position: number };

class ExpressionError extends Error {}

class DivisionByZeroError extends Error {}

const MAX_EXPRESSION_LENGTH = 500;
const NUMBER_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const UNSUPPORTED_OPERATORS = ['**', '//', '%', '^', '|', '&', '<<', '>>', '~'];

const tokenize = (source: string): Token[] => {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source.charAt(index);

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    const unsupported = UNSUPPORTED_OPERATORS.find((operator) => source.startsWith(operator, index));
    if (unsupported) {
      throw new ExpressionError(`Unsupported operator '${unsupported}'`);
    }

    if (char === '+' || char === '-' || char === '*' || char === '/') {
      tokens.push({ kind: 'operator', value: char, position: index });
      index += 1;
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ kind: 'paren', value: char, position: index });
      index += 1;
      continue;
    }

    const match = NUMBER_PATTERN.exec(source.slice(index));
    if (match) {
      tokens.push({ kind: 'number', value: Number(match[0]), position: index });
      index += match[0].length;
      continue;
    }

    throw new ExpressionError(`unexpected character '${char}' at position ${index}`);
  }

  return tokens;
};

class Parser {
  private index = 0;

  public constructor(private readonly tokens: Token[]) {}

  public parse(): number {
    if (this.tokens.length === 0) {
      throw new ExpressionError('empty expression');
    }

    const value = this.expression();
    const trailing = this.tokens[this.index];

    if (trailing) {
      throw new ExpressionError(`unexpected '${trailing.value}' at position ${trailing.position}`);
    }

    return value;
  }

  private expression(): number {
    let value = this.term();

    for (let token = this.peek(); token; token = this.peek()) {
      if (token.kind !== 'operator' || (token.value !== '+' && token.value !== '-')) {
        break;
      }

      this.index += 1;
      const right = this.term();
      value = token.value === '+' ? value + right : value - right;
    }

    return value;
  }

  private term(): number {
    let value = this.factor();

    for (let token = this.peek(); token; token = this.peek()) {
      if (token.kind !== 'operator' || (token.value !== '*' && token.value !== '/')) {
        break;
      }

      this.index += 1;
      const right = this.factor();

      if (token.value === '/') {
        if (right === 0) {
          throw new DivisionByZeroError();
        }
        value = value / right;
      } else {
        value = value * right;
      }
    }

    return value;
  }

  private factor(): number {
    const token = this.peek();

    if (!token) {
      throw new ExpressionError('unexpected end of expression');
    }

    this.index += 1;

    if (token.kind === 'number') {
      return token.value;
    }

    if (token.kind === 'operator' && (token.value === '+' || token.value === '-')) {
      const operand = this.factor();
      return token.value === '-' ? -operand : operand;
    }

    if (token.kind === 'paren' && token.value === '(') {
      const value = this.expression();
      const closing = this.peek();

      if (!closing || closing.kind !== 'paren' || closing.value !== ')') {
        throw new ExpressionError("missing closing ')'");
      }

      this.index += 1;
      return value;
    }

    throw new ExpressionError(`unexpected '${token.value}' at position ${token.position}`);
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }
}

/** Integers are printed exactly; fractions lose binary noise such as `0.1 + 0.2`. */
export const formatNumber = (value: number): string => {
  const normalized = Number.isInteger(value) ? value : Number(value.toPrecision(15));
  return String(Object.is(normalized, -0) ? 0 : normalized);
};

export const calculate = (expression: string): string => {
  const source = expression.trim();

  if (source.length > MAX_EXPRESSION_LENGTH) {
    return `Error: unrecognized expression (longer than ${MAX_EXPRESSION_LENGTH} characters)`;
  }

  try {
    const result = new Parser(tokenize(source)).parse();

    if (!Number.isFinite(result)) {
      return 'Error: Result is not a finite number';
    }

    return formatNumber(result);
  } catch (error: unknown) {
    if (error instanceof DivisionByZeroError) {
      return 'Error: Cannot divide by zero';
    }

    if (error instanceof ExpressionError && error.message.startsWith('Unsupported')) {
      return `Error: ${error.message}`;
    }

    if (error instanceof ExpressionError) {
      return `Error: unrecognized expression (${error.message})`;
    }

    throw error;
  }
};

const calculatorArgsSchema = z.object({
  expression: z.string().trim().min(1),
});

export const calculatorTool: ToolDefinition<z.infer<typeof calculatorArgsSchema>> = {
  name: 'calculator',
  description:
    'Evaluates an arithmetic expression using + - * / and parentheses. Returns the result or an error message.',
  argsSchema: calculatorArgsSchema,
  argsHint: { expression: "Arithmetic expression, e.g. '(2 + 3) * 4'" },
  execute: (args): ToolResult => {
    const output = calculate(args.expression);

    if (output.startsWith('Error:')) {
      return { error: output };
    }

    return { value: output };
  },
};
