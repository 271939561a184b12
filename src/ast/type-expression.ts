import { isBaseTypeName, type TypeReferenceAST } from './types.js';

interface Token {
  readonly text: string;
  readonly column: number;
}

const TOKEN_PATTERN = /\s*([A-Za-z_][A-Za-z0-9_.]*|[<>,]|\S)/gy;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export class TypeExpressionError extends Error {
  readonly expression: string;
  readonly column: number;

  constructor(expression: string, column: number, message: string) {
    super(`invalid type "${expression}" at column ${column}: ${message}`);
    this.name = 'TypeExpressionError';
    this.expression = expression;
    this.column = column;
  }
}

/**
 * Parses a written type such as `i32`, `shared.UUID`, `list<Foo>` or
 * `map<string, list<binary>>`. Every node of the result carries `line`.
 */
export function parseTypeExpression(expression: string, line: number): TypeReferenceAST {
  const tokens = tokenize(expression);
  const cursor = { index: 0 };
  const parsed = parseType(expression, tokens, cursor, line);
  const trailing = tokens[cursor.index];
  if (trailing !== undefined) {
    throw new TypeExpressionError(expression, trailing.column, `unexpected "${trailing.text}"`);
  }
  return parsed;
}

function tokenize(expression: string): readonly Token[] {
  const tokens: Token[] = [];
  TOKEN_PATTERN.lastIndex = 0;
  let match = TOKEN_PATTERN.exec(expression);
  while (match !== null) {
    const text = match[1];
    if (text === undefined) {
      break;
    }
    tokens.push({ text, column: match.index + match[0].length - text.length + 1 });
    match = TOKEN_PATTERN.exec(expression);
  }
  return tokens;
}

function parseType(
  expression: string,
  tokens: readonly Token[],
  cursor: { index: number },
  line: number,
): TypeReferenceAST {
  const token = tokens[cursor.index];
  if (token === undefined) {
    throw new TypeExpressionError(expression, expression.length + 1, 'expected a type');
  }
  cursor.index += 1;

  const text = token.text;
  switch (text) {
    case 'map': {
      expect(expression, tokens, cursor, '<');
      const key = parseType(expression, tokens, cursor, line);
      expect(expression, tokens, cursor, ',');
      const value = parseType(expression, tokens, cursor, line);
      expect(expression, tokens, cursor, '>');
      return { kind: 'map', key, value, line };
    }
    case 'list':
    case 'set': {
      expect(expression, tokens, cursor, '<');
      const value = parseType(expression, tokens, cursor, line);
      expect(expression, tokens, cursor, '>');
      return { kind: text, value, line };
    }
    default:
      break;
  }

  if (!IDENTIFIER_PATTERN.test(text)) {
    throw new TypeExpressionError(expression, token.column, `unexpected "${text}"`);
  }
  if (isBaseTypeName(text)) {
    return { kind: 'base', name: text, line };
  }
  return { kind: 'named', name: text, line };
}

function expect(expression: string, tokens: readonly Token[], cursor: { index: number }, text: string): void {
  const token = tokens[cursor.index];
  if (token === undefined) {
    throw new TypeExpressionError(expression, expression.length + 1, `expected "${text}"`);
  }
  if (token.text !== text) {
    throw new TypeExpressionError(expression, token.column, `expected "${text}" but found "${token.text}"`);
  }
  cursor.index += 1;
}
