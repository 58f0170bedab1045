/**
 * Token vocabulary shared by the lexer, the parser and error reporting.
 *
 * Every token carries the exact text it was read from, so a token stream can
 * always be turned back into its source with `stringify`.
 */

export enum Special {
  At = '@',
  BraceLeft = '{',
  BraceRight = '}',
  Comma = ',',
  Equals = '=',
  Pound = '#',
  Quote = '"',
}

export enum Whitespace {
  NewLine = 'newline',
  Space = 'space',
  Tab = 'tab',
}

export type Token =
  | { type: 'special'; special: Special }
  | { type: 'value'; value: string }
  | { type: 'whitespace'; whitespace: Whitespace; text: string };

/** 1-indexed line and column of a token's first character. */
export interface Position {
  readonly line: number;
  readonly column: number;
}

export interface TokenInfo {
  token: Token;
  position: Position;
}

export const START_POSITION: Position = { line: 1, column: 1 };

export const special = (s: Special): Token => ({ type: 'special', special: s });

export const value = (v: string): Token => ({ type: 'value', value: v });

const WHITESPACE_TEXT: Record<Whitespace, string> = {
  [Whitespace.NewLine]: '\n',
  [Whitespace.Space]: ' ',
  [Whitespace.Tab]: '\t',
};

export function whitespace(kind: Whitespace, text: string = WHITESPACE_TEXT[kind]): Token {
  return { type: 'whitespace', whitespace: kind, text };
}

export function isWhitespace(token: Token): boolean {
  return token.type === 'whitespace';
}

export function isSpecial(token: Token, s: Special): boolean {
  return token.type === 'special' && token.special === s;
}

/**
 * Structural equality used by the parser's `expect`. Whitespace tokens are
 * equal when they are of the same kind, whatever character they came from.
 */
export function tokensEqual(a: Token, b: Token): boolean {
  switch (a.type) {
    case 'special':
      return b.type === 'special' && a.special === b.special;
    case 'value':
      return b.type === 'value' && a.value === b.value;
    case 'whitespace':
      return b.type === 'whitespace' && a.whitespace === b.whitespace;
  }
}

export function tokenText(token: Token): string {
  switch (token.type) {
    case 'special':
      return token.special;
    case 'value':
      return token.value;
    case 'whitespace':
      return token.text;
  }
}

/** Short human-readable label for messages, e.g. `'='` or `value "author"`. */
export function describeToken(token: Token): string {
  switch (token.type) {
    case 'special':
      return `'${token.special}'`;
    case 'value':
      return `value "${token.value}"`;
    case 'whitespace':
      return token.whitespace;
  }
}

export function stringify(tokens: Iterable<Token>): string {
  let out = '';
  for (const token of tokens) out += tokenText(token);
  return out;
}

export function formatPosition(position: Position): string {
  return `line ${position.line}, column ${position.column}`;
}
