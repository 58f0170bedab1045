import { createToken, IToken, Lexer, TokenType } from 'chevrotain';
import { internalAssertion } from '../errors';
import { createLogger } from '../util/logger';
import { Special, Token, TokenInfo, Whitespace, special, value, whitespace } from './tokens';

const log = createLogger('lexer');

interface TokenSpec {
  name: string;
  pattern: RegExp;
  line_breaks?: boolean;
  build: (image: string) => Token;
}

// Order matters: chevrotain takes the first rule that matches, so the
// specific whitespace kinds come before the generic one. The value rule
// matches everything else, which makes the lexer total.
export const tokenSpecs: TokenSpec[] = [
  { name: 'NewLine', pattern: /\n|\r/, line_breaks: true, build: image => whitespace(Whitespace.NewLine, image) },
  { name: 'Tab', pattern: /\t/, build: image => whitespace(Whitespace.Tab, image) },
  { name: 'Space', pattern: /\s/, build: image => whitespace(Whitespace.Space, image) },
  { name: 'At', pattern: /@/, build: () => special(Special.At) },
  { name: 'BraceLeft', pattern: /\{/, build: () => special(Special.BraceLeft) },
  { name: 'BraceRight', pattern: /\}/, build: () => special(Special.BraceRight) },
  { name: 'Comma', pattern: /,/, build: () => special(Special.Comma) },
  { name: 'Equals', pattern: /=/, build: () => special(Special.Equals) },
  { name: 'Pound', pattern: /#/, build: () => special(Special.Pound) },
  { name: 'Quote', pattern: /"/, build: () => special(Special.Quote) },
  { name: 'Value', pattern: /[^@{}",=#\s]+/, build: image => value(image) },
];

interface BuiltLexer {
  lexer: Lexer;
  builders: Map<TokenType, (image: string) => Token>;
}

let cached: BuiltLexer | null = null;

function buildLexer(): BuiltLexer {
  if (cached) return cached;
  const builders = new Map<TokenType, (image: string) => Token>();
  const allTokens: TokenType[] = [];
  for (const spec of tokenSpecs) {
    const tokenType = spec.line_breaks
      ? createToken({ name: spec.name, pattern: spec.pattern, line_breaks: true })
      : createToken({ name: spec.name, pattern: spec.pattern });
    builders.set(tokenType, spec.build);
    allTokens.push(tokenType);
  }
  cached = { lexer: new Lexer(allTokens, { positionTracking: 'full' }), builders };
  return cached;
}

/**
 * Splits BibTeX source into positioned tokens. Never fails: stray braces,
 * unterminated quotes and the like are all valid tokens, and grammar
 * problems are left to the parser.
 */
export class Tokenizer {
  constructor(private readonly source: string) {}

  tokenize(): TokenInfo[] {
    const { lexer, builders } = buildLexer();
    const result = lexer.tokenize(this.source);
    if (result.errors.length > 0) {
      // The value rule accepts every character the others do not.
      const first = result.errors[0];
      throw internalAssertion(`Lexer rejected input at offset ${first.offset}: ${first.message}`);
    }
    const tokens = result.tokens.map(tok => toTokenInfo(tok, builders));
    log.debug(`Tokenized ${this.source.length} characters into ${tokens.length} tokens`);
    return tokens;
  }
}

export function toTokenInfo(tok: IToken, builders = buildLexer().builders): TokenInfo {
  const build = builders.get(tok.tokenType);
  if (!build) throw internalAssertion(`No token builder registered for ${tok.tokenType.name}`);
  return {
    token: build(tok.image),
    position: { line: tok.startLine ?? 1, column: tok.startColumn ?? 1 },
  };
}

export function tokenize(source: string): TokenInfo[] {
  return new Tokenizer(source).tokenize();
}
