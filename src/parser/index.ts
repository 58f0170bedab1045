import { Entries } from '../models/entry';
import { tokenize } from './lexer';
import { Parser, ParserOptions } from './parser';

export { Tokenizer, tokenize } from './lexer';
export { Parser, parseTokens, type ParserOptions } from './parser';
export * from './tokens';

/**
 * Tokenize and parse BibTeX source. Throws a `BibtexError` at the first
 * grammar error.
 */
export function parse(source: string, opts: ParserOptions = {}): Entries {
  return new Parser(tokenize(source), opts).parse();
}

export default {
  parse,
};
