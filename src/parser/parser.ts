import {
  CommentEntry,
  Entries,
  Entry,
  PreambleEntry,
  RefEntry,
  StringEntry,
  createCommentEntry,
  createPreambleEntry,
  createRefEntry,
  createStringEntry,
} from '../models/entry';
import { Part, Sequence, Tag, Value, bare, createTag, integer, parseUnsigned, quoted, sequence, single } from '../models/tag';
import { endOfTokenStream, internalAssertion, missing, unexpectedToken } from '../errors';
import { createLogger } from '../util/logger';
import { warn } from '../util/diag';
import {
  Position,
  START_POSITION,
  Special,
  Token,
  TokenInfo,
  Whitespace,
  isSpecial,
  isWhitespace,
  special,
  stringify,
  tokensEqual,
  whitespace,
} from './tokens';

const log = createLogger('parser');

export interface ParserOptions {
  /** Drop tags with empty values while building reference entries. */
  removeEmptyTags?: boolean;
}

/**
 * Recursive-descent parser over a materialized token list. Stops at the
 * first grammar error and throws it as a `BibtexError`.
 */
export class Parser {
  private readonly tokens: readonly TokenInfo[];
  private index = 0;
  private position: Position = START_POSITION;
  private readonly removeEmptyTags: boolean;

  constructor(tokens: readonly TokenInfo[], opts: ParserOptions = {}) {
    this.tokens = tokens;
    this.removeEmptyTags = opts.removeEmptyTags === true;
  }

  // ---------- Cursor ----------

  private peek(): TokenInfo | undefined {
    return this.tokens[this.index];
  }

  private next(): TokenInfo | undefined {
    const info = this.tokens[this.index];
    if (info) {
      this.index++;
      this.position = info.position;
    }
    return info;
  }

  /** Consumes whitespace and returns the next significant token without consuming it. */
  private peekNonWhitespace(): TokenInfo | undefined {
    let info = this.peek();
    while (info && isWhitespace(info.token)) {
      this.next();
      info = this.peek();
    }
    return info;
  }

  private nextNonWhitespace(): TokenInfo | undefined {
    this.peekNonWhitespace();
    return this.next();
  }

  /** Like `nextNonWhitespace` but for callers that already peeked a token. */
  private take(): TokenInfo {
    const info = this.nextNonWhitespace();
    if (!info) throw internalAssertion('Peeked token returned none.');
    return info;
  }

  private expect(expected: Token): TokenInfo {
    const info = this.nextNonWhitespace();
    if (!info) throw endOfTokenStream(this.position);
    if (!tokensEqual(info.token, expected)) throw unexpectedToken(expected, info);
    return info;
  }

  // ---------- Grammar ----------

  parse(): Entries {
    const entries = new Entries();
    let info = this.peekNonWhitespace();
    while (info) {
      if (!isSpecial(info.token, Special.At)) {
        throw unexpectedToken(special(Special.At), this.take());
      }
      entries.push(this.parseEntry());
      info = this.peekNonWhitespace();
    }
    log.debug(`Parsed ${entries.length} entries`);
    return entries;
  }

  parseEntry(): Entry {
    this.expect(special(Special.At));

    const info = this.nextNonWhitespace();
    if (!info) throw endOfTokenStream(this.position);
    if (info.token.type !== 'value') throw missing('MissingEntryType', info);
    const kind = info.token.value;

    switch (kind.toLowerCase()) {
      case 'comment':
        return this.parseCommentEntry();
      case 'preamble':
        return this.parsePreambleEntry();
      case 'string':
        return this.parseStringEntry();
      default:
        return this.parseRefEntry(kind);
    }
  }

  parseCommentEntry(): CommentEntry {
    this.expect(special(Special.BraceLeft));

    const body: Token[] = [];
    for (;;) {
      const info = this.next();
      if (!info) throw endOfTokenStream(this.position);
      if (isSpecial(info.token, Special.BraceRight)) break;
      body.push(info.token);
    }
    return createCommentEntry(stringify(body));
  }

  parsePreambleEntry(): PreambleEntry {
    this.expect(special(Special.BraceLeft));
    const body = this.parseTagValueSequence();
    this.expect(special(Special.BraceRight));
    return createPreambleEntry(body);
  }

  parseStringEntry(): StringEntry {
    this.expect(special(Special.BraceLeft));
    const tag = this.parseTag();

    // Optional trailing comma before the closing brace.
    const info = this.nextNonWhitespace();
    if (!info) throw endOfTokenStream(this.position);
    if (isSpecial(info.token, Special.Comma)) {
      this.expect(special(Special.BraceRight));
    } else if (!isSpecial(info.token, Special.BraceRight)) {
      throw unexpectedToken(special(Special.BraceRight), info);
    }
    return createStringEntry(tag);
  }

  parseRefEntry(kind: string): RefEntry {
    this.expect(special(Special.BraceLeft));

    const keyInfo = this.nextNonWhitespace();
    if (!keyInfo) throw endOfTokenStream(this.position);
    if (keyInfo.token.type !== 'value') throw missing('MissingCiteKey', keyInfo);
    const key = keyInfo.token.value;

    const tags: Tag[] = [];
    const seen = new Set<string>();
    for (;;) {
      const info = this.peekNonWhitespace();
      if (info && isSpecial(info.token, Special.BraceRight)) {
        this.take();
        break;
      }
      if (info && isSpecial(info.token, Special.Comma)) {
        this.take();
        continue;
      }
      const tagStart = info?.position ?? this.position;
      const tag = this.parseTag();
      if (seen.has(tag.name)) {
        warn('parser', `Duplicate tag '${tag.name}' in entry '${key}'`, { position: tagStart });
      }
      seen.add(tag.name);
      tags.push(tag);
    }

    return createRefEntry(kind, key, tags, { removeEmptyTags: this.removeEmptyTags });
  }

  parseTag(): Tag {
    const info = this.nextNonWhitespace();
    if (!info) throw endOfTokenStream(this.position);
    if (info.token.type !== 'value') throw missing('MissingTagName', info);
    const name = info.token.value;

    this.expect(special(Special.Equals));

    return createTag(name, this.parseTagValue());
  }

  /**
   * A tag value is a brace-delimited string, or a `#`-joined sequence of
   * quoted strings and bare words. A one-part sequence collapses to a
   * single string (quoted) or an integer (bare digits); any other bare word
   * stays a sequence so macro references survive.
   */
  parseTagValue(): Value {
    const info = this.peekNonWhitespace();
    if (!info) throw endOfTokenStream(this.position);

    if (isSpecial(info.token, Special.BraceLeft)) {
      const text = this.parseDelimitedString(special(Special.BraceLeft), special(Special.BraceRight));
      return single(text.trim());
    }
    if (!isSpecial(info.token, Special.Quote) && info.token.type !== 'value') {
      throw missing('MissingContentOpenToken', info);
    }

    const parts = this.parseTagValueSequence();
    if (parts.length > 1) return sequence(parts);

    const [part] = parts;
    if (part.type === 'quoted') return single(part.text.trim());
    const n = parseUnsigned(part.text);
    return n === null ? sequence(parts) : integer(n);
  }

  parseTagValueSequence(): Sequence {
    const first = this.parseTagValuePart();
    const rest: Part[] = [];

    for (;;) {
      const info = this.peekNonWhitespace();
      if (!info) throw endOfTokenStream(this.position);
      if (isSpecial(info.token, Special.BraceRight) || isSpecial(info.token, Special.Comma)) break;
      if (!isSpecial(info.token, Special.Pound)) {
        throw unexpectedToken(special(Special.Comma), info);
      }
      this.expect(special(Special.Pound));
      rest.push(this.parseTagValuePart());
    }

    return [first, ...rest];
  }

  parseTagValuePart(): Part {
    const info = this.peekNonWhitespace();
    if (!info) throw endOfTokenStream(this.position);

    if (isSpecial(info.token, Special.Quote)) {
      return quoted(this.parseDelimitedString(special(Special.Quote), special(Special.Quote)));
    }
    if (info.token.type === 'value') {
      const taken = this.take();
      if (taken.token.type !== 'value') throw internalAssertion('Token should be value type.');
      return bare(taken.token.value);
    }
    throw missing('MissingContentOpenToken', info);
  }

  /**
   * Reads the text between `start` and its matching `end`. Identical
   * delimiters (quotes) close on the next occurrence; distinct ones (braces)
   * nest. Whitespace runs collapse to one space.
   */
  parseDelimitedString(start: Token, end: Token): string {
    const open = this.nextNonWhitespace();
    if (!open) throw endOfTokenStream(this.position);
    if (!tokensEqual(open.token, start)) throw unexpectedToken(start, open);

    const sameDelimiter = tokensEqual(start, end);
    let nested = 0;
    const body: Token[] = [];

    for (;;) {
      const info = this.next();
      if (!info) throw endOfTokenStream(this.position);
      const token = info.token;

      if (tokensEqual(token, end)) {
        if (sameDelimiter || nested === 0) break;
        nested--;
      } else if (tokensEqual(token, start)) {
        nested++;
      }

      if (isWhitespace(token)) {
        const last = body[body.length - 1];
        if (!last || !isWhitespace(last)) body.push(whitespace(Whitespace.Space));
      } else {
        body.push(token);
      }
    }

    return stringify(body);
  }
}

export function parseTokens(tokens: readonly TokenInfo[], opts: ParserOptions = {}): Entries {
  return new Parser(tokens, opts).parse();
}
