import { Position, Token, TokenInfo, describeToken, formatPosition } from './parser/tokens';

export type MissingKind = 'MissingEntryType' | 'MissingCiteKey' | 'MissingTagName' | 'MissingContentOpenToken';

export type ErrorDetail =
  | { kind: 'EndOfTokenStream'; position: Position }
  | { kind: 'UnexpectedToken'; expected: Token; found: TokenInfo }
  | { kind: MissingKind; found: TokenInfo }
  | { kind: 'InternalAssertion'; message: string }
  | { kind: 'Io'; operation: 'read' | 'write'; path: string; reason: string };

export type ErrorKind = ErrorDetail['kind'];

const MISSING_LABEL: Record<MissingKind, string> = {
  MissingEntryType: "Missing entry type after '@'",
  MissingCiteKey: 'Missing cite key',
  MissingTagName: 'Missing tag name',
  MissingContentOpenToken: `Missing tag content (expected '{', '"' or a bare value)`,
};

export function describeError(detail: ErrorDetail): string {
  switch (detail.kind) {
    case 'EndOfTokenStream':
      return `Unexpected end of input after ${formatPosition(detail.position)}.`;
    case 'UnexpectedToken':
      return `Expected ${describeToken(detail.expected)} but found ${describeToken(detail.found.token)} at ${formatPosition(detail.found.position)}.`;
    case 'MissingEntryType':
    case 'MissingCiteKey':
    case 'MissingTagName':
    case 'MissingContentOpenToken':
      return `${MISSING_LABEL[detail.kind]}: found ${describeToken(detail.found.token)} at ${formatPosition(detail.found.position)}.`;
    case 'InternalAssertion':
      return `Internal assertion failed: ${detail.message}`;
    case 'Io':
      return `Failed to ${detail.operation} ${detail.path}: ${detail.reason}`;
  }
}

/**
 * The single error type raised by the bibfmt core. Parsing stops at the first
 * one; `detail` says what went wrong and where.
 */
export class BibtexError extends Error {
  readonly detail: ErrorDetail;

  constructor(detail: ErrorDetail) {
    super(describeError(detail));
    this.name = 'BibtexError';
    this.detail = detail;
  }

  get kind(): ErrorKind {
    return this.detail.kind;
  }

  /** Source location of the problem, when it has one. */
  get position(): Position | undefined {
    const detail = this.detail;
    switch (detail.kind) {
      case 'EndOfTokenStream':
        return detail.position;
      case 'UnexpectedToken':
      case 'MissingEntryType':
      case 'MissingCiteKey':
      case 'MissingTagName':
      case 'MissingContentOpenToken':
        return detail.found.position;
      case 'InternalAssertion':
      case 'Io':
        return undefined;
    }
  }
}

export const endOfTokenStream = (position: Position) => new BibtexError({ kind: 'EndOfTokenStream', position });

export const unexpectedToken = (expected: Token, found: TokenInfo) =>
  new BibtexError({ kind: 'UnexpectedToken', expected, found });

export const missing = (kind: MissingKind, found: TokenInfo) => new BibtexError({ kind, found });

export const internalAssertion = (message: string) => new BibtexError({ kind: 'InternalAssertion', message });

export function ioError(operation: 'read' | 'write', path: string, cause: unknown): BibtexError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new BibtexError({ kind: 'Io', operation, path, reason });
}

export function isBibtexError(err: unknown): err is BibtexError {
  return err instanceof BibtexError;
}
