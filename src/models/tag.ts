/**
 * Tag and value model for BibTeX entries.
 */

export type Part =
  | { type: 'quoted'; text: string }
  | { type: 'value'; text: string };

/** Parts joined by `#`. Never empty. */
export type Sequence = readonly [Part, ...Part[]];

export type Value =
  | { type: 'single'; text: string }
  | { type: 'integer'; value: bigint }
  | { type: 'sequence'; parts: Sequence };

export interface Tag {
  readonly name: string;
  readonly value: Value;
}

const U64_MAX = 18446744073709551615n;

export const quoted = (text: string): Part => ({ type: 'quoted', text });

export const bare = (text: string): Part => ({ type: 'value', text });

export const single = (text: string): Value => ({ type: 'single', text });

export const integer = (value: bigint): Value => ({ type: 'integer', value });

export const sequence = (parts: Sequence): Value => ({ type: 'sequence', parts });

export function createTag(name: string, value: Value): Tag {
  return { name: name.toLowerCase(), value };
}

/** Parses an unsigned 64-bit decimal, or returns null. */
export function parseUnsigned(text: string): bigint | null {
  if (!/^\d+$/.test(text)) return null;
  const n = BigInt(text);
  return n <= U64_MAX ? n : null;
}

export function isEmptyPart(part: Part): boolean {
  return part.text.length === 0;
}

export function isEmptyValue(value: Value): boolean {
  switch (value.type) {
    case 'single':
      return value.text.trim().length === 0;
    case 'integer':
      return false;
    case 'sequence':
      return value.parts.every(isEmptyPart);
  }
}

function rank(name: string): number {
  if (name === 'title') return 0;
  if (name === 'author') return 1;
  return 2;
}

/** Code point order, so astral characters sort after the whole BMP. */
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  let i = 0;
  while (i < a.length && i < b.length) {
    const x = a.codePointAt(i) ?? 0;
    const y = b.codePointAt(i) ?? 0;
    if (x !== y) return x < y ? -1 : 1;
    i += x > 0xffff ? 2 : 1;
  }
  return a.length < b.length ? -1 : 1;
}

/** `title` first, `author` second, then every other tag name alphabetically. */
export function compareTags(a: Tag, b: Tag): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left === right) return 0;
  const byRank = rank(left) - rank(right);
  if (byRank !== 0) return byRank;
  return compareStrings(left, right);
}
