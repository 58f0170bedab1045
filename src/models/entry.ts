import { Sequence, Tag, compareStrings, compareTags, isEmptyValue } from './tag';

export interface RefEntry {
  readonly type: 'ref';
  /** Entry type such as `article` or `misc`, lowercased. */
  readonly kind: string;
  readonly key: string;
  readonly tags: readonly Tag[];
}

export interface StringEntry {
  readonly type: 'string';
  readonly tag: Tag;
}

export interface CommentEntry {
  readonly type: 'comment';
  readonly body: string;
}

export interface PreambleEntry {
  readonly type: 'preamble';
  readonly body: Sequence;
}

export type Entry = PreambleEntry | StringEntry | CommentEntry | RefEntry;

export type EntryType = Entry['type'];

export interface RefEntryOptions {
  /** Drop tags whose value is empty. */
  removeEmptyTags?: boolean;
  /** Store tags in `compareTags` order instead of source order. */
  sortTags?: boolean;
}

export function createRefEntry(kind: string, key: string, tags: readonly Tag[], opts: RefEntryOptions = {}): RefEntry {
  let kept = opts.removeEmptyTags ? tags.filter(t => !isEmptyValue(t.value)) : [...tags];
  if (opts.sortTags) kept = kept.sort(compareTags);
  return { type: 'ref', kind: kind.toLowerCase(), key: key.toLowerCase(), tags: kept };
}

export const createStringEntry = (tag: Tag): StringEntry => ({ type: 'string', tag });

export const createCommentEntry = (body: string): CommentEntry => ({ type: 'comment', body });

export const createPreambleEntry = (body: Sequence): PreambleEntry => ({ type: 'preamble', body });

const GROUP_ORDER: Record<EntryType, number> = {
  preamble: 0,
  string: 1,
  comment: 2,
  ref: 3,
};

/**
 * Total order used when sorting a bibliography: preambles, then string
 * macros by name, then comments by body, then references by cite key.
 * Preambles always compare equal so they keep their file order.
 */
export function compareEntries(a: Entry, b: Entry): number {
  const byGroup = GROUP_ORDER[a.type] - GROUP_ORDER[b.type];
  if (byGroup !== 0) return byGroup;
  switch (a.type) {
    case 'preamble':
      return 0;
    case 'string':
      return b.type === 'string' ? compareStrings(a.tag.name, b.tag.name) : 0;
    case 'comment':
      return b.type === 'comment' ? compareStrings(a.body, b.body) : 0;
    case 'ref':
      return b.type === 'ref' ? compareStrings(a.key, b.key) : 0;
  }
}

/** Parsed entries in file order until `sort()` is called. */
export class Entries implements Iterable<Entry> {
  private readonly items: Entry[];

  constructor(entries: Iterable<Entry> = []) {
    this.items = [...entries];
  }

  get length(): number {
    return this.items.length;
  }

  push(entry: Entry): void {
    this.items.push(entry);
  }

  at(index: number): Entry | undefined {
    return this.items[index];
  }

  /** Stable in-place sort by `compareEntries`. */
  sort(): this {
    this.items.sort(compareEntries);
    return this;
  }

  /** A sorted copy; this collection keeps its order. */
  sorted(): Entries {
    return new Entries(this.items).sort();
  }

  toArray(): Entry[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<Entry> {
    return this.items[Symbol.iterator]();
  }
}
