/*
 * Title casing. BibTeX styles downcase titles; words that must keep their
 * capitals are protected by wrapping them in braces.
 */

const UPPERCASE = /\p{Lu}/u;

export function removeBraces(text: string): string {
  return text.replace(/[{}]/g, '');
}

/** Wraps a word in braces, leaving a trailing colon outside. */
export function wrapWordWithBraces(word: string): string {
  if (word.length > 1 && word.endsWith(':')) return `{${word.slice(0, -1)}}:`;
  return `{${word}}`;
}

/**
 * True when the word contains a capital letter. The leading word of a title
 * is left alone when its only capital is its first character.
 */
export function needsProtection(word: string, leading = false): boolean {
  const [first = '', ...rest] = Array.from(word);
  const capitalInRest = rest.some(ch => UPPERCASE.test(ch));
  if (leading && !capitalInRest) return false;
  return capitalInRest || UPPERCASE.test(first);
}

/**
 * @param leading - whether `text` starts the title; pass false for a later
 * fragment of a `#`-joined title.
 */
export function formatTitle(text: string, leading = true): string {
  return removeBraces(text)
    .split(/\s+/)
    .filter(word => word.length > 0)
    .map((word, i) => (needsProtection(word, leading && i === 0) ? wrapWordWithBraces(word) : word))
    .join(' ');
}

/** Like `formatTitle`, but keeps the fragment's leading and trailing whitespace. */
export function formatTitleFragment(text: string, leading = true): string {
  const inner = text.trim();
  if (inner.length === 0) return text;
  const start = text.length - text.trimStart().length;
  const end = text.trimEnd().length;
  return `${text.slice(0, start)}${formatTitle(inner, leading)}${text.slice(end)}`;
}
