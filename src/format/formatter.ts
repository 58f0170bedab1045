/*
 * Canonical BibTeX output.
 */
import { FormatOptions, resolveOptions } from '../config';
import { Entries, Entry, RefEntry, compareEntries } from '../models/entry';
import { Part, Sequence, Tag, Value, compareTags, isEmptyValue } from '../models/tag';
import { createLogger } from '../util/logger';
import { formatTitle, formatTitleFragment } from './title';

const log = createLogger('formatter');

const INDENT = '    ';

/** `leading` marks the first part of a title, whose first word may keep its initial capital. */
export function formatPart(part: Part, titleCase = false, leading = true): string {
  switch (part.type) {
    case 'quoted':
      return `"${titleCase ? formatTitleFragment(part.text, leading) : part.text}"`;
    case 'value':
      return part.text.toLowerCase();
  }
}

export function formatSequence(parts: Sequence, titleCase = false): string {
  return parts.map((part, i) => formatPart(part, titleCase, i === 0)).join(' # ');
}

/** Renders a tag value the way it appears inside a reference entry. */
export function formatValue(value: Value, titleCase = false): string {
  switch (value.type) {
    case 'single':
      return `{${titleCase ? formatTitle(value.text) : value.text}}`;
    case 'integer':
      return value.value.toString();
    case 'sequence':
      return formatSequence(value.parts, titleCase);
  }
}

export function formatTag(tag: Tag, opts: Partial<FormatOptions> = {}): string {
  const titleCase = resolveOptions(opts).formatTitle && tag.name === 'title';
  return `${tag.name} = ${formatValue(tag.value, titleCase)}`;
}

function formatRefEntry(entry: RefEntry, opts: FormatOptions): string {
  let tags = opts.skipEmptyTags ? entry.tags.filter(t => !isEmptyValue(t.value)) : [...entry.tags];
  if (opts.sortTags) tags = tags.sort(compareTags);

  if (tags.length === 0) return `@${entry.kind}{${entry.key}}`;

  const lines = [`@${entry.kind}{${entry.key},`];
  for (const tag of tags) lines.push(`${INDENT}${formatTag(tag, opts)},`);
  lines.push('}');
  return lines.join('\n');
}

// @STRING values are conventionally quoted; braces are used when the text
// itself contains a quote.
function formatStringValue(value: Value): string {
  switch (value.type) {
    case 'single':
      return value.text.includes('"') ? `{${value.text}}` : `"${value.text}"`;
    case 'integer':
      return `"${value.value.toString()}"`;
    case 'sequence':
      return formatSequence(value.parts);
  }
}

export function formatEntry(entry: Entry, opts: Partial<FormatOptions> = {}): string {
  switch (entry.type) {
    case 'ref':
      return formatRefEntry(entry, resolveOptions(opts));
    case 'string':
      return `@STRING{${entry.tag.name} = ${formatStringValue(entry.tag.value)}}`;
    case 'preamble':
      return `@PREAMBLE{${formatSequence(entry.body)}}`;
    case 'comment':
      return `@COMMENT{${entry.body}}`;
  }
}

/**
 * Renders a whole bibliography. Entries of different kinds are separated by
 * a blank line, as are consecutive reference entries. The input is never
 * reordered in place.
 */
export function formatEntries(entries: Entries | readonly Entry[], opts: Partial<FormatOptions> = {}): string {
  const resolved = resolveOptions(opts);
  const list = [...entries];
  if (resolved.sortEntries) list.sort(compareEntries);

  let out = '';
  list.forEach((entry, i) => {
    out += formatEntry(entry, resolved);
    const next = list[i + 1];
    if (!next) return;
    out += '\n';
    if (next.type !== entry.type || next.type === 'ref') out += '\n';
  });
  log.debug(`Formatted ${list.length} entries`);
  return out;
}
