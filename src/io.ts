/*
 * File input and output for bibliographies.
 */
import { readFileSync, writeFileSync } from 'fs';
import { FormatOptions } from './config';
import { ioError } from './errors';
import { formatEntries } from './format/formatter';
import { Entries, Entry } from './models/entry';
import { createLogger } from './util/logger';

const log = createLogger('io');

export function readBibFile(path: string): string {
  try {
    const src = readFileSync(path, 'utf8');
    log.info(`Read ${src.length} characters from ${path}`);
    return src;
  } catch (err) {
    throw ioError('read', path, err);
  }
}

/** Full file contents: the formatted entries followed by a newline. */
export function renderDocument(entries: Entries | readonly Entry[], opts: Partial<FormatOptions> = {}): string {
  const text = formatEntries(entries, opts);
  return text.length > 0 ? `${text}\n` : '';
}

export function writeEntries(entries: Entries | readonly Entry[], path: string, opts: Partial<FormatOptions> = {}): void {
  const doc = renderDocument(entries, opts);
  try {
    writeFileSync(path, doc, 'utf8');
  } catch (err) {
    throw ioError('write', path, err);
  }
  log.info(`Wrote ${doc.length} characters to ${path}`);
}

export function printEntries(entries: Entries | readonly Entry[], opts: Partial<FormatOptions> = {}): void {
  console.log(formatEntries(entries, opts));
}
