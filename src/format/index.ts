import { BibfmtOptions, resolveOptions } from '../config';
import { parse } from '../parser';
import { formatEntries } from './formatter';

export { formatEntries, formatEntry, formatPart, formatSequence, formatTag, formatValue } from './formatter';
export { formatTitle, formatTitleFragment, needsProtection, removeBraces, wrapWordWithBraces } from './title';

/** Tokenize, parse and format BibTeX source in one call. */
export function formatBibtex(source: string, opts: Partial<BibfmtOptions> = {}): string {
  const resolved = resolveOptions(opts);
  return formatEntries(parse(source, { removeEmptyTags: resolved.removeEmptyTags }), resolved);
}
