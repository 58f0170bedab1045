import { formatBibtex, formatEntries, formatEntry, formatTag, formatValue } from '../src/format';
import { createCommentEntry, createPreambleEntry, createRefEntry, createStringEntry } from '../src/models/entry';
import { bare, createTag, integer, quoted, sequence, single } from '../src/models/tag';
import { parse } from '../src/parser';

describe('formatter', () => {
  test('formats the canonical example', () => {
    expect(formatBibtex('@misc{citekey, author="foo", title = { bar }}')).toBe(
      '@misc{citekey,\n' + '    title = {bar},\n' + '    author = {foo},\n' + '}',
    );
  });

  test('sorts string macros by name', () => {
    const src =
      '@STRING{ieee = "Institute of Electrical and Electronics Engineers"}\n' +
      '@string{acm = "Association for Computing Machinery"}';
    const entries = parse(src).toArray();
    expect(entries.map(e => (e.type === 'string' ? e.tag.name : e.type))).toEqual(['ieee', 'acm']);
    expect(formatEntries(entries)).toBe(
      '@STRING{acm = "Association for Computing Machinery"}\n' +
        '@STRING{ieee = "Institute of Electrical and Electronics Engineers"}',
    );
  });

  test('renders tags title first, author second, then alphabetically', () => {
    const src = '@Book{K, year = 1997, publisher = aw, Author = {D. Knuth}, title = {Fundamental Algorithms}}';
    expect(formatBibtex(src)).toBe(
      [
        '@book{k,',
        '    title = {Fundamental {Algorithms}},',
        '    author = {D. Knuth},',
        '    publisher = aw,',
        '    year = 1997,',
        '}',
      ].join('\n'),
    );
  });

  test('keeps tag order when sortTags is off', () => {
    expect(formatBibtex('@misc{k, year = 1, title = {t}}', { sortTags: false })).toBe(
      '@misc{k,\n    year = 1,\n    title = {t},\n}',
    );
  });

  test('skips empty tags by default', () => {
    const src = '@misc{k, author = "", title = {x}}';
    expect(formatBibtex(src)).toBe('@misc{k,\n    title = {x},\n}');
    expect(formatBibtex(src, { skipEmptyTags: false })).toBe('@misc{k,\n    title = {x},\n    author = {},\n}');
  });

  test('an entry whose tags are all skipped has no tag block', () => {
    expect(formatBibtex('@misc{k, note = {  }}')).toBe('@misc{k}');
    expect(formatBibtex('@misc{k}')).toBe('@misc{k}');
  });

  test('protects capitals in titles only', () => {
    const src = '@misc{k, title = {The {LaTeX} Companion}, note = {See LaTeX}}';
    expect(formatBibtex(src)).toBe('@misc{k,\n    title = {The {LaTeX} {Companion}},\n    note = {See LaTeX},\n}');
    expect(formatBibtex('@misc{k, title = {The LaTeX Companion}}', { formatTitle: false })).toBe(
      '@misc{k,\n    title = {The LaTeX Companion},\n}',
    );
  });

  test('title casing applies to quoted parts of a title sequence', () => {
    const tag = createTag('title', sequence([quoted('Intro to  iOS'), bare('SUFFIX')]));
    expect(formatTag(tag)).toBe('title = "Intro to {iOS}" # suffix');
  });

  test('title casing keeps the whitespace around quoted parts', () => {
    expect(formatBibtex('@misc{k, title = "Deep" # " " # x}')).toBe('@misc{k,\n    title = "Deep" # " " # x,\n}');
    expect(formatBibtex('@misc{k, title = "Deep " # "Learning"}')).toBe(
      '@misc{k,\n    title = "Deep " # "{Learning}",\n}',
    );
  });

  test('renders values', () => {
    expect(formatValue(single('a {b}'))).toBe('{a {b}}');
    expect(formatValue(integer(42n))).toBe('42');
    expect(formatValue(sequence([bare('ACM'), quoted(' Press')]))).toBe('acm # " Press"');
  });

  test('renders string, preamble and comment entries', () => {
    expect(formatEntry(createStringEntry(createTag('x', single('say "hi"'))))).toBe('@STRING{x = {say "hi"}}');
    expect(formatEntry(createStringEntry(createTag('n', integer(5n))))).toBe('@STRING{n = "5"}');
    expect(formatEntry(createStringEntry(createTag('m', sequence([bare('a'), quoted('b')]))))).toBe(
      '@STRING{m = a # "b"}',
    );
    expect(formatEntry(createPreambleEntry([quoted('\\noop')]))).toBe('@PREAMBLE{"\\noop"}');
    expect(formatEntry(createCommentEntry(' kept as is '))).toBe('@COMMENT{ kept as is }');
  });

  test('separates groups and references with blank lines', () => {
    const entries = [
      createRefEntry('misc', 'y', []),
      createStringEntry(createTag('b', single('2'))),
      createCommentEntry('c'),
      createRefEntry('misc', 'x', []),
      createPreambleEntry([quoted('p')]),
      createStringEntry(createTag('a', single('1'))),
    ];
    expect(formatEntries(entries)).toBe(
      [
        '@PREAMBLE{"p"}',
        '',
        '@STRING{a = "1"}',
        '@STRING{b = "2"}',
        '',
        '@COMMENT{c}',
        '',
        '@misc{x}',
        '',
        '@misc{y}',
      ].join('\n'),
    );
  });

  test('sortEntries off keeps file order and does not reorder the input', () => {
    const entries = parse('@misc{b}\n@misc{a}');
    expect(formatEntries(entries, { sortEntries: false })).toBe('@misc{b}\n\n@misc{a}');
    expect(formatEntries(entries)).toBe('@misc{a}\n\n@misc{b}');
    expect(entries.at(0)).toEqual(createRefEntry('misc', 'b', []));
  });

  test('formats nothing as an empty string', () => {
    expect(formatEntries([])).toBe('');
  });

  test('formatting is a fixed point', () => {
    const src = [
      '@preamble{ "\\newcommand{\\noop}[1]{}" }',
      '@string{ pub = "Some Press" }',
      '@comment{ hand written }',
      '@Article{Z1, Title = "Using NASA: the {iOS} way", journal = pub # " Quarterly", YEAR = 2001, pages = {1--10}}',
      '@misc{a1, note = {  spaced   out  }, title = {plain}}',
    ].join('\n');
    const once = formatBibtex(src);
    expect(formatBibtex(once)).toBe(once);
  });
});
