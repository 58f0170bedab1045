import {
  formatTitle,
  formatTitleFragment,
  needsProtection,
  removeBraces,
  wrapWordWithBraces,
} from '../src/format/title';

describe('title formatting', () => {
  test('removeBraces strips every brace', () => {
    expect(removeBraces('{The} {{LaTeX}} Companion')).toBe('The LaTeX Companion');
    expect(removeBraces('{foo} {} {bar}}')).toBe('foo  bar');
  });

  test('wrapWordWithBraces leaves a trailing colon outside', () => {
    expect(wrapWordWithBraces('foo')).toBe('{foo}');
    expect(wrapWordWithBraces('NASA:')).toBe('{NASA}:');
    expect(wrapWordWithBraces(':')).toBe('{:}');
  });

  test('needsProtection is true for any capital', () => {
    expect(needsProtection('iPhone')).toBe(true);
    expect(needsProtection('DNA')).toBe(true);
    expect(needsProtection('Title')).toBe(true);
    expect(needsProtection('Über')).toBe(true);
    expect(needsProtection('A')).toBe(true);
    expect(needsProtection('lower')).toBe(false);
  });

  test('a leading word keeps a bare initial capital unprotected', () => {
    expect(needsProtection('Title', true)).toBe(false);
    expect(needsProtection('A', true)).toBe(false);
    expect(needsProtection('iPhone', true)).toBe(true);
    expect(needsProtection('FOO:', true)).toBe(true);
  });

  test('protects every capitalized word after the first', () => {
    expect(formatTitle('foo')).toBe('foo');
    expect(formatTitle('{foo}')).toBe('foo');
    expect(formatTitle('FOO:')).toBe('{FOO}:');
    expect(formatTitle('{FOO: A Framework for BAR}')).toBe('{FOO}: {A} {Framework} for {BAR}');
    expect(formatTitle('The LaTeX Companion')).toBe('The {LaTeX} {Companion}');
    expect(formatTitle('Using NASA: a guide')).toBe('Using {NASA}: a guide');
    expect(formatTitle('iPhone apps')).toBe('{iPhone} apps');
  });

  test('re-derives protection from scratch', () => {
    expect(formatTitle('{The} {LaTeX} {companion}')).toBe('The {LaTeX} companion');
    expect(formatTitle(formatTitle('Deep RNNs for NLP'))).toBe('Deep {RNNs} for {NLP}');
  });

  test('a later fragment protects its first word too', () => {
    expect(formatTitle('Learning', false)).toBe('{Learning}');
  });

  test('normalizes whitespace', () => {
    expect(formatTitle('  spaced \t  out  ')).toBe('spaced out');
    expect(formatTitle('')).toBe('');
  });

  test('formatTitleFragment keeps edge whitespace', () => {
    expect(formatTitleFragment(' ')).toBe(' ');
    expect(formatTitleFragment('')).toBe('');
    expect(formatTitleFragment('Deep ')).toBe('Deep ');
    expect(formatTitleFragment(' for  NLP ', false)).toBe(' for {NLP} ');
  });
});
