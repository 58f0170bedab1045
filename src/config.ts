/**
 * Formatting and parsing options, with defaults and environment overrides.
 *
 * Environment flags accept `1/true/yes/on` and `0/false/no/off`; any other
 * value leaves the option unset so the next layer decides.
 */

export interface FormatOptions {
  /** Brace-protect capitalized words in titles. */
  formatTitle: boolean;
  /** Omit tags whose value is empty from the output. */
  skipEmptyTags: boolean;
  sortEntries: boolean;
  sortTags: boolean;
}

export interface ParseOptions {
  /** Drop tags whose value is empty while parsing. */
  removeEmptyTags: boolean;
}

export type BibfmtOptions = FormatOptions & ParseOptions;

export const DEFAULT_OPTIONS: Readonly<BibfmtOptions> = Object.freeze({
  formatTitle: true,
  skipEmptyTags: true,
  sortEntries: true,
  sortTags: true,
  removeEmptyTags: false,
});

export const OPTION_KEYS: readonly (keyof BibfmtOptions)[] = [
  'formatTitle',
  'skipEmptyTags',
  'sortEntries',
  'sortTags',
  'removeEmptyTags',
];

export const ENV_FLAGS: Record<keyof BibfmtOptions, string> = {
  formatTitle: 'BIBFMT_FORMAT_TITLE',
  skipEmptyTags: 'BIBFMT_SKIP_EMPTY_TAGS',
  sortEntries: 'BIBFMT_SORT_ENTRIES',
  sortTags: 'BIBFMT_SORT_TAGS',
  removeEmptyTags: 'BIBFMT_REMOVE_EMPTY_TAGS',
};

export function parseEnvFlag(val: string | undefined): boolean | undefined {
  if (val === undefined) return undefined;
  const s = val.trim().toLowerCase();
  if (s === '1' || s === 'true' || s === 'yes' || s === 'on') return true;
  if (s === '0' || s === 'false' || s === 'no' || s === 'off') return false;
  return undefined;
}

export function readOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<BibfmtOptions> {
  const out: Partial<BibfmtOptions> = {};
  for (const key of OPTION_KEYS) {
    const flag = parseEnvFlag(env[ENV_FLAGS[key]]);
    if (flag !== undefined) out[key] = flag;
  }
  return out;
}

/**
 * Merge option layers over the defaults, left to right. `undefined` never
 * overrides an earlier value.
 */
export function resolveOptions(...layers: Partial<BibfmtOptions>[]): BibfmtOptions {
  const resolved: BibfmtOptions = { ...DEFAULT_OPTIONS };
  for (const layer of layers) {
    for (const key of OPTION_KEYS) {
      const v = layer[key];
      if (v !== undefined) resolved[key] = v;
    }
  }
  return resolved;
}
