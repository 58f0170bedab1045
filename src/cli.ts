#!/usr/bin/env node
import { Command } from 'commander';
import { BibfmtOptions, readOptionsFromEnv, resolveOptions } from './config';
import { BibtexError, isBibtexError } from './errors';
import { printEntries, readBibFile, renderDocument, writeEntries } from './io';
import { parse, tokenize } from './parser';
import { formatDiagnostic } from './util/diag';
import { configureLogging, createLogger, loadLoggingFromEnv } from './util/logger';

const log = createLogger('cli');

export const ExitCode = {
  Ok: 0,
  Unformatted: 1,
  ParseFailure: 2,
  ReadFailure: 3,
  WriteFailure: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type GlobalFlags = {
  verbose?: boolean;
  debug?: boolean;
};

export type FormatFlags = {
  out?: string;
  preview?: boolean;
  sortEntries?: boolean;
  sortTags?: boolean;
  formatTitle?: boolean;
  keepEmptyTags?: boolean;
  removeEmptyTags?: boolean;
};

export type InspectFlags = {
  tokens?: boolean;
};

function exitCodeFor(err: BibtexError): ExitCode {
  const { detail } = err;
  if (detail.kind !== 'Io') return ExitCode.ParseFailure;
  return detail.operation === 'read' ? ExitCode.ReadFailure : ExitCode.WriteFailure;
}

/**
 * Print a core error and map it to an exit code. Anything that is not a
 * `BibtexError` is a bug and propagates.
 */
function report(err: unknown, file: string, debug: boolean): ExitCode {
  if (!isBibtexError(err)) throw err;
  const component = err.kind === 'Io' ? 'io' : 'parser';
  console.error(formatDiagnostic('ERROR', component, err.message, { file, position: err.position }));
  if (debug && err.stack) console.error(err.stack);
  return exitCodeFor(err);
}

/** Options given explicitly on the command line; everything else stays unset. */
function flagOptions(cmd: Command): Partial<BibfmtOptions> {
  const flags = cmd.opts<FormatFlags>();
  const fromCli = (name: keyof FormatFlags) => cmd.getOptionValueSource(name) === 'cli';
  return {
    sortEntries: fromCli('sortEntries') ? flags.sortEntries : undefined,
    sortTags: fromCli('sortTags') ? flags.sortTags : undefined,
    formatTitle: fromCli('formatTitle') ? flags.formatTitle : undefined,
    skipEmptyTags: flags.keepEmptyTags ? false : undefined,
    removeEmptyTags: flags.removeEmptyTags ? true : undefined,
  };
}

export function runFormat(input: string, output: string | undefined, flags: FormatFlags, options: BibfmtOptions, debug = false): ExitCode {
  let target = input;
  try {
    const entries = parse(readBibFile(input), { removeEmptyTags: options.removeEmptyTags });
    const outPath = output ?? flags.out;
    if (flags.preview || !outPath) {
      printEntries(entries, options);
      return ExitCode.Ok;
    }
    target = outPath;
    writeEntries(entries, outPath, options);
    console.log(`Formatted ${entries.length} entries from ${input} into ${outPath}`);
    return ExitCode.Ok;
  } catch (err) {
    return report(err, target, debug);
  }
}

export function runCheck(input: string, options: BibfmtOptions, debug = false): ExitCode {
  try {
    const src = readBibFile(input);
    const expected = renderDocument(parse(src, { removeEmptyTags: options.removeEmptyTags }), options);
    if (src.trimEnd() === expected.trimEnd()) {
      console.log(`OK: ${input} is formatted`);
      return ExitCode.Ok;
    }
    console.log(`${input} is not formatted; run 'bibfmt format ${input} ${input}' to fix it`);
    return ExitCode.Unformatted;
  } catch (err) {
    return report(err, input, debug);
  }
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function runInspect(input: string, flags: InspectFlags, options: BibfmtOptions, debug = false): ExitCode {
  try {
    const src = readBibFile(input);
    const payload = flags.tokens
      ? tokenize(src)
      : parse(src, { removeEmptyTags: options.removeEmptyTags }).toArray();
    console.log(JSON.stringify(payload, jsonReplacer, 2));
    return ExitCode.Ok;
  } catch (err) {
    return report(err, input, debug);
  }
}

export function createProgram(onExit: (code: ExitCode) => void = code => { process.exitCode = code; }): Command {
  const program = new Command();

  program
    .name('bibfmt')
    .description('Canonical formatter for BibTeX bibliographies')
    .version('0.1.0');

  // Global options
  program
    .option('-v, --verbose', 'Enable verbose output for all commands')
    .option('--debug', 'Enable debug output (print stack traces)');

  program.hook('preAction', () => {
    loadLoggingFromEnv();
    const globalOpts = program.opts<GlobalFlags>();
    if (globalOpts.debug) configureLogging({ level: 'debug' });
    else if (globalOpts.verbose) configureLogging({ level: 'info' });
  });

  const isDebug = () => program.opts<GlobalFlags>().debug === true;

  program
    .command('format')
    .description('Format a BibTeX file; prints the result unless an output path is given')
    .argument('<input>', 'Path to the .bib file')
    .argument('[output]', 'Output file path (optional)')
    .option('-o, --out <path>', 'Output file path (overrides default)')
    .option('-p, --preview', 'Print the formatted bibliography instead of writing it')
    .option('--no-sort-entries', 'Keep entries in file order')
    .option('--no-sort-tags', 'Keep tags in entry order')
    .option('--no-format-title', 'Leave title capitalization untouched')
    .option('--keep-empty-tags', 'Print tags whose value is empty')
    .option('--remove-empty-tags', 'Drop tags whose value is empty while parsing')
    .action((input: string, output: string | undefined, flags: FormatFlags, cmd: Command) => {
      const options = resolveOptions(readOptionsFromEnv(), flagOptions(cmd));
      log.debug('Resolved options', options);
      onExit(runFormat(input, output, flags, options, isDebug()));
    });

  program
    .command('check')
    .description('Exit 0 if a BibTeX file is already formatted, non-zero otherwise')
    .argument('<input>', 'Path to the .bib file')
    .action((input: string) => {
      onExit(runCheck(input, resolveOptions(readOptionsFromEnv()), isDebug()));
    });

  program
    .command('inspect')
    .description('Print the parsed entries of a BibTeX file as JSON')
    .argument('<input>', 'Path to the .bib file')
    .option('--tokens', 'Print the token stream instead of the entries')
    .action((input: string, flags: InspectFlags) => {
      onExit(runInspect(input, flags, resolveOptions(readOptionsFromEnv()), isDebug()));
    });

  return program;
}

if (require.main === module) {
  createProgram().parse();
}
