/**
 * bibfmt: canonical formatting for BibTeX bibliographies.
 *
 * ```typescript
 * import { formatBibtex } from 'bibfmt';
 *
 * formatBibtex('@misc{citekey, author="foo", title = { bar }}');
 * // @misc{citekey,
 * //     title = {bar},
 * //     author = {foo},
 * // }
 * ```
 */
export * from './config';
export * from './errors';
export * from './format';
export * from './io';
export * from './models';
export * from './parser';
export { createLogger, configureLogging, loadLoggingFromEnv, getLoggingConfig, resetLogging, type Logger, type LogLevel, type LoggerConfig } from './util/logger';
export { formatDiagnostic, type DiagLevel, type DiagMeta } from './util/diag';
