/**
 * bibfmt Logger
 *
 * Centralized logging utility for the formatter core and the CLI.
 *
 * Features:
 * - Runtime configurable log levels
 * - Module namespaces (lexer, parser, formatter, io, cli)
 * - Optional ISO timestamps
 * - Safe defaults (error-only)
 *
 * Usage:
 * ```typescript
 * import { createLogger } from './util/logger';
 *
 * const log = createLogger('parser');
 *
 * log.debug('Parsed 12 entries');
 * log.info({ event: 'written', path: 'refs.bib' });
 * log.error('Failed to write output', error);
 * ```
 */

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  modules?: string[];
  timestamps?: boolean;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// ---------- State ----------
const DEFAULT_CONFIG: LoggerConfig = {
  level: 'error',
  modules: undefined,
  timestamps: false,
};

let config: LoggerConfig = { ...DEFAULT_CONFIG };

const moduleSet = new Set<string>();

const levelOrder: LogLevel[] = ['none', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return levelOrder.some(level => level === value);
}

// ---------- Configuration ----------

/**
 * Configure global logging settings.
 *
 * @example
 * ```typescript
 * configureLogging({ level: 'debug', modules: ['parser', 'lexer'] });
 * ```
 */
export function configureLogging(opts: Partial<LoggerConfig>): void {
  config = { ...config, ...opts };
  if (opts.modules) {
    moduleSet.clear();
    opts.modules.forEach(m => moduleSet.add(m));
  }

  if (shouldLog('debug')) {
    console.log('[bibfmt] Logging configured:', config);
  }
}

/**
 * Load logging configuration from environment variables.
 * Supports: BIBFMT_LOGLEVEL=debug BIBFMT_DEBUG=parser,lexer
 */
export function loadLoggingFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const rawLevel = env.BIBFMT_LOGLEVEL?.trim().toLowerCase();
  const level = rawLevel && isLogLevel(rawLevel) ? rawLevel : undefined;
  const modulesStr = env.BIBFMT_DEBUG;
  const modules = modulesStr ? modulesStr.split(',').map(m => m.trim()).filter(Boolean) : undefined;

  if (level || modules) {
    configureLogging({
      level: level ?? (modules ? 'debug' : config.level),
      modules,
    });
  }
}

/**
 * Get current logging configuration.
 */
export function getLoggingConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

/**
 * Restore the default (error-only, all modules) configuration.
 */
export function resetLogging(): void {
  config = { ...DEFAULT_CONFIG };
  moduleSet.clear();
}

// ---------- Helpers ----------

function shouldLog(level: LogLevel, module?: string): boolean {
  const levelIndex = levelOrder.indexOf(level);
  const configIndex = levelOrder.indexOf(config.level);

  if (levelIndex > configIndex) return false;
  if (module && moduleSet.size > 0 && !moduleSet.has(module)) return false;

  return true;
}

function formatTimestamp(): string {
  if (!config.timestamps) return '';
  return `${new Date().toISOString()} `;
}

type OutputLevel = Exclude<LogLevel, 'none'>;

const consoleMethod: Record<OutputLevel, (...args: unknown[]) => void> = {
  error: (...args) => console.error(...args),
  warn: (...args) => console.warn(...args),
  info: (...args) => console.info(...args),
  debug: (...args) => console.log(...args),
};

function output(level: OutputLevel, module: string, args: unknown[]): void {
  const prefix = `${formatTimestamp()}[${module}]`;
  consoleMethod[level](prefix, ...args);
}

// ---------- Public Logger Factory ----------

/**
 * Create a namespaced logger for a specific module.
 *
 * @param module - Module name (e.g., 'lexer', 'parser', 'formatter', 'cli')
 */
export function createLogger(module: string): Logger {
  const emit = (level: OutputLevel) => (...args: unknown[]) => {
    if (shouldLog(level, module)) {
      output(level, module, args);
    }
  };
  return {
    error: emit('error'),
    warn: emit('warn'),
    info: emit('info'),
    debug: emit('debug'),
  };
}

export default createLogger;
