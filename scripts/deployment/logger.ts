/**
 * Logger Utility
 *
 * Styled console logging for the deployment CLI.
 *
 * Log levels control verbosity per environment:
 *
 *   | Level   | Shown in production | Shown in development/staging |
 *   |---------|---------------------|------------------------------|
 *   | error   | ✓                   | ✓                            |
 *   | warn    | ✓                   | ✓                            |
 *   | info    | ✓                   | ✓                            |
 *   | verbose | ✗                   | ✓                            |
 *   | debug   | ✗                   | ✓                            |
 *
 * The level is determined by:
 *   1. LOG_LEVEL env var (explicit override)
 *   2. DEPLOY_ENVIRONMENT env var (production → info, else → debug)
 *   3. Fallback: debug (local development assumed)
 */

import chalk from 'chalk';

// =============================================================================
// Log Levels
// =============================================================================

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  VERBOSE = 3,
  DEBUG = 4,
}

const LOG_LEVEL_MAP: Record<string, LogLevel | undefined> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
};

function levelForEnvironment(environment: string | undefined): LogLevel {
  const env = environment?.toLowerCase();
  return env === 'production' || env === 'prod' ? LogLevel.INFO : LogLevel.DEBUG;
}

/**
 * Resolve the active log level from environment variables.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const explicit = env.LOG_LEVEL?.toLowerCase();
  const mapped = explicit ? LOG_LEVEL_MAP[explicit] : undefined;
  if (mapped !== undefined) {
    return mapped;
  }

  return levelForEnvironment(env.DEPLOY_ENVIRONMENT);
}

let currentLevel = resolveLogLevel();

// =============================================================================
// Logger
// =============================================================================

const logger = {
  // ---------------------------------------------------------------------------
  // Level management
  // ---------------------------------------------------------------------------

  /** Override the current log level programmatically */
  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  /** Get the current log level */
  getLevel: (): LogLevel => currentLevel,

  /**
   * Set log level from the resolved deployment environment.
   * An explicit LOG_LEVEL still wins.
   */
  setEnvironment: (environment: string): void => {
    if (process.env.LOG_LEVEL) return;
    currentLevel = levelForEnvironment(environment);
  },

  /** Check if a given level would produce output */
  isEnabled: (level: LogLevel): boolean => level <= currentLevel,

  // ---------------------------------------------------------------------------
  // Core output (always shown: error, warn, success, header)
  // ---------------------------------------------------------------------------

  header: (message: string): void => {
    console.log();
    console.log(chalk.bold.cyan(`━━━ ${message} ━━━`));
    console.log();
  },

  success: (message: string): void => {
    console.log(chalk.green('✓'), message);
  },

  warn: (message: string): void => {
    console.log(chalk.yellow('⚠'), message);
  },

  error: (message: string): void => {
    console.error(chalk.red('✗'), message);
  },

  // ---------------------------------------------------------------------------
  // Info level
  // ---------------------------------------------------------------------------

  info: (message: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(chalk.blue('ℹ'), message);
    }
  },

  task: (message: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(chalk.cyan('→'), message);
    }
  },

  keyValue: (key: string, value: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(`  ${chalk.dim(key + ':')} ${value}`);
    }
  },

  listItem: (message: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(`  ${chalk.dim('•')} ${message}`);
    }
  },

  // ---------------------------------------------------------------------------
  // Verbose level (stack events, waiter progress)
  // ---------------------------------------------------------------------------

  verbose: (message: string): void => {
    if (currentLevel >= LogLevel.VERBOSE) {
      console.log(chalk.gray('⋯'), message);
    }
  },

  // ---------------------------------------------------------------------------
  // Debug level (raw API payloads, parameter lists)
  // ---------------------------------------------------------------------------

  debug: (message: string): void => {
    if (currentLevel >= LogLevel.DEBUG) {
      console.log(chalk.gray('⊡'), chalk.dim(message));
    }
  },

  // ---------------------------------------------------------------------------
  // Colors (always shown)
  // ---------------------------------------------------------------------------

  yellow: (message: string): void => {
    console.log(chalk.yellow(message));
  },

  red: (message: string): void => {
    console.log(chalk.red(message));
  },

  blank: (): void => {
    console.log();
  },

  // ---------------------------------------------------------------------------
  // Complex formatters
  // ---------------------------------------------------------------------------

  /** Box for important messages (always shown) */
  box: (title: string, content: string[]): void => {
    const width = Math.max(title.length, ...content.map((line) => line.length));
    console.log();
    console.log(chalk.cyan('┌─' + '─'.repeat(width + 2) + '─┐'));
    console.log(chalk.cyan('│ ') + chalk.bold(title.padEnd(width + 2)) + chalk.cyan(' │'));
    console.log(chalk.cyan('├─' + '─'.repeat(width + 2) + '─┤'));
    content.forEach((line) => {
      console.log(chalk.cyan('│ ') + line.padEnd(width + 2) + chalk.cyan(' │'));
    });
    console.log(chalk.cyan('└─' + '─'.repeat(width + 2) + '─┘'));
    console.log();
  },

  /** Table for stack listings (always shown) */
  table: (headers: string[], rows: string[][]): void => {
    const colWidths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length))
    );
    const pad = (cells: string[]): string =>
      colWidths.map((w, i) => (cells[i] ?? '').padEnd(w)).join(' │ ');

    const separator = colWidths.map((w) => '─'.repeat(w + 2)).join('┼');

    console.log();
    console.log(chalk.dim('┌' + separator + '┐'));
    console.log(chalk.dim('│ ') + chalk.bold(pad(headers)) + chalk.dim(' │'));
    console.log(chalk.dim('├' + separator + '┤'));
    rows.forEach((row) => {
      console.log(chalk.dim('│ ') + pad(row) + chalk.dim(' │'));
    });
    console.log(chalk.dim('└' + separator + '┘'));
    console.log();
  },
};

export default logger;
