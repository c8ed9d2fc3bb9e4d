import chalk from 'chalk';
import { isEnvFlagSet } from './env-flag.js';
import { sanitizeForLog } from './log-sanitizer.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

let debugEnabled = isEnvFlagSet(process.env.TERMHOST_DEBUG);

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugLogging(): boolean {
  return debugEnabled;
}

/**
 * Scoped console logger. Messages are prefixed with `[scope]`; warnings and
 * errors are colored the way the CLI colors them.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message) {
      if (!debugEnabled) return;
      console.log(chalk.gray(`${prefix} ${message}`));
    },
    info(message) {
      console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(chalk.yellow(`${prefix} ${message}`));
    },
    error(message, error) {
      const detail = error === undefined
        ? ''
        : `: ${sanitizeForLog(error instanceof Error ? error.message : String(error), 200)}`;
      console.error(chalk.red(`${prefix} ${message}${detail}`));
    },
  };
}
