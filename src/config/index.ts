/**
 * Terminal-session configuration, read from the environment.
 */

import { parseTermSize } from '../cli/common/command-parsers.js';
import { isEnvFlagSet } from '../infra/env-flag.js';
import { createLogger } from '../infra/logger.js';

const log = createLogger('config');

export const DEFAULT_TERM_KEY = 0x17; // CTRL-W

export type TerminalBackground = 'dark' | 'light';

export type TerminalConfig = {
  /** Pinned size; 0 on a side means that side follows the window. */
  termSize: { rows: number; cols: number };
  /** Code point of the prefix key in the live input loop. */
  termKey: number;
  shell: string;
  background: TerminalBackground;
  colors: number;
  trueColor: boolean;
  debug: boolean;
};

type Env = Record<string, string | undefined>;

function getEnvInt(env: Env, name: string, defaultValue: number): number {
  const raw = env[name];
  if (!raw) return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    log.warn(`Ignoring ${name}=${raw}: not a number`);
    return defaultValue;
  }
  return Math.trunc(n);
}

function getEnvFlag(env: Env, name: string): boolean {
  return isEnvFlagSet(env[name]);
}

/**
 * Parse a key given as a single character, `^X` or `<C-x>`.
 */
export function parseTermKey(raw: string): number | undefined {
  const value = raw.trim();
  if (value.length === 0) return undefined;

  const caret = /^\^([@A-Za-z[\\\]^_])$/.exec(value);
  if (caret) return caret[1].toUpperCase().charCodeAt(0) & 0x1f;

  const angle = /^<[Cc]-([@A-Za-z[\\\]^_])>$/.exec(value);
  if (angle) return angle[1].toUpperCase().charCodeAt(0) & 0x1f;

  const chars = [...value];
  if (chars.length === 1) return chars[0].codePointAt(0);
  return undefined;
}

export function loadTerminalConfig(env: Env = process.env): TerminalConfig {
  let termSize = { rows: 0, cols: 0 };
  const rawSize = env.TERMHOST_TERMSIZE;
  if (rawSize) {
    const parsed = parseTermSize(rawSize);
    if (parsed) {
      termSize = parsed;
    } else {
      log.warn(`Ignoring TERMHOST_TERMSIZE=${rawSize}: expected ROWSxCOLS`);
    }
  }

  let termKey = DEFAULT_TERM_KEY;
  const rawKey = env.TERMHOST_TERMKEY;
  if (rawKey) {
    const parsed = parseTermKey(rawKey);
    if (parsed === undefined) {
      log.warn(`Ignoring TERMHOST_TERMKEY=${rawKey}: expected a single key`);
    } else {
      termKey = parsed;
    }
  }

  const rawBackground = env.TERMHOST_BACKGROUND?.trim().toLowerCase();
  let background: TerminalBackground = 'dark';
  if (rawBackground === 'light' || rawBackground === 'dark') {
    background = rawBackground;
  } else if (rawBackground) {
    log.warn(`Ignoring TERMHOST_BACKGROUND=${rawBackground}: expected dark or light`);
  }

  const colors = getEnvInt(env, 'TERMHOST_COLORS', 256);

  return Object.freeze({
    termSize: Object.freeze(termSize),
    termKey,
    shell: env.TERMHOST_SHELL || env.SHELL || '/bin/sh',
    background,
    colors: colors > 0 ? colors : 256,
    trueColor: getEnvFlag(env, 'TERMHOST_TRUECOLOR'),
    debug: getEnvFlag(env, 'TERMHOST_DEBUG'),
  });
}
