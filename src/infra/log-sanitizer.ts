/**
 * Log sanitization for command lines and paths.
 *
 * Commands typed into a terminal session can carry home-directory paths and
 * arbitrarily long argument lists; neither belongs verbatim in console output.
 */

import { homedir } from 'os';

const homeDir = homedir();

/**
 * Truncate a string for safe logging.
 * Returns the first `maxLen` characters followed by "..." if truncated.
 */
export function truncateContent(text: string, maxLen = 80): string {
  if (text.length <= maxLen) return text;
  return text.substring(0, maxLen) + '...';
}

/**
 * Replace the user's home directory path with `~` in a string.
 */
export function sanitizePath(text: string): string {
  if (!homeDir) return text;
  return text.replaceAll(homeDir, '~');
}

/**
 * Apply all sanitization to a log message string:
 * - Replace home directory with ~
 * - Escape control characters as \xNN
 * - Truncate to `maxLen`
 */
export function sanitizeForLog(message: string, maxLen = 80): string {
  // eslint-disable-next-line no-control-regex
  const printable = message.replace(/[\x00-\x1f\x7f]/g, (ch) => `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`);
  return truncateContent(sanitizePath(printable), maxLen);
}
