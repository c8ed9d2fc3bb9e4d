/**
 * Routes host input while a session window has focus.
 *
 * Input goes to the job, except for the prefix key (CTRL-W by default) and
 * what follows it, and for mouse events outside the session's window. Those
 * are handed back to the host.
 */

import { DEFAULT_TERM_KEY } from '../config/index.js';
import type { TerminalSession } from '../session/session.js';
import type { HostWindow } from '../types/terminal-contract.js';
import { isDragEvent, isMouseEvent, type HostInput } from './key-translator.js';

export type RouteOutcome =
  | { kind: 'sent'; bytes: string }
  | { kind: 'pending' }
  | { kind: 'frozen' }
  | { kind: 'paste-request'; register: string }
  | { kind: 'host'; inputs: HostInput[] }
  | { kind: 'closed' };

const PERIOD = 0x2e;
const QUOTE = 0x22;
const UPPER_N = 0x4e;

function isChar(input: HostInput, codepoint: number): boolean {
  return input.type === 'char' && input.codepoint === codepoint && !input.mod;
}

export function windowContains(window: HostWindow, row: number, col: number): boolean {
  return row >= window.top && row < window.top + window.height
    && col >= window.left && col < window.left + window.width;
}

export class InputRouter {
  private prefixPending = false;
  private registerPending = false;
  private mouseWasOutside = false;

  constructor(
    private readonly session: TerminalSession,
    private readonly window: HostWindow,
    private readonly termKey: number = DEFAULT_TERM_KEY,
  ) {}

  handle(input: HostInput): RouteOutcome {
    if (this.session.state !== 'live' || !this.session.isJobRunning()) {
      this.prefixPending = false;
      this.registerPending = false;
      return { kind: 'closed' };
    }

    if (this.registerPending) {
      this.registerPending = false;
      if (input.type === 'char') {
        return { kind: 'paste-request', register: String.fromCodePoint(input.codepoint) };
      }
      return { kind: 'host', inputs: [input] };
    }

    if (this.prefixPending) {
      this.prefixPending = false;
      return this.afterPrefix(input);
    }

    if (isChar(input, this.termKey)) {
      this.prefixPending = true;
      return { kind: 'pending' };
    }

    if (input.type === 'mouse' && isMouseEvent(input.event)) {
      const outside = !windowContains(this.window, input.row, input.col);
      if (outside || (this.mouseWasOutside && isDragEvent(input.event))) {
        this.mouseWasOutside = true;
        return { kind: 'host', inputs: [input] };
      }
      this.mouseWasOutside = false;
      return this.send({
        ...input,
        row: input.row - this.window.top,
        col: input.col - this.window.left,
      });
    }

    this.mouseWasOutside = false;
    if (isChar(input, 0)) {
      return { kind: 'host', inputs: [input] };
    }
    return this.send(input);
  }

  private afterPrefix(input: HostInput): RouteOutcome {
    const prefix: HostInput = { type: 'char', codepoint: this.termKey };
    const isDefaultKey = this.termKey === DEFAULT_TERM_KEY;

    if (isDefaultKey && isChar(input, PERIOD)) {
      return this.send(prefix);
    }
    if (!isDefaultKey && isChar(input, this.termKey)) {
      return this.send(prefix);
    }
    if (isChar(input, UPPER_N)) {
      return this.session.enterFrozen() ? { kind: 'frozen' } : { kind: 'closed' };
    }
    if (isChar(input, QUOTE)) {
      this.registerPending = true;
      return { kind: 'pending' };
    }
    return { kind: 'host', inputs: [prefix, input] };
  }

  private send(input: HostInput): RouteOutcome {
    return { kind: 'sent', bytes: this.session.sendInput(input) };
  }
}
