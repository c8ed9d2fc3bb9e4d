/**
 * Engine callbacks for one session.
 *
 * The engine calls these synchronously while it parses job output. They only
 * record state on the session and ask the host for a redraw; drawing happens
 * later in the host's own redraw pass.
 */

import { incMetric } from '../infra/diagnostics.js';
import { createLogger } from '../infra/logger.js';
import { insertCapturedLine } from '../session/scrollback-flush.js';
import type { TerminalSession } from '../session/session.js';
import type {
  EngineCallbacks,
  EngineCell,
  EnginePos,
  EngineProp,
  EngineRect,
  HostWindow,
} from '../types/terminal-contract.js';
import { ALL_ROWS } from './dirty-rows.js';

const log = createLogger('screen');

/** Put the window's cursor on `pos`, clamped to the window area. */
export function positionCursor(window: HostWindow, pos: EnginePos): void {
  const row = Math.max(0, Math.min(pos.row, window.height - 1));
  const col = Math.max(0, Math.min(pos.col, window.width - 1));
  window.setViewCursor(row, col);
}

export class ScreenAdapter implements EngineCallbacks {
  constructor(private readonly session: TerminalSession) {}

  damage(rect: EngineRect): void {
    this.guard('damage', () => this.markDamaged(rect.startRow, rect.endRow));
  }

  moveRect(dest: EngineRect, src: EngineRect): void {
    this.guard('moveRect', () => {
      this.markDamaged(Math.min(dest.startRow, src.startRow), Math.max(dest.endRow, src.endRow));
    });
  }

  moveCursor(pos: EnginePos, _oldPos: EnginePos, visible: boolean): void {
    this.guard('moveCursor', () => {
      const session = this.session;
      session.cursor = { row: pos.row, col: pos.col };
      session.cursorVisible = visible;
      if (session.state !== 'live') return;
      for (const window of session.host.windowsShowing(session.document)) {
        positionCursor(window, pos);
      }
      if (session.isDisplayed()) {
        session.host.setCursorVisible(visible);
      }
    });
  }

  setTermProp(prop: EngineProp): void {
    this.guard('setTermProp', () => {
      const session = this.session;
      switch (prop.kind) {
        case 'title':
          session.setTitle(prop.value);
          break;
        case 'cursor-visible':
          session.cursorVisible = prop.value;
          if (session.isDisplayed()) session.host.setCursorVisible(prop.value);
          break;
        case 'other':
          log.debug(`ignored terminal property '${prop.name}'`);
          break;
      }
    });
  }

  resize(rows: number, cols: number): void {
    this.guard('resize', () => {
      const session = this.session;
      session.rows = rows;
      session.cols = cols;
      // Sizes we applied ourselves already match the windows.
      if (!session.resizing) {
        for (const window of session.host.windowsShowing(session.document)) {
          window.setSize(rows, cols);
        }
      }
      session.dirty.markAll();
      session.document.markDirty(0, ALL_ROWS);
      session.host.scheduleRedraw(session.document);
    });
  }

  pushLine(cells: readonly EngineCell[]): void {
    this.guard('pushLine', () => {
      const session = this.session;
      // While frozen the flushed screen sits at the end of the store; evicted
      // rows go in front of it.
      insertCapturedLine(session, session.scrolled, cells);
      session.scrolled += 1;
    });
  }

  popLine(): boolean {
    return false;
  }

  private markDamaged(startRow: number, endRow: number): void {
    const session = this.session;
    session.dirty.add(startRow, endRow);
    if (endRow <= startRow) return;
    session.document.markDirty(startRow, endRow);
    session.host.scheduleRedraw(session.document);
  }

  private guard(callback: string, body: () => void): void {
    try {
      body();
    } catch (error) {
      incMetric('callback_failed', { callback });
      log.error(`${callback} callback failed for document ${this.session.document.id}`, error);
    }
  }
}

/**
 * Feed job output to the session's engine. Each LF is written as CR LF; the
 * engine's pending damage is flushed before returning.
 */
export function feedJobOutput(session: TerminalSession, text: string): void {
  const engine = session.engineHandle;
  if (!engine) {
    incMetric('engine_absent', { op: 'feed' });
    log.debug(`dropped ${text.length} chars of output for document ${session.document.id}`);
    return;
  }

  const lines = text.split('\n');
  lines.forEach((line, index) => {
    if (line.length > 0) engine.write(line);
    if (index < lines.length - 1) engine.write('\r\n');
  });
  engine.flushDamage();
}
