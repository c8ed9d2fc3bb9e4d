import { incMetric } from '../infra/diagnostics.js';
import { createLogger } from '../infra/logger.js';
import { getErrorMessage } from '../types/errors.js';
import type { EngineCell } from '../types/terminal-contract.js';
import { capturedLineText, effectiveWidth, type CapturedLine } from './scrollback-store.js';
import type { TerminalSession } from './session.js';

const log = createLogger('scrollback');

/**
 * Store `cells` as line `index` of the scrollback and insert its text as the
 * same line of the host document. The first line ever stored replaces the
 * document's placeholder line.
 */
export function insertCapturedLine(
  session: TerminalSession,
  index: number,
  cells: readonly (EngineCell | null | undefined)[],
): CapturedLine {
  const store = session.scrollback;
  const document = session.document;
  const replacesPlaceholder = store.length === 0;

  let line: CapturedLine;
  try {
    line = store.insert(index, cells);
  } catch (error) {
    incMetric('scrollback_row_skipped');
    log.warn(`row ${index} of document ${document.id} stored empty: ${getErrorMessage(error)}`);
    line = store.insertEmpty(index);
  }

  const at = Math.min(index, store.length - 1);
  document.appendLine(at, capturedLineText(line));
  if (replacesPlaceholder) {
    document.deleteLine(1);
  }
  return line;
}

/**
 * Move the visible screen into the scrollback and the host document.
 *
 * Empty rows are only written when a non-empty row follows them, so the
 * blank bottom of the screen never ends up in the document. Returns the
 * number of rows appended.
 */
export function flushScreenToScrollback(session: TerminalSession): number {
  const engine = session.engineHandle;
  if (!engine) {
    incMetric('engine_absent', { op: 'flush' });
    return 0;
  }

  const { rows, cols } = engine.getSize();
  let pendingEmpty = 0;
  let appended = 0;

  for (let row = 0; row < rows; row += 1) {
    const cells: (EngineCell | null)[] = [];
    for (let col = 0; col < cols; col += 1) {
      cells.push(engine.getCell({ row, col }));
    }
    if (effectiveWidth(cells) === 0) {
      pendingEmpty += 1;
      continue;
    }
    for (; pendingEmpty > 0; pendingEmpty -= 1) {
      insertCapturedLine(session, session.scrollback.length, []);
      appended += 1;
    }
    insertCapturedLine(session, session.scrollback.length, cells);
    appended += 1;
  }

  const lastLine = Math.max(0, session.document.lineCount() - 1);
  for (const window of session.host.windowsShowing(session.document)) {
    window.setDocumentCursor(lastLine, 0);
    window.invalidate();
  }
  log.debug(`flushed ${appended} rows of document ${session.document.id}`);
  return appended;
}
