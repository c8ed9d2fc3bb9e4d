import { beforeEach, describe, expect, it } from 'vitest';
import { positionCursor } from '../../src/emulation/screen-adapter.js';
import type { MemoryDocument, MemoryWindow } from '../../src/host/memory-host.js';
import { changeInDocument, getAttr } from '../../src/render/render-sync.js';
import type { TerminalSession } from '../../src/session/session.js';
import { createHarness, type Harness } from '../helpers/harness.js';

function windowOf(harness: Harness, session: TerminalSession): { document: MemoryDocument; window: MemoryWindow } {
  const document = harness.host.document(session.document.id);
  const window = document ? harness.host.windowsShowing(document)[0] : undefined;
  if (!document || !window) throw new Error('session not shown');
  return { document, window };
}

describe('render sync', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness({ height: 3, width: 6 });
  });

  it('draws the engine screen into the window and places the cursor', () => {
    const session = harness.manager.open({ command: 'sh' });
    const { window } = windowOf(harness, session);
    harness.launcher.last.emit('ab');

    expect(harness.manager.updateWindow(window)).toBe(true);

    expect(window.rowText(0)).toBe('ab    ');
    expect(window.rowText(2)).toBe('      ');
    expect(window.viewCursor).toEqual({ row: 0, col: 2 });
    expect(window.cells(0)[0].attr).toBe(session.attrs.indexOf({
      flags: 0,
      fg: { kind: 'index', index: 255 },
      bg: { kind: 'index', index: 1 },
    }));
  });

  it('draws the right half of a wide character as an empty cell', () => {
    const session = harness.manager.open({ command: 'sh' });
    const { window } = windowOf(harness, session);
    harness.launcher.last.emit('中a');

    harness.manager.updateWindow(window);

    const cells = window.cells(0);
    expect(window.rowText(0)).toBe('中a   ');
    expect(cells[1]).toEqual({ char: '', attr: cells[0].attr });
  });

  it('draws rows below a pinned screen empty', () => {
    const session = harness.manager.open({ command: 'sh', rows: 2 });
    const { document } = windowOf(harness, session);
    const tall = harness.host.openWindow(document, { height: 4, width: 6 });
    tall.drawRow(3, [{ char: 'x', attr: 0 }]);

    expect(harness.manager.updateWindow(tall)).toBe(true);

    expect(tall.rowText(1)).toBe('      ');
    expect(tall.cells(3)).toEqual([]);
    expect(session.getSize()).toEqual({ rows: 2, cols: 6 });
  });

  it('leaves frozen sessions to the host', () => {
    const session = harness.manager.open({ command: 'sh' });
    const { window } = windowOf(harness, session);
    session.enterFrozen();
    expect(harness.manager.updateWindow(window)).toBe(false);
  });

  it('redraws pending damage on every window once', () => {
    const session = harness.manager.open({ command: 'sh' });
    const { document, window } = windowOf(harness, session);
    const other = harness.host.openWindow(document);
    harness.launcher.last.emit('hi');

    expect(harness.manager.redraw(document)).toBe(2);

    expect(window.rowText(0)).toBe('hi    ');
    expect(other.rowText(0)).toBe('hi    ');
    expect(window.cells(1)).toEqual([]);
    expect(session.dirty.range()).toBeNull();
    expect(harness.manager.redraw(document)).toBe(0);
  });

  it('answers attributes only from the scrollback', () => {
    const session = harness.manager.open({ command: 'sh' });
    harness.launcher.last.emit('\x1b[4mu');
    expect(getAttr(session, 0, 0)).toBe(0);

    harness.launcher.last.finish();
    expect(getAttr(session, 0, 0)).toBe(session.attrs.indexOf({
      flags: 2,
      fg: { kind: 'index', index: 255 },
      bg: { kind: 'index', index: 1 },
    }));
  });

  it('drops the scrollback of a finished session before a document edit', () => {
    const session = harness.manager.open({ command: 'sh' });
    harness.launcher.last.emit('a\n');
    expect(changeInDocument(session)).toBe(false);

    harness.launcher.last.finish();
    harness.host.drainRedraws();
    expect(changeInDocument(session)).toBe(true);
    expect(session.scrollback.length).toBe(0);
    expect(harness.host.drainRedraws()).toEqual([session.document]);
    expect(changeInDocument(session)).toBe(false);
  });

  it('clamps the cursor to the window', () => {
    const session = harness.manager.open({ command: 'sh' });
    const { window } = windowOf(harness, session);
    positionCursor(window, { row: 5, col: 9 });
    expect(window.viewCursor).toEqual({ row: 2, col: 5 });
  });
});
