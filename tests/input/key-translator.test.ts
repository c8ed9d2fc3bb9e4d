import { beforeEach, describe, expect, it } from 'vitest';
import { getMetric, resetMetrics } from '../../src/infra/diagnostics.js';
import {
  isDragEvent,
  isMouseEvent,
  parseKeyTable,
  resolveInput,
  translateInput,
} from '../../src/input/key-translator.js';
import { KeyModifier } from '../../src/types/terminal-contract.js';
import { FakeEngine } from '../helpers/fake-engine.js';

describe('resolveInput', () => {
  it('maps CR, ESC and TAB characters to engine keys', () => {
    expect(resolveInput({ type: 'char', codepoint: 13 })).toEqual({ kind: 'engine-key', key: 'enter', mod: 0 });
    expect(resolveInput({ type: 'char', codepoint: 27 })).toEqual({ kind: 'engine-key', key: 'escape', mod: 0 });
    expect(resolveInput({ type: 'char', codepoint: 9, mod: KeyModifier.SHIFT })).toEqual({
      kind: 'engine-key',
      key: 'tab',
      mod: KeyModifier.SHIFT,
    });
  });

  it('passes other code points to the character encoder', () => {
    expect(resolveInput({ type: 'char', codepoint: 0x61, mod: KeyModifier.CTRL })).toEqual({
      kind: 'char',
      codepoint: 0x61,
      mod: KeyModifier.CTRL,
    });
  });

  it('drops invalid code points', () => {
    expect(resolveInput({ type: 'char', codepoint: 0 })).toEqual({ kind: 'drop' });
    expect(resolveInput({ type: 'char', codepoint: 0x110000 })).toEqual({ kind: 'drop' });
  });

  it('resolves named keys from the table', () => {
    expect(resolveInput({ type: 'key', key: 'shift-up' })).toEqual({ kind: 'engine-key', key: 'up', mod: KeyModifier.SHIFT });
    expect(resolveInput({ type: 'key', key: 'kp-home' })).toEqual({ kind: 'engine-key', key: 'kp-7', mod: 0 });
    expect(resolveInput({ type: 'key', key: 'backspace' })).toEqual({ kind: 'char', codepoint: 8, mod: 0 });
  });

  it('drops reserved and unknown keys', () => {
    expect(resolveInput({ type: 'key', key: 'help' })).toEqual({ kind: 'drop' });
    expect(resolveInput({ type: 'key', key: 'no-such-key' })).toEqual({ kind: 'drop' });
    expect(resolveInput({ type: 'mouse', event: 'x1-mouse', row: 0, col: 0 })).toEqual({ kind: 'drop' });
  });

  it('resolves mouse events to a button with coordinates', () => {
    expect(resolveInput({ type: 'mouse', event: 'right-release', row: 2, col: 7 })).toEqual({
      kind: 'mouse',
      button: 3,
      pressed: false,
      row: 2,
      col: 7,
      mod: 0,
    });
  });
});

describe('key table helpers', () => {
  it('knows which names are keys and mouse events', () => {
    expect(resolveInput({ type: 'key', key: 'left-mouse' })).toEqual({ kind: 'drop' });
    expect(isMouseEvent('left-mouse')).toBe(true);
    expect(isDragEvent('left-drag')).toBe(true);
    expect(isDragEvent('left-release')).toBe(false);
  });

  it('rejects malformed tables', () => {
    expect(() => parseKeyTable({ keys: {} })).toThrow('expected { keys, mouse } objects');
    expect(() => parseKeyTable({ keys: { bad: { key: 'up', mod: 'hyper' } }, mouse: {} })).toThrow(
      "key-table: entry 'bad' has unknown modifier",
    );
    expect(() => parseKeyTable({ keys: { bad: { key: 'warp' } }, mouse: {} })).toThrow(
      "key-table: entry 'bad' has no usable mapping",
    );
  });
});

describe('translateInput', () => {
  let engine: FakeEngine;

  beforeEach(() => {
    resetMetrics();
    engine = new FakeEngine(24, 80);
  });

  it('returns the bytes the engine encoded', () => {
    expect(translateInput(engine, { type: 'char', codepoint: 0x61 })).toBe('a');
    expect(translateInput(engine, { type: 'key', key: 'up' })).toBe('\x1b[A');
    expect(translateInput(engine, { type: 'key', key: 'shift-up' })).toBe('\x1b[1;2A');
    expect(translateInput(engine, { type: 'key', key: 'f5' })).toBe('\x1b[15~');
    expect(translateInput(engine, { type: 'key', key: 'backspace' })).toBe('\b');
    expect(translateInput(engine, { type: 'char', codepoint: 0x63, mod: KeyModifier.CTRL })).toBe('\x03');
  });

  it('moves the mouse before pressing the button', () => {
    expect(translateInput(engine, { type: 'mouse', event: 'left-mouse', row: 1, col: 4 })).toBe('\x1b[<0;5;2M');
    expect(translateInput(engine, { type: 'mouse', event: 'scroll-up', row: 0, col: 0 })).toBe('\x1b[<64;1;1M');
  });

  it('sends bracketed paste markers', () => {
    expect(translateInput(engine, { type: 'key', key: 'paste-start' })).toBe('\x1b[200~');
    expect(translateInput(engine, { type: 'key', key: 'paste-end' })).toBe('\x1b[201~');
  });

  it('produces nothing for dropped keys and counts them', () => {
    expect(translateInput(engine, { type: 'key', key: 'undo' })).toBe('');
    expect(getMetric('input_dropped', { key: 'undo' })).toBe(1);
  });

  it('produces nothing without an engine', () => {
    expect(translateInput(null, { type: 'char', codepoint: 0x61 })).toBe('');
    expect(getMetric('engine_absent', { op: 'translate' })).toBe(1);
  });
});
