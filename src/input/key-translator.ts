/**
 * Host input → bytes for the job.
 *
 * Keys are looked up in key-table.json, then fed to the engine's keyboard or
 * mouse encoder; whatever the encoder produced is drained and returned.
 */

import { readFileSync } from 'fs';
import { incMetric } from '../infra/diagnostics.js';
import { KeyModifier } from '../types/terminal-contract.js';
import type { EngineKey, KeyModifierMask, TerminalEngine } from '../types/terminal-contract.js';

export type HostInput =
  | { type: 'key'; key: string }
  | { type: 'char'; codepoint: number; mod?: KeyModifierMask }
  | { type: 'mouse'; event: string; row: number; col: number; mod?: KeyModifierMask };

export type KeyAction =
  | { kind: 'engine-key'; key: EngineKey; mod: KeyModifierMask }
  | { kind: 'char'; codepoint: number; mod: KeyModifierMask }
  | { kind: 'mouse'; button: number; pressed: boolean; row: number; col: number; mod: KeyModifierMask }
  | { kind: 'paste'; edge: 'start' | 'end' }
  | { kind: 'drop' };

type KeyEntry =
  | { kind: 'engine-key'; key: EngineKey; mod: KeyModifierMask }
  | { kind: 'char'; codepoint: number }
  | { kind: 'paste'; edge: 'start' | 'end' }
  | { kind: 'drop' };

type MouseEntry =
  | { kind: 'button'; button: number; pressed: boolean }
  | { kind: 'drop' };

type KeyTable = {
  keys: Map<string, KeyEntry>;
  mouse: Map<string, MouseEntry>;
};

const NAMED_ENGINE_KEYS = new Set<string>([
  'enter', 'tab', 'backspace', 'escape', 'up', 'down', 'left', 'right', 'ins', 'del',
  'home', 'end', 'pageup', 'pagedown', 'kp-mult', 'kp-plus', 'kp-comma', 'kp-minus',
  'kp-period', 'kp-divide', 'kp-enter', 'kp-equal',
]);

const MODIFIERS: Record<string, KeyModifierMask> = {
  shift: KeyModifier.SHIFT,
  alt: KeyModifier.ALT,
  ctrl: KeyModifier.CTRL,
};

export function isEngineKey(value: string): value is EngineKey {
  return NAMED_ENGINE_KEYS.has(value) || /^f\d{1,2}$/.test(value) || /^kp-\d$/.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseKeyEntry(name: string, raw: unknown): KeyEntry {
  if (!isRecord(raw)) throw new Error(`key-table: entry '${name}' is not an object`);
  if (raw.drop === true) return { kind: 'drop' };
  if (raw.paste === 'start' || raw.paste === 'end') return { kind: 'paste', edge: raw.paste };
  if (typeof raw.char === 'number') return { kind: 'char', codepoint: raw.char };
  if (typeof raw.key === 'string' && isEngineKey(raw.key)) {
    let mod: KeyModifierMask = KeyModifier.NONE;
    if (raw.mod !== undefined) {
      const parsed = typeof raw.mod === 'string' ? MODIFIERS[raw.mod] : undefined;
      if (parsed === undefined) throw new Error(`key-table: entry '${name}' has unknown modifier`);
      mod = parsed;
    }
    return { kind: 'engine-key', key: raw.key, mod };
  }
  throw new Error(`key-table: entry '${name}' has no usable mapping`);
}

function parseMouseEntry(name: string, raw: unknown): MouseEntry {
  if (!isRecord(raw)) throw new Error(`key-table: mouse entry '${name}' is not an object`);
  if (raw.drop === true) return { kind: 'drop' };
  if (typeof raw.button === 'number' && typeof raw.pressed === 'boolean') {
    return { kind: 'button', button: raw.button, pressed: raw.pressed };
  }
  throw new Error(`key-table: mouse entry '${name}' has no usable mapping`);
}

export function parseKeyTable(raw: unknown): KeyTable {
  if (!isRecord(raw) || !isRecord(raw.keys) || !isRecord(raw.mouse)) {
    throw new Error('key-table: expected { keys, mouse } objects');
  }
  const keys = new Map<string, KeyEntry>();
  for (const [name, entry] of Object.entries(raw.keys)) {
    keys.set(name, parseKeyEntry(name, entry));
  }
  const mouse = new Map<string, MouseEntry>();
  for (const [name, entry] of Object.entries(raw.mouse)) {
    mouse.set(name, parseMouseEntry(name, entry));
  }
  return { keys, mouse };
}

let cachedTable: KeyTable | undefined;

function keyTable(): KeyTable {
  if (!cachedTable) {
    const text = readFileSync(new URL('./key-table.json', import.meta.url), 'utf8');
    cachedTable = parseKeyTable(JSON.parse(text));
  }
  return cachedTable;
}

export function isMouseEvent(name: string): boolean {
  return keyTable().mouse.has(name);
}

export function isDragEvent(name: string): boolean {
  return name.endsWith('-drag');
}

/**
 * Decide how an input event reaches the engine. Pure apart from the lazily
 * loaded table.
 */
export function resolveInput(input: HostInput): KeyAction {
  switch (input.type) {
    case 'char': {
      const mod = input.mod ?? KeyModifier.NONE;
      if (input.codepoint === 0x0d) return { kind: 'engine-key', key: 'enter', mod };
      if (input.codepoint === 0x1b) return { kind: 'engine-key', key: 'escape', mod };
      if (input.codepoint === 0x09) return { kind: 'engine-key', key: 'tab', mod };
      if (input.codepoint <= 0 || input.codepoint > 0x10ffff) return { kind: 'drop' };
      return { kind: 'char', codepoint: input.codepoint, mod };
    }
    case 'key': {
      const entry = keyTable().keys.get(input.key);
      if (!entry) return { kind: 'drop' };
      if (entry.kind === 'char') return { kind: 'char', codepoint: entry.codepoint, mod: KeyModifier.NONE };
      return entry;
    }
    case 'mouse': {
      const entry = keyTable().mouse.get(input.event);
      if (!entry || entry.kind === 'drop') return { kind: 'drop' };
      return {
        kind: 'mouse',
        button: entry.button,
        pressed: entry.pressed,
        row: input.row,
        col: input.col,
        mod: input.mod ?? KeyModifier.NONE,
      };
    }
  }
}

function describeInput(input: HostInput): string {
  if (input.type === 'key') return input.key;
  if (input.type === 'mouse') return input.event;
  return `U+${input.codepoint.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Encode `input` through the engine and return the bytes to send to the job.
 * An absent engine or an unrepresentable input yields the empty string.
 */
export function translateInput(engine: TerminalEngine | null, input: HostInput): string {
  if (!engine) {
    incMetric('engine_absent', { op: 'translate' });
    return '';
  }

  const action = resolveInput(input);
  switch (action.kind) {
    case 'drop':
      incMetric('input_dropped', { key: describeInput(input) });
      return '';
    case 'paste':
      if (action.edge === 'start') engine.startPaste();
      else engine.endPaste();
      break;
    case 'engine-key':
      engine.keyboardKey(action.key, action.mod);
      break;
    case 'char':
      engine.keyboardUnichar(action.codepoint, action.mod);
      break;
    case 'mouse':
      engine.mouseMove(action.row, action.col, action.mod);
      engine.mouseButton(action.button, action.pressed, action.mod);
      break;
  }

  return engine.readOutput();
}
