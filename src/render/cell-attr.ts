/**
 * Cell → host attribute conversion and the attribute table that turns
 * attributes into small integer indices for the host's row buffers.
 */

import { incMetric } from '../infra/diagnostics.js';
import type { ColorCapability, EngineCell, EngineColor, HostDisplay } from '../types/terminal-contract.js';
import { colorToIndex, type PaletteLookup } from './color-index.js';

export const AttrFlag = {
  BOLD: 0x01,
  UNDERLINE: 0x02,
  ITALIC: 0x04,
  STRIKE: 0x08,
  REVERSE: 0x10,
} as const;

export type AttrFlagName = 'bold' | 'underline' | 'italic' | 'strike' | 'reverse';

const FLAG_BY_NAME: Record<AttrFlagName, number> = {
  bold: AttrFlag.BOLD,
  underline: AttrFlag.UNDERLINE,
  italic: AttrFlag.ITALIC,
  strike: AttrFlag.STRIKE,
  reverse: AttrFlag.REVERSE,
};

export type AttrColor =
  | { kind: 'default' }
  | { kind: 'index'; index: number }
  | { kind: 'rgb'; red: number; green: number; blue: number };

export type HostAttr = {
  flags: number;
  fg: AttrColor;
  bg: AttrColor;
};

export type ColorPalette = {
  capability: ColorCapability;
  lookup: PaletteLookup;
};

/** The palette of `host` as it is right now. */
export function hostPalette(host: HostDisplay): ColorPalette {
  return {
    capability: host.colorCapability(),
    lookup: (color, foreground) => host.paletteIndex(color, foreground),
  };
}

const DEFAULT_COLOR: AttrColor = { kind: 'default' };

export const PLAIN_ATTR: HostAttr = Object.freeze({ flags: 0, fg: DEFAULT_COLOR, bg: DEFAULT_COLOR });

export function cellFlags(cell: EngineCell): number {
  let flags = 0;
  if (cell.attrs.bold) flags |= AttrFlag.BOLD;
  if (cell.attrs.underline) flags |= AttrFlag.UNDERLINE;
  if (cell.attrs.italic) flags |= AttrFlag.ITALIC;
  if (cell.attrs.strike) flags |= AttrFlag.STRIKE;
  if (cell.attrs.reverse) flags |= AttrFlag.REVERSE;
  return flags;
}

export function hasAttrFlag(flags: number, name: AttrFlagName): boolean {
  return (flags & FLAG_BY_NAME[name]) !== 0;
}

function resolveColor(color: EngineColor, foreground: boolean, palette: ColorPalette): AttrColor {
  if (palette.capability.trueColor) {
    return { kind: 'rgb', red: color.red, green: color.green, blue: color.blue };
  }
  const index = colorToIndex(color, foreground, palette.capability.colors, palette.lookup);
  return index === 0 ? DEFAULT_COLOR : { kind: 'index', index };
}

export function cellToAttr(cell: EngineCell, palette: ColorPalette): HostAttr {
  return {
    flags: cellFlags(cell),
    fg: resolveColor(cell.fg, true, palette),
    bg: resolveColor(cell.bg, false, palette),
  };
}

function colorKey(color: AttrColor): string {
  switch (color.kind) {
    case 'default':
      return '-';
    case 'index':
      return `i${color.index}`;
    case 'rgb':
      return `r${color.red},${color.green},${color.blue}`;
  }
}

export function attrKey(attr: HostAttr): string {
  return `${attr.flags}|${colorKey(attr.fg)}|${colorKey(attr.bg)}`;
}

export const DEFAULT_ATTR_LIMIT = 65_536;

/**
 * Interns attributes. Index 0 is always the plain attribute; indices are
 * stable for the lifetime of the table.
 *
 * The table only grows, and on a true-color host every distinct color pair is
 * a new entry. Once `limit` entries exist, new attributes map to 0 (drawn
 * plain) and `attr_table_full` is counted.
 */
export class AttrTable {
  private attrs: HostAttr[] = [PLAIN_ATTR];
  private indexByKey = new Map<string, number>([[attrKey(PLAIN_ATTR), 0]]);

  constructor(private readonly limit: number = DEFAULT_ATTR_LIMIT) {}

  indexOf(attr: HostAttr): number {
    const key = attrKey(attr);
    const existing = this.indexByKey.get(key);
    if (existing !== undefined) return existing;
    if (this.attrs.length >= this.limit) {
      incMetric('attr_table_full');
      return 0;
    }
    const index = this.attrs.length;
    this.attrs.push(attr);
    this.indexByKey.set(key, index);
    return index;
  }

  get(index: number): HostAttr | undefined {
    return this.attrs[index];
  }

  get size(): number {
    return this.attrs.length;
  }

  cellIndex(cell: EngineCell, palette: ColorPalette): number {
    return this.indexOf(cellToAttr(cell, palette));
  }
}
