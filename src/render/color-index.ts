/**
 * Reverse-map engine RGB colors onto an indexed host palette.
 *
 * Results are palette numbers plus one, so that 0 can mean "no override:
 * use the host default".
 */

import type { EngineColor, StandardColor } from '../types/terminal-contract.js';

export type PaletteLookup = (color: StandardColor, foreground: boolean) => number;

type StandardEntry = {
  red: number;
  green: number;
  blue: number;
  name: StandardColor;
};

/** RGB values the engine uses for its default 16-color palette. */
export const STANDARD_COLORS: readonly StandardEntry[] = [
  { red: 0, green: 0, blue: 0, name: 'black' },
  { red: 0, green: 0, blue: 224, name: 'dark-blue' },
  { red: 0, green: 224, blue: 0, name: 'dark-green' },
  { red: 0, green: 224, blue: 224, name: 'dark-cyan' },
  { red: 224, green: 0, blue: 0, name: 'dark-red' },
  { red: 224, green: 0, blue: 224, name: 'dark-magenta' },
  { red: 224, green: 224, blue: 0, name: 'dark-yellow' },
  { red: 224, green: 224, blue: 224, name: 'light-grey' },
  { red: 128, green: 128, blue: 128, name: 'dark-grey' },
  { red: 255, green: 64, blue: 64, name: 'light-red' },
  { red: 255, green: 64, blue: 255, name: 'light-magenta' },
  { red: 255, green: 255, blue: 64, name: 'yellow' },
  { red: 255, green: 255, blue: 255, name: 'white' },
  { red: 64, green: 64, blue: 255, name: 'light-blue' },
  { red: 64, green: 255, blue: 64, name: 'light-green' },
  { red: 64, green: 255, blue: 255, name: 'light-cyan' },
];

/** Upper bounds of the 24 greyscale steps (palette 232..255). */
const GREY_CUTOFFS = [
  0x05, 0x10, 0x1b, 0x26, 0x31, 0x3c, 0x47, 0x52,
  0x5d, 0x68, 0x73, 0x7f, 0x8a, 0x95, 0xa0, 0xab,
  0xb6, 0xc1, 0xcc, 0xd7, 0xe2, 0xed, 0xf9,
];

export function findStandardColor(color: EngineColor): StandardColor | undefined {
  return STANDARD_COLORS.find(
    (entry) => entry.red === color.red && entry.green === color.green && entry.blue === color.blue,
  )?.name;
}

function cubeStep(component: number): number {
  return Math.floor((component + 25) / 0x33);
}

/**
 * Map `color` to a palette number plus one for a host with `colors` indexed
 * colors; 0 when there is no sensible match.
 */
export function colorToIndex(
  color: EngineColor,
  foreground: boolean,
  colors: number,
  lookup: PaletteLookup,
): number {
  const red = Math.max(0, Math.min(255, Math.trunc(color.red)));
  const green = Math.max(0, Math.min(255, Math.trunc(color.green)));
  const blue = Math.max(0, Math.min(255, Math.trunc(color.blue)));

  const standard = findStandardColor({ red, green, blue });
  if (standard) {
    return lookup(standard, foreground) + 1;
  }

  if (colors < 256) return 0;

  if (red === green && red === blue) {
    for (let i = 0; i < GREY_CUTOFFS.length; i += 1) {
      if (red < GREY_CUTOFFS[i]) return 232 + i + 1;
    }
    return 256;
  }

  return 16 + cubeStep(red) * 36 + cubeStep(green) * 6 + cubeStep(blue) + 1;
}

export function colorToHex(color: EngineColor): string {
  const hex = (v: number) => Math.max(0, Math.min(255, Math.trunc(v))).toString(16).padStart(2, '0');
  return `#${hex(color.red)}${hex(color.green)}${hex(color.blue)}`;
}
