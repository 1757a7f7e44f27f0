/**
 * Named sequential palettes sampled from d3 color scales
 */

import * as d3 from 'd3';
import type { Rgb } from '../core/types';
import { ChartInputError } from '../core/errors';

export const PALETTE_NAMES = [
  'viridis',
  'cividis',
  'plasma',
  'inferno',
  'magma',
  'turbo',
  'greys',
] as const;

export type PaletteName = (typeof PALETTE_NAMES)[number];

export const DEFAULT_PALETTE_SIZE = 256;

const INTERPOLATORS: Record<PaletteName, (t: number) => string> = {
  viridis: d3.interpolateViridis,
  cividis: d3.interpolateCividis,
  plasma: d3.interpolatePlasma,
  inferno: d3.interpolateInferno,
  magma: d3.interpolateMagma,
  turbo: d3.interpolateTurbo,
  greys: d3.interpolateGreys,
};

/**
 * Convert a CSS color string to an RGB triple in [0, 1]
 */
export function cssToRgb(color: string): Rgb {
  const { r, g, b } = d3.rgb(color);
  if ([r, g, b].some((channel) => Number.isNaN(channel))) {
    throw new ChartInputError('invalid-argument', `Unrecognized color "${color}".`);
  }
  return [r / 255, g / 255, b / 255];
}

/**
 * Sample `size` evenly spaced colors from a named scale, first to last
 */
export function createPalette(
  name: PaletteName = 'viridis',
  size: number = DEFAULT_PALETTE_SIZE,
): Rgb[] {
  if (!Number.isInteger(size) || size < 1) {
    throw new ChartInputError('invalid-argument', `Palette size must be a positive integer (got ${size}).`);
  }
  const interpolate = INTERPOLATORS[name];
  return Array.from({ length: size }, (_, i) =>
    cssToRgb(interpolate(size === 1 ? 0 : i / (size - 1))),
  );
}
