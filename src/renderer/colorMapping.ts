/**
 * Color mapping: numeric value per event -> palette color
 */

import type { ColorAssignment, ColorMethod, ColorScale, Palette, Rgb } from '../core/types';

/**
 * Domain of the color values, widened by one when every value is equal
 */
export function colorDomain(values: readonly number[]): ColorScale | null {
  if (values.length === 0) return null;
  const min = Math.min(...values);
  const max = Math.max(...values);
  return { min, max: max === min ? min + 1 : max };
}

/**
 * Rescale a value into [1, size + 0.99] and floor it to a 1-based palette index
 */
export function paletteIndex(value: number, domain: ColorScale, size: number): number {
  const fraction = (value - domain.min) / (domain.max - domain.min);
  const scaled = Math.floor(1 + fraction * (size - 0.01));
  return Math.min(size, Math.max(1, scaled));
}

function paletteColor(palette: Palette, index: number): Rgb {
  const color = palette[index - 1];
  if (!color) {
    throw new Error(`Palette index ${index} outside palette of ${palette.length} colors`);
  }
  return color;
}

export function mapColors(
  values: readonly number[],
  palette: Palette,
  method: ColorMethod,
): ColorAssignment {
  if (method === 'solid') {
    const solid = paletteColor(palette, 1);
    return { colors: values.map(() => solid), indices: null, scale: null };
  }

  const scale = colorDomain(values);
  if (!scale) {
    return { colors: [], indices: [], scale: null };
  }
  const indices = values.map((value) => paletteIndex(value, scale, palette.length));
  return {
    colors: indices.map((index) => paletteColor(palette, index)),
    indices,
    scale,
  };
}
