/**
 * Tests for color mapping and palettes
 */

import { describe, it, expect } from 'vitest';
import { colorDomain, mapColors, paletteIndex } from '../src/renderer/colorMapping';
import { createPalette, cssToRgb, DEFAULT_PALETTE_SIZE, PALETTE_NAMES } from '../src/renderer/palettes';
import { ChartInputError } from '../src/core/errors';
import type { Rgb } from '../src/core/types';

const palette: Rgb[] = [
  [0, 0, 0],
  [0.25, 0.25, 0.25],
  [0.5, 0.5, 0.5],
  [1, 1, 1],
];

describe('colorDomain', () => {
  it('should span the values', () => {
    expect(colorDomain([1, 5, 3])).toEqual({ min: 1, max: 5 });
  });

  it('should widen a degenerate domain by one', () => {
    expect(colorDomain([2, 2, 2])).toEqual({ min: 2, max: 3 });
  });

  it('should return null without values', () => {
    expect(colorDomain([])).toBeNull();
  });
});

describe('paletteIndex', () => {
  const domain = { min: 0, max: 10 };

  it('should map the domain ends to the first and last colors', () => {
    expect(paletteIndex(0, domain, 4)).toBe(1);
    expect(paletteIndex(10, domain, 4)).toBe(4);
  });

  it('should floor values in between', () => {
    // 1 + 0.5 * 3.99 = 2.995
    expect(paletteIndex(5, domain, 4)).toBe(2);
  });

  it('should never exceed the palette size', () => {
    expect(paletteIndex(10, domain, 256)).toBe(256);
    expect(paletteIndex(10, domain, 1)).toBe(1);
  });
});

describe('mapColors', () => {
  it('should look up colormapped colors and report the scale', () => {
    const assignment = mapColors([0, 5, 10], palette, 'colormapped');
    expect(assignment.indices).toEqual([1, 2, 4]);
    expect(assignment.colors).toEqual([palette[0], palette[1], palette[3]]);
    expect(assignment.scale).toEqual({ min: 0, max: 10 });
  });

  it('should map equal values to the first color', () => {
    const assignment = mapColors([3, 3], palette, 'colormapped');
    expect(assignment.indices).toEqual([1, 1]);
    expect(assignment.scale).toEqual({ min: 3, max: 4 });
  });

  it('should use the first color without a scale in solid mode', () => {
    const assignment = mapColors([0, 5, 10], palette, 'solid');
    expect(assignment.colors).toEqual([palette[0], palette[0], palette[0]]);
    expect(assignment.indices).toBeNull();
    expect(assignment.scale).toBeNull();
  });

  it('should handle no events', () => {
    expect(mapColors([], palette, 'colormapped')).toEqual({ colors: [], indices: [], scale: null });
  });
});

describe('createPalette', () => {
  it('should sample the viridis scale end to end', () => {
    const [first, last] = createPalette('viridis', 2);
    expect(first?.[0]).toBeCloseTo(68 / 255, 6);
    expect(first?.[1]).toBeCloseTo(1 / 255, 6);
    expect(first?.[2]).toBeCloseTo(84 / 255, 6);
    expect(last?.[0]).toBeCloseTo(253 / 255, 6);
    expect(last?.[1]).toBeCloseTo(231 / 255, 6);
    expect(last?.[2]).toBeCloseTo(37 / 255, 6);
  });

  it('should default to 256 colors with channels in [0, 1]', () => {
    const colors = createPalette();
    expect(colors).toHaveLength(DEFAULT_PALETTE_SIZE);
    expect(colors.flat().every((channel) => channel >= 0 && channel <= 1)).toBe(true);
  });

  it('should build every named palette', () => {
    for (const name of PALETTE_NAMES) {
      expect(createPalette(name, 8)).toHaveLength(8);
    }
  });

  it('should reject sizes below one', () => {
    expect(() => createPalette('magma', 0)).toThrow(ChartInputError);
  });
});

describe('cssToRgb', () => {
  it('should convert CSS colors', () => {
    expect(cssToRgb('#ff0000')).toEqual([1, 0, 0]);
  });

  it('should reject unknown colors', () => {
    expect(() => cssToRgb('not-a-color')).toThrow('Unrecognized color "not-a-color".');
  });
});
