import { describe, it, expect } from 'vitest';
import {
  BLACK,
  WHITE,
  adaptiveThreshold,
  binarize,
  close3x3,
  createGrayImage,
  gaussianKernel,
  otsuThreshold,
  whiteRatio,
} from './raster';
import type { GrayImage } from './types';

function fromRows(rows: number[][]): GrayImage {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  return { width, height, data: Uint8Array.from(rows.flat()) };
}

function countBlack(image: GrayImage): number {
  return image.data.filter(v => v === BLACK).length;
}

describe('gaussianKernel', () => {
  it('is normalized and symmetric', () => {
    const kernel = gaussianKernel(11);
    expect(kernel).toHaveLength(11);
    expect(kernel.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 10);
    expect(kernel[0]).toBeCloseTo(kernel[10], 12);
    expect(kernel[5]).toBeGreaterThan(kernel[4]);
  });
});

describe('adaptiveThreshold', () => {
  it('turns a flat image white', () => {
    const out = adaptiveThreshold(createGrayImage(15, 15, 128));
    expect(countBlack(out)).toBe(0);
  });

  it('marks a lone dark pixel black and leaves its surroundings white', () => {
    const image = createGrayImage(15, 15, WHITE);
    image.data[7 * 15 + 7] = 0;
    const out = adaptiveThreshold(image);
    expect(countBlack(out)).toBe(1);
    expect(out.data[7 * 15 + 7]).toBe(BLACK);
  });
});

describe('otsuThreshold', () => {
  it('is 0 for a single-valued image', () => {
    expect(otsuThreshold(createGrayImage(8, 8, 90))).toBe(0);
  });

  it('splits two populations at the lower one', () => {
    const image = fromRows([
      [10, 10, 200, 200],
      [10, 10, 200, 200],
    ]);
    expect(otsuThreshold(image)).toBe(10);
  });
});

describe('binarize', () => {
  const image = fromRows([[10, 11, 200]]);

  it('sets pixels above the threshold white', () => {
    expect([...binarize(image, 10).data]).toEqual([BLACK, WHITE, WHITE]);
  });

  it('reverses polarity when inverted', () => {
    expect([...binarize(image, 10, true).data]).toEqual([WHITE, BLACK, BLACK]);
  });
});

describe('close3x3', () => {
  it('fills a one-pixel hole', () => {
    const image = createGrayImage(5, 5, WHITE);
    image.data[12] = BLACK;
    expect(countBlack(close3x3(image))).toBe(0);
  });

  it('keeps an isolated white pixel', () => {
    const image = createGrayImage(5, 5, BLACK);
    image.data[12] = WHITE;
    const out = close3x3(image);
    expect(out.data[12]).toBe(WHITE);
    expect(countBlack(out)).toBe(24);
  });
});

describe('whiteRatio', () => {
  const image = fromRows([
    [255, 0, 255, 0],
    [255, 0, 255, 0],
  ]);

  it('counts pure white pixels in the region', () => {
    expect(whiteRatio(image, { xMin: 0, xMax: 4, yTop: 0, yBottom: 2 })).toBe(0.5);
    expect(whiteRatio(image, { xMin: 0, xMax: 1, yTop: 0, yBottom: 2 })).toBe(1);
  });

  it('clips the region to the image', () => {
    expect(whiteRatio(image, { xMin: -5, xMax: 1, yTop: -1, yBottom: 9 })).toBe(1);
  });

  it('is null for an empty region', () => {
    expect(whiteRatio(image, { xMin: 2, xMax: 2, yTop: 0, yBottom: 2 })).toBeNull();
    expect(whiteRatio(image, { xMin: 0, xMax: 4, yTop: 2, yBottom: 1 })).toBeNull();
    expect(whiteRatio(image, { xMin: 10, xMax: 20, yTop: 0, yBottom: 2 })).toBeNull();
  });
});
