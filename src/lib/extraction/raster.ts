// ============================================================
// EPS CHART EXTRACTION - RASTER THRESHOLDING
// Binary derivations of a grayscale chart used by the bar classifier
// ============================================================

import type { BarRegion, GrayImage } from './types';

export const WHITE = 255;
export const BLACK = 0;

const FLT_EPSILON = 1.1920929e-7;

export function createGrayImage(width: number, height: number, fill: number = BLACK): GrayImage {
  return { width, height, data: new Uint8Array(width * height).fill(fill) };
}

function clampIndex(i: number, n: number): number {
  return i < 0 ? 0 : i >= n ? n - 1 : i;
}

/**
 * 1-D Gaussian kernel; sigma <= 0 derives it from the size
 * as 0.3 * ((size - 1) * 0.5 - 1) + 0.8.
 */
export function gaussianKernel(size: number, sigma: number = 0): number[] {
  const s = sigma > 0 ? sigma : 0.3 * ((size - 1) * 0.5 - 1) + 0.8;
  const half = (size - 1) / 2;
  const weights = Array.from({ length: size }, (_, i) => Math.exp(-((i - half) ** 2) / (2 * s * s)));
  const sum = weights.reduce((acc, w) => acc + w, 0);
  return weights.map(w => w / sum);
}

/**
 * Separable Gaussian blur with replicated borders, rounded back to 8 bits
 */
export function gaussianBlur(image: GrayImage, size: number): GrayImage {
  const { width, height, data } = image;
  const kernel = gaussianKernel(size);
  const half = (size - 1) / 2;

  const horizontal = new Float64Array(width * height);
  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = 0; k < size; k++) {
        acc += kernel[k] * data[row + clampIndex(x + k - half, width)];
      }
      horizontal[row + x] = acc;
    }
  }

  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = 0; k < size; k++) {
        acc += kernel[k] * horizontal[clampIndex(y + k - half, height) * width + x];
      }
      out[y * width + x] = Math.min(WHITE, Math.max(BLACK, Math.round(acc)));
    }
  }

  return { width, height, data: out };
}

/**
 * Gaussian adaptive threshold: white where pixel > local mean - c
 */
export function adaptiveThreshold(image: GrayImage, blockSize: number = 11, c: number = 2): GrayImage {
  const mean = gaussianBlur(image, blockSize);
  const out = new Uint8Array(image.data.length);
  for (let i = 0; i < out.length; i++) {
    out[i] = image.data[i] > mean.data[i] - c ? WHITE : BLACK;
  }
  return { width: image.width, height: image.height, data: out };
}

/**
 * Otsu's global threshold (maximum between-class variance).
 * Single-valued images yield 0.
 */
export function otsuThreshold(image: GrayImage): number {
  const total = image.data.length;
  if (total === 0) return 0;

  const histogram = new Array<number>(256).fill(0);
  for (const value of image.data) histogram[value]++;

  let mu = 0;
  for (let i = 0; i < 256; i++) mu += i * histogram[i];
  mu /= total;

  let q1 = 0;
  let mu1 = 0;
  let maxSigma = 0;
  let threshold = 0;

  for (let i = 0; i < 256; i++) {
    const p = histogram[i] / total;
    mu1 *= q1;
    q1 += p;
    const q2 = 1 - q1;

    if (Math.min(q1, q2) < FLT_EPSILON || Math.max(q1, q2) > 1 - FLT_EPSILON) continue;

    mu1 = (mu1 + i * p) / q1;
    const mu2 = (mu - q1 * mu1) / q2;
    const sigma = q1 * q2 * (mu1 - mu2) ** 2;
    if (sigma > maxSigma) {
      maxSigma = sigma;
      threshold = i;
    }
  }

  return threshold;
}

export function binarize(image: GrayImage, threshold: number, inverted: boolean = false): GrayImage {
  const out = new Uint8Array(image.data.length);
  for (let i = 0; i < out.length; i++) {
    const above = image.data[i] > threshold;
    out[i] = above !== inverted ? WHITE : BLACK;
  }
  return { width: image.width, height: image.height, data: out };
}

function morph3x3(image: GrayImage, pick: (a: number, b: number) => number): GrayImage {
  const { width, height, data } = image;
  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = data[y * width + x];
      for (let dy = -1; dy <= 1; dy++) {
        const ny = y + dy;
        if (ny < 0 || ny >= height) continue;
        for (let dx = -1; dx <= 1; dx++) {
          const nx = x + dx;
          if (nx < 0 || nx >= width) continue;
          acc = pick(acc, data[ny * width + nx]);
        }
      }
      out[y * width + x] = acc;
    }
  }
  return { width, height, data: out };
}

export function dilate3x3(image: GrayImage): GrayImage {
  return morph3x3(image, Math.max);
}

export function erode3x3(image: GrayImage): GrayImage {
  return morph3x3(image, Math.min);
}

/** Morphological closing (dilate, then erode) with a 3x3 square */
export function close3x3(image: GrayImage): GrayImage {
  return erode3x3(dilate3x3(image));
}

/**
 * Share of pure-white pixels inside a region; null for an empty region
 */
export function whiteRatio(image: GrayImage, region: BarRegion): number | null {
  const xMin = Math.max(0, region.xMin);
  const xMax = Math.min(image.width, region.xMax);
  const yTop = Math.max(0, region.yTop);
  const yBottom = Math.min(image.height, region.yBottom);
  if (xMax <= xMin || yBottom <= yTop) return null;

  let white = 0;
  for (let y = yTop; y < yBottom; y++) {
    const row = y * image.width;
    for (let x = xMin; x < xMax; x++) {
      if (image.data[row + x] === WHITE) white++;
    }
  }
  return white / ((xMax - xMin) * (yBottom - yTop));
}
