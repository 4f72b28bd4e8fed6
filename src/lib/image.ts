import sharp from 'sharp';
import { ImageDecodeError } from './errors';
import type { GrayImage } from './extraction/types';

/**
 * Decode PNG/JPEG bytes into an 8-bit greyscale raster.
 */
export async function decodeGrayscale(bytes: Uint8Array): Promise<GrayImage> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(bytes)
      .removeAlpha()
      .greyscale()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new ImageDecodeError(
      `Could not decode image: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const { data, info } = decoded;
  const { width, height, channels } = info;
  if (channels === 1) {
    return { width, height, data: new Uint8Array(data.buffer, data.byteOffset, width * height) };
  }

  // Keep the first channel when the pipeline still emits several identical ones
  const gray = new Uint8Array(width * height);
  for (let i = 0; i < gray.length; i++) gray[i] = data[i * channels] ?? 0;
  return { width, height, data: gray };
}
