import sharp from 'sharp';
import type { RawImage } from './types';

/** Write an RGBA image as a lossless PNG */
export async function writePng(filePath: string, image: RawImage): Promise<void> {
  const { data, width, height } = image;
  await sharp(Buffer.from(data.buffer, data.byteOffset, data.byteLength), {
    raw: { width, height, channels: 4 },
  })
    .png()
    .toFile(filePath);
}

/** Decode any image file sharp understands into RGBA */
export async function readPng(filePath: string): Promise<RawImage> {
  const { data, info } = await sharp(filePath)
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== 4) {
    throw new Error(`Expected 4 channels from ${filePath}, got ${info.channels}`);
  }
  return {
    data: new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength),
    width: info.width,
    height: info.height,
  };
}
