import { createHash } from 'node:crypto';
import type { RawImage } from './types';
import { resizeTo } from './image';

/** Side of the canonical copy an image is resampled to before hashing */
export const HASH_SIZE = 64;

/**
 * SHA-256 (hex) of the image resampled to `size`×`size` RGBA. The same photo
 * at another resolution hashes alike; different content does not.
 */
export function computeImageHash(image: RawImage, size = HASH_SIZE): string {
  const canonical = resizeTo(image, size, size);
  return createHash('sha256').update(canonical.data).digest('hex');
}

/** Deduplication key of a correction: one per (photo, square) */
export function correctionKey(imageHash: string | null, squareName: string): string {
  return createHash('sha256')
    .update(`${imageHash ?? 'no_image'}:${squareName}`)
    .digest('hex');
}
