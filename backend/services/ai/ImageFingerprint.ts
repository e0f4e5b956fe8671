import sharp from 'sharp';
import type { DecodedImage, ImageFingerprinter } from '../../types/index.js';

export const DEFAULT_HASH_SIZE = 16;

/**
 * Average hash (aHash): shrink to hashSize x hashSize greyscale, set a bit for every pixel
 * brighter than the mean, and print the bits as hex, most significant first.
 * A 16x16 hash is 256 bits, so 64 hex characters.
 */
export class AverageHashFingerprinter implements ImageFingerprinter {
  constructor(private readonly hashSize: number = DEFAULT_HASH_SIZE) {
    // even sizes keep the bit count a whole number of hex digits
    if (!Number.isInteger(hashSize) || hashSize < 2 || hashSize % 2 !== 0) {
      throw new RangeError(`Hash size must be an even integer >= 2, got ${hashSize}`);
    }
  }

  async fingerprint(image: DecodedImage): Promise<string> {
    const { data, info } = await sharp(image.buffer)
      .flatten({ background: '#ffffff' })
      .greyscale()
      .resize(this.hashSize, this.hashSize, { fit: 'fill' })
      .raw()
      .toBuffer({ resolveWithObject: true });

    const pixelCount = this.hashSize * this.hashSize;
    const pixels: number[] = [];
    for (let i = 0; i < pixelCount; i++) {
      pixels.push(data[i * info.channels]);
    }

    const mean = pixels.reduce((sum, value) => sum + value, 0) / pixelCount;
    return bitsToHex(pixels.map(value => value > mean));
  }
}

export function bitsToHex(bits: boolean[]): string {
  let hex = '';
  for (let i = 0; i < bits.length; i += 4) {
    let nibble = 0;
    for (let j = 0; j < 4; j++) {
      nibble = (nibble << 1) | (bits[i + j] ? 1 : 0);
    }
    hex += nibble.toString(16);
  }
  return hex;
}

const HEX_PATTERN = /^[0-9a-f]*$/i;

/**
 * Number of differing bits between two hex fingerprints of equal length.
 */
export function hammingDistance(a: string, b: string): number {
  if (a.length !== b.length || !HEX_PATTERN.test(a) || !HEX_PATTERN.test(b)) {
    throw new RangeError('Fingerprints must be hex strings of equal length');
  }

  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    let diff = parseInt(a[i], 16) ^ parseInt(b[i], 16);
    while (diff) {
      distance += diff & 1;
      diff >>= 1;
    }
  }
  return distance;
}
