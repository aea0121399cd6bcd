import fs from 'fs-extra';
import decodeHeic from 'heic-decode';
import sharp from 'sharp';
import type { Sharp } from 'sharp';
import { errorMessage } from '../errors.js';
import type { PixelDimensions } from '../shared/types/media-record.js';
import { readHead } from '../utils/files.js';
import { detectMagicType } from '../utils/magic-bytes.js';

const SAMPLE_SIZE = 32;
const HASH_SIZE = 8;

export const PERCEPTUAL_HASH_BITS = HASH_SIZE * HASH_SIZE;

export interface DecodedImage {
  dimensions: PixelDimensions;
  perceptualHash?: string;
  hashError?: string;
}

// cos((2x + 1) * u * PI / 2N) for the low-frequency rows only
const COSINE_TABLE: number[][] = Array.from({ length: HASH_SIZE }, (_, u) =>
  Array.from({ length: SAMPLE_SIZE }, (_, x) => Math.cos(((2 * x + 1) * u * Math.PI) / (2 * SAMPLE_SIZE)))
);

/**
 * Decodes an image (bytes or a file path) and computes its 64-bit DCT perceptual hash.
 *
 * HEIC/HEIF stills go through libheif (heic-decode); everything else through sharp. The raster is
 * auto-oriented, flattened to greyscale and squashed to 32x32; the hash keeps the top-left 8x8 DCT
 * coefficients and sets one bit per coefficient above their median.
 * Rejects when not even the dimensions can be read. When only the pixel decode fails, the
 * dimensions are returned with `hashError` set.
 */
export const decodeImage = async (input: Buffer | string): Promise<DecodedImage> => {
  const head = typeof input === 'string' ? await readHead(input) : input;
  if (detectMagicType(head) === 'heic') {
    return decodeHeif(typeof input === 'string' ? await fs.readFile(input) : input);
  }

  const metadata = await sharp(input).metadata();
  if (!metadata.width || !metadata.height) {
    throw new Error('Unable to read image dimensions.');
  }
  const rotated = (metadata.orientation ?? 1) >= 5;
  const dimensions = rotated
    ? { width: metadata.height, height: metadata.width }
    : { width: metadata.width, height: metadata.height };
  return withHash(dimensions, () => hashImage(sharp(input)));
};

export const computePerceptualHash = async (input: Buffer | string): Promise<string> => {
  const decoded = await decodeImage(input);
  if (decoded.perceptualHash === undefined) {
    throw new Error(decoded.hashError ?? 'Perceptual hash unavailable.');
  }
  return decoded.perceptualHash;
};

const decodeHeif = async (bytes: Buffer): Promise<DecodedImage> => {
  const { width, height, data } = await decodeHeic({ buffer: bytes });
  return withHash({ width, height }, () => hashImage(sharp(data, { raw: { width, height, channels: 4 } })));
};

const withHash = async (dimensions: PixelDimensions, hash: () => Promise<string>): Promise<DecodedImage> => {
  try {
    return { dimensions, perceptualHash: await hash() };
  } catch (error) {
    return { dimensions, hashError: errorMessage(error) };
  }
};

const hashImage = async (image: Sharp): Promise<string> => {
  const { data, info } = await image
    .rotate()
    .removeAlpha()
    .greyscale()
    .resize(SAMPLE_SIZE, SAMPLE_SIZE, { fit: 'fill' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  const channels = info.channels;
  const pixels: number[] = [];
  for (let i = 0; i < SAMPLE_SIZE * SAMPLE_SIZE; i += 1) {
    pixels.push(data[i * channels] ?? 0);
  }
  return hashFromGreyPixels(pixels);
};

export const hashFromGreyPixels = (pixels: readonly number[]): string => {
  if (pixels.length !== SAMPLE_SIZE * SAMPLE_SIZE) {
    throw new Error(`Expected ${SAMPLE_SIZE * SAMPLE_SIZE} grey samples, got ${pixels.length}`);
  }

  const coefficients: number[] = [];
  for (let u = 0; u < HASH_SIZE; u += 1) {
    for (let v = 0; v < HASH_SIZE; v += 1) {
      let sum = 0;
      for (let y = 0; y < SAMPLE_SIZE; y += 1) {
        const rowCos = COSINE_TABLE[u][y];
        const rowOffset = y * SAMPLE_SIZE;
        for (let x = 0; x < SAMPLE_SIZE; x += 1) {
          sum += pixels[rowOffset + x] * rowCos * COSINE_TABLE[v][x];
        }
      }
      coefficients.push(sum);
    }
  }

  const median = medianOf(coefficients);
  let hex = '';
  for (let i = 0; i < coefficients.length; i += 4) {
    let nibble = 0;
    for (let bit = 0; bit < 4; bit += 1) {
      nibble = (nibble << 1) | (coefficients[i + bit] > median ? 1 : 0);
    }
    hex += nibble.toString(16);
  }
  return hex;
};

/**
 * Counts differing bits between two hex-encoded hashes.
 * Returns null when the hashes differ in length or contain non-hex characters.
 */
export const hammingDistance = (a: string, b: string): number | null => {
  if (a.length !== b.length || a.length === 0) {
    return null;
  }
  let distance = 0;
  for (let i = 0; i < a.length; i += 1) {
    const left = Number.parseInt(a.charAt(i), 16);
    const right = Number.parseInt(b.charAt(i), 16);
    if (Number.isNaN(left) || Number.isNaN(right)) {
      return null;
    }
    distance += nibblePopcount(left ^ right);
  }
  return distance;
};

export const maxHashDistance = (hash: string): number => hash.length * 4;

function medianOf(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function nibblePopcount(value: number): number {
  let count = 0;
  let rest = value & 0xf;
  while (rest > 0) {
    count += rest & 1;
    rest >>= 1;
  }
  return count;
}
