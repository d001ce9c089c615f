/**
 * Image fingerprints for duplicate detection.
 *
 * - SHA-256 over the raw bytes (exact duplicates)
 * - dHash over a 9x8 greyscale thumbnail (near duplicates, 64 bits as 16 hex chars)
 */

import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import sharp from "sharp";
import type { Logger } from "pino";

export const PERCEPTUAL_HASH_SIZE = 8;

export type ImageSource = Buffer | string;

export class ImageHashError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImageHashError";
  }
}

export interface ImageHashes {
  sha256: string | null;
  perceptual: string | null;
}

const readSource = async (source: ImageSource): Promise<Buffer> =>
  typeof source === "string" ? fs.readFile(source) : source;

export const calculateSha256 = async (source: ImageSource): Promise<string> => {
  const bytes = await readSource(source);
  return createHash("sha256").update(bytes).digest("hex");
};

/**
 * Difference hash. Bit i is 1 when pixel (x+1, y) is brighter than (x, y),
 * rows top to bottom, most significant bit first.
 */
export const calculatePerceptualHash = async (
  source: ImageSource,
  hashSize: number = PERCEPTUAL_HASH_SIZE
): Promise<string> => {
  const width = hashSize + 1;
  const height = hashSize;

  let pixels: Buffer;
  let channels: number;
  try {
    const { data, info } = await sharp(await readSource(source))
      .greyscale()
      .removeAlpha()
      .resize(width, height, { fit: "fill" })
      .raw()
      .toBuffer({ resolveWithObject: true });
    pixels = data;
    channels = info.channels;
  } catch (error) {
    throw new ImageHashError("Unable to decode image for perceptual hash", { cause: error });
  }

  let hash = 0n;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < hashSize; x++) {
      const left = pixels[(y * width + x) * channels];
      const right = pixels[(y * width + x + 1) * channels];
      hash = (hash << 1n) | (right > left ? 1n : 0n);
    }
  }

  return hash.toString(16).padStart((hashSize * hashSize) / 4, "0");
};

const POPCOUNT_NIBBLE = [0, 1, 1, 2, 1, 2, 2, 3, 1, 2, 2, 3, 2, 3, 3, 4];

/** Bit-level Hamming distance between two equal-length hex strings. */
export const hammingDistance = (a: string, b: string): number => {
  if (a.length !== b.length) {
    throw new ImageHashError(`Hash length mismatch (${a.length} vs ${b.length})`);
  }
  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    const x = Number.parseInt(a[i], 16);
    const y = Number.parseInt(b[i], 16);
    if (Number.isNaN(x) || Number.isNaN(y)) {
      throw new ImageHashError(`Invalid hex digit at position ${i}`);
    }
    distance += POPCOUNT_NIBBLE[x ^ y];
  }
  return distance;
};

/** Both hashes; each one degrades to null independently on failure. */
export const computeImageHashes = async (source: ImageSource, logger?: Logger): Promise<ImageHashes> => {
  let bytes: Buffer;
  try {
    bytes = await readSource(source);
  } catch (err) {
    logger?.warn({ err, source: typeof source === "string" ? source : "buffer" }, "image_hash.read_failed");
    return { sha256: null, perceptual: null };
  }

  const sha256 = await calculateSha256(bytes);
  let perceptual: string | null = null;
  try {
    perceptual = await calculatePerceptualHash(bytes);
  } catch (err) {
    logger?.warn({ err }, "image_hash.perceptual_failed");
  }

  return { sha256, perceptual };
};
