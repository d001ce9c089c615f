/**
 * Content-addressed image storage on local disk.
 *
 * Files are named `<sha256>.<ext>` with the extension taken from the bytes,
 * so the same bytes always map to the same path whatever content type the
 * sender declared.
 */

import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import sharp from "sharp";
import type { Logger } from "pino";

export interface StoredImage {
  path: string;
  sha256: string;
  /** false when an identical file was already on disk */
  created: boolean;
}

export interface ImageStorage {
  save(bytes: Buffer): Promise<StoredImage>;
  remove(imagePath: string): Promise<void>;
}

const FORMAT_EXTENSIONS: Record<string, string> = {
  jpeg: "jpg",
  png: "png",
  webp: "webp",
  gif: "gif",
  heif: "heic",
  tiff: "tiff",
};

/** Extension for the format sharp detects in the bytes; "bin" when it cannot tell. */
export const sniffExtension = async (bytes: Buffer): Promise<string> => {
  try {
    const { format } = await sharp(bytes).metadata();
    return (format && FORMAT_EXTENSIONS[format]) || "bin";
  } catch {
    return "bin";
  }
};

export class ImageStore implements ImageStorage {
  constructor(
    private readonly rootDir: string,
    private readonly logger: Logger
  ) {}

  async save(bytes: Buffer): Promise<StoredImage> {
    const sha256 = createHash("sha256").update(bytes).digest("hex");
    const fileName = `${sha256}.${await sniffExtension(bytes)}`;
    const fullPath = path.resolve(this.rootDir, fileName);

    await fs.mkdir(this.rootDir, { recursive: true });

    try {
      // wx: fail if the file already exists
      await fs.writeFile(fullPath, bytes, { flag: "wx" });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") {
        this.logger.debug({ path: fullPath }, "image_store.exists");
        return { path: fullPath, sha256, created: false };
      }
      throw err;
    }

    this.logger.info({ path: fullPath, bytes: bytes.length }, "image_store.saved");
    return { path: fullPath, sha256, created: true };
  }

  async remove(imagePath: string): Promise<void> {
    try {
      await fs.unlink(imagePath);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return;
      throw err;
    }
  }
}
