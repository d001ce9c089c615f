import sharp from "sharp";
import { parse as parseExif } from "exifr";
import type { Logger } from "pino";

export interface ImageMetadata {
  /** ISO-8601; receipt time when the image carries no capture date */
  timestamp: string;
  latitude: number | null;
  longitude: number | null;
}

export interface ImageMetadataExtractor {
  /** Throws ImageUnreadableError only when the file is not a decodable image. */
  extract(imagePath: string): Promise<ImageMetadata>;
}

export class ImageUnreadableError extends Error {
  constructor(
    public readonly imagePath: string,
    options?: { cause?: unknown }
  ) {
    super(`Image at ${imagePath} could not be read`, options);
    this.name = "ImageUnreadableError";
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const finiteOrNull = (value: unknown): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null;

const captureDate = (tags: Record<string, unknown>): Date | null => {
  for (const key of ["DateTimeOriginal", "CreateDate", "DateTime"]) {
    const value = tags[key];
    if (value instanceof Date && !Number.isNaN(value.getTime())) return value;
  }
  return null;
};

export class ExifMetadataExtractor implements ImageMetadataExtractor {
  constructor(
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async extract(imagePath: string): Promise<ImageMetadata> {
    try {
      await sharp(imagePath).metadata();
    } catch (err) {
      throw new ImageUnreadableError(imagePath, { cause: err });
    }

    let tags: unknown = undefined;
    try {
      tags = await parseExif(imagePath, { tiff: true, exif: true, gps: true });
    } catch (err) {
      // Decodable image without parseable EXIF segments.
      this.logger.debug({ err, imagePath }, "exif.parse_failed");
    }

    if (!isRecord(tags)) {
      return { timestamp: this.clock().toISOString(), latitude: null, longitude: null };
    }

    const latitude = finiteOrNull(tags.latitude);
    const longitude = finiteOrNull(tags.longitude);
    const hasGps = latitude !== null && longitude !== null;

    return {
      timestamp: (captureDate(tags) ?? this.clock()).toISOString(),
      latitude: hasGps ? latitude : null,
      longitude: hasGps ? longitude : null,
    };
  }
}
