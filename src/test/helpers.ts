/**
 * Shared fixtures for the Vitest suites: in-memory database with the real
 * migrations, a silent logger, generated images and fakes for the network
 * collaborators.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino, { type Logger } from "pino";
import sharp from "sharp";
import type { Database } from "better-sqlite3";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../migrate";
import type { NewSighting } from "../domain/sighting";
import type { VehicleImport } from "../repositories/vehicleRepository";
import type { Coordinates, Geocoder } from "../services/geocoder";
import type { ImageMetadata, ImageMetadataExtractor } from "../services/imageMetadata";
import type { MediaDownloader } from "../services/mediaDownloader";
import type { Notifier } from "../services/notifier";

export const silentLogger = (): Logger => pino({ level: "silent" });

export function createTestDb(): Database {
  const db = openDatabase(":memory:");
  runMigrations(db);
  return db;
}

export function makeTempDir(prefix = "sightings-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export const vehicle = (plate: string): VehicleImport => ({
  plate,
  vin: null,
  vehicleYear: 2021,
  ownerName: null,
  baseName: "TEST BASE",
  baseType: "BLACK-CAR",
  licenseNumber: null,
  baseNumber: null,
});

export const newSighting = (overrides: Partial<NewSighting> & { contributorId: number }): NewSighting => ({
  licensePlate: "T999999C",
  timestamp: "2025-06-01T12:00:00.000Z",
  latitude: 40.7,
  longitude: -73.99,
  imagePath: `/images/${Math.random().toString(16).slice(2)}.jpg`,
  imageHashSha256: null,
  imageHashPerceptual: null,
  ...overrides,
});

export type GradientKind = "increasing" | "decreasing" | "solid";

/** 90x80 RGB image whose brightness varies only along x. */
export async function gradientImage(
  kind: GradientKind,
  format: "png" | "jpeg" = "png",
  quality = 90
): Promise<Buffer> {
  const width = 90;
  const height = 80;
  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const ramp = Math.round((x * 255) / (width - 1));
      const value = kind === "increasing" ? ramp : kind === "decreasing" ? 255 - ramp : 128;
      const offset = (y * width + x) * 3;
      data[offset] = value;
      data[offset + 1] = value;
      data[offset + 2] = value;
    }
  }
  const image = sharp(data, { raw: { width, height, channels: 3 } });
  return format === "png" ? image.png().toBuffer() : image.jpeg({ quality }).toBuffer();
}

// -----------------------------------------------------------------------------
// Collaborator fakes
// -----------------------------------------------------------------------------

export class FakeMediaDownloader implements MediaDownloader {
  failing = false;
  readonly requested: string[] = [];
  private readonly bodies = new Map<string, Buffer>();

  /** Serve specific bytes for a URL; other URLs get bytes derived from the URL. */
  serve(url: string, bytes: Buffer): void {
    this.bodies.set(url, bytes);
  }

  async download(url: string): Promise<Buffer | null> {
    this.requested.push(url);
    if (this.failing) return null;
    return this.bodies.get(url) ?? Buffer.from(`image-bytes:${url}`);
  }
}

export class FakeMetadataExtractor implements ImageMetadataExtractor {
  result: ImageMetadata | Error = {
    timestamp: "2025-06-01T12:00:00.000Z",
    latitude: 40.7,
    longitude: -73.99,
  };
  readonly extracted: string[] = [];

  async extract(imagePath: string): Promise<ImageMetadata> {
    this.extracted.push(imagePath);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export class FakeGeocoder implements Geocoder {
  readonly queries: string[] = [];
  onGeocode: (() => void) | null = null;

  constructor(private readonly places: Record<string, Coordinates> = {}) {}

  async geocode(text: string): Promise<Coordinates | null> {
    this.queries.push(text);
    this.onGeocode?.();
    return this.places[text.trim().toLowerCase()] ?? null;
  }
}

export class RecordingNotifier implements Notifier {
  readonly messages: string[] = [];

  notify(message: string): void {
    this.messages.push(message);
  }
}
