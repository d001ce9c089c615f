import type { Logger } from "pino";
import type { SimilarImage } from "../domain/sighting";
import type { SightingRepository } from "../repositories/sightingRepository";
import { hammingDistance } from "./imageHashing";

export const DEFAULT_NEAR_DUPLICATE_THRESHOLD = 5;

export class DuplicateDetector {
  constructor(
    private readonly sightings: SightingRepository,
    private readonly logger: Logger,
    private readonly defaultThreshold: number = DEFAULT_NEAR_DUPLICATE_THRESHOLD
  ) {}

  /**
   * Stored sightings whose perceptual hash is within `threshold` bits.
   * Nearest first; equal distances stay in insertion order.
   * Stored hashes that cannot be compared are skipped.
   */
  findSimilar(perceptualHash: string, threshold = this.defaultThreshold, excludeId?: number): SimilarImage[] {
    const matches: SimilarImage[] = [];

    for (const row of this.sightings.listWithPerceptualHash()) {
      if (excludeId !== undefined && row.id === excludeId) continue;

      let distance: number;
      try {
        distance = hammingDistance(perceptualHash, row.hash);
      } catch (err) {
        this.logger.debug({ err, sightingId: row.id }, "duplicate.hash_skipped");
        continue;
      }

      if (distance <= threshold) {
        matches.push({ id: row.id, imagePath: row.imagePath, distance });
      }
    }

    return matches.sort((a, b) => a.distance - b.distance);
  }
}
