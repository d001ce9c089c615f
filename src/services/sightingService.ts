/**
 * SightingService: the commit step shared by every conversation path.
 *
 * Inserts the sighting and reports exact duplicates as a result. Near
 * duplicates never block the insert; they come back on the committed result
 * and are logged for operators.
 */

import type { Logger } from "pino";
import type { Contributor } from "../domain/contributor";
import type { Sighting, SimilarImage } from "../domain/sighting";
import type { ContributorRepository } from "../repositories/contributorRepository";
import type { SightingRepository } from "../repositories/sightingRepository";
import type { DuplicateDetector } from "./duplicateDetector";
import { computeImageHashes } from "./imageHashing";

export interface CommitInput {
  phoneNumber: string;
  plate: string;
  imagePath: string;
  timestamp: string;
  latitude: number | null;
  longitude: number | null;
}

export interface SightingStats {
  /** this plate's cumulative sightings, including the new one */
  plateCount: number;
  totalCount: number;
  contributorCount: number;
}

export type CommitResult =
  | {
      status: "committed";
      sighting: Sighting;
      contributor: Contributor;
      stats: SightingStats;
      /** earlier sightings within the perceptual-hash threshold, nearest first */
      nearDuplicates: SimilarImage[];
    }
  | { status: "duplicate"; contributor: Contributor };

export class SightingService {
  constructor(
    private readonly sightings: SightingRepository,
    private readonly contributors: ContributorRepository,
    private readonly duplicateDetector: DuplicateDetector,
    private readonly logger: Logger
  ) {}

  async commit(input: CommitInput): Promise<CommitResult> {
    const contributor = this.contributors.getOrCreateByPhone(input.phoneNumber);
    const hashes = await computeImageHashes(input.imagePath, this.logger);

    const result = this.sightings.insert({
      licensePlate: input.plate,
      timestamp: input.timestamp,
      latitude: input.latitude,
      longitude: input.longitude,
      imagePath: input.imagePath,
      contributorId: contributor.id,
      imageHashSha256: hashes.sha256,
      imageHashPerceptual: hashes.perceptual,
    });

    if (result.status === "duplicate") {
      this.logger.warn({ plate: input.plate, imagePath: input.imagePath }, "sighting.exact_duplicate");
      return { status: "duplicate", contributor };
    }

    const { sighting } = result;
    this.logger.info({ sightingId: sighting.id, plate: sighting.licensePlate }, "sighting.committed");

    const nearDuplicates = sighting.imageHashPerceptual
      ? this.findNearDuplicates(sighting.id, sighting.imageHashPerceptual)
      : [];

    return {
      status: "committed",
      sighting,
      contributor,
      stats: this.statsFor(input.plate, contributor.id),
      nearDuplicates,
    };
  }

  statsFor(plate: string, contributorId: number): SightingStats {
    return {
      plateCount: this.sightings.countForPlate(plate),
      totalCount: this.sightings.totalCount(),
      contributorCount: this.sightings.countForContributor(contributorId),
    };
  }

  private findNearDuplicates(sightingId: number, perceptualHash: string): SimilarImage[] {
    try {
      const similar = this.duplicateDetector.findSimilar(perceptualHash, undefined, sightingId);
      if (similar.length > 0) {
        this.logger.warn(
          { sightingId, matches: similar.slice(0, 5), nearest: similar[0].distance },
          "sighting.near_duplicate"
        );
      }
      return similar;
    } catch (err) {
      this.logger.warn({ err, sightingId }, "sighting.near_duplicate_check_failed");
      return [];
    }
  }
}
