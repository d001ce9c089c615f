/**
 * PlateMatcher
 *
 * Validates user-typed plates against the registry and recovers from typos:
 * wildcard search when the user marks unknown characters with `*`, otherwise
 * a same-length similarity search (1-2 differing positions).
 */

import type { Logger } from "pino";
import type { PlateValidation } from "../domain/vehicle";
import type { VehicleRepository } from "../repositories/vehicleRepository";

const SIX_DIGITS = /^\d{6}$/;
const MAX_SIMILAR_DIFFERENCES = 2;

/**
 * Uppercase and trim. A bare six-digit entry is expanded to the
 * T######C for-hire plate form.
 */
export const normalizePlate = (input: string): string => {
  const plate = input.trim().toUpperCase();
  return SIX_DIGITS.test(plate) ? `T${plate}C` : plate;
};

/** Count of differing positions; Infinity when the lengths differ. */
export const positionalDifferences = (a: string, b: string): number => {
  if (a.length !== b.length) return Number.POSITIVE_INFINITY;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) diff++;
  }
  return diff;
};

export class PlateMatcher {
  constructor(
    private readonly vehicles: VehicleRepository,
    private readonly logger?: Logger
  ) {}

  validate(plate: string): PlateValidation {
    const vehicle = this.vehicles.findByPlate(plate);
    return vehicle ? { valid: true, vehicle } : { valid: false, vehicle: null };
  }

  searchWildcard(pattern: string, limit: number): string[] {
    return this.vehicles.searchWildcard(pattern, limit);
  }

  /**
   * Registry plates of the same length differing in 1-2 positions.
   * Fewest differences first; ties keep plate order.
   */
  findSimilar(plate: string, max: number): string[] {
    const candidates: Array<{ plate: string; diff: number }> = [];
    for (const candidate of this.vehicles.listPlatesOfLength(plate.length)) {
      const diff = positionalDifferences(plate, candidate);
      if (diff >= 1 && diff <= MAX_SIMILAR_DIFFERENCES) {
        candidates.push({ plate: candidate, diff });
      }
    }

    // Array.prototype.sort is stable, so equal diffs stay in plate order.
    candidates.sort((a, b) => a.diff - b.diff);
    return candidates.slice(0, max).map((c) => c.plate);
  }

  suggest(plate: string, max: number): string[] {
    if (max <= 0) return [];

    const raw = plate.includes("*") ? this.searchWildcard(plate, max) : this.findSimilar(plate, max);
    const suggestions = Array.from(new Set(raw)).slice(0, max);

    this.logger?.debug({ plate, count: suggestions.length }, "plate.suggestions");
    return suggestions;
  }
}
