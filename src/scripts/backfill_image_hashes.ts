/**
 * Backfill image hashes for existing sightings
 *
 * Usage:
 *   tsx src/scripts/backfill_image_hashes.ts [--db path/to/db] [--batch-size 100] [--dry-run]
 *
 * Computes SHA-256 and perceptual hashes for sightings stored before hashing
 * existed (or whose hashing failed at commit time) and writes them back.
 *
 * Options:
 *   --db          Path to SQLite database (default: SQLITE_DB)
 *   --batch-size  Rows fetched per query (default: 100)
 *   --dry-run     Compute hashes but do not write them
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import pino from "pino";
import { runtimeConfig } from "../config";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../migrate";
import { SightingRepository, isDuplicateImageError } from "../repositories/sightingRepository";
import { calculatePerceptualHash, calculateSha256 } from "../services/imageHashing";

export interface BackfillOptions {
  batchSize: number;
  dryRun: boolean;
}

export interface BackfillFailure {
  sightingId: number;
  imagePath: string;
  reason: string;
}

export interface BackfillSummary {
  processed: number;
  updated: number;
  failed: BackfillFailure[];
}

export async function backfillImageHashes(
  sightings: SightingRepository,
  options: BackfillOptions
): Promise<BackfillSummary> {
  const summary: BackfillSummary = { processed: 0, updated: 0, failed: [] };
  let afterId = 0;

  for (;;) {
    const batch = sightings.listMissingHashes(options.batchSize, afterId);
    if (batch.length === 0) break;

    for (const sighting of batch) {
      afterId = sighting.id;
      summary.processed++;

      if (!fs.existsSync(sighting.imagePath)) {
        summary.failed.push({ sightingId: sighting.id, imagePath: sighting.imagePath, reason: "File not found" });
        continue;
      }

      const sha256 = sighting.imageHashSha256 ?? (await calculateSha256(sighting.imagePath));
      let perceptual = sighting.imageHashPerceptual;
      if (!perceptual) {
        try {
          perceptual = await calculatePerceptualHash(sighting.imagePath);
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          summary.failed.push({ sightingId: sighting.id, imagePath: sighting.imagePath, reason });
        }
      }

      if (!options.dryRun) {
        try {
          sightings.updateHashes(sighting.id, sha256, perceptual);
        } catch (err) {
          if (!isDuplicateImageError(err)) throw err;
          // Same bytes as an already hashed sighting; keep the older row's claim on the hash.
          summary.failed.push({ sightingId: sighting.id, imagePath: sighting.imagePath, reason: "Duplicate image" });
          continue;
        }
      }
      summary.updated++;
    }
  }

  return summary;
}

function parseArgs(): { dbPath: string; batchSize: number; dryRun: boolean } {
  const args = process.argv.slice(2);
  let dbPath = runtimeConfig.sqlitePath;
  let batchSize = 100;
  let dryRun = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--db" && i + 1 < args.length) {
      dbPath = args[++i];
    } else if (arg === "--batch-size" && i + 1 < args.length) {
      batchSize = Number.parseInt(args[++i], 10);
    } else if (arg.startsWith("--batch-size=")) {
      batchSize = Number.parseInt(arg.slice("--batch-size=".length), 10);
    } else if (arg === "--dry-run") {
      dryRun = true;
    }
  }

  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error("--batch-size must be a positive integer");
  }

  return { dbPath, batchSize, dryRun };
}

async function main() {
  const { dbPath, batchSize, dryRun } = parseArgs();
  const logger = pino({ name: "backfill_image_hashes" });

  console.log("=== Image Hash Backfill ===");
  console.log(`Database: ${dbPath}`);
  console.log(`Batch size: ${batchSize}`);
  console.log(`Mode: ${dryRun ? "DRY RUN" : "COMMIT"}`);
  console.log();

  const db = openDatabase(dbPath);
  try {
    runMigrations(db, logger);
    const summary = await backfillImageHashes(new SightingRepository(db), { batchSize, dryRun });

    console.log(`Processed: ${summary.processed}`);
    console.log(`${dryRun ? "Would update" : "Updated"}: ${summary.updated}`);
    if (summary.failed.length > 0) {
      console.log(`Failures: ${summary.failed.length}`);
      for (const failure of summary.failed.slice(0, 10)) {
        console.log(`  #${failure.sightingId} ${failure.imagePath}: ${failure.reason}`);
      }
    }
  } finally {
    db.close();
  }
}

const invokedDirectly =
  process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  main().catch((err: unknown) => {
    console.error("Backfill failed:", err);
    process.exitCode = 1;
  });
}
