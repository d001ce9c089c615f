import Database from "better-sqlite3";
import type { InsertSightingResult, NewSighting, Sighting, UnpostedSighting } from "../domain/sighting";

interface SightingRow {
  id: number;
  license_plate: string | null;
  timestamp: string;
  latitude: number | null;
  longitude: number | null;
  image_path: string;
  created_at: number;
  contributor_id: number;
  post_uri: string | null;
  image_hash_sha256: string | null;
  image_hash_perceptual: string | null;
}

interface UnpostedRow extends SightingRow {
  preferred_name: string | null;
  bluesky_handle: string | null;
}

const now = () => Date.now();

const DUPLICATE_IMAGE_COLUMNS = ["sightings.image_path", "sightings.image_hash_sha256"];

/** UNIQUE violation on either column that identifies the image bytes. */
export const isDuplicateImageError = (error: unknown): boolean => {
  if (!(error instanceof Error)) return false;
  const code = "code" in error ? error.code : undefined;
  return (
    code === "SQLITE_CONSTRAINT_UNIQUE" && DUPLICATE_IMAGE_COLUMNS.some((column) => error.message.includes(column))
  );
};

const countOf = (row: { total: number } | undefined) => row?.total ?? 0;

export class SightingRepository {
  constructor(private readonly db: Database.Database) {}

  /**
   * Insert a sighting. A repeated image_path or SHA-256 is reported as "duplicate";
   * any other database error propagates.
   */
  insert(input: NewSighting): InsertSightingResult {
    let info: Database.RunResult;
    try {
      info = this.db
        .prepare(
          `INSERT INTO sightings (
            license_plate, timestamp, latitude, longitude, image_path, created_at,
            contributor_id, image_hash_sha256, image_hash_perceptual
          ) VALUES (@license_plate, @timestamp, @latitude, @longitude, @image_path, @created_at,
            @contributor_id, @image_hash_sha256, @image_hash_perceptual)`
        )
        .run({
          license_plate: input.licensePlate,
          timestamp: input.timestamp,
          latitude: input.latitude,
          longitude: input.longitude,
          image_path: input.imagePath,
          created_at: now(),
          contributor_id: input.contributorId,
          image_hash_sha256: input.imageHashSha256,
          image_hash_perceptual: input.imageHashPerceptual,
        });
    } catch (error) {
      if (isDuplicateImageError(error)) {
        return { status: "duplicate" };
      }
      throw error;
    }

    const id = Number(info.lastInsertRowid);
    const sighting = this.findById(id);
    if (!sighting) {
      throw new Error(`Sighting ${id} missing after insert`);
    }
    return { status: "inserted", sighting };
  }

  findById(id: number): Sighting | undefined {
    const row = this.db.prepare<[number], SightingRow>(`SELECT * FROM sightings WHERE id = ?`).get(id);
    return row ? this.mapRow(row) : undefined;
  }

  countForPlate(plate: string): number {
    return countOf(
      this.db
        .prepare<[string], { total: number }>(`SELECT COUNT(*) AS total FROM sightings WHERE license_plate = ?`)
        .get(plate)
    );
  }

  totalCount(): number {
    return countOf(this.db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM sightings`).get());
  }

  countForContributor(contributorId: number): number {
    return countOf(
      this.db
        .prepare<[number], { total: number }>(`SELECT COUNT(*) AS total FROM sightings WHERE contributor_id = ?`)
        .get(contributorId)
    );
  }

  /** Distinct plates with at least one sighting. */
  uniqueSightedCount(): number {
    return countOf(
      this.db
        .prepare<[], { total: number }>(
          `SELECT COUNT(DISTINCT license_plate) AS total FROM sightings WHERE license_plate IS NOT NULL`
        )
        .get()
    );
  }

  /** Distinct plates with at least one published sighting. */
  uniquePostedCount(): number {
    return countOf(
      this.db
        .prepare<[], { total: number }>(
          `SELECT COUNT(DISTINCT license_plate) AS total FROM sightings
           WHERE license_plate IS NOT NULL AND post_uri IS NOT NULL`
        )
        .get()
    );
  }

  postedCountForPlate(plate: string): number {
    return countOf(
      this.db
        .prepare<[string], { total: number }>(
          `SELECT COUNT(*) AS total FROM sightings WHERE license_plate = ? AND post_uri IS NOT NULL`
        )
        .get(plate)
    );
  }

  /** Oldest capture first, with the contributor's display fields. */
  listUnposted(limit?: number): UnpostedSighting[] {
    const rows = this.db
      .prepare<{ limit: number }, UnpostedRow>(
        `SELECT s.*, c.preferred_name, c.bluesky_handle
         FROM sightings s
         JOIN contributors c ON c.id = s.contributor_id
         WHERE s.post_uri IS NULL AND s.license_plate IS NOT NULL
         ORDER BY s.timestamp ASC, s.id ASC
         LIMIT @limit`
      )
      .all({ limit: limit ?? -1 });

    return rows.map((row) => ({
      ...this.mapRow(row),
      contributorPreferredName: row.preferred_name,
      contributorBlueskyHandle: row.bluesky_handle,
    }));
  }

  /** Returns false when the sighting was already posted (or does not exist). */
  markPosted(id: number, postUri: string): boolean {
    const info = this.db
      .prepare(`UPDATE sightings SET post_uri = @post_uri WHERE id = @id AND post_uri IS NULL`)
      .run({ id, post_uri: postUri });
    return info.changes > 0;
  }

  markBatchPosted(ids: number[], postUri: string): number {
    const stmt = this.db.prepare(
      `UPDATE sightings SET post_uri = @post_uri WHERE id = @id AND post_uri IS NULL`
    );
    const run = this.db.transaction((batch: number[]) => {
      let changed = 0;
      for (const id of batch) {
        changed += stmt.run({ id, post_uri: postUri }).changes;
      }
      return changed;
    });
    return run(ids);
  }

  /** Rows eligible for near-duplicate comparison, insertion order. */
  listWithPerceptualHash(): Array<{ id: number; imagePath: string; hash: string }> {
    return this.db
      .prepare<[], { id: number; image_path: string; image_hash_perceptual: string }>(
        `SELECT id, image_path, image_hash_perceptual FROM sightings
         WHERE image_hash_perceptual IS NOT NULL
         ORDER BY id ASC`
      )
      .all()
      .map((row) => ({ id: row.id, imagePath: row.image_path, hash: row.image_hash_perceptual }));
  }

  listMissingHashes(limit: number, afterId = 0): Sighting[] {
    return this.db
      .prepare<{ limit: number; after_id: number }, SightingRow>(
        `SELECT * FROM sightings
         WHERE (image_hash_sha256 IS NULL OR image_hash_perceptual IS NULL) AND id > @after_id
         ORDER BY id ASC
         LIMIT @limit`
      )
      .all({ limit, after_id: afterId })
      .map((row) => this.mapRow(row));
  }

  /** Null arguments leave the stored value untouched. */
  updateHashes(id: number, sha256: string | null, perceptual: string | null): void {
    this.db
      .prepare(
        `UPDATE sightings
         SET image_hash_sha256 = COALESCE(@sha256, image_hash_sha256),
             image_hash_perceptual = COALESCE(@perceptual, image_hash_perceptual)
         WHERE id = @id`
      )
      .run({ id, sha256, perceptual });
  }

  private mapRow(row: SightingRow): Sighting {
    return {
      id: row.id,
      licensePlate: row.license_plate,
      timestamp: row.timestamp,
      latitude: row.latitude,
      longitude: row.longitude,
      imagePath: row.image_path,
      createdAt: row.created_at,
      contributorId: row.contributor_id,
      postUri: row.post_uri,
      imageHashSha256: row.image_hash_sha256,
      imageHashPerceptual: row.image_hash_perceptual,
    };
  }
}
