import Database from "better-sqlite3";
import type { Contributor } from "../domain/contributor";

interface ContributorRow {
  id: number;
  phone_number: string | null;
  bluesky_handle: string | null;
  preferred_name: string | null;
  created_at: number;
}

const now = () => Date.now();

export class ContributorRepository {
  constructor(private readonly db: Database.Database) {}

  getOrCreateByPhone(phoneNumber: string): Contributor {
    return this.getOrCreate("phone_number", phoneNumber);
  }

  getOrCreateByHandle(blueskyHandle: string): Contributor {
    return this.getOrCreate("bluesky_handle", blueskyHandle);
  }

  findByPhone(phoneNumber: string): Contributor | undefined {
    const row = this.db
      .prepare<[string], ContributorRow>(`SELECT * FROM contributors WHERE phone_number = ?`)
      .get(phoneNumber);
    return row ? this.mapRow(row) : undefined;
  }

  findByHandle(blueskyHandle: string): Contributor | undefined {
    const row = this.db
      .prepare<[string], ContributorRow>(`SELECT * FROM contributors WHERE bluesky_handle = ?`)
      .get(blueskyHandle);
    return row ? this.mapRow(row) : undefined;
  }

  updatePreferredName(id: number, preferredName: string | null): void {
    this.db
      .prepare(`UPDATE contributors SET preferred_name = @preferred_name WHERE id = @id`)
      .run({ id, preferred_name: preferredName });
  }

  count(): number {
    const row = this.db
      .prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM contributors`)
      .get();
    return row?.total ?? 0;
  }

  // Column names are fixed literals, never caller input.
  private getOrCreate(column: "phone_number" | "bluesky_handle", value: string): Contributor {
    const run = this.db.transaction((key: string) => {
      this.db
        .prepare(
          `INSERT INTO contributors (${column}, created_at) VALUES (@key, @created_at)
           ON CONFLICT(${column}) DO NOTHING`
        )
        .run({ key, created_at: now() });

      const row = this.db
        .prepare<[string], ContributorRow>(`SELECT * FROM contributors WHERE ${column} = ?`)
        .get(key);
      if (!row) {
        throw new Error(`Contributor missing after upsert (${column})`);
      }
      return this.mapRow(row);
    });
    return run.immediate(value);
  }

  private mapRow(row: ContributorRow): Contributor {
    return {
      id: row.id,
      phoneNumber: row.phone_number,
      blueskyHandle: row.bluesky_handle,
      preferredName: row.preferred_name,
      createdAt: row.created_at,
    };
  }
}
