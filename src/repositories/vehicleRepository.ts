import Database from "better-sqlite3";
import type { RegistryVehicle } from "../domain/vehicle";

interface VehicleRow {
  plate: string;
  vin: string | null;
  vehicle_year: number | null;
  owner_name: string | null;
  base_name: string | null;
  base_type: string | null;
  license_number: string | null;
  base_number: string | null;
  active: number;
  imported_at: number;
}

export type VehicleImport = Omit<RegistryVehicle, "importedAt" | "active"> & { active?: boolean };

const now = () => Date.now();

/** `*` matches exactly one character; LIKE metacharacters in the input are literal. */
export const wildcardToLike = (pattern: string): string =>
  pattern.replace(/[\\%_]/g, (ch) => `\\${ch}`).replace(/\*/g, "_");

export class VehicleRepository {
  constructor(private readonly db: Database.Database) {}

  findByPlate(plate: string): RegistryVehicle | undefined {
    const row = this.db
      .prepare<[string], VehicleRow>(`SELECT * FROM registry_vehicles WHERE plate = ?`)
      .get(plate);
    return row ? this.mapRow(row) : undefined;
  }

  searchWildcard(pattern: string, limit: number): string[] {
    return this.db
      .prepare<{ pattern: string; limit: number }, { plate: string }>(
        `SELECT plate FROM registry_vehicles
         WHERE plate LIKE @pattern ESCAPE '\\'
         ORDER BY plate ASC
         LIMIT @limit`
      )
      .all({ pattern: wildcardToLike(pattern), limit })
      .map((row) => row.plate);
  }

  /** Plates of exactly `length` characters, plate order. */
  listPlatesOfLength(length: number): string[] {
    return this.db
      .prepare<[number], { plate: string }>(
        `SELECT plate FROM registry_vehicles WHERE length(plate) = ? ORDER BY plate ASC`
      )
      .all(length)
      .map((row) => row.plate);
  }

  upsertMany(vehicles: VehicleImport[]): number {
    const stmt = this.db.prepare(
      `INSERT INTO registry_vehicles (
        plate, vin, vehicle_year, owner_name, base_name, base_type, license_number,
        base_number, active, imported_at
      ) VALUES (@plate, @vin, @vehicle_year, @owner_name, @base_name, @base_type, @license_number,
        @base_number, @active, @imported_at)
      ON CONFLICT(plate) DO UPDATE SET
        vin = excluded.vin,
        vehicle_year = excluded.vehicle_year,
        owner_name = excluded.owner_name,
        base_name = excluded.base_name,
        base_type = excluded.base_type,
        license_number = excluded.license_number,
        base_number = excluded.base_number,
        active = excluded.active,
        imported_at = excluded.imported_at`
    );

    const run = this.db.transaction((batch: VehicleImport[]) => {
      const importedAt = now();
      for (const vehicle of batch) {
        stmt.run({
          plate: vehicle.plate.trim().toUpperCase(),
          vin: vehicle.vin,
          vehicle_year: vehicle.vehicleYear,
          owner_name: vehicle.ownerName,
          base_name: vehicle.baseName,
          base_type: vehicle.baseType,
          license_number: vehicle.licenseNumber,
          base_number: vehicle.baseNumber,
          active: vehicle.active === false ? 0 : 1,
          imported_at: importedAt,
        });
      }
      return batch.length;
    });

    return run(vehicles);
  }

  count(): number {
    const row = this.db
      .prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM registry_vehicles`)
      .get();
    return row?.total ?? 0;
  }

  private mapRow(row: VehicleRow): RegistryVehicle {
    return {
      plate: row.plate,
      vin: row.vin,
      vehicleYear: row.vehicle_year,
      ownerName: row.owner_name,
      baseName: row.base_name,
      baseType: row.base_type,
      licenseNumber: row.license_number,
      baseNumber: row.base_number,
      active: row.active === 1,
      importedAt: row.imported_at,
    };
  }
}
