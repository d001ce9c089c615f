import { beforeEach, describe, expect, it } from "vitest";
import { VehicleRepository, wildcardToLike } from "../vehicleRepository";
import { createTestDb, vehicle } from "../../test/helpers";

describe("wildcardToLike", () => {
  it("maps * to a single-character match and escapes LIKE metacharacters", () => {
    expect(wildcardToLike("T12**56C")).toBe("T12__56C");
    expect(wildcardToLike("A_B%C")).toBe("A\\_B\\%C");
  });
});

describe("VehicleRepository", () => {
  let vehicles: VehicleRepository;

  beforeEach(() => {
    vehicles = new VehicleRepository(createTestDb());
    vehicles.upsertMany(["T123456C", "T123457C", "T993456C", "t555555c", "T1234567C"].map(vehicle));
  });

  it("uppercases imported plates and upserts by plate", () => {
    expect(vehicles.findByPlate("T555555C")?.active).toBe(true);
    vehicles.upsertMany([{ ...vehicle("T555555C"), active: false }]);
    expect(vehicles.findByPlate("T555555C")?.active).toBe(false);
    expect(vehicles.count()).toBe(5);
  });

  it("matches exactly one character per *", () => {
    expect(vehicles.searchWildcard("T12345*C", 10)).toEqual(["T123456C", "T123457C"]);
    expect(vehicles.searchWildcard("T**3456C", 10)).toEqual(["T123456C", "T993456C"]);
    expect(vehicles.searchWildcard("T12345*C", 1)).toEqual(["T123456C"]);
  });

  it("lists plates of one length in plate order", () => {
    expect(vehicles.listPlatesOfLength(9)).toEqual(["T1234567C"]);
    expect(vehicles.listPlatesOfLength(8)).toEqual(["T123456C", "T123457C", "T555555C", "T993456C"]);
  });
});
