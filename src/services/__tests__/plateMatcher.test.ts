import { beforeEach, describe, expect, it } from "vitest";
import { VehicleRepository } from "../../repositories/vehicleRepository";
import { PlateMatcher, normalizePlate, positionalDifferences } from "../plateMatcher";
import { createTestDb, silentLogger, vehicle } from "../../test/helpers";

describe("normalizePlate", () => {
  it("expands a bare six-digit entry to the T######C form", () => {
    expect(normalizePlate("123456")).toBe("T123456C");
  });

  it("uppercases and trims", () => {
    expect(normalizePlate("  t123456c ")).toBe("T123456C");
  });

  it("leaves pre-formatted and other-length input alone", () => {
    expect(normalizePlate("T123456C")).toBe("T123456C");
    expect(normalizePlate("1234567")).toBe("1234567");
    expect(normalizePlate("12345")).toBe("12345");
  });
});

describe("positionalDifferences", () => {
  it("counts differing positions for equal lengths", () => {
    expect(positionalDifferences("T123456C", "T123457C")).toBe(1);
    expect(positionalDifferences("T123456C", "T999456C")).toBe(3);
  });

  it("is infinite across lengths", () => {
    expect(positionalDifferences("T123456C", "T12345")).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("PlateMatcher", () => {
  let matcher: PlateMatcher;

  beforeEach(() => {
    const vehicles = new VehicleRepository(createTestDb());
    vehicles.upsertMany(
      ["T123457C", "T999456C", "T12345", "T999999C", "T7312580C", "T7399580C", "T7312581C"].map(vehicle)
    );
    matcher = new PlateMatcher(vehicles, silentLogger());
  });

  describe("validate", () => {
    it("returns the registry record for a known plate", () => {
      const result = matcher.validate("T999999C");
      expect(result.valid).toBe(true);
      expect(result.vehicle?.plate).toBe("T999999C");
      expect(result.vehicle?.baseName).toBe("TEST BASE");
    });

    it("reports absence as a normal result", () => {
      expect(matcher.validate("T000000C")).toEqual({ valid: false, vehicle: null });
    });
  });

  describe("findSimilar", () => {
    it("keeps only same-length plates within two differences", () => {
      expect(matcher.findSimilar("T123456C", 5)).toEqual(["T123457C"]);
    });

    it("ranks by difference count, ties in plate order", () => {
      const vehicles = new VehicleRepository(createTestDb());
      vehicles.upsertMany(["ZBCD", "ABXX", "AXCD", "ABCE", "ABCD"].map(vehicle));
      const local = new PlateMatcher(vehicles);

      expect(local.findSimilar("ABCD", 10)).toEqual(["ABCE", "AXCD", "ZBCD", "ABXX"]);
      expect(local.findSimilar("ABCD", 3)).toEqual(["ABCE", "AXCD", "ZBCD"]);
    });
  });

  describe("searchWildcard", () => {
    it("treats each * as exactly one character", () => {
      expect(matcher.searchWildcard("T73**580C", 5)).toEqual(["T7312580C", "T7399580C"]);
    });

    it("requires the pattern length to match", () => {
      expect(matcher.searchWildcard("T73*580C", 5)).toEqual([]);
    });

    it("treats SQL LIKE metacharacters literally", () => {
      expect(matcher.searchWildcard("T%", 5)).toEqual([]);
      expect(matcher.searchWildcard("T_23457C", 5)).toEqual([]);
    });
  });

  describe("suggest", () => {
    it("uses wildcard search when the input contains *", () => {
      expect(matcher.suggest("T73**580C", 5)).toEqual(["T7312580C", "T7399580C"]);
    });

    it("falls back to similarity search otherwise", () => {
      expect(matcher.suggest("T123456C", 5)).toEqual(["T123457C"]);
    });

    it("truncates to max", () => {
      expect(matcher.suggest("T73**580C", 1)).toEqual(["T7312580C"]);
      expect(matcher.suggest("T73**580C", 0)).toEqual([]);
    });
  });
});
