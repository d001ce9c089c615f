import { beforeEach, describe, expect, it } from "vitest";
import { ContributorRepository } from "../contributorRepository";
import { SightingRepository } from "../sightingRepository";
import { createTestDb, newSighting } from "../../test/helpers";

describe("SightingRepository", () => {
  let sightings: SightingRepository;
  let contributors: ContributorRepository;
  let contributorId: number;

  beforeEach(() => {
    const db = createTestDb();
    sightings = new SightingRepository(db);
    contributors = new ContributorRepository(db);
    contributorId = contributors.getOrCreateByPhone("+15555550100").id;
  });

  describe("insert", () => {
    it("returns the stored sighting", () => {
      const result = sightings.insert(newSighting({ contributorId, imagePath: "/images/a.jpg" }));
      expect(result.status).toBe("inserted");
      if (result.status !== "inserted") return;
      expect(result.sighting).toMatchObject({
        licensePlate: "T999999C",
        imagePath: "/images/a.jpg",
        latitude: 40.7,
        longitude: -73.99,
        contributorId,
        postUri: null,
      });
    });

    it("reports a repeated image path as a duplicate without a second row", () => {
      sightings.insert(newSighting({ contributorId, imagePath: "/images/a.jpg" }));
      const again = sightings.insert(newSighting({ contributorId, imagePath: "/images/a.jpg", licensePlate: "T123457C" }));

      expect(again).toEqual({ status: "duplicate" });
      expect(sightings.totalCount()).toBe(1);
    });

    it("reports repeated image bytes under another path as a duplicate", () => {
      sightings.insert(newSighting({ contributorId, imagePath: "/images/a.jpg", imageHashSha256: "same-bytes" }));
      const again = sightings.insert(
        newSighting({ contributorId, imagePath: "/images/a.png", imageHashSha256: "same-bytes" })
      );

      expect(again).toEqual({ status: "duplicate" });
      expect(sightings.totalCount()).toBe(1);
    });

    it("allows any number of rows without a SHA-256", () => {
      sightings.insert(newSighting({ contributorId, imagePath: "/images/a.jpg" }));
      sightings.insert(newSighting({ contributorId, imagePath: "/images/b.jpg" }));
      expect(sightings.totalCount()).toBe(2);
    });

    it("propagates other constraint failures", () => {
      expect(() => sightings.insert(newSighting({ contributorId: 999, imagePath: "/images/b.jpg" }))).toThrow(
        /FOREIGN KEY/
      );
    });
  });

  describe("counts", () => {
    beforeEach(() => {
      const other = contributors.getOrCreateByPhone("+15555550199").id;
      sightings.insert(newSighting({ contributorId, licensePlate: "T999999C", imagePath: "/images/1.jpg" }));
      sightings.insert(newSighting({ contributorId, licensePlate: "T999999C", imagePath: "/images/2.jpg" }));
      sightings.insert(newSighting({ contributorId: other, licensePlate: "T123457C", imagePath: "/images/3.jpg" }));
      sightings.insert(newSighting({ contributorId: other, licensePlate: null, imagePath: "/images/4.jpg" }));
    });

    it("counts per plate, overall and per contributor", () => {
      expect(sightings.countForPlate("T999999C")).toBe(2);
      expect(sightings.countForPlate("T000000C")).toBe(0);
      expect(sightings.totalCount()).toBe(4);
      expect(sightings.countForContributor(contributorId)).toBe(2);
    });

    it("counts distinct plates, ignoring unreadable ones", () => {
      expect(sightings.uniqueSightedCount()).toBe(2);
      expect(sightings.uniquePostedCount()).toBe(0);
    });
  });

  describe("publishing bookkeeping", () => {
    it("lists unposted, plated sightings oldest first with contributor names", () => {
      contributors.updatePreferredName(contributorId, "Alex");
      sightings.insert(newSighting({ contributorId, imagePath: "/images/late.jpg", timestamp: "2025-06-02T08:00:00.000Z" }));
      sightings.insert(newSighting({ contributorId, imagePath: "/images/early.jpg", timestamp: "2025-06-01T08:00:00.000Z" }));
      sightings.insert(newSighting({ contributorId, imagePath: "/images/noplate.jpg", licensePlate: null }));

      const unposted = sightings.listUnposted();
      expect(unposted.map((s) => s.imagePath)).toEqual(["/images/early.jpg", "/images/late.jpg"]);
      expect(unposted[0].contributorPreferredName).toBe("Alex");
      expect(unposted[0].contributorBlueskyHandle).toBeNull();
      expect(sightings.listUnposted(1)).toHaveLength(1);
    });

    it("sets post_uri only once", () => {
      const result = sightings.insert(newSighting({ contributorId, imagePath: "/images/a.jpg" }));
      if (result.status !== "inserted") throw new Error("insert failed");
      const id = result.sighting.id;

      expect(sightings.markPosted(id, "at://post/1")).toBe(true);
      expect(sightings.markPosted(id, "at://post/2")).toBe(false);
      expect(sightings.findById(id)?.postUri).toBe("at://post/1");
      expect(sightings.postedCountForPlate("T999999C")).toBe(1);
      expect(sightings.uniquePostedCount()).toBe(1);
      expect(sightings.listUnposted()).toEqual([]);
    });

    it("marks a batch, skipping already posted rows", () => {
      const ids = ["/images/x.jpg", "/images/y.jpg", "/images/z.jpg"].map((imagePath) => {
        const result = sightings.insert(newSighting({ contributorId, imagePath }));
        if (result.status !== "inserted") throw new Error("insert failed");
        return result.sighting.id;
      });
      sightings.markPosted(ids[0], "at://post/earlier");

      expect(sightings.markBatchPosted(ids, "at://post/batch")).toBe(2);
      expect(sightings.findById(ids[0])?.postUri).toBe("at://post/earlier");
      expect(sightings.findById(ids[2])?.postUri).toBe("at://post/batch");
    });
  });

  describe("hash maintenance", () => {
    it("lists rows missing either hash and fills them without overwriting", () => {
      const complete = sightings.insert(
        newSighting({ contributorId, imagePath: "/images/c.jpg", imageHashSha256: "aa", imageHashPerceptual: "bb" })
      );
      const partial = sightings.insert(
        newSighting({ contributorId, imagePath: "/images/p.jpg", imageHashSha256: "cc", imageHashPerceptual: null })
      );
      if (complete.status !== "inserted" || partial.status !== "inserted") throw new Error("insert failed");

      expect(sightings.listMissingHashes(10).map((s) => s.id)).toEqual([partial.sighting.id]);

      sightings.updateHashes(partial.sighting.id, null, "ffffffffffffffff");
      const updated = sightings.findById(partial.sighting.id);
      expect(updated?.imageHashSha256).toBe("cc");
      expect(updated?.imageHashPerceptual).toBe("ffffffffffffffff");
      expect(sightings.listMissingHashes(10)).toEqual([]);
    });
  });
});
