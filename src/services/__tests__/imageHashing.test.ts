import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  ImageHashError,
  calculatePerceptualHash,
  calculateSha256,
  computeImageHashes,
  hammingDistance,
} from "../imageHashing";
import { gradientImage, makeTempDir, silentLogger } from "../../test/helpers";

describe("calculateSha256", () => {
  it("hashes raw bytes", async () => {
    expect(await calculateSha256(Buffer.from("abc"))).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
  });

  it("gives the same digest for a file path", async () => {
    const file = path.join(makeTempDir(), "abc.bin");
    fs.writeFileSync(file, "abc");
    expect(await calculateSha256(file)).toBe(await calculateSha256(Buffer.from("abc")));
  });
});

describe("calculatePerceptualHash", () => {
  it("sets every bit when brightness rises left to right", async () => {
    expect(await calculatePerceptualHash(await gradientImage("increasing"))).toBe("ffffffffffffffff");
  });

  it("clears every bit when brightness falls", async () => {
    expect(await calculatePerceptualHash(await gradientImage("decreasing"))).toBe("0000000000000000");
  });

  it("clears every bit for a flat image", async () => {
    expect(await calculatePerceptualHash(await gradientImage("solid"))).toBe("0000000000000000");
  });

  it("survives JPEG recompression", async () => {
    const original = await calculatePerceptualHash(await gradientImage("increasing", "jpeg", 95));
    const recompressed = await calculatePerceptualHash(await gradientImage("increasing", "jpeg", 40));
    expect(hammingDistance(original, recompressed)).toBeLessThanOrEqual(5);
  });

  it("rejects bytes that are not an image", async () => {
    await expect(calculatePerceptualHash(Buffer.from("not an image"))).rejects.toBeInstanceOf(ImageHashError);
  });
});

describe("hammingDistance", () => {
  it("counts differing bits", () => {
    expect(hammingDistance("ffffffffffffffff", "0000000000000000")).toBe(64);
    expect(hammingDistance("0f", "0e")).toBe(1);
    expect(hammingDistance("a5", "a5")).toBe(0);
  });

  it("rejects hashes of different lengths", () => {
    expect(() => hammingDistance("ff", "fff")).toThrow(ImageHashError);
  });

  it("rejects non-hex input", () => {
    expect(() => hammingDistance("zz", "00")).toThrow(ImageHashError);
  });
});

describe("computeImageHashes", () => {
  it("returns both hashes for a real image", async () => {
    const bytes = await gradientImage("increasing");
    const hashes = await computeImageHashes(bytes, silentLogger());
    expect(hashes.sha256).toBe(await calculateSha256(bytes));
    expect(hashes.perceptual).toBe("ffffffffffffffff");
  });

  it("degrades the perceptual hash to null for a corrupt image", async () => {
    const hashes = await computeImageHashes(Buffer.from("corrupt"), silentLogger());
    expect(hashes.sha256).toBe(await calculateSha256(Buffer.from("corrupt")));
    expect(hashes.perceptual).toBeNull();
  });

  it("degrades both hashes to null for a missing file", async () => {
    const hashes = await computeImageHashes(path.join(makeTempDir(), "missing.jpg"), silentLogger());
    expect(hashes).toEqual({ sha256: null, perceptual: null });
  });
});
