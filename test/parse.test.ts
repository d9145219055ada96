import { describe, expect, it } from "vitest";
import { parseIntParam, parseSubmissionBody, resolveRegion } from "../src/api/parse.js";
import { regionHash } from "../src/utils/crypto.js";

const validBody = {
  lat: 12.971599,
  lng: 77.594566,
  state: "Karnataka",
  city: "Bengaluru",
  landmark: "  Cubbon Park ",
  activityType: 1,
  speedKmh: 5,
  stepsPerMin: 80,
};

describe("region resolution", () => {
  it("hashes canonical names after trimming and lowercasing", () => {
    expect(resolveRegion(" Bengaluru ")).toBe(regionHash("bengaluru"));
    expect(regionHash("BENGALURU")).toBe(regionHash("bengaluru"));
  });

  it("passes hashes through lowercased", () => {
    const hash = `0x${"AB".repeat(32)}`;
    expect(resolveRegion(hash)).toBe(`0x${"ab".repeat(32)}`);
  });

  it("rejects empty and non-string values", () => {
    expect(resolveRegion("   ")).toBeNull();
    expect(resolveRegion(42)).toBeNull();
    expect(resolveRegion(undefined)).toBeNull();
  });
});

describe("submission body parsing", () => {
  it("accepts degrees and region names", () => {
    expect(parseSubmissionBody(validBody)).toEqual({
      ok: true,
      value: {
        lat1e6: 12_971_599,
        lng1e6: 77_594_566,
        stateHash: regionHash("karnataka"),
        cityHash: regionHash("bengaluru"),
        landmark: "Cubbon Park",
        activityType: 1,
        speedKmh: 5,
        stepsPerMin: 80,
      },
    });
  });

  it("prefers fixed-point coordinates and hashes when given", () => {
    const cityHash = regionHash("mysuru");
    const result = parseSubmissionBody({
      ...validBody,
      lat1e6: "12295000",
      lng1e6: 76_639_000,
      cityHash,
      landmark: undefined,
    });
    expect(result.ok && result.value).toMatchObject({
      lat1e6: 12_295_000,
      lng1e6: 76_639_000,
      cityHash,
      landmark: "Unknown",
    });
  });

  it("leaves rule checks to the ledger", () => {
    const result = parseSubmissionBody({ ...validBody, speedKmh: 90, activityType: 4 });
    expect(result.ok).toBe(true);
  });

  it("reports the first malformed field", () => {
    expect(parseSubmissionBody(null)).toEqual({ ok: false, error: "Body must be a JSON object" });
    expect(parseSubmissionBody([])).toEqual({ ok: false, error: "Body must be a JSON object" });
    expect(parseSubmissionBody({ ...validBody, lat: 91 })).toEqual({ ok: false, error: "Invalid latitude" });
    expect(parseSubmissionBody({ ...validBody, lng: "east" })).toEqual({ ok: false, error: "Invalid longitude" });
    expect(parseSubmissionBody({ ...validBody, lat1e6: 1.5 })).toEqual({ ok: false, error: "Invalid latitude" });
    expect(parseSubmissionBody({ ...validBody, state: "" })).toEqual({
      ok: false,
      error: "Missing state (stateHash or state name)",
    });
    expect(parseSubmissionBody({ ...validBody, city: undefined })).toEqual({
      ok: false,
      error: "Missing city (cityHash or city name)",
    });
    expect(parseSubmissionBody({ ...validBody, landmark: 7 })).toEqual({ ok: false, error: "Invalid landmark" });
    expect(parseSubmissionBody({ ...validBody, landmark: "x".repeat(65) })).toEqual({
      ok: false,
      error: "Landmark longer than 64 characters",
    });
    expect(parseSubmissionBody({ ...validBody, activityType: 256 })).toEqual({
      ok: false,
      error: "Invalid activityType",
    });
    expect(parseSubmissionBody({ ...validBody, speedKmh: -1 })).toEqual({ ok: false, error: "Invalid speedKmh" });
    expect(parseSubmissionBody({ ...validBody, stepsPerMin: "fast" })).toEqual({
      ok: false,
      error: "Invalid stepsPerMin",
    });
  });

  it("counts landmark length in code points", () => {
    const within = parseSubmissionBody({ ...validBody, landmark: "\u{1F3DE}".repeat(64) });
    expect(within.ok && [...within.value.landmark].length).toBe(64);
    expect(parseSubmissionBody({ ...validBody, landmark: "\u{1F3DE}".repeat(65) })).toEqual({
      ok: false,
      error: "Landmark longer than 64 characters",
    });
  });

  it("accepts a landmark of exactly 64 characters", () => {
    const result = parseSubmissionBody({ ...validBody, landmark: "y".repeat(64) });
    expect(result.ok && result.value.landmark).toBe("y".repeat(64));
  });
});

describe("integer query params", () => {
  it("clamps into range and falls back on junk", () => {
    expect(parseIntParam(undefined, 10, 0, 100)).toBe(10);
    expect(parseIntParam("25", 10, 0, 100)).toBe(25);
    expect(parseIntParam("500", 10, 0, 100)).toBe(100);
    expect(parseIntParam("-3", 10, 0, 100)).toBe(0);
    expect(parseIntParam("abc", 10, 0, 100)).toBe(10);
    expect(parseIntParam("1.5", 10, 0, 100)).toBe(10);
  });
});
