import { describe, expect, it } from "vitest";
import { DEFAULT_RULES } from "../src/ledger/rules.js";
import {
  isAllowedActivity,
  isPlausibleCadence,
  isWithinBounds,
  validateSubmission,
} from "../src/ledger/validator.js";
import { ActivityType } from "../src/utils/types.js";

const rules = DEFAULT_RULES;

describe("geofence", () => {
  it("accepts the inclusive box edges", () => {
    expect(isWithinBounds(rules, 6_000_000, 68_000_000)).toBe(true);
    expect(isWithinBounds(rules, 37_000_000, 98_000_000)).toBe(true);
  });

  it("rejects coordinates that are not whole units", () => {
    expect(isWithinBounds(rules, 12_971_000.5, 77_594_000)).toBe(false);
    expect(isWithinBounds(rules, 12_971_000, Number.NaN)).toBe(false);
  });

  it("rejects anything outside the box", () => {
    expect(isWithinBounds(rules, 5_999_999, 70_000_000)).toBe(false);
    expect(isWithinBounds(rules, 37_000_001, 70_000_000)).toBe(false);
    expect(isWithinBounds(rules, 20_000_000, 67_999_999)).toBe(false);
    expect(isWithinBounds(rules, 20_000_000, 98_000_001)).toBe(false);
  });
});

describe("activity plausibility", () => {
  it("allows only the on-foot family", () => {
    expect(isAllowedActivity(ActivityType.ON_FOOT)).toBe(true);
    expect(isAllowedActivity(ActivityType.WALKING)).toBe(true);
    expect(isAllowedActivity(ActivityType.RUNNING)).toBe(true);
    expect(isAllowedActivity(ActivityType.ON_BICYCLE)).toBe(false);
    expect(isAllowedActivity(ActivityType.IN_VEHICLE)).toBe(false);
    expect(isAllowedActivity(255)).toBe(false);
  });

  it("exempts a stationary marker from the cadence floor", () => {
    expect(isPlausibleCadence(rules, 0, 0)).toBe(true);
    expect(isPlausibleCadence(rules, 1, 39)).toBe(false);
    expect(isPlausibleCadence(rules, 1, 40)).toBe(true);
  });
});

describe("validateSubmission", () => {
  const lat = 12_971_000;
  const lng = 77_594_000;

  it("passes a walking submission", () => {
    expect(validateSubmission(rules, lat, lng, ActivityType.WALKING, 10, 60)).toEqual({ ok: true });
  });

  it("rejects speed above the limit but not at it", () => {
    expect(validateSubmission(rules, lat, lng, ActivityType.RUNNING, 30, 160)).toEqual({ ok: true });
    expect(validateSubmission(rules, lat, lng, ActivityType.RUNNING, 31, 160)).toEqual({
      ok: false,
      reason: "SpeedTooHigh",
    });
  });

  it("rejects low cadence while moving", () => {
    expect(validateSubmission(rules, lat, lng, ActivityType.WALKING, 5, 20)).toEqual({
      ok: false,
      reason: "CadenceTooLow",
    });
  });

  it("reports the first failing rule", () => {
    expect(validateSubmission(rules, 2_000_000, 70_000_000, ActivityType.IN_VEHICLE, 90, 0)).toEqual({
      ok: false,
      reason: "OutOfBounds",
    });
    expect(validateSubmission(rules, lat, lng, ActivityType.IN_VEHICLE, 90, 0)).toEqual({
      ok: false,
      reason: "InvalidActivity",
    });
    expect(validateSubmission(rules, lat, lng, ActivityType.RUNNING, 90, 0)).toEqual({
      ok: false,
      reason: "SpeedTooHigh",
    });
  });
});
