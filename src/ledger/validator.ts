import { ALLOWED_ACTIVITIES } from "./rules.js";
import type { LedgerRules, ValidationResult } from "../utils/types.js";

/**
 * Coordinates are whole fixed-point units; fractional or non-finite values
 * are outside the box.
 */
export function isWithinBounds(rules: LedgerRules, lat1e6: number, lng1e6: number): boolean {
  return (
    Number.isSafeInteger(lat1e6) &&
    Number.isSafeInteger(lng1e6) &&
    lat1e6 >= rules.minLat1e6 &&
    lat1e6 <= rules.maxLat1e6 &&
    lng1e6 >= rules.minLng1e6 &&
    lng1e6 <= rules.maxLng1e6
  );
}

export function isAllowedActivity(activityType: number): boolean {
  return ALLOWED_ACTIVITIES.has(activityType);
}

export function isPlausibleSpeed(rules: LedgerRules, speedKmh: number): boolean {
  return speedKmh <= rules.maxSpeedKmh;
}

/**
 * Cadence floor applies only while moving; a zero-speed marker is exempt.
 */
export function isPlausibleCadence(
  rules: LedgerRules,
  speedKmh: number,
  stepsPerMin: number
): boolean {
  return speedKmh === 0 || stepsPerMin >= rules.minStepsPerMin;
}

/**
 * Geofence and anti-cheat checks for one submission.
 * Rules run in a fixed order; the first failure is the reported reason.
 */
export function validateSubmission(
  rules: LedgerRules,
  lat1e6: number,
  lng1e6: number,
  activityType: number,
  speedKmh: number,
  stepsPerMin: number
): ValidationResult {
  if (!isWithinBounds(rules, lat1e6, lng1e6)) {
    return { ok: false, reason: "OutOfBounds" };
  }
  if (!isAllowedActivity(activityType)) {
    return { ok: false, reason: "InvalidActivity" };
  }
  if (!isPlausibleSpeed(rules, speedKmh)) {
    return { ok: false, reason: "SpeedTooHigh" };
  }
  if (!isPlausibleCadence(rules, speedKmh, stepsPerMin)) {
    return { ok: false, reason: "CadenceTooLow" };
  }
  return { ok: true };
}
