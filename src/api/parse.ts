import { degreesToContractCoord } from "../utils/geo.js";
import { isRegionHash, regionHash } from "../utils/crypto.js";
import type { SubmissionRequest } from "../utils/types.js";

export const MAX_LANDMARK_LENGTH = 64;
export const DEFAULT_LANDMARK = "Unknown";
const UINT16_MAX = 65_535;
const UINT8_MAX = 255;

export type SubmissionBody = Omit<SubmissionRequest, "player" | "timestamp">;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toInt(value: unknown): number | null {
  const num = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof num === "number" && Number.isSafeInteger(num) ? num : null;
}

/**
 * Accepts a 0x-prefixed 32-byte hash or a canonical region name.
 * Names are hashed; hashes are lowercased.
 */
export function resolveRegion(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (trimmed.length === 0) return null;
  const lower = trimmed.toLowerCase();
  return isRegionHash(lower) ? lower : regionHash(trimmed);
}

function parseCoordinate(
  body: Record<string, unknown>,
  intKey: string,
  degreesKey: string,
  maxDegrees: number
): number | null {
  if (body[intKey] != null) {
    return toInt(body[intKey]);
  }
  const degrees = Number(body[degreesKey]);
  if (body[degreesKey] == null || !Number.isFinite(degrees)) return null;
  if (degrees < -maxDegrees || degrees > maxDegrees) return null;
  return degreesToContractCoord(degrees);
}

/**
 * Shape-check a POST /api/markers body. Rule checks (bounds, speed,
 * cadence) are left to the ledger so they report ledger reasons.
 */
export function parseSubmissionBody(body: unknown): ParseResult<SubmissionBody> {
  if (!isRecord(body)) {
    return { ok: false, error: "Body must be a JSON object" };
  }

  const lat1e6 = parseCoordinate(body, "lat1e6", "lat", 90);
  if (lat1e6 === null) return { ok: false, error: "Invalid latitude" };

  const lng1e6 = parseCoordinate(body, "lng1e6", "lng", 180);
  if (lng1e6 === null) return { ok: false, error: "Invalid longitude" };

  const stateHash = resolveRegion(body.stateHash ?? body.state);
  if (!stateHash) return { ok: false, error: "Missing state (stateHash or state name)" };

  const cityHash = resolveRegion(body.cityHash ?? body.city);
  if (!cityHash) return { ok: false, error: "Missing city (cityHash or city name)" };

  let landmark = DEFAULT_LANDMARK;
  if (body.landmark != null) {
    if (typeof body.landmark !== "string") return { ok: false, error: "Invalid landmark" };
    const trimmed = body.landmark.trim();
    // Limit is in code points, so astral characters count once
    if ([...trimmed].length > MAX_LANDMARK_LENGTH) {
      return { ok: false, error: `Landmark longer than ${MAX_LANDMARK_LENGTH} characters` };
    }
    if (trimmed.length > 0) landmark = trimmed;
  }

  const activityType = toInt(body.activityType);
  if (activityType === null || activityType < 0 || activityType > UINT8_MAX) {
    return { ok: false, error: "Invalid activityType" };
  }

  const speedKmh = toInt(body.speedKmh);
  if (speedKmh === null || speedKmh < 0 || speedKmh > UINT16_MAX) {
    return { ok: false, error: "Invalid speedKmh" };
  }

  const stepsPerMin = toInt(body.stepsPerMin);
  if (stepsPerMin === null || stepsPerMin < 0 || stepsPerMin > UINT16_MAX) {
    return { ok: false, error: "Invalid stepsPerMin" };
  }

  return {
    ok: true,
    value: { lat1e6, lng1e6, stateHash, cityHash, landmark, activityType, speedKmh, stepsPerMin },
  };
}

/**
 * Integer query parameter clamped to [min, max]; `fallback` when absent
 * or not a number.
 */
export function parseIntParam(value: unknown, fallback: number, min: number, max: number): number {
  const parsed = toInt(value);
  if (parsed === null) return fallback;
  return Math.max(min, Math.min(max, parsed));
}
