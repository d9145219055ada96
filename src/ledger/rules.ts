import { ActivityType, type LedgerRules } from "../utils/types.js";

export const LEADERBOARD_CAPACITY = 100;

/**
 * Default rule set: India bounding box, on-foot speeds, ~111 m grid.
 */
export const DEFAULT_RULES: LedgerRules = {
  minLat1e6: 6_000_000,
  maxLat1e6: 37_000_000,
  minLng1e6: 68_000_000,
  maxLng1e6: 98_000_000,
  maxSpeedKmh: 30,
  minStepsPerMin: 40,
  cooldownSeconds: 30,
  gridPrecision: 1000,
  leaderboardCapacity: LEADERBOARD_CAPACITY,
};

export const ALLOWED_ACTIVITIES: ReadonlySet<number> = new Set([
  ActivityType.ON_FOOT,
  ActivityType.WALKING,
  ActivityType.RUNNING,
]);
