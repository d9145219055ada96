// ============ Submission Types ============

/**
 * Activity classification reported by the client's activity recognizer.
 * Only the on-foot family may place markers.
 */
export enum ActivityType {
  ON_FOOT = 0,
  WALKING = 1,
  RUNNING = 2,
  ON_BICYCLE = 3,
  IN_VEHICLE = 4,
  STILL = 5,
  UNKNOWN = 6,
}

export interface SubmissionRequest {
  player: string; // lowercased 0x address
  lat1e6: number; // int (÷1e6 = degrees)
  lng1e6: number;
  stateHash: string; // 0x + 64 hex
  cityHash: string;
  landmark: string;
  activityType: number;
  speedKmh: number;
  stepsPerMin: number;
  timestamp: number; // logical clock, seconds
}

export type RejectionReason =
  | "OutOfBounds"
  | "InvalidActivity"
  | "SpeedTooHigh"
  | "CadenceTooLow"
  | "DuplicateLocation"
  | "CooldownActive"
  | "SystemPaused"
  | "InvalidPlayer";

export type QueryError = "IndexOutOfRange" | "NotFound";

export type AdminError = "Unauthorized" | "InvalidAddress";

/** Gate that turned a submission away. */
export type SubmissionGate = "pause" | "identity" | "geo" | "cooldown" | "dedup";

export type SubmissionState =
  | "received"
  | "geo_validated"
  | "cooldown_checked"
  | "dedup_checked"
  | "accepted";

export type SubmissionResult =
  | {
      status: "accepted";
      markerId: number;
      distanceMeters: number;
      firstMarker: boolean;
      globalRank: number | null;
      cityRank: number | null;
    }
  | {
      status: "rejected";
      reason: RejectionReason;
      step: SubmissionGate;
    };

export type ValidationResult = { ok: true } | { ok: false; reason: RejectionReason };

export type QueryResult<T> = { ok: true; value: T } | { ok: false; error: QueryError };

export type AdminResult = { ok: true } | { ok: false; error: AdminError };

// ============ Ledger Records ============

export interface Marker {
  readonly id: number;
  readonly player: string;
  readonly lat1e6: number;
  readonly lng1e6: number;
  readonly stateHash: string;
  readonly cityHash: string;
  readonly landmark: string;
  readonly activityType: number;
  readonly speedKmh: number;
  readonly stepsPerMin: number;
  readonly distanceMeters: number;
  readonly timestamp: number;
}

export type MarkerDraft = Omit<Marker, "id">;

export interface PlayerStats {
  totalMarkers: number;
  totalDistanceMeters: number;
  lastMarkerAt: number;
  lastLat1e6: number;
  lastLng1e6: number;
  homeState: string;
  homeCity: string;
  isRegistered: boolean;
  registeredAt: number;
}

export interface RegionStats {
  totalMarkers: number;
  totalPlayers: number;
  lastActivity: number;
}

export interface GlobalLeaderboardRow {
  player: string;
  markerCount: number;
  distanceMeters: number;
}

export interface CityLeaderboardRow {
  player: string;
  markerCount: number;
}

export interface LedgerRules {
  minLat1e6: number;
  maxLat1e6: number;
  minLng1e6: number;
  maxLng1e6: number;
  maxSpeedKmh: number;
  minStepsPerMin: number;
  cooldownSeconds: number;
  gridPrecision: number;
  leaderboardCapacity: number;
}

export interface AdminState {
  owner: string;
  paused: boolean;
}

// ============ Events ============

export type LedgerEvent =
  | {
      type: "player_registered";
      player: string;
      stateHash: string;
      cityHash: string;
      timestamp: number;
    }
  | {
      type: "marker_added";
      marker: Marker;
      totalDistanceMeters: number;
      globalRank: number | null;
      cityRank: number | null;
    }
  | { type: "paused"; by: string }
  | { type: "unpaused"; by: string }
  | { type: "ownership_transferred"; previousOwner: string; newOwner: string };

// ============ WebSocket Messages ============

export type WsClientMessage =
  | { type: "subscribe"; channel: "global" }
  | { type: "subscribe"; channel: "city"; cityHash: string }
  | { type: "unsubscribe" }
  | { type: "ping" };

export type WsServerMessage =
  | { type: "subscribed"; channel: string }
  | { type: "marker_added"; marker: Marker; totalDistanceMeters: number; globalRank: number | null; cityRank: number | null }
  | { type: "player_registered"; player: string; stateHash: string; cityHash: string; timestamp: number }
  | { type: "leaderboard"; scope: "global"; rows: GlobalLeaderboardRow[] }
  | { type: "leaderboard"; scope: "city"; cityHash: string; rows: CityLeaderboardRow[] }
  | { type: "paused"; paused: boolean }
  | { type: "pong" }
  | { type: "error"; error: string };

// ============ Rewards ============

export type RewardMintStatus = "pending" | "submitted" | "confirmed" | "failed";

export interface RewardMint {
  id: number;
  player: string;
  markerId: number;
  amount: string; // wei, decimal string
  txHash: string | null;
  status: RewardMintStatus;
  createdAt: number;
  confirmedAt: number | null;
  error: string | null;
}
