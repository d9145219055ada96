import { validateSubmission } from "./validator.js";
import type { LedgerStore } from "./store.js";
import { normalizeAddress } from "../utils/crypto.js";
import { estimateDistance } from "../utils/geo.js";
import { createLogger } from "../utils/logger.js";
import type {
  Marker,
  MarkerDraft,
  RejectionReason,
  SubmissionGate,
  SubmissionRequest,
  SubmissionResult,
  SubmissionState,
} from "../utils/types.js";

const log = createLogger("pipeline");

interface CommitOutcome {
  markerId: number;
  firstMarker: boolean;
  totalDistanceMeters: number;
  globalRank: number | null;
  cityRank: number | null;
}

/**
 * Run one submission through the gates and, if every gate passes, apply it
 * to the store.
 *
 * Gates: pause → player address → geofence/anti-cheat → cooldown → grid
 * dedup. Gates only read; a rejection leaves the store exactly as it was.
 * Everything from the journal write to the last leaderboard upsert runs
 * synchronously, so no reader observes a half-applied marker.
 */
export function submitMarker(store: LedgerStore, request: SubmissionRequest): SubmissionResult {
  let state: SubmissionState = "received";

  const reject = (reason: RejectionReason, step: SubmissionGate): SubmissionResult => {
    log.debug({ player: request.player, reason, step, state }, "Submission rejected");
    return { status: "rejected", reason, step };
  };

  if (store.paused) {
    return reject("SystemPaused", "pause");
  }

  const player = normalizeAddress(request.player);
  if (!player) {
    return reject("InvalidPlayer", "identity");
  }

  const validation = validateSubmission(
    store.rules,
    request.lat1e6,
    request.lng1e6,
    request.activityType,
    request.speedKmh,
    request.stepsPerMin
  );
  if (!validation.ok) {
    return reject(validation.reason, "geo");
  }
  state = "geo_validated";

  const previous = store.players.get(player);
  if (previous && request.timestamp - previous.lastMarkerAt < store.rules.cooldownSeconds) {
    return reject("CooldownActive", "cooldown");
  }
  state = "cooldown_checked";

  if (store.grid.has(player, request.lat1e6, request.lng1e6)) {
    return reject("DuplicateLocation", "dedup");
  }
  state = "dedup_checked";

  const distanceMeters = previous
    ? estimateDistance(previous.lastLat1e6, previous.lastLng1e6, request.lat1e6, request.lng1e6)
    : 0;

  const draft: MarkerDraft = {
    player,
    lat1e6: request.lat1e6,
    lng1e6: request.lng1e6,
    stateHash: request.stateHash.toLowerCase(),
    cityHash: request.cityHash.toLowerCase(),
    landmark: request.landmark,
    activityType: request.activityType,
    speedKmh: request.speedKmh,
    stepsPerMin: request.stepsPerMin,
    distanceMeters,
    timestamp: request.timestamp,
  };

  const marker: Marker = { id: store.markers.length, ...draft };
  store.persistMarker(marker);
  const outcome = applyMarker(store, marker);
  state = "accepted";

  log.info(
    { player, markerId: outcome.markerId, distanceMeters, globalRank: outcome.globalRank, state },
    "Marker accepted"
  );

  if (outcome.firstMarker) {
    store.emit({
      type: "player_registered",
      player,
      stateHash: marker.stateHash,
      cityHash: marker.cityHash,
      timestamp: marker.timestamp,
    });
  }
  store.emit({
    type: "marker_added",
    marker,
    totalDistanceMeters: outcome.totalDistanceMeters,
    globalRank: outcome.globalRank,
    cityRank: outcome.cityRank,
  });

  return {
    status: "accepted",
    markerId: outcome.markerId,
    distanceMeters,
    firstMarker: outcome.firstMarker,
    globalRank: outcome.globalRank,
    cityRank: outcome.cityRank,
  };
}

/**
 * Apply an already-accepted marker to every aggregate.
 * Shared by live submissions and journal replay.
 */
function applyMarker(store: LedgerStore, marker: Marker): CommitOutcome {
  const { player, cityHash, stateHash, timestamp } = marker;

  // Both checks run before the first write, so a bad journal entry leaves
  // the store at the previous marker.
  if (marker.id !== store.markers.length) {
    throw new Error(`Marker id mismatch: expected ${store.markers.length}, got ${marker.id}`);
  }
  if (!store.grid.checkAndMark(player, marker.lat1e6, marker.lng1e6)) {
    throw new Error(`Grid cell already used by ${player} (marker ${marker.id})`);
  }

  const firstMarker = store.players.registerIfNew(player, stateHash, cityHash, timestamp);

  store.regions.recordCityVisit(player, cityHash, timestamp);
  store.regions.recordStateVisit(player, stateHash, timestamp);

  const { id: _id, ...draft } = marker;
  const markerId = store.markers.append(draft);

  const stats = store.players.recordMarker(
    player,
    markerId,
    marker.distanceMeters,
    marker.lat1e6,
    marker.lng1e6,
    timestamp
  );

  const globalRank = store.globalBoard.upsert(player, stats.totalMarkers);
  const cityRank = store.cityBoard(cityHash).upsert(
    player,
    store.regions.playerCityVisits(player, cityHash)
  );

  return {
    markerId,
    firstMarker,
    totalDistanceMeters: stats.totalDistanceMeters,
    globalRank,
    cityRank,
  };
}

/**
 * Rebuild every aggregate from a journal of accepted markers, in id order.
 * Replay does not write to the journal and does not emit events.
 */
export function restoreLedger(store: LedgerStore, markers: Iterable<Marker>): number {
  let restored = 0;
  for (const marker of markers) {
    if (marker.id !== store.markers.length) {
      throw new Error(`Journal gap: expected marker ${store.markers.length}, found ${marker.id}`);
    }
    applyMarker(store, marker);
    restored++;
  }
  log.info({ restored, players: store.totalPlayers() }, "Ledger restored from journal");
  return restored;
}
