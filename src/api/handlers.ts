import { readFileSync, statSync } from "fs";
import { hostname } from "os";
import type { Request, Response } from "express";
import { authenticatedAddress } from "./middleware.js";
import { parseIntParam, parseSubmissionBody, resolveRegion } from "./parse.js";
import { config } from "../config.js";
import { getRewardMints } from "../db/queries.js";
import { isRewardMintingEnabled } from "../blockchain/client.js";
import { getMinterAllowance } from "../blockchain/contract.js";
import { submitMarker } from "../ledger/pipeline.js";
import type { LedgerStore } from "../ledger/store.js";
import { createLogger } from "../utils/logger.js";
import { contractCoordToDegrees } from "../utils/geo.js";
import { normalizeAddress } from "../utils/crypto.js";
import { getRoomStats } from "../ws/rooms.js";
import type { AdminResult, Marker, QueryError } from "../utils/types.js";

const log = createLogger("api");
const HEALTH_RPC_TIMEOUT_MS = 1500;
const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 200;

function resolveAppVersion(): string {
  try {
    const packageJsonPath = new URL("../../package.json", import.meta.url);
    const parsed = JSON.parse(readFileSync(packageJsonPath, "utf8")) as { version?: unknown };
    if (typeof parsed.version === "string" && parsed.version.trim().length > 0) {
      return parsed.version;
    }
  } catch (err) {
    log.debug({ error: (err as Error).message }, "package.json not readable");
  }
  return "unknown";
}

const appVersion = resolveAppVersion();

export function serializeMarker(marker: Marker) {
  return {
    ...marker,
    lat: contractCoordToDegrees(marker.lat1e6),
    lng: contractCoordToDegrees(marker.lng1e6),
  };
}

function sendQueryError(res: Response, error: QueryError, what: string): void {
  res.status(404).json({ error: error === "NotFound" ? `${what} not found` : "Index out of range", reason: error });
}

function sendAdminResult(res: Response, result: AdminResult): void {
  if (result.ok) {
    res.json({ success: true });
    return;
  }
  res.status(result.error === "Unauthorized" ? 403 : 400).json({ error: result.error });
}

async function probeMinter(): Promise<Record<string, unknown>> {
  if (!isRewardMintingEnabled()) return { enabled: false };

  const probe = getMinterAllowance()
    .then((allowance) => ({
      ok: true as const,
      isMinter: allowance.isMinter,
      remaining: allowance.remaining.toString(),
    }))
    .catch((err) => ({ ok: false as const, error: (err as Error).message }));
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<{ ok: false; error: string }>((resolve) => {
    timer = setTimeout(
      () => resolve({ ok: false, error: `timeout_after_${HEALTH_RPC_TIMEOUT_MS}ms` }),
      HEALTH_RPC_TIMEOUT_MS
    );
  });
  const result = await Promise.race([probe, timeout]);
  clearTimeout(timer);
  return { enabled: true, tokenAddress: config.rewardTokenAddress, ...result };
}

/**
 * Request handlers bound to one ledger store.
 */
export function createHandlers(store: LedgerStore) {
  /**
   * GET /health
   */
  async function healthCheck(_req: Request, res: Response): Promise<void> {
    const nowMs = Date.now();

    let dbFileSizeBytes: number | null = null;
    try {
      dbFileSizeBytes = statSync(config.dbPath).size;
    } catch (err) {
      log.debug({ error: (err as Error).message }, "Database file not readable");
    }

    const rewards = await probeMinter();

    res.json({
      status: "ok",
      timestamp: nowMs,
      timestampIso: new Date(nowMs).toISOString(),
      uptimeSeconds: Math.floor(process.uptime()),
      app: {
        name: "geomark-ledger",
        version: appVersion,
        nodeEnv: process.env.NODE_ENV ?? "unknown",
        nodeVersion: process.version,
        hostname: hostname(),
      },
      ledger: {
        owner: store.owner,
        paused: store.paused,
        totalMarkers: store.totalMarkers(),
        totalPlayers: store.totalPlayers(),
        totalDistanceMeters: store.totalDistance(),
      },
      db: { path: config.dbPath, fileSizeBytes: dbFileSizeBytes },
      ws: getRoomStats(),
      rewards,
    });
  }

  /**
   * GET /api/stats
   */
  function ledgerSummary(_req: Request, res: Response): void {
    res.json({
      totalMarkers: store.totalMarkers(),
      totalPlayers: store.totalPlayers(),
      totalDistanceMeters: store.totalDistance(),
      paused: store.paused,
      owner: store.owner,
      rules: store.rules,
    });
  }

  /**
   * GET /api/markers?offset=&limit=
   */
  function listMarkers(req: Request, res: Response): void {
    const offset = parseIntParam(req.query.offset, 0, 0, Number.MAX_SAFE_INTEGER);
    const limit = parseIntParam(req.query.limit, DEFAULT_PAGE_SIZE, 1, MAX_PAGE_SIZE);
    const page = store.getMarkers(offset, limit);
    if (!page.ok) {
      sendQueryError(res, page.error, "Marker");
      return;
    }
    res.json({ total: store.totalMarkers(), offset, markers: page.value.map(serializeMarker) });
  }

  /**
   * GET /api/markers/recent?n=
   */
  function recentMarkers(req: Request, res: Response): void {
    const n = parseIntParam(req.query.n, 20, 1, MAX_PAGE_SIZE);
    res.json({ markers: store.recentMarkers(n).map(serializeMarker) });
  }

  /**
   * GET /api/markers/:id
   */
  function markerDetail(req: Request, res: Response): void {
    const id = parseIntParam(req.params.id, -1, -1, Number.MAX_SAFE_INTEGER);
    const result = store.getMarker(id);
    if (!result.ok) {
      sendQueryError(res, result.error, "Marker");
      return;
    }
    res.json(serializeMarker(result.value));
  }

  /**
   * GET /api/players/:address
   */
  function playerInfo(req: Request, res: Response): void {
    const address = normalizeAddress(req.params.address);
    if (!address) {
      res.status(400).json({ error: "Invalid address" });
      return;
    }
    const stats = store.getPlayerStats(address);
    const markerIds = store.getPlayerMarkerIds(address);
    if (!stats.ok || !markerIds.ok) {
      sendQueryError(res, "NotFound", "Player");
      return;
    }
    res.json({
      address,
      ...stats.value,
      globalRank: store.globalBoard.rankOf(address),
      markerIds: markerIds.value,
    });
  }

  /**
   * GET /api/players/:address/cities/:city
   */
  function playerCityMarkers(req: Request, res: Response): void {
    const address = normalizeAddress(req.params.address);
    const cityHash = resolveRegion(req.params.city);
    if (!address || !cityHash) {
      res.status(400).json({ error: "Invalid address or city" });
      return;
    }
    res.json({
      address,
      cityHash,
      markerCount: store.getPlayerCityMarkerCount(address, cityHash),
      cityRank: store.getCityRank(address, cityHash),
    });
  }

  /**
   * GET /api/players/:address/rewards
   */
  function playerRewards(req: Request, res: Response): void {
    const address = normalizeAddress(req.params.address);
    if (!address) {
      res.status(400).json({ error: "Invalid address" });
      return;
    }
    res.json({ address, mints: getRewardMints(address) });
  }

  /**
   * GET /api/cities/:city
   */
  function cityStats(req: Request, res: Response): void {
    const cityHash = resolveRegion(req.params.city);
    if (!cityHash) {
      res.status(400).json({ error: "Invalid city" });
      return;
    }
    const stats = store.getCityStats(cityHash);
    if (!stats.ok) {
      sendQueryError(res, stats.error, "City");
      return;
    }
    res.json({ cityHash, ...stats.value, players: store.getCityPlayers(cityHash) });
  }

  /**
   * GET /api/states/:state
   */
  function stateStats(req: Request, res: Response): void {
    const stateHash = resolveRegion(req.params.state);
    if (!stateHash) {
      res.status(400).json({ error: "Invalid state" });
      return;
    }
    const stats = store.getStateStats(stateHash);
    if (!stats.ok) {
      sendQueryError(res, stats.error, "State");
      return;
    }
    res.json({ stateHash, ...stats.value, players: store.getStatePlayers(stateHash) });
  }

  /**
   * GET /api/leaderboard?limit=
   */
  function globalLeaderboard(req: Request, res: Response): void {
    const limit = parseIntParam(req.query.limit, 10, 0, store.rules.leaderboardCapacity);
    res.json({ rows: store.getGlobalLeaderboard(limit) });
  }

  /**
   * GET /api/cities/:city/leaderboard?limit=
   */
  function cityLeaderboard(req: Request, res: Response): void {
    const cityHash = resolveRegion(req.params.city);
    if (!cityHash) {
      res.status(400).json({ error: "Invalid city" });
      return;
    }
    const limit = parseIntParam(req.query.limit, 10, 0, store.rules.leaderboardCapacity);
    res.json({ cityHash, rows: store.getCityLeaderboard(cityHash, limit) });
  }

  /**
   * POST /api/markers
   * Body: { lat|lat1e6, lng|lng1e6, state|stateHash, city|cityHash, landmark?,
   *         activityType, speedKmh, stepsPerMin }
   */
  function submitMarkerHandler(req: Request, res: Response): void {
    const player = authenticatedAddress(res);
    const parsed = parseSubmissionBody(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    try {
      const result = submitMarker(store, {
        ...parsed.value,
        player,
        timestamp: Math.floor(Date.now() / 1000),
      });

      if (result.status === "rejected") {
        res.status(400).json({
          error: `Marker rejected: ${result.reason}`,
          reason: result.reason,
          step: result.step,
        });
        return;
      }

      res.json({ success: true, ...result });
    } catch (err) {
      log.error({ player, error: (err as Error).message }, "Marker submission error");
      res.status(500).json({ error: "Internal server error" });
    }
  }

  /**
   * POST /api/admin/pause
   */
  function pause(_req: Request, res: Response): void {
    sendAdminResult(res, store.pause(authenticatedAddress(res)));
  }

  /**
   * POST /api/admin/unpause
   */
  function unpause(_req: Request, res: Response): void {
    sendAdminResult(res, store.unpause(authenticatedAddress(res)));
  }

  /**
   * POST /api/admin/transfer-ownership
   * Body: { newOwner }
   */
  function transferOwnership(req: Request, res: Response): void {
    const body: unknown = req.body;
    const newOwner =
      typeof body === "object" && body !== null && "newOwner" in body ? body.newOwner : undefined;
    // Ownership is checked before the address, so a missing field from a
    // non-owner still reports Unauthorized.
    sendAdminResult(
      res,
      store.transferOwnership(authenticatedAddress(res), typeof newOwner === "string" ? newOwner : "")
    );
  }

  return {
    healthCheck,
    ledgerSummary,
    listMarkers,
    recentMarkers,
    markerDetail,
    playerInfo,
    playerCityMarkers,
    playerRewards,
    cityStats,
    stateStats,
    globalLeaderboard,
    cityLeaderboard,
    submitMarkerHandler,
    pause,
    unpause,
    transferOwnership,
  };
}
