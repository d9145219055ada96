import Database from "better-sqlite3";
import { config } from "../config.js";
import { runMigrations } from "./migrations.js";
import { createLogger } from "../utils/logger.js";
import type { LedgerJournal } from "../ledger/store.js";
import type { AdminState, Marker, RewardMint, RewardMintStatus } from "../utils/types.js";

const log = createLogger("db");

let db: Database.Database | null = null;

/**
 * Initialize the database connection and run migrations.
 */
export function initDb(): Database.Database {
  db = new Database(config.dbPath);
  runMigrations(db);
  log.info({ path: config.dbPath }, "Database initialized");
  return db;
}

export function getDb(): Database.Database {
  if (!db) throw new Error("Database not initialized. Call initDb() first.");
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
    log.info("Database closed");
  }
}

// ============ Markers ============

interface MarkerRow {
  id: number;
  player: string;
  lat_1e6: number;
  lng_1e6: number;
  state_hash: string;
  city_hash: string;
  landmark: string;
  activity_type: number;
  speed_kmh: number;
  steps_per_min: number;
  distance_meters: number;
  timestamp: number;
}

function mapMarker(row: MarkerRow): Marker {
  return {
    id: row.id,
    player: row.player,
    lat1e6: row.lat_1e6,
    lng1e6: row.lng_1e6,
    stateHash: row.state_hash,
    cityHash: row.city_hash,
    landmark: row.landmark,
    activityType: row.activity_type,
    speedKmh: row.speed_kmh,
    stepsPerMin: row.steps_per_min,
    distanceMeters: row.distance_meters,
    timestamp: row.timestamp,
  };
}

export function insertMarker(marker: Marker): void {
  getDb()
    .prepare(
      `INSERT INTO markers (
        id, player, lat_1e6, lng_1e6, state_hash, city_hash, landmark,
        activity_type, speed_kmh, steps_per_min, distance_meters, timestamp
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      marker.id,
      marker.player,
      marker.lat1e6,
      marker.lng1e6,
      marker.stateHash,
      marker.cityHash,
      marker.landmark,
      marker.activityType,
      marker.speedKmh,
      marker.stepsPerMin,
      marker.distanceMeters,
      marker.timestamp
    );
}

export function getAllMarkers(): Marker[] {
  return (
    getDb().prepare("SELECT * FROM markers ORDER BY id ASC").all() as MarkerRow[]
  ).map(mapMarker);
}

export function getMarkerCount(): number {
  const row = getDb().prepare("SELECT COUNT(*) as count FROM markers").get() as { count: number };
  return row.count;
}

// ============ Admin State ============

export function getAdminState(): AdminState | null {
  const row = getDb()
    .prepare("SELECT owner, paused FROM ledger_state WHERE id = 1")
    .get() as { owner: string; paused: number } | undefined;
  if (!row) return null;
  return { owner: row.owner, paused: row.paused === 1 };
}

export function saveAdminState(state: AdminState): void {
  getDb()
    .prepare(
      `INSERT INTO ledger_state (id, owner, paused) VALUES (1, ?, ?)
       ON CONFLICT(id) DO UPDATE SET owner = excluded.owner, paused = excluded.paused`
    )
    .run(state.owner, state.paused ? 1 : 0);
}

// ============ Ledger Rules ============

/**
 * Grid precision the stored markers were deduplicated with. The first call
 * records `configured`; later calls return the stored value, since replaying
 * the journal under another precision can merge cells it already holds.
 */
export function resolveGridPrecision(configured: number): number {
  const row = getDb()
    .prepare("SELECT grid_precision FROM ledger_rules WHERE id = 1")
    .get() as { grid_precision: number } | undefined;

  if (!row) {
    getDb().prepare("INSERT INTO ledger_rules (id, grid_precision) VALUES (1, ?)").run(configured);
    return configured;
  }
  if (row.grid_precision !== configured) {
    log.warn(
      { configured, stored: row.grid_precision },
      "GRID_PRECISION differs from the stored journal; using the stored value"
    );
  }
  return row.grid_precision;
}

/**
 * Journal backed by this database: markers and admin state are written
 * here before the in-memory ledger changes.
 */
export const sqliteJournal: LedgerJournal = {
  appendMarker: insertMarker,
  saveAdminState,
};

// ============ Reward Mints ============

export function insertRewardMint(mint: Omit<RewardMint, "id">): number {
  const result = getDb()
    .prepare(
      `INSERT INTO reward_mints (player, marker_id, amount, tx_hash, status, created_at, confirmed_at, error)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      mint.player,
      mint.markerId,
      mint.amount,
      mint.txHash,
      mint.status,
      mint.createdAt,
      mint.confirmedAt,
      mint.error
    );
  return Number(result.lastInsertRowid);
}

export function updateRewardMint(
  id: number,
  updates: { txHash?: string; status?: RewardMintStatus; confirmedAt?: number; error?: string }
): void {
  let sql = "UPDATE reward_mints SET id = id";
  const params: unknown[] = [];

  if (updates.txHash !== undefined) {
    sql += ", tx_hash = ?";
    params.push(updates.txHash);
  }
  if (updates.status !== undefined) {
    sql += ", status = ?";
    params.push(updates.status);
  }
  if (updates.confirmedAt !== undefined) {
    sql += ", confirmed_at = ?";
    params.push(updates.confirmedAt);
  }
  if (updates.error !== undefined) {
    sql += ", error = ?";
    params.push(updates.error);
  }

  sql += " WHERE id = ?";
  params.push(id);

  getDb().prepare(sql).run(...params);
}

export function getRewardMints(player: string, limit = 50): RewardMint[] {
  const rows = getDb()
    .prepare(
      "SELECT * FROM reward_mints WHERE player = ? ORDER BY id DESC LIMIT ?"
    )
    .all(player.toLowerCase(), limit) as Record<string, unknown>[];
  return rows.map((row) => ({
    id: row.id as number,
    player: row.player as string,
    markerId: row.marker_id as number,
    amount: row.amount as string,
    txHash: row.tx_hash as string | null,
    status: row.status as RewardMintStatus,
    createdAt: row.created_at as number,
    confirmedAt: row.confirmed_at as number | null,
    error: row.error as string | null,
  }));
}
