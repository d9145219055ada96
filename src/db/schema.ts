export const SCHEMA_VERSION = 1;

export const CREATE_TABLES = `
-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER NOT NULL
);

-- Accepted markers (append-only journal, replayed on startup)
CREATE TABLE IF NOT EXISTS markers (
  id              INTEGER PRIMARY KEY,
  player          TEXT NOT NULL,
  lat_1e6         INTEGER NOT NULL,
  lng_1e6         INTEGER NOT NULL,
  state_hash      TEXT NOT NULL,
  city_hash       TEXT NOT NULL,
  landmark        TEXT NOT NULL,
  activity_type   INTEGER NOT NULL,
  speed_kmh       INTEGER NOT NULL,
  steps_per_min   INTEGER NOT NULL,
  distance_meters INTEGER NOT NULL,
  timestamp       INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_markers_player ON markers(player);

-- Admin state (single row)
CREATE TABLE IF NOT EXISTS ledger_state (
  id     INTEGER PRIMARY KEY CHECK (id = 1),
  owner  TEXT NOT NULL,
  paused INTEGER NOT NULL DEFAULT 0
);

-- Rules the journal was accepted under (single row)
CREATE TABLE IF NOT EXISTS ledger_rules (
  id             INTEGER PRIMARY KEY CHECK (id = 1),
  grid_precision INTEGER NOT NULL
);

-- Reward mint log
CREATE TABLE IF NOT EXISTS reward_mints (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  player       TEXT NOT NULL,
  marker_id    INTEGER NOT NULL,
  amount       TEXT NOT NULL,
  tx_hash      TEXT,
  status       TEXT NOT NULL DEFAULT 'pending',
  created_at   INTEGER NOT NULL,
  confirmed_at INTEGER,
  error        TEXT
);

CREATE INDEX IF NOT EXISTS idx_reward_mints_player ON reward_mints(player);
CREATE INDEX IF NOT EXISTS idx_reward_mints_status ON reward_mints(status);
`;
