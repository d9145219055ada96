import dotenv from "dotenv";

// Load .env file — supports DOTENV_CONFIG_PATH override
dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || ".env" });

import { DEFAULT_RULES } from "./ledger/rules.js";
import { createLogger } from "./utils/logger.js";
import type { LedgerRules } from "./utils/types.js";

const log = createLogger("config");

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    log.fatal(`Missing required environment variable: ${name}`);
    process.exit(1);
  }
  return value;
}

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function envInt(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (!raw) return defaultValue;
  const parsed = parseInt(raw, 10);
  if (isNaN(parsed)) {
    log.fatal(`Invalid integer for ${name}: ${raw}`);
    process.exit(1);
  }
  return parsed;
}

function envBool(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return defaultValue;
  return raw.toLowerCase() === "true" || raw === "1";
}

const rules: LedgerRules = {
  minLat1e6: envInt("BOUNDS_MIN_LAT", DEFAULT_RULES.minLat1e6),
  maxLat1e6: envInt("BOUNDS_MAX_LAT", DEFAULT_RULES.maxLat1e6),
  minLng1e6: envInt("BOUNDS_MIN_LNG", DEFAULT_RULES.minLng1e6),
  maxLng1e6: envInt("BOUNDS_MAX_LNG", DEFAULT_RULES.maxLng1e6),
  maxSpeedKmh: envInt("MAX_SPEED_KMH", DEFAULT_RULES.maxSpeedKmh),
  minStepsPerMin: envInt("MIN_STEPS_PER_MIN", DEFAULT_RULES.minStepsPerMin),
  cooldownSeconds: envInt("COOLDOWN_SECONDS", DEFAULT_RULES.cooldownSeconds),
  gridPrecision: envInt("GRID_PRECISION", DEFAULT_RULES.gridPrecision),
  leaderboardCapacity: DEFAULT_RULES.leaderboardCapacity,
};

if (rules.gridPrecision <= 0) {
  log.fatal(`GRID_PRECISION must be positive: ${rules.gridPrecision}`);
  process.exit(1);
}

export const config = {
  // Admin
  ownerAddress: requireEnv("OWNER_ADDRESS").toLowerCase(),
  startPaused: envBool("START_PAUSED", false),

  // Server
  port: envInt("PORT", 3000),
  host: optionalEnv("HOST", "0.0.0.0"),
  authMaxAgeSeconds: envInt("AUTH_MAX_AGE_SECONDS", 300),

  // Database
  dbPath: optionalEnv("DB_PATH", "./data/geomark-ledger.db"),

  // Ledger rules
  rules,

  // Reward token (minting disabled when no token address is set)
  rpcUrl: optionalEnv("RPC_URL", "http://127.0.0.1:8545"),
  chainId: envInt("CHAIN_ID", 5003), // Mantle Sepolia
  rewardTokenAddress: optionalEnv("REWARD_TOKEN_ADDRESS", ""),
  minterPrivateKey: optionalEnv("MINTER_PRIVATE_KEY", ""),
  rewardPerMarker: optionalEnv("REWARD_PER_MARKER", "1"),

  // Logging
  logLevel: optionalEnv("LOG_LEVEL", "info"),
} as const;

export type Config = typeof config;
