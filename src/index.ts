import { createServer } from "http";
import { mkdirSync } from "fs";
import { dirname } from "path";
import express from "express";
import cors from "cors";
import { ethers } from "ethers";
import { config } from "./config.js";
import { createLogger } from "./utils/logger.js";
import {
  closeDb,
  getAdminState,
  getAllMarkers,
  initDb,
  resolveGridPrecision,
  saveAdminState,
  sqliteJournal,
} from "./db/queries.js";
import { LedgerStore } from "./ledger/store.js";
import { restoreLedger } from "./ledger/pipeline.js";
import { initWebSocketServer } from "./ws/server.js";
import { createRouter } from "./api/routes.js";
import { closeProviders, isRewardMintingEnabled } from "./blockchain/client.js";
import { createContractMinter } from "./blockchain/contract.js";
import { attachRewardMinting, createRewardQueue } from "./blockchain/rewards.js";
import type { RewardQueue } from "./blockchain/rewards.js";

const log = createLogger("main");

async function main(): Promise<void> {
  log.info("Geomark ledger starting...");

  // 1. Initialize database
  mkdirSync(dirname(config.dbPath), { recursive: true });
  initDb();

  // 2. Load admin state (first boot takes it from config)
  let admin = getAdminState();
  if (!admin) {
    admin = { owner: config.ownerAddress, paused: config.startPaused };
    saveAdminState(admin);
    log.info({ owner: admin.owner, paused: admin.paused }, "Admin state initialized from config");
  }

  // 3. Rebuild the in-memory ledger from the marker journal
  const store = new LedgerStore({
    owner: admin.owner,
    paused: admin.paused,
    rules: { ...config.rules, gridPrecision: resolveGridPrecision(config.rules.gridPrecision) },
    journal: sqliteJournal,
  });
  restoreLedger(store, getAllMarkers());

  // 4. Reward minting (optional)
  let rewardQueue: RewardQueue | null = null;
  if (isRewardMintingEnabled()) {
    rewardQueue = createRewardQueue(
      createContractMinter(),
      ethers.parseUnits(config.rewardPerMarker, 18)
    );
    attachRewardMinting(store, rewardQueue);
    log.info({ token: config.rewardTokenAddress, perMarker: config.rewardPerMarker }, "Reward minting enabled");
  } else {
    log.info("Reward minting disabled (REWARD_TOKEN_ADDRESS or MINTER_PRIVATE_KEY not set)");
  }

  // 5. Set up Express app
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(createRouter(store));

  // 6. HTTP + WebSocket servers
  const server = createServer(app);
  const wss = initWebSocketServer(server, store);

  server.listen(config.port, config.host, () => {
    log.info(
      { host: config.host, port: config.port },
      `Server listening on http://${config.host}:${config.port}`
    );
    log.info(`WebSocket available at ws://${config.host}:${config.port}/ws`);
    log.info(`Health check: http://${config.host}:${config.port}/health`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, "Shutting down...");

    wss.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    log.info("HTTP server closed");

    if (rewardQueue) {
      await rewardQueue.idle();
    }
    closeProviders();
    closeDb();
    log.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      log.error({ error: (err as Error).message }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((err) => {
  log.fatal({ error: err.message, stack: err.stack }, "Fatal error during startup");
  process.exit(1);
});
