import { Router } from "express";
import { walletAuth } from "./middleware.js";
import { createHandlers } from "./handlers.js";
import type { LedgerStore } from "../ledger/store.js";

export function createRouter(store: LedgerStore): Router {
  const h = createHandlers(store);
  const router = Router();

  // Public
  router.get("/health", h.healthCheck);
  router.get("/api/stats", h.ledgerSummary);
  router.get("/api/markers", h.listMarkers);
  router.get("/api/markers/recent", h.recentMarkers);
  router.get("/api/markers/:id", h.markerDetail);
  router.get("/api/players/:address", h.playerInfo);
  router.get("/api/players/:address/cities/:city", h.playerCityMarkers);
  router.get("/api/players/:address/rewards", h.playerRewards);
  router.get("/api/leaderboard", h.globalLeaderboard);
  router.get("/api/cities/:city", h.cityStats);
  router.get("/api/cities/:city/leaderboard", h.cityLeaderboard);
  router.get("/api/states/:state", h.stateStats);

  // Authenticated
  router.post("/api/markers", walletAuth, h.submitMarkerHandler);

  // Admin (owner-only; ownership is checked by the ledger)
  router.post("/api/admin/pause", walletAuth, h.pause);
  router.post("/api/admin/unpause", walletAuth, h.unpause);
  router.post("/api/admin/transfer-ownership", walletAuth, h.transferOwnership);

  return router;
}
