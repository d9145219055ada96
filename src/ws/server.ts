import { WebSocketServer, WebSocket } from "ws";
import type { Server as HttpServer } from "http";
import { handleWsMessage, SNAPSHOT_ROWS } from "./handlers.js";
import { broadcast, GLOBAL_CHANNEL, hasSubscribers, unsubscribe } from "./rooms.js";
import type { LedgerStore } from "../ledger/store.js";
import { createLogger } from "../utils/logger.js";
import type { LedgerEvent } from "../utils/types.js";

const log = createLogger("ws");

/**
 * Fan ledger events out to subscribed channels. Leaderboard snapshots only
 * go to channels that currently have listeners.
 */
export function relayLedgerEvent(store: LedgerStore, event: LedgerEvent): void {
  switch (event.type) {
    case "player_registered":
      broadcast(GLOBAL_CHANNEL, { ...event });
      break;

    case "marker_added": {
      const cityHash = event.marker.cityHash;
      broadcast(GLOBAL_CHANNEL, { ...event });
      broadcast(cityHash, { ...event });
      if (event.globalRank !== null && hasSubscribers(GLOBAL_CHANNEL)) {
        broadcast(GLOBAL_CHANNEL, {
          type: "leaderboard",
          scope: "global",
          rows: store.getGlobalLeaderboard(SNAPSHOT_ROWS),
        });
      }
      if (event.cityRank !== null && hasSubscribers(cityHash)) {
        broadcast(cityHash, {
          type: "leaderboard",
          scope: "city",
          cityHash,
          rows: store.getCityLeaderboard(cityHash, SNAPSHOT_ROWS),
        });
      }
      break;
    }

    case "paused":
    case "unpaused":
      broadcast(GLOBAL_CHANNEL, { type: "paused", paused: event.type === "paused" });
      break;

    case "ownership_transferred":
      break;
  }
}

/**
 * Initialize the WebSocket server on the given HTTP server.
 */
export function initWebSocketServer(server: HttpServer, store: LedgerStore): WebSocketServer {
  const wss = new WebSocketServer({ server, path: "/ws" });

  wss.on("connection", (ws: WebSocket) => {
    log.debug("New WebSocket connection");

    ws.on("message", (data) => {
      try {
        handleWsMessage(ws, data.toString(), store);
      } catch (err) {
        log.error({ error: (err as Error).message }, "Error handling WS message");
      }
    });

    ws.on("close", () => {
      unsubscribe(ws);
      log.debug("WebSocket connection closed");
    });

    ws.on("error", (err) => {
      log.error({ error: err.message }, "WebSocket error");
      unsubscribe(ws);
    });

    // Send heartbeat ping every 30s
    const pingInterval = setInterval(() => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.ping();
      } else {
        clearInterval(pingInterval);
      }
    }, 30_000);

    ws.on("close", () => clearInterval(pingInterval));
  });

  const detach = store.subscribe((event) => relayLedgerEvent(store, event));
  wss.on("close", detach);

  log.info("WebSocket server initialized on /ws");
  return wss;
}
