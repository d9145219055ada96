import type { WebSocket } from "ws";
import { GLOBAL_CHANNEL, send, subscribe, unsubscribe } from "./rooms.js";
import type { LedgerStore } from "../ledger/store.js";
import { isRegionHash } from "../utils/crypto.js";
import { createLogger } from "../utils/logger.js";
import type { WsClientMessage } from "../utils/types.js";

const log = createLogger("wsHandlers");

export const SNAPSHOT_ROWS = 10;

/**
 * Decode a client frame. Returns an error string for anything that is not
 * a known message.
 */
export function parseClientMessage(raw: string): WsClientMessage | string {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return "Invalid JSON";
  }
  if (typeof data !== "object" || data === null || !("type" in data)) {
    return "Missing message type";
  }

  switch (data.type) {
    case "ping":
      return { type: "ping" };
    case "unsubscribe":
      return { type: "unsubscribe" };
    case "subscribe": {
      const channel = "channel" in data ? data.channel : undefined;
      if (channel === "global") return { type: "subscribe", channel: "global" };
      if (channel === "city") {
        const cityHash = "cityHash" in data ? data.cityHash : undefined;
        if (typeof cityHash !== "string" || !isRegionHash(cityHash.toLowerCase())) {
          return "Invalid cityHash";
        }
        return { type: "subscribe", channel: "city", cityHash: cityHash.toLowerCase() };
      }
      return "Unknown channel";
    }
    default:
      return `Unknown message type: ${String(data.type)}`;
  }
}

/**
 * Handle an incoming WebSocket message.
 */
export function handleWsMessage(ws: WebSocket, raw: string, store: LedgerStore): void {
  const message = parseClientMessage(raw);
  if (typeof message === "string") {
    send(ws, { type: "error", error: message });
    return;
  }

  switch (message.type) {
    case "ping":
      send(ws, { type: "pong" });
      break;

    case "unsubscribe":
      unsubscribe(ws);
      break;

    case "subscribe":
      if (message.channel === "global") {
        subscribe(GLOBAL_CHANNEL, ws);
        send(ws, { type: "subscribed", channel: GLOBAL_CHANNEL });
        send(ws, {
          type: "leaderboard",
          scope: "global",
          rows: store.getGlobalLeaderboard(SNAPSHOT_ROWS),
        });
        send(ws, { type: "paused", paused: store.paused });
      } else {
        subscribe(message.cityHash, ws);
        send(ws, { type: "subscribed", channel: message.cityHash });
        send(ws, {
          type: "leaderboard",
          scope: "city",
          cityHash: message.cityHash,
          rows: store.getCityLeaderboard(message.cityHash, SNAPSHOT_ROWS),
        });
      }
      log.debug({ channel: message.channel }, "Subscription handled");
      break;
  }
}
