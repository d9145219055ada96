import { WebSocket } from "ws";
import { createLogger } from "../utils/logger.js";
import type { WsServerMessage } from "../utils/types.js";

const log = createLogger("rooms");

export const GLOBAL_CHANNEL = "global";

// channel ("global" or a city hash) -> subscribers
const channels = new Map<string, Set<WebSocket>>();

// ws -> channel (reverse lookup)
const subscriptionMap = new WeakMap<WebSocket, string>();

/**
 * Subscribe a connection to a channel. A connection follows one channel at
 * a time; subscribing again moves it.
 */
export function subscribe(channel: string, ws: WebSocket): void {
  unsubscribe(ws);

  let room = channels.get(channel);
  if (!room) {
    room = new Set();
    channels.set(channel, room);
  }
  room.add(ws);
  subscriptionMap.set(ws, channel);

  log.info({ channel, subscribers: room.size }, "Subscriber joined");
}

/**
 * Remove a connection from its channel, if any.
 */
export function unsubscribe(ws: WebSocket): void {
  const channel = subscriptionMap.get(ws);
  if (channel === undefined) return;
  subscriptionMap.delete(ws);

  const room = channels.get(channel);
  if (room) {
    room.delete(ws);
    if (room.size === 0) {
      channels.delete(channel);
    }
  }
  log.info({ channel }, "Subscriber left");
}

export function hasSubscribers(channel: string): boolean {
  return channels.has(channel);
}

/**
 * Send a message to every open connection on a channel.
 */
export function broadcast(channel: string, message: WsServerMessage): void {
  const room = channels.get(channel);
  if (!room) return;

  const payload = JSON.stringify(message);
  for (const ws of room) {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(payload);
    }
  }
}

export function send(ws: WebSocket, message: WsServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

export function getRoomStats(): {
  channels: number;
  globalSubscribers: number;
  citySubscribers: number;
} {
  let globalSubscribers = 0;
  let citySubscribers = 0;
  for (const [channel, room] of channels) {
    if (channel === GLOBAL_CHANNEL) {
      globalSubscribers += room.size;
    } else {
      citySubscribers += room.size;
    }
  }
  return { channels: channels.size, globalSubscribers, citySubscribers };
}
