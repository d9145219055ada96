import type { PlayerStats } from "../utils/types.js";

interface PlayerRecord extends PlayerStats {
  markerIds: number[];
}

export class PlayerRegistry {
  private readonly players = new Map<string, PlayerRecord>();
  private distanceTotal = 0;

  /**
   * Create the player's record with a permanent home region.
   * Returns true only when a record was created.
   */
  registerIfNew(player: string, stateHash: string, cityHash: string, timestamp: number): boolean {
    if (this.players.has(player)) return false;
    this.players.set(player, {
      totalMarkers: 0,
      totalDistanceMeters: 0,
      lastMarkerAt: 0,
      lastLat1e6: 0,
      lastLng1e6: 0,
      homeState: stateHash,
      homeCity: cityHash,
      isRegistered: true,
      registeredAt: timestamp,
      markerIds: [],
    });
    return true;
  }

  recordMarker(
    player: string,
    markerId: number,
    distanceMeters: number,
    lat1e6: number,
    lng1e6: number,
    timestamp: number
  ): PlayerStats {
    const record = this.players.get(player);
    if (!record) {
      throw new Error(`recordMarker for unregistered player ${player}`);
    }
    record.totalMarkers += 1;
    record.totalDistanceMeters += distanceMeters;
    record.lastMarkerAt = timestamp;
    record.lastLat1e6 = lat1e6;
    record.lastLng1e6 = lng1e6;
    record.markerIds.push(markerId);
    this.distanceTotal += distanceMeters;
    return this.snapshot(record);
  }

  isRegistered(player: string): boolean {
    return this.players.has(player);
  }

  get(player: string): PlayerStats | null {
    const record = this.players.get(player);
    return record ? this.snapshot(record) : null;
  }

  distance(player: string): number {
    return this.players.get(player)?.totalDistanceMeters ?? 0;
  }

  markerIds(player: string): number[] {
    return [...(this.players.get(player)?.markerIds ?? [])];
  }

  count(): number {
    return this.players.size;
  }

  totalDistance(): number {
    return this.distanceTotal;
  }

  private snapshot(record: PlayerRecord): PlayerStats {
    const { markerIds: _ids, ...stats } = record;
    return stats;
  }
}
