import type { RegionStats } from "../utils/types.js";

interface RegionRecord extends RegionStats {
  players: string[];
}

function emptyRegion(): RegionRecord {
  return { totalMarkers: 0, totalPlayers: 0, lastActivity: 0, players: [] };
}

function visitKey(player: string, regionHash: string): string {
  return `${player}:${regionHash}`;
}

/**
 * One scope of region rollups (all cities, or all states).
 * Membership goes through the visit-counter map; the player list is
 * append-only and never scanned.
 */
class RegionScope {
  private readonly regions = new Map<string, RegionRecord>();
  private readonly visits = new Map<string, number>();

  record(player: string, regionHash: string, timestamp: number): boolean {
    let region = this.regions.get(regionHash);
    if (!region) {
      region = emptyRegion();
      this.regions.set(regionHash, region);
    }

    const key = visitKey(player, regionHash);
    const previous = this.visits.get(key) ?? 0;
    const firstVisit = previous === 0;
    this.visits.set(key, previous + 1);

    region.totalMarkers += 1;
    region.lastActivity = timestamp;
    if (firstVisit) {
      region.totalPlayers += 1;
      region.players.push(player);
    }
    return firstVisit;
  }

  visitCount(player: string, regionHash: string): number {
    return this.visits.get(visitKey(player, regionHash)) ?? 0;
  }

  stats(regionHash: string): RegionStats | null {
    const region = this.regions.get(regionHash);
    if (!region) return null;
    return {
      totalMarkers: region.totalMarkers,
      totalPlayers: region.totalPlayers,
      lastActivity: region.lastActivity,
    };
  }

  players(regionHash: string): string[] {
    return [...(this.regions.get(regionHash)?.players ?? [])];
  }
}

export class RegionAggregator {
  private readonly cities = new RegionScope();
  private readonly states = new RegionScope();

  /** Returns true on the player's first-ever marker in the city. */
  recordCityVisit(player: string, cityHash: string, timestamp: number): boolean {
    return this.cities.record(player, cityHash, timestamp);
  }

  recordStateVisit(player: string, stateHash: string, timestamp: number): boolean {
    return this.states.record(player, stateHash, timestamp);
  }

  playerCityVisits(player: string, cityHash: string): number {
    return this.cities.visitCount(player, cityHash);
  }

  playerStateVisits(player: string, stateHash: string): number {
    return this.states.visitCount(player, stateHash);
  }

  city(cityHash: string): RegionStats | null {
    return this.cities.stats(cityHash);
  }

  state(stateHash: string): RegionStats | null {
    return this.states.stats(stateHash);
  }

  cityPlayers(cityHash: string): string[] {
    return this.cities.players(cityHash);
  }

  statePlayers(stateHash: string): string[] {
    return this.states.players(stateHash);
  }
}
