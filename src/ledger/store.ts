import { GridDedupIndex } from "./gridIndex.js";
import { RankedLeaderboard } from "./leaderboard.js";
import { MarkerLedger } from "./markerLedger.js";
import { PlayerRegistry } from "./playerRegistry.js";
import { RegionAggregator } from "./regionAggregator.js";
import { DEFAULT_RULES } from "./rules.js";
import { normalizeAddress } from "../utils/crypto.js";
import { createLogger } from "../utils/logger.js";
import type {
  AdminResult,
  AdminState,
  CityLeaderboardRow,
  GlobalLeaderboardRow,
  LedgerEvent,
  LedgerRules,
  Marker,
  PlayerStats,
  QueryResult,
  RegionStats,
} from "../utils/types.js";

const log = createLogger("ledger");

/**
 * Durable side of the store. Writes happen before the in-memory state
 * changes; a throwing journal aborts the operation.
 */
export interface LedgerJournal {
  appendMarker(marker: Marker): void;
  saveAdminState(state: AdminState): void;
}

export type LedgerListener = (event: LedgerEvent) => void;

export interface LedgerStoreOptions {
  owner: string;
  paused?: boolean;
  rules?: Partial<LedgerRules>;
  journal?: LedgerJournal;
}

/**
 * All ledger state behind one handle: player registry, region rollups,
 * grid index, marker log and leaderboards. Mutated only by the submission
 * pipeline and the admin methods below.
 */
export class LedgerStore {
  readonly rules: LedgerRules;
  readonly players = new PlayerRegistry();
  readonly regions = new RegionAggregator();
  readonly markers = new MarkerLedger();
  readonly grid: GridDedupIndex;
  readonly globalBoard: RankedLeaderboard;

  private readonly cityBoards = new Map<string, RankedLeaderboard>();
  private readonly listeners = new Set<LedgerListener>();
  private readonly journal: LedgerJournal | null;
  private admin: AdminState;

  constructor(options: LedgerStoreOptions) {
    const owner = normalizeAddress(options.owner);
    if (!owner) {
      throw new Error(`Invalid owner address: ${options.owner}`);
    }
    this.rules = { ...DEFAULT_RULES, ...options.rules };
    this.grid = new GridDedupIndex(this.rules.gridPrecision);
    this.globalBoard = new RankedLeaderboard(this.rules.leaderboardCapacity);
    this.journal = options.journal ?? null;
    this.admin = { owner, paused: options.paused ?? false };
  }

  get owner(): string {
    return this.admin.owner;
  }

  get paused(): boolean {
    return this.admin.paused;
  }

  cityBoard(cityHash: string): RankedLeaderboard {
    let board = this.cityBoards.get(cityHash);
    if (!board) {
      board = new RankedLeaderboard(this.rules.leaderboardCapacity);
      this.cityBoards.set(cityHash, board);
    }
    return board;
  }

  persistMarker(marker: Marker): void {
    this.journal?.appendMarker(marker);
  }

  // ============ Events ============

  subscribe(listener: LedgerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: LedgerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.error({ event: event.type, error: (err as Error).message }, "Ledger listener failed");
      }
    }
  }

  // ============ Queries ============

  totalMarkers(): number {
    return this.markers.length;
  }

  totalPlayers(): number {
    return this.players.count();
  }

  totalDistance(): number {
    return this.players.totalDistance();
  }

  getMarker(id: number): QueryResult<Marker> {
    const marker = this.markers.get(id);
    return marker ? { ok: true, value: marker } : { ok: false, error: "NotFound" };
  }

  getMarkers(offset: number, limit: number): QueryResult<Marker[]> {
    return this.markers.page(offset, limit);
  }

  recentMarkers(n: number): Marker[] {
    return this.markers.recent(n);
  }

  getPlayerStats(player: string): QueryResult<PlayerStats> {
    const stats = this.players.get(player.toLowerCase());
    return stats ? { ok: true, value: stats } : { ok: false, error: "NotFound" };
  }

  getPlayerMarkerIds(player: string): QueryResult<number[]> {
    const key = player.toLowerCase();
    if (!this.players.isRegistered(key)) return { ok: false, error: "NotFound" };
    return { ok: true, value: this.players.markerIds(key) };
  }

  getPlayerCityMarkerCount(player: string, cityHash: string): number {
    return this.regions.playerCityVisits(player.toLowerCase(), cityHash.toLowerCase());
  }

  getCityStats(cityHash: string): QueryResult<RegionStats> {
    const stats = this.regions.city(cityHash.toLowerCase());
    return stats ? { ok: true, value: stats } : { ok: false, error: "NotFound" };
  }

  getStateStats(stateHash: string): QueryResult<RegionStats> {
    const stats = this.regions.state(stateHash.toLowerCase());
    return stats ? { ok: true, value: stats } : { ok: false, error: "NotFound" };
  }

  getCityPlayers(cityHash: string): string[] {
    return this.regions.cityPlayers(cityHash.toLowerCase());
  }

  getStatePlayers(stateHash: string): string[] {
    return this.regions.statePlayers(stateHash.toLowerCase());
  }

  getCityRank(player: string, cityHash: string): number | null {
    return this.cityBoards.get(cityHash.toLowerCase())?.rankOf(player.toLowerCase()) ?? null;
  }

  getGlobalLeaderboard(limit: number): GlobalLeaderboardRow[] {
    return this.globalBoard.top(limit).map((entry) => ({
      player: entry.id,
      markerCount: entry.score,
      distanceMeters: this.players.distance(entry.id),
    }));
  }

  getCityLeaderboard(cityHash: string, limit: number): CityLeaderboardRow[] {
    const board = this.cityBoards.get(cityHash.toLowerCase());
    if (!board) return [];
    return board.top(limit).map((entry) => ({ player: entry.id, markerCount: entry.score }));
  }

  // ============ Admin ============

  pause(caller: string): AdminResult {
    return this.setPaused(caller, true);
  }

  unpause(caller: string): AdminResult {
    return this.setPaused(caller, false);
  }

  transferOwnership(caller: string, newOwner: string): AdminResult {
    if (!this.isOwner(caller)) return { ok: false, error: "Unauthorized" };

    const next = normalizeAddress(newOwner);
    if (!next || next === "0x0000000000000000000000000000000000000000") {
      return { ok: false, error: "InvalidAddress" };
    }

    const previousOwner = this.admin.owner;
    const state: AdminState = { ...this.admin, owner: next };
    this.journal?.saveAdminState(state);
    this.admin = state;

    log.info({ previousOwner, newOwner: next }, "Ownership transferred");
    this.emit({ type: "ownership_transferred", previousOwner, newOwner: next });
    return { ok: true };
  }

  private setPaused(caller: string, paused: boolean): AdminResult {
    if (!this.isOwner(caller)) return { ok: false, error: "Unauthorized" };
    if (this.admin.paused === paused) return { ok: true };

    const state: AdminState = { ...this.admin, paused };
    this.journal?.saveAdminState(state);
    this.admin = state;

    const by = caller.toLowerCase();
    log.info({ by, paused }, paused ? "Ledger paused" : "Ledger unpaused");
    this.emit(paused ? { type: "paused", by } : { type: "unpaused", by });
    return { ok: true };
  }

  private isOwner(caller: string): boolean {
    return caller.toLowerCase() === this.admin.owner;
  }
}
