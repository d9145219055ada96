import { gridKey } from "../utils/crypto.js";
import { gridCell } from "../utils/geo.js";

/**
 * Write-once set of (player, grid cell) keys. A cell, once used by a
 * player, stays used.
 */
export class GridDedupIndex {
  private readonly used = new Set<string>();

  constructor(private readonly precision: number) {}

  keyFor(player: string, lat1e6: number, lng1e6: number): string {
    return gridKey(player, gridCell(lat1e6, this.precision), gridCell(lng1e6, this.precision));
  }

  has(player: string, lat1e6: number, lng1e6: number): boolean {
    return this.used.has(this.keyFor(player, lat1e6, lng1e6));
  }

  /**
   * Returns false (DuplicateLocation) if the cell was already used by this
   * player, otherwise records it and returns true.
   */
  checkAndMark(player: string, lat1e6: number, lng1e6: number): boolean {
    const key = this.keyFor(player, lat1e6, lng1e6);
    if (this.used.has(key)) return false;
    this.used.add(key);
    return true;
  }

  get size(): number {
    return this.used.size;
  }
}
