import { LEADERBOARD_CAPACITY } from "./rules.js";

interface Slot {
  id: string;
  score: number;
}

export interface RankedEntry {
  id: string;
  score: number;
}

/**
 * Capped, score-ordered ranking maintained by in-place upserts.
 *
 * Order is strictly non-increasing by score. An entity is inserted in front
 * of the first slot holding a strictly lower score, so an upserted entity
 * lands behind every entity it ties with.
 */
export class RankedLeaderboard {
  private readonly slots: Slot[] = [];

  constructor(readonly capacity: number = LEADERBOARD_CAPACITY) {}

  /**
   * Place `id` at its position for `newScore`.
   * Returns the 1-based rank, or null if it falls outside the board.
   */
  upsert(id: string, newScore: number): number | null {
    let current = -1;
    for (let i = 0; i < this.slots.length; i++) {
      if (this.slots[i].id === id) {
        current = i;
        break;
      }
    }

    // The entity's own slot is compared with its new score.
    let insertAt = this.slots.length;
    for (let i = 0; i < this.slots.length; i++) {
      const occupant = this.slots[i];
      const occupantScore = occupant.id === id ? newScore : occupant.score;
      if (occupantScore < newScore) {
        insertAt = i;
        break;
      }
    }

    if (current >= 0) {
      this.slots.splice(current, 1);
      if (current < insertAt) insertAt -= 1;
    }

    if (insertAt >= this.capacity) {
      return null;
    }

    this.slots.splice(insertAt, 0, { id, score: newScore });
    if (this.slots.length > this.capacity) {
      this.slots.pop();
    }
    return insertAt + 1;
  }

  /** Top `k` entries, k clamped to [0, capacity]. */
  top(k: number = this.capacity): RankedEntry[] {
    const limit = Math.max(0, Math.min(Math.floor(k), this.capacity));
    return this.slots.slice(0, limit).map((slot) => ({ id: slot.id, score: slot.score }));
  }

  rankOf(id: string): number | null {
    const index = this.slots.findIndex((slot) => slot.id === id);
    return index === -1 ? null : index + 1;
  }

  get size(): number {
    return this.slots.length;
  }
}
