import type { Marker, MarkerDraft, QueryResult } from "../utils/types.js";

/**
 * Append-only log of accepted markers. Ids are sequential from zero.
 */
export class MarkerLedger {
  private readonly markers: Marker[] = [];

  append(draft: MarkerDraft): number {
    const id = this.markers.length;
    this.markers.push(Object.freeze({ id, ...draft }));
    return id;
  }

  get(id: number): Marker | null {
    if (!Number.isInteger(id) || id < 0) return null;
    return this.markers[id] ?? null;
  }

  /** Most recent `n` markers, newest first. */
  recent(n: number): Marker[] {
    const count = Math.max(0, Math.min(Math.floor(n), this.markers.length));
    const out: Marker[] = [];
    for (let i = this.markers.length - 1; out.length < count; i--) {
      out.push(this.markers[i]);
    }
    return out;
  }

  /** Markers in id order starting at `offset`. */
  page(offset: number, limit: number): QueryResult<Marker[]> {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.markers.length) {
      return { ok: false, error: "IndexOutOfRange" };
    }
    const size = Math.max(0, Math.floor(limit));
    return { ok: true, value: this.markers.slice(offset, offset + size) };
  }

  get length(): number {
    return this.markers.length;
  }
}
