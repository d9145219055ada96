import { describe, expect, it } from "vitest";
import { submitMarker } from "../src/ledger/pipeline.js";
import { LedgerStore } from "../src/ledger/store.js";
import type { LedgerJournal } from "../src/ledger/store.js";
import { regionHash } from "../src/utils/crypto.js";
import type { LedgerEvent, SubmissionRequest } from "../src/utils/types.js";

const OWNER = "0x00000000000000000000000000000000000000f0";
const P = "0x00000000000000000000000000000000000000a1";
const Q = "0x00000000000000000000000000000000000000b2";
const KARNATAKA = regionHash("Karnataka");
const BENGALURU = regionHash("Bengaluru");
const MYSURU = regionHash("Mysuru");

function request(overrides: Partial<SubmissionRequest> = {}): SubmissionRequest {
  return {
    player: P,
    lat1e6: 12_971_000,
    lng1e6: 77_594_000,
    stateHash: KARNATAKA,
    cityHash: BENGALURU,
    landmark: "Cubbon Park",
    activityType: 1,
    speedKmh: 10,
    stepsPerMin: 60,
    timestamp: 1000,
    ...overrides,
  };
}

function snapshot(store: LedgerStore) {
  return {
    markers: store.totalMarkers(),
    players: store.totalPlayers(),
    distance: store.totalDistance(),
    grid: store.grid.size,
    global: store.getGlobalLeaderboard(100),
    city: store.getCityLeaderboard(BENGALURU, 100),
    cityStats: store.getCityStats(BENGALURU),
    stateStats: store.getStateStats(KARNATAKA),
    player: store.getPlayerStats(P),
  };
}

describe("submission pipeline", () => {
  it("rejects out-of-bounds coordinates, then accepts a first marker at rank 1", () => {
    const store = new LedgerStore({ owner: OWNER });

    expect(submitMarker(store, request({ lat1e6: 2_000_000, lng1e6: 70_000_000 }))).toEqual({
      status: "rejected",
      reason: "OutOfBounds",
      step: "geo",
    });

    expect(submitMarker(store, request())).toEqual({
      status: "accepted",
      markerId: 0,
      distanceMeters: 0,
      firstMarker: true,
      globalRank: 1,
      cityRank: 1,
    });
    expect(store.getPlayerStats(P)).toEqual({
      ok: true,
      value: {
        totalMarkers: 1,
        totalDistanceMeters: 0,
        lastMarkerAt: 1000,
        lastLat1e6: 12_971_000,
        lastLng1e6: 77_594_000,
        homeState: KARNATAKA,
        homeCity: BENGALURU,
        isRegistered: true,
        registeredAt: 1000,
      },
    });
  });

  it("ranks global and city boards by their own scores", () => {
    const store = new LedgerStore({ owner: OWNER });

    submitMarker(store, request({ timestamp: 1000 }));
    submitMarker(store, request({ player: Q, timestamp: 1005 }));
    submitMarker(store, request({ lat1e6: 12_975_000, timestamp: 1030 }));
    submitMarker(store, request({ player: Q, cityHash: MYSURU, lat1e6: 12_974_000, lng1e6: 77_598_000, timestamp: 1040 }));
    const last = submitMarker(
      store,
      request({ player: Q, cityHash: MYSURU, lat1e6: 12_974_000, lng1e6: 77_602_000, timestamp: 1080 })
    );

    expect(last).toEqual({
      status: "accepted",
      markerId: 4,
      distanceMeters: 444,
      firstMarker: false,
      globalRank: 1,
      cityRank: 1,
    });
    expect(store.getGlobalLeaderboard(10)).toEqual([
      { player: Q, markerCount: 3, distanceMeters: 999 },
      { player: P, markerCount: 2, distanceMeters: 444 },
    ]);
    expect(store.getCityLeaderboard(BENGALURU, 10)).toEqual([
      { player: P, markerCount: 2 },
      { player: Q, markerCount: 1 },
    ]);
    expect(store.getCityLeaderboard(MYSURU, 10)).toEqual([{ player: Q, markerCount: 2 }]);
    expect(store.getPlayerCityMarkerCount(Q, BENGALURU)).toBe(1);
    expect(store.getCityRank(P, BENGALURU)).toBe(1);
    expect(store.getCityRank(P, MYSURU)).toBeNull();
  });

  it("rolls up city and state counters", () => {
    const store = new LedgerStore({ owner: OWNER });

    submitMarker(store, request({ timestamp: 1000 }));
    submitMarker(store, request({ player: Q, timestamp: 1005 }));
    submitMarker(store, request({ lat1e6: 12_975_000, timestamp: 1030 }));
    submitMarker(store, request({ player: Q, cityHash: MYSURU, lat1e6: 12_974_000, timestamp: 1040 }));

    expect(store.getCityStats(BENGALURU)).toEqual({
      ok: true,
      value: { totalMarkers: 3, totalPlayers: 2, lastActivity: 1030 },
    });
    expect(store.getCityStats(MYSURU)).toEqual({
      ok: true,
      value: { totalMarkers: 1, totalPlayers: 1, lastActivity: 1040 },
    });
    expect(store.getStateStats(KARNATAKA)).toEqual({
      ok: true,
      value: { totalMarkers: 4, totalPlayers: 2, lastActivity: 1040 },
    });
    expect(store.getCityPlayers(BENGALURU)).toEqual([P, Q]);
    expect(store.getCityStats(regionHash("Chennai"))).toEqual({ ok: false, error: "NotFound" });
  });

  it("accumulates distance from the previous accepted marker", () => {
    const store = new LedgerStore({ owner: OWNER });

    submitMarker(store, request({ timestamp: 1000 }));
    const second = submitMarker(store, request({ lat1e6: 12_974_000, lng1e6: 77_598_000, timestamp: 1030 }));
    const third = submitMarker(store, request({ lat1e6: 12_974_000, lng1e6: 77_602_000, timestamp: 1060 }));

    expect(second.status === "accepted" && second.distanceMeters).toBe(555);
    expect(third.status === "accepted" && third.distanceMeters).toBe(444);
    expect(store.players.distance(P)).toBe(999);
    expect(store.totalDistance()).toBe(999);
  });

  it("enforces the cooldown even at new coordinates", () => {
    const store = new LedgerStore({ owner: OWNER });

    submitMarker(store, request({ timestamp: 1000 }));
    expect(submitMarker(store, request({ lat1e6: 13_500_000, timestamp: 1029 }))).toEqual({
      status: "rejected",
      reason: "CooldownActive",
      step: "cooldown",
    });
    expect(submitMarker(store, request({ lat1e6: 13_500_000, timestamp: 1030 })).status).toBe("accepted");
  });

  it("accepts a grid cell at most once per player", () => {
    const store = new LedgerStore({ owner: OWNER });

    submitMarker(store, request({ timestamp: 1000 }));
    expect(submitMarker(store, request({ lat1e6: 12_971_999, lng1e6: 77_594_500, timestamp: 5000 }))).toEqual({
      status: "rejected",
      reason: "DuplicateLocation",
      step: "dedup",
    });
    expect(submitMarker(store, request({ player: Q, timestamp: 5000 })).status).toBe("accepted");
  });

  it("checks cooldown before the grid", () => {
    const store = new LedgerStore({ owner: OWNER });

    submitMarker(store, request({ timestamp: 1000 }));
    const result = submitMarker(store, request({ timestamp: 1001 }));
    expect(result.status === "rejected" && result.reason).toBe("CooldownActive");
  });

  it("leaves every aggregate untouched on rejection", () => {
    const store = new LedgerStore({ owner: OWNER });
    submitMarker(store, request({ timestamp: 1000 }));
    const before = snapshot(store);

    submitMarker(store, request({ speedKmh: 80, lat1e6: 13_000_000, timestamp: 2000 }));
    submitMarker(store, request({ stepsPerMin: 5, lat1e6: 13_000_000, timestamp: 2000 }));
    submitMarker(store, request({ activityType: 4, lat1e6: 13_000_000, timestamp: 2000 }));
    submitMarker(store, request({ lat1e6: 13_000_000, timestamp: 1010 }));
    submitMarker(store, request({ timestamp: 2000 }));

    expect(snapshot(store)).toEqual(before);
  });

  it("rejects fractional coordinates without locking the player out", () => {
    const store = new LedgerStore({ owner: OWNER });
    submitMarker(store, request({ timestamp: 1000 }));

    expect(submitMarker(store, request({ lat1e6: 12_980_000.5, timestamp: 1030 }))).toEqual({
      status: "rejected",
      reason: "OutOfBounds",
      step: "geo",
    });
    expect(submitMarker(store, request({ lng1e6: Number.POSITIVE_INFINITY, timestamp: 1030 }))).toEqual({
      status: "rejected",
      reason: "OutOfBounds",
      step: "geo",
    });
    expect(store.totalMarkers()).toBe(1);

    const next = submitMarker(store, request({ lat1e6: 12_975_000, timestamp: 1030 }));
    expect(next.status === "accepted" && next.distanceMeters).toBe(444);
  });

  it("rejects a player id that is not an address", () => {
    const store = new LedgerStore({ owner: OWNER });
    const before = snapshot(store);

    expect(submitMarker(store, request({ player: "runner-42" }))).toEqual({
      status: "rejected",
      reason: "InvalidPlayer",
      step: "identity",
    });
    expect(snapshot(store)).toEqual(before);
  });

  it("reports pause ahead of a bad player id", () => {
    const store = new LedgerStore({ owner: OWNER, paused: true });
    const result = submitMarker(store, request({ player: "runner-42" }));
    expect(result.status === "rejected" && result.reason).toBe("SystemPaused");
  });

  it("lowercases player and region identifiers", () => {
    const store = new LedgerStore({ owner: OWNER });
    submitMarker(
      store,
      request({ player: P.toUpperCase().replace("0X", "0x"), cityHash: BENGALURU.toUpperCase().replace("0X", "0x") })
    );

    const marker = store.markers.get(0);
    expect(marker?.player).toBe(P);
    expect(marker?.cityHash).toBe(BENGALURU);
    expect(store.grid.has(P, 12_971_000, 77_594_000)).toBe(true);
  });

  it("emits registration once, then a marker event per acceptance only", () => {
    const store = new LedgerStore({ owner: OWNER });
    const events: LedgerEvent[] = [];
    store.subscribe((event) => events.push(event));

    submitMarker(store, request({ timestamp: 1000 }));
    submitMarker(store, request({ lat1e6: 12_974_000, lng1e6: 77_598_000, timestamp: 1030 }));
    submitMarker(store, request({ timestamp: 1031 }));

    expect(events.map((event) => event.type)).toEqual(["player_registered", "marker_added", "marker_added"]);
    expect(events[0]).toEqual({
      type: "player_registered",
      player: P,
      stateHash: KARNATAKA,
      cityHash: BENGALURU,
      timestamp: 1000,
    });
    const added = events[2];
    expect(added.type === "marker_added" && added.totalDistanceMeters).toBe(555);
  });

  it("keeps delivering events when a listener throws", () => {
    const store = new LedgerStore({ owner: OWNER });
    const seen: string[] = [];
    store.subscribe(() => {
      throw new Error("listener broke");
    });
    store.subscribe((event) => seen.push(event.type));

    expect(submitMarker(store, request()).status).toBe("accepted");
    expect(seen).toEqual(["player_registered", "marker_added"]);
  });

  it("does not touch the ledger when the journal write fails", () => {
    const journal: LedgerJournal = {
      appendMarker: () => {
        throw new Error("disk full");
      },
      saveAdminState: () => undefined,
    };
    const store = new LedgerStore({ owner: OWNER, journal });

    expect(() => submitMarker(store, request())).toThrow("disk full");
    expect(store.totalMarkers()).toBe(0);
    expect(store.totalPlayers()).toBe(0);
    expect(store.grid.size).toBe(0);
    expect(store.getGlobalLeaderboard(10)).toEqual([]);
  });

  it("writes each accepted marker to the journal before applying it", () => {
    const written: number[] = [];
    const store = new LedgerStore({
      owner: OWNER,
      journal: {
        appendMarker: (marker) => {
          written.push(marker.id);
          expect(store.totalMarkers()).toBe(marker.id);
        },
        saveAdminState: () => undefined,
      },
    });

    submitMarker(store, request({ timestamp: 1000 }));
    submitMarker(store, request({ timestamp: 1001 }));
    submitMarker(store, request({ lat1e6: 12_975_000, timestamp: 1030 }));
    expect(written).toEqual([0, 1]);
  });

  it("applies rule overrides", () => {
    const store = new LedgerStore({ owner: OWNER, rules: { cooldownSeconds: 0, maxSpeedKmh: 50 } });

    submitMarker(store, request({ speedKmh: 45, timestamp: 1000 }));
    const result = submitMarker(store, request({ lat1e6: 12_975_000, timestamp: 1000 }));
    expect(result.status).toBe("accepted");
    expect(store.totalMarkers()).toBe(2);
  });
});
