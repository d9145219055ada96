/**
 * Meters per coordinate unit (1e-6 degree), applied to both axes.
 * Expressed as a ratio so the math stays in integers.
 */
const METERS_PER_UNIT_NUM = 111n;
const METERS_PER_UNIT_DEN = 1000n;

/**
 * Integer square root (floor) by Newton's method.
 * Exact for perfect squares.
 */
export function isqrt(n: bigint): bigint {
  if (n < 0n) throw new RangeError("isqrt of negative number");
  if (n < 2n) return n;

  let x = n;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + n / x) / 2n;
  }
  return x;
}

function axisMeters(delta: number): bigint {
  const units = BigInt(Math.abs(delta));
  return (units * METERS_PER_UNIT_NUM) / METERS_PER_UNIT_DEN;
}

/**
 * Planar distance in whole meters between two contract coordinates.
 *
 * Both axes use the same linear coefficient, so longitude is not scaled by
 * latitude. Away from the equator this over-reports east-west movement.
 */
export function estimateDistance(
  lat1: number,
  lng1: number,
  lat2: number,
  lng2: number
): number {
  const dy = axisMeters(lat2 - lat1);
  const dx = axisMeters(lng2 - lng1);
  return Number(isqrt(dx * dx + dy * dy));
}

/**
 * Convert contract int coordinate (lat/lng * 1e6) to decimal degrees.
 */
export function contractCoordToDegrees(coord: number): number {
  return coord / 1_000_000;
}

/**
 * Convert decimal degrees to contract int coordinate.
 */
export function degreesToContractCoord(degrees: number): number {
  return Math.round(degrees * 1_000_000);
}

/**
 * Coarse grid cell of a coordinate. Floors toward negative infinity so
 * cells stay contiguous across zero.
 */
export function gridCell(coord: number, precision: number): number {
  return Math.floor(coord / precision);
}
