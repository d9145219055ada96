import { ethers } from "ethers";

export const AUTH_MESSAGE_PREFIX = "geomark";

const REGION_HASH_PATTERN = /^0x[0-9a-f]{64}$/;

/**
 * Verify an EIP-191 personal_sign signature.
 * Returns the recovered signer address (checksummed).
 */
export function recoverSigner(message: string, signature: string): string {
  return ethers.verifyMessage(message, signature);
}

/**
 * Verify that a signature was signed by the expected address.
 * Comparison is case-insensitive (checksum-safe).
 */
export function verifySignature(
  message: string,
  signature: string,
  expectedAddress: string
): boolean {
  let recovered: string;
  try {
    recovered = recoverSigner(message, signature);
  } catch {
    // Malformed signatures are a failed verification, not a server error.
    return false;
  }
  return recovered.toLowerCase() === expectedAddress.toLowerCase();
}

/**
 * Validate REST API auth headers.
 * Expected message format: "geomark:{timestamp}"
 */
export function validateApiAuth(
  address: string,
  signature: string,
  message: string,
  maxAgeSeconds: number = 300,
  nowSeconds: number = Math.floor(Date.now() / 1000)
): { valid: boolean; error?: string } {
  const parts = message.split(":");
  if (parts.length !== 2 || parts[0] !== AUTH_MESSAGE_PREFIX) {
    return { valid: false, error: "Invalid message format" };
  }

  const timestamp = parseInt(parts[1], 10);
  if (isNaN(timestamp)) {
    return { valid: false, error: "Invalid timestamp" };
  }

  if (Math.abs(nowSeconds - timestamp) > maxAgeSeconds) {
    return { valid: false, error: "Message expired" };
  }

  if (!verifySignature(message, signature, address)) {
    return { valid: false, error: "Invalid signature" };
  }

  return { valid: true };
}

/**
 * Lowercased address, or null when the input is not a valid address.
 */
export function normalizeAddress(value: unknown): string | null {
  if (typeof value !== "string" || !ethers.isAddress(value)) return null;
  return value.toLowerCase();
}

/**
 * Content hash of a canonical region name (city or state id).
 * The name is trimmed and lowercased before hashing.
 */
export function regionHash(name: string): string {
  return ethers.sha256(ethers.toUtf8Bytes(name.trim().toLowerCase()));
}

export function isRegionHash(value: string): boolean {
  return REGION_HASH_PATTERN.test(value);
}

/**
 * Dedup key for a (player, grid cell) pair, packed the way the
 * on-chain ledger packs it: address ‖ int256 ‖ int256.
 */
export function gridKey(player: string, cellLat: number, cellLng: number): string {
  return ethers.solidityPackedKeccak256(
    ["address", "int256", "int256"],
    [player, cellLat, cellLng]
  );
}
