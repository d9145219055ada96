import type { Request, Response, NextFunction } from "express";
import { config } from "../config.js";
import { validateApiAuth } from "../utils/crypto.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("auth");

function header(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === "string" ? value : undefined;
}

/**
 * Express middleware that verifies wallet signature auth headers.
 *
 * Required headers:
 *   X-Address: wallet address
 *   X-Signature: EIP-191 signature
 *   X-Message: signed message ("geomark:{timestamp}")
 *
 * On success, sets `res.locals.playerAddress` (lowercased).
 */
export function walletAuth(req: Request, res: Response, next: NextFunction): void {
  const address = header(req, "x-address");
  const signature = header(req, "x-signature");
  const message = header(req, "x-message");

  if (!address || !signature || !message) {
    res.status(401).json({ error: "Missing auth headers (X-Address, X-Signature, X-Message)" });
    return;
  }

  const result = validateApiAuth(address, signature, message, config.authMaxAgeSeconds);
  if (!result.valid) {
    log.warn({ address, error: result.error }, "Auth failed");
    res.status(401).json({ error: result.error });
    return;
  }

  res.locals.playerAddress = address.toLowerCase();
  next();
}

/**
 * Address set by `walletAuth`. Throws if the middleware did not run.
 */
export function authenticatedAddress(res: Response): string {
  const address: unknown = res.locals.playerAddress;
  if (typeof address !== "string") {
    throw new Error("walletAuth middleware missing on route");
  }
  return address;
}
