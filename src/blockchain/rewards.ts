import { ethers } from "ethers";
import { insertRewardMint, updateRewardMint } from "../db/queries.js";
import type { LedgerStore } from "../ledger/store.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("rewards");

export interface SubmittedMint {
  hash: string;
  wait(): Promise<{ status: number | null } | null>;
}

/**
 * Anything that can send a mint transaction to the reward token.
 * The token enforces per-minter caps and the supply ceiling itself.
 */
export interface TokenMinter {
  submit(to: string, amount: bigint): Promise<SubmittedMint>;
  resetNonce(): void;
}

export type MintOutcome =
  | { status: "confirmed"; mintId: number; txHash: string }
  | { status: "failed"; mintId: number; error: string };

export interface RewardQueue {
  enqueue(player: string, markerId: number): Promise<MintOutcome>;
  /** Resolves once every mint queued so far has settled. */
  idle(): Promise<void>;
}

/**
 * Readable reason for a failed mint: the custom error name when the token
 * reverted with one (ExceedsMinterLimit, ExceedsMaxSupply, ...).
 */
export function describeMintError(err: unknown): string {
  if (ethers.isCallException(err) && err.revert) {
    return err.revert.name;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Sequential mint queue. One transaction at a time keeps nonces ordered;
 * failures are logged and recorded, never retried, and never reach the
 * ledger.
 */
export function createRewardQueue(minter: TokenMinter, amount: bigint): RewardQueue {
  let tail: Promise<void> = Promise.resolve();

  async function mint(player: string, markerId: number): Promise<MintOutcome> {
    const mintId = insertRewardMint({
      player,
      markerId,
      amount: amount.toString(),
      txHash: null,
      status: "pending",
      createdAt: Math.floor(Date.now() / 1000),
      confirmedAt: null,
      error: null,
    });

    try {
      log.info({ player, markerId, amount: amount.toString() }, "Submitting reward mint");
      const tx = await minter.submit(player, amount);
      updateRewardMint(mintId, { txHash: tx.hash, status: "submitted" });

      const receipt = await tx.wait();
      if (!receipt || receipt.status === 0) {
        minter.resetNonce();
        const error = "Transaction reverted";
        updateRewardMint(mintId, { status: "failed", error });
        log.error({ player, markerId, txHash: tx.hash }, "Reward mint reverted");
        return { status: "failed", mintId, error };
      }

      updateRewardMint(mintId, {
        status: "confirmed",
        confirmedAt: Math.floor(Date.now() / 1000),
      });
      log.info({ player, markerId, txHash: tx.hash }, "Reward mint confirmed");
      return { status: "confirmed", mintId, txHash: tx.hash };
    } catch (err) {
      minter.resetNonce();
      const error = describeMintError(err);
      updateRewardMint(mintId, { status: "failed", error });
      log.error({ player, markerId, error }, "Reward mint failed");
      return { status: "failed", mintId, error };
    }
  }

  return {
    enqueue(player: string, markerId: number): Promise<MintOutcome> {
      const result = tail.then(() => mint(player, markerId));
      tail = result.then(
        () => undefined,
        () => undefined
      );
      return result;
    },

    idle(): Promise<void> {
      return tail;
    },
  };
}

/**
 * Mint a reward for every accepted marker. Returns the unsubscribe handle.
 */
export function attachRewardMinting(store: LedgerStore, queue: RewardQueue): () => void {
  return store.subscribe((event) => {
    if (event.type !== "marker_added") return;
    queue.enqueue(event.marker.player, event.marker.id).catch((err) => {
      log.error(
        { markerId: event.marker.id, error: (err as Error).message },
        "Could not record reward mint"
      );
    });
  });
}
