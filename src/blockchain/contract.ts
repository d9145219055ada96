import { ethers } from "ethers";
import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { config } from "../config.js";
import { getMinterWallet } from "./client.js";
import { createLogger } from "../utils/logger.js";
import type { SubmittedMint, TokenMinter } from "./rewards.js";

const log = createLogger("contract");

const __dirname = dirname(fileURLToPath(import.meta.url));

// ABI lives at <repo>/abi, two levels up from both src/blockchain and dist/src/blockchain
function loadAbi(): ethers.InterfaceAbi {
  const candidates = [
    resolve(__dirname, "../../abi/RewardToken.json"),
    resolve(__dirname, "../../../abi/RewardToken.json"),
  ];
  for (const path of candidates) {
    try {
      const artifact = JSON.parse(readFileSync(path, "utf-8"));
      return artifact.abi;
    } catch (err) {
      log.debug({ path, error: (err as Error).message }, "ABI not found at path");
    }
  }
  throw new Error("RewardToken ABI not found");
}

let abi: ethers.InterfaceAbi | null = null;
let tokenContract: ethers.Contract | null = null;

function getAbi(): ethers.InterfaceAbi {
  if (!abi) abi = loadAbi();
  return abi;
}

/**
 * Reward token instance bound to the minter wallet.
 */
export function getTokenContract(): ethers.Contract {
  if (!tokenContract) {
    tokenContract = new ethers.Contract(config.rewardTokenAddress, getAbi(), getMinterWallet());
    log.info({ address: config.rewardTokenAddress }, "Reward token contract initialized");
  }
  return tokenContract;
}

export interface MinterAllowance {
  isMinter: boolean;
  limit: bigint;
  minted: bigint;
  remaining: bigint;
}

export async function getMinterAllowance(): Promise<MinterAllowance> {
  const wallet = getMinterWallet();
  const info = await getTokenContract().getFunction("getMinterInfo")(wallet.address);
  return {
    isMinter: Boolean(info[0]),
    limit: BigInt(info[1]),
    minted: BigInt(info[2]),
    remaining: BigInt(info[3]),
  };
}

/**
 * TokenMinter backed by the on-chain reward token. Tracks the pending
 * nonce locally so queued mints don't collide.
 */
export function createContractMinter(): TokenMinter {
  let pendingNonce: number | null = null;

  return {
    async submit(to: string, amount: bigint): Promise<SubmittedMint> {
      if (pendingNonce === null) {
        pendingNonce = await getMinterWallet().getNonce("pending");
      } else {
        pendingNonce++;
      }
      const tx: ethers.ContractTransactionResponse = await getTokenContract().getFunction(
        "mintReward"
      )(to, amount, { nonce: pendingNonce });
      return tx;
    },

    resetNonce(): void {
      pendingNonce = null;
    },
  };
}
