import { ethers } from "ethers";
import { config } from "../config.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("blockchain");

let httpProvider: ethers.JsonRpcProvider | null = null;
let minterWallet: ethers.Wallet | null = null;

export function isRewardMintingEnabled(): boolean {
  return config.rewardTokenAddress.length > 0 && config.minterPrivateKey.length > 0;
}

/**
 * HTTP JSON-RPC provider (reads + tx sending).
 */
export function getHttpProvider(): ethers.JsonRpcProvider {
  if (!httpProvider) {
    httpProvider = new ethers.JsonRpcProvider(config.rpcUrl, config.chainId);
    log.info({ rpcUrl: config.rpcUrl, chainId: config.chainId }, "HTTP provider initialized");
  }
  return httpProvider;
}

/**
 * Wallet holding the minter role on the reward token.
 */
export function getMinterWallet(): ethers.Wallet {
  if (!minterWallet) {
    minterWallet = new ethers.Wallet(config.minterPrivateKey, getHttpProvider());
    log.info({ address: minterWallet.address }, "Minter wallet initialized");
  }
  return minterWallet;
}

/**
 * Cleanup providers on shutdown.
 */
export function closeProviders(): void {
  if (httpProvider) {
    httpProvider.destroy();
    httpProvider = null;
    minterWallet = null;
    log.info("HTTP provider closed");
  }
}
