/**
 * Wire the four components onto one chain and hand out the scoped
 * capabilities between them.
 */

import {
  keccakHex,
  merkleClaimVerifier,
  type Address,
  type ClaimProofVerifier,
} from "@stampnet/protocol";
import type { Chain } from "./chain.js";
import { randomEntropy, type EntropySource } from "./entropy.js";
import { PostageStamp } from "./views/postage-stamp.js";
import { PriceOracle, type PushResult } from "./views/price-oracle.js";
import { Redistribution } from "./views/redistribution.js";
import { StakeRegistry } from "./views/stake-registry.js";

export interface DeployOptions {
  admin: Address;
  networkId?: bigint;
  minimumStake?: bigint;
  minimumPrice?: bigint;
  minimumValidityBlocks?: number;
  minimumBucketDepth?: number;
  entropy?: EntropySource;
  verifier?: ClaimProofVerifier;
}

export interface Deployment {
  chain: Chain;
  registry: StakeRegistry;
  postage: PostageStamp;
  oracle: PriceOracle;
  game: Redistribution;
  /** Result of pushing the starting price to the postage ledger. */
  initialPush: PushResult;
}

/** Stable component address: the last 20 bytes of H(name). */
export function componentAddress(name: string): Address {
  return keccakHex(new TextEncoder().encode(`stampnet:${name}`)).slice(24);
}

export function deploy(chain: Chain, options: DeployOptions): Deployment {
  const { admin } = options;

  const registry = new StakeRegistry(chain, componentAddress("stake-registry"), admin, {
    networkId: options.networkId,
    minimumStake: options.minimumStake,
  });
  const postage = new PostageStamp(chain, componentAddress("postage-stamp"), admin, {
    minimumValidityBlocks: options.minimumValidityBlocks,
    minimumBucketDepth: options.minimumBucketDepth,
  });
  const oracle = new PriceOracle(chain, componentAddress("price-oracle"), admin, postage, {
    minimumPrice: options.minimumPrice,
  });
  const game = new Redistribution(chain, componentAddress("redistribution"), admin, {
    registry,
    postage,
    oracle,
    entropy: options.entropy ?? randomEntropy,
    verifier: options.verifier ?? merkleClaimVerifier,
  });

  registry.grantRole(admin, "REDISTRIBUTOR", game.address);
  postage.grantRole(admin, "REDISTRIBUTOR", game.address);
  postage.grantRole(admin, "PRICE_ORACLE", oracle.address);
  oracle.grantRole(admin, "PRICE_UPDATER", game.address);

  const { push } = oracle.setPrice(admin, oracle.minimumPrice());
  chain.logger.info(
    { registry: registry.address, postage: postage.address, oracle: oracle.address, game: game.address },
    "components deployed",
  );

  return { chain, registry, postage, oracle, game, initialPush: push };
}
