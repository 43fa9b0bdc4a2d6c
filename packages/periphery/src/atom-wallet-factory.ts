/**
 * Deterministic Atom Wallet Factory
 *
 * Derives each atom's receiving account the way a CREATE2 deployer
 * would: the address depends only on the factory, the atom id (salt)
 * and the wallet init-code hash, so it is known before any wallet
 * exists.
 */

import { getContractAddress } from "viem";
import type { Address, AtomWalletFactory, TermId } from "@termvault/types";
import type { AtomWalletFactoryConfig } from "./types.js";

export class DeterministicAtomWalletFactory implements AtomWalletFactory {
  private readonly config: AtomWalletFactoryConfig;
  private readonly owners: Map<TermId, Address> = new Map();

  constructor(config: AtomWalletFactoryConfig) {
    this.config = config;
  }

  computeAtomWalletAddr(atomId: TermId): Address {
    return getContractAddress({
      opcode: "CREATE2",
      from: this.config.factory,
      salt: atomId,
      bytecodeHash: this.config.initCodeHash,
    });
  }

  atomWalletOwner(atomId: TermId): Address {
    return this.owners.get(atomId) ?? this.config.defaultOwner;
  }

  /**
   * Hand the atom's wallet to a new controller.
   */
  transferWalletOwnership(atomId: TermId, newOwner: Address): void {
    this.owners.set(atomId, newOwner);
  }
}
