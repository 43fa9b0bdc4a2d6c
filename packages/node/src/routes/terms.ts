/**
 * Term routes.
 *
 * POST /api/v1/atoms                        — Create an atom
 * POST /api/v1/atoms/batch                  — Create several atoms
 * POST /api/v1/triples                      — Create a triple (and its counter)
 * POST /api/v1/triples/batch                — Create several triples
 * GET  /api/v1/terms/:termId                — Term identity and kind
 * GET  /api/v1/atoms/:termId/wallet         — Atom wallet and its unclaimed fees
 * POST /api/v1/atoms/:termId/wallet/claim   — Pay the wallet's fees to its owner
 * GET  /api/v1/costs                        — Static creation costs
 * GET  /api/v1/previews/atom?assets=        — Preview an atom creation
 * GET  /api/v1/previews/triple?assets=      — Preview a triple creation
 */

import { Hono } from "hono";
import { MultiVaultError } from "@termvault/multivault";
import type { MultiVault } from "@termvault/multivault";
import type { TermId } from "@termvault/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  AssetsQuerySchema,
  CreateAtomSchema,
  CreateAtomsSchema,
  CreateTripleSchema,
  CreateTriplesSchema,
  TermParamSchema,
} from "../types/dto.js";
import { creationPreviewView } from "../types/views.js";
import { readBody, readParams, readQuery } from "../middleware/validate.js";

function termView(vault: MultiVault, termId: TermId): Record<string, unknown> {
  const vaultType = vault.getVaultType(termId);
  const base = { termId, vaultType, termIndex: vault.getTermIndex(termId) ?? null };

  if (vaultType === "atom") {
    return {
      ...base,
      atomData: vault.getAtom(termId) ?? null,
      atomWallet: vault.computeAtomWalletAddr(termId),
    };
  }
  if (vaultType === "triple") {
    return {
      ...base,
      ...vault.getTriple(termId),
      counterTermId: vault.getCounterIdFromTripleId(termId) ?? null,
    };
  }
  return {
    ...base,
    ...vault.getTriple(termId),
    tripleId: vault.getTripleIdFromCounterId(termId) ?? null,
  };
}

export function createTermRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Creation ──────────────────────────────────────────────────────

  routes.post("/atoms", async (c) => {
    const { vault } = c.get("service");
    const body = await readBody(c, CreateAtomSchema);
    const termId = vault.createAtom(c.get("account"), body.data, body.assets);
    return c.json({ data: termView(vault, termId) }, 201);
  });

  routes.post("/atoms/batch", async (c) => {
    const { vault } = c.get("service");
    const body = await readBody(c, CreateAtomsSchema);
    const termIds = vault.createAtoms(c.get("account"), body.data, body.assets);
    return c.json({ data: { termIds } }, 201);
  });

  routes.post("/triples", async (c) => {
    const { vault } = c.get("service");
    const body = await readBody(c, CreateTripleSchema);
    const termId = vault.createTriple(
      c.get("account"),
      body.subjectId,
      body.predicateId,
      body.objectId,
      body.assets,
    );
    return c.json({ data: termView(vault, termId) }, 201);
  });

  routes.post("/triples/batch", async (c) => {
    const { vault } = c.get("service");
    const body = await readBody(c, CreateTriplesSchema);
    const termIds = vault.createTriples(
      c.get("account"),
      body.subjectIds,
      body.predicateIds,
      body.objectIds,
      body.assets,
    );
    return c.json({ data: { termIds } }, 201);
  });

  // ─── Views ─────────────────────────────────────────────────────────

  routes.get("/terms/:termId", (c) => {
    const { vault } = c.get("service");
    const { termId } = readParams(c, TermParamSchema);
    return c.json({ data: termView(vault, termId) });
  });

  routes.get("/costs", (c) => {
    const { vault } = c.get("service");
    return c.json({
      data: {
        atomCost: vault.getAtomCost().toString(),
        tripleCost: vault.getTripleCost().toString(),
      },
    });
  });

  routes.get("/previews/atom", (c) => {
    const { vault } = c.get("service");
    const { assets } = readQuery(c, AssetsQuerySchema);
    return c.json({ data: creationPreviewView(vault.previewAtomCreate(assets)) });
  });

  routes.get("/previews/triple", (c) => {
    const { vault } = c.get("service");
    const { assets } = readQuery(c, AssetsQuerySchema);
    return c.json({ data: creationPreviewView(vault.previewTripleCreate(assets)) });
  });

  // ─── Atom Wallets ──────────────────────────────────────────────────

  routes.get("/atoms/:termId/wallet", (c) => {
    const service = c.get("service");
    const { termId } = readParams(c, TermParamSchema);
    if (!service.vault.isAtom(termId)) {
      throw new MultiVaultError("ATOM_DOES_NOT_EXIST", `Atom ${termId} does not exist`);
    }
    const wallet = service.vault.computeAtomWalletAddr(termId);
    return c.json({
      data: {
        wallet,
        owner: service.atomWallets.atomWalletOwner(termId),
        accumulatedFees: service.vault.accumulatedAtomWalletDepositFees(wallet).toString(),
      },
    });
  });

  routes.post("/atoms/:termId/wallet/claim", (c) => {
    const { vault } = c.get("service");
    const { termId } = readParams(c, TermParamSchema);
    const claimed = vault.claimAtomWalletDepositFees(c.get("account"), termId);
    return c.json({ data: { claimed: claimed.toString() } });
  });

  return routes;
}
