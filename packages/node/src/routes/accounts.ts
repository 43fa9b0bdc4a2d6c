/**
 * Account routes.
 *
 * GET  /api/v1/accounts/:account                       — Base-asset balance and activity
 * GET  /api/v1/accounts/:account/utilization/:epoch    — Personal utilization for an epoch
 * GET  /api/v1/accounts/:account/approvals/:sender     — What `sender` may do for `account`
 * POST /api/v1/approvals                               — Approve a sender for the calling account
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AccountParamSchema, AddressSchema, ApproveSchema, EpochParamSchema } from "../types/dto.js";
import { readBody, readParams } from "../middleware/validate.js";

const UtilizationParamSchema = AccountParamSchema.merge(EpochParamSchema);
const ApprovalParamSchema = AccountParamSchema.extend({ sender: AddressSchema });

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/accounts/:account", (c) => {
    const { vault } = c.get("service");
    const { account } = readParams(c, AccountParamSchema);
    return c.json({
      data: {
        account,
        balance: vault.assetBalanceOf(account).toString(),
        lastActiveEpoch: vault.getUserLastActiveEpoch(account),
      },
    });
  });

  routes.get("/accounts/:account/utilization/:epoch", (c) => {
    const { vault } = c.get("service");
    const { account, epoch } = readParams(c, UtilizationParamSchema);
    return c.json({
      data: {
        account,
        epoch,
        utilization: vault.getUserUtilizationForEpoch(account, epoch).toString(),
      },
    });
  });

  routes.get("/accounts/:account/approvals/:sender", (c) => {
    const { vault } = c.get("service");
    const { account, sender } = readParams(c, ApprovalParamSchema);
    return c.json({
      data: { owner: account, sender, approvalType: vault.getApproval(account, sender) },
    });
  });

  routes.post("/approvals", async (c) => {
    const { vault } = c.get("service");
    const owner = c.get("account");
    const body = await readBody(c, ApproveSchema);
    vault.approve(owner, body.sender, body.approvalType);
    return c.json({ data: { owner, sender: body.sender, approvalType: body.approvalType } });
  });

  return routes;
}
