/**
 * @termvault/multivault — Approvals.
 *
 * Who may deposit or redeem on behalf of whom. Acting for yourself
 * needs no approval, and nobody can approve themselves.
 */

import { MULTIVAULT_EVENTS } from "@termvault/event-store";
import type { Address } from "@termvault/types";
import type { EventRecorder } from "./events.js";
import type { Journal } from "./journal.js";
import { JournaledMap } from "./journal.js";
import type { ApprovalType } from "./types.js";
import { MultiVaultError } from "./types.js";

export const APPROVAL_TYPES: readonly ApprovalType[] = ["none", "deposit", "redemption", "both"];

export function isApprovalType(value: unknown): value is ApprovalType {
  return typeof value === "string" && APPROVAL_TYPES.some((t) => t === value);
}

function sameAccount(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function approvalKey(owner: Address, sender: Address): string {
  return `${owner.toLowerCase()}|${sender.toLowerCase()}`;
}

export class ApprovalRegistry {
  private readonly approvals: JournaledMap<string, ApprovalType>;

  constructor(
    journal: Journal,
    private readonly recorder: EventRecorder,
  ) {
    this.approvals = new JournaledMap(journal);
  }

  /**
   * Set what `sender` may do for `owner`. "none" revokes.
   *
   * @throws MultiVaultError CANNOT_APPROVE_SELF
   */
  approve(owner: Address, sender: Address, approvalType: ApprovalType): void {
    if (sameAccount(owner, sender)) {
      throw new MultiVaultError("CANNOT_APPROVE_SELF", "An account cannot approve or revoke itself");
    }
    const key = approvalKey(owner, sender);
    if (approvalType === "none") {
      this.approvals.delete(key);
    } else {
      this.approvals.set(key, approvalType);
    }
    this.recorder.emit(MULTIVAULT_EVENTS.APPROVAL_CHANGED, { owner, sender, approvalType });
  }

  getApproval(owner: Address, sender: Address): ApprovalType {
    return this.approvals.get(approvalKey(owner, sender)) ?? "none";
  }

  canDeposit(sender: Address, receiver: Address): boolean {
    if (sameAccount(sender, receiver)) return true;
    const approval = this.getApproval(receiver, sender);
    return approval === "deposit" || approval === "both";
  }

  canRedeem(sender: Address, receiver: Address): boolean {
    if (sameAccount(sender, receiver)) return true;
    const approval = this.getApproval(receiver, sender);
    return approval === "redemption" || approval === "both";
  }
}
