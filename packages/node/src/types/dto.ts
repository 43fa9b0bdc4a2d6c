/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Amounts travel
 * as base-10 strings and come out of parsing as bigint.
 */

import { z } from "zod";
import { isAddress, isTermId } from "@termvault/types";
import type { Address, Hex, TermId } from "@termvault/types";
import { APPROVAL_TYPES, isApprovalType } from "@termvault/multivault";
import type { ApprovalType } from "@termvault/multivault";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z.custom<Address>((v) => isAddress(v), {
  message: "Expected a 20-byte 0x-prefixed hex address",
});

export const TermIdSchema = z.custom<TermId>((v) => isTermId(v), {
  message: "Expected a 32-byte 0x-prefixed term id",
});

export const HexDataSchema = z.custom<Hex>(
  (v) => typeof v === "string" && /^0x([0-9a-fA-F]{2})*$/.test(v),
  { message: "Expected 0x-prefixed hex bytes" },
);

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer string")
  .max(78)
  .transform((v) => BigInt(v));

export const CurveIdSchema = z.number().int().positive();

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Path & Query Parameters
// =============================================================================

export const TermParamSchema = z.object({
  termId: TermIdSchema,
});

export const VaultParamSchema = z.object({
  termId: TermIdSchema,
  curveId: z.coerce.number().int().positive(),
});

export const AccountParamSchema = z.object({
  account: AddressSchema,
});

export const EpochParamSchema = z.object({
  epoch: z.coerce.number().int().min(0),
});

export const AssetsQuerySchema = z.object({
  assets: AmountSchema,
});

export const SharesQuerySchema = z.object({
  shares: AmountSchema,
});

// =============================================================================
// Term Creation
// =============================================================================

export const CreateAtomSchema = z.object({
  data: HexDataSchema,
  assets: AmountSchema,
});

export type CreateAtomDto = z.infer<typeof CreateAtomSchema>;

export const CreateAtomsSchema = z.object({
  data: z.array(HexDataSchema).min(1),
  assets: z.array(AmountSchema).min(1),
});

export type CreateAtomsDto = z.infer<typeof CreateAtomsSchema>;

export const CreateTripleSchema = z.object({
  subjectId: TermIdSchema,
  predicateId: TermIdSchema,
  objectId: TermIdSchema,
  assets: AmountSchema,
});

export type CreateTripleDto = z.infer<typeof CreateTripleSchema>;

export const CreateTriplesSchema = z.object({
  subjectIds: z.array(TermIdSchema).min(1),
  predicateIds: z.array(TermIdSchema).min(1),
  objectIds: z.array(TermIdSchema).min(1),
  assets: z.array(AmountSchema).min(1),
});

export type CreateTriplesDto = z.infer<typeof CreateTriplesSchema>;

// =============================================================================
// Deposits & Redemptions
// =============================================================================

export const DepositSchema = z.object({
  receiver: AddressSchema,
  termId: TermIdSchema,
  curveId: CurveIdSchema,
  assets: AmountSchema,
  minShares: AmountSchema.optional(),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const DepositBatchSchema = z.object({
  receiver: AddressSchema,
  termIds: z.array(TermIdSchema).min(1),
  curveIds: z.array(CurveIdSchema).min(1),
  assets: z.array(AmountSchema).min(1),
  minShares: z.array(AmountSchema).min(1),
});

export type DepositBatchDto = z.infer<typeof DepositBatchSchema>;

export const RedeemSchema = z.object({
  receiver: AddressSchema,
  termId: TermIdSchema,
  curveId: CurveIdSchema,
  shares: AmountSchema,
  minAssets: AmountSchema.optional(),
});

export type RedeemDto = z.infer<typeof RedeemSchema>;

export const RedeemBatchSchema = z.object({
  receiver: AddressSchema,
  termIds: z.array(TermIdSchema).min(1),
  curveIds: z.array(CurveIdSchema).min(1),
  shares: z.array(AmountSchema).min(1),
  minAssets: z.array(AmountSchema).min(1),
});

export type RedeemBatchDto = z.infer<typeof RedeemBatchSchema>;

// =============================================================================
// Approvals
// =============================================================================

export const ApproveSchema = z.object({
  sender: AddressSchema,
  approvalType: z.custom<ApprovalType>((v) => isApprovalType(v), {
    message: `Expected one of: ${APPROVAL_TYPES.join(", ")}`,
  }),
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

// =============================================================================
// Administration
// =============================================================================

export const PauseSchema = z.object({
  paused: z.boolean(),
});

export type PauseDto = z.infer<typeof PauseSchema>;

export const MintSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export type MintDto = z.infer<typeof MintSchema>;

// =============================================================================
// Event Queries
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
