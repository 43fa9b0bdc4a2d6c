/**
 * Type barrel — re-exports all public types from @termvault/node.
 */

// DTOs
export {
  AddressSchema,
  TermIdSchema,
  HexDataSchema,
  AmountSchema,
  CurveIdSchema,
  PaginationQuerySchema,
  CreateAtomSchema,
  CreateAtomsSchema,
  CreateTripleSchema,
  CreateTriplesSchema,
  DepositSchema,
  DepositBatchSchema,
  RedeemSchema,
  RedeemBatchSchema,
  ApproveSchema,
  PauseSchema,
  MintSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  CreateAtomDto,
  CreateAtomsDto,
  CreateTripleDto,
  CreateTriplesDto,
  DepositDto,
  DepositBatchDto,
  RedeemDto,
  RedeemBatchDto,
  ApproveDto,
  PauseDto,
  MintDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, RequestValidationError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope, ValidationIssue } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Views
export type {
  FeesView,
  VaultView,
  CreationPreviewView,
  DepositPreviewView,
  RedeemPreviewView,
} from "./views.js";

// App env
export type { AppEnv } from "./api-contract.js";
