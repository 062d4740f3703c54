/**
 * Type barrel — re-exports all public types from @yieldsplit/node.
 */

// DTOs
export {
  AmountSchema,
  AddressSchema,
  AssetSchema,
  SetSharesSchema,
  SetPreferenceSchema,
  DepositSchema,
  DistributeSchema,
  DistributeEqualSplitSchema,
  PreviewQuerySchema,
  FeeConfigSchema,
  TreasurySchema,
  AcceptedSplitsSchema,
  AuthorizedCallerSchema,
  EmergencyWithdrawSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  SetSharesDto,
  SetPreferenceDto,
  DepositDto,
  DistributeDto,
  DistributeEqualSplitDto,
  FeeConfigDto,
  EmergencyWithdrawDto,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, validationEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope, ValidationIssue } from "./error.js";

// Views
export {
  toAllocationView,
  toPlanView,
  toResultView,
  toStatsView,
  toFeePreviewView,
  toTransferView,
  toShareUpdateView,
} from "./views.js";

// App env
export type { AppEnv, ValidatedEnv, QueryEnv } from "./api-contract.js";
