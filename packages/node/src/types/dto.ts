/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as base-10 digit strings and are parsed to bigint here.
 */

import { z } from "zod";
import { isUnitAmount, parseUnits } from "@yieldsplit/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z.string().transform((value, ctx) => {
  if (!isUnitAmount(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Expected an unsigned integer string",
    });
    return z.NEVER;
  }
  try {
    return parseUnits(value);
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Amount exceeds uint256" });
    return z.NEVER;
  }
});

export const AddressSchema = z.string().min(1).max(256);

export const AssetSchema = z.string().min(1).max(128);

// =============================================================================
// Shares
// =============================================================================

export const SetSharesSchema = z.object({
  stakeholder: AddressSchema,
  asset: AssetSchema,
  amount: AmountSchema,
});

export type SetSharesDto = z.infer<typeof SetSharesSchema>;

// =============================================================================
// Preferences
// =============================================================================

export const SetPreferenceSchema = z.object({
  beneficiary: AddressSchema,
  splitPercent: z.number().int(),
});

export type SetPreferenceDto = z.infer<typeof SetPreferenceSchema>;

// =============================================================================
// Custody
// =============================================================================

export const DepositSchema = z.object({
  asset: AssetSchema,
  amount: AmountSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

// =============================================================================
// Distributions
// =============================================================================

export const DistributeSchema = z.object({
  asset: AssetSchema,
  amount: AmountSchema,
});

export type DistributeDto = z.infer<typeof DistributeSchema>;

export const DistributeEqualSplitSchema = DistributeSchema.extend({
  beneficiaries: z.array(AddressSchema).max(1_000),
});

export type DistributeEqualSplitDto = z.infer<typeof DistributeEqualSplitSchema>;

export const PreviewQuerySchema = z.object({
  amount: AmountSchema,
});

// =============================================================================
// Admin
// =============================================================================

export const FeeConfigSchema = z.object({
  feeRecipient: AddressSchema,
  feeBps: z.number().int(),
});

export type FeeConfigDto = z.infer<typeof FeeConfigSchema>;

export const TreasurySchema = z.object({
  treasury: AddressSchema,
});

export const AcceptedSplitsSchema = z.object({
  splits: z.array(z.number()).max(100),
});

export const AuthorizedCallerSchema = z.object({
  caller: AddressSchema,
  authorized: z.boolean(),
});

export const EmergencyWithdrawSchema = z.object({
  asset: AssetSchema,
  to: AddressSchema,
  amount: AmountSchema,
});

export type EmergencyWithdrawDto = z.infer<typeof EmergencyWithdrawSchema>;

// =============================================================================
// Events
// =============================================================================

export const ListEventsQuerySchema = z.object({
  stream: z.string().min(1).optional(),
  from: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
