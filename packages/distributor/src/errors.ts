/**
 * Distributor errors.
 *
 * Every rejection carries a stable `code` and the `category` the code
 * belongs to. Errors are raised before any state changes, or inside a
 * distribution pass, which is then aborted.
 */

export type DistributorErrorCategory = "input" | "authorization" | "domain" | "system";

export type DistributorErrorCode =
  // input
  | "ZERO_ADDRESS"
  | "ZERO_AMOUNT"
  | "INVALID_SPLIT_PERCENT"
  | "EMPTY_BENEFICIARY_LIST"
  | "CONFIG_OUT_OF_BOUNDS"
  | "AMOUNT_OUT_OF_RANGE"
  // authorization
  | "UNAUTHORIZED_CALLER"
  | "MISSING_ROLE"
  // domain
  | "UNAPPROVED_BENEFICIARY"
  | "NO_BENEFICIARY_CONFIGURED"
  | "INSUFFICIENT_BALANCE"
  | "SHARE_UNDERFLOW"
  | "TRANSFER_FAILED"
  // system
  | "SYSTEM_PAUSED"
  | "REENTRANT_CALL";

export const ERROR_CATEGORIES: Readonly<Record<DistributorErrorCode, DistributorErrorCategory>> = {
  ZERO_ADDRESS: "input",
  ZERO_AMOUNT: "input",
  INVALID_SPLIT_PERCENT: "input",
  EMPTY_BENEFICIARY_LIST: "input",
  CONFIG_OUT_OF_BOUNDS: "input",
  AMOUNT_OUT_OF_RANGE: "input",
  UNAUTHORIZED_CALLER: "authorization",
  MISSING_ROLE: "authorization",
  UNAPPROVED_BENEFICIARY: "domain",
  NO_BENEFICIARY_CONFIGURED: "domain",
  INSUFFICIENT_BALANCE: "domain",
  SHARE_UNDERFLOW: "domain",
  TRANSFER_FAILED: "domain",
  SYSTEM_PAUSED: "system",
  REENTRANT_CALL: "system",
};

export class DistributorError extends Error {
  public readonly code: DistributorErrorCode;
  public readonly category: DistributorErrorCategory;

  constructor(code: DistributorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DistributorError";
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
  }
}
