/**
 * @yieldsplit/custody — In-process custody ledger.
 *
 * @packageDocumentation
 */

export { CustodyLedger, EXTERNAL } from "./custody-ledger.js";
export type { CustodyLedgerOptions } from "./custody-ledger.js";
export type {
  CustodyTransfer,
  StagedTransfer,
  JournalFilter,
  ReceiverHook,
  TransferSession,
  CustodyPort,
  CustodyErrorCode,
} from "./types.js";
export { CustodyError } from "./types.js";
