/**
 * @flatchain/types — Shared record shapes.
 *
 * Every type here is a plain readonly data shape: what is written to
 * disk and what crosses package boundaries. No behavior lives here
 * beyond runtime guards.
 */

export type { AccountRecord, TransferIntent } from "./account.js";
export type { Block, Hash, StoreMetadata } from "./chain.js";
export { ZERO_HASH } from "./chain.js";
export {
  isHash,
  isAccountRecord,
  isTransferIntent,
  isBlock,
  isStoreMetadata,
} from "./guards.js";
