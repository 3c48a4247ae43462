/**
 * @flatchain/node — Ledger facade.
 *
 * Config (zod), logging (pino) and LedgerNode, which keeps accounts,
 * pending transfers and blocks consistent with the store on disk.
 *
 * @packageDocumentation
 */

export { LedgerNode, StoreJournal } from "./ledger-node.js";
export type { LedgerNodeOptions } from "./ledger-node.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
