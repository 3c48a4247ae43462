/**
 * @flatchain/ledger — Canonical payload text.
 *
 * These strings are what gets signed and what ends up inside blocks.
 * Changing them changes every signature and block hash.
 */

import type { TransferIntent } from "@flatchain/types";

export function transferPayload(intent: TransferIntent): string {
  return `from: ${intent.source} -- to: ${intent.dest} -- amount: ${intent.amount}`;
}

export function coinbasePayload(subsidy: number, miner: string): string {
  return `Reward $${subsidy} to ${miner}`;
}
