/**
 * @flatchain/store — Line encodings for accounts, intents and metadata.
 *
 * Fields are written in a fixed order so identical records produce
 * identical lines.
 */

import type { AccountRecord, StoreMetadata, TransferIntent } from "@flatchain/types";

export function encodeAccountRecord(record: AccountRecord): string {
  return JSON.stringify({
    name: record.name,
    balance: record.balance,
    signingKey: record.signingKey,
    verifyingKey: record.verifyingKey,
  });
}

export function encodeIntent(intent: TransferIntent): string {
  return JSON.stringify({ source: intent.source, dest: intent.dest, amount: intent.amount });
}

export function encodeMetadata(metadata: StoreMetadata): string {
  return JSON.stringify({
    difficultyBits: metadata.difficultyBits,
    subsidy: metadata.subsidy,
    height: metadata.height,
    segmentRecordCount: metadata.segmentRecordCount,
    currentSegmentIndex: metadata.currentSegmentIndex,
  });
}

/**
 * Parse a JSON line and check it against a guard.
 * Returns undefined for invalid JSON or a shape mismatch.
 */
export function decodeLine<T>(line: string, guard: (value: unknown) => value is T): T | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  return guard(parsed) ? parsed : undefined;
}
