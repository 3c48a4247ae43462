/**
 * @flatchain/chain — Signed message wire form.
 *
 * Transactions are carried in blocks as `payload|signature`, where the
 * signature is base58 text. Account names cannot contain `|`, so the
 * last `|` always separates the two parts.
 */

import { base58 } from "@scure/base";
import { ChainError } from "./types.js";

export interface SignedMessage {
  readonly payload: string;
  readonly signature: Uint8Array;
}

export const SIGNATURE_SEPARATOR = "|";

export function encodeSignedMessage(message: SignedMessage): string {
  return `${message.payload}${SIGNATURE_SEPARATOR}${base58.encode(message.signature)}`;
}

export function decodeSignedMessage(wire: string): SignedMessage {
  const at = wire.lastIndexOf(SIGNATURE_SEPARATOR);
  if (at < 0) {
    throw new ChainError("MALFORMED_TRANSACTION", `Missing signature separator in "${wire}"`);
  }

  let signature: Uint8Array;
  try {
    signature = base58.decode(wire.slice(at + 1));
  } catch {
    throw new ChainError("MALFORMED_TRANSACTION", `Signature is not base58 in "${wire}"`);
  }

  return { payload: wire.slice(0, at), signature };
}
