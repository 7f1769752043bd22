/**
 * Signature Recovery
 *
 * The curve and hash are a pluggable dependency of the verifier. The
 * default recoverer is viem's secp256k1 public-key recovery.
 */

import { recoverAddress, type Address, type Hex } from "viem";
import type { Signature } from "./types.js";

/**
 * Recover the identity that produced `signature` over `digest`.
 *
 * Implementations throw when no identity can be recovered.
 */
export interface SignatureRecoverer {
  recover(digest: Hex, signature: Signature): Promise<Address>;
}

/**
 * Map a 0/1 recovery id onto the 27/28 convention.
 */
export function normalizeV(v: number): number {
  return v === 0 || v === 1 ? v + 27 : v;
}

export const secp256k1Recoverer: SignatureRecoverer = {
  recover(digest, signature) {
    return recoverAddress({
      hash: digest,
      signature: {
        r: signature.r,
        s: signature.s,
        v: BigInt(normalizeV(signature.v)),
      },
    });
  },
};
