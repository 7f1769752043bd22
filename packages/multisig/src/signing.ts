/**
 * Off-Platform Signing Kit
 *
 * Helpers for the signers' side of the protocol:
 *
 * 1. Read the module's current nonce and domain separator
 * 2. Build a signing request (digest) for the proposed action
 * 3. Each signer signs the digest
 * 4. The submitter orders signatures ascending by recovered address
 *
 * Step 4 is part of the protocol: the module rejects any other order.
 */

import { hexToBigInt, parseSignature, type Address, type Hex } from "viem";
import { actionDigest } from "./digest.js";
import { secp256k1Recoverer, type SignatureRecoverer } from "./recovery.js";
import type { Action, Signature } from "./types.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Anything that can produce a raw secp256k1 signature over a 32-byte hash.
 * viem's `privateKeyToAccount(...)` satisfies this.
 */
export interface DigestSigner {
  readonly address: Address;
  sign(parameters: { hash: Hex }): Promise<Hex>;
}

export interface SigningRequest {
  readonly action: Action;
  /** Nonce the digest is bound to; must equal the module nonce at submission */
  readonly nonce: bigint;
  readonly digest: Hex;
}

// =============================================================================
// Requests
// =============================================================================

export function createSigningRequest(
  domainSeparator: Hex,
  action: Action,
  nonce: bigint,
): SigningRequest {
  return {
    action,
    nonce,
    digest: actionDigest(domainSeparator, action, nonce),
  };
}

/**
 * Split a 65-byte signature into (v, r, s).
 */
export function toSignature(serialized: Hex): Signature {
  const { r, s, v, yParity } = parseSignature(serialized);
  if (v !== undefined) {
    return { r, s, v: Number(v) };
  }
  if (yParity === undefined) {
    throw new Error(`Signature has neither v nor yParity: ${serialized}`);
  }
  return { r, s, v: yParity + 27 };
}

export async function signRequest(
  signer: DigestSigner,
  request: SigningRequest,
): Promise<Signature> {
  return toSignature(await signer.sign({ hash: request.digest }));
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Order signatures ascending by the address each one recovers to.
 *
 * @throws If any signature cannot be recovered
 */
export async function sortSignatures(
  digest: Hex,
  signatures: readonly Signature[],
  recoverer: SignatureRecoverer = secp256k1Recoverer,
): Promise<readonly Signature[]> {
  const keyed = await Promise.all(
    signatures.map(async (signature) => ({
      signature,
      position: hexToBigInt(await recoverer.recover(digest, signature)),
    })),
  );

  keyed.sort((a, b) => (a.position < b.position ? -1 : a.position > b.position ? 1 : 0));
  return keyed.map((k) => k.signature);
}

/**
 * Sign `request` with every signer and return the signatures in
 * submission order.
 */
export async function collectSignatures(
  signers: readonly DigestSigner[],
  request: SigningRequest,
  recoverer: SignatureRecoverer = secp256k1Recoverer,
): Promise<readonly Signature[]> {
  const signatures = await Promise.all(signers.map((s) => signRequest(s, request)));
  return sortSignatures(request.digest, signatures, recoverer);
}
