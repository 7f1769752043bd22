/**
 * Digest Builder
 *
 * Produces the exact 32 bytes signers sign for an action at a given nonce.
 * The encoding is EIP-712: any wallet's signTypedData over the matching
 * typed data yields a signature the module accepts.
 *
 *   structHash = keccak256(typeHash ‖ encodedFields ‖ uint256(nonce))
 *   digest     = keccak256(0x1901 ‖ domainSeparator ‖ structHash)
 *
 * Signers must reproduce this bit-for-bit. A wrong nonce, field encoding
 * or domain makes every signature recover to an unrelated address, which
 * surfaces only as INVALID_SIGNATURES.
 */

import {
  concat,
  encodeAbiParameters,
  keccak256,
  numberToHex,
  parseAbiParameters,
  toHex,
  type Hex,
} from "viem";
import type { Action, ActionKind, MultisigDomain } from "./types.js";

// =============================================================================
// Type Strings
// =============================================================================

export const EIP712_DOMAIN_TYPE =
  "EIP712Domain(string name,uint256 chainId,address verifyingContract)";

export const ACTION_TYPES: Readonly<Record<ActionKind, string>> = {
  execute: "Execute(address target,uint256 value,bytes payload,uint256 nonce)",
  update_quorum: "UpdateQuorum(uint256 quorum,uint256 nonce)",
  update_signer: "UpdateSigner(address signer,bool trusted,uint256 nonce)",
};

export const EIP712_DOMAIN_TYPEHASH: Hex = keccak256(toHex(EIP712_DOMAIN_TYPE));

const TYPE_HASHES: Readonly<Record<ActionKind, Hex>> = {
  execute: keccak256(toHex(ACTION_TYPES.execute)),
  update_quorum: keccak256(toHex(ACTION_TYPES.update_quorum)),
  update_signer: keccak256(toHex(ACTION_TYPES.update_signer)),
};

const DIGEST_PREFIX: Hex = "0x1901";

// =============================================================================
// Domain Separator
// =============================================================================

/**
 * Hash the EIP-712 domain. Fixed for the lifetime of a deployment.
 */
export function computeDomainSeparator(domain: MultisigDomain): Hex {
  return keccak256(
    encodeAbiParameters(parseAbiParameters("bytes32, bytes32, uint256, address"), [
      EIP712_DOMAIN_TYPEHASH,
      keccak256(toHex(domain.name)),
      BigInt(domain.chainId),
      domain.verifyingContract,
    ]),
  );
}

// =============================================================================
// Action Encoding
// =============================================================================

export function typeHashOf(kind: ActionKind): Hex {
  return TYPE_HASHES[kind];
}

/**
 * ABI-encode an action's fields (everything but the nonce) as 32-byte words.
 * Dynamic `bytes` are replaced by their keccak256, per EIP-712.
 */
export function encodeActionFields(action: Action): Hex {
  switch (action.kind) {
    case "execute":
      return encodeAbiParameters(parseAbiParameters("address, uint256, bytes32"), [
        action.target,
        action.value,
        keccak256(action.payload),
      ]);
    case "update_quorum":
      return encodeAbiParameters(parseAbiParameters("uint256"), [BigInt(action.quorum)]);
    case "update_signer":
      return encodeAbiParameters(parseAbiParameters("address, bool"), [
        action.signer,
        action.trusted,
      ]);
  }
}

// =============================================================================
// Digest
// =============================================================================

/**
 * Build the digest for pre-encoded action fields.
 *
 * @param domainSeparator Output of computeDomainSeparator
 * @param typeHash keccak256 of the action's type string
 * @param encodedFields Output of encodeActionFields
 * @param nonce The module nonce the action is bound to
 */
export function buildDigest(
  domainSeparator: Hex,
  typeHash: Hex,
  encodedFields: Hex,
  nonce: bigint,
): Hex {
  const structHash = keccak256(
    concat([typeHash, encodedFields, numberToHex(nonce, { size: 32 })]),
  );
  return keccak256(concat([DIGEST_PREFIX, domainSeparator, structHash]));
}

/**
 * Convenience wrapper: digest for a typed action.
 */
export function actionDigest(domainSeparator: Hex, action: Action, nonce: bigint): Hex {
  return buildDigest(
    domainSeparator,
    typeHashOf(action.kind),
    encodeActionFields(action),
    nonce,
  );
}
