/**
 * The 7-of-7 walkthrough, independent of how it is printed.
 *
 * Uses the multisig package directly (no HTTP server).
 */

import { getAddress, keccak256, toHex, type Address, type Hex } from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import {
  DispatchExecutor,
  Multisig,
  collectSignatures,
  createSigningRequest,
  isMultisigError,
  type Action,
  type MultisigErrorCode,
  type Signature,
} from "@quorumkit/multisig";

// =============================================================================
// Types
// =============================================================================

/** Receives the walkthrough's progress. */
export interface Narrator {
  step(index: number, total: number, title: string): void;
  ok(message: string): void;
  info(label: string, value: string): void;
  rejected(code: MultisigErrorCode, message: string): void;
  pause(): Promise<void>;
}

export interface WalkthroughResult {
  readonly nonce: bigint;
  readonly eventCount: number;
  readonly delivered: number;
  readonly trustedSigners: number;
}

export const SIGNER_COUNT = 7;
export const TOTAL_STEPS = 7;

const MODULE_ADDRESS: Address = getAddress("0x00000000000000000000000000000000000c0de1");
const TREASURY: Address = getAddress("0x0000000000000000000000000000000000007e57");

// =============================================================================
// Helpers
// =============================================================================

function demoSigners(): PrivateKeyAccount[] {
  const accounts: PrivateKeyAccount[] = [];
  for (let i = 0; i < SIGNER_COUNT; i++) {
    accounts.push(privateKeyToAccount(keccak256(toHex(`quorumkit-demo:signer-${i}`))));
  }
  return accounts;
}

function approve(
  multisig: Multisig,
  signers: readonly PrivateKeyAccount[],
  action: Action,
): Promise<readonly Signature[]> {
  return collectSignatures(
    signers,
    createSigningRequest(multisig.domainSeparator(), action, multisig.nonce()),
  );
}

function short(hex: Hex): string {
  return `${hex.slice(0, 10)}...${hex.slice(-6)}`;
}

/**
 * Await a submission that must fail with `code`.
 *
 * @throws If it succeeds or fails with anything else
 */
async function expectRejection(
  narrator: Narrator,
  submission: Promise<unknown>,
  code: MultisigErrorCode,
): Promise<void> {
  try {
    await submission;
  } catch (error) {
    if (isMultisigError(error) && error.code === code) {
      narrator.rejected(error.code, error.message);
      return;
    }
    throw error;
  }
  throw new Error(`Expected ${code}, but the action was accepted`);
}

// =============================================================================
// Walkthrough
// =============================================================================

export async function runWalkthrough(narrator: Narrator): Promise<WalkthroughResult> {
  // ─── Step 1: Boot ───────────────────────────────────────────────────

  narrator.step(1, TOTAL_STEPS, "Boot");

  const signers = demoSigners();
  const executor = new DispatchExecutor();
  const multisig = new Multisig(
    {
      name: "quorumkit-demo",
      chainId: 31337,
      verifyingContract: MODULE_ADDRESS,
      signers: signers.map((s) => s.address),
      quorum: SIGNER_COUNT,
    },
    { executor },
  );

  narrator.ok(`Module booted with ${SIGNER_COUNT} signers, quorum ${multisig.quorum()}`);
  narrator.info("domain", short(multisig.domainSeparator()));
  narrator.info("nonce", multisig.nonce().toString());
  await narrator.pause();

  // ─── Step 2: Execute ────────────────────────────────────────────────

  narrator.step(2, TOTAL_STEPS, "Execute");

  const transfer: Action = { kind: "execute", target: TREASURY, value: 1000n, payload: "0xc0ffee" };
  const approvals = await approve(multisig, signers, transfer);
  const executed = await multisig.execute(TREASURY, 1000n, "0xc0ffee", approvals);

  narrator.info("signatures", `${approvals.length}, ascending by signer address`);
  narrator.ok(`Call to ${short(TREASURY)} executed at nonce ${executed.nonce}`);
  narrator.info("next nonce", multisig.nonce().toString());
  await narrator.pause();

  // ─── Step 3: Replay ─────────────────────────────────────────────────

  narrator.step(3, TOTAL_STEPS, "Replay the same signatures");

  await expectRejection(
    narrator,
    multisig.execute(TREASURY, 1000n, "0xc0ffee", approvals),
    "INVALID_SIGNATURES",
  );
  narrator.info("reason", "the digest is bound to a nonce that is now spent");
  await narrator.pause();

  // ─── Step 4: Short Array ────────────────────────────────────────────

  narrator.step(4, TOTAL_STEPS, "Submit six of seven signatures");

  const fresh: Action = { kind: "execute", target: TREASURY, value: 0n, payload: "0x" };
  const all = await approve(multisig, signers, fresh);
  await expectRejection(
    narrator,
    multisig.execute(TREASURY, 0n, "0x", all.slice(0, SIGNER_COUNT - 1)),
    "SIGNATURE_INDEX_OUT_OF_RANGE",
  );
  await narrator.pause();

  // ─── Step 5: Remove a Signer ────────────────────────────────────────

  narrator.step(5, TOTAL_STEPS, "Remove a signer");

  const [removed] = signers.slice(-1);
  if (removed === undefined) {
    throw new Error("No signer to remove");
  }
  const removal: Action = { kind: "update_signer", signer: removed.address, trusted: false };
  await multisig.setSigner(removed.address, false, await approve(multisig, signers, removal));

  narrator.ok(`${short(removed.address)} is no longer trusted`);
  narrator.info("is signer", String(multisig.isSigner(removed.address)));
  await narrator.pause();

  // ─── Step 6: Removed Signer ─────────────────────────────────────────

  narrator.step(6, TOTAL_STEPS, "Sign with the removed signer");

  await expectRejection(
    narrator,
    multisig.execute(TREASURY, 0n, "0x", await approve(multisig, signers, fresh)),
    "INVALID_SIGNATURES",
  );
  const trustedSigners = signers.filter((s) => multisig.isSigner(s.address)).length;
  narrator.info("trusted", `${trustedSigners} signers left under quorum ${multisig.quorum()}`);
  await narrator.pause();

  // ─── Step 7: Summary ────────────────────────────────────────────────

  narrator.step(7, TOTAL_STEPS, "Summary");

  const result: WalkthroughResult = {
    nonce: multisig.nonce(),
    eventCount: multisig.getEventHistory().length,
    delivered: executor.getDelivered().length,
    trustedSigners,
  };

  narrator.info("events", String(result.eventCount));
  narrator.info("calls delivered", String(result.delivered));
  narrator.info("nonce", result.nonce.toString());

  return result;
}
