#!/usr/bin/env node
/**
 * @quorumkit/demo: Terminal walkthrough of a 7-of-7 module.
 *
 * execute -> replay rejected -> short array rejected ->
 * remove signer -> removed signer rejected
 */

import chalk from "chalk";
import { runWalkthrough, type Narrator } from "./walkthrough.js";

const DELAY_MS = 600;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                    QUORUMKIT DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("            7-of-7 signature-gated actions                ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

const terminal: Narrator = {
  step(index, total, title) {
    const prefix = chalk.cyan.bold(`  Step ${index}/${total}`);
    const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
    console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
  },
  ok(message) {
    console.log(chalk.green("    ✓ ") + chalk.white(message));
  },
  info(label, value) {
    console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
  },
  rejected(code, message) {
    console.log(chalk.red("    ✗ ") + chalk.red.bold(code) + chalk.gray(`  ${message}`));
  },
  pause() {
    return sleep(DELAY_MS);
  },
};

async function run(): Promise<void> {
  banner();
  const result = await runWalkthrough(terminal);

  console.log();
  console.log(chalk.white("    Executed calls:      ") + chalk.cyan.bold(String(result.delivered)));
  console.log(chalk.white("    Trusted signers:     ") + chalk.cyan.bold(String(result.trustedSigners)));
  console.log();
  console.log(chalk.gray("    Every approval is bound to one nonce and one action."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
