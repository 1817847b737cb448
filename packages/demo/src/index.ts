#!/usr/bin/env node
/**
 * @hourglass/demo — CLI walkthrough.
 *
 * Runs the executor lifecycle in your terminal against an in-process
 * chain. Configure with HOURGLASS_* environment variables.
 */

import chalk from "chalk";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runScenario } from "./scenario.js";
import type { ScenarioReporter } from "./scenario.js";

// =============================================================================
// Terminal output
// =============================================================================

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     HOURGLASS DEMO                      ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Timelocked Treasury Execution                  ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function terminalReporter(): ScenarioReporter {
  let step = 0;
  return {
    step(title) {
      step += 1;
      const prefix = chalk.cyan.bold(`  Step ${step}`);
      const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
      console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
    },
    ok(message) {
      console.log(chalk.green("    ✓ ") + chalk.white(message));
    },
    info(label, value) {
      console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
    },
    warn(message) {
      console.log(chalk.yellow("    ! ") + chalk.yellow(message));
    },
  };
}

// =============================================================================
// Main
// =============================================================================

function main(): void {
  const config = loadConfig();
  const logger = createLogger(config);

  banner();
  const summary = runScenario(config, terminalReporter(), logger);

  console.log();
  console.log(chalk.white("    Notifications:       ") + chalk.cyan.bold(String(summary.notifications)));
  console.log(chalk.white("    Delay:               ") + chalk.cyan.bold(`${summary.finalDelay} s`));
  console.log(chalk.white("    Admin:               ") + chalk.cyan.bold(summary.admin));
  console.log(chalk.white("    Grant paid:          ") + chalk.cyan.bold(`${summary.grant} wei`));
  console.log(chalk.white("    Redeemed:            ") + chalk.cyan.bold(`${summary.redeemed} wei`));
  console.log(chalk.white("    Treasury:            ") + chalk.cyan.bold(`${summary.treasury} wei`));
  console.log(
    chalk.white("    Log integrity:       ") +
      (summary.integrityValid ? chalk.green.bold("VALID") : chalk.red.bold("BROKEN")),
  );
  console.log();

  logger.flush();
}

try {
  main();
} catch (err: unknown) {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
}
