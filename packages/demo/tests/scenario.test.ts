import { describe, it, expect } from "vitest";
import pino from "pino";
import { runScenario, COUNCIL } from "../src/scenario.js";
import type { ScenarioReporter } from "../src/scenario.js";

function collectingReporter(): ScenarioReporter & { steps: string[]; warnings: string[] } {
  const steps: string[] = [];
  const warnings: string[] = [];
  return {
    steps,
    warnings,
    step: (title) => {
      steps.push(title);
    },
    ok: () => undefined,
    info: () => undefined,
    warn: (message) => {
      warnings.push(message);
    },
  };
}

describe("runScenario", () => {
  const config = {
    HOURGLASS_DELAY_SECONDS: 172_800n,
    HOURGLASS_REDEMPTION_RATE_BPS: 5_000n,
    HOURGLASS_TREASURY_WEI: 1_100_000n,
    HOURGLASS_MEMBERS: 100,
  };

  it("runs every step without warnings", () => {
    const reporter = collectingReporter();
    runScenario(config, reporter, pino({ level: "silent" }));

    expect(reporter.steps).toEqual([
      "Boot",
      "Set Redemption Rate",
      "Change Delay Through the Timelock",
      "Fund a Grant",
      "Hand Over Admin",
      "Redeem a Membership Unit",
      "Audit the Notification Log",
    ]);
    expect(reporter.warnings).toEqual([]);
  });

  it("ends in the expected state", () => {
    const summary = runScenario(config, collectingReporter(), pino({ level: "silent" }));

    expect(summary.finalDelay).toBe(345_600n);
    expect(summary.admin.toLowerCase()).toBe(COUNCIL);
    expect(summary.grant).toBe(110_000n);
    // pool 990,000 over 100 units: base 9,900 * 5,050 / 10,000
    expect(summary.redeemed).toBe(4_999n);
    expect(summary.treasury).toBe(985_001n);
    expect(summary.notifications).toBe(11);
    expect(summary.integrityValid).toBe(true);
  });

  it("caps the doubled delay at the maximum", () => {
    const summary = runScenario(
      { ...config, HOURGLASS_DELAY_SECONDS: 2_000_000n },
      collectingReporter(),
      pino({ level: "silent" }),
    );
    expect(summary.finalDelay).toBe(2_592_000n);
  });
});
