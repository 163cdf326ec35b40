/**
 * Unit tests for calculator.ts
 */

import { describe, expect, it } from "vitest";

import { DEFAULT_INPUTS } from "../../../src/config/defaults.js";
import {
  annualizeDailyCost,
  calculateTokensPerShift,
  computeCostReport,
} from "../../../src/estimator/calculator.js";

import type { CostInputs } from "../../../src/types/index.js";

const smallClinic: CostInputs = {
  prompts_per_shift: 12,
  chain_multiplier: 3,
  tokens_per_call: 750,
  price_per_1000_tokens: 0.002,
  doctors_per_shift: 4,
  shifts_per_day: 2,
};

describe("calculateTokensPerShift", () => {
  it("multiplies prompts, chain multiplier and tokens per call", () => {
    expect(calculateTokensPerShift(DEFAULT_INPUTS)).toBe(500_000);
    expect(calculateTokensPerShift(smallClinic)).toBe(27_000);
  });
});

describe("annualizeDailyCost", () => {
  it("uses twelve 30-day months by default basis", () => {
    expect(annualizeDailyCost(900, "months")).toBe(324_000);
  });

  it("uses 365 days on the calendar basis", () => {
    expect(annualizeDailyCost(900, "days")).toBe(328_500);
  });
});

describe("computeCostReport", () => {
  it("reproduces the reference scenario", () => {
    const report = computeCostReport(DEFAULT_INPUTS);

    expect(report.tokens_per_shift).toBe(500_000);
    expect(report.cost_per_shift).toBeCloseTo(30, 10);
    expect(report.cost_per_hospital_shift).toBeCloseTo(300, 10);
    expect(report.daily_cost).toBeCloseTo(900, 10);
    expect(report.monthly_cost).toBeCloseTo(27_000, 8);
    expect(report.annual_cost).toBeCloseTo(324_000, 6);
    expect(report.annual_basis).toBe("months");
  });

  it("derives the annual figure from 365 days on the calendar basis", () => {
    const report = computeCostReport(DEFAULT_INPUTS, "days");

    expect(report.annual_cost).toBeCloseTo(328_500, 6);
    expect(report.annual_cost).toBeCloseTo(report.daily_cost * 365, 6);
    expect(report.annual_basis).toBe("days");
  });

  it("chains each figure from the previous one", () => {
    const report = computeCostReport(smallClinic);

    // 27,000 tokens at $0.002/1K = $0.054 per doctor shift
    expect(report.cost_per_shift).toBeCloseTo(0.054, 12);
    expect(report.cost_per_hospital_shift).toBeCloseTo(
      report.cost_per_shift * smallClinic.doctors_per_shift,
      12,
    );
    expect(report.daily_cost).toBeCloseTo(
      report.cost_per_hospital_shift * smallClinic.shifts_per_day,
      12,
    );
    expect(report.monthly_cost).toBeCloseTo(report.daily_cost * 30, 10);
    expect(report.annual_cost).toBeCloseTo(report.monthly_cost * 12, 10);
  });

  it("is deterministic", () => {
    expect(computeCostReport(smallClinic)).toEqual(
      computeCostReport(smallClinic),
    );
  });

  it("doubles every figure when the price doubles", () => {
    const base = computeCostReport(smallClinic);
    const doubled = computeCostReport({
      ...smallClinic,
      price_per_1000_tokens: smallClinic.price_per_1000_tokens * 2,
    });

    expect(doubled.cost_per_shift).toBeCloseTo(base.cost_per_shift * 2, 12);
    expect(doubled.cost_per_hospital_shift).toBeCloseTo(
      base.cost_per_hospital_shift * 2,
      12,
    );
    expect(doubled.daily_cost).toBeCloseTo(base.daily_cost * 2, 12);
    expect(doubled.monthly_cost).toBeCloseTo(base.monthly_cost * 2, 10);
    expect(doubled.annual_cost).toBeCloseTo(base.annual_cost * 2, 10);
  });

  it("yields zero costs for a zero price", () => {
    const report = computeCostReport({
      ...DEFAULT_INPUTS,
      price_per_1000_tokens: 0,
    });

    expect(report.tokens_per_shift).toBe(500_000);
    expect(report.cost_per_shift).toBe(0);
    expect(report.cost_per_hospital_shift).toBe(0);
    expect(report.daily_cost).toBe(0);
    expect(report.monthly_cost).toBe(0);
    expect(report.annual_cost).toBe(0);
  });

  it("echoes a frozen copy of the inputs", () => {
    const inputs = { ...smallClinic };
    const report = computeCostReport(inputs);

    expect(report.inputs).toEqual(smallClinic);
    expect(report.inputs).not.toBe(inputs);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.inputs)).toBe(true);
  });
});
