/**
 * Cost calculator - derives shift, daily, monthly and annual cost from
 * usage inputs. Pure; no rounding is applied.
 */

import { CALENDAR } from "../config/defaults.js";
import { calculateTokenCost } from "../config/pricing.js";

import type { AnnualBasis, CostInputs, CostReport } from "../types/index.js";

/**
 * Tokens consumed by one doctor in one shift.
 *
 * @param inputs - Usage inputs
 * @returns Token count
 */
export function calculateTokensPerShift(inputs: CostInputs): number {
  return (
    inputs.prompts_per_shift * inputs.chain_multiplier * inputs.tokens_per_call
  );
}

/**
 * Scale daily cost to a year.
 *
 * @param dailyCost - Cost per day in USD
 * @param basis - months: 30 x 12 days, days: 365 days
 * @returns Annual cost in USD
 */
export function annualizeDailyCost(
  dailyCost: number,
  basis: AnnualBasis,
): number {
  switch (basis) {
    case "months":
      return dailyCost * CALENDAR.days_per_month * CALENDAR.months_per_year;
    case "days":
      return dailyCost * CALENDAR.days_per_year;
  }
}

/**
 * Compute every cost figure for a scenario.
 *
 * @param inputs - Usage inputs
 * @param annualBasis - How the annual figure is derived
 * @returns Frozen cost report
 */
export function computeCostReport(
  inputs: CostInputs,
  annualBasis: AnnualBasis = "months",
): CostReport {
  const tokensPerShift = calculateTokensPerShift(inputs);
  const costPerShift = calculateTokenCost(
    tokensPerShift,
    inputs.price_per_1000_tokens,
  );
  const costPerHospitalShift = costPerShift * inputs.doctors_per_shift;
  const dailyCost = costPerHospitalShift * inputs.shifts_per_day;
  const monthlyCost = dailyCost * CALENDAR.days_per_month;

  return Object.freeze({
    inputs: Object.freeze({ ...inputs }),
    annual_basis: annualBasis,
    tokens_per_shift: tokensPerShift,
    cost_per_shift: costPerShift,
    cost_per_hospital_shift: costPerHospitalShift,
    daily_cost: dailyCost,
    monthly_cost: monthlyCost,
    annual_cost: annualizeDailyCost(dailyCost, annualBasis),
  });
}
