/**
 * Cost estimation type definitions.
 */

/**
 * Usage parameters for one estimate.
 * Field order matches the order in which they are prompted.
 */
export interface CostInputs {
  readonly prompts_per_shift: number;
  /** API calls triggered by one logical prompt (chains, augmentation) */
  readonly chain_multiplier: number;
  readonly tokens_per_call: number;
  /** USD */
  readonly price_per_1000_tokens: number;
  readonly doctors_per_shift: number;
  readonly shifts_per_day: number;
}

/**
 * Name of a CostInputs field.
 */
export type CostInputField = keyof CostInputs;

/**
 * How annual cost is derived from daily cost.
 * - months: 30-day months, 12 per year
 * - days: 365-day calendar year
 */
export type AnnualBasis = "months" | "days";

/**
 * Derived cost figures. Amounts are unrounded USD.
 */
export interface CostReport {
  readonly inputs: CostInputs;
  readonly annual_basis: AnnualBasis;
  readonly tokens_per_shift: number;
  /** One doctor's shift */
  readonly cost_per_shift: number;
  /** All doctors on duty for one shift */
  readonly cost_per_hospital_shift: number;
  readonly daily_cost: number;
  readonly monthly_cost: number;
  readonly annual_cost: number;
}

/**
 * Report figures rendered as table rows, in display order.
 */
export type CostFigure =
  | "cost_per_shift"
  | "cost_per_hospital_shift"
  | "daily_cost"
  | "monthly_cost"
  | "annual_cost";
