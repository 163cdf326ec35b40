/**
 * Default configuration values.
 */

import type {
  CostInputField,
  CostInputs,
  EstimatorConfig,
  InputFieldSpec,
  ReportLabels,
} from "../types/index.js";

/**
 * Default usage scenario.
 * Price is GPT-4 list price at the time the defaults were chosen.
 */
export const DEFAULT_INPUTS: CostInputs = {
  prompts_per_shift: 50,
  chain_multiplier: 5,
  tokens_per_call: 2000,
  price_per_1000_tokens: 0.06,
  doctors_per_shift: 10,
  shifts_per_day: 3,
};

/**
 * Prompts in collection order.
 */
export const INPUT_FIELDS: readonly InputFieldSpec[] = [
  {
    field: "prompts_per_shift",
    prompt: "Enter the number of prompts sent per doctor's shift",
    default_value: DEFAULT_INPUTS.prompts_per_shift,
    allow_zero: false,
  },
  {
    field: "chain_multiplier",
    prompt: "Enter the chain/interaction/augmentation multiplier",
    default_value: DEFAULT_INPUTS.chain_multiplier,
    allow_zero: false,
  },
  {
    field: "tokens_per_call",
    prompt: "Enter the average tokens used per API call",
    default_value: DEFAULT_INPUTS.tokens_per_call,
    allow_zero: false,
  },
  {
    field: "price_per_1000_tokens",
    prompt: "Enter the API price per 1000 tokens (in $)",
    default_value: DEFAULT_INPUTS.price_per_1000_tokens,
    allow_zero: true,
  },
  {
    field: "doctors_per_shift",
    prompt: "Enter the number of doctors on shift per hospital",
    default_value: DEFAULT_INPUTS.doctors_per_shift,
    allow_zero: false,
  },
  {
    field: "shifts_per_day",
    prompt: "Enter the number of shifts per day",
    default_value: DEFAULT_INPUTS.shifts_per_day,
    allow_zero: false,
  },
];

/**
 * Fields whose product is tokens per shift.
 */
export const TOKEN_FACTORS: readonly CostInputField[] = [
  "prompts_per_shift",
  "chain_multiplier",
  "tokens_per_call",
];

/**
 * Calendar constants used to scale daily cost.
 */
export const CALENDAR = {
  days_per_month: 30,
  months_per_year: 12,
  days_per_year: 365,
} as const;

/**
 * Default report labels.
 */
export const DEFAULT_LABELS: ReportLabels = {
  app_name: "Doctor Diagnosis Assistant App",
  provider: "OpenAI",
};

/**
 * Create default configuration.
 *
 * @returns Complete configuration with defaults
 */
export function createDefaultConfig(): EstimatorConfig {
  return {
    output: "table",
    annual_basis: "months",
    assume_defaults: false,
    labels: { ...DEFAULT_LABELS },
    verbose: false,
    color: true,
  };
}
