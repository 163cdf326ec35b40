/**
 * Zod validation schemas for inputs and configuration.
 */

import { z } from "zod";

import { TOKEN_FACTORS } from "./defaults.js";

/**
 * A finite number greater than zero.
 */
const PositiveNumber = z
  .number()
  .finite()
  .positive("must be greater than 0");

/**
 * A finite number of zero or more.
 */
const NonNegativeNumber = z
  .number()
  .finite()
  .nonnegative("must be 0 or greater");

/**
 * Cost inputs schema.
 */
export const CostInputsSchema = z.object({
  prompts_per_shift: PositiveNumber,
  chain_multiplier: PositiveNumber,
  tokens_per_call: PositiveNumber,
  price_per_1000_tokens: NonNegativeNumber,
  doctors_per_shift: PositiveNumber,
  shifts_per_day: PositiveNumber,
}).refine(
  (inputs) =>
    Number.isFinite(
      TOKEN_FACTORS.reduce((product, field) => product * inputs[field], 1),
    ),
  {
    message:
      "prompts_per_shift * chain_multiplier * tokens_per_call is too large",
    path: ["tokens_per_call"],
  },
);

/**
 * Single field value schema.
 *
 * @param allowZero - Accept zero as well as positive values
 * @returns Schema for the field
 */
export function fieldValueSchema(allowZero: boolean): z.ZodNumber {
  return allowZero ? NonNegativeNumber : PositiveNumber;
}

/**
 * Output format schema.
 */
export const OutputFormatSchema = z.enum(["table", "json", "yaml"]);

/**
 * Annual basis schema.
 */
export const AnnualBasisSchema = z.enum(["months", "days"]);

/**
 * Report labels schema.
 */
export const ReportLabelsSchema = z.object({
  app_name: z.string().min(1, "App name is required"),
  provider: z.string().min(1, "Provider name is required"),
});

/**
 * Complete estimator configuration schema.
 */
export const EstimatorConfigSchema = z.object({
  output: OutputFormatSchema.default("table"),
  annual_basis: AnnualBasisSchema.default("months"),
  assume_defaults: z.boolean().default(false),
  labels: ReportLabelsSchema,
  verbose: z.boolean().default(false),
  color: z.boolean().default(true),
});

/**
 * Type inference from schema.
 */
export type ValidatedEstimatorConfig = z.infer<typeof EstimatorConfigSchema>;
