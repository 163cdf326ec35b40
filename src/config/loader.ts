/**
 * Configuration resolution from CLI options with Zod validation.
 */

import { createDefaultConfig } from "./defaults.js";
import { CostInputsSchema, EstimatorConfigSchema } from "./schema.js";

import type { CostInputs, EstimatorConfig } from "../types/index.js";
import type { ZodError } from "zod";

/**
 * Configuration validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly zodError: ZodError,
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

/**
 * Format Zod issues as an indented list.
 */
function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
    .join("\n");
}

/**
 * Validate raw configuration object.
 *
 * @param rawConfig - Raw configuration object
 * @returns Validated configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(rawConfig: unknown): EstimatorConfig {
  const result = EstimatorConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${formatIssues(result.error)}`,
      result.error,
    );
  }

  return result.data;
}

/**
 * Validate a complete set of cost inputs.
 *
 * @param rawInputs - Raw inputs object
 * @returns Frozen, validated inputs
 * @throws ConfigValidationError if any field is missing or out of range
 */
export function validateInputs(rawInputs: unknown): CostInputs {
  const result = CostInputsSchema.safeParse(rawInputs);

  if (!result.success) {
    throw new ConfigValidationError(
      `Input validation failed:\n${formatIssues(result.error)}`,
      result.error,
    );
  }

  return Object.freeze(result.data);
}

/**
 * CLI options that can override config.
 */
export interface CLIOptions {
  yes?: boolean;
  /** Checked against the output format schema */
  output?: string;
  /** Checked against the annual basis schema */
  annualBasis?: string;
  verbose?: boolean;
  color?: boolean;
}

/**
 * Build configuration from defaults and CLI overrides.
 *
 * @param cliOptions - CLI option overrides
 * @returns Validated configuration
 * @throws ConfigValidationError if an override is invalid
 */
export function loadConfigWithOverrides(
  cliOptions: Partial<CLIOptions>,
): EstimatorConfig {
  return validateConfig(applyOverrides(createDefaultConfig(), cliOptions));
}

/**
 * Configuration before enum fields are validated.
 */
type UnvalidatedConfig = Omit<EstimatorConfig, "output" | "annual_basis"> & {
  output: string;
  annual_basis: string;
};

/**
 * Apply CLI overrides to configuration.
 *
 * @param config - Base configuration
 * @param options - CLI options
 * @returns Configuration with overrides applied
 */
function applyOverrides(
  config: EstimatorConfig,
  options: Partial<CLIOptions>,
): UnvalidatedConfig {
  const result: UnvalidatedConfig = { ...config };

  if (options.yes !== undefined) {
    result.assume_defaults = options.yes;
  }

  if (options.output !== undefined) {
    result.output = options.output;
  }

  if (options.annualBasis !== undefined) {
    result.annual_basis = options.annualBasis;
  }

  if (options.verbose !== undefined) {
    result.verbose = options.verbose;
  }

  if (options.color !== undefined) {
    result.color = options.color;
  }

  return result;
}
