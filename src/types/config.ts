/**
 * Configuration type definitions.
 * Built from CLI options; there is no configuration file.
 */

import type { AnnualBasis, CostInputField } from "./cost.js";

/**
 * Report output format.
 */
export type OutputFormat = "table" | "json" | "yaml";

/**
 * Descriptor for one interactive prompt.
 */
export interface InputFieldSpec {
  field: CostInputField;
  prompt: string;
  default_value: number;
  /** Zero allowed when true, otherwise strictly positive */
  allow_zero: boolean;
}

/**
 * Names interpolated into the scenario description and table labels.
 */
export interface ReportLabels {
  app_name: string;
  provider: string;
}

/**
 * Resolved estimator configuration.
 */
export interface EstimatorConfig {
  output: OutputFormat;
  annual_basis: AnnualBasis;
  /** Skip prompts and use every default */
  assume_defaults: boolean;
  labels: ReportLabels;
  verbose: boolean;
  color: boolean;
}
