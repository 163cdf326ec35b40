/**
 * Configuration module exports.
 */

export {
  loadConfigWithOverrides,
  validateConfig,
  validateInputs,
  ConfigValidationError,
  type CLIOptions,
} from "./loader.js";

export {
  CostInputsSchema,
  EstimatorConfigSchema,
  OutputFormatSchema,
  AnnualBasisSchema,
  ReportLabelsSchema,
  fieldValueSchema,
  type ValidatedEstimatorConfig,
} from "./schema.js";

export {
  createDefaultConfig,
  DEFAULT_INPUTS,
  DEFAULT_LABELS,
  INPUT_FIELDS,
  TOKEN_FACTORS,
  CALENDAR,
} from "./defaults.js";

export {
  TOKENS_PER_PRICE_UNIT,
  calculateTokenCost,
  formatCost,
  formatCurrency,
} from "./pricing.js";
