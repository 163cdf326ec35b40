/**
 * Centralized type exports.
 */

// Cost types
export type {
  CostInputs,
  CostInputField,
  AnnualBasis,
  CostReport,
  CostFigure,
} from "./cost.js";

// Config types
export type {
  OutputFormat,
  InputFieldSpec,
  ReportLabels,
  EstimatorConfig,
} from "./config.js";
