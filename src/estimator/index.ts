/**
 * Estimator - collect inputs, compute costs, render the report.
 */

import { logger } from "../utils/logging.js";

import { computeCostReport } from "./calculator.js";
import { collectInputs } from "./input-collector.js";
import { renderReport } from "./report.js";

import type { CostReport, EstimatorConfig } from "../types/index.js";
import type { PromptReader } from "../utils/line-reader.js";

export {
  computeCostReport,
  calculateTokensPerShift,
  annualizeDailyCost,
} from "./calculator.js";
export {
  collectInputs,
  promptForField,
  parseFieldValue,
  formatPrompt,
  InvalidInputError,
  type CollectOptions,
  type CollectedValues,
} from "./input-collector.js";
export {
  renderReport,
  renderCostTable,
  describeScenario,
  costRows,
  type CostRow,
} from "./report.js";

/**
 * Console I/O used by a run.
 */
export interface EstimatorIO {
  reader: PromptReader;
  write: (text: string) => void;
}

/**
 * Run one estimate end to end.
 *
 * @param config - Estimator configuration
 * @param io - Prompt reader and output writer
 * @returns The computed report
 * @throws InputClosedError if input ends before every field is answered
 */
export async function runEstimation(
  config: EstimatorConfig,
  io: EstimatorIO,
): Promise<CostReport> {
  const inputs = await collectInputs(io.reader, {
    assumeDefaults: config.assume_defaults,
  });

  const report = computeCostReport(inputs, config.annual_basis);
  logger.debug(
    `tokens_per_shift=${String(report.tokens_per_shift)} cost_per_shift=${String(report.cost_per_shift)} daily_cost=${String(report.daily_cost)}`,
  );

  // Separate the rendered table from the prompts
  if (config.output === "table") {
    io.write("\n");
  }
  io.write(renderReport(report, config.output, config.labels));

  return report;
}
