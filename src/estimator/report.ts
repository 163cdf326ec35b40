/**
 * Report rendering - scenario description, cost table and structured
 * (json / yaml) output.
 */

import YAML from "yaml";

import { DEFAULT_LABELS } from "../config/defaults.js";
import { formatCost, formatCurrency } from "../config/pricing.js";

import type {
  CostFigure,
  CostInputs,
  CostReport,
  OutputFormat,
  ReportLabels,
} from "../types/index.js";

const TABLE_TITLE = "LLM Costing Analysis:";
const LABEL_MIN_WIDTH = 39;
const RULE_MIN_WIDTH = 57;

/**
 * A labelled table row.
 */
export interface CostRow {
  figure: CostFigure;
  label: string;
}

/**
 * Table rows in display order.
 *
 * @param labels - Report labels
 * @returns Rows with provider-specific labels
 */
export function costRows(labels: ReportLabels = DEFAULT_LABELS): CostRow[] {
  const { provider } = labels;
  return [
    { figure: "cost_per_shift", label: `${provider} Cost per shift` },
    { figure: "cost_per_hospital_shift", label: "Cost per hospital per shift" },
    { figure: "daily_cost", label: `Daily Costs of ${provider} API Calls` },
    {
      figure: "monthly_cost",
      label: `${provider} API costs per hospital per month`,
    },
    {
      figure: "annual_cost",
      label: `Annual cost per hospital for ${provider} API`,
    },
  ];
}

/**
 * Describe the scenario in one paragraph.
 *
 * @param inputs - Usage inputs
 * @param labels - Report labels
 * @returns Scenario description
 */
export function describeScenario(
  inputs: CostInputs,
  labels: ReportLabels = DEFAULT_LABELS,
): string {
  const { app_name: app, provider } = labels;
  return [
    `The scenario involves an example app '${app}', which utilizes the ${provider} API.`,
    `Each doctor's shift involves sending an average of ${String(inputs.prompts_per_shift)} prompts to the API.`,
    `The average chain callbacks/augmentation multiplier is set at ${String(inputs.chain_multiplier)},`,
    `with an average usage of ${String(inputs.tokens_per_call)} tokens per API call.`,
    `The cost of using the ${provider} API is ${formatCost(inputs.price_per_1000_tokens)} per 1000 tokens.`,
    `In each shift, there are ${String(inputs.doctors_per_shift)} doctors working at the hospital,`,
    `and the hospital operates ${String(inputs.shifts_per_day)} shifts per day.`,
  ].join(" ");
}

/**
 * Render the fixed-width cost table.
 *
 * Amounts are right-aligned one column wider than the longest formatted
 * amount, so every "$" lines up.
 *
 * @param report - Cost report
 * @param labels - Report labels
 * @returns Table lines joined with newlines
 */
export function renderCostTable(
  report: CostReport,
  labels: ReportLabels = DEFAULT_LABELS,
): string {
  const rows = costRows(labels).map((row) => ({
    label: row.label,
    amount: formatCurrency(report[row.figure]),
  }));

  const labelWidth = Math.max(
    LABEL_MIN_WIDTH,
    ...rows.map((row) => row.label.length),
  );
  const amountWidth = Math.max(...rows.map((row) => row.amount.length)) + 1;
  const rule = "-".repeat(RULE_MIN_WIDTH + labelWidth - LABEL_MIN_WIDTH);

  return [
    TABLE_TITLE,
    `  ${"Description".padEnd(labelWidth)} |       Cost `,
    rule,
    ...rows.map(
      (row) =>
        `| ${row.label.padEnd(labelWidth)} | $${row.amount.padStart(amountWidth)} |`,
    ),
    rule,
  ].join("\n");
}

/**
 * Render a report in the requested format.
 *
 * @param report - Cost report
 * @param format - Output format
 * @param labels - Report labels
 * @returns Rendered report ending in a newline
 */
export function renderReport(
  report: CostReport,
  format: OutputFormat = "table",
  labels: ReportLabels = DEFAULT_LABELS,
): string {
  switch (format) {
    case "table":
      return [
        "Scenario Description:",
        describeScenario(report.inputs, labels),
        "",
        renderCostTable(report, labels),
        "",
      ].join("\n");
    case "json":
      return `${JSON.stringify(report, null, 2)}\n`;
    case "yaml":
      return YAML.stringify(report);
  }
}
