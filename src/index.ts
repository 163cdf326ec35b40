#!/usr/bin/env node
/**
 * llm-shift-cost CLI entry point.
 *
 * With no options, asks for each usage parameter in turn and prints the
 * scenario description and cost table.
 */

import chalk from "chalk";
import { Command } from "commander";

import { loadConfigWithOverrides, type CLIOptions } from "./config/index.js";
import { runEstimation } from "./estimator/index.js";
import { createLineReader, InputClosedError, logger } from "./utils/index.js";

const program = new Command();

program.configureHelp({
  styleTitle: (str) => chalk.bold.cyan(str),
  styleCommandText: (str) => chalk.green(str),
  styleDescriptionText: (str) => str,
  styleOptionText: (str) => chalk.yellow(str),
  styleArgumentText: (str) => chalk.magenta(str),
});

/**
 * Extract CLI options from commander options object.
 */
function extractCLIOptions(
  options: Record<string, unknown>,
): Partial<CLIOptions> {
  const cliOptions: Partial<CLIOptions> = {};

  if (typeof options["yes"] === "boolean") {
    cliOptions.yes = options["yes"];
  }
  if (typeof options["output"] === "string") {
    cliOptions.output = options["output"];
  }
  if (typeof options["annualBasis"] === "string") {
    cliOptions.annualBasis = options["annualBasis"];
  }
  if (typeof options["verbose"] === "boolean") {
    cliOptions.verbose = options["verbose"];
  }
  if (typeof options["color"] === "boolean") {
    cliOptions.color = options["color"];
  }

  return cliOptions;
}

program
  .name("llm-shift-cost")
  .description(
    "Estimate LLM API cost per shift, day, month and year for a hospital",
  )
  .version("0.1.0")
  .option("-y, --yes", "Use every default without prompting")
  .option("-o, --output <format>", "Output format: table|json|yaml")
  .option(
    "--annual-basis <basis>",
    "Annual cost basis: months (30 x 12 days) | days (365)",
  )
  .option("-v, --verbose", "Log intermediate values")
  .option("--no-color", "Disable colored log output")
  .action(async (options: Record<string, unknown>) => {
    const reader = createLineReader();
    try {
      const config = loadConfigWithOverrides(extractCLIOptions(options));

      logger.configure({
        colors: config.color,
        level: config.verbose ? "debug" : "info",
      });

      await runEstimation(config, {
        reader,
        write: (text) => {
          process.stdout.write(text);
        },
      });
    } catch (err) {
      if (err instanceof InputClosedError) {
        // End the dangling prompt line
        process.stdout.write("\n");
      }
      logger.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    } finally {
      reader.close();
    }
  });

await program.parseAsync();
