/**
 * Unit tests for runEstimation
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createDefaultConfig } from "../../../src/config/defaults.js";
import { runEstimation } from "../../../src/estimator/index.js";
import { InputClosedError } from "../../../src/utils/line-reader.js";
import { configureLogger, resetLogger } from "../../../src/utils/logging.js";
import { createScriptedReader } from "../../mocks/prompt-reader.js";

import type { EstimatorConfig } from "../../../src/types/index.js";

function captureOutput(): { chunks: string[]; write: (text: string) => void } {
  const chunks: string[] = [];
  return {
    chunks,
    write: (text) => {
      chunks.push(text);
    },
  };
}

describe("runEstimation", () => {
  let config: EstimatorConfig;

  beforeEach(() => {
    config = createDefaultConfig();
    configureLogger({ colors: false });
    vi.spyOn(console, "error").mockImplementation(vi.fn());
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("prompts, computes and writes the table", async () => {
    const reader = createScriptedReader(["", "", "", "", "", ""]);
    const output = captureOutput();

    const report = await runEstimation(config, {
      reader,
      write: output.write,
    });

    expect(report.daily_cost).toBeCloseTo(900, 10);
    expect(reader.prompts).toHaveLength(6);
    expect(output.chunks[0]).toBe("\n");
    expect(output.chunks[1]).toMatch(/^Scenario Description:\n/);
    expect(output.chunks[1]).toContain(
      "| Daily Costs of OpenAI API Calls         | $     900.00 |",
    );
  });

  it("survives a non-numeric answer", async () => {
    const reader = createScriptedReader(["many", "60", "", "", "", "", ""]);
    const output = captureOutput();

    const report = await runEstimation(config, {
      reader,
      write: output.write,
    });

    expect(report.inputs.prompts_per_shift).toBe(60);
    expect(reader.prompts[0]).toBe(reader.prompts[1]);
    expect(console.error).toHaveBeenCalledWith(
      '[WARN] Invalid input: "many" is not a number',
    );
  });

  it("writes json without a leading blank line", async () => {
    const output = captureOutput();

    await runEstimation(
      { ...config, assume_defaults: true, output: "json" },
      { reader: createScriptedReader([]), write: output.write },
    );

    expect(output.chunks).toHaveLength(1);
    const parsed = JSON.parse(output.chunks[0] ?? "") as {
      monthly_cost: number;
    };
    expect(parsed.monthly_cost).toBe(27000);
  });

  it("applies the annual basis", async () => {
    const report = await runEstimation(
      { ...config, assume_defaults: true, annual_basis: "days" },
      { reader: createScriptedReader([]), write: vi.fn() },
    );

    expect(report.annual_cost).toBeCloseTo(328_500, 6);
  });

  it("writes nothing when input closes", async () => {
    const write = vi.fn();

    await expect(
      runEstimation(config, { reader: createScriptedReader(["10"]), write }),
    ).rejects.toBeInstanceOf(InputClosedError);
    expect(write).not.toHaveBeenCalled();
  });
});
