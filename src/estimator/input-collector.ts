/**
 * Input collector - prompts for each usage parameter, re-asking on
 * malformed or out-of-range answers.
 */

import { INPUT_FIELDS, TOKEN_FACTORS } from "../config/defaults.js";
import { validateInputs } from "../config/loader.js";
import { fieldValueSchema } from "../config/schema.js";
import { logger } from "../utils/logging.js";

import type {
  CostInputField,
  CostInputs,
  InputFieldSpec,
} from "../types/index.js";
import type { PromptReader } from "../utils/line-reader.js";

/**
 * Decimal or exponent notation only. Rejects hex, binary, "Infinity"
 * and grouped digits that Number() would otherwise accept or misread.
 */
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * An answer that cannot be used for a field.
 */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    public readonly field: CostInputField,
    public readonly text: string,
  ) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/**
 * Options for collectInputs.
 */
export interface CollectOptions {
  /** Prompt descriptors, in order (defaults to INPUT_FIELDS) */
  fields?: readonly InputFieldSpec[];
  /** Use every default without asking */
  assumeDefaults?: boolean;
}

/**
 * Build the prompt shown for a field.
 *
 * @param spec - Field descriptor
 * @returns Prompt text ending in ": "
 */
export function formatPrompt(spec: InputFieldSpec): string {
  return `${spec.prompt} [${String(spec.default_value)}]: `;
}

/**
 * Answers already accepted during one collection run.
 */
export type CollectedValues = Partial<Record<CostInputField, number>>;

/**
 * Parse an answer for a field. An empty answer selects the default.
 *
 * @param spec - Field descriptor
 * @param text - Raw answer
 * @param collected - Earlier answers, checked for tokens-per-shift overflow
 * @returns Parsed value
 * @throws InvalidInputError if the answer is not a usable number
 */
export function parseFieldValue(
  spec: InputFieldSpec,
  text: string,
  collected: CollectedValues = {},
): number {
  const value = parseNumber(spec, text);

  if (TOKEN_FACTORS.includes(spec.field)) {
    const tokensPerShift = TOKEN_FACTORS.reduce(
      (product, field) =>
        product * (field === spec.field ? value : (collected[field] ?? 1)),
      1,
    );
    if (!Number.isFinite(tokensPerShift)) {
      throw new InvalidInputError(
        `${spec.field} is too large: tokens per shift would overflow`,
        spec.field,
        text,
      );
    }
  }

  return value;
}

function parseNumber(spec: InputFieldSpec, text: string): number {
  const trimmed = text.trim();
  if (trimmed === "") {
    return spec.default_value;
  }

  const value = DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(
      `"${trimmed}" is not a number`,
      spec.field,
      text,
    );
  }

  const result = fieldValueSchema(spec.allow_zero).safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "is out of range";
    throw new InvalidInputError(`${spec.field} ${reason}`, spec.field, text);
  }

  // "-0" passes the range check; store it as 0
  return result.data + 0;
}

/**
 * Ask for one field until a usable answer is given.
 *
 * @param reader - Prompt reader
 * @param spec - Field descriptor
 * @param collected - Earlier answers in this run
 * @returns Parsed value
 * @throws InputClosedError if input ends first
 */
export async function promptForField(
  reader: PromptReader,
  spec: InputFieldSpec,
  collected: CollectedValues = {},
): Promise<number> {
  const prompt = formatPrompt(spec);

  for (;;) {
    const answer = await reader.ask(prompt);
    try {
      return parseFieldValue(spec, answer, collected);
    } catch (err) {
      if (!(err instanceof InvalidInputError)) {
        throw err;
      }
      logger.warn(`Invalid input: ${err.message}`);
    }
  }
}

/**
 * Collect all cost inputs.
 *
 * @param reader - Prompt reader
 * @param options - Collection options
 * @returns Validated inputs
 * @throws InputClosedError if input ends before every field is answered
 */
export async function collectInputs(
  reader: PromptReader,
  options: CollectOptions = {},
): Promise<CostInputs> {
  const fields = options.fields ?? INPUT_FIELDS;
  const values: CollectedValues = {};

  for (const spec of fields) {
    if (options.assumeDefaults === true) {
      logger.debug(`Using default ${spec.field}=${String(spec.default_value)}`);
      values[spec.field] = spec.default_value;
    } else {
      values[spec.field] = await promptForField(reader, spec, values);
    }
  }

  return validateInputs(values);
}
