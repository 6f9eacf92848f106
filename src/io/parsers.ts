/**
 * Text encodings of test data, as accepted by the CLI and the dispatcher
 *
 * - sample:        "1,2,3"
 * - sample pair:   "1,2,3|4,5,6"
 * - groups:        "1,2|3,4|5,6" or "[[1,2],[3,4],[5,6]]"
 * - nested arrays: "[[10,20],[30,40]]" (JSON)
 */

import { z, ZodError } from 'zod';
import { HypothesisError, ErrorCode } from '../core/errors';

const NumberToken = z
  .string()
  .trim()
  .min(1, 'Empty value')
  .pipe(z.coerce.number().finite());

const SampleSchema = z.array(NumberToken).min(1);

const NestedArraysSchema = z.array(z.array(z.number().finite())).min(1, 'Expected at least one row');

function invalidInput(message: string, input: string, error?: ZodError): HypothesisError {
  return new HypothesisError(ErrorCode.INVALID_INPUT, message, {
    input,
    ...(error
      ? { issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) }
      : {}),
  });
}

/**
 * Parse a comma-separated list of numbers
 *
 * @throws HypothesisError INVALID_INPUT for an empty list or a token that is
 *   not a finite number
 */
export function parseSample(text: string): number[] {
  const parsed = SampleSchema.safeParse(text.split(','));
  if (!parsed.success) {
    throw invalidInput('Sample must be a comma-separated list of finite numbers', text, parsed.error);
  }
  return parsed.data;
}

/**
 * Parse two samples separated by '|'
 */
export function parseSamplePair(text: string): [number[], number[]] {
  const parts = text.split('|');
  if (parts.length !== 2) {
    throw invalidInput(`Expected two samples separated by '|', got ${parts.length}`, text);
  }
  return [parseSample(parts[0]), parseSample(parts[1])];
}

/**
 * Parse a JSON array of number arrays
 */
export function parseNestedArrays(text: string): number[][] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new HypothesisError(ErrorCode.INVALID_INPUT, 'Input is not valid JSON', {
      input: text,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = NestedArraysSchema.safeParse(json);
  if (!parsed.success) {
    throw invalidInput('Expected a JSON array of number arrays', text, parsed.error);
  }
  return parsed.data;
}

/**
 * Parse groups for ANOVA, either '|'-separated lists or JSON arrays
 */
export function parseGroups(text: string): number[][] {
  if (text.trim().startsWith('[')) {
    return parseNestedArrays(text);
  }
  return text.split('|').map((part) => parseSample(part));
}
