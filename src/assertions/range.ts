import { DefinitionError } from '../errors.js';
import { formatNumber } from '../cif/values.js';
import { describeRangeProblem, type RangeFields } from '../types/suite.js';

export interface Range {
  min: number;
  max: number;
}

/**
 * Normalize a within check to an inclusive [min, max] range.
 * Throws DefinitionError for a malformed range.
 */
export function resolveRange(fields: RangeFields): Range {
  const problem = describeRangeProblem(fields);
  if (problem) {
    throw new DefinitionError(problem);
  }

  const { expected_value, allowed_deviation, min_value, max_value } = fields;
  if (min_value !== undefined && max_value !== undefined) {
    return { min: min_value, max: max_value };
  }
  if (expected_value !== undefined && allowed_deviation !== undefined) {
    return { min: expected_value - allowed_deviation, max: expected_value + allowed_deviation };
  }
  throw new DefinitionError('Within check has no range');
}

export function inRange(value: number, range: Range): boolean {
  return range.min <= value && value <= range.max;
}

export function formatRange(range: Range): string {
  return `[${formatNumber(range.min)}, ${formatNumber(range.max)}]`;
}
