import type { CifDocument } from '../cif/document.js';
import {
  equalsLiteral,
  formatLiteral,
  formatNumber,
  formatValue,
  isUnknown,
  textOf,
  toNumber,
  type CifValue,
} from '../cif/values.js';
import { DefinitionError, errorMessage } from '../errors.js';
import type { AssertionOutcome } from '../types/result.js';
import type { CifResult } from '../types/suite.js';
import { isLoopResult } from '../types/suite.js';
import { formatRange, inRange, resolveRange } from './range.js';
import { resolveEntry } from './resolve.js';
import type { Resolution } from './types.js';
import { labelOf, subjectOf, truncate } from './utils.js';

type Check<T extends CifResult['test_type']> = (
  result: Extract<CifResult, { test_type: T }>,
  value: CifValue
) => AssertionOutcome;

function pass(result: CifResult, detail: string): AssertionOutcome {
  return { passed: true, label: labelOf(result), kind: 'pass', detail };
}

function lookupFailure(result: CifResult, resolution: Extract<Resolution, { found: false }>): AssertionOutcome {
  return {
    passed: false,
    label: labelOf(result),
    kind: resolution.kind,
    detail: resolution.detail,
  };
}

/**
 * Check that an entry equals the expected value
 */
export const checkMatch: Check<'match'> = (result, value) => {
  const subject = subjectOf(result);
  const expected = formatLiteral(result.expected_value);
  if (equalsLiteral(value, result.expected_value)) {
    return pass(result, `${subject} matches expected value ${expected}`);
  }
  return {
    passed: false,
    label: labelOf(result),
    kind: 'value-mismatch',
    detail: `${subject}: expected ${expected}, got ${truncate(formatValue(value))}`,
    expected,
    actual: truncate(formatValue(value)),
  };
};

/**
 * Check that an entry differs from a forbidden value
 */
export const checkNonMatch: Check<'non-match'> = (result, value) => {
  const subject = subjectOf(result);
  const forbidden = formatLiteral(result.forbidden_value);
  if (!equalsLiteral(value, result.forbidden_value)) {
    return pass(result, `${subject} does not match forbidden value ${forbidden}`);
  }
  return {
    passed: false,
    label: labelOf(result),
    kind: 'forbidden-value',
    detail: `${subject} has forbidden value ${forbidden}`,
    expected: `not ${forbidden}`,
    actual: truncate(formatValue(value)),
  };
};

/**
 * Check that a numeric entry lies in an inclusive range
 */
export const checkWithin: Check<'within'> = (result, value) => {
  const subject = subjectOf(result);
  const range = resolveRange(result);
  const shownRange = formatRange(range);

  const actual = toNumber(value);
  if (actual === undefined) {
    return {
      passed: false,
      label: labelOf(result),
      kind: 'not-numeric',
      detail: `${subject} value ${truncate(formatValue(value))} is not a valid number`,
      expected: shownRange,
      actual: truncate(formatValue(value)),
    };
  }

  if (inRange(actual, range)) {
    return pass(result, `${subject} value ${formatNumber(actual)} is within ${shownRange}`);
  }
  return {
    passed: false,
    label: labelOf(result),
    kind: 'out-of-range',
    detail: `${subject} value ${formatNumber(actual)} is outside ${shownRange}`,
    expected: shownRange,
    actual: formatNumber(actual),
  };
};

/**
 * Case-sensitive substring check on the entry's text
 */
export const checkContain: Check<'contain'> = (result, value) => {
  const subject = subjectOf(result);
  const text = textOf(value);
  if (text.includes(result.expected_value)) {
    return pass(result, `${subject} contains '${result.expected_value}'`);
  }
  return {
    passed: false,
    label: labelOf(result),
    kind: 'substring-absent',
    detail: `${subject} does not contain '${result.expected_value}' (actual: '${truncate(text)}')`,
    expected: `contains '${result.expected_value}'`,
    actual: `'${truncate(text)}'`,
  };
};

/**
 * Check that an entry holds a value; the unknown marker counts only with allow_unknown
 */
export const checkPresent: Check<'present'> = (result, value) => {
  const subject = subjectOf(result);
  if (isUnknown(value) && !result.allow_unknown) {
    return {
      passed: false,
      label: labelOf(result),
      kind: 'unknown-value',
      detail: `${subject} is present but has undefined value '${value.marker}' (allow_unknown is false)`,
      expected: 'a determined value',
      actual: value.marker,
    };
  }
  return pass(result, `${subject} is present with value ${truncate(formatValue(value))}`);
};

/**
 * Check that an entry is absent. A loop check still needs its row to exist.
 */
export function checkMissing(
  result: Extract<CifResult, { test_type: 'missing' }>,
  document: CifDocument
): AssertionOutcome {
  const subject = subjectOf(result);

  if (!isLoopResult(result)) {
    const name = result.cif_entry_name;
    if (!document.has(name)) {
      return pass(result, `${subject} is missing as expected`);
    }
    const value = document.getScalar(name);
    const table = document.tableOf(name);
    const found = value
      ? `with value ${truncate(formatValue(value))}`
      : `as a column of loop '${table?.name ?? ''}'`;
    return {
      passed: false,
      label: labelOf(result),
      kind: 'unexpectedly-present',
      detail: `${subject} should be missing but was found ${found}`,
      expected: 'missing',
      actual: value ? truncate(formatValue(value)) : 'loop column',
    };
  }

  const resolution = resolveEntry(result, document);
  if (resolution.found) {
    return {
      passed: false,
      label: labelOf(result),
      kind: 'unexpectedly-present',
      detail: `${subject} should be missing but was found with value ${truncate(formatValue(resolution.value))}`,
      expected: 'missing',
      actual: truncate(formatValue(resolution.value)),
    };
  }
  if (resolution.kind === 'column-not-found') {
    return pass(result, `${subject} is missing as expected`);
  }
  return lookupFailure(result, resolution);
}

/**
 * Resolve the entry and apply the check for its test type
 */
export function runCheck(result: CifResult, document: CifDocument): AssertionOutcome {
  if (result.test_type === 'missing') {
    return checkMissing(result, document);
  }

  if (result.test_type === 'within') {
    // Range problems surface before the document is consulted
    try {
      resolveRange(result);
    } catch (err) {
      if (err instanceof DefinitionError) {
        return {
          passed: false,
          label: labelOf(result),
          kind: 'definition-error',
          detail: `Invalid within check: ${errorMessage(err)}`,
        };
      }
      throw err;
    }
  }

  const resolution = resolveEntry(result, document);
  if (!resolution.found) {
    return lookupFailure(result, resolution);
  }

  switch (result.test_type) {
    case 'match':
      return checkMatch(result, resolution.value);
    case 'non-match':
      return checkNonMatch(result, resolution.value);
    case 'within':
      return checkWithin(result, resolution.value);
    case 'contain':
      return checkContain(result, resolution.value);
    case 'present':
      return checkPresent(result, resolution.value);
    default: {
      const _exhaustive: never = result;
      throw new Error(`Unknown test type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
