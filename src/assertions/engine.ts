import type { CifDocument } from '../cif/document.js';
import type { AssertionOutcome } from '../types/result.js';
import type { CifResult, CommandStatus, ExpectedResult, StatusResult } from '../types/suite.js';
import { isStatusResult } from '../types/suite.js';
import { runCheck } from './checks.js';
import { labelOf } from './utils.js';

export interface EvaluationResult {
  passed: boolean;
  outcomes: AssertionOutcome[];
}

/**
 * What a finished command left behind to check against
 */
export interface CommandOutput {
  status: CommandStatus;
  document?: CifDocument;
}

/**
 * Evaluate one CIF check against a parsed document
 */
export function evaluate(result: CifResult, document: CifDocument): AssertionOutcome {
  return runCheck(result, document);
}

/**
 * Compare the terminal command status with the expected one
 */
export function evaluateStatus(result: StatusResult, status: CommandStatus): AssertionOutcome {
  const label = `status ${result.expected}`;
  if (status === result.expected) {
    return { passed: true, label, kind: 'pass', detail: `Command finished with status '${status}'` };
  }
  return {
    passed: false,
    label,
    kind: 'status-mismatch',
    detail: `Expected status '${result.expected}', got '${status}'`,
    expected: result.expected,
    actual: status,
  };
}

/**
 * Evaluate every expected result of a case, in declaration order.
 * CIF checks fail with no-document when the command produced no output.
 */
export function evaluateExpectedResults(
  results: readonly ExpectedResult[],
  output: CommandOutput
): EvaluationResult {
  const outcomes = results.map((result): AssertionOutcome => {
    if (isStatusResult(result)) {
      return evaluateStatus(result, output.status);
    }
    if (!output.document) {
      return {
        passed: false,
        label: labelOf(result),
        kind: 'no-document',
        detail: `No output document to check (command status: ${output.status})`,
      };
    }
    return evaluate(result, output.document);
  });

  return {
    passed: outcomes.every((o) => o.passed),
    outcomes,
  };
}
