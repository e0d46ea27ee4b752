import type { CommandStatus } from "./suite.js";

export type OutcomeKind =
  | "pass"
  | "value-mismatch"
  | "forbidden-value"
  | "entry-missing"
  | "row-not-found"
  | "column-not-found"
  | "not-numeric"
  | "out-of-range"
  | "substring-absent"
  | "unknown-value"
  | "unexpectedly-present"
  | "status-mismatch"
  | "no-document"
  | "definition-error";

export interface AssertionOutcome {
  passed: boolean;
  /** Short name of the check, e.g. "within _cell.length_a" */
  label: string;
  kind: OutcomeKind;
  detail: string;
  expected?: string;
  actual?: string;
}

export type CaseState = "passed" | "failed" | "error";

export interface ParameterSummary {
  name: string;
  type: "simple" | "external_file" | "internal_file";
  /** Literal value, file path, or upload name for inline files */
  value: string;
}

export interface CaseResult {
  caseName: string;
  commandName: string;
  parameters: ParameterSummary[];
  state: CaseState;
  commandStatus?: CommandStatus;
  outcomes: AssertionOutcome[];
  /** Setup or infrastructure failure; set when state is "error" */
  error?: string;
  /** Raw output document, kept for debug artifacts */
  outputText?: string;
  durationMs: number;
}

export interface SuiteResult {
  applicationSlug: string;
  applicationVersion: string;
  filePath: string;
  passed: boolean;
  cases: CaseResult[];
  debugDir?: string;
}

export interface Totals {
  suites: { passed: number; total: number };
  cases: { passed: number; total: number };
  assertions: { passed: number; total: number };
}

export interface RunReport {
  suites: SuiteResult[];
  totals: Totals;
  passed: boolean;
  /** Set when an unrecoverable infrastructure error stopped the run */
  aborted?: string;
}
