import { dirname, relative } from "node:path";
import { writeDebugArtifacts } from "../debug/reporter.js";
import { UnreachableError } from "../errors.js";
import type { CommandExecutor } from "../executor/types.js";
import type { CaseResult, RunReport, SuiteResult, TestSuite, Totals } from "../types/index.js";
import { formatTimestamp } from "../utils/files.js";
import { runCase } from "./case.js";

export interface LoadedSuite {
  suite: TestSuite;
  filePath: string;
}

export interface RunOptions {
  executor: CommandExecutor;
  /** Test location directory; suite paths are keyed relative to it */
  rootDir: string;
  /** Write failure artifacts here; off when undefined */
  debugDir?: string;
  /** Run timestamp for artifact directories; defaults to now */
  timestamp?: string;
  onLog?: (message: string) => void;
  onDebug?: (message: string) => void;
  onWarn?: (message: string) => void;
  onCaseComplete?: (result: CaseResult) => void;
  onSuiteComplete?: (result: SuiteResult) => void;
}

export interface SuiteRun {
  result: SuiteResult;
  /** Set when the API became unreachable during this suite */
  aborted?: string;
}

/**
 * Run the cases of one suite in declaration order
 */
export async function runSuite(loaded: LoadedSuite, options: RunOptions): Promise<SuiteRun> {
  const { suite, filePath } = loaded;
  options.onLog?.(`Running ${suite.application_slug} ${suite.application_version} (${suite.test_cases.length} cases)`);
  const cases: CaseResult[] = [];
  let aborted: string | undefined;

  for (const testCase of suite.test_cases) {
    try {
      const result = await runCase(testCase, {
        application: { slug: suite.application_slug, version: suite.application_version },
        suiteDir: dirname(filePath),
        suiteFile: relative(options.rootDir, filePath),
        executor: options.executor,
        onDebug: options.onDebug,
      });
      cases.push(result);
      options.onCaseComplete?.(result);
    } catch (err) {
      if (err instanceof UnreachableError) {
        aborted = err.message;
        break;
      }
      throw err;
    }
  }

  const result: SuiteResult = {
    applicationSlug: suite.application_slug,
    applicationVersion: suite.application_version,
    filePath,
    passed: aborted === undefined && cases.every((c) => c.state === "passed"),
    cases,
  };

  if (!result.passed && options.debugDir && cases.length > 0) {
    const dir = writeDebugArtifacts(result, {
      baseDir: options.debugDir,
      timestamp: options.timestamp ?? formatTimestamp(new Date()),
      onWarn: options.onWarn,
    });
    if (dir) {
      result.debugDir = dir;
    }
  }

  return aborted === undefined ? { result } : { result, aborted };
}

/**
 * Run suites in order. An unreachable API stops the run; the report
 * keeps what completed and carries the reason.
 */
export async function runSuites(suites: readonly LoadedSuite[], options: RunOptions): Promise<RunReport> {
  const timestamp = options.timestamp ?? formatTimestamp(new Date());
  const results: SuiteResult[] = [];
  let aborted: string | undefined;

  for (const loaded of suites) {
    const run = await runSuite(loaded, { ...options, timestamp });
    results.push(run.result);
    options.onSuiteComplete?.(run.result);
    if (run.aborted !== undefined) {
      aborted = run.aborted;
      break;
    }
  }

  const report: RunReport = {
    suites: results,
    totals: summarize(results),
    passed: aborted === undefined && results.every((s) => s.passed),
  };
  if (aborted !== undefined) {
    report.aborted = aborted;
  }
  return report;
}

/**
 * Passed/total counts for suites, cases and assertions
 */
export function summarize(suites: readonly SuiteResult[]): Totals {
  const cases = suites.flatMap((s) => s.cases);
  const outcomes = cases.flatMap((c) => c.outcomes);
  return {
    suites: { passed: suites.filter((s) => s.passed).length, total: suites.length },
    cases: { passed: cases.filter((c) => c.state === "passed").length, total: cases.length },
    assertions: { passed: outcomes.filter((o) => o.passed).length, total: outcomes.length },
  };
}

/**
 * Report as serializable JSON, without raw output documents
 */
export function toJsonReport(report: RunReport): string {
  const suites = report.suites.map((suite) => ({
    ...suite,
    cases: suite.cases.map(({ outputText: _outputText, ...rest }) => rest),
  }));
  return JSON.stringify({ ...report, suites }, null, 2);
}
