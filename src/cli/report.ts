import picocolors from 'picocolors';
import { summarize } from '../runner/suite.js';
import type { CaseResult, RunReport, SuiteResult } from '../types/index.js';

type Colors = ReturnType<typeof picocolors.createColors>;

export interface ReportOptions {
  /** Defaults to picocolors' terminal detection */
  colors?: boolean;
  /** Also list passing cases */
  verbose?: boolean;
}

/**
 * Console lines for one finished suite
 */
export function formatSuiteResult(result: SuiteResult, options: ReportOptions = {}): string[] {
  const pc = picocolors.createColors(options.colors);
  const totals = summarize([result]);
  const lines = [
    `${result.passed ? pc.green('✓ PASS') : pc.red('✗ FAIL')} ${pc.bold(
      `${result.applicationSlug} ${result.applicationVersion}`
    )} ${pc.dim(`(${result.filePath})`)}`,
    pc.dim(
      `  cases ${totals.cases.passed}/${totals.cases.total} passed, ` +
        `assertions ${totals.assertions.passed}/${totals.assertions.total} passed`
    ),
  ];

  for (const caseResult of result.cases) {
    if (caseResult.state === 'passed') {
      if (options.verbose) {
        lines.push(`  ${pc.green('✓')} ${caseResult.caseName} ${pc.dim(`(${caseResult.durationMs}ms)`)}`);
      }
      continue;
    }
    lines.push(...formatFailedCase(caseResult, pc));
  }

  if (result.debugDir) {
    lines.push(pc.cyan(`  Debug artifacts: ${result.debugDir}`));
  }
  return lines;
}

function formatFailedCase(caseResult: CaseResult, pc: Colors): string[] {
  const lines = [`  ${pc.red('✗')} ${caseResult.caseName} ${pc.dim(`(${caseResult.state.toUpperCase()})`)}`];
  if (caseResult.error) {
    lines.push(pc.red(`    ${caseResult.error}`));
  }
  for (const outcome of caseResult.outcomes) {
    if (!outcome.passed) {
      lines.push(pc.red(`    - ${outcome.label}: ${outcome.detail}`));
    }
  }
  return lines;
}

/**
 * Closing summary of a run
 */
export function formatSummary(report: RunReport, options: ReportOptions = {}): string[] {
  const pc = picocolors.createColors(options.colors);
  const { suites, cases, assertions } = report.totals;
  const failed = suites.total - suites.passed;

  const lines = [
    pc.bold('─'.repeat(40)),
    `${pc.bold('Results:')} ${pc.green(`${suites.passed} passed`)}, ${
      failed > 0 ? pc.red(`${failed} failed`) : pc.dim('0 failed')
    }`,
    `Cases: ${cases.passed}/${cases.total} passed`,
    `Assertions: ${assertions.passed}/${assertions.total} passed`,
  ];
  if (report.aborted) {
    lines.push(pc.red(`Run aborted: ${report.aborted}`));
  }
  return lines;
}
