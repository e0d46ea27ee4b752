import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { errorMessage } from "../errors.js";
import type { CaseResult, SuiteResult } from "../types/index.js";
import { safeName } from "../utils/files.js";

export interface DebugArtifactOptions {
  /** Parent directory for per-suite artifact directories */
  baseDir: string;
  /** Run timestamp, YYYYMMDD_HHMMSS */
  timestamp: string;
  onWarn?: (message: string) => void;
}

const RULE = "=".repeat(80);
const SEPARATOR = "-".repeat(80);

/**
 * Persist the failure log and raw output documents of a suite.
 * Returns the artifact directory, or null when writing failed.
 */
export function writeDebugArtifacts(result: SuiteResult, options: DebugArtifactOptions): string | null {
  const warn = options.onWarn ?? (() => {});

  try {
    const dir = createUniqueDir(options.baseDir, `${options.timestamp}_${safeName(result.applicationSlug)}`);
    const lines: string[] = [
      `Test Suite: ${result.applicationSlug} ${result.applicationVersion}`,
      `File: ${result.filePath}`,
      `Timestamp: ${options.timestamp}`,
      `Status: ${result.passed ? "PASSED" : "FAILED"}`,
      RULE,
      "",
    ];

    for (const caseResult of result.cases) {
      lines.push(`Test Case: ${caseResult.caseName}`, `Status: ${caseResult.state.toUpperCase()}`);
      if (caseResult.state !== "passed") {
        lines.push(...describeFailure(result, caseResult, dir));
      }
      lines.push("", SEPARATOR, "");
    }

    writeFileSync(join(dir, "summary.log"), lines.join("\n"));
    return dir;
  } catch (error) {
    warn(`Could not write debug artifacts for ${result.applicationSlug}: ${errorMessage(error)}`);
    return null;
  }
}

function describeFailure(suite: SuiteResult, caseResult: CaseResult, dir: string): string[] {
  const lines = [
    `Command: ${caseResult.commandName}`,
    `Application: ${suite.applicationSlug} v${suite.applicationVersion}`,
  ];

  if (caseResult.parameters.length > 0) {
    lines.push("Parameters:");
    for (const p of caseResult.parameters) {
      lines.push(`  ${p.name} (${p.type}): ${p.value}`);
    }
  }

  lines.push(`Command Status: ${caseResult.commandStatus ?? "not run"}`);

  if (caseResult.outputText !== undefined) {
    const fileName = `${safeName(caseResult.caseName)}_result.cif`;
    writeFileSync(join(dir, fileName), caseResult.outputText);
    lines.push(`Result CIF saved to: ${fileName}`);
  } else if (caseResult.commandStatus) {
    lines.push(`No result CIF available (command status: ${caseResult.commandStatus})`);
  }

  if (caseResult.error) {
    lines.push(`Error: ${caseResult.error}`);
  }

  const failed = caseResult.outcomes.filter((o) => !o.passed);
  if (failed.length > 0) {
    lines.push("", "Failed Checks:");
    for (const outcome of failed) {
      lines.push(`  - ${outcome.label}`, `    ${outcome.detail}`);
      if (outcome.expected !== undefined) lines.push(`    Expected: ${outcome.expected}`);
      if (outcome.actual !== undefined) lines.push(`    Actual: ${outcome.actual}`);
    }
  }

  return lines;
}

/**
 * Create <baseDir>/<name>, adding _2, _3... when it already exists
 */
function createUniqueDir(baseDir: string, name: string): string {
  mkdirSync(baseDir, { recursive: true });
  for (let n = 1; ; n++) {
    const dir = join(baseDir, n === 1 ? name : `${name}_${n}`);
    try {
      mkdirSync(dir);
      return dir;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "EEXIST") {
        continue;
      }
      throw error;
    }
  }
}
