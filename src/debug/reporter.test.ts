import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { SuiteResult } from "../types/index.js";
import { writeDebugArtifacts } from "./reporter.js";

function failingSuite(): SuiteResult {
  return {
    applicationSlug: "olex2",
    applicationVersion: "1.5",
    filePath: "/tests/olex2.yaml",
    passed: false,
    cases: [
      {
        caseName: "ok",
        commandName: "refine",
        parameters: [],
        state: "passed",
        commandStatus: "successful",
        outcomes: [{ passed: true, label: "status successful", kind: "pass", detail: "Command finished with status 'successful'" }],
        outputText: "data_ok\n",
        durationMs: 5,
      },
      {
        caseName: "wrong cell",
        commandName: "refine",
        parameters: [
          { name: "input_cif", type: "external_file", value: "input.cif" },
          { name: "n_cycles", type: "simple", value: "5" },
        ],
        state: "failed",
        commandStatus: "successful",
        outcomes: [
          {
            passed: false,
            label: "match _cell.length_a",
            kind: "value-mismatch",
            detail: "Entry '_cell.length_a': expected 10.2, got 9.9",
            expected: "10.2",
            actual: "9.9",
          },
        ],
        outputText: "data_result\n_cell.length_a 9.9\n",
        durationMs: 7,
      },
      {
        caseName: "crash",
        commandName: "solve",
        parameters: [],
        state: "failed",
        commandStatus: "failed",
        outcomes: [
          {
            passed: false,
            label: "status successful",
            kind: "status-mismatch",
            detail: "Expected status 'successful', got 'failed'",
            expected: "successful",
            actual: "failed",
          },
        ],
        durationMs: 3,
      },
      {
        caseName: "setup",
        commandName: "refine",
        parameters: [],
        state: "error",
        outcomes: [],
        error: "Setup failed: Cannot read input file",
        durationMs: 1,
      },
    ],
  };
}

const RULE = "=".repeat(80);
const SEPARATOR = "-".repeat(80);

describe("writeDebugArtifacts", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cifcheck-debug-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the summary log and failed case outputs", () => {
    const artifactDir = writeDebugArtifacts(failingSuite(), { baseDir: dir, timestamp: "20260101_120000" });

    expect(artifactDir).toBe(join(dir, "20260101_120000_olex2"));
    expect(readdirSync(join(dir, "20260101_120000_olex2")).sort()).toEqual([
      "summary.log",
      "wrong_cell_result.cif",
    ]);
    expect(readFileSync(join(dir, "20260101_120000_olex2", "wrong_cell_result.cif"), "utf-8")).toBe(
      "data_result\n_cell.length_a 9.9\n"
    );

    const summary = readFileSync(join(dir, "20260101_120000_olex2", "summary.log"), "utf-8");
    expect(summary.split("\n")).toEqual([
      "Test Suite: olex2 1.5",
      "File: /tests/olex2.yaml",
      "Timestamp: 20260101_120000",
      "Status: FAILED",
      RULE,
      "",
      "Test Case: ok",
      "Status: PASSED",
      "",
      SEPARATOR,
      "",
      "Test Case: wrong cell",
      "Status: FAILED",
      "Command: refine",
      "Application: olex2 v1.5",
      "Parameters:",
      "  input_cif (external_file): input.cif",
      "  n_cycles (simple): 5",
      "Command Status: successful",
      "Result CIF saved to: wrong_cell_result.cif",
      "",
      "Failed Checks:",
      "  - match _cell.length_a",
      "    Entry '_cell.length_a': expected 10.2, got 9.9",
      "    Expected: 10.2",
      "    Actual: 9.9",
      "",
      SEPARATOR,
      "",
      "Test Case: crash",
      "Status: FAILED",
      "Command: solve",
      "Application: olex2 v1.5",
      "Command Status: failed",
      "No result CIF available (command status: failed)",
      "",
      "Failed Checks:",
      "  - status successful",
      "    Expected status 'successful', got 'failed'",
      "    Expected: successful",
      "    Actual: failed",
      "",
      SEPARATOR,
      "",
      "Test Case: setup",
      "Status: ERROR",
      "Command: refine",
      "Application: olex2 v1.5",
      "Command Status: not run",
      "Error: Setup failed: Cannot read input file",
      "",
      SEPARATOR,
      "",
    ]);
  });

  it("adds a suffix when the directory already exists", () => {
    const first = writeDebugArtifacts(failingSuite(), { baseDir: dir, timestamp: "20260101_120000" });
    const second = writeDebugArtifacts(failingSuite(), { baseDir: dir, timestamp: "20260101_120000" });

    expect(first).toBe(join(dir, "20260101_120000_olex2"));
    expect(second).toBe(join(dir, "20260101_120000_olex2_2"));
  });

  it("warns and returns null when the directory cannot be created", () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "");
    const warnings: string[] = [];

    const result = writeDebugArtifacts(failingSuite(), {
      baseDir: blocker,
      timestamp: "20260101_120000",
      onWarn: (m) => warnings.push(m),
    });

    expect(result).toBeNull();
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^Could not write debug artifacts for olex2: /);
  });
});
