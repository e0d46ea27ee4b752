import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EXIT_ABORTED, EXIT_FAILED, EXIT_PASSED, executeRun } from "./run.js";

const SUITE = `
application_slug: olex2
application_version: "1.5"
test_cases:
  - name: cell
    command_name: refine
    input_parameters:
      - name: n_cycles
        value: 5
    expected_results:
      - result_type: status
        expected: successful
      - result_type: cif_value
        cif_entry_name: _cell.length_a
        test_type: match
        expected_value: 10.2
`;

// Color detection depends on the environment the tests run in
const plain = (args: unknown[]) => args.map(String).join(" ").replace(/\x1b\[[0-9;]*m/g, "");

describe("executeRun", () => {
  let dir: string;
  let testsDir: string;
  let replayDir: string;
  let configPath: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cifcheck-cli-"));
    testsDir = join(dir, "cmd_tests");
    replayDir = join(dir, "recordings");
    configPath = join(dir, "cifcheck.config.yaml");
    mkdirSync(testsDir);
    writeFileSync(configPath, 'version: "1.0"\napi:\n  retries: 0\n');

    stdout = [];
    stderr = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      stdout.push(plain(args));
    });
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      stderr.push(plain(args));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    rmSync(dir, { recursive: true, force: true });
  });

  function record(suiteFile: string, caseName: string, status: string, outputText: string | null) {
    mkdirSync(join(replayDir, suiteFile), { recursive: true });
    writeFileSync(
      join(replayDir, suiteFile, `${caseName}.json`),
      JSON.stringify({ status, output_text: outputText })
    );
  }

  function jsonOutput(): unknown {
    expect(stdout).toHaveLength(1);
    return JSON.parse(stdout[0] ?? "");
  }

  it("exits 0 when every suite passes", async () => {
    writeFileSync(join(testsDir, "olex2.yaml"), SUITE);
    record("olex2.yaml", "cell", "successful", "data_r\n_cell.length_a 10.2\n");

    const code = await executeRun(testsDir, { config: configPath, replay: replayDir, json: true });

    expect(code).toBe(EXIT_PASSED);
    expect(jsonOutput()).toMatchObject({
      passed: true,
      totals: { cases: { passed: 1, total: 1 }, assertions: { passed: 2, total: 2 } },
    });
  });

  it("exits 1 when a check fails", async () => {
    writeFileSync(join(testsDir, "olex2.yaml"), SUITE);
    record("olex2.yaml", "cell", "successful", "data_r\n_cell.length_a 9.9\n");

    const code = await executeRun(testsDir, { config: configPath, replay: replayDir });

    expect(code).toBe(EXIT_FAILED);
    expect(stdout).toContain("Results: 0 passed, 1 failed");
  });

  it("validates every suite before running any", async () => {
    writeFileSync(join(testsDir, "a.yaml"), SUITE);
    writeFileSync(join(testsDir, "b.yaml"), "application_slug: broken\n");
    record("a.yaml", "cell", "successful", "data_r\n_cell.length_a 10.2\n");

    const code = await executeRun(testsDir, { config: configPath, replay: replayDir, json: true });

    expect(code).toBe(EXIT_FAILED);
    const output = jsonOutput();
    expect(output).toEqual({ errors: [expect.stringMatching(/^Invalid test suite .*b\.yaml:\n/)] });
  });

  it("refuses --record together with --replay", async () => {
    writeFileSync(join(testsDir, "olex2.yaml"), SUITE);

    const code = await executeRun(testsDir, { config: configPath, record: join(dir, "rec"), replay: replayDir });

    expect(code).toBe(EXIT_FAILED);
    expect(stderr).toEqual(["Error: --record and --replay are mutually exclusive"]);
  });

  it("lists suites without executing on a dry run", async () => {
    writeFileSync(join(testsDir, "olex2.yaml"), SUITE);
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    const code = await executeRun(testsDir, { config: configPath, dryRun: true, json: true });

    expect(code).toBe(EXIT_PASSED);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(jsonOutput()).toEqual({
      validated: [{ application: "olex2", version: "1.5", cases: 1, file: join(testsDir, "olex2.yaml") }],
    });
  });

  it("exits 2 when the command API is unreachable", async () => {
    writeFileSync(join(testsDir, "olex2.yaml"), SUITE);
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    const code = await executeRun(testsDir, {
      config: configPath,
      apiUrl: "http://localhost:11000",
      json: true,
    });

    expect(code).toBe(EXIT_ABORTED);
    expect(jsonOutput()).toMatchObject({
      passed: false,
      aborted: "Cannot reach command API at http://localhost:11000: fetch failed",
    });
  });

  it("exits 1 when the test location does not exist", async () => {
    const code = await executeRun(join(dir, "absent"), { config: configPath });

    expect(code).toBe(EXIT_FAILED);
    expect(stderr).toEqual([`Error: Test location not found: ${join(dir, "absent")}`]);
  });
});
