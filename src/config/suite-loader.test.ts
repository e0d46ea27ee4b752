import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DefinitionError } from "../errors.js";
import { discoverSuiteFiles, loadSuiteFile } from "./suite-loader.js";

const VALID_SUITE = `
application_slug: olex2
application_version: "1.5"
test_cases:
  - name: basic
    command_name: refine
    input_parameters:
      - name: input_cif
        type: external_file
        value: data/input.cif
      - name: n_cycles
        value: 5
    expected_results:
      - result_type: status
        expected: successful
      - result_type: cif_value
        cif_entry_name: _exptl.crystal_colour
        test_type: present
      - result_type: cif_loop_value
        cif_entry_name: _atom_site.adp_type
        test_type: match
        expected_value: Uani
        row_lookup:
          - row_entry_name: _atom_site.label
            row_entry_value: O1
`;

describe("loadSuiteFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cifcheck-suite-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const filePath = join(dir, name);
    writeFileSync(filePath, content);
    return filePath;
  }

  it("loads a valid suite and applies defaults", () => {
    const { suite } = loadSuiteFile(write("suite.yaml", VALID_SUITE));

    expect(suite.application_slug).toBe("olex2");
    const [testCase] = suite.test_cases;
    expect(testCase.input_parameters[1]).toEqual({ name: "n_cycles", type: "simple", value: 5 });
    expect(testCase.expected_results[1]).toEqual({
      result_type: "cif_value",
      cif_entry_name: "_exptl.crystal_colour",
      test_type: "present",
      allow_unknown: false,
    });
  });

  it("rejects duplicate case names", () => {
    const duplicated = VALID_SUITE + VALID_SUITE.slice(VALID_SUITE.indexOf("  - name: basic"));
    const filePath = write("dup.yaml", duplicated);

    expect(() => loadSuiteFile(filePath)).toThrow(DefinitionError);
    expect(() => loadSuiteFile(filePath)).toThrow(
      `Invalid test suite ${filePath}:\n  - test_cases: Duplicate test case name: basic`
    );
  });

  it("rejects case names that map to the same file name", () => {
    const cases = VALID_SUITE.slice(VALID_SUITE.indexOf("  - name: basic"));
    const suite =
      VALID_SUITE.replace("  - name: basic", "  - name: basic refine") +
      cases.replace("  - name: basic", "  - name: basic_refine");
    const filePath = write("clash.yaml", suite);

    expect(() => loadSuiteFile(filePath)).toThrow(
      `Invalid test suite ${filePath}:\n  - test_cases: Test case names 'basic refine', 'basic_refine' share the file name 'basic_refine'`
    );
  });

  it("rejects a within check with min above max", () => {
    const filePath = write(
      "within.yaml",
      `
application_slug: olex2
application_version: "1.5"
test_cases:
  - name: cell
    command_name: refine
    expected_results:
      - result_type: status
        expected: successful
      - result_type: cif_value
        cif_entry_name: _cell.length_a
        test_type: within
        min_value: 2
        max_value: 1
`
    );

    expect(() => loadSuiteFile(filePath)).toThrow(
      "  - test case 0 (cell) → expected result 1 (cif_value/within): min_value (2) cannot be greater than max_value (1)"
    );
  });

  it("rejects a within check mixing both forms", () => {
    const filePath = write(
      "mixed.yaml",
      `
application_slug: olex2
application_version: "1.5"
test_cases:
  - name: cell
    command_name: refine
    expected_results:
      - result_type: cif_value
        cif_entry_name: _cell.length_a
        test_type: within
        expected_value: 10
        allowed_deviation: 0.1
        max_value: 11
`
    );

    expect(() => loadSuiteFile(filePath)).toThrow(
      "expected result 0 (cif_value/within): Within check takes either (expected_value + allowed_deviation) or (min_value + max_value), not both"
    );
  });

  it("reports missing fields of the intended result type", () => {
    const filePath = write(
      "lookup.yaml",
      `
application_slug: olex2
application_version: "1.5"
test_cases:
  - name: atoms
    command_name: refine
    expected_results:
      - result_type: cif_loop_value
        cif_entry_name: _atom_site.adp_type
        test_type: match
        expected_value: Uani
`
    );

    expect(() => loadSuiteFile(filePath)).toThrow(
      `Invalid test suite ${filePath}:\n  - test case 0 (atoms) → expected result 0 (cif_loop_value/match) → row_lookup: Required`
    );
  });

  it("rejects an unknown result type", () => {
    const filePath = write(
      "type.yaml",
      `
application_slug: olex2
application_version: "1.5"
test_cases:
  - name: atoms
    command_name: refine
    expected_results:
      - result_type: cif_table
        cif_entry_name: _atom_site.label
        test_type: present
`
    );

    expect(() => loadSuiteFile(filePath)).toThrow(
      '→ result_type: Invalid value "cif_table"; expected one of status, cif_value, cif_loop_value'
    );
  });

  it("rejects duplicate parameter names", () => {
    const filePath = write(
      "params.yaml",
      `
application_slug: olex2
application_version: "1.5"
test_cases:
  - name: atoms
    command_name: refine
    input_parameters:
      - { name: a, value: 1 }
      - { name: a, value: 2 }
    expected_results:
      - result_type: status
        expected: successful
`
    );

    expect(() => loadSuiteFile(filePath)).toThrow(
      "  - test case 0 (atoms) → input_parameters: Duplicate parameter name: a"
    );
  });

  it("rejects invalid YAML", () => {
    const filePath = write("broken.yaml", "test_cases: [unclosed\n");
    expect(() => loadSuiteFile(filePath)).toThrow(`Invalid YAML in ${filePath}`);
  });

  it("rejects a missing file", () => {
    expect(() => loadSuiteFile(join(dir, "absent.yaml"))).toThrow("Test suite file not found");
  });
});

describe("discoverSuiteFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cifcheck-discover-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("lists yaml files of a directory, sorted and non-recursive", async () => {
    writeFileSync(join(dir, "b.yaml"), "");
    writeFileSync(join(dir, "a.yml"), "");
    writeFileSync(join(dir, "notes.txt"), "");
    mkdirSync(join(dir, "nested"));
    writeFileSync(join(dir, "nested", "c.yaml"), "");

    expect(await discoverSuiteFiles(dir)).toEqual([join(dir, "a.yml"), join(dir, "b.yaml")]);
  });

  it("accepts a single suite file", async () => {
    const filePath = join(dir, "one.yaml");
    writeFileSync(filePath, "");
    expect(await discoverSuiteFiles(filePath)).toEqual([filePath]);
  });

  it("rejects a file with another extension", async () => {
    const filePath = join(dir, "one.json");
    writeFileSync(filePath, "{}");
    await expect(discoverSuiteFiles(filePath)).rejects.toThrow("must end in .yaml or .yml");
  });

  it("rejects a missing location", async () => {
    await expect(discoverSuiteFiles(join(dir, "none"))).rejects.toThrow("Test location not found");
  });
});
