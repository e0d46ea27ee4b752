import { describe, it, expect } from "vitest";
import { CifSyntaxError } from "../errors.js";
import { parseCif } from "./parser.js";
import { tokenize } from "./lexer.js";

const SAMPLE = `# structure output
data_sample
_cell.length_a 10.234(5)
_symmetry.space_group_name_H-M 'P 21/c'
_chemical.name_common
;
Line one
Line two
;
_exptl.crystal_colour ?
_publ.contact_author "O'Brien"

loop_
_atom_site.label
_atom_site.type_symbol
_atom_site.occupancy
O1 O 1.0
H1 H 0.5
`;

describe("parseCif", () => {
  const doc = parseCif(SAMPLE);

  it("reads the block name", () => {
    expect(doc.blockName).toBe("sample");
  });

  it("parses scalar entries with typed values", () => {
    expect(doc.getScalar("_cell.length_a")).toEqual({
      kind: "number",
      value: 10.234,
      su: 0.005,
      raw: "10.234(5)",
    });
    expect(doc.getScalar("_symmetry.space_group_name_H-M")).toEqual({ kind: "text", value: "P 21/c" });
    expect(doc.getScalar("_exptl.crystal_colour")).toEqual({ kind: "unknown", marker: "?" });
  });

  it("keeps apostrophes inside quoted values", () => {
    expect(doc.getScalar("_publ.contact_author")).toEqual({ kind: "text", value: "O'Brien" });
  });

  it("parses semicolon text fields", () => {
    expect(doc.getScalar("_chemical.name_common")).toEqual({ kind: "text", value: "Line one\nLine two" });
  });

  it("looks names up case-insensitively", () => {
    expect(doc.getScalar("_CELL.LENGTH_A")).toBeDefined();
    expect(doc.has("_Atom_Site.Label")).toBe(true);
  });

  it("builds loop tables in source order", () => {
    const table = doc.getTable("_atom_site");
    expect(table?.columns).toEqual(["_atom_site.label", "_atom_site.type_symbol", "_atom_site.occupancy"]);
    expect(table?.rows.map((r) => r["_atom_site.label"])).toEqual([
      { kind: "text", value: "O1" },
      { kind: "text", value: "H1" },
    ]);
    expect(doc.tableOf("_atom_site.occupancy")?.name).toBe("_atom_site");
  });

  it("keeps loop columns out of the scalar namespace", () => {
    expect(doc.getScalar("_atom_site.label")).toBeUndefined();
  });

  it("returns an empty document for empty input", () => {
    const empty = parseCif("# nothing here\n");
    expect(empty.scalarNames).toEqual([]);
    expect(empty.tableNames).toEqual([]);
  });

  it("reads only the first data block", () => {
    const first = parseCif("data_a\n_x 1\ndata_b\n_y 2\n");
    expect(first.blockName).toBe("a");
    expect(first.has("_x")).toBe(true);
    expect(first.has("_y")).toBe(false);
  });

  it("skips save frames and a leading global block", () => {
    const parsed = parseCif("global_\n_g 1\ndata_a\nsave_frame\n_z 1\nsave_\n_x 1\n");
    expect(parsed.has("_g")).toBe(false);
    expect(parsed.has("_z")).toBe(false);
    expect(parsed.has("_x")).toBe(true);
  });

  it("allows loops without rows", () => {
    const parsed = parseCif("data_a\nloop_\n_refln.index_h\n_refln.index_k\n");
    expect(parsed.getTable("_refln")?.rows).toEqual([]);
  });

  it("numbers repeated loop categories", () => {
    const parsed = parseCif("data_a\nloop_\n_geom.x\n1\nloop_\n_geom.y\n2\n");
    expect(parsed.tableNames).toEqual(["_geom", "_geom#2"]);
  });

  it("derives loop names for underscore-style tags", () => {
    const parsed = parseCif("data_a\nloop_\n_atom_site_label\n_atom_site_type_symbol\nC1 C\n");
    expect(parsed.tableOf("_atom_site_label")?.name).toBe("_atom_site");
  });

  it("produces frozen rows", () => {
    const table = doc.getTable("_atom_site");
    expect(Object.isFrozen(table?.rows[0])).toBe(true);
  });
});

describe("parseCif errors", () => {
  it("rejects a loop whose values do not fill its rows", () => {
    expect(() => parseCif("data_x\nloop_\n_a.b\n_a.c\n1 2 3\n")).toThrow(
      "line 2: loop _a has 3 values for 2 columns"
    );
  });

  it("rejects duplicate entries", () => {
    expect(() => parseCif("data_x\n_a 1\n_A 2\n")).toThrow("line 3: duplicate entry _A");
  });

  it("rejects an entry without a value", () => {
    expect(() => parseCif("data_x\n_a\n")).toThrow("line 2: entry _a has no value");
  });

  it("rejects a value without an entry", () => {
    expect(() => parseCif("data_x\nstray\n")).toThrow("line 2: value 'stray' without an entry name");
  });

  it("rejects content before the first block", () => {
    expect(() => parseCif("_a 1\n")).toThrow("line 1: expected a data_ block header");
  });

  it("reports the line of an unterminated text field", () => {
    try {
      parseCif("data_x\n_a\n;abc\n");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CifSyntaxError);
      expect(err instanceof CifSyntaxError && err.line).toBe(3);
    }
  });
});

describe("tokenize", () => {
  it("ignores comments and strips a byte order mark", () => {
    const tokens = tokenize("\uFEFFdata_x # block\n_a 1 # trailing\n");
    expect(tokens.map((t) => [t.type, t.text])).toEqual([
      ["data", "x"],
      ["tag", "_a"],
      ["value", "1"],
    ]);
  });

  it("treats a semicolon inside a line as part of a value", () => {
    const tokens = tokenize("data_x\n_a b;c\n");
    expect(tokens[2]).toEqual({ type: "value", text: "b;c", quoted: false, line: 2 });
  });
});
