import { z } from "zod";
import { safeName } from "../utils/files.js";

const LiteralSchema = z.union([z.string(), z.number(), z.boolean()]);
const EntryNameSchema = z.string().min(1);

export const COMMAND_STATUSES = ["successful", "failed", "warning"] as const;
const CommandStatusSchema = z.enum(COMMAND_STATUSES);

// Input parameters ("type" defaults to simple)
const SimpleParameterSchema = z.object({
  name: z.string().min(1),
  type: z.literal("simple"),
  value: LiteralSchema,
}).strict();

const ExternalFileParameterSchema = z.object({
  name: z.string().min(1),
  type: z.literal("external_file"),
  value: z.string().min(1),
  upload_filename: z.string().min(1).optional(),
}).strict();

const InternalFileParameterSchema = z.object({
  name: z.string().min(1),
  type: z.literal("internal_file"),
  value: z.string(),
  upload_filename: z.string().min(1).optional(),
}).strict();

const InputParameterSchema = z.preprocess(
  (raw) =>
    typeof raw === "object" && raw !== null && !Array.isArray(raw) && !("type" in raw)
      ? { ...raw, type: "simple" }
      : raw,
  z.discriminatedUnion("type", [
    SimpleParameterSchema,
    ExternalFileParameterSchema,
    InternalFileParameterSchema,
  ])
);

// Status
const StatusResultSchema = z.object({
  result_type: z.literal("status"),
  expected: CommandStatusSchema,
}).strict();

// Within accepts (expected_value + allowed_deviation) or (min_value + max_value)
const WithinFields = {
  test_type: z.literal("within"),
  expected_value: z.number().optional(),
  allowed_deviation: z.number().optional(),
  min_value: z.number().optional(),
  max_value: z.number().optional(),
};

// Non-looped entries
const CifValueFields = {
  result_type: z.literal("cif_value"),
  cif_entry_name: EntryNameSchema,
};

const CifValueResultSchema = z.discriminatedUnion("test_type", [
  z.object({ ...CifValueFields, test_type: z.literal("match"), expected_value: LiteralSchema }).strict(),
  z.object({ ...CifValueFields, test_type: z.literal("non-match"), forbidden_value: LiteralSchema }).strict(),
  z.object({ ...CifValueFields, ...WithinFields }).strict(),
  z.object({ ...CifValueFields, test_type: z.literal("contain"), expected_value: z.string() }).strict(),
  z.object({ ...CifValueFields, test_type: z.literal("present"), allow_unknown: z.boolean().default(false) }).strict(),
  z.object({ ...CifValueFields, test_type: z.literal("missing") }).strict(),
]);

// Loop entries: row_lookup conditions are ANDed
const RowLookupSchema = z.object({
  row_entry_name: EntryNameSchema,
  row_entry_value: LiteralSchema,
}).strict();

const CifLoopValueFields = {
  result_type: z.literal("cif_loop_value"),
  cif_entry_name: EntryNameSchema,
  row_lookup: z.array(RowLookupSchema).min(1),
};

const CifLoopValueResultSchema = z.discriminatedUnion("test_type", [
  z.object({ ...CifLoopValueFields, test_type: z.literal("match"), expected_value: LiteralSchema }).strict(),
  z.object({ ...CifLoopValueFields, test_type: z.literal("non-match"), forbidden_value: LiteralSchema }).strict(),
  z.object({ ...CifLoopValueFields, ...WithinFields }).strict(),
  z.object({ ...CifLoopValueFields, test_type: z.literal("contain"), expected_value: z.string() }).strict(),
  z.object({ ...CifLoopValueFields, test_type: z.literal("present"), allow_unknown: z.boolean().default(false) }).strict(),
  z.object({ ...CifLoopValueFields, test_type: z.literal("missing") }).strict(),
]);

// Branch order of the union below
export const RESULT_TYPES = ["status", "cif_value", "cif_loop_value"] as const;

export const ExpectedResultSchema = z
  .union([StatusResultSchema, CifValueResultSchema, CifLoopValueResultSchema])
  .superRefine((result, ctx) => {
    if (result.result_type !== "status" && result.test_type === "within") {
      const problem = describeRangeProblem(result);
      if (problem) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
      }
    }
  });

const TestCaseSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  command_name: z.string().min(1),
  input_parameters: z.array(InputParameterSchema).default([]),
  expected_results: z.array(ExpectedResultSchema).min(1, "Test case must have at least one expected result"),
}).strict().superRefine((testCase, ctx) => {
  for (const name of findDuplicates(testCase.input_parameters.map((p) => p.name))) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["input_parameters"],
      message: `Duplicate parameter name: ${name}`,
    });
  }
});

export const TestSuiteSchema = z.object({
  application_slug: z.string().min(1),
  application_version: z.string().min(1),
  description: z.string().optional(),
  test_cases: z.array(TestCaseSchema).min(1, "Test suite must contain at least one test case"),
}).strict().superRefine((suite, ctx) => {
  for (const name of findDuplicates(suite.test_cases.map((t) => t.name))) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["test_cases"],
      message: `Duplicate test case name: ${name}`,
    });
  }
  // Recordings and debug files are named after the case
  for (const [fileName, names] of groupByFileName(suite.test_cases.map((t) => t.name))) {
    if (names.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["test_cases"],
        message: `Test case names ${names.map((n) => `'${n}'`).join(", ")} share the file name '${fileName}'`,
      });
    }
  }
});

export type CommandStatus = z.infer<typeof CommandStatusSchema>;
export type InputParameter = z.infer<typeof InputParameterSchema>;
export type SimpleParameter = z.infer<typeof SimpleParameterSchema>;
export type FileParameter =
  | z.infer<typeof ExternalFileParameterSchema>
  | z.infer<typeof InternalFileParameterSchema>;
export type StatusResult = z.infer<typeof StatusResultSchema>;
export type CifValueResult = z.infer<typeof CifValueResultSchema>;
export type CifLoopValueResult = z.infer<typeof CifLoopValueResultSchema>;
export type CifResult = CifValueResult | CifLoopValueResult;
export type ExpectedResult = z.infer<typeof ExpectedResultSchema>;
export type RowLookup = z.infer<typeof RowLookupSchema>;
export type TestType = CifResult["test_type"];
export type WithinResult = Extract<CifResult, { test_type: "within" }>;
export type TestCase = z.infer<typeof TestCaseSchema>;
export type TestSuite = z.infer<typeof TestSuiteSchema>;

/** Fields of a within check that define its accepted range */
export type RangeFields = Pick<WithinResult, "expected_value" | "allowed_deviation" | "min_value" | "max_value">;

/**
 * Explain why a within range is malformed, or return null if it is usable
 */
export function describeRangeProblem(fields: RangeFields): string | null {
  const hasDeviation = fields.expected_value !== undefined || fields.allowed_deviation !== undefined;
  const hasBounds = fields.min_value !== undefined || fields.max_value !== undefined;

  if (hasDeviation && hasBounds) {
    return "Within check takes either (expected_value + allowed_deviation) or (min_value + max_value), not both";
  }
  if (hasDeviation) {
    if (fields.expected_value === undefined || fields.allowed_deviation === undefined) {
      return "Within check needs both expected_value and allowed_deviation";
    }
    if (fields.allowed_deviation < 0) {
      return `allowed_deviation (${fields.allowed_deviation}) cannot be negative`;
    }
    return null;
  }
  if (hasBounds) {
    if (fields.min_value === undefined || fields.max_value === undefined) {
      return "Within check needs both min_value and max_value";
    }
    if (fields.min_value > fields.max_value) {
      return `min_value (${fields.min_value}) cannot be greater than max_value (${fields.max_value})`;
    }
    return null;
  }
  return "Within check requires either (expected_value + allowed_deviation) or (min_value + max_value)";
}

// Type guards
export function isStatusResult(result: ExpectedResult): result is StatusResult {
  return result.result_type === "status";
}

export function isLoopResult(result: CifResult): result is CifLoopValueResult {
  return result.result_type === "cif_loop_value";
}

export function isFileParameter(param: InputParameter): param is FileParameter {
  return param.type !== "simple";
}

function groupByFileName(names: string[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const name of new Set(names)) {
    const fileName = safeName(name);
    groups.set(fileName, [...(groups.get(fileName) ?? []), name]);
  }
  return groups;
}

function findDuplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  return [...duplicates];
}
