import { evaluateExpectedResults } from "../assertions/engine.js";
import { parseCif, type CifDocument } from "../cif/index.js";
import { CifSyntaxError, InfrastructureError, UnreachableError, errorMessage } from "../errors.js";
import type { CommandExecutor, ExecutionResult, ResolvedParameter } from "../executor/types.js";
import type { CaseResult, TestCase } from "../types/index.js";
import { resolveParameters, summarizeParameters } from "./parameters.js";

export interface CaseContext {
  application: { slug: string; version: string };
  /** Directory external files are resolved against */
  suiteDir: string;
  /** Suite path relative to the test location; keys recordings */
  suiteFile: string;
  executor: CommandExecutor;
  onDebug?: (message: string) => void;
}

/**
 * Run one case: resolve parameters, invoke the command, parse its output
 * and evaluate every expected result. Only UnreachableError escapes.
 */
export async function runCase(testCase: TestCase, context: CaseContext): Promise<CaseResult> {
  const debug = context.onDebug ?? (() => {});
  const startTs = Date.now();

  const base = {
    caseName: testCase.name,
    commandName: testCase.command_name,
    parameters: summarizeParameters(testCase.input_parameters),
  };
  const fail = (error: string, execution?: ExecutionResult): CaseResult => ({
    ...base,
    state: "error",
    commandStatus: execution?.status,
    outcomes: [],
    error,
    outputText: execution?.outputText,
    durationMs: Date.now() - startTs,
  });

  let parameters: ResolvedParameter[];
  try {
    parameters = await resolveParameters(testCase.input_parameters, context.suiteDir);
  } catch (err) {
    if (err instanceof InfrastructureError) {
      return fail(`Setup failed: ${err.message}`);
    }
    throw err;
  }

  debug(`Invoking ${testCase.command_name} for case ${testCase.name}`);
  let execution: ExecutionResult;
  try {
    execution = await context.executor.invoke({
      application: context.application,
      commandName: testCase.command_name,
      parameters,
      source: { suiteFile: context.suiteFile, caseName: testCase.name },
    });
  } catch (err) {
    if (err instanceof InfrastructureError && !(err instanceof UnreachableError)) {
      return fail(`Command invocation failed: ${err.message}`);
    }
    throw err;
  }
  debug(`Case ${testCase.name}: command status ${execution.status}`);

  let document: CifDocument | undefined;
  if (execution.outputText !== undefined) {
    try {
      document = parseCif(execution.outputText);
    } catch (err) {
      if (err instanceof CifSyntaxError) {
        return fail(`Output document could not be parsed: ${errorMessage(err)}`, execution);
      }
      throw err;
    }
  }

  const evaluation = evaluateExpectedResults(testCase.expected_results, {
    status: execution.status,
    document,
  });

  return {
    ...base,
    state: evaluation.passed ? "passed" : "failed",
    commandStatus: execution.status,
    outcomes: evaluation.outcomes,
    outputText: execution.outputText,
    durationMs: Date.now() - startTs,
  };
}
