import { readFile } from "node:fs/promises";
import { isAbsolute, resolve } from "node:path";
import { InfrastructureError, errorMessage } from "../errors.js";
import type { ResolvedParameter } from "../executor/types.js";
import type { FileParameter, InputParameter, ParameterSummary } from "../types/index.js";

/**
 * Name the file is uploaded under
 */
export function uploadName(parameter: FileParameter): string {
  return parameter.upload_filename ?? `${parameter.name}.cif`;
}

/**
 * Turn suite parameters into what the executor sends. External files are
 * read relative to the suite directory; a missing file fails the case.
 */
export async function resolveParameters(
  parameters: readonly InputParameter[],
  suiteDir: string
): Promise<ResolvedParameter[]> {
  const resolved: ResolvedParameter[] = [];

  for (const parameter of parameters) {
    switch (parameter.type) {
      case "simple":
        resolved.push({ kind: "value", name: parameter.name, value: parameter.value });
        break;
      case "internal_file":
        resolved.push({
          kind: "file",
          name: parameter.name,
          filename: uploadName(parameter),
          content: parameter.value,
        });
        break;
      case "external_file": {
        const filePath = isAbsolute(parameter.value) ? parameter.value : resolve(suiteDir, parameter.value);
        let content: string;
        try {
          content = await readFile(filePath, "utf-8");
        } catch (error) {
          throw new InfrastructureError(
            `Cannot read input file for parameter '${parameter.name}': ${filePath} (${errorMessage(error)})`,
            { cause: error }
          );
        }
        resolved.push({ kind: "file", name: parameter.name, filename: uploadName(parameter), content });
        break;
      }
    }
  }

  return resolved;
}

/**
 * Short description of each parameter for reports
 */
export function summarizeParameters(parameters: readonly InputParameter[]): ParameterSummary[] {
  return parameters.map((parameter) => ({
    name: parameter.name,
    type: parameter.type,
    value:
      parameter.type === "internal_file"
        ? `<inline ${uploadName(parameter)}>`
        : String(parameter.value),
  }));
}
