import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { InfrastructureError, errorMessage } from "../errors.js";
import type { CommandExecutor, ExecutionResult, InvocationRequest } from "../executor/types.js";
import { getRecordingPath, RecordingSchema } from "./recorder.js";

/**
 * Check if a recording exists for a case
 */
export function hasRecording(baseDir: string, source: InvocationRequest["source"]): boolean {
  return existsSync(getRecordingPath(baseDir, source));
}

/**
 * Load a stored result. A missing or malformed recording fails that case only.
 */
export async function loadRecording(
  baseDir: string,
  source: InvocationRequest["source"]
): Promise<ExecutionResult> {
  const filePath = getRecordingPath(baseDir, source);
  if (!existsSync(filePath)) {
    throw new InfrastructureError(`Recording not found: ${filePath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(await readFile(filePath, "utf-8"));
  } catch (error) {
    throw new InfrastructureError(`Cannot read recording ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  const result = RecordingSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw new InfrastructureError(`Invalid recording ${filePath}: ${issues}`);
  }

  const { status, output_text } = result.data;
  return output_text === null ? { status } : { status, outputText: output_text };
}

/**
 * Executor that serves recorded results instead of calling the API
 */
export class ReplayExecutor implements CommandExecutor {
  constructor(
    private baseDir: string,
    private onDebug: (message: string) => void = () => {}
  ) {}

  async invoke(request: InvocationRequest): Promise<ExecutionResult> {
    this.onDebug(`Replaying ${request.source.caseName} from ${this.baseDir}`);
    return loadRecording(this.baseDir, request.source);
  }
}
