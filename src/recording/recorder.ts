import { mkdir, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { z } from "zod";
import type { CommandExecutor, ExecutionResult, InvocationRequest } from "../executor/types.js";
import { errorMessage } from "../errors.js";
import { COMMAND_STATUSES } from "../types/suite.js";
import { safeName } from "../utils/files.js";

/**
 * Stored form of one executor result
 */
export const RecordingSchema = z.object({
  status: z.enum(COMMAND_STATUSES),
  output_text: z.string().nullable(),
}).strict();

export type Recording = z.infer<typeof RecordingSchema>;

/**
 * Get the recording file for a case: <baseDir>/<suite file>/<case>.json
 */
export function getRecordingPath(baseDir: string, source: InvocationRequest["source"]): string {
  return join(baseDir, source.suiteFile, `${safeName(source.caseName)}.json`);
}

/**
 * Write one result to its recording file
 */
export async function saveRecording(
  baseDir: string,
  source: InvocationRequest["source"],
  result: ExecutionResult
): Promise<string> {
  const filePath = getRecordingPath(baseDir, source);
  const recording: Recording = { status: result.status, output_text: result.outputText ?? null };
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(recording, null, 2) + "\n");
  return filePath;
}

/**
 * Executor wrapper that stores every result it passes through.
 * A recording that cannot be written is reported and the result kept.
 */
export class RecordingExecutor implements CommandExecutor {
  constructor(
    private inner: CommandExecutor,
    private baseDir: string,
    private onDebug: (message: string) => void = () => {},
    private onWarn: (message: string) => void = () => {}
  ) {}

  async invoke(request: InvocationRequest): Promise<ExecutionResult> {
    const result = await this.inner.invoke(request);
    try {
      const filePath = await saveRecording(this.baseDir, request.source, result);
      this.onDebug(`Recorded ${request.source.caseName} to ${filePath}`);
    } catch (error) {
      this.onWarn(`Could not record ${request.source.caseName}: ${errorMessage(error)}`);
    }
    return result;
  }
}
