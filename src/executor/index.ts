import { RecordingExecutor, ReplayExecutor } from "../recording/index.js";
import type { Settings } from "../types/config.js";
import { HttpCommandExecutor } from "./http.js";
import type { CommandExecutor } from "./types.js";

export * from "./http.js";
export * from "./types.js";

export interface CreateExecutorOptions {
  /** Store every result under this directory */
  recordDir?: string;
  /** Serve results from this directory instead of the API */
  replayDir?: string;
  onDebug?: (message: string) => void;
  onWarn?: (message: string) => void;
}

/**
 * Create the command executor for a run
 */
export function createExecutor(
  settings: Settings,
  options: CreateExecutorOptions = {}
): CommandExecutor {
  if (options.recordDir && options.replayDir) {
    throw new Error("Recording and replay cannot be combined");
  }
  if (options.replayDir) {
    return new ReplayExecutor(options.replayDir, options.onDebug);
  }

  const http = new HttpCommandExecutor({
    baseUrl: settings.apiUrl,
    headers: settings.headers,
    timeoutMs: settings.timeoutMs,
    requestTimeoutMs: settings.requestTimeoutMs,
    pollIntervalMs: settings.pollIntervalMs,
    retries: settings.retries,
    onDebug: options.onDebug,
    onWarn: options.onWarn,
  });

  return options.recordDir ? new RecordingExecutor(http, options.recordDir, options.onDebug, options.onWarn) : http;
}
