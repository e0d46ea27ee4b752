import { z } from "zod";

// Command API connection
const ApiSchema = z.object({
  url: z.string().url().optional(),
  headers: z.record(z.string()).optional(),
  timeout_ms: z.number().positive().optional(),
  request_timeout_ms: z.number().positive().optional(),
  poll_interval_ms: z.number().nonnegative().optional(),
  retries: z.number().int().nonnegative().optional(),
}).strict();

export const ProjectConfigSchema = z.object({
  version: z.string().default("1.0"),
  api: ApiSchema.default({}),
  tests: z.string().min(1).optional(),
  debug_dir: z.string().min(1).optional(),
}).strict();

export type ApiConfig = z.infer<typeof ApiSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Fully resolved run configuration, built once at start and passed down
 */
export interface Settings {
  apiUrl: string;
  headers: Record<string, string>;
  /** Deadline for one command invocation, polling included */
  timeoutMs: number;
  requestTimeoutMs: number;
  pollIntervalMs: number;
  retries: number;
  testLocation: string;
  /** Directory for failure artifacts; undefined when debug mode is off */
  debugDir?: string;
}
