import type { Literal } from "../cif/values.js";
import type { CommandStatus } from "../types/suite.js";

/**
 * Parameter ready to send: a literal, or file content with its upload name
 */
export type ResolvedParameter =
  | { kind: "value"; name: string; value: Literal }
  | { kind: "file"; name: string; filename: string; content: string };

export interface InvocationRequest {
  application: { slug: string; version: string };
  commandName: string;
  parameters: ResolvedParameter[];
  /** Where the request comes from; keys recordings */
  source: { suiteFile: string; caseName: string };
}

export interface ExecutionResult {
  status: CommandStatus;
  /** Output document text; absent when the command produced none */
  outputText?: string;
}

/**
 * Runs one command against the backend.
 * Throws InfrastructureError when the invocation cannot be carried out.
 */
export interface CommandExecutor {
  invoke(request: InvocationRequest): Promise<ExecutionResult>;
}
