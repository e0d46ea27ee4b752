import { z } from "zod";
import { InfrastructureError, UnreachableError, errorMessage } from "../errors.js";
import { COMMAND_STATUSES, type CommandStatus } from "../types/suite.js";
import type { CommandExecutor, ExecutionResult, InvocationRequest, ResolvedParameter } from "./types.js";

export interface HttpExecutorOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  /** Deadline for a whole invocation, uploads and polling included */
  timeoutMs?: number;
  requestTimeoutMs?: number;
  pollIntervalMs?: number;
  /** Extra attempts for retryable statuses and connection failures */
  retries?: number;
  /** Base delay between retries, doubled on each attempt */
  retryDelayMs?: number;
  retryOn?: number[];
  onDebug?: (message: string) => void;
  onWarn?: (message: string) => void;
}

export const DEFAULT_TIMEOUT_MS = 600_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 500;
const DEFAULT_RETRYABLE_STATUS_CODES = [502, 503, 504];

// Response payloads of the command API
const CreateDatasetResponseSchema = z.object({
  payload: z.object({
    datasets: z
      .array(
        z.object({
          qcrbox_dataset_id: z.string(),
          data_files: z.record(z.object({ qcrbox_file_id: z.string() })),
        })
      )
      .min(1),
  }),
});

const InvokeResponseSchema = z.object({
  payload: z.object({ calculation_id: z.string() }),
});

const CalculationResponseSchema = z.object({
  payload: z.object({
    calculations: z.array(
      z.object({
        status: z.string(),
        output_dataset_id: z.string().nullish(),
      })
    ),
  }),
});

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Read a response body, giving up when the signal aborts. A stalled body
 * would otherwise outlive the request timeout.
 */
function readBody(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  const aborted = new Promise<never>((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
  return Promise.race([response.text(), aborted]);
}

function isCommandStatus(status: string): status is CommandStatus {
  return COMMAND_STATUSES.some((s) => s === status);
}

/**
 * Command executor for the HTTP command API: uploads file parameters as
 * datasets, invokes the command, polls the calculation until it ends and
 * downloads the output dataset.
 */
export class HttpCommandExecutor implements CommandExecutor {
  private baseUrl: string;
  private headers: Record<string, string>;
  private timeoutMs: number;
  private requestTimeoutMs: number;
  private pollIntervalMs: number;
  private retries: number;
  private retryDelayMs: number;
  private retryOn: number[];
  private debug: (message: string) => void;
  private warn: (message: string) => void;

  constructor(options: HttpExecutorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.retries = options.retries ?? DEFAULT_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.retryOn = options.retryOn ?? DEFAULT_RETRYABLE_STATUS_CODES;
    this.debug = options.onDebug ?? (() => {});
    this.warn = options.onWarn ?? (() => {});

    if (this.baseUrl.length === 0) {
      throw new InfrastructureError("HttpCommandExecutor requires a base URL");
    }
  }

  async invoke(request: InvocationRequest): Promise<ExecutionResult> {
    const deadline = Date.now() + this.timeoutMs;
    const inputDatasets: string[] = [];

    try {
      const commandArguments: Record<string, unknown> = {};
      for (const parameter of request.parameters) {
        if (parameter.kind === "value") {
          commandArguments[parameter.name] = parameter.value;
        } else {
          const { datasetId, fileId } = await this.upload(parameter, deadline);
          inputDatasets.push(datasetId);
          commandArguments[parameter.name] = { data_file_id: fileId };
        }
      }

      const invoked = await this.requestJson(
        "POST",
        "/commands/invoke",
        InvokeResponseSchema,
        deadline,
        {
          json: {
            application_slug: request.application.slug,
            application_version: request.application.version,
            command_name: request.commandName,
            command_arguments: commandArguments,
          },
        }
      );
      const calculationId = invoked.payload.calculation_id;
      this.debug(`[HTTP] Calculation ${calculationId} started for ${request.commandName}`);

      const { status, outputDatasetId } = await this.waitForCalculation(calculationId, deadline);
      if (status === "failed" || !outputDatasetId) {
        return { status };
      }

      const outputText = await this.request(
        "GET",
        `/datasets/${encodeURIComponent(outputDatasetId)}/download`,
        deadline
      );
      await this.deleteDataset(outputDatasetId, deadline);
      return { status, outputText };
    } finally {
      for (const datasetId of inputDatasets) {
        await this.deleteDataset(datasetId, deadline);
      }
    }
  }

  private async upload(
    parameter: Extract<ResolvedParameter, { kind: "file" }>,
    deadline: number
  ): Promise<{ datasetId: string; fileId: string }> {
    const form = new FormData();
    form.append("file", new Blob([parameter.content], { type: "chemical/x-cif" }), parameter.filename);

    const created = await this.requestJson("POST", "/datasets", CreateDatasetResponseSchema, deadline, { body: form });
    const [dataset] = created.payload.datasets;
    const file = dataset.data_files[parameter.filename];
    if (!file) {
      throw new InfrastructureError(`Upload of ${parameter.filename} returned no file id for it`);
    }
    this.debug(`[HTTP] Uploaded ${parameter.filename} as dataset ${dataset.qcrbox_dataset_id}`);
    return { datasetId: dataset.qcrbox_dataset_id, fileId: file.qcrbox_file_id };
  }

  private async waitForCalculation(
    calculationId: string,
    deadline: number
  ): Promise<{ status: CommandStatus; outputDatasetId?: string }> {
    for (;;) {
      const response = await this.requestJson(
        "GET",
        `/calculations/${encodeURIComponent(calculationId)}`,
        CalculationResponseSchema,
        deadline
      );
      for (const calculation of response.payload.calculations) {
        const { status } = calculation;
        if (isCommandStatus(status)) {
          this.debug(`[HTTP] Calculation ${calculationId} finished: ${status}`);
          return { status, outputDatasetId: calculation.output_dataset_id ?? undefined };
        }
      }

      if (Date.now() + this.pollIntervalMs > deadline) {
        throw new InfrastructureError(`Command did not finish within ${this.timeoutMs}ms`);
      }
      await sleep(this.pollIntervalMs);
    }
  }

  private async deleteDataset(datasetId: string, deadline: number): Promise<void> {
    try {
      await this.request("DELETE", `/datasets/${encodeURIComponent(datasetId)}`, deadline);
    } catch (error) {
      // Leftover datasets do not change the command's outcome
      this.warn(`Could not delete dataset ${datasetId}: ${errorMessage(error)}`);
    }
  }

  private async requestJson<S extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: S,
    deadline: number,
    payload: { json?: unknown; body?: FormData } = {}
  ): Promise<z.infer<S>> {
    const text = await this.request(method, path, deadline, payload);

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new InfrastructureError(`${method} ${path} returned invalid JSON`, { cause: error });
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      const issues = result.error.errors
        .map((e: z.ZodIssue) => `${e.path.join(".") || "(root)"}: ${e.message}`)
        .join("; ");
      throw new InfrastructureError(`${method} ${path} returned an unexpected payload: ${issues}`);
    }
    return result.data;
  }

  /**
   * Send one request with retries and return its body. The request timeout
   * covers reading the body. Connection failures that outlast the retries
   * raise UnreachableError.
   */
  private async request(
    method: string,
    path: string,
    deadline: number,
    payload: { json?: unknown; body?: FormData } = {}
  ): Promise<string> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { Accept: "application/json", ...this.headers };
    let body: string | FormData | undefined = payload.body;
    if (payload.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(payload.json);
    }

    for (let attempt = 0; ; attempt++) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new InfrastructureError(`Command did not finish within ${this.timeoutMs}ms`);
      }
      const timeout = Math.min(this.requestTimeoutMs, remaining);
      const timedOut = (cause?: unknown) =>
        new InfrastructureError(`${method} ${path} timed out after ${timeout}ms`, { cause });
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      this.debug(`[HTTP] ${method} ${url}${attempt > 0 ? ` (retry ${attempt}/${this.retries})` : ""}`);

      let response: Response;
      let text: string;
      try {
        try {
          response = await fetch(url, { method, headers, body, signal: controller.signal });
        } catch (error) {
          if (isAbortError(error)) {
            throw timedOut(error);
          }
          if (attempt < this.retries) {
            this.debug(`[HTTP] Connection error, will retry: ${errorMessage(error)}`);
            await sleep(this.retryDelayMs * Math.pow(2, attempt));
            continue;
          }
          throw new UnreachableError(`Cannot reach command API at ${this.baseUrl}: ${errorMessage(error)}`, {
            cause: error,
          });
        }

        try {
          text = await readBody(response, controller.signal);
        } catch (error) {
          if (isAbortError(error)) {
            throw timedOut(error);
          }
          throw new InfrastructureError(`${method} ${path} response could not be read: ${errorMessage(error)}`, {
            cause: error,
          });
        }
      } finally {
        clearTimeout(timeoutId);
      }

      if (response.ok) {
        return text;
      }
      if (this.retryOn.includes(response.status) && attempt < this.retries) {
        this.debug(`[HTTP] Retryable status ${response.status}: ${text}`);
        await sleep(this.retryDelayMs * Math.pow(2, attempt));
        continue;
      }
      throw new InfrastructureError(`${method} ${path} failed: HTTP ${response.status}: ${text}`);
    }
  }
}
