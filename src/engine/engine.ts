import path from "node:path";
import { appendExecutionLog, formatAttemptSummary, prepareExecutionLog } from "../audit/execution-log.js";
import { makeRequestId } from "../audit/names.js";
import { writeAudit } from "../audit/store.js";
import { CANCELLED_MESSAGE, NO_OPERATION_MESSAGE, NO_TEXT_MESSAGE, failure, toOutcome } from "../core/errors.js";
import {
  AttemptRecord,
  Config,
  ExecutionLog,
  Failure,
  InvocationResult,
  OperationOutcome,
  ProviderSpec
} from "../core/types.js";
import { cleanResult } from "../prompts/cleanup.js";
import { OperationSummary, listOperations, renderPrompt } from "../prompts/templates.js";
import { resolveChain } from "../providers/registry.js";
import { invokeProvider } from "../runner/invoker.js";
import { ProcessLauncher } from "../runner/spawn.js";

export type EngineOptions = {
  launcher?: ProcessLauncher;
  cwd?: string;
  killGraceMs?: number;
};

export type CallOptions = {
  fallback?: boolean;
  timeoutSeconds?: number;
};

export type OperationOptions = {
  provider?: string;
};

type ChainRequest = {
  operation?: string;
  prompt: string;
  chain: ProviderSpec[];
  timeoutSeconds?: number;
};

/**
 * Turns an operation plus user text into a provider response.
 *
 * Providers are tried one at a time in chain order; the first success wins and
 * only the last failure is reported back. Every attempt lands in the execution log.
 */
export class InvocationEngine {
  private readonly config: Config;
  private readonly launcher?: ProcessLauncher;
  private readonly cwd: string;
  private readonly killGraceMs?: number;
  private readonly inFlight = new Set<AbortController>();

  constructor(config: Config, options: EngineOptions = {}) {
    this.config = config;
    this.launcher = options.launcher;
    this.cwd = options.cwd ?? process.cwd();
    this.killGraceMs = options.killGraceMs;
  }

  get configuration(): Config {
    return this.config;
  }

  listOperations(): OperationSummary[] {
    return listOperations(this.config.operations);
  }

  async call(providerId: string, prompt: string, options: CallOptions = {}): Promise<OperationOutcome> {
    const resolution = resolveChain(this.config, providerId);
    if (!resolution.ok) {
      return toOutcome(resolution);
    }
    const chain = options.fallback === false ? resolution.chain.slice(0, 1) : resolution.chain;
    const result = await this.runChain({ prompt, chain, timeoutSeconds: options.timeoutSeconds });
    return toOutcome(result);
  }

  async performOperation(
    operationId: string,
    text: string,
    params: Record<string, string> = {},
    options: OperationOptions = {}
  ): Promise<OperationOutcome> {
    if (!operationId) {
      return toOutcome(failure("NoOperationSpecified", NO_OPERATION_MESSAGE));
    }
    if (!text || text.trim().length === 0) {
      return toOutcome(failure("NoTextProvided", NO_TEXT_MESSAGE));
    }

    const rendered = renderPrompt(this.config.operations, operationId, text, params);
    if (!rendered.ok) {
      return toOutcome(rendered);
    }

    const resolution = resolveChain(this.config, options.provider ?? "");
    if (!resolution.ok) {
      return toOutcome(resolution);
    }

    const result = await this.runChain({ operation: operationId, prompt: rendered.prompt, chain: resolution.chain });
    if (!result.ok) {
      return toOutcome(result);
    }
    return { success: true, text: cleanResult(this.config.operations[operationId], result.text) };
  }

  // Terminates every outstanding attempt; safe to call repeatedly.
  stop(): void {
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  private async runChain(request: ChainRequest): Promise<InvocationResult> {
    const requestId = makeRequestId();
    const startedAt = new Date().toISOString();
    const controller = new AbortController();
    this.inFlight.add(controller);

    const log = this.openLog(request, requestId, startedAt);
    const attempts: AttemptRecord[] = [];
    let last: { provider: string; failure: Failure } | undefined;
    let result: InvocationResult | undefined;

    try {
      for (const [index, spec] of request.chain.entries()) {
        if (controller.signal.aborted) {
          result = failure("Cancelled", CANCELLED_MESSAGE);
          break;
        }
        const timeoutSeconds = request.timeoutSeconds ?? spec.timeoutSeconds ?? this.config.llm.timeoutSeconds;
        appendExecutionLog(log, `\n## Attempt ${index + 1} (${spec.id})\n`);

        const started = Date.now();
        const attempt = await invokeProvider(spec, request.prompt, timeoutSeconds, {
          launcher: this.launcher,
          signal: controller.signal,
          logFile: log?.path,
          searchPaths: this.config.environment.paths,
          killGraceMs: this.killGraceMs
        });
        const record: AttemptRecord = attempt.ok
          ? { provider: spec.id, ok: true, durationMs: Date.now() - started }
          : { provider: spec.id, ok: false, kind: attempt.kind, message: attempt.message, durationMs: Date.now() - started };
        attempts.push(record);
        appendExecutionLog(log, formatAttemptSummary(record));

        if (attempt.ok) {
          result = attempt;
          break;
        }
        if (attempt.kind === "Cancelled") {
          result = attempt;
          break;
        }
        last = { provider: spec.id, failure: attempt };
      }
    } finally {
      this.inFlight.delete(controller);
    }

    if (!result) {
      result = last
        ? failure(last.failure.kind, `${last.provider}: ${last.failure.message}`)
        : failure("NoProviderConfigured", "No provider configured");
      appendExecutionLog(log, `\nAll ${attempts.length} provider(s) failed.\n`);
    }

    this.recordAudit(request, requestId, startedAt, attempts, result, log);
    return result;
  }

  private openLog(request: ChainRequest, requestId: string, startedAt: string): ExecutionLog | undefined {
    if (!this.config.logs.enabled) {
      return undefined;
    }
    const log = prepareExecutionLog(path.resolve(this.cwd, this.config.logs.dir), {
      requestId,
      operation: request.operation,
      chain: request.chain.map((spec) => spec.id),
      startedAt,
      promptChars: request.prompt.length
    });
    if (request.prompt.length > this.config.llm.maxPromptChars) {
      appendExecutionLog(
        log,
        `Warning: prompt is ${request.prompt.length} chars, above the ${this.config.llm.maxPromptChars} char guideline.\n`
      );
    }
    return log;
  }

  private recordAudit(
    request: ChainRequest,
    requestId: string,
    startedAt: string,
    attempts: AttemptRecord[],
    result: InvocationResult,
    log: ExecutionLog | undefined
  ): void {
    try {
      writeAudit(
        this.config,
        {
          requestId,
          startedAt,
          operation: request.operation,
          provider: request.chain[0]?.id ?? "",
          prompt: request.prompt,
          attempts,
          outcome: toOutcome(result)
        },
        this.cwd
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      appendExecutionLog(log, `\n[audit] ${message}\n`);
    }
  }
}
