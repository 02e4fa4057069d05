import { CANCELLED_MESSAGE, failure, timeoutMessage } from "../core/errors.js";
import { InvocationResult, ProviderSpec, RunnerResult } from "../core/types.js";
import { buildInvocation } from "../providers/base.js";
import { ProcessLauncher, runCommand, runInvocation } from "./spawn.js";

export type InvokeOptions = {
  launcher?: ProcessLauncher;
  signal?: AbortSignal;
  logFile?: string;
  searchPaths?: string[];
  killGraceMs?: number;
};

export async function invokeProvider(
  spec: ProviderSpec,
  prompt: string,
  timeoutSeconds: number,
  options: InvokeOptions = {}
): Promise<InvocationResult> {
  const invocation = buildInvocation(spec, prompt, options.searchPaths ?? []);
  let runner: RunnerResult;
  try {
    runner = await runInvocation(
      invocation,
      {
        timeoutMs: Math.max(0, timeoutSeconds) * 1000,
        killGraceMs: options.killGraceMs,
        signal: options.signal,
        logFile: options.logFile
      },
      options.launcher ?? runCommand
    );
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return failure("ProcessError", `binary not found in PATH: ${spec.binary}`);
    }
    const message = err instanceof Error ? err.message : String(err);
    return failure("ProcessError", message || "failed to start provider command");
  }
  return classifyRunnerResult(runner, timeoutSeconds);
}

export function classifyRunnerResult(runner: RunnerResult, timeoutSeconds: number): InvocationResult {
  if (runner.aborted) {
    return failure("Cancelled", CANCELLED_MESSAGE);
  }
  if (runner.timedOut) {
    return failure("Timeout", timeoutMessage(timeoutSeconds));
  }

  const stdout = runner.stdout.trim();
  const stderr = runner.stderr.trim();
  if (runner.exitCode !== 0) {
    return failure("ProcessError", stderr || stdout || `Command failed with exit code ${runner.exitCode}`);
  }
  if (!stdout) {
    return failure("EmptyResponse", stderr || "empty output");
  }
  return { ok: true, text: stdout };
}
