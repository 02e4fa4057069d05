import spawn from "cross-spawn";
import fs from "node:fs";
import { Invocation } from "../providers/base.js";
import { RunnerResult } from "../core/types.js";

export type CommandOptions = {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs: number;
  killGraceMs?: number;
  signal?: AbortSignal;
  logFile?: string;
};

export type ProcessLauncher = (cmd: string, args: string[], options: CommandOptions) => Promise<RunnerResult>;

const DEFAULT_KILL_GRACE_MS = 2000;

// Children lead their own process group so a timeout or abort reaches everything they forked.
const USE_PROCESS_GROUP = process.platform !== "win32";

type ExitStatus = { code: number | null; signal: NodeJS.Signals | null };

/**
 * Runs a command to completion, or until the deadline or abort signal stops it.
 *
 * Normal runs resolve on `close`, once all output has been read. A terminated run
 * resolves as soon as the child itself has exited; its pipes are released even when
 * a forked descendant still holds them, and the SIGKILL escalation still reaches
 * the rest of the group.
 */
export function runCommand(cmd: string, args: string[], options: CommandOptions): Promise<RunnerResult> {
  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      resolve({ stdout: "", stderr: "", exitCode: -1, durationMs: 0, aborted: true, signal: null });
      return;
    }

    const start = Date.now();
    const child = spawn(cmd, args, {
      cwd: options.cwd,
      env: { ...process.env, ...(options.env ?? {}) },
      stdio: ["ignore", "pipe", "pipe"],
      shell: false,
      detached: USE_PROCESS_GROUP
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let aborted = false;
    let settled = false;
    let exited: ExitStatus | undefined;
    let logStream: fs.WriteStream | undefined;
    if (options.logFile) {
      try {
        logStream = fs.createWriteStream(options.logFile, { flags: "a" });
        logStream.on("error", () => {
          logStream = undefined;
        });
      } catch {
        logStream = undefined;
      }
    }

    let deadline: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;
    const signalGroup = (signal: NodeJS.Signals) => {
      if (USE_PROCESS_GROUP && child.pid !== undefined) {
        try {
          process.kill(-child.pid, signal);
          return;
        } catch (err) {
          if (err instanceof Error && "code" in err && err.code === "ESRCH") {
            return;
          }
        }
      }
      if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
      }
    };
    const finish = (status: ExitStatus) => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      resolve({
        stdout,
        stderr,
        exitCode: status.code ?? -1,
        durationMs: Date.now() - start,
        timedOut,
        aborted,
        signal: status.signal,
        pid: child.pid
      });
    };
    const releasePipes = () => {
      child.stdout?.destroy();
      child.stderr?.destroy();
    };
    const terminate = () => {
      signalGroup("SIGTERM");
      if (!killTimer) {
        // Left running after settling: descendants that ignore SIGTERM still get SIGKILL.
        killTimer = setTimeout(() => signalGroup("SIGKILL"), options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
        killTimer.unref();
      }
      if (exited) {
        releasePipes();
        finish(exited);
      }
    };
    const onAbort = () => {
      if (settled || timedOut) {
        return;
      }
      aborted = true;
      terminate();
    };
    const cleanup = () => {
      if (deadline) {
        clearTimeout(deadline);
      }
      options.signal?.removeEventListener("abort", onAbort);
      logStream?.end();
    };
    const writeLog = (label: "stdout" | "stderr", chunk: Buffer) => {
      if (!logStream) {
        return;
      }
      const lines = chunk.toString().split(/\r?\n/);
      for (let i = 0; i < lines.length; i += 1) {
        const line = lines[i];
        if (i === lines.length - 1 && line.length === 0) {
          continue;
        }
        logStream.write(`[${label}] ${line}\n`);
      }
    };

    if (options.timeoutMs > 0) {
      deadline = setTimeout(() => {
        if (aborted || settled) {
          return;
        }
        timedOut = true;
        terminate();
      }, options.timeoutMs);
    }
    options.signal?.addEventListener("abort", onAbort, { once: true });

    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
      writeLog("stdout", chunk);
    });

    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
      writeLog("stderr", chunk);
    });

    child.on("error", (err) => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      reject(err);
    });

    child.on("exit", (code, signal) => {
      exited = { code, signal };
      if (timedOut || aborted) {
        releasePipes();
        finish(exited);
      }
    });

    child.on("close", (code, signal) => {
      finish({ code, signal });
    });
  });
}

export function runInvocation(
  invocation: Invocation,
  options: Omit<CommandOptions, "cwd" | "env">,
  launcher: ProcessLauncher = runCommand
): Promise<RunnerResult> {
  return launcher(invocation.cmd, invocation.args, {
    ...options,
    cwd: invocation.cwd,
    env: invocation.env
  });
}
