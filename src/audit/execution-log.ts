import fs from "node:fs";
import path from "node:path";
import { AttemptRecord, ExecutionLog } from "../core/types.js";
import { buildRunBasename } from "./names.js";

export type ExecutionLogHeader = {
  requestId: string;
  operation?: string;
  chain: string[];
  startedAt: string;
  promptChars: number;
};

export function prepareExecutionLog(logDir: string, header: ExecutionLogHeader): ExecutionLog | undefined {
  try {
    fs.mkdirSync(logDir, { recursive: true });
    const logPath = path.join(
      logDir,
      `${buildRunBasename({ ...header, provider: header.chain[0] ?? "" })}.md`
    );
    const lines = [
      "# Run log",
      `Request: ${header.requestId}`,
      `Operation: ${header.operation ?? "(direct call)"}`,
      `Chain: ${header.chain.join(" -> ")}`,
      `Started: ${header.startedAt}`,
      `Prompt length: ${header.promptChars} chars`,
      ""
    ].join("\n");
    fs.writeFileSync(logPath, `${lines}\n`, "utf-8");
    return { path: logPath, format: "markdown" };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Run log disabled for ${header.requestId}: ${message}`);
    return undefined;
  }
}

export function appendExecutionLog(log: ExecutionLog | undefined, text: string): void {
  if (!log) {
    return;
  }
  try {
    fs.appendFileSync(log.path, text, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Failed to append to ${log.path}: ${message}`);
  }
}

export function formatAttemptSummary(attempt: AttemptRecord): string {
  const lines = [`- Outcome: ${attempt.ok ? "success" : attempt.kind ?? "failure"}`, `- Duration: ${attempt.durationMs}ms`];
  if (attempt.message) {
    lines.push(`- Message: ${attempt.message}`);
  }
  return `${lines.join("\n")}\n`;
}
