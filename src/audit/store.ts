import fs from "node:fs";
import path from "node:path";
import { Config, RequestRecord } from "../core/types.js";
import { buildRunBasename } from "./names.js";

export function writeAudit(config: Config, record: RequestRecord, baseDir = process.cwd()): string | undefined {
  if (!config.audit.enabled) {
    return undefined;
  }

  const dir = path.resolve(baseDir, config.audit.dir);
  fs.mkdirSync(dir, { recursive: true });

  const payload = {
    request: {
      requestId: record.requestId,
      operation: record.operation ?? null,
      provider: record.provider,
      prompt: record.prompt
    },
    attempts: record.attempts,
    outcome: record.outcome,
    startedAt: record.startedAt,
    timestamp: new Date().toISOString()
  };

  const basename = buildRunBasename(record);
  const fullPath = path.join(dir, `${basename}.json`);
  fs.writeFileSync(fullPath, JSON.stringify(payload, null, 2), "utf-8");
  return fullPath;
}
