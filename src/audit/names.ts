import { randomUUID } from "node:crypto";

export type RunName = {
  requestId: string;
  startedAt: string;
  provider: string;
  operation?: string;
};

export function makeRequestId(): string {
  return `req-${randomUUID().slice(0, 8)}`;
}

function toSlug(value: string, fallback: string): string {
  const slug = value.replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^_+|_+$/g, "");
  return slug.length > 0 ? slug : fallback;
}

// Sortable by start time; the same run gets the same name in the audit and log directories.
export function buildRunBasename(run: RunName): string {
  const stamp = run.startedAt.replace(/[:.]/g, "-");
  return [
    toSlug(stamp, "unknown-time"),
    toSlug(run.operation ?? "call", "call"),
    toSlug(run.provider, "provider"),
    toSlug(run.requestId, "request")
  ].join("__");
}
