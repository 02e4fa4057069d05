import os from "node:os";
import path from "node:path";
import { ProviderSpec } from "../core/types.js";

export interface Invocation {
  cmd: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export const PROMPT_PLACEHOLDER = "${prompt}";

function buildArgs(spec: ProviderSpec, prompt: string): string[] {
  const args = [...spec.args];
  const modelFlag = spec.modelFlag ?? "--model";
  if (spec.model && modelFlag && !args.includes(modelFlag)) {
    args.push(modelFlag, spec.model);
  }
  if (args.some((arg) => arg.includes(PROMPT_PLACEHOLDER))) {
    return args.map((arg) => arg.split(PROMPT_PLACEHOLDER).join(prompt));
  }
  const flag = spec.inputFlag ?? "";
  if (flag.length > 0) {
    args.push(flag, prompt);
  } else {
    args.push(prompt);
  }
  return args;
}

export function expandHome(entry: string): string {
  const home = os.homedir();
  if (entry === "~") {
    return home;
  }
  if (entry.startsWith("~/")) {
    return path.join(home, entry.slice(2));
  }
  return entry.replace(/\$HOME\b/g, () => home);
}

export function buildSearchPath(extraPaths: string[], currentPath = process.env.PATH ?? ""): string {
  const entries = extraPaths.map(expandHome).filter((entry) => entry.length > 0);
  if (currentPath) {
    entries.push(currentPath);
  }
  return entries.join(path.delimiter);
}

export function buildInvocation(spec: ProviderSpec, prompt: string, extraPaths: string[] = []): Invocation {
  const env: Record<string, string> = { ...(spec.env ?? {}) };
  if (extraPaths.length > 0 && env.PATH === undefined) {
    env.PATH = buildSearchPath(extraPaths);
  }
  return {
    cmd: spec.binary,
    args: buildArgs(spec, prompt),
    env: Object.keys(env).length > 0 ? env : undefined,
    cwd: spec.cwd
  };
}
