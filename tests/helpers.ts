import { defaultConfig } from "../src/core/config.js";
import { Config, RunnerResult } from "../src/core/types.js";
import { CommandOptions, ProcessLauncher } from "../src/runner/spawn.js";

export type FakeReply = Partial<RunnerResult> | ((args: string[], options: CommandOptions) => Promise<Partial<RunnerResult>>);

export type LaunchCall = {
  cmd: string;
  args: string[];
  options: CommandOptions;
};

export function makeConfig(overrides: Partial<Config> = {}): Config {
  const base = defaultConfig();
  return {
    ...base,
    environment: { paths: [] },
    audit: { enabled: false, dir: ".textops/audit" },
    logs: { enabled: false, dir: ".textops/logs" },
    ...overrides
  };
}

// Commands without a scripted reply behave like a binary missing from PATH.
export function fakeLauncher(replies: Record<string, FakeReply>): { launcher: ProcessLauncher; calls: LaunchCall[] } {
  const calls: LaunchCall[] = [];
  const launcher: ProcessLauncher = async (cmd, args, options) => {
    calls.push({ cmd, args, options });
    const reply = replies[cmd];
    if (reply === undefined) {
      throw Object.assign(new Error(`spawn ${cmd} ENOENT`), { code: "ENOENT" });
    }
    const value = typeof reply === "function" ? await reply(args, options) : reply;
    return { stdout: "", stderr: "", exitCode: 0, durationMs: 1, ...value };
  };
  return { launcher, calls };
}
