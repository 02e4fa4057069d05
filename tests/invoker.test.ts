import assert from "node:assert/strict";
import { test } from "node:test";
import { ProviderSpec } from "../src/core/types.js";
import { classifyRunnerResult, invokeProvider } from "../src/runner/invoker.js";
import { fakeLauncher } from "./helpers.js";

const gemini: ProviderSpec = {
  id: "gemini",
  binary: "gemini",
  args: [],
  inputFlag: "-p",
  enabled: true,
  priority: 1
};

const nodeEcho: ProviderSpec = {
  id: "node",
  binary: process.execPath,
  args: ["-e", "console.log(process.argv[1])"],
  inputFlag: "",
  enabled: true,
  priority: 1
};

test("classifyRunnerResult trims a successful response", () => {
  const result = classifyRunnerResult({ stdout: "\n  Better text.  \n", stderr: "", exitCode: 0, durationMs: 5 }, 30);
  assert.deepEqual(result, { ok: true, text: "Better text." });
});

test("classifyRunnerResult treats empty output as a failure", () => {
  assert.deepEqual(classifyRunnerResult({ stdout: "  \n", stderr: "", exitCode: 0, durationMs: 5 }, 30), {
    ok: false,
    kind: "EmptyResponse",
    message: "empty output"
  });
  assert.deepEqual(classifyRunnerResult({ stdout: "", stderr: "quota warning\n", exitCode: 0, durationMs: 5 }, 30), {
    ok: false,
    kind: "EmptyResponse",
    message: "quota warning"
  });
});

test("classifyRunnerResult prefers stderr for failed commands", () => {
  assert.deepEqual(classifyRunnerResult({ stdout: "partial", stderr: "auth failed", exitCode: 1, durationMs: 5 }, 30), {
    ok: false,
    kind: "ProcessError",
    message: "auth failed"
  });
  assert.deepEqual(classifyRunnerResult({ stdout: "usage: gemini", stderr: "", exitCode: 2, durationMs: 5 }, 30), {
    ok: false,
    kind: "ProcessError",
    message: "usage: gemini"
  });
  assert.deepEqual(classifyRunnerResult({ stdout: "", stderr: "", exitCode: 127, durationMs: 5 }, 30), {
    ok: false,
    kind: "ProcessError",
    message: "Command failed with exit code 127"
  });
});

test("classifyRunnerResult reports timeouts before anything else", () => {
  const result = classifyRunnerResult({ stdout: "late", stderr: "", exitCode: -1, durationMs: 5, timedOut: true }, 5);
  assert.deepEqual(result, { ok: false, kind: "Timeout", message: "operation timed out after 5s" });
});

test("invokeProvider passes the prompt and timeout to the launcher", async () => {
  const { launcher, calls } = fakeLauncher({ gemini: { stdout: "Done\n" } });
  const result = await invokeProvider(gemini, "PROMPT", 12, { launcher });
  assert.deepEqual(result, { ok: true, text: "Done" });
  assert.equal(calls.length, 1);
  assert.deepEqual(calls[0].args, ["-p", "PROMPT"]);
  assert.equal(calls[0].options.timeoutMs, 12000);
});

test("invokeProvider maps a missing binary to a process error", async () => {
  const { launcher } = fakeLauncher({});
  const result = await invokeProvider(gemini, "PROMPT", 12, { launcher });
  assert.deepEqual(result, { ok: false, kind: "ProcessError", message: "binary not found in PATH: gemini" });
});

test("invokeProvider runs a real command and trims its output", async () => {
  const result = await invokeProvider(nodeEcho, "  hello world  ", 10);
  assert.deepEqual(result, { ok: true, text: "hello world" });
});

test("invokeProvider times out a real command", async () => {
  const slow: ProviderSpec = { ...nodeEcho, args: ["-e", "setTimeout(() => {}, 10000)"] };
  const result = await invokeProvider(slow, "PROMPT", 0.2);
  assert.deepEqual(result, { ok: false, kind: "Timeout", message: "operation timed out after 0.2s" });
});

test("invokeProvider reports cancellation", async () => {
  const controller = new AbortController();
  const { launcher } = fakeLauncher({
    gemini: (_args, options) =>
      new Promise((resolve) => {
        options.signal?.addEventListener("abort", () => resolve({ exitCode: -1, aborted: true }), { once: true });
      })
  });
  const pending = invokeProvider(gemini, "PROMPT", 30, { launcher, signal: controller.signal });
  controller.abort();
  assert.deepEqual(await pending, { ok: false, kind: "Cancelled", message: "Operation cancelled" });
});

test("invokeProvider times out a shell wrapper within its deadline", { skip: process.platform === "win32" }, async () => {
  const wrapper: ProviderSpec = {
    id: "wrapper",
    binary: "/bin/sh",
    args: ["-c", "sleep 4; echo late"],
    enabled: true,
    priority: 1
  };
  const started = Date.now();
  const result = await invokeProvider(wrapper, "PROMPT", 0.3, { killGraceMs: 200 });
  assert.deepEqual(result, { ok: false, kind: "Timeout", message: "operation timed out after 0.3s" });
  assert.ok(Date.now() - started < 2000);
});
