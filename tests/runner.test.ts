import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import { runCommand } from "../src/runner/spawn.js";

function isAlive(pid: number | undefined): boolean {
  assert.equal(typeof pid, "number");
  try {
    process.kill(pid ?? -1, 0);
    return true;
  } catch {
    return false;
  }
}

test("runCommand streams output to log file", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "textops-"));
  const logFile = path.join(dir, "run.md");
  const result = await runCommand(process.execPath, ["-e", "console.log('hi'); console.error('oops');"], {
    timeoutMs: 5000,
    logFile
  });
  assert.equal(result.exitCode, 0);
  assert.equal(result.stdout, "hi\n");
  assert.equal(result.stderr, "oops\n");
  const log = fs.readFileSync(logFile, "utf-8");
  assert.ok(log.includes("[stdout] hi"));
  assert.ok(log.includes("[stderr] oops"));
});

test("runCommand reports a non-zero exit code", async () => {
  const result = await runCommand(process.execPath, ["-e", "process.exit(3)"], { timeoutMs: 5000 });
  assert.equal(result.exitCode, 3);
  assert.equal(result.timedOut, false);
});

test("runCommand terminates a process that outlives its deadline", async () => {
  const result = await runCommand(process.execPath, ["-e", "setTimeout(() => {}, 10000);"], {
    timeoutMs: 200
  });
  assert.equal(result.timedOut, true);
  assert.equal(result.signal, "SIGTERM");
  assert.equal(isAlive(result.pid), false);
});

const posixOnly = { skip: process.platform === "win32" };
// The wrapper prints the pid of the sleep it forks, then waits on it.
const WRAPPER_SCRIPT = "sleep 5 & echo $!; wait; echo late";

// A killed orphan may linger as a zombie until init reaps it; that counts as gone.
function isRunning(pid: number): boolean {
  if (!isAlive(pid)) {
    return false;
  }
  try {
    const stat = fs.readFileSync(`/proc/${pid}/stat`, "utf-8");
    return stat.slice(stat.lastIndexOf(")") + 2, stat.lastIndexOf(")") + 3) !== "Z";
  } catch {
    return true;
  }
}

async function waitUntilGone(pid: number, withinMs: number): Promise<boolean> {
  const stopAt = Date.now() + withinMs;
  while (Date.now() < stopAt) {
    if (!isRunning(pid)) {
      return true;
    }
    await new Promise((resolve) => setTimeout(resolve, 25));
  }
  return !isRunning(pid);
}

test("runCommand times out a wrapper and the process it forked", posixOnly, async () => {
  const started = Date.now();
  const result = await runCommand("/bin/sh", ["-c", WRAPPER_SCRIPT], {
    timeoutMs: 300,
    killGraceMs: 200
  });
  assert.ok(Date.now() - started < 2000);
  assert.equal(result.timedOut, true);
  assert.equal(result.stdout.includes("late"), false);
  const sleepPid = Number.parseInt(result.stdout.trim(), 10);
  assert.ok(Number.isInteger(sleepPid));
  assert.equal(await waitUntilGone(sleepPid, 1000), true);
});

test("runCommand abort reaches the process a wrapper forked", posixOnly, async () => {
  const controller = new AbortController();
  const started = Date.now();
  const pending = runCommand("/bin/sh", ["-c", WRAPPER_SCRIPT], {
    timeoutMs: 10000,
    killGraceMs: 200,
    signal: controller.signal
  });
  setTimeout(() => controller.abort(), 200);
  const result = await pending;
  assert.ok(Date.now() - started < 2000);
  assert.equal(result.aborted, true);
  const sleepPid = Number.parseInt(result.stdout.trim(), 10);
  assert.ok(Number.isInteger(sleepPid));
  assert.equal(await waitUntilGone(sleepPid, 1000), true);
});

test("runCommand escalates to SIGKILL when SIGTERM is ignored", async () => {
  const script = "process.on('SIGTERM', () => {}); setInterval(() => {}, 1000);";
  const result = await runCommand(process.execPath, ["-e", script], {
    timeoutMs: 1000,
    killGraceMs: 200
  });
  assert.equal(result.timedOut, true);
  assert.equal(result.signal, "SIGKILL");
  assert.equal(isAlive(result.pid), false);
});

test("runCommand stops the process when the signal aborts", async () => {
  const controller = new AbortController();
  const pending = runCommand(process.execPath, ["-e", "setTimeout(() => {}, 10000);"], {
    timeoutMs: 5000,
    signal: controller.signal
  });
  setTimeout(() => controller.abort(), 100);
  const result = await pending;
  assert.equal(result.aborted, true);
  assert.equal(result.timedOut, false);
  assert.equal(isAlive(result.pid), false);
});

test("runCommand does not start when already aborted", async () => {
  const controller = new AbortController();
  controller.abort();
  const result = await runCommand(process.execPath, ["-e", "console.log('never')"], {
    timeoutMs: 5000,
    signal: controller.signal
  });
  assert.equal(result.aborted, true);
  assert.equal(result.stdout, "");
});

test("runCommand rejects when the binary is missing", async () => {
  await assert.rejects(runCommand("textops-missing-binary", [], { timeoutMs: 1000 }), { code: "ENOENT" });
});
