// Launches the download as a detached background process and records its PID.

import { spawn } from "child_process";
import { closeSync, openSync } from "fs";
import { dirname } from "path";
import { ensureDirSync, errorMessage } from "./fs-utils.ts";
import type { JobDeps } from "./jobs.ts";
import type { Confidence } from "./prober.ts";

export type LaunchOutcome =
  | { kind: "launched"; pid: number; startedAt: string; logPath: string }
  | { kind: "already-running"; pid: number; confidence: Confidence }
  | { kind: "spawn-failed"; error: string }
  | { kind: "record-failed"; pid: number; error: string }
  | { kind: "error"; message: string };

/**
 * Spawn `command` in its own session with stdout and stderr appended to
 * `logPath`, then record its PID. Refuses while a tracked job is running.
 */
export function launchJob(command: string[], logPath: string, deps: JobDeps): LaunchOutcome {
  const { store, prober } = deps;

  try {
    const existing = store.load();
    if (existing) {
      const identity = prober.identify(existing.pid);
      if (identity.matches) {
        return { kind: "already-running", pid: existing.pid, confidence: identity.confidence };
      }
      store.clear(existing.pid);
      deps.logger.info(`Cleared stale job record (pid ${existing.pid})`);
    }
  } catch (err) {
    return { kind: "error", message: errorMessage(err) };
  }

  const [file, ...args] = command;
  if (!file) {
    return { kind: "spawn-failed", error: "Empty command" };
  }

  let pid: number | undefined;
  try {
    ensureDirSync(dirname(logPath));
    const logFd = openSync(logPath, "a");
    try {
      const child = spawn(file, args, {
        detached: true,
        stdio: ["ignore", logFd, logFd],
      });
      // Spawn errors (e.g. ENOENT) arrive as an event after pid came back undefined
      child.on("error", (err) => {
        deps.logger.error(`Background process error: ${err.message}`);
      });
      pid = child.pid;
      // Unref so parent can exit without waiting
      child.unref();
    } finally {
      closeSync(logFd);
    }
  } catch (err) {
    return { kind: "spawn-failed", error: errorMessage(err) };
  }

  if (!pid) {
    return { kind: "spawn-failed", error: `Failed to get PID from spawned process: ${file}` };
  }

  try {
    const job = store.save(pid);
    return { kind: "launched", pid, startedAt: job.startedAt, logPath };
  } catch (err) {
    // An untracked job could never be cancelled, so stop it now
    try {
      prober.control.signal(pid, "SIGTERM", { group: prober.control.supportsGroups });
    } catch (signalErr) {
      deps.logger.error(`Could not stop untracked process ${pid}: ${errorMessage(signalErr)}`);
    }
    return { kind: "record-failed", pid, error: errorMessage(err) };
  }
}
