// Cancels the tracked background job: load, verify, signal, clear.

import { errorMessage } from "./fs-utils.ts";
import type { JobDeps } from "./jobs.ts";
import type { Confidence } from "./prober.ts";

export type CancelOutcome =
  | { kind: "nothing-to-cancel" }
  | { kind: "stale-cleared"; pid: number }
  | { kind: "terminated"; pid: number; confidence: Confidence; group: boolean }
  | { kind: "already-dead-cleared"; pid: number }
  | { kind: "permission-denied"; pid: number }
  | { kind: "error"; pid: number | null; message: string };

export function cancelJob(deps: JobDeps): CancelOutcome {
  const outcome = settleCancel(deps);
  if (outcome.kind === "terminated") {
    // The outcome stands even if the log cannot be written
    try {
      deps.logger.info(`Sent SIGTERM to background job (pid ${outcome.pid}${outcome.group ? ", process group" : ""})`);
    } catch (err) {
      console.error(`Could not write to log: ${errorMessage(err)}`);
    }
  }
  return outcome;
}

function settleCancel(deps: JobDeps): CancelOutcome {
  const { store, prober } = deps;
  let pid: number | null = null;

  try {
    const job = store.load();
    if (!job) return { kind: "nothing-to-cancel" };
    pid = job.pid;

    const identity = prober.identify(pid);
    if (identity.liveness === "absent") {
      store.clear(pid);
      return { kind: "already-dead-cleared", pid };
    }
    if (!identity.matches) {
      // PID was reused by an unrelated process: never signal it
      store.clear(pid);
      return { kind: "stale-cleared", pid };
    }

    const group = prober.control.supportsGroups;
    const outcome = prober.control.signal(pid, "SIGTERM", { group });
    switch (outcome) {
      case "delivered":
        store.clear(pid);
        return { kind: "terminated", pid, confidence: identity.confidence, group };
      case "absent":
        store.clear(pid);
        return { kind: "already-dead-cleared", pid };
      case "denied":
        // Job may still be alive under another owner: keep the record
        return { kind: "permission-denied", pid };
    }
  } catch (err) {
    return { kind: "error", pid, message: errorMessage(err) };
  }
}

export function describeCancelOutcome(outcome: CancelOutcome): string {
  switch (outcome.kind) {
    case "nothing-to-cancel":
      return "No background download to cancel.";
    case "stale-cleared":
      return `No active background download (pid ${outcome.pid} now belongs to another process; record cleared).`;
    case "terminated":
      return outcome.confidence === "verified"
        ? `Cancelled background download (pid ${outcome.pid}).`
        : `Cancelled background download (pid ${outcome.pid}). Note: the process identity could not be verified on this system.`;
    case "already-dead-cleared":
      return `Background download (pid ${outcome.pid}) had already stopped; record cleared.`;
    case "permission-denied":
      return `Permission denied signalling pid ${outcome.pid}; the job record was kept.`;
    case "error":
      return outcome.pid === null
        ? `Could not cancel background download: ${outcome.message}`
        : `Could not cancel background download (pid ${outcome.pid}): ${outcome.message}`;
  }
}
