// Background job management: wiring, status and the download entry points.

import { config } from "./config.ts";
import { workerArgs, type DownloadOptions } from "./downloader.ts";
import { launchJob, type LaunchOutcome } from "./launcher.ts";
import { createLogger, type Logger } from "./logger.ts";
import { getProcessControl } from "./process-control.ts";
import { ProcessProber, type Confidence } from "./prober.ts";
import { getStore, type BackgroundJob, type JobStore } from "./store/index.ts";
import { errorMessage } from "./fs-utils.ts";

export interface JobDeps {
  store: JobStore;
  prober: ProcessProber;
  logger: Logger;
}

export function defaultJobDeps(logger: Logger = createLogger("yt-playlist-dl")): JobDeps {
  return {
    store: getStore(),
    prober: new ProcessProber(getProcessControl(), config.workerEntry),
    logger,
  };
}

/**
 * The same worker an interactive run would use, re-invoked through the
 * current runtime (execArgv carries the TypeScript loader).
 */
export function buildWorkerCommand(options: DownloadOptions): string[] {
  return [
    process.execPath,
    ...process.execArgv,
    config.workerEntry,
    ...workerArgs(options),
    "--detached",
  ];
}

export function startBackgroundDownload(options: DownloadOptions, deps: JobDeps): LaunchOutcome {
  const outcome = launchJob(buildWorkerCommand(options), config.logFile, deps);
  if (outcome.kind === "launched") {
    deps.logger.info(`Background download started (pid ${outcome.pid}): ${options.playlistUrl}`);
  }
  return outcome;
}

export function describeLaunchOutcome(outcome: LaunchOutcome): string {
  switch (outcome.kind) {
    case "launched":
      return `Background download started (pid ${outcome.pid}). Output: ${outcome.logPath}`;
    case "already-running":
      return outcome.confidence === "verified"
        ? `A background download is already running (pid ${outcome.pid}).`
        : `A background download appears to be running (pid ${outcome.pid}; identity not verifiable on this system).`;
    case "spawn-failed":
      return `Could not start background download: ${outcome.error}`;
    case "record-failed":
      return `Could not record background download (pid ${outcome.pid}, stopped): ${outcome.error}`;
    case "error":
      return `Could not start background download: ${outcome.message}`;
  }
}

export type JobStatus =
  | { kind: "idle"; healed: number | null }
  | { kind: "running"; job: BackgroundJob; confidence: Confidence; restricted: boolean }
  | { kind: "error"; message: string };

/**
 * Report the tracked job. A record that no longer points at the job is
 * removed on the way.
 */
export function getJobStatus(deps: JobDeps): JobStatus {
  try {
    const job = deps.store.load();
    if (!job) return { kind: "idle", healed: null };

    const identity = deps.prober.identify(job.pid);
    if (!identity.matches) {
      deps.store.clear(job.pid);
      return { kind: "idle", healed: job.pid };
    }

    return {
      kind: "running",
      job,
      confidence: identity.confidence,
      restricted: identity.liveness === "restricted",
    };
  } catch (err) {
    return { kind: "error", message: errorMessage(err) };
  }
}

export function describeJobStatus(status: JobStatus): string {
  switch (status.kind) {
    case "idle":
      return status.healed === null
        ? "No background download."
        : `No background download (cleared stale record for pid ${status.healed}).`;
    case "running": {
      const notes: string[] = [];
      if (status.confidence === "liveness-only") notes.push("identity not verified");
      if (status.restricted) notes.push("owned by another user");
      const suffix = notes.length > 0 ? ` [${notes.join("; ")}]` : "";
      const since = status.job.startedAt ? `, started ${status.job.startedAt}` : "";
      return `Background download running (pid ${status.job.pid}${since})${suffix}`;
    }
    case "error":
      return `Could not read background job status: ${status.message}`;
  }
}
