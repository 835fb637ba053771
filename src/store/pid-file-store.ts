// File-backed JobStore — a single JSON record holding the tracked PID.

import { readFileSync, unlinkSync } from "fs";
import { config } from "../config.ts";
import { atomicWriteFileSync, errorCode } from "../fs-utils.ts";
import type { BackgroundJob, JobStore } from "./job-store.ts";

// process.kill only takes 32-bit signed PIDs
const MAX_PID = 2147483647;

/**
 * Parse record content. Anything that does not carry a signallable pid is
 * treated as no record at all. PIDs 0 and 1 are rejected too: kill() reads
 * them as "own group" and init, and their negation as "every process".
 */
export function parseJobRecord(content: string): BackgroundJob | null {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return null;
  }
  if (typeof data !== "object" || data === null || !("pid" in data)) return null;

  const { pid } = data;
  if (typeof pid !== "number" || !Number.isInteger(pid) || pid <= 1 || pid > MAX_PID) return null;

  const startedAt = "startedAt" in data && typeof data.startedAt === "string" ? data.startedAt : "";
  return { pid, startedAt };
}

export class PidFileStore implements JobStore {
  private readonly file: string;

  constructor(file: string = config.jobFile) {
    this.file = file;
  }

  save(pid: number): BackgroundJob {
    const job: BackgroundJob = { pid, startedAt: new Date().toISOString() };
    atomicWriteFileSync(this.file, JSON.stringify(job, null, 2) + "\n");
    return job;
  }

  load(): BackgroundJob | null {
    let content: string;
    try {
      content = readFileSync(this.file, "utf-8");
    } catch {
      return null;
    }
    return parseJobRecord(content);
  }

  clear(expectedPid: number): boolean {
    const current = this.load();
    if (!current || current.pid !== expectedPid) return false;

    try {
      unlinkSync(this.file);
      return true;
    } catch (err) {
      // Another invocation removed it first
      if (errorCode(err) === "ENOENT") return false;
      throw err;
    }
  }
}
