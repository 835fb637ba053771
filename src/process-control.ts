// OS process capabilities used by the job lifecycle: liveness probe,
// command-line inspection and signal delivery.
// All OS calls use argv arrays (spawnSync) and never go through a shell.

import { spawnSync } from "child_process";
import { existsSync, readFileSync } from "fs";
import { errorCode } from "./fs-utils.ts";

/**
 * - alive: the process exists and can be signalled
 * - absent: no process with that PID
 * - restricted: it exists but belongs to another user, so nothing more can be
 *   learned about it
 */
export type Liveness = "alive" | "absent" | "restricted";

export type SignalOutcome = "delivered" | "absent" | "denied";

export interface IdentityInspector {
  readonly name: "procfs" | "ps";
  /**
   * Full command line of the process, or null if it could not be read.
   * An empty string means the process has exited and not been reaped yet.
   */
  commandLine(pid: number): string | null;
}

export interface ProcessControl {
  /** Null when no inspection strategy works on this host. */
  readonly inspector: IdentityInspector | null;
  /** Whether a signal can be addressed to a whole process group. */
  readonly supportsGroups: boolean;
  probe(pid: number): Liveness;
  signal(pid: number, signal: NodeJS.Signals, opts: { group: boolean }): SignalOutcome;
}

// ---------- identity inspection strategies ----------

/**
 * Linux: /proc/<pid>/cmdline holds argv separated by NUL bytes.
 */
export const procfsInspector: IdentityInspector = {
  name: "procfs",
  commandLine(pid: number): string | null {
    try {
      const raw = readFileSync(`/proc/${pid}/cmdline`, "utf-8");
      return raw.split("\0").filter(Boolean).join(" ");
    } catch {
      return null;
    }
  },
};

/**
 * BSD/macOS and other POSIX hosts without procfs.
 */
export const psInspector: IdentityInspector = {
  name: "ps",
  commandLine(pid: number): string | null {
    const result = spawnSync("ps", ["-o", "command=", "-p", String(pid)], {
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "ignore"],
    });
    if (result.status !== 0) return null;
    const line = (result.stdout || "").trim();
    // Zombies are listed without arguments
    if (line.endsWith("<defunct>")) return "";
    return line || null;
  },
};

/**
 * Pick the strongest inspection strategy that actually works here,
 * checked against our own process.
 */
export function detectInspector(): IdentityInspector | null {
  if (existsSync(`/proc/${process.pid}/cmdline`) && procfsInspector.commandLine(process.pid)) {
    return procfsInspector;
  }
  if (process.platform !== "win32" && psInspector.commandLine(process.pid)) {
    return psInspector;
  }
  return null;
}

// ---------- node implementation ----------

export class NodeProcessControl implements ProcessControl {
  readonly inspector: IdentityInspector | null;
  readonly supportsGroups: boolean;

  constructor(opts?: { inspector?: IdentityInspector | null; supportsGroups?: boolean }) {
    this.inspector = opts?.inspector !== undefined ? opts.inspector : detectInspector();
    this.supportsGroups = opts?.supportsGroups ?? process.platform !== "win32";
  }

  probe(pid: number): Liveness {
    try {
      process.kill(pid, 0);
      return "alive";
    } catch (err) {
      switch (errorCode(err)) {
        case "ESRCH":
          return "absent";
        case "EPERM":
          return "restricted";
        default:
          throw err;
      }
    }
  }

  signal(pid: number, signal: NodeJS.Signals, opts: { group: boolean }): SignalOutcome {
    // A detached child leads its own group, so -pid addresses the group.
    // kill(-1) would reach every process we own, and -0 is our own group.
    const target = opts.group && this.supportsGroups && pid > 1 ? -pid : pid;
    try {
      process.kill(target, signal);
      return "delivered";
    } catch (err) {
      switch (errorCode(err)) {
        case "ESRCH":
          return "absent";
        case "EPERM":
          return "denied";
        default:
          throw err;
      }
    }
  }
}

let _control: ProcessControl | null = null;

export function getProcessControl(): ProcessControl {
  if (!_control) {
    _control = new NodeProcessControl();
  }
  return _control;
}
