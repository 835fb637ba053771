// Decides whether a recorded PID is still the download job that created it.
// PIDs are recycled, so "alive" alone is not enough when the command line
// can be read.

import type { Liveness, ProcessControl } from "./process-control.ts";

/**
 * - verified: the command line was read and carries the worker signature
 * - liveness-only: no command line was available, so a reused PID cannot
 *   be told apart from the job
 */
export type Confidence = "verified" | "liveness-only";

export interface JobIdentity {
  pid: number;
  liveness: Liveness;
  matches: boolean;
  confidence: Confidence;
}

export class ProcessProber {
  readonly control: ProcessControl;
  private readonly signature: string;

  constructor(control: ProcessControl, signature: string) {
    this.control = control;
    this.signature = signature;
  }

  isAlive(pid: number): boolean {
    return this.control.probe(pid) !== "absent";
  }

  identify(pid: number): JobIdentity {
    const liveness = this.control.probe(pid);
    if (liveness === "absent") {
      return { pid, liveness, matches: false, confidence: "verified" };
    }

    const commandLine = this.control.inspector?.commandLine(pid) ?? null;
    if (commandLine === null) {
      return { pid, liveness, matches: true, confidence: "liveness-only" };
    }
    // An exited but unreaped process (zombie) keeps its PID and loses its argv
    if (commandLine.trim() === "") {
      return { pid, liveness: "absent", matches: false, confidence: "verified" };
    }

    return {
      pid,
      liveness,
      matches: commandLine.includes(this.signature),
      confidence: "verified",
    };
  }

  isDownloadJob(pid: number): boolean {
    return this.identify(pid).matches;
  }
}
