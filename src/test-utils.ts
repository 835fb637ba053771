// In-memory ProcessControl for lifecycle tests: no real processes are touched.

import type { IdentityInspector, Liveness, ProcessControl, SignalOutcome } from "./process-control.ts";

export interface FakeProcess {
  commandLine: string | null;
  restricted?: boolean;
}

export class FakeProcessControl implements ProcessControl {
  readonly inspector: IdentityInspector | null;
  supportsGroups: boolean;
  readonly processes = new Map<number, FakeProcess>();
  readonly probes: number[] = [];
  readonly signals: Array<{ pid: number; signal: NodeJS.Signals; group: boolean }> = [];
  /** Forces the result of the next signal() calls. */
  signalResult: SignalOutcome | null = null;
  /** Makes probe() throw, like an unexpected errno. */
  probeError: Error | null = null;

  constructor(opts: { inspect?: boolean; supportsGroups?: boolean } = {}) {
    this.supportsGroups = opts.supportsGroups ?? true;
    this.inspector =
      opts.inspect === false
        ? null
        : { name: "procfs", commandLine: (pid: number) => this.processes.get(pid)?.commandLine ?? null };
  }

  add(pid: number, commandLine: string | null, restricted = false): this {
    this.processes.set(pid, { commandLine, restricted });
    return this;
  }

  probe(pid: number): Liveness {
    this.probes.push(pid);
    if (this.probeError) throw this.probeError;
    const proc = this.processes.get(pid);
    if (!proc) return "absent";
    return proc.restricted ? "restricted" : "alive";
  }

  signal(pid: number, signal: NodeJS.Signals, opts: { group: boolean }): SignalOutcome {
    this.signals.push({ pid, signal, group: opts.group });
    if (this.signalResult) return this.signalResult;
    if (!this.processes.delete(pid)) return "absent";
    return "delivered";
  }
}
