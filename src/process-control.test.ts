import { afterEach, describe, expect, test, vi } from "vitest";
import { spawnSync } from "child_process";
import { detectInspector, NodeProcessControl, procfsInspector } from "./process-control.ts";

function exitedPid(): number {
  const result = spawnSync(process.execPath, ["-e", ""]);
  if (!result.pid) throw new Error("spawnSync returned no pid");
  return result.pid;
}

describe("NodeProcessControl", () => {
  const control = new NodeProcessControl();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("our own process is alive", () => {
    expect(control.probe(process.pid)).toBe("alive");
  });

  test("a PID no longer assigned is absent", () => {
    expect(control.probe(exitedPid())).toBe("absent");
  });

  test("signalling a PID no longer assigned reports absent", () => {
    expect(control.signal(exitedPid(), "SIGTERM", { group: false })).toBe("absent");
  });

  test("group signals go to the negated PID", () => {
    const kill = vi.spyOn(process, "kill").mockReturnValue(true);
    const grouped = new NodeProcessControl({ inspector: null, supportsGroups: true });

    expect(grouped.signal(4321, "SIGTERM", { group: true })).toBe("delivered");
    expect(kill.mock.calls).toEqual([[-4321, "SIGTERM"]]);
  });

  test("PID 1 is never addressed as a group", () => {
    const kill = vi.spyOn(process, "kill").mockReturnValue(true);
    const grouped = new NodeProcessControl({ inspector: null, supportsGroups: true });

    grouped.signal(1, "SIGTERM", { group: true });

    expect(kill.mock.calls).toEqual([[1, "SIGTERM"]]);
  });

  test("explicit capabilities override detection", () => {
    const limited = new NodeProcessControl({ inspector: null, supportsGroups: false });

    expect(limited.inspector).toBeNull();
    expect(limited.supportsGroups).toBe(false);
  });
});

describe.runIf(process.platform === "linux")("procfs inspection", () => {
  test("is the detected strategy on Linux", () => {
    expect(detectInspector()?.name).toBe("procfs");
  });

  test("reads the command line with spaces between arguments", () => {
    const commandLine = procfsInspector.commandLine(process.pid);

    expect(commandLine).not.toBeNull();
    expect(commandLine).not.toContain("\0");
  });

  test("returns null for a PID no longer assigned", () => {
    expect(procfsInspector.commandLine(exitedPid())).toBeNull();
  });
});
