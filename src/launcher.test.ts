import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { cancelJob } from "./canceller.ts";
import type { JobDeps } from "./jobs.ts";
import { launchJob } from "./launcher.ts";
import { silentLogger } from "./logger.ts";
import { detectInspector, NodeProcessControl } from "./process-control.ts";
import { ProcessProber } from "./prober.ts";
import type { JobStore } from "./store/job-store.ts";
import { PidFileStore } from "./store/pid-file-store.ts";
import { FakeProcessControl } from "./test-utils.ts";

async function waitFor(check: () => boolean, timeoutMs = 5000): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (check()) return true;
    await new Promise((resolve) => setTimeout(resolve, 50));
  }
  return check();
}

describe("launchJob (fake control)", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ytpl-launch-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("refuses while the tracked job is alive", () => {
    const store = new PidFileStore(join(dir, "job.json"));
    store.save(4242);
    const control = new FakeProcessControl().add(4242, "node /opt/ytpl/src/worker.ts");
    const deps: JobDeps = { store, prober: new ProcessProber(control, "worker.ts"), logger: silentLogger };

    expect(launchJob(["/bin/false"], join(dir, "app.log"), deps)).toEqual({
      kind: "already-running",
      pid: 4242,
      confidence: "verified",
    });
    expect(store.load()?.pid).toBe(4242);
    expect(existsSync(join(dir, "app.log"))).toBe(false);
  });

  test("empty command is a spawn failure", () => {
    const store = new PidFileStore(join(dir, "job.json"));
    const deps: JobDeps = { store, prober: new ProcessProber(new FakeProcessControl(), "worker.ts"), logger: silentLogger };

    expect(launchJob([], join(dir, "app.log"), deps)).toEqual({ kind: "spawn-failed", error: "Empty command" });
  });
});

// Starts a child of its own (same process group) and writes its PID to argv[2]
const SPAWNS_GRANDCHILD = [
  'const child = require("child_process").spawn(process.execPath, ["-e", "setInterval(() => {}, 1000)"], { stdio: "ignore" });',
  'require("fs").writeFileSync(process.argv[2], String(child.pid));',
  "setInterval(() => {}, 1000);",
].join("\n");

// Real detached processes: a `node -e` loop carrying a unique marker as its signature
describe.skipIf(process.platform === "win32")("background job lifecycle", () => {
  let dir: string;
  let logPath: string;
  let marker: string;
  let store: PidFileStore;
  let control: NodeProcessControl;
  let deps: JobDeps;
  const spawned: number[] = [];

  function dummyCommand(script = "setInterval(() => {}, 1000)", ...extra: string[]): string[] {
    return [process.execPath, "-e", script, marker, ...extra];
  }

  function launch(script?: string, ...extra: string[]): number {
    const outcome = launchJob(dummyCommand(script, ...extra), logPath, deps);
    if (outcome.kind !== "launched") throw new Error(`launch failed: ${outcome.kind}`);
    spawned.push(outcome.pid);
    return outcome.pid;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ytpl-e2e-"));
    logPath = join(dir, "logs", "app.log");
    marker = `ytpl-test-job-${process.pid}-${Date.now()}`;
    store = new PidFileStore(join(dir, "job.json"));
    control = new NodeProcessControl();
    deps = { store, prober: new ProcessProber(control, marker), logger: silentLogger };
  });

  // Orphans are reaped by init; until then they linger as zombies
  function hasExited(pid: number): boolean {
    if (control.probe(pid) === "absent") return true;
    try {
      return /^State:\s+Z/m.test(readFileSync(`/proc/${pid}/status`, "utf-8"));
    } catch {
      return false;
    }
  }

  afterEach(() => {
    for (const pid of spawned.splice(0)) {
      control.signal(pid, "SIGKILL", { group: true });
    }
    rmSync(dir, { recursive: true, force: true });
  });

  test("records the spawned PID and refuses a second launch", () => {
    const pid = launch();

    expect(store.load()?.pid).toBe(pid);
    expect(deps.prober.isAlive(pid)).toBe(true);

    const second = launchJob(dummyCommand(), logPath, deps);
    expect(second.kind).toBe("already-running");
    if (second.kind === "already-running") {
      expect(second.pid).toBe(pid);
    }
    expect(store.load()?.pid).toBe(pid);
  });

  test("cancel terminates the job and empties the record", async () => {
    const pid = launch();

    const outcome = cancelJob(deps);
    expect(outcome.kind).toBe("terminated");
    if (outcome.kind === "terminated") {
      expect(outcome.pid).toBe(pid);
      expect(outcome.group).toBe(true);
    }
    expect(store.load()).toBeNull();
    expect(await waitFor(() => !deps.prober.isAlive(pid))).toBe(true);
  });

  test("cancel also stops the processes the job started", async () => {
    const pidFile = join(dir, "grandchild.pid");
    launch(SPAWNS_GRANDCHILD, pidFile);
    expect(await waitFor(() => existsSync(pidFile) && readFileSync(pidFile, "utf-8") !== "")).toBe(true);
    const grandchild = Number(readFileSync(pidFile, "utf-8"));
    expect(control.probe(grandchild)).toBe("alive");

    expect(cancelJob(deps).kind).toBe("terminated");
    expect(await waitFor(() => hasExited(grandchild))).toBe(true);
  });

  test("a job killed out of band is cleared as already dead", async () => {
    const pid = launch();
    control.signal(pid, "SIGKILL", { group: true });
    expect(await waitFor(() => !deps.prober.isAlive(pid))).toBe(true);

    expect(cancelJob(deps)).toEqual({ kind: "already-dead-cleared", pid });
    expect(store.load()).toBeNull();
  });

  test("output is appended to the log file", async () => {
    launch("console.log('first line'); setInterval(() => {}, 1000)");
    expect(await waitFor(() => existsSync(logPath) && readFileSync(logPath, "utf-8").includes("first line"))).toBe(true);

    cancelJob(deps);
    launch("console.error('second line'); setInterval(() => {}, 1000)");
    expect(await waitFor(() => readFileSync(logPath, "utf-8").includes("second line"))).toBe(true);
    expect(readFileSync(logPath, "utf-8")).toBe("first line\nsecond line\n");
  });

  test.runIf(detectInspector() !== null)("a stale record pointing at a foreign process is replaced", () => {
    // The test runner itself is alive but is not the job
    store.save(process.pid);

    const pid = launch();
    expect(pid).not.toBe(process.pid);
    expect(store.load()?.pid).toBe(pid);
  });

  test("missing executable is a spawn failure and records nothing", () => {
    const outcome = launchJob([join(dir, "no-such-binary")], logPath, deps);

    expect(outcome.kind).toBe("spawn-failed");
    expect(store.load()).toBeNull();
  });

  test("a record that cannot be written stops the spawned process", async () => {
    const failing: JobStore = {
      save: () => {
        throw new Error("disk full");
      },
      load: () => null,
      clear: () => false,
    };
    const outcome = launchJob(dummyCommand(), logPath, { ...deps, store: failing });

    expect(outcome.kind).toBe("record-failed");
    if (outcome.kind === "record-failed") {
      spawned.push(outcome.pid);
      expect(outcome.error).toBe("disk full");
      expect(await waitFor(() => !deps.prober.isAlive(outcome.pid))).toBe(true);
    }
  });
});
