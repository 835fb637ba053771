// Store factory — returns the JobStore backed by the configured record file.

import { config } from "../config.ts";
import type { JobStore } from "./job-store.ts";
import { PidFileStore } from "./pid-file-store.ts";

let _store: JobStore | null = null;

export function getStore(): JobStore {
  if (!_store) {
    _store = new PidFileStore(config.jobFile);
  }
  return _store;
}

export { type JobStore, type BackgroundJob } from "./job-store.ts";
export { PidFileStore, parseJobRecord } from "./pid-file-store.ts";
