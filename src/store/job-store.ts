// JobStore interface — abstracts persistence of the single tracked background job.

export interface BackgroundJob {
  pid: number;
  startedAt: string;
}

export interface JobStore {
  /** Overwrite the record with a new job. Throws when the write fails. */
  save(pid: number): BackgroundJob;
  /** The tracked job, or null when there is none or the record is unreadable. */
  load(): BackgroundJob | null;
  /** Remove the record only if it still tracks `expectedPid`. */
  clear(expectedPid: number): boolean;
}
