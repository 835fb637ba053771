// Shared filesystem utilities for atomic writes and permission management

import { writeFileSync, renameSync, mkdirSync, unlinkSync } from "fs";
import { dirname } from "path";

/**
 * Write file atomically: write to temp file, then rename.
 * rename() is atomic on the same filesystem, so readers see either the old
 * content or the new content, never a torn write.
 */
export function atomicWriteFileSync(filePath: string, data: string, mode = 0o600): void {
  ensureDirSync(dirname(filePath));
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    writeFileSync(tmpPath, data, { mode });
    renameSync(tmpPath, filePath);
  } catch (err) {
    try {
      unlinkSync(tmpPath);
    } catch {
      // Temp file was never created
    }
    throw err;
  }
}

/**
 * Ensure directory exists with restrictive permissions.
 * mode 0o700 = owner-only read/write/execute.
 */
export function ensureDirSync(dirPath: string, mode = 0o700): void {
  mkdirSync(dirPath, { recursive: true, mode });
}

/**
 * Narrow an unknown thrown value to a Node system error code.
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
