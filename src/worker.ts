#!/usr/bin/env tsx

// Download worker: the process the launcher runs in the background.
// Also usable directly; it performs exactly what an interactive download does.

import { downloadPlaylist, parseWorkerArgs } from "./downloader.ts";
import { errorMessage } from "./fs-utils.ts";
import { createLogger } from "./logger.ts";

async function main(): Promise<void> {
  const { options, detached } = parseWorkerArgs(process.argv.slice(2));

  // Detached: stdout/stderr already go to the log file
  const logger = createLogger("yt-playlist-dl.worker", detached ? { file: false } : {});
  logger.info(`Worker started (pid ${process.pid})`);

  process.on("SIGTERM", () => {
    logger.warn("Cancellation requested, stopping");
    process.exit(143);
  });

  const code = await downloadPlaylist(options, logger);
  logger.info(`Worker finished with exit code ${code}`);
  process.exit(code);
}

main().catch((err: unknown) => {
  console.error("Error:", errorMessage(err));
  process.exit(1);
});
