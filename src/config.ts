// Configuration for yt-playlist-dl

import { homedir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";

const stateDir = process.env.YTPL_HOME || join(homedir(), ".yt-playlist-dl");

export const config = {
  // State directory (job record, logs, settings)
  stateDir,
  jobFile: join(stateDir, "job.json"),
  logFile: join(stateDir, "logs", "app.log"),
  settingsFile: join(stateDir, "settings.json"),

  // Background worker entry point; its path is also the identity signature
  // looked for in a tracked process's command line
  workerEntry: fileURLToPath(new URL("./worker.ts", import.meta.url)),

  // External downloader
  ytDlpBinary: process.env.YTPL_YTDLP || "yt-dlp",
  outputTemplate: "%(playlist_index)03d-%(title)s.%(ext)s",
  retries: 10,
  fragmentRetries: 20,
  socketTimeoutSeconds: 30,
  concurrentFragments: 1,
  trimFilenames: 200,

  // Leftovers yt-dlp resumes from on the next run
  partialPatterns: ["**/*.part", "**/*.ytdl"],

  // Default number of log lines for `logs`
  logTailLines: 50,

  // Default archive file name inside the download directory
  archiveFileName: "archive.txt",
};
