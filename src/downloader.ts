// Playlist download through yt-dlp: option construction and invocation.
// Resuming relies on yt-dlp's .part files (--continue) and deduplication on
// its download archive.

import { execFile, spawn } from "child_process";
import { mkdirSync } from "fs";
import { join, resolve } from "path";
import { createInterface } from "readline";
import { promisify } from "util";
import { glob } from "glob";
import { config } from "./config.ts";
import { errorMessage } from "./fs-utils.ts";
import type { Logger } from "./logger.ts";
import { ProgressReporter } from "./progress.ts";

const execFileAsync = promisify(execFile);

export interface DownloadOptions {
  playlistUrl: string;
  downloadDir: string;
  cookiesPath: string | null;
  /** Download only the last N entries; 0 means the whole playlist. */
  lastVideos: number;
  /** Maximum video height in pixels; 0 means best available. */
  maxQualityHeight: number;
  /** Download archive; null means archive.txt inside the download directory. */
  archivePath: string | null;
}

export interface PlaylistRange {
  start: number;
  end?: number;
}

export function formatSelector(maxQualityHeight: number): string {
  if (maxQualityHeight > 0) {
    return `bestvideo[height<=${maxQualityHeight}]+bestaudio/best[height<=${maxQualityHeight}]`;
  }
  return "bestvideo+bestaudio/best";
}

export function computeRange(totalItems: number, lastVideos: number): PlaylistRange {
  if (lastVideos <= 0 || totalItems <= 0) return { start: 1 };
  return { start: Math.max(1, totalItems - lastVideos + 1), end: totalItems };
}

export function resolveArchivePath(options: DownloadOptions): string {
  return options.archivePath ?? join(options.downloadDir, config.archiveFileName);
}

export function buildYtDlpArgs(options: DownloadOptions, range: PlaylistRange): string[] {
  const args = [
    "-o", join(options.downloadDir, config.outputTemplate),
    "--ignore-errors",
    "--yes-playlist",
    "--continue",
    "--part",
    "--retries", String(config.retries),
    "--fragment-retries", String(config.fragmentRetries),
    "--socket-timeout", String(config.socketTimeoutSeconds),
    "--concurrent-fragments", String(config.concurrentFragments),
    "--trim-filenames", String(config.trimFilenames),
    "-f", formatSelector(options.maxQualityHeight),
    "--download-archive", resolveArchivePath(options),
  ];

  if (range.start > 1) {
    args.push("--playlist-start", String(range.start));
  }
  if (range.end !== undefined) {
    args.push("--playlist-end", String(range.end));
  }
  if (options.cookiesPath) {
    args.push("--cookies", options.cookiesPath);
  }
  // One progress report per line, read back by ProgressReporter
  args.push("--newline", options.playlistUrl);
  return args;
}

/**
 * Count playlist entries without downloading. Returns null when the
 * playlist could not be read.
 */
export async function countPlaylistEntries(
  playlistUrl: string,
  cookiesPath: string | null
): Promise<number | null> {
  const args = ["--flat-playlist", "--dump-single-json"];
  if (cookiesPath) args.push("--cookies", cookiesPath);
  args.push(playlistUrl);

  const { stdout } = await execFileAsync(config.ytDlpBinary, args, { maxBuffer: 64 * 1024 * 1024 });
  const data: unknown = JSON.parse(stdout);
  if (typeof data !== "object" || data === null || !("entries" in data)) return 0;
  return Array.isArray(data.entries) ? data.entries.length : 0;
}

async function determineRange(options: DownloadOptions, logger: Logger): Promise<PlaylistRange> {
  if (options.lastVideos <= 0) return { start: 1 };

  let total: number | null;
  try {
    total = await countPlaylistEntries(options.playlistUrl, options.cookiesPath);
  } catch (err) {
    logger.warn(`Could not determine playlist size (${errorMessage(err)}). Downloading the whole playlist.`);
    return { start: 1 };
  }

  if (!total) {
    logger.warn("The playlist has no detectable videos.");
    return { start: 1 };
  }

  const range = computeRange(total, options.lastVideos);
  logger.info(`Downloading the last ${options.lastVideos} videos (index ${range.start} to ${range.end})`);
  return range;
}

/**
 * Run a full playlist download in the foreground. Resolves with yt-dlp's
 * exit code; individual video failures are skipped by yt-dlp itself.
 */
export async function downloadPlaylist(options: DownloadOptions, logger: Logger): Promise<number> {
  mkdirSync(options.downloadDir, { recursive: true });
  const range = await determineRange(options, logger);
  const args = buildYtDlpArgs(options, range);

  logger.info(`Starting playlist download: ${options.playlistUrl}`);
  logger.info(`Saving to: ${resolve(options.downloadDir)}`);
  if (options.cookiesPath) {
    logger.info(`Using cookies file: ${options.cookiesPath}`);
  }

  return new Promise((resolvePromise) => {
    const child = spawn(config.ytDlpBinary, args, { stdio: ["ignore", "pipe", "pipe"] });
    const reporter = new ProgressReporter(logger);
    createInterface({ input: child.stdout }).on("line", (line) => reporter.handle(line));
    createInterface({ input: child.stderr }).on("line", (line) => reporter.handle(line));

    child.on("error", (err) => {
      reporter.endLine();
      logger.error(`Failed to start ${config.ytDlpBinary}: ${err.message}`);
      resolvePromise(1);
    });

    child.on("close", (code, signal) => {
      reporter.endLine();
      if (code === 0) {
        logger.info("All downloads attempted.");
      } else if (signal) {
        logger.warn(`Download interrupted by ${signal}`);
      } else {
        logger.error(`${config.ytDlpBinary} exited with code ${code}`);
      }
      resolvePromise(code ?? 1);
    });
  });
}

// ---------- worker argument contract ----------

export function workerArgs(options: DownloadOptions): string[] {
  const args = ["--playlist-url", options.playlistUrl, "--download-dir", options.downloadDir];
  if (options.cookiesPath) args.push("--cookies-path", options.cookiesPath);
  if (options.lastVideos > 0) args.push("--last-videos", String(options.lastVideos));
  if (options.maxQualityHeight > 0) args.push("--max-quality-height", String(options.maxQualityHeight));
  if (options.archivePath) args.push("--archive-path", options.archivePath);
  return args;
}

function parseCount(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${flag} expects a non-negative integer, got: ${value ?? "(nothing)"}`);
  }
  return n;
}

export function parseWorkerArgs(argv: string[]): { options: DownloadOptions; detached: boolean } {
  let playlistUrl = "";
  let downloadDir = "";
  let cookiesPath: string | null = null;
  let lastVideos = 0;
  let maxQualityHeight = 0;
  let archivePath: string | null = null;
  let detached = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--playlist-url":
        playlistUrl = argv[++i] ?? "";
        break;
      case "--download-dir":
        downloadDir = argv[++i] ?? "";
        break;
      case "--cookies-path":
        cookiesPath = argv[++i] || null;
        break;
      case "--last-videos":
        lastVideos = parseCount(arg, argv[++i]);
        break;
      case "--max-quality-height":
        maxQualityHeight = parseCount(arg, argv[++i]);
        break;
      case "--archive-path":
        archivePath = argv[++i] || null;
        break;
      case "--detached":
        detached = true;
        break;
      default:
        throw new Error(`Unknown worker argument: ${arg}`);
    }
  }

  if (!playlistUrl) throw new Error("--playlist-url is required");
  if (!downloadDir) throw new Error("--download-dir is required");

  return {
    options: { playlistUrl, downloadDir, cookiesPath, lastVideos, maxQualityHeight, archivePath },
    detached,
  };
}

// ---------- environment checks ----------

/**
 * Partial files yt-dlp will resume from on the next run.
 */
export async function findPartialDownloads(downloadDir: string): Promise<string[]> {
  const matches = await glob(config.partialPatterns, {
    cwd: resolve(downloadDir),
    absolute: true,
    nodir: true,
  });
  return matches.sort();
}

export async function getYtDlpVersion(): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync(config.ytDlpBinary, ["--version"]);
    return stdout.trim();
  } catch {
    return null;
  }
}
