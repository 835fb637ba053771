#!/usr/bin/env tsx

// yt-playlist-dl CLI - Download YouTube playlists with yt-dlp, in the
// foreground or as a single tracked background job

import { existsSync } from "fs";
import { resolve } from "path";
import { config } from "./config.ts";
import {
  defaultJobDeps,
  describeJobStatus,
  describeLaunchOutcome,
  getJobStatus,
  startBackgroundDownload,
  type JobDeps,
} from "./jobs.ts";
import { cancelJob, describeCancelOutcome } from "./canceller.ts";
import {
  downloadPlaylist,
  findPartialDownloads,
  getYtDlpVersion,
  type DownloadOptions,
} from "./downloader.ts";
import { errorMessage } from "./fs-utils.ts";
import { tailLog } from "./log-view.ts";
import { createLogger, type Logger } from "./logger.ts";
import { parseCookiesAnswer, Prompter } from "./prompts.ts";
import { loadSettings, saveSettings, type Settings } from "./settings.ts";

const HELP = `
yt-playlist-dl - Download YouTube playlists with yt-dlp (resumable, deduplicated)

Usage:
  yt-playlist-dl                          Interactive menu
  yt-playlist-dl download --url <url>     Download a playlist
  yt-playlist-dl status                   Show the background download
  yt-playlist-dl cancel                   Cancel the background download
  yt-playlist-dl logs [lines]             Show the end of the log (default: 50 lines)
  yt-playlist-dl settings [show]          Edit (or show) saved settings
  yt-playlist-dl health                   Check yt-dlp availability

Options (download):
  -u, --url <url>            Playlist URL
  -d, --dir <path>           Download directory (default: saved setting)
  -c, --cookies <path|none>  cookies.txt for YouTube (default: saved setting)
  -n, --last <count>         Only the last <count> videos (default: 0 = all)
  -q, --max-height <px>      Maximum video height (0 = best available)
  -b, --background           Run detached; follow with 'status' and 'logs'
  -h, --help                 Show this help

Files:
  State directory: $YTPL_HOME (default: ~/.yt-playlist-dl)
  yt-dlp binary:   $YTPL_YTDLP (default: yt-dlp)
`;

interface Options {
  url: string | null;
  dir: string | null;
  cookies: string | null | undefined;
  last: number;
  maxHeight: number | null;
  background: boolean;
}

function parseCountOption(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < 0) {
    console.error(`Invalid value for ${flag}: ${value ?? "(missing)"}`);
    console.error("Expected a non-negative integer");
    process.exit(1);
  }
  return n;
}

function parseArgs(args: string[]): {
  command: string;
  positional: string[];
  options: Options;
} {
  const options: Options = {
    url: null,
    dir: null,
    cookies: undefined,
    last: 0,
    maxHeight: null,
    background: false,
  };

  const positional: string[] = [];
  let command = "";

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      console.log(HELP);
      process.exit(0);
    } else if (arg === "-u" || arg === "--url") {
      options.url = args[++i] ?? null;
    } else if (arg === "-d" || arg === "--dir") {
      options.dir = args[++i] ?? null;
    } else if (arg === "-c" || arg === "--cookies") {
      options.cookies = parseCookiesAnswer(args[++i] ?? "");
    } else if (arg === "-n" || arg === "--last") {
      options.last = parseCountOption(arg, args[++i]);
    } else if (arg === "-q" || arg === "--max-height") {
      options.maxHeight = parseCountOption(arg, args[++i]);
    } else if (arg === "-b" || arg === "--background") {
      options.background = true;
    } else if (arg.startsWith("-")) {
      console.error(`Unknown option: ${arg}`);
      process.exit(1);
    } else if (!command) {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, options };
}

function toDownloadOptions(settings: Settings, overrides: {
  url: string;
  dir?: string | null;
  cookies?: string | null;
  last: number;
  maxHeight?: number | null;
}): DownloadOptions {
  return {
    playlistUrl: overrides.url,
    downloadDir: overrides.dir || settings.downloadDir,
    cookiesPath: overrides.cookies !== undefined ? overrides.cookies : settings.cookiesPath,
    lastVideos: overrides.last,
    maxQualityHeight: overrides.maxHeight ?? settings.maxQualityHeight,
    archivePath: settings.archivePath,
  };
}

/** Returns the process exit code. */
async function runDownload(
  options: DownloadOptions,
  background: boolean,
  deps: JobDeps,
  logger: Logger
): Promise<number> {
  if (options.cookiesPath && !existsSync(options.cookiesPath)) {
    console.error(`Warning: cookies file not found: ${options.cookiesPath}. The download may fail.`);
  }

  if (background) {
    const outcome = startBackgroundDownload(options, deps);
    const message = describeLaunchOutcome(outcome);
    if (outcome.kind === "launched") {
      console.log(message);
      console.log("");
      console.log("Commands:");
      console.log("  Check status:  yt-playlist-dl status");
      console.log("  Follow output: yt-playlist-dl logs");
      console.log("  Cancel:        yt-playlist-dl cancel");
      return 0;
    }
    console.error(message);
    return 1;
  }

  const code = await downloadPlaylist(options, logger);
  console.log(code === 0 ? "\nAll downloads attempted. Review the log for details." : `\nDownload ended with errors. See ${config.logFile}`);
  return code;
}

async function printStatus(deps: JobDeps): Promise<number> {
  const status = getJobStatus(deps);
  console.log(describeJobStatus(status));

  const settings = loadSettings();
  const partials = await findPartialDownloads(settings.downloadDir);
  if (partials.length > 0) {
    console.log(`${partials.length} partial file(s) in ${resolve(settings.downloadDir)} will resume on the next run.`);
  }
  return status.kind === "error" ? 1 : 0;
}

function runCancel(deps: JobDeps): number {
  const outcome = cancelJob(deps);
  const message = describeCancelOutcome(outcome);
  if (outcome.kind === "permission-denied" || outcome.kind === "error") {
    console.error(message);
    return 1;
  }
  console.log(message);
  return 0;
}

async function configureSettings(prompter: Prompter, logger: Logger): Promise<Settings> {
  const current = loadSettings();
  console.log("\n--- Settings ---");
  const downloadDir = await prompter.text("Default download directory", current.downloadDir);
  const cookiesPath = await prompter.cookiesPath(current.cookiesPath);
  const maxQualityHeight = await prompter.integer(
    "Maximum quality (height in pixels, 0 for best available)",
    current.maxQualityHeight,
    0
  );

  const updated: Settings = {
    ...current,
    downloadDir: downloadDir || current.downloadDir,
    cookiesPath,
    maxQualityHeight,
  };
  saveSettings(updated);
  logger.info("Settings updated");
  console.log("Settings saved.\n");
  return updated;
}

async function promptDownload(prompter: Prompter, background: boolean, deps: JobDeps, logger: Logger): Promise<void> {
  const settings = loadSettings();
  console.log(background ? "\n--- Background download ---" : "\n--- Download ---");

  let url = await prompter.text("YouTube playlist URL");
  while (!url) {
    console.log("The URL cannot be empty.");
    url = await prompter.text("YouTube playlist URL");
  }

  const cookies = await prompter.cookiesPath(settings.cookiesPath);
  if (cookies === null || existsSync(cookies)) {
    saveSettings({ ...settings, cookiesPath: cookies });
  }
  const last = await prompter.integer("Number of latest videos to download (0 = whole playlist)", 0, 0);
  const dir = await prompter.text("Download directory", settings.downloadDir);

  await runDownload(toDownloadOptions(settings, { url, dir, cookies, last }), background, deps, logger);
}

const MENU = `
=== YouTube playlist downloader ===
1) Download now
2) Download in background
3) Background status
4) Cancel background download
5) Settings
6) Quit
Choice`;

async function interactive(deps: JobDeps, logger: Logger): Promise<void> {
  const prompter = new Prompter();
  process.on("SIGINT", () => {
    console.log("\nExit requested. Bye!");
    logger.info("Interrupted by user (Ctrl+C)");
    prompter.close();
    process.exit(0);
  });

  try {
    for (;;) {
      const choice = await prompter.text(MENU);
      if (choice === "1") {
        await promptDownload(prompter, false, deps, logger);
      } else if (choice === "2") {
        await promptDownload(prompter, true, deps, logger);
      } else if (choice === "3") {
        await printStatus(deps);
      } else if (choice === "4") {
        runCancel(deps);
      } else if (choice === "5") {
        await configureSettings(prompter, logger);
      } else if (choice === "6") {
        console.log("Bye!");
        break;
      } else {
        console.log("Invalid choice, please try again.\n");
      }
    }
  } finally {
    prompter.close();
  }
}

async function main() {
  const args = process.argv.slice(2);
  const { command, positional, options } = parseArgs(args);
  const logger = createLogger("yt-playlist-dl");
  const deps = defaultJobDeps(logger);

  try {
    switch (command) {
      case "": {
        await interactive(deps, logger);
        break;
      }

      case "download": {
        if (!options.url) {
          console.error("Error: No playlist URL provided (--url)");
          process.exit(1);
        }
        const downloadOptions = toDownloadOptions(loadSettings(), {
          url: options.url,
          dir: options.dir,
          cookies: options.cookies,
          last: options.last,
          maxHeight: options.maxHeight,
        });
        process.exitCode = await runDownload(downloadOptions, options.background, deps, logger);
        break;
      }

      case "status": {
        process.exitCode = await printStatus(deps);
        break;
      }

      case "cancel": {
        process.exitCode = runCancel(deps);
        break;
      }

      case "logs": {
        const lines = positional[0] ? parseCountOption("lines", positional[0]) : config.logTailLines;
        const output = tailLog(config.logFile, lines);
        if (output === null) {
          console.error(`No log yet at ${config.logFile}`);
          process.exit(1);
        }
        console.log(output.join("\n"));
        break;
      }

      case "settings": {
        if (positional[0] === "show") {
          console.log(JSON.stringify(loadSettings(), null, 2));
          break;
        }
        const prompter = new Prompter();
        try {
          await configureSettings(prompter, logger);
        } finally {
          prompter.close();
        }
        break;
      }

      case "health": {
        const version = await getYtDlpVersion();
        if (!version) {
          console.error(`${config.ytDlpBinary} not found`);
          console.error("Install with: pip install -U yt-dlp (or set YTPL_YTDLP)");
          process.exit(1);
        }
        console.log(`yt-dlp: ${version}`);
        console.log(`Identity check: ${deps.prober.control.inspector?.name ?? "unavailable (liveness only)"}`);
        console.log(`State: ${config.stateDir}`);
        console.log("Status: Ready");
        break;
      }

      default:
        console.error(`Unknown command: ${command}`);
        console.log(HELP);
        process.exit(1);
    }
  } catch (err) {
    console.error("Error:", errorMessage(err));
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("Error:", errorMessage(err));
  process.exit(1);
});
