// yt-dlp console output (run with --newline): line classification and the
// one-line progress display shown while a video downloads.

import { basename } from "path";
import type { Logger } from "./logger.ts";

export type YtDlpLine =
  | { kind: "destination"; file: string }
  | { kind: "progress"; percent: number; speed: string | null; eta: number | null }
  | { kind: "already-downloaded"; file: string }
  | { kind: "merged"; file: string }
  | { kind: "error"; message: string }
  | { kind: "warning"; message: string }
  | { kind: "other"; text: string };

/** "00:12" or "1:02:03" to seconds; null for "Unknown" and anything else. */
export function parseEta(raw: string): number | null {
  if (!/^\d+(:\d{1,2}){0,2}$/.test(raw)) return null;
  return raw.split(":").reduce((total, part) => total * 60 + Number(part), 0);
}

export function formatEta(seconds: number | null): string {
  if (seconds === null) return "unknown";
  const secs = seconds % 60;
  const minutes = Math.floor(seconds / 60) % 60;
  const hours = Math.floor(seconds / 3600);
  const pad = (n: number) => String(n).padStart(2, "0");
  if (hours) return `${hours}h${pad(minutes)}m${pad(secs)}s`;
  if (minutes) return `${minutes}m${pad(secs)}s`;
  return `${secs}s`;
}

export function parseYtDlpLine(line: string): YtDlpLine {
  const text = line.trimEnd();
  let match: RegExpMatchArray | null;

  if ((match = text.match(/^\[download\] Destination: (.+)$/))) {
    return { kind: "destination", file: match[1] };
  }
  if ((match = text.match(/^\[download\] (.+) has already been downloaded/))) {
    return { kind: "already-downloaded", file: match[1] };
  }
  if ((match = text.match(/^\[Merger\] Merging formats into "(.+)"$/))) {
    return { kind: "merged", file: match[1] };
  }
  // [download]  45.5% of  123.45MiB at    1.23MiB/s ETA 00:12
  if ((match = text.match(/^\[download\]\s+(\d+(?:\.\d+)?)%/))) {
    const speed = text.match(/ at\s+(\S+\/s)/);
    const eta = text.match(/ ETA (\S+)/);
    return {
      kind: "progress",
      percent: parseFloat(match[1]),
      speed: speed ? speed[1] : null,
      eta: eta ? parseEta(eta[1]) : null,
    };
  }
  if ((match = text.match(/^ERROR: (.*)$/))) {
    return { kind: "error", message: match[1] };
  }
  if ((match = text.match(/^WARNING: (.*)$/))) {
    return { kind: "warning", message: match[1] };
  }
  return { kind: "other", text };
}

export interface ProgressOutput {
  write(chunk: string): unknown;
}

/**
 * Turns yt-dlp output into a redrawn progress line plus log records:
 * "Finished downloading <file>" per completed file, errors and warnings.
 * Other output is passed through unchanged.
 */
export class ProgressReporter {
  private readonly logger: Logger;
  private readonly out: ProgressOutput;
  private current: string | null = null;
  private finished: string | null = null;
  private redrawing = false;

  constructor(logger: Logger, out: ProgressOutput = process.stdout) {
    this.logger = logger;
    this.out = out;
  }

  handle(line: string): void {
    const parsed = parseYtDlpLine(line);
    switch (parsed.kind) {
      case "progress":
        this.out.write(`\r${this.progressLine(parsed.percent, parsed.speed, parsed.eta)}`);
        this.redrawing = true;
        if (parsed.percent >= 100 && this.current && this.finished !== this.current) {
          this.finish(this.current);
        }
        return;
      case "destination":
        this.current = parsed.file;
        this.passThrough(line);
        return;
      case "already-downloaded":
        this.endLine();
        this.logger.info(`Already downloaded ${parsed.file}`);
        return;
      case "merged":
        this.passThrough(line);
        this.logger.info(`Merged formats into ${parsed.file}`);
        return;
      case "error":
        this.endLine();
        this.logger.error(`Error during download: ${parsed.message}`);
        return;
      case "warning":
        this.endLine();
        this.logger.warn(parsed.message);
        return;
      case "other":
        if (parsed.text) this.passThrough(parsed.text);
        return;
    }
  }

  /** Terminates a pending progress line. */
  endLine(): void {
    if (this.redrawing) {
      this.out.write("\n");
      this.redrawing = false;
    }
  }

  private progressLine(percent: number, speed: string | null, eta: number | null): string {
    const title = this.current ? basename(this.current) : "Unknown title";
    return `[DOWNLOADING] ${title.slice(0, 50).padEnd(50)} | ${percent.toFixed(1)}% at ${speed ?? "?"} | ETA ${formatEta(eta)}`;
  }

  private finish(file: string): void {
    this.finished = file;
    this.endLine();
    this.logger.info(`Finished downloading ${file}`);
    this.out.write(`Completed: ${basename(file)}\n`);
  }

  private passThrough(text: string): void {
    this.endLine();
    this.out.write(text.trimEnd() + "\n");
  }
}
