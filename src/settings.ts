// Persisted user settings (download directory, cookies, quality, archive).

import { readFileSync } from "fs";
import { config } from "./config.ts";
import { atomicWriteFileSync } from "./fs-utils.ts";

export interface Settings {
  downloadDir: string;
  cookiesPath: string | null;
  /** 0 means best available. */
  maxQualityHeight: number;
  archivePath: string | null;
}

export const DEFAULT_SETTINGS: Settings = {
  downloadDir: "downloads",
  cookiesPath: null,
  maxQualityHeight: 1080,
  archivePath: null,
};

function optionalString(value: unknown, fallback: string | null): string | null {
  if (value === null) return null;
  if (typeof value === "string") return value || null;
  return fallback;
}

/**
 * Merge raw file data over the defaults, field by field. Fields with the
 * wrong type keep their default.
 */
export function normalizeSettings(data: unknown): Settings {
  const settings = { ...DEFAULT_SETTINGS };
  if (typeof data !== "object" || data === null || Array.isArray(data)) return settings;

  if ("downloadDir" in data && typeof data.downloadDir === "string" && data.downloadDir) {
    settings.downloadDir = data.downloadDir;
  }
  if ("cookiesPath" in data) {
    settings.cookiesPath = optionalString(data.cookiesPath, DEFAULT_SETTINGS.cookiesPath);
  }
  if (
    "maxQualityHeight" in data &&
    typeof data.maxQualityHeight === "number" &&
    Number.isInteger(data.maxQualityHeight) &&
    data.maxQualityHeight >= 0
  ) {
    settings.maxQualityHeight = data.maxQualityHeight;
  }
  if ("archivePath" in data) {
    settings.archivePath = optionalString(data.archivePath, DEFAULT_SETTINGS.archivePath);
  }
  return settings;
}

export function loadSettings(file: string = config.settingsFile): Settings {
  try {
    return normalizeSettings(JSON.parse(readFileSync(file, "utf-8")));
  } catch {
    return { ...DEFAULT_SETTINGS };
  }
}

export function saveSettings(settings: Settings, file: string = config.settingsFile): void {
  atomicWriteFileSync(file, JSON.stringify(settings, null, 2) + "\n");
}
