import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { DEFAULT_SETTINGS, loadSettings, normalizeSettings, saveSettings } from "./settings.ts";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "ytpl-settings-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("loadSettings", () => {
  test("defaults when the file is missing", () => {
    expect(loadSettings(join(dir, "settings.json"))).toEqual(DEFAULT_SETTINGS);
  });

  test("defaults when the file is malformed", () => {
    const file = join(dir, "settings.json");
    writeFileSync(file, "{ not json");

    expect(loadSettings(file)).toEqual(DEFAULT_SETTINGS);
  });

  test("saved settings load back", () => {
    const file = join(dir, "nested", "settings.json");
    const settings = { downloadDir: "/media/yt", cookiesPath: "/home/me/cookies.txt", maxQualityHeight: 720, archivePath: null };
    saveSettings(settings, file);

    expect(loadSettings(file)).toEqual(settings);
  });
});

describe("normalizeSettings", () => {
  test("merges known fields over defaults", () => {
    expect(normalizeSettings({ maxQualityHeight: 0 })).toEqual({ ...DEFAULT_SETTINGS, maxQualityHeight: 0 });
  });

  test("wrong types keep their default", () => {
    expect(
      normalizeSettings({ downloadDir: 12, cookiesPath: false, maxQualityHeight: -1, archivePath: ["x"] })
    ).toEqual(DEFAULT_SETTINGS);
  });

  test("empty cookies path means no cookies", () => {
    expect(normalizeSettings({ cookiesPath: "" }).cookiesPath).toBeNull();
  });

  test("non-objects give defaults", () => {
    expect(normalizeSettings([1, 2])).toEqual(DEFAULT_SETTINGS);
    expect(normalizeSettings("downloads")).toEqual(DEFAULT_SETTINGS);
  });
});
