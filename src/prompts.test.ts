import { afterEach, describe, expect, test, vi } from "vitest";
import { PassThrough } from "stream";
import { parseCookiesAnswer, Prompter } from "./prompts.ts";

/** Prompter whose questions are answered in order, one per prompt written. */
function scripted(answers: string[]): Prompter {
  const input = new PassThrough();
  const output = new PassThrough();
  output.on("data", () => {
    const next = answers.shift();
    if (next !== undefined) input.write(next + "\n");
  });
  return new Prompter(input, output);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Prompter", () => {
  test("empty answer takes the default", async () => {
    const prompter = scripted([""]);

    expect(await prompter.text("Download directory", "downloads")).toBe("downloads");
    prompter.close();
  });

  test("integer asks again until the value is valid", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const prompter = scripted(["abc", "-1", "7"]);

    expect(await prompter.integer("Count", 3, 0)).toBe(7);
    expect(log.mock.calls).toEqual([
      ["Invalid number. Please try again."],
      ["Please enter an integer greater than or equal to 0."],
    ]);
    prompter.close();
  });

  test("cookies prompt keeps the current path on empty input", async () => {
    const prompter = scripted([""]);

    expect(await prompter.cookiesPath("/home/me/cookies.txt")).toBe("/home/me/cookies.txt");
    prompter.close();
  });
});

describe("parseCookiesAnswer", () => {
  test("opt-out words mean no cookies", () => {
    expect(parseCookiesAnswer("none")).toBeNull();
    expect(parseCookiesAnswer("NO")).toBeNull();
    expect(parseCookiesAnswer("")).toBeNull();
  });

  test("anything else is a path", () => {
    expect(parseCookiesAnswer("  ./cookies.txt ")).toBe("./cookies.txt");
  });
});
