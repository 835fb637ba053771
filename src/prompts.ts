// Interactive prompts for the menu-driven mode.

import { createInterface, type Interface } from "node:readline/promises";

const NO_COOKIES_ANSWERS = new Set(["none", "no", "aucun", "non"]);

export class Prompter {
  private readonly rl: Interface;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = createInterface({ input, output });
  }

  async text(question: string, fallback?: string): Promise<string> {
    const suffix = fallback ? ` [${fallback}]` : "";
    const answer = (await this.rl.question(`${question}${suffix}: `)).trim();
    return answer || fallback || "";
  }

  async integer(question: string, fallback: number, min = 0): Promise<number> {
    for (;;) {
      const raw = await this.text(question, String(fallback));
      const value = Number(raw);
      if (!Number.isInteger(value)) {
        console.log("Invalid number. Please try again.");
        continue;
      }
      if (value < min) {
        console.log(`Please enter an integer greater than or equal to ${min}.`);
        continue;
      }
      return value;
    }
  }

  async cookiesPath(current: string | null): Promise<string | null> {
    const display = current ?? "none";
    const raw = (await this.rl.question(`Path to cookies.txt ('none' for no cookies) [${display}]: `)).trim();
    if (raw === "") return current;
    return parseCookiesAnswer(raw);
  }

  close(): void {
    this.rl.close();
  }
}

export function parseCookiesAnswer(raw: string): string | null {
  const trimmed = raw.trim();
  if (trimmed === "" || NO_COOKIES_ANSWERS.has(trimmed.toLowerCase())) return null;
  return trimmed;
}
