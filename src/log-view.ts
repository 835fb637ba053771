// Reading the shared log file back for `logs`.

import { readFileSync } from "fs";

const ANSI_OSC_REGEX = /\u001B\][\s\S]*?(?:\u0007|\u001B\\|\u009C)/g;
const ANSI_CSI_REGEX =
  /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:[;:]\d{0,4})*)?[\dA-PR-TZcf-nq-uy=><~]/g;
const ANSI_ESC_TWO_CHAR_REGEX = /\u001B[@-Z\\-_]/g;
const CONTROL_CHARS_REGEX = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export function stripAnsiCodes(text: string): string {
  return text
    .replace(ANSI_OSC_REGEX, "")
    .replace(ANSI_CSI_REGEX, "")
    .replace(ANSI_ESC_TWO_CHAR_REGEX, "")
    .replace(CONTROL_CHARS_REGEX, "");
}

/**
 * Progress bars redraw a line with \r; keep only what was last drawn.
 */
export function collapseProgress(text: string): string {
  return text
    .replace(/\r\n/g, "\n")
    .split("\n")
    .map((line) => {
      const segments = line.split("\r").filter((segment) => segment.length > 0);
      return segments.length > 0 ? segments[segments.length - 1] : "";
    })
    .join("\n");
}

export function cleanLogText(text: string): string {
  // Collapse first: stripping control chars would also drop the \r markers
  return stripAnsiCodes(collapseProgress(text));
}

/**
 * Last `lines` non-empty lines of the log, cleaned. Null if the log does not exist.
 */
export function tailLog(path: string, lines: number): string[] | null {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch {
    return null;
  }
  const all = cleanLogText(content)
    .split("\n")
    .filter((line) => line.trim().length > 0);
  return lines > 0 ? all.slice(-lines) : all;
}
