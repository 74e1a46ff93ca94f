import { readFileSync, writeFileSync } from "node:fs";

/**
 * Read a newline-delimited list of document paths. Lines are trimmed and
 * blank lines skipped.
 */
export function readPathList(file: string, readFile: (path: string) => string = readUtf8): string[] {
  return parsePathList(readFile(file));
}

export function parsePathList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** One path per line, each terminated by `\n` */
export function formatPathList(paths: readonly string[]): string {
  return paths.map((path) => `${path}\n`).join("");
}

export function writePathList(file: string, paths: readonly string[]): void {
  writeFileSync(file, formatPathList(paths), "utf-8");
}

function readUtf8(path: string): string {
  return readFileSync(path, "utf-8");
}
