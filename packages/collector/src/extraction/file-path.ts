import { relative } from "node:path";

/**
 * Provenance path of a document: `filename` relative to `cwd`, with the
 * characters of `strip` trimmed from both ends.
 *
 * `strip` is a character set. With the default
 * `../chromium/src/third_party/WebKit`, a document at
 * `../chromium/src/third_party/WebKit/bits/Foo.idl` yields `Foo.idl`,
 * because `b`, `i`, `t`, `s` and `/` all occur in the set.
 */
export function toProvenancePath(filename: string, cwd: string, strip: string): string {
  return trimCharacters(relative(cwd, filename), strip);
}

/**
 * Remove every leading and trailing character of `value` that occurs in
 * `characters`.
 */
export function trimCharacters(value: string, characters: string): string {
  const set = new Set(characters.split(""));
  let start = 0;
  let end = value.length;
  while (start < end && set.has(value.charAt(start))) start++;
  while (end > start && set.has(value.charAt(end - 1))) end--;
  return value.slice(start, end);
}
