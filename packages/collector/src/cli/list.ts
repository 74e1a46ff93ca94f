import { discoverDocuments } from "../sources/discover.js";
import { writePathList } from "../sources/path-list.js";
import type { DiscoveryConfig } from "../config.js";
import type { CliIo } from "./collect.js";

export const LIST_USAGE = `
list-idls - Write the path of every .idl document under a directory

Usage:
  list-idls <directory> <path-list-file>

Arguments:
  directory       Root of the tree to search
  path-list-file  Where the newline-delimited path list is written

Exit codes:
  0  Success
  1  Error (invalid args, unreadable directory, etc.)
`.trim();

/**
 * `list-idls <directory> <path-list-file>`; returns the exit code.
 */
export function runList(args: readonly string[], io: CliIo, config?: DiscoveryConfig): number {
  if (args.includes("--help") || args.includes("-h")) {
    io.print(LIST_USAGE);
    return 0;
  }

  const [directory, pathListFile] = args;
  if (args.length !== 2 || directory === undefined || pathListFile === undefined) {
    io.print(LIST_USAGE);
    return 1;
  }

  try {
    const documents = discoverDocuments(directory, config);
    writePathList(pathListFile, documents);
    io.logger.info(`[collector] listed ${documents.length} document(s) in ${pathListFile}`);
    return 0;
  } catch (err) {
    io.logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
