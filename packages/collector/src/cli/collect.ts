import { createWebIdlParser } from "../parsing/webidl-parser.js";
import { buildRegistry } from "../registry/builder.js";
import { writeRegistry } from "../serialize/serializer.js";
import { readPathList } from "../sources/path-list.js";
import type { CollectorConfig } from "../config.js";
import type { Logger } from "../types.js";

export const COLLECT_USAGE = `
collect-idls - Merge WebIDL interfaces into one JSON registry

Usage:
  collect-idls <path-list-file> <output-file>

Arguments:
  path-list-file  Text file with one .idl document path per line
  output-file     Where the JSON registry is written

Exit codes:
  0  Success
  1  Error (invalid args, unreadable input, parse failure, unknown mixin, etc.)
`.trim();

export interface CliIo {
  logger: Logger;
  /** Writes usage text */
  print(text: string): void;
}

/**
 * `collect-idls <path-list-file> <output-file>`; returns the exit code.
 */
export function runCollect(args: readonly string[], io: CliIo, config?: CollectorConfig): number {
  if (args.includes("--help") || args.includes("-h")) {
    io.print(COLLECT_USAGE);
    return 0;
  }

  const [pathListFile, outputFile] = args;
  if (args.length !== 2 || pathListFile === undefined || outputFile === undefined) {
    io.print(COLLECT_USAGE);
    return 1;
  }

  try {
    const paths = readPathList(pathListFile);
    const registry = buildRegistry(paths, {
      parser: createWebIdlParser({ logger: io.logger }),
      config,
      logger: io.logger,
    });
    writeRegistry(outputFile, registry);
    io.logger.info(`[collector] wrote ${registry.size} interface(s) to ${outputFile}`);
    return 0;
  } catch (err) {
    io.logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
