#!/usr/bin/env node
/**
 * list-idls CLI
 *
 * Usage:
 *   list-idls ./Source idl-paths.txt
 */

import { runList } from "../cli/list.js";
import { ConsoleLogger } from "../logger.js";

process.exitCode = runList(process.argv.slice(2), {
  logger: new ConsoleLogger(),
  print: (text) => console.error(text),
});
