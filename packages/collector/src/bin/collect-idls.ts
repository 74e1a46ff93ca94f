#!/usr/bin/env node
/**
 * collect-idls CLI
 *
 * Usage:
 *   collect-idls idl-paths.txt interfaces.json
 */

import { runCollect } from "../cli/collect.js";
import { ConsoleLogger } from "../logger.js";

process.exitCode = runCollect(process.argv.slice(2), {
  logger: new ConsoleLogger(),
  print: (text) => console.error(text),
});
