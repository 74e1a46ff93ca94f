export { runCollect, COLLECT_USAGE, type CliIo } from "./collect.js";
export { runList, LIST_USAGE } from "./list.js";
