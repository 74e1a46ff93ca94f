import * as fs from "node:fs";
import * as nodePath from "node:path";
import { resolveDiscoveryConfig, type DiscoveryConfig } from "../config.js";

/**
 * Collect every interface-definition document under `root`.
 *
 * Walks the tree depth-first, keeps files whose name ends with the
 * configured extension and is not excluded, and returns absolute paths in
 * sorted order. Unreadable directories fail the walk.
 */
export function discoverDocuments(root: string, config?: DiscoveryConfig): string[] {
  const { extension, exclude } = resolveDiscoveryConfig(config);
  const pending = [nodePath.resolve(root)];
  const files: string[] = [];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;

    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const fullPath = nodePath.join(current, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
        continue;
      }
      if (!entry.isFile()) continue;
      if (!entry.name.endsWith(extension) || exclude.has(entry.name)) continue;
      files.push(fullPath);
    }
  }

  files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return files;
}
