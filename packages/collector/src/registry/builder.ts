import type { IdlNode } from "../tree/node.js";
import type { DocumentParser } from "../parsing/webidl-parser.js";
import type { InterfaceRecord, InterfaceRegistry, MixinRelation } from "../extraction/types.js";
import { resolveCollectorConfig, type CollectorConfig } from "../config.js";
import {
  extractInterfaceRecord,
  extractMixinRelation,
  isInterface,
  isMixinRelation,
  isPartialInterface,
} from "../extraction/extractor.js";
import { mergePartials, type PartialFragments } from "../merge/partials.js";
import { mergeMixins } from "../merge/mixins.js";
import { nullLogger, type Logger } from "../types.js";

export interface BuildRegistryOptions {
  /** Parser used to read each document */
  parser: DocumentParser;
  config?: CollectorConfig;
  logger?: Logger;
}

export interface CollectRegistryOptions {
  config?: CollectorConfig;
  logger?: Logger;
}

/**
 * Main entry point: parse the documents and build the merged registry.
 *
 * Pipeline:
 * 1. Parse: each path → top-level definition nodes (parsed once, reused by every pass)
 * 2. Collect: interfaces, partial fragments, mixin relations
 * 3. Merge partial fragments into their base interfaces
 * 4. Merge mixin members into the interfaces that include them
 *
 * Run it once per input set: merges append, so feeding a merged registry
 * back in would duplicate members.
 */
export function buildRegistry(paths: readonly string[], options: BuildRegistryOptions): InterfaceRegistry {
  const log = options.logger ?? nullLogger;

  log.info(`[collector] parsing ${paths.length} document(s)...`);
  const definitions = collectDefinitions(paths, options.parser);

  return collectRegistry(definitions, { config: options.config, logger: log });
}

/**
 * Parse every document and return its top-level definitions, documents in
 * path order and definitions in declaration order.
 */
export function collectDefinitions(paths: readonly string[], parser: DocumentParser): IdlNode[] {
  return paths.flatMap((path) => [...parser.parse(path).getChildren()]);
}

/**
 * Build the merged registry from already-parsed definition nodes.
 */
export function collectRegistry(definitions: readonly IdlNode[], options?: CollectRegistryOptions): InterfaceRegistry {
  const log = options?.logger ?? nullLogger;
  const config = resolveCollectorConfig(options?.config);

  log.info("[collector] collecting interfaces...");
  const interfaces = collectInterfaces(definitions, (node) => extractInterfaceRecord(node, config), log);
  const partials = collectPartials(definitions, (node) => extractInterfaceRecord(node, config));
  const relations = collectMixinRelations(definitions);

  log.info(`[collector] merging ${countFragments(partials)} partial fragment(s)...`);
  const withPartials = mergePartials(interfaces, partials, log);

  log.info(`[collector] merging ${relations.length} mixin relation(s)...`);
  const registry = mergeMixins(withPartials, relations, log);

  log.info(`[collector] complete: ${registry.size} interface(s)`);
  return registry;
}

// --- Collection passes ---

/**
 * Non-partial interfaces keyed by name. A later definition with the same
 * name replaces an earlier one.
 */
export function collectInterfaces(
  definitions: readonly IdlNode[],
  extract: (node: IdlNode) => InterfaceRecord,
  logger: Logger = nullLogger,
): Map<string, InterfaceRecord> {
  const interfaces = new Map<string, InterfaceRecord>();
  for (const node of definitions) {
    if (!isInterface(node)) continue;
    const record = extract(node);
    const previous = interfaces.get(record.name);
    if (previous) {
      logger.warn(`[collector] interface '${record.name}' is defined more than once; ${record.filePath} replaces ${previous.filePath}`);
    }
    interfaces.set(record.name, record);
  }
  return interfaces;
}

/** Partial fragments grouped by the interface they extend, in input order */
export function collectPartials(
  definitions: readonly IdlNode[],
  extract: (node: IdlNode) => InterfaceRecord,
): PartialFragments {
  const partials = new Map<string, InterfaceRecord[]>();
  for (const node of definitions) {
    if (!isPartialInterface(node)) continue;
    const record = extract(node);
    const fragments = partials.get(record.name);
    if (fragments) {
      fragments.push(record);
    } else {
      partials.set(record.name, [record]);
    }
  }
  return partials;
}

export function collectMixinRelations(definitions: readonly IdlNode[]): MixinRelation[] {
  return definitions.filter(isMixinRelation).map(extractMixinRelation);
}

function countFragments(partials: PartialFragments): number {
  let count = 0;
  for (const fragments of partials.values()) count += fragments.length;
  return count;
}
