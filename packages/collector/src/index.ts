// Collector package public API
//
// Builds a name-keyed registry of WebIDL interfaces with partial fragments
// and mixin members folded in.
//
// Architecture:
// - Parsing: document → IdlNode tree (webidl2 adapter)
// - Extraction: Interface node → InterfaceRecord
// - Merge: partial fragments, then mixin relations
// - Serialize: registry → sorted, indented JSON

// === Main entry point ===
export {
  buildRegistry,
  collectRegistry,
  collectDefinitions,
  collectInterfaces,
  collectPartials,
  collectMixinRelations,
  type BuildRegistryOptions,
  type CollectRegistryOptions,
} from "./registry/index.js";

// === Shared types ===
export { nullLogger, type Logger } from "./types.js";
export { ConsoleLogger } from "./logger.js";
export { CollectorError, CollectorErrorCode, type CollectorErrorCodeType } from "./errors.js";

// === Configuration ===
export {
  resolveCollectorConfig,
  resolveDiscoveryConfig,
  DEFAULT_STRIP_PREFIX,
  DEFAULT_EXTENSION,
  DEFAULT_EXCLUDED_DOCUMENTS,
  type CollectorConfig,
  type DiscoveryConfig,
  type ResolvedCollectorConfig,
  type ResolvedDiscoveryConfig,
} from "./config.js";

// === Node tree ===
export { NodeClass, NodeProperty, TreeNode, createNode } from "./tree/index.js";
export type { IdlNode, NodePropertyValue, TreeNodeInit } from "./tree/index.js";

// === Parsing ===
export { createWebIdlParser, typeName, rewriteImplements } from "./parsing/index.js";
export type { DocumentParser, WebIdlParserOptions, TypeDescription } from "./parsing/index.js";

// === Extraction ===
export {
  extractInterfaceRecord,
  extractMixinRelation,
  extractConst,
  extractAttribute,
  extractOperation,
  extractArgument,
  extractExtAttributes,
  extractInherit,
  extractTypeName,
  operationName,
  isInterface,
  isPartialInterface,
  isMixinRelation,
  toProvenancePath,
  trimCharacters,
  GETTER_NAME,
  SETTER_NAME,
  DELETER_NAME,
} from "./extraction/index.js";
export type {
  InterfaceRecord,
  InterfaceRegistry,
  ConstRecord,
  AttributeRecord,
  OperationRecord,
  ArgumentRecord,
  ExtAttributeRecord,
  InheritRecord,
  MixinRelation,
  MemberListKey,
} from "./extraction/index.js";

// === Merge ===
export { mergePartials, mergeMixins, appendMembers } from "./merge/index.js";
export type { PartialFragments, MemberLists } from "./merge/index.js";

// === Serialize ===
export { serializeRegistry, writeRegistry, toWireRegistry, toWireInterface, stableStringify, INDENT } from "./serialize/index.js";
export type {
  JsonValue,
  WireRegistry,
  WireInterface,
  WireConst,
  WireAttribute,
  WireOperation,
  WireExtAttribute,
} from "./serialize/index.js";

// === Sources ===
export { readPathList, parsePathList, formatPathList, writePathList, discoverDocuments } from "./sources/index.js";

// === CLI ===
export { runCollect, runList, COLLECT_USAGE, LIST_USAGE, type CliIo } from "./cli/index.js";
