import type { IdlNode } from "../tree/node.js";
import { NodeClass, NodeProperty } from "../tree/node.js";
import { resolveCollectorConfig, type CollectorConfig } from "../config.js";
import { CollectorError, CollectorErrorCode } from "../errors.js";
import type { InterfaceRecord, MixinRelation } from "./types.js";
import {
  extractAttribute,
  extractConst,
  extractExtAttributes,
  extractInherit,
  extractOperation,
  hasFlag,
} from "./members.js";
import { toProvenancePath } from "./file-path.js";

/**
 * Convert one `Interface` node into its canonical record.
 *
 * The record carries only the node's own members; partial fragments and
 * mixins are merged later. Extraction is pure, so the same node always
 * yields an equal record.
 */
export function extractInterfaceRecord(node: IdlNode, config?: CollectorConfig): InterfaceRecord {
  const { stripPrefix, cwd } = resolveCollectorConfig(config);
  return {
    name: node.getName(),
    filePath: toProvenancePath(documentFilename(node), cwd, stripPrefix),
    partialFilePaths: [],
    consts: node.getListOf(NodeClass.Const).map(extractConst),
    attributes: node.getListOf(NodeClass.Attribute).map(extractAttribute),
    operations: node.getListOf(NodeClass.Operation).map(extractOperation),
    extAttributes: extractExtAttributes(node),
    inherit: extractInherit(node),
  };
}

/** Read an `Implements` node as a relation between two interface names */
export function extractMixinRelation(node: IdlNode): MixinRelation {
  const reference = node.getProperty(NodeProperty.Reference);
  return {
    target: node.getName(),
    reference: typeof reference === "string" && reference.length > 0 ? reference : undefined,
  };
}

export function isInterface(node: IdlNode): boolean {
  return node.getClass() === NodeClass.Interface && !hasFlag(node, NodeProperty.Partial);
}

export function isPartialInterface(node: IdlNode): boolean {
  return node.getClass() === NodeClass.Interface && hasFlag(node, NodeProperty.Partial);
}

export function isMixinRelation(node: IdlNode): boolean {
  return node.getClass() === NodeClass.Implements;
}

function documentFilename(node: IdlNode): string {
  const filename = node.getProperty(NodeProperty.Filename);
  if (typeof filename !== "string") {
    throw new CollectorError(
      `Interface '${node.getName()}' does not record the document it was defined in`,
      CollectorErrorCode.MISSING_CHILD,
      `${node.getClass()} '${node.getName()}'`,
    );
  }
  return filename;
}
