import type { IdlNode } from "../tree/node.js";
import { NodeClass, NodeProperty } from "../tree/node.js";
import { CollectorError, CollectorErrorCode } from "../errors.js";
import type {
  ArgumentRecord,
  AttributeRecord,
  ConstRecord,
  ExtAttributeRecord,
  InheritRecord,
  OperationRecord,
} from "./types.js";

export const GETTER_NAME = "__getter__";
export const SETTER_NAME = "__setter__";
export const DELETER_NAME = "__deleter__";

export function extractConst(node: IdlNode): ConstRecord {
  return {
    name: node.getName(),
    type: extractTypeName(node),
    value: requireChild(node, NodeClass.Value).getName(),
    extAttributes: extractExtAttributes(node),
  };
}

export function extractAttribute(node: IdlNode): AttributeRecord {
  return {
    name: node.getName(),
    type: extractTypeName(node),
    extAttributes: extractExtAttributes(node),
    readonly: hasFlag(node, NodeProperty.Readonly),
    static: hasFlag(node, NodeProperty.Static),
  };
}

export function extractOperation(node: IdlNode): OperationRecord {
  return {
    name: operationName(node),
    arguments: requireChild(node, NodeClass.Arguments).getListOf(NodeClass.Argument).map(extractArgument),
    type: extractTypeName(node),
    extAttributes: extractExtAttributes(node),
    static: hasFlag(node, NodeProperty.Static),
  };
}

export function extractArgument(node: IdlNode): ArgumentRecord {
  return {
    name: node.getName(),
    type: extractTypeName(node),
  };
}

/**
 * Special operations are keyed by a sentinel instead of their declared name.
 * Flags are checked getter, setter, deleter; the first one set wins.
 */
export function operationName(node: IdlNode): string {
  if (hasFlag(node, NodeProperty.Getter)) return GETTER_NAME;
  if (hasFlag(node, NodeProperty.Setter)) return SETTER_NAME;
  if (hasFlag(node, NodeProperty.Deleter)) return DELETER_NAME;
  return node.getName();
}

/** Declared (unresolved) type name: the first child of the `Type` child */
export function extractTypeName(node: IdlNode): string {
  const type = requireChild(node, NodeClass.Type);
  const first = type.getChildren()[0];
  if (!first) {
    throw missingChild(type, "type name");
  }
  return first.getName();
}

export function extractExtAttributes(node: IdlNode): ExtAttributeRecord[] {
  const block = node.getOneOf(NodeClass.ExtAttributes);
  if (!block) return [];
  return block.getListOf(NodeClass.ExtAttribute).map((attr) => ({ name: attr.getName() }));
}

export function extractInherit(node: IdlNode): InheritRecord[] {
  return node.getListOf(NodeClass.Inherit).map((inherit) => ({ parent: inherit.getName() }));
}

// --- Helper functions ---

export function hasFlag(node: IdlNode, key: string): boolean {
  return node.getProperty(key, false) === true;
}

export function requireChild(node: IdlNode, kind: string): IdlNode {
  const child = node.getOneOf(kind);
  if (!child) {
    throw missingChild(node, kind);
  }
  return child;
}

function missingChild(node: IdlNode, what: string): CollectorError {
  const label = `${node.getClass()} '${node.getName()}'`;
  return new CollectorError(`${label} has no ${what} child`, CollectorErrorCode.MISSING_CHILD, label);
}
