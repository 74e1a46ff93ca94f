/**
 * Accessor contract for a parsed interface-definition tree.
 *
 * The extractor only reads nodes through this interface, so any parser can
 * feed it by producing a tree that answers these calls.
 */
export interface IdlNode {
  /** Class tag, e.g. "Interface", "Operation" */
  getClass(): string;
  getName(): string;
  /** Property value, or `fallback` when the node does not carry `key` */
  getProperty(key: string, fallback?: NodePropertyValue): NodePropertyValue | undefined;
  /** First child with the given class tag */
  getOneOf(kind: string): IdlNode | undefined;
  /** All children with the given class tag, in order */
  getListOf(kind: string): readonly IdlNode[];
  getChildren(): readonly IdlNode[];
}

export type NodePropertyValue = string | boolean;

/** Class tags produced by the parser adapter and read by the extractor */
export const NodeClass = {
  Definitions: "Definitions",
  Interface: "Interface",
  Implements: "Implements",
  Const: "Const",
  Attribute: "Attribute",
  Operation: "Operation",
  Arguments: "Arguments",
  Argument: "Argument",
  Type: "Type",
  Typeref: "Typeref",
  Value: "Value",
  ExtAttributes: "ExtAttributes",
  ExtAttribute: "ExtAttribute",
  Inherit: "Inherit",
} as const;

/** Property keys */
export const NodeProperty = {
  Filename: "filename",
  Partial: "partial",
  Mixin: "mixin",
  Callback: "callback",
  Readonly: "readonly",
  Static: "static",
  Getter: "getter",
  Setter: "setter",
  Deleter: "deleter",
  Reference: "reference",
} as const;
