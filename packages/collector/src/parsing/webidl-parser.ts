/**
 * WebIDL parser adapter
 *
 * Parses documents with `webidl2` and re-shapes the result into the
 * accessor-based node tree the extractor reads:
 *
 * - `interface`, `interface mixin`, `callback interface` → `Interface`
 * - `A includes B;` → `Implements` named `A` with `reference` = `B`
 * - legacy `A implements B;` is read as `A includes B;`
 * - other definitions → a node tagged with the capitalised definition type
 *
 * Only constants, attributes and operations are carried over as members.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse } from "webidl2";
import type { IdlNode } from "../tree/node.js";
import { NodeClass, NodeProperty } from "../tree/node.js";
import { createNode } from "../tree/tree-node.js";
import { nullLogger, type Logger } from "../types.js";

/**
 * Turns one document into a tree whose root children are the document's
 * top-level definitions, in declaration order.
 */
export interface DocumentParser {
  parse(path: string): IdlNode;
}

export interface WebIdlParserOptions {
  /** Reads a document given its absolute path. Default: UTF-8 read from disk */
  readFile?: (path: string) => string;
  logger?: Logger;
}

type Definition = ReturnType<typeof parse>[number];
type InterfaceLike = Extract<Definition, { type: "interface" | "interface mixin" | "callback interface" }>;
type Includes = Extract<Definition, { type: "includes" }>;
type Member = InterfaceLike["members"][number];
type Const = Extract<Member, { type: "const" }>;
type Attribute = Extract<Member, { type: "attribute" }>;
type Operation = Extract<Member, { type: "operation" }>;
type Argument = Operation["arguments"][number];

/** Structural view of `webidl2` type descriptions */
export interface TypeDescription {
  readonly idlType: string | readonly TypeDescription[];
  readonly generic: string;
  readonly union: boolean;
}

interface ConstValue {
  readonly type: string;
  readonly value?: unknown;
  readonly negative?: boolean;
}

type ExtAttrs = readonly { readonly name: string }[];

export function createWebIdlParser(options?: WebIdlParserOptions): DocumentParser {
  const readFile = options?.readFile ?? ((path: string) => readFileSync(path, "utf-8"));
  const logger = options?.logger ?? nullLogger;

  return {
    parse(path) {
      const filename = resolve(path);
      logger.log(`[parser] parsing ${filename}`);
      const definitions = parse(rewriteImplements(readFile(filename)), { sourceName: filename });
      return createNode({
        kind: NodeClass.Definitions,
        name: filename,
        properties: { [NodeProperty.Filename]: filename },
        children: definitions.map((definition) => definitionNode(definition, filename)),
      });
    },
  };
}

function definitionNode(definition: Definition, filename: string): IdlNode {
  switch (definition.type) {
    case "interface":
    case "interface mixin":
    case "callback interface":
      return interfaceNode(definition, filename);
    case "includes":
      return includesNode(definition, filename);
    default:
      return createNode({
        kind: classTagFor(definition.type),
        name: "name" in definition ? definition.name : "",
        properties: { [NodeProperty.Filename]: filename },
      });
  }
}

function interfaceNode(definition: InterfaceLike, filename: string): IdlNode {
  const members: readonly Member[] = definition.members;
  const inheritance = "inheritance" in definition ? definition.inheritance : null;
  return createNode({
    kind: NodeClass.Interface,
    name: definition.name,
    properties: {
      [NodeProperty.Filename]: filename,
      [NodeProperty.Partial]: "partial" in definition && definition.partial === true,
      [NodeProperty.Mixin]: definition.type === "interface mixin",
      [NodeProperty.Callback]: definition.type === "callback interface",
    },
    children: [
      ...extAttributesNode(definition.extAttrs),
      ...(typeof inheritance === "string" ? [createNode({ kind: NodeClass.Inherit, name: inheritance })] : []),
      ...members.flatMap(memberNode),
    ],
  });
}

function includesNode(definition: Includes, filename: string): IdlNode {
  return createNode({
    kind: NodeClass.Implements,
    name: definition.target,
    properties: {
      [NodeProperty.Filename]: filename,
      [NodeProperty.Reference]: definition.includes,
    },
  });
}

function memberNode(member: Member): IdlNode[] {
  switch (member.type) {
    case "const":
      return [constNode(member)];
    case "attribute":
      return [attributeNode(member)];
    case "operation":
      // Bare `stringifier;` declares no return type and is not a named member
      return member.idlType ? [operationNode(member, member.idlType)] : [];
    default:
      return [];
  }
}

function constNode(member: Const): IdlNode {
  return createNode({
    kind: NodeClass.Const,
    name: member.name,
    children: [
      ...extAttributesNode(member.extAttrs),
      typeNode(member.idlType),
      createNode({ kind: NodeClass.Value, name: constValue(member.value) }),
    ],
  });
}

function attributeNode(member: Attribute): IdlNode {
  return createNode({
    kind: NodeClass.Attribute,
    name: member.name,
    properties: {
      [NodeProperty.Readonly]: member.readonly === true,
      [NodeProperty.Static]: member.special === "static",
    },
    children: [...extAttributesNode(member.extAttrs), typeNode(member.idlType)],
  });
}

function operationNode(member: Operation, returnType: TypeDescription): IdlNode {
  const args: readonly Argument[] = member.arguments;
  return createNode({
    kind: NodeClass.Operation,
    name: member.name ?? undefined,
    properties: {
      [NodeProperty.Static]: member.special === "static",
      [NodeProperty.Getter]: member.special === "getter",
      [NodeProperty.Setter]: member.special === "setter",
      [NodeProperty.Deleter]: member.special === "deleter",
    },
    children: [
      ...extAttributesNode(member.extAttrs),
      typeNode(returnType),
      createNode({ kind: NodeClass.Arguments, children: args.map(argumentNode) }),
    ],
  });
}

function argumentNode(argument: Argument): IdlNode {
  return createNode({
    kind: NodeClass.Argument,
    name: argument.name,
    children: [...extAttributesNode(argument.extAttrs), typeNode(argument.idlType)],
  });
}

function typeNode(type: TypeDescription): IdlNode {
  return createNode({
    kind: NodeClass.Type,
    children: [createNode({ kind: NodeClass.Typeref, name: typeName(type) })],
  });
}

function extAttributesNode(extAttrs: ExtAttrs): IdlNode[] {
  if (extAttrs.length === 0) return [];
  return [
    createNode({
      kind: NodeClass.ExtAttributes,
      children: extAttrs.map((attr) => createNode({ kind: NodeClass.ExtAttribute, name: attr.name })),
    }),
  ];
}

// --- Helper functions ---

const IMPLEMENTS_STATEMENT = /^(\s*[A-Za-z_][\w-]*\s+)implements(\s+[A-Za-z_][\w-]*\s*;)/gm;

/**
 * Rewrite top-level `A implements B;` statements to `A includes B;`, which is
 * the only spelling `webidl2` accepts. Line numbers are unchanged.
 */
export function rewriteImplements(text: string): string {
  return text.replace(IMPLEMENTS_STATEMENT, "$1includes$2");
}

/**
 * Declared type as written, without nullability:
 * `unsigned long`, `sequence<DOMString>`, `(Node or DOMString)`.
 */
export function typeName(type: TypeDescription): string {
  const inner = type.idlType;
  if (typeof inner === "string") return inner;
  const names = inner.map(typeName);
  return type.union ? `(${names.join(" or ")})` : `${type.generic}<${names.join(", ")}>`;
}

function constValue(value: ConstValue): string {
  if (value.type === "Infinity") return value.negative ? "-Infinity" : "Infinity";
  return value.value === undefined ? value.type : String(value.value);
}

function classTagFor(type: string): string {
  return type
    .split(" ")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");
}
