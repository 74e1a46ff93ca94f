/**
 * Fixture builders for IdlNode trees, shaped like the webidl2 adapter's output.
 */

import { createNode, NodeClass, NodeProperty, type IdlNode, type DocumentParser } from "../../src/index.js";

export interface MemberOptions {
  extAttrs?: readonly string[];
}

export function typeNode(name: string): IdlNode {
  return createNode({ kind: NodeClass.Type, children: [createNode({ kind: NodeClass.Typeref, name })] });
}

export function extAttrsNode(names: readonly string[] | undefined): IdlNode[] {
  if (!names || names.length === 0) return [];
  return [
    createNode({
      kind: NodeClass.ExtAttributes,
      children: names.map((name) => createNode({ kind: NodeClass.ExtAttribute, name })),
    }),
  ];
}

export function constNode(name: string, type: string, value: string, options?: MemberOptions): IdlNode {
  return createNode({
    kind: NodeClass.Const,
    name,
    children: [...extAttrsNode(options?.extAttrs), typeNode(type), createNode({ kind: NodeClass.Value, name: value })],
  });
}

export interface AttributeOptions extends MemberOptions {
  readonly?: boolean;
  static?: boolean;
}

export function attributeNode(name: string, type: string, options?: AttributeOptions): IdlNode {
  return createNode({
    kind: NodeClass.Attribute,
    name,
    properties: {
      [NodeProperty.Readonly]: options?.readonly ?? false,
      [NodeProperty.Static]: options?.static ?? false,
    },
    children: [...extAttrsNode(options?.extAttrs), typeNode(type)],
  });
}

export interface OperationOptions extends MemberOptions {
  args?: readonly (readonly [name: string, type: string])[];
  static?: boolean;
  getter?: boolean;
  setter?: boolean;
  deleter?: boolean;
  /** Leave out the Arguments child entirely (malformed) */
  omitArguments?: boolean;
}

export function operationNode(name: string, type: string, options?: OperationOptions): IdlNode {
  const args = (options?.args ?? []).map(([argName, argType]) =>
    createNode({ kind: NodeClass.Argument, name: argName, children: [typeNode(argType)] }),
  );
  return createNode({
    kind: NodeClass.Operation,
    name,
    properties: {
      [NodeProperty.Static]: options?.static ?? false,
      [NodeProperty.Getter]: options?.getter ?? false,
      [NodeProperty.Setter]: options?.setter ?? false,
      [NodeProperty.Deleter]: options?.deleter ?? false,
    },
    children: [
      ...extAttrsNode(options?.extAttrs),
      typeNode(type),
      ...(options?.omitArguments ? [] : [createNode({ kind: NodeClass.Arguments, children: args })]),
    ],
  });
}

export interface InterfaceOptions {
  filename: string;
  partial?: boolean;
  members?: readonly IdlNode[];
  extAttrs?: readonly string[];
  inherit?: string;
}

export function interfaceNode(name: string, options: InterfaceOptions): IdlNode {
  return createNode({
    kind: NodeClass.Interface,
    name,
    properties: {
      [NodeProperty.Filename]: options.filename,
      [NodeProperty.Partial]: options.partial ?? false,
    },
    children: [
      ...extAttrsNode(options.extAttrs),
      ...(options.inherit ? [createNode({ kind: NodeClass.Inherit, name: options.inherit })] : []),
      ...(options.members ?? []),
    ],
  });
}

export function implementsNode(target: string, reference?: string): IdlNode {
  return createNode({
    kind: NodeClass.Implements,
    name: target,
    properties: reference === undefined ? {} : { [NodeProperty.Reference]: reference },
  });
}

/**
 * Parser over prebuilt trees, counting how often each document is parsed.
 */
export function createFixtureParser(documents: Record<string, readonly IdlNode[]>): DocumentParser & {
  readonly parseCounts: Map<string, number>;
} {
  const parseCounts = new Map<string, number>();
  return {
    parseCounts,
    parse(path) {
      parseCounts.set(path, (parseCounts.get(path) ?? 0) + 1);
      const definitions = documents[path];
      if (!definitions) throw new Error(`no fixture document '${path}'`);
      return createNode({ kind: NodeClass.Definitions, name: path, children: definitions });
    },
  };
}

/** Collects log lines by level */
export function createRecordingLogger() {
  const lines: { level: "log" | "info" | "warn" | "error"; message: string }[] = [];
  return {
    lines,
    log: (message: string) => void lines.push({ level: "log", message }),
    info: (message: string) => void lines.push({ level: "info", message }),
    warn: (message: string) => void lines.push({ level: "warn", message }),
    error: (message: string) => void lines.push({ level: "error", message }),
  };
}
