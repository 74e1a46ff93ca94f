import { writeFileSync } from "node:fs";
import type {
  AttributeRecord,
  ConstRecord,
  ExtAttributeRecord,
  InterfaceRecord,
  InterfaceRegistry,
  OperationRecord,
} from "../extraction/types.js";

export type JsonValue = string | number | boolean | null | readonly JsonValue[] | { readonly [key: string]: JsonValue };

/* =============================================================================
 * WIRE FORMAT
 * ============================================================================= */

export type WireExtAttribute = { readonly name: string };

export type WireConst = {
  readonly name: string;
  readonly type: string;
  readonly value: string;
  readonly ext_attributes: readonly WireExtAttribute[];
};

export type WireAttribute = {
  readonly name: string;
  readonly type: string;
  readonly ext_attributes: readonly WireExtAttribute[];
  readonly readonly: boolean;
  readonly static: boolean;
};

export type WireOperation = {
  readonly name: string;
  readonly arguments: readonly { readonly name: string; readonly type: string }[];
  readonly type: string;
  readonly ext_attributes: readonly WireExtAttribute[];
  readonly static: boolean;
};

export type WireInterface = {
  readonly name: string;
  readonly file_path: string;
  readonly partial_file_paths: readonly string[];
  readonly consts: readonly WireConst[];
  readonly attributes: readonly WireAttribute[];
  readonly operations: readonly WireOperation[];
  readonly ext_attributes: readonly WireExtAttribute[];
  readonly inherit: readonly { readonly parent: string }[];
};

export type WireRegistry = { readonly [name: string]: WireInterface };

export const INDENT = "    ";

/**
 * Serialize the registry as JSON: keys sorted at every level, four-space
 * indentation. Equal registries always produce identical text.
 */
export function serializeRegistry(registry: InterfaceRegistry): string {
  return stableStringify(toWireRegistry(registry));
}

export function writeRegistry(path: string, registry: InterfaceRegistry): void {
  writeFileSync(path, serializeRegistry(registry), "utf-8");
}

export function toWireRegistry(registry: InterfaceRegistry): WireRegistry {
  const wire: Record<string, WireInterface> = {};
  for (const [name, record] of registry) {
    wire[name] = toWireInterface(record);
  }
  return wire;
}

export function toWireInterface(record: InterfaceRecord): WireInterface {
  return {
    name: record.name,
    file_path: record.filePath,
    partial_file_paths: [...record.partialFilePaths],
    consts: record.consts.map(toWireConst),
    attributes: record.attributes.map(toWireAttribute),
    operations: record.operations.map(toWireOperation),
    ext_attributes: record.extAttributes.map(toWireExtAttribute),
    inherit: record.inherit.map((inherit) => ({ parent: inherit.parent })),
  };
}

function toWireConst(record: ConstRecord): WireConst {
  return {
    name: record.name,
    type: record.type,
    value: record.value,
    ext_attributes: record.extAttributes.map(toWireExtAttribute),
  };
}

function toWireAttribute(record: AttributeRecord): WireAttribute {
  return {
    name: record.name,
    type: record.type,
    ext_attributes: record.extAttributes.map(toWireExtAttribute),
    readonly: record.readonly,
    static: record.static,
  };
}

function toWireOperation(record: OperationRecord): WireOperation {
  return {
    name: record.name,
    arguments: record.arguments.map((arg) => ({ name: arg.name, type: arg.type })),
    type: record.type,
    ext_attributes: record.extAttributes.map(toWireExtAttribute),
    static: record.static,
  };
}

function toWireExtAttribute(record: ExtAttributeRecord): WireExtAttribute {
  return { name: record.name };
}

/* =============================================================================
 * STABLE JSON
 * ============================================================================= */

/**
 * JSON with object keys sorted by UTF-16 code unit (case-sensitive) and one
 * `indent` per nesting level. Empty arrays and objects print as `[]`/`{}`.
 */
export function stableStringify(value: JsonValue, indent: string = INDENT, depth = 0): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }

  const inner = indent.repeat(depth + 1);
  const outer = indent.repeat(depth);

  if (isJsonArray(value)) {
    if (value.length === 0) return "[]";
    const items = value.map((item) => `${inner}${stableStringify(item, indent, depth + 1)}`);
    return `[\n${items.join(",\n")}\n${outer}]`;
  }

  const keys = Object.keys(value).sort(compareCodeUnits);
  if (keys.length === 0) return "{}";
  const entries = keys.map((key) => {
    const entry = value[key] ?? null;
    return `${inner}${JSON.stringify(key)}: ${stableStringify(entry, indent, depth + 1)}`;
  });
  return `{\n${entries.join(",\n")}\n${outer}}`;
}

function isJsonArray(value: JsonValue): value is readonly JsonValue[] {
  return Array.isArray(value);
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
