import type { IdlNode, NodePropertyValue } from "./node.js";

export interface TreeNodeInit {
  readonly kind: string;
  readonly name?: string;
  readonly properties?: Readonly<Record<string, NodePropertyValue>>;
  readonly children?: readonly IdlNode[];
}

/**
 * In-memory node. The WebIDL adapter builds these, and tests build them
 * directly as fixtures.
 */
export class TreeNode implements IdlNode {
  readonly #kind: string;
  readonly #name: string;
  readonly #properties: ReadonlyMap<string, NodePropertyValue>;
  readonly #children: readonly IdlNode[];

  constructor(init: TreeNodeInit) {
    this.#kind = init.kind;
    this.#name = init.name ?? "";
    this.#properties = new Map(Object.entries(init.properties ?? {}));
    this.#children = [...(init.children ?? [])];
  }

  getClass(): string {
    return this.#kind;
  }

  getName(): string {
    return this.#name;
  }

  getProperty(key: string, fallback?: NodePropertyValue): NodePropertyValue | undefined {
    return this.#properties.has(key) ? this.#properties.get(key) : fallback;
  }

  getOneOf(kind: string): IdlNode | undefined {
    return this.#children.find((child) => child.getClass() === kind);
  }

  getListOf(kind: string): readonly IdlNode[] {
    return this.#children.filter((child) => child.getClass() === kind);
  }

  getChildren(): readonly IdlNode[] {
    return this.#children;
  }
}

export function createNode(init: TreeNodeInit): TreeNode {
  return new TreeNode(init);
}
