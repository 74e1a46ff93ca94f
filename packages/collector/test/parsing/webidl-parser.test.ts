/**
 * WebIDL adapter tests
 *
 * Documents are served from memory through the injected readFile.
 */

import { describe, it, expect } from "vitest";
import {
  createWebIdlParser,
  extractInterfaceRecord,
  extractMixinRelation,
  rewriteImplements,
  NodeClass,
  NodeProperty,
  type IdlNode,
} from "../../src/index.js";

function parseDocument(text: string, path = "/work/idl/Doc.idl"): IdlNode {
  const parser = createWebIdlParser({
    readFile: (file) => {
      if (file !== path) throw new Error(`unexpected read of ${file}`);
      return text;
    },
  });
  return parser.parse(path);
}

function firstDefinition(text: string): IdlNode {
  const definition = parseDocument(text).getChildren()[0];
  if (!definition) throw new Error("document has no definitions");
  return definition;
}

const config = { cwd: "/work", stripPrefix: "" };

describe("createWebIdlParser", () => {
  it("returns the top-level definitions in order", () => {
    const root = parseDocument(`
      interface A {};
      dictionary AInit { long x; };
      partial interface A {};
      A includes M;
      interface mixin M {};
      enum Mode { "on", "off" };
    `);

    expect(root.getClass()).toBe(NodeClass.Definitions);
    expect(root.getChildren().map((node) => `${node.getClass()}:${node.getName()}`)).toEqual([
      "Interface:A",
      "Dictionary:AInit",
      "Interface:A",
      "Implements:A",
      "Interface:M",
      "Enum:Mode",
    ]);
  });

  it("marks partial, mixin and callback interfaces", () => {
    const root = parseDocument(`
      partial interface A {};
      interface mixin M {};
      callback interface Listener { undefined handleEvent(long detail); };
    `);
    const [partial, mixin, callback] = root.getChildren();

    expect(partial?.getProperty(NodeProperty.Partial)).toBe(true);
    expect(mixin?.getProperty(NodeProperty.Mixin)).toBe(true);
    expect(mixin?.getProperty(NodeProperty.Partial)).toBe(false);
    expect(callback?.getProperty(NodeProperty.Callback)).toBe(true);
  });

  it("records the absolute document path on each definition", () => {
    const node = firstDefinition("interface A {};");
    expect(node.getProperty(NodeProperty.Filename)).toBe("/work/idl/Doc.idl");
  });

  it("maps includes statements to relations", () => {
    const node = firstDefinition("Element includes ParentNode;");

    expect(node.getClass()).toBe(NodeClass.Implements);
    expect(node.getName()).toBe("Element");
    expect(node.getProperty(NodeProperty.Reference)).toBe("ParentNode");
  });

  it("produces nodes the extractor reads into a full record", () => {
    const node = firstDefinition(`
      [Exposed=Window]
      interface Node : EventTarget {
        const unsigned short ELEMENT_NODE = 1;
        [Pure] readonly attribute unsigned short nodeType;
        static attribute long counter;
        Node insertBefore(Node node, Node? child);
        static Node create();
      };
    `);

    expect(extractInterfaceRecord(node, config)).toEqual({
      name: "Node",
      filePath: "idl/Doc.idl",
      partialFilePaths: [],
      consts: [{ name: "ELEMENT_NODE", type: "unsigned short", value: "1", extAttributes: [] }],
      attributes: [
        { name: "nodeType", type: "unsigned short", extAttributes: [{ name: "Pure" }], readonly: true, static: false },
        { name: "counter", type: "long", extAttributes: [], readonly: false, static: true },
      ],
      operations: [
        {
          name: "insertBefore",
          arguments: [
            { name: "node", type: "Node" },
            { name: "child", type: "Node" },
          ],
          type: "Node",
          extAttributes: [],
          static: false,
        },
        { name: "create", arguments: [], type: "Node", extAttributes: [], static: true },
      ],
      extAttributes: [{ name: "Exposed" }],
      inherit: [{ parent: "EventTarget" }],
    });
  });

  it("names special operations with sentinels", () => {
    const node = firstDefinition(`
      interface Storage {
        getter DOMString? getItem(DOMString key);
        setter undefined setItem(DOMString key, DOMString value);
        deleter undefined removeItem(DOMString key);
      };
    `);

    expect(extractInterfaceRecord(node, config).operations.map((op) => op.name)).toEqual([
      "__getter__",
      "__setter__",
      "__deleter__",
    ]);
  });

  it("spells generic and union types", () => {
    const node = firstDefinition(`
      interface T {
        undefined take(sequence<DOMString> names, (Node or DOMString) item, record<DOMString, long> counts);
      };
    `);

    expect(extractInterfaceRecord(node, config).operations[0]?.arguments).toEqual([
      { name: "names", type: "sequence<DOMString>" },
      { name: "item", type: "(Node or DOMString)" },
      { name: "counts", type: "record<DOMString, long>" },
    ]);
  });

  it("writes constant values as text", () => {
    const node = firstDefinition(`
      interface C {
        const boolean ENABLED = true;
        const double LOW = -Infinity;
        const double HIGH = Infinity;
        const double NOTHING = NaN;
        const long HEX = 0x10;
      };
    `);

    expect(extractInterfaceRecord(node, config).consts.map((c) => `${c.name}=${c.value}`)).toEqual([
      "ENABLED=true",
      "LOW=-Infinity",
      "HIGH=Infinity",
      "NOTHING=NaN",
      "HEX=0x10",
    ]);
  });

  it("leaves out members that are not constants, attributes or operations", () => {
    const node = firstDefinition(`
      interface Iter {
        constructor(long size);
        iterable<long>;
        attribute long size;
      };
    `);

    expect(node.getChildren().map((child) => child.getClass())).toEqual([NodeClass.Attribute]);
  });

  it("propagates parse errors naming the document", () => {
    expect(() => parseDocument("interface Broken {")).toThrow("/work/idl/Doc.idl");
  });

  it("reads legacy implements statements as mixin relations", () => {
    const root = parseDocument(`
      interface Foo {};
      Foo implements Mixin;
      Foo includes Other;
    `);
    const [, legacy, current] = root.getChildren();

    expect(legacy?.getClass()).toBe(NodeClass.Implements);
    expect(legacy && extractMixinRelation(legacy)).toEqual({ target: "Foo", reference: "Mixin" });
    expect(current && extractMixinRelation(current)).toEqual({ target: "Foo", reference: "Other" });
  });
});

describe("rewriteImplements", () => {
  it("rewrites top-level statements and keeps line breaks", () => {
    expect(rewriteImplements("Foo implements Bar;\n  Baz   implements Qux ;")).toBe(
      "Foo includes Bar;\n  Baz   includes Qux ;",
    );
  });

  it("leaves comments and identifiers containing the word alone", () => {
    const text = "// Foo implements Bar;\ninterface implementsThing {};";
    expect(rewriteImplements(text)).toBe(text);
  });
});
