import { describe, it, expect } from "vitest";
import { mergePartials, type InterfaceRecord } from "../../src/index.js";
import { attributeRecord, constRecord, interfaceRecord, names, operationRecord } from "../_helpers/records.js";
import { createRecordingLogger } from "../_helpers/nodes.js";

describe("mergePartials", () => {
  const base = interfaceRecord("Document", {
    filePath: "dom/Document.idl",
    consts: [constRecord("C0")],
    attributes: [attributeRecord("url")],
    operations: [operationRecord("open")],
    extAttributes: [{ name: "Exposed" }],
    inherit: [{ parent: "Node" }],
  });
  const first = interfaceRecord("Document", {
    filePath: "html/DocumentHTML.idl",
    attributes: [attributeRecord("title")],
    operations: [operationRecord("write"), operationRecord("writeln")],
    extAttributes: [{ name: "ImplementedAs" }],
    inherit: [{ parent: "Ignored" }],
  });
  const second = interfaceRecord("Document", {
    filePath: "fullscreen/DocumentFullscreen.idl",
    consts: [constRecord("C1")],
    operations: [operationRecord("exitFullscreen")],
  });

  it("appends every fragment's members after the base, in fragment order", () => {
    const merged = mergePartials(new Map([["Document", base]]), new Map([["Document", [first, second]]]));
    const document = merged.get("Document");

    expect(names(document?.consts ?? [])).toEqual(["C0", "C1"]);
    expect(names(document?.attributes ?? [])).toEqual(["url", "title"]);
    expect(names(document?.operations ?? [])).toEqual(["open", "write", "writeln", "exitFullscreen"]);
  });

  it("records fragment provenance in merge order", () => {
    const merged = mergePartials(new Map([["Document", base]]), new Map([["Document", [first, second]]]));

    expect(merged.get("Document")?.partialFilePaths).toEqual([
      "html/DocumentHTML.idl",
      "fullscreen/DocumentFullscreen.idl",
    ]);
  });

  it("keeps identity, extended attributes and inheritance of the base", () => {
    const merged = mergePartials(new Map([["Document", base]]), new Map([["Document", [first]]]));
    const document = merged.get("Document");

    expect(document?.name).toBe("Document");
    expect(document?.filePath).toBe("dom/Document.idl");
    expect(document?.extAttributes).toEqual([{ name: "Exposed" }]);
    expect(document?.inherit).toEqual([{ parent: "Node" }]);
  });

  it("drops fragments without a base and does not raise", () => {
    const logger = createRecordingLogger();
    const orphan = interfaceRecord("Missing", { attributes: [attributeRecord("x")] });

    const merged = mergePartials(new Map([["Document", base]]), new Map([["Missing", [orphan]]]), logger);

    expect([...merged.keys()]).toEqual(["Document"]);
    expect(merged.get("Document")).toEqual(base);
    expect(logger.lines).toEqual([
      { level: "log", message: "[partials] dropped 1 fragment(s) of 'Missing': no base interface" },
    ]);
  });

  it("leaves the input registry and records untouched", () => {
    const registry = new Map<string, InterfaceRecord>([["Document", base]]);

    const merged = mergePartials(registry, new Map([["Document", [first]]]));

    expect(merged).not.toBe(registry);
    expect(registry.get("Document")).toBe(base);
    expect(names(base.attributes)).toEqual(["url"]);
    expect(base.partialFilePaths).toEqual([]);
  });

  it("passes interfaces without fragments through unchanged", () => {
    const other = interfaceRecord("Window");
    const merged = mergePartials(new Map([["Document", base], ["Window", other]]), new Map());
    expect(merged.get("Window")).toBe(other);
  });
});
