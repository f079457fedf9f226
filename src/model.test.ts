import { describe, expect, it } from "vitest";
import type { BlockType } from "./block.js";
import { defaultCatalog } from "./blocks/catalog.js";
import { dependencyOrder, formatPortRef, NetworkModel, parsePortRef, type ElementaryInstance } from "./model.js";

function abs(name: string, index: number): ElementaryInstance {
  const blockType: BlockType | undefined = defaultCatalog.lookup("Reals.Abs");
  if (!blockType) throw new Error("Reals.Abs missing from the catalogue");
  return { kind: "elementary", name, typeName: "Reals.Abs", parameters: {}, index, blockType, inputs: blockType.inputs, outputs: blockType.outputs };
}

describe("port references", () => {
  it("splits on the first dot", () => {
    expect(parsePortRef("gain.y")).toEqual({ instance: "gain", port: "y" });
    expect(parsePortRef("u")).toEqual({ port: "u" });
    expect(formatPortRef({ instance: "gain", port: "y" })).toBe("gain.y");
    expect(formatPortRef({ port: "u" })).toBe("u");
  });
});

describe("NetworkModel", () => {
  it("caches the evaluation order until the connections change", () => {
    const model = new NetworkModel({ name: "N", instances: [abs("a", 0), abs("b", 1)] });
    const first = model.evaluationOrder();
    expect(first.map((i) => i.name)).toEqual(["a", "b"]);
    expect(model.evaluationOrder()).toBe(first);

    model.addConnection({ source: { instance: "b", port: "y" }, destinations: [{ instance: "a", port: "u" }] });
    expect(model.evaluationOrder().map((i) => i.name)).toEqual(["b", "a"]);

    model.setConnections([]);
    expect(model.evaluationOrder().map((i) => i.name)).toEqual(["a", "b"]);
  });

  it("lists every network once, leaves first", () => {
    const leaf = new NetworkModel({ name: "Leaf" });
    const use = (name: string, index: number) => ({
      kind: "composite" as const,
      name,
      typeName: "Leaf",
      parameters: {},
      index,
      network: leaf,
      inputs: [],
      outputs: [],
    });
    const mid = new NetworkModel({ name: "Mid", instances: [use("l", 0)] });
    const root = new NetworkModel({
      name: "Root",
      instances: [{ ...use("m", 0), typeName: "Mid", network: mid }, use("l", 1)],
    });
    expect(root.dependencies().map((n) => n.name)).toEqual(["Mid", "Leaf"]);
    expect(dependencyOrder(root).map((n) => n.name)).toEqual(["Leaf", "Mid", "Root"]);
  });
});
