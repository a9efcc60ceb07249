import { describe, it, expect } from "vitest";
import { LayerDetector } from "../src/core/services/LayerDetector.js";
import { DEFAULT_LAYER_RULES } from "../src/core/defaults.js";
import { buildGraph, edge, node } from "./fixtures.js";

const detector = new LayerDetector(DEFAULT_LAYER_RULES);

const controller = node("OrderController");
const service = node("OrderService");
const entity = node("OrderEntity");
const repository = node("OrderRepository", { kind: "class" });
const save = node("save", { kind: "method", parentId: "OrderRepository" });
const misc = node("misc");
const stub = node("external:OrderView", { metadata: { external: true } });

const elements = [controller, service, entity, repository, save, misc, stub];
const relationships = [
  edge("OrderController", "OrderService"),
  edge("OrderService", "OrderEntity"),
  edge("OrderService", "OrderRepository"),
  edge("OrderEntity", "OrderRepository"),
  edge("OrderRepository", "OrderController"),
  edge("save", "OrderService"),
  edge("OrderController", "external:OrderView"),
];

describe("LayerDetector", () => {
  it("assigns by name and inherits the layer of the nearest matched parent", () => {
    expect(Object.fromEntries(detector.assign(elements))).toEqual({
      OrderController: "presentation",
      OrderService: "application",
      OrderEntity: "domain",
      OrderRepository: "infrastructure",
      save: "infrastructure",
    });
  });

  it("falls back to the file path", () => {
    const handler = node("run", { filePath: "src/controllers/run.ts" });
    expect(detector.assign([handler]).get("run")).toBe("presentation");
  });

  it("lists layers from the top with their dependencies", () => {
    const { layers } = detector.detect(elements, buildGraph(elements, relationships));

    expect(layers).toEqual([
      { name: "presentation", level: 3, memberIds: ["OrderController"], dependsOn: ["application"] },
      { name: "application", level: 2, memberIds: ["OrderService"], dependsOn: ["domain", "infrastructure"] },
      { name: "domain", level: 1, memberIds: ["OrderEntity"], dependsOn: ["infrastructure"] },
      {
        name: "infrastructure",
        level: 0,
        memberIds: ["OrderRepository", "save"],
        dependsOn: ["presentation", "application"],
      },
    ]);
  });

  it("reports dependencies that point upwards", () => {
    const { violations } = detector.detect(elements, buildGraph(elements, relationships));

    expect(violations).toEqual([
      { sourceId: "OrderRepository", targetId: "OrderController", fromLayer: "infrastructure", toLayer: "presentation" },
      { sourceId: "save", targetId: "OrderService", fromLayer: "infrastructure", toLayer: "application" },
    ]);
  });

  it("omits empty layers", () => {
    const report = detector.detect([service], buildGraph([service], []));
    expect(report.layers.map((l) => l.name)).toEqual(["application"]);
    expect(report.violations).toEqual([]);
  });
});
