import type { Element } from "@archlens/extract";
import type { LayerRule } from "../defaults.js";
import {
  LAYER_LEVEL,
  LAYER_NAMES,
  type Layer,
  type LayerName,
  type LayerReport,
  type LayerViolation,
  isExternal,
} from "../model.js";
import type { DependencyGraph } from "./DependencyGraph.js";

interface CompiledLayerRule {
  regex: RegExp;
  layer: LayerName;
}

/**
 * Places elements into presentation / application / domain / infrastructure
 * and reports dependencies that point upwards.
 */
export class LayerDetector {
  private readonly rules: CompiledLayerRule[];

  constructor(rules: readonly LayerRule[]) {
    this.rules = rules.map((rule) => ({
      regex: new RegExp(rule.pattern, rule.flags?.replace(/[gy]/g, "")),
      layer: rule.layer,
    }));
  }

  /** Own match on name, then path; otherwise the nearest matched ancestor. */
  assign(elements: readonly Element[]): Map<string, LayerName> {
    const byId = new Map(elements.map((e) => [e.id, e]));
    const direct = new Map<string, LayerName | undefined>();
    const matchOwn = (element: Element): LayerName | undefined => {
      if (!direct.has(element.id)) {
        direct.set(
          element.id,
          this.match(element.name) ?? (element.filePath ? this.match(element.filePath) : undefined)
        );
      }
      return direct.get(element.id);
    };

    const assigned = new Map<string, LayerName>();
    for (const element of elements) {
      if (isExternal(element) || element.kind === "import") continue;
      let current: Element | undefined = element;
      const visited = new Set<string>();
      while (current && !visited.has(current.id)) {
        visited.add(current.id);
        const layer = matchOwn(current);
        if (layer) {
          assigned.set(element.id, layer);
          break;
        }
        current = current.parentId === undefined ? undefined : byId.get(current.parentId);
      }
    }
    return assigned;
  }

  detect(elements: readonly Element[], graph: DependencyGraph): LayerReport {
    const assigned = this.assign(elements);

    const members = new Map<LayerName, string[]>();
    const dependsOn = new Map<LayerName, Set<LayerName>>();
    const violations = new Map<string, LayerViolation>();

    for (const [id, layer] of [...assigned].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      const list = members.get(layer) ?? [];
      list.push(id);
      members.set(layer, list);

      for (const targetId of graph.dependenciesOf(id)) {
        const targetLayer = assigned.get(targetId);
        if (!targetLayer || targetLayer === layer) continue;
        const deps = dependsOn.get(layer) ?? new Set<LayerName>();
        deps.add(targetLayer);
        dependsOn.set(layer, deps);
        if (LAYER_LEVEL[layer] < LAYER_LEVEL[targetLayer]) {
          violations.set(`${id}\u0000${targetId}`, { sourceId: id, targetId, fromLayer: layer, toLayer: targetLayer });
        }
      }
    }

    const layers: Layer[] = LAYER_NAMES.flatMap((name) => {
      const memberIds = members.get(name);
      if (!memberIds) return [];
      const deps = dependsOn.get(name) ?? new Set<LayerName>();
      return [
        {
          name,
          level: LAYER_LEVEL[name],
          memberIds,
          dependsOn: LAYER_NAMES.filter((other) => deps.has(other)),
        },
      ];
    });

    return {
      layers,
      // Insertion order is already (sourceId, targetId)
      violations: [...violations.values()],
    };
  }

  private match(value: string): LayerName | undefined {
    return this.rules.find((rule) => rule.regex.test(value))?.layer;
  }
}
