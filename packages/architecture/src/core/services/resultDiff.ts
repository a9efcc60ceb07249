import type { AnalysisResult } from "../model.js";

export interface IdDiff {
  readonly added: readonly string[];
  readonly removed: readonly string[];
  readonly changed: readonly string[];
}

export interface ResultDiff {
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly elements: IdDiff;
  readonly relationships: IdDiff;
  readonly boundaries: IdDiff;
}

/**
 * JSON with object keys sorted at every level and undefined members dropped.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => canonicalJson(item)).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

function diffById<T extends { id: string }>(before: readonly T[], after: readonly T[]): IdDiff {
  const old = new Map(before.map((item) => [item.id, item]));
  const next = new Map(after.map((item) => [item.id, item]));
  const added: string[] = [];
  const changed: string[] = [];
  for (const [id, item] of next) {
    const earlier = old.get(id);
    if (!earlier) added.push(id);
    else if (canonicalJson(earlier) !== canonicalJson(item)) changed.push(id);
  }
  const removed = [...old.keys()].filter((id) => !next.has(id));
  return { added: added.sort(), removed: removed.sort(), changed: changed.sort() };
}

/** With no previous result everything counts as added. */
export function diffResults(previous: AnalysisResult | undefined, current: AnalysisResult): ResultDiff {
  return {
    fromVersion: previous?.version ?? 0,
    toVersion: current.version,
    elements: diffById(previous?.elements ?? [], current.elements),
    relationships: diffById(previous?.relationships ?? [], current.relationships),
    boundaries: diffById(previous?.boundaries ?? [], current.boundaries),
  };
}
