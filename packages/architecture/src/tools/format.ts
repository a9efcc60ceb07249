/**
 * Plain-text renderings of analysis results for tool responses.
 */

import type { AnalysisResult, ServiceBoundary } from "../core/model.js";
import type { MetricsReport, SizeMetrics } from "../core/services/MetricsReport.js";
import type { IdDiff, ResultDiff } from "../core/services/resultDiff.js";

function pct(value: number): string {
  return `${(value * 100).toFixed(0)}%`;
}

function fixed(value: number): string {
  return value.toFixed(2);
}

export function formatAnalysisSummary(result: AnalysisResult): string {
  const languages = Object.entries(result.languageCounts)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([language, count]) => `${language} (${count.files} files, ${count.elements} elements)`);
  const warnings = result.diagnostics.filter((d) => d.severity !== "info").length;

  const lines = [
    `## Analysis v${result.version} (${result.mode})`,
    "",
    `**Root:** ${result.rootPath}`,
    `**Elements:** ${result.elements.length}`,
    `**Relationships:** ${result.relationships.length}`,
    `**Boundaries:** ${result.boundaries.length} (${result.unassigned.length} unassigned)`,
    `**Cycles:** ${result.metrics.summary.cycleCount}`,
    `**Anti-patterns:** ${result.antiPatterns.length}`,
  ];
  if (languages.length > 0) lines.push(`**Languages:** ${languages.join(", ")}`);
  if (warnings > 0) lines.push(`**Diagnostics:** ${warnings} warning(s) or error(s)`);
  return lines.join("\n");
}

export function formatMetrics(metrics: MetricsReport): string {
  const s = metrics.summary;
  const lines = [
    "## Metrics",
    "",
    `Nodes ${s.nodeCount}, edges ${s.edgeCount} (${s.dependencyEdgeCount} dependency), density ${fixed(s.density)}`,
    `Average afferent ${fixed(s.averageAfferent)}, efferent ${fixed(s.averageEfferent)}, instability ${fixed(s.averageInstability)}`,
    `Cycles ${s.cycleCount}, max depth ${s.maxDepth}`,
    formatSize(metrics.size),
    "",
    "### Thresholds",
    ...metrics.thresholds.map(
      (t) => `- ${t.severity === "warning" ? "WARN" : "ok"} ${t.name}: ${fixed(t.value)} (${t.direction} ${fixed(t.limit)})`
    ),
  ];

  if (metrics.topImpact.length > 0) {
    lines.push("", "### Highest impact", ...metrics.topImpact.map((n) => `- ${n.id}: ${pct(n.value)}`));
  }
  return lines.join("\n");
}

export function formatSize(size: SizeMetrics): string {
  const kinds = Object.entries(size.elementsByKind)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([kind, count]) => `${kind} ${count}`);
  return (
    `Files ${size.files}, ${size.linesOfCode} lines (${size.averageFileLines.toFixed(1)} per file), ` +
    `documented ${pct(size.documentation)}` +
    (kinds.length > 0 ? `; ${kinds.join(", ")}` : "")
  );
}

export function formatBoundary(boundary: ServiceBoundary): string {
  return (
    `- **${boundary.name}** [${boundary.type}] ${boundary.memberIds.length} members, ` +
    `cohesion ${fixed(boundary.cohesion)}, coupling ${fixed(boundary.coupling)}, complexity ${boundary.complexity}`
  );
}

export function formatBoundaries(boundaries: readonly ServiceBoundary[]): string {
  if (boundaries.length === 0) return "No boundaries found.";
  return [`## Boundaries (${boundaries.length})`, "", ...boundaries.map(formatBoundary)].join("\n");
}

/** Returns undefined when the id is not in the result. */
export function formatElement(result: AnalysisResult, elementId: string): string | undefined {
  const element = result.elements.find((e) => e.id === elementId);
  if (!element) return undefined;
  const metrics = result.graph.metrics(elementId);
  const outgoing = result.relationships.filter((r) => r.sourceId === elementId);
  const incoming = result.relationships.filter((r) => r.targetId === elementId);
  const boundary = result.boundaries.find((b) => b.memberIds.includes(elementId));

  const lines = [
    `## ${element.qualifiedName}`,
    "",
    `**Kind:** ${element.kind}`,
    element.filePath ? `**File:** ${element.filePath}:${element.startLine}` : "**External**",
  ];
  if (boundary) lines.push(`**Boundary:** ${boundary.name} [${boundary.type}]`);
  if (metrics) {
    lines.push(
      `**Metrics:** Ca ${metrics.afferent}, Ce ${metrics.efferent}, I ${fixed(metrics.instability)}, impact ${pct(metrics.impact)}`
    );
  }

  if (outgoing.length > 0) {
    lines.push("", "### Outgoing", ...outgoing.map((r) => `- ${r.kind} → ${r.targetId} (${fixed(r.strength)})`));
  }
  if (incoming.length > 0) {
    lines.push("", "### Incoming", ...incoming.map((r) => `- ${r.kind} ← ${r.sourceId} (${fixed(r.strength)})`));
  }
  return lines.join("\n");
}

function formatIdDiff(title: string, diff: IdDiff): string {
  return `${title}: +${diff.added.length} -${diff.removed.length} ~${diff.changed.length}`;
}

export function formatDiff(diff: ResultDiff): string {
  return [
    `## Changes v${diff.fromVersion} → v${diff.toVersion}`,
    "",
    formatIdDiff("Elements", diff.elements),
    formatIdDiff("Relationships", diff.relationships),
    formatIdDiff("Boundaries", diff.boundaries),
  ].join("\n");
}
