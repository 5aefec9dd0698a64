import path from "node:path";
import fg from "fast-glob";
import type { AppConfig, EntryKind, EntryType, ScalarSeriesView, SourceStatus, StreamEnvelope } from "@steplog/contracts";
import { asRecord, configKeys, tagToString, type IngestionEngine } from "@steplog/core";

export interface TagSummaryRow {
  tag: string;
  type: EntryType;
  kind: EntryKind;
  /** Per-step entries, or scalar observations for global tags. */
  count: number;
}

export interface SourceProgressRow {
  id: string;
  kind: string;
  path: string;
  bytesLoaded: number;
  bytesTotal: number;
}

export interface SummaryData {
  tags: TagSummaryRow[];
  steps: { count: number; first: number | null; last: number | null };
  sources: SourceProgressRow[];
}

/** Renders rows as an aligned table; the first row is the header. */
export function renderTable(rows: string[][]): string[] {
  const header = rows[0];
  if (!header) return [];
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  const lines: string[] = [];
  for (const [idx, row] of rows.entries()) {
    lines.push(row.map((cell, col) => cell.padEnd(widths[col] ?? 0)).join(idx === 0 ? " | " : "   "));
    if (idx === 0) {
      lines.push(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
  return lines;
}

export function fmtPct(count: number, total: number): string {
  if (total <= 0) return "0.0%";
  return `${((count / total) * 100).toFixed(1)}%`;
}

function flattenSources(sources: SourceStatus[], out: SourceProgressRow[] = []): SourceProgressRow[] {
  for (const source of sources) {
    out.push({
      id: source.id.join("."),
      kind: source.kind,
      path: source.path,
      bytesLoaded: source.bytesLoaded,
      bytesTotal: source.bytesTotal,
    });
    flattenSources(source.children, out);
  }
  return out;
}

export function buildSummary(engine: IngestionEngine): SummaryData {
  const tags = engine.tags().map((info): TagSummaryRow => {
    const count =
      info.kind === "global"
        ? (engine.globalEntry(info.tag)?.observationCount() ?? 0)
        : engine.entriesFor(info.tag).length;
    return { tag: tagToString(info.tag), type: info.type, kind: info.kind, count };
  });
  const steps = engine.steps();
  return {
    tags,
    steps: { count: steps.length, first: steps[0] ?? null, last: steps.at(-1) ?? null },
    sources: flattenSources(engine.status().sources),
  };
}

export function renderSummary(data: SummaryData): string[] {
  const lines: string[] = ["tags:"];
  lines.push(
    ...renderTable([
      ["tag", "type", "kind", "count"],
      ...data.tags.map((row) => [row.tag, row.type, row.kind, String(row.count)]),
    ]),
  );
  const range = data.steps.first === null ? "" : ` (${data.steps.first}..${data.steps.last})`;
  lines.push("", `steps: ${data.steps.count}${range}`, "", "sources:");
  lines.push(
    ...renderTable([
      ["id", "kind", "loaded", "path"],
      ...data.sources.map((row) => [row.id, row.kind, fmtPct(row.bytesLoaded, row.bytesTotal), row.path]),
    ]),
  );
  return lines;
}

export function scalarViews(engine: IngestionEngine, tagText: string): ScalarSeriesView[] | null {
  const tag = engine.tags().find((info) => info.kind === "global" && tagToString(info.tag) === tagText)?.tag;
  const series = tag ? engine.globalEntry(tag) : null;
  if (!tag || !series) return null;
  return series.loaderIds().map((loaderId) => ({
    tag,
    loaderId,
    steps: series.steps(loaderId),
    values: series.values(loaderId),
  }));
}

export function renderScalars(views: ScalarSeriesView[]): string[] {
  const rows: string[][] = [["loader", "step", "value"]];
  for (const view of views) {
    view.steps.forEach((step, idx) => {
      rows.push([view.loaderId.join("."), String(step), String(view.values[idx] ?? "")]);
    });
  }
  return renderTable(rows);
}

export function formatNotification(envelope: StreamEnvelope): string {
  const payload = { ...envelope.payload };
  if (Array.isArray(payload.tag)) payload.tag = payload.tag.map(String).join("/");
  const fields = Object.entries(payload).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return [envelope.type, ...fields].join(" ");
}

/** Flattens a config into `section.field` / value pairs. */
export function configEntries(config: AppConfig): Array<[string, unknown]> {
  const root = asRecord(config);
  return configKeys().map((key) => {
    const [section = "", field = ""] = key.split(".");
    return [key, asRecord(root[section])[field]];
  });
}

/**
 * Resolves CLI path arguments. Arguments with glob characters are expanded;
 * others are resolved as-is so missing paths still reach the engine's warning.
 */
export async function expandPaths(inputs: string[], cwd = process.cwd()): Promise<string[]> {
  const out: string[] = [];
  const seen = new Set<string>();
  const push = (value: string): void => {
    if (seen.has(value)) return;
    seen.add(value);
    out.push(value);
  };
  for (const input of inputs) {
    if (!fg.isDynamicPattern(input)) {
      push(path.resolve(cwd, input));
      continue;
    }
    const matches = await fg(input, { cwd, absolute: true, onlyFiles: false, dot: true, suppressErrors: true });
    for (const match of matches.sort()) push(path.normalize(match));
  }
  return out;
}
