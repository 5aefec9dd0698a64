import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, encodeEvent, encodeRecord, loadSnapshot, mergeConfig } from "@steplog/core";
import {
  buildSummary,
  configEntries,
  expandPaths,
  fmtPct,
  formatNotification,
  renderScalars,
  renderSummary,
  renderTable,
  scalarViews,
} from "./report.js";

function scalarFrame(tag: string, step: number, value: number): Buffer {
  return encodeRecord(encodeEvent({ step, values: [{ tag, simpleValue: value }] }));
}

function imageFrame(tag: string, step: number): Buffer {
  return encodeRecord(
    encodeEvent({ step, values: [{ tag, image: { height: 1, width: 1, encoded: Buffer.from("img") } }] }),
  );
}

async function buildFixture(): Promise<{ root: string; file: string }> {
  const root = await mkdtemp(path.join(os.tmpdir(), "steplog-cli-"));
  const file = path.join(root, "run.tfevents");
  await writeFile(
    file,
    Buffer.concat([scalarFrame("loss", 0, 0.5), scalarFrame("loss", 2, 0.25), imageFrame("input/1/image", 2)]),
  );
  return { root, file };
}

const TEST_CONFIG = mergeConfig({ poll: { intervalMs: 20 } });

describe("cli report helpers", () => {
  it("renders aligned tables", () => {
    expect(
      renderTable([
        ["tag", "type"],
        ["loss", "scalar"],
      ]),
    ).toEqual(["tag  | type  ", "-----+-------", "loss   scalar"]);
    expect(renderTable([])).toEqual([]);
  });

  it("formats percentages", () => {
    expect(fmtPct(1, 4)).toBe("25.0%");
    expect(fmtPct(0, 0)).toBe("0.0%");
  });

  it("summarises tags, steps and sources of a loaded engine", async () => {
    const { file } = await buildFixture();
    const engine = await loadSnapshot([file], { config: TEST_CONFIG });
    try {
      const data = buildSummary(engine);
      expect(data.tags).toEqual([
        { tag: "loss", type: "scalar", kind: "global", count: 2 },
        { tag: "input/1", type: "image", kind: "per_step", count: 1 },
      ]);
      expect(data.steps).toEqual({ count: 2, first: 0, last: 2 });
      expect(data.sources).toHaveLength(1);
      expect(data.sources[0]?.id).toBe("0");
      expect(data.sources[0]?.bytesLoaded).toBe(data.sources[0]?.bytesTotal);

      const lines = renderSummary(data);
      expect(lines).toContain("steps: 2 (0..2)");
      expect(lines[0]).toBe("tags:");
      expect(lines[3]).toBe("loss      scalar   global     2    ");
    } finally {
      await engine.stop();
    }
  });

  it("lists scalar rows per loader id", async () => {
    const { file } = await buildFixture();
    const engine = await loadSnapshot([file], { config: TEST_CONFIG });
    try {
      const views = scalarViews(engine, "loss");
      expect(views).toEqual([{ tag: ["loss"], loaderId: [0], steps: [0, 2], values: [0.5, 0.25] }]);
      expect(renderScalars(views ?? [])).toEqual([
        "loader | step | value",
        "-------+------+------",
        "0        0      0.5  ",
        "0        2      0.25 ",
      ]);
      expect(scalarViews(engine, "input/1")).toBeNull();
    } finally {
      await engine.stop();
    }
  });

  it("prints notifications as one line each", () => {
    expect(
      formatNotification({
        id: "3",
        type: "tagDiscovered",
        version: 3,
        payload: { tag: ["input", 1], type: "image" },
      }),
    ).toBe('tagDiscovered tag="input/1" type="image"');
    expect(formatNotification({ id: "4", type: "initialLoadComplete", version: 4, payload: {} })).toBe(
      "initialLoadComplete",
    );
  });

  it("flattens config into dotted keys", () => {
    const entries = configEntries(DEFAULT_CONFIG);
    expect(entries).toContainEqual(["poll.intervalMs", 2500]);
    expect(entries).toContainEqual(["sources.eventMarker", ".tfevents"]);
    expect(entries).toHaveLength(9);
  });

  it("expands glob arguments and resolves plain paths", async () => {
    const { root } = await buildFixture();
    await mkdir(path.join(root, "nested"));
    await writeFile(path.join(root, "b.tfevents"), "");
    await writeFile(path.join(root, "notes.txt"), "");

    await expect(expandPaths(["*.tfevents"], root)).resolves.toEqual([
      path.join(root, "b.tfevents"),
      path.join(root, "run.tfevents"),
    ]);
    await expect(expandPaths(["nested", "missing", "nested"], root)).resolves.toEqual([
      path.join(root, "nested"),
      path.join(root, "missing"),
    ]);
  });
});
