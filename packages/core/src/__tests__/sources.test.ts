import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { LoaderId } from "@steplog/contracts";
import { describe, expect, it } from "vitest";
import { encodeRecord } from "../records/recordReader.js";
import { EventDirectorySource } from "../sources/directorySource.js";
import { EventFileSource, RecordFileSource } from "../sources/fileSources.js";
import { SourceRegistry } from "../sources/registry.js";
import {
  appendFrames,
  createTempRoot,
  exampleFrame,
  imageEvent,
  RecordingSink,
  scalarEvent,
  testContext,
  writeFrames,
} from "./helpers.js";

const MARKERS = { eventMarker: ".tfevents", recordMarker: ".tfrecords" };

function sortedIds(ids: LoaderId[]): string[] {
  return ids.map((id) => id.join(".")).sort();
}

describe("EventFileSource", () => {
  it("leaves an incomplete trailing record for the next poll", async () => {
    const root = await createTempRoot();
    const file = path.join(root, "run.tfevents");
    const first = scalarEvent("loss", 0, 0.5);
    const second = scalarEvent("loss", 1, 0.25);
    await writeFrames(file, [first, second.subarray(0, 10)]);

    const source = new EventFileSource(file, [0], testContext());
    const sink = new RecordingSink();
    await expect(source.poll(sink)).resolves.toBe(true);
    expect(sink.steps()).toEqual([0]);
    expect(source.bytesLoaded()).toBe(first.length);

    await appendFrames(file, [second.subarray(10)]);
    await expect(source.poll(sink)).resolves.toBe(true);
    expect(sink.steps()).toEqual([0, 1]);
    expect(sink.committed).toBe(2);
    expect(source.bytesLoaded()).toBe(first.length + second.length);
    expect(source.bytesTotal()).toBe(first.length + second.length);
  });

  it("stalls on a corrupt record and resumes once it is repaired", async () => {
    const root = await createTempRoot();
    const file = path.join(root, "run.tfevents");
    const frames = [scalarEvent("loss", 0, 0.5), scalarEvent("loss", 1, 0.25), scalarEvent("loss", 2, 0.125)];
    const corrupt = Buffer.from(frames[1] ?? Buffer.alloc(0));
    const flipAt = corrupt.length - 5;
    corrupt[flipAt] = (corrupt[flipAt] ?? 0) ^ 0xff;
    await writeFrames(file, [frames[0] ?? Buffer.alloc(0), corrupt, frames[2] ?? Buffer.alloc(0)]);

    const source = new EventFileSource(file, [0], testContext());
    const sink = new RecordingSink();
    await expect(source.poll(sink)).resolves.toBe(true);
    await expect(source.poll(sink)).resolves.toBe(true);
    expect(sink.steps()).toEqual([0]);

    await writeFrames(file, frames);
    await expect(source.poll(sink)).resolves.toBe(true);
    expect(sink.steps()).toEqual([0, 1, 2]);
  });

  it("skips a record whose payload does not parse", async () => {
    const root = await createTempRoot();
    const file = path.join(root, "run.tfevents");
    const garbage = encodeRecord(new Uint8Array([0xff, 0xff, 0xff, 0xff]));
    const good = scalarEvent("loss", 3, 0.5);
    await writeFrames(file, [garbage, good]);

    const source = new EventFileSource(file, [0], testContext());
    const sink = new RecordingSink();
    await source.poll(sink);

    expect(sink.steps()).toEqual([3]);
    expect(source.bytesLoaded()).toBe(garbage.length + good.length);
  });

  it("reads nothing while a stop is requested", async () => {
    const root = await createTempRoot();
    const file = path.join(root, "run.tfevents");
    await writeFrames(file, [scalarEvent("loss", 0, 0.5)]);

    const source = new EventFileSource(file, [0], testContext());
    const sink = new RecordingSink();
    sink.stopRequested = true;

    await expect(source.poll(sink)).resolves.toBe(true);
    expect(sink.batches).toEqual([]);
    expect(source.bytesLoaded()).toBe(0);
  });

  it("reports itself gone once the file is deleted", async () => {
    const root = await createTempRoot();
    const file = path.join(root, "run.tfevents");
    await writeFrames(file, [scalarEvent("loss", 0, 0.5)]);

    const source = new EventFileSource(file, [0], testContext());
    const sink = new RecordingSink();
    await expect(source.poll(sink)).resolves.toBe(true);

    await rm(file);
    await expect(source.poll(sink)).resolves.toBe(false);
  });

  it("hands out a handle that re-reads image payloads by offset", async () => {
    const root = await createTempRoot();
    const file = path.join(root, "run.tfevents");
    await writeFrames(file, [scalarEvent("loss", 0, 0.5), imageEvent("img", 1, "pixels")]);

    const source = new EventFileSource(file, [0], testContext());
    const sink = new RecordingSink();
    await source.poll(sink);

    const batch = sink.batches[1];
    const value = batch?.values[0];
    expect(value?.kind).toBe("payload");
    if (!batch || value?.kind !== "payload") return;
    const payload = await batch.handle.materialize(batch.offset, value.ref, "img");
    expect(payload.kind).toBe("compressed");
    if (payload.kind !== "compressed") return;
    expect(Buffer.from(payload.bytes).toString()).toBe("pixels");
  });
});

describe("RecordFileSource", () => {
  it("numbers records by position", async () => {
    const root = await createTempRoot();
    const file = path.join(root, "train.tfrecords");
    await writeFrames(file, [
      exampleFrame({ height: 1, width: 1, image_raw: new Uint8Array([1]) }),
      exampleFrame({ height: 1, width: 1, image_raw: new Uint8Array([2]) }),
    ]);

    const source = new RecordFileSource(file, [2], testContext());
    const sink = new RecordingSink();
    await source.poll(sink);

    expect(sink.steps()).toEqual([0, 1]);
    expect(sink.batches.map((batch) => batch.loaderId)).toEqual([[2], [2]]);
  });
});

describe("EventDirectorySource", () => {
  it("tracks files appearing in and disappearing from a directory", async () => {
    const root = await createTempRoot();
    const dir = path.join(root, "run");
    await mkdir(dir);
    for (const [name, step] of [
      ["a.tfevents", 0],
      ["b.tfevents", 1],
      ["c.tfevents", 2],
    ] as const) {
      await writeFrames(path.join(dir, name), [scalarEvent("loss", step, 0.5)]);
    }
    await writeFile(path.join(dir, "notes.txt"), "ignored");

    const source = new EventDirectorySource(dir, [0], ".tfevents", testContext());
    const sink = new RecordingSink();
    await expect(source.poll(sink)).resolves.toBe(true);
    expect(sink.steps().sort()).toEqual([0, 1, 2]);
    expect(sortedIds(source.childSources().map((child) => child.id))).toEqual(["0.0", "0.1", "0.2"]);

    await rm(path.join(dir, "b.tfevents"));
    await expect(source.poll(sink)).resolves.toBe(true);
    expect(sink.removed).toEqual([[0, 1]]);

    await writeFrames(path.join(dir, "d.tfevents"), [scalarEvent("loss", 3, 0.5)]);
    await source.poll(sink);
    expect(sortedIds(source.childSources().map((child) => child.id))).toEqual(["0.0", "0.2", "0.3"]);
    expect(sink.batches.at(-1)?.loaderId).toEqual([0, 3]);

    await rm(dir, { recursive: true });
    await expect(source.poll(sink)).resolves.toBe(false);
    expect(sortedIds(sink.removed)).toEqual(["0.0", "0.1", "0.2", "0.3"]);
    expect(source.childSources()).toEqual([]);
  });

  it("sums child byte counts into its status", async () => {
    const root = await createTempRoot();
    const frame = scalarEvent("loss", 0, 0.5);
    await writeFrames(path.join(root, "a.tfevents"), [frame]);
    await writeFrames(path.join(root, "b.tfevents"), [frame]);

    const source = new EventDirectorySource(root, [4], ".tfevents", testContext());
    await source.poll(new RecordingSink());

    const status = source.status();
    expect(status.kind).toBe("event_directory");
    expect(status.bytesLoaded).toBe(frame.length * 2);
    expect(status.bytesTotal).toBe(frame.length * 2);
    expect(status.children.map((child) => child.bytesLoaded)).toEqual([frame.length, frame.length]);
  });
});

describe("SourceRegistry", () => {
  it("picks the first variant that applies to a path", async () => {
    const root = await createTempRoot();
    const registry = SourceRegistry.withDefaults(MARKERS);
    const eventFile = path.join(root, "events.out.tfevents.1700000000.host");
    const recordFile = path.join(root, "train.tfrecords");
    const emptyDir = path.join(root, "empty");
    await writeFrames(eventFile, [scalarEvent("loss", 0, 1)]);
    await writeFrames(recordFile, []);
    await mkdir(emptyDir);

    const context = testContext();
    expect((await registry.resolve(eventFile, [0], context))?.kind).toBe("event_file");
    expect((await registry.resolve(root, [1], context))?.kind).toBe("event_directory");
    expect((await registry.resolve(recordFile, [2], context))?.kind).toBe("record_file");
    await expect(registry.resolve(emptyDir, [3], context)).resolves.toBeNull();
    await expect(registry.resolve(path.join(root, "notes.txt"), [4], context)).resolves.toBeNull();
    expect(registry.kinds()).toEqual(["event_file", "event_directory", "record_file"]);
  });

  it("resolves relative paths to absolute ones", async () => {
    const root = await createTempRoot();
    const file = path.join(root, "a.tfevents");
    await writeFrames(file, [scalarEvent("loss", 0, 1)]);

    const source = await SourceRegistry.withDefaults(MARKERS).resolve(
      path.relative(process.cwd(), file),
      [0],
      testContext(),
    );
    expect(source?.path).toBe(file);
  });
});
