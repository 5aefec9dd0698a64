import { appendFile, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { LoaderId } from "@steplog/contracts";
import { DecodePool } from "../decodePool.js";
import { encodeEvent, encodeExample, type FeatureInput } from "../formats/proto.js";
import { encodeRecord } from "../records/recordReader.js";
import type { RecordBatch, SourceContext, SourceSink } from "../sources/types.js";

export type EventInput = Parameters<typeof encodeEvent>[0];

export async function createTempRoot(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "steplog-core-"));
}

export function eventFrame(event: EventInput): Buffer {
  return encodeRecord(encodeEvent(event));
}

export function exampleFrame(features: Record<string, FeatureInput>): Buffer {
  return encodeRecord(encodeExample(features));
}

export function scalarEvent(tag: string, step: number, value: number): Buffer {
  return eventFrame({ step, values: [{ tag, simpleValue: value }] });
}

export function imageEvent(tag: string, step: number, encoded: string): Buffer {
  return eventFrame({ step, values: [{ tag, image: { height: 1, width: 1, encoded: Buffer.from(encoded) } }] });
}

export async function writeFrames(filePath: string, frames: Buffer[]): Promise<void> {
  await writeFile(filePath, Buffer.concat(frames));
}

export async function appendFrames(filePath: string, frames: Buffer[]): Promise<void> {
  await appendFile(filePath, Buffer.concat(frames));
}

export function testContext(): SourceContext {
  return { pool: new DecodePool(2), recordCacheSize: 8 };
}

/** Collects everything a source pushes into the engine. */
export class RecordingSink implements SourceSink {
  readonly batches: RecordBatch[] = [];
  readonly removed: LoaderId[] = [];
  committed = 0;
  stopRequested = false;

  isStopRequested(): boolean {
    return this.stopRequested;
  }

  async applyRecord(batch: RecordBatch): Promise<void> {
    this.batches.push(batch);
  }

  recordCommitted(): void {
    this.committed += 1;
  }

  sourceRemoved(loaderId: LoaderId): void {
    this.removed.push(loaderId);
  }

  steps(): number[] {
    return this.batches.map((batch) => batch.step);
  }
}

export async function waitFor(predicate: () => boolean, timeoutMs = 5000): Promise<void> {
  const startedAt = Date.now();
  while (!predicate()) {
    if (Date.now() - startedAt > timeoutMs) {
      throw new Error("timed out waiting for condition");
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
