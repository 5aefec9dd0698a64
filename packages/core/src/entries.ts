import { EventEmitter } from "node:events";
import type { LoaderId, MaterializedPayload, Tag } from "@steplog/contracts";
import type { DecodePool } from "./decodePool.js";
import { DecodeFuture } from "./decodeFuture.js";
import type { PayloadRef } from "./formats/types.js";
import { tagToString } from "./tags.js";
import { bisectLeft, bisectRight } from "./utils.js";

/**
 * Non-owning view of the file an entry was read from. The owning source keeps
 * the tracker; entries drop this handle when they are closed.
 */
export interface EntryHandle {
  readonly path: string;
  readonly pool: DecodePool;
  materialize(offset: number, ref: PayloadRef, description: string): Promise<MaterializedPayload>;
}

export interface PerStepEntryInit {
  tag: Tag;
  step: number;
  loaderId: LoaderId;
  offset: number;
  ref: PayloadRef;
  handle: EntryHandle;
}

export class PerStepEntry {
  readonly kind = "per_step";
  readonly type = "image";
  readonly tag: Tag;
  readonly step: number;
  readonly loaderId: LoaderId;
  readonly offset: number;
  readonly ref: PayloadRef;
  private handle: EntryHandle | null;
  private readonly pending = new Set<DecodeFuture>();

  constructor(init: PerStepEntryInit) {
    this.tag = init.tag;
    this.step = init.step;
    this.loaderId = init.loaderId;
    this.offset = init.offset;
    this.ref = init.ref;
    this.handle = init.handle;
  }

  get path(): string | null {
    return this.handle?.path ?? null;
  }

  get isClosed(): boolean {
    return this.handle === null;
  }

  /**
   * A fresh decode of this entry's payload, owned by one consumer so that its
   * cancel never affects another. Returns null once the entry is closed.
   */
  decodeFuture(): DecodeFuture | null {
    const handle = this.handle;
    if (!handle) return null;

    const description = tagToString(this.tag);
    const future = new DecodeFuture(
      handle.pool,
      () => handle.materialize(this.offset, this.ref, description),
      `${description}@${this.step}`,
    );
    future.once("done", () => this.pending.delete(future));
    this.pending.add(future);
    return future;
  }

  pendingDecodes(): number {
    return this.pending.size;
  }

  close(): void {
    this.handle = null;
    const pending = [...this.pending];
    this.pending.clear();
    for (const future of pending) future.cancel();
  }
}

/**
 * Scalar observations for one tag, partitioned by the top-level source id so
 * every file of a directory source lands in one series.
 * Emits `stepAdded(position, loaderId)`.
 */
export class ScalarSeries extends EventEmitter {
  readonly kind = "global";
  readonly type = "scalar";
  readonly tag: Tag;
  private allSteps: number[] = [];
  private partitionOrder: number[] = [];
  private partitions = new Map<number, { steps: number[]; values: number[] }>();

  constructor(tag: Tag) {
    super();
    this.tag = tag;
  }

  addObservation(step: number, value: number, loaderId: LoaderId): number {
    const root = loaderId[0] ?? 0;
    const partitionId: LoaderId = [root];

    const allIdx = bisectLeft(this.allSteps, step, (item) => item);
    if (this.allSteps[allIdx] !== step) this.allSteps.splice(allIdx, 0, step);

    let partition = this.partitions.get(root);
    if (!partition) {
      partition = { steps: [], values: [] };
      this.partitions.set(root, partition);
      this.partitionOrder.push(root);
    }
    const idx = bisectRight(partition.steps, step, (item) => item);
    partition.steps.splice(idx, 0, step);
    partition.values.splice(idx, 0, value);
    this.emit("stepAdded", idx, partitionId);
    return idx;
  }

  /** Distinct steps across all partitions, or every step of one partition. */
  steps(loaderId?: LoaderId): number[] {
    if (!loaderId) return [...this.allSteps];
    return [...(this.partitions.get(loaderId[0] ?? 0)?.steps ?? [])];
  }

  values(loaderId: LoaderId): number[] {
    return [...(this.partitions.get(loaderId[0] ?? 0)?.values ?? [])];
  }

  loaderIds(): LoaderId[] {
    return this.partitionOrder.map((root) => [root]);
  }

  observationCount(): number {
    let count = 0;
    for (const partition of this.partitions.values()) count += partition.steps.length;
    return count;
  }

  close(): void {
    this.allSteps = [];
    this.partitionOrder = [];
    this.partitions.clear();
    this.removeAllListeners();
  }
}

export type GlobalEntry = ScalarSeries;
export type Entry = PerStepEntry | GlobalEntry;
