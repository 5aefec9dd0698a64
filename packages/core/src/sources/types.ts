import type { LoaderId, SourceKind, SourceStatus } from "@steplog/contracts";
import type { DecodePool } from "../decodePool.js";
import type { EntryHandle } from "../entries.js";
import type { DecodedValue } from "../formats/types.js";
import type { EventDirectorySource } from "./directorySource.js";
import type { EventFileSource, RecordFileSource } from "./fileSources.js";

/** One committed record's worth of decoded values, applied atomically. */
export interface RecordBatch {
  loaderId: LoaderId;
  step: number;
  offset: number;
  values: DecodedValue[];
  handle: EntryHandle;
}

/** The engine's mutation interface, as seen by a polling source. */
export interface SourceSink {
  isStopRequested(): boolean;
  applyRecord(batch: RecordBatch): Promise<void>;
  /** Closes one iteration; called after each committed record. */
  recordCommitted(): void;
  sourceRemoved(loaderId: LoaderId): void;
}

export interface SourceContext {
  pool: DecodePool;
  recordCacheSize: number;
}

export interface SourceCommon {
  readonly kind: SourceKind;
  readonly id: LoaderId;
  readonly path: string;
  bytesLoaded(): number;
  bytesTotal(): number;
  sortKey(): number;
  /**
   * Re-reads on-disk metadata so `sortKey()` and the byte counts are current.
   * Resolves false when a transient error left the previous metadata in place.
   */
  refresh(): Promise<boolean>;
  /** Returns false once the source is permanently gone. */
  poll(sink: SourceSink): Promise<boolean>;
  status(): SourceStatus;
}

export type Source = EventFileSource | EventDirectorySource | RecordFileSource;
