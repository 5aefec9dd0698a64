import type { LoaderId, MaterializedPayload, SourceStatus } from "@steplog/contracts";
import type { EntryHandle } from "../entries.js";
import { RecordChecksumError, RecordFormatError, errorMessage, isTransientIoError } from "../errors.js";
import { eventFormat } from "../formats/eventFormat.js";
import { exampleFormat } from "../formats/exampleFormat.js";
import type { EventMessage, ExampleMessage } from "../formats/proto.js";
import type { PayloadRef, RecordFormat } from "../formats/types.js";
import { createSubsystemLogger } from "../logging.js";
import { FileTracker } from "../tracker/fileTracker.js";
import type { SourceCommon, SourceContext, SourceSink } from "./types.js";

const log = createSubsystemLogger("core/source");

/**
 * A single growing record file scanned from its committed offset on each poll.
 * Every record is applied and committed on its own, so a stop request between
 * records never loses finished work.
 */
abstract class TrackedFileSource<TMessage> implements SourceCommon {
  abstract readonly kind: "event_file" | "record_file";
  readonly id: LoaderId;
  readonly path: string;
  protected readonly tracker: FileTracker<TMessage>;
  protected readonly handle: EntryHandle;
  private readonly format: RecordFormat<TMessage>;
  private recordIndex = 0;
  private stalledAt: number | null = null;

  constructor(filePath: string, id: LoaderId, format: RecordFormat<TMessage>, context: SourceContext) {
    this.path = filePath;
    this.id = id;
    this.format = format;
    this.tracker = new FileTracker(filePath, (payload) => format.parse(payload), context.recordCacheSize);
    const tracker = this.tracker;
    this.handle = {
      path: filePath,
      pool: context.pool,
      async materialize(offset: number, ref: PayloadRef, description: string): Promise<MaterializedPayload> {
        const message = await tracker.readCachedAndDecodeAt(offset);
        if (message === null) return { kind: "unavailable" };
        return format.materialize(message, ref, description);
      },
    };
  }

  bytesLoaded(): number {
    return this.tracker.committedOffset();
  }

  bytesTotal(): number {
    return this.tracker.size();
  }

  sortKey(): number {
    return this.tracker.lastModifiedTime();
  }

  refresh(): Promise<boolean> {
    return this.tracker.refresh();
  }

  status(): SourceStatus {
    return {
      id: [...this.id],
      kind: this.kind,
      path: this.path,
      bytesLoaded: this.bytesLoaded(),
      bytesTotal: this.bytesTotal(),
      children: [],
    };
  }

  async poll(sink: SourceSink): Promise<boolean> {
    if (!(await this.refresh())) {
      log.debug("file briefly unreadable, retrying next cycle", { path: this.path });
      return true;
    }
    if (!this.tracker.isValid()) {
      log.info("file deleted or truncated, dropping source", { path: this.path, id: this.id.join(".") });
      return false;
    }
    if (!this.tracker.hasChanged()) return true;

    try {
      await this.scan(sink);
    } catch (error) {
      if (error instanceof RecordChecksumError) {
        if (this.stalledAt !== error.offset) {
          this.stalledAt = error.offset;
          log.warn("stalled on corrupt record, retrying next cycle", { path: this.path, offset: error.offset, part: error.part });
        }
        return true;
      }
      if (isTransientIoError(error)) {
        log.debug("transient read error, retrying next cycle", { path: this.path, error: errorMessage(error) });
        return true;
      }
      log.error("unexpected error while polling", { path: this.path, error: errorMessage(error) });
      throw error;
    }
    return true;
  }

  private async scan(sink: SourceSink): Promise<void> {
    const reader = this.tracker.newReaderFrom();
    for await (const record of reader) {
      if (sink.isStopRequested()) return;
      this.stalledAt = null;

      let message: TMessage;
      try {
        message = this.tracker.decode(record);
      } catch (error) {
        if (!(error instanceof RecordFormatError)) throw error;
        log.warn("skipping malformed record", { path: this.path, offset: record.offset, error: errorMessage(error.cause) });
        this.tracker.setCommittedOffset(record.endOffset);
        continue;
      }

      const decoded = this.format.describe(message, this.recordIndex);
      await sink.applyRecord({
        loaderId: this.id,
        step: decoded.step,
        offset: record.offset,
        values: decoded.values,
        handle: this.handle,
      });
      this.recordIndex += 1;
      this.tracker.setCommittedOffset(record.endOffset);
      sink.recordCommitted();
    }
    if (reader.tail === "partial") {
      log.debug("incomplete trailing record, waiting for writer", { path: this.path, offset: reader.offset });
    }
  }
}

export class EventFileSource extends TrackedFileSource<EventMessage> {
  readonly kind = "event_file";

  constructor(filePath: string, id: LoaderId, context: SourceContext) {
    super(filePath, id, eventFormat, context);
  }
}

export class RecordFileSource extends TrackedFileSource<ExampleMessage> {
  readonly kind = "record_file";

  constructor(filePath: string, id: LoaderId, context: SourceContext) {
    super(filePath, id, exampleFormat, context);
  }
}
