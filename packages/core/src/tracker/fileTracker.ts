import { stat } from "node:fs/promises";
import { InvariantViolationError, RecordFormatError, isMissingPathError, isTransientIoError } from "../errors.js";
import { LruCache } from "../lru.js";
import { RecordReader, readRecordAt, type FramedRecord } from "../records/recordReader.js";

export type PayloadParser<TMessage> = (payload: Buffer) => TMessage;

interface FileSnapshot {
  exists: boolean;
  size: number;
  mtimeMs: number;
}

const MISSING: FileSnapshot = { exists: false, size: 0, mtimeMs: 0 };

/**
 * Tracks one growing record file: what was last observed on disk, how far the
 * file has been consumed, and a small cache of records re-read by offset.
 *
 * `refresh()` is the only method that touches the filesystem for metadata; the
 * predicates answer from the last snapshot so a poll sees one consistent view.
 * A refresh that hits a transient error keeps the previous snapshot.
 */
export class FileTracker<TMessage> {
  readonly path: string;
  private readonly parse: PayloadParser<TMessage>;
  private committed = 0;
  private snapshot: FileSnapshot = MISSING;
  private readonly records: LruCache<number, FramedRecord>;
  private readonly decoded: LruCache<number, TMessage>;

  constructor(filePath: string, parse: PayloadParser<TMessage>, cacheSize = 32) {
    this.path = filePath;
    this.parse = parse;
    this.records = new LruCache(cacheSize);
    this.decoded = new LruCache(cacheSize);
  }

  /** Returns false when the file could not be stat'ed this time and the snapshot is stale. */
  async refresh(): Promise<boolean> {
    try {
      const info = await stat(this.path);
      this.snapshot = info.isFile() ? { exists: true, size: info.size, mtimeMs: info.mtimeMs } : MISSING;
    } catch (error) {
      if (isMissingPathError(error)) {
        this.snapshot = MISSING;
      } else if (isTransientIoError(error)) {
        return false;
      } else {
        throw error;
      }
    }
    this.dropCacheBeyond(this.snapshot.size);
    return true;
  }

  /** The file exists and has not been truncated below what was already consumed. */
  isValid(): boolean {
    return this.snapshot.exists && this.committed <= this.snapshot.size;
  }

  hasChanged(): boolean {
    return this.snapshot.size !== this.committed;
  }

  size(): number {
    return this.snapshot.size;
  }

  lastModifiedTime(): number {
    return this.snapshot.mtimeMs;
  }

  committedOffset(): number {
    return this.committed;
  }

  newReaderFrom(offset = this.committed): RecordReader {
    return new RecordReader(this.path, offset);
  }

  setCommittedOffset(offset: number): void {
    if (offset < this.committed) {
      this.dropCache();
      throw new InvariantViolationError(
        `committed offset for ${this.path} would regress from ${this.committed} to ${offset}`,
      );
    }
    this.committed = offset;
  }

  async readCachedRecordAt(offset: number): Promise<FramedRecord | null> {
    const cached = this.records.get(offset);
    if (cached) return cached;
    const record = await readRecordAt(this.path, offset);
    if (record) this.records.set(offset, record);
    return record;
  }

  async readCachedAndDecodeAt(offset: number): Promise<TMessage | null> {
    const cached = this.decoded.get(offset);
    if (cached !== undefined) return cached;
    const record = await this.readCachedRecordAt(offset);
    if (!record) return null;
    const message = this.decode(record);
    this.decoded.set(offset, message);
    return message;
  }

  /** Parses a record read during a scan and primes the decode cache with it. */
  decode(record: FramedRecord): TMessage {
    let message: TMessage;
    try {
      message = this.parse(record.payload);
    } catch (error) {
      throw new RecordFormatError(this.path, record.offset, error);
    }
    this.records.set(record.offset, record);
    this.decoded.set(record.offset, message);
    return message;
  }

  private dropCacheBeyond(size: number): void {
    const cachedOffsets = this.records.keys();
    const highest = cachedOffsets.length > 0 ? Math.max(...cachedOffsets) : -1;
    if (highest >= size) this.dropCache();
  }

  private dropCache(): void {
    this.records.clear();
    this.decoded.clear();
  }
}
