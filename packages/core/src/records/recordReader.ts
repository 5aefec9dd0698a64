import { open, type FileHandle } from "node:fs/promises";
import { RecordChecksumError } from "../errors.js";
import { maskedCrc32c } from "./crc32c.js";

const HEADER_BYTES = 12;
const FOOTER_BYTES = 4;

export interface FramedRecord {
  /** Offset of the frame's first byte. */
  offset: number;
  /** Offset immediately after the frame; resuming from here never replays this record. */
  endOffset: number;
  payload: Buffer;
}

/**
 * How the last iteration ended: on a frame boundary, or on trailing bytes that do
 * not yet form a complete frame (usually a writer mid-append).
 */
export type ReaderTail = "eof" | "partial";

export function encodeRecord(payload: Uint8Array): Buffer {
  const frame = Buffer.alloc(HEADER_BYTES + payload.length + FOOTER_BYTES);
  frame.writeBigUInt64LE(BigInt(payload.length), 0);
  frame.writeUInt32LE(maskedCrc32c(frame.subarray(0, 8)), 8);
  frame.set(payload, HEADER_BYTES);
  frame.writeUInt32LE(maskedCrc32c(payload), HEADER_BYTES + payload.length);
  return frame;
}

async function readExactly(handle: FileHandle, length: number, position: number): Promise<Buffer | null> {
  const buffer = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(buffer, filled, length - filled, position + filled);
    if (bytesRead <= 0) return null;
    filled += bytesRead;
  }
  return buffer;
}

/**
 * Lazily reads length-prefixed, checksummed frames from `startOffset` onward.
 *
 * Iteration stops cleanly at end of file and at an incomplete trailing frame; a
 * complete frame with a bad checksum throws {@link RecordChecksumError}. The
 * position never moves past a frame that was not fully validated.
 */
export class RecordReader implements AsyncIterable<FramedRecord> {
  readonly path: string;
  private position: number;
  private lastTail: ReaderTail | null = null;

  constructor(filePath: string, startOffset = 0) {
    this.path = filePath;
    this.position = Math.max(0, Math.floor(startOffset));
  }

  /** End offset of the last fully validated record (or the start offset). */
  get offset(): number {
    return this.position;
  }

  get tail(): ReaderTail | null {
    return this.lastTail;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<FramedRecord, void, undefined> {
    this.lastTail = null;
    const handle = await open(this.path, "r");
    try {
      while (true) {
        const record = await this.readFrame(handle);
        if (!record) return;
        this.position = record.endOffset;
        yield record;
      }
    } finally {
      await handle.close();
    }
  }

  private async readFrame(handle: FileHandle): Promise<FramedRecord | null> {
    const start = this.position;
    const header = await readExactly(handle, HEADER_BYTES, start);
    if (!header) {
      const { size } = await handle.stat();
      this.lastTail = size > start ? "partial" : "eof";
      return null;
    }

    if (header.readUInt32LE(8) !== maskedCrc32c(header.subarray(0, 8))) {
      throw new RecordChecksumError(this.path, start, "length");
    }
    const length = header.readBigUInt64LE(0);
    if (length > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new RecordChecksumError(this.path, start, "length");
    }
    const payloadLength = Number(length);

    const body = await readExactly(handle, payloadLength + FOOTER_BYTES, start + HEADER_BYTES);
    if (!body) {
      this.lastTail = "partial";
      return null;
    }
    const payload = body.subarray(0, payloadLength);
    if (body.readUInt32LE(payloadLength) !== maskedCrc32c(payload)) {
      throw new RecordChecksumError(this.path, start, "payload");
    }

    return {
      offset: start,
      endOffset: start + HEADER_BYTES + payloadLength + FOOTER_BYTES,
      payload,
    };
  }
}

/** Reads the single record that starts at `offset`, or null if it is not complete yet. */
export async function readRecordAt(filePath: string, offset: number): Promise<FramedRecord | null> {
  const reader = new RecordReader(filePath, offset);
  for await (const record of reader) {
    return record;
  }
  return null;
}
