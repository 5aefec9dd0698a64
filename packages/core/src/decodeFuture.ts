import { EventEmitter } from "node:events";
import type { MaterializedPayload } from "@steplog/contracts";
import type { DecodePool, PoolTask } from "./decodePool.js";
import { errorMessage } from "./errors.js";
import { createSubsystemLogger } from "./logging.js";

const log = createSubsystemLogger("core/decode-future");

export type DecodeFutureState = "created" | "started" | "cancelled" | "completed";

export type DecodeWork = () => Promise<MaterializedPayload>;

/**
 * One unit of heavy decode work on a {@link DecodePool}.
 *
 * Emits `"ready"` (with the payload) at most once, and `"done"` exactly once
 * whichever way the future ends. `start()` and `cancel()` are idempotent and may
 * be called in any order; a cancel that lands while the work is awaiting still
 * suppresses the result.
 */
export class DecodeFuture extends EventEmitter implements PoolTask {
  readonly label: string;
  private current: DecodeFutureState = "created";
  private result: MaterializedPayload | null = null;
  private failure: unknown = null;
  private doneFired = false;
  private readonly work: DecodeWork;
  private readonly pool: DecodePool;
  private readonly settled: Promise<void>;
  private resolveSettled: () => void = () => undefined;

  constructor(pool: DecodePool, work: DecodeWork, label = "decode") {
    super();
    this.pool = pool;
    this.work = work;
    this.label = label;
    this.settled = new Promise<void>((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get state(): DecodeFutureState {
    return this.current;
  }

  get isDone(): boolean {
    return this.doneFired;
  }

  get error(): unknown {
    return this.failure;
  }

  start(): void {
    if (this.current !== "created") return;
    this.current = "started";
    if (!this.pool.submit(this)) {
      this.cancel();
    }
  }

  cancel(): void {
    if (this.current === "cancelled" || this.current === "completed") return;
    this.current = "cancelled";
    this.pool.cancel(this);
    this.finish();
  }

  /** Resolves with the payload, or null when the future was cancelled or failed. */
  async whenDone(): Promise<MaterializedPayload | null> {
    await this.settled;
    return this.result;
  }

  async run(): Promise<void> {
    if (this.current !== "started") return;

    let value: MaterializedPayload | null = null;
    try {
      value = await this.work();
    } catch (error) {
      if (this.current === "started") {
        log.warn("decode failed", { label: this.label, error: errorMessage(error) });
        this.failure = error;
      }
    }

    // A cancel during the await has already fired "done".
    if (this.current !== "started") return;
    this.current = "completed";
    this.result = value;
    try {
      if (value) this.emit("ready", value);
    } finally {
      this.finish();
    }
  }

  private finish(): void {
    if (this.doneFired) return;
    this.doneFired = true;
    this.resolveSettled();
    this.emit("done");
  }
}
