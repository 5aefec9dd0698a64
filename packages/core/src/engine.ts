import { EventEmitter } from "node:events";
import chokidar, { type FSWatcher } from "chokidar";
import type {
  AppConfig,
  EngineNotifications,
  EngineState,
  EngineStatus,
  IndexSnapshot,
  LoaderId,
  NotificationType,
  StreamEnvelope,
  Tag,
  TagInfo,
} from "@steplog/contracts";
import { mergeConfig } from "./config.js";
import { DecodePool } from "./decodePool.js";
import { PerStepEntry, ScalarSeries } from "./entries.js";
import { EntryIndex } from "./entryIndex.js";
import { SteplogError, errorMessage } from "./errors.js";
import { createSubsystemLogger } from "./logging.js";
import { Mutex } from "./mutex.js";
import { SourceRegistry } from "./sources/registry.js";
import type { RecordBatch, Source, SourceContext, SourceSink } from "./sources/types.js";
import { TagPathCache } from "./tags.js";

const log = createSubsystemLogger("core/engine");

const NOTIFICATION_FIELDS: { [K in NotificationType]: string[] } = {
  sourceDiscoveryCleared: [],
  progress: ["iteration", "ratio"],
  stepInserted: ["position", "iteration"],
  tagDiscovered: ["tag", "type"],
  globalEntryDiscovered: ["tag", "type"],
  initialLoadComplete: [],
  loopStopped: [],
  sourceRemoved: ["loaderId"],
};

export interface IngestionEngineOptions {
  config?: AppConfig;
  registry?: SourceRegistry;
}

export interface EngineStreamEvent {
  envelope: StreamEnvelope;
}

/**
 * Polls a set of sources on a timer, merges what they decode into one tag/step
 * index and reports changes as events (see `EngineNotifications`); every event
 * is mirrored as a `stream` envelope.
 *
 * Index mutations happen only on the poll loop and only while holding the
 * engine lock; readers that need a consistent multi-part view use `snapshot()`.
 */
export class IngestionEngine extends EventEmitter {
  readonly config: AppConfig;
  private readonly registry: SourceRegistry;
  private readonly lock = new Mutex();
  private readonly index = new EntryIndex();
  private readonly tagPaths = new TagPathCache();
  private readonly pool: DecodePool;
  private readonly context: SourceContext;
  private sources: Source[] = [];
  private rootPaths: string[] = [];
  private queuedSources: Source[] = [];
  private nextLoaderIndex = 0;
  private reloadRequested = false;
  private engineState: EngineState = "idle";
  private initialLoading = true;
  private iteration = 0;
  private progressRatio = 0;
  private pendingSteps: Array<[position: number, iteration: number]> = [];
  private streamVersion = 0;
  private failure: unknown = null;
  private wakeRequested = false;
  private wakeResolver: (() => void) | null = null;
  private watcher: FSWatcher | null = null;
  private watchTimer: NodeJS.Timeout | null = null;
  private loop: Promise<void> | null = null;
  private readonly initialLoaded: Promise<void>;
  private resolveInitialLoaded: () => void = () => undefined;
  private readonly stopped: Promise<void>;
  private resolveStopped: () => void = () => undefined;

  private readonly sink: SourceSink = {
    isStopRequested: () => this.isStopRequested(),
    applyRecord: (batch) => this.lock.runExclusive(() => this.applyRecord(batch)),
    recordCommitted: () => this.finishIteration(),
    sourceRemoved: (loaderId) => this.notify("sourceRemoved", [...loaderId]),
  };

  constructor(options: IngestionEngineOptions = {}) {
    super();
    this.config = options.config ?? mergeConfig();
    this.registry = options.registry ?? SourceRegistry.withDefaults(this.config.sources);
    this.pool = new DecodePool(this.config.decode.concurrency);
    this.context = { pool: this.pool, recordCacheSize: this.config.decode.recordCacheSize };
    this.initialLoaded = new Promise<void>((resolve) => {
      this.resolveInitialLoaded = resolve;
    });
    this.stopped = new Promise<void>((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  get state(): EngineState {
    return this.engineState;
  }

  /** Resolves the paths and begins polling. Paths no variant accepts are logged and skipped. */
  async start(paths: string[]): Promise<void> {
    if (this.engineState !== "idle") {
      throw new SteplogError(`engine cannot start from state ${this.engineState}`);
    }
    this.engineState = "running";
    this.rootPaths = [...paths];
    const resolved = await this.resolveAll(paths);
    this.sources = await sortedBySortKey(resolved);
    log.info("starting poll loop", { sources: this.sources.length, unresolved: paths.length - resolved.length });
    if (this.config.watch.enabled) this.startWatcher(paths);
    this.loop = this.runLoop();
  }

  /** Hot-adds a top-level source. Returns false when no variant accepts the path. */
  async addSource(sourcePath: string): Promise<boolean> {
    if (this.isStopRequested()) {
      throw new SteplogError("cannot add a source to a stopped engine");
    }
    const [source] = await this.resolveAll([sourcePath]);
    if (!source) return false;
    this.rootPaths.push(sourcePath);
    this.queuedSources.push(source);
    this.watcher?.add(sourcePath);
    this.wake();
    return true;
  }

  /** Requests a full clear and rescan; handled at the start of the next cycle. */
  reload(): void {
    this.reloadRequested = true;
    this.wake();
  }

  /** Cuts the current wait between cycles short. */
  wake(): void {
    this.wakeRequested = true;
    this.wakeResolver?.();
  }

  /** Requests a stop and waits until the loop has exited and the decode pool has drained. */
  async stop(): Promise<void> {
    if (this.engineState === "idle") {
      this.engineState = "stopped";
      await this.pool.drain();
      this.settle();
    } else if (this.engineState === "running") {
      this.engineState = "stop_requested";
    }
    this.wake();
    await this.whenStopped();
  }

  isStopRequested(): boolean {
    return this.engineState === "stop_requested" || this.engineState === "stopped";
  }

  /** Resolves after the first complete cycle, or when the loop ends before one. */
  whenInitialLoaded(): Promise<void> {
    return this.initialLoaded;
  }

  /** Resolves once torn down; rejects with the error that ended the loop, if any. */
  async whenStopped(): Promise<void> {
    await this.stopped;
    if (this.loop) await this.loop;
    if (this.failure !== null) {
      throw this.failure instanceof Error ? this.failure : new SteplogError(errorMessage(this.failure));
    }
  }

  tags(): TagInfo[] {
    return this.index.tags();
  }

  steps(): number[] {
    return this.index.steps();
  }

  entriesFor(tag: Tag): PerStepEntry[] {
    return this.index.entriesFor(tag);
  }

  entryAt(step: number, tag: Tag): PerStepEntry | null {
    return this.index.entryAt(step, tag);
  }

  globalEntry(tag: Tag): ScalarSeries | null {
    return this.index.globalEntry(tag);
  }

  snapshot(): Promise<IndexSnapshot> {
    return this.lock.runExclusive(() => this.index.snapshot());
  }

  status(): EngineStatus {
    const { loaded, total } = this.byteTotals();
    return {
      state: this.engineState,
      initialLoading: this.initialLoading,
      iteration: this.iteration,
      progress: this.progressRatio,
      bytesLoaded: loaded,
      bytesTotal: total,
      failure: this.failure === null ? "" : errorMessage(this.failure),
      sources: this.sources.map((source) => source.status()),
    };
  }

  private async resolveAll(paths: string[]): Promise<Source[]> {
    const resolved: Source[] = [];
    for (const sourcePath of paths) {
      const id: LoaderId = [this.nextLoaderIndex];
      this.nextLoaderIndex += 1;
      const source = await this.registry.resolve(sourcePath, id, this.context);
      if (source) resolved.push(source);
      else log.warn("cannot load path", { path: sourcePath });
    }
    return resolved;
  }

  private async runLoop(): Promise<void> {
    try {
      while (!this.isStopRequested()) {
        if (!(await this.pollCycle())) break;
        await this.waitForWake(this.config.poll.intervalMs);
      }
    } catch (error) {
      this.failure = error;
      log.error("poll loop failed", { error: errorMessage(error) });
    } finally {
      await this.teardown();
    }
  }

  /** One pass over every source. Returns false when the loop should exit. */
  private async pollCycle(): Promise<boolean> {
    await this.handleRequests();

    const removed: Source[] = [];
    for (const source of this.sources) {
      if (!(await source.poll(this.sink))) removed.push(source);
      if (this.isStopRequested()) return false;
    }

    if (removed.length > 0) {
      await this.lock.runExclusive(() => {
        this.sources = this.sources.filter((source) => !removed.includes(source));
        for (const source of removed) this.notify("sourceRemoved", [...source.id]);
      });
    }
    if (this.sources.length === 0 && this.queuedSources.length === 0) {
      log.info("no sources left, stopping");
      return false;
    }

    if (this.initialLoading) {
      await this.lock.runExclusive(() => this.completeInitialLoad());
    }
    return true;
  }

  private async handleRequests(): Promise<void> {
    if (this.reloadRequested) {
      this.reloadRequested = false;
      this.queuedSources = [];
      const fresh = await sortedBySortKey(await this.resolveAll(this.rootPaths));
      await this.lock.runExclusive(() => {
        this.index.clear();
        this.tagPaths.clear();
        this.pendingSteps = [];
        this.sources = fresh;
        this.initialLoading = true;
        this.progressRatio = 0;
        this.notify("sourceDiscoveryCleared");
      });
      log.info("reloaded sources", { sources: fresh.length });
    }

    if (this.queuedSources.length > 0) {
      const added = this.queuedSources;
      this.queuedSources = [];
      await this.lock.runExclusive(() => {
        this.sources.push(...added);
        this.initialLoading = true;
      });
    }
  }

  private applyRecord(batch: RecordBatch): void {
    const streaming = this.isStreaming();
    for (const value of batch.values) {
      const tag = this.tagPaths.resolve(value.tag);
      if (value.kind === "payload") {
        const entry = new PerStepEntry({
          tag,
          step: batch.step,
          loaderId: batch.loaderId,
          offset: batch.offset,
          ref: value.ref,
          handle: batch.handle,
        });
        const { newTag, stepPosition } = this.index.addEntry(entry);
        if (newTag && streaming) this.notify("tagDiscovered", tag, entry.type);
        if (stepPosition !== null) this.pendingSteps.push([stepPosition, this.iteration]);
        continue;
      }

      let series = this.index.globalEntry(tag);
      const created = series === null;
      if (!series) {
        series = new ScalarSeries(tag);
        this.index.registerGlobal(series);
      }
      series.addObservation(batch.step, value.value, batch.loaderId);
      if (created && streaming) this.notify("globalEntryDiscovered", tag, series.type);
      const stepPosition = this.index.addStep(batch.step);
      if (stepPosition !== null) this.pendingSteps.push([stepPosition, this.iteration]);
    }
  }

  private finishIteration(): void {
    if (this.initialLoading) {
      if (this.iteration % this.config.poll.progressEvery === 0) {
        const { loaded, total } = this.byteTotals();
        this.progressRatio = total > 0 ? Math.min(1, loaded / total) : 1;
        this.notify("progress", this.iteration, this.progressRatio);
      }
    } else {
      this.progressRatio = 1;
      this.notify("progress", this.iteration, 1);
    }
    this.iteration += 1;

    const pending = this.pendingSteps;
    this.pendingSteps = [];
    if (this.isStreaming()) {
      for (const [position, iteration] of pending) this.notify("stepInserted", position, iteration);
    }
  }

  private completeInitialLoad(): void {
    if (!this.config.poll.interactivePreload) {
      for (const info of this.index.tags()) {
        if (info.kind === "global") this.notify("globalEntryDiscovered", info.tag, info.type);
        else this.notify("tagDiscovered", info.tag, info.type);
      }
    }
    this.progressRatio = 1;
    this.notify("progress", this.iteration, 1);
    this.initialLoading = false;
    log.info("initial load done", { tags: this.index.tags().length, steps: this.index.steps().length });
    this.notify("initialLoadComplete");
    this.resolveInitialLoaded();
  }

  private isStreaming(): boolean {
    return this.config.poll.interactivePreload || !this.initialLoading;
  }

  private byteTotals(): { loaded: number; total: number } {
    let loaded = 0;
    let total = 0;
    for (const source of this.sources) {
      loaded += source.bytesLoaded();
      total += source.bytesTotal();
    }
    return { loaded, total };
  }

  private async waitForWake(delayMs: number): Promise<void> {
    if (!this.wakeRequested && !this.isStopRequested()) {
      await new Promise<void>((resolve) => {
        let timer: NodeJS.Timeout | null = null;
        const finish = (): void => {
          if (timer) clearTimeout(timer);
          this.wakeResolver = null;
          resolve();
        };
        timer = setTimeout(finish, Math.max(1, delayMs));
        this.wakeResolver = finish;
      });
    }
    this.wakeRequested = false;
  }

  private startWatcher(paths: string[]): void {
    if (paths.length === 0) return;
    const debounceMs = Math.max(1, this.config.watch.debounceMs);
    this.watcher = chokidar.watch(paths, {
      ignoreInitial: true,
      persistent: true,
      followSymlinks: false,
      depth: 1,
    });
    const onChange = (): void => {
      if (this.watchTimer) clearTimeout(this.watchTimer);
      this.watchTimer = setTimeout(() => {
        this.watchTimer = null;
        this.wake();
      }, debounceMs);
    };
    this.watcher.on("add", onChange);
    this.watcher.on("change", onChange);
    this.watcher.on("unlink", onChange);
    this.watcher.on("error", (error) => {
      log.warn("watcher error, relying on polling", { error: errorMessage(error) });
    });
  }

  private async teardown(): Promise<void> {
    try {
      if (this.watchTimer) clearTimeout(this.watchTimer);
      this.watchTimer = null;
      if (this.watcher) {
        await this.watcher.close();
        this.watcher = null;
      }
      await this.lock.runExclusive(async () => {
        this.notify("loopStopped");
        this.index.releaseEntries();
        await this.pool.drain();
      });
    } catch (error) {
      if (this.failure === null) this.failure = error;
      log.error("teardown failed", { error: errorMessage(error) });
    } finally {
      this.engineState = "stopped";
      this.settle();
      log.info("poll loop exited");
    }
  }

  private settle(): void {
    this.resolveInitialLoaded();
    this.resolveStopped();
  }

  private notify<K extends NotificationType>(type: K, ...args: EngineNotifications[K]): void {
    this.emit(type, ...args);
    const fields = NOTIFICATION_FIELDS[type];
    const values: readonly unknown[] = args;
    const payload: Record<string, unknown> = {};
    fields.forEach((field, idx) => {
      payload[field] = values[idx];
    });
    this.streamVersion += 1;
    const envelope: StreamEnvelope = {
      id: String(this.streamVersion),
      type,
      version: this.streamVersion,
      payload,
    };
    const event: EngineStreamEvent = { envelope };
    this.emit("stream", event);
  }
}

async function sortedBySortKey(sources: Source[]): Promise<Source[]> {
  await Promise.all(sources.map((source) => source.refresh()));
  return [...sources].sort((left, right) => left.sortKey() - right.sortKey());
}
