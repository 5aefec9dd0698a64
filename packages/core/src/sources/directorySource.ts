import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { LoaderId, SourceStatus } from "@steplog/contracts";
import { isMissingPathError, isTransientIoError } from "../errors.js";
import { createSubsystemLogger } from "../logging.js";
import { EventFileSource } from "./fileSources.js";
import type { SourceCommon, SourceContext, SourceSink } from "./types.js";

const log = createSubsystemLogger("core/source");

export type DirectoryState = "directory" | "absent" | "unreadable";

/** `absent` covers both a missing path and a path that is not a directory. */
export async function directoryState(dirPath: string): Promise<DirectoryState> {
  try {
    return (await stat(dirPath)).isDirectory() ? "directory" : "absent";
  } catch (error) {
    if (isMissingPathError(error)) return "absent";
    if (isTransientIoError(error)) return "unreadable";
    throw error;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  return (await directoryState(dirPath)) === "directory";
}

/** Direct children of `dirPath` whose file name contains `marker`, sorted by name. */
export async function listMarkedFiles(dirPath: string, marker: string): Promise<string[]> {
  const files = await fg("*", {
    cwd: dirPath,
    onlyFiles: true,
    deep: 1,
    dot: true,
    absolute: true,
    suppressErrors: true,
  });
  return files
    .filter((file) => path.basename(file).includes(marker))
    .map((file) => path.normalize(file))
    .sort();
}

/**
 * A directory of event files. New files are picked up on every poll and get
 * fresh nested ids; ids of removed children are never reused.
 */
export class EventDirectorySource implements SourceCommon {
  readonly kind = "event_directory";
  readonly id: LoaderId;
  readonly path: string;
  private readonly marker: string;
  private readonly context: SourceContext;
  private children: EventFileSource[] = [];
  private nextChildIndex = 0;

  constructor(dirPath: string, id: LoaderId, marker: string, context: SourceContext) {
    this.path = dirPath;
    this.id = id;
    this.marker = marker;
    this.context = context;
  }

  childSources(): EventFileSource[] {
    return [...this.children];
  }

  bytesLoaded(): number {
    return this.children.reduce((sum, child) => sum + child.bytesLoaded(), 0);
  }

  bytesTotal(): number {
    return this.children.reduce((sum, child) => sum + child.bytesTotal(), 0);
  }

  sortKey(): number {
    return this.children.reduce((latest, child) => Math.max(latest, child.sortKey()), 0);
  }

  async refresh(): Promise<boolean> {
    if ((await directoryState(this.path)) !== "directory") return false;
    await this.refreshChildren();
    return true;
  }

  status(): SourceStatus {
    return {
      id: [...this.id],
      kind: this.kind,
      path: this.path,
      bytesLoaded: this.bytesLoaded(),
      bytesTotal: this.bytesTotal(),
      children: this.children.map((child) => child.status()),
    };
  }

  async poll(sink: SourceSink): Promise<boolean> {
    const state = await directoryState(this.path);
    if (state === "unreadable") {
      log.debug("directory briefly unreadable, retrying next cycle", { path: this.path });
      return true;
    }
    if (state === "absent") {
      log.info("directory deleted, dropping source", { path: this.path });
      for (const child of this.children) sink.sourceRemoved(child.id);
      this.children = [];
      return false;
    }

    await this.refreshChildren();

    const removed: EventFileSource[] = [];
    for (const child of this.children) {
      if (!(await child.poll(sink))) removed.push(child);
      if (sink.isStopRequested()) return true;
    }
    if (removed.length > 0) {
      this.children = this.children.filter((child) => !removed.includes(child));
      for (const child of removed) sink.sourceRemoved(child.id);
    }
    return true;
  }

  private async refreshChildren(): Promise<void> {
    await this.discover();
    await Promise.all(this.children.map((child) => child.refresh()));
    // Stable sort: ties keep discovery order.
    this.children.sort((left, right) => left.sortKey() - right.sortKey());
  }

  private async discover(): Promise<void> {
    const known = new Set(this.children.map((child) => child.path));
    for (const file of await listMarkedFiles(this.path, this.marker)) {
      if (known.has(file)) continue;
      const id: LoaderId = [...this.id, this.nextChildIndex];
      this.nextChildIndex += 1;
      log.debug("tracking new file", { path: file, id: id.join(".") });
      this.children.push(new EventFileSource(file, id, this.context));
    }
  }
}
