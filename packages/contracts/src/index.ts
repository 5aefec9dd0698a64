export type TagSegment = string | number;

/** Hierarchical tag path, e.g. `["input", 3]` for the raw tag `input/3/image`. */
export type Tag = readonly TagSegment[];

/** Provenance chain: top-level source index, then nested sub-source indices. */
export type LoaderId = readonly number[];

export type EntryType = "image" | "scalar";
export type EntryKind = "per_step" | "global";
export type SourceKind = "event_file" | "event_directory" | "record_file";
export type EngineState = "idle" | "running" | "stop_requested" | "stopped";
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface TagInfo {
  tag: Tag;
  type: EntryType;
  kind: EntryKind;
}

export interface PollConfig {
  intervalMs: number;
  progressEvery: number;
  interactivePreload: boolean;
}

export interface DecodeConfig {
  concurrency: number;
  recordCacheSize: number;
}

export interface SourceMarkersConfig {
  eventMarker: string;
  recordMarker: string;
}

export interface WatchConfig {
  enabled: boolean;
  debounceMs: number;
}

export interface AppConfig {
  poll: PollConfig;
  decode: DecodeConfig;
  sources: SourceMarkersConfig;
  watch: WatchConfig;
}

export interface SourceStatus {
  id: LoaderId;
  kind: SourceKind;
  path: string;
  bytesLoaded: number;
  bytesTotal: number;
  children: SourceStatus[];
}

export interface EngineStatus {
  state: EngineState;
  initialLoading: boolean;
  iteration: number;
  progress: number;
  bytesLoaded: number;
  bytesTotal: number;
  failure: string;
  sources: SourceStatus[];
}

export interface TagSteps {
  tag: Tag;
  steps: number[];
}

export interface IndexSnapshot {
  tags: TagInfo[];
  steps: number[];
  tagSteps: TagSteps[];
}

export interface ScalarSeriesView {
  tag: Tag;
  loaderId: LoaderId;
  steps: number[];
  values: number[];
}

export type MaterializedPayload =
  | { kind: "compressed"; bytes: Uint8Array; description: string }
  | {
      kind: "raw";
      bytes: Uint8Array;
      width: number;
      height: number;
      isColor: boolean;
      description: string;
    }
  | { kind: "unavailable" };

/** Listener argument tuples, keyed by notification name. */
export interface EngineNotifications {
  sourceDiscoveryCleared: [];
  progress: [iteration: number, ratio: number];
  stepInserted: [position: number, iteration: number];
  tagDiscovered: [tag: Tag, type: EntryType];
  globalEntryDiscovered: [tag: Tag, type: EntryType];
  initialLoadComplete: [];
  loopStopped: [];
  sourceRemoved: [loaderId: LoaderId];
}

export type NotificationType = keyof EngineNotifications;

export interface StreamEnvelope {
  id: string;
  type: NotificationType | "snapshot" | "heartbeat";
  version: number;
  payload: Record<string, unknown>;
}
