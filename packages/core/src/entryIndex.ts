import type { EntryKind, EntryType, IndexSnapshot, Tag, TagInfo } from "@steplog/contracts";
import type { PerStepEntry, ScalarSeries } from "./entries.js";
import { InvariantViolationError } from "./errors.js";
import { tagKey, tagToString } from "./tags.js";
import { bisectRight, insertDistinct } from "./utils.js";

export interface EntryInsertResult {
  /** True when this entry introduced its tag. */
  newTag: boolean;
  /** Position in the global step list when the step was new, else null. */
  stepPosition: number | null;
}

/**
 * The merged tag/step index. Pure data: the engine serialises access to it
 * and turns the returned deltas into notifications.
 */
export class EntryIndex {
  private perTag = new Map<string, PerStepEntry[]>();
  private byStep = new Map<number, Map<string, PerStepEntry>>();
  private globals = new Map<string, ScalarSeries>();
  private distinctSteps: number[] = [];
  private tagInfos: TagInfo[] = [];
  private tagTypes = new Map<string, { type: EntryType; kind: EntryKind }>();

  addEntry(entry: PerStepEntry): EntryInsertResult {
    const key = tagKey(entry.tag);
    const newTag = this.declareTag(entry.tag, entry.type, entry.kind);

    let list = this.perTag.get(key);
    if (!list) {
      list = [];
      this.perTag.set(key, list);
    }
    list.splice(bisectRight(list, entry.step, (item) => item.step), 0, entry);

    let atStep = this.byStep.get(entry.step);
    if (!atStep) {
      atStep = new Map();
      this.byStep.set(entry.step, atStep);
    }
    atStep.set(key, entry);

    return { newTag, stepPosition: this.addStep(entry.step) };
  }

  /** Registers the one global entry of its tag; a second registration is a bug. */
  registerGlobal(entry: ScalarSeries): void {
    const key = tagKey(entry.tag);
    if (this.globals.has(key)) {
      throw new InvariantViolationError(`global entry for tag ${tagToString(entry.tag)} registered twice`);
    }
    this.declareTag(entry.tag, entry.type, entry.kind);
    this.globals.set(key, entry);
  }

  addStep(step: number): number | null {
    return insertDistinct(this.distinctSteps, step);
  }

  entriesFor(tag: Tag): PerStepEntry[] {
    return [...(this.perTag.get(tagKey(tag)) ?? [])];
  }

  /** The newest entry reported for `tag` at exactly `step`. */
  entryAt(step: number, tag: Tag): PerStepEntry | null {
    return this.byStep.get(step)?.get(tagKey(tag)) ?? null;
  }

  globalEntry(tag: Tag): ScalarSeries | null {
    return this.globals.get(tagKey(tag)) ?? null;
  }

  tags(): TagInfo[] {
    return this.tagInfos.map((info) => ({ ...info, tag: [...info.tag] }));
  }

  steps(): number[] {
    return [...this.distinctSteps];
  }

  snapshot(): IndexSnapshot {
    return {
      tags: this.tags(),
      steps: this.steps(),
      tagSteps: this.tagInfos.map((info) => ({
        tag: [...info.tag],
        steps:
          info.kind === "global"
            ? (this.globals.get(tagKey(info.tag))?.steps() ?? [])
            : (this.perTag.get(tagKey(info.tag)) ?? []).map((entry) => entry.step),
      })),
    };
  }

  /** Detaches per-step entries from their files and cancels their decodes; data stays readable. */
  releaseEntries(): void {
    for (const list of this.perTag.values()) {
      for (const entry of list) entry.close();
    }
  }

  /** Closes every entry and empties the index. */
  clear(): void {
    for (const list of this.perTag.values()) {
      for (const entry of list) entry.close();
    }
    for (const entry of this.globals.values()) entry.close();
    this.perTag = new Map();
    this.byStep = new Map();
    this.globals = new Map();
    this.distinctSteps = [];
    this.tagInfos = [];
    this.tagTypes = new Map();
  }

  private declareTag(tag: Tag, type: EntryType, kind: EntryKind): boolean {
    const key = tagKey(tag);
    const known = this.tagTypes.get(key);
    if (known) {
      if (known.type !== type || known.kind !== kind) {
        throw new InvariantViolationError(
          `tag ${tagToString(tag)} redeclared as ${kind}/${type}, was ${known.kind}/${known.type}`,
        );
      }
      return false;
    }
    this.tagTypes.set(key, { type, kind });
    this.tagInfos.push({ tag: [...tag], type, kind });
    return true;
  }
}
