import type { Tag, TagSegment } from "@steplog/contracts";

const IMAGE_SUFFIX = "/image";
const NUMERIC_SEGMENT = /^\d+$/;

/**
 * Turns a raw summary tag into a hierarchical path: a trailing `/image` is
 * dropped and trailing numeric segments become integer segments.
 * `"input/3/image"` becomes `["input", 3]`.
 */
export function tagToPath(raw: string): Tag {
  let rest = raw.endsWith(IMAGE_SUFFIX) ? raw.slice(0, -IMAGE_SUFFIX.length) : raw;
  const indices: number[] = [];
  while (true) {
    const slash = rest.lastIndexOf("/");
    if (slash < 0) break;
    const last = rest.slice(slash + 1);
    if (!NUMERIC_SEGMENT.test(last)) break;
    indices.unshift(Number.parseInt(last, 10));
    rest = rest.slice(0, slash);
  }
  const segments: TagSegment[] = [rest, ...indices];
  return segments;
}

export function tagToString(tag: Tag): string {
  return tag.map(String).join("/");
}

/** Stable map key; distinguishes `["a", 1]` from `["a", "1"]`. */
export function tagKey(tag: Tag): string {
  return JSON.stringify(tag);
}

/** Memoises {@link tagToPath} per raw tag string. */
export class TagPathCache {
  private readonly cache = new Map<string, Tag>();

  resolve(raw: string): Tag {
    const cached = this.cache.get(raw);
    if (cached) return cached;
    const tag = tagToPath(raw);
    this.cache.set(raw, tag);
    return tag;
  }

  clear(): void {
    this.cache.clear();
  }
}
