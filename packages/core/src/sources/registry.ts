import path from "node:path";
import type { LoaderId, SourceKind, SourceMarkersConfig } from "@steplog/contracts";
import { EventDirectorySource, isDirectory, listMarkedFiles } from "./directorySource.js";
import { EventFileSource, RecordFileSource } from "./fileSources.js";
import type { Source, SourceContext } from "./types.js";

export interface SourceVariant {
  readonly kind: SourceKind;
  appliesTo(sourcePath: string): Promise<boolean>;
  create(sourcePath: string, id: LoaderId, context: SourceContext): Source;
}

export function eventFileVariant(marker: string): SourceVariant {
  return {
    kind: "event_file",
    async appliesTo(sourcePath) {
      return path.basename(sourcePath).includes(marker) && !(await isDirectory(sourcePath));
    },
    create: (sourcePath, id, context) => new EventFileSource(sourcePath, id, context),
  };
}

export function eventDirectoryVariant(marker: string): SourceVariant {
  return {
    kind: "event_directory",
    async appliesTo(sourcePath) {
      if (!(await isDirectory(sourcePath))) return false;
      return (await listMarkedFiles(sourcePath, marker)).length > 0;
    },
    create: (sourcePath, id, context) => new EventDirectorySource(sourcePath, id, marker, context),
  };
}

export function recordFileVariant(marker: string): SourceVariant {
  return {
    kind: "record_file",
    async appliesTo(sourcePath) {
      return path.basename(sourcePath).includes(marker) && !(await isDirectory(sourcePath));
    },
    create: (sourcePath, id, context) => new RecordFileSource(sourcePath, id, context),
  };
}

/** Picks a source variant for a path: first registered variant that applies wins. */
export class SourceRegistry {
  private readonly variants: SourceVariant[] = [];

  static withDefaults(markers: SourceMarkersConfig): SourceRegistry {
    return new SourceRegistry()
      .register(eventFileVariant(markers.eventMarker))
      .register(eventDirectoryVariant(markers.eventMarker))
      .register(recordFileVariant(markers.recordMarker));
  }

  register(variant: SourceVariant): this {
    this.variants.push(variant);
    return this;
  }

  kinds(): SourceKind[] {
    return this.variants.map((variant) => variant.kind);
  }

  async resolve(sourcePath: string, id: LoaderId, context: SourceContext): Promise<Source | null> {
    const resolved = path.resolve(sourcePath);
    for (const variant of this.variants) {
      if (await variant.appliesTo(resolved)) {
        return variant.create(resolved, id, context);
      }
    }
    return null;
  }
}
