export * from "./config.js";
export * from "./decodeFuture.js";
export * from "./decodePool.js";
export * from "./engine.js";
export * from "./entries.js";
export * from "./entryIndex.js";
export * from "./errors.js";
export * from "./formats/eventFormat.js";
export * from "./formats/exampleFormat.js";
export * from "./formats/png.js";
export * from "./formats/proto.js";
export * from "./formats/types.js";
export * from "./logging.js";
export * from "./mutex.js";
export * from "./records/crc32c.js";
export * from "./records/recordReader.js";
export * from "./snapshot.js";
export * from "./sources/directorySource.js";
export * from "./sources/fileSources.js";
export * from "./sources/registry.js";
export * from "./sources/types.js";
export * from "./tags.js";
export * from "./tracker/fileTracker.js";
export * from "./utils.js";
