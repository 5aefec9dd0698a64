import type { AppConfig } from "@steplog/contracts";
import { loadConfig } from "./config.js";
import { IngestionEngine } from "./engine.js";

export interface LoadSnapshotOptions {
  config?: AppConfig;
  configPath?: string;
}

/**
 * Starts an engine over `paths` and waits for its first complete pass.
 * The caller owns the returned engine and must `stop()` it.
 */
export async function loadSnapshot(paths: string[], options: LoadSnapshotOptions = {}): Promise<IngestionEngine> {
  const config = options.config ?? (await loadConfig(options.configPath));
  const engine = new IngestionEngine({ config: { ...config, watch: { ...config.watch, enabled: false } } });
  await engine.start(paths);
  await engine.whenInitialLoaded();
  return engine;
}
