#!/usr/bin/env node
import { Command } from "commander";
import {
  DEFAULT_CONFIG_PATH,
  IngestionEngine,
  errorMessage,
  loadConfig,
  loadSnapshot,
  saveConfig,
  setConfigValue,
  type EngineStreamEvent,
} from "@steplog/core";
import { runServer } from "@steplog/server";
import {
  buildSummary,
  configEntries,
  expandPaths,
  formatNotification,
  renderScalars,
  renderSummary,
  scalarViews,
} from "./report.js";

const program = new Command();
program.name("steplog").description("Inspect append-only training event logs and record files");
program.option("--config <path>", "Config path", process.env.STEPLOG_CONFIG ?? DEFAULT_CONFIG_PATH);
program.addHelpText(
  "after",
  `
Examples:
  $ steplog summary runs/exp1
  $ steplog scalars "runs/*" --tag loss --json
  $ steplog watch runs/exp1/events.out.tfevents.1700000000.host
  $ steplog serve runs/exp1 --port 8797
  $ steplog config set poll.intervalMs 1000
`,
);

function configPath(): string {
  return program.opts<{ config: string }>().config;
}

async function withSnapshot<T>(inputs: string[], work: (engine: IngestionEngine) => T): Promise<T> {
  const paths = await expandPaths(inputs);
  const engine = await loadSnapshot(paths, { configPath: configPath() });
  try {
    return work(engine);
  } finally {
    await engine.stop();
  }
}

program
  .command("summary <paths...>")
  .description("Load once and print tags, step range and source progress")
  .option("--json", "JSON output")
  .action(async (inputs: string[], opts: { json?: boolean }) => {
    const data = await withSnapshot(inputs, buildSummary);
    if (opts.json) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }
    for (const line of renderSummary(data)) console.log(line);
  });

program
  .command("scalars <paths...>")
  .description("Print step/value rows of one scalar tag per loader id")
  .requiredOption("--tag <tag>", "Scalar tag, e.g. loss or layer/2")
  .option("--json", "JSON output")
  .action(async (inputs: string[], opts: { tag: string; json?: boolean }) => {
    const views = await withSnapshot(inputs, (engine) => scalarViews(engine, opts.tag));
    if (!views) {
      throw new Error(`unknown scalar tag: ${opts.tag}`);
    }
    if (opts.json) {
      console.log(JSON.stringify(views, null, 2));
      return;
    }
    for (const line of renderScalars(views)) console.log(line);
  });

program
  .command("watch <paths...>")
  .description("Follow sources and print notifications until Ctrl-C")
  .action(async (inputs: string[]) => {
    const paths = await expandPaths(inputs);
    const engine = new IngestionEngine({ config: await loadConfig(configPath()) });
    engine.on("stream", ({ envelope }: EngineStreamEvent) => {
      console.log(formatNotification(envelope));
    });
    process.once("SIGINT", () => {
      engine.stop().catch((error: unknown) => {
        console.error(errorMessage(error));
        process.exitCode = 1;
      });
    });
    await engine.start(paths);
    await engine.whenStopped();
  });

program
  .command("serve <paths...>")
  .description("Serve the HTTP API and event stream over the given sources")
  .option("--host <host>", "Server host", process.env.STEPLOG_HOST ?? "127.0.0.1")
  .option("--port <port>", "Server port", process.env.STEPLOG_PORT ?? "8797")
  .action(async (inputs: string[], opts: { host: string; port: string }) => {
    const port = Number(opts.port);
    if (!Number.isInteger(port) || port <= 0) {
      throw new Error(`invalid port: ${opts.port}`);
    }
    await runServer({
      paths: await expandPaths(inputs),
      host: opts.host,
      port,
      configPath: configPath(),
    });
  });

const configCmd = program.command("config").description("Configuration");

configCmd
  .command("get")
  .option("--json", "JSON output")
  .action(async (opts: { json?: boolean }) => {
    const config = await loadConfig(configPath());
    if (opts.json) {
      console.log(JSON.stringify(config, null, 2));
      return;
    }
    for (const [key, value] of configEntries(config)) {
      console.log(`${key} = ${JSON.stringify(value)}`);
    }
  });

configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
  const config = setConfigValue(await loadConfig(configPath()), key, value);
  await saveConfig(config, configPath());
  console.log(`updated ${key}`);
});

void program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
