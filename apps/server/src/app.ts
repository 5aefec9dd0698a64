import Fastify, { type FastifyInstance } from "fastify";
import type { ScalarSeriesView, StreamEnvelope, Tag } from "@steplog/contracts";
import {
  DEFAULT_CONFIG_PATH,
  IngestionEngine,
  SteplogError,
  asRecord,
  createSubsystemLogger,
  errorMessage,
  imageContentType,
  loadConfig,
  tagToPath,
  tagToString,
  type EngineStreamEvent,
} from "@steplog/core";

const log = createSubsystemLogger("server");

const HEARTBEAT_MS = 15_000;

export interface CreateServerOptions {
  engine: IngestionEngine;
  heartbeatMs?: number;
}

interface TagQuery {
  tag?: string;
}

interface ImageQuery extends TagQuery {
  step?: string;
}

/** Parses a `tag` query value the same way raw summary tags are turned into paths. */
export function parseTagQuery(value: string | undefined): Tag | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;
  return tagToPath(trimmed);
}

export function parseStepQuery(value: string | undefined): number | null {
  if (value === undefined || !/^-?\d+$/.test(value.trim())) return null;
  const step = Number(value);
  return Number.isSafeInteger(step) ? step : null;
}

export function formatSseEvent(type: string, data: unknown): string {
  return `event: ${type}\ndata: ${JSON.stringify(data)}\n\n`;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  const engine = options.engine;
  const heartbeatMs = options.heartbeatMs ?? HEARTBEAT_MS;

  server.get("/api/healthz", async () => ({ ok: true }));

  server.get("/api/status", async () => ({ status: engine.status() }));

  server.get("/api/tags", async () => ({
    tags: engine.tags().map((info) => ({ ...info, name: tagToString(info.tag) })),
  }));

  server.get("/api/steps", async () => ({ steps: engine.steps() }));

  server.get<{ Querystring: TagQuery }>("/api/scalars", async (request, reply) => {
    const tag = parseTagQuery(request.query.tag);
    if (!tag) {
      reply.code(400);
      return { error: "missing tag" };
    }
    const series = engine.globalEntry(tag);
    if (!series) {
      reply.code(404);
      return { error: `unknown scalar tag: ${tagToString(tag)}` };
    }
    const views: ScalarSeriesView[] = series.loaderIds().map((loaderId) => ({
      tag,
      loaderId,
      steps: series.steps(loaderId),
      values: series.values(loaderId),
    }));
    return { tag, series: views };
  });

  server.get<{ Querystring: TagQuery }>("/api/entries", async (request, reply) => {
    const tag = parseTagQuery(request.query.tag);
    if (!tag) {
      reply.code(400);
      return { error: "missing tag" };
    }
    const entries = engine.entriesFor(tag);
    if (entries.length === 0) {
      reply.code(404);
      return { error: `unknown per-step tag: ${tagToString(tag)}` };
    }
    return { tag, steps: entries.map((entry) => entry.step) };
  });

  server.get<{ Querystring: ImageQuery }>("/api/image", async (request, reply) => {
    const tag = parseTagQuery(request.query.tag);
    const step = parseStepQuery(request.query.step);
    if (!tag || step === null) {
      reply.code(400);
      return { error: "tag and integer step are required" };
    }
    const entry = engine.entryAt(step, tag);
    if (!entry) {
      reply.code(404);
      return { error: `no ${tagToString(tag)} entry at step ${step}` };
    }
    const future = entry.decodeFuture();
    if (!future) {
      reply.code(404);
      return { error: "entry is no longer readable" };
    }

    // Cancelling a finished future is a no-op, so this only bites on early disconnects.
    reply.raw.once("close", () => future.cancel());
    future.start();
    const payload = await future.whenDone();

    if (!payload || payload.kind === "unavailable") {
      reply.code(404);
      return { error: "image unavailable" };
    }
    reply.header("x-image-description", encodeURIComponent(payload.description));
    if (payload.kind === "compressed") {
      reply.type(imageContentType(payload.bytes));
      return reply.send(Buffer.from(payload.bytes));
    }
    reply.type("application/octet-stream");
    reply.header("x-image-width", String(payload.width));
    reply.header("x-image-height", String(payload.height));
    reply.header("x-image-color", String(payload.isColor));
    return reply.send(Buffer.from(payload.bytes));
  });

  server.post<{ Body: unknown }>("/api/sources", async (request, reply) => {
    const sourcePath = asRecord(request.body).path;
    if (typeof sourcePath !== "string" || !sourcePath.trim()) {
      reply.code(400);
      return { ok: false, error: "body must be {\"path\": string}" };
    }
    try {
      const added = await engine.addSource(sourcePath.trim());
      if (!added) {
        reply.code(422);
        return { ok: false, error: `cannot load path: ${sourcePath}` };
      }
      return { ok: true, path: sourcePath.trim() };
    } catch (error) {
      reply.code(error instanceof SteplogError ? 409 : 500);
      return { ok: false, error: errorMessage(error) };
    }
  });

  server.post("/api/reload", async (_request, reply) => {
    if (engine.isStopRequested()) {
      reply.code(409);
      return { ok: false, error: "engine is stopped" };
    }
    engine.reload();
    return { ok: true };
  });

  server.get("/api/stream", async (_request, reply) => {
    reply.hijack();
    reply.raw.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    reply.raw.setHeader("Cache-Control", "no-cache, no-transform");
    reply.raw.setHeader("Connection", "keep-alive");
    reply.raw.setHeader("X-Accel-Buffering", "no");

    const snapshot: StreamEnvelope = {
      id: "0",
      type: "snapshot",
      version: 0,
      payload: { ...(await engine.snapshot()), status: engine.status() },
    };
    reply.raw.write(formatSseEvent("snapshot", snapshot));

    const onStream = ({ envelope }: EngineStreamEvent) => {
      reply.raw.write(formatSseEvent(envelope.type, envelope));
    };

    const heartbeat = setInterval(() => {
      reply.raw.write(formatSseEvent("heartbeat", { ts: Date.now() }));
    }, heartbeatMs);

    engine.on("stream", onStream);

    reply.raw.on("close", () => {
      clearInterval(heartbeat);
      engine.off("stream", onStream);
      reply.raw.end();
    });
  });

  return server;
}

export interface RunServerOptions {
  paths: string[];
  host?: string;
  port?: number;
  configPath?: string;
}

export interface RunningServer {
  server: FastifyInstance;
  engine: IngestionEngine;
  url: string;
}

/** Loads config, starts an engine over `paths` and serves it until SIGINT. */
export async function runServer(options: RunServerOptions): Promise<RunningServer> {
  const host = options.host ?? process.env.STEPLOG_HOST ?? "127.0.0.1";
  const port = options.port ?? Number(process.env.STEPLOG_PORT ?? "8797");
  const configPath = options.configPath ?? process.env.STEPLOG_CONFIG ?? DEFAULT_CONFIG_PATH;

  const config = await loadConfig(configPath);
  const engine = new IngestionEngine({ config });
  await engine.start(options.paths);
  const server = await createServer({ engine });

  await server.listen({ host, port });

  const shutdown = async (): Promise<void> => {
    try {
      await engine.stop();
    } catch (error) {
      log.error("engine stopped with an error", { error: errorMessage(error) });
    }
    await server.close();
  };
  process.once("SIGINT", () => {
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error("shutdown failed", { error: errorMessage(error) });
        process.exit(1);
      },
    );
  });

  const url = `http://${host}:${port}`;
  // eslint-disable-next-line no-console
  console.log(`steplog server: ${url}`);
  return { server, engine, url };
}
