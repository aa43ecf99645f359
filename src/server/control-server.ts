import fs from "node:fs";
import http from "node:http";
import path from "node:path";
import type { Writable } from "node:stream";
import { NotFoundError, ValidationError, errorMessage } from "../core/errors";
import type { Logger } from "../core/logger";
import type { RunController } from "../core/run-controller";
import { artifactKind } from "../core/run-store";
import type { ArtifactKind, RunEvent } from "../core/types";
import type { ServerConfig } from "../project/config";

const CONTENT_TYPES: Record<ArtifactKind, string> = {
  json: "application/json; charset=utf-8",
  markdown: "text/markdown; charset=utf-8",
  text: "text/plain; charset=utf-8",
};

/** Writes a chunk; when the socket buffer is full, waits until it drains or closes. */
export const writeChunk = async (out: Writable, chunk: string): Promise<void> => {
  if (out.write(chunk) || out.destroyed) {
    return;
  }
  await new Promise<void>((resolve) => {
    const done = () => {
      out.off("drain", done);
      out.off("close", done);
      resolve();
    };
    out.on("drain", done);
    out.on("close", done);
  });
};

const readBody = async (req: http.IncomingMessage): Promise<unknown> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const raw = Buffer.concat(chunks).toString("utf8").trim();
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new ValidationError("Request body is not valid JSON", [errorMessage(error)]);
  }
};

const respondJson = (
  res: http.ServerResponse,
  status: number,
  payload: unknown,
): void => {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseCreateRun = (body: unknown): { issueId: string; config: unknown } => {
  if (!isRecord(body) || typeof body.issue_id !== "string" || body.issue_id === "") {
    throw new ValidationError("issue_id is required");
  }
  return { issueId: body.issue_id, config: body.config };
};

export const formatSseEvent = (event: RunEvent): string =>
  `id: ${event.seq}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;

/**
 * HTTP surface over a RunController: JSON for requests and state, one
 * Server-Sent Events stream per run that ends after the terminating event.
 */
export class ControlServer {
  private server?: http.Server;

  constructor(
    private readonly controller: RunController,
    private readonly config: ServerConfig,
    private readonly logger: Logger,
  ) {}

  /** Bound TCP port; undefined when listening on a unix socket. */
  get port(): number | undefined {
    const address = this.server?.address();
    return typeof address === "object" && address !== null ? address.port : undefined;
  }

  start(): Promise<void> {
    const server = http.createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        this.logger.error("request failed", {
          url: req.url,
          error: errorMessage(error),
        });
        if (!res.headersSent) {
          respondJson(res, 500, { error: errorMessage(error) });
          return;
        }
        res.end();
      });
    });
    this.server = server;

    const { socketPath } = this.config;
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      const ready = () => {
        server.off("error", reject);
        this.logger.info("control server listening", {
          ...(socketPath ? { socketPath } : { port: this.port }),
        });
        resolve();
      };
      if (socketPath) {
        fs.mkdirSync(path.dirname(socketPath), { recursive: true });
        fs.rmSync(socketPath, { force: true });
        server.listen(socketPath, () => {
          fs.chmodSync(socketPath, 0o600);
          ready();
        });
        return;
      }
      server.listen(this.config.port ?? 0, this.config.host ?? "127.0.0.1", ready);
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    this.server = undefined;
    if (this.config.socketPath) {
      fs.rmSync(this.config.socketPath, { force: true });
    }
  }

  private async handle(
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    const segments = url.pathname.split("/").filter(Boolean).map(decodeURIComponent);

    try {
      if (method === "GET" && url.pathname === "/issues") {
        respondJson(res, 200, this.controller.listIssues());
        return;
      }

      if (url.pathname === "/runs") {
        if (method === "POST") {
          const { issueId, config } = parseCreateRun(await readBody(req));
          const runId = this.controller.createRun(issueId, config);
          respondJson(res, 201, { run_id: runId });
          return;
        }
        if (method === "GET") {
          respondJson(res, 200, this.controller.listRuns());
          return;
        }
      }

      const [root, runId, resource, name] = segments;
      if (method === "DELETE" && root === "runs" && runId && !resource) {
        this.controller.deleteRun(runId);
        res.writeHead(204);
        res.end();
        return;
      }
      if (root === "runs" && runId && resource) {
        if (method === "GET" && resource === "state" && !name) {
          respondJson(res, 200, this.controller.getState(runId));
          return;
        }
        if (method === "GET" && resource === "events" && !name) {
          this.streamEvents(res, runId, url.searchParams.get("from"));
          return;
        }
        if (method === "POST" && resource === "cancel" && !name) {
          const body = await readBody(req);
          const reason =
            isRecord(body) && typeof body.reason === "string" ? body.reason : undefined;
          const snapshot = this.controller.cancel(runId, reason);
          respondJson(res, 202, {
            run_id: snapshot.run.run_id,
            status: snapshot.run.status,
          });
          return;
        }
        if (method === "GET" && resource === "artifacts" && !name) {
          const pattern = url.searchParams.get("pattern") ?? undefined;
          respondJson(res, 200, this.controller.listArtifacts(runId, pattern));
          return;
        }
        if (method === "GET" && resource === "artifacts" && name) {
          const content = this.controller.fetchArtifact(runId, name);
          res.writeHead(200, { "Content-Type": CONTENT_TYPES[artifactKind(name)] });
          res.end(content);
          return;
        }
      }

      respondJson(res, 404, { error: "not_found" });
    } catch (error) {
      if (error instanceof ValidationError) {
        respondJson(res, 400, { error: error.message, issues: error.issues });
        return;
      }
      if (error instanceof NotFoundError) {
        respondJson(res, 404, { error: error.message });
        return;
      }
      throw error;
    }
  }

  private streamEvents(
    res: http.ServerResponse,
    runId: string,
    from: string | null,
  ): void {
    if (from !== null && from !== "start" && from !== "now") {
      throw new ValidationError("from must be start or now", [from]);
    }
    const subscription = this.controller.subscribe(runId, from ?? "start");
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.flushHeaders();
    res.on("close", () => subscription.close());

    const pump = async () => {
      for await (const event of subscription) {
        await writeChunk(res, formatSseEvent(event));
      }
      res.end();
    };
    pump().catch((error: unknown) => {
      this.logger.warn("event stream aborted", { run: runId, error: errorMessage(error) });
      res.end();
    });
  }
}
