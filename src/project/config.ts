import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createJiti } from "jiti";
import type { Logger } from "../core/logger";

export const BUNDLED_DATA_DIR = fileURLToPath(
  new URL("../../data", import.meta.url),
);

export interface RetryPolicy {
  /** Retries after the first failed attempt. */
  attempts: number;
  backoffMs: number;
}

export interface ServerConfig {
  socketPath?: string;
  port?: number;
  host?: string;
}

export interface ProjectConfig {
  name: string;
  /** Department profiles and built-in issues. */
  dataDir: string;
  /** Project issue definitions (.ts or .json), overriding built-ins by id. */
  issuesDir: string;
  runsDir: string;
  /** Run config defaults, validated when a run is created. */
  runDefaults: Record<string, unknown>;
  retry: RetryPolicy;
  stageTimeoutMs: number;
  mailboxWaitMs: number;
  maxConcurrentActors: number;
  negotiation: {
    disputeThreshold: number;
  };
  server: ServerConfig;
}

export const defaultProjectConfig: ProjectConfig = {
  name: "policy-council",
  dataDir: BUNDLED_DATA_DIR,
  issuesDir: ".council/issues.d",
  runsDir: ".council/runs",
  runDefaults: {},
  retry: { attempts: 2, backoffMs: 100 },
  stageTimeoutMs: 30_000,
  mailboxWaitMs: 50,
  maxConcurrentActors: 6,
  negotiation: { disputeThreshold: 0.35 },
  server: { socketPath: ".council/council.sock" },
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const positiveNumber = (value: unknown, fallback: number): number =>
  typeof value === "number" && Number.isFinite(value) && value >= 0
    ? value
    : fallback;

const normalizeServer = (raw: unknown): ServerConfig => {
  if (!isRecord(raw)) return defaultProjectConfig.server;
  const server: ServerConfig = {};
  if (typeof raw.socketPath === "string") server.socketPath = raw.socketPath;
  if (typeof raw.port === "number") server.port = raw.port;
  if (typeof raw.host === "string") server.host = raw.host;
  return Object.keys(server).length > 0 ? server : defaultProjectConfig.server;
};

const resolveDir = (cwd: string, value: unknown, fallback: string): string =>
  path.resolve(cwd, typeof value === "string" ? value : fallback);

export const normalizeProjectConfig = (
  parsed: unknown,
  cwd: string,
): ProjectConfig => {
  const raw = isRecord(parsed) ? parsed : {};
  const retry = isRecord(raw.retry) ? raw.retry : {};
  const negotiation = isRecord(raw.negotiation) ? raw.negotiation : {};
  const server = normalizeServer(raw.server);

  return {
    name: typeof raw.name === "string" ? raw.name : defaultProjectConfig.name,
    dataDir: resolveDir(cwd, raw.dataDir, defaultProjectConfig.dataDir),
    issuesDir: resolveDir(cwd, raw.issuesDir, defaultProjectConfig.issuesDir),
    runsDir: resolveDir(cwd, raw.runsDir, defaultProjectConfig.runsDir),
    runDefaults: isRecord(raw.runDefaults)
      ? raw.runDefaults
      : defaultProjectConfig.runDefaults,
    retry: {
      attempts: Math.floor(
        positiveNumber(retry.attempts, defaultProjectConfig.retry.attempts),
      ),
      backoffMs: positiveNumber(
        retry.backoffMs,
        defaultProjectConfig.retry.backoffMs,
      ),
    },
    stageTimeoutMs: positiveNumber(
      raw.stageTimeoutMs,
      defaultProjectConfig.stageTimeoutMs,
    ),
    mailboxWaitMs: positiveNumber(
      raw.mailboxWaitMs,
      defaultProjectConfig.mailboxWaitMs,
    ),
    maxConcurrentActors: Math.max(
      1,
      Math.floor(
        positiveNumber(
          raw.maxConcurrentActors,
          defaultProjectConfig.maxConcurrentActors,
        ),
      ),
    ),
    negotiation: {
      disputeThreshold: positiveNumber(
        negotiation.disputeThreshold,
        defaultProjectConfig.negotiation.disputeThreshold,
      ),
    },
    server: server.socketPath
      ? { ...server, socketPath: path.resolve(cwd, server.socketPath) }
      : server,
  };
};

const unwrapDefault = (loaded: unknown): unknown =>
  isRecord(loaded) && "default" in loaded ? (loaded.default ?? loaded) : loaded;

export const loadProjectConfig = async (
  cwd: string,
  logger?: Logger,
): Promise<ProjectConfig> => {
  const tsPath = path.join(cwd, ".council", "project.ts");
  if (fs.existsSync(tsPath)) {
    const jiti = createJiti(import.meta.url);
    try {
      return normalizeProjectConfig(unwrapDefault(await jiti.import(tsPath)), cwd);
    } catch (error) {
      logger?.warn("project.ts failed to load; using defaults", {
        path: tsPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return normalizeProjectConfig({}, cwd);
    }
  }

  const jsonPath = path.join(cwd, ".council", "project.json");
  if (!fs.existsSync(jsonPath)) {
    return normalizeProjectConfig({}, cwd);
  }

  const parsed = JSON.parse(fs.readFileSync(jsonPath, "utf8")) as unknown;
  return normalizeProjectConfig(parsed, cwd);
};
