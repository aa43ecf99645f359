import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { NotFoundError, ValidationError } from "./errors";
import {
  type ArtifactKind,
  type ArtifactRecord,
  type RunEvent,
  type RunId,
  type RunSnapshot,
  type RunSummary,
  isEventType,
} from "./types";

export interface RunStore {
  saveSnapshot(snapshot: RunSnapshot): void;
  loadSnapshot(runId: RunId): RunSnapshot | null;
  appendEvent(event: RunEvent): void;
  loadTrace(runId: RunId): RunEvent[];
  writeArtifact(
    runId: RunId,
    name: string,
    content: string,
  ): ArtifactRecord;
  listArtifacts(runId: RunId, pattern?: string): ArtifactRecord[];
  readArtifact(runId: RunId, name: string): Buffer;
  listRuns(): RunSummary[];
  deleteRun(runId: RunId): void;
}

const SAFE_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const isSafeName = (name: string): boolean => SAFE_NAME.test(name) && !name.includes("..");

export const artifactKind = (name: string): ArtifactKind => {
  switch (path.extname(name)) {
    case ".json":
      return "json";
    case ".md":
      return "markdown";
    default:
      return "text";
  }
};

export const assertArtifactName = (name: string): void => {
  if (!isSafeName(name)) {
    throw new ValidationError("Invalid artifact name", [name]);
  }
};

export const assertRunId = (runId: string): void => {
  if (!isSafeName(runId)) {
    throw new ValidationError("Invalid run id", [runId]);
  }
};

export const summarizeRun = (snapshot: RunSnapshot): RunSummary => ({
  run_id: snapshot.run.run_id,
  issue_id: snapshot.run.issue_id,
  issue_title: snapshot.issue.title,
  stage: snapshot.run.stage,
  status: snapshot.run.status,
  created_at: snapshot.run.created_at,
});

/**
 * One directory per run: `state.json` (rewritten atomically after every
 * stage), `trace.jsonl` (one event per line, append-only) and `artifacts/`.
 */
export class FileRunStore implements RunStore {
  constructor(private readonly rootDir: string) {}

  ensure(): void {
    fs.mkdirSync(this.rootDir, { recursive: true });
  }

  runDir(runId: RunId): string {
    return path.join(this.rootDir, runId);
  }

  statePath(runId: RunId): string {
    return path.join(this.runDir(runId), "state.json");
  }

  tracePath(runId: RunId): string {
    return path.join(this.runDir(runId), "trace.jsonl");
  }

  artifactsDir(runId: RunId): string {
    return path.join(this.runDir(runId), "artifacts");
  }

  saveSnapshot(snapshot: RunSnapshot): void {
    const runId = snapshot.run.run_id;
    fs.mkdirSync(this.runDir(runId), { recursive: true });
    const target = this.statePath(runId);
    const temp = `${target}.tmp`;
    fs.writeFileSync(temp, JSON.stringify(snapshot, null, 2));
    fs.renameSync(temp, target);
  }

  loadSnapshot(runId: RunId): RunSnapshot | null {
    const file = this.statePath(runId);
    if (!fs.existsSync(file)) {
      return null;
    }

    return JSON.parse(fs.readFileSync(file, "utf8")) as RunSnapshot;
  }

  appendEvent(event: RunEvent): void {
    fs.mkdirSync(this.runDir(event.run_id), { recursive: true });
    fs.appendFileSync(this.tracePath(event.run_id), `${JSON.stringify(event)}\n`);
  }

  loadTrace(runId: RunId): RunEvent[] {
    const file = this.tracePath(runId);
    if (!fs.existsSync(file)) {
      return [];
    }

    const events = fs
      .readFileSync(file, "utf8")
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line) => JSON.parse(line) as RunEvent);
    const unrecognized = events.filter((event) => !isEventType(event.type));
    if (unrecognized.length > 0) {
      throw new ValidationError(
        `Trace of run ${runId} has unknown event types`,
        unrecognized.map((event) => `#${event.seq}: ${String(event.type)}`),
      );
    }
    return events;
  }

  writeArtifact(runId: RunId, name: string, content: string): ArtifactRecord {
    assertArtifactName(name);
    const dir = this.artifactsDir(runId);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, name), content);
    return {
      name,
      kind: artifactKind(name),
      size_bytes: Buffer.byteLength(content),
      created_at: new Date().toISOString(),
    };
  }

  listArtifacts(runId: RunId, pattern?: string): ArtifactRecord[] {
    const dir = this.artifactsDir(runId);
    if (!fs.existsSync(dir)) {
      return [];
    }

    return fs
      .readdirSync(dir)
      .filter((name) => !pattern || minimatch(name, pattern))
      .sort()
      .map((name) => {
        const stat = fs.statSync(path.join(dir, name));
        return {
          name,
          kind: artifactKind(name),
          size_bytes: stat.size,
          created_at: stat.mtime.toISOString(),
        };
      });
  }

  readArtifact(runId: RunId, name: string): Buffer {
    assertArtifactName(name);
    const file = path.join(this.artifactsDir(runId), name);
    if (!fs.existsSync(file)) {
      throw new NotFoundError(`Artifact ${name} not found for run ${runId}`);
    }
    return fs.readFileSync(file);
  }

  listRuns(): RunSummary[] {
    if (!fs.existsSync(this.rootDir)) {
      return [];
    }

    return fs
      .readdirSync(this.rootDir)
      .flatMap((entry) => {
        const stateFile = path.join(this.rootDir, entry, "state.json");
        if (!fs.existsSync(stateFile)) {
          return [];
        }
        return [
          summarizeRun(
            JSON.parse(fs.readFileSync(stateFile, "utf8")) as RunSnapshot,
          ),
        ];
      })
      .sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  /** Removes the run directory with its state, trace and artifacts. */
  deleteRun(runId: RunId): void {
    assertRunId(runId);
    const dir = this.runDir(runId);
    if (!fs.existsSync(dir)) {
      throw new NotFoundError(`Unknown run: ${runId}`);
    }
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
