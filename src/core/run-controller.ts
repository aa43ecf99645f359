import { nanoid } from "nanoid";
import type { Deliberator } from "../actors/deliberator";
import type { ProjectConfig } from "../project/config";
import type { DepartmentProfiles } from "../project/departments";
import type { IssueCatalog } from "../project/issues";
import { NotFoundError, ValidationError, errorMessage } from "./errors";
import { EventStream, type EventSubscription, type SubscribeFrom } from "./event-stream";
import { type Logger, silentLogger } from "./logger";
import { resolveRunConfig } from "./run-config";
import { type RunStore, summarizeRun } from "./run-store";
import { StageOrchestrator } from "./stage-orchestrator";
import {
  type ArtifactRecord,
  type Issue,
  type Run,
  type RunId,
  type RunSnapshot,
  type RunSummary,
  STAGES,
  asRunId,
} from "./types";

export interface RunControllerDeps {
  catalog: IssueCatalog;
  store: RunStore;
  profiles: DepartmentProfiles;
  deliberator: Deliberator;
  config: ProjectConfig;
  logger?: Logger;
}

interface LiveRun {
  orchestrator: StageOrchestrator;
  done: Promise<RunSnapshot>;
}

/**
 * Entry point for callers. Validates requests, owns the set of live runs
 * and serves state, events and artifacts for live and stored runs alike.
 */
export class RunController {
  private readonly live = new Map<RunId, LiveRun>();
  private readonly logger: Logger;

  constructor(private readonly deps: RunControllerDeps) {
    this.logger = (deps.logger ?? silentLogger()).child("controller");
  }

  listIssues(): Issue[] {
    return this.deps.catalog.list();
  }

  createRun(issueId: string, config?: unknown): RunId {
    const issue = this.deps.catalog.get(issueId);
    if (!issue) {
      throw new ValidationError(`Unknown issue: ${issueId}`, [issueId]);
    }
    const runConfig = resolveRunConfig(config, this.deps.config.runDefaults);

    const now = new Date().toISOString();
    const run: Run = {
      run_id: asRunId(`${issue.id}-${nanoid(8)}`),
      issue_id: issue.id,
      stage: STAGES[0],
      status: "running",
      config: runConfig,
      created_at: now,
      updated_at: now,
    };

    const orchestrator = new StageOrchestrator({
      run,
      issue,
      store: this.deps.store,
      deliberator: this.deps.deliberator,
      profiles: this.deps.profiles,
      settings: this.deps.config,
      logger: this.deps.logger ?? silentLogger(),
    });
    const done = orchestrator.run().finally(() => {
      this.live.delete(run.run_id);
    });
    this.live.set(run.run_id, { orchestrator, done });
    this.logger.info("run created", { run: run.run_id, issue: issue.id });
    return run.run_id;
  }

  getState(runId: string): RunSnapshot {
    const live = this.live.get(asRunId(runId));
    if (live) {
      return live.orchestrator.snapshot();
    }
    const stored = this.deps.store.loadSnapshot(asRunId(runId));
    if (!stored) {
      throw new NotFoundError(`Unknown run: ${runId}`);
    }
    return stored;
  }

  listRuns(): RunSummary[] {
    const stored = new Map(
      this.deps.store.listRuns().map((summary) => [summary.run_id, summary]),
    );
    for (const [runId, entry] of this.live) {
      stored.set(runId, summarizeRun(entry.orchestrator.snapshot()));
    }
    return [...stored.values()].sort((a, b) =>
      a.created_at.localeCompare(b.created_at),
    );
  }

  /** Replay from the persisted trace once a run is no longer live. */
  subscribe(runId: string, from: SubscribeFrom = "start"): EventSubscription {
    const live = this.live.get(asRunId(runId));
    if (live) {
      return live.orchestrator.stream.subscribe(from);
    }
    const snapshot = this.getState(runId);
    const trace = this.deps.store.loadTrace(snapshot.run.run_id);
    return EventStream.replayOnly(snapshot.run.run_id, trace).subscribe(from);
  }

  listArtifacts(runId: string, pattern?: string): ArtifactRecord[] {
    const snapshot = this.getState(runId);
    return this.deps.store.listArtifacts(snapshot.run.run_id, pattern);
  }

  fetchArtifact(runId: string, name: string): Buffer {
    const snapshot = this.getState(runId);
    return this.deps.store.readArtifact(snapshot.run.run_id, name);
  }

  cancel(runId: string, reason?: string): RunSnapshot {
    const live = this.live.get(asRunId(runId));
    if (!live) {
      return this.getState(runId);
    }
    live.orchestrator.cancel(reason);
    return live.orchestrator.snapshot();
  }

  /** Deletes a finished run's stored state, trace and artifacts. */
  deleteRun(runId: string): void {
    if (this.live.has(asRunId(runId))) {
      throw new ValidationError("Run is still live; cancel it first", [runId]);
    }
    this.deps.store.deleteRun(asRunId(runId));
    this.logger.info("run deleted", { run: runId });
  }

  /** Resolves with the final snapshot once the run reaches a terminal status. */
  async waitForRun(runId: string): Promise<RunSnapshot> {
    const live = this.live.get(asRunId(runId));
    if (live) {
      return live.done;
    }
    return this.getState(runId);
  }

  async shutdown(): Promise<void> {
    const pending = [...this.live.values()];
    for (const entry of pending) {
      entry.orchestrator.cancel("controller shutting down");
    }
    const settled = await Promise.allSettled(pending.map((entry) => entry.done));
    for (const result of settled) {
      if (result.status === "rejected") {
        this.logger.error("run did not shut down cleanly", {
          error: errorMessage(result.reason),
        });
      }
    }
  }
}
