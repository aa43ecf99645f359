import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { NotFoundError, ValidationError } from "../src/core/errors";
import { defaultRunConfig } from "../src/core/run-config";
import { FileRunStore, artifactKind } from "../src/core/run-store";
import { type RunEvent, type RunSnapshot, asIssueId, asRunId } from "../src/core/types";
import { issue, tempDir } from "./helpers";

const snapshot = (id: string, createdAt: string): RunSnapshot => ({
  run: {
    run_id: asRunId(id),
    issue_id: asIssueId("test-issue"),
    stage: "issue_intake",
    status: "running",
    config: defaultRunConfig(),
    created_at: createdAt,
    updated_at: createdAt,
  },
  issue: issue(),
  memos: [],
  unavailable: [],
  disputes: [],
  rounds: [],
  gate_results: [],
  artifacts: [],
});

const store = () => {
  const runStore = new FileRunStore(path.join(tempDir("council-store-"), "runs"));
  runStore.ensure();
  return runStore;
};

describe("FileRunStore", () => {
  it("round-trips the latest snapshot and lists runs oldest first", () => {
    const runs = store();
    runs.saveSnapshot(snapshot("run-b", "2026-02-01T00:00:00.000Z"));
    runs.saveSnapshot(snapshot("run-a", "2026-03-01T00:00:00.000Z"));
    const updated = snapshot("run-b", "2026-02-01T00:00:00.000Z");
    updated.run.status = "completed";
    runs.saveSnapshot(updated);

    expect(runs.loadSnapshot(asRunId("run-b"))?.run.status).toBe("completed");
    expect(runs.loadSnapshot(asRunId("run-z"))).toBeNull();
    expect(runs.listRuns().map((run) => [run.run_id, run.status, run.issue_title])).toEqual([
      ["run-b", "completed", "Test issue"],
      ["run-a", "running", "Test issue"],
    ]);
    expect(fs.existsSync(`${runs.statePath(asRunId("run-b"))}.tmp`)).toBe(false);
  });

  it("appends events to the trace in order", () => {
    const runs = store();
    const runId = asRunId("run-1");
    const events: RunEvent[] = [
      {
        seq: 1,
        type: "stage_change",
        run_id: runId,
        timestamp: "2026-01-01T00:00:00.000Z",
        payload: { from: null, to: "issue_intake" },
      },
      {
        seq: 2,
        type: "completed",
        run_id: runId,
        timestamp: "2026-01-01T00:00:01.000Z",
        payload: { status: "completed", approved: true },
      },
    ];
    for (const event of events) {
      runs.appendEvent(event);
    }

    expect(runs.loadTrace(runId)).toEqual(events);
    expect(runs.loadTrace(asRunId("run-2"))).toEqual([]);
  });

  it("rejects a trace with events of an unknown type", () => {
    const runs = store();
    const runId = asRunId("run-1");
    runs.appendEvent({
      seq: 1,
      type: "stage_change",
      run_id: runId,
      timestamp: "2026-01-01T00:00:00.000Z",
      payload: { from: null, to: "issue_intake" },
    });
    fs.appendFileSync(
      runs.tracePath(runId),
      `${JSON.stringify({ seq: 2, type: "heartbeat", run_id: runId, payload: {} })}\n`,
    );

    expect(() => runs.loadTrace(runId)).toThrow(ValidationError);
    expect(() => runs.loadTrace(runId)).toThrow(
      "Trace of run run-1 has unknown event types: #2: heartbeat",
    );
  });

  it("writes, filters and reads artifacts", () => {
    const runs = store();
    const runId = asRunId("run-1");
    const record = runs.writeArtifact(runId, "final_decision.json", '{"approved":true}');
    runs.writeArtifact(runId, "execution_plan.md", "# Plan\n");
    runs.writeArtifact(runId, "transcript.md", "# Transcript\n");

    expect(record).toMatchObject({ name: "final_decision.json", kind: "json", size_bytes: 17 });
    expect(runs.listArtifacts(runId).map((entry) => entry.name)).toEqual([
      "execution_plan.md",
      "final_decision.json",
      "transcript.md",
    ]);
    expect(runs.listArtifacts(runId, "*.md").map((entry) => entry.name)).toEqual([
      "execution_plan.md",
      "transcript.md",
    ]);
    expect(runs.readArtifact(runId, "execution_plan.md").toString("utf8")).toBe("# Plan\n");
    expect(runs.listArtifacts(asRunId("run-2"))).toEqual([]);
  });

  it("refuses artifact names that leave the artifacts directory", () => {
    const runs = store();
    const runId = asRunId("run-1");

    expect(() => runs.writeArtifact(runId, "../state.json", "{}")).toThrow(ValidationError);
    expect(() => runs.readArtifact(runId, "..")).toThrow(ValidationError);
    expect(() => runs.readArtifact(runId, "sub/file.txt")).toThrow(ValidationError);
    expect(() => runs.readArtifact(runId, "missing.txt")).toThrow(NotFoundError);
  });

  it("deletes a run with its trace and artifacts", () => {
    const runs = store();
    const runId = asRunId("run-1");
    runs.saveSnapshot(snapshot("run-1", "2026-02-01T00:00:00.000Z"));
    runs.writeArtifact(runId, "transcript.md", "# Transcript\n");

    runs.deleteRun(runId);

    expect(fs.existsSync(runs.runDir(runId))).toBe(false);
    expect(runs.listRuns()).toEqual([]);
    expect(() => runs.deleteRun(runId)).toThrow(NotFoundError);
    expect(() => runs.deleteRun(asRunId("../runs"))).toThrow(ValidationError);
  });

  it("infers the artifact kind from the extension", () => {
    expect(artifactKind("plan.json")).toBe("json");
    expect(artifactKind("plan.md")).toBe("markdown");
    expect(artifactKind("notes")).toBe("text");
  });
});
