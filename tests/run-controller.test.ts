import { describe, expect, it } from "vitest";
import type { MemoPrompt, MemoDraft, RulingDraft, RulingPrompt } from "../src/actors/deliberator";
import { RuleBasedDeliberator } from "../src/actors/rule-based-deliberator";
import { NotFoundError, RunCancelledError, ValidationError } from "../src/core/errors";
import { collectEvents } from "../src/core/event-stream";
import type { RunEvent } from "../src/core/types";
import { createHarness, profiles } from "./helpers";

const eventsOf = <K extends RunEvent["type"]>(events: readonly RunEvent[], type: K) =>
  events.filter((event): event is Extract<RunEvent, { type: K }> => event.type === type);

class OfflineDepartmentDeliberator extends RuleBasedDeliberator {
  async draftMemo(prompt: MemoPrompt, signal?: AbortSignal): Promise<MemoDraft> {
    if (prompt.department === "environment") {
      throw new Error("model offline");
    }
    return super.draftMemo(prompt, signal);
  }
}

class OfflineDeciderDeliberator extends RuleBasedDeliberator {
  async rule(_prompt: RulingPrompt): Promise<RulingDraft> {
    throw new Error("ruling service down");
  }
}

class BlockingDeliberator extends RuleBasedDeliberator {
  draftMemo(_prompt: MemoPrompt, signal?: AbortSignal): Promise<MemoDraft> {
    return new Promise((_resolve, reject) => {
      signal?.addEventListener("abort", () => reject(new RunCancelledError()), { once: true });
    });
  }
}

const dataSharingIssue = {
  id: "shared-records",
  title: "Shared citizen records",
  description: "Introduce data sharing between municipal registries",
  departments: ["finance", "legal"],
  constraints: { budget_ceiling: 1_000_000_000, legal_requirements: [] },
  policy_seed: {
    estimated_budget: 200_000_000,
    key_measures: ["Link registry databases"],
  },
};

describe("RunController", () => {
  it("takes an issue through every stage to an approved decision", async () => {
    const { controller } = await createHarness();
    const runId = controller.createRun("ev-charging-rollout");
    const events = await collectEvents(controller.subscribe(runId, "start"));
    const snapshot = await controller.waitForRun(runId);

    expect(runId).toMatch(/^ev-charging-rollout-[A-Za-z0-9_-]{8}$/);
    expect(snapshot.run.status).toBe("completed");
    expect(snapshot.run.stage).toBe("execution_planning");
    expect(eventsOf(events, "stage_change").map((event) => event.payload.to)).toEqual([
      "issue_intake",
      "department_memos",
      "dispute_aggregation",
      "negotiation",
      "legal_gate",
      "fiscal_gate",
      "final_ruling",
      "execution_planning",
    ]);
    expect(events.map((event) => event.seq)).toEqual(events.map((_, index) => index + 1));
    expect(events.at(-1)).toMatchObject({
      type: "completed",
      payload: { status: "completed", approved: true },
    });

    expect(snapshot.policy_card).toMatchObject({
      title: "Public electric vehicle charging rollout",
      summary:
        "Install public chargers at municipal car parks and curbside locations, co-funded with private operators. Urgency: medium.",
      estimated_budget: 350_000_000,
    });
    expect(
      snapshot.memos.map((memo) => [memo.department, memo.stance, memo.confidence, memo.revision]),
    ).toEqual([
      ["finance", "conditional", 0.85, 2],
      ["industry", "conditional", 0.75, 2],
      ["environment", "support", 0.75, 0],
    ]);

    expect(snapshot.disputes).toMatchObject([
      {
        id: "dispute-budget",
        departments: ["finance", "industry"],
        severity: 0.61,
        status: "resolved",
        resolved_round: 2,
      },
    ]);
    expect(
      eventsOf(events, "negotiation_round").map((event) => event.payload),
    ).toEqual([
      { round: 1, convergence_score: 0.4167, resolved_this_round: [], remaining: 1 },
      {
        round: 2,
        convergence_score: 0.83,
        resolved_this_round: ["dispute-budget"],
        remaining: 0,
        stop_reason: "no_open_disputes",
      },
    ]);

    expect(snapshot.gate_results.map((result) => [result.gate, result.verdict])).toEqual([
      ["legal", "conditional-pass"],
      ["fiscal", "conditional-pass"],
    ]);
    expect(snapshot.decision).toMatchObject({
      approved: true,
      auto_rejected: false,
      policy_text:
        "Public electric vehicle charging rollout. Measures: Install 4,000 curbside chargers; Co-funding scheme for private charging operators.",
      rationale: "1 support, 2 conditional, 0 oppose across 3 department memos.",
      conditions: [
        "Obtain a legal review before implementation",
        "phased approach agreed between finance and industry",
      ],
    });
    expect(
      snapshot.execution_plan?.steps.map((step) => [step.order, step.owner, step.deadline_offset_days]),
    ).toEqual([
      [1, "finance", 30],
      [2, "finance", 60],
      [3, "finance", 420],
      [4, "industry", 780],
    ]);
    expect(snapshot.artifacts.map((artifact) => artifact.name)).toEqual([
      "final_decision.json",
      "execution_plan.json",
      "execution_plan.md",
      "transcript.md",
    ]);
  });

  it("reports agent activity as tool_call events", async () => {
    const { controller } = await createHarness();
    const runId = controller.createRun("ev-charging-rollout");
    const events = await collectEvents(controller.subscribe(runId, "start"));

    const calls = eventsOf(events, "tool_call");
    expect(calls.some((event) => event.actor_id === "office" && event.payload.name === "impact_estimate")).toBe(true);
    expect(
      calls.filter(
        (event) =>
          event.actor_id === "office" &&
          event.payload.name === "send" &&
          event.payload.detail?.type === "mediation_proposal",
      ),
    ).toHaveLength(4);
    const officeMail = calls
      .filter((event) => event.payload.name === "send" && event.payload.detail?.to === "office")
      .map((event) => event.payload.detail?.message_id);
    const officeAcks = calls
      .filter((event) => event.actor_id === "office" && event.payload.name === "ack")
      .map((event) => event.payload.detail?.message_id);
    expect(officeAcks).toEqual(officeMail);
    expect(eventsOf(events, "memo_ready").map((event) => event.actor_id)).toEqual([
      "finance",
      "industry",
      "environment",
      "finance",
      "industry",
      "finance",
      "industry",
    ]);
  });

  it("serves finished runs from the store, including artifacts", async () => {
    const { controller } = await createHarness();
    const runId = controller.createRun("ev-charging-rollout");
    await controller.waitForRun(runId);

    expect(controller.getState(runId).run.status).toBe("completed");
    expect(controller.listRuns().map((run) => run.run_id)).toEqual([runId]);
    expect(controller.listArtifacts(runId, "execution_plan.*").map((entry) => entry.name)).toEqual([
      "execution_plan.json",
      "execution_plan.md",
    ]);

    const decision: unknown = JSON.parse(
      controller.fetchArtifact(runId, "final_decision.json").toString("utf8"),
    );
    expect(decision).toMatchObject({ approved: true, auto_rejected: false });
    expect(controller.fetchArtifact(runId, "execution_plan.md").toString("utf8")).toContain(
      "| 3 | finance | Install 4,000 curbside chargers | 420 |",
    );
  });

  it("replays a finished run exactly as it streamed live", async () => {
    const { controller } = await createHarness();
    const runId = controller.createRun("ev-charging-rollout");
    const live = await collectEvents(controller.subscribe(runId, "start"));
    await controller.waitForRun(runId);

    const replayed = await collectEvents(controller.subscribe(runId, "start"));
    expect(replayed).toEqual(live);
    expect(await collectEvents(controller.subscribe(runId, "now"))).toEqual([]);
  });

  it("rejects unknown issues, invalid configs and unknown runs", async () => {
    const { controller } = await createHarness();

    expect(() => controller.createRun("no-such-issue")).toThrow(ValidationError);
    expect(() => controller.createRun("ev-charging-rollout", { maxRounds: 0 })).toThrow(
      ValidationError,
    );
    expect(() => controller.getState("missing-run")).toThrow(NotFoundError);
    expect(() => controller.subscribe("missing-run")).toThrow(NotFoundError);
    expect(controller.listRuns()).toEqual([]);
  });

  it("auto-rejects when the legal gate fails", async () => {
    const { controller, catalog } = await createHarness();
    catalog.register(dataSharingIssue);

    const runId = controller.createRun("shared-records");
    const snapshot = await controller.waitForRun(runId);

    expect(snapshot.run.status).toBe("completed");
    expect(snapshot.memos.map((memo) => [memo.department, memo.stance])).toEqual([
      ["finance", "conditional"],
      ["legal", "oppose"],
    ]);
    expect(snapshot.rounds).toEqual([]);
    expect(snapshot.gate_results.map((result) => [result.gate, result.attempt, result.verdict])).toEqual([
      ["legal", 1, "fail"],
      ["fiscal", 1, "conditional-pass"],
    ]);
    expect(snapshot.decision?.approved).toBe(false);
    expect(snapshot.decision?.auto_rejected).toBe(true);
    expect(snapshot.decision?.rationale).toMatch(
      /^Rejected by the legal gate\. Findings: legal gate: legal department opposes: Legal Affairs Office/,
    );
    expect(snapshot.execution_plan).toBeUndefined();
    expect(snapshot.artifacts.map((artifact) => artifact.name)).toEqual([
      "final_decision.json",
      "transcript.md",
    ]);
  });

  it("re-reviews a failed gate once after remediation when enabled", async () => {
    const { controller, catalog } = await createHarness();
    catalog.register(dataSharingIssue);

    const runId = controller.createRun("shared-records", { remediate_gates: true });
    const events = await collectEvents(controller.subscribe(runId, "start"));
    const snapshot = await controller.waitForRun(runId);

    expect(snapshot.gate_results.map((result) => [result.gate, result.attempt, result.verdict])).toEqual([
      ["legal", 1, "fail"],
      ["legal", 2, "conditional-pass"],
      ["fiscal", 1, "conditional-pass"],
    ]);
    expect(snapshot.memos.find((memo) => memo.department === "legal")).toMatchObject({
      stance: "conditional",
      revision: 1,
    });
    expect(
      eventsOf(events, "tool_call").some(
        (event) =>
          event.actor_id === "office" && event.payload.detail?.type === "remediation_request",
      ),
    ).toBe(true);
    expect(snapshot.decision).toMatchObject({
      approved: true,
      conditions: [
        "publish an enabling regulation before rollout",
        "release funds in tranches tied to delivery milestones",
      ],
    });
  });

  it("completes without a department that stays unavailable", async () => {
    const { controller } = await createHarness(new OfflineDepartmentDeliberator(profiles));
    const runId = controller.createRun("ev-charging-rollout");
    const events = await collectEvents(controller.subscribe(runId, "start"));
    const snapshot = await controller.waitForRun(runId);

    expect(snapshot.run.status).toBe("completed");
    expect(snapshot.unavailable).toEqual([
      {
        actor_id: "environment",
        department: "environment",
        stage: "department_memos",
        reason: "failed after 3 attempts: model offline",
      },
    ]);
    expect(eventsOf(events, "error").map((event) => event.payload)).toEqual([
      {
        message:
          "environment unavailable during department_memos: failed after 3 attempts: model offline",
        fatal: false,
        stage: "department_memos",
      },
    ]);
    expect(snapshot.memos.map((memo) => memo.department)).toEqual(["finance", "industry"]);
    expect(snapshot.decision?.approved).toBe(true);
    expect(snapshot.decision?.rationale).toContain(
      "Unavailable contributions: environment (department_memos: failed after 3 attempts: model offline).",
    );
    expect(snapshot.execution_plan?.steps.map((step) => step.owner)).not.toContain("environment");
  });

  it("fails the run when the decider cannot rule", async () => {
    const { controller } = await createHarness(new OfflineDeciderDeliberator(profiles));
    const runId = controller.createRun("ev-charging-rollout");
    const events = await collectEvents(controller.subscribe(runId, "start"));
    const snapshot = await controller.waitForRun(runId);

    expect(snapshot.run.status).toBe("failed");
    expect(snapshot.run.error).toBe(
      "decider unavailable: failed after 3 attempts: ruling service down",
    );
    expect(snapshot.decision).toBeUndefined();
    expect(events.at(-1)).toMatchObject({
      type: "error",
      payload: {
        message: "decider unavailable: failed after 3 attempts: ruling service down",
        fatal: true,
        stage: "final_ruling",
      },
    });
  });

  it("cancels a live run and closes its stream with a fatal error", async () => {
    const { controller } = await createHarness(new BlockingDeliberator(profiles));
    const runId = controller.createRun("ev-charging-rollout");

    const events: RunEvent[] = [];
    for await (const event of controller.subscribe(runId, "start")) {
      events.push(event);
      if (event.type === "stage_change" && event.payload.to === "department_memos") {
        controller.cancel(runId, "test cancel");
      }
    }
    const snapshot = await controller.waitForRun(runId);

    expect(snapshot.run.status).toBe("cancelled");
    expect(snapshot.run.error).toBe("test cancel");
    expect(snapshot.memos).toEqual([]);
    expect(events.at(-1)).toMatchObject({
      type: "error",
      payload: { message: "test cancel", fatal: true, cancelled: true, stage: "department_memos" },
    });
    expect(controller.cancel(runId).run.status).toBe("cancelled");
  });

  it("deletes finished runs and refuses live ones", async () => {
    const blocked = await createHarness(new BlockingDeliberator(profiles));
    const liveRun = blocked.controller.createRun("ev-charging-rollout");
    expect(() => blocked.controller.deleteRun(liveRun)).toThrow(ValidationError);
    await blocked.controller.shutdown();

    const { controller } = await createHarness();
    const runId = controller.createRun("ev-charging-rollout");
    await controller.waitForRun(runId);

    controller.deleteRun(runId);

    expect(() => controller.getState(runId)).toThrow(NotFoundError);
    expect(controller.listRuns()).toEqual([]);
    expect(() => controller.deleteRun(runId)).toThrow(NotFoundError);
  });

  it("cancels live runs on shutdown", async () => {
    const { controller } = await createHarness(new BlockingDeliberator(profiles));
    const runId = controller.createRun("ev-charging-rollout");

    await controller.shutdown();

    expect(controller.getState(runId).run).toMatchObject({
      status: "cancelled",
      error: "controller shutting down",
    });
  });
});
