import { describe, expect, it, vi } from "vitest";
import {
  type Actor,
  type ActorContext,
  type ActorOutput,
  type Observation,
  emptyMemory,
} from "../src/actors/actor";
import { AgentManager, type AgentManagerOptions, Semaphore } from "../src/actors/agent-manager";
import { RuleBasedDeliberator } from "../src/actors/rule-based-deliberator";
import { RunCancelledError } from "../src/core/errors";
import { silentLogger } from "../src/core/logger";
import { Mailbox } from "../src/core/mailbox";
import {
  type DepartmentCode,
  asAgentId,
  asRunId,
  deepFreeze,
} from "../src/core/types";
import { ToolGateway } from "../src/tools/tool-gateway";
import { issue, memo, profiles } from "./helpers";

const runId = asRunId("run-1");
const mailbox = new Mailbox(runId);

const observation: Observation = deepFreeze({
  run_id: runId,
  stage: "department_memos",
  issue: issue(),
  memos: [],
  messages: [],
  task: { kind: "memo" },
});

const output = (department: DepartmentCode): ActorOutput => ({
  kind: "memo",
  memo: memo(department, "support", ["budget"]),
});

const fakeActor = (
  department: DepartmentCode,
  step: (observation: Observation, context: ActorContext) => Promise<ActorOutput>,
): Actor => ({
  id: asAgentId(department),
  kind: "department",
  department,
  step,
  memory: emptyMemory,
});

const manager = (overrides: Partial<AgentManagerOptions> = {}) =>
  new AgentManager({
    retry: { attempts: 2, backoffMs: 1 },
    stageTimeoutMs: 1_000,
    maxConcurrent: 4,
    logger: silentLogger(),
    createContext: (actor, signal) => ({
      actorId: actor.id,
      deliberator: new RuleBasedDeliberator(profiles),
      tools: new ToolGateway({ enableSentiment: false }),
      mailbox,
      settings: { model: "council-default", temperature: 0.7, enableSearch: false },
      signal,
      mailboxWaitMs: 5,
      report: () => {},
    }),
    ...overrides,
  });

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Step that records how many steps overlap while it runs. */
const overlapTracker = () => {
  let active = 0;
  let peak = 0;
  return {
    peak: () => peak,
    step: (department: DepartmentCode) => async (): Promise<ActorOutput> => {
      active += 1;
      peak = Math.max(peak, active);
      await sleep(10);
      active -= 1;
      return output(department);
    },
  };
};

describe("AgentManager", () => {
  it("retries a failing step and keeps the first success", async () => {
    const step = vi
      .fn<() => Promise<ActorOutput>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValue(output("finance"));
    const actor = fakeActor("finance", step);

    const result = await manager().runTurn(
      "department_memos",
      [{ actor, observe: () => observation }],
      new AbortController().signal,
    );

    expect(step).toHaveBeenCalledTimes(3);
    expect(result.outputs.get(actor.id)).toEqual(output("finance"));
    expect(result.unavailable).toEqual([]);
  });

  it("reports an actor unavailable once retries are exhausted", async () => {
    const failing = fakeActor("environment", async () => {
      throw new Error("model offline");
    });
    const working = fakeActor("finance", async () => output("finance"));

    const result = await manager().runTurn(
      "department_memos",
      [
        { actor: failing, observe: () => observation },
        { actor: working, observe: () => observation },
      ],
      new AbortController().signal,
    );

    expect([...result.outputs.keys()]).toEqual(["finance"]);
    expect(result.unavailable).toEqual([
      {
        actor_id: "environment",
        department: "environment",
        stage: "department_memos",
        reason: "failed after 3 attempts: model offline",
      },
    ]);
  });

  it("gives up on actors that outlast the stage timeout", async () => {
    const stuck = fakeActor("legal", () => new Promise<ActorOutput>(() => {}));

    const result = await manager({ stageTimeoutMs: 20 }).runTurn(
      "legal_gate",
      [{ actor: stuck, observe: () => observation }],
      new AbortController().signal,
    );

    expect(result.outputs.size).toBe(0);
    expect(result.unavailable.map((entry) => entry.reason)).toEqual([
      "legal_gate turn timed out after 20ms",
    ]);
  });

  it("rejects the whole turn when the run is cancelled", async () => {
    const run = new AbortController();
    const stuck = fakeActor("legal", () => new Promise<ActorOutput>(() => {}));

    const turn = manager().runTurn(
      "legal_gate",
      [{ actor: stuck, observe: () => observation }],
      run.signal,
    );
    run.abort(new RunCancelledError("test cancel"));

    await expect(turn).rejects.toBeInstanceOf(RunCancelledError);
  });

  it("never runs two turns of one actor at the same time", async () => {
    const tracker = overlapTracker();
    const actor = fakeActor("finance", tracker.step("finance"));
    const agents = manager();

    await Promise.all([
      agents.runTurn("negotiation", [{ actor, observe: () => observation }], new AbortController().signal),
      agents.runTurn("negotiation", [{ actor, observe: () => observation }], new AbortController().signal),
    ]);

    expect(tracker.peak()).toBe(1);
  });

  it("runs distinct actors concurrently up to the limit", async () => {
    const departments: DepartmentCode[] = ["finance", "industry", "environment"];
    const run = async (maxConcurrent: number) => {
      const tracker = overlapTracker();
      await manager({ maxConcurrent }).runTurn(
        "department_memos",
        departments.map((department) => ({
          actor: fakeActor(department, tracker.step(department)),
          observe: () => observation,
        })),
        new AbortController().signal,
      );
      return tracker.peak();
    };

    expect(await run(3)).toBe(3);
    expect(await run(1)).toBe(1);
  });
});

describe("Semaphore", () => {
  it("serves waiters in arrival order", async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];
    await semaphore.acquire();

    const first = semaphore.acquire().then(() => order.push("first"));
    const second = semaphore.acquire().then(() => order.push("second"));
    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(["first", "second"]);
  });
});
