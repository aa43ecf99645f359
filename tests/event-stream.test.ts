import { describe, expect, it, vi } from "vitest";
import { EventStream, collectEvents } from "../src/core/event-stream";
import { asAgentId, asRunId } from "../src/core/types";

const runId = asRunId("run-1");

describe("EventStream", () => {
  it("assigns a 1-based sequence and persists every append", () => {
    const persisted = vi.fn();
    const stream = new EventStream(runId, persisted);

    const first = stream.append({
      type: "stage_change",
      payload: { from: null, to: "issue_intake" },
    });
    const second = stream.append({
      type: "tool_call",
      actor_id: asAgentId("office"),
      payload: { call: "phase", name: "observe" },
    });

    expect(first.seq).toBe(1);
    expect(second.seq).toBe(2);
    expect(second.actor_id).toBe("office");
    expect(second.run_id).toBe("run-1");
    expect(persisted).toHaveBeenCalledTimes(2);
    expect(persisted).toHaveBeenLastCalledWith(second);
  });

  it("replays the backlog then delivers live events without gaps", async () => {
    const stream = new EventStream(runId);
    stream.append({ type: "stage_change", payload: { from: null, to: "issue_intake" } });

    const subscription = stream.subscribe("start");
    const collected = collectEvents(subscription);
    stream.append({
      type: "stage_change",
      payload: { from: "issue_intake", to: "department_memos" },
    });
    stream.append({ type: "completed", payload: { status: "completed", approved: true } });

    const events = await collected;
    expect(events.map((event) => event.seq)).toEqual([1, 2, 3]);
    expect(stream.isClosed).toBe(true);
  });

  it("skips the backlog for subscribers joining now", async () => {
    const stream = new EventStream(runId);
    stream.append({ type: "stage_change", payload: { from: null, to: "issue_intake" } });

    const collected = collectEvents(stream.subscribe("now"));
    stream.append({
      type: "error",
      payload: { message: "boom", fatal: true, stage: "issue_intake" },
    });

    const events = await collected;
    expect(events.map((event) => event.type)).toEqual(["error"]);
  });

  it("does not close on a non-fatal error", () => {
    const stream = new EventStream(runId);
    stream.append({
      type: "error",
      payload: { message: "finance unavailable", fatal: false, stage: "department_memos" },
    });
    expect(stream.isClosed).toBe(false);
  });

  it("rejects appends after the terminator", () => {
    const stream = new EventStream(runId);
    stream.append({ type: "completed", payload: { status: "completed", approved: false } });

    expect(() =>
      stream.append({ type: "stage_change", payload: { from: null, to: "issue_intake" } }),
    ).toThrow("Event stream for run-1 is closed");
  });

  it("ends a subscription closed by its consumer", async () => {
    const stream = new EventStream(runId);
    const subscription = stream.subscribe("now");
    const pending = subscription.next();
    subscription.close();

    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    stream.append({ type: "stage_change", payload: { from: null, to: "issue_intake" } });
    await expect(subscription.next()).resolves.toEqual({ done: true, value: undefined });
  });

  it("serves a closed replay-only stream from its recorded events", async () => {
    const live = new EventStream(runId);
    live.append({ type: "stage_change", payload: { from: null, to: "issue_intake" } });
    live.append({ type: "completed", payload: { status: "completed", approved: true } });

    const replay = EventStream.replayOnly(runId, [...live.history()]);
    expect(await collectEvents(replay.subscribe("start"))).toEqual(live.history());
    expect(await collectEvents(replay.subscribe("now"))).toEqual([]);
  });
});
