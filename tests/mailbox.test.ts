import { describe, expect, it } from "vitest";
import { RunCancelledError } from "../src/core/errors";
import { Mailbox } from "../src/core/mailbox";
import { asAgentId, asRunId } from "../src/core/types";

const office = asAgentId("office");
const finance = asAgentId("finance");
const legal = asAgentId("legal");

const mailbox = () => {
  const box = new Mailbox(asRunId("run-1"));
  box.register(office);
  box.register(finance);
  box.register(legal);
  return box;
};

describe("Mailbox", () => {
  it("numbers messages per sender and keeps them until acknowledged", () => {
    const box = mailbox();
    const first = box.send({ from: office, to: finance, type: "rebuttal_request", payload: 1 });
    const second = box.send({ from: office, to: legal, type: "rebuttal_request", payload: 2 });
    const reply = box.send({ from: finance, to: office, type: "concession_offer", payload: 3 });

    expect([first.seq, second.seq, reply.seq]).toEqual([1, 2, 1]);
    expect(box.drain(finance).map((message) => message.id)).toEqual([first.id]);
    expect(box.drain(finance).map((message) => message.id)).toEqual([first.id]);

    box.ack(first.id);
    expect(box.drain(finance)).toEqual([]);
    expect(box.pendingCount(legal)).toBe(1);
  });

  it("preserves per-sender order in the inbox", () => {
    const box = mailbox();
    for (const payload of ["a", "b", "c"]) {
      box.send({ from: office, to: finance, type: "mediation_proposal", payload });
    }
    expect(box.drain(finance).map((message) => message.payload)).toEqual(["a", "b", "c"]);
  });

  it("treats a resend with the same id as the original message", () => {
    const box = mailbox();
    const first = box.send({
      id: "fixed-id",
      from: office,
      to: finance,
      type: "rebuttal_request",
      payload: "x",
    });
    const again = box.send({
      id: "fixed-id",
      from: office,
      to: finance,
      type: "rebuttal_request",
      payload: "y",
    });

    expect(again).toBe(first);
    expect(box.pendingCount(finance)).toBe(1);
  });

  it("dead-letters messages for unregistered recipients", () => {
    const box = mailbox();
    const message = box.send({
      from: office,
      to: asAgentId("security"),
      type: "rebuttal_request",
      payload: null,
    });

    expect(box.undelivered()).toEqual([message]);
    expect(box.transcript()).toEqual([message]);
  });

  it("wakes a waiting recipient when a message arrives", async () => {
    const box = mailbox();
    const waiting = box.waitFor(finance, 1_000);
    const message = box.send({ from: office, to: finance, type: "mediation_proposal", payload: {} });

    await expect(waiting).resolves.toEqual([message]);
  });

  it("resolves an idle wait with nothing after the timeout", async () => {
    const box = mailbox();
    await expect(box.waitFor(finance, 5)).resolves.toEqual([]);
  });

  it("rejects a wait when the signal aborts", async () => {
    const box = mailbox();
    const controller = new AbortController();
    const waiting = box.waitFor(finance, 1_000, controller.signal);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(RunCancelledError);
  });

  it("releases waiters on close and dead-letters later sends", async () => {
    const box = mailbox();
    const waiting = box.waitFor(finance, 1_000);
    box.close();

    await expect(waiting).resolves.toEqual([]);
    box.send({ from: office, to: finance, type: "rebuttal_request", payload: null });
    expect(box.undelivered()).toHaveLength(1);
    expect(box.pendingCount(finance)).toBe(0);
  });
});
