import { describe, expect, it } from "vitest";
import { type ActorContext, OFFICE_ID, type Observation } from "../src/actors/actor";
import { createDepartmentActor } from "../src/actors/department-actor";
import { RuleBasedDeliberator } from "../src/actors/rule-based-deliberator";
import { Mailbox } from "../src/core/mailbox";
import {
  type Dispute,
  type Memo,
  type MessageType,
  asAgentId,
  asDisputeId,
  asRunId,
  deepFreeze,
} from "../src/core/types";
import { ToolGateway } from "../src/tools/tool-gateway";
import { issue, memo, policyCard, profiles } from "./helpers";

const runId = asRunId("run-1");
const finance = asAgentId("finance");

const dispute: Dispute = {
  id: asDisputeId("dispute-budget"),
  topic: "budget",
  departments: ["finance", "industry"],
  positions: { finance: "oppose", industry: "support" },
  severity: 0.3,
  status: "resolving",
  opened_round: 0,
};

const setup = () => {
  const mailbox = new Mailbox(runId);
  mailbox.register(finance);
  mailbox.register(OFFICE_ID);
  const context: ActorContext = {
    actorId: finance,
    deliberator: new RuleBasedDeliberator(profiles),
    tools: new ToolGateway({ enableSentiment: false }),
    mailbox,
    settings: { model: "council-default", temperature: 0.7, enableSearch: false },
    signal: new AbortController().signal,
    mailboxWaitMs: 5,
    report: () => undefined,
  };
  const fromOffice = (type: MessageType, payload: unknown) =>
    mailbox.send({ from: OFFICE_ID, to: finance, type, payload });
  const revise = (own: Memo): Observation =>
    deepFreeze({
      run_id: runId,
      stage: "negotiation",
      issue: issue(),
      policy_card: policyCard(),
      memos: [own],
      messages: mailbox.drain(finance),
      task: { kind: "revision", round: 1, disputes: [dispute] },
    });
  return { mailbox, context, fromOffice, revise };
};

describe("department actor", () => {
  it("answers a rebuttal request it does not concede by restating its stance", async () => {
    const { mailbox, context, fromOffice, revise } = setup();
    fromOffice("rebuttal_request", {
      dispute_id: "dispute-budget",
      topic: "budget",
      positions: { finance: "oppose", industry: "support" },
    });
    const actor = createDepartmentActor(profiles.finance);

    const output = await actor.step(revise(memo("finance", "oppose", ["budget"])), context);

    expect(output).toMatchObject({
      kind: "memo",
      memo: {
        stance: "oppose",
        revision: 1,
        rationale: "finance is oppose; maintained oppose on budget in round 1",
      },
    });
    expect(mailbox.pendingCount(finance)).toBe(0);
    expect(mailbox.pendingCount(OFFICE_ID)).toBe(0);
  });

  it("offers the office a concession when mediation moves its stance", async () => {
    const { mailbox, context, fromOffice, revise } = setup();
    fromOffice("rebuttal_request", {
      dispute_id: "dispute-budget",
      topic: "budget",
      positions: { finance: "oppose", industry: "support" },
    });
    fromOffice("mediation_proposal", {
      dispute_id: "dispute-budget",
      topic: "budget",
      departments: ["finance", "industry"],
      proposal: "budget: phased approach agreed between finance and industry",
      suggested_stance: "conditional",
    });
    const actor = createDepartmentActor(profiles.finance);

    const output = await actor.step(revise(memo("finance", "oppose", ["budget"])), context);

    expect(output).toMatchObject({
      kind: "memo",
      memo: {
        stance: "conditional",
        confidence: 0.85,
        rationale: "finance is oppose; accepted mediation on budget in round 1",
        recommendations: ["budget: phased approach agreed between finance and industry"],
      },
    });
    expect(mailbox.pendingCount(finance)).toBe(0);
    expect(mailbox.drain(OFFICE_ID).map((message) => [message.type, message.payload])).toEqual([
      ["concession_offer", { department: "finance", from: "oppose", to: "conditional", revision: 1 }],
    ]);
  });
});
