import { ActorInvocationError } from "../core/errors";
import type {
  ConcessionOffer,
  DepartmentCode,
  Dispute,
  Issue,
  MediationProposal,
  Memo,
  Message,
  PolicyCard,
  Stage,
} from "../core/types";
import {
  type Actor,
  type ActorTask,
  OFFICE_ID,
  type PlannedAction,
  createActor,
  departmentAgentId,
  isConcessionOffer,
} from "./actor";

interface CoordinatorFocus {
  stage: Stage;
  issue: Issue;
  policy_card?: PolicyCard;
  memos: readonly Memo[];
  task: ActorTask;
  concessions: ConcessionOffer[];
  /** Every inbox message; the office acknowledges all it has read. */
  consumed: readonly Message[];
}

type CoordinatorThought =
  | {
      kind: "policy_card";
      trace: string;
      card: PolicyCard;
      tools: { tool: string; args: unknown }[];
    }
  | { kind: "rebuttals"; trace: string; disputes: readonly Dispute[] }
  | { kind: "mediation"; trace: string; proposals: MediationProposal[] }
  | { kind: "settlement"; trace: string; concessions: ConcessionOffer[] };

const LOW_SUPPORT_RATE = 0.5;

const uniqueDepartments = (disputes: readonly Dispute[]): DepartmentCode[] => [
  ...new Set(disputes.flatMap((dispute) => dispute.departments)),
];

/**
 * The office: drafts the policy card, requests rebuttals and mediates
 * disputes. Concession offers from departments feed the next mediation;
 * the settlement turn after negotiation reads the last of them.
 */
export const createCoordinatorActor = (): Actor =>
  createActor<CoordinatorFocus, CoordinatorThought>(
    { id: OFFICE_ID, kind: "coordinator" },
    {
      observe(observation) {
        return {
          stage: observation.stage,
          issue: observation.issue,
          ...(observation.policy_card
            ? { policy_card: observation.policy_card }
            : {}),
          memos: observation.memos,
          task: observation.task,
          concessions: observation.messages
            .filter((message) => message.type === "concession_offer")
            .map((message) => message.payload)
            .filter(isConcessionOffer),
          consumed: observation.messages,
        };
      },

      async think(focus, _memory, context) {
        const { task } = focus;
        switch (task.kind) {
          case "policy_card": {
            const card = await context.deliberator.draftPolicyCard(
              { issue: focus.issue, settings: context.settings },
              context.signal,
            );
            const tools: { tool: string; args: unknown }[] = [
              { tool: "impact_estimate", args: { policy_card: card, scenario: "baseline" } },
            ];
            if (context.tools.available().includes("public_opinion_sim")) {
              tools.push({
                tool: "public_opinion_sim",
                args: {
                  policy_card: card,
                  context: `${focus.issue.urgency} ${focus.issue.description}`,
                },
              });
            }
            return {
              kind: "policy_card",
              trace: `drafted policy card "${card.title}"`,
              card,
              tools,
            };
          }
          case "aggregate":
            return {
              kind: "rebuttals",
              trace: `${task.disputes.length} disputes need rebuttals`,
              disputes: task.disputes,
            };
          case "mediation": {
            const proposals = await context.deliberator.mediate(
              {
                issue: focus.issue,
                round: task.round,
                disputes: [...task.disputes],
                memos: [...focus.memos],
                concessions: focus.concessions,
                settings: context.settings,
              },
              context.signal,
            );
            return {
              kind: "mediation",
              trace: `round ${task.round}: ${proposals.length} mediation proposals`,
              proposals,
            };
          }
          case "settlement":
            return {
              kind: "settlement",
              trace: `negotiation settled with ${focus.concessions.length} concessions`,
              concessions: focus.concessions,
            };
          default:
            throw new ActorInvocationError(
              OFFICE_ID,
              focus.stage,
              `the office does not handle ${task.kind} tasks`,
            );
        }
      },

      plan(thought, focus) {
        const acks = focus.consumed.map(
          (message): PlannedAction => ({ kind: "ack", message_id: message.id }),
        );
        switch (thought.kind) {
          case "policy_card":
            return [
              ...acks,
              ...thought.tools.map(
                (use): PlannedAction => ({ kind: "tool", ...use }),
              ),
              { kind: "emit", output: "policy_card" },
            ];
          case "rebuttals":
            return [
              ...acks,
              ...thought.disputes.flatMap((dispute) =>
                dispute.departments.map(
                  (department): PlannedAction => ({
                    kind: "message",
                    to: departmentAgentId(department),
                    type: "rebuttal_request",
                    payload: {
                      dispute_id: dispute.id,
                      topic: dispute.topic,
                      positions: dispute.positions,
                    },
                  }),
                ),
              ),
              { kind: "emit", output: "rebuttals" },
            ];
          case "mediation":
            return [
              ...acks,
              ...thought.proposals.flatMap((proposal) =>
                proposal.departments.map(
                  (department): PlannedAction => ({
                    kind: "message",
                    to: departmentAgentId(department),
                    type: "mediation_proposal",
                    payload: proposal,
                  }),
                ),
              ),
              { kind: "emit", output: "mediation" },
            ];
          case "settlement":
            return [...acks, { kind: "emit", output: "settlement" }];
        }
      },

      async act(plan, thought, _focus, context) {
        const result = await context.execute(plan);
        switch (thought.kind) {
          case "policy_card": {
            const opinion = result.tools.find(
              (outcome) => outcome.result?.tool === "public_opinion_sim",
            )?.result;
            const lowSupport =
              opinion?.tool === "public_opinion_sim" &&
              opinion.output.support_rate < LOW_SUPPORT_RATE;
            return {
              kind: "policy_card",
              policy_card: lowSupport
                ? {
                    ...thought.card,
                    risk_factors: [
                      ...thought.card.risk_factors,
                      "low projected public support",
                    ],
                  }
                : thought.card,
            };
          }
          case "rebuttals":
            return {
              kind: "rebuttals",
              requested: uniqueDepartments(thought.disputes),
            };
          case "mediation":
            return { kind: "mediation", proposals: thought.proposals };
          case "settlement":
            return { kind: "settlement", concessions: thought.concessions };
        }
      },
    },
  );
