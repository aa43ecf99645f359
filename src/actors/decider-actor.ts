import { ActorInvocationError } from "../core/errors";
import type { Issue, Memo, PolicyCard, Stage } from "../core/types";
import {
  type Actor,
  type ActorTask,
  DECIDER_ID,
  type PlannedAction,
  createActor,
} from "./actor";
import { type RulingDraft, fallbackPolicyCard } from "./deliberator";

interface DeciderFocus {
  stage: Stage;
  issue: Issue;
  policy_card: PolicyCard;
  memos: readonly Memo[];
  task: Extract<ActorTask, { kind: "ruling" }>;
  acknowledgements: PlannedAction[];
}

interface DeciderThought {
  trace: string;
  ruling: RulingDraft;
}

export const createDeciderActor = (): Actor =>
  createActor<DeciderFocus, DeciderThought>(
    { id: DECIDER_ID, kind: "decider" },
    {
      observe(observation) {
        const { task } = observation;
        if (task.kind !== "ruling") {
          throw new ActorInvocationError(
            DECIDER_ID,
            observation.stage,
            `the decider does not handle ${task.kind} tasks`,
          );
        }
        return {
          stage: observation.stage,
          issue: observation.issue,
          policy_card: observation.policy_card ?? fallbackPolicyCard(observation.issue),
          memos: observation.memos,
          task,
          acknowledgements: observation.messages.map((message): PlannedAction => ({
            kind: "ack",
            message_id: message.id,
          })),
        };
      },

      async think(focus, _memory, context) {
        const ruling = await context.deliberator.rule(
          {
            issue: focus.issue,
            policy_card: focus.policy_card,
            memos: [...focus.memos],
            gate_results: [...focus.task.gate_results],
            unresolved: [...focus.task.unresolved],
            unavailable: [...focus.task.unavailable],
            settings: context.settings,
          },
          context.signal,
        );
        return {
          trace: `ruled ${ruling.approved ? "approve" : "reject"}: ${ruling.rationale}`,
          ruling,
        };
      },

      plan(_thought, focus) {
        return [...focus.acknowledgements, { kind: "emit", output: "ruling" }];
      },

      async act(plan, thought, _focus, context) {
        await context.execute(plan);
        return { kind: "ruling", ruling: thought.ruling };
      },
    },
  );
