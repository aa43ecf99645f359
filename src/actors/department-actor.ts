import { ActorInvocationError } from "../core/errors";
import {
  type DepartmentCode,
  type Issue,
  type MediationProposal,
  type Memo,
  type Message,
  type PolicyCard,
  type RebuttalRequest,
  type Stage,
  deepFreeze,
} from "../core/types";
import type { DepartmentProfile } from "../project/departments";
import {
  type Actor,
  type ActorTask,
  OFFICE_ID,
  type PlannedAction,
  type ToolOutcome,
  createActor,
  departmentAgentId,
  isMediationProposal,
  isRebuttalRequest,
  isRemediationRequest,
} from "./actor";
import type { GateJudgment, MemoDraft } from "./deliberator";

interface DepartmentFocus {
  department: DepartmentCode;
  stage: Stage;
  issue: Issue;
  policy_card: PolicyCard;
  task: ActorTask;
  own?: Memo;
  proposals: MediationProposal[];
  rebuttals: RebuttalRequest[];
  findings: string[];
  /** Messages this turn consumes and acknowledges. */
  consumed: Message[];
}

type DepartmentThought =
  | {
      kind: "memo";
      trace: string;
      draft: MemoDraft;
      revision: number;
      tools: { tool: string; args: unknown }[];
    }
  | { kind: "judgment"; trace: string; judgment: GateJudgment };

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

export const createMemo = (
  department: DepartmentCode,
  draft: MemoDraft,
  revision: number,
): Memo =>
  deepFreeze({
    department,
    stance: draft.stance,
    rationale: draft.rationale,
    concerns: [...draft.concerns],
    recommendations: [...draft.recommendations],
    topics: [...draft.topics],
    confidence: clamp01(draft.confidence),
    revision,
    created_at: new Date().toISOString(),
  });

/** Tool evidence adds concerns and lowers confidence; it never flips the stance. */
export const applyToolEvidence = (
  draft: MemoDraft,
  outcomes: readonly ToolOutcome[],
): MemoDraft => {
  const concerns = [...draft.concerns];
  let confidence = draft.confidence;
  for (const outcome of outcomes) {
    if (outcome.error) {
      concerns.push(`${outcome.tool} unavailable: ${outcome.error}`);
      continue;
    }
    const result = outcome.result;
    if (result?.tool === "feasibility_check" && !result.output.feasible) {
      concerns.push(...result.output.issues);
      confidence -= 0.1;
    }
    if (result?.tool === "risk_assessment" && result.output.level === "high") {
      concerns.push(`high ${result.output.category} risk: ${result.output.risks.join(", ")}`);
      confidence -= 0.05;
    }
  }
  return {
    ...draft,
    concerns,
    confidence: Math.round(clamp01(confidence) * 100) / 100,
  };
};

export const createDepartmentActor = (profile: DepartmentProfile): Actor => {
  const department = profile.code;
  const id = departmentAgentId(department);

  return createActor<DepartmentFocus, DepartmentThought>(
    { id, kind: "department", department },
    {
      awaits(observation) {
        const { task } = observation;
        return (
          task.kind === "revision" &&
          task.disputes.some((dispute) => dispute.departments.includes(department)) &&
          !observation.messages.some((message) => message.type === "mediation_proposal")
        );
      },

      observe(observation) {
        if (!observation.policy_card) {
          throw new ActorInvocationError(
            id,
            observation.stage,
            "no policy card to deliberate on",
          );
        }
        const proposals = observation.messages
          .filter((message) => message.type === "mediation_proposal")
          .map((message) => message.payload)
          .filter(isMediationProposal);
        const rebuttals = observation.messages
          .filter((message) => message.type === "rebuttal_request")
          .map((message) => message.payload)
          .filter(isRebuttalRequest);
        const findings = observation.messages
          .filter((message) => message.type === "remediation_request")
          .map((message) => message.payload)
          .filter(isRemediationRequest)
          .flatMap((request) => request.findings);
        const consumes =
          observation.task.kind === "revision" ||
          observation.task.kind === "remediation";

        return {
          department,
          stage: observation.stage,
          issue: observation.issue,
          policy_card: observation.policy_card,
          task: observation.task,
          own: observation.memos.find((memo) => memo.department === department),
          proposals,
          rebuttals,
          findings:
            observation.task.kind === "remediation" && findings.length === 0
              ? [...observation.task.findings]
              : findings,
          consumed: consumes ? [...observation.messages] : [],
        };
      },

      async think(focus, _memory, context) {
        const { task } = focus;
        switch (task.kind) {
          case "memo": {
            const draft = await context.deliberator.draftMemo(
              {
                department,
                issue: focus.issue,
                policy_card: focus.policy_card,
                settings: context.settings,
              },
              context.signal,
            );
            const available = new Set<string>(context.tools.available());
            const tools = profile.tools
              .filter((use) => available.has(use.tool))
              .map((use) => ({
                tool: use.tool,
                args: {
                  policy_card: focus.policy_card,
                  ...use.args,
                  ...(use.tool === "feasibility_check"
                    ? { budget_ceiling: focus.issue.constraints.budget_ceiling }
                    : {}),
                },
              }));
            return {
              kind: "memo",
              trace: `${department} drafted a ${draft.stance} memo`,
              draft,
              revision: 0,
              tools,
            };
          }
          case "revision":
          case "remediation": {
            const current = focus.own;
            if (!current) {
              throw new ActorInvocationError(id, focus.stage, "no memo to revise");
            }
            const round = task.kind === "revision" ? task.round : current.revision + 1;
            const draft = await context.deliberator.reviseMemo(
              {
                department,
                issue: focus.issue,
                policy_card: focus.policy_card,
                current,
                round,
                proposals: focus.proposals,
                disputes: task.kind === "revision" ? [...task.disputes] : [],
                rebuttals: task.kind === "revision" ? focus.rebuttals : [],
                findings: task.kind === "remediation" ? focus.findings : [],
                settings: context.settings,
              },
              context.signal,
            );
            return {
              kind: "memo",
              trace: `${department} revised its memo: ${current.stance} -> ${draft.stance}`,
              draft,
              revision: round,
              tools: [],
            };
          }
          case "judgment": {
            const judgment = await context.deliberator.review(
              {
                gate: task.gate,
                department,
                issue: focus.issue,
                policy_card: focus.policy_card,
                ...(focus.own ? { memo: focus.own } : {}),
                unresolved: [...task.unresolved],
                settings: context.settings,
              },
              context.signal,
            );
            return {
              kind: "judgment",
              trace: `${department} judged the ${task.gate} gate: ${judgment.verdict}`,
              judgment,
            };
          }
          default:
            throw new ActorInvocationError(
              id,
              focus.stage,
              `departments do not handle ${task.kind} tasks`,
            );
        }
      },

      plan(thought, focus) {
        if (thought.kind === "judgment") {
          return [{ kind: "emit", output: "judgment" }];
        }

        const actions = thought.tools.map((use): PlannedAction => ({
          kind: "tool",
          tool: use.tool,
          args: use.args,
        }));
        for (const message of focus.consumed) {
          actions.push({ kind: "ack", message_id: message.id });
        }
        if (
          focus.task.kind === "revision" &&
          focus.own &&
          focus.own.stance !== thought.draft.stance
        ) {
          actions.push({
            kind: "message",
            to: OFFICE_ID,
            type: "concession_offer",
            payload: {
              department,
              from: focus.own.stance,
              to: thought.draft.stance,
              revision: thought.revision,
            },
          });
        }
        actions.push({ kind: "emit", output: "memo" });
        return actions;
      },

      async act(plan, thought, _focus, context) {
        const result = await context.execute(plan);
        if (thought.kind === "judgment") {
          return { kind: "judgment", judgment: thought.judgment };
        }
        return {
          kind: "memo",
          memo: createMemo(
            department,
            applyToolEvidence(thought.draft, result.tools),
            thought.revision,
          ),
        };
      },
    },
  );
};
