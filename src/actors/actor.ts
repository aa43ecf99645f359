import { ToolExecutionError, throwIfCancelled } from "../core/errors";
import type { Mailbox } from "../core/mailbox";
import {
  type AgentId,
  type ConcessionOffer,
  type DepartmentCode,
  type Dispute,
  type GateName,
  type GateResult,
  type Issue,
  type MediationProposal,
  type Memo,
  type Message,
  type MessageId,
  type MessageType,
  type PolicyCard,
  type RebuttalRequest,
  type RunId,
  type Stage,
  type Stance,
  type ToolCallReport,
  type UnavailableContribution,
  asAgentId,
  deepFreeze,
  isDepartmentCode,
} from "../core/types";
import type { ToolGateway, ToolResult } from "../tools/tool-gateway";
import type {
  Deliberator,
  GateJudgment,
  PromptSettings,
  RulingDraft,
} from "./deliberator";

export type ActorKind = "department" | "coordinator" | "decider";

export const OFFICE_ID = asAgentId("office");
export const DECIDER_ID = asAgentId("decider");
export const departmentAgentId = (code: DepartmentCode): AgentId =>
  asAgentId(code);

/** What the orchestrator asks of an actor in one turn. */
export type ActorTask =
  | { kind: "policy_card" }
  | { kind: "memo" }
  | { kind: "aggregate"; disputes: readonly Dispute[] }
  | { kind: "mediation"; round: number; disputes: readonly Dispute[] }
  | { kind: "settlement" }
  | { kind: "revision"; round: number; disputes: readonly Dispute[] }
  | { kind: "remediation"; gate: GateName; findings: readonly string[] }
  | { kind: "judgment"; gate: GateName; unresolved: readonly Dispute[] }
  | {
      kind: "ruling";
      gate_results: readonly GateResult[];
      unresolved: readonly Dispute[];
      unavailable: readonly UnavailableContribution[];
    };

/** Read-only view curated by the orchestrator for a single turn. */
export interface Observation {
  readonly run_id: RunId;
  readonly stage: Stage;
  readonly issue: Issue;
  readonly policy_card?: PolicyCard;
  readonly memos: readonly Memo[];
  /** Unacknowledged mailbox messages addressed to the actor. */
  readonly messages: readonly Message[];
  readonly task: ActorTask;
}

export type ActorOutput =
  | { kind: "policy_card"; policy_card: PolicyCard }
  | { kind: "memo"; memo: Memo }
  | { kind: "rebuttals"; requested: DepartmentCode[] }
  | { kind: "mediation"; proposals: MediationProposal[] }
  | { kind: "settlement"; concessions: ConcessionOffer[] }
  | { kind: "judgment"; judgment: GateJudgment }
  | { kind: "ruling"; ruling: RulingDraft };

export type PlannedAction =
  | { kind: "tool"; tool: string; args: unknown }
  | { kind: "message"; to: AgentId; type: MessageType; payload: unknown }
  | { kind: "ack"; message_id: MessageId }
  | { kind: "emit"; output: ActorOutput["kind"] };

export interface ToolOutcome {
  tool: string;
  result?: ToolResult;
  error?: string;
}

export interface ExecutionResult {
  tools: ToolOutcome[];
  sent: Message[];
  acknowledged: MessageId[];
}

export interface ActionRecord {
  stage: Stage;
  action: PlannedAction["kind"];
  detail: string;
}

export interface ObservationDigest {
  stage: Stage;
  task: ActorTask["kind"];
  message_count: number;
}

export interface ActorMemory {
  readonly observations: readonly ObservationDigest[];
  readonly thoughts: readonly string[];
  readonly plans: readonly (readonly PlannedAction[])[];
  readonly actions: readonly ActionRecord[];
  readonly received: readonly Message[];
  readonly sent: readonly Message[];
}

export const emptyMemory = (): ActorMemory =>
  deepFreeze({
    observations: [],
    thoughts: [],
    plans: [],
    actions: [],
    received: [],
    sent: [],
  });

export interface ActorContext {
  actorId: AgentId;
  deliberator: Deliberator;
  tools: ToolGateway;
  mailbox: Mailbox;
  settings: PromptSettings;
  signal: AbortSignal;
  /** Upper bound on a receive-wait for replies the turn depends on. */
  mailboxWaitMs: number;
  report: (report: ToolCallReport) => void;
}

export interface ActContext extends ActorContext {
  execute(actions: readonly PlannedAction[]): Promise<ExecutionResult>;
}

/**
 * Per-variant behavior. `observe` and `plan` are pure; `think` may consult
 * the deliberator; only `act` touches tools and the mailbox.
 */
export interface ActorHooks<F, T extends { trace: string }> {
  /** True when the turn should first wait for messages it has not received yet. */
  awaits?(observation: Observation): boolean;
  observe(observation: Observation, memory: ActorMemory): F;
  think(focus: F, memory: ActorMemory, context: ActorContext): Promise<T>;
  plan(thought: T, focus: F): PlannedAction[];
  act(
    plan: readonly PlannedAction[],
    thought: T,
    focus: F,
    context: ActContext,
  ): Promise<ActorOutput>;
}

export interface Actor {
  readonly id: AgentId;
  readonly kind: ActorKind;
  readonly department?: DepartmentCode;
  step(observation: Observation, context: ActorContext): Promise<ActorOutput>;
  memory(): ActorMemory;
}

export interface StepResult {
  output: ActorOutput;
  memory: ActorMemory;
}

const describeAction = (action: PlannedAction): string => {
  switch (action.kind) {
    case "tool":
      return action.tool;
    case "message":
      return `${action.type} -> ${action.to}`;
    case "ack":
      return action.message_id;
    case "emit":
      return action.output;
  }
};

export const executeActions = async (
  actions: readonly PlannedAction[],
  context: ActorContext,
): Promise<ExecutionResult> => {
  const result: ExecutionResult = { tools: [], sent: [], acknowledged: [] };
  for (const action of actions) {
    throwIfCancelled(context.signal);
    switch (action.kind) {
      case "tool": {
        try {
          const output = context.tools.invoke(action.tool, action.args);
          result.tools.push({ tool: action.tool, result: output });
          context.report({ call: "tool", name: action.tool, detail: { status: "ok" } });
        } catch (error) {
          if (!(error instanceof ToolExecutionError)) {
            throw error;
          }
          result.tools.push({ tool: action.tool, error: error.message });
          context.report({
            call: "tool",
            name: action.tool,
            detail: { status: "error", error: error.message },
          });
        }
        break;
      }
      case "message": {
        const message = context.mailbox.send({
          from: context.actorId,
          to: action.to,
          type: action.type,
          payload: action.payload,
        });
        result.sent.push(message);
        context.report({
          call: "mailbox",
          name: "send",
          detail: { to: action.to, type: action.type, message_id: message.id },
        });
        break;
      }
      case "ack":
        context.mailbox.ack(action.message_id);
        result.acknowledged.push(action.message_id);
        context.report({
          call: "mailbox",
          name: "ack",
          detail: { message_id: action.message_id },
        });
        break;
      case "emit":
        break;
    }
  }
  return result;
};

const receive = async (
  observation: Observation,
  context: ActorContext,
): Promise<Observation> => {
  const waited = await context.mailbox.waitFor(
    context.actorId,
    context.mailboxWaitMs,
    context.signal,
  );
  const known = new Set(observation.messages.map((message) => message.id));
  const fresh = waited.filter((message) => !known.has(message.id));
  context.report({
    call: "mailbox",
    name: "wait",
    detail: { received: fresh.length, timeout_ms: context.mailboxWaitMs },
  });
  return deepFreeze({ ...observation, messages: [...observation.messages, ...fresh] });
};

/**
 * One observe-think-plan-act pass: `(observation, memory) -> (output, memory')`.
 * The returned memory is a new frozen value; the input memory is untouched.
 */
export const runActorStep = async <F, T extends { trace: string }>(
  hooks: ActorHooks<F, T>,
  observation: Observation,
  memory: ActorMemory,
  context: ActorContext,
): Promise<StepResult> => {
  const enter = (phase: "observe" | "think" | "plan" | "act") => {
    throwIfCancelled(context.signal);
    context.report({
      call: "phase",
      name: phase,
      detail: { stage: observation.stage, task: observation.task.kind },
    });
  };

  if (hooks.awaits?.(observation)) {
    observation = await receive(observation, context);
  }

  enter("observe");
  const focus = hooks.observe(observation, memory);
  enter("think");
  const thought = await hooks.think(focus, memory, context);
  enter("plan");
  const plan = hooks.plan(thought, focus);
  enter("act");

  const actions: ActionRecord[] = [];
  const sent: Message[] = [];
  const actContext: ActContext = {
    ...context,
    execute: async (planned) => {
      const result = await executeActions(planned, context);
      actions.push(
        ...planned.map((action) => ({
          stage: observation.stage,
          action: action.kind,
          detail: describeAction(action),
        })),
      );
      sent.push(...result.sent);
      return result;
    },
  };
  const output = await hooks.act(plan, thought, focus, actContext);
  throwIfCancelled(context.signal);

  const known = new Set(memory.received.map((message) => message.id));
  const next: ActorMemory = {
    observations: [
      ...memory.observations,
      {
        stage: observation.stage,
        task: observation.task.kind,
        message_count: observation.messages.length,
      },
    ],
    thoughts: [...memory.thoughts, thought.trace],
    plans: [...memory.plans, plan],
    actions: [...memory.actions, ...actions],
    received: [
      ...memory.received,
      ...observation.messages.filter((message) => !known.has(message.id)),
    ],
    sent: [...memory.sent, ...sent],
  };
  return { output, memory: deepFreeze(structuredClone(next)) };
};

/** Binds hooks to an identity and a private memory that only advances on success. */
export const createActor = <F, T extends { trace: string }>(
  identity: { id: AgentId; kind: ActorKind; department?: DepartmentCode },
  hooks: ActorHooks<F, T>,
): Actor => {
  let memory = emptyMemory();
  return {
    ...identity,
    async step(observation, context) {
      const result = await runActorStep(hooks, observation, memory, context);
      memory = result.memory;
      return result.output;
    },
    memory: () => memory,
  };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === "string");

const isStance = (value: unknown): value is Stance =>
  value === "support" || value === "oppose" || value === "conditional";

export const isMediationProposal = (
  value: unknown,
): value is MediationProposal =>
  isRecord(value) &&
  typeof value.dispute_id === "string" &&
  typeof value.topic === "string" &&
  typeof value.proposal === "string" &&
  Array.isArray(value.departments) &&
  value.departments.every(isDepartmentCode) &&
  isStance(value.suggested_stance);

export const isRebuttalRequest = (value: unknown): value is RebuttalRequest =>
  isRecord(value) &&
  typeof value.dispute_id === "string" &&
  typeof value.topic === "string" &&
  isRecord(value.positions) &&
  Object.entries(value.positions).every(
    ([code, stance]) => isDepartmentCode(code) && isStance(stance),
  );

export const isConcessionOffer = (value: unknown): value is ConcessionOffer =>
  isRecord(value) &&
  isDepartmentCode(value.department) &&
  isStance(value.from) &&
  isStance(value.to) &&
  typeof value.revision === "number";

export const isRemediationRequest = (
  value: unknown,
): value is { gate: GateName; findings: string[] } =>
  isRecord(value) &&
  (value.gate === "legal" || value.gate === "fiscal") &&
  isStringArray(value.findings);
