export type Brand<T, B extends string> = T & { readonly __brand: B };

export type RunId = Brand<string, "RunId">;
export type IssueId = Brand<string, "IssueId">;
export type AgentId = Brand<string, "AgentId">;
export type MessageId = Brand<string, "MessageId">;
export type DisputeId = Brand<string, "DisputeId">;

export const asRunId = (value: string): RunId => value as RunId;
export const asIssueId = (value: string): IssueId => value as IssueId;
export const asAgentId = (value: string): AgentId => value as AgentId;
export const asMessageId = (value: string): MessageId => value as MessageId;
export const asDisputeId = (value: string): DisputeId => value as DisputeId;

export const DEPARTMENT_CODES = [
  "finance",
  "legal",
  "planning",
  "industry",
  "environment",
  "security",
] as const;

export type DepartmentCode = (typeof DEPARTMENT_CODES)[number];

export const isDepartmentCode = (value: unknown): value is DepartmentCode =>
  typeof value === "string" &&
  (DEPARTMENT_CODES as readonly string[]).includes(value);

export const STAGES = [
  "issue_intake",
  "department_memos",
  "dispute_aggregation",
  "negotiation",
  "legal_gate",
  "fiscal_gate",
  "final_ruling",
  "execution_planning",
] as const;

export type Stage = (typeof STAGES)[number];

export const stageIndex = (stage: Stage): number => STAGES.indexOf(stage);

export type Urgency = "low" | "medium" | "high" | "critical";

export interface IssueConstraints {
  budget_ceiling: number;
  legal_requirements: string[];
}

export interface Issue {
  id: IssueId;
  title: string;
  description: string;
  background: string;
  urgency: Urgency;
  departments: DepartmentCode[];
  constraints: IssueConstraints;
  /** Figures the coordinator starts from when drafting the policy card. */
  policy_seed?: Partial<PolicyCard>;
}

export interface PolicyCard {
  title: string;
  summary: string;
  estimated_budget: number;
  duration_months: number;
  affected_population: number;
  key_measures: string[];
  risk_factors: string[];
}

export type Stance = "support" | "oppose" | "conditional";

export interface Memo {
  department: DepartmentCode;
  stance: Stance;
  rationale: string;
  concerns: string[];
  recommendations: string[];
  topics: string[];
  confidence: number;
  /** 0 for the first memo, the negotiation round index for revisions. */
  revision: number;
  created_at: string;
}

export interface UnavailableContribution {
  actor_id: AgentId;
  department?: DepartmentCode;
  stage: Stage;
  reason: string;
}

export type DisputeStatus =
  | "open"
  | "resolving"
  | "resolved"
  | "unresolved-at-limit";

export interface Dispute {
  id: DisputeId;
  topic: string;
  departments: DepartmentCode[];
  positions: Partial<Record<DepartmentCode, Stance>>;
  severity: number;
  status: DisputeStatus;
  opened_round: number;
  resolved_round?: number;
  resolution?: string;
}

export interface MediationProposal {
  dispute_id: DisputeId;
  topic: string;
  departments: DepartmentCode[];
  proposal: string;
  suggested_stance: Stance;
}

/** Asks a disputing department to restate its position on the topic. */
export interface RebuttalRequest {
  dispute_id: DisputeId;
  topic: string;
  positions: Partial<Record<DepartmentCode, Stance>>;
}

/** Tells the office that a revision moved a department's stance. */
export interface ConcessionOffer {
  department: DepartmentCode;
  from: Stance;
  to: Stance;
  revision: number;
}

export type NegotiationStopReason =
  | "no_open_disputes"
  | "convergence_floor"
  | "stalled"
  | "round_limit";

export interface NegotiationRound {
  round: number;
  memos: Partial<Record<DepartmentCode, Memo>>;
  convergence_score: number;
  resolved_disputes: DisputeId[];
  open_disputes: DisputeId[];
  proposals: MediationProposal[];
  stop_reason?: NegotiationStopReason;
  created_at: string;
}

export type GateName = "legal" | "fiscal";
export type GateVerdict = "pass" | "fail" | "conditional-pass";

export interface GateResult {
  gate: GateName;
  attempt: number;
  verdict: GateVerdict;
  findings: string[];
  conditions: string[];
  /** Departments whose memos drove a failing finding. */
  implicated: DepartmentCode[];
  created_at: string;
}

export interface Decision {
  approved: boolean;
  policy_text: string;
  rationale: string;
  conditions: string[];
  auto_rejected: boolean;
  created_at: string;
}

export interface ExecutionStep {
  order: number;
  owner: DepartmentCode;
  action: string;
  deadline_offset_days: number;
}

export interface ExecutionPlan {
  steps: ExecutionStep[];
  created_at: string;
}

export type RunStatus = "running" | "completed" | "failed" | "cancelled";

export interface RunConfig {
  maxRounds: number;
  convergenceThreshold: number;
  convergenceFloor: number;
  model: string;
  temperature: number;
  enableSearch: boolean;
  enableSentiment: boolean;
  remediateGates: boolean;
}

export interface Run {
  run_id: RunId;
  issue_id: IssueId;
  stage: Stage;
  status: RunStatus;
  config: RunConfig;
  created_at: string;
  updated_at: string;
  error?: string;
}

export type ArtifactKind = "json" | "markdown" | "text";

export interface ArtifactRecord {
  name: string;
  kind: ArtifactKind;
  size_bytes: number;
  created_at: string;
}

export interface RunSnapshot {
  run: Run;
  issue: Issue;
  policy_card?: PolicyCard;
  memos: Memo[];
  unavailable: UnavailableContribution[];
  disputes: Dispute[];
  rounds: NegotiationRound[];
  gate_results: GateResult[];
  decision?: Decision;
  execution_plan?: ExecutionPlan;
  artifacts: ArtifactRecord[];
}

export interface RunSummary {
  run_id: RunId;
  issue_id: IssueId;
  issue_title: string;
  stage: Stage;
  status: RunStatus;
  created_at: string;
}

export type MessageType =
  | "position_statement"
  | "rebuttal_request"
  | "concession_offer"
  | "mediation_proposal"
  | "remediation_request";

export interface Message {
  id: MessageId;
  run_id: RunId;
  from: AgentId;
  to: AgentId;
  type: MessageType;
  /** Position in the sender's outgoing sequence, starting at 1. */
  seq: number;
  timestamp: string;
  payload: unknown;
}

export interface ToolCallReport {
  call: "phase" | "tool" | "mailbox";
  name: string;
  detail?: Record<string, unknown>;
}

export interface EventPayloads {
  stage_change: { from: Stage | null; to: Stage };
  policy_card_created: { policy_card: PolicyCard };
  memo_ready: { memo: Memo };
  dispute_update: { disputes: Dispute[] };
  negotiation_round: {
    round: number;
    convergence_score: number;
    resolved_this_round: DisputeId[];
    remaining: number;
    stop_reason?: NegotiationStopReason;
  };
  tool_call: ToolCallReport;
  gate_result: { result: GateResult };
  decision: { decision: Decision };
  artifact_created: { artifact: ArtifactRecord };
  completed: { status: "completed"; approved: boolean };
  error: {
    message: string;
    fatal: boolean;
    cancelled?: boolean;
    stage: Stage;
  };
}

export type EventType = keyof EventPayloads;

export const EVENT_TYPES: readonly EventType[] = [
  "stage_change",
  "policy_card_created",
  "memo_ready",
  "dispute_update",
  "negotiation_round",
  "tool_call",
  "gate_result",
  "decision",
  "artifact_created",
  "completed",
  "error",
];

export const isEventType = (value: unknown): value is EventType =>
  typeof value === "string" &&
  (EVENT_TYPES as readonly string[]).includes(value);

export type RunEventOf<K extends EventType> = {
  seq: number;
  type: K;
  run_id: RunId;
  timestamp: string;
  actor_id?: AgentId;
  payload: EventPayloads[K];
};

export type RunEvent = { [K in EventType]: RunEventOf<K> }[EventType];

export const isTerminalEvent = (event: RunEvent): boolean =>
  event.type === "completed" ||
  (event.type === "error" && event.payload.fatal);

/** Freezes `value` and everything reachable from it. */
export const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};
