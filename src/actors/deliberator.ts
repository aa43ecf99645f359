import type {
  ConcessionOffer,
  DepartmentCode,
  Dispute,
  GateName,
  GateResult,
  GateVerdict,
  Issue,
  MediationProposal,
  Memo,
  PolicyCard,
  RebuttalRequest,
  Stance,
  UnavailableContribution,
} from "../core/types";

/** Forwarded from the run config with every prompt. */
export interface PromptSettings {
  model: string;
  temperature: number;
  enableSearch: boolean;
}

export interface PolicyCardPrompt {
  issue: Issue;
  settings: PromptSettings;
}

export interface MemoPrompt {
  department: DepartmentCode;
  issue: Issue;
  policy_card: PolicyCard;
  settings: PromptSettings;
}

export interface RevisionPrompt {
  department: DepartmentCode;
  issue: Issue;
  policy_card: PolicyCard;
  current: Memo;
  round: number;
  proposals: MediationProposal[];
  disputes: Dispute[];
  /** Positions the office asked this department to defend. */
  rebuttals: RebuttalRequest[];
  /** Gate findings when the revision is a remediation. */
  findings: string[];
  settings: PromptSettings;
}

export interface MediationPrompt {
  issue: Issue;
  round: number;
  disputes: Dispute[];
  memos: Memo[];
  /** Stance changes departments offered since the last mediation. */
  concessions: ConcessionOffer[];
  settings: PromptSettings;
}

export interface JudgmentPrompt {
  gate: GateName;
  department: DepartmentCode;
  issue: Issue;
  policy_card: PolicyCard;
  memo?: Memo;
  unresolved: Dispute[];
  settings: PromptSettings;
}

export interface RulingPrompt {
  issue: Issue;
  policy_card: PolicyCard;
  memos: Memo[];
  gate_results: GateResult[];
  unresolved: Dispute[];
  unavailable: UnavailableContribution[];
  settings: PromptSettings;
}

export interface MemoDraft {
  stance: Stance;
  rationale: string;
  concerns: string[];
  recommendations: string[];
  topics: string[];
  confidence: number;
}

export interface GateJudgment {
  verdict: GateVerdict;
  findings: string[];
  conditions: string[];
}

export interface RulingDraft {
  approved: boolean;
  policy_text: string;
  rationale: string;
  conditions: string[];
}

/**
 * Reasoning backend behind every actor. A language-model client goes here;
 * the bundled implementation is rule based. Calls may be slow and should
 * reject promptly once `signal` aborts.
 */
export interface Deliberator {
  draftPolicyCard(prompt: PolicyCardPrompt, signal?: AbortSignal): Promise<PolicyCard>;
  draftMemo(prompt: MemoPrompt, signal?: AbortSignal): Promise<MemoDraft>;
  reviseMemo(prompt: RevisionPrompt, signal?: AbortSignal): Promise<MemoDraft>;
  mediate(
    prompt: MediationPrompt,
    signal?: AbortSignal,
  ): Promise<MediationProposal[]>;
  review(prompt: JudgmentPrompt, signal?: AbortSignal): Promise<GateJudgment>;
  rule(prompt: RulingPrompt, signal?: AbortSignal): Promise<RulingDraft>;
}

const FALLBACK_BUDGET = 100_000_000;
const FALLBACK_DURATION_MONTHS = 12;
const FALLBACK_POPULATION = 100_000;

/** Card derived from the issue alone, used when no coordinator draft exists. */
export const fallbackPolicyCard = (issue: Issue): PolicyCard => {
  const seed = issue.policy_seed ?? {};
  return {
    title: seed.title ?? issue.title,
    summary: seed.summary ?? issue.description,
    estimated_budget: seed.estimated_budget ?? FALLBACK_BUDGET,
    duration_months: seed.duration_months ?? FALLBACK_DURATION_MONTHS,
    affected_population: seed.affected_population ?? FALLBACK_POPULATION,
    key_measures: [...(seed.key_measures ?? [`Implement ${issue.title}`])],
    risk_factors: [...(seed.risk_factors ?? [])],
  };
};

/** Recommendations are written as "<topic>: text". */
export const recommendationTopic = (recommendation: string): string | undefined => {
  const index = recommendation.indexOf(":");
  return index > 0 ? recommendation.slice(0, index).trim() : undefined;
};
