import type { GateJudgment } from "../actors/deliberator";
import type {
  DepartmentCode,
  Dispute,
  GateName,
  GateResult,
  GateVerdict,
  Issue,
  Memo,
  PolicyCard,
  UnavailableContribution,
} from "../core/types";

/** Dispute topic each gate is sensitive to. */
export const GATE_TOPICS = {
  legal: "legal-basis",
  fiscal: "budget",
} as const satisfies Record<GateName, string>;

/** Department whose judgment each gate consults. */
export const GATE_DEPARTMENTS = {
  legal: "legal",
  fiscal: "finance",
} as const satisfies Record<GateName, DepartmentCode>;

const LEGAL_FAIL_CONFIDENCE = 0.7;
const FISCAL_WARNING_SHARE = 0.8;
const COMPLIANCE_RESERVE = 0.05;

const VERDICT_SEVERITY: Record<GateVerdict, number> = {
  pass: 0,
  "conditional-pass": 1,
  fail: 2,
};

export const worstVerdict = (...verdicts: GateVerdict[]): GateVerdict =>
  verdicts.reduce<GateVerdict>(
    (worst, verdict) =>
      VERDICT_SEVERITY[verdict] > VERDICT_SEVERITY[worst] ? verdict : worst,
    "pass",
  );

export interface GateInput {
  issue: Issue;
  policy_card: PolicyCard;
  memos: readonly Memo[];
  /** Disputes left `unresolved-at-limit`. */
  unresolved: readonly Dispute[];
  unavailable: readonly UnavailableContribution[];
  attempt: number;
  judgment?: GateJudgment;
}

interface RuleOutcome {
  verdict: GateVerdict;
  findings: string[];
  conditions: string[];
  implicated: DepartmentCode[];
}

const unique = <T>(values: readonly T[]): T[] => [...new Set(values)];

const finalize = (
  gate: GateName,
  input: GateInput,
  outcome: RuleOutcome,
): GateResult => {
  const judgment = input.judgment;
  const conditions = unique([...outcome.conditions, ...(judgment?.conditions ?? [])]);
  const verdict = worstVerdict(
    outcome.verdict,
    judgment?.verdict ?? "pass",
    conditions.length > 0 ? "conditional-pass" : "pass",
  );
  return {
    gate,
    attempt: input.attempt,
    verdict,
    findings: unique([...outcome.findings, ...(judgment?.findings ?? [])]),
    conditions,
    implicated: unique(outcome.implicated),
    created_at: new Date().toISOString(),
  };
};

const memoOf = (memos: readonly Memo[], department: DepartmentCode) =>
  memos.find((memo) => memo.department === department);

const unresolvedOn = (disputes: readonly Dispute[], topic: string) =>
  disputes.filter((dispute) => dispute.topic === topic);

export const reviewLegal = (input: GateInput): GateResult => {
  const outcome: RuleOutcome = {
    verdict: "pass",
    findings: [],
    conditions: [],
    implicated: [],
  };
  const memo = memoOf(input.memos, "legal");

  if (!memo) {
    outcome.verdict = "conditional-pass";
    outcome.findings.push("no legal memo on record");
    outcome.conditions.push("Obtain a legal review before implementation");
  } else if (memo.stance === "oppose" && memo.confidence >= LEGAL_FAIL_CONFIDENCE) {
    outcome.verdict = "fail";
    outcome.findings.push(`legal department opposes: ${memo.rationale}`);
    outcome.implicated.push("legal");
  }

  for (const dispute of unresolvedOn(input.unresolved, GATE_TOPICS.legal)) {
    outcome.verdict = worstVerdict(outcome.verdict, "conditional-pass");
    outcome.findings.push(
      `legal basis still disputed between ${dispute.departments.join(", ")}`,
    );
    outcome.conditions.push("Settle the statutory basis before rollout");
    outcome.implicated.push(...dispute.departments);
  }

  for (const requirement of input.issue.constraints.legal_requirements) {
    outcome.conditions.push(`Satisfy legal requirement: ${requirement}`);
  }

  return finalize("legal", input, outcome);
};

const formatAmount = (amount: number): string => amount.toLocaleString("en-US");

export const reviewFiscal = (
  input: GateInput & { legal: GateResult },
): GateResult => {
  const outcome: RuleOutcome = {
    verdict: "pass",
    findings: [],
    conditions: [],
    implicated: [],
  };
  const ceiling = input.issue.constraints.budget_ceiling;
  const reserve = input.legal.verdict === "conditional-pass" ? COMPLIANCE_RESERVE : 0;
  const budget = input.policy_card.estimated_budget * (1 + reserve);
  const financeMemo = memoOf(input.memos, "finance");

  if (budget > ceiling) {
    outcome.verdict = "fail";
    outcome.findings.push(
      reserve > 0
        ? `budget ${formatAmount(budget)} including compliance reserve exceeds ceiling ${formatAmount(ceiling)}`
        : `budget ${formatAmount(budget)} exceeds ceiling ${formatAmount(ceiling)}`,
    );
    if (financeMemo) {
      outcome.implicated.push("finance");
    }
  } else if (budget > ceiling * FISCAL_WARNING_SHARE) {
    outcome.verdict = "conditional-pass";
    outcome.findings.push(
      `budget ${formatAmount(budget)} uses more than 80% of ceiling ${formatAmount(ceiling)}`,
    );
    outcome.conditions.push("Phase the funding across fiscal years");
  }

  for (const dispute of unresolvedOn(input.unresolved, GATE_TOPICS.fiscal)) {
    outcome.verdict = worstVerdict(outcome.verdict, "conditional-pass");
    outcome.findings.push(
      `budget still disputed between ${dispute.departments.join(", ")}`,
    );
    outcome.conditions.push("Agree a funding schedule with the disputing departments");
    outcome.implicated.push(...dispute.departments);
  }

  if (!financeMemo) {
    outcome.verdict = worstVerdict(outcome.verdict, "conditional-pass");
    outcome.findings.push("no finance memo on record");
    outcome.conditions.push("Obtain a finance review of the budget");
  }

  return finalize("fiscal", input, outcome);
};

/** Asks the gate's department for its judgment; undefined when unavailable. */
export type GateJudge = (
  gate: GateName,
  department: DepartmentCode,
) => Promise<GateJudgment | undefined>;

/**
 * Legal then fiscal. Each review combines the deterministic rules above with
 * the judgment of the gate's department; the result is the more severe.
 */
export class GateReviewer {
  constructor(private readonly judge: GateJudge) {}

  async reviewLegal(input: Omit<GateInput, "judgment">): Promise<GateResult> {
    const judgment = await this.consult("legal", input);
    return reviewLegal({ ...input, ...(judgment ? { judgment } : {}) });
  }

  async reviewFiscal(
    input: Omit<GateInput, "judgment"> & { legal: GateResult },
  ): Promise<GateResult> {
    const judgment = await this.consult("fiscal", input);
    return reviewFiscal({ ...input, ...(judgment ? { judgment } : {}) });
  }

  private async consult(
    gate: GateName,
    input: Omit<GateInput, "judgment">,
  ): Promise<GateJudgment | undefined> {
    const department = GATE_DEPARTMENTS[gate];
    if (!input.issue.departments.includes(department)) {
      return undefined;
    }
    return this.judge(gate, department);
  }
}
