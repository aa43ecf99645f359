import type { RulingDraft } from "../actors/deliberator";
import type {
  Decision,
  Dispute,
  GateName,
  GateResult,
  PolicyCard,
  UnavailableContribution,
} from "../core/types";

/** Most recent result per gate, legal first. */
export const latestGateResults = (results: readonly GateResult[]): GateResult[] => {
  const latest = new Map<GateName, GateResult>();
  for (const result of results) {
    const previous = latest.get(result.gate);
    if (!previous || result.attempt >= previous.attempt) {
      latest.set(result.gate, result);
    }
  }
  return (["legal", "fiscal"] as const).flatMap((gate) => {
    const result = latest.get(gate);
    return result ? [result] : [];
  });
};

export const failingGates = (results: readonly GateResult[]): GateResult[] =>
  latestGateResults(results).filter((result) => result.verdict === "fail");

const describeUnavailable = (
  unavailable: readonly UnavailableContribution[],
): string | undefined => {
  if (unavailable.length === 0) {
    return undefined;
  }
  const entries = unavailable.map(
    (entry) => `${entry.department ?? entry.actor_id} (${entry.stage}: ${entry.reason})`,
  );
  return `Unavailable contributions: ${entries.join("; ")}.`;
};

const describeUnresolved = (unresolved: readonly Dispute[]): string | undefined =>
  unresolved.length === 0
    ? undefined
    : `Unresolved at round limit: ${unresolved
        .map((dispute) => `${dispute.id} on ${dispute.topic} (${dispute.departments.join(", ")})`)
        .join("; ")}.`;

const joinRationale = (parts: (string | undefined)[]): string =>
  parts.filter((part): part is string => Boolean(part)).join(" ");

export interface DecisionContext {
  policy_card: PolicyCard;
  gate_results: readonly GateResult[];
  unresolved: readonly Dispute[];
  unavailable: readonly UnavailableContribution[];
}

/** Rejection composed without the decider when a gate's latest verdict is fail. */
export const autoRejectDecision = (context: DecisionContext): Decision => {
  const failing = failingGates(context.gate_results);
  const findings = failing.flatMap((result) =>
    result.findings.map((finding) => `${result.gate} gate: ${finding}`),
  );
  return {
    approved: false,
    policy_text: context.policy_card.title,
    rationale: joinRationale([
      `Rejected by the ${failing.map((result) => result.gate).join(" and ")} gate.`,
      findings.length > 0 ? `Findings: ${findings.join("; ")}.` : undefined,
      describeUnresolved(context.unresolved),
      describeUnavailable(context.unavailable),
    ]),
    conditions: [],
    auto_rejected: true,
    created_at: new Date().toISOString(),
  };
};

/** Decider ruling plus every condition carried forward by conditional gates. */
export const composeDecision = (
  draft: RulingDraft,
  context: DecisionContext,
): Decision => {
  const gateConditions = latestGateResults(context.gate_results)
    .filter((result) => result.verdict === "conditional-pass")
    .flatMap((result) => result.conditions);
  return {
    approved: draft.approved,
    policy_text: draft.policy_text,
    rationale: joinRationale([
      draft.rationale,
      describeUnresolved(context.unresolved),
      describeUnavailable(context.unavailable),
    ]),
    conditions: [...new Set([...draft.conditions, ...gateConditions])],
    auto_rejected: false,
    created_at: new Date().toISOString(),
  };
};
