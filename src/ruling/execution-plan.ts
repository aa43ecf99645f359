import type {
  Decision,
  DepartmentCode,
  ExecutionPlan,
  ExecutionStep,
  Issue,
  PolicyCard,
  UnavailableContribution,
} from "../core/types";

const DAYS_PER_MONTH = 30;
const CONDITION_LEAD_DAYS = 30;

const conditionOwner = (
  condition: string,
  owners: readonly DepartmentCode[],
  fallback: DepartmentCode,
): DepartmentCode => {
  const lowered = condition.toLowerCase();
  if (lowered.includes("legal") || lowered.includes("statutory")) {
    return owners.includes("legal") ? "legal" : fallback;
  }
  if (lowered.includes("fund") || lowered.includes("budget")) {
    return owners.includes("finance") ? "finance" : fallback;
  }
  return fallback;
};

/**
 * Conditions come first, one every 30 days; the policy's key measures
 * follow, spread evenly over its duration and assigned round-robin to the
 * departments that contributed a memo.
 */
export const buildExecutionPlan = (input: {
  issue: Issue;
  policy_card: PolicyCard;
  decision: Decision;
  unavailable: readonly UnavailableContribution[];
}): ExecutionPlan => {
  // A department that missed a later turn still has its memo and owns work.
  const missing = new Set(
    input.unavailable
      .filter((entry) => entry.stage === "department_memos")
      .map((entry) => entry.department),
  );
  const contributing = input.issue.departments.filter(
    (department) => !missing.has(department),
  );
  const owners = contributing.length > 0 ? contributing : [...input.issue.departments];
  const fallback = owners[0] ?? "planning";

  const steps: ExecutionStep[] = input.decision.conditions.map((condition, index) => ({
    order: index + 1,
    owner: conditionOwner(condition, owners, fallback),
    action: condition,
    deadline_offset_days: CONDITION_LEAD_DAYS * (index + 1),
  }));

  const start = steps.length * CONDITION_LEAD_DAYS;
  const span = input.policy_card.duration_months * DAYS_PER_MONTH;
  const measures = input.policy_card.key_measures;
  measures.forEach((measure, index) => {
    steps.push({
      order: steps.length + 1,
      owner: owners[index % owners.length] ?? fallback,
      action: measure,
      deadline_offset_days: start + Math.round((span * (index + 1)) / measures.length),
    });
  });

  return { steps, created_at: new Date().toISOString() };
};
