import { describe, expect, it } from "vitest";
import {
  type Decision,
  type GateResult,
  type UnavailableContribution,
  asAgentId,
} from "../src/core/types";
import {
  autoRejectDecision,
  composeDecision,
  failingGates,
  latestGateResults,
} from "../src/ruling/decision";
import { buildExecutionPlan } from "../src/ruling/execution-plan";
import { issue, policyCard } from "./helpers";

const gate = (
  overrides: Partial<GateResult> & Pick<GateResult, "gate" | "verdict">,
): GateResult => ({
  attempt: 1,
  findings: [],
  conditions: [],
  implicated: [],
  created_at: "2026-01-01T00:00:00.000Z",
  ...overrides,
});

const unavailable: UnavailableContribution[] = [
  {
    actor_id: asAgentId("environment"),
    department: "environment",
    stage: "department_memos",
    reason: "failed after 3 attempts: model offline",
  },
];

describe("latestGateResults", () => {
  it("keeps the latest attempt per gate, legal first", () => {
    const results = [
      gate({ gate: "fiscal", verdict: "pass" }),
      gate({ gate: "legal", verdict: "fail" }),
      gate({ gate: "legal", verdict: "conditional-pass", attempt: 2 }),
    ];

    expect(latestGateResults(results).map((result) => [result.gate, result.attempt])).toEqual([
      ["legal", 2],
      ["fiscal", 1],
    ]);
    expect(failingGates(results)).toEqual([]);
  });
});

describe("autoRejectDecision", () => {
  it("rejects with the failing gates' findings", () => {
    const decision = autoRejectDecision({
      policy_card: policyCard(),
      gate_results: [
        gate({ gate: "legal", verdict: "fail", findings: ["legal department opposes: no basis"] }),
        gate({ gate: "fiscal", verdict: "pass" }),
      ],
      unresolved: [],
      unavailable,
    });

    expect(decision).toMatchObject({
      approved: false,
      auto_rejected: true,
      policy_text: "Test policy",
      conditions: [],
      rationale:
        "Rejected by the legal gate. Findings: legal gate: legal department opposes: no basis. " +
        "Unavailable contributions: environment (department_memos: failed after 3 attempts: model offline).",
    });
  });
});

describe("composeDecision", () => {
  it("carries conditions from conditional gates without duplicates", () => {
    const decision = composeDecision(
      {
        approved: true,
        policy_text: "Test policy. Measures: Measure one; Measure two.",
        rationale: "2 support, 0 conditional, 0 oppose across 2 department memos.",
        conditions: ["Obtain a legal review before implementation"],
      },
      {
        policy_card: policyCard(),
        gate_results: [
          gate({
            gate: "legal",
            verdict: "conditional-pass",
            conditions: ["Obtain a legal review before implementation"],
          }),
          gate({ gate: "fiscal", verdict: "pass", conditions: [] }),
          gate({
            gate: "fiscal",
            verdict: "conditional-pass",
            attempt: 2,
            conditions: ["Phase the funding across fiscal years"],
          }),
        ],
        unresolved: [],
        unavailable: [],
      },
    );

    expect(decision.approved).toBe(true);
    expect(decision.auto_rejected).toBe(false);
    expect(decision.rationale).toBe("2 support, 0 conditional, 0 oppose across 2 department memos.");
    expect(decision.conditions).toEqual([
      "Obtain a legal review before implementation",
      "Phase the funding across fiscal years",
    ]);
  });
});

describe("buildExecutionPlan", () => {
  const decision: Decision = {
    approved: true,
    policy_text: "Test policy",
    rationale: "",
    conditions: [
      "Satisfy legal requirement: Consult the data regulator",
      "Phase the funding across fiscal years",
      "Set up a delivery unit",
    ],
    auto_rejected: false,
    created_at: "2026-01-01T00:00:00.000Z",
  };

  it("schedules conditions first, then measures across the policy duration", () => {
    const plan = buildExecutionPlan({
      issue: issue({ departments: ["planning", "finance", "legal"] }),
      policy_card: policyCard({ duration_months: 12, key_measures: ["Pilot", "Rollout", "Review"] }),
      decision,
      unavailable: [],
    });

    expect(plan.steps.map(({ order, owner, action, deadline_offset_days }) => [
      order,
      owner,
      action,
      deadline_offset_days,
    ])).toEqual([
      [1, "legal", "Satisfy legal requirement: Consult the data regulator", 30],
      [2, "finance", "Phase the funding across fiscal years", 60],
      [3, "planning", "Set up a delivery unit", 90],
      [4, "planning", "Pilot", 210],
      [5, "finance", "Rollout", 330],
      [6, "legal", "Review", 450],
    ]);
  });

  it("assigns no work to unavailable departments", () => {
    const plan = buildExecutionPlan({
      issue: issue({ departments: ["environment", "finance"] }),
      policy_card: policyCard({ key_measures: ["Pilot", "Rollout"] }),
      decision: { ...decision, conditions: [] },
      unavailable,
    });

    expect(plan.steps.map((step) => step.owner)).toEqual(["finance", "finance"]);
  });

  it("keeps work with departments that missed only a later turn", () => {
    const plan = buildExecutionPlan({
      issue: issue({ departments: ["finance", "legal"] }),
      policy_card: policyCard({ key_measures: ["Pilot", "Rollout"] }),
      decision: { ...decision, conditions: ["Satisfy legal requirement: Consult the data regulator"] },
      unavailable: [
        {
          actor_id: asAgentId("legal"),
          department: "legal",
          stage: "legal_gate",
          reason: "failed after 3 attempts: model offline",
        },
      ],
    });

    expect(plan.steps.map((step) => [step.owner, step.action])).toEqual([
      ["legal", "Satisfy legal requirement: Consult the data regulator"],
      ["finance", "Pilot"],
      ["legal", "Rollout"],
    ]);
  });
});
