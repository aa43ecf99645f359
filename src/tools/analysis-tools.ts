import { type Static, Type } from "@sinclair/typebox";

export const PolicyCardSchema = Type.Object({
  title: Type.String(),
  summary: Type.String(),
  estimated_budget: Type.Number({ minimum: 0 }),
  duration_months: Type.Integer({ minimum: 1 }),
  affected_population: Type.Integer({ minimum: 0 }),
  key_measures: Type.Array(Type.String()),
  risk_factors: Type.Array(Type.String()),
});

export const ImpactArgsSchema = Type.Object({
  policy_card: PolicyCardSchema,
  scenario: Type.Union([
    Type.Literal("baseline"),
    Type.Literal("optimistic"),
    Type.Literal("pessimistic"),
  ]),
});

export const OpinionArgsSchema = Type.Object({
  policy_card: PolicyCardSchema,
  context: Type.String(),
});

export const StakeholderArgsSchema = Type.Object({
  policy_card: PolicyCardSchema,
  stakeholder_type: Type.Union([
    Type.Literal("citizens"),
    Type.Literal("businesses"),
    Type.Literal("government"),
  ]),
});

export const RiskArgsSchema = Type.Object({
  policy_card: PolicyCardSchema,
  risk_category: Type.Union([
    Type.Literal("financial"),
    Type.Literal("operational"),
    Type.Literal("legal"),
    Type.Literal("social"),
  ]),
});

export const FeasibilityArgsSchema = Type.Object({
  policy_card: PolicyCardSchema,
  aspect: Type.Union([
    Type.Literal("technical"),
    Type.Literal("financial"),
    Type.Literal("timeline"),
    Type.Literal("resource"),
  ]),
  budget_ceiling: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
});

export type ImpactArgs = Static<typeof ImpactArgsSchema>;
export type OpinionArgs = Static<typeof OpinionArgsSchema>;
export type StakeholderArgs = Static<typeof StakeholderArgsSchema>;
export type RiskArgs = Static<typeof RiskArgsSchema>;
export type FeasibilityArgs = Static<typeof FeasibilityArgsSchema>;

export interface ImpactEstimate {
  gdp_delta: number;
  employment_delta: number;
  inflation_delta: number;
  distributional_notes: string;
}

export interface OpinionSimulation {
  support_rate: number;
  volatility: number;
  key_concerns: string[];
}

export interface StakeholderAnalysis {
  stakeholder_type: StakeholderArgs["stakeholder_type"];
  impact_level: "low" | "medium" | "high";
  benefits: string[];
  concerns: string[];
  affected_population: number;
}

export type RiskLevel = "low" | "medium" | "high";

export interface RiskAssessment {
  category: RiskArgs["risk_category"];
  level: RiskLevel;
  risks: string[];
  mitigation: string[];
  existing_risk_factors: string[];
}

export interface FeasibilityCheck {
  aspect: FeasibilityArgs["aspect"];
  feasible: boolean;
  score: number;
  issues: string[];
  recommendations: string[];
}

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const SCENARIO_MULTIPLIERS: Record<ImpactArgs["scenario"], number> = {
  baseline: 1,
  optimistic: 1.5,
  pessimistic: 0.6,
};

export const impactEstimate = ({
  policy_card,
  scenario,
}: ImpactArgs): ImpactEstimate => {
  const multiplier = SCENARIO_MULTIPLIERS[scenario];
  const budget = policy_card.estimated_budget;
  const affected = policy_card.affected_population;

  return {
    gdp_delta: round((budget / 1e9) * 0.02 * multiplier, 4),
    employment_delta: Math.trunc((budget / 1e6) * 5 * multiplier),
    inflation_delta: round((budget / 1e10) * 0.001 * multiplier, 4),
    distributional_notes: `${scenario} scenario: ${affected} direct beneficiaries, ${affected * 3} indirectly affected.`,
  };
};

export const publicOpinionSim = ({
  policy_card,
  context,
}: OpinionArgs): OpinionSimulation => {
  const riskCount = policy_card.risk_factors.length;
  const lowered = context.toLowerCase();
  const concerns: string[] = [];
  if (lowered.includes("budget") || lowered.includes("fiscal")) {
    concerns.push("fiscal burden");
  }
  if (lowered.includes("urgent") || lowered.includes("deadline")) {
    concerns.push("delivery timeliness");
  }
  if (riskCount > 2) {
    concerns.push("policy risk");
  }
  if (concerns.length === 0) {
    concerns.push("transparency");
  }

  return {
    support_rate: round(Math.max(0.3, Math.min(0.9, 0.65 - riskCount * 0.05)), 2),
    volatility: round(0.1 + riskCount * 0.02, 2),
    key_concerns: concerns,
  };
};

const STAKEHOLDER_PROFILES: Record<
  StakeholderArgs["stakeholder_type"],
  Omit<StakeholderAnalysis, "stakeholder_type" | "affected_population">
> = {
  citizens: {
    impact_level: "medium",
    benefits: ["better public services", "improved living conditions"],
    concerns: ["possible tax burden", "delivery quality"],
  },
  businesses: {
    impact_level: "medium",
    benefits: ["market opportunities", "policy support"],
    concerns: ["compliance cost", "shifting competition"],
  },
  government: {
    impact_level: "high",
    benefits: ["policy goals met", "stronger governance capacity"],
    concerns: ["fiscal pressure", "execution difficulty"],
  },
};

export const stakeholderAnalysis = ({
  policy_card,
  stakeholder_type,
}: StakeholderArgs): StakeholderAnalysis => ({
  stakeholder_type,
  ...STAKEHOLDER_PROFILES[stakeholder_type],
  affected_population: policy_card.affected_population,
});

export const riskAssessment = ({
  policy_card,
  risk_category,
}: RiskArgs): RiskAssessment => {
  const riskFactors = [...policy_card.risk_factors];
  switch (risk_category) {
    case "financial":
      return {
        category: risk_category,
        level: policy_card.estimated_budget > 1e9 ? "medium" : "low",
        risks: ["budget overrun", "unstable funding sources"],
        mitigation: ["budget monitoring", "diversified funding"],
        existing_risk_factors: riskFactors,
      };
    case "operational":
      return {
        category: risk_category,
        level: policy_card.duration_months > 36 ? "high" : "medium",
        risks: ["insufficient delivery capacity", "schedule slippage"],
        mitigation: ["capacity building", "milestone tracking"],
        existing_risk_factors: riskFactors,
      };
    case "legal":
      return {
        category: risk_category,
        level: "low",
        risks: ["thin statutory basis", "procedural compliance"],
        mitigation: ["shore up legal basis", "follow due process"],
        existing_risk_factors: riskFactors,
      };
    case "social":
      return {
        category: risk_category,
        level: riskFactors.length > 2 ? "medium" : "low",
        risks: ["public acceptance", "conflicting interests"],
        mitigation: ["public communication", "benefit-sharing mechanism"],
        existing_risk_factors: riskFactors,
      };
  }
};

const DEFAULT_BUDGET_CEILING = 5e9;

export const feasibilityCheck = ({
  policy_card,
  aspect,
  budget_ceiling,
}: FeasibilityArgs): FeasibilityCheck => {
  switch (aspect) {
    case "technical":
      return {
        aspect,
        feasible: true,
        score: 0.8,
        issues: ["requires technical support", "requires specialist staff"],
        recommendations: ["technical design review", "talent plan"],
      };
    case "financial": {
      const ceiling = budget_ceiling ?? DEFAULT_BUDGET_CEILING;
      const feasible = policy_card.estimated_budget <= ceiling;
      return {
        aspect,
        feasible,
        score: feasible ? 0.7 : 0.4,
        issues: feasible ? [] : ["budget exceeds available ceiling"],
        recommendations: ["phase the rollout", "seek co-funding"],
      };
    }
    case "timeline": {
      const feasible = policy_card.duration_months <= 60;
      return {
        aspect,
        feasible,
        score: feasible ? 0.75 : 0.5,
        issues: feasible ? [] : ["long delivery horizon"],
        recommendations: ["tighten the schedule", "critical path management"],
      };
    }
    case "resource": {
      const feasible = policy_card.key_measures.length <= 10;
      return {
        aspect,
        feasible,
        score: feasible ? 0.7 : 0.5,
        issues: feasible ? [] : ["many measures, heavy resource demand"],
        recommendations: ["pool resources", "prioritize measures"],
      };
    }
  }
};
