import { defineIssue } from "../../src/project/issues";

export default defineIssue({
  id: "night-bus-network",
  title: "Night bus network expansion",
  description:
    "Extend public transport with twelve night bus routes serving hospital, logistics and hospitality shift workers.",
  background:
    "Late-shift workers report commutes over ninety minutes after the last metro departure.",
  urgency: "medium",
  departments: ["finance", "planning", "security"],
  constraints: {
    budget_ceiling: 4e8,
    legal_requirements: ["Public service obligation contract with operators"],
  },
  policy_seed: {
    estimated_budget: 1.8e8,
    duration_months: 18,
    affected_population: 240_000,
    key_measures: [
      "Tender twelve night routes",
      "Staff safety patrols at interchange hubs",
    ],
    risk_factors: ["Driver recruitment shortfall"],
  },
});
