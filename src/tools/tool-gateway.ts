import type { TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ToolExecutionError } from "../core/errors";
import {
  FeasibilityArgsSchema,
  type FeasibilityCheck,
  type ImpactEstimate,
  ImpactArgsSchema,
  OpinionArgsSchema,
  type OpinionSimulation,
  RiskArgsSchema,
  type RiskAssessment,
  type StakeholderAnalysis,
  StakeholderArgsSchema,
  feasibilityCheck,
  impactEstimate,
  publicOpinionSim,
  riskAssessment,
  stakeholderAnalysis,
} from "./analysis-tools";

export const TOOL_NAMES = [
  "impact_estimate",
  "public_opinion_sim",
  "stakeholder_analysis",
  "risk_assessment",
  "feasibility_check",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const isToolName = (value: string): value is ToolName =>
  (TOOL_NAMES as readonly string[]).includes(value);

export type ToolResult =
  | { tool: "impact_estimate"; output: ImpactEstimate }
  | { tool: "public_opinion_sim"; output: OpinionSimulation }
  | { tool: "stakeholder_analysis"; output: StakeholderAnalysis }
  | { tool: "risk_assessment"; output: RiskAssessment }
  | { tool: "feasibility_check"; output: FeasibilityCheck };

export interface ToolGatewayOptions {
  enableSentiment: boolean;
}

const describeErrors = (schema: TSchema, args: unknown): string =>
  [...Value.Errors(schema, args)]
    .map((error) => `${error.path || "/"} ${error.message}`)
    .join("; ");

/**
 * Synchronous façade over the analysis tools. Holds only immutable feature
 * flags, so one instance can serve concurrent actors.
 */
export class ToolGateway {
  constructor(private readonly options: ToolGatewayOptions) {}

  available(): ToolName[] {
    return TOOL_NAMES.filter(
      (name) => name !== "public_opinion_sim" || this.options.enableSentiment,
    );
  }

  invoke(name: string, args: unknown): ToolResult {
    if (!isToolName(name)) {
      throw new ToolExecutionError(name, "unknown tool");
    }

    switch (name) {
      case "impact_estimate":
        if (!Value.Check(ImpactArgsSchema, args)) {
          throw new ToolExecutionError(name, describeErrors(ImpactArgsSchema, args));
        }
        return { tool: name, output: impactEstimate(args) };
      case "public_opinion_sim":
        if (!this.options.enableSentiment) {
          throw new ToolExecutionError(name, "sentiment simulation is disabled for this run");
        }
        if (!Value.Check(OpinionArgsSchema, args)) {
          throw new ToolExecutionError(name, describeErrors(OpinionArgsSchema, args));
        }
        return { tool: name, output: publicOpinionSim(args) };
      case "stakeholder_analysis":
        if (!Value.Check(StakeholderArgsSchema, args)) {
          throw new ToolExecutionError(
            name,
            describeErrors(StakeholderArgsSchema, args),
          );
        }
        return { tool: name, output: stakeholderAnalysis(args) };
      case "risk_assessment":
        if (!Value.Check(RiskArgsSchema, args)) {
          throw new ToolExecutionError(name, describeErrors(RiskArgsSchema, args));
        }
        return { tool: name, output: riskAssessment(args) };
      case "feasibility_check":
        if (!Value.Check(FeasibilityArgsSchema, args)) {
          throw new ToolExecutionError(
            name,
            describeErrors(FeasibilityArgsSchema, args),
          );
        }
        return { tool: name, output: feasibilityCheck(args) };
    }
  }
}
