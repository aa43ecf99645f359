import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ValidationError } from "./errors";
import type { RunConfig } from "./types";

export const RunConfigSchema = Type.Object(
  {
    maxRounds: Type.Integer({ minimum: 1, maximum: 20, default: 5 }),
    /** Minimum round-over-round score improvement before negotiation is considered stalled. */
    convergenceThreshold: Type.Number({
      exclusiveMinimum: 0,
      maximum: 1,
      default: 0.15,
    }),
    /** Absolute score at which negotiation ends as converged. */
    convergenceFloor: Type.Number({
      exclusiveMinimum: 0,
      maximum: 1,
      default: 0.9,
    }),
    model: Type.String({ minLength: 1, default: "council-default" }),
    temperature: Type.Number({ minimum: 0, maximum: 2, default: 0.7 }),
    enableSearch: Type.Boolean({ default: false }),
    enableSentiment: Type.Boolean({ default: false }),
    remediateGates: Type.Boolean({ default: false }),
  },
  { additionalProperties: false },
);

const SNAKE_CASE_KEYS: Record<string, keyof RunConfig> = {
  max_rounds: "maxRounds",
  convergence_threshold: "convergenceThreshold",
  convergence_floor: "convergenceFloor",
  enable_search: "enableSearch",
  enable_sentiment: "enableSentiment",
  enable_public_opinion: "enableSentiment",
  remediate_gates: "remediateGates",
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const normalizeKeys = (input: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(input).map(([key, value]) => [
      SNAKE_CASE_KEYS[key] ?? key,
      value,
    ]),
  );

/**
 * Merges `input` over `defaults` and the schema defaults, then validates.
 * Accepts snake_case keys as sent by HTTP clients.
 */
export const resolveRunConfig = (
  input: unknown,
  defaults: Record<string, unknown> = {},
): RunConfig => {
  if (input !== undefined && input !== null && !isRecord(input)) {
    throw new ValidationError("Run config must be an object");
  }

  const merged: unknown = Value.Default(RunConfigSchema, {
    ...normalizeKeys(defaults),
    ...(input ? normalizeKeys(input) : {}),
  });

  if (!Value.Check(RunConfigSchema, merged)) {
    const issues = [...Value.Errors(RunConfigSchema, merged)].map(
      (error) => `${error.path || "/"}: ${error.message}`,
    );
    throw new ValidationError("Invalid run config", issues);
  }

  return merged;
};

export const defaultRunConfig = (): RunConfig => resolveRunConfig({});
