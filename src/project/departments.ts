import fs from "node:fs";
import path from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ValidationError } from "../core/errors";
import { type DepartmentCode, DEPARTMENT_CODES } from "../core/types";

const DepartmentCodeSchema = Type.Union(
  DEPARTMENT_CODES.map((code) => Type.Literal(code)),
);

const ToolUseSchema = Type.Object({
  tool: Type.String(),
  args: Type.Record(Type.String(), Type.Unknown()),
});

const SignalSchema = Type.Object({
  keywords: Type.Array(Type.String(), { minItems: 1 }),
  weight: Type.Number({ minimum: -1, maximum: 1 }),
});

export const DepartmentProfileSchema = Type.Object({
  code: DepartmentCodeSchema,
  name: Type.String({ minLength: 1 }),
  mandate: Type.String(),
  topics: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  /** Added to the stance score before thresholds apply. */
  bias: Type.Number({ minimum: -1, maximum: 1 }),
  /** Weight of budget pressure (budget / ceiling above one half) on the stance score. */
  budget_sensitivity: Type.Number({ minimum: 0 }),
  confidence: Type.Number({ minimum: 0, maximum: 1 }),
  signals: Type.Array(SignalSchema),
  tools: Type.Array(ToolUseSchema),
  concerns: Type.Record(Type.String(), Type.String()),
  recommendations: Type.Record(Type.String(), Type.String()),
});

export type DepartmentProfile = Static<typeof DepartmentProfileSchema>;
export type DepartmentProfiles = Readonly<Record<DepartmentCode, DepartmentProfile>>;

const ProfileListSchema = Type.Array(DepartmentProfileSchema);

export const parseDepartmentProfiles = (raw: unknown): DepartmentProfiles => {
  if (!Value.Check(ProfileListSchema, raw)) {
    const issues = [...Value.Errors(ProfileListSchema, raw)].map(
      (error) => `${error.path || "/"}: ${error.message}`,
    );
    throw new ValidationError("Invalid department profiles", issues);
  }

  const byCode = new Map<DepartmentCode, DepartmentProfile>(
    raw.map((profile) => [profile.code, profile]),
  );
  const missing = DEPARTMENT_CODES.filter((code) => !byCode.has(code));
  if (missing.length > 0) {
    throw new ValidationError("Missing department profiles", missing);
  }

  const pick = (code: DepartmentCode): DepartmentProfile => {
    const profile = byCode.get(code);
    if (!profile) {
      throw new ValidationError("Missing department profile", [code]);
    }
    return Object.freeze(profile);
  };
  return Object.freeze({
    finance: pick("finance"),
    legal: pick("legal"),
    planning: pick("planning"),
    industry: pick("industry"),
    environment: pick("environment"),
    security: pick("security"),
  });
};

export const loadDepartmentProfiles = (dataDir: string): DepartmentProfiles => {
  const file = path.join(dataDir, "departments.json");
  return parseDepartmentProfiles(JSON.parse(fs.readFileSync(file, "utf8")));
};
