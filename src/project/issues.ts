import fs from "node:fs";
import path from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { createJiti } from "jiti";
import { ValidationError } from "../core/errors";
import { type Logger, silentLogger } from "../core/logger";
import {
  DEPARTMENT_CODES,
  type Issue,
  type IssueId,
  asIssueId,
  deepFreeze,
} from "../core/types";
import { PolicyCardSchema } from "../tools/analysis-tools";

export const DEFAULT_BUDGET_CEILING = 5e9;

export const IssueDefinitionSchema = Type.Object({
  id: Type.String({ pattern: "^[a-z0-9][a-z0-9-]*$" }),
  title: Type.String({ minLength: 1 }),
  description: Type.String({ minLength: 1 }),
  background: Type.String({ default: "" }),
  urgency: Type.Union(
    [
      Type.Literal("low"),
      Type.Literal("medium"),
      Type.Literal("high"),
      Type.Literal("critical"),
    ],
    { default: "medium" },
  ),
  departments: Type.Array(
    Type.Union(DEPARTMENT_CODES.map((code) => Type.Literal(code))),
    { minItems: 1, uniqueItems: true },
  ),
  constraints: Type.Object(
    {
      budget_ceiling: Type.Number({
        exclusiveMinimum: 0,
        default: DEFAULT_BUDGET_CEILING,
      }),
      legal_requirements: Type.Array(Type.String(), { default: [] }),
    },
    { default: {} },
  ),
  policy_seed: Type.Optional(Type.Partial(PolicyCardSchema)),
});

export type IssueDefinition = Static<typeof IssueDefinitionSchema>;

/** Typed helper for `.council/issues.d/*.ts` modules. */
export const defineIssue = (
  issue: Partial<IssueDefinition> & Pick<IssueDefinition, "id" | "title" | "description" | "departments">,
): Partial<IssueDefinition> => issue;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const unwrapDefault = (loaded: unknown): unknown =>
  isRecord(loaded) && "default" in loaded ? (loaded.default ?? loaded) : loaded;

export const parseIssue = (raw: unknown, source = "issue"): Issue => {
  const withDefaults: unknown = Value.Default(
    IssueDefinitionSchema,
    structuredClone(raw),
  );
  if (!Value.Check(IssueDefinitionSchema, withDefaults)) {
    const issues = [...Value.Errors(IssueDefinitionSchema, withDefaults)].map(
      (error) => `${error.path || "/"}: ${error.message}`,
    );
    throw new ValidationError(`Invalid issue definition in ${source}`, issues);
  }

  const { policy_seed, ...rest } = withDefaults;
  return deepFreeze({
    ...rest,
    id: asIssueId(rest.id),
    ...(policy_seed ? { policy_seed } : {}),
  });
};

/**
 * Read-only issue definitions. Later directories override earlier ones by
 * id, so project issues replace the bundled samples.
 */
export class IssueCatalog {
  private readonly issues = new Map<IssueId, Issue>();

  constructor(
    private readonly directories: string[],
    private readonly logger: Logger = silentLogger(),
  ) {}

  async load(): Promise<void> {
    this.issues.clear();
    for (const directory of this.directories) {
      await this.loadIssueDirectory(directory);
    }
    this.logger.info("issues loaded", { count: this.issues.size });
  }

  private async loadIssueDirectory(directory: string): Promise<void> {
    if (!fs.existsSync(directory)) {
      return;
    }

    const jiti = createJiti(import.meta.url);
    const entries = fs
      .readdirSync(directory)
      .filter((entry) => [".json", ".ts", ".js"].includes(path.extname(entry)))
      .sort();
    for (const entry of entries) {
      const file = path.join(directory, entry);
      const loaded: unknown =
        path.extname(entry) === ".json"
          ? JSON.parse(fs.readFileSync(file, "utf8"))
          : unwrapDefault(await jiti.import(file));
      const definitions = Array.isArray(loaded) ? loaded : [loaded];
      for (const definition of definitions) {
        const issue = parseIssue(definition, file);
        if (this.issues.has(issue.id)) {
          this.logger.debug("issue overridden", { id: issue.id, file });
        }
        this.issues.set(issue.id, issue);
      }
    }
  }

  list(): Issue[] {
    return [...this.issues.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  get(issueId: string): Issue | undefined {
    return this.issues.get(asIssueId(issueId));
  }

  register(definition: unknown): Issue {
    const issue = parseIssue(definition);
    this.issues.set(issue.id, issue);
    return issue;
  }
}
