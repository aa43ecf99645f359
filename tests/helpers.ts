import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Deliberator } from "../src/actors/deliberator";
import { RuleBasedDeliberator } from "../src/actors/rule-based-deliberator";
import { silentLogger } from "../src/core/logger";
import { RunController } from "../src/core/run-controller";
import { FileRunStore } from "../src/core/run-store";
import {
  type DepartmentCode,
  type Issue,
  type Memo,
  type PolicyCard,
  type Stance,
  asIssueId,
} from "../src/core/types";
import { BUNDLED_DATA_DIR, type ProjectConfig, normalizeProjectConfig } from "../src/project/config";
import { type DepartmentProfiles, loadDepartmentProfiles } from "../src/project/departments";
import { IssueCatalog } from "../src/project/issues";

export const tempDir = (prefix = "council-"): string =>
  fs.mkdtempSync(path.join(os.tmpdir(), prefix));

export const profiles: DepartmentProfiles = loadDepartmentProfiles(BUNDLED_DATA_DIR);

export const memo = (
  department: DepartmentCode,
  stance: Stance,
  topics: string[],
  options: { recommendations?: string[]; confidence?: number; revision?: number } = {},
): Memo => ({
  department,
  stance,
  rationale: `${department} is ${stance}`,
  concerns: [],
  recommendations:
    options.recommendations ?? topics.map((topic) => `${topic}: shared plan`),
  topics,
  confidence: options.confidence ?? 0.8,
  revision: options.revision ?? 0,
  created_at: "2026-01-01T00:00:00.000Z",
});

export const policyCard = (overrides: Partial<PolicyCard> = {}): PolicyCard => ({
  title: "Test policy",
  summary: "A policy under test",
  estimated_budget: 100_000_000,
  duration_months: 12,
  affected_population: 50_000,
  key_measures: ["Measure one", "Measure two"],
  risk_factors: [],
  ...overrides,
});

export const issue = (overrides: Partial<Issue> = {}): Issue => ({
  id: asIssueId("test-issue"),
  title: "Test issue",
  description: "An issue under test",
  background: "",
  urgency: "medium",
  departments: ["finance", "industry"],
  constraints: { budget_ceiling: 1_000_000_000, legal_requirements: [] },
  ...overrides,
});

export const testConfig = (root: string): ProjectConfig =>
  normalizeProjectConfig(
    {
      runsDir: "runs",
      issuesDir: "issues.d",
      retry: { attempts: 2, backoffMs: 1 },
      stageTimeoutMs: 5_000,
      mailboxWaitMs: 5,
    },
    root,
  );

export interface Harness {
  root: string;
  controller: RunController;
  catalog: IssueCatalog;
  store: FileRunStore;
  config: ProjectConfig;
}

export const createHarness = async (
  deliberator: Deliberator = new RuleBasedDeliberator(profiles),
): Promise<Harness> => {
  const root = tempDir("council-run-");
  const config = testConfig(root);
  const catalog = new IssueCatalog([path.join(BUNDLED_DATA_DIR, "issues")]);
  await catalog.load();
  const store = new FileRunStore(config.runsDir);
  store.ensure();
  const controller = new RunController({
    catalog,
    store,
    profiles,
    deliberator,
    config,
    logger: silentLogger(),
  });
  return { root, controller, catalog, store, config };
};
