#!/usr/bin/env -S node --import tsx
import path from "node:path";
import { parseArgs } from "node:util";
import { RuleBasedDeliberator } from "./actors/rule-based-deliberator";
import { errorMessage } from "./core/errors";
import { createLogger } from "./core/logger";
import { RunController } from "./core/run-controller";
import { FileRunStore } from "./core/run-store";
import { buildRunLines, formatEventLine } from "./observability/transcript";
import { loadProjectConfig } from "./project/config";
import { loadDepartmentProfiles } from "./project/departments";
import { IssueCatalog } from "./project/issues";
import { ControlServer } from "./server/control-server";

const USAGE = `Usage:
  policy-council serve [--port <n>]
  policy-council run <issue-id> [--max-rounds <n>] [--remediate]
  policy-council issues
  policy-council runs
  policy-council delete <run-id>`;

const main = async (): Promise<number> => {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      cwd: { type: "string" },
      port: { type: "string" },
      "max-rounds": { type: "string" },
      remediate: { type: "boolean" },
    },
  });
  const cwd = path.resolve(values.cwd ?? process.cwd());
  const logger = createLogger("council");
  const config = await loadProjectConfig(cwd, logger);

  const catalog = new IssueCatalog(
    [path.join(config.dataDir, "issues"), config.issuesDir],
    logger,
  );
  await catalog.load();
  const profiles = loadDepartmentProfiles(config.dataDir);
  const store = new FileRunStore(config.runsDir);
  store.ensure();
  const controller = new RunController({
    catalog,
    store,
    profiles,
    deliberator: new RuleBasedDeliberator(profiles),
    config,
    logger,
  });

  const [command = "serve", target] = positionals;
  switch (command) {
    case "issues":
      for (const issue of controller.listIssues()) {
        process.stdout.write(`${issue.id}: ${issue.title}\n`);
      }
      return 0;

    case "runs":
      process.stdout.write(`${buildRunLines(controller.listRuns()).join("\n")}\n`);
      return 0;

    case "delete":
      if (!target) {
        process.stderr.write(`${USAGE}\n`);
        return 2;
      }
      controller.deleteRun(target);
      process.stdout.write(`deleted ${target}\n`);
      return 0;

    case "run": {
      if (!target) {
        process.stderr.write(`${USAGE}\n`);
        return 2;
      }
      const runId = controller.createRun(target, {
        ...(values["max-rounds"] ? { maxRounds: Number(values["max-rounds"]) } : {}),
        ...(values.remediate ? { remediateGates: true } : {}),
      });
      const cancel = () => controller.cancel(runId, "interrupted");
      process.once("SIGINT", cancel);
      for await (const event of controller.subscribe(runId, "start")) {
        process.stdout.write(`${formatEventLine(event)}\n`);
      }
      const snapshot = await controller.waitForRun(runId);
      process.off("SIGINT", cancel);
      process.stdout.write(`run ${runId} ${snapshot.run.status}\n`);
      return snapshot.run.status === "completed" ? 0 : 1;
    }

    case "serve": {
      const port = values.port ? Number(values.port) : undefined;
      const server = new ControlServer(
        controller,
        port === undefined ? config.server : { port, host: config.server.host },
        logger,
      );
      await server.start();
      await new Promise<void>((resolve) => {
        process.once("SIGINT", () => resolve());
        process.once("SIGTERM", () => resolve());
      });
      await controller.shutdown();
      await server.stop();
      return 0;
    }

    default:
      process.stderr.write(`${USAGE}\n`);
      return 2;
  }
};

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${errorMessage(error)}\n`);
    process.exitCode = 1;
  },
);
