import {
  type Actor,
  type ActorContext,
  type ActorTask,
  DECIDER_ID,
  OFFICE_ID,
  type Observation,
} from "../actors/actor";
import { AgentManager, type TurnResult } from "../actors/agent-manager";
import { createCoordinatorActor } from "../actors/coordinator-actor";
import { createDeciderActor } from "../actors/decider-actor";
import { type Deliberator, fallbackPolicyCard } from "../actors/deliberator";
import { createDepartmentActor } from "../actors/department-actor";
import { GateReviewer } from "../gates/gate-reviewer";
import { NegotiationEngine } from "../negotiation/negotiation-engine";
import { detectDisputes } from "../negotiation/disputes";
import { renderExecutionPlan, renderTranscript } from "../observability/transcript";
import type { ProjectConfig } from "../project/config";
import type { DepartmentProfiles } from "../project/departments";
import { autoRejectDecision, composeDecision, failingGates } from "../ruling/decision";
import { buildExecutionPlan } from "../ruling/execution-plan";
import { ToolGateway } from "../tools/tool-gateway";
import {
  ActorInvocationError,
  RunCancelledError,
  errorMessage,
  throwIfCancelled,
} from "./errors";
import { type EventDraft, EventStream } from "./event-stream";
import type { Logger } from "./logger";
import { Mailbox } from "./mailbox";
import type { RunStore } from "./run-store";
import {
  type AgentId,
  type Decision,
  type DepartmentCode,
  type Dispute,
  type GateName,
  type GateResult,
  type Issue,
  type Memo,
  type PolicyCard,
  type Run,
  type RunSnapshot,
  type RunStatus,
  type Stage,
  type UnavailableContribution,
  deepFreeze,
  stageIndex,
} from "./types";

export type OrchestratorSettings = Pick<
  ProjectConfig,
  "retry" | "stageTimeoutMs" | "mailboxWaitMs" | "maxConcurrentActors" | "negotiation"
>;

export interface StageOrchestratorDeps {
  run: Run;
  issue: Issue;
  store: RunStore;
  deliberator: Deliberator;
  profiles: DepartmentProfiles;
  settings: OrchestratorSettings;
  logger: Logger;
}

const unresolvedOf = (disputes: readonly Dispute[]): Dispute[] =>
  disputes.filter((dispute) => dispute.status === "unresolved-at-limit");

/**
 * Drives one run through the eight stages. Sole writer of the run record
 * and of the run's event stream; every stage ends with a snapshot save.
 */
export class StageOrchestrator {
  readonly stream: EventStream;
  readonly mailbox: Mailbox;
  private readonly state: RunSnapshot;
  private readonly abort = new AbortController();
  private readonly agents: AgentManager;
  private readonly tools: ToolGateway;
  private readonly office: Actor;
  private readonly decider: Actor;
  private readonly departments = new Map<DepartmentCode, Actor>();
  private readonly logger: Logger;

  constructor(private readonly deps: StageOrchestratorDeps) {
    const { run, issue, store } = deps;
    this.logger = deps.logger.child("orchestrator", { run: run.run_id });
    this.stream = new EventStream(run.run_id, (event) => store.appendEvent(event));
    this.mailbox = new Mailbox(run.run_id);
    this.tools = new ToolGateway({ enableSentiment: run.config.enableSentiment });
    this.state = {
      run: { ...run },
      issue,
      memos: [],
      unavailable: [],
      disputes: [],
      rounds: [],
      gate_results: [],
      artifacts: [],
    };

    this.office = createCoordinatorActor();
    this.decider = createDeciderActor();
    this.mailbox.register(OFFICE_ID);
    this.mailbox.register(DECIDER_ID);
    for (const code of issue.departments) {
      const actor = createDepartmentActor(deps.profiles[code]);
      this.departments.set(code, actor);
      this.mailbox.register(actor.id);
    }

    this.agents = new AgentManager({
      retry: deps.settings.retry,
      stageTimeoutMs: deps.settings.stageTimeoutMs,
      maxConcurrent: deps.settings.maxConcurrentActors,
      logger: this.logger,
      createContext: (actor, signal) => this.createContext(actor, signal),
    });
  }

  get runId() {
    return this.state.run.run_id;
  }

  get status(): RunStatus {
    return this.state.run.status;
  }

  snapshot(): RunSnapshot {
    return structuredClone(this.state);
  }

  cancel(reason = "run cancelled"): void {
    if (this.state.run.status !== "running" || this.abort.signal.aborted) {
      return;
    }
    this.logger.info("cancel requested", { reason });
    this.abort.abort(new RunCancelledError(reason));
  }

  /** Runs every stage; resolves with the final snapshot and never rejects. */
  async run(): Promise<RunSnapshot> {
    try {
      this.save();
      await this.issueIntake();
      await this.departmentMemos();
      await this.disputeAggregation();
      await this.negotiation();
      await this.gate("legal_gate", "legal");
      await this.gate("fiscal_gate", "fiscal");
      await this.finalRuling();
      await this.executionPlanning();
      this.complete();
    } catch (error) {
      this.terminate(error);
    } finally {
      this.mailbox.close();
    }
    return this.snapshot();
  }

  private get signal(): AbortSignal {
    return this.abort.signal;
  }

  private emit(draft: EventDraft): void {
    this.stream.append(draft);
  }

  private save(): void {
    this.state.run.updated_at = new Date().toISOString();
    this.deps.store.saveSnapshot(this.state);
  }

  private enter(stage: Stage): void {
    throwIfCancelled(this.signal);
    const from = this.stream.length === 0 ? null : this.state.run.stage;
    if (from !== null && stageIndex(stage) < stageIndex(from)) {
      throw new Error(`Stage cannot move back from ${from} to ${stage}`);
    }
    this.state.run.stage = stage;
    this.state.run.updated_at = new Date().toISOString();
    this.logger.debug("stage entered", { stage });
    this.emit({ type: "stage_change", payload: { from, to: stage } });
  }

  private createContext(actor: Actor, signal: AbortSignal): ActorContext {
    const { config } = this.state.run;
    return {
      actorId: actor.id,
      deliberator: this.deps.deliberator,
      tools: this.tools,
      mailbox: this.mailbox,
      settings: {
        model: config.model,
        temperature: config.temperature,
        enableSearch: config.enableSearch,
      },
      signal,
      mailboxWaitMs: this.deps.settings.mailboxWaitMs,
      report: (report) => {
        if (signal.aborted || this.stream.isClosed) {
          return;
        }
        this.emit({ type: "tool_call", actor_id: actor.id, payload: report });
      },
    };
  }

  private observe(actor: Actor, task: ActorTask): Observation {
    return deepFreeze({
      run_id: this.state.run.run_id,
      stage: this.state.run.stage,
      issue: this.state.issue,
      ...(this.state.policy_card ? { policy_card: this.state.policy_card } : {}),
      memos: [...this.state.memos],
      messages: this.mailbox.drain(actor.id),
      task,
    });
  }

  private async turn(
    stage: Stage,
    entries: readonly { actor: Actor; task: ActorTask }[],
  ): Promise<TurnResult> {
    const result = await this.agents.runTurn(
      stage,
      entries.map(({ actor, task }) => ({
        actor,
        observe: () => this.observe(actor, task),
      })),
      this.signal,
    );
    this.recordUnavailable(result.unavailable);
    return result;
  }

  private recordUnavailable(entries: readonly UnavailableContribution[]): void {
    for (const entry of entries) {
      this.state.unavailable.push(entry);
      this.emit({
        type: "error",
        actor_id: entry.actor_id,
        payload: {
          message: `${entry.department ?? entry.actor_id} unavailable during ${entry.stage}: ${entry.reason}`,
          fatal: false,
          stage: entry.stage,
        },
      });
    }
  }

  private acceptMemos(memos: readonly Memo[]): void {
    for (const memo of memos) {
      const index = this.state.memos.findIndex(
        (entry) => entry.department === memo.department,
      );
      if (index >= 0) {
        this.state.memos[index] = memo;
      } else {
        this.state.memos.push(memo);
      }
      const actor = this.departments.get(memo.department);
      this.emit({
        type: "memo_ready",
        ...(actor ? { actor_id: actor.id } : {}),
        payload: { memo },
      });
    }
  }

  private memosFrom(
    result: TurnResult,
    actors: readonly Actor[],
  ): Memo[] {
    return actors.flatMap((actor) => {
      const output = result.outputs.get(actor.id);
      return output?.kind === "memo" ? [output.memo] : [];
    });
  }

  private departmentActors(codes: readonly DepartmentCode[]): Actor[] {
    return codes.flatMap((code) => {
      const actor = this.departments.get(code);
      return actor ? [actor] : [];
    });
  }

  private withMemo(codes: readonly DepartmentCode[]): DepartmentCode[] {
    return codes.filter((code) =>
      this.state.memos.some((memo) => memo.department === code),
    );
  }

  private setDisputes(disputes: readonly Dispute[]): void {
    this.state.disputes = [...disputes];
    this.emit({ type: "dispute_update", payload: { disputes: [...disputes] } });
  }

  private policyCard(): PolicyCard {
    return this.state.policy_card ?? fallbackPolicyCard(this.state.issue);
  }

  private async issueIntake(): Promise<void> {
    this.enter("issue_intake");
    const result = await this.turn("issue_intake", [
      { actor: this.office, task: { kind: "policy_card" } },
    ]);
    const output = result.outputs.get(OFFICE_ID);
    const card = deepFreeze(
      output?.kind === "policy_card"
        ? output.policy_card
        : fallbackPolicyCard(this.state.issue),
    );
    this.state.policy_card = card;
    this.emit({
      type: "policy_card_created",
      actor_id: OFFICE_ID,
      payload: { policy_card: card },
    });
    this.save();
  }

  private async departmentMemos(): Promise<void> {
    this.enter("department_memos");
    const actors = this.departmentActors(this.state.issue.departments);
    const result = await this.turn(
      "department_memos",
      actors.map((actor) => ({ actor, task: { kind: "memo" } })),
    );
    this.acceptMemos(this.memosFrom(result, actors));
    this.save();
  }

  private async disputeAggregation(): Promise<void> {
    this.enter("dispute_aggregation");
    const disputes = detectDisputes(this.state.memos, [], {
      threshold: this.deps.settings.negotiation.disputeThreshold,
      round: 0,
    });
    this.setDisputes(disputes);
    if (disputes.length > 0) {
      await this.turn("dispute_aggregation", [
        { actor: this.office, task: { kind: "aggregate", disputes } },
      ]);
    }
    this.save();
  }

  private async negotiation(): Promise<void> {
    this.enter("negotiation");
    const { config } = this.state.run;
    const engine = new NegotiationEngine(
      {
        mediate: async (round, disputes) => {
          const result = await this.turn("negotiation", [
            { actor: this.office, task: { kind: "mediation", round, disputes } },
          ]);
          const output = result.outputs.get(OFFICE_ID);
          return output?.kind === "mediation" ? output.proposals : [];
        },
        revise: async (round, codes, disputes) => {
          const actors = this.departmentActors(this.withMemo(codes));
          const result = await this.turn(
            "negotiation",
            actors.map((actor) => ({
              actor,
              task: { kind: "revision", round, disputes },
            })),
          );
          const memos = this.memosFrom(result, actors);
          this.acceptMemos(memos);
          return memos;
        },
      },
      {
        disputesChanged: (disputes) => this.setDisputes(disputes),
        roundCompleted: (round, resolved) => {
          this.state.rounds.push(round);
          this.emit({
            type: "negotiation_round",
            payload: {
              round: round.round,
              convergence_score: round.convergence_score,
              resolved_this_round: resolved,
              remaining: round.open_disputes.length,
              ...(round.stop_reason ? { stop_reason: round.stop_reason } : {}),
            },
          });
        },
      },
    );

    const outcome = await engine.run(this.state.memos, this.state.disputes, {
      maxRounds: config.maxRounds,
      convergenceThreshold: config.convergenceThreshold,
      convergenceFloor: config.convergenceFloor,
      disputeThreshold: this.deps.settings.negotiation.disputeThreshold,
      signal: this.signal,
    });
    this.state.memos = outcome.memos;
    this.state.disputes = outcome.disputes;

    let concessions = 0;
    if (this.mailbox.pendingCount(OFFICE_ID) > 0) {
      const result = await this.turn("negotiation", [
        { actor: this.office, task: { kind: "settlement" } },
      ]);
      const output = result.outputs.get(OFFICE_ID);
      concessions = output?.kind === "settlement" ? output.concessions.length : 0;
    }
    this.logger.info("negotiation finished", {
      rounds: outcome.rounds.length,
      stop_reason: outcome.stop_reason,
      concessions,
    });
    this.save();
  }

  private latestGate(gate: GateName): GateResult | undefined {
    return this.state.gate_results.filter((result) => result.gate === gate).at(-1);
  }

  private async gate(stage: "legal_gate" | "fiscal_gate", gate: GateName): Promise<void> {
    this.enter(stage);
    const reviewer = new GateReviewer(async (name, department) => {
      const actor = this.departments.get(department);
      if (!actor || this.withMemo([department]).length === 0) {
        return undefined;
      }
      const result = await this.turn(stage, [
        {
          actor,
          task: {
            kind: "judgment",
            gate: name,
            unresolved: unresolvedOf(this.state.disputes),
          },
        },
      ]);
      const output = result.outputs.get(actor.id);
      return output?.kind === "judgment" ? output.judgment : undefined;
    });

    const review = async (attempt: number): Promise<GateResult> => {
      const input = {
        issue: this.state.issue,
        policy_card: this.policyCard(),
        memos: [...this.state.memos],
        unresolved: unresolvedOf(this.state.disputes),
        unavailable: [...this.state.unavailable],
        attempt,
      };
      if (gate === "legal") {
        return reviewer.reviewLegal(input);
      }
      const legal = this.latestGate("legal");
      if (!legal) {
        throw new Error("fiscal gate requires a legal gate result");
      }
      return reviewer.reviewFiscal({ ...input, legal });
    };

    let result = await review(1);
    this.recordGate(result);
    if (
      result.verdict === "fail" &&
      this.state.run.config.remediateGates &&
      result.implicated.length > 0
    ) {
      await this.remediate(stage, result);
      result = await review(2);
      this.recordGate(result);
    }
    this.save();
  }

  private recordGate(result: GateResult): void {
    this.state.gate_results.push(result);
    this.emit({ type: "gate_result", payload: { result } });
  }

  private async remediate(stage: Stage, result: GateResult): Promise<void> {
    const codes = this.withMemo(result.implicated);
    const actors = this.departmentActors(codes);
    for (const actor of actors) {
      const message = this.mailbox.send({
        from: OFFICE_ID,
        to: actor.id,
        type: "remediation_request",
        payload: { gate: result.gate, findings: result.findings },
      });
      this.emit({
        type: "tool_call",
        actor_id: OFFICE_ID,
        payload: {
          call: "mailbox",
          name: "send",
          detail: { to: actor.id, type: message.type, message_id: message.id },
        },
      });
    }
    const turn = await this.turn(
      stage,
      actors.map((actor) => ({
        actor,
        task: { kind: "remediation", gate: result.gate, findings: result.findings },
      })),
    );
    this.acceptMemos(this.memosFrom(turn, actors));
  }

  private async finalRuling(): Promise<void> {
    this.enter("final_ruling");
    const context = {
      policy_card: this.policyCard(),
      gate_results: [...this.state.gate_results],
      unresolved: unresolvedOf(this.state.disputes),
      unavailable: [...this.state.unavailable],
    };

    let actorId: AgentId | undefined;
    let decision: Decision;
    if (failingGates(this.state.gate_results).length > 0) {
      decision = autoRejectDecision(context);
    } else {
      const result = await this.turn("final_ruling", [
        {
          actor: this.decider,
          task: {
            kind: "ruling",
            gate_results: context.gate_results,
            unresolved: context.unresolved,
            unavailable: context.unavailable,
          },
        },
      ]);
      const output = result.outputs.get(DECIDER_ID);
      if (output?.kind !== "ruling") {
        const reason =
          result.unavailable.find((entry) => entry.actor_id === DECIDER_ID)?.reason ??
          "no ruling produced";
        throw new ActorInvocationError(
          DECIDER_ID,
          "final_ruling",
          `decider unavailable: ${reason}`,
        );
      }
      decision = composeDecision(output.ruling, context);
      actorId = DECIDER_ID;
    }

    this.state.decision = deepFreeze(decision);
    this.emit({
      type: "decision",
      ...(actorId ? { actor_id: actorId } : {}),
      payload: { decision },
    });
    this.writeArtifact("final_decision.json", JSON.stringify(decision, null, 2));
    this.save();
  }

  private async executionPlanning(): Promise<void> {
    this.enter("execution_planning");
    const decision = this.state.decision;
    if (decision?.approved) {
      const plan = buildExecutionPlan({
        issue: this.state.issue,
        policy_card: this.policyCard(),
        decision,
        unavailable: this.state.unavailable,
      });
      this.state.execution_plan = plan;
      this.writeArtifact("execution_plan.json", JSON.stringify(plan, null, 2));
      this.writeArtifact(
        "execution_plan.md",
        renderExecutionPlan(plan, this.state.policy_card),
      );
    }
    this.writeArtifact("transcript.md", renderTranscript(this.state));
    this.save();
  }

  private writeArtifact(name: string, content: string): void {
    const artifact = this.deps.store.writeArtifact(this.state.run.run_id, name, content);
    this.state.artifacts.push(artifact);
    this.emit({ type: "artifact_created", payload: { artifact } });
  }

  private complete(): void {
    this.state.run.status = "completed";
    this.save();
    this.logger.info("run completed", { approved: this.state.decision?.approved });
    this.emit({
      type: "completed",
      payload: { status: "completed", approved: this.state.decision?.approved ?? false },
    });
  }

  private terminate(error: unknown): void {
    const cancelled = error instanceof RunCancelledError || this.signal.aborted;
    const message = cancelled
      ? errorMessage(this.signal.reason ?? error)
      : errorMessage(error);
    this.state.run.status = cancelled ? "cancelled" : "failed";
    this.state.run.error = message;
    try {
      this.save();
    } catch (saveError) {
      this.logger.error("final snapshot not saved", { error: errorMessage(saveError) });
    }

    if (cancelled) {
      this.logger.info("run cancelled", { stage: this.state.run.stage, reason: message });
    } else {
      this.logger.error("run failed", { stage: this.state.run.stage, error: message });
    }
    if (this.stream.isClosed) {
      return;
    }
    try {
      this.emit({
        type: "error",
        payload: {
          message,
          fatal: true,
          ...(cancelled ? { cancelled: true } : {}),
          stage: this.state.run.stage,
        },
      });
    } catch (emitError) {
      this.logger.error("terminal event not persisted", { error: errorMessage(emitError) });
      this.stream.close();
    }
  }
}
