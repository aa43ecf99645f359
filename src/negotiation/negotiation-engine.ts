import { throwIfCancelled } from "../core/errors";
import type {
  DepartmentCode,
  Dispute,
  DisputeId,
  MediationProposal,
  Memo,
  NegotiationRound,
  NegotiationStopReason,
} from "../core/types";
import { convergenceScore, meanConfidence, terminationReason } from "./convergence";
import { byDepartmentOrder, detectDisputes, isActive } from "./disputes";

/** The actor turns a round needs; supplied by the orchestrator. */
export interface NegotiationParticipants {
  mediate(round: number, disputes: readonly Dispute[]): Promise<MediationProposal[]>;
  /** Revised memos of the departments that completed the turn. */
  revise(
    round: number,
    departments: readonly DepartmentCode[],
    disputes: readonly Dispute[],
  ): Promise<Memo[]>;
}

export interface NegotiationListener {
  disputesChanged(disputes: readonly Dispute[]): void;
  roundCompleted(round: NegotiationRound, resolvedThisRound: DisputeId[]): void;
}

export interface NegotiationOptions {
  maxRounds: number;
  convergenceThreshold: number;
  convergenceFloor: number;
  disputeThreshold: number;
  signal: AbortSignal;
}

export interface NegotiationOutcome {
  memos: Memo[];
  disputes: Dispute[];
  rounds: NegotiationRound[];
  stop_reason: NegotiationStopReason;
}

const replaceMemos = (memos: readonly Memo[], revised: readonly Memo[]): Memo[] =>
  memos.map(
    (memo) => revised.find((entry) => entry.department === memo.department) ?? memo,
  );

const sameDisputes = (a: readonly Dispute[], b: readonly Dispute[]): boolean =>
  JSON.stringify(a) === JSON.stringify(b);

/**
 * Bounded negotiation over the memo set. Each round mediates the active
 * disputes, collects revisions from the disputing departments, re-detects
 * disputes and scores convergence. Disputes still active when the loop ends
 * are marked `unresolved-at-limit`.
 */
export class NegotiationEngine {
  constructor(
    private readonly participants: NegotiationParticipants,
    private readonly listener: NegotiationListener,
  ) {}

  async run(
    initialMemos: readonly Memo[],
    initialDisputes: readonly Dispute[],
    options: NegotiationOptions,
  ): Promise<NegotiationOutcome> {
    let memos = [...initialMemos];
    let disputes = [...initialDisputes];
    const rounds: NegotiationRound[] = [];

    if (!disputes.some(isActive)) {
      return { memos, disputes, rounds, stop_reason: "no_open_disputes" };
    }

    let previousMean = meanConfidence(memos);
    let previousScore: number | undefined;
    let stopReason: NegotiationStopReason = "round_limit";

    for (let round = 1; round <= options.maxRounds; round += 1) {
      throwIfCancelled(options.signal);
      const active = disputes.filter(isActive);
      const proposals = await this.participants.mediate(round, active);

      // Every active dispute's departments revise this round, proposal or not.
      const marked = disputes.map((dispute) =>
        dispute.status === "open"
          ? { ...dispute, status: "resolving" as const }
          : dispute,
      );
      if (!sameDisputes(marked, disputes)) {
        disputes = marked;
        this.listener.disputesChanged(disputes);
      }

      const departments = [
        ...new Set(active.flatMap((dispute) => dispute.departments)),
      ].sort(byDepartmentOrder);
      const revised = await this.participants.revise(
        round,
        departments,
        disputes.filter(isActive),
      );
      throwIfCancelled(options.signal);
      memos = replaceMemos(memos, revised);

      const before = new Set(disputes.filter(isActive).map((dispute) => dispute.id));
      const detected = detectDisputes(memos, disputes, {
        threshold: options.disputeThreshold,
        round,
      });
      const resolvedThisRound = detected
        .filter((dispute) => dispute.status === "resolved" && before.has(dispute.id))
        .map((dispute) => dispute.id);
      if (!sameDisputes(detected, disputes)) {
        disputes = detected;
        this.listener.disputesChanged(disputes);
      }

      const score = convergenceScore({
        memos,
        disputes,
        previousMeanConfidence: previousMean,
      });
      const stop = terminationReason({
        round,
        maxRounds: options.maxRounds,
        score,
        ...(previousScore !== undefined ? { previousScore } : {}),
        disputes,
        threshold: options.convergenceThreshold,
        floor: options.convergenceFloor,
      });

      const record: NegotiationRound = {
        round,
        memos: Object.fromEntries(memos.map((memo) => [memo.department, memo])),
        convergence_score: score,
        resolved_disputes: resolvedThisRound,
        open_disputes: disputes.filter(isActive).map((dispute) => dispute.id),
        proposals,
        ...(stop ? { stop_reason: stop } : {}),
        created_at: new Date().toISOString(),
      };
      rounds.push(record);
      this.listener.roundCompleted(record, resolvedThisRound);

      previousMean = meanConfidence(memos);
      previousScore = score;
      if (stop) {
        stopReason = stop;
        break;
      }
    }

    if (disputes.some(isActive)) {
      disputes = disputes.map((dispute) =>
        isActive(dispute)
          ? { ...dispute, status: "unresolved-at-limit" as const }
          : dispute,
      );
      this.listener.disputesChanged(disputes);
    }

    return { memos, disputes, rounds, stop_reason: stopReason };
  }
}
