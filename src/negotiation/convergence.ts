import type { Dispute, Memo, NegotiationStopReason } from "../core/types";
import { isActive, stanceGap } from "./disputes";

export const CONVERGENCE_WEIGHTS = {
  agreement: 0.4,
  reduction: 0.4,
  confidence: 0.2,
} as const;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

/** 1 minus the mean pairwise stance gap; 1 with fewer than two memos. */
export const stanceAgreement = (memos: readonly Memo[]): number => {
  let total = 0;
  let pairs = 0;
  for (let i = 0; i < memos.length; i += 1) {
    for (let j = i + 1; j < memos.length; j += 1) {
      const a = memos[i];
      const b = memos[j];
      if (a && b) {
        total += stanceGap(a.stance, b.stance);
        pairs += 1;
      }
    }
  }
  return pairs === 0 ? 1 : 1 - total / pairs;
};

/** Share of disputes resolved; 1 when nothing was ever disputed. */
export const disputeReduction = (disputes: readonly Dispute[]): number => {
  if (disputes.length === 0) {
    return 1;
  }
  const resolved = disputes.filter((dispute) => dispute.status === "resolved").length;
  return resolved / disputes.length;
};

export const meanConfidence = (memos: readonly Memo[]): number =>
  memos.length === 0
    ? 0
    : memos.reduce((sum, memo) => sum + memo.confidence, 0) / memos.length;

/** Mean confidence plus its change since the previous round, clamped to [0, 1]. */
export const confidenceTrend = (mean: number, previousMean: number = mean): number =>
  clamp01(mean + (mean - previousMean));

export interface ConvergenceInput {
  memos: readonly Memo[];
  disputes: readonly Dispute[];
  previousMeanConfidence?: number;
}

export const convergenceScore = ({
  memos,
  disputes,
  previousMeanConfidence,
}: ConvergenceInput): number =>
  round4(
    CONVERGENCE_WEIGHTS.agreement * stanceAgreement(memos) +
      CONVERGENCE_WEIGHTS.reduction * disputeReduction(disputes) +
      CONVERGENCE_WEIGHTS.confidence *
        confidenceTrend(meanConfidence(memos), previousMeanConfidence),
  );

export interface TerminationInput {
  round: number;
  maxRounds: number;
  score: number;
  previousScore?: number;
  disputes: readonly Dispute[];
  /** Minimum round-over-round improvement. */
  threshold: number;
  /** Absolute score that ends negotiation. */
  floor: number;
}

/**
 * Stop after `round` when nothing is open, the floor is reached, the score
 * improved by less than `threshold` since the previous round (from round 2),
 * or the round limit is hit. Checked in that order.
 */
export const terminationReason = ({
  round,
  maxRounds,
  score,
  previousScore,
  disputes,
  threshold,
  floor,
}: TerminationInput): NegotiationStopReason | undefined => {
  if (!disputes.some(isActive)) {
    return "no_open_disputes";
  }
  if (score >= floor) {
    return "convergence_floor";
  }
  if (round >= 2 && previousScore !== undefined && score - previousScore < threshold) {
    return "stalled";
  }
  if (round >= maxRounds) {
    return "round_limit";
  }
  return undefined;
};
