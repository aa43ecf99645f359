import { recommendationTopic } from "../actors/deliberator";
import {
  DEPARTMENT_CODES,
  type DepartmentCode,
  type Dispute,
  type DisputeId,
  type Memo,
  type Stance,
  asDisputeId,
} from "../core/types";

export const STANCE_VALUE: Record<Stance, number> = {
  support: 1,
  conditional: 0.5,
  oppose: 0,
};

const STANCE_WEIGHT = 0.7;
const RECOMMENDATION_WEIGHT = 0.3;

export const stanceGap = (a: Stance, b: Stance): number =>
  Math.abs(STANCE_VALUE[a] - STANCE_VALUE[b]);

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

export const tokenize = (text: string): string[] =>
  text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);

/** Tokens of the memo's recommendations on `topic`. */
export const topicTokens = (memo: Memo, topic: string): Set<string> =>
  new Set(
    memo.recommendations
      .filter((recommendation) => recommendationTopic(recommendation) === topic)
      .flatMap(tokenize),
  );

/** Jaccard similarity; two empty sets are identical. */
export const jaccard = (a: ReadonlySet<string>, b: ReadonlySet<string>): number => {
  if (a.size === 0 && b.size === 0) {
    return 1;
  }
  let shared = 0;
  for (const token of a) {
    if (b.has(token)) {
      shared += 1;
    }
  }
  return shared / (a.size + b.size - shared);
};

export const divergence = (a: Memo, b: Memo, topic: string): number =>
  STANCE_WEIGHT * stanceGap(a.stance, b.stance) +
  RECOMMENDATION_WEIGHT * (1 - jaccard(topicTokens(a, topic), topicTokens(b, topic)));

export const byDepartmentOrder = (a: DepartmentCode, b: DepartmentCode): number =>
  DEPARTMENT_CODES.indexOf(a) - DEPARTMENT_CODES.indexOf(b);

export const isActive = (dispute: Dispute): boolean =>
  dispute.status === "open" || dispute.status === "resolving";

interface Divergence {
  departments: Set<DepartmentCode>;
  severity: number;
}

/** Topics on which some pair of memos diverges beyond `threshold`. */
export const findDivergences = (
  memos: readonly Memo[],
  threshold: number,
): Map<string, Divergence> => {
  const ordered = [...memos].sort((a, b) =>
    byDepartmentOrder(a.department, b.department),
  );
  const topics = [...new Set(ordered.flatMap((memo) => memo.topics))].sort();
  const found = new Map<string, Divergence>();

  for (const topic of topics) {
    const holders = ordered.filter((memo) => memo.topics.includes(topic));
    for (let i = 0; i < holders.length; i += 1) {
      for (let j = i + 1; j < holders.length; j += 1) {
        const a = holders[i];
        const b = holders[j];
        if (!a || !b) {
          continue;
        }
        const score = divergence(a, b, topic);
        if (score <= threshold) {
          continue;
        }
        const entry = found.get(topic) ?? { departments: new Set(), severity: 0 };
        entry.departments.add(a.department);
        entry.departments.add(b.department);
        entry.severity = Math.max(entry.severity, score);
        found.set(topic, entry);
      }
    }
  }
  return found;
};

const positionsOf = (
  memos: readonly Memo[],
  departments: readonly DepartmentCode[],
): Partial<Record<DepartmentCode, Stance>> => {
  const positions: Partial<Record<DepartmentCode, Stance>> = {};
  for (const department of departments) {
    const memo = memos.find((entry) => entry.department === department);
    if (memo) {
      positions[department] = memo.stance;
    }
  }
  return positions;
};

const nextDisputeId = (topic: string, existing: readonly Dispute[]): DisputeId => {
  const previous = existing.filter((dispute) => dispute.topic === topic).length;
  return asDisputeId(
    previous === 0 ? `dispute-${topic}` : `dispute-${topic}-${previous + 1}`,
  );
};

export interface DetectionOptions {
  threshold: number;
  /** 0 during aggregation, the negotiation round afterwards. */
  round: number;
}

/**
 * Re-detects disputes over the current memo set. Active disputes are
 * re-scored in place (new objects, same id). A dispute whose topic no longer
 * diverges moves one step: `open` to `resolving`, `resolving` to `resolved`
 * in `round`. Settled disputes never reopen; renewed divergence on their
 * topic opens a fresh dispute.
 */
export const detectDisputes = (
  memos: readonly Memo[],
  existing: readonly Dispute[],
  options: DetectionOptions,
): Dispute[] => {
  const found = findDivergences(memos, options.threshold);
  const next: Dispute[] = [];

  for (const dispute of existing) {
    if (!isActive(dispute)) {
      next.push(dispute);
      continue;
    }
    const current = found.get(dispute.topic);
    if (current) {
      const departments = [...current.departments].sort(byDepartmentOrder);
      next.push({
        ...dispute,
        departments,
        positions: positionsOf(memos, departments),
        severity: round4(current.severity),
      });
      found.delete(dispute.topic);
      continue;
    }
    if (dispute.status === "open") {
      next.push({
        ...dispute,
        positions: positionsOf(memos, dispute.departments),
        status: "resolving",
      });
      continue;
    }
    next.push({
      ...dispute,
      positions: positionsOf(memos, dispute.departments),
      status: "resolved",
      resolved_round: options.round,
      resolution: `positions on ${dispute.topic} converged in round ${options.round}`,
    });
  }

  for (const [topic, entry] of found) {
    const departments = [...entry.departments].sort(byDepartmentOrder);
    next.push({
      id: nextDisputeId(topic, next),
      topic,
      departments,
      positions: positionsOf(memos, departments),
      severity: round4(entry.severity),
      status: "open",
      opened_round: options.round,
    });
  }
  return next;
};
