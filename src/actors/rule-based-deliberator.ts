import { throwIfCancelled } from "../core/errors";
import type { MediationProposal, Memo, PolicyCard, Stance } from "../core/types";
import { GATE_TOPICS } from "../gates/gate-reviewer";
import type { DepartmentProfiles } from "../project/departments";
import {
  type Deliberator,
  type GateJudgment,
  type JudgmentPrompt,
  type MediationPrompt,
  type MemoDraft,
  type MemoPrompt,
  type PolicyCardPrompt,
  type RevisionPrompt,
  type RulingDraft,
  type RulingPrompt,
  fallbackPolicyCard,
  recommendationTopic,
} from "./deliberator";

const SUPPORT_SCORE = 0.2;
const OPPOSE_SCORE = -0.2;
const CONCESSION_CONFIDENCE_GAIN = 0.05;

const round2 = (value: number): number => Math.round(value * 100) / 100;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

export const stanceForScore = (score: number): Stance => {
  if (score >= SUPPORT_SCORE) return "support";
  if (score <= OPPOSE_SCORE) return "oppose";
  return "conditional";
};

const MEDIATED_STANCE: Stance = "conditional";

/** Round in which a department accepts mediation on a dispute of this severity. */
export const concessionRound = (severity: number): number => {
  if (severity < 0.5) return 1;
  if (severity < 0.75) return 2;
  return 3;
};

const topicRecommendations = (memo: Memo, topic: string): string[] =>
  memo.recommendations
    .filter((recommendation) => recommendationTopic(recommendation) === topic)
    .map((recommendation) => recommendation.slice(topic.length + 1).trim());

/**
 * Deterministic deliberation from department profiles: stance from keyword
 * signals, stance bias and budget pressure; concessions by round and
 * dispute severity. The same prompt always yields the same draft.
 */
export class RuleBasedDeliberator implements Deliberator {
  constructor(private readonly profiles: DepartmentProfiles) {}

  async draftPolicyCard(
    { issue }: PolicyCardPrompt,
    signal?: AbortSignal,
  ): Promise<PolicyCard> {
    throwIfCancelled(signal);
    const card = fallbackPolicyCard(issue);
    return issue.policy_seed?.summary
      ? card
      : { ...card, summary: `${issue.description} Urgency: ${issue.urgency}.` };
  }

  async draftMemo(
    { department, issue, policy_card }: MemoPrompt,
    signal?: AbortSignal,
  ): Promise<MemoDraft> {
    throwIfCancelled(signal);
    const profile = this.profiles[department];
    const text = [
      issue.title,
      issue.description,
      ...policy_card.key_measures,
      ...policy_card.risk_factors,
    ]
      .join(" ")
      .toLowerCase();

    let score = profile.bias;
    for (const signalRule of profile.signals) {
      if (signalRule.keywords.some((keyword) => text.includes(keyword.toLowerCase()))) {
        score += signalRule.weight;
      }
    }
    const pressure =
      policy_card.estimated_budget / issue.constraints.budget_ceiling - 0.5;
    score = round2(score - profile.budget_sensitivity * Math.max(0, pressure));

    const stance = stanceForScore(score);
    return {
      stance,
      rationale: `${profile.name} (${profile.mandate}): ${stance} at score ${score.toFixed(2)}`,
      concerns: profile.topics.map(
        (topic) => profile.concerns[topic] ?? `Open questions on ${topic}`,
      ),
      recommendations: profile.topics.map(
        (topic) =>
          profile.recommendations[topic] ?? `${topic}: review before rollout`,
      ),
      topics: [...profile.topics],
      confidence: profile.confidence,
    };
  }

  async reviseMemo(
    { department, current, round, proposals, disputes, rebuttals, findings }: RevisionPrompt,
    signal?: AbortSignal,
  ): Promise<MemoDraft> {
    throwIfCancelled(signal);
    const base: MemoDraft = {
      stance: current.stance,
      rationale: current.rationale,
      concerns: [...current.concerns],
      recommendations: [...current.recommendations],
      topics: [...current.topics],
      confidence: current.confidence,
    };

    if (findings.length > 0) {
      return {
        ...base,
        stance: current.stance === "oppose" ? "conditional" : current.stance,
        rationale: `${current.rationale}; revised to address gate findings`,
        concerns: [...base.concerns, ...findings],
      };
    }

    const conceded: string[] = [];
    let { stance, recommendations } = base;
    for (const proposal of proposals) {
      if (!proposal.departments.includes(department)) {
        continue;
      }
      const severity =
        disputes.find((dispute) => dispute.id === proposal.dispute_id)?.severity ?? 1;
      if (round < concessionRound(severity)) {
        continue;
      }
      recommendations = [
        ...recommendations.filter(
          (recommendation) => recommendationTopic(recommendation) !== proposal.topic,
        ),
        proposal.proposal,
      ];
      stance = proposal.suggested_stance;
      conceded.push(proposal.topic);
    }

    const held = [
      ...new Set(
        rebuttals
          .filter(
            (request) =>
              request.positions[department] !== undefined &&
              !conceded.includes(request.topic),
          )
          .map((request) => request.topic),
      ),
    ];
    const maintained =
      held.length > 0
        ? `; maintained ${current.stance} on ${held.join(", ")} in round ${round}`
        : "";

    if (conceded.length === 0) {
      return held.length === 0
        ? base
        : { ...base, rationale: `${current.rationale}${maintained}` };
    }
    return {
      ...base,
      stance,
      recommendations,
      rationale: `${current.rationale}; accepted mediation on ${conceded.join(", ")} in round ${round}${maintained}`,
      confidence: round2(
        clamp01(current.confidence + CONCESSION_CONFIDENCE_GAIN * conceded.length),
      ),
    };
  }

  async mediate(
    { disputes, concessions }: MediationPrompt,
    signal?: AbortSignal,
  ): Promise<MediationProposal[]> {
    throwIfCancelled(signal);
    // Departments already at the mediated stance get no further proposals.
    const settled = new Set(
      concessions
        .filter((offer) => offer.to === MEDIATED_STANCE)
        .map((offer) => offer.department),
    );
    return disputes.flatMap((dispute) => {
      const departments = dispute.departments.filter((code) => !settled.has(code));
      if (departments.length === 0) {
        return [];
      }
      return [
        {
          dispute_id: dispute.id,
          topic: dispute.topic,
          departments,
          proposal: `${dispute.topic}: phased approach agreed between ${dispute.departments.join(" and ")}`,
          suggested_stance: MEDIATED_STANCE,
        },
      ];
    });
  }

  async review(
    { gate, department, memo }: JudgmentPrompt,
    signal?: AbortSignal,
  ): Promise<GateJudgment> {
    throwIfCancelled(signal);
    const name = this.profiles[department].name;
    if (!memo) {
      return {
        verdict: "conditional-pass",
        findings: [`${name} has no memo on record`],
        conditions: [],
      };
    }

    const conditions = topicRecommendations(memo, GATE_TOPICS[gate]);
    if (memo.stance === "oppose") {
      return {
        verdict: "conditional-pass",
        findings: [`${name} maintains objections: ${memo.concerns.join("; ")}`],
        conditions,
      };
    }
    return { verdict: "pass", findings: [], conditions };
  }

  async rule(
    { policy_card, memos }: RulingPrompt,
    signal?: AbortSignal,
  ): Promise<RulingDraft> {
    throwIfCancelled(signal);
    const count = (stance: Stance) =>
      memos.filter((memo) => memo.stance === stance).length;
    const support = count("support");
    const conditional = count("conditional");
    const oppose = count("oppose");

    return {
      approved: memos.length > 0 && support + conditional > oppose,
      policy_text: `${policy_card.title}. Measures: ${policy_card.key_measures.join("; ")}.`,
      rationale: `${support} support, ${conditional} conditional, ${oppose} oppose across ${memos.length} department memos.`,
      conditions: [],
    };
  }
}
