import type {
  Decision,
  Dispute,
  ExecutionPlan,
  GateResult,
  Memo,
  NegotiationRound,
  PolicyCard,
  RunEvent,
  RunSnapshot,
  RunSummary,
} from "../core/types";

export const buildRunLines = (runs: RunSummary[]): string[] =>
  runs.length > 0
    ? runs.map(
        (run) => `${run.run_id}: ${run.issue_id} ${run.stage} (${run.status})`,
      )
    : ["No runs"];

export const buildMemoLines = (memos: readonly Memo[]): string[] =>
  memos.map(
    (memo) =>
      `${memo.department} r${memo.revision}: ${memo.stance} (confidence ${memo.confidence.toFixed(2)})`,
  );

export const buildDisputeLines = (disputes: readonly Dispute[]): string[] =>
  disputes.length > 0
    ? disputes.map(
        (dispute) =>
          `${dispute.id}: ${dispute.status} severity=${dispute.severity.toFixed(2)} [${dispute.departments.join(", ")}]`,
      )
    : ["No disputes"];

export const buildRoundLines = (rounds: readonly NegotiationRound[]): string[] =>
  rounds.map(
    (round) =>
      `round ${round.round}: score=${round.convergence_score.toFixed(4)} resolved=${round.resolved_disputes.length} open=${round.open_disputes.length}${round.stop_reason ? ` stop=${round.stop_reason}` : ""}`,
  );

export const buildGateLines = (results: readonly GateResult[]): string[] =>
  results.map(
    (result) =>
      `${result.gate} #${result.attempt}: ${result.verdict}${result.findings.length > 0 ? ` - ${result.findings.join("; ")}` : ""}`,
  );

/** One line per event, for live console output. */
export const formatEventLine = (event: RunEvent): string => {
  const actor = event.actor_id ? ` ${event.actor_id}` : "";
  const prefix = `#${event.seq} ${event.type}${actor}`;
  switch (event.type) {
    case "stage_change":
      return `${prefix}: ${event.payload.from ?? "start"} -> ${event.payload.to}`;
    case "policy_card_created":
      return `${prefix}: ${event.payload.policy_card.title}`;
    case "memo_ready":
      return `${prefix}: ${event.payload.memo.stance} r${event.payload.memo.revision}`;
    case "dispute_update":
      return `${prefix}: ${event.payload.disputes.map((dispute) => `${dispute.id}=${dispute.status}`).join(", ") || "none"}`;
    case "negotiation_round":
      return `${prefix}: round ${event.payload.round} score=${event.payload.convergence_score.toFixed(4)} remaining=${event.payload.remaining}`;
    case "tool_call":
      return `${prefix}: ${event.payload.call} ${event.payload.name}`;
    case "gate_result":
      return `${prefix}: ${event.payload.result.gate} ${event.payload.result.verdict}`;
    case "decision":
      return `${prefix}: ${event.payload.decision.approved ? "approved" : "rejected"}`;
    case "artifact_created":
      return `${prefix}: ${event.payload.artifact.name}`;
    case "completed":
      return `${prefix}: ${event.payload.approved ? "approved" : "rejected"}`;
    case "error":
      return `${prefix}: ${event.payload.message}${event.payload.fatal ? " (fatal)" : ""}`;
  }
};

const bullets = (items: readonly string[]): string[] =>
  items.length > 0 ? items.map((item) => `- ${item}`) : ["- (none)"];

const renderPolicyCard = (card: PolicyCard | undefined): string[] =>
  card
    ? [
        `**${card.title}**`,
        "",
        card.summary,
        "",
        `- Budget: ${card.estimated_budget}`,
        `- Duration: ${card.duration_months} months`,
        `- Affected population: ${card.affected_population}`,
        "",
        "Key measures:",
        ...bullets(card.key_measures),
        "",
        "Risk factors:",
        ...bullets(card.risk_factors),
      ]
    : ["(no policy card)"];

const renderMemo = (memo: Memo): string[] => [
  `### ${memo.department} (revision ${memo.revision})`,
  "",
  `Stance: ${memo.stance}, confidence ${memo.confidence.toFixed(2)}`,
  "",
  memo.rationale,
  "",
  "Concerns:",
  ...bullets(memo.concerns),
  "",
  "Recommendations:",
  ...bullets(memo.recommendations),
  "",
];

const renderDecision = (decision: Decision | undefined): string[] =>
  decision
    ? [
        `Approved: ${decision.approved ? "yes" : "no"}${decision.auto_rejected ? " (auto-rejected)" : ""}`,
        "",
        decision.policy_text,
        "",
        decision.rationale,
        "",
        "Conditions:",
        ...bullets(decision.conditions),
      ]
    : ["(no decision)"];

export const renderExecutionPlan = (
  plan: ExecutionPlan,
  card: PolicyCard | undefined,
): string =>
  [
    `# Execution plan${card ? `: ${card.title}` : ""}`,
    "",
    "| # | Owner | Action | Deadline (days) |",
    "|---|-------|--------|-----------------|",
    ...plan.steps.map(
      (step) =>
        `| ${step.order} | ${step.owner} | ${step.action} | ${step.deadline_offset_days} |`,
    ),
    "",
  ].join("\n");

/** Full markdown record of a run: memos, negotiation, gates and ruling. */
export const renderTranscript = (snapshot: RunSnapshot): string =>
  [
    `# ${snapshot.issue.title}`,
    "",
    `Run ${snapshot.run.run_id}, status ${snapshot.run.status}`,
    "",
    "## Policy card",
    "",
    ...renderPolicyCard(snapshot.policy_card),
    "",
    "## Memos",
    "",
    ...snapshot.memos.flatMap(renderMemo),
    ...(snapshot.unavailable.length > 0
      ? [
          "Unavailable:",
          ...bullets(
            snapshot.unavailable.map(
              (entry) =>
                `${entry.department ?? entry.actor_id} at ${entry.stage}: ${entry.reason}`,
            ),
          ),
          "",
        ]
      : []),
    "## Disputes",
    "",
    ...bullets(buildDisputeLines(snapshot.disputes)),
    "",
    "## Negotiation",
    "",
    ...bullets(buildRoundLines(snapshot.rounds)),
    "",
    "## Gates",
    "",
    ...bullets(buildGateLines(snapshot.gate_results)),
    "",
    "## Decision",
    "",
    ...renderDecision(snapshot.decision),
    "",
  ].join("\n");
