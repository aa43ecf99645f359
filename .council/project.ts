export default {
  name: "policy-council",
  issuesDir: ".council/issues.d",
  runsDir: ".council/runs",
  runDefaults: {
    maxRounds: 5,
    remediateGates: true,
  },
  retry: { attempts: 2, backoffMs: 100 },
  stageTimeoutMs: 30_000,
  mailboxWaitMs: 50,
  maxConcurrentActors: 6,
  negotiation: { disputeThreshold: 0.35 },
  server: { socketPath: ".council/council.sock" },
};
