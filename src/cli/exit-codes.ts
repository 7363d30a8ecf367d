import type { RunReport } from "../orchestration/download-orchestrator";

export const ExitCode = {
  Success: 0,
  Failure: 1,
  Incomplete: 2,
  Cancelled: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Quota exhaustion wins over item failures: the run stopped with work pending either way. */
export function exitCodeFor(report: Pick<RunReport, "outcome" | "failed">): ExitCode {
  if (report.outcome === "cancelled") return ExitCode.Cancelled;
  if (report.outcome === "quota_exhausted") return ExitCode.Incomplete;
  if (report.failed > 0) return ExitCode.Failure;
  return ExitCode.Success;
}
