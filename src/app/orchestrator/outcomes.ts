import type { Batch } from "../../core/batch-planner.js";
import type { TerminalBatchStatus } from "../../core/batch-state.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { ExecutionError, ToolUnavailableError, VerificationError } from "../../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type BatchFailureKind = "execution" | "tool_unavailable" | "verification" | "unexpected";

export type BatchFailure = {
  kind: BatchFailureKind;
  message: string;
};

export type BatchOutcome = {
  index: number;
  archiveName: string;
  status: TerminalBatchStatus;
  verification?: "verified" | "verify_failed";
  // null: the tool reported success but the archive could not be stat-ed.
  archiveSize?: number | null;
  error?: BatchFailure;
  durationMs: number;
};

// =============================================================================
// HELPERS
// =============================================================================

export function classifyFailure(error: unknown): BatchFailure {
  const message = formatErrorMessage(error);

  if (error instanceof ToolUnavailableError) return { kind: "tool_unavailable", message };
  if (error instanceof VerificationError) return { kind: "verification", message };
  if (error instanceof ExecutionError) return { kind: "execution", message };
  return { kind: "unexpected", message };
}

export function failedOutcome(batch: Batch, failure: BatchFailure, durationMs = 0): BatchOutcome {
  return {
    index: batch.index,
    archiveName: batch.archiveName,
    status: "failed",
    error: failure,
    durationMs,
  };
}
