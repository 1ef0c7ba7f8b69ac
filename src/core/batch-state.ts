import { z } from "zod";

export const BatchStatusSchema = z.enum([
  "planned",
  "running",
  "compressed",
  "verifying",
  "verified",
  "verify_failed",
  "done",
  "failed",
  "skipped",
]);
export type BatchStatus = z.infer<typeof BatchStatusSchema>;

export const TerminalBatchStatusSchema = BatchStatusSchema.extract(["done", "failed", "skipped"]);
export type TerminalBatchStatus = z.infer<typeof TerminalBatchStatusSchema>;

const BATCH_TRANSITIONS: Record<BatchStatus, readonly BatchStatus[]> = {
  planned: ["running", "skipped"],
  running: ["compressed", "failed"],
  compressed: ["verifying", "done"],
  verifying: ["verified", "verify_failed"],
  verified: ["done"],
  // A failed check demotes the batch: it ends failed, never done.
  verify_failed: ["failed"],
  done: [],
  failed: [],
  skipped: [],
};

export function canTransition(from: BatchStatus, to: BatchStatus): boolean {
  return BATCH_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: BatchStatus): status is TerminalBatchStatus {
  return TerminalBatchStatusSchema.safeParse(status).success;
}

// =============================================================================
// TRACKER
// =============================================================================

export type BatchTransitionListener = (event: {
  index: number;
  from: BatchStatus;
  to: BatchStatus;
}) => void;

export class BatchStateTracker {
  private current: BatchStatus = "planned";

  constructor(
    readonly index: number,
    private readonly onTransition?: BatchTransitionListener,
  ) {}

  get status(): BatchStatus {
    return this.current;
  }

  transition(to: BatchStatus): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new Error(`Batch ${this.index} cannot move from ${from} to ${to}`);
    }

    this.current = to;
    this.onTransition?.({ index: this.index, from, to });
  }

  terminalStatus(): TerminalBatchStatus {
    const status = this.current;
    if (!isTerminalStatus(status)) {
      throw new Error(`Batch ${this.index} has not finished (status ${status})`);
    }
    return status;
  }
}
