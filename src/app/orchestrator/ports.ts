/**
 * Orchestrator ports define the boundary between the batch orchestrator and adapters.
 * Purpose: make the archiving tool, prompt, progress output and clock replaceable in tests.
 * Assumptions: ports stay small and map to stable runtime capabilities.
 * Usage: provide implementations in `run-context.ts` and inject into RunContext.
 */

import type { ToolRunner } from "../../archiver/tool-runner.js";

import type { BatchOutcome } from "./outcomes.js";

// =============================================================================
// PORTS
// =============================================================================

export interface ConfirmPrompt {
  confirm(question: string): Promise<boolean>;
}

export interface ProgressReporter {
  start(total: number): void;
  advance(outcome: BatchOutcome): void;
  stop(): void;
}

export interface Clock {
  now(): Date;
  isoNow(): string;
}

export type OrchestratorPorts = {
  toolRunner: ToolRunner;
  prompt: ConfirmPrompt;
  progress: ProgressReporter;
  clock: Clock;
};
