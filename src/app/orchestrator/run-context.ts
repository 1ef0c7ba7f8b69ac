/**
 * RunContext + default adapters for batch runs.
 * Purpose: carry run-scoped settings and injected ports instead of global state.
 * Assumptions: ports are thin adapters and are overrideable for tests.
 * Usage: runBatchOrchestration(createRunContext({ settings, logger })).
 */

import { stdin, stdout } from "node:process";
import { createInterface } from "node:readline/promises";

import { ExecaToolRunner } from "../../archiver/tool-runner.js";
import { SEVEN_ZIP_COMMAND } from "../../archiver/seven-zip.js";
import type { RunLogger } from "../../core/logger.js";
import type { RunSettings } from "../../core/settings.js";
import { isoNow } from "../../core/utils.js";

import type { Clock, ConfirmPrompt, OrchestratorPorts } from "./ports.js";
import { resolveProgressReporter } from "./progress.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunContext = {
  settings: RunSettings;
  logger: RunLogger;
  ports: OrchestratorPorts;
  // Whether a human can answer the confirmation prompt (stdin is a terminal).
  interactive: boolean;
  stopSignal?: AbortSignal;
};

export type RunContextInput = {
  settings: RunSettings;
  logger: RunLogger;
  ports?: Partial<OrchestratorPorts>;
  interactive?: boolean;
  stopSignal?: AbortSignal;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export const systemClock: Clock = {
  now: () => new Date(),
  isoNow,
};

export class ReadlineConfirmPrompt implements ConfirmPrompt {
  async confirm(question: string): Promise<boolean> {
    const rl = createInterface({ input: stdin, output: stdout });
    try {
      const answer = await rl.question(`${question} (y/N): `);
      return isAffirmative(answer);
    } finally {
      rl.close();
    }
  }
}

export function isAffirmative(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

export function createDefaultPorts(settings: Pick<RunSettings, "verbose">): OrchestratorPorts {
  return {
    toolRunner: new ExecaToolRunner(SEVEN_ZIP_COMMAND),
    prompt: new ReadlineConfirmPrompt(),
    progress: resolveProgressReporter({ stream: process.stderr, verbose: settings.verbose }),
    clock: systemClock,
  };
}

// =============================================================================
// CONTEXT
// =============================================================================

export function createRunContext(input: RunContextInput): RunContext {
  return {
    settings: input.settings,
    logger: input.logger,
    ports: { ...createDefaultPorts(input.settings), ...input.ports },
    interactive: input.interactive ?? Boolean(stdin.isTTY),
    stopSignal: input.stopSignal,
  };
}
