import path from "node:path";

import { buildTestArgs } from "../../archiver/seven-zip.js";
import type { ToolRunner } from "../../archiver/tool-runner.js";
import { firstVolumePath } from "../../core/batch-planner.js";
import { formatErrorMessage } from "../../core/error-format.js";
import type { RunLogger } from "../../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type VerificationRunnerDeps = {
  toolRunner: ToolRunner;
  logger: RunLogger;
  password?: string;
  timeoutSeconds?: number;
};

export type VerificationResult = { ok: true } | { ok: false; message: string };

// =============================================================================
// RUNNER
// =============================================================================

export class VerificationRunner {
  constructor(private readonly deps: VerificationRunnerDeps) {}

  /**
   * Runs the tool's integrity test against an archive. Split archives are
   * tested through their first volume. Never throws.
   */
  async verify(
    archivePath: string,
    options: { splitVolumes?: boolean } = {},
  ): Promise<VerificationResult> {
    const { toolRunner, logger, password, timeoutSeconds } = this.deps;
    const target = options.splitVolumes ? firstVolumePath(archivePath) : archivePath;
    const name = path.basename(archivePath);

    logger.info(`Verifying ${name}...`);

    try {
      const res = await toolRunner.run(buildTestArgs({ archivePath: path.resolve(target), password }), {
        timeoutSeconds,
      });
      if (res.exitCode === 0) {
        logger.info(`Verification passed: ${name}`);
        return { ok: true };
      }

      const diagnostics = res.stderr.trim() || res.stdout.trim();
      logger.error(`Verification failed: ${name}`);
      if (diagnostics) {
        logger.error(`${toolRunner.command} stderr: ${diagnostics}`);
      }
      return {
        ok: false,
        message: diagnostics
          ? `integrity test of ${name} failed (exit ${res.exitCode}): ${diagnostics}`
          : `integrity test of ${name} failed (exit ${res.exitCode})`,
      };
    } catch (err) {
      const message = formatErrorMessage(err);
      logger.error(`Error verifying ${name}: ${message}`);
      return { ok: false, message };
    }
  }
}
