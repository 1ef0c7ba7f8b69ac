/**
 * Batch orchestrator: plan once, execute once, report once.
 * Purpose: catalog the input, plan batches, run them under a bounded pool and aggregate outcomes.
 * Assumptions: settings are validated; the input directory exists.
 * Usage: const summary = await runBatchOrchestration(createRunContext({ settings, logger }));
 */

import { planBatches, type Batch, type BatchPlan } from "../../core/batch-planner.js";
import { BatchStateTracker } from "../../core/batch-state.js";
import { VerificationError } from "../../core/errors.js";
import { buildFileCatalog, totalSize, type FileEntry } from "../../core/file-catalog.js";
import { formatSize } from "../../core/sizes.js";
import { ensureDir } from "../../core/utils.js";

import { ArchiveExecutor, removeArchiveFiles } from "./archive-executor.js";
import { classifyFailure, failedOutcome, type BatchOutcome } from "./outcomes.js";
import { RunReportBuilder, writeRunReport } from "./run-report.js";
import type { RunContext } from "./run-context.js";
import { VerificationRunner } from "./verification-runner.js";
import { runWorkerPool } from "./worker-pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunOutcome =
  | "completed"
  | "dry_run"
  | "declined"
  | "no_files"
  | "nothing_to_do"
  | "stopped";

export type RunSummary = {
  outcome: RunOutcome;
  totalBatches: number;
  planned: number;
  skipped: number;
  succeeded: number;
  failed: number;
  notStarted: number;
  totalFiles: number;
  totalInputSize: number;
  totalOutputSize: number;
  compressionRatio: number;
  reportPath?: string;
  outcomes: BatchOutcome[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runBatchOrchestration(context: RunContext): Promise<RunSummary> {
  const { settings, logger } = context;

  const entries = await buildFileCatalog({
    root: settings.input,
    exclude: settings.exclude,
    recursive: settings.recursive,
  });

  if (entries.length === 0) {
    logger.warn(`No files found in ${settings.input}`);
    return emptySummary("no_files", entries, 0, 0);
  }

  const plan = await planBatches(entries, {
    batchSize: settings.batchSize,
    outputDir: settings.output,
    prefix: settings.prefix,
    extension: settings.extension,
    overwrite: settings.overwrite,
    splitVolumes: settings.splitSize !== undefined,
  });

  logPlan(context, entries, plan);

  if (plan.batches.length === 0) {
    logger.info("All archives already exist. Nothing to do.");
    return emptySummary("nothing_to_do", entries, plan.totalBatches, plan.skipped.length);
  }

  if (settings.dryRun) {
    logger.info("Dry run mode: no archives will be created.");
    return {
      ...emptySummary("dry_run", entries, plan.totalBatches, plan.skipped.length),
      planned: plan.batches.length,
    };
  }

  if (context.interactive && !settings.auto) {
    const proceed = await context.ports.prompt.confirm(
      `Proceed with compression of ${plan.batches.length} batch(es)?`,
    );
    if (!proceed) {
      logger.warn("Operation cancelled by user.");
      return {
        ...emptySummary("declined", entries, plan.totalBatches, plan.skipped.length),
        planned: plan.batches.length,
      };
    }
  }

  await ensureDir(settings.output);
  return executePlan(context, entries, plan);
}

// =============================================================================
// EXECUTION
// =============================================================================

async function executePlan(
  context: RunContext,
  entries: FileEntry[],
  plan: BatchPlan,
): Promise<RunSummary> {
  const { settings, logger, ports } = context;
  const splitVolumes = settings.splitSize !== undefined;

  const executor = new ArchiveExecutor({
    toolRunner: ports.toolRunner,
    logger,
    sourceRoot: settings.input,
    settings: {
      compressionLevel: settings.compressionLevel,
      password: settings.password,
      splitSize: settings.splitSize,
      timeoutSeconds: settings.timeoutSeconds,
      overwrite: settings.overwrite,
    },
  });
  const verifier = new VerificationRunner({
    toolRunner: ports.toolRunner,
    logger,
    password: settings.password,
    timeoutSeconds: settings.timeoutSeconds,
  });

  const processBatch = async (batch: Batch): Promise<BatchOutcome> => {
    const startedAt = ports.clock.now().getTime();
    const elapsed = (): number => ports.clock.now().getTime() - startedAt;
    const tracker = new BatchStateTracker(batch.index, ({ index, from, to }) =>
      logger.debug(`Batch ${index}: ${from} -> ${to}`),
    );

    tracker.transition("running");
    const compressed = await executor.compress(batch);
    if (!compressed.ok) {
      tracker.transition("failed");
      return failedOutcome(batch, compressed.failure, elapsed());
    }
    tracker.transition("compressed");

    let verification: BatchOutcome["verification"];
    if (settings.verify) {
      tracker.transition("verifying");
      const verified = await verifier.verify(batch.archivePath, { splitVolumes });
      if (!verified.ok) {
        tracker.transition("verify_failed");
        // A kept corrupt archive would be skipped as existing on the next run.
        await removeArchiveFiles(batch.archivePath);
        logger.warn(`Removed ${batch.archiveName} after failed verification`);
        tracker.transition("failed");
        return {
          ...failedOutcome(batch, classifyFailure(new VerificationError(verified.message)), elapsed()),
          verification: "verify_failed",
          archiveSize: compressed.archiveSize,
        };
      }
      tracker.transition("verified");
      verification = "verified";
    }

    tracker.transition("done");
    return {
      index: batch.index,
      archiveName: batch.archiveName,
      status: tracker.terminalStatus(),
      verification,
      archiveSize: compressed.archiveSize,
      durationMs: elapsed(),
    };
  };

  const report = new RunReportBuilder({
    inputFolder: settings.input,
    outputFolder: settings.output,
    totalFiles: entries.length,
    totalInputSize: totalSize(entries),
    batchSize: settings.batchSize,
    compressionLevel: settings.compressionLevel,
  });
  const outcomes: BatchOutcome[] = [];

  const pool = runWorkerPool(plan.batches, {
    concurrency: settings.threads,
    stopSignal: context.stopSignal,
    run: processBatch,
    onError: (batch, err) => {
      const failure = classifyFailure(err);
      logger.error(`Batch ${batch.index} (${batch.archiveName}) failed unexpectedly: ${failure.message}`);
      return failedOutcome(batch, { kind: "unexpected", message: failure.message });
    },
  });

  ports.progress.start(plan.batches.length);
  try {
    for await (const { item, result } of pool.results) {
      report.recordOutcome(item, result);
      outcomes.push(result);
      ports.progress.advance(result);
    }
  } finally {
    ports.progress.stop();
  }
  const { notStarted } = await pool.completion;

  if (notStarted > 0) {
    logger.warn(`Run stopped: ${notStarted} batch(es) were not started.`);
  }

  let reportPath: string | undefined;
  if (settings.metadataPath && report.succeeded > 0) {
    await writeRunReport(settings.metadataPath, report.toJSON(ports.clock.isoNow()));
    logger.info(`Metadata exported to ${settings.metadataPath}`);
    reportPath = settings.metadataPath;
  }

  return {
    outcome: notStarted > 0 ? "stopped" : "completed",
    totalBatches: plan.totalBatches,
    planned: plan.batches.length,
    skipped: plan.skipped.length,
    succeeded: report.succeeded,
    failed: report.failed,
    notStarted,
    totalFiles: entries.length,
    totalInputSize: totalSize(entries),
    totalOutputSize: report.totalOutputSize,
    compressionRatio: report.compressionRatio(),
    reportPath,
    outcomes: outcomes.sort((a, b) => a.index - b.index),
  };
}

// =============================================================================
// LOGGING
// =============================================================================

function logPlan(context: RunContext, entries: FileEntry[], plan: BatchPlan): void {
  const { settings, logger } = context;

  logger.info(
    `Found ${entries.length} files (${formatSize(totalSize(entries))}), will create ${plan.totalBatches} archive(s)`,
  );
  if (settings.exclude.length > 0) {
    logger.info(`Excluding patterns: ${settings.exclude.join(", ")}`);
  }

  for (const batch of plan.skipped) {
    logger.warn(`Skipping existing archive: ${batch.archiveName}`);
  }

  for (const batch of plan.batches) {
    logger.info(
      `Batch ${batch.index}/${plan.totalBatches}: ${batch.files.length} files (${formatSize(batch.inputSize)}) -> ${batch.archiveName}`,
    );
    for (const file of batch.files) {
      logger.debug(`  ${file.relativePath}`);
    }
  }
}

function emptySummary(
  outcome: RunOutcome,
  entries: FileEntry[],
  totalBatches: number,
  skipped: number,
): RunSummary {
  return {
    outcome,
    totalBatches,
    planned: 0,
    skipped,
    succeeded: 0,
    failed: 0,
    notStarted: 0,
    totalFiles: entries.length,
    totalInputSize: totalSize(entries),
    totalOutputSize: 0,
    compressionRatio: 0,
    outcomes: [],
  };
}
