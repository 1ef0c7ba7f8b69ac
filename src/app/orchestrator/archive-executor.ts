/**
 * ArchiveExecutor compresses one batch into its archive via the external tool.
 * Purpose: turn one tool invocation into a success (with size) or a classified failure.
 * Assumptions: the output directory exists; member paths are relative to sourceRoot.
 * Usage: const result = await new ArchiveExecutor(deps).compress(batch).
 */

import path from "node:path";

import fse from "fs-extra";

import { buildCompressArgs, redactArgs } from "../../archiver/seven-zip.js";
import type { ToolRunner, ToolRunResult } from "../../archiver/tool-runner.js";
import type { Batch } from "../../core/batch-planner.js";
import { ExecutionError } from "../../core/errors.js";
import type { RunLogger } from "../../core/logger.js";

import { classifyFailure, type BatchFailure } from "./outcomes.js";

// =============================================================================
// TYPES
// =============================================================================

export type CompressionSettings = {
  compressionLevel: number;
  password?: string;
  splitSize?: number;
  timeoutSeconds?: number;
  overwrite?: boolean;
};

export type ArchiveExecutorDeps = {
  toolRunner: ToolRunner;
  logger: RunLogger;
  sourceRoot: string;
  settings: CompressionSettings;
};

export type CompressResult =
  | { ok: true; archiveSize: number | null }
  | { ok: false; failure: BatchFailure };

const VOLUME_SUFFIX = /^\.\d{3,}$/;

// =============================================================================
// EXECUTOR
// =============================================================================

export class ArchiveExecutor {
  constructor(private readonly deps: ArchiveExecutorDeps) {}

  async compress(batch: Batch): Promise<CompressResult> {
    const { toolRunner, logger, sourceRoot, settings } = this.deps;
    const args = buildCompressArgs({
      archivePath: path.resolve(batch.archivePath),
      files: batch.files.map((file) => file.relativePath),
      compressionLevel: settings.compressionLevel,
      password: settings.password,
      splitSize: settings.splitSize,
    });

    logger.info(`Compressing ${batch.files.length} files into ${batch.archiveName}`);

    // 7z `a` updates an existing archive in place; recreating means starting empty.
    if (settings.overwrite) {
      try {
        const removed = await removeArchiveFiles(batch.archivePath);
        if (removed > 0) {
          logger.info(`Removed existing ${batch.archiveName} before recreating it`);
        }
      } catch (err) {
        const failure = classifyFailure(err);
        logger.error(`Could not remove existing ${batch.archiveName}: ${failure.message}`);
        return { ok: false, failure };
      }
    }

    logger.debug(`Executing: ${toolRunner.command} ${redactArgs(args).join(" ")}`);

    let res: ToolRunResult;
    try {
      res = await toolRunner.run(args, {
        cwd: sourceRoot,
        timeoutSeconds: settings.timeoutSeconds,
      });
    } catch (err) {
      const failure = classifyFailure(err);
      logger.error(`Error compressing ${batch.archiveName}: ${failure.message}`);
      return { ok: false, failure };
    }

    if (res.exitCode !== 0) {
      const diagnostics = res.stderr.trim() || res.stdout.trim();
      logger.error(`Failed to create ${batch.archiveName}, return code ${res.exitCode}`);
      if (diagnostics) {
        logger.error(`${toolRunner.command} stderr: ${diagnostics}`);
      }
      const detail = diagnostics ? `: ${diagnostics}` : "";
      return {
        ok: false,
        failure: classifyFailure(
          new ExecutionError(`${toolRunner.command} exited with code ${res.exitCode}${detail}`, res.exitCode),
        ),
      };
    }

    logger.info(`Successfully created ${batch.archiveName}`);
    const archiveSize = await resolveArchiveSize(batch.archivePath, settings.splitSize !== undefined);
    if (archiveSize === null) {
      logger.warn(`${batch.archiveName} was reported as created but could not be found`);
    }
    return { ok: true, archiveSize };
  }
}

// =============================================================================
// FILES ON DISK
// =============================================================================

/**
 * Size of the produced archive, summing `.001`, `.002`, ... when split into volumes.
 * Returns null when nothing is on disk.
 */
export async function resolveArchiveSize(
  archivePath: string,
  splitVolumes: boolean,
): Promise<number | null> {
  if (!splitVolumes) {
    return statSize(archivePath);
  }

  const volumes = await listVolumes(archivePath);
  if (volumes.length === 0) {
    return null;
  }

  let total = 0;
  for (const volume of volumes) {
    total += (await statSize(volume)) ?? 0;
  }
  return total;
}

/**
 * Deletes the archive and any `.NNN` volumes beside it; returns how many files went.
 */
export async function removeArchiveFiles(archivePath: string): Promise<number> {
  const targets = [...(await listVolumes(archivePath))];
  if (await fse.pathExists(archivePath)) {
    targets.push(archivePath);
  }

  for (const target of targets) {
    await fse.remove(target);
  }
  return targets.length;
}

async function listVolumes(archivePath: string): Promise<string[]> {
  const dir = path.dirname(archivePath);
  const base = path.basename(archivePath);
  let names: string[];
  try {
    names = await fse.readdir(dir);
  } catch {
    return [];
  }

  return names
    .filter((name) => name.startsWith(base) && VOLUME_SUFFIX.test(name.slice(base.length)))
    .sort()
    .map((name) => path.join(dir, name));
}

async function statSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fse.stat(filePath);
    return stat.isFile() ? stat.size : null;
  } catch {
    return null;
  }
}
