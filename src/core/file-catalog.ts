/*
Purpose: enumerate the files a run will archive, with sizes, in a stable order.
Assumptions: the root was checked with assertInputDirectory before scanning.
Usage: const entries = await buildFileCatalog({ root, exclude: ["*.tmp"], recursive: true });
*/

import type { Stats } from "node:fs";
import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";
import { minimatch } from "minimatch";

import { InputNotFoundError, NotADirectoryError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type FileEntry = {
  readonly absolutePath: string;
  readonly relativePath: string;
  readonly size: number;
};

export type FileCatalogOptions = {
  root: string;
  exclude?: string[];
  recursive?: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function assertInputDirectory(root: string): Promise<void> {
  let stat: Stats;
  try {
    stat = await fse.stat(root);
  } catch {
    throw new InputNotFoundError(root);
  }

  if (!stat.isDirectory()) {
    throw new NotADirectoryError(root);
  }
}

export async function buildFileCatalog(options: FileCatalogOptions): Promise<FileEntry[]> {
  const root = path.resolve(options.root);
  const recursive = options.recursive ?? false;
  const exclude = options.exclude ?? [];

  const found = await fg(recursive ? "**/*" : "*", {
    cwd: root,
    onlyFiles: true,
    dot: true,
    stats: true,
    deep: recursive ? Infinity : 1,
    followSymbolicLinks: true,
  });

  const seen = new Set<string>();
  const entries: FileEntry[] = [];

  for (const item of found) {
    const relativePath = item.path;
    if (seen.has(relativePath)) continue;
    seen.add(relativePath);

    if (isExcluded(relativePath, exclude, recursive)) continue;

    const absolutePath = path.join(root, relativePath);
    const size = item.stats?.size ?? (await fse.stat(absolutePath)).size;
    entries.push({ absolutePath, relativePath, size });
  }

  return entries.sort(compareEntries);
}

/**
 * Base name matches in both modes; the relative path is only considered when
 * walking recursively. Against the relative path, `*` and `?` also match `/`,
 * so `build/*` excludes everything below `build/`.
 */
export function isExcluded(relativePath: string, patterns: string[], recursive: boolean): boolean {
  const baseName = path.posix.basename(relativePath);

  return patterns.some(
    (pattern) =>
      minimatch(baseName, pattern, { dot: true }) ||
      (recursive && matchesAcrossSeparators(relativePath, pattern)),
  );
}

export function totalSize(entries: readonly FileEntry[]): number {
  return entries.reduce((sum, entry) => sum + entry.size, 0);
}

// =============================================================================
// INTERNALS
// =============================================================================

// minimatch never lets a wildcard cross `/`; folding separators into one
// segment gives the whole-path matching exclusions need.
const SEPARATOR_STANDIN = "\u0000";

function matchesAcrossSeparators(relativePath: string, pattern: string): boolean {
  return minimatch(
    relativePath.split("/").join(SEPARATOR_STANDIN),
    pattern.split("/").join(SEPARATOR_STANDIN),
    { dot: true },
  );
}

// Code-unit order, not locale order, so every platform plans identical batches.
function compareEntries(a: FileEntry, b: FileEntry): number {
  if (a.relativePath < b.relativePath) return -1;
  if (a.relativePath > b.relativePath) return 1;
  return 0;
}
