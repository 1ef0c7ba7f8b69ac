import { constants } from "node:fs";
import path from "node:path";

import fse from "fs-extra";

// =============================================================================
// TYPES
// =============================================================================

export type ToolLookupEnv = {
  PATH?: string;
  PATHEXT?: string;
};

export type ToolAvailability = {
  tool: string;
  path: string | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function findExecutable(
  name: string,
  env: ToolLookupEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): Promise<string | null> {
  const dirs = (env.PATH ?? "").split(path.delimiter).filter((dir) => dir.length > 0);
  const extensions =
    platform === "win32" ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")] : [""];

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, `${name}${ext}`);
      if (await isExecutableFile(candidate, platform)) {
        return candidate;
      }
    }
  }

  return null;
}

export async function checkTools(
  tools: readonly string[],
  env: ToolLookupEnv = process.env,
): Promise<ToolAvailability[]> {
  const results: ToolAvailability[] = [];
  for (const tool of tools) {
    results.push({ tool, path: await findExecutable(tool, env) });
  }
  return results;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function isExecutableFile(candidate: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const stat = await fse.stat(candidate);
    if (!stat.isFile()) return false;
    if (platform !== "win32") {
      await fse.access(candidate, constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}
