import { SUPPORTED_TOOLS } from "../archiver/seven-zip.js";
import { checkTools, type ToolAvailability, type ToolLookupEnv } from "../archiver/tools.js";
import type { RunLogger } from "../core/logger.js";

export async function runCheckCommand(
  logger: RunLogger,
  env: ToolLookupEnv = process.env,
): Promise<ToolAvailability[]> {
  logger.info("=== Checking compression tools ===");

  const results = await checkTools(SUPPORTED_TOOLS, env);
  for (const { tool, path } of results) {
    if (path) {
      logger.info(`${tool} found at: ${path}`);
    } else {
      logger.warn(`${tool} NOT found on system.`);
    }
  }

  return results;
}
