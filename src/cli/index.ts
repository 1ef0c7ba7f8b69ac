import { Command } from "commander";

import { VERSION } from "../version.js";

import { runCompressCommand, type CompressCommandDeps } from "./compress.js";
import {
  collectPattern,
  parseCliOptions,
  parseIntegerArg,
  parseSecondsArg,
} from "./options.js";

const EXAMPLES = `
Examples:
  $ batch-archiver --check
  $ batch-archiver --input ./files --output ./archives
  $ batch-archiver --input ./files --output ./archives --batch 50 --auto --threads 4
  $ batch-archiver --input ./files --output ./archives --dry-run
  $ batch-archiver --input ./files --output ./archives --exclude "*.tmp" --exclude "*.log"
  $ batch-archiver --input ./files --output ./archives --recursive --metadata report.json
  $ batch-archiver --config compress.yaml`;

export function buildCli(deps: CompressCommandDeps = {}): Command {
  const program = new Command();

  program
    .name("batch-archiver")
    .description("Compress files in fixed-size batches using 7z")
    .version(VERSION, "-V, --version", "Show version and exit")
    // Basic arguments
    .option("-i, --input <dir>", "Input folder")
    .option("-o, --output <dir>", "Output folder for archives")
    .option("-b, --batch <n>", "Files per archive (default: 80)", parseIntegerArg)
    .option("--prefix <name>", "Archive name prefix (default: archive)")
    .option("--ext <format>", "Archive format: 7z, zip or rar (default: 7z)")
    // Execution control
    .option("--auto", "Run without confirmation")
    .option("-t, --threads <n>", "Parallel compression jobs (default: 1)", parseIntegerArg)
    .option("--dry-run", "Preview the batches without compressing")
    // Compression options
    .option("-l, --compression-level <n>", "Compression level 0-9 (default: 5)", parseIntegerArg)
    .option("--password <secret>", "Encrypt archives and their headers (7z only)")
    .option("--split-size <size>", "Split archives into volumes, e.g. 100M or 1G")
    .option("--timeout <seconds>", "Kill a compression or test run after this many seconds", parseSecondsArg)
    // File filtering
    .option("--exclude <pattern>", "Glob pattern to exclude (repeatable)", collectPattern)
    .option("-r, --recursive", "Scan subdirectories")
    // Output control
    .option("--overwrite", "Recreate archives that already exist")
    .option("--verify", "Test each archive after creating it")
    .option("--metadata <path>", "Write a JSON run report")
    // Utility options
    .option("--check", "Report whether 7z, zip and rar are installed")
    .option("--config <path>", "Load settings from a YAML config file")
    .option("--logfile <path>", "Log file (default: compress_batches.log)")
    .option("-v, --verbose", "Debug logging")
    .option("--debug", "Show stack traces in error output")
    .addHelpText("after", EXAMPLES)
    .action(async () => {
      const options = parseCliOptions(program.opts());
      process.exitCode = await runCompressCommand(options, deps);
    });

  return program;
}
