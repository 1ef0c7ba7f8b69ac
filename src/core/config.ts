import { z } from "zod";

// =============================================================================
// CONSTANTS
// =============================================================================

export const ARCHIVE_EXTENSIONS = ["7z", "zip", "rar"] as const;
export type ArchiveExtension = (typeof ARCHIVE_EXTENSIONS)[number];

export const SETTINGS_DEFAULTS = {
  batch: 80,
  prefix: "archive",
  ext: "7z",
  threads: 1,
  compressionLevel: 5,
  logfile: "compress_batches.log",
} as const satisfies {
  batch: number;
  prefix: string;
  ext: ArchiveExtension;
  threads: number;
  compressionLevel: number;
  logfile: string;
};

// =============================================================================
// CONFIG FILE SCHEMA
// =============================================================================

export const ConfigFileSchema = z
  .object({
    input: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    batch: z.number().int().min(1).optional(),
    prefix: z.string().min(1).optional(),
    ext: z.enum(ARCHIVE_EXTENSIONS).optional(),
    auto: z.boolean().optional(),
    threads: z.number().int().min(1).optional(),
    dry_run: z.boolean().optional(),
    compression_level: z.number().int().min(0).max(9).optional(),
    password: z.string().min(1).optional(),
    // YAML reads `split_size: 1024` as a number; keep it as a size string.
    split_size: z
      .union([z.string().min(1), z.number().int().positive()])
      .transform((value) => String(value))
      .optional(),
    exclude: z.array(z.string().min(1)).optional(),
    recursive: z.boolean().optional(),
    overwrite: z.boolean().optional(),
    verify: z.boolean().optional(),
    metadata: z.string().min(1).optional(),
    timeout: z.number().positive().optional(),
    logfile: z.string().min(1).optional(),
    verbose: z.boolean().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// =============================================================================
// SETTINGS INPUT
// =============================================================================

/**
 * Every field is optional: `undefined` means "not provided by this source", so a
 * value that happens to equal the default still counts as explicit.
 */
export type SettingsInput = {
  input?: string;
  output?: string;
  batch?: number;
  prefix?: string;
  ext?: string;
  auto?: boolean;
  threads?: number;
  dryRun?: boolean;
  compressionLevel?: number;
  password?: string;
  splitSize?: string;
  exclude?: string[];
  recursive?: boolean;
  overwrite?: boolean;
  verify?: boolean;
  metadata?: string;
  timeout?: number;
  logfile?: string;
  verbose?: boolean;
};

export function settingsFromConfigFile(config: ConfigFile): SettingsInput {
  return {
    input: config.input,
    output: config.output,
    batch: config.batch,
    prefix: config.prefix,
    ext: config.ext,
    auto: config.auto,
    threads: config.threads,
    dryRun: config.dry_run,
    compressionLevel: config.compression_level,
    password: config.password,
    splitSize: config.split_size,
    exclude: config.exclude,
    recursive: config.recursive,
    overwrite: config.overwrite,
    verify: config.verify,
    metadata: config.metadata,
    timeout: config.timeout,
    logfile: config.logfile,
    verbose: config.verbose,
  };
}

const SETTINGS_KEYS = [
  "input",
  "output",
  "batch",
  "prefix",
  "ext",
  "auto",
  "threads",
  "dryRun",
  "compressionLevel",
  "password",
  "splitSize",
  "exclude",
  "recursive",
  "overwrite",
  "verify",
  "metadata",
  "timeout",
  "logfile",
  "verbose",
] as const satisfies ReadonlyArray<keyof SettingsInput>;

/**
 * CLI values win whenever the user passed them; the config file fills the rest.
 */
export function mergeSettingsInput(cli: SettingsInput, file: SettingsInput): SettingsInput {
  const merged: SettingsInput = { ...file };
  for (const key of SETTINGS_KEYS) {
    assignDefined(merged, cli, key);
  }
  return merged;
}

function assignDefined<K extends keyof SettingsInput>(
  target: SettingsInput,
  source: SettingsInput,
  key: K,
): void {
  const value = source[key];
  if (value !== undefined) {
    target[key] = value;
  }
}
