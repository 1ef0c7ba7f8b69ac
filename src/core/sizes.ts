import { ValidationError } from "./errors.js";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

const SIZE_MULTIPLIERS: Record<string, number> = {
  "": 1,
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
  T: 1024 ** 4,
};

const SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*([KMGT]?)B?$/;

export function formatSize(sizeBytes: number): string {
  let size = sizeBytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) {
      return `${size.toFixed(2)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(2)} PB`;
}

/**
 * Parses "100M", "1.5G", "512k" or "2048" into bytes (binary multiples).
 */
export function parseSize(input: string): number {
  const match = SIZE_PATTERN.exec(input.trim().toUpperCase());
  if (!match) {
    throw new ValidationError(`Invalid size format: ${input}`);
  }

  const value = Number(match[1]);
  const multiplier = SIZE_MULTIPLIERS[match[2] ?? ""] ?? 1;
  const bytes = Math.floor(value * multiplier);
  if (bytes < 1) {
    throw new ValidationError(`Size must be at least 1 byte: ${input}`);
  }

  return bytes;
}
