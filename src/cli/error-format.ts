/*
Purpose: print fatal batch-archiver errors on the terminal, labelled and coloured when stderr is a TTY.
Assumptions: formatErrorLines decides which lines exist; this module only decorates them.
Usage: process.stderr.write(`${renderCliError(err, { debug })}\n`);
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineLabel = {
  label: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
  block?: boolean;
};

// Debug-only lines are dimmed so the title and hint stand out.
const LINE_LABELS: Partial<Record<ErrorFormatLineKind, LineLabel>> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"], block: true },
};

const STACK_INDENT = "  ";

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return lines.map((line) => decorateLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function decorateLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const decoration = LINE_LABELS[line.kind];
  if (!decoration) return line.text;

  const label = format(decoration.label, decoration.labelStyles);
  if (decoration.block) {
    const body = line.text
      .split("\n")
      .map((row) => `${STACK_INDENT}${row}`)
      .join("\n");
    return `${label}\n${format(body, decoration.textStyles)}`;
  }

  const text = decoration.textStyles.length > 0 ? format(line.text, decoration.textStyles) : line.text;
  return `${label} ${text}`;
}
