/*
Purpose: turn any thrown value into printable lines for the rig CLI, with optional ANSI styling.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: printError(err, { mode: "debug" }); formatErrorLines(err).
*/

import {
  USER_FACING_ERROR_CODES,
  toUserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type PrintErrorOptions = {
  mode?: ErrorFormatMode;
  stream?: { isTTY?: boolean };
  write?: (line: string) => void;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const LINE_STYLES: Record<ErrorFormatLineKind, AnsiStyle[]> = {
  title: ["bold", "red"],
  message: [],
  hint: ["yellow"],
  next: ["cyan"],
  code: ["dim"],
  name: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};

const LINE_PREFIXES: Partial<Record<ErrorFormatLineKind, string>> = {
  hint: "Hint: ",
  next: "Next: ",
  code: "Code: ",
  name: "Name: ",
  cause: "Cause: ",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    const named = error instanceof Error ? error : normalized.cause;
    if (named instanceof Error) {
      lines.push({ kind: "name", text: named.name });
    }

    const cause = normalized.cause;
    if (cause !== undefined && cause !== null && cause !== error) {
      const text = formatErrorMessage(cause);
      if (text !== normalized.message) {
        lines.push({ kind: "cause", text });
      }
    }

    const stacked = [error, normalized.cause].find(
      (candidate): candidate is Error => candidate instanceof Error && Boolean(candidate.stack),
    );
    if (stacked?.stack) {
      lines.push({ kind: "stack", text: stacked.stack });
    }
  }

  return lines;
}

export function printError(error: unknown, options: PrintErrorOptions = {}): void {
  const stream = options.stream ?? process.stderr;
  const write = options.write ?? ((line: string) => console.error(line));
  const format = createAnsiFormatter(Boolean(stream.isTTY));

  for (const line of formatErrorLines(error, { mode: options.mode })) {
    const prefix = LINE_PREFIXES[line.kind] ?? "";
    write(format(`${prefix}${line.text}`, LINE_STYLES[line.kind]));
  }
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function normalizeError(error: unknown): UserFacingErrorInput {
  const userFacing = toUserFacingError(error);
  if (userFacing) {
    return {
      code: userFacing.code,
      title: userFacing.title.trim() || DEFAULT_ERROR_TITLE,
      message: userFacing.message.trim() || DEFAULT_ERROR_MESSAGE,
      hint: userFacing.hint?.trim() || undefined,
      next: userFacing.next?.trim() || undefined,
      cause: userFacing.cause ?? error,
    };
  }

  const message =
    error === undefined || error === null ? DEFAULT_ERROR_MESSAGE : formatErrorMessage(error);
  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: message.trim() || DEFAULT_ERROR_MESSAGE,
    cause: error,
  };
}
