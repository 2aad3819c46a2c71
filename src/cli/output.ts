import type { Command } from "commander";

import { printError } from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import type { JsonValue } from "../core/logger.js";

import { resolveGlobalFlags } from "./context.js";

/** Runs a command body and reports failures through the error formatter. */
export async function runGuarded(command: Command, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    printError(err, { mode: resolveGlobalFlags(command).errorMode });
    process.exitCode = 1;
  }
}

/** JSON when it parses, otherwise the raw string. */
export function parseCliValue(raw: string): JsonValue {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isJsonValue(parsed) ? parsed : raw;
  } catch {
    return raw;
  }
}

export function parseRunIds(raw: string[]): number[] {
  return raw.map((value) => {
    const runId = Number(value);
    if (!Number.isInteger(runId) || runId < 0) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.annotation,
        title: "Invalid run id.",
        message: `Run ids must be non-negative integers, received ${JSON.stringify(value)}.`,
      });
    }
    return runId;
  });
}

export function parseMetadataEntries(entries: string[] = []): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};
  for (const entry of entries) {
    const index = entry.indexOf("=");
    if (index <= 0) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.annotation,
        title: "Invalid metadata entry.",
        message: `Expected key=value, received ${JSON.stringify(entry)}.`,
      });
    }
    out[entry.slice(0, index)] = parseCliValue(entry.slice(index + 1));
  }
  return out;
}

export function formatValue(value: unknown): string {
  if (value === undefined) return "-";
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
  );
  const render = (cells: string[]): string =>
    `  ${cells.map((cell, column) => cell.padEnd(widths[column] ?? 0, " ")).join("  ")}`.trimEnd();

  console.log(render(headers));
  for (const row of rows) {
    console.log(render(row));
  }
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  if (["string", "number", "boolean"].includes(typeof value)) return true;
  return typeof value === "object";
}
