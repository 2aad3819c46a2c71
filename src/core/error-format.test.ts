import { describe, expect, it } from "vitest";

import { createAnsiFormatter, formatErrorLines, printError } from "./error-format.js";
import {
  StaleParameterError,
  USER_FACING_ERROR_CODES,
  UntrackedComponentError,
  UserFacingError,
} from "./errors.js";

describe("formatErrorLines", () => {
  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Rig config invalid.",
      message: "Missing profiles",
      hint: "Check rig.yaml",
      next: "Run rig station profiles",
    });

    const lines = formatErrorLines(error);

    expect(lines).toEqual([
      { kind: "title", text: "Rig config invalid." },
      { kind: "message", text: "Missing profiles" },
      { kind: "hint", text: "Check rig.yaml" },
      { kind: "next", text: "Run rig station profiles" },
    ]);
  });

  it("maps stale parameters to a hint naming the parameter", () => {
    const lines = formatErrorLines(new StaleParameterError("bias", 1, "mV"));

    expect(lines.map((line) => line.kind)).toEqual(["title", "message", "hint", "next"]);
    expect(lines[0]?.text).toBe("Parameter not updated since the last measurement.");
    expect(lines[2]?.text).toBe("Set a new value with: rig param set bias <value>");
  });

  it("includes debug details when requested", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.station,
      title: "Station reconfiguration failed.",
      message: "Registry rejected the change",
      cause: new Error("boom"),
    });

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.find((line) => line.kind === "code")?.text).toBe("STATION_ERROR");
    expect(lines.find((line) => line.kind === "name")?.text).toBe("UserFacingError");
    expect(lines.find((line) => line.kind === "cause")?.text).toBe("boom");
    expect(lines.find((line) => line.kind === "stack")?.text).toContain("UserFacingError");
  });

  it("names the domain error in debug mode", () => {
    const lines = formatErrorLines(new UntrackedComponentError("magnet"), { mode: "debug" });

    expect(lines.find((line) => line.kind === "name")?.text).toBe("UntrackedComponentError");
    expect(lines.some((line) => line.kind === "cause")).toBe(false);
  });

  it("defaults unknown inputs to an unexpected error title", () => {
    const lines = formatErrorLines("boom");

    expect(lines).toEqual([
      { kind: "title", text: "Unexpected error" },
      { kind: "message", text: "boom" },
    ]);
  });
});

describe("printError", () => {
  it("prefixes hints and skips color off a TTY", () => {
    const written: string[] = [];

    printError(new StaleParameterError("bias", 1, "mV"), {
      stream: { isTTY: false },
      write: (line) => written.push(line),
    });

    expect(written).toEqual([
      "Parameter not updated since the last measurement.",
      "Parameter bias (current value: 1 mV) was not updated since the last measurement.",
      "Hint: Set a new value with: rig param set bias <value>",
      "Next: Then start the measurement again.",
    ]);
  });
});

describe("createAnsiFormatter", () => {
  it("returns input unchanged when disabled", () => {
    expect(createAnsiFormatter(false)("plain", ["red"])).toBe("plain");
  });

  it("wraps output with ANSI codes when enabled", () => {
    expect(createAnsiFormatter(true)("alert", ["red"])).toBe("\x1b[31malert\x1b[0m");
  });
});
