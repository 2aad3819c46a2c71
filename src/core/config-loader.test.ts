import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadRigConfig, parseRigConfig } from "./config-loader.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function writeConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "rig-config-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "rig.yaml");
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

function captureError(fn: () => unknown): UserFacingError {
  try {
    fn();
  } catch (err) {
    if (err instanceof UserFacingError) return err;
    throw err;
  }
  throw new Error("Expected a UserFacingError");
}

const VALID_CONFIG = [
  "station:",
  "  untracked_components: warn",
  "instruments:",
  "  - name: cryostat",
  "    label: Cryostat",
  "parameters:",
  "  - name: measurement_description",
  "    strict: false",
  "profiles:",
  "  cooldown: [cryostat, measurement_description]",
  "",
].join("\n");

// =============================================================================
// TESTS
// =============================================================================

describe("loadRigConfig", () => {
  it("parses YAML and fills defaults", () => {
    const config = loadRigConfig(writeConfig(VALID_CONFIG), {});

    expect(config.station).toEqual({ untracked_components: "warn", verbose: true });
    expect(config.parameters).toEqual([
      { name: "measurement_description", unit: "", must_differ: true, strict: false },
    ]);
    expect(config.profiles).toEqual({ cooldown: ["cryostat", "measurement_description"] });
  });

  it("lets RIG_UNTRACKED_COMPONENTS override the station policy", () => {
    const config = loadRigConfig(writeConfig(VALID_CONFIG), { RIG_UNTRACKED_COMPONENTS: "error" });

    expect(config.station.untracked_components).toBe("error");
  });

  it("maps a missing file to a config error", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "rig-config-"));
    tempDirs.push(dir);
    const missing = path.join(dir, "missing.yaml");

    const error = captureError(() => loadRigConfig(missing, {}));

    expect(error.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(error.title).toBe("Rig config not found.");
    expect(error.message).toBe(`Config file not found at ${path.resolve(missing)}.`);
  });

  it("treats an empty file as an empty rig", () => {
    const config = loadRigConfig(writeConfig(""), {});

    expect(config.instruments).toEqual([]);
    expect(config.profiles).toEqual({});
  });
});

describe("parseRigConfig", () => {
  it("rejects profiles that name unknown components", () => {
    const error = captureError(() =>
      parseRigConfig({ instruments: [{ name: "lockin" }], profiles: { base: ["lockin", "ghost"] } }, {}),
    );

    expect(error.message).toBe(
      'Config <inline> failed validation:\n- profiles.base.1: Unknown component "ghost"',
    );
  });

  it("rejects duplicate component names across instruments and parameters", () => {
    const error = captureError(() =>
      parseRigConfig({ instruments: [{ name: "bias" }], parameters: [{ name: "bias" }] }, {}),
    );

    expect(error.message).toBe(
      'Config <inline> failed validation:\n- parameters.0.name: Duplicate component name "bias"',
    );
  });

  it("reports invalid policies", () => {
    const error = captureError(() =>
      parseRigConfig({ station: { untracked_components: "ignore" } }, {}),
    );

    expect(error.message).toBe(
      'Config <inline> failed validation:\n- station.untracked_components: Expected one of "error", "warn", received "ignore"',
    );
  });

  it("rejects an invalid policy override", () => {
    const error = captureError(() => parseRigConfig({}, { RIG_UNTRACKED_COMPONENTS: "loud" }));

    expect(error.message).toBe(
      'RIG_UNTRACKED_COMPONENTS must be "error" or "warn", received "loud".',
    );
  });
});
