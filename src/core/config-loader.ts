/*
Purpose: read rig.yaml, apply environment overrides and validate it against RigConfigSchema.
Assumptions: config files are small; reads are synchronous so CLI setup stays linear.
Usage: const config = loadRigConfig("rig.yaml");
*/

import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import {
  RigConfigSchema,
  UntrackedComponentPolicySchema,
  formatConfigIssues,
  type RigConfig,
} from "./config.js";
import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "rig.yaml";

const CONFIG_HINT = "Pass --config <path> or create rig.yaml in the working directory.";

export function loadRigConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): RigConfig {
  const resolved = path.resolve(configPath);

  if (!fs.existsSync(resolved)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Rig config not found.",
      message: `Config file not found at ${resolved}.`,
      hint: CONFIG_HINT,
      cause: new ConfigError(`Missing config file: ${resolved}`),
    });
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(resolved, "utf8"));
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Rig config invalid.",
      message: `Could not parse YAML in ${resolved}.`,
      cause: err,
    });
  }

  return parseRigConfig(raw ?? {}, env, resolved);
}

export function parseRigConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
  source = "<inline>",
): RigConfig {
  const parsed = RigConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = formatConfigIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Rig config invalid.",
      message: `Config ${source} failed validation:\n${details.map((line) => `- ${line}`).join("\n")}`,
      hint: CONFIG_HINT,
      cause: new ConfigError(details.join("; "), parsed.error),
    });
  }

  return applyEnvOverrides(parsed.data, env);
}

function applyEnvOverrides(config: RigConfig, env: NodeJS.ProcessEnv): RigConfig {
  const override = env.RIG_UNTRACKED_COMPONENTS?.trim();
  if (!override) return config;

  const policy = UntrackedComponentPolicySchema.safeParse(override);
  if (!policy.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Rig config invalid.",
      message: `RIG_UNTRACKED_COMPONENTS must be "error" or "warn", received ${JSON.stringify(override)}.`,
      cause: new ConfigError("Invalid RIG_UNTRACKED_COMPONENTS", policy.error),
    });
  }

  return { ...config, station: { ...config.station, untracked_components: policy.data } };
}
