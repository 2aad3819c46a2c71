/**
 * CLI context: resolves config, state paths and the persisted session for one command invocation.
 * Commands load the session, mutate it, and save it back before returning.
 */

import type { Command } from "commander";

import { JsonRunMetadataStore } from "../annotations/run-store.js";
import type { RigConfig } from "../core/config.js";
import { DEFAULT_CONFIG_FILE, loadRigConfig } from "../core/config-loader.js";
import type { ErrorFormatMode } from "../core/error-format.js";
import { JsonlLogger } from "../core/logger.js";
import { createRigPaths, resolveRigHome, type RigPaths } from "../core/paths.js";
import { defaultSessionId } from "../core/utils.js";
import { SessionStateStore, restoreSession } from "../session/session-store.js";
import { createMeasurementSession, type MeasurementSession } from "../session/session.js";

export type GlobalFlags = {
  configPath: string;
  errorMode: ErrorFormatMode;
};

export type CliContext = {
  config: RigConfig;
  configPath: string;
  paths: RigPaths;
  sessionStore: SessionStateStore;
  runStore: JsonRunMetadataStore;
};

export function resolveGlobalFlags(command: Command): GlobalFlags {
  const opts = command.optsWithGlobals<{ config?: string; debug?: boolean }>();
  return {
    configPath: opts.config ?? DEFAULT_CONFIG_FILE,
    errorMode: opts.debug ? "debug" : "short",
  };
}

export function buildCliContext(command: Command): CliContext {
  const flags = resolveGlobalFlags(command);
  const config = loadRigConfig(flags.configPath);
  const paths = createRigPaths(resolveRigHome(flags.configPath));

  return {
    config,
    configPath: flags.configPath,
    paths,
    sessionStore: new SessionStateStore(paths.sessionStatePath),
    runStore: new JsonRunMetadataStore(paths.runStorePath),
  };
}

export async function loadSession(ctx: CliContext): Promise<MeasurementSession> {
  const state = await ctx.sessionStore.load();
  if (state) {
    const logger = new JsonlLogger(ctx.paths.sessionLogPath, { sessionId: state.session_id });
    return restoreSession(ctx.config, state, { logger });
  }

  const sessionId = defaultSessionId();
  const logger = new JsonlLogger(ctx.paths.sessionLogPath, { sessionId });
  return createMeasurementSession(ctx.config, { sessionId, logger });
}

export async function withSession<T>(
  ctx: CliContext,
  fn: (session: MeasurementSession) => T | Promise<T>,
): Promise<T> {
  const session = await loadSession(ctx);
  try {
    return await fn(session);
  } finally {
    // A failed sweep keeps the parameters it already claimed.
    await ctx.sessionStore.save(session);
  }
}
