import fse from "fs-extra";
import { z } from "zod";

import type { RigConfig } from "../core/config.js";
import { ConfigError } from "../core/errors.js";
import { logSessionEvent } from "../core/logger.js";
import { isoNow } from "../core/utils.js";

import {
  createMeasurementSession,
  type CreateSessionOptions,
  type MeasurementSession,
} from "./session.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const SESSION_STATE_VERSION = 1;

const ParameterSnapshotSchema = z.object({
  name: z.string().min(1),
  label: z.string(),
  unit: z.string(),
  must_differ: z.boolean(),
  strict: z.boolean(),
  has_value: z.boolean(),
  value: z.unknown().optional(),
  consumed_by_measurement: z.boolean(),
  read_since_set: z.boolean(),
});

export const SessionStateSchema = z.object({
  version: z.literal(SESSION_STATE_VERSION),
  session_id: z.string().min(1),
  started_at: z.string(),
  updated_at: z.string(),
  active_profiles: z.array(z.string()).default([]),
  registered: z.array(z.string()).default([]),
  parameters: z.array(ParameterSnapshotSchema).default([]),
});

export type SessionState = z.infer<typeof SessionStateSchema>;

// =============================================================================
// SNAPSHOT + RESTORE
// =============================================================================

export function snapshotSession(session: MeasurementSession): SessionState {
  return {
    version: SESSION_STATE_VERSION,
    session_id: session.id,
    started_at: session.startedAt,
    updated_at: isoNow(),
    active_profiles: [...session.activeProfiles],
    registered: session.registry.componentNames(),
    parameters: [...session.parameters.values()].map((parameter) => parameter.snapshot()),
  };
}

/**
 * Rebuilds a session from the current config and saved state. Config decides which
 * components exist and how parameters behave; the state supplies registry contents
 * and parameter values. Saved names missing from the config are skipped and logged.
 */
export function restoreSession(
  config: RigConfig,
  state: SessionState,
  options: CreateSessionOptions = {},
): MeasurementSession {
  const session = createMeasurementSession(config, {
    ...options,
    sessionId: state.session_id,
    startedAt: state.started_at,
  });

  for (const name of state.registered) {
    const component = session.components.get(name);
    if (!component) {
      logSessionEvent(session.logger, "session.restore_skipped", { component: name });
      continue;
    }
    session.registry.add(component);
  }

  for (const snapshot of state.parameters) {
    const parameter = session.parameters.get(snapshot.name);
    if (!parameter) {
      logSessionEvent(session.logger, "session.restore_skipped", { parameter: snapshot.name });
      continue;
    }
    parameter.restoreState(snapshot);
  }

  session.activeProfiles = state.active_profiles.filter((name) =>
    session.station.profileNames().includes(name),
  );
  return session;
}

// =============================================================================
// STORE
// =============================================================================

export class SessionStateStore {
  constructor(readonly filePath: string) {}

  async exists(): Promise<boolean> {
    return fse.pathExists(this.filePath);
  }

  async load(): Promise<SessionState | null> {
    if (!(await this.exists())) return null;

    const raw: unknown = await fse.readJson(this.filePath);
    const parsed = SessionStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        `Session state at ${this.filePath} is invalid. Run \`rig session reset\` to start over.`,
        parsed.error,
      );
    }
    return parsed.data;
  }

  async save(session: MeasurementSession): Promise<SessionState> {
    const state = snapshotSession(session);
    await fse.outputJson(this.filePath, state, { spaces: 2 });
    return state;
  }

  async clear(): Promise<boolean> {
    if (!(await this.exists())) return false;
    await fse.remove(this.filePath);
    return true;
  }
}
