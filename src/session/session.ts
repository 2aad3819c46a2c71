/**
 * MeasurementSession + composition root for a rig.
 * Purpose: hold the registry, station and parameters of the one active session as an explicit value.
 * Assumptions: a single session per process; callers pass the session wherever "the current station" is needed.
 * Usage: const session = createMeasurementSession(config); applyProfiles(session, ["cooldown"]); beginMeasurement(session).
 */

import type { RigConfig } from "../core/config.js";
import { ConfigError, UnknownParameterError } from "../core/errors.js";
import type { EventLogger } from "../core/logger.js";
import { defaultSessionId, isoNow } from "../core/utils.js";
import { checkParametersUpdated } from "../parameters/check-updated.js";
import { MustUpdateParameter } from "../parameters/must-update-parameter.js";
import { createInstrument, type Component } from "../station/component.js";
import { DynamicStation, type ReconcileResult } from "../station/dynamic-station.js";
import { InMemoryComponentRegistry } from "../station/registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type MeasurementSession = {
  id: string;
  startedAt: string;
  config: RigConfig;
  registry: InMemoryComponentRegistry;
  station: DynamicStation;
  /** Every configured component, registered or not. */
  components: Map<string, Component>;
  parameters: Map<string, MustUpdateParameter>;
  activeProfiles: string[];
  logger?: EventLogger;
};

export type CreateSessionOptions = {
  sessionId?: string;
  startedAt?: string;
  logger?: EventLogger;
  print?: (line: string) => void;
  warn?: (line: string) => void;
};

export type BeginMeasurementOptions = {
  parameters?: string[];
  verbose?: boolean;
  print?: (line: string) => void;
};

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function createMeasurementSession(
  config: RigConfig,
  options: CreateSessionOptions = {},
): MeasurementSession {
  const components = new Map<string, Component>();
  const parameters = new Map<string, MustUpdateParameter>();

  for (const instrument of config.instruments) {
    components.set(instrument.name, createInstrument(instrument.name, instrument.label));
  }

  for (const entry of config.parameters) {
    const parameter = new MustUpdateParameter(entry.name, {
      mustDiffer: entry.must_differ,
      strict: entry.strict,
      label: entry.label,
      unit: entry.unit,
      logger: options.logger,
    });
    parameters.set(entry.name, parameter);
    components.set(entry.name, parameter);
  }

  const registry = new InMemoryComponentRegistry();
  const station = new DynamicStation({
    registry,
    profiles: buildProfileCatalogue(config.profiles, components),
    untrackedComponents: config.station.untracked_components,
    logger: options.logger,
    print: options.print,
    warn: options.warn,
  });

  return {
    id: options.sessionId ?? defaultSessionId(),
    startedAt: options.startedAt ?? isoNow(),
    config,
    registry,
    station,
    components,
    parameters,
    activeProfiles: [],
    logger: options.logger,
  };
}

function buildProfileCatalogue(
  profiles: Record<string, string[]>,
  components: Map<string, Component>,
): Map<string, Component[]> {
  const catalogue = new Map<string, Component[]>();
  for (const [profileName, members] of Object.entries(profiles)) {
    catalogue.set(
      profileName,
      members.map((member) => {
        const component = components.get(member);
        if (!component) {
          throw new ConfigError(`Profile "${profileName}" references unknown component "${member}".`);
        }
        return component;
      }),
    );
  }
  return catalogue;
}

// =============================================================================
// OPERATIONS
// =============================================================================

export function applyProfiles(
  session: MeasurementSession,
  profileNames: string[],
  options: { verbose?: boolean } = {},
): ReconcileResult {
  const result = session.station.reconcile(profileNames, {
    verbose: options.verbose ?? session.config.station.verbose,
  });
  session.activeProfiles = [...new Set(profileNames)];
  return result;
}

export function getParameter(session: MeasurementSession, name: string): MustUpdateParameter {
  const parameter = session.parameters.get(name);
  if (!parameter) {
    throw new UnknownParameterError(name);
  }
  return parameter;
}

/**
 * Runs the consumption sweep for a new measurement and returns the claimed values.
 * Without an explicit list, every parameter currently registered in the station is swept.
 */
export function beginMeasurement(
  session: MeasurementSession,
  options: BeginMeasurementOptions = {},
): Record<string, unknown> {
  const target = options.parameters
    ? options.parameters.map((name) => getParameter(session, name))
    : session;

  const claimed = checkParametersUpdated(target, {
    verbose: options.verbose ?? session.config.station.verbose,
    logger: session.logger,
    print: options.print,
  });

  return Object.fromEntries(claimed.map((parameter) => [parameter.name, parameter.peek()]));
}
