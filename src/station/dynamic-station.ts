/**
 * DynamicStation: a component registry with memory of several component profiles.
 * Purpose: make the live registry hold exactly the union of the active profiles' components.
 * Assumptions: one controlling caller at a time; profiles are not mutually exclusive.
 * Usage: station.setProfiles({ cooldown: [a, b] }); station.reconcile(["cooldown"]).
 */

import type { UntrackedComponentPolicy } from "../core/config.js";
import {
  ConflictingComponentError,
  UnknownProfileError,
  UntrackedComponentError,
} from "../core/errors.js";
import { logSessionEvent, type EventLogger } from "../core/logger.js";
import { uniqueBy } from "../core/utils.js";

import type { Component, ComponentRegistry } from "./component.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProfileCatalogue =
  | Readonly<Record<string, readonly Component[]>>
  | ReadonlyMap<string, readonly Component[]>;

export type ReconcilePlan = {
  activeProfiles: string[];
  /** Union of the active profiles' components. */
  ensure: Component[];
  /** Components of inactive profiles that no active profile keeps alive. */
  remove: Component[];
  /** Registered names that will be removed. */
  removeFromRegistry: string[];
  /** Components that will be added. */
  add: Component[];
  /** Registered names that belong to no profile at all. */
  untracked: string[];
};

export type ReconcileResult = {
  ensured: string[];
  removed: string[];
  added: string[];
  untracked: string[];
};

export type ReconcileOptions = {
  verbose?: boolean;
};

export type DynamicStationOptions = {
  registry: ComponentRegistry;
  profiles?: ProfileCatalogue;
  untrackedComponents?: UntrackedComponentPolicy;
  logger?: EventLogger;
  print?: (line: string) => void;
  warn?: (line: string) => void;
};

// =============================================================================
// STATION
// =============================================================================

export class DynamicStation {
  readonly registry: ComponentRegistry;
  readonly untrackedComponents: UntrackedComponentPolicy;

  private catalogue = new Map<string, Component[]>();
  private readonly logger?: EventLogger;
  private readonly print: (line: string) => void;
  private readonly warn: (line: string) => void;

  constructor(options: DynamicStationOptions) {
    this.registry = options.registry;
    this.untrackedComponents = options.untrackedComponents ?? "error";
    this.logger = options.logger;
    this.print = options.print ?? ((line) => console.log(line));
    this.warn = options.warn ?? ((line) => console.warn(line));
    if (options.profiles) {
      this.setProfiles(options.profiles);
    }
  }

  /** Replaces the whole catalogue. */
  setProfiles(catalogue: ProfileCatalogue): void {
    this.catalogue = normalizeCatalogue(catalogue);
  }

  profileNames(): string[] {
    return [...this.catalogue.keys()];
  }

  profileMembers(profileName: string): Component[] {
    const members = this.catalogue.get(profileName);
    if (!members) {
      throw new UnknownProfileError(profileName, this.profileNames());
    }
    return [...members];
  }

  planReconcile(activeProfileNames: Iterable<string>): ReconcilePlan {
    const active = [...new Set(activeProfileNames)];
    for (const name of active) {
      if (!this.catalogue.has(name)) {
        throw new UnknownProfileError(name, this.profileNames());
      }
    }

    const activeSet = new Set(active);
    const ensure = uniqueBy(
      active.flatMap((name) => this.catalogue.get(name) ?? []),
      (component) => component.name,
    );
    const ensureNames = new Set(ensure.map((component) => component.name));

    const inactiveMembers = [...this.catalogue.entries()]
      .filter(([name]) => !activeSet.has(name))
      .flatMap(([, members]) => members);
    const remove = uniqueBy(inactiveMembers, (component) => component.name).filter(
      (component) => !ensureNames.has(component.name),
    );
    const removeNames = new Set(remove.map((component) => component.name));

    const removeFromRegistry: string[] = [];
    const untracked: string[] = [];
    for (const name of this.registry.componentNames()) {
      if (removeNames.has(name)) {
        removeFromRegistry.push(name);
      } else if (!ensureNames.has(name)) {
        untracked.push(name);
      }
    }

    const add = ensure.filter((component) => !this.registry.has(component.name));

    return { activeProfiles: active, ensure, remove, removeFromRegistry, add, untracked };
  }

  reconcile(activeProfileNames: Iterable<string>, options: ReconcileOptions = {}): ReconcileResult {
    const verbose = options.verbose ?? true;
    const plan = this.planReconcile(activeProfileNames);

    if (verbose) {
      this.print(`Ensuring components: ${formatNames(plan.ensure.map((c) => c.name))}`);
      this.print(`Removing components: ${formatNames(plan.remove.map((c) => c.name))}`);
    }

    for (const name of plan.untracked) {
      const error = new UntrackedComponentError(name);
      if (this.untrackedComponents === "error") {
        throw error;
      }
      logSessionEvent(this.logger, "station.untracked_component", { component: name });
      this.warn(`Warning: ${error.message}`);
    }

    for (const name of plan.removeFromRegistry) {
      this.registry.remove(name);
    }
    for (const component of plan.add) {
      this.registry.add(component);
    }

    const result: ReconcileResult = {
      ensured: plan.ensure.map((component) => component.name),
      removed: plan.removeFromRegistry,
      added: plan.add.map((component) => component.name),
      untracked: plan.untracked,
    };

    logSessionEvent(this.logger, "station.reconcile", {
      active_profiles: plan.activeProfiles,
      ensured: result.ensured,
      removed: result.removed,
      added: result.added,
      untracked: result.untracked,
    });

    if (verbose) {
      this.print(`Station components: ${formatNames(this.registry.componentNames())}`);
    }

    return result;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function normalizeCatalogue(catalogue: ProfileCatalogue): Map<string, Component[]> {
  const entries: Array<[string, readonly Component[]]> =
    isCatalogueMap(catalogue) ? [...catalogue.entries()] : Object.entries(catalogue);

  const owners = new Map<string, Component>();
  const normalized = new Map<string, Component[]>();

  for (const [profileName, members] of entries) {
    for (const component of members) {
      const owner = owners.get(component.name);
      if (owner && owner !== component) {
        throw new ConflictingComponentError(component.name, profileName);
      }
      owners.set(component.name, component);
    }
    normalized.set(profileName, uniqueBy(members, (component) => component.name));
  }

  return normalized;
}

function isCatalogueMap(
  catalogue: ProfileCatalogue,
): catalogue is ReadonlyMap<string, readonly Component[]> {
  return catalogue instanceof Map;
}

function formatNames(names: string[]): string {
  return names.length > 0 ? names.join(", ") : "(none)";
}
