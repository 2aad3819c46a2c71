// Station component contracts.
// Purpose: describe the addressable units a station holds and the registry port the reconciler drives.
// Identity is the component name; object references are never compared by the reconciler.

export type ComponentKind = "instrument" | "parameter";

export interface Component {
  readonly name: string;
  readonly kind: ComponentKind;
  readonly label?: string;
  readonly unit?: string;
}

export interface ComponentRegistry {
  /** Registered components in insertion order. */
  components(): readonly Component[];
  componentNames(): string[];
  has(name: string): boolean;
  get(name: string): Component | undefined;
  /** Throws DuplicateComponentError when a different object already owns the name. */
  add(component: Component): void;
  /** Throws ComponentNotFoundError when nothing is registered under the name. */
  remove(name: string): Component;
}

export function createInstrument(name: string, label?: string): Component {
  return label === undefined ? { name, kind: "instrument" } : { name, kind: "instrument", label };
}
