import { ComponentNotFoundError, DuplicateComponentError } from "../core/errors.js";

import type { Component, ComponentRegistry } from "./component.js";

export class InMemoryComponentRegistry implements ComponentRegistry {
  private readonly entries = new Map<string, Component>();

  constructor(initial: Iterable<Component> = []) {
    for (const component of initial) {
      this.add(component);
    }
  }

  components(): readonly Component[] {
    return [...this.entries.values()];
  }

  componentNames(): string[] {
    return [...this.entries.keys()];
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): Component | undefined {
    return this.entries.get(name);
  }

  add(component: Component): void {
    const existing = this.entries.get(component.name);
    if (existing === component) return;
    if (existing) {
      throw new DuplicateComponentError(component.name);
    }
    this.entries.set(component.name, component);
  }

  remove(name: string): Component {
    const existing = this.entries.get(name);
    if (!existing) {
      throw new ComponentNotFoundError(name);
    }
    this.entries.delete(name);
    return existing;
  }
}
