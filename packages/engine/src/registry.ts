// ──────────────────────────────────────────────
// Weft - Component Registry
// Dynamic registration and resolution of stage types
// ──────────────────────────────────────────────

import { DuplicateComponentTypeError, UnknownComponentTypeError } from "@weft/utils";
import type { ComponentDefinition } from "./components/base.js";

const registry = new Map<string, ComponentDefinition>();

export function registerComponent(definition: ComponentDefinition): void {
  if (registry.has(definition.name)) {
    throw new DuplicateComponentTypeError(definition.name);
  }
  registry.set(definition.name, definition);
}

export function resolveComponent(name: string): ComponentDefinition {
  const definition = registry.get(name);
  if (!definition) {
    throw new UnknownComponentTypeError(name, listAvailableComponents());
  }
  return definition;
}

export function listAvailableComponents(): string[] {
  return Array.from(registry.keys());
}

export function isComponentRegistered(name: string): boolean {
  return registry.has(name);
}

export function clearRegistry(): void {
  registry.clear();
}
