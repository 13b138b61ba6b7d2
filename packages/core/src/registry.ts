/**
 * Macro Registry - Stores and retrieves macro definitions
 */

import type { MacroDefinition, MacroRegistry, TaggedTemplateMacroDef } from "./types.js";

// ============================================================================
// Keyed store
// ============================================================================

/**
 * Duplicate handling for a keyed store:
 * - "skip": keep the existing entry; an entry that `valueEquals` rejects throws
 * - "replace": the incoming entry wins
 */
type DuplicateStrategy = "skip" | "replace";

class KeyedStore<K, V> {
  private readonly store = new Map<K, V>();

  constructor(
    private readonly name: string,
    private readonly strategy: DuplicateStrategy,
    private readonly valueEquals?: (a: V, b: V) => boolean
  ) {}

  set(key: K, value: V): void {
    const existing = this.store.get(key);

    if (existing !== undefined && this.strategy === "skip") {
      if (this.valueEquals && !this.valueEquals(existing, value)) {
        throw new Error(`${this.name}: different value for key '${String(key)}' already exists`);
      }
      return;
    }

    this.store.set(key, value);
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  values(): IterableIterator<V> {
    return this.store.values();
  }

  clear(): void {
    this.store.clear();
  }
}

// ============================================================================
// Macro Registry Implementation
// ============================================================================

/**
 * Key for module-scoped macro lookup: "module::exportName"
 */
function moduleKey(mod: string, exportName: string): string {
  return `${mod}::${exportName}`;
}

/**
 * Two definitions with the same name and module are the same macro.
 * ESM re-imports can produce fresh objects for one definition.
 */
function isSameMacro(existing: MacroDefinition, incoming: MacroDefinition): boolean {
  if (existing === incoming) return true;
  return existing.name === incoming.name && existing.module === incoming.module;
}

class MacroRegistryImpl implements MacroRegistry {
  private readonly taggedTemplateMacros = new KeyedStore<string, TaggedTemplateMacroDef>(
    "MacroRegistry",
    "skip",
    isSameMacro
  );

  /**
   * Secondary index: module-scoped lookup for macros that declare a `module`.
   */
  private readonly moduleScopedMacros = new KeyedStore<string, MacroDefinition>(
    "MacroRegistry",
    "replace"
  );

  register(macro: MacroDefinition): void {
    try {
      this.taggedTemplateMacros.set(macro.name, macro);
    } catch (error) {
      throw new Error(`Tagged template macro '${macro.name}' is already registered`, { cause: error });
    }

    if (macro.module) {
      this.moduleScopedMacros.set(moduleKey(macro.module, macro.exportName ?? macro.name), macro);
    }
  }

  getTaggedTemplate(name: string): TaggedTemplateMacroDef | undefined {
    return this.taggedTemplateMacros.get(name);
  }

  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined {
    return this.moduleScopedMacros.get(moduleKey(mod, exportName));
  }

  isImportScoped(name: string): boolean {
    return this.taggedTemplateMacros.get(name)?.module !== undefined;
  }

  getAll(): MacroDefinition[] {
    return [...this.taggedTemplateMacros.values()];
  }

  clear(): void {
    this.taggedTemplateMacros.clear();
    this.moduleScopedMacros.clear();
  }
}

/** The process-wide registry the transformer consults. */
export const globalRegistry: MacroRegistry = new MacroRegistryImpl();

/** Create an isolated registry (for testing). */
export function createRegistry(): MacroRegistry {
  return new MacroRegistryImpl();
}

// ============================================================================
// Definition Helpers
// ============================================================================

export function defineTaggedTemplateMacro(
  def: Omit<TaggedTemplateMacroDef, "kind">
): TaggedTemplateMacroDef {
  return { ...def, kind: "tagged-template" };
}
