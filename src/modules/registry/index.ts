/**
 * In-memory registry of researches and items.
 *
 * Role in system:
 * - Source of truth for "what exists" at runtime; the config manager walks
 *   it on every reload.
 *
 * Invariants:
 * - Item ids, research keys and research numeric ids are unique.
 * - Iteration order is registration order.
 */
import type { GameItem } from "@/modules/items";
import type { NamespacedKey, Research } from "@/modules/research";

export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

export class GameRegistry {
  private readonly researches = new Map<string, Research>();
  private readonly researchIds = new Set<number>();
  private readonly items = new Map<string, GameItem>();

  registerResearch(research: Research): void {
    const key = research.key.toString();
    if (this.researches.has(key)) {
      throw new RegistryError(`Research ${key} is already registered`);
    }
    if (this.researchIds.has(research.id)) {
      throw new RegistryError(`Research id ${research.id} of ${key} is already in use`);
    }
    this.researches.set(key, research);
    this.researchIds.add(research.id);
  }

  registerItem(item: GameItem): void {
    if (this.items.has(item.id)) {
      throw new RegistryError(`Item ${item.id} is already registered`);
    }
    this.items.set(item.id, item);
  }

  getResearches(): readonly Research[] {
    return Array.from(this.researches.values());
  }

  getResearch(key: NamespacedKey): Research | null {
    return this.researches.get(key.toString()) ?? null;
  }

  getAllItems(): readonly GameItem[] {
    return Array.from(this.items.values());
  }

  getItem(id: string): GameItem | null {
    return this.items.get(id) ?? null;
  }

  clear(): void {
    this.researches.clear();
    this.researchIds.clear();
    this.items.clear();
  }
}
