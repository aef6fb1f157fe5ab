/**
 * Research definitions.
 *
 * Role in system:
 * - A research unlocks a set of items for a player in exchange for a cost.
 * - Cost and enabled state are owned by `Researches.yml`; the definition only
 *   supplies defaults.
 *
 * Invariants:
 * - `cost` is always an integer >= 0.
 */
import type { ConfigDocument } from "@/configuration/document";
import type { NamespacedKey } from "./key";

export class ResearchError extends Error {
  constructor(
    message: string,
    public readonly research: string,
  ) {
    super(message);
    this.name = "ResearchError";
  }
}

export interface ResearchDefinition {
  key: NamespacedKey;
  /** Legacy numeric id, unique across researches. */
  id: number;
  name: string;
  /** Default cost, written to the config on first registration. */
  cost: number;
  items?: readonly string[];
}

export class Research {
  readonly key: NamespacedKey;
  readonly id: number;
  readonly name: string;
  readonly items: readonly string[];
  private cost: number;
  private enabled = true;

  constructor(definition: ResearchDefinition) {
    this.key = definition.key;
    this.id = definition.id;
    this.name = definition.name;
    this.items = definition.items ?? [];
    this.cost = 0;
    this.setCost(definition.cost);
  }

  getCost(): number {
    return this.cost;
  }

  setCost(cost: number): void {
    if (!Number.isInteger(cost) || cost < 0) {
      throw new ResearchError(`Research cost must be zero or greater! (got ${cost})`, this.key.toString());
    }
    this.cost = cost;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** Path of a field of this research in `Researches.yml`. */
  configPath(field: "cost" | "enabled"): string {
    return `${this.key.toConfigPath()}.${field}`;
  }

  /**
   * Write this research's defaults into the researches document and read back
   * what the server owner configured.
   *
   * @sideEffects Mutates `config` (defaults only, never overwrites).
   * @errors Throws `ResearchError` when the configured cost is negative.
   */
  applyConfig(config: ConfigDocument): void {
    config.setDefaultValue(this.configPath("cost"), this.cost);
    config.setDefaultValue(this.configPath("enabled"), true);

    this.enabled = config.getBoolean(this.configPath("enabled"));
    this.setCost(config.getInt(this.configPath("cost")));
  }

  toString(): string {
    return `Research (${this.key.toString()})`;
  }
}
