/**
 * Registered game item.
 *
 * Owns its settings and reports problems through the plugin logger, tagged
 * with the item id and the addon that registered it.
 */
import type { PluginLogger } from "@/utils/logger";
import { ItemSettingError, type LoadableSetting } from "./settings";

export const ITEM_ID_REGEX = /^[A-Z0-9_]+$/;

export interface GameItemDefinition {
  id: string;
  name: string;
  /** Name of the addon that registered the item. */
  addon: string;
  hidden?: boolean;
}

export class GameItem {
  readonly id: string;
  readonly name: string;
  readonly addon: string;
  readonly hidden: boolean;
  private readonly settings = new Map<string, LoadableSetting>();

  constructor(
    definition: GameItemDefinition,
    private readonly logger: PluginLogger,
  ) {
    if (!ITEM_ID_REGEX.test(definition.id)) {
      throw new Error(`Invalid item id '${definition.id}'. Expected pattern ${ITEM_ID_REGEX.source}`);
    }
    this.id = definition.id;
    this.name = definition.name;
    this.addon = definition.addon;
    this.hidden = definition.hidden ?? false;
  }

  addSettings(...settings: LoadableSetting[]): this {
    for (const setting of settings) {
      if (this.settings.has(setting.key)) {
        throw new ItemSettingError(
          `Item ${this.id} already has a setting "${setting.key}"`,
          setting.key,
        );
      }
      this.settings.set(setting.key, setting);
    }
    return this;
  }

  getSettings(): readonly LoadableSetting[] {
    return Array.from(this.settings.values());
  }

  getSetting(key: string): LoadableSetting | null {
    return this.settings.get(key) ?? null;
  }

  error(message: string, cause: unknown): void {
    this.logger.error(this.tag(message), cause);
  }

  warn(message: string): void {
    this.logger.warn(this.tag(message));
  }

  toString(): string {
    return `GameItem (${this.id})`;
  }

  private tag(message: string): string {
    return `Item "${this.id}" from ${this.addon}: ${message}`;
  }
}
