/**
 * Turns validated content packs into registered items and researches.
 *
 * Role in system:
 * - Bootstrap path: packs -> `GameItem`/`Research` -> `GameRegistry`.
 * - On install, every research and item setting reads its current value
 *   from the config documents (writing defaults for new entries).
 *
 * Gotchas:
 * - Installing into a registry that already holds the same ids throws
 *   `RegistryError`; call `registry.clear()` first to reinstall.
 */
import type { GameConfigManager } from "@/configuration/manager";
import {
  BooleanSetting,
  EnumSetting,
  GameItem,
  IntRangeSetting,
  IntSetting,
  StringListSetting,
  StringSetting,
  type LoadableSetting,
} from "@/modules/items";
import { NamespacedKey, Research } from "@/modules/research";
import type { PluginContext } from "@/plugin";
import type { PluginLogger } from "@/utils/logger";
import {
  DEFAULT_CONTENT_PACKS_DIR,
  loadContentPacks,
  type LoadedContentPacks,
  type SourcedItemDef,
  type SourcedResearchDef,
} from "./loader";
import type { SettingDef } from "./schemas";
import { validateLoadedContent } from "./validation";

export interface InstallSummary {
  readonly items: number;
  readonly researches: number;
  /** Settings whose configured value was rejected in favour of the default. */
  readonly rejectedSettings: number;
}

export function buildSetting(definition: SettingDef): LoadableSetting {
  switch (definition.type) {
    case "boolean":
      return new BooleanSetting(definition.key, definition.default);
    case "int":
      return new IntSetting(definition.key, definition.default);
    case "int-range":
      return new IntRangeSetting(definition.key, definition.min, definition.default, definition.max);
    case "string":
      return new StringSetting(definition.key, definition.default);
    case "string-list":
      return new StringListSetting(definition.key, definition.default);
    case "enum":
      return new EnumSetting(definition.key, definition.options, definition.default);
  }
}

export function buildItem(definition: SourcedItemDef, logger: PluginLogger): GameItem {
  const item = new GameItem(
    {
      id: definition.id,
      name: definition.name,
      addon: definition.addon,
      hidden: definition.hidden,
    },
    logger,
  );
  return item.addSettings(...definition.settings.map(buildSetting));
}

export function buildResearch(definition: SourcedResearchDef): Research {
  return new Research({
    key: NamespacedKey.parse(definition.key).unwrap(),
    id: definition.id,
    name: definition.name,
    cost: definition.cost,
    items: definition.items,
  });
}

/**
 * Register every research and item of `content` with the plugin.
 *
 * @sideEffects Mutates the registry and the in-memory items/researches documents.
 * @errors Propagates `RegistryError` on duplicate ids.
 */
export function installContent(
  plugin: PluginContext,
  config: GameConfigManager,
  content: LoadedContentPacks,
): InstallSummary {
  const researchesConfig = config.getResearchesConfig();
  for (const definition of content.researches) {
    const research = buildResearch(definition);
    try {
      research.applyConfig(researchesConfig);
    } catch (error) {
      // Keeps the pack's default cost; the next reload reports it again.
      plugin.logger.error(
        `Could not apply the configured values of ${research.toString()}, using defaults`,
        error,
      );
    }
    plugin.registry.registerResearch(research);
  }

  const itemsConfig = config.getItemsConfig();
  let rejectedSettings = 0;
  for (const definition of content.items) {
    const item = buildItem(definition, plugin.logger);
    for (const setting of item.getSettings()) {
      if (!setting.load(item, itemsConfig)) {
        rejectedSettings += 1;
      }
    }
    plugin.registry.registerItem(item);
  }

  return {
    items: content.items.length,
    researches: content.researches.length,
    rejectedSettings,
  };
}

/** Load, validate and install the packs in `packDir`. */
export async function loadContentInto(
  plugin: PluginContext,
  config: GameConfigManager,
  packDir: string = DEFAULT_CONTENT_PACKS_DIR,
): Promise<InstallSummary> {
  const packs = await loadContentPacks(packDir);
  validateLoadedContent(packs);
  return installContent(plugin, config, packs);
}
