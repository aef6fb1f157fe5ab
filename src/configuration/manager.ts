/**
 * Config cache and reload manager.
 *
 * Role in system:
 * - Owns the three plugin documents (`config.yml`, `Items.yml`,
 *   `Researches.yml`) and caches the boolean flags other systems check on
 *   hot paths, so they never re-parse YAML.
 * - On reload, pushes document changes into the registry: research costs,
 *   item settings and item permission nodes.
 *
 * Invariants:
 * - Cached flags reflect the last reload in which every document loaded;
 *   they are swapped as a whole, never field by field.
 * - `reload()` never throws. Every failure is logged and turns the result
 *   into `false`; processing of the remaining researches and items goes on.
 *
 * Gotchas:
 * - Reload is not atomic across the registry: a failure halfway leaves the
 *   earlier researches/items updated and nothing is rolled back.
 * - Accessors are plain fields; setters only change the cache, not the file.
 */
import path from "node:path";
import type { PluginContext } from "@/plugin";
import {
  ConfigFile,
  FLAG_NAMES,
  FLAG_SOURCES,
  INITIAL_FLAGS,
  RESEARCHING_ENABLED_DEFAULT,
  configFileName,
  type CachedFlags,
  type FlagSource,
} from "./constants";
import {
  YamlConfigDocument,
  type ConfigDocument,
  type YamlConfigDocumentOptions,
} from "./document";

export const DEFAULT_PLUGIN_CONFIG_FILE = path.resolve(process.cwd(), "resources", "config.yml");

export type DocumentFactory = (
  file: string,
  options: YamlConfigDocumentOptions,
) => ConfigDocument;

export interface ConfigManagerOptions {
  /** Bundled `config.yml` copied into the data directory on first start. */
  defaultsFile?: string;
  createDocument?: DocumentFactory;
}

const createYamlDocument: DocumentFactory = (file, options) =>
  new YamlConfigDocument(file, options);

export class GameConfigManager {
  private readonly pluginConfig: ConfigDocument;
  private readonly itemsConfig: ConfigDocument;
  private readonly researchesConfig: ConfigDocument;

  private flags: CachedFlags = { ...INITIAL_FLAGS };

  constructor(
    private readonly plugin: PluginContext,
    options: ConfigManagerOptions = {},
  ) {
    const create = options.createDocument ?? createYamlDocument;
    this.pluginConfig = this.openConfig(ConfigFile.Plugin, create, {
      defaultsFile: options.defaultsFile ?? DEFAULT_PLUGIN_CONFIG_FILE,
    });
    this.itemsConfig = this.openConfig(ConfigFile.Items, create, {});
    this.researchesConfig = this.openConfig(ConfigFile.Researches, create, {});
  }

  /**
   * (Re)load every document and re-apply derived state to the registry.
   *
   * Not guaranteed to reload every setting of every subsystem.
   *
   * @returns `true` when everything reloaded without a single error.
   * @sideEffects Replaces cached flags; mutates research costs, item settings
   *   and the permission cache; writes defaults into the in-memory documents.
   */
  reload(): boolean {
    const { logger, registry, permissions } = this.plugin;
    let isSuccessful = true;

    try {
      this.pluginConfig.reload();
      this.itemsConfig.reload();
      this.researchesConfig.reload();

      this.researchesConfig.setDefaultValue("enable-researching", RESEARCHING_ENABLED_DEFAULT);

      this.flags = this.readFlags();
    } catch (error) {
      logger.error(
        `An exception was caught while (re)loading the config files for ${this.pluginLabel()}`,
        error,
      );
      isSuccessful = false;
    }

    for (const research of registry.getResearches()) {
      try {
        const costPath = research.configPath("cost");
        // A key removed from the file keeps the current cost instead of dropping to 0.
        this.researchesConfig.setDefaultValue(costPath, research.getCost());
        research.setCost(this.researchesConfig.getInt(costPath));
      } catch (error) {
        logger.error(
          `Something went wrong while trying to update the cost of a research: ${research.toString()}`,
          error,
        );
        isSuccessful = false;
      }
    }

    for (const item of registry.getAllItems()) {
      try {
        for (const setting of item.getSettings()) {
          if (!setting.load(item, this.itemsConfig)) {
            isSuccessful = false;
          }
        }
      } catch (error) {
        item.error("Something went wrong while updating the settings for this item!", error);
        isSuccessful = false;
      }

      try {
        permissions.update(item, false);
      } catch (error) {
        item.error("Something went wrong while updating the permission node for this item!", error);
        isSuccessful = false;
      }
    }

    return isSuccessful;
  }

  /**
   * Persist the three documents.
   *
   * @errors Propagates the first `ConfigDocumentError`; later files are not saved.
   */
  saveFiles(): void {
    this.pluginConfig.save();
    this.itemsConfig.save();
    this.researchesConfig.save();
  }

  getPluginConfig(): ConfigDocument {
    return this.pluginConfig;
  }

  getItemsConfig(): ConfigDocument {
    return this.itemsConfig;
  }

  getResearchesConfig(): ConfigDocument {
    return this.researchesConfig;
  }

  getFlags(): Readonly<CachedFlags> {
    return Object.freeze({ ...this.flags });
  }

  /**
   * Backwards compatibility lets the server recognise items stored by older
   * versions, at a large lookup cost on every item check.
   */
  isBackwardsCompatible(): boolean {
    return this.flags.backwardsCompatibility;
  }

  setBackwardsCompatible(compatible: boolean): void {
    this.flags.backwardsCompatibility = compatible;
  }

  isResearchingEnabled(): boolean {
    return this.flags.researchingEnabled;
  }

  setResearchingEnabled(enabled: boolean): void {
    this.flags.researchingEnabled = enabled;
  }

  isFreeCreativeResearchingEnabled(): boolean {
    return this.flags.freeCreativeResearching;
  }

  setFreeCreativeResearchingEnabled(enabled: boolean): void {
    this.flags.freeCreativeResearching = enabled;
  }

  isResearchFireworkEnabled(): boolean {
    return this.flags.researchFireworks;
  }

  isDuplicateBlockLoggingEnabled(): boolean {
    return this.flags.duplicateBlockLogging;
  }

  isVanillaRecipeShown(): boolean {
    return this.flags.vanillaRecipesShown;
  }

  isGuideGivenOnJoin(): boolean {
    return this.flags.guideGivenOnJoin;
  }

  isUpdaterEnabled(): boolean {
    return this.flags.updaterEnabled;
  }

  isTalismanMessageInActionbar(): boolean {
    return this.flags.talismanMessageInActionbar;
  }

  isExcessCommandItemsDroppingEnabled(): boolean {
    return this.flags.excessCommandItemsDropping;
  }

  private openConfig(
    file: ConfigFile,
    create: DocumentFactory,
    options: YamlConfigDocumentOptions,
  ): ConfigDocument {
    const fileName = configFileName(file);
    const document = create(path.join(this.plugin.dataDir, fileName), options);

    try {
      document.reload();
    } catch (error) {
      this.plugin.logger.error(
        `An exception was thrown while loading the config file "${fileName}" for ${this.pluginLabel()}`,
        error,
      );
    }

    return document;
  }

  private readFlags(): CachedFlags {
    const flags: CachedFlags = { ...INITIAL_FLAGS };
    for (const name of FLAG_NAMES) {
      const source: FlagSource = FLAG_SOURCES[name];
      flags[name] = this.documentFor(source.file).getBoolean(source.path);
    }
    return flags;
  }

  private documentFor(file: FlagSource["file"]): ConfigDocument {
    return file === ConfigFile.Researches ? this.researchesConfig : this.pluginConfig;
  }

  private pluginLabel(): string {
    return `${this.plugin.name} v${this.plugin.version}`;
  }
}
