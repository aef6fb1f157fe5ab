/**
 * Canonical names for the plugin's configuration files and cached flags.
 *
 * Role in system:
 * - Shared by the config manager, the permissions service and bootstrap.
 *
 * Invariants:
 * - File names and key paths are the public on-disk format; renaming one
 *   orphans whatever server owners already wrote under the old name.
 */
export const PLUGIN_NAME = "Gearworks";
export const PLUGIN_VERSION = "1.4.0";

export enum ConfigFile {
  Plugin = "config",
  Items = "Items",
  Researches = "Researches",
  Permissions = "permissions",
}

export const configFileName = (file: ConfigFile): string => `${file}.yml`;

/** Flags cached by the config manager on every successful reload. */
export const FLAG_NAMES = [
  "backwardsCompatibility",
  "researchingEnabled",
  "freeCreativeResearching",
  "researchFireworks",
  "duplicateBlockLogging",
  "vanillaRecipesShown",
  "guideGivenOnJoin",
  "updaterEnabled",
  "talismanMessageInActionbar",
  "excessCommandItemsDropping",
] as const;

export type FlagName = (typeof FLAG_NAMES)[number];

export type CachedFlags = Record<FlagName, boolean>;

export interface FlagSource {
  readonly file: ConfigFile.Plugin | ConfigFile.Researches;
  readonly path: string;
}

export const FLAG_SOURCES = {
  backwardsCompatibility: { file: ConfigFile.Plugin, path: "options.backwards-compatibility" },
  researchingEnabled: { file: ConfigFile.Researches, path: "enable-researching" },
  freeCreativeResearching: { file: ConfigFile.Plugin, path: "researches.free-in-creative-mode" },
  researchFireworks: { file: ConfigFile.Plugin, path: "researches.enable-fireworks" },
  duplicateBlockLogging: { file: ConfigFile.Plugin, path: "options.log-duplicate-block-entries" },
  vanillaRecipesShown: { file: ConfigFile.Plugin, path: "guide.show-vanilla-recipes" },
  guideGivenOnJoin: { file: ConfigFile.Plugin, path: "guide.receive-on-first-join" },
  updaterEnabled: { file: ConfigFile.Plugin, path: "options.auto-update" },
  talismanMessageInActionbar: { file: ConfigFile.Plugin, path: "talismans.use-actionbar" },
  excessCommandItemsDropping: { file: ConfigFile.Plugin, path: "options.drop-excess-give-items" },
} as const satisfies Record<FlagName, FlagSource>;

/** Every flag reads as `false` until the first successful reload. */
export const INITIAL_FLAGS: Readonly<CachedFlags> = Object.freeze({
  backwardsCompatibility: false,
  researchingEnabled: false,
  freeCreativeResearching: false,
  researchFireworks: false,
  duplicateBlockLogging: false,
  vanillaRecipesShown: false,
  guideGivenOnJoin: false,
  updaterEnabled: false,
  talismanMessageInActionbar: false,
  excessCommandItemsDropping: false,
});

export const RESEARCHING_ENABLED_DEFAULT = true;
