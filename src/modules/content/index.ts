export {
  loadContentPacks,
  DEFAULT_CONTENT_PACKS_DIR,
  ContentLoadError,
  type LoadedContentPacks,
  type SourceMeta,
  type Sourced,
  type SourcedItemDef,
  type SourcedResearchDef,
} from "./loader";

export {
  validateLoadedContent,
  ContentValidationError,
} from "./validation";

export {
  buildSetting,
  buildItem,
  buildResearch,
  installContent,
  loadContentInto,
  type InstallSummary,
} from "./registry";

export {
  CONTENT_SCHEMA_VERSION,
  ItemIdSchema,
  SettingKeySchema,
  ResearchKeySchema,
  SettingDefSchema,
  ItemDefSchema,
  ResearchDefSchema,
  ItemPackSchema,
  ResearchPackSchema,
  type SettingDef,
  type ItemDef,
  type ResearchDef,
  type ItemPack,
  type ResearchPack,
} from "./schemas";
