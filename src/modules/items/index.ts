export { GameItem, ITEM_ID_REGEX, type GameItemDefinition } from "./item";
export {
  ItemSetting,
  ItemSettingError,
  BooleanSetting,
  StringSetting,
  StringListSetting,
  IntSetting,
  IntRangeSetting,
  EnumSetting,
  SETTING_KEY_REGEX,
  type LoadableSetting,
  type SettingValue,
} from "./settings";
