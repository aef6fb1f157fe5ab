export { NamespacedKey, NAMESPACE_REGEX, KEY_REGEX } from "./key";
export {
  Research,
  ResearchError,
  type ResearchDefinition,
} from "./research";
