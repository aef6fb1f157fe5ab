import { RESERVED_PATH_SEGMENTS } from "@/configuration/document";
import { ErrResult, OkResult, type Result } from "@/utils/result";

// No dots: both parts become single segments of a dotted config path.
export const NAMESPACE_REGEX = /^[a-z0-9_-]+$/;
export const KEY_REGEX = /^[a-z0-9_/-]+$/;

/**
 * `namespace:key` identifier. Researches are stored in `Researches.yml`
 * under `<namespace>.<key>`.
 */
export class NamespacedKey {
  private constructor(
    readonly namespace: string,
    readonly key: string,
  ) {}

  static of(namespace: string, key: string): Result<NamespacedKey, Error> {
    if (!NAMESPACE_REGEX.test(namespace)) {
      return ErrResult(new Error(`Invalid namespace '${namespace}'. Expected pattern ${NAMESPACE_REGEX.source}`));
    }
    if (!KEY_REGEX.test(key)) {
      return ErrResult(new Error(`Invalid key '${key}'. Expected pattern ${KEY_REGEX.source}`));
    }
    if (RESERVED_PATH_SEGMENTS.has(namespace) || RESERVED_PATH_SEGMENTS.has(key)) {
      return ErrResult(new Error(`Reserved namespaced key '${namespace}:${key}'`));
    }
    return OkResult(new NamespacedKey(namespace, key));
  }

  static parse(text: string): Result<NamespacedKey, Error> {
    const separator = text.indexOf(":");
    if (separator < 0) {
      return ErrResult(new Error(`Missing ':' in namespaced key '${text}'`));
    }
    return NamespacedKey.of(text.slice(0, separator), text.slice(separator + 1));
  }

  /** Dotted config path of this key, e.g. `gearworks.basic_tools`. */
  toConfigPath(): string {
    return `${this.namespace}.${this.key}`;
  }

  equals(other: NamespacedKey): boolean {
    return this.namespace === other.namespace && this.key === other.key;
  }

  toString(): string {
    return `${this.namespace}:${this.key}`;
  }
}
