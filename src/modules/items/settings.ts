/**
 * Item settings.
 *
 * Role in system:
 * - Per-item values server owners can change in `Items.yml` under
 *   `<ITEM_ID>.<setting-key>`.
 * - Loaded on registration and again on every config reload.
 *
 * Invariants:
 * - `getValue()` always returns a value that passed the type schema and
 *   `validateInput`; a bad configured value falls back to the default.
 *
 * Gotchas:
 * - `load()` writes the default into the document when the key is missing.
 *   Nothing is persisted until the document is saved.
 */
import { z } from "zod";
import type { ConfigDocument, ConfigValue } from "@/configuration/document";
import type { GameItem } from "./item";

export type SettingValue = string | number | boolean | string[];

export const SETTING_KEY_REGEX = /^[a-z0-9-]+$/;

export class ItemSettingError extends Error {
  constructor(
    message: string,
    public readonly key: string,
  ) {
    super(message);
    this.name = "ItemSettingError";
  }
}

/** Shape the registry and the config manager work with, independent of `T`. */
export interface LoadableSetting {
  readonly key: string;
  readonly typeName: string;
  getValue(): SettingValue;
  getDefaultValue(): SettingValue;
  load(item: GameItem, config: ConfigDocument): boolean;
}

function describeValue(value: ConfigValue | undefined): string {
  if (value === undefined) return "nothing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "a list";
  if (typeof value === "object") return "a section";
  return `${typeof value} '${String(value)}'`;
}

export class ItemSetting<T extends SettingValue> implements LoadableSetting {
  private value: T;

  constructor(
    readonly key: string,
    private readonly defaultValue: T,
    readonly typeName: string,
    private readonly schema: z.ZodType<T>,
  ) {
    if (!SETTING_KEY_REGEX.test(key)) {
      throw new ItemSettingError(
        `Invalid setting key '${key}'. Expected pattern ${SETTING_KEY_REGEX.source}`,
        key,
      );
    }
    this.value = defaultValue;
  }

  getValue(): T {
    return this.value;
  }

  getDefaultValue(): T {
    return this.defaultValue;
  }

  /** Extra constraints beyond the type; subclasses narrow this. */
  validateInput(_input: T): boolean {
    return true;
  }

  protected invalidValueMessage(): string {
    return `expected a valid ${this.typeName}`;
  }

  /**
   * Set the value at runtime.
   *
   * @errors Throws `ItemSettingError` when the value fails validation.
   */
  update(value: T): void {
    if (!this.validateInput(value)) {
      throw new ItemSettingError(
        `Rejected value for item setting "${this.key}": ${this.invalidValueMessage()}`,
        this.key,
      );
    }
    this.value = value;
  }

  /**
   * Read this setting for `item` from the items document.
   *
   * @returns `false` when the configured value was rejected and the default is used.
   * @sideEffects Writes the default into `config` if missing; warns on the item.
   */
  load(item: GameItem, config: ConfigDocument): boolean {
    const path = `${item.id}.${this.key}`;
    config.setDefaultValue(path, this.defaultValue);

    const configured = config.getValue(path);
    const parsed = this.schema.safeParse(configured);
    if (!parsed.success) {
      this.value = this.defaultValue;
      item.warn(
        `Item setting "${this.key}" has an invalid type: expected ${this.typeName}, found ${describeValue(configured)}. Using the default value.`,
      );
      return false;
    }

    if (!this.validateInput(parsed.data)) {
      this.value = this.defaultValue;
      item.warn(
        `Item setting "${this.key}" has an invalid value (${this.invalidValueMessage()}). Using the default value.`,
      );
      return false;
    }

    this.value = parsed.data;
    return true;
  }
}

export class BooleanSetting extends ItemSetting<boolean> {
  constructor(key: string, defaultValue: boolean) {
    super(key, defaultValue, "boolean", z.boolean());
  }
}

export class StringSetting extends ItemSetting<string> {
  constructor(key: string, defaultValue: string) {
    super(key, defaultValue, "string", z.string());
  }
}

export class StringListSetting extends ItemSetting<string[]> {
  constructor(key: string, defaultValue: string[]) {
    super(key, defaultValue, "string list", z.array(z.string()));
  }
}

export class IntSetting extends ItemSetting<number> {
  constructor(key: string, defaultValue: number) {
    super(key, defaultValue, "integer", z.number().int());
  }
}

export class IntRangeSetting extends IntSetting {
  constructor(
    key: string,
    readonly min: number,
    defaultValue: number,
    readonly max: number,
  ) {
    super(key, defaultValue);
    if (min > max || defaultValue < min || defaultValue > max) {
      throw new ItemSettingError(
        `Default ${defaultValue} of "${key}" is outside ${min}..${max}`,
        key,
      );
    }
  }

  override validateInput(input: number): boolean {
    return input >= this.min && input <= this.max;
  }

  protected override invalidValueMessage(): string {
    return `expected an integer between ${this.min} and ${this.max}`;
  }
}

export class EnumSetting extends StringSetting {
  readonly options: readonly string[];

  constructor(key: string, options: readonly string[], defaultValue: string) {
    super(key, defaultValue);
    this.options = options;
    if (!options.includes(defaultValue)) {
      throw new ItemSettingError(
        `Default '${defaultValue}' of "${key}" is not one of ${options.join(", ")}`,
        key,
      );
    }
  }

  override validateInput(input: string): boolean {
    return this.options.includes(input);
  }

  protected override invalidValueMessage(): string {
    return `expected one of ${this.options.join(", ")}`;
  }
}
