/**
 * YAML-backed configuration document.
 *
 * Role in system:
 * - One instance per file (`config.yml`, `Items.yml`, `Researches.yml`,
 *   `permissions.yml`). The config manager and the permissions service read
 *   and write through it with dotted key paths.
 *
 * Invariants:
 * - The in-memory tree is always a mapping of validated `ConfigValue`s.
 * - `reload()` is all-or-nothing: a parse failure keeps the previous tree.
 * - After a failed `reload()`, `save()` refuses to write until a reload succeeds.
 * - Path walking only follows own keys; `__proto__` is never a valid segment.
 *
 * Gotchas:
 * - Comments in the file are not preserved by `save()`.
 * - Dots always separate path segments; keys containing a dot are unreachable.
 */
import { copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { parse, stringify } from "yaml";
import { z } from "zod";

export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | ConfigValue[]
  | { [key: string]: ConfigValue };

export type ConfigTree = { [key: string]: ConfigValue };

const ConfigValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ConfigValueSchema),
    z.record(z.string(), ConfigValueSchema),
  ]),
);

const ConfigTreeSchema = z.record(z.string(), ConfigValueSchema);

export class ConfigDocumentError extends Error {
  constructor(
    message: string,
    public readonly file: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "ConfigDocumentError";
  }
}

export interface ConfigDocument {
  readonly file: string;
  reload(): void;
  save(): void;
  contains(path: string): boolean;
  getValue(path: string): ConfigValue | undefined;
  setValue(path: string, value: ConfigValue): void;
  setDefaultValue(path: string, value: ConfigValue): void;
  getBoolean(path: string): boolean;
  getInt(path: string): number;
  getString(path: string): string | null;
  getStringList(path: string): string[];
  getKeys(): string[];
}

export interface YamlConfigDocumentOptions {
  /** Bundled file copied into place when `file` does not exist yet. */
  defaultsFile?: string;
}

function isTree(value: ConfigValue | undefined): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Segments that would reach an object's prototype instead of a key. */
export const RESERVED_PATH_SEGMENTS: ReadonlySet<string> = new Set(["__proto__"]);

function splitPath(keyPath: string): string[] | null {
  const segments = keyPath.split(".");
  const valid = segments.every(
    (segment) => segment.length > 0 && !RESERVED_PATH_SEGMENTS.has(segment),
  );
  return valid ? segments : null;
}

function ownChild(node: ConfigTree, segment: string): ConfigValue | undefined {
  return Object.hasOwn(node, segment) ? node[segment] : undefined;
}

export class YamlConfigDocument implements ConfigDocument {
  private tree: ConfigTree = {};
  private lastReloadFailed = false;

  constructor(
    readonly file: string,
    private readonly options: YamlConfigDocumentOptions = {},
  ) {}

  /**
   * @errors Throws `ConfigDocumentError` when the file cannot be copied,
   *   parsed or validated; the previous tree stays in place.
   */
  reload(): void {
    try {
      this.tree = this.read();
      this.lastReloadFailed = false;
    } catch (error) {
      this.lastReloadFailed = true;
      throw error;
    }
  }

  private read(): ConfigTree {
    if (!existsSync(this.file)) {
      const defaults = this.options.defaultsFile;
      if (!defaults) {
        return {};
      }

      try {
        mkdirSync(path.dirname(this.file), { recursive: true });
        copyFileSync(defaults, this.file);
      } catch (error) {
        throw new ConfigDocumentError(
          `Could not copy defaults ${defaults} to ${this.file}`,
          this.file,
          error,
        );
      }
    }

    let raw: unknown;
    try {
      raw = parse(readFileSync(this.file, "utf8"));
    } catch (error) {
      throw new ConfigDocumentError(`Failed to parse ${this.file}`, this.file, error);
    }

    // An empty file parses to null.
    if (raw === null || raw === undefined) {
      return {};
    }

    const parsed = ConfigTreeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigDocumentError(
        `Invalid document ${this.file}: root must be a mapping of plain values`,
        this.file,
        parsed.error,
      );
    }

    return parsed.data;
  }

  /**
   * @errors Throws `ConfigDocumentError` when writing fails or the last
   *   reload failed (the file on disk is left untouched).
   */
  save(): void {
    if (this.lastReloadFailed) {
      throw new ConfigDocumentError(
        `Refusing to save ${this.file}: the last reload failed`,
        this.file,
      );
    }
    try {
      mkdirSync(path.dirname(this.file), { recursive: true });
      writeFileSync(this.file, stringify(this.tree), "utf8");
    } catch (error) {
      throw new ConfigDocumentError(`Failed to save ${this.file}`, this.file, error);
    }
  }

  contains(keyPath: string): boolean {
    return this.lookup(keyPath) !== undefined;
  }

  getValue(keyPath: string): ConfigValue | undefined {
    const value = this.lookup(keyPath);
    return typeof value === "object" && value !== null ? structuredClone(value) : value;
  }

  setValue(keyPath: string, value: ConfigValue): void {
    const segments = splitPath(keyPath);
    if (!segments) {
      throw new ConfigDocumentError(`Invalid key path '${keyPath}'`, this.file);
    }

    const last = segments.pop();
    if (last === undefined) return;

    let node = this.tree;
    for (const segment of segments) {
      const next = ownChild(node, segment);
      if (isTree(next)) {
        node = next;
        continue;
      }
      const created: ConfigTree = {};
      node[segment] = created;
      node = created;
    }

    node[last] = typeof value === "object" && value !== null ? structuredClone(value) : value;
  }

  setDefaultValue(keyPath: string, value: ConfigValue): void {
    if (!this.contains(keyPath)) {
      this.setValue(keyPath, value);
    }
  }

  getBoolean(keyPath: string): boolean {
    return this.lookup(keyPath) === true;
  }

  getInt(keyPath: string): number {
    const value = this.lookup(keyPath);
    return typeof value === "number" && Number.isFinite(value) ? Math.trunc(value) : 0;
  }

  getString(keyPath: string): string | null {
    const value = this.lookup(keyPath);
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    return null;
  }

  getStringList(keyPath: string): string[] {
    const value = this.lookup(keyPath);
    if (!Array.isArray(value)) return [];
    return value.filter((entry): entry is string => typeof entry === "string");
  }

  getKeys(): string[] {
    return Object.keys(this.tree);
  }

  private lookup(keyPath: string): ConfigValue | undefined {
    const segments = splitPath(keyPath);
    if (!segments) return undefined;

    let current: ConfigValue | undefined = this.tree;
    for (const segment of segments) {
      if (!isTree(current)) return undefined;
      current = ownChild(current, segment);
    }
    return current;
  }
}
