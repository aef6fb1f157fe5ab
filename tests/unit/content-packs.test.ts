import { writeFileSync } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { GameConfigManager } from "@/configuration";
import {
  ContentLoadError,
  ContentValidationError,
  loadContentInto,
  loadContentPacks,
  validateLoadedContent,
} from "@/modules/content";
import { NamespacedKey } from "@/modules/research";
import {
  cleanupTempDirs,
  createRecordingLogger,
  createTempDir,
  createTestContext,
  messagesAt,
  writeYaml,
} from "../_utils/plugin";

function createTempPackDir(files: Record<string, unknown>): string {
  const dir = createTempDir();
  for (const [fileName, content] of Object.entries(files)) {
    writeFileSync(path.join(dir, fileName), JSON.stringify(content, null, 2), "utf8");
  }
  return dir;
}

const item = (id: string, settings: unknown[] = []) => ({ id, name: id, settings });

afterEach(() => {
  cleanupTempDirs();
});

describe("content pack loading", () => {
  it("returns schema errors with file and json path", async () => {
    const packDir = createTempPackDir({
      "gearworks.items.json": { schemaVersion: 1, addon: "Tests", items: [item("bad-id")] },
      "gearworks.researches.json": { schemaVersion: 1, researches: [] },
    });

    const thrown = await loadContentPacks(packDir).then(
      () => null,
      (error: unknown) => error,
    );

    expect(thrown).toBeInstanceOf(ContentLoadError);
    if (!(thrown instanceof ContentLoadError)) return;
    expect(thrown.details).toEqual([
      `${path.join(packDir, "gearworks.items.json")} $.items[0].id: Invalid item id. Expected pattern ^[A-Z0-9_]+$`,
    ]);
  });

  it("reports a missing pack file", async () => {
    const packDir = createTempPackDir({
      "gearworks.items.json": { schemaVersion: 1, addon: "Tests", items: [] },
    });

    await expect(loadContentPacks(packDir)).rejects.toThrow(
      "Missing required content pack: gearworks.researches.json or gearworks.researches.json5",
    );
  });

  it("fills in the pack addon and source location", async () => {
    const packDir = createTempPackDir({
      "gearworks.items.json": {
        schemaVersion: 1,
        addon: "Tests",
        items: [item("MAGNET"), { ...item("LASER"), addon: "Lasers" }],
      },
      "gearworks.researches.json": { schemaVersion: 1, researches: [] },
    });

    const packs = await loadContentPacks(packDir);

    expect(packs.items.map((entry) => entry.addon)).toEqual(["Tests", "Lasers"]);
    expect(packs.items[1]?.__source.jsonPath).toBe("$.items[1]");
    expect(packs.items[0]?.hidden).toBe(false);
  });

  it("loads the packs shipped with the plugin", async () => {
    const packs = await loadContentPacks();

    expect(packs.items).toHaveLength(5);
    expect(packs.researches).toHaveLength(4);
    expect(() => validateLoadedContent(packs)).not.toThrow();
  });
});

describe("content cross-reference validation", () => {
  it("catches unknown items and bad setting defaults", async () => {
    const packDir = createTempPackDir({
      "gearworks.items.json": {
        schemaVersion: 1,
        addon: "Tests",
        items: [
          item("MAGNET", [{ type: "int-range", key: "radius", min: 1, max: 16, default: 20 }]),
        ],
      },
      "gearworks.researches.json": {
        schemaVersion: 1,
        researches: [
          { key: "tests:magnetism", id: 1, name: "Magnetism", cost: 3, items: ["MAGNET", "MISSING"] },
        ],
      },
    });
    const packs = await loadContentPacks(packDir);
    const itemsFile = path.join(packDir, "gearworks.items.json");
    const researchesFile = path.join(packDir, "gearworks.researches.json");

    let thrown: unknown = null;
    try {
      validateLoadedContent(packs);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ContentValidationError);
    if (!(thrown instanceof ContentValidationError)) return;
    expect(thrown.details).toEqual([
      `${itemsFile} $.items[0] $.settings[0].default=20 is out of range [1, 16]`,
      `${researchesFile} $.researches[0] $.items[1] references unknown item 'MISSING'`,
    ]);
  });

  it("catches duplicate ids", async () => {
    const packDir = createTempPackDir({
      "gearworks.items.json": {
        schemaVersion: 1,
        addon: "Tests",
        items: [item("MAGNET"), item("MAGNET")],
      },
      "gearworks.researches.json": { schemaVersion: 1, researches: [] },
    });
    const packs = await loadContentPacks(packDir);
    const itemsFile = path.join(packDir, "gearworks.items.json");

    expect(() => validateLoadedContent(packs)).toThrow(ContentValidationError);
    try {
      validateLoadedContent(packs);
    } catch (error) {
      if (!(error instanceof ContentValidationError)) throw error;
      expect(error.details).toEqual([
        `Duplicate item id 'MAGNET' in ${itemsFile} $.items[0] and ${itemsFile} $.items[1]`,
      ]);
    }
  });
});

describe("installing content", () => {
  it("registers content and reads the configured values", async () => {
    const dataDir = createTempDir();
    writeYaml(dataDir, "Items.yml", "MAGNET:\n  radius: 40\n");
    writeYaml(dataDir, "Researches.yml", "gearworks:\n  magnetism:\n    cost: 30\n");
    const logger = createRecordingLogger();
    const plugin = createTestContext(dataDir, logger);
    const manager = new GameConfigManager(plugin);

    const summary = await loadContentInto(plugin, manager);

    expect(summary).toEqual({ items: 5, researches: 4, rejectedSettings: 1 });
    expect(plugin.registry.getItem("DEBUG_STICK")?.hidden).toBe(true);
    expect(
      plugin.registry.getResearch(NamespacedKey.parse("gearworks:magnetism").unwrap())?.getCost(),
    ).toBe(30);
    expect(
      plugin.registry.getResearch(NamespacedKey.parse("gearworks:smelting").unwrap())?.getCost(),
    ).toBe(20);
    expect(manager.getItemsConfig().getInt("GRAPPLING_HOOK.despawn-seconds")).toBe(60);
    expect(plugin.registry.getItem("MAGNET")?.getSetting("radius")?.getValue()).toBe(6);
    expect(messagesAt(logger, "warn")).toEqual([
      'Item "MAGNET" from Gearworks: Item setting "radius" has an invalid value (expected an integer between 1 and 16). Using the default value.',
    ]);
  });
});
