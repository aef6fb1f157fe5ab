import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { YamlConfigDocument } from "@/configuration/document";
import {
  BooleanSetting,
  EnumSetting,
  GameItem,
  IntRangeSetting,
  IntSetting,
  ItemSettingError,
  StringListSetting,
} from "@/modules/items";
import {
  cleanupTempDirs,
  createRecordingLogger,
  createTempDir,
  messagesAt,
  type RecordingLogger,
} from "../_utils/plugin";

let logger: RecordingLogger;
let config: YamlConfigDocument;

beforeEach(() => {
  logger = createRecordingLogger();
  config = new YamlConfigDocument(path.join(createTempDir(), "Items.yml"));
});

afterEach(() => {
  cleanupTempDirs();
});

const magnet = (): GameItem => new GameItem({ id: "MAGNET", name: "Magnet", addon: "Tests" }, logger);

describe("ItemSetting.load", () => {
  it("writes the default under the item id when the key is missing", () => {
    const radius = new IntRangeSetting("radius", 1, 6, 16);

    expect(radius.load(magnet(), config)).toBe(true);
    expect(radius.getValue()).toBe(6);
    expect(config.getValue("MAGNET.radius")).toBe(6);
  });

  it("accepts a configured value that passes validation", () => {
    const radius = new IntRangeSetting("radius", 1, 6, 16);
    config.setValue("MAGNET.radius", 16);

    expect(radius.load(magnet(), config)).toBe(true);
    expect(radius.getValue()).toBe(16);
  });

  it("falls back to the default for an out-of-range value", () => {
    const radius = new IntRangeSetting("radius", 1, 6, 16);
    config.setValue("MAGNET.radius", 40);

    expect(radius.load(magnet(), config)).toBe(false);
    expect(radius.getValue()).toBe(6);
    expect(messagesAt(logger, "warn")).toEqual([
      'Item "MAGNET" from Tests: Item setting "radius" has an invalid value (expected an integer between 1 and 16). Using the default value.',
    ]);
  });

  it("falls back to the default for a value of the wrong type", () => {
    const strength = new IntSetting("strength", 2);
    config.setValue("MAGNET.strength", 7.5);

    expect(strength.load(magnet(), config)).toBe(false);
    expect(strength.getValue()).toBe(2);
    expect(messagesAt(logger, "warn")).toEqual([
      `Item "MAGNET" from Tests: Item setting "strength" has an invalid type: expected integer, found number '7.5'. Using the default value.`,
    ]);
  });

  it("resets a previously loaded value when the file turns invalid", () => {
    const enabled = new BooleanSetting("enabled", true);
    config.setValue("MAGNET.enabled", false);
    enabled.load(magnet(), config);
    expect(enabled.getValue()).toBe(false);

    config.setValue("MAGNET.enabled", "nope");

    expect(enabled.load(magnet(), config)).toBe(false);
    expect(enabled.getValue()).toBe(true);
  });

  it("checks enum options and string lists", () => {
    const fuel = new EnumSetting("fuel", ["COAL", "CHARCOAL"], "COAL");
    const worlds = new StringListSetting("blacklisted-worlds", []);
    config.setValue("MAGNET.fuel", "CHARCOAL");
    config.setValue("MAGNET.blacklisted-worlds", ["nether"]);

    expect(fuel.load(magnet(), config)).toBe(true);
    expect(worlds.load(magnet(), config)).toBe(true);
    expect(fuel.getValue()).toBe("CHARCOAL");
    expect(worlds.getValue()).toEqual(["nether"]);

    config.setValue("MAGNET.fuel", "WOOD");
    expect(fuel.load(magnet(), config)).toBe(false);
    expect(fuel.getValue()).toBe("COAL");
  });
});

describe("ItemSetting construction and updates", () => {
  it("rejects invalid keys and defaults", () => {
    expect(() => new BooleanSetting("Not Valid", true)).toThrow(ItemSettingError);
    expect(() => new IntRangeSetting("radius", 1, 20, 16)).toThrow(ItemSettingError);
    expect(() => new EnumSetting("fuel", ["COAL"], "WOOD")).toThrow(ItemSettingError);
  });

  it("validates runtime updates", () => {
    const radius = new IntRangeSetting("radius", 1, 6, 16);

    radius.update(3);
    expect(radius.getValue()).toBe(3);
    expect(() => radius.update(0)).toThrow(
      'Rejected value for item setting "radius": expected an integer between 1 and 16',
    );
    expect(radius.getValue()).toBe(3);
  });
});

describe("GameItem", () => {
  it("rejects invalid ids", () => {
    expect(() => new GameItem({ id: "magnet", name: "Magnet", addon: "Tests" }, logger)).toThrow(
      "Invalid item id 'magnet'",
    );
  });

  it("rejects duplicate setting keys", () => {
    const item = magnet().addSettings(new BooleanSetting("enabled", true));

    expect(() => item.addSettings(new BooleanSetting("enabled", false))).toThrow(ItemSettingError);
    expect(item.getSettings()).toHaveLength(1);
    expect(item.getSetting("enabled")?.getValue()).toBe(true);
    expect(item.getSetting("missing")).toBeNull();
  });

  it("tags errors with the item and addon", () => {
    const cause = new Error("boom");
    magnet().error("Could not tick", cause);

    expect(logger.entries).toEqual([
      { level: "error", message: 'Item "MAGNET" from Tests: Could not tick', error: cause },
    ]);
  });
});
