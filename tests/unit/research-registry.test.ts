import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { YamlConfigDocument } from "@/configuration/document";
import { GameItem } from "@/modules/items";
import { GameRegistry, RegistryError } from "@/modules/registry";
import { NamespacedKey, Research, ResearchError } from "@/modules/research";
import { cleanupTempDirs, createRecordingLogger, createTempDir } from "../_utils/plugin";

const key = (text: string): NamespacedKey => NamespacedKey.parse(text).unwrap();

afterEach(() => {
  cleanupTempDirs();
});

describe("NamespacedKey", () => {
  it("parses namespace and key", () => {
    const parsed = key("gearworks:magnetism");

    expect(parsed.namespace).toBe("gearworks");
    expect(parsed.key).toBe("magnetism");
    expect(parsed.toString()).toBe("gearworks:magnetism");
    expect(parsed.toConfigPath()).toBe("gearworks.magnetism");
    expect(parsed.equals(key("gearworks:magnetism"))).toBe(true);
  });

  it("returns errors for malformed keys", () => {
    const missing = NamespacedKey.parse("magnetism");
    const upper = NamespacedKey.parse("Gearworks:magnetism");

    expect(missing.isErr()).toBe(true);
    expect(upper.isErr()).toBe(true);
    if (missing.isErr()) {
      expect(missing.error.message).toBe("Missing ':' in namespaced key 'magnetism'");
    }
  });

  it("rejects keys that would not map to their own config path", () => {
    const dottedNamespace = NamespacedKey.parse("a.b:c");
    const dottedKey = NamespacedKey.parse("a:b.c");
    const reserved = NamespacedKey.parse("__proto__:magnetism");

    expect(dottedNamespace.isErr()).toBe(true);
    expect(dottedKey.isErr()).toBe(true);
    expect(reserved.isErr()).toBe(true);
    if (reserved.isErr()) {
      expect(reserved.error.message).toBe("Reserved namespaced key '__proto__:magnetism'");
    }
    expect(NamespacedKey.parse("gearworks:tools/hook").isOk()).toBe(true);
  });
});

describe("Research", () => {
  it("rejects negative or fractional costs", () => {
    const research = new Research({ key: key("gearworks:magnetism"), id: 3, name: "Magnetism", cost: 14 });

    expect(() => research.setCost(-1)).toThrow(ResearchError);
    expect(() => research.setCost(1.5)).toThrow(ResearchError);
    expect(research.getCost()).toBe(14);
    expect(research.toString()).toBe("Research (gearworks:magnetism)");
  });

  it("writes defaults and reads the configured values", () => {
    const config = new YamlConfigDocument(path.join(createTempDir(), "Researches.yml"));
    config.setValue("gearworks.magnetism.enabled", false);
    const research = new Research({ key: key("gearworks:magnetism"), id: 3, name: "Magnetism", cost: 14 });

    research.applyConfig(config);

    expect(config.getInt("gearworks.magnetism.cost")).toBe(14);
    expect(research.getCost()).toBe(14);
    expect(research.isEnabled()).toBe(false);
  });
});

describe("GameRegistry", () => {
  it("keeps registration order and rejects duplicates", () => {
    const registry = new GameRegistry();
    const logger = createRecordingLogger();
    const magnet = new GameItem({ id: "MAGNET", name: "Magnet", addon: "Tests" }, logger);
    const hook = new GameItem({ id: "GRAPPLING_HOOK", name: "Hook", addon: "Tests" }, logger);
    const magnetism = new Research({ key: key("gearworks:magnetism"), id: 3, name: "Magnetism", cost: 14 });

    registry.registerItem(magnet);
    registry.registerItem(hook);
    registry.registerResearch(magnetism);

    expect(registry.getAllItems().map((item) => item.id)).toEqual(["MAGNET", "GRAPPLING_HOOK"]);
    expect(registry.getItem("MAGNET")).toBe(magnet);
    expect(registry.getResearch(key("gearworks:magnetism"))).toBe(magnetism);
    expect(() => registry.registerItem(magnet)).toThrow(RegistryError);
    expect(() =>
      registry.registerResearch(
        new Research({ key: key("gearworks:other"), id: 3, name: "Other", cost: 1 }),
      ),
    ).toThrow("Research id 3 of gearworks:other is already in use");

    registry.clear();
    expect(registry.getAllItems()).toEqual([]);
    expect(registry.getResearches()).toEqual([]);
  });
});
