/**
 * Plugin bootstrap.
 *
 * Loads process settings, installs the content packs, runs the first config
 * reload and registers permission nodes. Reload failures are reported but do
 * not stop the process; only unreadable content packs or a broken
 * `permissions.yml` abort startup.
 */
import "module-alias/register";
import "dotenv/config";

import { GameConfigManager, readRuntimeSettings } from "@/configuration";
import { loadContentInto } from "@/modules/content";
import { createPluginContext } from "@/plugin";

async function bootstrap(): Promise<void> {
  const settings = readRuntimeSettings().unwrap();
  const plugin = createPluginContext({ dataDir: settings.dataDir });
  plugin.logger.info(`Starting ${plugin.name} v${plugin.version} (data: ${settings.dataDir})`);

  const config = new GameConfigManager(plugin);
  const summary = await loadContentInto(plugin, config, settings.contentDir);
  plugin.logger.info(
    `Installed ${summary.items} items and ${summary.researches} researches from ${settings.contentDir}`,
  );

  const reloaded = config.reload();
  if (!reloaded) {
    plugin.logger.warn("Config reload finished with errors, see above; config files are not saved");
  }

  plugin.permissions.register(plugin.registry.getAllItems(), settings.saveOnStart);
  if (settings.saveOnStart && reloaded) {
    config.saveFiles();
  }

  const enabled = Object.entries(config.getFlags())
    .filter(([, value]) => value)
    .map(([name]) => name);
  plugin.logger.info(`Enabled options: ${enabled.length > 0 ? enabled.join(", ") : "none"}`);
}

bootstrap().catch((error) => {
  console.error("[bootstrap] Failed to start plugin:", error);
  process.exitCode = 1;
});
