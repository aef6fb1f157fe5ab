/**
 * Plugin runtime context.
 *
 * Role in system:
 * - Bundles what the config manager and content loading need from the host:
 *   identity for log lines, the data directory, the registry and the
 *   permissions service.
 */
import path from "node:path";
import { PLUGIN_NAME, PLUGIN_VERSION, ConfigFile, configFileName } from "@/configuration/constants";
import { YamlConfigDocument } from "@/configuration/document";
import { GameRegistry } from "@/modules/registry";
import { PermissionsService } from "@/modules/permissions";
import { createConsoleLogger, type PluginLogger } from "@/utils/logger";

export interface PluginContext {
  readonly name: string;
  readonly version: string;
  readonly dataDir: string;
  readonly logger: PluginLogger;
  readonly registry: GameRegistry;
  readonly permissions: PermissionsService;
}

export interface PluginContextOptions {
  dataDir: string;
  logger?: PluginLogger;
}

/**
 * Build a fresh context with an empty registry and a permissions service
 * backed by `<dataDir>/permissions.yml` (loaded immediately).
 *
 * @errors Propagates a `ConfigDocumentError` when `permissions.yml` is unreadable.
 */
export function createPluginContext(options: PluginContextOptions): PluginContext {
  const permissionsConfig = new YamlConfigDocument(
    path.join(options.dataDir, configFileName(ConfigFile.Permissions)),
  );
  permissionsConfig.reload();

  return {
    name: PLUGIN_NAME,
    version: PLUGIN_VERSION,
    dataDir: options.dataDir,
    logger: options.logger ?? createConsoleLogger(PLUGIN_NAME.toLowerCase()),
    registry: new GameRegistry(),
    permissions: new PermissionsService(permissionsConfig),
  };
}
