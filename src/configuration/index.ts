/**
 * Configuration entrypoint.
 *
 * Re-exports the documents, the cache/reload manager and the file/flag
 * constants. Prefer `import { GameConfigManager } from "@/configuration"`.
 */
export * from "./constants";
export * from "./document";
export * from "./env";
export * from "./manager";
