import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import JSON5 from "json5";
import type { z } from "zod";
import {
  ItemPackSchema,
  ResearchPackSchema,
  type ItemDef,
  type ResearchDef,
} from "./schemas";

const PACK_FILE_BASENAMES = {
  items: "gearworks.items",
  researches: "gearworks.researches",
} as const;

export const DEFAULT_CONTENT_PACKS_DIR = path.resolve(
  process.cwd(),
  "content",
  "packs",
);

type PackKey = keyof typeof PACK_FILE_BASENAMES;

export interface SourceMeta {
  readonly file: string;
  readonly jsonPath: string;
}

export type Sourced<T> = T & { readonly __source: SourceMeta };
export type SourcedItemDef = Sourced<ItemDef & { addon: string }>;
export type SourcedResearchDef = Sourced<ResearchDef>;

export interface LoadedContentPacks {
  readonly packDir: string;
  readonly items: readonly SourcedItemDef[];
  readonly researches: readonly SourcedResearchDef[];
}

export class ContentLoadError extends Error {
  constructor(
    message: string,
    public readonly details: readonly string[] = [],
  ) {
    super(message);
    this.name = "ContentLoadError";
  }
}

/** `$.items[0].id` style path of a zod issue. */
function issuePath(segments: readonly (string | number)[]): string {
  return segments.reduce<string>(
    (acc, part) => (typeof part === "number" ? `${acc}[${part}]` : `${acc}.${part}`),
    "$",
  );
}

function formatZodIssues(issues: readonly z.ZodIssue[], file: string): string[] {
  return issues.map((issue) => `${file} ${issuePath(issue.path)}: ${issue.message}`);
}

function parseContentFile(rawContent: string, filePath: string): unknown {
  return filePath.endsWith(".json5") ? JSON5.parse(rawContent) : JSON.parse(rawContent);
}

const PACK_EXTENSIONS = [".json5", ".json"] as const;

function resolvePackFilePath(packDir: string, packKey: PackKey): string {
  const baseName = PACK_FILE_BASENAMES[packKey];
  const found = PACK_EXTENSIONS.map((ext) => path.join(packDir, `${baseName}${ext}`)).find(
    (candidate) => existsSync(candidate),
  );
  if (found) return found;

  throw new ContentLoadError(
    `Missing required content pack: ${baseName}.json or ${baseName}.json5`,
    [path.join(packDir, baseName)],
  );
}

async function readPackFile(filePath: string): Promise<unknown> {
  const rawContent = await readFile(filePath, "utf8");
  try {
    return parseContentFile(rawContent, filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ContentLoadError(`Failed to parse content file ${filePath}`, [
      `${filePath}: ${reason}`,
    ]);
  }
}

/**
 * Read and schema-check the item and research packs in `packDir`.
 *
 * @errors Throws `ContentLoadError` with one detail per schema issue.
 */
export async function loadContentPacks(
  packDir: string = DEFAULT_CONTENT_PACKS_DIR,
): Promise<LoadedContentPacks> {
  const files = {
    items: resolvePackFilePath(packDir, "items"),
    researches: resolvePackFilePath(packDir, "researches"),
  } as const;

  const [itemsRaw, researchesRaw] = await Promise.all([
    readPackFile(files.items),
    readPackFile(files.researches),
  ]);

  const itemsParsed = ItemPackSchema.safeParse(itemsRaw);
  if (!itemsParsed.success) {
    throw new ContentLoadError(
      "Invalid items content pack",
      formatZodIssues(itemsParsed.error.issues, files.items),
    );
  }

  const researchesParsed = ResearchPackSchema.safeParse(researchesRaw);
  if (!researchesParsed.success) {
    throw new ContentLoadError(
      "Invalid researches content pack",
      formatZodIssues(researchesParsed.error.issues, files.researches),
    );
  }

  const packAddon = itemsParsed.data.addon;
  const sourcedItems = itemsParsed.data.items.map((item, index) => ({
    ...item,
    addon: item.addon ?? packAddon,
    __source: { file: files.items, jsonPath: issuePath(["items", index]) },
  }));
  const sourcedResearches = researchesParsed.data.researches.map((research, index) => ({
    ...research,
    __source: { file: files.researches, jsonPath: issuePath(["researches", index]) },
  }));

  return {
    packDir,
    items: sourcedItems,
    researches: sourcedResearches,
  };
}
