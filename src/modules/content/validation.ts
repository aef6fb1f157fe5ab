import type { LoadedContentPacks } from "./loader";

export class ContentValidationError extends Error {
  constructor(
    message: string,
    public readonly details: readonly string[] = [],
  ) {
    super(message);
    this.name = "ContentValidationError";
  }
}

function sourceLabel(entry: { __source: { file: string; jsonPath: string } }): string {
  return `${entry.__source.file} ${entry.__source.jsonPath}`;
}

function checkDuplicates<T extends { __source: { file: string; jsonPath: string } }>(
  entries: readonly T[],
  idOf: (entry: T) => string,
  entityName: string,
): string[] {
  const issues: string[] = [];
  const byId = new Map<string, T>();

  for (const entry of entries) {
    const id = idOf(entry);
    const existing = byId.get(id);
    if (!existing) {
      byId.set(id, entry);
      continue;
    }

    issues.push(
      `Duplicate ${entityName} '${id}' in ${sourceLabel(existing)} and ${sourceLabel(entry)}`,
    );
  }

  return issues;
}

/**
 * Cross-reference checks the schemas cannot express.
 *
 * @errors Throws `ContentValidationError` listing every issue found.
 */
export function validateLoadedContent(content: LoadedContentPacks): void {
  const issues: string[] = [];

  issues.push(...checkDuplicates(content.items, (item) => item.id, "item id"));
  issues.push(...checkDuplicates(content.researches, (research) => research.key, "research key"));
  issues.push(
    ...checkDuplicates(content.researches, (research) => String(research.id), "research id"),
  );

  const knownItemIds = new Set(content.items.map((item) => item.id));

  for (const item of content.items) {
    const seenKeys = new Set<string>();
    item.settings.forEach((setting, settingIndex) => {
      const at = `${sourceLabel(item)} $.settings[${settingIndex}]`;

      if (seenKeys.has(setting.key)) {
        issues.push(`${at}.key duplicates setting '${setting.key}'`);
      }
      seenKeys.add(setting.key);

      if (setting.type === "int-range") {
        if (setting.min > setting.max) {
          issues.push(`${at} min=${setting.min} is greater than max=${setting.max}`);
        } else if (setting.default < setting.min || setting.default > setting.max) {
          issues.push(
            `${at}.default=${setting.default} is out of range [${setting.min}, ${setting.max}]`,
          );
        }
      }

      if (setting.type === "enum" && !setting.options.includes(setting.default)) {
        issues.push(`${at}.default '${setting.default}' is not one of the options`);
      }
    });
  }

  for (const research of content.researches) {
    research.items.forEach((itemId, itemIndex) => {
      if (!knownItemIds.has(itemId)) {
        issues.push(
          `${sourceLabel(research)} $.items[${itemIndex}] references unknown item '${itemId}'`,
        );
      }
    });
  }

  if (issues.length > 0) {
    throw new ContentValidationError("Content validation failed", issues);
  }
}
