/**
 * Standalone pack check: `npm run content:validate [packDir]`.
 *
 * Runs the same load and cross-reference validation as startup without
 * touching any config document. Exit code 1 on the first failing stage.
 */
import "module-alias/register";

import { createConsoleLogger } from "@/utils/logger";
import { ContentLoadError, DEFAULT_CONTENT_PACKS_DIR, loadContentPacks } from "./loader";
import { ContentValidationError, validateLoadedContent } from "./validation";

const logger = createConsoleLogger("content");

async function validatePacks(packDir: string): Promise<boolean> {
  try {
    const packs = await loadContentPacks(packDir);
    validateLoadedContent(packs);
    logger.info(`${packDir}: ${packs.items.length} items, ${packs.researches.length} researches`);
    return true;
  } catch (error) {
    if (error instanceof ContentLoadError || error instanceof ContentValidationError) {
      logger.error(`${error.message} (${error.details.length} issues)`);
      error.details.forEach((detail) => logger.error(`  ${detail}`));
      return false;
    }
    throw error;
  }
}

validatePacks(process.argv[2] ?? DEFAULT_CONTENT_PACKS_DIR).then(
  (ok) => {
    process.exitCode = ok ? 0 : 1;
  },
  (error: unknown) => {
    logger.error("Unexpected failure while validating content packs", error);
    process.exitCode = 1;
  },
);
