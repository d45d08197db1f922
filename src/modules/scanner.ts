/**
 * Scanner Module
 * Collects the fallback sections that the manifest did not cover
 */

import { scanSection } from "../utils";
import type { BuildContext, PlannedSection } from "../types";

/**
 * Writes to context:
 * - plannedSections: Sections with at least one file not yet placed,
 *   in the injected priority order
 * - included: Extended with every scanned file that was kept
 */
export async function scan(ctx: BuildContext): Promise<void> {
  if (!ctx.contentRoot || !ctx.included) {
    throw new Error("Resolver must run before scanner");
  }

  const { config, tracker, logger, contentRoot, included, sections } = ctx;
  const planned: PlannedSection[] = [];

  for (const definition of sections) {
    if (definition.directory === config.navigation.sourceSection) {
      logger.debug(`Skipping section ${definition.directory}: covered by the manifest`);
      continue;
    }

    const files = await scanSection(contentRoot, definition.directory, {
      extensions: config.content.extensions,
      snippetDirectory: config.content.snippetDirectory,
    });

    const fresh = files.filter((file) => !included.has(file.identity));
    tracker.incrementDuplicates(files.length - fresh.length);

    if (fresh.length === 0) {
      logger.debug(`Section ${definition.directory} has no new pages`);
      continue;
    }

    for (const file of fresh) {
      included.add(file.identity);
    }

    logger.debug(`Section ${definition.directory}: ${fresh.length} pages`);
    planned.push({ definition, files: fresh });
  }

  ctx.plannedSections = planned;
}
