/**
 * Resolver Module
 * Resolves navigation manifest references into the Part I reading order
 */

import path from "path";
import {
  describeFile,
  loadNavigation,
  resolveReference,
  titleFromPath,
} from "../utils";
import type { BuildContext, ContentReference, PlannedChapter } from "../types";

function chapterId(index: number): string {
  return `ch_${String(index + 1).padStart(2, "0")}`;
}

/**
 * Writes to context:
 * - references: Links of the manifest's first group
 * - manifestChapters: Resolved references, in manifest order
 * - included: Identities of every file placed so far
 *
 * Chapter ids follow manifest positions, so skipped references leave gaps.
 */
export async function resolve(ctx: BuildContext): Promise<void> {
  if (!ctx.contentRoot) {
    throw new Error("Content root must be set before resolving references");
  }

  const { config, tracker, logger, contentRoot } = ctx;
  const manifestPath = path.resolve(config.repoPath, config.navigation.manifest);

  let references: ContentReference[] = [];
  try {
    const navigation = await loadNavigation(manifestPath);
    references = navigation.links;
    for (const { index, error } of navigation.rejected) {
      tracker.trackError(`${manifestPath}#links[${index}]`, error, "resource");
      logger.warn(`Skipping manifest link ${index + 1}: not a valid reference`);
    }
  } catch (error) {
    tracker.trackError(manifestPath, error, "resource");
    logger.warn(`Navigation manifest is invalid, skipping it: ${manifestPath}`);
  }

  if (references.length === 0) {
    logger.info("No navigation links found, Part I will be empty");
  }

  const included = new Set<string>();
  const planned: PlannedChapter[] = [];

  for (const [index, reference] of references.entries()) {
    const filePath = await resolveReference(contentRoot, reference.to, {
      prefix: config.content.prefix,
      extensions: config.content.extensions,
    });

    if (!filePath) {
      logger.warn(`Skipping ${reference.to}: no matching file`);
      tracker.trackUnresolvedReference(reference.to, reference.name ?? undefined);
      continue;
    }

    const file = await describeFile(contentRoot, filePath);
    if (included.has(file.identity)) {
      logger.debug(`Skipping ${reference.to}: already listed in the manifest`);
      tracker.incrementDuplicates();
      continue;
    }

    included.add(file.identity);
    planned.push({
      id: chapterId(index),
      file,
      fallbackTitle: reference.name?.trim() || titleFromPath(filePath),
    });
  }

  ctx.references = references;
  ctx.manifestChapters = planned;
  ctx.included = included;
}
