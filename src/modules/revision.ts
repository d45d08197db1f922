/**
 * Revision Module
 * Reads source revision metadata and derives the edition labels
 */

import path from "path";
import { defaultRevision, editionFor, readRevision } from "../utils";
import type { BuildContext } from "../types";

/**
 * Writes to context:
 * - revision: Latest commit, or placeholders when git is unavailable
 * - edition: Build date labels
 */
export async function revision(ctx: BuildContext): Promise<void> {
  const { config, tracker, logger, git, now } = ctx;
  const repoPath = path.resolve(config.repoPath);

  try {
    ctx.revision = await readRevision(
      repoPath,
      { timeout: config.git.timeout, repositoryUrl: config.book.repositoryUrl },
      git,
    );
    logger.debug(`Revision ${ctx.revision.short}: ${ctx.revision.message}`);
  } catch (error) {
    tracker.trackFallback(repoPath, "revision-unavailable", error);
    logger.warn(`Git metadata unavailable in ${repoPath}, using placeholders`);
    ctx.revision = defaultRevision();
  }

  ctx.edition = editionFor(now);
}
