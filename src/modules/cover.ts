/**
 * Cover Module
 * Picks the supplied cover image or draws one
 */

import path from "path";
import { generateCover, overlayCoverText } from "../cover";
import { isFile } from "../utils";
import type { BuildContext } from "../types";

/**
 * Writes to context:
 * - cover: Supplied image with title overlay, else a generated cover
 */
export async function cover(ctx: BuildContext): Promise<void> {
  if (!ctx.edition) {
    throw new Error("Revision module must run before cover");
  }

  const { config, tracker, logger, edition } = ctx;

  if (config.cover.image) {
    const imagePath = path.resolve(config.cover.image);

    if (await isFile(imagePath)) {
      try {
        ctx.cover = await overlayCoverText(imagePath, config.cover, edition.label);
        logger.info(`Using custom cover ${imagePath}`);
        return;
      } catch (error) {
        tracker.trackFallback(imagePath, "cover-failed", error);
        logger.warn(`Cannot use cover ${imagePath}, generating one instead`);
      }
    } else {
      tracker.trackFallback(imagePath, "cover-missing");
      logger.warn(`Cover ${imagePath} not found, generating one instead`);
    }
  }

  ctx.cover = await generateCover(config.cover, {
    author: config.book.author,
    buildMonth: edition.buildMonth,
  });
  logger.debug("Generated cover image");
}
