/**
 * Writer Module
 * Packages the book and writes the EPUB file
 */

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { createArchive, identifierFor, packageBook } from "../epub";
import { loadTemplates } from "../templates";
import type { BuildContext } from "../types";

/**
 * Writes to context:
 * - result: Output location and book summary
 *
 * The archive is built in memory; nothing touches the output path until
 * every page has been packaged.
 */
export async function write(ctx: BuildContext): Promise<void> {
  const { revision, edition, partOne, parts, cover } = ctx;
  if (!revision || !edition || !partOne || !parts || !cover) {
    throw new Error("All pipeline modules must run before writer");
  }

  const { config, logger } = ctx;
  const templates = await loadTemplates(config.templates);

  const files = packageBook(
    { book: config.book, edition, revision, partOne, parts, cover },
    templates,
  );
  const archive = createArchive(files);

  const outputPath = path.resolve(config.output);
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, archive);

  const chapters =
    partOne.length + parts.reduce((sum, section) => sum + section.chapters.length, 0);

  ctx.result = {
    outputPath,
    size: archive.length,
    identifier: identifierFor(config.book.identifierPrefix, revision, edition),
    chapters,
    parts: parts.length + (partOne.length > 0 ? 1 : 0),
  };
  logger.debug(`Wrote ${files.length} entries to ${outputPath}`);
}
