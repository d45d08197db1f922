/**
 * Processor Module
 * Assembles one chapter per planned file, one file at a time
 */

import { readFile } from "fs/promises";
import { createMarkdownRenderer } from "../render";
import { assembleChapter, type SanitizeOptions } from "../utils";
import type { BuildContext, Chapter, PlannedChapter, Section } from "../types";

// Part I holds the manifest chapters; sections are numbered after it
const FIRST_SECTION_PART = 2;

function sectionChapterId(part: number, index: number): string {
  return `s${part}_${String(index + 1).padStart(2, "0")}`;
}

/**
 * Writes to context:
 * - partOne: Manifest chapters that assembled successfully
 * - parts: Non-empty sections, numbered consecutively
 */
export async function process(ctx: BuildContext): Promise<void> {
  if (!ctx.manifestChapters || !ctx.plannedSections) {
    throw new Error("Resolver and scanner must run before processor");
  }

  const { config, tracker, logger, manifestChapters, plannedSections } = ctx;
  const renderer = createMarkdownRenderer(config.markdown);
  const sanitize: SanitizeOptions = {
    prefix: config.content.prefix,
    handbookStyle: config.links.handbookStyle,
    internalStyle: config.links.internalStyle,
    markdown: config.markdown,
  };

  /**
   * Read and assemble one file
   * Returns null when it cannot be read or rendered; the issue is tracked.
   */
  async function assemble(planned: PlannedChapter): Promise<Chapter | null> {
    const { file } = planned;
    tracker.incrementTotal();

    let content: string;
    try {
      content = await readFile(file.path, "utf-8");
    } catch (error) {
      tracker.incrementFailed();
      tracker.trackError(file.relativePath, error, "file", "read");
      logger.warn(`Skipping ${file.relativePath}: cannot read file`);
      return null;
    }

    try {
      const { chapter, frontmatter } = await assembleChapter(
        {
          id: planned.id,
          path: file.relativePath,
          content,
          fallbackTitle: planned.fallbackTitle,
        },
        renderer,
        sanitize,
      );

      if (frontmatter.kind === "malformed") {
        tracker.trackMalformedFrontmatter(file.relativePath, frontmatter.reason);
        logger.debug(`${file.relativePath}: ignoring frontmatter (${frontmatter.reason})`);
      }

      tracker.incrementSuccessful();
      logger.debug(`${chapter.id} ← ${file.relativePath}`);
      return chapter;
    } catch (error) {
      tracker.incrementFailed();
      tracker.trackError(file.relativePath, error, "file", "render");
      logger.warn(`Skipping ${file.relativePath}: cannot render markdown`);
      return null;
    }
  }

  const partOne: Chapter[] = [];
  for (const planned of manifestChapters) {
    const chapter = await assemble(planned);
    if (chapter) partOne.push(chapter);
  }

  const parts: Section[] = [];
  let part = FIRST_SECTION_PART;

  for (const { definition, files } of plannedSections) {
    const chapters: Chapter[] = [];

    for (const [index, file] of files.entries()) {
      const chapter = await assemble({
        id: sectionChapterId(part, index),
        file,
        fallbackTitle: file.title,
      });
      if (chapter) chapters.push(chapter);
    }

    if (chapters.length === 0) {
      continue;
    }

    logger.info(`Part ${part}: ${definition.title} (${chapters.length} pages)`);
    parts.push({
      directory: definition.directory,
      title: definition.title,
      part,
      chapters,
    });
    part++;
  }

  ctx.partOne = partOne;
  ctx.parts = parts;
  tracker.setParts(parts.length + (partOne.length > 0 ? 1 : 0));
}
