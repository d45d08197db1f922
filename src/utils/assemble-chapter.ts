/**
 * Chapter Assembler
 * Turns one source document into one e-book chapter
 */

import { escapeXml } from "./escape-xml";
import { frontmatterTitle, parseFrontmatter } from "./parse-frontmatter";
import { sanitizeMarkup, type SanitizeOptions } from "./sanitize-markup";
import type { MarkdownRenderer } from "../render";
import type { Chapter, FrontmatterResult } from "../types";

export interface ChapterSource {
  id: string;
  path: string;
  content: string;
  fallbackTitle: string;
}

export interface AssembledChapter {
  chapter: Chapter;
  frontmatter: FrontmatterResult;
}

/**
 * Parse, sanitize and render a document into a chapter
 * The frontmatter title wins over the caller's fallback title.
 */
export async function assembleChapter(
  source: ChapterSource,
  renderer: MarkdownRenderer,
  sanitize: SanitizeOptions,
): Promise<AssembledChapter> {
  const { frontmatter, data, body } = parseFrontmatter(source.content);
  const title = frontmatterTitle(data) ?? source.fallbackTitle;

  const html = await renderer.render(sanitizeMarkup(body, sanitize));

  return {
    chapter: {
      id: source.id,
      title,
      fileName: `${source.id}.xhtml`,
      body: `<h1>${escapeXml(title)}</h1>\n${html}`,
      sourcePath: source.path,
    },
    frontmatter,
  };
}
