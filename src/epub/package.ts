/**
 * EPUB Package
 * Lays out the pages, manifest, spine and table of contents of the book
 */

import { CONTAINER_XML, type PageTemplates } from "../templates";
import { toRoman } from "./roman";
import type {
  BookConfig,
  Chapter,
  CoverImage,
  EditionInfo,
  ManifestItem,
  RevisionInfo,
  Section,
  TocEntry,
} from "../types";

const XHTML = "application/xhtml+xml";
const STYLESHEET_HREF = "style/default.css";

export interface BookContent {
  book: BookConfig;
  edition: EditionInfo;
  revision: RevisionInfo;
  partOne: Chapter[];
  parts: Section[];
  cover: CoverImage;
}

export interface EpubFile {
  name: string; // Path inside the archive
  data: Buffer | string;
}

interface Page {
  id: string;
  fileName: string;
  title: string;
  body: string;
}

/**
 * Book identifier, unique per revision and build day
 * e.g. "handbook-1a2b3c4-2026-10-19"
 */
export function identifierFor(
  prefix: string,
  revision: RevisionInfo,
  edition: EditionInfo,
): string {
  return `${prefix}-${revision.short}-${edition.buildDate}`;
}

export function bookTitle(book: BookConfig, edition: EditionInfo): string {
  return `${book.title} — ${edition.label}`;
}

function chapterPage(chapter: Chapter): Page {
  return {
    id: chapter.id,
    fileName: chapter.fileName,
    title: chapter.title,
    body: chapter.body,
  };
}

function chapterEntries(chapters: Chapter[]): TocEntry[] {
  return chapters.map((chapter) => ({
    title: chapter.title,
    href: chapter.fileName,
    order: 0,
    children: [],
  }));
}

/**
 * Number entries depth-first, starting at 1
 */
function assignPlayOrder(entries: TocEntry[]): void {
  let order = 0;
  const visit = (list: TocEntry[]): void => {
    for (const entry of list) {
      entry.order = ++order;
      visit(entry.children);
    }
  };
  visit(entries);
}

/**
 * Reading order of the book, with nav.xhtml placed after the credits page
 */
export function layoutBook(
  content: BookContent,
  templates: PageTemplates,
): { pages: Page[]; spine: string[]; toc: TocEntry[] } {
  const { book, edition, revision, partOne, parts } = content;
  const pages: Page[] = [];
  const spine: string[] = [];
  const toc: TocEntry[] = [];

  const push = (page: Page): void => {
    pages.push(page);
    spine.push(page.id);
  };

  push({
    id: "edition",
    fileName: "edition.xhtml",
    title: edition.label,
    body: templates.credits({ book, edition, revision }),
  });
  spine.push("nav");

  if (partOne.length > 0) {
    const title = `Part I: ${book.subtitle}`;
    push({
      id: "part1",
      fileName: "part1.xhtml",
      title,
      body: templates.part({ number: toRoman(1), title: book.subtitle }),
    });
    partOne.forEach((chapter) => push(chapterPage(chapter)));
    toc.push({
      title,
      href: "part1.xhtml",
      order: 0,
      children: chapterEntries(partOne),
    });
  }

  for (const section of parts) {
    const fileName = `part${section.part}.xhtml`;
    push({
      id: `part${section.part}`,
      fileName,
      title: `Part ${toRoman(section.part)}: ${section.title}`,
      body: templates.part({ number: toRoman(section.part), title: section.title }),
    });
    section.chapters.forEach((chapter) => push(chapterPage(chapter)));
    toc.push({
      title: section.title,
      href: fileName,
      order: 0,
      children: chapterEntries(section.chapters),
    });
  }

  push({
    id: "colophon",
    fileName: "colophon.xhtml",
    title: "Colophon",
    body: templates.colophon({ book, edition, revision }),
  });

  assignPlayOrder(toc);
  return { pages, spine, toc };
}

/**
 * Every file of the EPUB container, in archive order
 * The mimetype entry comes first, as the container format requires.
 */
export function packageBook(content: BookContent, templates: PageTemplates): EpubFile[] {
  const { book, edition, revision, cover } = content;
  const identifier = identifierFor(book.identifierPrefix, revision, edition);
  const title = bookTitle(book, edition);
  const { pages, spine, toc } = layoutBook(content, templates);

  const items: ManifestItem[] = [
    { id: "nav", href: "nav.xhtml", mediaType: XHTML, properties: "nav" },
    { id: "ncx", href: "toc.ncx", mediaType: "application/x-dtbncx+xml" },
    { id: "style", href: STYLESHEET_HREF, mediaType: "text/css" },
    {
      id: "cover-image",
      href: cover.fileName,
      mediaType: cover.mediaType,
      properties: "cover-image",
    },
    ...pages.map((page) => ({ id: page.id, href: page.fileName, mediaType: XHTML })),
  ];

  const opf = templates.packageDocument({
    identifier,
    title,
    language: book.language,
    author: book.author,
    description: book.description,
    date: edition.buildDate,
    publisher: book.publisher,
    modified: edition.modified,
    items,
    spine,
    guide: { title: edition.label, href: "edition.xhtml" },
  });

  const navigation = { identifier, title, language: book.language, entries: toc };

  return [
    { name: "mimetype", data: "application/epub+zip" },
    { name: "META-INF/container.xml", data: CONTAINER_XML },
    { name: "OEBPS/content.opf", data: opf },
    { name: "OEBPS/nav.xhtml", data: templates.navigation(navigation) },
    { name: "OEBPS/toc.ncx", data: templates.ncx(navigation) },
    { name: `OEBPS/${STYLESHEET_HREF}`, data: templates.stylesheet },
    { name: `OEBPS/${cover.fileName}`, data: cover.data },
    ...pages.map((page) => ({
      name: `OEBPS/${page.fileName}`,
      data: templates.page({
        title: page.title,
        language: book.language,
        stylesheet: STYLESHEET_HREF,
        body: page.body,
      }),
    })),
  ];
}
