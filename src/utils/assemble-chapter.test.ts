import { describe, it, expect } from "vitest";
import { assembleChapter } from "./assemble-chapter";
import { createMarkdownRenderer } from "../render";
import type { SanitizeOptions } from "./sanitize-markup";

const renderer = createMarkdownRenderer({
  gfm: true,
  breaks: true,
  emphasis: "*",
  strong: "**",
  removeSelectors: [],
});

const sanitize: SanitizeOptions = {
  prefix: "/handbook/",
  handbookStyle: "italic",
  internalStyle: "plain",
  markdown: { emphasis: "*", strong: "**" },
};

describe("assembleChapter", () => {
  it("prefers the frontmatter title over the fallback", async () => {
    const { chapter, frontmatter } = await assembleChapter(
      {
        id: "ch_01",
        path: "company/story.md",
        content: '---\ntitle: "Our Story"\n---\nWe started in a garage.',
        fallbackTitle: "Story",
      },
      renderer,
      sanitize,
    );

    expect(frontmatter.kind).toBe("parsed");
    expect(chapter).toEqual({
      id: "ch_01",
      title: "Our Story",
      fileName: "ch_01.xhtml",
      body: "<h1>Our Story</h1>\n<p>We started in a garage.</p>",
      sourcePath: "company/story.md",
    });
  });

  it("uses the fallback title without frontmatter", async () => {
    const { chapter, frontmatter } = await assembleChapter(
      { id: "s2_01", path: "people/qa.md", content: "Ask away.", fallbackTitle: "Q&A" },
      renderer,
      sanitize,
    );

    expect(frontmatter.kind).toBe("absent");
    expect(chapter.title).toBe("Q&A");
    expect(chapter.body).toBe("<h1>Q&amp;A</h1>\n<p>Ask away.</p>");
  });

  it("falls back when frontmatter is malformed", async () => {
    const { chapter, frontmatter } = await assembleChapter(
      {
        id: "s2_02",
        path: "people/broken.md",
        content: "---\ntitle: [oops\n---\nText",
        fallbackTitle: "Broken",
      },
      renderer,
      sanitize,
    );

    expect(frontmatter.kind).toBe("malformed");
    expect(chapter.title).toBe("Broken");
  });

  it("sanitizes MDX before rendering", async () => {
    const { chapter } = await assembleChapter(
      {
        id: "ch_02",
        path: "company/values.mdx",
        content:
          "import Callout from 'components/Callout'\n\n<Callout>Be kind</Callout>\n\nSee [Values](/handbook/company/values).",
        fallbackTitle: "Values",
      },
      renderer,
      sanitize,
    );

    expect(chapter.body).toBe(
      "<h1>Values</h1>\n<p>Be kind</p>\n<p>See <em>Values</em>.</p>",
    );
  });
});
