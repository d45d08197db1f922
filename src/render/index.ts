/**
 * Markdown Renderer
 * Renders sanitized markdown to an XHTML fragment for chapter pages
 */

import { Marked } from "marked";
import { load, type CheerioAPI } from "cheerio";
import type { MarkdownConfig } from "../types";
import { headingAnchors, removeUnsupported } from "./rules";

export type RenderRule = ($: CheerioAPI) => void;

export interface MarkdownRenderer {
  render(markdown: string): Promise<string>;
}

export function createMarkdownRenderer(config: MarkdownConfig): MarkdownRenderer {
  const marked = new Marked({
    gfm: config.gfm,
    breaks: config.breaks,
  });

  const rules: RenderRule[] = [removeUnsupported(config), headingAnchors()];

  return {
    async render(markdown: string): Promise<string> {
      const html = await marked.parse(markdown);
      const $ = load(html, null, false);

      for (const rule of rules) {
        rule($);
      }

      // Chapter pages are XHTML, so void elements must be self-closed
      return $.xml().trim();
    },
  };
}
