/**
 * Render Rule: Remove Unsupported Elements
 *
 * Raw HTML embedded in handbook pages can carry scripts, players and forms
 * that e-readers cannot run, plus images that point at site-relative paths
 * which are not packaged into the book.
 */

import type { CheerioAPI } from "cheerio";
import type { MarkdownConfig } from "../../types";

export function removeUnsupported(config: MarkdownConfig) {
  return ($: CheerioAPI): void => {
    for (const selector of config.removeSelectors) {
      $(selector).remove();
    }
  };
}
