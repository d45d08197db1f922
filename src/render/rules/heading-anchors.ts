/**
 * Render Rule: Heading Anchors
 *
 * Gives every heading without an id a GitHub-style anchor so readers can
 * link into a chapter. Duplicates get a numeric suffix, and anchors that do
 * not start with a letter are prefixed to stay valid XML names.
 */

import type { CheerioAPI } from "cheerio";
import { generateAnchor } from "../../utils/generate-anchor";

function toXmlName(anchor: string): string {
  if (!anchor) return "section";
  return /^\p{L}/u.test(anchor) ? anchor : `h-${anchor}`;
}

export function headingAnchors() {
  return ($: CheerioAPI): void => {
    const counts = new Map<string, number>();

    $("[id]").each((_index, element) => {
      const id = $(element).attr("id");
      if (id) counts.set(id, 1);
    });

    $("h1, h2, h3, h4, h5, h6").each((_index, element) => {
      const $heading = $(element);
      if ($heading.attr("id")) return;

      const base = toXmlName(generateAnchor($heading.text().trim()));
      const count = counts.get(base) ?? 0;
      const anchor = count === 0 ? base : `${base}_${count}`;
      counts.set(base, count + 1);

      $heading.attr("id", anchor);
    });
  };
}
