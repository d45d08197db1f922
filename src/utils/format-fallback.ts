import type { MarkdownConfig } from "../types";

export type TextStyle = "bold" | "italic" | "plain";

function wrap(text: string, marker: string): string {
  const inner = text.split(marker).join("");
  return `${marker}${inner}${marker}`;
}

/**
 * Format the label of a dropped link using the configured style
 * Markers already in the label are removed so the emphasis stays balanced.
 */
export function formatFallback(
  text: string,
  style: TextStyle,
  markdown: Pick<MarkdownConfig, "emphasis" | "strong">,
): string {
  switch (style) {
    case "bold":
      return wrap(text, markdown.strong);
    case "italic":
      return wrap(text, markdown.emphasis);
    case "plain":
      return text;
  }
}
