/**
 * Markup Sanitizer
 * Strips MDX syntax that has no equivalent in the e-book before rendering
 */

import { formatFallback, type TextStyle } from "./format-fallback";
import type { MarkdownConfig } from "../types";

export interface SanitizeOptions {
  prefix: string; // Cross-reference prefix, e.g. "/handbook/"
  handbookStyle: TextStyle;
  internalStyle: TextStyle;
  markdown: Pick<MarkdownConfig, "emphasis" | "strong">;
}

const MODULE_STATEMENT = /^(?:import|export)[ \t]+.*$/gm;
const SELF_CLOSING_COMPONENT = /<[A-Z][\w.]*(?:\s[^>]*)?\/>/g;
const PAIRED_COMPONENT = /<([A-Z][\w.]*)(?:\s[^>]*)?>([\s\S]*?)<\/\1\s*>/g;
const STRAY_COMPONENT_TAG = /<\/?[A-Z][\w.]*(?:\s[^>]*)?>/g;
// Links to "//host/..." are protocol-relative, not internal
const INTERNAL_LINK = /!?\[([^\]]*)\]\(\/(?!\/)[^)]*\)/g;
const EXCESS_BLANK_LINES = /\n{4,}/g;

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Unwrap paired component tags until none are left
 * Each pass removes the outermost match it finds, so nested components of
 * different names (and repeated names) unwrap over several passes.
 */
function unwrapComponents(content: string): string {
  let previous: string;
  let current = content;
  do {
    previous = current;
    current = previous.replace(PAIRED_COMPONENT, "$2");
  } while (current !== previous);
  return current;
}

export function sanitizeMarkup(content: string, options: SanitizeOptions): string {
  const { prefix, handbookStyle, internalStyle, markdown } = options;
  const crossReference = new RegExp(
    `!?\\[([^\\]]*)\\]\\(${escapeRegex(prefix)}[^)]*\\)`,
    "g",
  );

  let result = content.replace(/\r\n?/g, "\n").replace(MODULE_STATEMENT, "");
  result = result.replace(SELF_CLOSING_COMPONENT, "");
  result = unwrapComponents(result);
  result = result.replace(STRAY_COMPONENT_TAG, "");

  result = result.replace(crossReference, (_match, text: string) =>
    text ? formatFallback(text, handbookStyle, markdown) : "",
  );
  result = result.replace(INTERNAL_LINK, (_match, text: string) =>
    text ? formatFallback(text, internalStyle, markdown) : "",
  );

  return result.replace(EXCESS_BLANK_LINES, "\n\n\n");
}
