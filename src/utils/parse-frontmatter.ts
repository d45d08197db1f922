import { parse } from "yaml";
import type { FrontmatterRecord, ParsedDocument } from "../types";

const DELIMITER = "---";

function isRecord(value: unknown): value is FrontmatterRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split a document into its YAML frontmatter and body
 *
 * Only a document that starts with `---` carries frontmatter. The block ends
 * at the next `---`, wherever it occurs. Repeated keys keep their last value.
 * Anything that cannot be read as a mapping leaves the whole input as body
 * with an empty record.
 *
 * @example
 * parseFrontmatter("---\ntitle: Hi\n---\nBody").data // { title: "Hi" }
 * parseFrontmatter("No metadata").body // "No metadata"
 */
export function parseFrontmatter(content: string): ParsedDocument {
  if (!content.startsWith(DELIMITER)) {
    return { frontmatter: { kind: "absent" }, data: {}, body: content };
  }

  const end = content.indexOf(DELIMITER, DELIMITER.length);
  if (end === -1) {
    return {
      frontmatter: { kind: "malformed", reason: "unterminated frontmatter block" },
      data: {},
      body: content,
    };
  }

  const block = content.slice(DELIMITER.length, end);
  const body = content.slice(end + DELIMITER.length);

  let parsed: unknown;
  try {
    parsed = parse(block, { uniqueKeys: false });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { frontmatter: { kind: "malformed", reason }, data: {}, body: content };
  }

  if (parsed === null || parsed === undefined) {
    return { frontmatter: { kind: "parsed", data: {} }, data: {}, body };
  }

  if (!isRecord(parsed)) {
    return {
      frontmatter: { kind: "malformed", reason: "frontmatter is not a mapping" },
      data: {},
      body: content,
    };
  }

  return { frontmatter: { kind: "parsed", data: parsed }, data: parsed, body };
}

/**
 * Read the title field of a frontmatter record, if it holds usable text
 */
export function frontmatterTitle(data: FrontmatterRecord): string | null {
  const title = data.title;
  if (typeof title === "string" && title.trim()) {
    return title.trim();
  }
  if (typeof title === "number") {
    return String(title);
  }
  return null;
}
