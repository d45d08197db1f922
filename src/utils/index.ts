/**
 * Utility exports
 */

// Anchor utilities
export { generateAnchor } from "./generate-anchor";

// Document utilities
export { parseFrontmatter, frontmatterTitle } from "./parse-frontmatter";
export { sanitizeMarkup } from "./sanitize-markup";
export type { SanitizeOptions } from "./sanitize-markup";
export { formatFallback } from "./format-fallback";
export type { TextStyle } from "./format-fallback";
export { assembleChapter } from "./assemble-chapter";
export type { ChapterSource, AssembledChapter } from "./assemble-chapter";
export { escapeXml } from "./escape-xml";

// Path/filename utilities
export { filenameToTitle } from "./filename-to-title";
export { canonicalPath } from "./canonical-path";
export {
  referenceToSlug,
  candidatePaths,
  resolveReference,
} from "./resolve-reference";
export type { ResolveOptions } from "./resolve-reference";

// Filesystem utilities
export { fileExists, isFile, isDirectory } from "./file-exists";
export { loadNavigation } from "./load-navigation";
export type { NavigationLinks, RejectedLink } from "./load-navigation";
export { scanSection, describeFile, titleFromPath } from "./scan-section";
export type { ScanOptions } from "./scan-section";

// Revision utilities
export {
  readRevision,
  parseGitLog,
  defaultRevision,
  runGit,
} from "./read-revision";
export type { GitRunner, RevisionOptions } from "./read-revision";
export { formatCommitDate, editionFor } from "./format-date";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Classes
export { Tracker } from "./tracker";
export { Logger } from "./logger";
export type { LogSink } from "./logger";
