/**
 * Consolidated type definitions and Zod schemas
 */

import { z } from "zod";
import { Tracker } from "./utils/tracker";
import { Logger } from "./utils/logger";
import type { GitRunner } from "./utils/read-revision";

// Re-export classes
export { Tracker, Logger };

// ============================================================================
// Configuration Types & Schemas
// ============================================================================

export const ContentConfigSchema = z.object({
  root: z.string(),
  prefix: z.string(),
  extensions: z.array(z.string()).min(1),
  snippetDirectory: z.string(),
});

export const NavigationConfigSchema = z.object({
  manifest: z.string(),
  // Section directory already covered by the manifest (skipped when scanning)
  sourceSection: z.string().nullable(),
});

export const SectionDefinitionSchema = z.object({
  directory: z.string(),
  title: z.string(),
});

export const BookConfigSchema = z.object({
  title: z.string(),
  subtitle: z.string(),
  description: z.string(),
  author: z.string(),
  language: z.string(),
  publisher: z.string().nullable(),
  identifierPrefix: z.string(),
  repositoryUrl: z.string().nullable(),
  liveUrl: z.string().nullable(),
  license: z.string().nullable(),
  credits: z.array(z.string()),
});

export const MarkdownConfigSchema = z.object({
  gfm: z.boolean(),
  breaks: z.boolean(),
  emphasis: z.enum(["_", "*"]),
  strong: z.enum(["__", "**"]),
  removeSelectors: z.array(z.string()),
});

export const LinksConfigSchema = z.object({
  // How `[text](/handbook/...)` cross-references are rewritten
  handbookStyle: z.enum(["bold", "italic", "plain"]),
  // How every other internal link is rewritten
  internalStyle: z.enum(["bold", "italic", "plain"]),
});

// Secondary colours of the generated design
export const CoverPaletteSchema = z.object({
  title: z.string(),
  subtitle: z.string(),
  tagline: z.string(),
  footer: z.string(),
  grid: z.string(),
  spineMiddle: z.string(), // Spines between the accented centre and the edges
  spineOuter: z.string(),
  body: z.string(),
  bodyOutline: z.string(),
  eye: z.string(),
  pupil: z.string(),
  mark: z.string(),
});

export const CoverConfigSchema = z.object({
  image: z.string().nullable(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  quality: z.number().int().min(1).max(100),
  titleLines: z.array(z.string()).min(1),
  subtitle: z.string(),
  taglines: z.array(z.string()),
  fontFamily: z.string(),
  background: z.string(),
  accent: z.string(),
  palette: CoverPaletteSchema,
});

export const TemplatesConfigSchema = z.object({
  directory: z.string().nullable(),
  stylesheet: z.string().nullable(),
});

export const GitConfigSchema = z.object({
  timeout: z.number().int().positive(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const BuildConfigSchema = z.object({
  repoPath: z.string(),
  output: z.string(),
  content: ContentConfigSchema,
  navigation: NavigationConfigSchema,
  sections: z.array(SectionDefinitionSchema),
  book: BookConfigSchema,
  markdown: MarkdownConfigSchema,
  links: LinksConfigSchema,
  cover: CoverConfigSchema,
  templates: TemplatesConfigSchema,
  git: GitConfigSchema,
  logging: LoggingConfigSchema,
});

export const PartialBuildConfigSchema = BuildConfigSchema.partial().extend({
  content: ContentConfigSchema.partial().optional(),
  navigation: NavigationConfigSchema.partial().optional(),
  book: BookConfigSchema.partial().optional(),
  markdown: MarkdownConfigSchema.partial().optional(),
  links: LinksConfigSchema.partial().optional(),
  cover: CoverConfigSchema.partial()
    .extend({ palette: CoverPaletteSchema.partial().optional() })
    .optional(),
  templates: TemplatesConfigSchema.partial().optional(),
  git: GitConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type ContentConfig = z.infer<typeof ContentConfigSchema>;
export type NavigationConfig = z.infer<typeof NavigationConfigSchema>;
export type SectionDefinition = z.infer<typeof SectionDefinitionSchema>;
export type BookConfig = z.infer<typeof BookConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type LinksConfig = z.infer<typeof LinksConfigSchema>;
export type CoverConfig = z.infer<typeof CoverConfigSchema>;
export type CoverPalette = z.infer<typeof CoverPaletteSchema>;
export type TemplatesConfig = z.infer<typeof TemplatesConfigSchema>;
export type GitConfig = z.infer<typeof GitConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type PartialBuildConfig = z.infer<typeof PartialBuildConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}

// ============================================================================
// Navigation Manifest
// ============================================================================

export const ContentReferenceSchema = z.looseObject({
  to: z.string(),
  name: z.string().nullish(),
});

// Links are validated one by one, so a single odd entry never drops the group
export const NavigationGroupSchema = z.looseObject({
  links: z.array(z.unknown()).optional(),
});

export const NavigationManifestSchema = z.array(NavigationGroupSchema);

export type ContentReference = z.infer<typeof ContentReferenceSchema>;

// ============================================================================
// Document Types
// ============================================================================

export type FrontmatterRecord = Record<string, unknown>;

export type FrontmatterResult =
  | { kind: "absent" }
  | { kind: "malformed"; reason: string }
  | { kind: "parsed"; data: FrontmatterRecord };

export interface ParsedDocument {
  frontmatter: FrontmatterResult;
  data: FrontmatterRecord; // Empty unless frontmatter parsed
  body: string;
}

export interface ResolvedFile {
  path: string; // Absolute path as found on disk
  identity: string; // Canonical path, used as the deduplication key
  relativePath: string; // Relative to the content root
  title: string; // Frontmatter title or filename-derived title
}

export interface Chapter {
  id: string; // e.g. "ch_03", "s2_01"
  title: string;
  fileName: string; // e.g. "ch_03.xhtml"
  body: string; // XHTML fragment, starts with the <h1> title
  sourcePath: string;
}

export interface Section {
  directory: string;
  title: string;
  part: number;
  chapters: Chapter[];
}

export interface PlannedChapter {
  id: string;
  file: ResolvedFile;
  fallbackTitle: string;
}

export interface PlannedSection {
  definition: SectionDefinition;
  files: ResolvedFile[];
}

// ============================================================================
// Build Artifacts
// ============================================================================

export interface RevisionInfo {
  hash: string;
  short: string;
  date: string;
  dateHuman: string;
  message: string;
  url: string;
}

export interface EditionInfo {
  buildDate: string; // "2026-10-19"
  buildMonth: string; // "October 2026"
  label: string; // "October 2026 Edition"
  modified: string; // "2026-10-19T08:30:00Z"
}

export interface CoverImage {
  data: Buffer;
  mediaType: "image/png" | "image/jpeg";
  fileName: string;
  source: "custom" | "generated";
}

export interface BuildResult {
  outputPath: string;
  size: number;
  identifier: string;
  chapters: number;
  parts: number;
}

// ============================================================================
// Context Types
// ============================================================================

export interface BuildContext {
  config: BuildConfig;
  tracker: Tracker;
  logger: Logger;
  sections: SectionDefinition[]; // Priority order, injected
  now: Date;
  git: GitRunner;
  verbose: boolean;

  // Filled by the pipeline modules, in order
  contentRoot?: string;
  revision?: RevisionInfo;
  edition?: EditionInfo;
  references?: ContentReference[];
  manifestChapters?: PlannedChapter[];
  included?: Set<string>;
  plannedSections?: PlannedSection[];
  partOne?: Chapter[];
  parts?: Section[];
  cover?: CoverImage;
  result?: BuildResult;
}

// ============================================================================
// Tracker Types
// ============================================================================

export type FileIssueReason =
  | "read-error"
  | "render-error"
  | "malformed-frontmatter";
export type ReferenceIssueReason = "not-found";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";
export type FallbackIssueReason =
  | "revision-unavailable"
  | "cover-missing"
  | "cover-failed";

export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ReferenceIssue {
  type: "reference";
  path: string;
  reason: ReferenceIssueReason;
  name?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export interface FallbackIssue {
  type: "fallback";
  path: string;
  reason: FallbackIssueReason;
  details?: string;
}

export type Issue = FileIssue | ReferenceIssue | ResourceIssue | FallbackIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;
  skippedReferences: number;
  duplicateFiles: number;
  parts: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Template Context Types
// ============================================================================

/**
 * Context passed to the page shell template
 * Every XHTML document in the book is wrapped by it
 */
export interface PageTemplateContext {
  title: string;
  language: string;
  stylesheet: string; // Relative href of the stylesheet
  body: string; // XHTML fragment
}

/**
 * Context passed to credits.xhtml.hbs and colophon.xhtml.hbs
 */
export interface EditionTemplateContext {
  book: BookConfig;
  edition: EditionInfo;
  revision: RevisionInfo;
}

/**
 * Context passed to part.xhtml.hbs
 */
export interface PartTemplateContext {
  number: string; // Roman numeral
  title: string;
}

export interface TocEntry {
  title: string;
  href: string;
  order: number; // NCX play order, starting at 1
  children: TocEntry[];
}

export interface ManifestItem {
  id: string;
  href: string;
  mediaType: string;
  properties?: string;
}

/**
 * Context passed to the package document (content.opf) template
 */
export interface PackageTemplateContext {
  identifier: string;
  title: string;
  language: string;
  author: string;
  description: string;
  date: string;
  publisher: string | null;
  modified: string;
  items: ManifestItem[];
  spine: string[]; // Manifest item ids
  guide: { title: string; href: string };
}

/**
 * Context passed to the navigation document and NCX templates
 */
export interface NavigationTemplateContext {
  identifier: string;
  title: string;
  language: string;
  entries: TocEntry[];
}
