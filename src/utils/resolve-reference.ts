/**
 * Path Resolver
 * Maps a logical handbook reference to a file under the content root
 */

import path from "path";
import { isFile } from "./file-exists";

export interface ResolveOptions {
  prefix: string; // e.g. "/handbook/"
  extensions: string[]; // e.g. ["md", "mdx"], in preference order
}

/**
 * Extract the slug from a reference
 * Returns null when the reference lies outside the prefix
 *
 * @example
 * referenceToSlug("/handbook/company/story/", opts) // "company/story"
 * referenceToSlug("/handbook/values#why", opts) // "values"
 * referenceToSlug("/blog/post", opts) // null
 */
export function referenceToSlug(
  reference: string,
  prefix: string,
): string | null {
  const target = reference.split(/[?#]/)[0].trim();
  const bare = prefix.replace(/\/+$/, "");

  let slug: string;
  if (target.startsWith(prefix)) {
    slug = target.slice(prefix.length);
  } else if (target === bare) {
    slug = "";
  } else {
    return null;
  }

  return slug.replace(/^\/+|\/+$/g, "");
}

/**
 * Candidate files for a slug, in lookup order:
 * <slug>.md, <slug>.mdx, <slug>/index.md, <slug>/index.mdx
 */
export function candidatePaths(
  contentRoot: string,
  slug: string,
  extensions: string[],
): string[] {
  const direct = slug
    ? extensions.map((ext) => path.join(contentRoot, `${slug}.${ext}`))
    : [];
  const indexes = extensions.map((ext) =>
    path.join(contentRoot, slug, `index.${ext}`),
  );
  return [...direct, ...indexes];
}

/**
 * Resolve a reference to the first existing file
 * Returns null if none exists (the caller logs and skips)
 */
export async function resolveReference(
  contentRoot: string,
  reference: string,
  options: ResolveOptions,
): Promise<string | null> {
  const slug = referenceToSlug(reference, options.prefix);
  if (slug === null) return null;

  const root = path.resolve(contentRoot);
  const relative = path.relative(root, path.resolve(root, slug));
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    return null;
  }

  for (const candidate of candidatePaths(root, slug, options.extensions)) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }

  return null;
}
