import { readFile } from "fs/promises";
import type { ZodError } from "zod";
import { fileExists } from "./file-exists";
import {
  ContentReferenceSchema,
  NavigationManifestSchema,
  type ContentReference,
} from "../types";

export interface RejectedLink {
  index: number; // Position in the group's links
  error: ZodError;
}

export interface NavigationLinks {
  links: ContentReference[];
  rejected: RejectedLink[];
}

/**
 * Load the ordered chapter references from the navigation manifest
 *
 * Only the first top-level group's links are used. Each link is validated on
 * its own: invalid ones are returned as rejected and the rest are kept.
 * A missing manifest yields no links; an unreadable file, invalid JSON or a
 * manifest that is not a list of groups throws.
 */
export async function loadNavigation(manifestPath: string): Promise<NavigationLinks> {
  if (!(await fileExists(manifestPath))) {
    return { links: [], rejected: [] };
  }

  const content = await readFile(manifestPath, "utf-8");
  const manifest = NavigationManifestSchema.parse(JSON.parse(content));

  const links: ContentReference[] = [];
  const rejected: RejectedLink[] = [];

  for (const [index, entry] of (manifest[0]?.links ?? []).entries()) {
    const result = ContentReferenceSchema.safeParse(entry);
    if (result.success) {
      links.push(result.data);
    } else {
      rejected.push({ index, error: result.error });
    }
  }

  return { links, rejected };
}
