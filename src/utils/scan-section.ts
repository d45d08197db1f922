/**
 * Section Scanner
 * Lists the markdown files of one fallback section directory
 */

import glob from "fast-glob";
import { readFile } from "fs/promises";
import path from "path";
import { canonicalPath } from "./canonical-path";
import { filenameToTitle } from "./filename-to-title";
import { frontmatterTitle, parseFrontmatter } from "./parse-frontmatter";
import { isDirectory } from "./file-exists";
import type { ResolvedFile } from "../types";

export interface ScanOptions {
  extensions: string[];
  snippetDirectory: string;
}

/**
 * Title derived from a file's name; index files take their directory's name
 */
export function titleFromPath(filePath: string): string {
  const stem = path.parse(filePath).name;
  if (stem === "index") {
    return filenameToTitle(path.basename(path.dirname(filePath)));
  }
  return filenameToTitle(stem);
}

async function readTitle(filePath: string): Promise<string | null> {
  try {
    const { data } = parseFrontmatter(await readFile(filePath, "utf-8"));
    return frontmatterTitle(data);
  } catch {
    // Unreadable files are reported when the chapter is assembled
    return null;
  }
}

/**
 * Build a ResolvedFile for a path, reading its frontmatter title
 */
export async function describeFile(
  contentRoot: string,
  filePath: string,
): Promise<ResolvedFile> {
  return {
    path: filePath,
    identity: await canonicalPath(filePath),
    relativePath: path.relative(contentRoot, filePath),
    title: (await readTitle(filePath)) ?? titleFromPath(filePath),
  };
}

/**
 * Scan a section directory recursively
 *
 * Files under a snippet directory are skipped. Both extensions are sorted
 * together by full path, so repeated scans of the same tree give the same list.
 * A missing directory yields an empty list.
 */
export async function scanSection(
  contentRoot: string,
  directory: string,
  options: ScanOptions,
): Promise<ResolvedFile[]> {
  const base = path.join(contentRoot, directory);
  if (!(await isDirectory(base))) {
    return [];
  }

  const pattern =
    options.extensions.length === 1
      ? `**/*.${options.extensions[0]}`
      : `**/*.{${options.extensions.join(",")}}`;

  const paths = await glob(pattern, {
    cwd: base,
    absolute: true,
    onlyFiles: true,
    ignore: [`**/${options.snippetDirectory}/**`],
  });

  const sorted = paths
    .map((p) => path.normalize(p))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  const files: ResolvedFile[] = [];
  for (const filePath of sorted) {
    files.push(await describeFile(contentRoot, filePath));
  }
  return files;
}
