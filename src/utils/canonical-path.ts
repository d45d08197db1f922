import { realpath } from "fs/promises";
import path from "path";

/**
 * Canonical form of a path, used as a file identity
 * Symlinks are followed; a path that cannot be resolved keeps its absolute form.
 */
export async function canonicalPath(filePath: string): Promise<string> {
  try {
    return await realpath(filePath);
  } catch {
    return path.resolve(filePath);
  }
}
