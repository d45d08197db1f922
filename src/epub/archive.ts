/**
 * EPUB Archive
 * Zips packaged files in memory with adm-zip
 */

import AdmZip from "adm-zip";
import type { EpubFile } from "./package";

// Zip compression method for stored (uncompressed) entries
const STORED = 0;

/**
 * Build the archive in insertion order
 * The mimetype entry is stored uncompressed so readers can sniff it.
 */
export function createArchive(files: EpubFile[]): Buffer {
  const zip = new AdmZip(undefined, { noSort: true });

  for (const file of files) {
    const data = typeof file.data === "string" ? Buffer.from(file.data, "utf-8") : file.data;
    zip.addFile(file.name, data);

    if (file.name === "mimetype") {
      const entry = zip.getEntry(file.name);
      if (entry) entry.header.method = STORED;
    }
  }

  return zip.toBuffer();
}
