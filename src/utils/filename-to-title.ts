/**
 * Convert a filename to a readable title
 * Splits by hyphens/underscores and capitalizes each word
 *
 * @example
 * filenameToTitle("team-structure") // "Team Structure"
 * filenameToTitle("how_we_HIRE") // "How We Hire"
 */
export function filenameToTitle(filename: string): string {
  return filename
    .split(/[-_]/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}
