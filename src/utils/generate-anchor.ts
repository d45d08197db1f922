/**
 * GitHub-style anchor for a heading
 * Unicode letters and digits survive; other punctuation is dropped.
 *
 * @example
 * generateAnchor("How We Hire (2024)") // "how-we-hire-2024"
 * generateAnchor("Q&A / FAQ") // "qa-faq"
 * generateAnchor("Café culture") // "café-culture"
 */
export function generateAnchor(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
}
