import type { EditionInfo } from "../types";

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Format an ISO timestamp in UTC for the credits page
 * Unparseable input is returned unchanged.
 *
 * @example
 * formatCommitDate("2024-03-05T14:03:00+01:00") // "05 March 2024 at 13:03 UTC"
 */
export function formatCommitDate(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }

  return `${pad(date.getUTCDate())} ${MONTHS[date.getUTCMonth()]} ${date.getUTCFullYear()} at ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`;
}

/**
 * Edition labels derived from the build time (UTC)
 */
export function editionFor(now: Date): EditionInfo {
  const buildMonth = `${MONTHS[now.getUTCMonth()]} ${now.getUTCFullYear()}`;

  return {
    buildDate: now.toISOString().slice(0, 10),
    buildMonth,
    label: `${buildMonth} Edition`,
    modified: now.toISOString().replace(/\.\d{3}Z$/, "Z"),
  };
}
