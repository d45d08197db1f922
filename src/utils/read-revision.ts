/**
 * Revision Reader
 * Reads the latest commit of the handbook source repository
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { formatCommitDate } from "./format-date";
import type { RevisionInfo } from "../types";

const execFileAsync = promisify(execFile);

const LOG_FORMAT = "--format=%H%n%h%n%aI%n%s";

export type GitRunner = (
  args: string[],
  options: { cwd: string; timeout: number },
) => Promise<string>;

export interface RevisionOptions {
  timeout: number;
  repositoryUrl: string | null;
}

export const runGit: GitRunner = async (args, { cwd, timeout }) => {
  const { stdout } = await execFileAsync("git", args, {
    cwd,
    timeout,
    encoding: "utf8",
  });
  return stdout;
};

/**
 * Placeholder revision used when git metadata is unavailable
 */
export function defaultRevision(): RevisionInfo {
  return {
    hash: "unknown",
    short: "unknown",
    date: "unknown",
    dateHuman: "unknown",
    message: "",
    url: "",
  };
}

/**
 * Parse `git log -1` output in LOG_FORMAT
 * Returns null when fewer than four lines are present.
 */
export function parseGitLog(
  stdout: string,
  repositoryUrl: string | null,
): RevisionInfo | null {
  const lines = stdout.trim().split("\n");
  if (lines.length < 4) {
    return null;
  }

  const [hash, short, date, message] = lines;
  const base = repositoryUrl?.replace(/\/+$/, "");

  return {
    hash,
    short,
    date,
    dateHuman: formatCommitDate(date),
    message,
    url: base ? `${base}/commit/${hash}` : "",
  };
}

/**
 * Read revision info for a repository
 * Throws if git fails, times out or prints something unexpected.
 */
export async function readRevision(
  repoPath: string,
  options: RevisionOptions,
  run: GitRunner = runGit,
): Promise<RevisionInfo> {
  const stdout = await run(["log", "-1", LOG_FORMAT], {
    cwd: repoPath,
    timeout: options.timeout,
  });

  const revision = parseGitLog(stdout, options.repositoryUrl);
  if (!revision) {
    throw new Error(`Unexpected git log output: ${JSON.stringify(stdout)}`);
  }
  return revision;
}
