import { describe, it, expect, vi } from "vitest";
import { defaultRevision, parseGitLog, readRevision, type GitRunner } from "./read-revision";

const LOG = "abc1234def5678\nabc1234\n2024-03-05T14:03:00+01:00\nFix typo in hiring guide\n";

describe("parseGitLog", () => {
  it("reads the four log lines", () => {
    expect(parseGitLog(LOG, "https://example.com/org/handbook/")).toEqual({
      hash: "abc1234def5678",
      short: "abc1234",
      date: "2024-03-05T14:03:00+01:00",
      dateHuman: "05 March 2024 at 13:03 UTC",
      message: "Fix typo in hiring guide",
      url: "https://example.com/org/handbook/commit/abc1234def5678",
    });
  });

  it("leaves the url empty without a repository url", () => {
    expect(parseGitLog(LOG, null)?.url).toBe("");
  });

  it("returns null for short output", () => {
    expect(parseGitLog("abc\ndef\n", null)).toBeNull();
  });
});

describe("readRevision", () => {
  it("runs git log in the repository with the timeout", async () => {
    const run = vi.fn<GitRunner>().mockResolvedValue(LOG);

    const revision = await readRevision(
      "/repo",
      { timeout: 5000, repositoryUrl: null },
      run,
    );

    expect(revision.short).toBe("abc1234");
    expect(run).toHaveBeenCalledWith(["log", "-1", "--format=%H%n%h%n%aI%n%s"], {
      cwd: "/repo",
      timeout: 5000,
    });
  });

  it("propagates git failures", async () => {
    const run = vi.fn<GitRunner>().mockRejectedValue(new Error("not a git repository"));

    await expect(
      readRevision("/repo", { timeout: 5000, repositoryUrl: null }, run),
    ).rejects.toThrow("not a git repository");
  });

  it("rejects unexpected output", async () => {
    const run = vi.fn<GitRunner>().mockResolvedValue("");

    await expect(
      readRevision("/repo", { timeout: 5000, repositoryUrl: null }, run),
    ).rejects.toThrow(/Unexpected git log output/);
  });
});

describe("defaultRevision", () => {
  it("uses placeholders", () => {
    expect(defaultRevision()).toEqual({
      hash: "unknown",
      short: "unknown",
      date: "unknown",
      dateHuman: "unknown",
      message: "",
      url: "",
    });
  });
});
