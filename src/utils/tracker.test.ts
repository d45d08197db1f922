import { describe, it, expect } from "vitest";
import { z } from "zod";
import { Tracker } from "./tracker";

describe("Tracker", () => {
  it("counts files and parts", () => {
    const tracker = new Tracker();
    tracker.incrementTotal(3);
    tracker.incrementSuccessful();
    tracker.incrementSuccessful();
    tracker.incrementFailed();
    tracker.incrementDuplicates(2);
    tracker.setParts(4);

    expect(tracker.getStats()).toMatchObject({
      totalFiles: 3,
      successfulFiles: 2,
      failedFiles: 1,
      duplicateFiles: 2,
      parts: 4,
      skippedReferences: 0,
    });
  });

  it("records unresolved references", () => {
    const tracker = new Tracker();
    tracker.trackUnresolvedReference("/handbook/old-page", "Old Page");

    expect(tracker.getStats().skippedReferences).toBe(1);
    expect(tracker.getIssues("reference")).toEqual([
      { type: "reference", path: "/handbook/old-page", reason: "not-found", name: "Old Page" },
    ]);
  });

  it("classifies resource errors", () => {
    const tracker = new Tracker();
    const result = z.object({ links: z.array(z.string()) }).safeParse({ links: 1 });
    if (result.success) throw new Error("expected a validation failure");

    tracker.trackError("nav.json", result.error, "resource");
    tracker.trackError("config.json", new SyntaxError("Unexpected end of JSON input"), "resource");

    expect(tracker.getIssues("resource").map((issue) => issue.reason)).toEqual([
      "schema-validation",
      "invalid-json",
    ]);
  });

  it("classifies file errors by context", () => {
    const tracker = new Tracker();
    const missing = Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });

    tracker.trackError("a.md", missing, "file", "render");
    tracker.trackError("b.md", new Error("bad markdown"), "file", "render");

    expect(tracker.getIssues("file")).toEqual([
      { type: "file", path: "a.md", reason: "read-error", details: "ENOENT: no such file" },
      { type: "file", path: "b.md", reason: "render-error", details: "bad markdown" },
    ]);
  });
});
