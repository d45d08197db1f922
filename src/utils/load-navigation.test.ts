import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { ZodError } from "zod";
import { loadNavigation } from "./load-navigation";

describe("loadNavigation", () => {
  let dir: string;
  let manifest: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "nav-"));
    manifest = path.join(dir, "handbook.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns no links when the manifest is missing", async () => {
    expect(await loadNavigation(manifest)).toEqual({ links: [], rejected: [] });
  });

  it("returns the links of the first group only", async () => {
    await writeFile(
      manifest,
      JSON.stringify([
        {
          name: "Handbook",
          links: [
            { to: "/handbook/company/story", name: "Story", icon: "book" },
            { to: "/handbook/company/values" },
          ],
        },
        { links: [{ to: "/handbook/other" }] },
      ]),
    );

    const { links, rejected } = await loadNavigation(manifest);
    expect(rejected).toEqual([]);
    expect(links.map((link) => [link.to, link.name])).toEqual([
      ["/handbook/company/story", "Story"],
      ["/handbook/company/values", undefined],
    ]);
  });

  it("returns no links when the first group has none", async () => {
    await writeFile(manifest, JSON.stringify([{ name: "Empty" }]));
    expect(await loadNavigation(manifest)).toEqual({ links: [], rejected: [] });
  });

  it("keeps valid links when others in the group are invalid", async () => {
    await writeFile(
      manifest,
      JSON.stringify([
        {
          links: [
            { to: "/handbook/a", name: "A" },
            { name: "Divider" },
            { to: "/handbook/b", name: null },
          ],
        },
      ]),
    );

    const { links, rejected } = await loadNavigation(manifest);
    expect(links).toEqual([
      { to: "/handbook/a", name: "A" },
      { to: "/handbook/b", name: null },
    ]);
    expect(rejected.map((entry) => entry.index)).toEqual([1]);
    expect(rejected[0]?.error).toBeInstanceOf(ZodError);
  });

  it("throws on an invalid structure", async () => {
    await writeFile(manifest, JSON.stringify([{ links: "nope" }]));
    await expect(loadNavigation(manifest)).rejects.toBeInstanceOf(ZodError);
  });

  it("throws on invalid JSON", async () => {
    await writeFile(manifest, "[{");
    await expect(loadNavigation(manifest)).rejects.toBeInstanceOf(SyntaxError);
  });
});
