import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { referenceToSlug, resolveReference } from "./resolve-reference";

const options = { prefix: "/handbook/", extensions: ["md", "mdx"] };

async function touch(filePath: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, "# Page\n");
}

describe("referenceToSlug", () => {
  it("strips the prefix and surrounding slashes", () => {
    expect(referenceToSlug("/handbook/company/story/", "/handbook/")).toBe("company/story");
  });

  it("drops fragments and queries", () => {
    expect(referenceToSlug("/handbook/values#why", "/handbook/")).toBe("values");
    expect(referenceToSlug("/handbook/values?tab=2", "/handbook/")).toBe("values");
  });

  it("maps the bare prefix to the root", () => {
    expect(referenceToSlug("/handbook", "/handbook/")).toBe("");
  });

  it("returns null outside the prefix", () => {
    expect(referenceToSlug("/blog/post", "/handbook/")).toBeNull();
  });
});

describe("resolveReference", () => {
  let workspace: string;
  let root: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), "resolve-"));
    root = path.join(workspace, "handbook");
    await touch(path.join(root, "company", "story.md"));
    await touch(path.join(root, "company", "values.mdx"));
    await touch(path.join(root, "both.md"));
    await touch(path.join(root, "both.mdx"));
    await touch(path.join(root, "people", "index.mdx"));
    await touch(path.join(root, "team.md"));
    await touch(path.join(root, "team", "index.md"));
    await touch(path.join(workspace, "secret.md"));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it("finds a markdown file", async () => {
    expect(await resolveReference(root, "/handbook/company/story", options)).toBe(
      path.join(root, "company", "story.md"),
    );
  });

  it("finds an MDX file", async () => {
    expect(await resolveReference(root, "/handbook/company/values", options)).toBe(
      path.join(root, "company", "values.mdx"),
    );
  });

  it("prefers .md over .mdx", async () => {
    expect(await resolveReference(root, "/handbook/both", options)).toBe(
      path.join(root, "both.md"),
    );
  });

  it("falls back to a directory index", async () => {
    expect(await resolveReference(root, "/handbook/people/", options)).toBe(
      path.join(root, "people", "index.mdx"),
    );
  });

  it("prefers a direct file over a directory index", async () => {
    expect(await resolveReference(root, "/handbook/team", options)).toBe(
      path.join(root, "team.md"),
    );
  });

  it("returns null for a removed page", async () => {
    expect(await resolveReference(root, "/handbook/old-page", options)).toBeNull();
  });

  it("returns null for a directory without an index", async () => {
    expect(await resolveReference(root, "/handbook/company", options)).toBeNull();
  });

  it("never leaves the content root", async () => {
    expect(await resolveReference(root, "/handbook/../secret", options)).toBeNull();
  });
});
