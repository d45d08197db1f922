import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("lists the sections in priority order", async () => {
    const config = await loadDefaultConfig();
    expect(config.sections.map((section) => section.directory)).toEqual([
      "company",
      "people",
      "engineering",
      "product",
      "content",
      "marketing",
      "growth",
      "support",
      "cs-and-onboarding",
      "brand",
      "community",
      "getting-started",
      "exec",
      "onboarding",
      "docs-and-wizard",
    ]);
  });
});

describe("mergeConfig", () => {
  it("merges groups key by key", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, { book: { title: "Field Guide" } });

    expect(merged.book.title).toBe("Field Guide");
    expect(merged.book.author).toBe(base.book.author);
    expect(merged.content).toEqual(base.content);
  });

  it("merges cover palette colours one by one", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, { cover: { palette: { body: "#445566" } } });

    expect(merged.cover.palette.body).toBe("#445566");
    expect(merged.cover.palette.spineOuter).toBe("#8B6914");
    expect(merged.cover.accent).toBe(base.cover.accent);
  });

  it("replaces the section list", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, {
      sections: [{ directory: "people", title: "People" }],
    });

    expect(merged.sections).toEqual([{ directory: "people", title: "People" }]);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file", async () => {
    const custom = path.join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ output: "guide.epub", cover: { quality: 70 } }));

    const { config, errors } = await loadConfig(custom);

    expect(config.output).toBe("guide.epub");
    expect(config.cover.quality).toBe(70);
    expect(config.cover.width).toBe(1600);
    expect(errors.find((error) => error.path === custom)).toBeUndefined();
  });

  it("reports and skips an invalid custom config", async () => {
    const custom = path.join(dir, "invalid.json");
    await writeFile(custom, JSON.stringify({ cover: { width: -5 } }));

    const { config, errors } = await loadConfig(custom);

    expect(config.cover.width).toBe(1600);
    expect(errors.map((error) => error.path)).toContain(custom);
  });
});
