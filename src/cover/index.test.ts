import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import sharp from "sharp";
import { generateCover, generatedCoverSvg, overlayCoverText, overlaySvg } from "./index";
import type { CoverConfig } from "../types";

const config: CoverConfig = {
  image: null,
  width: 1600,
  height: 2400,
  quality: 90,
  titleLines: ["The R&D", "Handbook"],
  subtitle: "How we work",
  taglines: ["Strategy · Values"],
  fontFamily: "DejaVu Sans, sans-serif",
  background: "#151A26",
  accent: "#F7A501",
  palette: {
    title: "#FFFFFF",
    subtitle: "#9CA3AF",
    tagline: "#6B7280",
    footer: "#4B5563",
    grid: "#1A2030",
    spineMiddle: "#D48B01",
    spineOuter: "#8B6914",
    body: "#2A3040",
    bodyOutline: "#3A4050",
    eye: "#FFFFFF",
    pupil: "#151A26",
    mark: "#1A1A1A",
  },
};

describe("cover designs", () => {
  it("escapes text in the generated design", () => {
    const svg = generatedCoverSvg(config, { author: "Ops & People", buildMonth: "October 2026" });

    expect(svg).toContain(">The R&amp;D</text>");
    expect(svg).toContain(">Ops &amp; People</text>");
    expect(svg).toContain(">Auto-generated from source · October 2026</text>");
  });

  it("draws the motif and text in the configured palette", () => {
    const svg = generatedCoverSvg(
      { ...config, palette: { ...config.palette, spineOuter: "#112233", body: "#445566", footer: "#778899" } },
      { author: "Handbook Team", buildMonth: "October 2026" },
    );

    // Spine 0 sits at the far edge, spine 12 at the centre
    expect(svg).toContain('stroke="#112233" stroke-width="4"/>');
    expect(svg).toContain('stroke="#F7A501" stroke-width="6"/>');
    expect(svg).toContain('fill="#445566" stroke="#3A4050"');
    expect(svg).toContain('fill="#778899">Auto-generated from source · October 2026</text>');
  });

  it("scales overlay text to the image width", () => {
    const svg = overlaySvg(config, "October 2026 Edition", 1200, 1800);

    // Title at width / 12, label at width / 22, starting 4% down
    expect(svg).toContain('y="152" text-anchor="middle" font-family="DejaVu Sans, sans-serif" font-size="100" font-weight="bold" fill="#FFFFFF">The R&amp;D</text>');
    expect(svg).toContain('font-size="54" fill="#F7A501">October 2026 Edition</text>');
  });
});

describe("cover rendering", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "cover-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("generates a JPEG at the configured size", async () => {
    const cover = await generateCover(config, { author: "The Team", buildMonth: "October 2026" });
    const metadata = await sharp(cover.data).metadata();

    expect(cover.fileName).toBe("cover.jpg");
    expect(cover.mediaType).toBe("image/jpeg");
    expect(metadata.format).toBe("jpeg");
    expect(metadata.width).toBe(1600);
    expect(metadata.height).toBe(2400);
  });

  it("overlays text on a supplied image as PNG", async () => {
    const imagePath = path.join(dir, "art.png");
    await sharp({
      create: { width: 400, height: 600, channels: 3, background: "#203040" },
    })
      .png()
      .toFile(imagePath);

    const cover = await overlayCoverText(imagePath, config, "October 2026 Edition");
    const metadata = await sharp(cover.data).metadata();

    expect(cover.source).toBe("custom");
    expect(cover.fileName).toBe("cover.png");
    expect(metadata.format).toBe("png");
    expect(metadata.width).toBe(400);
    expect(metadata.height).toBe(600);
  });
});
