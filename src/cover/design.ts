/**
 * Cover Design
 * SVG documents rasterized by sharp for the book cover
 */

import { escapeXml } from "../utils/escape-xml";
import type { CoverConfig, CoverPalette } from "../types";

// Layout coordinates are on this canvas; the SVG scales to the configured size
const CANVAS_WIDTH = 1600;
const CANVAS_HEIGHT = 2400;

const SPINE_COUNT = 24;
const SPINE_RADIUS = 280;
const MOTIF_CENTER_Y = 580;

export interface CoverText {
  author: string;
  buildMonth: string; // "October 2026"
}

interface TextLine {
  text: string;
  top: number; // Top edge of the line box
  size: number;
  fill: string;
  bold?: boolean;
}

/**
 * Centered text; SVG positions by baseline, so shift down from the top edge
 */
function centeredText(line: TextLine, width: number, fontFamily: string): string {
  const baseline = Math.round(line.top + line.size * 0.8);
  const weight = line.bold ? ` font-weight="bold"` : "";
  return `<text x="${width / 2}" y="${baseline}" text-anchor="middle" font-family="${escapeXml(fontFamily)}" font-size="${line.size}"${weight} fill="${line.fill}">${escapeXml(line.text)}</text>`;
}

// Spines near the middle are brighter and thicker
function spineStyle(
  index: number,
  accent: string,
  palette: CoverPalette,
): { color: string; width: number } {
  const half = Math.floor(SPINE_COUNT / 2);
  const distance = Math.abs(index - half) / half;
  if (distance < 0.3) return { color: accent, width: 6 };
  if (distance < 0.6) return { color: palette.spineMiddle, width: 5 };
  return { color: palette.spineOuter, width: 4 };
}

/**
 * Radiating spines over a small body, drawn across the upper half circle
 */
function motif(accent: string, palette: CoverPalette): string {
  const cx = CANVAS_WIDTH / 2;
  const cy = MOTIF_CENTER_Y;
  const inner = SPINE_RADIUS * 0.45;
  const shapes: string[] = [];

  for (let i = 0; i < SPINE_COUNT; i++) {
    const angle = Math.PI + (Math.PI * i) / (SPINE_COUNT - 1);
    const length = SPINE_RADIUS + (i % 2 === 0 ? 40 : 0);
    const { color, width } = spineStyle(i, accent, palette);

    const x1 = (cx + inner * Math.cos(angle)).toFixed(1);
    const y1 = (cy + inner * Math.sin(angle)).toFixed(1);
    const x2 = (cx + length * Math.cos(angle)).toFixed(1);
    const y2 = (cy + length * Math.sin(angle)).toFixed(1);

    shapes.push(
      `<line x1="${x1}" y1="${y1}" x2="${x2}" y2="${y2}" stroke="${color}" stroke-width="${width}"/>`,
    );
  }

  shapes.push(
    `<ellipse cx="${cx}" cy="${cy + SPINE_RADIUS * 0.15}" rx="${SPINE_RADIUS * 0.5}" ry="${SPINE_RADIUS * 0.3}" fill="${palette.body}" stroke="${palette.bodyOutline}" stroke-width="2"/>`,
    `<circle cx="${cx - 22.5}" cy="${cy + 22.5}" r="12.5" fill="${palette.eye}"/>`,
    `<circle cx="${cx - 22.5}" cy="${cy + 22.5}" r="7.5" fill="${palette.pupil}"/>`,
    `<circle cx="${cx - 51}" cy="${cy + 29}" r="9" fill="${palette.mark}"/>`,
  );

  return shapes.join("\n  ");
}

/**
 * Full cover, drawn from scratch
 */
export function generatedCoverSvg(config: CoverConfig, text: CoverText): string {
  const W = CANVAS_WIDTH;
  const H = CANVAS_HEIGHT;
  const margin = 200;
  const font = config.fontFamily;
  const { palette } = config;

  const grid: string[] = [];
  for (let y = 0; y < H; y += 80) {
    grid.push(`<line x1="0" y1="${y}" x2="${W}" y2="${y}" stroke="${palette.grid}" stroke-width="1"/>`);
  }

  const lines: TextLine[] = [
    ...config.titleLines.map((line, i) => ({
      text: line,
      top: 940 + i * 160,
      size: 130,
      fill: palette.title,
      bold: true,
    })),
    { text: config.subtitle, top: 1310, size: 56, fill: palette.subtitle },
    ...config.taglines.map((line, i) => ({
      text: line,
      top: 1500 + i * 60,
      size: 36,
      fill: palette.tagline,
    })),
    { text: text.author, top: 1850, size: 48, fill: palette.title, bold: true },
    {
      text: `Auto-generated from source · ${text.buildMonth}`,
      top: 2280,
      size: 28,
      fill: palette.footer,
    },
  ];

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${config.width}" height="${config.height}" viewBox="0 0 ${W} ${H}" preserveAspectRatio="none">
  <rect x="0" y="0" width="${W}" height="${H}" fill="${config.background}"/>
  ${grid.join("\n  ")}
  ${motif(config.accent, palette)}
  <line x1="${margin}" y1="860" x2="${W - margin}" y2="860" stroke="${config.accent}" stroke-width="4"/>
  <line x1="${margin}" y1="1420" x2="${W - margin}" y2="1420" stroke="${config.accent}" stroke-width="4"/>
  ${lines.map((line) => centeredText(line, W, font)).join("\n  ")}
  <rect x="0" y="0" width="${W}" height="12" fill="${config.accent}"/>
  <rect x="0" y="${H - 12}" width="${W}" height="12" fill="${config.accent}"/>
</svg>
`;
}

/**
 * Transparent layer with the title and edition label for a supplied image
 */
export function overlaySvg(
  config: CoverConfig,
  editionLabel: string,
  width: number,
  height: number,
): string {
  const titleSize = Math.floor(width / 12);
  const labelSize = Math.floor(width / 22);
  const font = config.fontFamily;

  const lines: TextLine[] = [];
  let y = Math.floor(height * 0.04);
  for (const text of config.titleLines) {
    lines.push({ text, top: y, size: titleSize, fill: config.palette.title, bold: true });
    y += titleSize + Math.floor(height * 0.015);
  }
  y += Math.floor(height * 0.01);
  lines.push({ text: editionLabel, top: y, size: labelSize, fill: config.accent });

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">
  ${lines.map((line) => centeredText(line, width, font)).join("\n  ")}
</svg>
`;
}
