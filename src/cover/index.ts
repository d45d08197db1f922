/**
 * Cover Renderer
 * Rasterizes the cover designs with sharp
 */

import sharp from "sharp";
import { generatedCoverSvg, overlaySvg, type CoverText } from "./design";
import type { CoverConfig, CoverImage } from "../types";

export { generatedCoverSvg, overlaySvg, type CoverText };

/**
 * Draw a cover from scratch as a JPEG
 */
export async function generateCover(
  config: CoverConfig,
  text: CoverText,
): Promise<CoverImage> {
  const svg = generatedCoverSvg(config, text);
  const data = await sharp(Buffer.from(svg))
    .resize(config.width, config.height, { fit: "fill" })
    .flatten({ background: config.background })
    .jpeg({ quality: config.quality })
    .toBuffer();

  return {
    data,
    mediaType: "image/jpeg",
    fileName: "cover.jpg",
    source: "generated",
  };
}

/**
 * Write the title lines and edition label over a supplied image as a PNG
 */
export async function overlayCoverText(
  imagePath: string,
  config: CoverConfig,
  editionLabel: string,
): Promise<CoverImage> {
  const image = sharp(imagePath);
  const { width, height } = await image.metadata();
  if (!width || !height) {
    throw new Error(`Cannot read the dimensions of ${imagePath}`);
  }

  const layer = Buffer.from(overlaySvg(config, editionLabel, width, height));
  const data = await image
    .composite([{ input: layer, top: 0, left: 0 }])
    .png()
    .toBuffer();

  return {
    data,
    mediaType: "image/png",
    fileName: "cover.png",
    source: "custom",
  };
}
