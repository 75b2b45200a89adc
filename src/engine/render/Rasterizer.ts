/**
 * Glyph rasterization through sharp
 * Each outline is drawn as an SVG path the size of the canvas, and the
 * rendered alpha channel is read back as coverage. A pixel covered at least
 * one half adds 255 to the canvas, saturating; anything else adds nothing.
 */

import sharp from "sharp";
import type { GrayscaleImage, PathCommand } from "../../types/engine.types";

const COVERAGE_THRESHOLD = 128;

/**
 * Maps font units (y up) to canvas pixels (y down): x' = originX + x * scale, y' = originY - y * scale
 */
export interface OutlineTransform {
  scale: number;
  originX: number;
  originY: number;
}

export function createImage(width: number, height: number): GrayscaleImage {
  const w = Math.max(0, Math.floor(width));
  const h = Math.max(0, Math.floor(height));
  return { width: w, height: h, data: new Uint8Array(w * h) };
}

export function getPixel(image: GrayscaleImage, x: number, y: number): number {
  return image.data[y * image.width + x];
}

/**
 * SVG path data for an outline in canvas space
 */
export function outlineToSvgPath(commands: readonly PathCommand[], transform: OutlineTransform): string {
  const x = (value: number) => transform.originX + value * transform.scale;
  const y = (value: number) => transform.originY - value * transform.scale;

  return commands
    .map((command) => {
      switch (command.type) {
        case "moveTo":
          return `M${x(command.x)} ${y(command.y)}`;
        case "lineTo":
          return `L${x(command.x)} ${y(command.y)}`;
        case "quadTo":
          return `Q${x(command.cx)} ${y(command.cy)} ${x(command.x)} ${y(command.y)}`;
        case "cubicTo":
          return `C${x(command.c1x)} ${y(command.c1y)} ${x(command.c2x)} ${y(command.c2y)} ${x(command.x)} ${y(command.y)}`;
        case "close":
          return "Z";
      }
    })
    .join("");
}

function outlineSvg(width: number, height: number, path: string): Buffer {
  return Buffer.from(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">` +
      `<path d="${path}" fill="#ffffff" fill-rule="nonzero"/></svg>`
  );
}

/**
 * Rasterize one outline into `image`, clipped to its bounds
 */
export async function rasterizeOutline(
  image: GrayscaleImage,
  commands: readonly PathCommand[],
  transform: OutlineTransform
): Promise<void> {
  if (commands.length === 0 || image.width === 0 || image.height === 0) return;

  const { data, info } = await sharp(outlineSvg(image.width, image.height, outlineToSvgPath(commands, transform)))
    .ensureAlpha()
    .extractChannel(3)
    .raw()
    .toBuffer({ resolveWithObject: true });

  const width = Math.min(image.width, info.width);
  const height = Math.min(image.height, info.height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (data[(y * info.width + x) * info.channels] < COVERAGE_THRESHOLD) continue;
      const index = y * image.width + x;
      image.data[index] = Math.min(255, image.data[index] + 255);
    }
  }
}
