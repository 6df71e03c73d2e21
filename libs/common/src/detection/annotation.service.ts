import { Injectable } from '@nestjs/common';
import sharp from 'sharp';
import type { BoundingBox, Polygon } from '../roi';

const STROKE = 'rgb(255,255,0)';
const STROKE_WIDTH = 3;

export function buildOverlaySvg(width: number, height: number, boxes: BoundingBox[], roi: Polygon | null): string {
  const rects = boxes.map(
    ([x1, y1, x2, y2]) =>
      `<rect x="${x1}" y="${y1}" width="${x2 - x1}" height="${y2 - y1}" fill="none" stroke="${STROKE}" stroke-width="${STROKE_WIDTH}"/>`,
  );
  const outline =
    roi && roi.length > 0
      ? [`<polygon points="${roi.map(([x, y]) => `${x},${y}`).join(' ')}" fill="none" stroke="${STROKE}" stroke-width="${STROKE_WIDTH}"/>`]
      : [];
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`,
    ...rects,
    ...outline,
    '</svg>',
  ].join('');
}

/** Draws person boxes and the ROI outline on a copy of the frame. */
@Injectable()
export class AnnotationService {
  async renderPng(imagePath: string, boxes: BoundingBox[], roi: Polygon | null): Promise<Buffer> {
    const image = sharp(imagePath);
    const { width, height } = await image.metadata();
    if (!width || !height) {
      throw new Error(`Cannot annotate ${imagePath}: unknown image dimensions`);
    }
    const overlay = Buffer.from(buildOverlaySvg(width, height, boxes, roi));
    return image
      .composite([{ input: overlay, top: 0, left: 0 }])
      .png()
      .toBuffer();
  }
}
