export type Point = [x: number, y: number];
export type Polygon = Point[];
export type BoundingBox = [x1: number, y1: number, x2: number, y2: number];

/** A polygon drawn against a fixed base resolution. */
export interface RoiDefinition {
  baseWidth: number;
  baseHeight: number;
  polygon: Polygon;
}

export function scalePolygon(
  polygon: Polygon,
  targetWidth: number,
  targetHeight: number,
  baseWidth: number,
  baseHeight: number,
): Polygon {
  const xScale = targetWidth / baseWidth;
  const yScale = targetHeight / baseHeight;
  return polygon.map(([x, y]): Point => [Math.round(x * xScale), Math.round(y * yScale)]);
}

/**
 * Ray-casting membership test. Points lying exactly on an edge may land on
 * either side depending on floating-point comparison.
 */
export function pointInPolygon([x, y]: Point, polygon: Polygon): boolean {
  const count = polygon.length;
  if (count < 3) return false;

  let inside = false;
  for (let i = 0, j = count - 1; i < count; j = i++) {
    const [xi, yi] = polygon[i];
    const [xj, yj] = polygon[j];
    // horizontal edges never satisfy the first clause, the divisor only keeps the math finite
    const divisor = yj - yi || 1e-9;
    const crosses = yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / divisor + xi;
    if (crosses) inside = !inside;
  }
  return inside;
}

/** Bottom-center of a box: where a standing person's feet are. */
export function anchorPoint([x1, , x2, y2]: BoundingBox): Point {
  return [(x1 + x2) / 2, y2];
}

export function scaledRoi(
  width: number | null | undefined,
  height: number | null | undefined,
  roi: RoiDefinition,
): Polygon | null {
  if (!width || !height) return null;
  return scalePolygon(roi.polygon, width, height, roi.baseWidth, roi.baseHeight);
}
