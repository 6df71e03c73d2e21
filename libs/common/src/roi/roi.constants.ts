import type { Point, Polygon, RoiDefinition } from './roi-geometry';

export const ROI_BASE_WIDTH = 1920;
export const ROI_BASE_HEIGHT = 1080;

/** Queue area in front of the border checkpoint, drawn on a 1920x1080 frame. */
export const DEFAULT_ROI_POLYGON: Polygon = [
  [303, 465],
  [354, 465],
  [890, 527],
  [1279, 588],
  [1510, 641],
  [1683, 702],
  [1820, 783],
  [1888, 841],
  [1739, 900],
  [1195, 817],
  [876, 705],
  [293, 500],
];

export const DEFAULT_ROI: RoiDefinition = {
  baseWidth: ROI_BASE_WIDTH,
  baseHeight: ROI_BASE_HEIGHT,
  polygon: DEFAULT_ROI_POLYGON,
};

function isPoint(value: unknown): value is [number, number] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value.every((coordinate) => typeof coordinate === 'number' && Number.isFinite(coordinate))
  );
}

/**
 * Parse a ROI_POLYGON value such as `[[10,10],[90,10],[90,90]]`.
 */
export function parseRoiPolygon(raw: string): Polygon {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Invalid ROI_POLYGON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!Array.isArray(parsed) || !parsed.every(isPoint)) {
    throw new Error('Invalid ROI_POLYGON: expected an array of [x, y] pairs');
  }
  if (parsed.length < 3) {
    throw new Error(`Invalid ROI_POLYGON: expected at least 3 vertices, got ${parsed.length}`);
  }
  return parsed.map(([x, y]): Point => [x, y]);
}
