export { anchorPoint, pointInPolygon, scalePolygon, scaledRoi } from './roi-geometry';
export type { BoundingBox, Point, Polygon, RoiDefinition } from './roi-geometry';
export { DEFAULT_ROI, DEFAULT_ROI_POLYGON, ROI_BASE_HEIGHT, ROI_BASE_WIDTH, parseRoiPolygon } from './roi.constants';
