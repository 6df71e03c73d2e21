import { anchorPoint, pointInPolygon, scalePolygon, scaledRoi } from './roi-geometry';
import type { Polygon } from './roi-geometry';
import { DEFAULT_ROI, parseRoiPolygon } from './roi.constants';

const square: Polygon = [
  [10, 10],
  [90, 10],
  [90, 90],
  [10, 90],
];

describe('scalePolygon', () => {
  it('scales each vertex and rounds to whole pixels', () => {
    expect(scalePolygon([[100, 200], [1920, 1080], [303, 465]], 960, 540, 1920, 1080)).toEqual([
      [50, 100],
      [960, 540],
      [152, 233],
    ]);
  });
});

describe('pointInPolygon', () => {
  it('detects interior points', () => {
    expect(pointInPolygon([50, 50], square)).toBe(true);
  });

  it('rejects exterior points', () => {
    expect(pointInPolygon([5, 50], square)).toBe(false);
    expect(pointInPolygon([50, 95], square)).toBe(false);
  });

  it('never matches a degenerate polygon', () => {
    expect(pointInPolygon([0, 0], [[0, 0], [10, 10]])).toBe(false);
  });
});

describe('anchorPoint', () => {
  it('is the bottom center of the box', () => {
    expect(anchorPoint([20, 20, 40, 40])).toEqual([30, 40]);
  });
});

describe('scaledRoi', () => {
  it('returns null without frame dimensions', () => {
    expect(scaledRoi(null, 1080, DEFAULT_ROI)).toBeNull();
    expect(scaledRoi(1920, 0, DEFAULT_ROI)).toBeNull();
  });

  it('leaves the default polygon untouched at the base resolution', () => {
    expect(scaledRoi(1920, 1080, DEFAULT_ROI)).toEqual(DEFAULT_ROI.polygon);
  });
});

describe('parseRoiPolygon', () => {
  it('parses a list of pairs', () => {
    expect(parseRoiPolygon('[[10,10],[90,10],[90,90]]')).toEqual([
      [10, 10],
      [90, 10],
      [90, 90],
    ]);
  });

  it('rejects malformed JSON', () => {
    expect(() => parseRoiPolygon('[[10,10]')).toThrow(/^Invalid ROI_POLYGON: /);
  });

  it('rejects polygons with fewer than three vertices', () => {
    expect(() => parseRoiPolygon('[[10,10],[90,10]]')).toThrow('Invalid ROI_POLYGON: expected at least 3 vertices, got 2');
  });

  it('rejects values that are not coordinate pairs', () => {
    expect(() => parseRoiPolygon('[[10,10,3]]')).toThrow('Invalid ROI_POLYGON: expected an array of [x, y] pairs');
    expect(() => parseRoiPolygon('{"x":1}')).toThrow('Invalid ROI_POLYGON: expected an array of [x, y] pairs');
  });
});
