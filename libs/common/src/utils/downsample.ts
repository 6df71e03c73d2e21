/**
 * Uniformly sample `points` down to at most `maxPoints`, always keeping the
 * first and last point and the original order.
 */
export function downsamplePoints<T>(points: T[], maxPoints: number): T[] {
  const size = points.length;
  if (size <= maxPoints || maxPoints <= 0) return points;
  if (maxPoints === 1) return [points[size - 1]];

  const indices = new Set<number>();
  for (let i = 0; i < maxPoints; i++) {
    indices.add(Math.round((i * (size - 1)) / (maxPoints - 1)));
  }
  return [...indices].map((index) => points[index]);
}
