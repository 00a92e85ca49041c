import type { NormalizedLandmark, NumericRange, PixelPoint } from "../types/crop";

/**
 * Convert a normalized mesh point (0-1) to pixel coordinates
 */
export const normalizedToPixel = (
  landmark: NormalizedLandmark,
  imageWidth: number,
  imageHeight: number
): PixelPoint => {
  return {
    x: landmark.x * imageWidth,
    y: landmark.y * imageHeight,
  };
};

export const mean = (values: readonly number[]): number => {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

export const clamp = (value: number, min: number, max: number): number => {
  return Math.min(Math.max(value, min), max);
};

/**
 * Point with the smallest y; the first one wins ties
 */
export const topmostPoint = (points: readonly PixelPoint[]): PixelPoint => {
  return points.reduce((best, point) => (point.y < best.y ? point : best));
};

/**
 * Point with the largest y; the first one wins ties
 */
export const bottommostPoint = (points: readonly PixelPoint[]): PixelPoint => {
  return points.reduce((best, point) => (point.y > best.y ? point : best));
};

/**
 * Horizontal extent of a point cloud
 */
export const horizontalExtent = (points: readonly PixelPoint[]): NumericRange => {
  const xs = points.map((point) => point.x);
  return { min: Math.min(...xs), max: Math.max(...xs) };
};

/**
 * Build a range only when both bounds are present
 */
export const rangeOf = (
  min: number | null | undefined,
  max: number | null | undefined
): NumericRange | null => {
  if (min === null || min === undefined || max === null || max === undefined) {
    return null;
  }
  return { min, max };
};

export const midpoint = (range: NumericRange): number => {
  return (range.min + range.max) / 2;
};

export const isWithin = (value: number, range: NumericRange): boolean => {
  return range.min <= value && value <= range.max;
};

/**
 * Round to whole pixels, normalizing -0 to 0
 */
export const roundPx = (value: number): number => {
  const rounded = Math.round(value);
  return rounded === 0 ? 0 : rounded;
};
