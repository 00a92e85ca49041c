import {
  bottommostPoint,
  clamp,
  horizontalExtent,
  isWithin,
  mean,
  midpoint,
  normalizedToPixel,
  rangeOf,
  roundPx,
  topmostPoint,
} from '../geometryUtils';

describe('normalizedToPixel', () => {
  it('should scale by image width and height', () => {
    expect(normalizedToPixel({ x: 0.5, y: 0.25, z: -0.1 }, 800, 1200)).toEqual({ x: 400, y: 300 });
  });
});

describe('point extrema', () => {
  const points = [
    { x: 10, y: 40 },
    { x: 20, y: 5 },
    { x: 30, y: 5 },
    { x: 40, y: 90 },
  ];

  it('should keep the first topmost point on ties', () => {
    expect(topmostPoint(points)).toEqual({ x: 20, y: 5 });
  });

  it('should find the bottommost point', () => {
    expect(bottommostPoint(points)).toEqual({ x: 40, y: 90 });
  });

  it('should measure the horizontal extent', () => {
    expect(horizontalExtent(points)).toEqual({ min: 10, max: 40 });
  });
});

describe('ranges', () => {
  it('should only build a range when both bounds exist', () => {
    expect(rangeOf(1, 2)).toEqual({ min: 1, max: 2 });
    expect(rangeOf(0, 0)).toEqual({ min: 0, max: 0 });
    expect(rangeOf(1, null)).toBeNull();
    expect(rangeOf(undefined, 2)).toBeNull();
  });

  it('should test inclusive membership', () => {
    expect(isWithin(300, { min: 300, max: 420 })).toBe(true);
    expect(isWithin(420, { min: 300, max: 420 })).toBe(true);
    expect(isWithin(421, { min: 300, max: 420 })).toBe(false);
  });

  it('should find the midpoint', () => {
    expect(midpoint({ min: 280, max: 340 })).toBe(310);
  });
});

describe('numeric helpers', () => {
  it('should average values', () => {
    expect(mean([1, 2, 6])).toBe(3);
  });

  it('should clamp into bounds', () => {
    expect(clamp(5, 0, 3)).toBe(3);
    expect(clamp(-1, 0, 3)).toBe(0);
    expect(clamp(2, 0, 3)).toBe(2);
  });

  it('should round to whole pixels without negative zero', () => {
    expect(roundPx(357.5)).toBe(358);
    expect(roundPx(-4.6)).toBe(-5);
    expect(Object.is(roundPx(-0.2), 0)).toBe(true);
  });
});
