import { describe, it, expect } from 'vitest';
import { InvalidRouteError, InvalidSegmentError } from '../../errors.js';
import { toECEF } from '../../geo/ecef.js';
import { createRoute, type TimedRoute } from '../route.js';
import { PRIMING_SAMPLES, pointsNeededForSegment, upsampleRoute, upsampledPointCount } from '../upsample.js';

const sparse = createRoute(
  [
    { latitude: 0, longitude: 0, altitude: 0 },
    { latitude: 0.004, longitude: 0, altitude: 4 },
    { latitude: 0.004, longitude: 0.009, altitude: 13 },
  ],
  [5, 10],
  [4, 7],
  'encoded-polyline',
);

describe('pointsNeededForSegment', () => {
  it('is one less than the points that fit in the segment', () => {
    expect(pointsNeededForSegment(5, 1)).toBe(4);
    expect(pointsNeededForSegment(10, 1)).toBe(9);
    expect(pointsNeededForSegment(100, 10 / 1.4)).toBe(713);
  });

  it('goes negative for a zero-length segment', () => {
    expect(pointsNeededForSegment(0, 1)).toBe(-1);
  });
});

describe('upsampledPointCount', () => {
  it('adds priming and final samples to the interpolated points', () => {
    expect(upsampledPointCount([5, 10], 10, 10)).toBe(24);
    expect(upsampledPointCount([], 10, 10)).toBe(11);
  });
});

describe('upsampleRoute', () => {
  const timed: TimedRoute = { route: sparse, speed: 10, frequency: 10 };

  it('produces 10 + 4 + 9 + 1 points for segments of 5 and 10 meters at 1 point per meter', () => {
    const result = upsampleRoute(timed);
    expect(result.route.points).toHaveLength(24);
    expect(result.route.points).toHaveLength(upsampledPointCount(sparse.distances, 10, 10));
  });

  it('makes every distance and duration uniform', () => {
    const result = upsampleRoute(timed);
    expect(result.route.distances).toHaveLength(23);
    expect(result.route.durations).toHaveLength(23);
    expect(result.route.distances.every((d) => d === 1)).toBe(true);
    expect(result.route.durations.every((d) => d === 0.1)).toBe(true);
  });

  it('repeats the first point during priming', () => {
    const { points } = upsampleRoute(timed).route;
    for (let i = 0; i < PRIMING_SAMPLES; i++) {
      expect(points[i]).toBe(sparse.points[0]);
    }
  });

  it('interpolates each coordinate linearly from the segment start', () => {
    const { points } = upsampleRoute(timed).route;

    expect(points[10]).toEqual(sparse.points[0]);

    const quarter = points[11];
    expect(quarter.latitude).toBeCloseTo(0.001, 12);
    expect(quarter.longitude).toBe(0);
    expect(quarter.altitude).toBeCloseTo(1, 12);
    expect(quarter.ecef).toEqual(toECEF(quarter.latitude, quarter.longitude, quarter.altitude));

    // second segment starts at the second route point, j = 0
    expect(points[14]).toEqual(sparse.points[1]);
    const third = points[17];
    expect(third.latitude).toBeCloseTo(0.004, 12);
    expect(third.longitude).toBeCloseTo(0.003, 12);
    expect(third.altitude).toBeCloseTo(7, 12);
  });

  it('ends on the last route point', () => {
    const { points } = upsampleRoute(timed).route;
    expect(points[points.length - 1]).toBe(sparse.points[2]);
  });

  it('keeps speed, frequency and polyline', () => {
    const result = upsampleRoute(timed);
    expect(result.speed).toBe(10);
    expect(result.frequency).toBe(10);
    expect(result.route.polyline).toBe('encoded-polyline');
  });

  it('leaves the input route untouched', () => {
    const before = JSON.stringify(timed);
    upsampleRoute(timed);
    expect(JSON.stringify(timed)).toBe(before);
    expect(sparse.points).toHaveLength(3);
  });

  it('spaces points speed/frequency meters apart', () => {
    const walk = createRoute(
      [
        { latitude: 37.417747, longitude: -122.086086, altitude: 10 },
        { latitude: 37.418647, longitude: -122.086086, altitude: 12 },
      ],
      [100],
      [71],
    );
    const result = upsampleRoute({ route: walk, speed: 1.4, frequency: 10 });
    expect(result.route.points).toHaveLength(10 + 713 + 1);
    expect(result.route.distances[0]).toBeCloseTo(0.14, 12);
  });

  it('primes and ends a single-point route without interpolating', () => {
    const still = createRoute([{ latitude: 5, longitude: 6, altitude: 7 }], [], []);
    const result = upsampleRoute({ route: still, speed: 1, frequency: 10 });
    expect(result.route.points).toHaveLength(11);
    expect(result.route.points.every((point) => point === still.points[0])).toBe(true);
  });

  it('rejects a zero-length segment instead of dividing by zero', () => {
    const zero = createRoute(
      [
        { latitude: 1, longitude: 1, altitude: 0 },
        { latitude: 1, longitude: 1, altitude: 0 },
      ],
      [0],
      [0],
    );
    let caught: InvalidSegmentError | null = null;
    try {
      upsampleRoute({ route: zero, speed: 10, frequency: 10 });
    } catch (error) {
      if (error instanceof InvalidSegmentError) caught = error;
    }
    expect(caught).not.toBeNull();
    expect(caught?.code).toBe('INVALID_SEGMENT');
    expect(caught?.segmentIndex).toBe(0);
    expect(caught?.distance).toBe(0);
    expect(caught?.pointsNeeded).toBe(-1);
  });

  it('rejects a segment too short for a single interpolated point', () => {
    const short = createRoute(
      [
        { latitude: 0, longitude: 0, altitude: 0 },
        { latitude: 0, longitude: 0.00001, altitude: 0 },
        { latitude: 0, longitude: 0.00002, altitude: 0 },
      ],
      [10, 1.5],
      [1, 1],
    );
    expect(() => upsampleRoute({ route: short, speed: 10, frequency: 10 })).toThrow(InvalidSegmentError);
  });

  it.each([
    [0, 10],
    [-1, 10],
    [10, 0],
    [Number.NaN, 10],
  ])('rejects speed %s and frequency %s', (speed, frequency) => {
    expect(() => upsampleRoute({ route: sparse, speed, frequency })).toThrow(InvalidRouteError);
  });
});
