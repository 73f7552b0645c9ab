/**
 * Route Upsampler
 * ===============
 * Densifies a route so the broadcaster gets one position per tick at the
 * requested speed and frequency.
 */

import { InvalidSegmentError } from '../errors.js';
import { withEcef } from '../geo/ecef.js';
import type { TrackPoint } from '../geo/types.js';
import { validateRoute, validateTiming, type TimedRoute } from './route.js';

/**
 * Samples of the first point emitted before motion starts, so the
 * broadcaster has settled before the position begins to change.
 */
export const PRIMING_SAMPLES = 10;

/**
 * Number of points interpolated on a segment of `distance` meters, not
 * counting the segment's end point.
 */
export function pointsNeededForSegment(distance: number, pointsPerMeter: number): number {
  return Math.floor(distance * pointsPerMeter) - 1;
}

/**
 * Expected length of the upsampled route for the given segment lengths.
 */
export function upsampledPointCount(distances: readonly number[], speed: number, frequency: number): number {
  const pointsPerMeter = frequency / speed;
  return distances.reduce(
    (total, distance) => total + pointsNeededForSegment(distance, pointsPerMeter),
    PRIMING_SAMPLES + 1,
  );
}

function interpolate(start: TrackPoint, end: TrackPoint, fraction: number): TrackPoint {
  return withEcef({
    latitude: start.latitude + (end.latitude - start.latitude) * fraction,
    longitude: start.longitude + (end.longitude - start.longitude) * fraction,
    altitude: start.altitude + (end.altitude - start.altitude) * fraction,
  });
}

/**
 * Turns a sparse route into one with a point every `speed / frequency`
 * meters. Segments are interpolated linearly per coordinate.
 *
 * The input is left untouched; a new TimedRoute is returned whose distances
 * and durations are uniform.
 *
 * @throws InvalidSegmentError when a segment cannot hold a single point
 */
export function upsampleRoute(timedRoute: TimedRoute): TimedRoute {
  const { route, speed, frequency } = timedRoute;
  validateTiming(speed, frequency);
  validateRoute(route);

  const pointsPerMeter = frequency / speed;
  const first = route.points[0];
  const upsampled: TrackPoint[] = [];

  for (let i = 0; i < PRIMING_SAMPLES; i++) {
    upsampled.push(first);
  }

  route.distances.forEach((distance, i) => {
    const start = route.points[i];
    const end = route.points[i + 1];
    const pointsNeeded = pointsNeededForSegment(distance, pointsPerMeter);
    if (pointsNeeded < 1) {
      throw new InvalidSegmentError(i, distance, pointsNeeded);
    }
    for (let j = 0; j < pointsNeeded; j++) {
      upsampled.push(interpolate(start, end, j / pointsNeeded));
    }
  });

  upsampled.push(route.points[route.points.length - 1]);

  const segments = upsampled.length - 1;
  return {
    speed,
    frequency,
    route: {
      points: upsampled,
      distances: new Array<number>(segments).fill(speed / frequency),
      durations: new Array<number>(segments).fill(1 / frequency),
      polyline: route.polyline,
    },
  };
}
