import { InvalidRouteError } from '../errors.js';
import { haversineDistance } from '../geo/distance.js';
import { withEcef } from '../geo/ecef.js';
import type { GeoPoint, LatLng, TrackPoint } from '../geo/types.js';
import type { RouteProvider, TravelMode } from './providers/route-provider.js';
import { upsampleRoute } from './upsample.js';

/**
 * Ordered points plus the length (meters) and duration (seconds) of each
 * segment between consecutive points.
 */
export interface Route {
  readonly points: readonly TrackPoint[];
  readonly distances: readonly number[];
  readonly durations: readonly number[];
  readonly polyline: string | null;   // passed through from the provider, never decoded
}

/**
 * A route travelled at `speed` (m/s) and sampled at `frequency` (Hz).
 */
export interface TimedRoute {
  readonly route: Route;
  readonly speed: number;
  readonly frequency: number;
}

/** Average speeds in meters per second. */
export const TRANSPORT_SPEEDS = {
  walking: 1.4,
  running: 2,
  biking: 3,
} as const;

export type Transport = keyof typeof TRANSPORT_SPEEDS;

export function validateRoute(route: Route): void {
  if (route.points.length === 0) {
    throw new InvalidRouteError('Route has no points');
  }
  const segments = route.points.length - 1;
  if (route.distances.length !== segments || route.durations.length !== segments) {
    throw new InvalidRouteError(
      `Route with ${route.points.length} points needs ${segments} distances and durations, ` +
      `got ${route.distances.length} and ${route.durations.length}`,
    );
  }
}

export function validateTiming(speed: number, frequency: number): void {
  if (!Number.isFinite(speed) || speed <= 0) {
    throw new InvalidRouteError(`Speed must be a positive number of m/s, got ${speed}`);
  }
  if (!Number.isFinite(frequency) || frequency <= 0) {
    throw new InvalidRouteError(`Frequency must be a positive number of Hz, got ${frequency}`);
  }
}

export function createRoute(
  points: readonly GeoPoint[],
  distances: readonly number[],
  durations: readonly number[],
  polyline: string | null = null,
): Route {
  const route: Route = {
    points: points.map(withEcef),
    distances: [...distances],
    durations: [...durations],
    polyline,
  };
  validateRoute(route);
  return route;
}

/**
 * Requests directions between two locations, then the elevation of every
 * point on the way.
 */
export async function buildRoute(
  provider: RouteProvider,
  start: LatLng,
  end: LatLng,
  mode: TravelMode = 'walking',
): Promise<Route> {
  const directions = await provider.directions(start, end, mode);
  const elevations = await provider.elevations(directions.points);
  if (elevations.length !== directions.points.length) {
    throw new InvalidRouteError(
      `Got ${elevations.length} elevations for ${directions.points.length} route points`,
    );
  }

  const points = directions.points.map((point, i) => ({
    latitude: point.latitude,
    longitude: point.longitude,
    altitude: elevations[i],
  }));
  return createRoute(points, directions.distances, directions.durations, directions.polyline);
}

export async function buildTimedRoute(
  provider: RouteProvider,
  start: LatLng,
  end: LatLng,
  speed: number,
  frequency: number,
  mode: TravelMode = 'walking',
): Promise<TimedRoute> {
  validateTiming(speed, frequency);
  const route = await buildRoute(provider, start, end, mode);
  return upsampleRoute({ route, speed, frequency });
}

/**
 * Route over already known points, e.g. an imported track. Segment lengths
 * are great-circle distances; durations are unknown and left at zero.
 */
export function routeFromWaypoints(points: readonly GeoPoint[]): Route {
  const distances: number[] = [];
  for (let i = 1; i < points.length; i++) {
    distances.push(haversineDistance(points[i - 1], points[i]));
  }
  return createRoute(points, distances, distances.map(() => 0));
}
