import type { LatLng } from '../../geo/types.js';

export type TravelMode = 'walking' | 'bicycling' | 'driving';

/**
 * Directions between two locations as a list of step end points.
 * `distances[i]` and `durations[i]` describe the step from `points[i]` to
 * `points[i + 1]`.
 */
export interface DirectionsResult {
  points: LatLng[];
  distances: number[];   // meters
  durations: number[];   // seconds
  polyline: string;
}

/**
 * Common interface for directions/elevation services
 */
export interface RouteProvider {
  /**
   * Directions from `start` to `end`
   * @throws NoRouteFoundError when the service knows no way between them
   */
  directions(start: LatLng, end: LatLng, mode: TravelMode): Promise<DirectionsResult>;

  /**
   * Elevation in meters of every point, in input order
   */
  elevations(points: readonly LatLng[]): Promise<number[]>;
}
