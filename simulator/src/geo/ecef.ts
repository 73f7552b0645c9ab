import type { EcefPoint, GeoPoint, TrackPoint } from './types.js';

// World Geodetic System 1984
export const WGS84_SEMI_MAJOR_AXIS = 6378137.0;
export const WGS84_ECCENTRICITY = 0.0818191908426;

const DEG_TO_RAD = Math.PI / 180;

/**
 * Geodetic (degrees, meters) to ECEF (meters) on the WGS84 ellipsoid.
 */
export function toECEF(latitude: number, longitude: number, altitude: number): EcefPoint {
  const eccentricitySq = WGS84_ECCENTRICITY * WGS84_ECCENTRICITY;
  const lat = latitude * DEG_TO_RAD;
  const lon = longitude * DEG_TO_RAD;

  const sinLat = Math.sin(lat);
  const cosLat = Math.cos(lat);
  // Prime vertical radius of curvature
  const n = WGS84_SEMI_MAJOR_AXIS / Math.sqrt(1 - eccentricitySq * sinLat * sinLat);

  return {
    x: (n + altitude) * cosLat * Math.cos(lon),
    y: (n + altitude) * cosLat * Math.sin(lon),
    z: ((1 - eccentricitySq) * n + altitude) * sinLat,
  };
}

/**
 * Returns a copy of the point with its ECEF triple derived. A missing
 * altitude is taken as sea level.
 */
export function withEcef(point: GeoPoint): TrackPoint {
  const altitude = point.altitude ?? 0;
  return {
    latitude: point.latitude,
    longitude: point.longitude,
    altitude,
    ecef: toECEF(point.latitude, point.longitude, altitude),
  };
}
