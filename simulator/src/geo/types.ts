/**
 * Latitude/longitude pair in decimal degrees.
 */
export interface LatLng {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * Earth-centered, earth-fixed coordinates in meters.
 */
export interface EcefPoint {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface GeoPoint extends LatLng {
  readonly altitude?: number;   // meters
  readonly ecef?: EcefPoint;    // derived from lat/lon/alt, see withEcef()
}

/**
 * A point whose altitude is known and whose ECEF triple has been derived.
 */
export interface TrackPoint extends GeoPoint {
  readonly altitude: number;
  readonly ecef: EcefPoint;
}
