import type { TrackbeamConfig } from '../../config.js';
import { GoogleMapsProvider } from './google-maps.js';
import type { RouteProvider } from './route-provider.js';

/**
 * Create the route provider configured in the environment
 *
 * Environment variables:
 * - MAPS_API_KEY (required)
 * - MAPS_BASE_URL (optional, default: Google Maps web services)
 */
export function createRouteProvider(config: Pick<TrackbeamConfig, 'mapsApiKey' | 'mapsBaseUrl'>): RouteProvider {
  if (!config.mapsApiKey) {
    throw new Error('MAPS_API_KEY not set in environment');
  }

  return new GoogleMapsProvider({
    apiKey: config.mapsApiKey,
    baseUrl: config.mapsBaseUrl,
  });
}
