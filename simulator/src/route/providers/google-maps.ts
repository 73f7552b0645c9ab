/**
 * Google Maps Route Provider
 * ==========================
 * Directions and Elevation web APIs over node-fetch.
 *
 * Environment variables (via config):
 * - MAPS_API_KEY
 * - MAPS_BASE_URL
 */

import fetch, { type RequestInit, type Response } from 'node-fetch';
import { z } from 'zod';
import { NoRouteFoundError, ProviderError, errorMessage } from '../../errors.js';
import type { LatLng } from '../../geo/types.js';
import { createLogger } from '../../utils/logger.js';
import type { DirectionsResult, RouteProvider, TravelMode } from './route-provider.js';

const log = createLogger('MapsProvider');

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface GoogleMapsProviderConfig {
  apiKey: string;
  baseUrl?: string;
  elevationBatchSize?: number;
  fetch?: FetchLike;
}

const locationSchema = z.object({ lat: z.number(), lng: z.number() });

const stepSchema = z.object({
  start_location: locationSchema,
  end_location: locationSchema,
  distance: z.object({ value: z.number() }),
  duration: z.object({ value: z.number() }),
});

const directionsSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  routes: z
    .array(
      z.object({
        overview_polyline: z.object({ points: z.string() }),
        legs: z.array(z.object({ steps: z.array(stepSchema) })),
      }),
    )
    .default([]),
});

const elevationSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z.array(z.object({ elevation: z.number() })).default([]),
});

export type DirectionsResponse = z.infer<typeof directionsSchema>;

const NO_ROUTE_STATUSES = new Set(['ZERO_RESULTS', 'NOT_FOUND']);

function formatLocation(point: LatLng): string {
  return `${point.latitude},${point.longitude}`;
}

/**
 * Flattens the first route of a directions response into step end points.
 */
export function parseDirectionsResponse(response: DirectionsResponse): DirectionsResult {
  const route = response.routes[0];
  const firstStep = route?.legs[0]?.steps[0];
  if (!route || !firstStep) {
    throw new NoRouteFoundError();
  }

  const result: DirectionsResult = {
    points: [{ latitude: firstStep.start_location.lat, longitude: firstStep.start_location.lng }],
    distances: [],
    durations: [],
    polyline: route.overview_polyline.points,
  };

  for (const leg of route.legs) {
    for (const step of leg.steps) {
      result.points.push({ latitude: step.end_location.lat, longitude: step.end_location.lng });
      result.distances.push(step.distance.value);
      result.durations.push(step.duration.value);
    }
  }

  return result;
}

/**
 * RouteProvider backed by the Google Maps Directions and Elevation web APIs
 */
export class GoogleMapsProvider implements RouteProvider {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly elevationBatchSize: number;
  private readonly fetchFn: FetchLike;

  constructor(config: GoogleMapsProviderConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? 'https://maps.googleapis.com/maps/api').replace(/\/+$/, '');
    this.elevationBatchSize = config.elevationBatchSize ?? 256;
    this.fetchFn = config.fetch ?? fetch;
  }

  public async directions(start: LatLng, end: LatLng, mode: TravelMode): Promise<DirectionsResult> {
    log.debug(`Requesting ${mode} directions ${formatLocation(start)} -> ${formatLocation(end)}`);

    const body = await this.getJson('directions', {
      origin: formatLocation(start),
      destination: formatLocation(end),
      mode,
      departure_time: 'now',
    });

    const parsed = directionsSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(`Unexpected directions response: ${parsed.error.message}`);
    }
    if (NO_ROUTE_STATUSES.has(parsed.data.status)) {
      throw new NoRouteFoundError();
    }
    if (parsed.data.status !== 'OK') {
      throw new ProviderError(this.describeStatus('Directions', parsed.data.status, parsed.data.error_message));
    }

    const result = parseDirectionsResponse(parsed.data);
    log.info(`Route found: ${result.points.length} points, ${result.distances.reduce((a, b) => a + b, 0)} m`);
    return result;
  }

  public async elevations(points: readonly LatLng[]): Promise<number[]> {
    const elevations: number[] = [];

    for (let offset = 0; offset < points.length; offset += this.elevationBatchSize) {
      const batch = points.slice(offset, offset + this.elevationBatchSize);
      const body = await this.getJson('elevation', {
        locations: batch.map(formatLocation).join('|'),
      });

      const parsed = elevationSchema.safeParse(body);
      if (!parsed.success) {
        throw new ProviderError(`Unexpected elevation response: ${parsed.error.message}`);
      }
      if (parsed.data.status !== 'OK') {
        throw new ProviderError(this.describeStatus('Elevation', parsed.data.status, parsed.data.error_message));
      }
      if (parsed.data.results.length !== batch.length) {
        throw new ProviderError(
          `Elevation API returned ${parsed.data.results.length} results for ${batch.length} locations`,
        );
      }

      elevations.push(...parsed.data.results.map((result) => result.elevation));
    }

    log.debug(`Received ${elevations.length} elevations`);
    return elevations;
  }

  private describeStatus(api: string, status: string, message?: string): string {
    return message ? `${api} API error: ${status} - ${message}` : `${api} API error: ${status}`;
  }

  private async getJson(api: 'directions' | 'elevation', params: Record<string, string>): Promise<unknown> {
    const query = new URLSearchParams({ ...params, key: this.apiKey });
    const url = `${this.baseUrl}/${api}/json?${query.toString()}`;

    let response: Response;
    try {
      response = await this.fetchFn(url);
    } catch (error) {
      throw new ProviderError(`Request to ${api} API failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new ProviderError(`${api} API error: HTTP ${response.status} ${response.statusText}`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ProviderError(`${api} API returned invalid JSON`, { cause: error });
    }
  }
}
