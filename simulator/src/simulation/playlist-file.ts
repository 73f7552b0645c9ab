import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { InvalidPlaylistError, errorMessage } from '../errors.js';
import type { TrackImporter } from '../route/importers/gpx-importer.js';
import type { RouteProvider } from '../route/providers/route-provider.js';
import { TRANSPORT_SPEEDS, buildTimedRoute, routeFromWaypoints, type Transport } from '../route/route.js';
import { writeTimedRouteFile } from '../route/track-writer.js';
import { upsampleRoute } from '../route/upsample.js';
import { createLogger } from '../utils/logger.js';
import type { SimulationSpec } from './spec.js';

const log = createLogger('PlaylistFile');

const common = {
  runDuration: z.number().positive().optional(),
  gain: z.number().optional(),
};

const latitude = z.number().gte(-90).lte(90);
const longitude = z.number().gte(-180).lte(180);
const locationSchema = z.object({ lat: latitude, lng: longitude });
const transportSchema = z.enum(['walking', 'running', 'biking']);

// Generated tracks default to the 10 rows/s the run log assumes
const motion = {
  transport: transportSchema.optional(),
  speed: z.number().positive().optional(),
  frequency: z.number().positive().default(10),
  output: z.string().min(1).optional(),
};

const entrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('static'), latitude, longitude, ...common }),
  z.object({ type: z.literal('dynamic'), trackFile: z.string().min(1), ...common }),
  z.object({
    type: z.literal('route'),
    start: locationSchema,
    end: locationSchema,
    mode: z.enum(['walking', 'bicycling', 'driving']).default('walking'),
    ...motion,
    ...common,
  }),
  z.object({ type: z.literal('gpx'), file: z.string().min(1), ...motion, ...common }),
]);

export const playlistFileSchema = z.object({
  simulations: z.array(entrySchema).min(1),
});

export type PlaylistEntry = z.infer<typeof entrySchema>;

export interface PrepareOptions {
  /** Only called when a route entry needs directions. */
  getProvider: () => RouteProvider;
  importer: TrackImporter;
  trackDir: string;
}

/**
 * Validates a parsed playlist document. Relative paths resolve against
 * `baseDir`.
 */
export function parsePlaylist(document: unknown, baseDir: string): PlaylistEntry[] {
  const parsed = playlistFileSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidPlaylistError(`Invalid playlist: ${issues.join('; ')}`);
  }

  const resolve = (file: string) => path.resolve(baseDir, file);
  return parsed.data.simulations.map((entry): PlaylistEntry => {
    switch (entry.type) {
      case 'static':
        return entry;
      case 'dynamic':
        return { ...entry, trackFile: resolve(entry.trackFile) };
      case 'route':
        return { ...entry, output: entry.output === undefined ? undefined : resolve(entry.output) };
      case 'gpx':
        return {
          ...entry,
          file: resolve(entry.file),
          output: entry.output === undefined ? undefined : resolve(entry.output),
        };
    }
  });
}

export async function loadPlaylistFile(filePath: string): Promise<PlaylistEntry[]> {
  let document: unknown;
  try {
    document = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new InvalidPlaylistError(`Could not read playlist ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  return parsePlaylist(document, path.dirname(path.resolve(filePath)));
}

function speedFor(entry: { speed?: number; transport?: Transport }): number {
  return entry.speed ?? TRANSPORT_SPEEDS[entry.transport ?? 'walking'];
}

/**
 * Turns playlist entries into simulation specs, generating the track file of
 * every route and gpx entry first.
 */
export async function preparePlaylist(entries: readonly PlaylistEntry[], options: PrepareOptions): Promise<SimulationSpec[]> {
  const specs: SimulationSpec[] = [];

  for (const [i, entry] of entries.entries()) {
    const { runDuration, gain } = entry;

    switch (entry.type) {
      case 'static':
        specs.push({ kind: 'static', latitude: entry.latitude, longitude: entry.longitude, runDuration, gain });
        break;

      case 'dynamic':
        specs.push({ kind: 'dynamic', trackFile: entry.trackFile, runDuration, gain });
        break;

      case 'route': {
        const timedRoute = await buildTimedRoute(
          options.getProvider(),
          { latitude: entry.start.lat, longitude: entry.start.lng },
          { latitude: entry.end.lat, longitude: entry.end.lng },
          speedFor(entry),
          entry.frequency,
          entry.mode,
        );
        const trackFile = entry.output ?? path.join(options.trackDir, `route_${i + 1}.csv`);
        await writeTimedRouteFile(trackFile, timedRoute);
        log.info(`Wrote ${timedRoute.route.points.length} track rows to ${trackFile}`);
        specs.push({ kind: 'dynamic', trackFile, runDuration, gain });
        break;
      }

      case 'gpx': {
        const points = await options.importer.importTrack(entry.file);
        const timedRoute = upsampleRoute({
          route: routeFromWaypoints(points),
          speed: speedFor(entry),
          frequency: entry.frequency,
        });
        const trackFile = entry.output ??
          path.join(options.trackDir, `${path.basename(entry.file, path.extname(entry.file))}.csv`);
        await writeTimedRouteFile(trackFile, timedRoute);
        log.info(`Wrote ${timedRoute.route.points.length} track rows to ${trackFile}`);
        specs.push({ kind: 'dynamic', trackFile, runDuration, gain });
        break;
      }
    }
  }

  return specs;
}
