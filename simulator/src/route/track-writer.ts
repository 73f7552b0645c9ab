import * as fs from 'fs/promises';
import * as path from 'path';
import type { TrackPoint } from '../geo/types.js';
import type { Route, TimedRoute } from './route.js';

function ecefColumns(point: TrackPoint): string {
  return `${point.ecef.x},${point.ecef.y},${point.ecef.z}`;
}

/**
 * `x,y,z` per point, ECEF meters.
 */
export function formatRouteRows(route: Route): string[] {
  return route.points.map(ecefColumns);
}

/**
 * `time,x,y,z` per point; time is seconds since start with one decimal.
 */
export function formatTimedRouteRows(timedRoute: TimedRoute): string[] {
  const step = 1 / timedRoute.frequency;
  return timedRoute.route.points.map((point, i) => `${(i * step).toFixed(1)},${ecefColumns(point)}`);
}

async function writeRows(filePath: string, rows: string[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, rows.map((row) => `${row}\n`).join(''), 'utf-8');
}

export async function writeRouteFile(filePath: string, route: Route): Promise<void> {
  await writeRows(filePath, formatRouteRows(route));
}

/**
 * Writes the user motion file the broadcaster reads with `-u`.
 */
export async function writeTimedRouteFile(filePath: string, timedRoute: TimedRoute): Promise<void> {
  await writeRows(filePath, formatTimedRouteRows(timedRoute));
}
