import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { TrackPoint } from '../../geo/types.js';
import type { Route, TimedRoute } from '../route.js';
import {
  formatRouteRows,
  formatTimedRouteRows,
  writeRouteFile,
  writeTimedRouteFile,
} from '../track-writer.js';

function point(x: number, y: number, z: number): TrackPoint {
  return { latitude: 0, longitude: 0, altitude: 0, ecef: { x, y, z } };
}

const route: Route = {
  points: [point(1, 2, 3), point(4.5, -5.25, 6), point(7, 8, 9)],
  distances: [1, 1],
  durations: [0.1, 0.1],
  polyline: null,
};

describe('formatRouteRows', () => {
  it('writes x,y,z per point', () => {
    expect(formatRouteRows(route)).toEqual(['1,2,3', '4.5,-5.25,6', '7,8,9']);
  });
});

describe('formatTimedRouteRows', () => {
  it('prefixes each row with the elapsed time to one decimal', () => {
    const timed: TimedRoute = { route, speed: 10, frequency: 10 };
    expect(formatTimedRouteRows(timed)).toEqual(['0.0,1,2,3', '0.1,4.5,-5.25,6', '0.2,7,8,9']);
  });

  it('steps by 1/frequency', () => {
    const timed: TimedRoute = { route, speed: 1, frequency: 2 };
    expect(formatTimedRouteRows(timed).map((row) => row.split(',')[0])).toEqual(['0.0', '0.5', '1.0']);
  });

  it('does not accumulate rounding drift over long tracks', () => {
    const points = Array.from({ length: 1001 }, () => point(0, 0, 0));
    const timed: TimedRoute = {
      route: { points, distances: points.slice(1).map(() => 1), durations: points.slice(1).map(() => 0.1), polyline: null },
      speed: 10,
      frequency: 10,
    };
    const rows = formatTimedRouteRows(timed);
    expect(rows[3]).toBe('0.3,0,0,0');
    expect(rows[1000]).toBe('100.0,0,0,0');
  });
});

describe('writing track files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trackbeam-writer-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes one newline-terminated row per point', async () => {
    const file = path.join(dir, 'route.csv');
    await writeRouteFile(file, route);
    expect(await fs.readFile(file, 'utf-8')).toBe('1,2,3\n4.5,-5.25,6\n7,8,9\n');
  });

  it('creates missing parent directories', async () => {
    const file = path.join(dir, 'nested', 'motion', 'walk.csv');
    await writeTimedRouteFile(file, { route, speed: 10, frequency: 10 });
    expect(await fs.readFile(file, 'utf-8')).toBe('0.0,1,2,3\n0.1,4.5,-5.25,6\n0.2,7,8,9\n');
  });
});
