/**
 * What a single broadcast run plays: a fixed location, or a user motion
 * file of timed ECEF rows.
 */
export type SimulationSpec = StaticSimulationSpec | DynamicSimulationSpec;

interface CommonSpec {
  runDuration?: number;   // seconds
  gain?: number;          // broadcaster signal gain
}

export interface StaticSimulationSpec extends CommonSpec {
  kind: 'static';
  latitude: number;
  longitude: number;
}

export interface DynamicSimulationSpec extends CommonSpec {
  kind: 'dynamic';
  trackFile: string;
}

function show(value: number | string | undefined): string {
  return value === undefined ? 'none' : String(value);
}

/**
 * Deterministic one-line rendering, written as the first line of each
 * playlist log record.
 */
export function describeSpec(spec: SimulationSpec): string {
  switch (spec.kind) {
    case 'static':
      return `StaticSimulation(latitude=${show(spec.latitude)}, longitude=${show(spec.longitude)}, ` +
        `run_duration=${show(spec.runDuration)}, gain=${show(spec.gain)})`;
    case 'dynamic':
      return `DynamicSimulation(track_file=${show(spec.trackFile)}, ` +
        `run_duration=${show(spec.runDuration)}, gain=${show(spec.gain)})`;
  }
}

/**
 * Broadcaster arguments: `-T now [-d duration] [-a gain] (-l lat,lon | -u file)`
 */
export function buildBroadcasterArgs(spec: SimulationSpec): string[] {
  const args = ['-T', 'now'];
  if (spec.runDuration !== undefined) {
    args.push('-d', String(spec.runDuration));
  }
  if (spec.gain !== undefined) {
    args.push('-a', String(spec.gain));
  }
  switch (spec.kind) {
    case 'static':
      args.push('-l', `${spec.latitude},${spec.longitude}`);
      break;
    case 'dynamic':
      args.push('-u', spec.trackFile);
      break;
  }
  return args;
}
