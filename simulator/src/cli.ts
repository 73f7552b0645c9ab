import * as path from 'path';
import { loadConfig, type TrackbeamConfig } from './config.js';
import { TrackbeamError, errorMessage } from './errors.js';
import { parseLatLng } from './geo/distance.js';
import { parseCommandScript, ScriptedInputSource, type InputSource } from './input/input-source.js';
import { KeyboardInputSource } from './input/keyboard-input.js';
import { GpxTrackImporter, type TrackImporter } from './route/importers/gpx-importer.js';
import { createRouteProvider } from './route/providers/provider-factory.js';
import type { RouteProvider } from './route/providers/route-provider.js';
import { TRANSPORT_SPEEDS, buildTimedRoute } from './route/route.js';
import { writeTimedRouteFile } from './route/track-writer.js';
import { loadPlaylistFile, preparePlaylist } from './simulation/playlist-file.js';
import { Playlist, type PlaylistSummary } from './simulation/playlist.js';
import { NodeProcessLauncher, type ProcessLauncher } from './simulation/process-handle.js';
import { FileRunLog } from './simulation/run-log.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const log = createLogger('Trackbeam');

export const USAGE = [
  'Usage:',
  '  trackbeam simulate <playlist.json> [--commands n,-,p,q]',
  '  trackbeam route <startLat,startLng> <endLat,endLng> <output.csv> [speed] [frequency]',
].join('\n');

export interface CliDependencies {
  config?: TrackbeamConfig;
  createProvider?: (config: TrackbeamConfig) => RouteProvider;
  importer?: TrackImporter;
  launcher?: ProcessLauncher;
  createInput?: () => InputSource;
}

function parsePositive(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number, got ${value}`);
  }
  return parsed;
}

async function routeCommand(args: string[], config: TrackbeamConfig, deps: CliDependencies): Promise<number> {
  const [startText, endText, output, speedText, frequencyText] = args;
  if (!startText || !endText || !output) {
    console.error(USAGE);
    return 1;
  }
  const start = parseLatLng(startText);
  const end = parseLatLng(endText);
  if (!start || !end) {
    throw new Error(`Locations must be given as lat,lng (got ${startText} and ${endText})`);
  }
  const speed = parsePositive(speedText, TRANSPORT_SPEEDS.walking, 'speed');
  const frequency = parsePositive(frequencyText, 10, 'frequency');

  const provider = (deps.createProvider ?? createRouteProvider)(config);
  const timedRoute = await buildTimedRoute(provider, start, end, speed, frequency);
  const filePath = path.resolve(output);
  await writeTimedRouteFile(filePath, timedRoute);
  log.info(`Wrote ${timedRoute.route.points.length} track rows to ${filePath}`);
  return 0;
}

async function simulateCommand(args: string[], config: TrackbeamConfig, deps: CliDependencies): Promise<number> {
  const playlistPath = args[0];
  if (!playlistPath) {
    console.error(USAGE);
    return 1;
  }
  const commandsFlag = args.indexOf('--commands');
  const script = commandsFlag >= 0 ? args[commandsFlag + 1] : undefined;

  const entries = await loadPlaylistFile(playlistPath);
  const specs = await preparePlaylist(entries, {
    getProvider: () => (deps.createProvider ?? createRouteProvider)(config),
    importer: deps.importer ?? new GpxTrackImporter(),
    trackDir: config.trackDir,
  });

  const input: InputSource = script !== undefined
    ? new ScriptedInputSource(parseCommandScript(script))
    : (deps.createInput ?? (() => new KeyboardInputSource()))();
  const logSink = new FileRunLog(config.simulationLogDir);

  const playlist = new Playlist(specs, {
    input,
    launcher: deps.launcher ?? new NodeProcessLauncher(),
    logSink,
    command: config.broadcasterCommand,
    cwd: config.broadcasterCwd,
    pollIntervalMs: config.playlistPollMs,
  });

  const onSignal = () => playlist.requestStop();
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  console.log('------------------------------------------------');
  console.log("Press 'n' to go to next sim, 'p' to go to previous sim, or 'q' to quit");
  console.log('------------------------------------------------');

  let summary: PlaylistSummary;
  try {
    summary = await playlist.run();
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    input.close?.();
  }

  log.info(`${summary.runs.length} simulation(s) played, log: ${logSink.location}`);
  const { launchErrors, logErrors, shutdownErrors } = summary;
  if (launchErrors.length > 0 || logErrors.length > 0 || shutdownErrors.length > 0) {
    log.warn(
      `${launchErrors.length} launch error(s), ${logErrors.length} log error(s), ` +
      `${shutdownErrors.length} broadcaster(s) left running`,
    );
    for (const error of shutdownErrors) {
      log.error(error.message);
    }
    return 1;
  }
  return 0;
}

/**
 * Runs one CLI command and returns the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const config = deps.config ?? loadConfig();
  setLogLevel(config.logLevel);

  const [command, ...args] = argv;
  try {
    switch (command) {
      case 'simulate':
        return await simulateCommand(args, config, deps);
      case 'route':
        return await routeCommand(args, config, deps);
      default:
        console.error(USAGE);
        return 1;
    }
  } catch (error) {
    const code = error instanceof TrackbeamError ? ` (${error.code})` : '';
    log.error(`${errorMessage(error)}${code}`);
    return 1;
  }
}
