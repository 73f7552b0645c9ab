import * as fs from 'fs';
import path from 'path';
import { errorMessage } from './errors.js';
import { createLogger, isLogLevel, type LogLevel } from './utils/logger.js';

const log = createLogger('Config');

export interface TrackbeamConfig {
  logLevel: LogLevel;
  mapsApiKey: string | undefined;
  mapsBaseUrl: string;
  broadcasterCommand: string;
  broadcasterCwd: string;
  simulationLogDir: string;
  trackDir: string;
  playlistPollMs: number;
}

export const DEFAULT_CONFIG: TrackbeamConfig = {
  logLevel: 'info',
  mapsApiKey: undefined,
  mapsBaseUrl: 'https://maps.googleapis.com/maps/api',
  broadcasterCommand: './run_bladerfGPS.sh',
  broadcasterCwd: './bladeGPS',
  simulationLogDir: 'simulation_logs',
  trackDir: 'user_motion_files',
  playlistPollMs: 100,
};

/** Read in order; a variable set by an earlier file is kept. */
export const ENV_FILES = ['.env.local', '.env'] as const;

/**
 * `KEY=value`, `KEY="value"` or `export KEY=value`. Comments and blank lines
 * give null.
 */
export function parseEnvAssignment(line: string): { key: string; value: string } | null {
  const trimmed = line.trim().replace(/^export\s+/, '');
  if (!trimmed || trimmed.startsWith('#')) return null;
  const eq = trimmed.indexOf('=');
  if (eq <= 0) return null;

  const key = trimmed.slice(0, eq).trim();
  let value = trimmed.slice(eq + 1).trim();
  const quote = value[0];
  if (value.length >= 2 && (quote === '"' || quote === "'") && value.endsWith(quote)) {
    value = value.slice(1, -1);
  }
  return key ? { key, value } : null;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Copies variables from `.env.local` and `.env` under `cwd` into `env`
 * without overriding what is already set. A file that exists but cannot be
 * read is skipped with a warning.
 *
 * @returns the files that were applied
 */
export function loadEnvFiles(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string[] {
  const applied: string[] = [];

  for (const file of ENV_FILES) {
    const filePath = path.resolve(cwd, file);
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        log.warn(`Skipping ${filePath}: ${errorMessage(error)}`);
      }
      continue;
    }

    for (const line of raw.split(/\r?\n/)) {
      const assignment = parseEnvAssignment(line);
      if (assignment && env[assignment.key] === undefined) {
        env[assignment.key] = assignment.value;
      }
    }
    applied.push(filePath);
  }

  if (applied.length > 0) {
    log.debug(`Loaded ${applied.map((file) => path.basename(file)).join(', ')}`);
  }
  return applied;
}

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    log.warn(`${key}=${raw} is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.LOG_LEVEL?.toLowerCase();
  if (!raw) return DEFAULT_CONFIG.logLevel;
  if (isLogLevel(raw)) return raw;
  log.warn(`LOG_LEVEL=${raw} is not one of debug, info, warn, error`);
  return DEFAULT_CONFIG.logLevel;
}

/**
 * Builds the runtime configuration from environment variables. Relative
 * directories resolve against `cwd`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): TrackbeamConfig {
  return {
    logLevel: readLogLevel(env),
    mapsApiKey: env.MAPS_API_KEY || undefined,
    mapsBaseUrl: (env.MAPS_BASE_URL || DEFAULT_CONFIG.mapsBaseUrl).replace(/\/+$/, ''),
    broadcasterCommand: env.BROADCASTER_COMMAND || DEFAULT_CONFIG.broadcasterCommand,
    broadcasterCwd: path.resolve(cwd, env.BROADCASTER_CWD || DEFAULT_CONFIG.broadcasterCwd),
    simulationLogDir: path.resolve(cwd, env.SIMULATION_LOG_DIR || DEFAULT_CONFIG.simulationLogDir),
    trackDir: path.resolve(cwd, env.TRACK_DIR || DEFAULT_CONFIG.trackDir),
    playlistPollMs: readPositiveInt(env, 'PLAYLIST_POLL_MS', DEFAULT_CONFIG.playlistPollMs),
  };
}
