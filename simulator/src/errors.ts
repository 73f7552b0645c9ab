/**
 * Error kinds raised by route preparation and playlist playback. Every error
 * carries a stable `code`.
 */

export type TrackbeamErrorCode =
  | 'NO_ROUTE_FOUND'
  | 'INVALID_SEGMENT'
  | 'INVALID_ROUTE'
  | 'PROVIDER_ERROR'
  | 'LAUNCH_FAILED'
  | 'SHUTDOWN_FAILED'
  | 'LOG_WRITE_FAILED'
  | 'INVALID_PLAYLIST'
  | 'IMPORT_FAILED';

export class TrackbeamError extends Error {
  public readonly code: TrackbeamErrorCode;

  constructor(code: TrackbeamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NoRouteFoundError extends TrackbeamError {
  constructor(message = 'No routes between start and end points, try new points') {
    super('NO_ROUTE_FOUND', message);
  }
}

/**
 * A segment is too short to hold a single interpolated point at the
 * requested speed/frequency.
 */
export class InvalidSegmentError extends TrackbeamError {
  public readonly segmentIndex: number;
  public readonly distance: number;
  public readonly pointsNeeded: number;

  constructor(segmentIndex: number, distance: number, pointsNeeded: number) {
    super(
      'INVALID_SEGMENT',
      `Segment ${segmentIndex} (${distance} m) is too short for the requested density: ${pointsNeeded} points`,
    );
    this.segmentIndex = segmentIndex;
    this.distance = distance;
    this.pointsNeeded = pointsNeeded;
  }
}

export class InvalidRouteError extends TrackbeamError {
  constructor(message: string) {
    super('INVALID_ROUTE', message);
  }
}

export class ProviderError extends TrackbeamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROVIDER_ERROR', message, options);
  }
}

export class LaunchError extends TrackbeamError {
  public readonly command: string;

  constructor(command: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('LAUNCH_FAILED', `Failed to launch ${command}${reason}`, options);
    this.command = command;
  }
}

/**
 * The broadcaster outlived every quit/terminate/kill round.
 */
export class ShutdownError extends TrackbeamError {
  public readonly pid: number | undefined;

  constructor(pid: number | undefined, rounds: number) {
    super('SHUTDOWN_FAILED', `Process ${pid ?? 'unknown'} did not exit after ${rounds} shutdown rounds`);
    this.pid = pid;
  }
}

export class LogWriteError extends TrackbeamError {
  public readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('LOG_WRITE_FAILED', `Failed to write simulation log ${path}${reason}`, options);
    this.path = path;
  }
}

export class InvalidPlaylistError extends TrackbeamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_PLAYLIST', message, options);
  }
}

export class ImportError extends TrackbeamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IMPORT_FAILED', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
