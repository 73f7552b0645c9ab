import * as fs from 'fs/promises';
import * as path from 'path';
import { LogWriteError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { SimulationRun } from './simulation-run.js';
import { describeSpec } from './spec.js';

const log = createLogger('RunLog');

/** Rows per second in the user motion files the broadcaster plays. */
export const TRACK_ROWS_PER_SECOND = 10;

/**
 * Append-only destination of playlist log records.
 */
export interface RunLogSink {
  readonly location: string;
  append(record: string): Promise<void>;
}

/**
 * `YYYY-MM-DD,HH:MM:SS` in UTC
 */
export function formatLogTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ',');
}

/**
 * First `count` lines of a file, line terminators kept.
 */
export async function readLeadingLines(filePath: string, count: number): Promise<string[]> {
  if (count <= 0) return [];
  const content = await fs.readFile(filePath, 'utf-8');
  const lines = content.split(/(?<=\n)/).filter((line) => line !== '');
  return lines.slice(0, count).map((line) => (line.endsWith('\n') ? line : `${line}\n`));
}

/**
 * Number of track rows broadcast during `elapsedMs`.
 */
export function trackRowsForElapsed(elapsedMs: number): number {
  return Math.max(0, Math.floor((elapsedMs * TRACK_ROWS_PER_SECOND) / 1000));
}

/**
 * Renders the log record of a finished run. For a dynamic run the rows the
 * broadcaster played are copied from the track file; they are always taken
 * from the top of the file, whatever part of it the broadcaster consumed.
 *
 * @throws LogWriteError when the track file cannot be read
 */
export async function formatRunRecord(run: SimulationRun): Promise<string> {
  const startTime = run.getStartTime();
  const endTime = run.getEndTime();
  if (!startTime || !endTime) {
    throw new Error(`Simulation ${run.id} has not finished`);
  }

  let record = `${describeSpec(run.spec)}\n`;
  record += `Start Time: ${formatLogTimestamp(startTime)}\n`;

  const spec = run.spec;
  if (spec.kind === 'dynamic') {
    const rows = trackRowsForElapsed(endTime.getTime() - startTime.getTime());
    let lines: string[];
    try {
      lines = await readLeadingLines(spec.trackFile, rows);
    } catch (error) {
      throw new LogWriteError(spec.trackFile, { cause: error });
    }
    if (lines.length < rows) {
      log.warn(`${spec.trackFile} has ${lines.length} rows, ${rows} were broadcast`);
    }
    record += lines.join('');
  }

  record += `End Time: ${formatLogTimestamp(endTime)}\n\n`;
  return record;
}

/**
 * Playlist log file, named by the time the playlist was created:
 * playlist_<UTC timestamp>.log
 */
export class FileRunLog implements RunLogSink {
  public readonly location: string;

  constructor(logDir: string, createdAt: Date = new Date()) {
    const stamp = createdAt.toISOString().replace(/:/g, '-').replace(/\..+/, '');
    this.location = path.join(logDir, `playlist_${stamp}.log`);
  }

  public async append(record: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.location), { recursive: true });
      await fs.appendFile(this.location, record, 'utf-8');
    } catch (error) {
      throw new LogWriteError(this.location, { cause: error });
    }
  }
}
