/**
 * Simulation Playlist
 * ===================
 * Plays queued broadcaster runs one at a time:
 * - n / p / q from the InputSource move forward, back or quit
 * - a run that finishes on its own advances to the next
 * - every ended run is appended to the playlist log
 */

import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import { LaunchError, LogWriteError, type ShutdownError } from '../errors.js';
import type { InputSource } from '../input/input-source.js';
import { createLogger } from '../utils/logger.js';
import type { ProcessLauncher } from './process-handle.js';
import { formatRunRecord, type RunLogSink } from './run-log.js';
import { SimulationRun } from './simulation-run.js';
import type { SimulationSpec } from './spec.js';

const log = createLogger('Playlist');

export const DEFAULT_POLL_INTERVAL_MS = 100;

export interface PlaylistOptions {
  input: InputSource;
  launcher: ProcessLauncher;
  logSink: RunLogSink;
  command: string;
  cwd: string;
  pollIntervalMs?: number;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  shutdownStepMs?: number;
}

export interface PlaylistSummary {
  runs: SimulationRun[];          // every run that ended, in order
  launchErrors: LaunchError[];
  logErrors: LogWriteError[];
  shutdownErrors: ShutdownError[];  // broadcasters left running
}

/**
 * Plays an ordered list of simulations one at a time, letting the operator
 * skip forward, go back or quit from the InputSource.
 *
 * Events:
 * - 'runStarted': (run: SimulationRun, index: number)
 * - 'runEnded': (run: SimulationRun, index: number)
 * - 'runLogged': (run: SimulationRun, record: string)
 * - 'launchFailed': (run: SimulationRun, error: LaunchError)
 * - 'logFailed': (run: SimulationRun, error: LogWriteError)
 * - 'shutdownFailed': (run: SimulationRun, error: ShutdownError)
 * - 'notice': (message: string)
 */
export class Playlist extends EventEmitter {
  private readonly specs: readonly SimulationSpec[];
  private readonly slots: (SimulationRun | null)[];
  private readonly options: PlaylistOptions;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly pollIntervalMs: number;

  private currentIndex: number | null = null;
  private started = false;
  private stopRequested = false;
  private readonly finished: SimulationRun[] = [];
  private readonly launchErrors: LaunchError[] = [];
  private readonly logErrors: LogWriteError[] = [];
  private readonly shutdownErrors: ShutdownError[] = [];

  constructor(specs: readonly SimulationSpec[], options: PlaylistOptions) {
    super();
    this.specs = [...specs];
    this.slots = this.specs.map(() => null);
    this.options = options;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  public get length(): number {
    return this.specs.length;
  }

  public getCurrentIndex(): number | null {
    return this.currentIndex;
  }

  public getCurrentRun(): SimulationRun | null {
    return this.currentIndex === null ? null : this.slots[this.currentIndex] ?? null;
  }

  /**
   * Makes the loop behave as if "quit" was pressed on its next check.
   */
  public requestStop(): void {
    this.stopRequested = true;
  }

  /**
   * Plays the playlist until the operator quits or the last simulation
   * finishes on its own.
   */
  public async run(): Promise<PlaylistSummary> {
    if (this.started) {
      throw new Error('Playlist has already been played');
    }
    this.started = true;

    if (this.specs.length === 0) {
      this.notice('Playlist is empty');
      return this.summary();
    }

    await this.switchTo(0);

    while (this.currentIndex !== null && this.currentIndex < this.specs.length) {
      const index: number = this.currentIndex;
      const running = this.getCurrentRun()?.isRunning() ?? false;
      const command = this.stopRequested ? 'quit' : this.options.input.next();
      const isLast = index >= this.specs.length - 1;

      if (command === 'quit' || (!running && isLast)) {
        await this.finishCurrent();
        break;
      } else if (command === 'next' || !running) {
        await this.switchTo(index + 1);
      } else if (command === 'prev') {
        await this.switchTo(index - 1);
      }

      await this.sleep(this.pollIntervalMs);
    }

    log.info('Simulation set ending...');
    this.currentIndex = null;
    return this.summary();
  }

  /**
   * Ends and logs the current simulation, then starts the one at
   * `newIndex`. Out-of-range indexes leave everything as it is. When the
   * current broadcaster cannot be stopped nothing new is started and the
   * playlist stops.
   *
   * @returns false when no simulation was started
   */
  public async switchTo(newIndex: number): Promise<boolean> {
    if (newIndex < 0) {
      this.notice('Already on first simulation');
      return false;
    }
    if (newIndex >= this.specs.length) {
      this.notice('Already on last simulation');
      return false;
    }

    await this.finishCurrent();
    if (this.getCurrentRun()?.getShutdownError()) {
      this.notice('Previous broadcaster is still running, stopping the playlist');
      this.requestStop();
      return false;
    }

    const run = new SimulationRun(this.specs[newIndex], {
      launcher: this.options.launcher,
      command: this.options.command,
      cwd: this.options.cwd,
      clock: this.options.clock,
      sleep: this.options.sleep,
      shutdownStepMs: this.options.shutdownStepMs,
    });
    this.slots[newIndex] = run;
    this.currentIndex = newIndex;

    try {
      await run.run();
    } catch (error) {
      if (!(error instanceof LaunchError)) throw error;
      log.error(`Simulation ${newIndex + 1}/${this.specs.length} failed to launch: ${error.message}`);
      this.launchErrors.push(error);
      this.finished.push(run);
      this.emit('launchFailed', run, error);
      return true;
    }

    log.info(`Simulation ${newIndex + 1}/${this.specs.length} running (${run.id})`);
    this.emit('runStarted', run, newIndex);
    return true;
  }

  private async finishCurrent(): Promise<void> {
    const index = this.currentIndex;
    const run = this.getCurrentRun();
    // Runs that never launched were settled in switchTo()
    if (index === null || !run || run.getLaunchError() || run.getStatus() === 'idle') return;
    if (this.finished.includes(run)) return;

    await run.end();
    this.finished.push(run);
    this.emit('runEnded', run, index);
    const shutdownError = run.getShutdownError();
    if (shutdownError) {
      this.shutdownErrors.push(shutdownError);
      this.emit('shutdownFailed', run, shutdownError);
    }
    await this.logRun(run);
  }

  private async logRun(run: SimulationRun): Promise<void> {
    try {
      const record = await formatRunRecord(run);
      await this.options.logSink.append(record);
      this.emit('runLogged', run, record);
    } catch (error) {
      if (!(error instanceof LogWriteError)) throw error;
      log.error(error.message);
      this.logErrors.push(error);
      this.emit('logFailed', run, error);
    }
  }

  private notice(message: string): void {
    log.info(message);
    this.emit('notice', message);
  }

  private summary(): PlaylistSummary {
    return {
      runs: [...this.finished],
      launchErrors: [...this.launchErrors],
      logErrors: [...this.logErrors],
      shutdownErrors: [...this.shutdownErrors],
    };
  }
}
