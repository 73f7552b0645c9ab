/**
 * Simulation Run
 * ==============
 * Lifecycle of one broadcaster process, from launch to the escalating
 * quit -> SIGTERM -> SIGKILL shutdown.
 */

import { setTimeout as delay } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { LaunchError, ShutdownError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { ChildProcessHandle, ProcessLauncher } from './process-handle.js';
import { buildBroadcasterArgs, describeSpec, type SimulationSpec } from './spec.js';

const log = createLogger('Simulation');

export type RunStatus = 'idle' | 'running' | 'ended';

/** Settle time after each shutdown step (quit, terminate, kill). */
export const SHUTDOWN_STEP_MS = 1000;

/** Quit/terminate/kill rounds tried before the process is given up on. */
export const MAX_SHUTDOWN_ROUNDS = 3;

export interface SimulationRunOptions {
  launcher: ProcessLauncher;
  command: string;
  cwd: string;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  shutdownStepMs?: number;
}

/**
 * One broadcast of a SimulationSpec. Moves idle -> running -> ended and is
 * never restarted; playing the same spec again takes a new run.
 */
export class SimulationRun {
  public readonly id: string = uuidv4();
  public readonly spec: SimulationSpec;

  private status: RunStatus = 'idle';
  private handle: ChildProcessHandle | null = null;
  private startTime: Date | null = null;
  private endTime: Date | null = null;
  private launchError: LaunchError | null = null;
  private shutdownError: ShutdownError | null = null;

  private readonly launcher: ProcessLauncher;
  private readonly command: string;
  private readonly cwd: string;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly shutdownStepMs: number;

  constructor(spec: SimulationSpec, options: SimulationRunOptions) {
    this.spec = spec;
    this.launcher = options.launcher;
    this.command = options.command;
    this.cwd = options.cwd;
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.shutdownStepMs = options.shutdownStepMs ?? SHUTDOWN_STEP_MS;
  }

  /**
   * Starts the broadcaster for this run's spec
   * @throws LaunchError when the broadcaster cannot be started; the run is ended
   */
  public async run(): Promise<void> {
    if (this.status !== 'idle') {
      throw new Error(`Simulation ${this.id} was already started`);
    }

    this.startTime = this.clock();
    log.info(`Starting ${describeSpec(this.spec)}`);

    try {
      this.handle = await this.launcher.launch(this.command, buildBroadcasterArgs(this.spec), this.cwd);
    } catch (error) {
      this.launchError = error instanceof LaunchError ? error : new LaunchError(this.command, { cause: error });
      this.endTime = this.clock();
      this.status = 'ended';
      throw this.launchError;
    }

    this.status = 'running';
  }

  /**
   * Stops the broadcaster: "q" on stdin, then SIGTERM, then SIGKILL, with a
   * settle time after each step. Does nothing unless the run is running.
   *
   * A process still alive after MAX_SHUTDOWN_ROUNDS is released and recorded
   * as a ShutdownError; the run ends either way.
   */
  public async end(): Promise<void> {
    const handle = this.handle;
    if (this.status !== 'running' || !handle) return;

    let rounds = 0;
    while (!handle.poll() && rounds < MAX_SHUTDOWN_ROUNDS) {
      rounds++;
      log.info('Quitting simulation...');
      handle.signalQuit();
      await this.sleep(this.shutdownStepMs);

      if (!handle.poll()) {
        log.info('Terminating subprocess...');
        handle.terminate();
        await this.sleep(this.shutdownStepMs);
      }
      if (!handle.poll()) {
        log.info('Killing subprocess...');
        handle.kill();
        await this.sleep(this.shutdownStepMs);
      }
    }

    if (!handle.poll()) {
      this.shutdownError = new ShutdownError(handle.pid, rounds);
      log.error(`${this.shutdownError.message}, releasing it`);
    }

    this.endTime = this.clock();
    this.handle = null;
    this.status = 'ended';
    log.info('Subprocess closed.');
  }

  /**
   * True while the broadcaster process is alive.
   */
  public isRunning(): boolean {
    return this.handle !== null && !this.handle.poll();
  }

  public getStatus(): RunStatus {
    return this.status;
  }

  public getStartTime(): Date | null {
    return this.startTime;
  }

  public getEndTime(): Date | null {
    return this.endTime;
  }

  public getLaunchError(): LaunchError | null {
    return this.launchError;
  }

  /**
   * Set when `end()` gave up on a process that would not exit.
   */
  public getShutdownError(): ShutdownError | null {
    return this.shutdownError;
  }

  /**
   * Seconds between start and end, or null until the run has ended.
   */
  public getElapsedSeconds(): number | null {
    if (!this.startTime || !this.endTime) return null;
    return (this.endTime.getTime() - this.startTime.getTime()) / 1000;
  }
}
