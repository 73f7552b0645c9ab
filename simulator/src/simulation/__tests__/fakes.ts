import { LaunchError } from '../../errors.js';
import type { ChildProcessHandle, ProcessLauncher } from '../process-handle.js';

export type ExitStep = 'quit' | 'terminate' | 'kill' | 'never';

/**
 * In-memory broadcaster. Dies on the configured shutdown step, or when
 * exit() is called.
 */
export class FakeHandle implements ChildProcessHandle {
  public readonly pid = 4242;
  public quits = 0;
  public terminates = 0;
  public kills = 0;
  private alive = true;

  constructor(private readonly exitOn: ExitStep = 'quit') {}

  public signalQuit(): void {
    this.quits++;
    if (this.exitOn === 'quit') this.alive = false;
  }

  public terminate(): void {
    this.terminates++;
    if (this.exitOn === 'terminate') this.alive = false;
  }

  public kill(): void {
    this.kills++;
    if (this.exitOn === 'kill') this.alive = false;
  }

  public exit(): void {
    this.alive = false;
  }

  public poll(): boolean {
    return !this.alive;
  }
}

export interface LaunchCall {
  command: string;
  args: readonly string[];
  cwd: string;
  handle: FakeHandle;
}

export class FakeLauncher implements ProcessLauncher {
  public readonly calls: LaunchCall[] = [];
  /** Launch attempts (0-based) that fail. */
  public readonly failing = new Set<number>();
  private attempts = 0;

  constructor(private readonly exitOn: ExitStep = 'quit') {}

  public async launch(command: string, args: readonly string[], cwd: string): Promise<ChildProcessHandle> {
    const attempt = this.attempts++;
    if (this.failing.has(attempt)) {
      throw new LaunchError(command, { cause: new Error('spawn ENOENT') });
    }
    const handle = new FakeHandle(this.exitOn);
    this.calls.push({ command, args, cwd, handle });
    return handle;
  }

  public lastHandle(): FakeHandle {
    const call = this.calls[this.calls.length - 1];
    if (!call) throw new Error('nothing launched');
    return call.handle;
  }
}

/**
 * Clock that returns the given instants in order and then keeps returning
 * the last one.
 */
export function sequenceClock(...isoTimes: string[]): () => Date {
  let i = 0;
  return () => {
    const time = isoTimes[Math.min(i, isoTimes.length - 1)];
    i++;
    return new Date(time ?? 0);
  };
}

export const noSleep = async (): Promise<void> => {};

/**
 * Clock that advances `stepMs` on every call, starting at `isoStart`.
 */
export function steppingClock(isoStart: string, stepMs: number): () => Date {
  const start = new Date(isoStart).getTime();
  let calls = 0;
  return () => new Date(start + stepMs * calls++);
}
