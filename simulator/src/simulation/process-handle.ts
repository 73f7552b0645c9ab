import { spawn, type ChildProcess } from 'child_process';
import { LaunchError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Broadcaster');

/**
 * Control surface over a running broadcaster process.
 */
export interface ChildProcessHandle {
  readonly pid: number | undefined;

  /** Asks the broadcaster to quit by typing "q" on its stdin. */
  signalQuit(): void;

  /** SIGTERM */
  terminate(): void;

  /** SIGKILL */
  kill(): void;

  /** True once the process has exited. */
  poll(): boolean;
}

export interface ProcessLauncher {
  /**
   * Starts `command` and resolves once the process is running.
   * @throws LaunchError when the process cannot be spawned
   */
  launch(command: string, args: readonly string[], cwd: string): Promise<ChildProcessHandle>;
}

class NodeChildProcessHandle implements ChildProcessHandle {
  private exited = false;

  constructor(private readonly child: ChildProcess) {
    child.on('exit', (code, signal) => {
      this.exited = true;
      log.debug(`Process ${child.pid} exited (code: ${code}, signal: ${signal})`);
    });
    child.on('error', (error) => {
      log.error(`Process ${child.pid} error: ${error.message}`);
    });
    // Writing "q" to a process that already closed its stdin raises EPIPE
    child.stdin?.on('error', (error) => {
      log.debug(`stdin of ${child.pid} closed: ${error.message}`);
    });
  }

  public get pid(): number | undefined {
    return this.child.pid;
  }

  public signalQuit(): void {
    const stdin = this.child.stdin;
    if (!stdin || stdin.destroyed || stdin.writableEnded) return;
    stdin.end('q');
  }

  public terminate(): void {
    this.child.kill('SIGTERM');
  }

  public kill(): void {
    this.child.kill('SIGKILL');
  }

  public poll(): boolean {
    return this.exited || this.child.exitCode !== null || this.child.signalCode !== null;
  }
}

/**
 * Launches broadcasters with `child_process.spawn`. stdin is piped for the
 * quit keystroke; stdout and stderr are inherited so the broadcaster's own
 * progress output stays visible.
 */
export class NodeProcessLauncher implements ProcessLauncher {
  public launch(command: string, args: readonly string[], cwd: string): Promise<ChildProcessHandle> {
    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(command, [...args], { cwd, stdio: ['pipe', 'inherit', 'inherit'] });
      } catch (error) {
        reject(new LaunchError(command, { cause: error }));
        return;
      }

      const onSpawn = () => {
        child.off('error', onError);
        log.info(`Started ${command} ${args.join(' ')} (PID: ${child.pid})`);
        resolve(new NodeChildProcessHandle(child));
      };
      const onError = (error: Error) => {
        child.off('spawn', onSpawn);
        reject(new LaunchError(command, { cause: error }));
      };

      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }
}
