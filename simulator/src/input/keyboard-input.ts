import * as readline from 'readline';
import { createLogger } from '../utils/logger.js';
import { commandForKey, type InputSource, type PlaylistCommand } from './input-source.js';

const log = createLogger('Keyboard');

export type KeyboardStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

interface Keypress {
  name?: string;
  ctrl?: boolean;
}

/**
 * Single-keystroke reader over a terminal. Keys are queued as they arrive
 * and handed out one per `next()` call.
 *
 * n = next simulation, p = previous simulation, q / Ctrl+C = quit
 */
export class KeyboardInputSource implements InputSource {
  private readonly pending: PlaylistCommand[] = [];
  private readonly stream: KeyboardStream;
  private rawMode = false;
  private closed = false;

  private readonly onKeypress = (str: string | undefined, key: Keypress | undefined) => {
    const command = key?.ctrl && key.name === 'c' ? 'quit' : commandForKey(str ?? key?.name ?? '');
    if (command === 'none') return;
    log.debug(`Key ${str ?? key?.name} -> ${command}`);
    this.pending.push(command);
  };

  constructor(stream: KeyboardStream = process.stdin) {
    this.stream = stream;
    readline.emitKeypressEvents(stream);
    if (stream.isTTY && stream.setRawMode) {
      stream.setRawMode(true);
      this.rawMode = true;
    }
    stream.on('keypress', this.onKeypress);
    stream.resume();
  }

  public next(): PlaylistCommand {
    return this.pending.shift() ?? 'none';
  }

  /**
   * Stops listening and gives the terminal back its line mode.
   */
  public close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stream.removeListener('keypress', this.onKeypress);
    if (this.rawMode && this.stream.setRawMode) {
      this.stream.setRawMode(false);
    }
    this.stream.pause();
  }
}
