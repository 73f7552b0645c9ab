export type PlaylistCommand = 'next' | 'prev' | 'quit' | 'none';

/**
 * Non-blocking source of operator commands. `next()` hands out at most one
 * pending command per call and `none` when nothing is pending.
 */
export interface InputSource {
  next(): PlaylistCommand;
  close?(): void;
}

const KEY_COMMANDS = new Map<string, PlaylistCommand>([
  ['n', 'next'],
  ['p', 'prev'],
  ['q', 'quit'],
]);

export function commandForKey(key: string): PlaylistCommand {
  return KEY_COMMANDS.get(key.toLowerCase()) ?? 'none';
}

/**
 * Replays a fixed list of commands, then reports `none` forever.
 */
export class ScriptedInputSource implements InputSource {
  private readonly commands: PlaylistCommand[];

  constructor(commands: readonly PlaylistCommand[]) {
    this.commands = [...commands];
  }

  public next(): PlaylistCommand {
    return this.commands.shift() ?? 'none';
  }

  public remaining(): number {
    return this.commands.length;
  }
}

/**
 * Parses "n,n,p,q" style command lists; `-` stands for a tick with no key.
 */
export function parseCommandScript(script: string): PlaylistCommand[] {
  return script
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token !== '')
    .map((token) => (token === '-' ? 'none' : commandForKey(token)));
}
