import type { MultiplexerStrategy } from '../shared/types.js';
import type { CommandRunner } from './exec.js';

export interface Multiplexer {
  readonly strategy: MultiplexerStrategy;
  /** Starts a detached session. Returns false when the multiplexer refused. */
  newSession(name: string, command: string, args: string[]): boolean;
  /** Pids of the processes hosted by every session called `name`. */
  sessionPids(name: string): number[];
  killSession(name: string): void;
}

export function shellQuote(s: string): string {
  return `'${s.replace(/'/g, "'\\''")}'`;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class ScreenMultiplexer implements Multiplexer {
  readonly strategy = 'screen';

  constructor(private readonly runner: CommandRunner) {}

  newSession(name: string, command: string, args: string[]): boolean {
    return this.runner.capture('screen', ['-dmS', name, command, ...args]) !== null;
  }

  sessionPids(name: string): number[] {
    // `screen -ls` exits non-zero even when it lists sessions
    const output = this.runner.capture('screen', ['-ls', name], { anyExit: true });
    if (!output) return [];
    const pattern = new RegExp(`^\\s*(\\d+)\\.${escapeRegExp(name)}\\s`);
    const pids: number[] = [];
    for (const line of output.split('\n')) {
      const match = pattern.exec(line);
      if (match?.[1]) pids.push(parseInt(match[1], 10));
    }
    return pids;
  }

  killSession(name: string): void {
    // screen allows duplicate names; address each one by pid.name
    for (const pid of this.sessionPids(name)) {
      this.runner.capture('screen', ['-S', `${pid}.${name}`, '-X', 'quit']);
    }
  }
}

export class TmuxMultiplexer implements Multiplexer {
  readonly strategy = 'tmux';

  constructor(private readonly runner: CommandRunner) {}

  newSession(name: string, command: string, args: string[]): boolean {
    const line = [command, ...args].map(shellQuote).join(' ');
    return this.runner.capture('tmux', ['new-session', '-d', '-s', name, line]) !== null;
  }

  sessionPids(name: string): number[] {
    const output = this.runner.capture('tmux', ['list-panes', '-t', `=${name}`, '-F', '#{pane_pid}']);
    if (!output) return [];
    return output
      .split('\n')
      .map(line => parseInt(line.trim(), 10))
      .filter(pid => Number.isInteger(pid) && pid > 0);
  }

  killSession(name: string): void {
    this.runner.capture('tmux', ['kill-session', '-t', `=${name}`]);
  }
}
