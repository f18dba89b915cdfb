import type { CommandRunner } from './exec.js';

export interface SignalOpts {
  /** Signal the whole process group led by `pid`, not just the leader. */
  group?: boolean;
}

export interface ProcessControl {
  readonly selfPid: number;
  /** Sends a signal. Returns false when delivery failed (usually: the process is gone). */
  signal(pid: number, signal?: NodeJS.Signals, opts?: SignalOpts): boolean;
  isAlive(pid: number): boolean;
  /** Best-effort SIGTERM to every process whose command line matches `pattern`. */
  sweep(pattern: string): void;
}

export class SystemProcessControl implements ProcessControl {
  readonly selfPid = process.pid;

  constructor(
    private readonly runner: CommandRunner,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  signal(pid: number, signal: NodeJS.Signals = 'SIGTERM', opts: SignalOpts = {}): boolean {
    if (opts.group && this.platform !== 'win32') {
      try {
        // Negative pid: every process in the group, so a watcher's children go with it
        process.kill(-pid, signal);
        return true;
      } catch {
        // Not a group leader; fall back to the process itself
      }
    }
    try {
      process.kill(pid, signal);
      return true;
    } catch {
      return false;
    }
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (err) {
      // EPERM: exists, owned by someone else
      return (err as NodeJS.ErrnoException).code === 'EPERM';
    }
  }

  sweep(pattern: string): void {
    // pkill exits 1 when nothing matched
    this.runner.capture('pkill', ['-f', pattern]);
  }
}
