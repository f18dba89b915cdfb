import type { LaunchHandle, LaunchSpec, LaunchStrategy, MonitorName, Platform } from '../shared/types.js';
import type { Config } from '../shared/config.js';
import type { CommandRunner, ToolProbe } from './exec.js';
import { ScreenMultiplexer, TmuxMultiplexer, type Multiplexer } from './multiplexer.js';

export type MultiplexerPreference = Config['multiplexer'];

/**
 * Picks the launch strategy for this run. Windows gets a console window or
 * nothing; Unix prefers screen, then tmux, then a plain detached process.
 * A preference only reorders or disables multiplexers that are installed.
 */
export function selectLaunchStrategy(
  platform: Platform,
  probe: ToolProbe,
  preference: MultiplexerPreference = 'auto',
): LaunchStrategy | null {
  if (platform === 'win32') {
    return probe.has('cmd') ? 'windows-console' : null;
  }

  if (preference === 'none') return 'background';

  const order: LaunchStrategy[] = preference === 'tmux' ? ['tmux', 'screen'] : ['screen', 'tmux'];
  for (const tool of order) {
    if (probe.has(tool)) return tool;
  }
  return 'background';
}

export interface ProcessLauncher {
  readonly strategy: LaunchStrategy;
  /** Throws when the task could not be started. */
  launch(spec: LaunchSpec): LaunchHandle;
  /** Tears down anything left under `name` by an earlier run that records don't cover. */
  clear(name: MonitorName): void;
}

export class MultiplexerLauncher implements ProcessLauncher {
  constructor(private readonly mux: Multiplexer) {}

  get strategy(): LaunchStrategy {
    return this.mux.strategy;
  }

  launch(spec: LaunchSpec): LaunchHandle {
    if (!this.mux.newSession(spec.name, spec.command, spec.args)) {
      throw new Error(`${this.mux.strategy} refused to start session ${spec.name}`);
    }
    const [pid] = this.mux.sessionPids(spec.name);
    return { strategy: this.mux.strategy, name: spec.name, session: spec.name, pid: pid ?? null };
  }

  clear(name: MonitorName): void {
    this.mux.killSession(name);
  }
}

abstract class DetachedLauncher implements ProcessLauncher {
  abstract readonly strategy: 'background' | 'windows-console';

  constructor(
    protected readonly runner: CommandRunner,
    protected readonly cwd: string,
  ) {}

  abstract launch(spec: LaunchSpec): LaunchHandle;

  clear(_name: MonitorName): void {
    // Detached processes are only known through their pid records
  }
}

export class BackgroundLauncher extends DetachedLauncher {
  readonly strategy = 'background';

  launch(spec: LaunchSpec): LaunchHandle {
    const pid = this.runner.spawnDetached(spec.command, spec.args, { cwd: this.cwd });
    if (pid === null) throw new Error(`Failed to start ${spec.command}`);
    return { strategy: this.strategy, name: spec.name, pid };
  }
}

export class WindowsConsoleLauncher extends DetachedLauncher {
  readonly strategy = 'windows-console';

  launch(spec: LaunchSpec): LaunchHandle {
    // The empty argument reaches cmd as "" and becomes start's window title;
    // an unquoted name would be taken for the program to run
    const pid = this.runner.spawnDetached('cmd.exe', ['/c', 'start', '', spec.command, ...spec.args], { cwd: this.cwd });
    if (pid === null) throw new Error('Failed to open a console window');
    // cmd.exe exits as soon as the window opens, so its pid names nothing worth recording
    return { strategy: this.strategy, name: spec.name, pid: null };
  }
}

export interface LauncherDeps {
  runner: CommandRunner;
  cwd: string;
}

export function createLauncher(strategy: LaunchStrategy, deps: LauncherDeps): ProcessLauncher {
  switch (strategy) {
    case 'screen':
      return new MultiplexerLauncher(new ScreenMultiplexer(deps.runner));
    case 'tmux':
      return new MultiplexerLauncher(new TmuxMultiplexer(deps.runner));
    case 'background':
      return new BackgroundLauncher(deps.runner, deps.cwd);
    case 'windows-console':
      return new WindowsConsoleLauncher(deps.runner, deps.cwd);
  }
}
