import type { LaunchHandle, LaunchSpec, LaunchStrategy, MonitorName, MonitorReport, MonitorStatus, Platform } from '../shared/types.js';
import { isMultiplexer } from '../shared/types.js';
import { LaunchUnavailableError } from '../shared/errors.js';
import type { Logger } from '../shared/log.js';
import type { CommandRunner, ToolProbe } from './exec.js';
import type { ProcessControl } from './signals.js';
import { monitorKey, type PidFileStore } from './pid-store.js';
import { createLauncher, selectLaunchStrategy, type MultiplexerPreference, type ProcessLauncher } from './launcher.js';
import { SCRIPTS, type AgentToolkit } from './toolkit.js';

export const MONITORS: readonly MonitorName[] = ['event_monitor', 'agent_monitor'];

export const DEFAULT_STATUS_POLL_SECONDS = 10;

export const MULTIPLEXER_ADVISORY = "NOTE: Install 'screen' or 'tmux' for better background process management.";

const STRATEGY_LABELS: Record<LaunchStrategy, string> = {
  screen: 'Starting event monitor in screen session...',
  tmux: 'Starting event monitor in tmux session...',
  background: 'Starting event monitor in background...',
  'windows-console': 'Starting event monitoring in a new window...',
};

export interface MonitorSupervisorOpts {
  cwd: string;
  platform: Platform;
  probe: ToolProbe;
  runner: CommandRunner;
  processes: ProcessControl;
  store: PidFileStore;
  toolkit: AgentToolkit;
  logger: Logger;
  preference?: MultiplexerPreference;
  statusPollSeconds?: number;
  sweepStale?: boolean;
}

/**
 * Owns the event watcher and the status poller: clears whatever an earlier
 * run left behind, picks one launch strategy, starts the monitors under it and
 * records their pids.
 */
export class MonitorSupervisor {
  private readonly launchers = new Map<LaunchStrategy, ProcessLauncher>();

  constructor(private readonly opts: MonitorSupervisorOpts) {}

  start(): MonitorReport {
    const { logger, platform } = this.opts;

    const stale = this.killStale();

    const strategy = selectLaunchStrategy(platform, this.opts.probe, this.opts.preference);
    if (strategy === null) {
      const err = new LaunchUnavailableError(this.opts.toolkit.displayCommand(SCRIPTS.watch));
      logger.warn(`Warning: ${err.message}.`);
      logger.info(`Please open a new terminal and run: ${err.fallbackCommand}`);
      return { strategy: null, launched: [], stale, advisory: false };
    }

    const launcher = this.launcherFor(strategy);
    logger.info(STRATEGY_LABELS[strategy]);

    const launched: LaunchHandle[] = [];
    const watcher = this.launchOne(launcher, this.watcherSpec());
    if (watcher) launched.push(watcher);

    if (isMultiplexer(strategy)) {
      const poller = this.launchOne(launcher, this.pollerSpec());
      if (poller) launched.push(poller);
    }

    const advisory = platform !== 'win32' && !isMultiplexer(strategy);
    if (advisory) logger.warn(MULTIPLEXER_ADVISORY);

    return { strategy, launched, stale, advisory };
  }

  /** Terminates recorded monitors and any session still carrying a monitor name. */
  stop(): number[] {
    // Sessions first: quitting a session takes the whole pane tree down with it
    this.clearSessions();
    return this.terminateRecorded();
  }

  status(): MonitorStatus[] {
    return MONITORS.map(name => {
      const pid = this.opts.store.read(monitorKey(name));
      return { name, pid, alive: pid !== null && this.opts.processes.isAlive(pid) };
    });
  }

  watcherSpec(): LaunchSpec {
    const { command, args } = this.opts.toolkit.command(SCRIPTS.watch);
    return { name: 'event_monitor', command, args };
  }

  pollerSpec(): LaunchSpec {
    const seconds = this.opts.statusPollSeconds ?? DEFAULT_STATUS_POLL_SECONDS;
    const { command, args } = this.opts.toolkit.command(SCRIPTS.status, ['list']);
    return { name: 'agent_monitor', command: 'watch', args: ['-n', String(seconds), command, ...args] };
  }

  private killStale(): number[] {
    this.clearSessions();
    const stale = this.terminateRecorded();
    if (this.opts.platform === 'win32') return stale;

    // Catches watchers whose record was lost
    if (this.opts.sweepStale ?? true) {
      this.opts.processes.sweep(this.watcherSpec().command);
    }
    return stale;
  }

  private terminateRecorded(): number[] {
    const stopped: number[] = [];
    for (const name of MONITORS) {
      // Monitors lead their own process group (detached child or multiplexer pane)
      const pid = this.opts.store.terminateAndClear(monitorKey(name), { group: true });
      if (pid !== null) stopped.push(pid);
    }
    return stopped;
  }

  private clearSessions(): void {
    if (this.opts.platform === 'win32') return;
    for (const strategy of ['screen', 'tmux'] as const) {
      if (!this.opts.probe.has(strategy)) continue;
      const launcher = this.launcherFor(strategy);
      for (const name of MONITORS) launcher.clear(name);
    }
  }

  private launchOne(launcher: ProcessLauncher, spec: LaunchSpec): LaunchHandle | null {
    try {
      const handle = launcher.launch(spec);
      if (handle.pid !== null) {
        this.opts.store.write(monitorKey(spec.name), handle.pid);
      }
      return handle;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.opts.logger.warn(`Warning: could not start ${spec.name}: ${message}`);
      return null;
    }
  }

  private launcherFor(strategy: LaunchStrategy): ProcessLauncher {
    let launcher = this.launchers.get(strategy);
    if (!launcher) {
      const { runner, cwd } = this.opts;
      launcher = createLauncher(strategy, { runner, cwd });
      this.launchers.set(strategy, launcher);
    }
    return launcher;
  }
}
