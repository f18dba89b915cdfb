import { loadConfig, type Config } from '../shared/config.js';
import { createLogger, type Logger } from '../shared/log.js';
import { runDir } from '../shared/paths.js';
import type { Platform } from '../shared/types.js';
import { detectPlatform, PathProbe, SystemRunner, type CommandRunner, type ToolProbe } from '../supervisor/exec.js';
import { SystemProcessControl, type ProcessControl } from '../supervisor/signals.js';
import { FilePidStore, type PidFileStore } from '../supervisor/pid-store.js';
import { AgentToolkit } from '../supervisor/toolkit.js';
import { MonitorSupervisor } from '../supervisor/monitor.js';
import { HeartbeatScheduler } from '../supervisor/heartbeat.js';

export interface NexusContext {
  cwd: string;
  config: Config;
  logger: Logger;
  platform: Platform;
  probe: ToolProbe;
  runner: CommandRunner;
  processes: ProcessControl;
  store: PidFileStore;
  toolkit: AgentToolkit;
  supervisor: MonitorSupervisor;
  heartbeat: HeartbeatScheduler;
}

export function createContext(cwd: string = process.cwd(), overrides: Partial<Config> = {}): NexusContext {
  const config: Config = { ...loadConfig(cwd), ...overrides };
  const logger = createLogger({ level: config.logLevel });
  const platform = detectPlatform();
  const probe = new PathProbe();
  const runner = new SystemRunner();
  const processes = new SystemProcessControl(runner);
  const store = new FilePidStore(runDir(cwd), processes, logger);
  const toolkit = new AgentToolkit({ cwd, scriptsDir: config.scriptsDir, platform, runner, probe });

  const supervisor = new MonitorSupervisor({
    cwd,
    platform,
    probe,
    runner,
    processes,
    store,
    toolkit,
    logger,
    preference: config.multiplexer,
    statusPollSeconds: config.statusPollSeconds,
    sweepStale: config.sweepStaleMonitors,
  });

  const heartbeat = new HeartbeatScheduler({
    store,
    reporter: toolkit,
    intervalMs: config.heartbeatIntervalSeconds * 1000,
    logger,
  });

  return { cwd, config, logger, platform, probe, runner, processes, store, toolkit, supervisor, heartbeat };
}

/** Stops every heartbeat on SIGINT/SIGTERM so records don't outlive the process. */
export function stopHeartbeatsOnExit(ctx: NexusContext): void {
  const shutdown = () => {
    if (ctx.heartbeat.stopAll().length > 0) ctx.logger.info('Heartbeat stopped.');
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}
