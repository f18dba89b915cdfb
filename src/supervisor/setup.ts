import type { AgentIdentity, MonitorReport, Platform } from '../shared/types.js';
import type { Logger } from '../shared/log.js';
import { scriptsPath } from '../shared/paths.js';
import type { RunResult, ToolProbe } from './exec.js';
import { checkDependencies } from './dependencies.js';
import { ensureDirectories, initializeFiles, makeScriptsExecutable } from './workspace.js';
import type { MonitorSupervisor } from './monitor.js';
import type { HeartbeatHandle, HeartbeatScheduler } from './heartbeat.js';
import type { AgentToolkit } from './toolkit.js';
import { quickReference } from './reference.js';

const PLATFORM_LABELS: Record<Platform, string> = {
  linux: 'Linux',
  darwin: 'macOS',
  win32: 'Windows',
};

export const READY_NOTE = 'Starting up and ready for collaboration';

export interface SetupDeps {
  cwd: string;
  scriptsDir: string;
  platform: Platform;
  probe: ToolProbe;
  logger: Logger;
  toolkit: AgentToolkit;
  supervisor: MonitorSupervisor;
  heartbeat: HeartbeatScheduler;
}

export interface SetupOpts {
  /** Asked at step 5, after the workspace is ready. */
  identity: () => Promise<AgentIdentity>;
  monitor?: boolean;
  heartbeat?: boolean;
  /** Runs just before the heartbeat writes its record, e.g. to install exit handlers. */
  beforeHeartbeat?: () => void;
}

export interface SetupResult {
  identity: AgentIdentity;
  monitors: MonitorReport | null;
  heartbeat: HeartbeatHandle | null;
}

/**
 * Brings one agent into the shared workspace: dependencies, files, identity,
 * monitors, registration, heartbeat, welcome message and snapshot. Only a
 * missing dependency or a rejected identity stops it; collaborator failures
 * are reported and skipped.
 */
export class SetupOrchestrator {
  constructor(private readonly deps: SetupDeps) {}

  async run(opts: SetupOpts): Promise<SetupResult> {
    const { cwd, platform, probe, logger, toolkit } = this.deps;

    logger.info(`Detected operating system: ${PLATFORM_LABELS[platform]}`);

    logger.info('[1/5] Checking dependencies...');
    checkDependencies(platform, probe);
    logger.success('✓ All dependencies are installed.');

    logger.info('[2/5] Setting up directory structure...');
    ensureDirectories(cwd);
    logger.success('✓ Directory structure set up.');

    logger.info('[3/5] Initializing log files...');
    for (const created of initializeFiles(cwd)) logger.debug(`Created ${created}`);
    logger.success('✓ Log files initialized.');

    logger.info('[4/5] Making scripts executable...');
    makeScriptsExecutable(scriptsPath(cwd, this.deps.scriptsDir), platform);
    logger.success('✓ Scripts are now executable.');

    logger.info('[5/5] Configuring your agent...');
    const identity = await opts.identity();

    logger.info('Starting system services...');
    const monitors = opts.monitor === false ? null : this.deps.supervisor.start();

    await this.collaborate('register agent', () => toolkit.registerAgent(identity.id, identity.kind, identity.description));
    await this.collaborate('set status', () => toolkit.setStatus(identity.id, 'active', READY_NOTE));

    let heartbeat: HeartbeatHandle | null = null;
    if (opts.heartbeat !== false) {
      logger.info('Starting automatic heartbeat...');
      opts.beforeHeartbeat?.();
      heartbeat = this.deps.heartbeat.start(identity.id);
    }

    await this.collaborate('send welcome message', () =>
      toolkit.sendMessage(identity.id, 'all', `${identity.kind} agent '${identity.id}' has joined the collaboration.`),
    );
    await this.collaborate('generate snapshot', () => toolkit.generateSnapshot());

    logger.success('✓ Setup complete!');
    logger.info(`Your agent ID: ${identity.id} is registered and active.`);
    if (monitors?.launched.length) logger.info('Event monitoring is running in the background.');
    logger.info('You can now begin collaborating with other agents.');
    for (const line of quickReference(toolkit, identity.id)) logger.info(line);

    return { identity, monitors, heartbeat };
  }

  private async collaborate(label: string, call: () => Promise<RunResult>): Promise<void> {
    try {
      const result = await call();
      if (result.exitCode !== 0) {
        this.deps.logger.warn(`Warning: ${label} exited with code ${result.exitCode}`);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.deps.logger.warn(`Warning: could not ${label}: ${message}`);
    }
  }
}
